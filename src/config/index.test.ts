/**
 * Unit Tests for the configuration loader
 *
 * Loads the module in isolation against a controlled environment.
 * Schema rules are covered in schema.test.ts.
 */

// Keep a developer's .env out of the tests
jest.mock('dotenv', () => ({ config: jest.fn() }));

type ConfigModule = typeof import('./index');

const VALID_ENV = {
  GOOGLE_CLIENT_ID: 'test-client-id',
  GOOGLE_CLIENT_SECRET: 'test-client-secret',
  SESSION_SECRET: 'test-session-secret-test-session-secret',
};

describe('config', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { NODE_ENV: 'test' };
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  function loadModule(): ConfigModule {
    let loaded: ConfigModule | undefined;
    jest.isolateModules(() => {
      loaded = require('./index');
    });
    if (!loaded) {
      throw new Error('config module did not load');
    }
    return loaded;
  }

  it('should load a valid environment', () => {
    Object.assign(process.env, VALID_ENV, { HTTP_PORT: '8080', CREDENTIAL_STORE: 'memory' });

    const { config } = loadModule();

    expect(config).toMatchObject({
      googleClientId: 'test-client-id',
      googleClientSecret: 'test-client-secret',
      httpPort: 8080,
      credentialStore: 'memory',
      stateTtlSeconds: 600,
    });
  });

  it('should exit with status 1 when configuration is invalid', () => {
    Object.assign(process.env, VALID_ENV, { GOOGLE_CLIENT_SECRET: '' });
    const exit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(() => loadModule()).toThrow('process.exit called');

    expect(exit).toHaveBeenCalledWith(1);
    expect(consoleError).toHaveBeenCalledWith('  • googleClientSecret: GOOGLE_CLIENT_SECRET is required');
  });
});
