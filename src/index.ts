/**
 * Workspace Agent Gateway
 *
 * Signs users in with Google once and hands short-lived access tokens to the
 * Workspace agents (Sheets, Docs, Drive, Slides, Calendar, Chat), refreshing
 * them transparently.
 *
 * Flow: Browser → /auth/login → Google consent → /auth/callback → Agents → /agents/:agent/token
 */

// Config must be imported first to validate environment variables
import { config } from './config';

import { createCredentialCore, type CredentialCoreOptions } from './auth';
import { closeDatabase, initializeDatabase } from './db';
import { createTables } from './db/credentials.schema';
import { SqliteCredentialStore } from './db/repositories/credential.repository';
import { SqliteStateStore } from './db/repositories/state.repository';
import { GoogleOAuthProvider } from './oauth/google-client';
import { createHttpServer, startHttpServer, stopHttpServer } from './oauth/server';
import { createTokenCipher } from './utils/crypto';
import { serverLogger } from './utils/logger';

/**
 * Persistent stores when configured; otherwise the core falls back to
 * process memory.
 */
function createStores(): Pick<CredentialCoreOptions, 'credentialStore' | 'stateStore'> {
  if (config.credentialStore !== 'sqlite') {
    serverLogger.info('Using in-memory credential store (credentials are lost on restart)');
    return {};
  }

  if (!config.encryptionKey) {
    throw new Error('ENCRYPTION_KEY is required for the sqlite credential store');
  }

  serverLogger.info('Initializing database...');
  const db = initializeDatabase(config.databasePath);
  createTables(db);

  return {
    credentialStore: new SqliteCredentialStore(db, createTokenCipher(config.encryptionKey)),
    stateStore: new SqliteStateStore(db),
  };
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  serverLogger.info('Starting Workspace Agent Gateway');

  const provider = new GoogleOAuthProvider({
    clientId: config.googleClientId,
    clientSecret: config.googleClientSecret,
    redirectUri: config.googleRedirectUri,
    requestTimeoutMs: config.tokenRequestTimeoutMs,
  });

  const core = createCredentialCore({
    provider,
    stateTtlSeconds: config.stateTtlSeconds,
    expirySkewSeconds: config.expirySkewSeconds,
    ...createStores(),
  });

  const app = createHttpServer({
    core,
    sessionSecret: config.sessionSecret,
    cookieSecure: config.cookieSecure,
  });
  const server = await startHttpServer(app, config.httpPort);

  serverLogger.info(`Agents: ${core.registry.agents().join(', ')}`);
  serverLogger.info('Server ready - Press Ctrl+C to stop');

  // Handle graceful shutdown on Ctrl+C
  process.on('SIGINT', () => {
    serverLogger.info('Received shutdown signal...');

    stopHttpServer(server)
      .then(() => {
        closeDatabase();
        serverLogger.info('Goodbye!');
        process.exit(0);
      })
      .catch((err: unknown) => {
        serverLogger.error('Error during shutdown', { error: err });
        process.exit(1);
      });
  });

  // Handle uncaught errors
  process.on('uncaughtException', (err) => {
    serverLogger.error('Uncaught exception', { error: err });
    closeDatabase();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    serverLogger.error('Unhandled rejection', { reason });
    closeDatabase();
    process.exit(1);
  });
}

// Start the application
main().catch((err: unknown) => {
  serverLogger.error('Failed to start', { error: err });
  closeDatabase();
  process.exit(1);
});
