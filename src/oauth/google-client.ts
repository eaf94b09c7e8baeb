/**
 * Google OAuth Client
 *
 * Talks to Google's authorization and token endpoints through
 * google-auth-library: builds consent URLs, exchanges authorization codes,
 * refreshes access tokens and revokes tokens. Every token-endpoint call is
 * bounded by a timeout, and failures are classified as either an explicit
 * rejection by Google or Google being unreachable.
 */

import { OAuth2Client, type Credentials } from 'google-auth-library';
import { authLogger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { DEFAULT_TOKEN_LIFETIME_MS, GOOGLE_REVOKE_URL } from '../constants/google-api';
import { ProviderRejectedError, ProviderUnavailableError } from '../auth/errors';
import { formatScopes, parseScopeString, type ScopeSet } from '../auth/scopes';

/**
 * Token material returned by the provider
 */
export interface ProviderTokens {
  accessToken: string;
  /** Absent on most refreshes; present when the provider rotates it */
  refreshToken?: string;
  /** Absolute expiry, epoch milliseconds */
  expiresAt: number;
  /** Granted scopes, when the provider reported them */
  scopes?: ScopeSet;
}

export interface ConsentUrlParams {
  scopes: ScopeSet;
  state: string;
}

/**
 * The OAuth2 authorization-code grant as seen by the credential core
 */
export interface OAuthProvider {
  buildConsentUrl(params: ConsentUrlParams): string;
  /** @throws ProviderRejectedError | ProviderUnavailableError */
  exchangeCode(code: string): Promise<ProviderTokens>;
  /** @throws ProviderRejectedError | ProviderUnavailableError */
  refresh(refreshToken: string): Promise<ProviderTokens>;
  /** Best effort; resolves false when Google did not confirm */
  revoke(token: string): Promise<boolean>;
}

export interface GoogleOAuthProviderOptions {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  requestTimeoutMs: number;
  now?: () => number;
}

/**
 * Shape of the errors gaxios raises for HTTP failures
 */
interface HttpFailure {
  response: {
    status: number;
    data?: unknown;
  };
}

const TRANSIENT_CLIENT_STATUSES = new Set([408, 429]);

function isHttpFailure(error: unknown): error is HttpFailure {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return false;
  }
  const { response } = error;
  return typeof response === 'object' && response !== null && 'status' in response && typeof response.status === 'number';
}

function oauthErrorCode(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
    return data.error;
  }
  return undefined;
}

/**
 * Map a failure from google-auth-library onto the gateway's error taxonomy.
 * A 4xx answer is Google saying no, except a request timeout or rate limit;
 * everything else means it could not be reached or failed on its side.
 */
export function classifyProviderError(error: unknown, operation: string): ProviderRejectedError | ProviderUnavailableError {
  if (error instanceof ProviderRejectedError || error instanceof ProviderUnavailableError) {
    return error;
  }

  if (isHttpFailure(error)) {
    const { status, data } = error.response;
    if (status >= 400 && status < 500 && !TRANSIENT_CLIENT_STATUSES.has(status)) {
      const code = oauthErrorCode(data);
      return new ProviderRejectedError(
        `Google rejected ${operation} (${status}${code ? `: ${code}` : ''})`,
        code,
        { cause: error }
      );
    }
    return new ProviderUnavailableError(`Google failed ${operation} (${status})`, { cause: error });
  }

  const message = error instanceof Error ? error.message : 'unknown error';
  return new ProviderUnavailableError(`Could not reach Google for ${operation}: ${message}`, {
    cause: error,
  });
}

export class GoogleOAuthProvider implements OAuthProvider {
  private readonly options: GoogleOAuthProviderOptions;
  private readonly now: () => number;

  /**
   * Shared client for URL generation and code exchange; these calls carry
   * no per-user credentials.
   */
  private readonly client: OAuth2Client;

  constructor(options: GoogleOAuthProviderOptions) {
    this.options = options;
    this.now = options.now ?? (() => Date.now());
    this.client = this.createClient();
  }

  buildConsentUrl({ scopes, state }: ConsentUrlParams): string {
    return this.client.generateAuthUrl({
      access_type: 'offline', // Request refresh_token for long-term access
      prompt: 'consent', // Always show consent screen to get refresh_token
      include_granted_scopes: true,
      response_type: 'code',
      scope: formatScopes(scopes),
      state,
    });
  }

  async exchangeCode(code: string): Promise<ProviderTokens> {
    authLogger.debug('Exchanging authorization code for tokens');
    const startedAt = this.now();

    let credentials: Credentials;
    try {
      const { tokens } = await this.bounded(this.client.getToken(code), 'code exchange');
      credentials = tokens;
    } catch (error) {
      throw classifyProviderError(error, 'code exchange');
    }

    if (!credentials.access_token) {
      throw new ProviderRejectedError('No access token received from Google');
    }

    authLogger.info(`Exchanged authorization code in ${this.now() - startedAt}ms`);
    return this.toProviderTokens(credentials.access_token, credentials);
  }

  async refresh(refreshToken: string): Promise<ProviderTokens> {
    authLogger.debug('Refreshing access token');
    const startedAt = this.now();

    // A dedicated client: credentials are per user and must not leak
    // between concurrent refreshes.
    const client = this.createClient();
    client.setCredentials({ refresh_token: refreshToken });

    let credentials: Credentials;
    try {
      const response = await this.bounded(client.refreshAccessToken(), 'token refresh');
      credentials = response.credentials;
    } catch (error) {
      throw classifyProviderError(error, 'token refresh');
    }

    if (!credentials.access_token) {
      throw new ProviderRejectedError('Failed to refresh access token');
    }

    authLogger.info(`Refreshed access token in ${this.now() - startedAt}ms`);
    return this.toProviderTokens(credentials.access_token, credentials);
  }

  async revoke(token: string): Promise<boolean> {
    try {
      const response = await fetch(GOOGLE_REVOKE_URL, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ token }).toString(),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });

      if (!response.ok) {
        authLogger.warn(`Token revoke request failed with ${response.status} (may already be revoked)`);
        return false;
      }

      authLogger.info('Token successfully revoked');
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'unknown error';
      authLogger.warn(`Token revoke error: ${message}`);
      return false;
    }
  }

  private createClient(): OAuth2Client {
    return new OAuth2Client(this.options.clientId, this.options.clientSecret, this.options.redirectUri);
  }

  private bounded<T>(operation: Promise<T>, label: string): Promise<T> {
    const timeoutMs = this.options.requestTimeoutMs;
    return withTimeout(
      operation,
      timeoutMs,
      () => new ProviderUnavailableError(`Google ${label} timed out after ${timeoutMs}ms`)
    );
  }

  private toProviderTokens(accessToken: string, credentials: Credentials): ProviderTokens {
    const scopes = parseScopeString(credentials.scope);
    return {
      accessToken,
      ...(credentials.refresh_token ? { refreshToken: credentials.refresh_token } : {}),
      expiresAt: credentials.expiry_date ?? this.now() + DEFAULT_TOKEN_LIFETIME_MS,
      ...(scopes.length > 0 && { scopes }),
    };
  }
}
