/**
 * Credential Resolver
 *
 * The per-request entry point for agents: given a session and the scopes an
 * operation needs, returns a usable access token or tells the caller where to
 * send the user for consent. Expired tokens are refreshed transparently.
 *
 * Refreshes for one session are single-flight: concurrent requests share one
 * provider call. The provider is called outside the session lock and the
 * result is written back under it, only if the record still holds the refresh
 * token that was used (a concurrent sign-out or re-login wins).
 */

import { authLogger } from '../utils/logger';
import type { OAuthProvider, ProviderTokens } from '../oauth/google-client';
import type { CredentialRecord, CredentialStore } from './credential-store';
import { ProviderRejectedError, ProviderUnavailableError, RefreshFailedError } from './errors';
import type { AuthorizationFlowController } from './flow-controller';
import type { ScopeRegistry } from './scope-registry';
import { describeId } from './state-manager';
import { isSubset, normalizeScopes, type ScopeSet } from './scopes';

const DEFAULT_EXPIRY_SKEW_MS = 60_000;
const INVALID_GRANT = 'invalid_grant';

/**
 * Snapshot handed to a caller for the current request only
 */
export interface ResolvedCredential {
  readonly sessionId: string;
  readonly accessToken: string;
  readonly expiresAt: number;
  readonly scopes: ScopeSet;
}

export type NeedsAuthorizationReason =
  | 'no_credential'
  | 'insufficient_scope'
  | 'refresh_unavailable'
  | 'refresh_failed'
  | 'provider_unavailable';

export type ResolveResult =
  | { readonly status: 'resolved'; readonly credential: ResolvedCredential }
  | {
      readonly status: 'needs_authorization';
      readonly reason: NeedsAuthorizationReason;
      readonly redirectUrl: string;
    };

export interface ResolveOptions {
  /** Post-login destination embedded in the consent redirect */
  returnTarget?: string;
}

export interface CredentialResolverOptions {
  store: CredentialStore;
  provider: OAuthProvider;
  flow: AuthorizationFlowController;
  registry: ScopeRegistry;
  expirySkewSeconds?: number;
  now?: () => number;
}

type RefreshOutcome =
  | { readonly status: 'refreshed'; readonly record: CredentialRecord }
  | { readonly status: 'rejected'; readonly error: RefreshFailedError }
  | { readonly status: 'unavailable'; readonly error: ProviderUnavailableError };

export class CredentialResolver {
  private readonly store: CredentialStore;
  private readonly provider: OAuthProvider;
  private readonly flow: AuthorizationFlowController;
  private readonly registry: ScopeRegistry;
  private readonly expirySkewMs: number;
  private readonly now: () => number;
  private readonly inFlightRefreshes = new Map<string, Promise<RefreshOutcome>>();

  constructor(options: CredentialResolverOptions) {
    this.store = options.store;
    this.provider = options.provider;
    this.flow = options.flow;
    this.registry = options.registry;
    this.expirySkewMs =
      options.expirySkewSeconds !== undefined ? options.expirySkewSeconds * 1000 : DEFAULT_EXPIRY_SKEW_MS;
    this.now = options.now ?? (() => Date.now());
  }

  async resolve(sessionId: string, requiredScopes: Iterable<string>, options: ResolveOptions = {}): Promise<ResolveResult> {
    const required = normalizeScopes(requiredScopes);
    const record = await this.store.get(sessionId);

    if (!record) {
      return this.needsAuthorization(sessionId, required, 'no_credential', options);
    }

    if (!isSubset(required, record.scopes)) {
      return this.needsAuthorization(sessionId, required, 'insufficient_scope', options);
    }

    if (!this.isExpired(record)) {
      return resolved(record);
    }

    if (!record.refreshToken) {
      authLogger.info(`Session ${describeId(sessionId)} has an expired token and no refresh token`);
      return this.needsAuthorization(sessionId, required, 'refresh_unavailable', options);
    }

    const outcome = await this.refreshOnce(record);
    if (outcome.status === 'refreshed') {
      return resolved(outcome.record);
    }

    // A sign-in that landed while the refresh was in flight may have stored a usable credential.
    const current = await this.store.get(sessionId);
    if (current && isSubset(required, current.scopes) && !this.isExpired(current)) {
      return resolved(current);
    }

    switch (outcome.status) {
      case 'rejected':
        return this.needsAuthorization(sessionId, required, 'refresh_failed', options);
      case 'unavailable':
        // The stored token may still be usable inside the skew margin.
        if (record.expiresAt > this.now()) {
          authLogger.warn(`Refresh unavailable for ${describeId(sessionId)}; serving stored token until expiry`);
          return resolved(record);
        }
        return this.needsAuthorization(sessionId, required, 'provider_unavailable', options);
    }
  }

  /**
   * Resolve the merged scopes of registered agents
   *
   * @throws UnknownAgentError for an unregistered agent name
   */
  resolveForAgents(sessionId: string, agentNames: string[], options: ResolveOptions = {}): Promise<ResolveResult> {
    return this.resolve(sessionId, this.registry.mergedScopes(...agentNames), options);
  }

  private isExpired(record: CredentialRecord): boolean {
    return record.expiresAt - this.expirySkewMs <= this.now();
  }

  private async needsAuthorization(
    sessionId: string,
    required: ScopeSet,
    reason: NeedsAuthorizationReason,
    options: ResolveOptions
  ): Promise<ResolveResult> {
    const redirectUrl = await this.flow.beginAuthorization(sessionId, required, options.returnTarget);
    return { status: 'needs_authorization', reason, redirectUrl };
  }

  private refreshOnce(record: CredentialRecord): Promise<RefreshOutcome> {
    const existing = this.inFlightRefreshes.get(record.sessionId);
    if (existing) {
      return existing;
    }

    const pending = this.refresh(record).finally(() => {
      this.inFlightRefreshes.delete(record.sessionId);
    });
    this.inFlightRefreshes.set(record.sessionId, pending);
    return pending;
  }

  private async refresh(record: CredentialRecord): Promise<RefreshOutcome> {
    const { sessionId } = record;
    const usedRefreshToken = record.refreshToken;
    if (!usedRefreshToken) {
      return { status: 'rejected', error: new RefreshFailedError('No refresh token stored') };
    }

    let tokens: ProviderTokens;
    try {
      tokens = await this.provider.refresh(usedRefreshToken);
    } catch (error) {
      if (error instanceof ProviderRejectedError && error.oauthError === INVALID_GRANT) {
        authLogger.warn(`Refresh for ${describeId(sessionId)} rejected, credential removed: ${error.message}`);
        await this.store.update(sessionId, (current) =>
          current?.refreshToken === usedRefreshToken ? undefined : current
        );
        return { status: 'rejected', error: new RefreshFailedError(undefined, { cause: error }) };
      }

      // Only a revoked grant forces a new sign-in; anything else keeps the credential.
      const unavailable =
        error instanceof ProviderUnavailableError
          ? error
          : new ProviderUnavailableError(
              `Token refresh failed: ${error instanceof Error ? error.message : 'unknown error'}`,
              { cause: error }
            );
      authLogger.warn(`Refresh for ${describeId(sessionId)} failed, credential kept: ${unavailable.message}`);
      return { status: 'unavailable', error: unavailable };
    }

    const written = await this.store.update(sessionId, (current) => {
      if (!current || current.refreshToken !== usedRefreshToken) {
        return current;
      }
      return {
        ...current,
        accessToken: tokens.accessToken,
        refreshToken: tokens.refreshToken ?? current.refreshToken,
        expiresAt: tokens.expiresAt,
        updatedAt: this.now(),
      };
    });

    if (!written) {
      // Signed out while the refresh was in flight.
      return { status: 'rejected', error: new RefreshFailedError('Credential removed during refresh') };
    }

    authLogger.info(`Refreshed credential for session ${describeId(sessionId)}`);
    return { status: 'refreshed', record: written };
  }
}

function resolved(record: CredentialRecord): ResolveResult {
  const credential: ResolvedCredential = Object.freeze({
    sessionId: record.sessionId,
    accessToken: record.accessToken,
    expiresAt: record.expiresAt,
    scopes: record.scopes,
  });
  return { status: 'resolved', credential };
}
