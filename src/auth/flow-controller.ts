/**
 * Authorization Flow Controller
 *
 * Drives the three-legged OAuth2 flow for one authorization attempt:
 *
 *   START → REDIRECTED → CALLBACK_RECEIVED → EXCHANGED | FAILED
 *
 * `beginAuthorization` covers START → REDIRECTED (the caller issues the
 * actual HTTP redirect); `completeAuthorization` covers the callback. Neither
 * touches HTTP, so the state machine can be exercised without a web layer.
 */

import { authLogger } from '../utils/logger';
import type { OAuthProvider, ProviderTokens } from '../oauth/google-client';
import type { CredentialRecord, CredentialStore } from './credential-store';
import { ExchangeFailedError, InvalidStateError, StateTokenError } from './errors';
import { describeId, type AuthorizationState, type StateTokenManager } from './state-manager';
import { missingScopes, unionScopes, type ScopeSet } from './scopes';

export type AuthorizationPhase = 'START' | 'REDIRECTED' | 'CALLBACK_RECEIVED' | 'EXCHANGED' | 'FAILED';

export interface AuthorizationResult {
  readonly credential: CredentialRecord;
  readonly returnTarget?: string;
  /** Requested scopes the user declined on the consent screen */
  readonly missingScopes: ScopeSet;
}

export interface CompleteAuthorizationOptions {
  /**
   * Session presenting the callback. When given, it must be the session
   * that began the flow.
   */
  sessionId?: string;
}

export interface AuthorizationFlowControllerOptions {
  provider: OAuthProvider;
  states: StateTokenManager;
  store: CredentialStore;
  now?: () => number;
}

export class AuthorizationFlowController {
  private readonly provider: OAuthProvider;
  private readonly states: StateTokenManager;
  private readonly store: CredentialStore;
  private readonly now: () => number;

  constructor(options: AuthorizationFlowControllerOptions) {
    this.provider = options.provider;
    this.states = options.states;
    this.store = options.store;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Build the consent URL for a session. The requested scopes are merged with
   * everything already granted, so re-authorization only ever broadens access.
   */
  async beginAuthorization(sessionId: string, requiredScopes: Iterable<string>, returnTarget?: string): Promise<string> {
    const existing = await this.store.get(sessionId);
    const scopes = unionScopes(requiredScopes, existing?.scopes ?? []);

    const state = await this.states.issue(sessionId, scopes, returnTarget);
    const url = this.provider.buildConsentUrl({ scopes, state: state.id });

    this.transition(state.id, 'REDIRECTED', `session ${describeId(sessionId)}, scopes: ${scopes.join(' ')}`);
    return url;
  }

  /**
   * Handle the provider callback: validate the state, exchange the code and
   * store the resulting credential.
   *
   * @throws InvalidStateError if the state is unknown, expired, replayed or bound to another session
   * @throws ExchangeFailedError if the provider did not issue tokens; never retried
   */
  async completeAuthorization(
    stateParam: string,
    authorizationCode: string,
    options: CompleteAuthorizationOptions = {}
  ): Promise<AuthorizationResult> {
    const state = await this.consumeState(stateParam);
    this.transition(state.id, 'CALLBACK_RECEIVED');

    if (options.sessionId !== undefined && options.sessionId !== state.sessionId) {
      this.transition(state.id, 'FAILED', 'callback presented by a different session');
      throw new InvalidStateError();
    }

    let tokens: ProviderTokens;
    try {
      tokens = await this.provider.exchangeCode(authorizationCode);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'unknown error';
      this.transition(state.id, 'FAILED', message);
      throw new ExchangeFailedError(undefined, { cause: error });
    }

    const credential = await this.store.update(state.sessionId, (current) =>
      this.buildRecord(state, tokens, current)
    );
    if (!credential) {
      throw new Error('Credential record was not written');
    }

    const declined = missingScopes(state.requestedScopes, credential.scopes);
    this.transition(
      state.id,
      'EXCHANGED',
      declined.length > 0 ? `declined scopes: ${declined.join(' ')}` : `granted: ${credential.scopes.join(' ')}`
    );

    return {
      credential,
      ...(state.returnTarget !== undefined && { returnTarget: state.returnTarget }),
      missingScopes: declined,
    };
  }

  /**
   * Consume the state of an attempt the provider ended with an error
   * (e.g. the user pressed "Cancel"), so it can never be completed later.
   */
  async abandonAuthorization(stateParam: string, reason: string): Promise<void> {
    try {
      const state = await this.states.consume(stateParam);
      this.transition(state.id, 'FAILED', `provider returned error: ${reason}`);
    } catch (error) {
      if (!(error instanceof StateTokenError)) throw error;
      authLogger.warn(`Ignoring abandoned attempt with unusable state: ${error.message}`);
    }
  }

  /**
   * Forget the session's credential and revoke it at the provider. The local
   * record is removed first; revocation is best effort.
   */
  async signOut(sessionId: string): Promise<boolean> {
    const captured: { record?: CredentialRecord } = {};
    await this.store.update(sessionId, (current) => {
      captured.record = current;
      return undefined;
    });

    const removed = captured.record;
    if (!removed) {
      return false;
    }

    authLogger.info(`Signed out session ${describeId(sessionId)}`);
    await this.provider.revoke(removed.refreshToken ?? removed.accessToken);
    return true;
  }

  private async consumeState(stateParam: string): Promise<AuthorizationState> {
    try {
      return await this.states.consume(stateParam);
    } catch (error) {
      if (error instanceof StateTokenError) {
        authLogger.warn(`Callback rejected for state ${describeId(stateParam)}: ${error.message}`);
        throw new InvalidStateError({ cause: error });
      }
      throw error;
    }
  }

  private buildRecord(
    state: AuthorizationState,
    tokens: ProviderTokens,
    current: CredentialRecord | undefined
  ): CredentialRecord {
    const granted = tokens.scopes ?? state.requestedScopes;
    const refreshToken = tokens.refreshToken ?? current?.refreshToken;

    return {
      sessionId: state.sessionId,
      accessToken: tokens.accessToken,
      ...(refreshToken !== undefined && { refreshToken }),
      expiresAt: tokens.expiresAt,
      scopes: unionScopes(current?.scopes ?? [], granted),
      updatedAt: this.now(),
    };
  }

  private transition(stateId: string, phase: AuthorizationPhase, detail?: string): void {
    const suffix = detail ? ` (${detail})` : '';
    const line = `Attempt ${describeId(stateId)} → ${phase}${suffix}`;
    if (phase === 'FAILED') {
      authLogger.warn(line);
    } else {
      authLogger.info(line);
    }
  }
}
