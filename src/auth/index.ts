/**
 * Credential Core
 *
 * Wires the scope registry, state manager, credential store, flow controller
 * and resolver together. Stores are injected, so a deployment picks the
 * backend (process memory or SQLite) without the components knowing.
 */

import type { OAuthProvider } from '../oauth/google-client';
import { InMemoryCredentialStore, type CredentialStore } from './credential-store';
import { CredentialResolver } from './credential-resolver';
import { AuthorizationFlowController } from './flow-controller';
import { ScopeRegistry, type ScopeTable } from './scope-registry';
import { InMemoryStateStore, StateTokenManager, type StateStore } from './state-manager';

export interface CredentialCore {
  registry: ScopeRegistry;
  states: StateTokenManager;
  store: CredentialStore;
  flow: AuthorizationFlowController;
  resolver: CredentialResolver;
}

export interface CredentialCoreOptions {
  provider: OAuthProvider;
  stateTtlSeconds: number;
  expirySkewSeconds: number;
  credentialStore?: CredentialStore;
  stateStore?: StateStore;
  scopeTable?: ScopeTable;
  now?: () => number;
}

export function createCredentialCore(options: CredentialCoreOptions): CredentialCore {
  const { provider, now } = options;

  const registry = new ScopeRegistry(options.scopeTable);
  const store = options.credentialStore ?? new InMemoryCredentialStore();
  const states = new StateTokenManager({
    store: options.stateStore ?? new InMemoryStateStore(),
    ttlSeconds: options.stateTtlSeconds,
    ...(now && { now }),
  });
  const flow = new AuthorizationFlowController({ provider, states, store, ...(now && { now }) });
  const resolver = new CredentialResolver({
    store,
    provider,
    flow,
    registry,
    expirySkewSeconds: options.expirySkewSeconds,
    ...(now && { now }),
  });

  return { registry, states, store, flow, resolver };
}

export * from './errors';
export * from './scopes';
export type { CredentialRecord, CredentialStore } from './credential-store';
export type { ResolveResult, ResolvedCredential, NeedsAuthorizationReason } from './credential-resolver';
export type { AuthorizationResult } from './flow-controller';
export type { AuthorizationState } from './state-manager';
