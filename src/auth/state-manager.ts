/**
 * State Token Manager
 *
 * Issues and consumes the single-use `state` values that correlate a consent
 * redirect with its callback. Consumption is a check-and-mark performed by
 * the backing store as one atomic step: of any number of concurrent callers
 * presenting the same identifier, exactly one succeeds.
 *
 * Consumed entries stay behind as tombstones until their TTL passes, so a
 * second presentation is reported as a replay rather than as unknown.
 */

import { nanoid } from 'nanoid';
import { stateLogger } from '../utils/logger';
import { ExpiredStateError, ReplayedStateError, UnknownStateError } from './errors';
import { normalizeScopes, type ScopeSet } from './scopes';

/** 32 URL-safe characters from a 64-symbol alphabet: 192 bits */
const STATE_ID_LENGTH = 32;

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export interface AuthorizationState {
  readonly id: string;
  /** Session that started the flow */
  readonly sessionId: string;
  readonly requestedScopes: ScopeSet;
  /** Where to send the user after a successful callback */
  readonly returnTarget?: string;
  /** Epoch milliseconds */
  readonly createdAt: number;
  readonly consumed: boolean;
}

export type ClaimOutcome =
  | { readonly status: 'claimed'; readonly state: AuthorizationState }
  | { readonly status: 'unknown' }
  | { readonly status: 'replayed' }
  | { readonly status: 'expired' };

/**
 * Keyed storage for authorization states
 */
export interface StateStore {
  insert(state: AuthorizationState): Promise<void>;
  /**
   * Atomically mark the state consumed if it exists, is unconsumed and was
   * created after `notBefore`. An expired entry is also marked consumed.
   */
  claim(id: string, notBefore: number): Promise<ClaimOutcome>;
  /** Drop entries created before `cutoff`; returns how many were dropped */
  evictCreatedBefore(cutoff: number): Promise<number>;
}

export class InMemoryStateStore implements StateStore {
  private readonly states = new Map<string, AuthorizationState>();

  async insert(state: AuthorizationState): Promise<void> {
    this.states.set(state.id, state);
  }

  async claim(id: string, notBefore: number): Promise<ClaimOutcome> {
    const state = this.states.get(id);
    if (!state) {
      return { status: 'unknown' };
    }
    if (state.consumed) {
      return { status: 'replayed' };
    }

    const consumed: AuthorizationState = { ...state, consumed: true };
    this.states.set(id, consumed);

    if (state.createdAt <= notBefore) {
      return { status: 'expired' };
    }
    return { status: 'claimed', state: consumed };
  }

  async evictCreatedBefore(cutoff: number): Promise<number> {
    let evicted = 0;
    for (const [id, state] of this.states) {
      if (state.createdAt <= cutoff) {
        this.states.delete(id);
        evicted++;
      }
    }
    return evicted;
  }

  get size(): number {
    return this.states.size;
  }
}

export interface StateTokenManagerOptions {
  store?: StateStore;
  ttlSeconds: number;
  sweepIntervalMs?: number;
  now?: () => number;
  generateId?: () => string;
}

export class StateTokenManager {
  private readonly store: StateStore;
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private lastSweepAt: number;

  constructor(options: StateTokenManagerOptions) {
    this.store = options.store ?? new InMemoryStateStore();
    this.ttlMs = options.ttlSeconds * 1000;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.now = options.now ?? (() => Date.now());
    this.generateId = options.generateId ?? (() => nanoid(STATE_ID_LENGTH));
    this.lastSweepAt = this.now();
  }

  async issue(sessionId: string, requestedScopes: Iterable<string>, returnTarget?: string): Promise<AuthorizationState> {
    await this.sweepIfDue();

    const state: AuthorizationState = {
      id: this.generateId(),
      sessionId,
      requestedScopes: normalizeScopes(requestedScopes),
      ...(returnTarget !== undefined && { returnTarget }),
      createdAt: this.now(),
      consumed: false,
    };

    await this.store.insert(state);
    stateLogger.debug(`Issued state ${describeId(state.id)} for session ${describeId(sessionId)}`);

    return state;
  }

  /**
   * @throws UnknownStateError | ExpiredStateError | ReplayedStateError
   */
  async consume(id: string): Promise<AuthorizationState> {
    const outcome = await this.store.claim(id, this.now() - this.ttlMs);

    switch (outcome.status) {
      case 'claimed':
        stateLogger.debug(`Consumed state ${describeId(id)}`);
        return outcome.state;
      case 'unknown':
        stateLogger.warn(`Rejected unknown state ${describeId(id)}`);
        throw new UnknownStateError();
      case 'replayed':
        stateLogger.warn(`Rejected replayed state ${describeId(id)}`);
        throw new ReplayedStateError();
      case 'expired':
        stateLogger.warn(`Rejected expired state ${describeId(id)}`);
        throw new ExpiredStateError();
    }
  }

  /**
   * Evict every entry whose TTL has passed, consumed or not
   */
  async purgeExpired(): Promise<number> {
    const now = this.now();
    this.lastSweepAt = now;
    const evicted = await this.store.evictCreatedBefore(now - this.ttlMs);
    if (evicted > 0) {
      stateLogger.debug(`Evicted ${evicted} expired state(s)`);
    }
    return evicted;
  }

  private async sweepIfDue(): Promise<void> {
    if (this.now() - this.lastSweepAt >= this.sweepIntervalMs) {
      await this.purgeExpired();
    }
  }
}

/**
 * Short prefix of an identifier, safe to log
 */
export function describeId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}…` : id;
}
