/**
 * Credential Store
 *
 * Owns the per-session token bundle. Backends implement raw keyed
 * read/write/remove; this base class serializes every operation on a given
 * session id so a read-modify-write (refresh, re-authorization) never loses
 * a concurrent update to the same session.
 */

import { KeyedMutex } from './keyed-mutex';
import type { ScopeSet } from './scopes';

export interface CredentialRecord {
  readonly sessionId: string;
  readonly accessToken: string;
  readonly refreshToken?: string;
  /** Absolute expiry, epoch milliseconds */
  readonly expiresAt: number;
  readonly scopes: ScopeSet;
  readonly updatedAt: number;
}

/**
 * Returns the next record, or undefined to delete. Must not perform I/O:
 * it runs while the session is locked.
 */
export type CredentialMutator = (current: CredentialRecord | undefined) => CredentialRecord | undefined;

export interface CredentialStore {
  get(sessionId: string): Promise<CredentialRecord | undefined>;
  put(sessionId: string, record: CredentialRecord): Promise<void>;
  delete(sessionId: string): Promise<boolean>;
  update(sessionId: string, mutator: CredentialMutator): Promise<CredentialRecord | undefined>;
}

export abstract class KeyedCredentialStore implements CredentialStore {
  private readonly locks = new KeyedMutex();

  protected abstract read(sessionId: string): Promise<CredentialRecord | undefined>;
  protected abstract write(record: CredentialRecord): Promise<void>;
  protected abstract remove(sessionId: string): Promise<boolean>;

  get(sessionId: string): Promise<CredentialRecord | undefined> {
    return this.locks.runExclusive(sessionId, () => this.read(sessionId));
  }

  async put(sessionId: string, record: CredentialRecord): Promise<void> {
    assertOwnedBy(sessionId, record);
    return this.locks.runExclusive(sessionId, () => this.write(record));
  }

  delete(sessionId: string): Promise<boolean> {
    return this.locks.runExclusive(sessionId, () => this.remove(sessionId));
  }

  update(sessionId: string, mutator: CredentialMutator): Promise<CredentialRecord | undefined> {
    return this.locks.runExclusive(sessionId, async () => {
      const current = await this.read(sessionId);
      const next = mutator(current);

      if (next === undefined) {
        if (current !== undefined) {
          await this.remove(sessionId);
        }
        return undefined;
      }

      assertOwnedBy(sessionId, next);
      await this.write(next);
      return next;
    });
  }
}

function assertOwnedBy(sessionId: string, record: CredentialRecord): void {
  if (record.sessionId !== sessionId) {
    throw new Error('Credential record does not belong to this session');
  }
}

/**
 * Process-local backend for single-instance deployments
 */
export class InMemoryCredentialStore extends KeyedCredentialStore {
  private readonly records = new Map<string, CredentialRecord>();

  protected async read(sessionId: string): Promise<CredentialRecord | undefined> {
    return this.records.get(sessionId);
  }

  protected async write(record: CredentialRecord): Promise<void> {
    this.records.set(record.sessionId, record);
  }

  protected async remove(sessionId: string): Promise<boolean> {
    return this.records.delete(sessionId);
  }

  get size(): number {
    return this.records.size;
  }
}
