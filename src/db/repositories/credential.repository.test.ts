/**
 * Unit Tests for the SQLite Credential Repository
 *
 * Runs against an in-memory database.
 */

import type Database from 'better-sqlite3';
import { openDatabase } from '../index';
import { createTables } from '../credentials.schema';
import type { CredentialRecord } from '../../auth/credential-store';
import { createTokenCipher, isEncrypted } from '../../utils/crypto';
import { SqliteCredentialStore } from './credential.repository';

const TEST_KEY = '0123456789abcdef'.repeat(4);
const OTHER_KEY = 'fedcba9876543210'.repeat(4);

const record: CredentialRecord = {
  sessionId: 'session-1',
  accessToken: 'access-1',
  refreshToken: 'refresh-1',
  expiresAt: 1_772_355_600_000,
  scopes: ['scope:a', 'scope:b'],
  updatedAt: 1_772_352_000_000,
};

interface RawRow {
  access_token: string;
  refresh_token: string | null;
  scopes: string;
}

describe('SqliteCredentialStore', () => {
  let db: Database.Database;
  let store: SqliteCredentialStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    createTables(db);
    store = new SqliteCredentialStore(db, createTokenCipher(TEST_KEY));
  });

  afterEach(() => {
    db.close();
  });

  function rawRow(sessionId: string): RawRow | undefined {
    return db
      .prepare<[string], RawRow>('SELECT access_token, refresh_token, scopes FROM credentials WHERE session_id = ?')
      .get(sessionId);
  }

  it('should return undefined for an unknown session', async () => {
    await expect(store.get('session-1')).resolves.toBeUndefined();
  });

  it('should round-trip a record', async () => {
    await store.put('session-1', record);

    await expect(store.get('session-1')).resolves.toEqual(record);
  });

  it('should encrypt tokens at rest', async () => {
    await store.put('session-1', record);

    const row = rawRow('session-1');
    expect(row?.access_token).not.toBe('access-1');
    expect(isEncrypted(row?.access_token ?? '')).toBe(true);
    expect(isEncrypted(row?.refresh_token ?? '')).toBe(true);
    expect(row?.scopes).toBe('scope:a scope:b');
  });

  it('should store a record without a refresh token', async () => {
    await store.put('session-1', { ...record, refreshToken: undefined });

    const stored = await store.get('session-1');
    expect(stored).not.toHaveProperty('refreshToken');
    expect(rawRow('session-1')?.refresh_token).toBeNull();
  });

  it('should overwrite on put', async () => {
    await store.put('session-1', record);
    await store.put('session-1', { ...record, accessToken: 'access-2', scopes: ['scope:c'] });

    await expect(store.get('session-1')).resolves.toMatchObject({ accessToken: 'access-2', scopes: ['scope:c'] });
  });

  it('should apply updates under the session lock', async () => {
    await store.put('session-1', record);

    const updated = await store.update('session-1', (current) =>
      current ? { ...current, accessToken: 'access-2' } : current
    );

    expect(updated).toMatchObject({ accessToken: 'access-2', refreshToken: 'refresh-1' });
    await expect(store.get('session-1')).resolves.toEqual(updated);
  });

  it('should delete records', async () => {
    await store.put('session-1', record);

    await expect(store.delete('session-1')).resolves.toBe(true);
    await expect(store.delete('session-1')).resolves.toBe(false);
    expect(rawRow('session-1')).toBeUndefined();
  });

  it('should fail to read tokens written under another key', async () => {
    await store.put('session-1', record);
    const otherStore = new SqliteCredentialStore(db, createTokenCipher(OTHER_KEY));

    await expect(otherStore.get('session-1')).rejects.toThrow();
  });
});
