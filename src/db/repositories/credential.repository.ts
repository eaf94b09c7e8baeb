/**
 * Credential Repository
 *
 * SQLite backend for the credential store. Access and refresh tokens are
 * encrypted at rest with AES-256-GCM; scopes are stored space-joined.
 * Per-session serialization comes from `KeyedCredentialStore`.
 */

import type Database from 'better-sqlite3';
import { KeyedCredentialStore, type CredentialRecord } from '../../auth/credential-store';
import { formatScopes, parseScopeString } from '../../auth/scopes';
import type { TokenCipher } from '../../utils/crypto';
import { dbLogger } from '../../utils/logger';

/**
 * Row structure matching the credentials table
 */
interface CredentialRow {
  session_id: string;
  access_token: string;
  refresh_token: string | null;
  expires_at: number;
  scopes: string;
  updated_at: number;
}

export class SqliteCredentialStore extends KeyedCredentialStore {
  private readonly selectStmt: Database.Statement<[string], CredentialRow>;
  private readonly upsertStmt: Database.Statement<[CredentialRow]>;
  private readonly deleteStmt: Database.Statement<[string]>;

  constructor(
    db: Database.Database,
    private readonly cipher: TokenCipher
  ) {
    super();
    this.selectStmt = db.prepare<[string], CredentialRow>('SELECT * FROM credentials WHERE session_id = ?');
    this.upsertStmt = db.prepare<[CredentialRow]>(`
      INSERT INTO credentials (session_id, access_token, refresh_token, expires_at, scopes, updated_at)
      VALUES (@session_id, @access_token, @refresh_token, @expires_at, @scopes, @updated_at)
      ON CONFLICT(session_id) DO UPDATE SET
        access_token = excluded.access_token,
        refresh_token = excluded.refresh_token,
        expires_at = excluded.expires_at,
        scopes = excluded.scopes,
        updated_at = excluded.updated_at
    `);
    this.deleteStmt = db.prepare<[string]>('DELETE FROM credentials WHERE session_id = ?');
  }

  protected async read(sessionId: string): Promise<CredentialRecord | undefined> {
    const row = this.selectStmt.get(sessionId);
    return row ? this.toRecord(row) : undefined;
  }

  protected async write(record: CredentialRecord): Promise<void> {
    this.upsertStmt.run({
      session_id: record.sessionId,
      access_token: this.cipher.encrypt(record.accessToken),
      refresh_token: record.refreshToken !== undefined ? this.cipher.encrypt(record.refreshToken) : null,
      expires_at: record.expiresAt,
      scopes: formatScopes(record.scopes),
      updated_at: record.updatedAt,
    });
    dbLogger.debug(`Stored credential for session ${record.sessionId.slice(0, 8)}…`);
  }

  protected async remove(sessionId: string): Promise<boolean> {
    return this.deleteStmt.run(sessionId).changes > 0;
  }

  private toRecord(row: CredentialRow): CredentialRecord {
    return {
      sessionId: row.session_id,
      accessToken: this.cipher.decrypt(row.access_token),
      ...(row.refresh_token !== null && { refreshToken: this.cipher.decrypt(row.refresh_token) }),
      expiresAt: row.expires_at,
      scopes: parseScopeString(row.scopes),
      updatedAt: row.updated_at,
    };
  }
}
