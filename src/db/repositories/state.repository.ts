/**
 * Authorization State Repository
 *
 * SQLite backend for the state token manager. The check-and-mark of `claim`
 * is a single conditional UPDATE, so only one caller can flip `consumed`
 * from 0 to 1 for a given id.
 */

import type Database from 'better-sqlite3';
import type { AuthorizationState, ClaimOutcome, StateStore } from '../../auth/state-manager';
import { formatScopes, parseScopeString } from '../../auth/scopes';

interface StateRow {
  id: string;
  session_id: string;
  requested_scopes: string;
  return_target: string | null;
  created_at: number;
  consumed: number;
}

export class SqliteStateStore implements StateStore {
  private readonly insertStmt: Database.Statement<[StateRow]>;
  private readonly markStmt: Database.Statement<[string]>;
  private readonly selectStmt: Database.Statement<[string], StateRow>;
  private readonly evictStmt: Database.Statement<[number]>;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare<[StateRow]>(`
      INSERT INTO authorization_states (id, session_id, requested_scopes, return_target, created_at, consumed)
      VALUES (@id, @session_id, @requested_scopes, @return_target, @created_at, @consumed)
    `);
    this.markStmt = db.prepare<[string]>(
      'UPDATE authorization_states SET consumed = 1 WHERE id = ? AND consumed = 0'
    );
    this.selectStmt = db.prepare<[string], StateRow>('SELECT * FROM authorization_states WHERE id = ?');
    this.evictStmt = db.prepare<[number]>('DELETE FROM authorization_states WHERE created_at <= ?');
  }

  async insert(state: AuthorizationState): Promise<void> {
    this.insertStmt.run({
      id: state.id,
      session_id: state.sessionId,
      requested_scopes: formatScopes(state.requestedScopes),
      return_target: state.returnTarget ?? null,
      created_at: state.createdAt,
      consumed: state.consumed ? 1 : 0,
    });
  }

  async claim(id: string, notBefore: number): Promise<ClaimOutcome> {
    const marked = this.markStmt.run(id).changes === 1;
    const row = this.selectStmt.get(id);

    if (!row) {
      return { status: 'unknown' };
    }
    if (!marked) {
      return { status: 'replayed' };
    }
    if (row.created_at <= notBefore) {
      return { status: 'expired' };
    }
    return { status: 'claimed', state: toState(row) };
  }

  async evictCreatedBefore(cutoff: number): Promise<number> {
    return this.evictStmt.run(cutoff).changes;
  }
}

function toState(row: StateRow): AuthorizationState {
  return {
    id: row.id,
    sessionId: row.session_id,
    requestedScopes: parseScopeString(row.requested_scopes),
    ...(row.return_target !== null && { returnTarget: row.return_target }),
    createdAt: row.created_at,
    consumed: row.consumed === 1,
  };
}
