/**
 * Credentials Database Schema
 *
 * Tables for per-session OAuth credentials and in-flight authorization
 * states. Created if they don't exist.
 */

import type Database from 'better-sqlite3';
import { dbLogger } from '../utils/logger';

export function createTables(db: Database.Database): void {
  // Token columns hold AES-256-GCM ciphertext; scopes are space-joined
  db.exec(`
    CREATE TABLE IF NOT EXISTS credentials (
      session_id TEXT PRIMARY KEY,
      access_token TEXT NOT NULL,
      refresh_token TEXT,
      expires_at INTEGER NOT NULL,
      scopes TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS authorization_states (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL,
      requested_scopes TEXT NOT NULL,
      return_target TEXT,
      created_at INTEGER NOT NULL,
      consumed INTEGER NOT NULL DEFAULT 0
    );
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_authorization_states_created_at
      ON authorization_states(created_at);
  `);

  dbLogger.debug('Database tables created/verified');
}
