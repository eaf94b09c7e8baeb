/**
 * Database Connection Module
 *
 * Opens the SQLite database that backs the persistent credential and state
 * stores. Uses better-sqlite3: every statement is synchronous, so a single
 * statement is atomic with respect to all other requests in the process.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { dbLogger } from '../utils/logger';

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

/**
 * Open a database file (or `:memory:`) and apply connection pragmas
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      dbLogger.debug(`Created directory: ${dir}`);
    }
  }

  const connection = new Database(dbPath);

  // WAL: concurrent readers while a write is in progress
  connection.pragma('journal_mode = WAL');

  return connection;
}

/**
 * Open the process-wide connection
 */
export function initializeDatabase(dbPath: string): Database.Database {
  if (db) {
    return db;
  }
  db = openDatabase(dbPath);
  dbLogger.info(`Connected to database: ${dbPath}`);
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    dbLogger.info('Database connection closed');
  }
}
