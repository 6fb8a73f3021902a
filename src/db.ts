import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';

/**
 * Export type for the database instance
 */
export type DbInstance = Database.Database;

export interface OpenDatabaseOptions {
  /** Called with every SQL statement executed */
  verbose?: (sql: string) => void;
}

const IN_MEMORY = ':memory:';

/**
 * Ensure the database directory exists
 */
const ensureDbDirectory = (dbPath: string): void => {
  if (dbPath === IN_MEMORY) return;

  const dir = dirname(dbPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
};

/**
 * Create the users table; email and user_id are unique, password_hash stays
 * null until a password is set
 */
const createSchema = (db: DbInstance): void => {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT UNIQUE NOT NULL,
      name TEXT NOT NULL,
      email TEXT UNIQUE NOT NULL,
      password_hash TEXT
    );
  `);
};

/**
 * Open (creating if needed) the SQLite database at dbPath
 */
export const openDatabase = (dbPath: string, options: OpenDatabaseOptions = {}): DbInstance => {
  ensureDbDirectory(dbPath);

  const db = new Database(dbPath, options.verbose ? { verbose: (message) => options.verbose?.(String(message)) } : {});

  // Enable foreign keys
  db.pragma('foreign_keys = ON');
  createSchema(db);

  return db;
};

/**
 * Drop and recreate the schema, discarding all users
 */
export const resetDatabase = (db: DbInstance): void => {
  db.exec('DROP TABLE IF EXISTS users');
  createSchema(db);
};
