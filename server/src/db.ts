import Database, { type Database as DatabaseType } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import path from 'path';
import fs from 'fs';
import { SCHEMA } from './schema';

export interface DatabaseHandles {
  db: DatabaseType;
  drizzleDb: BetterSQLite3Database;
}

/**
 * Ensure the directory holding a file database exists and is writable.
 * better-sqlite3 reports the real error if it still cannot open the file.
 */
function prepareDatabaseDirectory(databasePath: string): void {
  const dbDir = path.dirname(databasePath);
  try {
    if (!fs.existsSync(dbDir)) {
      console.log(`[DB] Creating database directory: ${dbDir}`);
      fs.mkdirSync(dbDir, { recursive: true });
    }
    fs.accessSync(dbDir, fs.constants.W_OK);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[DB] ✗ Error preparing database directory: ${message}`);
  }
}

/**
 * Open a SQLite database and apply the schema.
 * Pass ':memory:' for an isolated in-memory database (tests).
 */
export function openDatabase(databasePath: string): DatabaseHandles {
  if (databasePath !== ':memory:') {
    prepareDatabaseDirectory(databasePath);
    console.log(`[DB] Connecting to database at ${databasePath}...`);
  }

  const db = new Database(databasePath);
  db.pragma('foreign_keys = ON');
  if (databasePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);

  return { db, drizzleDb: drizzle(db) };
}
