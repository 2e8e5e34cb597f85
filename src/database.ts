/**
 * Database module.
 * Opens the SQLite file and creates the schema. Uses better-sqlite3 for
 * synchronous database operations; every caller owns its handle explicitly
 * instead of sharing a module-level connection.
 *
 * @module database
 */

import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import { logger } from "./utils/logger";

export type DatabaseHandle = Database.Database;

/**
 * Opens (creating if needed) the database at `databasePath`.
 * `":memory:"` opens a private in-memory database.
 *
 * @example
 * ```typescript
 * const db = openDatabase(config.databasePath);
 * initDb(db);
 * ```
 */
export function openDatabase(databasePath: string): DatabaseHandle {
	if (databasePath !== ":memory:") {
		fs.mkdirSync(path.dirname(path.resolve(databasePath)), { recursive: true });
	}

	const db = new Database(databasePath);
	if (databasePath !== ":memory:") {
		db.pragma("journal_mode = WAL");
	}
	return db;
}

/**
 * Creates the forwards log and the ban registry with their indexes.
 * Safe to call multiple times - uses IF NOT EXISTS clauses.
 *
 * - forwards: append-only log of successful publishes
 * - bans: ban registry; revocation flips `active`, rows are never deleted
 */
export const initDb = (db: DatabaseHandle): void => {
	db.exec(`
    CREATE TABLE IF NOT EXISTS forwards (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL,
      message_kind TEXT NOT NULL
        CHECK(message_kind IN ('text', 'photo', 'video', 'video_note')),
      timestamp INTEGER NOT NULL,
      local_time TEXT NOT NULL
    );
  `);

	db.exec(`
    CREATE TABLE IF NOT EXISTS bans (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      subject_user_id INTEGER NOT NULL,
      subject_display_name TEXT NOT NULL,
      issuer_user_id INTEGER NOT NULL,
      issuer_display_name TEXT NOT NULL,
      reason TEXT,
      ban_until INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      active INTEGER NOT NULL DEFAULT 1
    );
  `);

	db.exec(`
    CREATE INDEX IF NOT EXISTS idx_forwards_timestamp ON forwards(timestamp);
    CREATE INDEX IF NOT EXISTS idx_forwards_username ON forwards(username);
    CREATE INDEX IF NOT EXISTS idx_bans_subject ON bans(subject_user_id, active);
  `);

	logger.info("Database initialized successfully");
};
