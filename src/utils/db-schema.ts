/**
 * Database initialization and schema.
 *
 * Owns every CREATE TABLE statement. The store classes in db-sqlite.ts and
 * db-sessions.ts prepare their statements against the handle returned here.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { logger } from '../middleware/logger.js';

export type SqliteHandle = InstanceType<typeof Database>;

export const IN_MEMORY = ':memory:';

/** Open (creating if needed) the marketplace database and apply the schema. */
export function openDatabase(path: string): SqliteHandle {
  if (path !== IN_MEMORY) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db: SqliteHandle = new Database(path, { timeout: 5000 });

  // busy_timeout must be set before switching journal mode.
  db.pragma('busy_timeout = 5000');
  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');

  applySchema(db);
  logger.info({ path }, 'SQLite database opened');
  return db;
}

// ── Schema ──────────────────────────────────────────────────────────

function applySchema(db: SqliteHandle): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY,
      username TEXT,
      first_name TEXT,
      last_name TEXT,
      phone TEXT,
      location TEXT,
      bio TEXT,
      is_active INTEGER NOT NULL DEFAULT 1,
      warning_count INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS admin_users (
      user_id INTEGER PRIMARY KEY REFERENCES users (id),
      role TEXT NOT NULL CHECK (role IN ('moderator', 'admin', 'super_admin')),
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS listings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      seller_id INTEGER NOT NULL REFERENCES users (id),
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      price REAL NOT NULL CHECK (price > 0),
      category TEXT NOT NULL,
      location TEXT,
      status TEXT NOT NULL DEFAULT 'active'
        CHECK (status IN ('active', 'sold', 'reserved', 'deleted')),
      is_flagged INTEGER NOT NULL DEFAULT 0,
      flag_reason TEXT,
      flagged_by INTEGER,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_listings_status_created
      ON listings (status, created_at DESC);

    CREATE INDEX IF NOT EXISTS idx_listings_seller
      ON listings (seller_id);

    CREATE TABLE IF NOT EXISTS listing_photos (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      listing_id INTEGER NOT NULL REFERENCES listings (id),
      file_id TEXT NOT NULL,
      unique_id TEXT NOT NULL,
      position INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_listing_photos_listing
      ON listing_photos (listing_id, position);

    CREATE TABLE IF NOT EXISTS favorites (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users (id),
      listing_id INTEGER NOT NULL REFERENCES listings (id),
      created_at INTEGER NOT NULL,
      UNIQUE (user_id, listing_id)
    );

    CREATE INDEX IF NOT EXISTS idx_favorites_user
      ON favorites (user_id, created_at DESC);

    CREATE TABLE IF NOT EXISTS reviews (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      listing_id INTEGER NOT NULL REFERENCES listings (id),
      seller_id INTEGER NOT NULL REFERENCES users (id),
      reviewer_id INTEGER NOT NULL REFERENCES users (id),
      rating INTEGER NOT NULL CHECK (rating BETWEEN 1 AND 5),
      comment TEXT,
      created_at INTEGER NOT NULL,
      UNIQUE (reviewer_id, listing_id)
    );

    CREATE INDEX IF NOT EXISTS idx_reviews_seller
      ON reviews (seller_id, created_at DESC);

    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      listing_id INTEGER REFERENCES listings (id),
      sender_id INTEGER NOT NULL REFERENCES users (id),
      receiver_id INTEGER NOT NULL REFERENCES users (id),
      text TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS user_warnings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id INTEGER NOT NULL REFERENCES users (id),
      admin_id INTEGER NOT NULL,
      reason TEXT NOT NULL,
      severity TEXT NOT NULL CHECK (severity IN ('low', 'medium', 'high')),
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at INTEGER NOT NULL,
      expires_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_user_warnings_user
      ON user_warnings (user_id, created_at DESC);

    CREATE TABLE IF NOT EXISTS admin_audit_log (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      actor_id INTEGER NOT NULL,
      action TEXT NOT NULL,
      target_type TEXT NOT NULL,
      target_id INTEGER,
      detail TEXT NOT NULL DEFAULT '{}',
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_audit_created
      ON admin_audit_log (created_at DESC, id DESC);

    CREATE TABLE IF NOT EXISTS sessions (
      principal_id INTEGER PRIMARY KEY,
      kind TEXT NOT NULL,
      state TEXT NOT NULL,
      payload TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_sessions_updated
      ON sessions (updated_at);
  `);
}

/** Close the raw database handle. */
export function closeDatabase(db: SqliteHandle): void {
  db.close();
  logger.info('SQLite database closed');
}
