import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { logger } from '../lib/logger.js';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS appointments (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    slot_start TEXT NOT NULL,
    slot_end TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN ('tentative', 'confirmed', 'cancelled')),
    remote_event_id TEXT UNIQUE,
    booking_key TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    CHECK ((status = 'tentative' AND remote_event_id IS NULL)
        OR (status = 'confirmed' AND remote_event_id IS NOT NULL)
        OR status = 'cancelled')
  );

  CREATE UNIQUE INDEX IF NOT EXISTS unique_active_slot
  ON appointments(slot_start, slot_end)
  WHERE status IN ('tentative', 'confirmed');

  CREATE INDEX IF NOT EXISTS idx_appointments_slot ON appointments(slot_start, slot_end);
  CREATE INDEX IF NOT EXISTS idx_appointments_user ON appointments(user_id);
  CREATE INDEX IF NOT EXISTS idx_appointments_booking_key ON appointments(booking_key);

  CREATE TABLE IF NOT EXISTS blocked_slots (
    remote_event_id TEXT PRIMARY KEY,
    slot_start TEXT NOT NULL,
    slot_end TEXT NOT NULL,
    summary TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_blocked_slots_range ON blocked_slots(slot_start, slot_end);

  CREATE TABLE IF NOT EXISTS drift_records (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    kind TEXT NOT NULL,
    appointment_id TEXT,
    remote_event_id TEXT,
    detected_at TEXT NOT NULL,
    resolved_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_drift_open ON drift_records(kind) WHERE resolved_at IS NULL;

  CREATE TABLE IF NOT EXISTS closed_dates (
    date TEXT PRIMARY KEY,
    reason TEXT
  );

  CREATE TABLE IF NOT EXISTS booking_sessions (
    user_id TEXT PRIMARY KEY,
    state TEXT NOT NULL,
    selected_date TEXT,
    candidate_start TEXT,
    candidate_end TEXT,
    offered_slots TEXT NOT NULL DEFAULT '[]',
    expires_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS idempotency_keys (
    idempotency_key TEXT PRIMARY KEY,
    request_hash TEXT NOT NULL,
    response_status INTEGER NOT NULL,
    response_body TEXT NOT NULL,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_idempotency_created ON idempotency_keys(created_at);
`;

/**
 * Opens (creating if needed) the booking database. Pass ":memory:" for a throwaway one.
 */
export function openDatabase(file: string): SqliteDatabase {
  if (file !== ':memory:') {
    const dataDir = path.dirname(path.resolve(file));
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
  }

  const db = new Database(file);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);

  logger.debug(`Database initialized: ${file}`);
  return db;
}
