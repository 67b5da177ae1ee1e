import * as path from 'node:path';
import Database from 'better-sqlite3';
import { HookRelayError, StoreUnavailableError, toErrorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { ensureSessionDir, sessionDir } from './session-root.js';
import type { SessionStorageRoot } from './types.js';

const log = createLogger('session-db');

const MAX_ATTEMPTS = 3;
const RETRYABLE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    session_id TEXT NOT NULL,
    command TEXT NOT NULL,
    source TEXT NOT NULL,
    timeout INTEGER NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    enqueued_at REAL NOT NULL,
    started_at REAL,
    finished_at REAL,
    delivered_at REAL,
    pid INTEGER,
    exit_code INTEGER,
    stdout_capture TEXT NOT NULL DEFAULT '',
    stderr_capture TEXT NOT NULL DEFAULT '',
    stdout_path TEXT,
    stderr_path TEXT,
    error TEXT,
    metadata TEXT NOT NULL DEFAULT '{}'
  );
  CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
  CREATE INDEX IF NOT EXISTS idx_tasks_finished_at ON tasks(finished_at);

  CREATE TABLE IF NOT EXISTS feedback_items (
    issue_id TEXT PRIMARY KEY,
    instance_id TEXT NOT NULL,
    content TEXT NOT NULL,
    task_id TEXT NOT NULL,
    file_path TEXT,
    severity TEXT NOT NULL,
    category TEXT NOT NULL,
    strategy TEXT NOT NULL,
    first_seen REAL NOT NULL,
    last_seen REAL NOT NULL,
    occurrence_count INTEGER NOT NULL,
    shown INTEGER NOT NULL DEFAULT 0,
    times_shown INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_feedback_last_seen ON feedback_items(last_seen);
`;

export function sessionDbPath(storage: SessionStorageRoot, sessionId: string): string {
  return path.join(sessionDir(storage, sessionId), 'session.db');
}

/** Open (creating if needed) the SQLite file shared by a session's queue and feedback. */
export function openSessionDatabase(storage: SessionStorageRoot, sessionId: string): Database.Database {
  try {
    ensureSessionDir(storage, sessionId);
    const db = new Database(sessionDbPath(storage, sessionId));
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    db.exec(SCHEMA);
    return db;
  } catch (err) {
    throw new StoreUnavailableError(`Cannot open session store for ${sessionId}: ${toErrorMessage(err)}`, err);
  }
}

/**
 * Run one store operation, retrying briefly on lock contention. Anything else
 * that SQLite throws surfaces as `StoreUnavailableError`.
 */
export function guardStore<T>(store: string, sessionId: string, operation: string, fn: () => T): T {
  for (let attempt = 1; ; attempt++) {
    try {
      return fn();
    } catch (err) {
      if (err instanceof HookRelayError) throw err;
      const retryable = err instanceof Database.SqliteError && RETRYABLE_CODES.has(err.code);
      if (retryable && attempt < MAX_ATTEMPTS) {
        log.debug('retrying locked operation', { store, operation, attempt });
        continue;
      }
      log.error(`${store} operation failed`, err, { operation, session_id: sessionId });
      throw new StoreUnavailableError(`${store} ${operation} failed: ${toErrorMessage(err)}`, err);
    }
  }
}
