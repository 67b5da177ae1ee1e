import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import {
  InvalidCommandError,
  InvalidTransitionError,
  StoreUnavailableError,
  toErrorMessage,
} from './errors.js';
import { createLogger } from './logger.js';
import { guardStore, openSessionDatabase } from './session-db.js';
import { removeSessionDir } from './session-root.js';
import type { BackgroundTask, SessionStorageRoot, TaskStatus } from './types.js';

const log = createLogger('task-queue');

export const DEFAULT_TASK_TIMEOUT = 120;

interface TaskRow {
  id: string;
  session_id: string;
  command: string;
  source: string;
  timeout: number;
  status: TaskStatus;
  enqueued_at: number;
  started_at: number | null;
  finished_at: number | null;
  delivered_at: number | null;
  pid: number | null;
  exit_code: number | null;
  stdout_capture: string;
  stderr_capture: string;
  stdout_path: string | null;
  stderr_path: string | null;
  error: string | null;
  metadata: string;
}

export interface PartialOutput {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

export interface TaskQueueOptions {
  now?: () => number;
}

function parseJson<T>(text: string, fallback: T, guard: (value: unknown) => value is T): T {
  try {
    const value: unknown = JSON.parse(text);
    return guard(value) ? value : fallback;
  } catch {
    return fallback;
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function rowToTask(row: TaskRow): BackgroundTask {
  return {
    id: row.id,
    session_id: row.session_id,
    command: parseJson(row.command, [], isStringArray),
    source: row.source,
    timeout: row.timeout,
    status: row.status,
    enqueued_at: row.enqueued_at,
    started_at: row.started_at ?? undefined,
    finished_at: row.finished_at ?? undefined,
    delivered_at: row.delivered_at ?? undefined,
    pid: row.pid ?? undefined,
    exit_code: row.exit_code ?? undefined,
    stdout_capture: row.stdout_capture,
    stderr_capture: row.stderr_capture,
    stdout_path: row.stdout_path ?? undefined,
    stderr_path: row.stderr_path ?? undefined,
    error: row.error ?? undefined,
    metadata: parseJson(row.metadata, {}, isRecord),
  };
}

export function validateCommand(command: unknown): string[] {
  if (!isStringArray(command) || command.length === 0) {
    throw new InvalidCommandError('command must be a non-empty array of strings');
  }
  if (!command[0].trim()) {
    throw new InvalidCommandError('command program must not be blank');
  }
  return command;
}

function validateTimeout(timeout: number): number {
  if (!Number.isInteger(timeout) || timeout <= 0) {
    throw new InvalidCommandError(`timeout must be a positive integer, got ${timeout}`);
  }
  return timeout;
}

/**
 * Session-scoped background task queue backed by SQLite at
 * `<root>/sessions/<session>/session.db`. Every method commits before returning.
 */
export class TaskQueue {
  readonly sessionId: string;
  private db: Database.Database;
  private now: () => number;

  constructor(storage: SessionStorageRoot, sessionId: string, options: TaskQueueOptions = {}) {
    this.sessionId = sessionId;
    this.now = options.now ?? Date.now;
    this.db = openSessionDatabase(storage, sessionId);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private withStore<T>(operation: string, fn: () => T): T {
    return guardStore('Task queue', this.sessionId, operation, fn);
  }

  enqueue(command: string[], source: string, timeout: number = DEFAULT_TASK_TIMEOUT, metadata: Record<string, unknown> = {}): string {
    const argv = validateCommand(command);
    const seconds = validateTimeout(timeout);
    const id = randomUUID();
    this.withStore('enqueue', () => {
      this.db
        .prepare(
          `INSERT INTO tasks (id, session_id, command, source, timeout, status, enqueued_at, metadata)
           VALUES (?, ?, ?, ?, ?, 'pending', ?, ?)`,
        )
        .run(id, this.sessionId, JSON.stringify(argv), source || 'unknown', seconds, this.now(), JSON.stringify(metadata));
    });
    log.info('task enqueued', { task_id: id, source, session_id: this.sessionId });
    return id;
  }

  get(id: string): BackgroundTask | null {
    return this.withStore('get', () => {
      const row = this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(id);
      return row ? rowToTask(row) : null;
    });
  }

  /**
   * Move the oldest pending task to running. The UPDATE is guarded by the
   * expected prior status, so of several overlapping claimers exactly one
   * sees `changes === 1`; the rest get null.
   */
  claimNextPending(claimerPid: number = process.pid): BackgroundTask | null {
    return this.withStore('claim', () => {
      const claim = this.db.transaction((): BackgroundTask | null => {
        const candidate = this.db
          .prepare<[], { id: string }>(
            `SELECT id FROM tasks WHERE status = 'pending' ORDER BY enqueued_at ASC, rowid ASC LIMIT 1`,
          )
          .get();
        if (!candidate) return null;
        const updated = this.db
          .prepare(
            `UPDATE tasks SET status = 'running', started_at = ?, pid = ?
             WHERE id = ? AND status = 'pending'`,
          )
          .run(this.now(), claimerPid, candidate.id);
        if (updated.changes === 0) return null;
        const row = this.db.prepare<[string], TaskRow>('SELECT * FROM tasks WHERE id = ?').get(candidate.id);
        return row ? rowToTask(row) : null;
      });
      return claim.immediate();
    });
  }

  attachProcess(id: string, pid: number, stdoutPath: string, stderrPath: string): void {
    this.withStore('attach', () => {
      const updated = this.db
        .prepare(
          `UPDATE tasks SET pid = ?, stdout_path = ?, stderr_path = ?
           WHERE id = ? AND status = 'running'`,
        )
        .run(pid, stdoutPath, stderrPath, id);
      if (updated.changes === 0) this.rejectTransition(id, 'running');
    });
  }

  complete(id: string, exitCode: number, stdout: string, stderr: string): void {
    this.finish(id, 'completed', { exitCode, stdout, stderr });
  }

  fail(id: string, error: string, partial: PartialOutput = {}): void {
    this.finish(id, 'failed', partial, error);
  }

  markTimedOut(id: string, partial: PartialOutput = {}): void {
    const task = this.get(id);
    const error = task ? `Task timed out after ${task.timeout}s` : 'Task timed out';
    this.finish(id, 'timed_out', partial, error);
  }

  private finish(id: string, status: 'completed' | 'failed' | 'timed_out', partial: PartialOutput, error?: string): void {
    this.withStore(status, () => {
      const updated = this.db
        .prepare(
          `UPDATE tasks
           SET status = ?, finished_at = ?, exit_code = ?,
               stdout_capture = ?, stderr_capture = ?, error = ?
           WHERE id = ? AND status = 'running'`,
        )
        .run(status, this.now(), partial.exitCode ?? null, partial.stdout ?? '', partial.stderr ?? '', error ?? null, id);
      if (updated.changes === 0) this.rejectTransition(id, status);
    });
    log.info('task finished', { task_id: id, status, session_id: this.sessionId });
  }

  private rejectTransition(id: string, to: TaskStatus): never {
    const row = this.db.prepare<[string], { status: TaskStatus }>('SELECT status FROM tasks WHERE id = ?').get(id);
    const err = new InvalidTransitionError(id, row?.status ?? 'missing', to);
    log.warn('rejected task transition', { task_id: id, from: row?.status ?? 'missing', to });
    throw err;
  }

  /** Terminal, undelivered tasks, oldest result first. */
  listReady(): BackgroundTask[] {
    return this.withStore('listReady', () =>
      this.db
        .prepare<[], TaskRow>(
          `SELECT * FROM tasks
           WHERE status IN ('completed', 'failed', 'timed_out') AND delivered_at IS NULL
           ORDER BY finished_at ASC, rowid ASC`,
        )
        .all()
        .map(rowToTask),
    );
  }

  markDelivered(id: string): void {
    this.withStore('markDelivered', () => {
      this.db
        .prepare(
          `UPDATE tasks SET delivered_at = COALESCE(delivered_at, ?)
           WHERE id = ? AND status IN ('completed', 'failed', 'timed_out')`,
        )
        .run(this.now(), id);
    });
  }

  listPending(limit = 50): BackgroundTask[] {
    return this.withStore('listPending', () =>
      this.db
        .prepare<[number], TaskRow>(
          `SELECT * FROM tasks WHERE status = 'pending' ORDER BY enqueued_at ASC, rowid ASC LIMIT ?`,
        )
        .all(limit)
        .map(rowToTask),
    );
  }

  listRunning(): BackgroundTask[] {
    return this.withStore('listRunning', () =>
      this.db
        .prepare<[], TaskRow>(`SELECT * FROM tasks WHERE status = 'running' ORDER BY started_at ASC, rowid ASC`)
        .all()
        .map(rowToTask),
    );
  }

  listAll(): BackgroundTask[] {
    return this.withStore('listAll', () =>
      this.db.prepare<[], TaskRow>('SELECT * FROM tasks ORDER BY enqueued_at ASC, rowid ASC').all().map(rowToTask),
    );
  }

  /** Delete delivered results that finished more than `ageMs` ago. */
  purgeOlderThan(ageMs: number): number {
    const cutoff = this.now() - ageMs;
    return this.withStore('purgeOlderThan', () => {
      const result = this.db
        .prepare('DELETE FROM tasks WHERE delivered_at IS NOT NULL AND finished_at < ?')
        .run(cutoff);
      return result.changes;
    });
  }
}

export function openTaskQueue(storage: SessionStorageRoot, sessionId: string, options?: TaskQueueOptions): TaskQueue {
  return new TaskQueue(storage, sessionId, options);
}

/** Remove the session partition (queue, feedback, drop-ins and captured output). */
export function purgeSession(storage: SessionStorageRoot, sessionId: string): void {
  try {
    removeSessionDir(storage, sessionId);
    log.info('session purged', { session_id: sessionId });
  } catch (err) {
    throw new StoreUnavailableError(`Cannot purge session ${sessionId}: ${toErrorMessage(err)}`, err);
  }
}
