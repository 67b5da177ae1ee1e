import * as fs from 'node:fs';
import type Database from 'better-sqlite3';
import { SeveritySchema, StrategySchema } from './schemas.js';
import { guardStore, openSessionDatabase, sessionDbPath } from './session-db.js';
import { removeSessionDir } from './session-root.js';
import type { FeedbackItem, SessionStorageRoot, Severity, Strategy } from './types.js';

/** One issue observed by `occurrences` distinct task invocations in a batch. */
export interface FeedbackObservation {
  issue_id: string;
  instance_id: string;
  content: string;
  task_id: string;
  file_path?: string;
  severity: Severity;
  category: string;
  strategy: Strategy;
  occurrences: number;
}

export interface UpsertResult {
  item: FeedbackItem;
  created: boolean;
  /** Same instance id as the stored record: content unchanged. */
  exactRepeat: boolean;
}

interface FeedbackRow {
  issue_id: string;
  instance_id: string;
  content: string;
  task_id: string;
  file_path: string | null;
  severity: string;
  category: string;
  strategy: string;
  first_seen: number;
  last_seen: number;
  occurrence_count: number;
  shown: number;
  times_shown: number;
}

const severityOf = SeveritySchema.catch('info');
const strategyOf = StrategySchema.catch('show_once');

function rowToItem(row: FeedbackRow): FeedbackItem {
  return {
    instance_id: row.instance_id,
    issue_id: row.issue_id,
    content: row.content,
    task_id: row.task_id,
    ...(row.file_path === null ? {} : { file_path: row.file_path }),
    severity: severityOf.parse(row.severity),
    category: row.category,
    strategy: strategyOf.parse(row.strategy),
    first_seen: row.first_seen,
    last_seen: row.last_seen,
    occurrence_count: row.occurrence_count,
    shown: row.shown === 1,
    times_shown: row.times_shown,
  };
}

/**
 * Session-scoped feedback records, a table in the session's SQLite file.
 * Counters are bumped in SQL inside an immediate transaction so overlapping
 * hook invocations never lose an observation.
 */
export class FeedbackStore {
  private storage: SessionStorageRoot;
  private sessionId: string;
  private now: () => number;
  private db: Database.Database | null = null;

  constructor(storage: SessionStorageRoot, sessionId: string, now: () => number = Date.now) {
    this.storage = storage;
    this.sessionId = sessionId;
    this.now = now;
  }

  close(): void {
    if (this.db?.open) this.db.close();
    this.db = null;
  }

  private connection(): Database.Database {
    if (!this.db) this.db = openSessionDatabase(this.storage, this.sessionId);
    return this.db;
  }

  /** A session that never stored anything has no file; reads see it as empty. */
  private exists(): boolean {
    return this.db !== null || fs.existsSync(sessionDbPath(this.storage, this.sessionId));
  }

  private withStore<T>(operation: string, fn: (db: Database.Database) => T): T {
    return guardStore('Feedback store', this.sessionId, operation, () => fn(this.connection()));
  }

  private select(db: Database.Database, issueId: string): FeedbackItem | null {
    const row = db.prepare<[string], FeedbackRow>('SELECT * FROM feedback_items WHERE issue_id = ?').get(issueId);
    return row ? rowToItem(row) : null;
  }

  readItems(): FeedbackItem[] {
    if (!this.exists()) return [];
    return this.withStore('readItems', (db) =>
      db.prepare<[], FeedbackRow>('SELECT * FROM feedback_items ORDER BY first_seen ASC, rowid ASC').all().map(rowToItem),
    );
  }

  upsert(observation: FeedbackObservation): UpsertResult {
    return this.upsertMany([observation])[0];
  }

  /** Apply a batch in one transaction. */
  upsertMany(observations: FeedbackObservation[]): UpsertResult[] {
    return this.withStore('upsert', (db) => {
      const insert = db.prepare(
        `INSERT INTO feedback_items
           (issue_id, instance_id, content, task_id, file_path, severity, category, strategy,
            first_seen, last_seen, occurrence_count)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      );
      const repeat = db.prepare(
        `UPDATE feedback_items
         SET occurrence_count = occurrence_count + ?, last_seen = MAX(last_seen, ?)
         WHERE issue_id = ?`,
      );
      const replace = db.prepare(
        `UPDATE feedback_items
         SET instance_id = ?, content = ?, severity = ?,
             occurrence_count = occurrence_count + ?, last_seen = MAX(last_seen, ?)
         WHERE issue_id = ?`,
      );

      const apply = db.transaction((): UpsertResult[] => {
        const now = this.now();
        const results: UpsertResult[] = [];
        for (const obs of observations) {
          const count = Math.max(1, obs.occurrences);
          const existing = this.select(db, obs.issue_id);
          let created = false;
          let exactRepeat = false;
          if (!existing) {
            insert.run(
              obs.issue_id, obs.instance_id, obs.content, obs.task_id, obs.file_path ?? null,
              obs.severity, obs.category, obs.strategy, now, now, count,
            );
            created = true;
          } else if (existing.instance_id === obs.instance_id) {
            repeat.run(count, now, obs.issue_id);
            exactRepeat = true;
          } else {
            replace.run(obs.instance_id, obs.content, obs.severity, count, now, obs.issue_id);
          }
          const item = this.select(db, obs.issue_id);
          if (item) results.push({ item, created, exactRepeat });
        }
        return results;
      });
      return apply.immediate();
    });
  }

  get(issueId: string): FeedbackItem | null {
    if (!this.exists()) return null;
    return this.withStore('get', (db) => this.select(db, issueId));
  }

  listUnshown(since?: number): FeedbackItem[] {
    if (!this.exists()) return [];
    return this.withStore('listUnshown', (db) =>
      db
        .prepare<[number], FeedbackRow>(
          `SELECT * FROM feedback_items WHERE shown = 0 AND last_seen >= ?
           ORDER BY first_seen ASC, rowid ASC`,
        )
        .all(since ?? Number.MIN_SAFE_INTEGER)
        .map(rowToItem),
    );
  }

  listDeferred(): FeedbackItem[] {
    if (!this.exists()) return [];
    return this.withStore('listDeferred', (db) =>
      db
        .prepare<[], FeedbackRow>(
          `SELECT * FROM feedback_items WHERE strategy = 'defer_until_commit' AND shown = 0
           ORDER BY first_seen ASC, rowid ASC`,
        )
        .all()
        .map(rowToItem),
    );
  }

  markShown(issueIds: string[]): void {
    if (issueIds.length === 0 || !this.exists()) return;
    this.withStore('markShown', (db) => {
      const mark = db.prepare('UPDATE feedback_items SET shown = 1, times_shown = times_shown + 1 WHERE issue_id = ?');
      const apply = db.transaction(() => {
        for (const id of new Set(issueIds)) mark.run(id);
      });
      apply.immediate();
    });
  }

  /** Age-based GC on `last_seen`; returns how many items were dropped. */
  purgeOlderThan(ageMs: number): number {
    if (!this.exists()) return 0;
    const cutoff = this.now() - ageMs;
    return this.withStore('purgeOlderThan', (db) =>
      db.prepare('DELETE FROM feedback_items WHERE last_seen < ?').run(cutoff).changes,
    );
  }

  purgeSession(): void {
    this.close();
    removeSessionDir(this.storage, this.sessionId);
  }
}
