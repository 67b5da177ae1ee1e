import { createHash } from 'node:crypto';
import * as path from 'node:path';
import type { FeedbackObservation, FeedbackStore } from './feedback-store.js';
import { createLogger } from './logger.js';
import type { FeedbackItem, Severity, SourcedCandidate, Strategy } from './types.js';

const log = createLogger('feedback-engine');

export const DEFAULT_STRATEGY: Strategy = 'show_once';

const SEVERITY_RANK: Record<Severity, number> = { error: 2, warn: 1, info: 0 };

export type RenderMode = 'full' | 'summary';

export interface RenderedFeedback {
  item: FeedbackItem;
  mode: RenderMode;
  text: string;
}

export interface EngineResult {
  rendered: RenderedFeedback[];
  /** Observed this batch but not rendered (show_once repeats, deferred items). */
  suppressed: FeedbackItem[];
  observed: FeedbackItem[];
}

export interface ProcessOptions {
  /** Render every unshown deferred item of the session (commit trigger). */
  flushDeferred?: boolean;
}

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex');
}

export function instanceIdFor(content: string): string {
  return sha256(content.trim()).slice(0, 16);
}

/** `{task_id}:{file}:{issue_type}`; the issue type falls back to a hash of the content's first 100 chars. */
export function issueIdFor(candidate: SourcedCandidate): string {
  const file = candidate.file_path ? path.basename(candidate.file_path) : 'global';
  const issueType = candidate.issue_type || sha256(candidate.content.trim().slice(0, 100)).slice(0, 8);
  return `${candidate.task_id}:${file}:${issueType}`;
}

export function summaryText(item: FeedbackItem): string {
  return `${item.occurrence_count} previous ${item.category} warnings still apply`;
}

export function compareForRender(a: FeedbackItem, b: FeedbackItem): number {
  return SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity]
    || a.first_seen - b.first_seen
    || a.issue_id.localeCompare(b.issue_id);
}

interface IssueGroup {
  first: SourcedCandidate;
  invocations: Set<string>;
}

/**
 * Decides, per issue, whether this turn shows the full finding, a one-line
 * summary, or nothing, according to the issue's strategy and its history
 * in the session.
 */
export class FeedbackEngine {
  private store: FeedbackStore;
  private defaultStrategy: Strategy;

  constructor(store: FeedbackStore, defaultStrategy: Strategy = DEFAULT_STRATEGY) {
    this.store = store;
    this.defaultStrategy = defaultStrategy;
  }

  process(candidates: SourcedCandidate[], options: ProcessOptions = {}): EngineResult {
    // Duplicates within one batch count once per reporting invocation, not per line.
    const groups = new Map<string, IssueGroup>();
    for (const candidate of candidates) {
      if (!candidate.content.trim()) continue;
      const issueId = issueIdFor(candidate);
      const group = groups.get(issueId);
      if (group) {
        group.invocations.add(candidate.invocation_id);
      } else {
        groups.set(issueId, { first: candidate, invocations: new Set([candidate.invocation_id]) });
      }
    }

    const observations: FeedbackObservation[] = [...groups].map(([issueId, { first, invocations }]) => ({
      issue_id: issueId,
      instance_id: instanceIdFor(first.content),
      content: first.content.trim(),
      task_id: first.task_id,
      file_path: first.file_path,
      severity: first.severity,
      category: first.category,
      strategy: first.strategy ?? this.defaultStrategy,
      occurrences: invocations.size,
    }));

    const results = observations.length > 0 ? this.store.upsertMany(observations) : [];
    const rendered: RenderedFeedback[] = [];
    const suppressed: FeedbackItem[] = [];

    for (const { item } of results) {
      const decision = this.decide(item);
      if (decision) {
        rendered.push(decision);
      } else {
        suppressed.push(item);
      }
    }

    if (options.flushDeferred) {
      const already = new Set(rendered.map((r) => r.item.issue_id));
      for (const item of this.store.listDeferred()) {
        if (already.has(item.issue_id)) continue;
        rendered.push({ item, mode: 'full', text: item.content });
      }
      const flushed = new Set(rendered.map((r) => r.item.issue_id));
      for (let i = suppressed.length - 1; i >= 0; i--) {
        if (flushed.has(suppressed[i].issue_id)) suppressed.splice(i, 1);
      }
    }

    rendered.sort((a, b) => compareForRender(a.item, b.item));
    log.debug('feedback batch processed', {
      candidates: candidates.length,
      issues: results.length,
      rendered: rendered.length,
      suppressed: suppressed.length,
    });
    return { rendered, suppressed, observed: results.map((r) => r.item) };
  }

  private decide(item: FeedbackItem): RenderedFeedback | null {
    switch (item.strategy) {
      case 'always':
        return { item, mode: 'full', text: item.content };
      case 'show_once':
        return item.shown ? null : { item, mode: 'full', text: item.content };
      case 'summary_after_first':
        return item.shown
          ? { item, mode: 'summary', text: summaryText(item) }
          : { item, mode: 'full', text: item.content };
      case 'defer_until_commit':
        return null;
    }
  }

  /** Record that these items went out in a response. */
  markRendered(rendered: RenderedFeedback[]): void {
    this.store.markShown(rendered.map((r) => r.item.issue_id));
  }
}
