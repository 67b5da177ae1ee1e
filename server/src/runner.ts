import { randomUUID } from 'node:crypto';
import type { TaskEntry } from './config.js';
import { TaskError, TaskTimeoutError, toErrorMessage } from './errors.js';
import type { TaskRequest } from './intake.js';
import { createLogger } from './logger.js';
import { TaskOutcomeSchema, type ParsedTaskOutcome } from './schemas.js';
import type { FeedbackCandidate, HookInput, SyncTask, TaskResolver, TaskResult } from './types.js';

const log = createLogger('runner');

export const DEFAULT_CONCURRENCY = 6;
export const DEFAULT_SYNC_TIMEOUT_SECONDS = 12;

export interface RunOptions {
  event: string;
  input: HookInput;
  files: string[];
  sessionId: string;
  resolver: TaskResolver;
  enqueue(request: TaskRequest): string;
  concurrency?: number;
  /** Seconds, for entries that set no timeout of their own. */
  defaultTimeout?: number;
}

function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

function mergeOutcomes(outcomes: ParsedTaskOutcome[]): ParsedTaskOutcome {
  const merged: ParsedTaskOutcome = { feedback: [] };
  for (const outcome of outcomes) {
    merged.feedback = [...(merged.feedback ?? []), ...(outcome.feedback ?? [])];
    merged.permission_decision ??= outcome.permission_decision;
    merged.permission_decision_reason ??= outcome.permission_decision_reason;
    merged.block = merged.block || outcome.block;
    merged.reason ??= outcome.reason;
    merged.stop = merged.stop || outcome.stop;
    merged.system_message ??= outcome.system_message;
    merged.suppress_output = merged.suppress_output || outcome.suppress_output;
  }
  return merged;
}

function normalizeOutcome(value: unknown): ParsedTaskOutcome {
  if (value === undefined || value === null) return {};
  const list = Array.isArray(value) ? value : [value];
  return mergeOutcomes(list.map((entry) => TaskOutcomeSchema.parse(entry)));
}

function faultResult(entry: TaskEntry, invocationId: string, candidate: FeedbackCandidate, startedAt: number): TaskResult {
  return {
    task_id: entry.id,
    invocation_id: invocationId,
    feedback: [candidate],
    elapsed_ms: Date.now() - startedAt,
  };
}

async function runOne(entry: TaskEntry, options: RunOptions): Promise<TaskResult> {
  const invocationId = randomUUID();
  const startedAt = Date.now();

  let task: SyncTask;
  try {
    task = await options.resolver(entry.ref);
  } catch (err) {
    log.warn('task could not be resolved', { task_id: entry.id, ref: entry.ref, err: toErrorMessage(err) });
    return faultResult(entry, invocationId, {
      content: `Task ${entry.id} could not be loaded: ${toErrorMessage(err)}`,
      severity: 'warn',
      category: 'task-error',
    }, startedAt);
  }

  const timeoutMs = (entry.timeout ?? options.defaultTimeout ?? DEFAULT_SYNC_TIMEOUT_SECONDS) * 1000;
  const controller = new AbortController();
  try {
    const raw = await withTimeout(
      Promise.resolve().then(() =>
        task({
          event: options.event,
          input: options.input,
          files: options.files,
          params: entry.params,
          taskId: entry.id,
          sessionId: options.sessionId,
          signal: controller.signal,
          enqueue: options.enqueue,
        }),
      ),
      timeoutMs,
      () => new TaskTimeoutError(entry.id, timeoutMs),
    );
    const outcome = normalizeOutcome(raw);
    const feedback = (outcome.feedback ?? []).map((candidate) => ({
      ...candidate,
      strategy: candidate.strategy ?? entry.strategy,
    }));
    return {
      task_id: entry.id,
      invocation_id: invocationId,
      feedback,
      permission_decision: outcome.permission_decision,
      permission_decision_reason: outcome.permission_decision_reason,
      block: outcome.block,
      reason: outcome.reason,
      stop: outcome.stop,
      system_message: outcome.system_message,
      suppress_output: outcome.suppress_output,
      elapsed_ms: Date.now() - startedAt,
    };
  } catch (err) {
    if (err instanceof TaskTimeoutError) {
      controller.abort(err);
      log.warn('task timed out', { task_id: entry.id, timeout_ms: timeoutMs });
      return faultResult(entry, invocationId, {
        content: `Task ${entry.id} timed out after ${timeoutMs / 1000}s`,
        severity: 'warn',
        category: 'task-timeout',
      }, startedAt);
    }
    const failure = new TaskError(entry.id, `Task ${entry.id} failed: ${toErrorMessage(err)}`, err);
    log.error('task failed', failure, { task_id: entry.id });
    return faultResult(entry, invocationId, {
      content: failure.message,
      severity: 'error',
      category: 'task-error',
    }, startedAt);
  }
}

/**
 * Run the selected entries with at most `concurrency` in flight. Results come
 * back in entry order; a task that throws or overruns becomes a feedback
 * candidate and never rejects the batch.
 */
export async function runTasks(entries: TaskEntry[], options: RunOptions): Promise<TaskResult[]> {
  const results: TaskResult[] = new Array(entries.length);
  const limit = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < entries.length) {
      const index = next++;
      results[index] = await runOne(entries[index], options);
    }
  };

  await Promise.all(Array.from({ length: Math.min(limit, entries.length) }, worker));
  return results;
}
