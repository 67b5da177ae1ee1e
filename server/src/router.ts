/**
 * One host invocation end to end: run the event's synchronous tasks, advance
 * the session's background queue, push every candidate through the feedback
 * engine and the block policy, and render a single response object.
 */

import { taskEntriesFor, type RouterConfig } from './config.js';
import { StoreUnavailableError } from './errors.js';
import { FeedbackEngine, type RenderedFeedback } from './feedback-engine.js';
import { FeedbackStore } from './feedback-store.js';
import { enqueueRequest, type TaskRequest } from './intake.js';
import { createLogger } from './logger.js';
import { matchesBlockPolicy } from './policy.js';
import { createResolver } from './resolver.js';
import { runTasks } from './runner.js';
import { collectChangedFiles, selectTasks } from './selectors.js';
import { advanceQueue, parseTaskOutput, terminateRunning } from './task-launcher.js';
import { openTaskQueue, purgeSession, type TaskQueue } from './task-queue.js';
import type {
  HookInput,
  HookOutput,
  HookSpecificOutput,
  SessionStorageRoot,
  Severity,
  SourcedCandidate,
  TaskResolver,
  TaskResult,
} from './types.js';

const log = createLogger('router');

export const MAX_CONTEXT_LINES = 50;

const DECISION_EVENTS = new Set(['PreToolUse']);
const NON_BLOCKING_EVENTS = new Set(['SessionEnd', 'Notification']);

const SEVERITY_RANK: Record<Severity, number> = { error: 2, warn: 1, info: 0 };

export interface RouterDeps {
  storage: SessionStorageRoot;
  config: RouterConfig;
  resolver?: TaskResolver;
  /** Working directory for module refs and spawned tasks; defaults to the payload's `cwd`. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  now?: () => number;
  isCommitTrigger?: (input: HookInput) => boolean;
  graceMs?: number;
}

/** A Bash tool call that runs `git commit`. */
export function isCommitTrigger(input: HookInput): boolean {
  if (input.tool_name !== 'Bash') return false;
  const event = input.hook_event_name;
  if (event !== 'PreToolUse' && event !== 'PostToolUse') return false;
  const command = input.tool_input?.command;
  return typeof command === 'string' && /\bgit\s+commit\b/.test(command);
}

function openQueue(storage: SessionStorageRoot, sessionId: string, now: () => number): TaskQueue | null {
  try {
    return openTaskQueue(storage, sessionId, { now });
  } catch (err) {
    if (err instanceof StoreUnavailableError) {
      log.error('task queue unavailable, skipping background work', err, { session_id: sessionId });
      return null;
    }
    throw err;
  }
}

async function collectBackground(
  storage: SessionStorageRoot,
  queue: TaskQueue,
  config: RouterConfig,
  deps: RouterDeps,
  cwd: string,
  now: () => number,
): Promise<SourcedCandidate[]> {
  const candidates: SourcedCandidate[] = [];
  try {
    await advanceQueue(storage, queue, {
      cwd,
      env: deps.env,
      maxConcurrent: config.max_background,
      graceMs: deps.graceMs,
      now,
    });
    for (const task of queue.listReady()) {
      for (const candidate of parseTaskOutput(task)) {
        candidates.push({ ...candidate, task_id: task.source, invocation_id: task.id });
      }
      queue.markDelivered(task.id);
    }
    queue.purgeOlderThan(config.feedback_ttl_hours * 3_600_000);
  } catch (err) {
    if (!(err instanceof StoreUnavailableError)) throw err;
    log.error('background results unavailable this turn', err, { session_id: queue.sessionId });
  }
  return candidates;
}

function fallbackRendering(candidates: SourcedCandidate[]): RenderedFeedback[] {
  const now = Date.now();
  return [...candidates]
    .sort((a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity])
    .map((c): RenderedFeedback => ({
      mode: 'full',
      text: c.content.trim(),
      item: {
        instance_id: '',
        issue_id: '',
        content: c.content.trim(),
        task_id: c.task_id,
        file_path: c.file_path,
        severity: c.severity,
        category: c.category,
        strategy: c.strategy ?? 'always',
        first_seen: now,
        last_seen: now,
        occurrence_count: 1,
        shown: false,
        times_shown: 0,
      },
    }));
}

function formatLine(rendered: RenderedFeedback): string {
  const { item } = rendered;
  const where = rendered.mode === 'full' && item.file_path ? `${item.file_path}: ` : '';
  return `[${item.severity}] ${where}${rendered.text}`;
}

interface ContextText {
  text: string;
  included: RenderedFeedback[];
}

/** Items that do not fit in the line budget stay unshown for a later turn. */
function formatContext(rendered: RenderedFeedback[]): ContextText {
  const lines: string[] = [];
  const included: RenderedFeedback[] = [];
  for (const entry of rendered) {
    const entryLines = formatLine(entry).split('\n');
    if (lines.length + entryLines.length > MAX_CONTEXT_LINES) {
      if (lines.length === 0) {
        lines.push(...entryLines.slice(0, MAX_CONTEXT_LINES - 1), '...');
        included.push(entry);
      }
      break;
    }
    lines.push(...entryLines);
    included.push(entry);
  }
  const omitted = rendered.length - included.length;
  if (omitted > 0) lines.push(`... ${omitted} more not shown`);
  return { text: lines.join('\n'), included };
}

function blockReason(results: TaskResult[], blocking: SourcedCandidate[]): string {
  const parts: string[] = [];
  for (const result of results) {
    if (result.block && result.reason) parts.push(result.reason);
    else if (result.block) parts.push(`Blocked by ${result.task_id}`);
  }
  for (const candidate of blocking) {
    parts.push(`[${candidate.severity}] ${candidate.content.trim()}`);
  }
  return [...new Set(parts)].join('\n\n');
}

function runPurge(storage: SessionStorageRoot, sessionId: string): void {
  try {
    purgeSession(storage, sessionId);
  } catch (err) {
    log.error('session purge failed', err, { session_id: sessionId });
  }
}

export async function routeEvent(input: HookInput, deps: RouterDeps): Promise<HookOutput> {
  const { storage, config } = deps;
  const event = input.hook_event_name ?? '';
  const sessionId = input.session_id ?? '';
  const cwd = deps.cwd ?? input.cwd ?? process.cwd();
  const now = deps.now ?? Date.now;
  const resolver = deps.resolver ?? createResolver({ cwd });
  const commitTrigger = (deps.isCommitTrigger ?? isCommitTrigger)(input);
  const files = collectChangedFiles(input);

  const queue = openQueue(storage, sessionId, now);
  const store = new FeedbackStore(storage, sessionId, now);
  try {
    const entries = selectTasks(taskEntriesFor(config, event), { toolName: input.tool_name ?? '', files });
    const results = await runTasks(entries, {
      event,
      input,
      files,
      sessionId,
      resolver,
      concurrency: config.concurrency,
      defaultTimeout: config.default_timeout,
      enqueue(request: TaskRequest): string {
        if (!queue) throw new StoreUnavailableError('Task queue is unavailable');
        return enqueueRequest(queue, request, 'router');
      },
    });

    const candidates: SourcedCandidate[] = results.flatMap((result) =>
      result.feedback.map((c) => ({ ...c, task_id: result.task_id, invocation_id: result.invocation_id })),
    );
    if (queue && event !== 'SessionEnd') {
      candidates.push(...(await collectBackground(storage, queue, config, deps, cwd, now)));
    }

    const engine = new FeedbackEngine(store, config.default_strategy);
    let rendered: RenderedFeedback[];
    let tracked = true;
    try {
      rendered = engine.process(candidates, { flushDeferred: commitTrigger }).rendered;
      store.purgeOlderThan(config.feedback_ttl_hours * 3_600_000);
    } catch (err) {
      if (!(err instanceof StoreUnavailableError)) throw err;
      log.error('feedback store unavailable, rendering raw candidates', err, { session_id: sessionId });
      rendered = fallbackRendering(candidates);
      tracked = false;
    }

    const blocking = candidates.filter((c) => matchesBlockPolicy(c, config.policy.block_on));
    const blocked = !NON_BLOCKING_EVENTS.has(event) && (blocking.length > 0 || results.some((r) => r.block));
    const reason = blocked ? blockReason(results, blocking) : '';
    const context = formatContext(rendered);

    const output: HookOutput = { continue: true };
    let contextShown = false;
    const specific = (extra: Omit<HookSpecificOutput, 'hookEventName'>): HookSpecificOutput => ({
      hookEventName: event,
      ...extra,
    });

    if (DECISION_EVENTS.has(event)) {
      const decided = results.find((r) => r.permission_decision);
      if (blocked) {
        output.hookSpecificOutput = specific({ permissionDecision: 'deny', permissionDecisionReason: reason });
      } else if (decided?.permission_decision) {
        const text = [decided.permission_decision_reason, context.text].filter(Boolean).join('\n\n');
        output.hookSpecificOutput = specific({
          permissionDecision: decided.permission_decision,
          permissionDecisionReason: text || undefined,
        });
        contextShown = Boolean(context.text);
      } else if (context.text) {
        output.hookSpecificOutput = specific({ permissionDecision: 'allow', permissionDecisionReason: context.text });
        contextShown = true;
      }
    } else if (event === 'SessionStart') {
      if (blocked) {
        output.continue = false;
        output.stopReason = reason;
      } else if (context.text) {
        output.hookSpecificOutput = specific({ additionalContext: context.text });
        contextShown = true;
      }
    } else if (event === 'Notification') {
      if (context.text) {
        output.systemMessage = context.text;
        contextShown = true;
      }
    } else if (event !== 'SessionEnd') {
      // PostToolUse, UserPromptSubmit, Stop, SubagentStop, PreCompact
      if (blocked) {
        output.decision = 'block';
        output.reason = reason;
      }
      if (context.text) {
        output.hookSpecificOutput = specific({ additionalContext: context.text });
        contextShown = true;
      }
    }

    const stopper = results.find((r) => r.stop);
    if (stopper && !NON_BLOCKING_EVENTS.has(event)) {
      output.continue = false;
      output.stopReason = stopper.reason ?? `Stopped by ${stopper.task_id}`;
    }

    const messages = results.map((r) => r.system_message).filter((m): m is string => Boolean(m));
    if (messages.length > 0) {
      output.systemMessage = [output.systemMessage, ...messages].filter(Boolean).join('\n');
    }
    if (results.some((r) => r.suppress_output)) output.suppressOutput = true;

    if (contextShown && tracked && context.included.length > 0) {
      try {
        engine.markRendered(context.included);
      } catch (err) {
        if (!(err instanceof StoreUnavailableError)) throw err;
        log.error('could not record shown feedback', err, { session_id: sessionId });
      }
    }

    log.info('event routed', {
      event,
      session_id: sessionId,
      tasks: entries.length,
      candidates: candidates.length,
      rendered: context.included.length,
      blocked,
    });

    if (event === 'SessionEnd' && queue) {
      try {
        const terminated = await terminateRunning(queue, deps.graceMs);
        if (terminated.length > 0) log.info('running tasks terminated', { session_id: sessionId, count: terminated.length });
      } catch (err) {
        if (!(err instanceof StoreUnavailableError)) throw err;
        log.error('could not terminate running tasks', err, { session_id: sessionId });
      }
    }
    return output;
  } finally {
    queue?.close();
    store.close();
    if (event === 'SessionEnd') runPurge(storage, sessionId);
  }
}
