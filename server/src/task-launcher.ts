/**
 * Turns claimed queue entries into detached child processes and, on some
 * later invocation, into terminal queue records. Nothing here waits on a
 * running task: every call does what it can now and returns.
 */

import { spawn } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import { InvalidTransitionError, toErrorMessage } from './errors.js';
import { importIncoming } from './intake.js';
import { createLogger } from './logger.js';
import { FeedbackCandidateSchema } from './schemas.js';
import { outputDir } from './session-root.js';
import type { TaskQueue } from './task-queue.js';
import type { BackgroundTask, FeedbackCandidate, SessionStorageRoot } from './types.js';

const log = createLogger('task-launcher');

export const DEFAULT_MAX_BACKGROUND = 2;
export const DEFAULT_GRACE_MS = 500;
const MAX_CAPTURE_CHARS = 100_000;
const MAX_TEXT_FEEDBACK_CHARS = 2000;

// Runs the task's argv and records its exit status beside the captured output;
// a detached grandchild's status is otherwise lost once the spawner exits.
const EXIT_WRAPPER =
  '"$@"; status=$?; printf "%s" "$status" > "$HOOK_RELAY_EXIT_FILE.tmp" && mv "$HOOK_RELAY_EXIT_FILE.tmp" "$HOOK_RELAY_EXIT_FILE"';

export interface LaunchOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface AdvanceOptions extends LaunchOptions {
  maxConcurrent?: number;
  graceMs?: number;
  now?: () => number;
}

export interface AdvanceSummary {
  imported: string[];
  reaped: string[];
  timedOut: string[];
  spawned: string[];
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export function isProcessAlive(pid: number | undefined): boolean {
  if (!pid || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === 'EPERM';
  }
}

function signalGroup(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(-pid, signal);
  } catch (groupErr) {
    try {
      process.kill(pid, signal);
    } catch (err) {
      log.debug('signal not delivered', { pid, signal, group_err: toErrorMessage(groupErr), err: toErrorMessage(err) });
    }
  }
}

async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isProcessAlive(pid)) return true;
    await sleep(25);
  }
  return !isProcessAlive(pid);
}

function readCapture(file: string | undefined): string {
  if (!file) return '';
  try {
    return fs.readFileSync(file, 'utf-8').slice(0, MAX_CAPTURE_CHARS);
  } catch {
    return '';
  }
}

function exitFileFor(task: BackgroundTask): string | undefined {
  if (!task.stdout_path) return undefined;
  return path.join(path.dirname(task.stdout_path), `${task.id}.exit`);
}

function readExitCode(file: string | undefined): number | undefined {
  if (!file || !fs.existsSync(file)) return undefined;
  const code = Number.parseInt(fs.readFileSync(file, 'utf-8').trim(), 10);
  return Number.isNaN(code) ? undefined : code;
}

/**
 * Start `task.command` in its own process group with stdout/stderr going to
 * files under the session's output directory. The child outlives this
 * process; its pid and capture paths are recorded on the queue entry.
 */
export function spawnAndDetach(
  storage: SessionStorageRoot,
  queue: TaskQueue,
  task: BackgroundTask,
  options: LaunchOptions = {},
): number | undefined {
  const dir = outputDir(storage, queue.sessionId);
  const stdoutPath = path.join(dir, `${task.id}.stdout`);
  const stderrPath = path.join(dir, `${task.id}.stderr`);
  const exitPath = path.join(dir, `${task.id}.exit`);

  let outFd: number | undefined;
  let errFd: number | undefined;
  try {
    fs.mkdirSync(dir, { recursive: true });
    outFd = fs.openSync(stdoutPath, 'w');
    errFd = fs.openSync(stderrPath, 'w');
    const child = spawn('/bin/sh', ['-c', EXIT_WRAPPER, 'hook-relay-task', ...task.command], {
      cwd: options.cwd,
      detached: true,
      stdio: ['ignore', outFd, errFd],
      env: { ...(options.env ?? process.env), HOOK_RELAY_EXIT_FILE: exitPath },
    });
    child.on('error', (err) => {
      log.error('background task process error', err, { task_id: task.id });
    });
    child.unref();
    if (child.pid === undefined) {
      queue.fail(task.id, 'process could not be started');
      return undefined;
    }
    queue.attachProcess(task.id, child.pid, stdoutPath, stderrPath);
    log.info('background task spawned', { task_id: task.id, pid: child.pid, source: task.source });
    return child.pid;
  } catch (err) {
    log.error('failed to spawn background task', err, { task_id: task.id });
    queue.fail(task.id, `spawn failed: ${toErrorMessage(err)}`);
    return undefined;
  } finally {
    if (outFd !== undefined) fs.closeSync(outFd);
    if (errFd !== undefined) fs.closeSync(errFd);
  }
}

function settle(task: BackgroundTask, apply: () => void): boolean {
  try {
    apply();
    return true;
  } catch (err) {
    if (err instanceof InvalidTransitionError) {
      // another invocation settled it first
      log.debug('task already settled', { task_id: task.id });
      return false;
    }
    throw err;
  }
}

/** Non-blocking: record the result of a running task whose process has exited. */
export function reapIfFinished(queue: TaskQueue, task: BackgroundTask): boolean {
  if (task.status !== 'running') return false;

  if (!task.stdout_path) {
    // claimed, but the claiming invocation died before spawning
    if (isProcessAlive(task.pid)) return false;
    return settle(task, () => queue.fail(task.id, 'launcher exited before the task was spawned'));
  }

  const exitFile = exitFileFor(task);
  let exitCode = readExitCode(exitFile);
  if (exitCode === undefined) {
    if (isProcessAlive(task.pid)) return false;
    exitCode = readExitCode(exitFile);
  }

  const stdout = readCapture(task.stdout_path);
  const stderr = readCapture(task.stderr_path);
  if (exitCode === undefined) {
    return settle(task, () =>
      queue.fail(task.id, 'process exited without reporting a status', { stdout, stderr }),
    );
  }
  if (exitCode === 0) {
    return settle(task, () => queue.complete(task.id, 0, stdout, stderr));
  }
  return settle(task, () =>
    queue.fail(task.id, `exited with code ${exitCode}`, { exitCode, stdout, stderr }),
  );
}

/**
 * Terminate a task that has outlived its timeout: SIGTERM to its process
 * group, SIGKILL once `graceMs` passes, then mark it timed out.
 */
export async function enforceTimeout(
  queue: TaskQueue,
  task: BackgroundTask,
  now: number = Date.now(),
  graceMs: number = DEFAULT_GRACE_MS,
): Promise<boolean> {
  if (task.status !== 'running' || task.started_at === undefined) return false;
  if (now - task.started_at <= task.timeout * 1000) return false;
  if (!task.stdout_path || !isProcessAlive(task.pid)) return reapIfFinished(queue, task);

  const pid = task.pid;
  if (pid !== undefined) {
    signalGroup(pid, 'SIGTERM');
    if (!(await waitForExit(pid, graceMs))) {
      log.warn('task ignored SIGTERM, killing', { task_id: task.id, pid });
      signalGroup(pid, 'SIGKILL');
      await waitForExit(pid, graceMs);
    }
  }

  const stdout = readCapture(task.stdout_path);
  const stderr = readCapture(task.stderr_path);
  return settle(task, () => queue.markTimedOut(task.id, { stdout, stderr }));
}

/**
 * One opportunistic pass over the session's queue: import drop-ins, settle
 * what has finished or overrun, then fill free slots with pending tasks.
 */
export async function advanceQueue(
  storage: SessionStorageRoot,
  queue: TaskQueue,
  options: AdvanceOptions = {},
): Promise<AdvanceSummary> {
  const now = options.now ?? Date.now;
  const maxConcurrent = options.maxConcurrent ?? DEFAULT_MAX_BACKGROUND;
  const summary: AdvanceSummary = { imported: [], reaped: [], timedOut: [], spawned: [] };

  summary.imported = importIncoming(storage, queue);

  for (const task of queue.listRunning()) {
    if (reapIfFinished(queue, task)) {
      summary.reaped.push(task.id);
    } else if (await enforceTimeout(queue, task, now(), options.graceMs)) {
      summary.timedOut.push(task.id);
    }
  }

  let running = queue.listRunning().length;
  while (running < maxConcurrent) {
    const task = queue.claimNextPending();
    if (!task) break;
    const pid = spawnAndDetach(storage, queue, task, options);
    if (pid !== undefined) {
      summary.spawned.push(task.id);
      running++;
    }
  }
  return summary;
}

/** Best-effort stop of everything still running, ahead of a session purge. */
export async function terminateRunning(queue: TaskQueue, graceMs: number = DEFAULT_GRACE_MS): Promise<string[]> {
  const terminated: string[] = [];
  for (const task of queue.listRunning()) {
    if (task.stdout_path && task.pid !== undefined && isProcessAlive(task.pid)) {
      signalGroup(task.pid, 'SIGTERM');
      if (!(await waitForExit(task.pid, graceMs))) signalGroup(task.pid, 'SIGKILL');
    }
    if (settle(task, () => queue.fail(task.id, 'terminated at session end'))) {
      terminated.push(task.id);
    }
  }
  return terminated;
}

const FeedbackEntrySchema = FeedbackCandidateSchema.extend({
  category: z.string().min(1).default('background-task'),
});

const FeedbackEnvelopeSchema = z.object({
  feedback: z.array(z.unknown()),
});

function structuredFeedback(stdout: string): FeedbackCandidate[] | null {
  const text = stdout.trim();
  if (!text.startsWith('{')) return null;
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return null;
  }
  const envelope = FeedbackEnvelopeSchema.safeParse(data);
  if (!envelope.success) return null;
  const candidates: FeedbackCandidate[] = [];
  for (const entry of envelope.data.feedback) {
    const parsed = FeedbackEntrySchema.safeParse(entry);
    if (parsed.success) candidates.push(parsed.data);
  }
  // nothing usable in a non-empty list: report the raw text instead
  if (candidates.length === 0 && envelope.data.feedback.length > 0) return null;
  return candidates;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Map a finished task to feedback candidates. Stdout is read as
 * `{"feedback": [...]}` when it parses that way and as plain text otherwise;
 * this never throws.
 */
export function parseTaskOutput(task: BackgroundTask): FeedbackCandidate[] {
  const candidates: FeedbackCandidate[] = [];

  if (task.status === 'timed_out') {
    candidates.push({
      content: `Background task ${task.source} timed out after ${task.timeout}s`,
      severity: 'warn',
      category: 'task-timeout',
    });
    return candidates;
  }

  const structured = structuredFeedback(task.stdout_capture);
  if (structured) {
    candidates.push(...structured);
  } else if (task.stdout_capture.trim()) {
    candidates.push({
      content: truncate(task.stdout_capture.trim(), MAX_TEXT_FEEDBACK_CHARS),
      severity: 'info',
      category: 'background-task',
    });
  }

  if (task.status === 'failed') {
    const detail = task.stderr_capture.trim() || task.error || 'unknown error';
    candidates.push({
      content: `Background task ${task.source} failed: ${truncate(detail, 500)}`,
      severity: 'error',
      category: 'task-error',
    });
  }
  return candidates;
}
