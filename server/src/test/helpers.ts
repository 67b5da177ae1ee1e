import { spawn } from 'node:child_process';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Client } from '@modelcontextprotocol/sdk/client/index.js';
import type { TaskEntry } from '../config.js';
import type { BackgroundTask, SessionStorageRoot, SourcedCandidate } from '../types.js';

// Keep test runs out of the user's log file.
process.env.HOOK_RELAY_LOG_LEVEL = 'silent';

export function makeStorage(): SessionStorageRoot {
  return { root: fs.mkdtempSync(path.join(os.tmpdir(), 'hook-relay-test-')) };
}

export function removeStorage(storage: SessionStorageRoot): void {
  fs.rmSync(storage.root, { recursive: true, force: true });
}

export interface TestClock {
  now: () => number;
  advance(ms: number): void;
}

export function createClock(start = 1_700_000_000_000): TestClock {
  let current = start;
  return {
    now: () => current,
    advance(ms) {
      current += ms;
    },
  };
}

export async function waitFor(check: () => boolean, timeoutMs = 10_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
    await sleep(25);
  }
}

export const MAIN_ENTRY = fileURLToPath(new URL('../main.ts', import.meta.url));
const STORE_WORKER = fileURLToPath(new URL('./store-worker.ts', import.meta.url));

export interface NodeRun {
  code: number | null;
  stdout: string;
  stderr: string;
  elapsedMs: number;
}

/** Run a TypeScript entry point in a fresh node process, loaded through tsx. */
export function runNode(
  script: string,
  args: string[] = [],
  options: { env?: Record<string, string>; input?: string } = {},
): Promise<NodeRun> {
  const started = Date.now();
  return new Promise((resolve, reject) => {
    const child = spawn(process.execPath, ['--import', 'tsx', script, ...args], {
      env: { ...process.env, ...options.env },
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('error', reject);
    child.on('close', (code) => resolve({ code, stdout, stderr, elapsedMs: Date.now() - started }));
    child.stdin.end(options.input ?? '');
  });
}

/**
 * Start `count` store workers against one storage root, release them at the
 * same moment once all are up, and collect what each printed.
 */
export async function raceWorkers(
  storage: SessionStorageRoot,
  count: number,
  mode: 'claim' | 'upsert',
  sessionId: string,
  rounds = 1,
): Promise<NodeRun[]> {
  const runs = Array.from({ length: count }, () =>
    runNode(STORE_WORKER, [mode, storage.root, sessionId, String(rounds)]),
  );
  const ready = () => fs.readdirSync(storage.root).filter((name) => name.startsWith('ready-')).length;
  await waitFor(() => ready() >= count, 30_000);
  fs.writeFileSync(path.join(storage.root, 'go'), '');
  return Promise.all(runs);
}

export function entry(id: string, extra: Partial<TaskEntry> = {}): TaskEntry {
  return { id, ref: id, tools: [], file_types: [], params: {}, ...extra };
}

export function candidate(content: string, extra: Partial<SourcedCandidate> = {}): SourcedCandidate {
  return {
    content,
    severity: 'info',
    category: 'lint',
    task_id: 'lint',
    invocation_id: 'inv-1',
    ...extra,
  };
}

export function makeTask(extra: Partial<BackgroundTask> = {}): BackgroundTask {
  return {
    id: 'task-1',
    session_id: 's1',
    command: ['true'],
    source: 'checker',
    timeout: 120,
    status: 'completed',
    enqueued_at: 1,
    stdout_capture: '',
    stderr_capture: '',
    metadata: {},
    ...extra,
  };
}

export function callTool(
  client: Client,
  name: string,
  args: Record<string, unknown> = {},
) {
  return client.callTool({ name, arguments: args });
}

const ToolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  isError: z.boolean().optional(),
});

export function text(result: Awaited<ReturnType<typeof callTool>>): string {
  return ToolResultSchema.parse(result).content
    .map((c) => c.text ?? '')
    .join('\n');
}

export function isError(result: Awaited<ReturnType<typeof callTool>>): boolean {
  return ToolResultSchema.parse(result).isError === true;
}
