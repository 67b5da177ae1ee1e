import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { InvalidCommandError, toErrorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { incomingDir } from './session-root.js';
import { DEFAULT_TASK_TIMEOUT, type TaskQueue } from './task-queue.js';
import type { SessionStorageRoot } from './types.js';

const log = createLogger('intake');

/**
 * Shape shared by every way of requesting background work: a drop-in file,
 * the `--queue-task` CLI form and the `queue_task` MCP tool.
 */
export const TaskRequestSchema = z.object({
  command: z.array(z.string()).min(1, 'command must not be empty'),
  source: z.string().min(1).optional(),
  timeout: z.number().int().positive().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type TaskRequest = z.infer<typeof TaskRequestSchema>;

export function enqueueRequest(queue: TaskQueue, request: unknown, defaultSource: string): string {
  const parsed = TaskRequestSchema.safeParse(request);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'request'}: ${i.message}`).join('; ');
    throw new InvalidCommandError(`Invalid task request: ${detail}`);
  }
  const { command, source, timeout, metadata } = parsed.data;
  return queue.enqueue(command, source ?? defaultSource, timeout ?? DEFAULT_TASK_TIMEOUT, metadata ?? {});
}

/**
 * Import `incoming/*.json` drop-ins. Each file is renamed before it is read so
 * two overlapping invocations never import it twice. Files that are not JSON
 * yet (possibly still being written) are left in place; JSON that fails
 * validation is removed.
 */
export function importIncoming(storage: SessionStorageRoot, queue: TaskQueue): string[] {
  const dir = incomingDir(storage, queue.sessionId);
  let names: string[];
  try {
    names = fs.readdirSync(dir).filter((n) => n.endsWith('.json')).sort();
  } catch {
    return [];
  }

  const imported: string[] = [];
  for (const name of names) {
    const file = path.join(dir, name);
    let raw: string;
    try {
      raw = fs.readFileSync(file, 'utf-8');
    } catch {
      continue;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      log.warn('incoming task file is not valid JSON yet', { file, err: toErrorMessage(err) });
      continue;
    }

    const claimed = `${file}.${process.pid}.claimed`;
    try {
      fs.renameSync(file, claimed);
    } catch {
      // another invocation took it
      continue;
    }

    try {
      imported.push(enqueueRequest(queue, data, 'external-json'));
    } catch (err) {
      if (!(err instanceof InvalidCommandError)) {
        fs.renameSync(claimed, file);
        throw err;
      }
      log.warn('discarding invalid incoming task file', { file, err: err.message });
    }
    fs.rmSync(claimed, { force: true });
  }
  return imported;
}
