import * as fs from 'node:fs';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { InvalidCommandError } from './errors.js';
import { FeedbackStore } from './feedback-store.js';
import { enqueueRequest } from './intake.js';
import { sessionDir } from './session-root.js';
import { openTaskQueue, type TaskQueue } from './task-queue.js';
import type { BackgroundTask, FeedbackItem, SessionStorageRoot } from './types.js';
import { VERSION } from './version.js';

const TaskStatusFilterSchema = z.enum(['pending', 'running', 'completed', 'failed', 'timed_out', 'all']);

function withQueue<T>(storage: SessionStorageRoot, sessionId: string, fn: (queue: TaskQueue) => T): T {
  const queue = openTaskQueue(storage, sessionId);
  try {
    return fn(queue);
  } finally {
    queue.close();
  }
}

function describeTask(task: BackgroundTask): string {
  const outcome = task.status === 'failed' || task.status === 'timed_out'
    ? ` (${task.error ?? 'no detail'})`
    : task.exit_code !== undefined ? ` (exit ${task.exit_code})` : '';
  const delivered = task.delivered_at !== undefined ? ', delivered' : '';
  return `- [${task.status}${delivered}] ${task.source}: ${task.command.join(' ')}${outcome} [id: ${task.id}]`;
}

export function registerTools(server: McpServer, storage: SessionStorageRoot) {
  server.tool(
    'health',
    'Check that the hook-relay server is up.',
    {},
    async () => ({
      content: [{ type: 'text' as const, text: `ok (hook-relay ${VERSION})` }],
    })
  );

  server.tool(
    'queue_task',
    'Queue a command to run in the background for a session. Its output is surfaced on a later hook event of that session.',
    {
      session_id: z.string().min(1).describe('Session the task belongs to'),
      command: z.array(z.string()).describe('Program and arguments, e.g. ["npm", "test"]'),
      source: z.string().optional().describe('Label shown with the task\'s feedback (default: mcp)'),
      timeout: z.number().int().positive().optional().describe('Seconds before the task is killed (default: 120)'),
      metadata: z.record(z.unknown()).optional().describe('Free-form data stored with the task'),
    },
    async (args) => {
      const { session_id, ...request } = args;
      try {
        const id = withQueue(storage, session_id, (queue) => enqueueRequest(queue, request, 'mcp'));
        return {
          content: [{ type: 'text' as const, text: `Queued task: ${id}` }],
        };
      } catch (err) {
        if (!(err instanceof InvalidCommandError)) throw err;
        return {
          content: [{ type: 'text' as const, text: err.message }],
          isError: true,
        };
      }
    }
  );

  server.tool(
    'list_tasks',
    'List background tasks of a session, optionally filtered by status.',
    {
      session_id: z.string().min(1).describe('Session to inspect'),
      status: TaskStatusFilterSchema.optional().describe('Filter by status (default: all)'),
    },
    async (args) => {
      if (!fs.existsSync(sessionDir(storage, args.session_id))) {
        return { content: [{ type: 'text' as const, text: 'No tasks found.' }] };
      }
      let tasks = withQueue(storage, args.session_id, (queue) => queue.listAll());
      if (args.status && args.status !== 'all') {
        tasks = tasks.filter((t) => t.status === args.status);
      }
      if (tasks.length === 0) {
        return { content: [{ type: 'text' as const, text: 'No tasks found.' }] };
      }
      return {
        content: [{
          type: 'text' as const,
          text: `${tasks.length} task(s):\n\n${tasks.map(describeTask).join('\n')}`,
        }],
      };
    }
  );

  server.tool(
    'list_feedback',
    'List the feedback items recorded for a session.',
    {
      session_id: z.string().min(1).describe('Session to inspect'),
      unshown_only: z.boolean().optional().describe('Only items not yet included in a response'),
    },
    async (args) => {
      const store = new FeedbackStore(storage, args.session_id);
      let items: FeedbackItem[];
      try {
        items = args.unshown_only ? store.listUnshown() : store.readItems();
      } finally {
        store.close();
      }
      if (items.length === 0) {
        return { content: [{ type: 'text' as const, text: 'No feedback recorded.' }] };
      }
      const lines = items.map((item) => {
        const state = item.shown ? `shown ${item.times_shown}x` : 'unshown';
        return `- [${item.severity}] ${item.category}: ${item.content} (seen ${item.occurrence_count}x, ${state}, ${item.strategy}) [issue: ${item.issue_id}]`;
      });
      return {
        content: [{
          type: 'text' as const,
          text: `${items.length} feedback item(s):\n\n${lines.join('\n')}`,
        }],
      };
    }
  );
}
