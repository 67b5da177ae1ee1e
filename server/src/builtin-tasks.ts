import { TaskRequestSchema } from './intake.js';
import type { TaskOutcome } from './schemas.js';
import type { SyncTask, TaskContext } from './types.js';

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((v): v is string => typeof v === 'string' && v.trim() !== '').map((v) => v.trim());
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function bashCommand(ctx: TaskContext): string {
  if (ctx.input.tool_name !== 'Bash') return '';
  const command = ctx.input.tool_input?.command;
  return typeof command === 'string' ? command : '';
}

/**
 * Queue `params.command` as background work. An argument spelled `{files}`
 * expands to the files the tool call touched.
 */
export const enqueueBackground: SyncTask = (ctx) => {
  const command = stringList(ctx.params.command).flatMap((arg) => (arg === '{files}' ? ctx.files : [arg]));
  const request = TaskRequestSchema.parse({
    command,
    source: typeof ctx.params.source === 'string' ? ctx.params.source : ctx.taskId,
    timeout: ctx.params.timeout,
  });
  ctx.enqueue(request);
};

function protectedBranches(ctx: TaskContext): string[] {
  const fromParams = stringList(ctx.params.branches);
  if (fromParams.length > 0) return fromParams;
  const fromEnv = (process.env.PROTECTED_BRANCHES ?? '').split(',').map((s) => s.trim()).filter(Boolean);
  return fromEnv.length > 0 ? fromEnv : ['main', 'master'];
}

/** Blocks direct pushes to protected branches from Bash tool calls. */
export const protectBranch: SyncTask = (ctx): TaskOutcome | void => {
  const command = bashCommand(ctx);
  if (!command) return;

  const branches = protectedBranches(ctx).map(escapeRegExp).join('|');
  const rules: Array<[RegExp, string]> = [
    [new RegExp(`\\bgit\\s+push\\s+(?:-f|--force)\\s+(?:origin\\s+)?(?:${branches})\\b`, 'i'), 'Force push to a protected branch is not allowed'],
    [new RegExp(`\\bgit\\s+push\\s+(?:origin\\s+)?(?:${branches})\\b`, 'i'), 'Direct push to a protected branch is not allowed'],
    [new RegExp(`\\bgit\\s+push\\s+(?:origin\\s+)?[^:\\s]*:(?:${branches})\\b`, 'i'), 'Pushing to a protected branch is not allowed'],
  ];

  for (const [pattern, message] of rules) {
    if (!pattern.test(command)) continue;
    return {
      block: true,
      reason: [
        message,
        '',
        `Command: ${command}`,
        '',
        'Push a feature branch and open a pull request instead.',
      ].join('\n'),
    };
  }
};

export const BUILTIN_TASKS: Readonly<Record<string, SyncTask>> = {
  'enqueue-background': enqueueBackground,
  'protect-branch': protectBranch,
};
