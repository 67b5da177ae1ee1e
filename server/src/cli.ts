import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { loadConfig } from './config.js';
import { HookRelayError, toErrorMessage } from './errors.js';
import { runHook } from './hook-helpers.js';
import { enqueueRequest } from './intake.js';
import { createLogger } from './logger.js';
import { defaultStorageRoot } from './session-root.js';
import { openTaskQueue } from './task-queue.js';
import type { HookInput, SessionStorageRoot } from './types.js';
import { VERSION } from './version.js';

const log = createLogger('cli');

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Overrides `HOOK_RELAY_HOME`. */
  storage?: SessionStorageRoot;
  /** Hook payload; stdin is read when omitted. */
  input?: HookInput;
  cwd?: string;
}

interface CliOptions {
  config?: string;
  checkConfig?: boolean;
  queueTask?: boolean;
  session?: string;
  source: string;
  timeout?: number;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function parseTimeout(value: string): number {
  const seconds = Number(value);
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('must be a positive integer number of seconds');
  }
  return seconds;
}

function queueTask(io: CliIO, command: string[], opts: CliOptions): number {
  if (!opts.session) {
    io.stderr('--queue-task requires --session <id>\n');
    return 2;
  }
  const queue = openTaskQueue(io.storage ?? defaultStorageRoot(), opts.session);
  try {
    const id = enqueueRequest(queue, { command, source: opts.source, timeout: opts.timeout }, 'cli');
    io.stdout(`Queued task: ${id}\n`);
    return 0;
  } finally {
    queue.close();
  }
}

export function createProgram(io: CliIO = defaultIO, setExitCode: (code: number) => void = () => {}): Command {
  const program = new Command();

  program
    .name('hook-relay')
    .description('Route coding-assistant hook events to tasks and queue background checks')
    .version(VERSION)
    .option('--config <path>', 'Router config file (default: $HOOK_RELAY_CONFIG, ./hooks.json, ./.claude/hooks/hooks.json)')
    .option('--check-config', 'Validate the config and print it with defaults applied')
    .option('--queue-task', 'Queue the trailing command as a background task instead of routing stdin')
    .option('--session <id>', 'Session id for --queue-task')
    .option('--source <name>', 'Source label for --queue-task', 'cli')
    .option('--timeout <seconds>', 'Timeout for --queue-task', parseTimeout)
    .argument('[command...]', 'Command to queue (after --)')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .action(async (command: string[], opts: CliOptions) => {
      const cwd = io.cwd ?? process.cwd();

      if (opts.checkConfig) {
        const config = loadConfig(cwd, opts.config);
        io.stdout(`${JSON.stringify(config, null, 2)}\n`);
        return;
      }

      if (opts.queueTask) {
        setExitCode(queueTask(io, command, opts));
        return;
      }

      if (command.length > 0) {
        io.stderr(`Unexpected arguments: ${command.join(' ')} (did you mean --queue-task?)\n`);
        setExitCode(2);
        return;
      }

      await runHook({
        configPath: opts.config,
        input: io.input,
        deps: { storage: io.storage, cwd: io.cwd },
        write: io.stdout,
      });
    });

  return program;
}

/** Parse `argv` (without the node and script entries) and run; resolves to the exit code. */
export async function runCli(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync(argv, { from: 'user' });
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    if (err instanceof HookRelayError) {
      io.stderr(`${err.message}\n`);
      return 1;
    }
    io.stderr(`hook-relay: ${toErrorMessage(err)}\n`);
    log.error('cli failed', err);
    return 1;
  }
}
