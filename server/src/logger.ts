/**
 * File-only pino logger. Stdout belongs to the host protocol, so nothing is
 * ever logged there.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import pino from 'pino';
import { defaultStorageRoot } from './session-root.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, err?: unknown, context?: LogContext): void;
}

const VALID_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

let rootLogger: pino.Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(): LogLevel {
  const level = process.env.HOOK_RELAY_LOG_LEVEL?.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

export function resolveLogFile(): string {
  const dir = process.env.HOOK_RELAY_LOG_DIR || path.join(defaultStorageRoot().root, 'logs');
  return path.join(dir, 'hook-relay.log');
}

/**
 * The configured file, else one under the OS temp dir. Null when neither can
 * be opened; logging then goes silent rather than failing the hook.
 */
function openDestination(): pino.DestinationStream | null {
  const files = [resolveLogFile(), path.join(os.tmpdir(), 'hook-relay', 'hook-relay.log')];
  for (const dest of files) {
    try {
      // Sync writes: the process exits right after printing its response.
      return pino.destination({ dest, sync: true, mkdir: true });
    } catch {
      continue;
    }
  }
  return null;
}

function getRootLogger(): pino.Logger {
  if (rootLogger) return rootLogger;
  const level = resolveLogLevel();
  const destination = level === 'silent' ? null : openDestination();
  rootLogger = destination ? pino({ level }, destination) : pino({ level: 'silent' });
  return rootLogger;
}

function serializeError(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack, cause: err.cause };
  }
  return { message: String(err) };
}

/**
 * Module logger. The pino instance is built on first use so the environment
 * (log dir, level) is read when the process actually logs.
 */
export function createLogger(module: string): Logger {
  const base = { module };
  const target = () => getRootLogger();
  return {
    debug(msg, context) {
      target().debug({ ...base, ...context }, msg);
    },
    info(msg, context) {
      target().info({ ...base, ...context }, msg);
    },
    warn(msg, context) {
      target().warn({ ...base, ...context }, msg);
    },
    error(msg, err, context) {
      if (err === undefined) {
        target().error({ ...base, ...context }, msg);
      } else {
        target().error({ ...base, ...context, err: serializeError(err) }, msg);
      }
    },
  };
}
