export type HookRelayErrorCode =
  | 'INVALID_COMMAND'
  | 'INVALID_TRANSITION'
  | 'STORE_UNAVAILABLE'
  | 'TASK_ERROR'
  | 'TASK_TIMEOUT'
  | 'CONFIG_INVALID';

export class HookRelayError extends Error {
  readonly code: HookRelayErrorCode;

  constructor(code: HookRelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed enqueue request; nothing is persisted. */
export class InvalidCommandError extends HookRelayError {
  constructor(message: string) {
    super('INVALID_COMMAND', message);
  }
}

export class InvalidTransitionError extends HookRelayError {
  readonly taskId: string;

  constructor(taskId: string, from: string, to: string) {
    super('INVALID_TRANSITION', `Task ${taskId} cannot move from ${from} to ${to}`);
    this.taskId = taskId;
  }
}

export class StoreUnavailableError extends HookRelayError {
  constructor(message: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', message, { cause });
  }
}

export class TaskError extends HookRelayError {
  readonly taskId: string;

  constructor(taskId: string, message: string, cause?: unknown) {
    super('TASK_ERROR', message, { cause });
    this.taskId = taskId;
  }
}

export class TaskTimeoutError extends HookRelayError {
  readonly taskId: string;
  readonly timeoutMs: number;

  constructor(taskId: string, timeoutMs: number) {
    super('TASK_TIMEOUT', `Task ${taskId} timed out after ${timeoutMs}ms`);
    this.taskId = taskId;
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends HookRelayError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
