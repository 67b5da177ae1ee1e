import type { TaskRequest } from './intake.js';
import type { TaskOutcome } from './schemas.js';

export type Severity = 'info' | 'warn' | 'error';

export type Strategy = 'always' | 'show_once' | 'summary_after_first' | 'defer_until_commit';

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'timed_out';

export type PermissionDecision = 'allow' | 'deny' | 'ask';

export interface SessionStorageRoot {
  root: string;
}

export interface BackgroundTask {
  id: string;
  session_id: string;
  command: string[];
  source: string;
  timeout: number;
  status: TaskStatus;
  enqueued_at: number;
  started_at?: number;
  finished_at?: number;
  delivered_at?: number;
  pid?: number;
  exit_code?: number;
  stdout_capture: string;
  stderr_capture: string;
  stdout_path?: string;
  stderr_path?: string;
  error?: string;
  metadata: Record<string, unknown>;
}

export interface FeedbackItem {
  instance_id: string;
  issue_id: string;
  content: string;
  task_id: string;
  file_path?: string;
  severity: Severity;
  category: string;
  strategy: Strategy;
  first_seen: number;
  last_seen: number;
  occurrence_count: number;
  shown: boolean;
  times_shown: number;
}

/** A finding as a task reports it, before the engine assigns it an issue id. */
export interface FeedbackCandidate {
  content: string;
  severity: Severity;
  category: string;
  file_path?: string;
  issue_type?: string;
  strategy?: Strategy;
}

/** A candidate tagged with the task invocation that produced it. */
export interface SourcedCandidate extends FeedbackCandidate {
  task_id: string;
  invocation_id: string;
}

export interface TaskResult {
  task_id: string;
  invocation_id: string;
  feedback: FeedbackCandidate[];
  permission_decision?: PermissionDecision;
  permission_decision_reason?: string;
  block?: boolean;
  reason?: string;
  stop?: boolean;
  system_message?: string;
  suppress_output?: boolean;
  elapsed_ms?: number;
}

export interface HookInput {
  hook_event_name?: string;
  session_id?: string;
  cwd?: string;
  tool_name?: string;
  tool_input?: Record<string, unknown>;
  tool_response?: unknown;
  [key: string]: unknown;
}

export interface HookSpecificOutput {
  hookEventName: string;
  permissionDecision?: PermissionDecision;
  permissionDecisionReason?: string;
  additionalContext?: string;
}

export interface HookOutput {
  continue: boolean;
  stopReason?: string;
  suppressOutput?: boolean;
  systemMessage?: string;
  decision?: 'block';
  reason?: string;
  hookSpecificOutput?: HookSpecificOutput;
}

export interface TaskContext {
  event: string;
  input: HookInput;
  files: string[];
  params: Record<string, unknown>;
  taskId: string;
  sessionId: string;
  /** Aborted when the task overruns its timeout. */
  signal: AbortSignal;
  /** Queue background work for this session; returns the new task id. */
  enqueue(request: TaskRequest): string;
}

type MaybePromise<T> = T | Promise<T>;

export type SyncTask = (ctx: TaskContext) => MaybePromise<TaskOutcome | TaskOutcome[] | void>;

/** Maps a configured task ref to something callable. */
export type TaskResolver = (ref: string) => MaybePromise<SyncTask>;
