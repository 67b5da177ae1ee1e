import { createHash } from 'node:crypto';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { SessionStorageRoot } from './types.js';

const SAFE_SEGMENT = /^[A-Za-z0-9_-]{1,64}$/;

function shortHash(input: string): string {
  return createHash('sha256').update(input).digest('hex').slice(0, 16);
}

export function defaultStorageRoot(): SessionStorageRoot {
  const root = process.env.HOOK_RELAY_HOME
    || path.join(process.env.HOME || process.env.USERPROFILE || os.tmpdir(), '.cache', 'hook-relay');
  return { root };
}

/** Safe ids are used verbatim; anything else (the empty id too) becomes `~<hash>`, which no verbatim key can equal. */
export function getSessionKey(sessionId: string): string {
  if (SAFE_SEGMENT.test(sessionId)) return sessionId;
  return `~${shortHash(sessionId)}`;
}

/** Partitions live under `sessions/` so no session id can reach the log directory. */
export function sessionDir(storage: SessionStorageRoot, sessionId: string): string {
  return path.join(storage.root, 'sessions', getSessionKey(sessionId));
}

export function ensureSessionDir(storage: SessionStorageRoot, sessionId: string): string {
  const dir = sessionDir(storage, sessionId);
  fs.mkdirSync(dir, { recursive: true });
  return dir;
}

export function incomingDir(storage: SessionStorageRoot, sessionId: string): string {
  return path.join(sessionDir(storage, sessionId), 'incoming');
}

export function outputDir(storage: SessionStorageRoot, sessionId: string): string {
  return path.join(sessionDir(storage, sessionId), 'output');
}

/** Deleting the partition is the whole of session cleanup. */
export function removeSessionDir(storage: SessionStorageRoot, sessionId: string): void {
  fs.rmSync(sessionDir(storage, sessionId), { recursive: true, force: true });
}
