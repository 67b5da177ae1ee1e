import * as fs from 'node:fs';
import { z } from 'zod';
import { loadConfig, type RouterConfig } from './config.js';
import { toErrorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { routeEvent, type RouterDeps } from './router.js';
import { defaultStorageRoot } from './session-root.js';
import type { HookInput, HookOutput } from './types.js';

const log = createLogger('hook');

const HookInputSchema = z
  .object({
    hook_event_name: z.string().optional(),
    session_id: z.string().optional(),
    cwd: z.string().optional(),
    tool_name: z.string().optional(),
    tool_input: z.record(z.unknown()).optional(),
  })
  .passthrough();

export function parseHookInput(raw: string): HookInput {
  if (!raw.trim()) return {};
  const parsed = HookInputSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Unexpected hook payload: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
  }
  return parsed.data;
}

function readInput(): HookInput {
  return parseHookInput(fs.readFileSync(0, 'utf-8'));
}

function output(result: HookOutput, write: (text: string) => void): void {
  write(JSON.stringify(result));
}

export interface HookRunOptions {
  configPath?: string;
  /** Test seam; reads stdin when omitted. */
  input?: HookInput;
  deps?: Partial<RouterDeps>;
  write?: (text: string) => void;
}

/**
 * Route one hook payload and write exactly one JSON object. Any failure ends
 * in `{"continue":true}` so the host is never left without a response.
 */
export async function runHook(options: HookRunOptions = {}): Promise<HookOutput> {
  const write = options.write ?? ((text: string) => process.stdout.write(text));
  let result: HookOutput = { continue: true };
  try {
    const input = options.input ?? readInput();
    const cwd = options.deps?.cwd ?? input.cwd ?? process.cwd();
    let config: RouterConfig;
    try {
      config = options.deps?.config ?? loadConfig(cwd, options.configPath);
    } catch (err) {
      result = { continue: true, systemMessage: `hook-relay: ${toErrorMessage(err)}` };
      output(result, write);
      log.error('configuration rejected', err);
      return result;
    }
    result = await routeEvent(input, {
      ...options.deps,
      storage: options.deps?.storage ?? defaultStorageRoot(),
      config,
      cwd,
    });
  } catch (err) {
    result = { continue: true };
    output(result, write);
    log.error('hook invocation failed', err);
    return result;
  }
  output(result, write);
  return result;
}
