import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError, toErrorMessage } from './errors.js';
import { StrategySchema } from './schemas.js';
import type { Strategy } from './types.js';

const TaskEntrySchema = z.union([
  z.string().min(1),
  z.object({
    ref: z.string().min(1),
    id: z.string().min(1).optional(),
    timeout: z.number().positive().optional(),
    tools: z.array(z.string()).optional(),
    file_types: z.array(z.string()).optional(),
    params: z.record(z.unknown()).optional(),
    strategy: StrategySchema.optional(),
  }),
]);

/**
 * An already-resolved router configuration: `extends` chains and example
 * packs are flattened before this file is written.
 */
export const RouterConfigSchema = z.object({
  concurrency: z.number().int().positive().default(6),
  default_timeout: z.number().positive().default(12),
  max_background: z.number().int().positive().default(2),
  feedback_ttl_hours: z.number().positive().default(24),
  default_strategy: StrategySchema.default('show_once'),
  policy: z
    .object({
      block_on: z.array(z.string()).default([]),
    })
    .default({}),
  events: z.record(z.array(TaskEntrySchema)).default({}),
});

export type RouterConfig = z.output<typeof RouterConfigSchema>;
export type RouterConfigInput = z.input<typeof RouterConfigSchema>;

export interface TaskEntry {
  id: string;
  ref: string;
  timeout?: number;
  tools: string[];
  file_types: string[];
  params: Record<string, unknown>;
  strategy?: Strategy;
}

export function parseConfig(data: unknown, origin = 'config'): RouterConfig {
  const parsed = RouterConfigSchema.safeParse(data);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`${origin}: ${detail}`);
  }
  return parsed.data;
}

export function defaultConfig(): RouterConfig {
  return parseConfig({});
}

export function candidatePaths(cwd: string, explicit?: string): string[] {
  if (explicit) return [path.resolve(cwd, explicit)];
  const fromEnv = process.env.HOOK_RELAY_CONFIG;
  if (fromEnv) return [path.resolve(cwd, fromEnv)];
  return [path.join(cwd, 'hooks.json'), path.join(cwd, '.claude', 'hooks', 'hooks.json')];
}

/**
 * Load the first config found. An explicitly named file must exist; with
 * nothing found by discovery the defaults apply (no synchronous tasks).
 */
export function loadConfig(cwd: string, explicit?: string): RouterConfig {
  const required = Boolean(explicit || process.env.HOOK_RELAY_CONFIG);
  for (const file of candidatePaths(cwd, explicit)) {
    let raw: string;
    try {
      raw = fs.readFileSync(file, 'utf-8');
    } catch (err) {
      if (required) throw new ConfigError(`Cannot read ${file}: ${toErrorMessage(err)}`);
      continue;
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`${file} is not valid JSON: ${toErrorMessage(err)}`);
    }
    return parseConfig(data, file);
  }
  return defaultConfig();
}

/** Normalize an event's entries: string shorthand becomes `{ ref }`, ids default to the ref. */
export function taskEntriesFor(config: RouterConfig, event: string): TaskEntry[] {
  const entries = config.events[event] ?? [];
  return entries.map((entry) => {
    if (typeof entry === 'string') {
      return { id: entry, ref: entry, tools: [], file_types: [], params: {} };
    }
    return {
      id: entry.id ?? entry.ref,
      ref: entry.ref,
      timeout: entry.timeout,
      tools: entry.tools ?? [],
      file_types: entry.file_types ?? [],
      params: entry.params ?? {},
      strategy: entry.strategy,
    };
  });
}
