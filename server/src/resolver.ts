import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { BUILTIN_TASKS } from './builtin-tasks.js';
import type { SyncTask, TaskResolver } from './types.js';

export interface ResolverOptions {
  /** Base directory for relative module refs. */
  cwd: string;
  builtins?: Readonly<Record<string, SyncTask>>;
}

/**
 * Default resolver: built-in task names first, then `path/to/module.js#export`
 * refs (export defaults to `run`) loaded with a dynamic import.
 */
export function createResolver(options: ResolverOptions): TaskResolver {
  const builtins = options.builtins ?? BUILTIN_TASKS;
  return async (ref) => {
    const builtin = builtins[ref];
    if (builtin) return builtin;

    const hash = ref.lastIndexOf('#');
    const modulePath = hash >= 0 ? ref.slice(0, hash) : ref;
    const exportName = hash >= 0 ? ref.slice(hash + 1) : 'run';
    if (!modulePath.startsWith('.') && !path.isAbsolute(modulePath)) {
      throw new Error(`Unknown task: ${ref}`);
    }
    const url = pathToFileURL(path.resolve(options.cwd, modulePath)).href;
    const mod: Record<string, unknown> = await import(url);
    const target = mod[exportName];
    if (typeof target !== 'function') {
      throw new Error(`Task module ${modulePath} has no callable export "${exportName}"`);
    }
    return (ctx) => target(ctx);
  };
}
