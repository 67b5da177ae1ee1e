import type { TaskEntry } from './config.js';
import type { HookInput } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pullPaths(source: Record<string, unknown>, into: string[]): void {
  for (const key of ['file_path', 'filePath']) {
    const v = source[key];
    if (typeof v === 'string' && v) into.push(v);
  }
  for (const key of ['file_paths', 'filePaths', 'files']) {
    const list = source[key];
    if (!Array.isArray(list)) continue;
    for (const item of list) {
      if (typeof item === 'string' && item) into.push(item);
    }
  }
  const edits = source.edits;
  if (Array.isArray(edits)) {
    for (const edit of edits) {
      if (!isRecord(edit)) continue;
      const p = edit.path ?? edit.file_path;
      if (typeof p === 'string' && p) into.push(p);
    }
  }
}

/** File paths named by `tool_input` and `tool_response`, de-duplicated in order. */
export function collectChangedFiles(input: HookInput): string[] {
  const paths: string[] = [];
  if (isRecord(input.tool_input)) pullPaths(input.tool_input, paths);
  if (isRecord(input.tool_response)) pullPaths(input.tool_response, paths);
  return [...new Set(paths)];
}

function extension(file: string): string {
  const lower = file.toLowerCase();
  const dot = lower.lastIndexOf('.');
  return dot >= 0 ? lower.slice(dot + 1) : '';
}

export interface SelectionContext {
  toolName: string;
  files: string[];
}

/**
 * Apply the `tools` and `file_types` filters. A filter only applies when the
 * entry declares it; it then requires the payload to carry a match.
 */
export function selectTasks(entries: TaskEntry[], ctx: SelectionContext): TaskEntry[] {
  const seen = new Set<string>();
  const selected: TaskEntry[] = [];
  for (const entry of entries) {
    if (entry.tools.length > 0) {
      const tool = ctx.toolName.toLowerCase();
      if (!tool || !entry.tools.some((t) => t.toLowerCase() === tool)) continue;
    }
    if (entry.file_types.length > 0) {
      const wanted = new Set(entry.file_types.map((ft) => ft.toLowerCase().replace(/^\./, '')));
      if (!ctx.files.some((f) => wanted.has(extension(f)))) continue;
    }
    if (seen.has(entry.id)) continue;
    seen.add(entry.id);
    selected.push(entry);
  }
  return selected;
}
