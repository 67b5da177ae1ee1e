import type { Severity } from './types.js';

const SEVERITIES = new Set<string>(['info', 'warn', 'error']);

export interface PolicySubject {
  severity?: Severity;
  category?: string;
}

/**
 * `block_on` tokens: a severity (`error`), a category (`security`), or
 * `category:severity` where either side may be empty (`:warn`, `security:`).
 */
export function matchesBlockRule(subject: PolicySubject, rule: string): boolean {
  const token = rule.trim().toLowerCase();
  if (!token) return false;
  const severity = (subject.severity ?? '').toLowerCase();
  const category = (subject.category ?? '').toLowerCase();

  const sep = token.indexOf(':');
  if (sep >= 0) {
    const ruleCategory = token.slice(0, sep);
    const ruleSeverity = token.slice(sep + 1);
    return (!ruleCategory || ruleCategory === category) && (!ruleSeverity || ruleSeverity === severity);
  }
  if (SEVERITIES.has(token)) return token === severity;
  return token === category;
}

export function matchesBlockPolicy(subject: PolicySubject, blockOn: readonly string[]): boolean {
  return blockOn.some((rule) => matchesBlockRule(subject, rule));
}
