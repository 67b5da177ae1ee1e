import { z } from 'zod';

export const SeveritySchema = z.enum(['info', 'warn', 'error']);

export const StrategySchema = z.enum(['always', 'show_once', 'summary_after_first', 'defer_until_commit']);

export const PermissionDecisionSchema = z.enum(['allow', 'deny', 'ask']);

/** One finding as a task (synchronous or background) reports it. */
export const FeedbackCandidateSchema = z.object({
  content: z.string().min(1),
  severity: SeveritySchema.default('info'),
  category: z.string().min(1).default('general'),
  file_path: z.string().optional(),
  issue_type: z.string().optional(),
  strategy: StrategySchema.optional(),
});

export const TaskOutcomeSchema = z.object({
  feedback: z.array(FeedbackCandidateSchema).optional(),
  permission_decision: PermissionDecisionSchema.optional(),
  permission_decision_reason: z.string().optional(),
  block: z.boolean().optional(),
  reason: z.string().optional(),
  stop: z.boolean().optional(),
  system_message: z.string().optional(),
  suppress_output: z.boolean().optional(),
});

export type TaskOutcome = z.input<typeof TaskOutcomeSchema>;
export type ParsedTaskOutcome = z.output<typeof TaskOutcomeSchema>;
