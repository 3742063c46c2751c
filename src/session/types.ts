import { z } from 'zod';

/** Dot-separated ancestry path: "0", "0.1", "0.1.0" */
export const SessionIdSchema = z
  .string()
  .regex(/^\d+(\.\d+)*$/, { message: 'Session id must be a dot-separated path of integers' });

/** Human-chosen name for a session; starts with a letter so it never reads as an id */
export const AliasSchema = z
  .string()
  .regex(/^[A-Za-z][A-Za-z0-9_-]*$/, { message: 'Alias must start with a letter and use only letters, digits, - and _' })
  .max(64)
  .refine((alias) => alias !== 'root', { message: "'root' names the top level and cannot be an alias" });

/** A session id or alias, as callers may name a session */
export const SessionRefSchema = z.string().min(1);

export const SESSION_STATES = [
  'pending',
  'running',
  'awaiting_verification',
  'retrying',
  'done',
  'aborted',
  'skipped',
] as const;

export const SessionStateSchema = z.enum(SESSION_STATES);
export type SessionState = z.infer<typeof SessionStateSchema>;

export const TERMINAL_STATES: ReadonlySet<SessionState> = new Set<SessionState>(['done', 'aborted', 'skipped']);

export function isTerminal(state: SessionState): boolean {
  return TERMINAL_STATES.has(state);
}

export const DependencyRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('all'),
    tolerateFailures: z.boolean().default(false),
  }),
  z.object({ kind: z.literal('any') }),
  z.object({
    kind: z.literal('gate'),
    required: z.number().int().min(1),
  }),
]);
export type DependencyRule = z.infer<typeof DependencyRuleSchema>;

export const OutcomeClassSchema = z.enum(['pass', 'fail']);
export type OutcomeClass = z.infer<typeof OutcomeClassSchema>;

export const ConditionSchema = z.object({
  on: OutcomeClassSchema,
  sessionId: SessionIdSchema,
});
export type Condition = z.infer<typeof ConditionSchema>;

export const DependencySpecSchema = z
  .object({
    after: z.array(SessionIdSchema).default([]),
    rule: DependencyRuleSchema.default({ kind: 'all', tolerateFailures: false }),
    conditions: z.array(ConditionSchema).default([]),
    pipe: z.boolean().default(false), // inject satisfied predecessors' results into the contract
  })
  .refine((spec) => spec.rule.kind !== 'gate' || spec.rule.required <= spec.after.length, {
    message: 'Gate requires more predecessors than were named',
    path: ['rule', 'required'],
  })
  .refine((spec) => spec.rule.kind !== 'any' || spec.after.length > 0, {
    message: 'An any-of rule needs at least one predecessor',
    path: ['after'],
  });
export type DependencySpec = z.infer<typeof DependencySpecSchema>;

/**
 * Dependencies as a caller names them: sessions by id or alias. Resolved to
 * ids and checked against DependencySpecSchema before the session is stored.
 */
export const DependencyRequestSchema = z.object({
  after: z.array(SessionRefSchema).default([]),
  rule: DependencyRuleSchema.default({ kind: 'all', tolerateFailures: false }),
  conditions: z.array(z.object({ on: OutcomeClassSchema, sessionId: SessionRefSchema })).default([]),
  pipe: z.boolean().default(false),
});
export type DependencyRequest = z.infer<typeof DependencyRequestSchema>;
export type DependencyRequestInput = z.input<typeof DependencyRequestSchema>;

const commandChecker = z.object({
  kind: z.literal('command'),
  command: z.string().min(1),
});

const agentChecker = z.object({
  kind: z.literal('agent'),
  prompt: z.string().min(1),
});

export const CheckerSpecSchema = z.discriminatedUnion('kind', [
  commandChecker.extend({ maxIterations: z.number().int().min(1) }),
  agentChecker.extend({ maxIterations: z.number().int().min(1) }),
]);
export type CheckerSpec = z.infer<typeof CheckerSpecSchema>;

/** Checker as requested by a caller; the bound falls back to the configured default */
export const CheckerSpecInputSchema = z.discriminatedUnion('kind', [
  commandChecker.extend({ maxIterations: z.number().int().min(1).optional() }),
  agentChecker.extend({ maxIterations: z.number().int().min(1).optional() }),
]);
export type CheckerSpecInput = z.infer<typeof CheckerSpecInputSchema>;

export const PhaseMetadataSchema = z.object({
  name: z.string().min(1),
  previousOutput: z.string().nullable().default(null),
});
export type PhaseMetadata = z.infer<typeof PhaseMetadataSchema>;

export const VerdictSchema = z.enum(['ACCEPT', 'RETRY', 'TERMINATE']);
export type Verdict = z.infer<typeof VerdictSchema>;

export const VerdictRecordSchema = z.object({
  iteration: z.number().int().min(1),
  verdict: VerdictSchema,
  findings: z.string(),
  at: z.string(),
});
export type VerdictRecord = z.infer<typeof VerdictRecordSchema>;

export const SessionOutcomeSchema = z.enum([
  'accepted',
  'max_iterations_reached',
  'terminated',
  'aborted',
  'launch_failed',
  'worker_lost',
  'unsatisfiable',
]);
export type SessionOutcome = z.infer<typeof SessionOutcomeSchema>;

/**
 * Persisted session record. Fields that only exist for auditing default so
 * that hand-edited records stay loadable.
 */
export const SessionRecordSchema = z.object({
  id: SessionIdSchema,
  parentId: SessionIdSchema.nullable(),
  alias: AliasSchema.nullable().default(null),
  task: z.string(),
  state: SessionStateSchema,
  dependencies: DependencySpecSchema.nullable().default(null),
  checker: CheckerSpecSchema.nullable().default(null),
  iterationCount: z.number().int().min(0).default(0),
  output: z.string().nullable().default(null),
  result: z.string().nullable().default(null),
  outcome: SessionOutcomeSchema.nullable().default(null),
  pipedInputs: z.array(SessionIdSchema).default([]),
  phase: PhaseMetadataSchema.nullable().default(null),
  parentIntent: z.string().nullable().default(null),
  fileScope: z.array(z.string()).default([]),
  verdicts: z.array(VerdictRecordSchema).default([]),
  findings: z.string().nullable().default(null),
  activity: z.string().nullable().default(null),
  workerHandle: z.string().nullable().default(null),
  /** Agent transcript reported by the worker's last Stop hook */
  transcriptPath: z.string().nullable().default(null),
  createdAt: z.string(),
  updatedAt: z.string(),
  terminatedAt: z.string().nullable().default(null),
});
export type Session = z.infer<typeof SessionRecordSchema>;

/** Fields a caller supplies when creating a session */
export interface SessionDraft {
  parentId: string | null;
  alias: string | null;
  task: string;
  dependencies: DependencySpec | null;
  checker: CheckerSpec | null;
  phase: PhaseMetadata | null;
  parentIntent: string | null;
  fileScope: string[];
}

/** Mutable part of a session; id, parentage and creation time never change */
export type SessionPatch = Partial<Omit<Session, 'id' | 'parentId' | 'createdAt' | 'updatedAt'>>;

export interface SessionFilter {
  state?: SessionState | SessionState[];
  parentId?: string | null;
  /** Restrict to descendants of this id */
  ancestorId?: string;
  /** Restrict to sessions whose dependencies reference this id */
  dependsOn?: string;
  alias?: string;
}

/** Every session a dependency spec waits on: rule predecessors, then condition targets */
export function dependencyIds(spec: DependencySpec | null): string[] {
  if (!spec) {
    return [];
  }
  const ids = [...spec.after];
  for (const condition of spec.conditions) {
    if (!ids.includes(condition.sessionId)) {
      ids.push(condition.sessionId);
    }
  }
  return ids;
}
