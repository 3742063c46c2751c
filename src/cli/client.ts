import { z } from 'zod';
import { TranscriptEntrySchema } from '../claude/transcript.js';
import type { SpawnRequest } from '../orchestrator/supervisor.js';
import {
  SessionOutcomeSchema,
  SessionRecordSchema,
  SessionStateSchema,
  VerdictSchema,
  type Session,
  type SessionState,
} from '../session/types.js';

const PollResultSchema = z.object({
  id: z.string(),
  alias: z.string().nullable().default(null),
  parentId: z.string().nullable(),
  task: z.string(),
  state: SessionStateSchema,
  outcome: SessionOutcomeSchema.nullable(),
  activity: z.string().nullable(),
  elapsedMs: z.number(),
  signal: z.object({
    iteration: z.number(),
    maxIterations: z.number().nullable(),
    lastVerdict: VerdictSchema.nullable(),
    findings: z.string().nullable(),
  }),
  openDescendants: z.number(),
  complete: z.boolean(),
  result: z.string().nullable(),
});

const WaitResultSchema = z.object({
  settled: z.boolean(),
  sessions: z.array(
    z.object({
      id: z.string(),
      state: SessionStateSchema,
      outcome: SessionOutcomeSchema.nullable(),
      result: z.string().nullable(),
      complete: z.boolean(),
    })
  ),
});

const TrajectoryResultSchema = z.object({
  id: z.string(),
  transcriptPath: z.string(),
  summary: z.object({
    turnCount: z.number(),
    toolCalls: z.array(z.string()),
    toolSummary: z.record(z.number()),
    durationSeconds: z.number().nullable(),
    model: z.string().nullable(),
    usage: z.object({
      inputTokens: z.number(),
      outputTokens: z.number(),
      cacheCreationTokens: z.number(),
      cacheReadTokens: z.number(),
    }),
  }),
  entries: z.array(TranscriptEntrySchema),
});

const AbortResponseSchema = z.object({ aborted: z.array(z.string()) });

const ErrorBodySchema = z.object({ error: z.string(), code: z.string().optional() }).passthrough();

export type PollResponse = z.infer<typeof PollResultSchema>;
export type WaitResponse = z.infer<typeof WaitResultSchema>;
export type TrajectoryResponse = z.infer<typeof TrajectoryResultSchema>;

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Client for the orchestrator's HTTP surface. Used by the CLI, which is
 * what workers call to spawn and wait on their children.
 */
export class SessionctlClient {
  private baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  spawn(request: SpawnRequest): Promise<Session> {
    return this.request('POST', '/sessions', SessionRecordSchema, request);
  }

  poll(ref: string): Promise<PollResponse> {
    return this.request('GET', `/sessions/${encodeURIComponent(ref)}`, PollResultSchema);
  }

  trajectory(ref: string): Promise<TrajectoryResponse> {
    return this.request('GET', `/sessions/${encodeURIComponent(ref)}/trajectory`, TrajectoryResultSchema);
  }

  wait(ids: string[], timeoutMs?: number): Promise<WaitResponse> {
    return this.request('POST', '/sessions/wait', WaitResultSchema, { ids, timeoutMs });
  }

  abort(ref: string, reason?: string): Promise<string[]> {
    return this.request('POST', `/sessions/${encodeURIComponent(ref)}/abort`, AbortResponseSchema, { reason }).then(
      (body) => body.aborted
    );
  }

  list(filter: { state?: SessionState[]; parent?: string } = {}): Promise<Session[]> {
    const params = new URLSearchParams();
    for (const state of filter.state ?? []) {
      params.append('state', state);
    }
    if (filter.parent) {
      params.set('parent', filter.parent);
    }
    const query = params.toString();
    return this.request('GET', `/sessions${query ? `?${query}` : ''}`, z.array(SessionRecordSchema));
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    const text = await response.text();
    let json: unknown = null;
    if (text) {
      try {
        json = JSON.parse(text);
      } catch {
        throw new ApiError(response.status, `Unexpected response from ${path}: ${text.slice(0, 200)}`);
      }
    }

    if (!response.ok) {
      const error = ErrorBodySchema.safeParse(json);
      if (error.success) {
        throw new ApiError(response.status, error.data.error, error.data.code);
      }
      throw new ApiError(response.status, `${method} ${path} failed with status ${response.status}`);
    }

    return schema.parse(json);
  }
}
