/**
 * LifecycleSupervisor - drives sessions through their state machine
 *
 * Reacts to store changes rather than polling:
 * - created          -> evaluate dependencies
 * - awaiting_verification -> run the checker
 * - retrying         -> relaunch the worker with findings
 * - terminal         -> stop the worker, re-evaluate dependents
 *
 * Everything it starts in the background is tracked so callers (and tests)
 * can wait for the system to settle.
 */

import { z, ZodError } from 'zod';
import type { ContractComposer } from '../contract/composer.js';
import type { DependencyResolver, Readiness } from '../dependencies/resolver.js';
import { SessionError, UnsatisfiableDependencyError, errorMessage } from '../errors/index.js';
import type { SessionStore } from '../session/store.js';
import {
  AliasSchema,
  CheckerSpecInputSchema,
  DependencyRequestSchema,
  DependencySpecSchema,
  PhaseMetadataSchema,
  SessionRefSchema,
  isTerminal,
  type CheckerSpec,
  type CheckerSpecInput,
  type Condition,
  type DependencyRequest,
  type DependencySpec,
  type Session,
  type SessionOutcome,
  type SessionPatch,
  type SessionState,
} from '../session/types.js';
import { logger } from '../utils/logger.js';
import type { FeedbackLoopController } from './feedback-loop.js';
import type { WorkerLauncher } from './worker-launcher.js';

export const SpawnRequestSchema = z.object({
  task: z.string().min(1),
  alias: AliasSchema.nullable().default(null),
  /** Id or alias of the owning session */
  parentId: SessionRefSchema.nullable().default(null),
  dependencies: DependencyRequestSchema.nullable().default(null),
  checker: CheckerSpecInputSchema.nullable().default(null),
  /** Accept the worker's output without any checker */
  noVerify: z.boolean().default(false),
  phase: PhaseMetadataSchema.nullable().default(null),
  parentIntent: z.string().nullable().default(null),
  fileScope: z.array(z.string()).default([]),
});
export type SpawnRequest = z.input<typeof SpawnRequestSchema>;

export interface SupervisorOptions {
  defaultMaxIterations: number;
  /** Extra launch attempts after the first one fails */
  launchRetries: number;
  launchRetryDelayMs: number;
}

export interface AbortOptions {
  reason?: string;
  /** Outcome recorded on the session itself; descendants are always 'aborted' */
  outcome?: Extract<SessionOutcome, 'aborted' | 'worker_lost'>;
}

/** Criteria used when a spawn names no checker and is not exempt */
export function defaultCheckerCriteria(task: string): string {
  return `The output fully accomplishes the following task, with no unresolved errors or placeholders:\n\n${task}`;
}

export function resolveChecker(
  task: string,
  checker: CheckerSpecInput | null,
  noVerify: boolean,
  defaultMaxIterations: number
): CheckerSpec | null {
  if (noVerify) {
    return null;
  }
  if (!checker) {
    return { kind: 'agent', prompt: defaultCheckerCriteria(task), maxIterations: defaultMaxIterations };
  }
  return { ...checker, maxIterations: checker.maxIterations ?? defaultMaxIterations };
}

type LaunchableState = Extract<SessionState, 'pending' | 'retrying'>;

function isLaunchable(state: SessionState): state is LaunchableState {
  return state === 'pending' || state === 'retrying';
}

export class LifecycleSupervisor {
  private tasks: Set<Promise<void>> = new Set();
  private launching: Set<string> = new Set();
  private verifying: Set<string> = new Set();
  // Stop events that arrived while the worker's launch was still being recorded
  private earlyStops: Map<string, string> = new Map();
  // One termination per worker handle, shared by abort and the terminal reaction
  private stopping: Map<string, Promise<void>> = new Map();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private store: SessionStore,
    private resolver: DependencyResolver,
    private composer: ContractComposer,
    private launcher: WorkerLauncher,
    private feedback: FeedbackLoopController,
    private options: SupervisorOptions
  ) {}

  /**
   * Start reacting to store changes.
   */
  start(): void {
    if (this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.store.subscribe((session, previous) => this.onSessionChanged(session, previous));
  }

  stop(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  /** Resolves once no background work is in flight */
  async settle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  async spawn(request: SpawnRequest): Promise<Session> {
    const parsed = SpawnRequestSchema.parse(request);
    const parentId = parsed.parentId === null ? null : await this.store.resolve(parsed.parentId);
    const dependencies = parsed.dependencies === null ? null : await this.resolveDependencies(parsed.dependencies);
    return this.store.create({
      parentId,
      alias: parsed.alias,
      task: parsed.task,
      dependencies,
      checker: resolveChecker(parsed.task, parsed.checker, parsed.noVerify, this.options.defaultMaxIterations),
      phase: parsed.phase,
      parentIntent: parsed.parentIntent,
      fileScope: parsed.fileScope,
    });
  }

  private async resolveDependencies(request: DependencyRequest): Promise<DependencySpec> {
    const after: string[] = [];
    for (const ref of request.after) {
      after.push(await this.store.resolve(ref));
    }
    const conditions: Condition[] = [];
    for (const condition of request.conditions) {
      conditions.push({ on: condition.on, sessionId: await this.store.resolve(condition.sessionId) });
    }

    const checked = DependencySpecSchema.safeParse({ ...request, after, conditions });
    if (!checked.success) {
      throw new ZodError(checked.error.issues.map((issue) => ({ ...issue, path: ['dependencies', ...issue.path] })));
    }
    return checked.data;
  }

  /**
   * Decide whether a pending session can start, must wait, or can never run.
   */
  async evaluate(id: string): Promise<void> {
    const session = await this.store.get(id);
    if (session.state !== 'pending') {
      return;
    }

    let readiness: Readiness;
    try {
      readiness = await this.resolver.evaluate(session);
    } catch (err) {
      logger.error('Dependency evaluation failed', { sessionId: id, error: errorMessage(err) });
      await this.transition(id, ['pending'], {
        state: 'skipped',
        outcome: 'unsatisfiable',
        result: `[skipped: dependencies could not be evaluated: ${errorMessage(err)}]`,
      });
      return;
    }

    switch (readiness.status) {
      case 'waiting':
        logger.debug('Session waiting on dependencies', { sessionId: id, pendingOn: readiness.pendingOn });
        return;
      case 'unsatisfiable': {
        const unsatisfiable = new UnsatisfiableDependencyError(id, readiness.reason);
        logger.info(unsatisfiable.message);
        await this.transition(id, ['pending'], {
          state: 'skipped',
          outcome: 'unsatisfiable',
          result: `[skipped: ${readiness.reason}]`,
        });
        return;
      }
      case 'ready':
        await this.launch(id, readiness.piped);
        return;
    }
  }

  /**
   * Worker reported completion of its current iteration.
   */
  async handleWorkerStopped(id: string, output: string): Promise<Session> {
    let moved = false;
    const session = await this.store.update(id, (current) => {
      if (current.state !== 'running') {
        return null;
      }
      moved = true;
      return { state: 'awaiting_verification', output };
    });

    if (!moved) {
      if (isLaunchable(session.state) && this.launching.has(id)) {
        this.earlyStops.set(id, output);
      } else {
        logger.debug('Ignoring worker stop', { sessionId: id, state: session.state });
      }
    }
    return session;
  }

  async recordActivity(id: string, activity: string): Promise<Session> {
    return this.store.update(id, () => ({ activity }));
  }

  async recordTranscript(id: string, transcriptPath: string): Promise<Session> {
    return this.store.update(id, (current) =>
      current.transcriptPath === transcriptPath ? null : { transcriptPath }
    );
  }

  /**
   * Abort a session and every open descendant. Descendants are marked parent
   * first, so none can spawn a child once marked; the scan repeats until no
   * open descendant remains.
   */
  async abort(ref: string, options: AbortOptions = {}): Promise<Session[]> {
    const id = await this.store.resolve(ref);
    const reason = options.reason ?? 'aborted by request';
    const aborted: Session[] = [];

    const root = await this.markAborted(id, reason, options.outcome ?? 'aborted');
    if (root) {
      aborted.push(root);
    }

    for (;;) {
      // Id order is a pre-order walk of the subtree
      const open = (await this.store.list({ ancestorId: id })).filter((s) => !isTerminal(s.state));
      if (open.length === 0) {
        break;
      }
      for (const descendant of open) {
        const marked = await this.markAborted(descendant.id, `ancestor ${id} was aborted`, 'aborted');
        if (marked) {
          aborted.push(marked);
        }
      }
    }

    // Workers are stopped before the abort is acknowledged
    await Promise.all(aborted.map((session) => this.stopWorker(session)));

    logger.info('Abort complete', { sessionId: id, aborted: aborted.map((s) => s.id) });
    return aborted;
  }

  /**
   * Resume work interrupted by a restart. Running sessions are left to the
   * reconciler, which knows whether their workers survived.
   */
  async recover(): Promise<void> {
    const open = await this.store.list({ state: ['pending', 'retrying', 'awaiting_verification'] });
    for (const session of open) {
      this.react(session);
    }
    logger.info('Recovery scheduled', { sessions: open.length });
  }

  private onSessionChanged(session: Session, previous: Session | null): void {
    if (previous !== null && previous.state === session.state) {
      return;
    }
    this.react(session);
  }

  private react(session: Session): void {
    switch (session.state) {
      case 'pending':
        this.track(this.evaluate(session.id));
        return;
      case 'retrying':
        this.track(this.launch(session.id, null));
        return;
      case 'awaiting_verification':
        this.track(this.verify(session));
        return;
      case 'done':
      case 'aborted':
      case 'skipped':
        this.track(this.onTerminal(session));
        return;
      case 'running':
        return;
    }
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((err: unknown) => {
        logger.error('Supervisor task failed', err);
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }

  private async verify(session: Session): Promise<void> {
    if (this.verifying.has(session.id)) {
      return;
    }
    this.verifying.add(session.id);
    try {
      await this.feedback.verify(session);
    } finally {
      this.verifying.delete(session.id);
    }
  }

  private async onTerminal(session: Session): Promise<void> {
    this.earlyStops.delete(session.id);
    await this.stopWorker(session);

    const dependents = await this.store.list({ state: 'pending', dependsOn: session.id });
    for (const dependent of dependents) {
      await this.evaluate(dependent.id);
    }
  }

  /**
   * @param piped Predecessors whose results the contract carries; null keeps
   * what was recorded at first launch.
   */
  private async launch(id: string, piped: string[] | null): Promise<void> {
    if (this.launching.has(id)) {
      return;
    }
    this.launching.add(id);
    try {
      await this.launchWorker(id, piped);
    } finally {
      this.launching.delete(id);
    }

    const output = this.earlyStops.get(id);
    if (output !== undefined) {
      this.earlyStops.delete(id);
      await this.handleWorkerStopped(id, output);
    }
  }

  private async launchWorker(id: string, piped: string[] | null): Promise<void> {
    let session = await this.store.get(id);
    if (piped !== null && session.state === 'pending') {
      session = await this.store.update(id, (current) =>
        current.state === 'pending' ? { pipedInputs: piped } : null
      );
    }

    const from = session.state;
    if (!isLaunchable(from)) {
      return;
    }

    let contract: string;
    try {
      contract = await this.composer.composeFor(session);
    } catch (err) {
      logger.error('Contract composition failed', { sessionId: id, error: errorMessage(err) });
      await this.transition(id, [from], {
        state: 'aborted',
        outcome: 'launch_failed',
        result: `[aborted: ${errorMessage(err)}]`,
      });
      return;
    }

    const attempts = this.options.launchRetries + 1;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (attempt > 1) {
        await new Promise((resolve) => setTimeout(resolve, this.options.launchRetryDelayMs));
      }

      const current = await this.store.get(id);
      if (current.state !== from) {
        return; // aborted while we were retrying
      }

      try {
        const handle = await this.launcher.launch(current, contract);
        const updated = await this.store.update(id, (latest) =>
          latest.state === from ? { state: 'running', workerHandle: handle, output: null } : null
        );
        if (updated.state !== 'running' || updated.workerHandle !== handle) {
          logger.info('Session changed during launch, stopping its worker', { sessionId: id, state: updated.state });
          await this.launcher.terminate(handle);
        }
        return;
      } catch (err) {
        lastError = err;
        logger.warn(`Worker launch attempt ${attempt}/${attempts} failed`, {
          sessionId: id,
          error: errorMessage(err),
        });
        if (err instanceof SessionError && !err.isRetryable) {
          break;
        }
      }
    }

    await this.transition(id, [from], {
      state: 'aborted',
      outcome: 'launch_failed',
      result: `[aborted: worker could not be launched: ${errorMessage(lastError)}]`,
    });
  }

  private stopWorker(session: Session): Promise<void> {
    const handle = session.workerHandle;
    if (!handle) {
      return Promise.resolve();
    }
    let stopping = this.stopping.get(handle);
    if (!stopping) {
      stopping = this.launcher.terminate(handle).catch((err: unknown) => {
        logger.warn('Failed to terminate worker', { sessionId: session.id, error: errorMessage(err) });
      });
      this.stopping.set(handle, stopping);
    }
    return stopping;
  }

  private async markAborted(id: string, reason: string, outcome: SessionOutcome): Promise<Session | null> {
    let changed = false;
    const session = await this.store.update(
      id,
      (current) => {
        if (isTerminal(current.state)) {
          return null;
        }
        changed = true;
        return { state: 'aborted', outcome, result: `[aborted: ${reason}]` };
      },
      { exclusiveChildren: true }
    );
    return changed ? session : null;
  }

  /** Apply `patch` only while the session is still in one of `from` */
  private async transition(id: string, from: SessionState[], patch: SessionPatch): Promise<Session> {
    return this.store.update(id, (current) => (from.includes(current.state) ? patch : null));
  }
}
