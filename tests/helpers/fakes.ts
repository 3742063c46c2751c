import { ContractComposer } from '../../src/contract/composer.js';
import type { OutcomeClassifier } from '../../src/dependencies/classifier.js';
import { DependencyResolver } from '../../src/dependencies/resolver.js';
import { WorkerLaunchError } from '../../src/errors/index.js';
import type { Checker, CheckerFactory, CheckerSignal, CheckRequest } from '../../src/orchestrator/checkers.js';
import { FeedbackLoopController } from '../../src/orchestrator/feedback-loop.js';
import { QueryService } from '../../src/orchestrator/query.js';
import { LifecycleSupervisor, type SupervisorOptions } from '../../src/orchestrator/supervisor.js';
import type { WorkerLauncher } from '../../src/orchestrator/worker-launcher.js';
import { InMemorySessionPersistence } from '../../src/session/persistence.js';
import { SessionStore } from '../../src/session/store.js';
import type { OutcomeClass, Session, SessionDraft, Verdict } from '../../src/session/types.js';

export interface LaunchRecord {
  sessionId: string;
  contract: string;
  handle: string;
}

/** Launcher that records contracts instead of starting processes */
export class FakeLauncher implements WorkerLauncher {
  launches: LaunchRecord[] = [];
  terminated: string[] = [];
  alive: Set<string> = new Set();
  /** Number of upcoming launches that fail */
  failNext = 0;
  private counter = 0;
  private parked: Array<() => void> | null = null;

  /** Park upcoming launches until release() */
  hold(): void {
    this.parked = [];
  }

  release(): void {
    const waiting = this.parked ?? [];
    this.parked = null;
    for (const resume of waiting) {
      resume();
    }
  }

  get parkedCount(): number {
    return this.parked?.length ?? 0;
  }

  async launch(session: Session, contract: string): Promise<string> {
    if (this.failNext > 0) {
      this.failNext--;
      throw new WorkerLaunchError(session.id, 'tmux unavailable');
    }
    const parked = this.parked;
    if (parked) {
      await new Promise<void>((resume) => parked.push(resume));
    }
    this.counter++;
    const handle = `worker-${session.id}-${this.counter}`;
    this.launches.push({ sessionId: session.id, contract, handle });
    this.alive.add(handle);
    return handle;
  }

  async terminate(handle: string): Promise<void> {
    this.terminated.push(handle);
    this.alive.delete(handle);
  }

  async isAlive(handle: string): Promise<boolean> {
    return this.alive.has(handle);
  }

  launchesOf(sessionId: string): LaunchRecord[] {
    return this.launches.filter((launch) => launch.sessionId === sessionId);
  }
}

export function signal(verdict: Verdict, findings: string = ''): CheckerSignal {
  return { verdict, findings };
}

/** Checker factory whose verdicts are scripted per session */
export class ScriptedCheckerFactory implements CheckerFactory {
  requests: CheckRequest[] = [];
  private scripts: Map<string, Array<CheckerSignal | Error>> = new Map();

  script(sessionId: string, ...steps: Array<CheckerSignal | Error>): void {
    const queue = this.scripts.get(sessionId) ?? [];
    queue.push(...steps);
    this.scripts.set(sessionId, queue);
  }

  create(): Checker {
    return {
      check: async (request: CheckRequest): Promise<CheckerSignal> => {
        this.requests.push(request);
        const next = this.scripts.get(request.session.id)?.shift();
        if (!next) {
          throw new Error(`no scripted verdict for ${request.session.id}`);
        }
        if (next instanceof Error) {
          throw next;
        }
        return next;
      },
    };
  }
}

export class FakeClassifier implements OutcomeClassifier {
  outcomes: Map<string, OutcomeClass> = new Map();
  calls: string[] = [];

  async classify(session: Session): Promise<OutcomeClass> {
    this.calls.push(session.id);
    const outcome = this.outcomes.get(session.id);
    if (!outcome) {
      throw new Error(`no classification for ${session.id}`);
    }
    return outcome;
  }
}

export function draft(overrides: Partial<SessionDraft> = {}): SessionDraft {
  return {
    parentId: null,
    alias: null,
    task: 'test task',
    dependencies: null,
    checker: null,
    phase: null,
    parentIntent: null,
    fileScope: [],
    ...overrides,
  };
}

/** A fully populated session record for pure-function tests */
export function makeSession(overrides: Partial<Session> & { id: string }): Session {
  const now = '2024-01-01T00:00:00.000Z';
  return {
    parentId: null,
    alias: null,
    task: `task ${overrides.id}`,
    state: 'pending',
    dependencies: null,
    checker: null,
    iterationCount: 0,
    output: null,
    result: null,
    outcome: null,
    pipedInputs: [],
    phase: null,
    parentIntent: null,
    fileScope: [],
    verdicts: [],
    findings: null,
    activity: null,
    workerHandle: null,
    transcriptPath: null,
    createdAt: now,
    updatedAt: now,
    terminatedAt: null,
    ...overrides,
  };
}

/**
 * Supervisor wired to in-memory persistence and scripted collaborators.
 */
export function createHarness(options: Partial<SupervisorOptions> = {}) {
  const store = new SessionStore(new InMemorySessionPersistence());
  const launcher = new FakeLauncher();
  const checkers = new ScriptedCheckerFactory();
  const classifier = new FakeClassifier();
  const resolver = new DependencyResolver(store, classifier);
  const composer = new ContractComposer(store);
  const feedback = new FeedbackLoopController(store, checkers);
  const supervisor = new LifecycleSupervisor(store, resolver, composer, launcher, feedback, {
    defaultMaxIterations: 3,
    launchRetries: 2,
    launchRetryDelayMs: 0,
    ...options,
  });
  const query = new QueryService(store, { recheckMs: 20 });
  supervisor.start();

  return {
    store,
    launcher,
    checkers,
    classifier,
    resolver,
    supervisor,
    query,

    /** Spawn and let evaluation (and launch) finish */
    async spawn(...args: Parameters<LifecycleSupervisor['spawn']>): Promise<Session> {
      const session = await supervisor.spawn(...args);
      await supervisor.settle();
      return store.get(session.id);
    },

    /** Report the worker's completion and let verification run */
    async complete(id: string, output: string): Promise<Session> {
      await supervisor.handleWorkerStopped(id, output);
      await supervisor.settle();
      return store.get(id);
    },
  };
}

export type Harness = ReturnType<typeof createHarness>;
