import { AgentRunner } from './claude/agent-runner.js';
import type { SessionctlConfig } from './config/schema.js';
import { ContractComposer } from './contract/composer.js';
import { AgentOutcomeClassifier } from './dependencies/classifier.js';
import { DependencyResolver } from './dependencies/resolver.js';
import { DefaultCheckerFactory } from './orchestrator/checkers.js';
import { FeedbackLoopController } from './orchestrator/feedback-loop.js';
import { QueryService } from './orchestrator/query.js';
import { Reconciler } from './orchestrator/reconciler.js';
import { LifecycleSupervisor } from './orchestrator/supervisor.js';
import { SessionServer } from './server.js';
import { FileSessionPersistence } from './session/persistence.js';
import { SessionStore } from './session/store.js';
import { TmuxWorkerLauncher } from './tmux/launcher.js';
import { logger } from './utils/logger.js';

export interface Runtime {
  config: SessionctlConfig;
  store: SessionStore;
  supervisor: LifecycleSupervisor;
  query: QueryService;
  reconciler: Reconciler;
  server: SessionServer;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Wire the production components: file-backed store, tmux-hosted workers,
 * agent checkers/classifier and the HTTP server.
 */
export function createRuntime(config: SessionctlConfig): Runtime {
  const store = new SessionStore(new FileSessionPersistence(config.stateDir));

  const agentRunner = (timeoutMs: number) =>
    new AgentRunner({ command: config.workerCommand, cwd: config.workDir, timeoutMs, model: config.model });

  const resolver = new DependencyResolver(store, new AgentOutcomeClassifier(agentRunner(config.classifierTimeoutMs)));
  const composer = new ContractComposer(store);
  const launcher = new TmuxWorkerLauncher({
    stateDir: config.stateDir,
    workDir: config.workDir,
    workerCommand: config.workerCommand,
    orchestratorUrl: config.serverUrl,
    model: config.model,
  });
  const checkers = new DefaultCheckerFactory(agentRunner(config.checkerTimeoutMs), {
    cwd: config.workDir,
    timeoutMs: config.checkerTimeoutMs,
  });
  const feedback = new FeedbackLoopController(store, checkers);
  const supervisor = new LifecycleSupervisor(store, resolver, composer, launcher, feedback, {
    defaultMaxIterations: config.defaultMaxIterations,
    launchRetries: config.launchRetries,
    launchRetryDelayMs: config.launchRetryDelayMs,
  });
  const query = new QueryService(store, { recheckMs: config.waitRecheckMs });
  const reconciler = new Reconciler(store, launcher, supervisor);
  const server = new SessionServer({ store, supervisor, query }, config.serverPort, config.serverHost);

  return {
    config,
    store,
    supervisor,
    query,
    reconciler,
    server,

    async start(): Promise<void> {
      await server.start();
      supervisor.start();
      // Dead workers first, so recovery does not wait on them
      const lost = await reconciler.check();
      if (lost.length > 0) {
        logger.warn('Aborted sessions whose workers did not survive the restart', { sessions: lost });
      }
      await supervisor.recover();
      reconciler.start(config.reconcileIntervalMs);
    },

    async stop(): Promise<void> {
      reconciler.stop();
      supervisor.stop();
      await server.stop();
    },
  };
}
