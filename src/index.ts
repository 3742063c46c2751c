export * from './errors/index.js';
export * from './session/types.js';
export * from './session/id.js';
export { ALLOWED_TRANSITIONS, canTransition, assertTransition } from './session/transitions.js';
export { SessionStore, type SessionListener, type SessionMutation, type UpdateOptions } from './session/store.js';
export {
  FileSessionPersistence,
  InMemorySessionPersistence,
  type SessionPersistence,
} from './session/persistence.js';
export {
  ContractComposer,
  composeCheckerContract,
  composeContract,
  type ContractInput,
  type PipedResult,
} from './contract/composer.js';
export { AgentOutcomeClassifier, type OutcomeClassifier } from './dependencies/classifier.js';
export { DependencyResolver, evaluateRule, type Readiness, type RuleEvaluation } from './dependencies/resolver.js';
export {
  AgentChecker,
  CommandChecker,
  DefaultCheckerFactory,
  parseVerdict,
  type Checker,
  type CheckerFactory,
  type CheckerSignal,
} from './orchestrator/checkers.js';
export { FeedbackLoopController, decide, type FeedbackDecision } from './orchestrator/feedback-loop.js';
export {
  LifecycleSupervisor,
  SpawnRequestSchema,
  type AbortOptions,
  type SpawnRequest,
  type SupervisorOptions,
} from './orchestrator/supervisor.js';
export { QueryService, type PollResult, type WaitOptions, type WaitResult } from './orchestrator/query.js';
export { Reconciler } from './orchestrator/reconciler.js';
export type { WorkerLauncher } from './orchestrator/worker-launcher.js';
export { TmuxWorkerLauncher } from './tmux/launcher.js';
export { AgentRunner } from './claude/agent-runner.js';
export { SessionServer } from './server.js';
export { ConfigLoader } from './config/loader.js';
export type { SessionctlConfig } from './config/schema.js';
export { createRuntime, type Runtime } from './runtime.js';
export { logger, configureLogDirectory } from './utils/logger.js';
