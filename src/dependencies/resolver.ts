/**
 * DependencyResolver - readiness of pending sessions
 *
 * Rules:
 * - all:  every predecessor done (aborted/skipped only tolerated when asked)
 * - any:  first predecessor to finish done wins
 * - gate: N of the named predecessors done, in any order
 * Conditional triggers additionally require the referenced session to be
 * classified pass or fail.
 *
 * Evaluation is pure apart from reading predecessor records and asking the
 * classifier; it is re-run whenever a predecessor becomes terminal.
 */

import { compareSessionIds } from '../session/id.js';
import type { SessionStore } from '../session/store.js';
import { isTerminal, type DependencyRule, type OutcomeClass, type Session } from '../session/types.js';
import { logger } from '../utils/logger.js';
import type { OutcomeClassifier } from './classifier.js';

export type Readiness =
  | { status: 'waiting'; pendingOn: string[] }
  | { status: 'ready'; piped: string[] }
  | { status: 'unsatisfiable'; reason: string };

export type RuleEvaluation =
  | { status: 'waiting'; pendingOn: string[] }
  | { status: 'satisfied'; satisfiedBy: string[] }
  | { status: 'unsatisfiable'; reason: string };

/** Termination order; equal (or missing) timestamps fall back to ascending id */
export function compareByTermination(a: Session, b: Session): number {
  const left = a.terminatedAt ? Date.parse(a.terminatedAt) : Number.POSITIVE_INFINITY;
  const right = b.terminatedAt ? Date.parse(b.terminatedAt) : Number.POSITIVE_INFINITY;
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  return compareSessionIds(a.id, b.id);
}

export function evaluateRule(rule: DependencyRule, predecessors: Session[]): RuleEvaluation {
  const done = predecessors.filter((p) => p.state === 'done').sort(compareByTermination);
  const failed = predecessors.filter((p) => p.state === 'aborted' || p.state === 'skipped');
  const open = predecessors.filter((p) => !isTerminal(p.state)).map((p) => p.id);

  switch (rule.kind) {
    case 'all': {
      if (failed.length > 0 && !rule.tolerateFailures) {
        return { status: 'unsatisfiable', reason: `predecessor ${failed[0].id} ended ${failed[0].state}` };
      }
      if (open.length > 0) {
        return { status: 'waiting', pendingOn: open };
      }
      // Declared order for "all"
      const satisfiedBy = predecessors.filter((p) => p.state === 'done').map((p) => p.id);
      return { status: 'satisfied', satisfiedBy };
    }

    case 'any': {
      if (done.length > 0) {
        return { status: 'satisfied', satisfiedBy: [done[0].id] };
      }
      if (open.length === 0) {
        return { status: 'unsatisfiable', reason: 'no predecessor finished done' };
      }
      return { status: 'waiting', pendingOn: open };
    }

    case 'gate': {
      if (done.length >= rule.required) {
        return { status: 'satisfied', satisfiedBy: done.slice(0, rule.required).map((p) => p.id) };
      }
      if (done.length + open.length < rule.required) {
        return {
          status: 'unsatisfiable',
          reason: `only ${done.length + open.length} of the ${rule.required} required predecessors can still finish done`,
        };
      }
      return { status: 'waiting', pendingOn: open };
    }
  }
}

export class DependencyResolver {
  // Results are immutable once terminal, so one classification per session is enough.
  private classifications: Map<string, Promise<OutcomeClass>> = new Map();

  constructor(
    private store: SessionStore,
    private classifier: OutcomeClassifier
  ) {}

  async evaluate(session: Session): Promise<Readiness> {
    const spec = session.dependencies;
    if (!spec) {
      return { status: 'ready', piped: [] };
    }

    const pendingOn: string[] = [];

    for (const condition of spec.conditions) {
      const target = await this.store.get(condition.sessionId);
      if (!isTerminal(target.state)) {
        pendingOn.push(target.id);
        continue;
      }
      if (target.state !== 'done') {
        return {
          status: 'unsatisfiable',
          reason: `on_${condition.on} ${target.id} can never hold: it ended ${target.state}`,
        };
      }
      const outcome = await this.classify(target);
      if (outcome !== condition.on) {
        return {
          status: 'unsatisfiable',
          reason: `${target.id} was classified ${outcome}, on_${condition.on} required`,
        };
      }
    }

    const predecessors = await Promise.all(spec.after.map((id) => this.store.get(id)));
    const evaluation = evaluateRule(spec.rule, predecessors);

    if (evaluation.status === 'unsatisfiable') {
      return evaluation;
    }
    if (evaluation.status === 'waiting') {
      return { status: 'waiting', pendingOn: [...evaluation.pendingOn, ...pendingOn] };
    }
    if (pendingOn.length > 0) {
      return { status: 'waiting', pendingOn };
    }

    return { status: 'ready', piped: spec.pipe ? evaluation.satisfiedBy : [] };
  }

  private classify(session: Session): Promise<OutcomeClass> {
    const cached = this.classifications.get(session.id);
    if (cached) {
      return cached;
    }

    const pending = this.classifier.classify(session).then(
      (outcome) => {
        logger.info('Session outcome classified', { sessionId: session.id, outcome });
        return outcome;
      },
      (err: unknown) => {
        this.classifications.delete(session.id);
        throw err;
      }
    );
    this.classifications.set(session.id, pending);
    return pending;
  }
}
