/**
 * FeedbackLoopController - applies a checker's verdict to a finished iteration
 *
 * The checker's verdict is final. The only judgement made here is the
 * iteration bound: a RETRY on the last allowed iteration ends the session as
 * done but flagged as not converged.
 */

import { VerificationError, errorMessage } from '../errors/index.js';
import type { SessionStore } from '../session/store.js';
import type { CheckerSpec, Session, SessionOutcome } from '../session/types.js';
import { logger } from '../utils/logger.js';
import type { CheckerFactory, CheckerSignal } from './checkers.js';

export type FeedbackDecision =
  | { state: 'done'; outcome: SessionOutcome; result: string }
  | { state: 'retrying'; findings: string };

export function maxIterationsNote(iteration: number): string {
  return `[did not converge: max iterations (${iteration}) reached]`;
}

export function terminatedNote(iteration: number): string {
  return `[did not converge: terminated by checker at iteration ${iteration}]`;
}

function annotate(output: string, note: string): string {
  return output ? `${output}\n\n${note}` : note;
}

/**
 * Pure decision for iteration `iteration` (1-based) of a session bounded by
 * `maxIterations`.
 */
export function decide(
  signal: CheckerSignal,
  iteration: number,
  maxIterations: number,
  output: string
): FeedbackDecision {
  switch (signal.verdict) {
    case 'ACCEPT':
      return { state: 'done', outcome: 'accepted', result: output };
    case 'TERMINATE':
      return { state: 'done', outcome: 'terminated', result: annotate(output, terminatedNote(iteration)) };
    case 'RETRY':
      if (iteration < maxIterations) {
        return { state: 'retrying', findings: signal.findings };
      }
      return {
        state: 'done',
        outcome: 'max_iterations_reached',
        result: annotate(output, maxIterationsNote(iteration)),
      };
  }
}

export class FeedbackLoopController {
  constructor(
    private store: SessionStore,
    private checkers: CheckerFactory
  ) {}

  /**
   * Verify the latest output of a session awaiting verification and record
   * the decision. Returns the updated session; if the session left
   * awaiting_verification meanwhile (an abort), it is returned unchanged.
   */
  async verify(session: Session): Promise<Session> {
    const iteration = session.iterationCount + 1;
    const output = session.output ?? '';

    if (!session.checker) {
      logger.info('Session exempt from verification, accepting', { sessionId: session.id });
      return this.store.update(session.id, (current) =>
        isSameIteration(current, session)
          ? { state: 'done', outcome: 'accepted', result: output, iterationCount: iteration }
          : null
      );
    }

    const signal = await this.runChecker(session.checker, session, output, iteration);
    const decision = decide(signal, iteration, session.checker.maxIterations, output);

    logger.info('Checker verdict', {
      sessionId: session.id,
      iteration,
      maxIterations: session.checker.maxIterations,
      verdict: signal.verdict,
      next: decision.state,
    });

    const record = {
      iteration,
      verdict: signal.verdict,
      findings: signal.findings,
      at: new Date().toISOString(),
    };

    return this.store.update(session.id, (current) => {
      if (!isSameIteration(current, session)) {
        return null;
      }
      const verdicts = [...current.verdicts, record];
      if (decision.state === 'retrying') {
        return { state: 'retrying', iterationCount: iteration, findings: decision.findings, verdicts };
      }
      return {
        state: 'done',
        outcome: decision.outcome,
        result: decision.result,
        iterationCount: iteration,
        verdicts,
      };
    });
  }

  /** A checker that cannot run counts as RETRY, never as ACCEPT */
  private async runChecker(
    spec: CheckerSpec,
    session: Session,
    output: string,
    iteration: number
  ): Promise<CheckerSignal> {
    try {
      return await this.checkers.create(spec).check({ session, output, iteration });
    } catch (err) {
      const failure =
        err instanceof VerificationError ? err : new VerificationError(session.id, errorMessage(err), err);
      logger.warn('Verification failed, treating as RETRY', { sessionId: session.id, iteration, error: failure.message });
      return { verdict: 'RETRY', findings: `Verification could not complete: ${failure.message}` };
    }
  }
}

function isSameIteration(current: Session, seen: Session): boolean {
  return current.state === 'awaiting_verification' && current.iterationCount === seen.iterationCount;
}
