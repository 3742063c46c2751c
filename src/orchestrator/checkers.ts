/**
 * Checkers - the verifying half of the doer/checker protocol
 *
 * A checker turns a doer's output into one verdict. It never changes session
 * state; the feedback loop applies the decision.
 */

import { execa } from 'execa';
import type { AgentRunner } from '../claude/agent-runner.js';
import { composeCheckerContract } from '../contract/composer.js';
import { VerificationError } from '../errors/index.js';
import type { CheckerSpec, Session, Verdict } from '../session/types.js';
import { logger } from '../utils/logger.js';

export interface CheckerSignal {
  verdict: Verdict;
  findings: string;
}

export interface CheckRequest {
  session: Session;
  output: string;
  /** Iteration being verified, 1-based */
  iteration: number;
}

export interface Checker {
  check(request: CheckRequest): Promise<CheckerSignal>;
}

/** Lines of command output carried back to the doer as findings */
const FINDINGS_TAIL_LINES = 50;

export function tailLines(text: string, count: number): string {
  const lines = text.trimEnd().split('\n');
  return lines.slice(-count).join('\n');
}

/**
 * Runs a shell command (lint, tests, type-check) in the working directory.
 * Exit 0 accepts; anything else asks for another iteration.
 */
export class CommandChecker implements Checker {
  constructor(
    private command: string,
    private options: { cwd: string; timeoutMs: number }
  ) {}

  async check(request: CheckRequest): Promise<CheckerSignal> {
    const { session } = request;
    logger.info('Running command checker', { sessionId: session.id, command: this.command });

    const result = await execa(this.command, {
      shell: true,
      cwd: this.options.cwd,
      timeout: this.options.timeoutMs,
      reject: false,
      all: true,
      stdin: 'ignore',
    });

    if (result.timedOut) {
      throw new VerificationError(session.id, `checker command timed out after ${this.options.timeoutMs}ms`);
    }
    if (result.exitCode === undefined) {
      throw new VerificationError(session.id, result.stderr || 'checker command could not be started');
    }

    if (result.exitCode === 0) {
      return { verdict: 'ACCEPT', findings: '' };
    }

    const tail = tailLines(result.all, FINDINGS_TAIL_LINES);
    return {
      verdict: 'RETRY',
      findings: `\`${this.command}\` exited with code ${result.exitCode}:\n\n${tail}`,
    };
  }
}

const VERDICT_LINE = /^[\s*`#>-]*(ACCEPT|RETRY|TERMINATE)[\s*`.!]*$/;

/**
 * Verdict of an agent checker: the last line consisting of a verdict word.
 * Everything else in the response is the findings.
 */
export function parseVerdict(response: string): CheckerSignal | null {
  const lines = response.trimEnd().split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    const match = lines[i].match(VERDICT_LINE);
    if (!match) continue;

    const verdict = toVerdict(match[1]);
    const findings = [...lines.slice(0, i), ...lines.slice(i + 1)].join('\n').trim();
    return { verdict, findings };
  }
  return null;
}

function toVerdict(word: string): Verdict {
  switch (word) {
    case 'ACCEPT':
      return 'ACCEPT';
    case 'TERMINATE':
      return 'TERMINATE';
    default:
      return 'RETRY';
  }
}

/** A second agent invocation that reviews the doer's output */
export class AgentChecker implements Checker {
  constructor(
    private criteria: string,
    private runner: AgentRunner,
    private timeoutMs?: number
  ) {}

  async check(request: CheckRequest): Promise<CheckerSignal> {
    const { session, output, iteration } = request;
    const prompt = composeCheckerContract(this.criteria, output, iteration, session.verdicts);

    const run = await this.runner.run(prompt, {
      timeoutMs: this.timeoutMs,
      label: `check ${session.id}#${iteration}`,
    });

    if (!run.success) {
      const reason = run.timedOut ? 'checker agent timed out' : `checker agent exited with code ${run.exitCode}`;
      throw new VerificationError(session.id, run.stderr ? `${reason}: ${run.stderr}` : reason);
    }

    const signal = parseVerdict(run.output);
    if (!signal) {
      throw new VerificationError(session.id, 'checker agent gave no verdict');
    }
    return signal;
  }
}

export interface CheckerFactory {
  create(spec: CheckerSpec): Checker;
}

export class DefaultCheckerFactory implements CheckerFactory {
  constructor(
    private runner: AgentRunner,
    private options: { cwd: string; timeoutMs: number }
  ) {}

  create(spec: CheckerSpec): Checker {
    switch (spec.kind) {
      case 'command':
        return new CommandChecker(spec.command, this.options);
      case 'agent':
        return new AgentChecker(spec.prompt, this.runner, this.options.timeoutMs);
    }
  }
}
