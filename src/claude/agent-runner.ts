/**
 * AgentRunner - one-shot agent invocations via --print mode
 *
 * Used where the core needs the agent's judgement rather than its labour:
 * agent checkers and pass/fail classification of finished sessions.
 * Each run is atomic: spawn, wait for exit, return stdout/stderr/exit code.
 */

import { execa } from 'execa';
import { logger } from '../utils/logger.js';

export interface AgentRunResult {
  success: boolean;
  output: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
  timedOut: boolean;
}

export interface AgentRunnerConfig {
  command: string;
  cwd: string;
  timeoutMs: number;
  model?: string;
}

/** Environment variables that would attribute the run to a session */
const SESSION_ENV_KEYS = ['SESSIONCTL_SESSION_ID', 'SESSIONCTL_PARENT_ID'];

export class AgentRunner {
  constructor(private config: AgentRunnerConfig) {}

  async run(prompt: string, options: { timeoutMs?: number; label?: string } = {}): Promise<AgentRunResult> {
    const startTime = Date.now();
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;

    logger.debug('Agent run starting', {
      label: options.label,
      promptLength: prompt.length,
      timeoutMs,
    });

    const result = await execa(this.config.command, this.buildArgs(prompt), {
      cwd: this.config.cwd,
      timeout: timeoutMs,
      env: this.buildEnv(),
      extendEnv: false,
      reject: false, // Don't throw on non-zero exit
      stdin: 'ignore',
      stripFinalNewline: true,
    });

    const durationMs = Date.now() - startTime;
    const exitCode = result.exitCode ?? -1;

    logger.debug('Agent run finished', {
      label: options.label,
      exitCode,
      durationMs,
      timedOut: result.timedOut,
      stdoutLength: result.stdout.length,
    });

    return {
      success: !result.failed && exitCode === 0,
      output: result.stdout,
      stderr: result.stderr,
      exitCode,
      durationMs,
      timedOut: result.timedOut,
    };
  }

  private buildArgs(prompt: string): string[] {
    const args = ['--print', '--dangerously-skip-permissions'];

    if (this.config.model) {
      args.push('--model', this.config.model);
    }

    args.push(prompt);
    return args;
  }

  /**
   * Copy of the parent environment without session attribution, so hooks
   * fired by this run are not mistaken for a worker's.
   */
  private buildEnv(): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...process.env };
    for (const key of SESSION_ENV_KEYS) {
      delete env[key];
    }
    return env;
  }
}
