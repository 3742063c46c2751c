import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execa } from 'execa';
import { AgentRunner } from '../../src/claude/agent-runner.js';
import { VerificationError } from '../../src/errors/index.js';
import {
  AgentChecker,
  CommandChecker,
  DefaultCheckerFactory,
  parseVerdict,
  tailLines,
} from '../../src/orchestrator/checkers.js';
import { makeSession } from '../helpers/fakes.js';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

describe('parseVerdict', () => {
  it('should read a decorated verdict on the last line', () => {
    expect(parseVerdict('Looks good overall.\n\n**ACCEPT**')).toEqual({
      verdict: 'ACCEPT',
      findings: 'Looks good overall.',
    });
  });

  it('should take the last verdict line and keep the rest as findings', () => {
    expect(parseVerdict('RETRY\nAdd tests for the empty input case')).toEqual({
      verdict: 'RETRY',
      findings: 'Add tests for the empty input case',
    });
    expect(parseVerdict('ACCEPT\nOn reflection, no.\nTERMINATE.')).toEqual({
      verdict: 'TERMINATE',
      findings: 'ACCEPT\nOn reflection, no.',
    });
  });

  it('should ignore verdict words inside prose', () => {
    expect(parseVerdict('I would ACCEPT this')).toBeNull();
    expect(parseVerdict('')).toBeNull();
  });
});

describe('tailLines', () => {
  it('should keep the last lines without the trailing newline', () => {
    expect(tailLines('a\nb\nc\n', 2)).toBe('b\nc');
    expect(tailLines('only', 5)).toBe('only');
  });
});

describe('CommandChecker', () => {
  const session = makeSession({ id: '0', state: 'awaiting_verification' });
  const request = { session, output: 'done', iteration: 1 };
  let checker: CommandChecker;

  beforeEach(() => {
    execaMock.mockReset();
    checker = new CommandChecker('npm test', { cwd: '/work', timeoutMs: 1000 });
  });

  it('should accept on exit code 0', async () => {
    execaMock.mockResolvedValue({ exitCode: 0, timedOut: false, all: 'ok', stderr: '' } as never);

    expect(await checker.check(request)).toEqual({ verdict: 'ACCEPT', findings: '' });
    expect(execaMock).toHaveBeenCalledWith(
      'npm test',
      expect.objectContaining({ shell: true, cwd: '/work', timeout: 1000, reject: false, all: true })
    );
  });

  it('should ask for a retry with the tail of the output', async () => {
    execaMock.mockResolvedValue({
      exitCode: 1,
      timedOut: false,
      all: 'FAIL src/a.test.ts\nexpected 1 to be 2\n',
      stderr: '',
    } as never);

    expect(await checker.check(request)).toEqual({
      verdict: 'RETRY',
      findings: '`npm test` exited with code 1:\n\nFAIL src/a.test.ts\nexpected 1 to be 2',
    });
  });

  it('should raise a verification error on timeout', async () => {
    execaMock.mockResolvedValue({ exitCode: undefined, timedOut: true, all: '', stderr: '' } as never);

    await expect(checker.check(request)).rejects.toThrow(
      'Verification of 0 could not run: checker command timed out after 1000ms'
    );
  });

  it('should raise a verification error when the command never ran', async () => {
    execaMock.mockResolvedValue({ exitCode: undefined, timedOut: false, all: '', stderr: 'spawn sh ENOENT' } as never);

    await expect(checker.check(request)).rejects.toThrow(VerificationError);
    await expect(checker.check(request)).rejects.toThrow('spawn sh ENOENT');
  });
});

describe('AgentChecker', () => {
  const runner = new AgentRunner({ command: 'claude', cwd: '/work', timeoutMs: 5000 });
  const session = makeSession({
    id: '0.2',
    state: 'awaiting_verification',
    verdicts: [{ iteration: 1, verdict: 'RETRY', findings: 'no tests', at: '2024-01-01T00:00:00.000Z' }],
  });

  beforeEach(() => {
    execaMock.mockReset();
  });

  it('should send the checker contract and parse the verdict', async () => {
    execaMock.mockResolvedValue({
      stdout: 'Error handling is missing\nRETRY',
      stderr: '',
      exitCode: 0,
      failed: false,
      timedOut: false,
    } as never);

    const checker = new AgentChecker('Must handle errors', runner, 2000);
    const signal = await checker.check({ session, output: 'patched', iteration: 2 });

    expect(signal).toEqual({ verdict: 'RETRY', findings: 'Error handling is missing' });
    expect(execaMock).toHaveBeenCalledWith(
      'claude',
      [
        '--print',
        '--dangerously-skip-permissions',
        expect.stringContaining('# Checker Criteria\n\nMust handle errors'),
      ],
      expect.objectContaining({ timeout: 2000, cwd: '/work' })
    );
    expect(execaMock).toHaveBeenCalledWith(
      'claude',
      expect.arrayContaining([expect.stringContaining('- Iteration 1: **RETRY** - no tests')]),
      expect.anything()
    );
  });

  it('should fail verification when the agent exits non-zero', async () => {
    execaMock.mockResolvedValue({
      stdout: '',
      stderr: 'not logged in',
      exitCode: 1,
      failed: true,
      timedOut: false,
    } as never);

    const checker = new AgentChecker('criteria', runner);
    await expect(checker.check({ session, output: 'x', iteration: 2 })).rejects.toThrow(
      'Verification of 0.2 could not run: checker agent exited with code 1: not logged in'
    );
  });

  it('should fail verification when no verdict is given', async () => {
    execaMock.mockResolvedValue({
      stdout: 'It depends.',
      stderr: '',
      exitCode: 0,
      failed: false,
      timedOut: false,
    } as never);

    const checker = new AgentChecker('criteria', runner);
    await expect(checker.check({ session, output: 'x', iteration: 2 })).rejects.toThrow('checker agent gave no verdict');
  });
});

describe('DefaultCheckerFactory', () => {
  it('should build the checker named by the spec', () => {
    const factory = new DefaultCheckerFactory(new AgentRunner({ command: 'claude', cwd: '/', timeoutMs: 1 }), {
      cwd: '/',
      timeoutMs: 1,
    });
    expect(factory.create({ kind: 'command', command: 'make check', maxIterations: 1 })).toBeInstanceOf(CommandChecker);
    expect(factory.create({ kind: 'agent', prompt: 'review', maxIterations: 1 })).toBeInstanceOf(AgentChecker);
  });
});
