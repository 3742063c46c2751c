import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { execa } from 'execa';
import { AgentRunner } from '../../src/claude/agent-runner.js';
import {
  AgentOutcomeClassifier,
  buildClassificationPrompt,
  parseClassification,
} from '../../src/dependencies/classifier.js';
import { makeSession } from '../helpers/fakes.js';

vi.mock('execa', () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

describe('parseClassification', () => {
  it('should read the last PASS or FAIL token', () => {
    expect(parseClassification('The build is green.\nPASS')).toBe('pass');
    expect(parseClassification('It would pass locally, but\n**FAIL**\n')).toBe('fail');
    expect(parseClassification('fail')).toBe('fail');
  });

  it('should return null without an answer', () => {
    expect(parseClassification('Unclear.')).toBeNull();
    expect(parseClassification('bypassed')).toBeNull();
  });
});

describe('buildClassificationPrompt', () => {
  it('should include the task and the result', () => {
    const prompt = buildClassificationPrompt('Run the migration', 'migrated 3 tables');
    expect(prompt).toContain('# Task\nRun the migration');
    expect(prompt).toContain('# Result\nmigrated 3 tables');
  });

  it('should clip long results', () => {
    const prompt = buildClassificationPrompt('t', 'x'.repeat(4100));
    expect(prompt).toContain(`# Result\n${'x'.repeat(4000)}\n[truncated]\n`);
  });
});

describe('AgentOutcomeClassifier', () => {
  const runner = new AgentRunner({ command: 'claude', cwd: '/work', timeoutMs: 5000, model: 'haiku' });
  const classifier = new AgentOutcomeClassifier(runner);
  const session = makeSession({ id: '1', state: 'done', task: 'Run tests', result: '2 tests failed' });
  const savedSessionId = process.env.SESSIONCTL_SESSION_ID;

  beforeEach(() => {
    execaMock.mockReset();
    process.env.SESSIONCTL_SESSION_ID = '0.4';
  });

  afterEach(() => {
    if (savedSessionId === undefined) {
      delete process.env.SESSIONCTL_SESSION_ID;
    } else {
      process.env.SESSIONCTL_SESSION_ID = savedSessionId;
    }
  });

  it('should ask the agent in print mode without session attribution', async () => {
    execaMock.mockResolvedValue({ stdout: 'FAIL', stderr: '', exitCode: 0, failed: false, timedOut: false } as never);

    expect(await classifier.classify(session)).toBe('fail');
    expect(execaMock).toHaveBeenCalledWith(
      'claude',
      ['--print', '--dangerously-skip-permissions', '--model', 'haiku', expect.stringContaining('# Result\n2 tests failed')],
      expect.objectContaining({
        cwd: '/work',
        timeout: 5000,
        extendEnv: false,
        env: expect.not.objectContaining({ SESSIONCTL_SESSION_ID: expect.anything() }),
      })
    );
  });

  it('should throw when the agent run fails', async () => {
    execaMock.mockResolvedValue({
      stdout: '',
      stderr: 'rate limited',
      exitCode: 1,
      failed: true,
      timedOut: false,
    } as never);

    await expect(classifier.classify(session)).rejects.toThrow('Classifier exited with code 1: rate limited');
  });

  it('should throw when the answer is missing', async () => {
    execaMock.mockResolvedValue({ stdout: 'Hard to say.', stderr: '', exitCode: 0, failed: false, timedOut: false } as never);

    await expect(classifier.classify(session)).rejects.toThrow('Classifier gave no PASS/FAIL answer for session 1');
  });
});
