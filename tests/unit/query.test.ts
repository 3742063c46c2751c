import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { NotFoundError } from '../../src/errors/index.js';
import { createHarness, signal, type Harness } from '../helpers/fakes.js';

describe('QueryService', () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  describe('poll', () => {
    it('should report the partial signal of a running session', async () => {
      await h.spawn({ task: 'build feature', checker: { kind: 'command', command: 'npm test', maxIterations: 3 } });
      h.checkers.script('0', signal('RETRY', 'two tests fail'));
      await h.complete('0', 'first pass');
      await h.supervisor.recordActivity('0', 'editing parser.ts');

      const result = await h.query.poll('0');

      expect(result).toMatchObject({
        id: '0',
        parentId: null,
        task: 'build feature',
        state: 'running',
        outcome: null,
        activity: 'editing parser.ts',
        signal: { iteration: 1, maxIterations: 3, lastVerdict: 'RETRY', findings: 'two tests fail' },
        openDescendants: 0,
        complete: false,
        result: null,
      });
      expect(result.elapsedMs).toBeGreaterThanOrEqual(0);
    });

    it('should not be complete while descendants are open', async () => {
      await h.spawn({ task: 'parent', noVerify: true });
      await h.spawn({ task: 'child', parentId: '0', noVerify: true });
      await h.complete('0', 'parent output');

      const result = await h.query.poll('0');
      expect(result.state).toBe('done');
      expect(result.openDescendants).toBe(1);
      expect(result.complete).toBe(false);
    });

    it('should throw for unknown sessions', async () => {
      await expect(h.query.poll('9')).rejects.toThrow(NotFoundError);
    });

    it('should look sessions up by alias', async () => {
      await h.spawn({ task: 'index docs', alias: 'indexer', noVerify: true });

      expect(await h.query.poll('indexer')).toMatchObject({ id: '0', alias: 'indexer', task: 'index docs' });
    });
  });

  describe('wait', () => {
    it('should resolve once the session completes', async () => {
      await h.spawn({ task: 'work', noVerify: true });

      const waiting = h.query.wait(['0'], { timeoutMs: 5000 });
      await h.complete('0', 'finished work');

      expect(await waiting).toEqual({
        settled: true,
        sessions: [{ id: '0', state: 'done', outcome: 'accepted', result: 'finished work', complete: true }],
      });
    });

    it('should return at once for completed sessions', async () => {
      await h.spawn({ task: 'a', noVerify: true });
      await h.complete('0', 'a done');

      const result = await h.query.wait(['0']);
      expect(result.settled).toBe(true);
    });

    it('should wait for descendants of a finished parent', async () => {
      await h.spawn({ task: 'parent', noVerify: true });
      await h.spawn({ task: 'child', parentId: '0', noVerify: true });
      await h.complete('0', 'parent output');

      const waiting = h.query.wait(['0'], { timeoutMs: 5000 });
      await h.complete('0.0', 'child output');

      const result = await waiting;
      expect(result.settled).toBe(true);
      expect(result.sessions[0].result).toBe('parent output');
    });

    it('should give up after the timeout', async () => {
      await h.spawn({ task: 'slow', noVerify: true });

      const result = await h.query.wait(['0'], { timeoutMs: 30 });
      expect(result).toEqual({
        settled: false,
        sessions: [{ id: '0', state: 'running', outcome: null, result: null, complete: false }],
      });
    });

    it('should stop when the caller aborts', async () => {
      await h.spawn({ task: 'slow', noVerify: true });
      const controller = new AbortController();

      const waiting = h.query.wait(['0'], { signal: controller.signal });
      controller.abort();

      expect((await waiting).settled).toBe(false);
    });

    it('should reject unknown ids before waiting', async () => {
      await expect(h.query.wait(['4'], { timeoutMs: 10 })).rejects.toThrow(NotFoundError);
    });

    it('should wait on a mix of ids and aliases', async () => {
      await h.spawn({ task: 'first', alias: 'first', noVerify: true });
      await h.spawn({ task: 'second', noVerify: true });
      await h.complete('0', 'one');
      await h.complete('1', 'two');

      const result = await h.query.wait(['first', '1']);
      expect(result.sessions.map((entry) => [entry.id, entry.result])).toEqual([
        ['0', 'one'],
        ['1', 'two'],
      ]);
    });
  });

  describe('trajectory', () => {
    let dir: string;

    beforeEach(async () => {
      dir = join(tmpdir(), `query-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await mkdir(dir, { recursive: true });
    });

    afterEach(async () => {
      try {
        await rm(dir, { recursive: true, force: true });
      } catch {
        // Ignore cleanup errors
      }
    });

    it('should summarize the recorded transcript', async () => {
      const transcript = join(dir, 'worker.jsonl');
      await writeFile(
        transcript,
        [
          JSON.stringify({ type: 'user', message: { content: 'go' } }),
          JSON.stringify({ type: 'assistant', message: { content: [{ type: 'tool_use', name: 'Grep', input: {} }] } }),
        ].join('\n')
      );
      await h.spawn({ task: 'search', alias: 'search', noVerify: true });
      await h.supervisor.recordTranscript('0', transcript);

      const result = await h.query.trajectory('search');

      expect(result.id).toBe('0');
      expect(result.transcriptPath).toBe(transcript);
      expect(result.entries).toHaveLength(2);
      expect(result.summary).toMatchObject({ turnCount: 2, toolSummary: { Grep: 1 } });
    });

    it('should report sessions without a transcript', async () => {
      await h.spawn({ task: 'quiet', noVerify: true });
      await expect(h.query.trajectory('0')).rejects.toThrow('No trajectory recorded for session 0');
    });

    it('should report a transcript that was removed', async () => {
      await h.spawn({ task: 'gone', noVerify: true });
      await h.supervisor.recordTranscript('0', join(dir, 'deleted.jsonl'));

      await expect(h.query.trajectory('0')).rejects.toThrow(NotFoundError);
    });
  });
});
