import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { ApiError, SessionctlClient } from '../../src/cli/client.js';
import { SessionServer } from '../../src/server.js';
import { createHarness, type Harness } from '../helpers/fakes.js';

// Real HTTP on an ephemeral port; the supervisor runs on in-memory fakes

describe('SessionServer', () => {
  let h: Harness;
  let server: SessionServer;
  let baseUrl: string;
  let client: SessionctlClient;

  const postHook = (hook: string, body: unknown, sessionId?: string) =>
    fetch(`${baseUrl}/hooks/${hook}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...(sessionId ? { 'X-Session-Id': sessionId } : {}),
      },
      body: JSON.stringify(body),
    });

  beforeEach(async () => {
    h = createHarness();
    server = new SessionServer({ store: h.store, supervisor: h.supervisor, query: h.query }, 0);
    await server.start();
    baseUrl = `http://127.0.0.1:${server.getPort()}`;
    client = new SessionctlClient(baseUrl);
  });

  afterEach(async () => {
    await server.stop();
    await h.supervisor.settle();
  });

  describe('health check', () => {
    it('should respond with healthy status', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: 'healthy', timestamp: expect.any(String) });
    });
  });

  describe('session API', () => {
    it('should spawn and poll a session', async () => {
      const spawned = await client.spawn({ task: 'summarize', noVerify: true });
      expect(spawned.id).toBe('0');
      expect(spawned.state).toBe('pending');

      await h.supervisor.settle();
      const status = await client.poll('0');
      expect(status.state).toBe('running');
      expect(status.complete).toBe(false);
    });

    it('should reject invalid spawn requests', async () => {
      const response = await fetch(`${baseUrl}/sessions`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ task: '' }),
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: 'Invalid request',
        code: 'VALIDATION_FAILED',
        issues: [expect.objectContaining({ path: ['task'] })],
      });
    });

    it('should map missing sessions to 404', async () => {
      const error = await client.poll('9').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).toMatchObject({ status: 404, code: 'NOT_FOUND', message: 'Session 9 not found' });
    });

    it('should refuse children of aborted sessions with 409', async () => {
      await client.spawn({ task: 'root', noVerify: true });
      await h.supervisor.settle();
      await client.abort('0');

      const error = await client.spawn({ task: 'late', parentId: '0' }).catch((err: unknown) => err);
      expect(error).toMatchObject({ status: 409, code: 'INVALID_TRANSITION' });
    });

    it('should abort a subtree', async () => {
      await client.spawn({ task: 'root', noVerify: true });
      await client.spawn({ task: 'child', parentId: '0', noVerify: true });
      await h.supervisor.settle();

      expect(await client.abort('0', 'no longer needed')).toEqual(['0', '0.0']);
      expect((await h.store.get('0')).result).toBe('[aborted: no longer needed]');
    });

    it('should list sessions by parent and state', async () => {
      await client.spawn({ task: 'a', noVerify: true });
      await client.spawn({ task: 'b', parentId: '0', noVerify: true });
      await h.supervisor.settle();

      expect((await client.list({ parent: 'root' })).map((s) => s.id)).toEqual(['0']);
      expect((await client.list({ state: ['running'] })).map((s) => s.id)).toEqual(['0', '0.0']);
      expect(await client.list({ state: ['done'] })).toEqual([]);
    });

    it('should list the children of an aliased parent', async () => {
      await client.spawn({ task: 'plan', alias: 'planner', noVerify: true });
      await client.spawn({ task: 'step', parentId: 'planner', noVerify: true });

      expect((await client.list({ parent: 'planner' })).map((s) => s.id)).toEqual(['0.0']);
    });

    it('should wait until a worker reports completion', async () => {
      await client.spawn({ task: 'work', noVerify: true });
      await h.supervisor.settle();

      const waiting = client.wait(['0'], 5000);
      const hook = await postHook('stop', { last_assistant_message: 'work complete' }, '0');
      expect(hook.status).toBe(200);

      const result = await waiting;
      expect(result.settled).toBe(true);
      expect(result.sessions).toEqual([
        { id: '0', state: 'done', outcome: 'accepted', result: 'work complete', complete: true },
      ]);
    });

    it('should address sessions by alias', async () => {
      await client.spawn({ task: 'crawl', alias: 'crawler', noVerify: true });
      await h.supervisor.settle();

      expect(await client.poll('crawler')).toMatchObject({ id: '0', alias: 'crawler', state: 'running' });
      expect(await client.abort('crawler')).toEqual(['0']);
    });

    it('should refuse a taken alias with 409', async () => {
      await client.spawn({ task: 'first', alias: 'builder', noVerify: true });

      const error = await client.spawn({ task: 'second', alias: 'builder' }).catch((err: unknown) => err);
      expect(error).toMatchObject({
        status: 409,
        code: 'ALIAS_CONFLICT',
        message: 'Alias builder is already used by session 0',
      });
    });

    it('should report a timed out wait as not settled', async () => {
      await client.spawn({ task: 'slow', noVerify: true });
      await h.supervisor.settle();

      const result = await client.wait(['0'], 50);
      expect(result.settled).toBe(false);
      expect(result.sessions[0].state).toBe('running');
    });
  });

  describe('hook endpoint', () => {
    let dir: string;

    beforeEach(async () => {
      dir = join(tmpdir(), `server-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
      await mkdir(dir, { recursive: true });
    });

    afterEach(async () => {
      try {
        await rm(dir, { recursive: true, force: true });
      } catch {
        // Ignore cleanup errors
      }
    });

    it('should record activity from tool use', async () => {
      await client.spawn({ task: 'edit', noVerify: true });
      await h.supervisor.settle();

      const response = await postHook('activity', { tool_name: 'Read', tool_input: { file_path: '/repo/a.ts' } }, '0');

      expect(await response.json()).toEqual({ status: 'ok', hook: 'activity' });
      expect((await h.store.get('0')).activity).toBe('reading a.ts');
    });

    it('should take the output from the transcript', async () => {
      const transcript = join(dir, 'transcript.jsonl');
      await writeFile(
        transcript,
        JSON.stringify({ type: 'assistant', message: { content: [{ type: 'text', text: 'from transcript' }] } }) + '\n'
      );
      await client.spawn({ task: 'write', noVerify: true });
      await h.supervisor.settle();

      await postHook('stop', { transcript_path: transcript, last_assistant_message: 'fallback' }, '0');
      await h.supervisor.settle();

      expect((await h.store.get('0')).result).toBe('from transcript');
    });

    it('should serve the trajectory of a stopped worker', async () => {
      const transcript = join(dir, 'transcript.jsonl');
      await writeFile(
        transcript,
        [
          JSON.stringify({ type: 'user', timestamp: '2024-05-01T10:00:00.000Z', message: { content: 'write it' } }),
          JSON.stringify({
            type: 'assistant',
            timestamp: '2024-05-01T10:00:30.000Z',
            message: { content: [{ type: 'tool_use', name: 'Write', input: { file_path: 'out.md' } }] },
          }),
        ].join('\n') + '\n'
      );
      await client.spawn({ task: 'write', alias: 'writer', noVerify: true });
      await h.supervisor.settle();

      await postHook('stop', { transcript_path: transcript, last_assistant_message: 'written' }, '0');
      await h.supervisor.settle();

      const trajectory = await client.trajectory('writer');
      expect(trajectory.transcriptPath).toBe(transcript);
      expect(trajectory.summary).toMatchObject({ turnCount: 2, toolCalls: ['Write'], durationSeconds: 30 });
      expect(trajectory.entries).toHaveLength(2);
    });

    it('should map a missing trajectory to 404', async () => {
      await client.spawn({ task: 'idle', noVerify: true });

      const error = await client.trajectory('0').catch((err: unknown) => err);
      expect(error).toMatchObject({ status: 404, message: 'No trajectory recorded for session 0' });
    });

    it('should ignore hooks from runs outside a session', async () => {
      const response = await postHook('stop', {});
      expect(await response.json()).toEqual({ status: 'ignored', hook: 'stop' });
    });

    it('should reject unknown hooks', async () => {
      await client.spawn({ task: 'x', noVerify: true });
      const response = await postHook('pre-compact', {}, '0');
      expect(response.status).toBe(404);
    });
  });
});
