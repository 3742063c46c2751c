import express, { NextFunction, Request, Response } from 'express';
import type { Server } from 'http';
import { z, ZodError } from 'zod';
import { inferActivity } from './claude/activity.js';
import { extractFinalResponse } from './claude/transcript.js';
import {
  AliasConflictError,
  ErrorCode,
  InvalidTransitionError,
  MissingDependencyResultError,
  NotFoundError,
  SessionError,
} from './errors/index.js';
import type { QueryService } from './orchestrator/query.js';
import type { LifecycleSupervisor } from './orchestrator/supervisor.js';
import type { SessionStore } from './session/store.js';
import { SessionIdSchema, SessionRefSchema, SessionStateSchema } from './session/types.js';
import { logger } from './utils/logger.js';

export const SESSION_ID_HEADER = 'x-session-id';

const WaitRequestSchema = z.object({
  ids: z.array(SessionRefSchema).min(1),
  timeoutMs: z.number().int().min(0).optional(),
});

const AbortRequestSchema = z.object({
  reason: z.string().min(1).optional(),
});

const ListQuerySchema = z.object({
  state: z
    .union([SessionStateSchema, z.array(SessionStateSchema)])
    .optional(),
  parent: SessionRefSchema.optional(),
});

const StopHookSchema = z
  .object({
    transcript_path: z.string().optional(),
    last_assistant_message: z.string().optional(),
  })
  .passthrough();

const ActivityHookSchema = z
  .object({
    tool_name: z.string().default(''),
    tool_input: z.record(z.unknown()).default({}),
  })
  .passthrough();

export interface SessionServerDeps {
  store: SessionStore;
  supervisor: LifecycleSupervisor;
  query: QueryService;
}

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function statusForError(err: unknown): number {
  if (err instanceof ZodError) return 400;
  if (err instanceof NotFoundError) return 404;
  if (
    err instanceof InvalidTransitionError ||
    err instanceof MissingDependencyResultError ||
    err instanceof AliasConflictError
  ) {
    return 409;
  }
  if (err instanceof SessionError && err.code === ErrorCode.CONFIG_INVALID) return 400;
  return 500;
}

/**
 * HTTP surface of the orchestrator: the session API used by the CLI and by
 * workers spawning children, plus the endpoints agent hooks post to.
 */
export class SessionServer {
  private app: express.Application;
  private server: Server | null = null;

  constructor(
    private deps: SessionServerDeps,
    private port: number = 3000,
    private host: string = '127.0.0.1'
  ) {
    this.app = express();
    this.app.use(express.json({ limit: '10mb' }));
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    const { supervisor, query, store } = this.deps;

    this.app.post(
      '/sessions',
      route(async (req, res) => {
        const session = await supervisor.spawn(req.body);
        res.status(201).json(session);
      })
    );

    this.app.get(
      '/sessions',
      route(async (req, res) => {
        const filter = ListQuerySchema.parse(req.query);
        let parentId: string | null | undefined;
        if (filter.parent !== undefined) {
          parentId = filter.parent === 'root' ? null : await store.resolve(filter.parent);
        }
        const sessions = await store.list({ state: filter.state, parentId });
        res.json(sessions);
      })
    );

    // Registered before /sessions/:ref so "wait" is never read as an id
    this.app.post(
      '/sessions/wait',
      route(async (req, res) => {
        const body = WaitRequestSchema.parse(req.body);
        const controller = new AbortController();
        // A caller that hangs up stops waiting; the sessions keep running
        res.on('close', () => {
          if (!res.writableEnded) {
            controller.abort();
          }
        });
        const result = await query.wait(body.ids, { timeoutMs: body.timeoutMs, signal: controller.signal });
        if (!controller.signal.aborted) {
          res.json(result);
        }
      })
    );

    // :ref is a session id or alias
    this.app.get(
      '/sessions/:ref',
      route(async (req, res) => {
        const ref = SessionRefSchema.parse(req.params.ref);
        res.json(await query.poll(ref));
      })
    );

    this.app.get(
      '/sessions/:ref/trajectory',
      route(async (req, res) => {
        const ref = SessionRefSchema.parse(req.params.ref);
        res.json(await query.trajectory(ref));
      })
    );

    this.app.post(
      '/sessions/:ref/abort',
      route(async (req, res) => {
        const ref = SessionRefSchema.parse(req.params.ref);
        const body = AbortRequestSchema.parse(req.body ?? {});
        const aborted = await supervisor.abort(ref, { reason: body.reason });
        res.json({ aborted: aborted.map((s) => s.id) });
      })
    );

    this.app.post(
      '/hooks/:hookName',
      route(async (req, res) => {
        const hookName = req.params.hookName;
        const sessionId = req.get(SESSION_ID_HEADER);

        if (!sessionId) {
          // Agent runs outside any session (checkers, classifiers) report nothing
          res.json({ status: 'ignored', hook: hookName });
          return;
        }
        const id = SessionIdSchema.parse(sessionId);

        logger.info(`Received hook: ${hookName}`, { sessionId: id });

        switch (hookName) {
          case 'stop': {
            const payload = StopHookSchema.parse(req.body ?? {});
            if (payload.transcript_path) {
              await supervisor.recordTranscript(id, payload.transcript_path);
            }
            const fromTranscript = payload.transcript_path ? await extractFinalResponse(payload.transcript_path) : null;
            const output = fromTranscript ?? payload.last_assistant_message ?? '';
            await supervisor.handleWorkerStopped(id, output);
            break;
          }
          case 'activity': {
            const payload = ActivityHookSchema.parse(req.body ?? {});
            if (payload.tool_name) {
              await supervisor.recordActivity(id, inferActivity(payload.tool_name, payload.tool_input));
            }
            break;
          }
          default:
            res.status(404).json({ error: `Unknown hook: ${hookName}` });
            return;
        }

        res.json({ status: 'ok', hook: hookName });
      })
    );

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'healthy', timestamp: new Date().toISOString() });
    });
  }

  private setupErrorHandling(): void {
    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const status = statusForError(err);
      if (status >= 500) {
        logger.error('Server error', { path: req.path, error: err });
      } else {
        logger.debug('Request rejected', { path: req.path, status });
      }

      if (err instanceof ZodError) {
        res.status(status).json({ error: 'Invalid request', code: 'VALIDATION_FAILED', issues: err.issues });
        return;
      }
      if (err instanceof SessionError) {
        res.status(status).json({ error: err.message, code: err.code, context: err.context });
        return;
      }
      res.status(status).json({ error: 'Internal server error' });
    });
  }

  /**
   * Start the server.
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host, () => {
        server.off('error', reject);
        const address = server.address();
        if (address && typeof address === 'object') {
          this.port = address.port;
        }
        logger.info(`Session server listening on ${this.host}:${this.port}`);
        resolve();
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  /**
   * Stop the server.
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.server;
      if (!server) {
        resolve();
        return;
      }
      server.close((err) => {
        if (err) {
          logger.warn('Error stopping session server', err);
        }
        this.server = null;
        logger.info('Session server stopped');
        resolve();
      });
      server.closeAllConnections();
    });
  }

  /**
   * Port the server listens on (the bound port once started with 0).
   */
  getPort(): number {
    return this.port;
  }
}
