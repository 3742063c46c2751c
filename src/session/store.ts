/**
 * SessionStore - single source of truth for session records
 *
 * - Hierarchical id allocation, atomic per parent
 * - Per-session serialized updates (no global lock)
 * - Transition, write-once result and iteration-bound checks on every update
 * - Change notifications for waiters
 */

import { AliasConflictError, InvalidTransitionError, NotFoundError } from '../errors/index.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { logger } from '../utils/logger.js';
import { childId, childIndex, compareDeepestFirst, compareSessionIds, isDescendantOf } from './id.js';
import type { SessionPersistence } from './persistence.js';
import { assertTransition } from './transitions.js';
import {
  SessionIdSchema,
  dependencyIds,
  isTerminal,
  type Session,
  type SessionDraft,
  type SessionFilter,
  type SessionPatch,
  type SessionState,
} from './types.js';

/** Fields that may still change once a session is terminal */
const AUDIT_FIELDS: ReadonlySet<string> = new Set(['activity', 'transcriptPath']);

const ALIAS_KEY = 'aliases';

export type SessionListener = (session: Session, previous: Session | null) => void;

/** Returns the change to apply, or null to leave the session untouched */
export type SessionMutation = (current: Session) => SessionPatch | null;

export interface UpdateOptions {
  /**
   * Also hold the child-allocation lock of this session, so no child can be
   * created while the mutation runs.
   */
  exclusiveChildren?: boolean;
}

export class SessionStore {
  private locks = new KeyedMutex();
  private listeners: Set<SessionListener> = new Set();

  constructor(private persistence: SessionPersistence) {}

  /**
   * Create a pending session under `draft.parentId` with the next free id.
   */
  async create(draft: SessionDraft): Promise<Session> {
    const alias = draft.alias;
    if (alias === null) {
      return this.allocate(draft);
    }
    // Aliases are unique across the whole store
    return this.locks.runExclusive(ALIAS_KEY, async () => {
      const [owner] = await this.list({ alias });
      if (owner) {
        throw new AliasConflictError(alias, owner.id);
      }
      return this.allocate(draft);
    });
  }

  private async allocate(draft: SessionDraft): Promise<Session> {
    return this.locks.runExclusive(childrenKey(draft.parentId), async () => {
      if (draft.parentId !== null) {
        const parent = await this.get(draft.parentId);
        if (parent.state === 'aborted') {
          throw new InvalidTransitionError(parent.id, parent.state, null, 'cannot spawn under an aborted session');
        }
      }

      for (const predecessorId of dependencyIds(draft.dependencies)) {
        await this.get(predecessorId);
      }

      // File names, not parsed records: an unreadable record still holds its id
      const existing = await this.persistence.listIds();
      let lastIndex = -1;
      for (const existingId of existing) {
        const index = childIndex(existingId, draft.parentId);
        if (index !== null && index > lastIndex) {
          lastIndex = index;
        }
      }

      const id = childId(draft.parentId, lastIndex + 1);
      const now = new Date().toISOString();
      const session: Session = {
        id,
        parentId: draft.parentId,
        alias: draft.alias,
        task: draft.task,
        state: 'pending',
        dependencies: draft.dependencies,
        checker: draft.checker,
        iterationCount: 0,
        output: null,
        result: null,
        outcome: null,
        pipedInputs: [],
        phase: draft.phase,
        parentIntent: draft.parentIntent,
        fileScope: draft.fileScope,
        verdicts: [],
        findings: null,
        activity: null,
        workerHandle: null,
        transcriptPath: null,
        createdAt: now,
        updatedAt: now,
        terminatedAt: null,
      };

      await this.persistence.write(session);
      logger.info('Session created', {
        sessionId: id,
        alias: draft.alias,
        parentId: draft.parentId,
        dependsOn: dependencyIds(draft.dependencies),
      });
      this.emit(session, null);
      return session;
    });
  }

  async get(id: string): Promise<Session> {
    const session = await this.persistence.read(id);
    if (!session) {
      throw new NotFoundError(id);
    }
    return session;
  }

  async find(id: string): Promise<Session | null> {
    return this.persistence.read(id);
  }

  /**
   * Id of the session named by `ref`, which is either an id or an alias.
   */
  async resolve(ref: string): Promise<string> {
    if (SessionIdSchema.safeParse(ref).success) {
      return (await this.get(ref)).id;
    }
    const [session] = await this.list({ alias: ref });
    if (!session) {
      throw new NotFoundError(ref);
    }
    return session.id;
  }

  /**
   * Apply a mutation atomically. The mutation sees the current record inside
   * the session's lock; the resulting change is validated before it is
   * written.
   */
  async update(id: string, mutate: SessionMutation, options: UpdateOptions = {}): Promise<Session> {
    const apply = () => this.locks.runExclusive(sessionKey(id), () => this.applyMutation(id, mutate));
    if (options.exclusiveChildren) {
      return this.locks.runExclusive(childrenKey(id), apply);
    }
    return apply();
  }

  async list(filter: SessionFilter = {}): Promise<Session[]> {
    const sessions = await this.persistence.list();
    const states: SessionState[] | null =
      filter.state === undefined ? null : Array.isArray(filter.state) ? filter.state : [filter.state];

    return sessions
      .filter((s) => states === null || states.includes(s.state))
      .filter((s) => filter.parentId === undefined || s.parentId === filter.parentId)
      .filter((s) => filter.ancestorId === undefined || isDescendantOf(s.id, filter.ancestorId))
      .filter((s) => filter.dependsOn === undefined || dependencyIds(s.dependencies).includes(filter.dependsOn))
      .filter((s) => filter.alias === undefined || s.alias === filter.alias)
      .sort((a, b) => compareSessionIds(a.id, b.id));
  }

  /** Descendants of `id`, deepest first */
  async descendants(id: string): Promise<Session[]> {
    const sessions = await this.list({ ancestorId: id });
    return sessions.sort((a, b) => compareDeepestFirst(a.id, b.id));
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async applyMutation(id: string, mutate: SessionMutation): Promise<Session> {
    const current = await this.get(id);
    const patch = mutate(current);
    if (!patch) {
      return current;
    }

    this.validate(current, patch);

    const now = new Date().toISOString();
    const next: Session = { ...current, ...patch, updatedAt: now };
    if (next.state !== current.state && isTerminal(next.state) && next.terminatedAt === null) {
      next.terminatedAt = now;
    }

    await this.persistence.write(next);
    if (next.state !== current.state) {
      logger.debug(`Session ${id}: ${current.state} -> ${next.state}`);
    }
    this.emit(next, current);
    return next;
  }

  private validate(current: Session, patch: SessionPatch): void {
    if (isTerminal(current.state)) {
      for (const [key, value] of Object.entries(patch)) {
        if (!isSessionField(current, key)) continue;
        if (!AUDIT_FIELDS.has(key) && !sameValue(value, current[key])) {
          throw new InvalidTransitionError(current.id, current.state, patch.state ?? null, `${key} is immutable once terminal`);
        }
      }
      return;
    }

    const nextState = patch.state ?? current.state;
    if (nextState !== current.state) {
      assertTransition(current.id, current.state, nextState);
    }

    if (patch.result !== undefined && patch.result !== null) {
      if (current.result !== null && current.result !== patch.result) {
        throw new InvalidTransitionError(current.id, current.state, nextState, 'result is write-once');
      }
      if (!isTerminal(nextState)) {
        throw new InvalidTransitionError(current.id, current.state, nextState, 'result is only recorded on a terminal state');
      }
    }

    const checker = patch.checker !== undefined ? patch.checker : current.checker;
    const iterations = patch.iterationCount ?? current.iterationCount;
    if (checker && iterations > checker.maxIterations) {
      throw new InvalidTransitionError(
        current.id,
        current.state,
        nextState,
        `iteration ${iterations} exceeds the bound of ${checker.maxIterations}`
      );
    }
  }

  private emit(session: Session, previous: Session | null): void {
    for (const listener of this.listeners) {
      try {
        listener(session, previous);
      } catch (err) {
        logger.error('Session listener failed', err);
      }
    }
  }
}

function sessionKey(id: string): string {
  return `session:${id}`;
}

function childrenKey(parentId: string | null): string {
  return `children:${parentId ?? ''}`;
}

function isSessionField(session: Session, key: string): key is keyof Session {
  return key in session;
}

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}
