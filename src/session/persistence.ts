import { mkdir, readFile, readdir, rename, writeFile } from 'fs/promises';
import { join } from 'path';
import { CorruptRecordError } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { SessionIdSchema, SessionRecordSchema, type Session } from './types.js';

/** Durable storage behind the session store */
export interface SessionPersistence {
  read(id: string): Promise<Session | null>;
  write(session: Session): Promise<void>;
  list(): Promise<Session[]>;
  /** Every id with a stored record, readable or not */
  listIds(): Promise<string[]>;
}

const RECORD_SUFFIX = '.json';

/**
 * One JSON file per session under `<stateDir>/sessions/`.
 *
 * Records are re-read on every access so hand edits take effect, and each
 * read is validated against the record schema.
 */
export class FileSessionPersistence implements SessionPersistence {
  private sessionsDir: string;

  constructor(stateDir: string) {
    this.sessionsDir = join(stateDir, 'sessions');
  }

  getSessionsDir(): string {
    return this.sessionsDir;
  }

  recordPath(id: string): string {
    return join(this.sessionsDir, `${id}${RECORD_SUFFIX}`);
  }

  async read(id: string): Promise<Session | null> {
    let raw: string;
    try {
      raw = await readFile(this.recordPath(id), 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return null;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new CorruptRecordError(id, 'invalid JSON');
    }

    const result = SessionRecordSchema.safeParse(parsed);
    if (!result.success) {
      const detail = result.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
      throw new CorruptRecordError(id, detail);
    }
    if (result.data.id !== id) {
      throw new CorruptRecordError(id, `record carries id ${result.data.id}`);
    }
    return result.data;
  }

  async write(session: Session): Promise<void> {
    await mkdir(this.sessionsDir, { recursive: true });
    const target = this.recordPath(session.id);
    const temp = `${target}.${process.pid}.tmp`;
    await writeFile(temp, JSON.stringify(session, null, 2) + '\n', 'utf-8');
    await rename(temp, target);
  }

  async listIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.sessionsDir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return [];
      }
      throw err;
    }
    return entries
      .filter((entry) => entry.endsWith(RECORD_SUFFIX))
      .map((entry) => entry.slice(0, -RECORD_SUFFIX.length))
      .filter((id) => SessionIdSchema.safeParse(id).success);
  }

  async list(): Promise<Session[]> {
    const sessions: Session[] = [];
    for (const id of await this.listIds()) {
      try {
        const session = await this.read(id);
        if (session) {
          sessions.push(session);
        }
      } catch (err) {
        if (err instanceof CorruptRecordError) {
          logger.warn('Skipping unreadable session record', { sessionId: id, error: err.message });
          continue;
        }
        throw err;
      }
    }
    return sessions;
  }
}

/** Process-local persistence, for tests and embedding */
export class InMemorySessionPersistence implements SessionPersistence {
  private records: Map<string, Session> = new Map();

  async read(id: string): Promise<Session | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async write(session: Session): Promise<void> {
    this.records.set(session.id, structuredClone(session));
  }

  async list(): Promise<Session[]> {
    return Array.from(this.records.values(), (record) => structuredClone(record));
  }

  async listIds(): Promise<string[]> {
    return [...this.records.keys()];
  }
}
