/**
 * Query interface - read-only projections for callers
 *
 * poll returns at once; wait suspends until sessions are complete (terminal
 * with no open descendant), a timeout passes or the caller gives up. Neither
 * ever changes a session.
 */

import { readTranscript, summarizeTrajectory, type TranscriptEntry, type TrajectorySummary } from '../claude/transcript.js';
import { NotFoundError } from '../errors/index.js';
import { isDescendantOf } from '../session/id.js';
import type { SessionStore } from '../session/store.js';
import { isTerminal, type Session, type SessionOutcome, type SessionState, type Verdict } from '../session/types.js';

export interface PartialSignal {
  /** Completed doer/checker cycles */
  iteration: number;
  maxIterations: number | null;
  lastVerdict: Verdict | null;
  findings: string | null;
}

export interface PollResult {
  id: string;
  alias: string | null;
  parentId: string | null;
  task: string;
  state: SessionState;
  outcome: SessionOutcome | null;
  activity: string | null;
  elapsedMs: number;
  signal: PartialSignal;
  openDescendants: number;
  complete: boolean;
  result: string | null;
}

export interface WaitEntry {
  id: string;
  state: SessionState;
  outcome: SessionOutcome | null;
  result: string | null;
  complete: boolean;
}

export interface WaitResult {
  /** False when the wait ended by timeout or cancellation */
  settled: boolean;
  sessions: WaitEntry[];
}

export interface TrajectoryResult {
  id: string;
  transcriptPath: string;
  summary: TrajectorySummary;
  entries: TranscriptEntry[];
}

export interface WaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export class QueryService {
  constructor(
    private store: SessionStore,
    private options: { recheckMs: number }
  ) {}

  async poll(ref: string): Promise<PollResult> {
    const id = await this.store.resolve(ref);
    const session = await this.store.get(id);
    const openDescendants = await this.countOpenDescendants(id);
    const lastVerdict = session.verdicts.length > 0 ? session.verdicts[session.verdicts.length - 1] : null;

    return {
      id: session.id,
      alias: session.alias,
      parentId: session.parentId,
      task: session.task,
      state: session.state,
      outcome: session.outcome,
      activity: session.activity,
      elapsedMs: elapsedMs(session),
      signal: {
        iteration: session.iterationCount,
        maxIterations: session.checker?.maxIterations ?? null,
        lastVerdict: lastVerdict?.verdict ?? null,
        findings: session.findings,
      },
      openDescendants,
      complete: isTerminal(session.state) && openDescendants === 0,
      result: session.result,
    };
  }

  async wait(refs: string[], options: WaitOptions = {}): Promise<WaitResult> {
    // Unknown ids and aliases fail before anything is awaited
    const ids: string[] = [];
    for (const ref of refs) {
      ids.push(await this.store.resolve(ref));
    }

    const deadline = options.timeoutMs !== undefined ? Date.now() + options.timeoutMs : null;
    let dirty = false;
    let wake: (() => void) | null = null;

    const notify = (): void => {
      dirty = true;
      if (wake) {
        const resolve = wake;
        wake = null;
        resolve();
      }
    };

    const unsubscribe = this.store.subscribe((session) => {
      if (ids.some((id) => session.id === id || isDescendantOf(session.id, id))) {
        notify();
      }
    });
    options.signal?.addEventListener('abort', notify);

    try {
      for (;;) {
        dirty = false;
        const sessions = await this.snapshot(ids);

        if (sessions.every((entry) => entry.complete)) {
          return { settled: true, sessions };
        }
        if (options.signal?.aborted) {
          return { settled: false, sessions };
        }

        const remaining = deadline === null ? this.options.recheckMs : deadline - Date.now();
        if (remaining <= 0) {
          return { settled: false, sessions };
        }
        if (dirty) {
          continue; // changed while the snapshot was taken
        }

        // Store events wake us early; the recheck covers records edited on disk
        await new Promise<void>((resolve) => {
          const timer = setTimeout(() => {
            wake = null;
            resolve();
          }, Math.min(remaining, this.options.recheckMs));
          wake = () => {
            clearTimeout(timer);
            resolve();
          };
        });
      }
    } finally {
      unsubscribe();
      options.signal?.removeEventListener('abort', notify);
    }
  }

  /**
   * The agent transcript a session's worker reported, with its summary.
   */
  async trajectory(ref: string): Promise<TrajectoryResult> {
    const session = await this.store.get(await this.store.resolve(ref));
    if (session.transcriptPath === null) {
      throw new NotFoundError(session.id, `No trajectory recorded for session ${session.id}`);
    }
    const entries = await readTranscript(session.transcriptPath);
    if (entries === null) {
      throw new NotFoundError(session.id, `Transcript of session ${session.id} is gone: ${session.transcriptPath}`);
    }
    return {
      id: session.id,
      transcriptPath: session.transcriptPath,
      summary: summarizeTrajectory(entries),
      entries,
    };
  }

  private async snapshot(ids: string[]): Promise<WaitEntry[]> {
    const entries: WaitEntry[] = [];
    for (const id of ids) {
      const session = await this.store.get(id);
      const complete = isTerminal(session.state) && (await this.countOpenDescendants(id)) === 0;
      entries.push({
        id,
        state: session.state,
        outcome: session.outcome,
        result: session.result,
        complete,
      });
    }
    return entries;
  }

  private async countOpenDescendants(id: string): Promise<number> {
    const descendants = await this.store.list({ ancestorId: id });
    return descendants.filter((s) => !isTerminal(s.state)).length;
  }
}

function elapsedMs(session: Session): number {
  const end = session.terminatedAt ? Date.parse(session.terminatedAt) : Date.now();
  return Math.max(0, end - Date.parse(session.createdAt));
}
