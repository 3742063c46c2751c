import type { SessionStore } from '../session/store.js';
import { logger } from '../utils/logger.js';
import type { LifecycleSupervisor } from './supervisor.js';
import type { WorkerLauncher } from './worker-launcher.js';

/**
 * Finds running sessions whose worker process has gone away (crash, killed
 * pane, record edited by hand) and aborts them so they cannot stay running
 * forever.
 */
export class Reconciler {
  private checkInterval: NodeJS.Timeout | null = null;

  constructor(
    private store: SessionStore,
    private launcher: WorkerLauncher,
    private supervisor: LifecycleSupervisor
  ) {}

  /**
   * Start periodic reconciliation.
   */
  start(intervalMs: number): void {
    if (this.checkInterval) {
      this.stop();
    }

    this.checkInterval = setInterval(() => {
      this.check().catch((err) => {
        logger.error('Reconciliation check failed', err);
      });
    }, intervalMs);

    logger.info(`Reconciler started (interval: ${intervalMs}ms)`);
  }

  stop(): void {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
      logger.info('Reconciler stopped');
    }
  }

  /**
   * One pass over running sessions. Returns the ids that were aborted.
   */
  async check(): Promise<string[]> {
    const running = await this.store.list({ state: 'running' });
    const lost: string[] = [];

    for (const session of running) {
      const alive = session.workerHandle !== null && (await this.launcher.isAlive(session.workerHandle));
      if (alive) {
        continue;
      }

      logger.warn(`Session ${session.id} is running but its worker is gone`, {
        workerHandle: session.workerHandle,
      });
      const aborted = await this.supervisor.abort(session.id, {
        reason: 'worker process is no longer running',
        outcome: 'worker_lost',
      });
      if (aborted.some((s) => s.id === session.id)) {
        lost.push(session.id);
      }
    }

    return lost;
  }
}
