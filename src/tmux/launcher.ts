import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { generateWorkerSettings } from '../claude/hooks.js';
import { WorkerLaunchError, errorMessage } from '../errors/index.js';
import type { WorkerLauncher } from '../orchestrator/worker-launcher.js';
import { tmuxSessionName } from '../session/id.js';
import type { Session } from '../session/types.js';
import { logger } from '../utils/logger.js';
import { TmuxManager, shellQuote } from './session.js';

export interface TmuxWorkerLauncherConfig {
  stateDir: string;
  /** Directory the worker runs in */
  workDir: string;
  workerCommand: string;
  /** Base URL of the orchestrator's HTTP server, used by hooks and child spawns */
  orchestratorUrl: string;
  model?: string;
}

export function getWorkerDir(stateDir: string, sessionId: string): string {
  return join(stateDir, 'workers', sessionId);
}

/**
 * Hosts each worker in its own detached tmux session. The contract and the
 * hook settings are written beside the session's state so the worker can be
 * inspected (and the pane attached to) while it runs.
 */
export class TmuxWorkerLauncher implements WorkerLauncher {
  constructor(
    private config: TmuxWorkerLauncherConfig,
    private tmux: TmuxManager = new TmuxManager()
  ) {}

  async launch(session: Session, contract: string): Promise<string> {
    const workerDir = getWorkerDir(this.config.stateDir, session.id);
    const contractPath = join(workerDir, 'contract.md');
    const settingsPath = join(workerDir, 'settings.json');
    const sessionName = tmuxSessionName(session.id);

    try {
      await mkdir(workerDir, { recursive: true });
      await writeFile(contractPath, contract, 'utf-8');
      await writeFile(
        settingsPath,
        JSON.stringify(generateWorkerSettings(this.config.orchestratorUrl), null, 2),
        'utf-8'
      );

      await this.tmux.createSession(
        sessionName,
        this.config.workDir,
        this.buildEnv(session),
        join(workerDir, 'pane.log')
      );
      await this.tmux.sendKeys(sessionName, this.buildCommand(settingsPath, contractPath));
    } catch (err) {
      throw new WorkerLaunchError(session.id, `could not start worker: ${errorMessage(err)}`, err);
    }

    if (!(await this.tmux.sessionExists(sessionName))) {
      throw new WorkerLaunchError(session.id, `tmux session ${sessionName} exited immediately`);
    }

    logger.info('Worker launched', { sessionId: session.id, tmuxSession: sessionName });
    return sessionName;
  }

  async terminate(handle: string): Promise<void> {
    await this.tmux.killSession(handle);
  }

  async isAlive(handle: string): Promise<boolean> {
    return this.tmux.sessionExists(handle);
  }

  buildEnv(session: Session): Record<string, string> {
    return {
      SESSIONCTL_SESSION_ID: session.id,
      SESSIONCTL_PARENT_ID: session.parentId ?? '',
      SESSIONCTL_URL: this.config.orchestratorUrl,
    };
  }

  /** Shell line that starts the agent with the contract as its first prompt */
  buildCommand(settingsPath: string, contractPath: string): string {
    const parts = [this.config.workerCommand, '--dangerously-skip-permissions', '--settings', shellQuote(settingsPath)];
    if (this.config.model) {
      parts.push('--model', shellQuote(this.config.model));
    }
    parts.push(`"$(cat ${shellQuote(contractPath)})"`);
    return parts.join(' ');
  }
}
