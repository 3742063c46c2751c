import { execa } from 'execa';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';

export class TmuxManager {
  /**
   * Create a detached tmux session with environment variables exported into
   * its shell, so the worker started inside inherits them.
   */
  async createSession(
    sessionName: string,
    cwd: string,
    env: Record<string, string> = {},
    logFile?: string
  ): Promise<void> {
    try {
      if (await this.sessionExists(sessionName)) {
        logger.warn(`Session ${sessionName} exists, killing...`);
        await this.killSession(sessionName);
      }

      // 1. Create the session detached in the correct directory
      await execa('tmux', ['new-session', '-d', '-s', sessionName, '-c', cwd]);

      if (logFile) {
        await this.attachSessionLogger(sessionName, logFile);
      }

      // 2. Keep the name stable for lookups
      await execa('tmux', ['set-option', '-t', sessionName, 'allow-rename', 'off']);

      // 3. Session environment (new panes) and shell exports (the running shell)
      for (const [key, value] of Object.entries(env)) {
        await execa('tmux', ['set-environment', '-t', sessionName, key, value]);
      }

      if (Object.keys(env).length > 0) {
        const exportCmd = Object.entries(env)
          .map(([k, v]) => `export ${k}=${shellQuote(v)}`)
          .join(' && ');
        await this.sendKeys(sessionName, exportCmd);
      }

      logger.info(`Created tmux session: ${sessionName}`, {
        envKeys: Object.keys(env),
      });
    } catch (err) {
      logger.error(`Failed to create tmux session: ${sessionName}`, err);
      throw err;
    }
  }

  /**
   * Type a command line into the session's shell and submit it.
   */
  async sendKeys(sessionName: string, keys: string, pressEnter: boolean = true): Promise<void> {
    try {
      // -l sends the text literally so key names inside it are not interpreted
      await execa('tmux', ['send-keys', '-t', sessionName, '-l', keys]);
      logger.debug(`Sent keys to ${sessionName}: ${keys.substring(0, 50)}...`);

      if (pressEnter) {
        await execa('tmux', ['send-keys', '-t', sessionName, 'Enter']);
      }
    } catch (err) {
      logger.error(`Failed to send keys to ${sessionName}`, err);
      throw err;
    }
  }

  /**
   * Kill a tmux session. A session that is already gone is not an error.
   */
  async killSession(sessionName: string): Promise<void> {
    try {
      await execa('tmux', ['kill-session', '-t', sessionName]);
      logger.info(`Killed tmux session: ${sessionName}`);
    } catch (err: unknown) {
      if (err instanceof Error && /session not found|can't find session|no server running/.test(err.message)) {
        return;
      }
      logger.warn(`Failed to kill tmux session: ${sessionName}`, err);
    }
  }

  async sessionExists(sessionName: string): Promise<boolean> {
    try {
      await execa('tmux', ['has-session', '-t', sessionName]);
      return true;
    } catch {
      return false;
    }
  }

  async attachSessionLogger(sessionName: string, logFile: string): Promise<void> {
    try {
      await mkdir(dirname(logFile), { recursive: true });
      await execa('tmux', ['pipe-pane', '-t', sessionName, `exec cat >> ${shellQuote(logFile)}`]);
      logger.debug(`Attached logger to ${sessionName}`, { logFile });
    } catch (err) {
      logger.warn(`Failed to attach logger to ${sessionName}`, err);
    }
  }
}

/** Single-quote a value for a POSIX shell */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}
