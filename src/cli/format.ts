import chalk from 'chalk';
import type { SessionState } from '../session/types.js';

const STATE_COLORS: Record<SessionState, (text: string) => string> = {
  pending: chalk.gray,
  running: chalk.cyan,
  awaiting_verification: chalk.blue,
  retrying: chalk.yellow,
  done: chalk.green,
  aborted: chalk.red,
  skipped: chalk.magenta,
};

export function formatState(state: SessionState): string {
  return STATE_COLORS[state](state);
}

export function formatElapsed(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ${seconds % 60}s`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

export function truncate(text: string, max: number): string {
  const oneLine = text.replace(/\s+/g, ' ').trim();
  return oneLine.length > max ? `${oneLine.slice(0, max - 1)}…` : oneLine;
}
