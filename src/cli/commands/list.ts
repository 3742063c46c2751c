import chalk from 'chalk';
import { depthOf } from '../../session/id.js';
import { SessionStateSchema, type Session } from '../../session/types.js';
import { SessionctlClient } from '../client.js';
import { formatState, truncate } from '../format.js';
import { resolveServerUrl, type ConnectionOptions } from './shared.js';

export interface ListOptions extends ConnectionOptions {
  state?: string[];
  parent?: string;
  json?: boolean;
}

/** One line per session, indented by depth */
export function formatSessionTree(sessions: Session[]): string {
  if (sessions.length === 0) {
    return chalk.gray('No sessions');
  }
  return sessions
    .map((session) => {
      const indent = '  '.repeat(depthOf(session.id));
      const activity = session.activity && session.state === 'running' ? chalk.gray(` - ${session.activity}`) : '';
      const alias = session.alias ? chalk.gray(` (${session.alias})`) : '';
      return `${indent}${chalk.bold(session.id)}${alias} ${formatState(session.state)} ${truncate(session.task, 60)}${activity}`;
    })
    .join('\n');
}

export async function listCommand(options: ListOptions): Promise<void> {
  const client = new SessionctlClient(await resolveServerUrl(options));
  const states = (options.state ?? []).map((state) => SessionStateSchema.parse(state));
  const sessions = await client.list({ state: states, parent: options.parent });
  console.log(options.json ? JSON.stringify(sessions, null, 2) : formatSessionTree(sessions));
}
