import chalk from 'chalk';
import { SessionctlClient, type PollResponse } from '../client.js';
import { formatElapsed, formatState, truncate } from '../format.js';
import { resolveServerUrl, type ConnectionOptions } from './shared.js';

export interface PollOptions extends ConnectionOptions {
  json?: boolean;
}

export function formatPoll(status: PollResponse): string {
  const name = status.alias ? `${status.id} (${status.alias})` : status.id;
  const lines = [`${chalk.bold(name)}  ${formatState(status.state)}  ${chalk.gray(formatElapsed(status.elapsedMs))}`];

  if (status.activity && !status.complete) {
    lines.push(`  activity: ${status.activity}`);
  }
  if (status.signal.maxIterations !== null) {
    const verdict = status.signal.lastVerdict ? `, last verdict ${status.signal.lastVerdict}` : '';
    lines.push(`  iteration: ${status.signal.iteration}/${status.signal.maxIterations}${verdict}`);
  }
  if (status.signal.findings && status.state === 'retrying') {
    lines.push(`  findings: ${truncate(status.signal.findings, 120)}`);
  }
  if (status.openDescendants > 0) {
    lines.push(`  open descendants: ${status.openDescendants}`);
  }
  if (status.outcome) {
    lines.push(`  outcome: ${status.outcome}`);
  }
  if (status.result !== null) {
    lines.push('', status.result);
  }
  return lines.join('\n');
}

export async function pollCommand(id: string, options: PollOptions): Promise<void> {
  const client = new SessionctlClient(await resolveServerUrl(options));
  const status = await client.poll(id);
  console.log(options.json ? JSON.stringify(status, null, 2) : formatPoll(status));
}
