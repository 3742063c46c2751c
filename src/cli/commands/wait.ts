import chalk from 'chalk';
import { SessionctlClient, type WaitResponse } from '../client.js';
import { formatState } from '../format.js';
import { parseTimeoutSeconds, resolveServerUrl, type ConnectionOptions } from './shared.js';

export interface WaitOptions extends ConnectionOptions {
  timeout?: string;
  json?: boolean;
}

/** Exit code when a wait ends before every session completed */
export const EXIT_NOT_SETTLED = 2;

export function formatWait(result: WaitResponse): string {
  const blocks = result.sessions.map((entry) => {
    const header = `${chalk.bold(`[${entry.id}]`)} ${formatState(entry.state)}${entry.outcome ? ` (${entry.outcome})` : ''}`;
    if (!entry.complete) {
      return `${header}\n${chalk.gray('still in progress')}`;
    }
    return entry.result ? `${header}\n${entry.result}` : header;
  });
  return blocks.join('\n\n');
}

export async function waitCommand(ids: string[], options: WaitOptions): Promise<void> {
  const client = new SessionctlClient(await resolveServerUrl(options));
  const result = await client.wait(ids, parseTimeoutSeconds(options.timeout));

  console.log(options.json ? JSON.stringify(result, null, 2) : formatWait(result));
  if (!result.settled) {
    console.error(chalk.yellow('Timed out before all sessions completed; they keep running.'));
    process.exitCode = EXIT_NOT_SETTLED;
  }
}
