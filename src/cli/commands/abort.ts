import chalk from 'chalk';
import { SessionctlClient } from '../client.js';
import { resolveServerUrl, type ConnectionOptions } from './shared.js';

export interface AbortOptions extends ConnectionOptions {
  reason?: string;
}

export async function abortCommand(id: string, options: AbortOptions): Promise<void> {
  const client = new SessionctlClient(await resolveServerUrl(options));
  const aborted = await client.abort(id, options.reason);

  if (aborted.length === 0) {
    console.log(chalk.gray(`Nothing to abort: ${id} and its descendants had already finished`));
    return;
  }
  console.log(chalk.red(`Aborted ${aborted.length} session(s): ${aborted.join(', ')}`));
}
