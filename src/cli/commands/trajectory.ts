import chalk from 'chalk';
import { contentBlocks, type TranscriptEntry } from '../../claude/transcript.js';
import { SessionctlClient, type TrajectoryResponse } from '../client.js';
import { formatElapsed, truncate } from '../format.js';
import { resolveServerUrl, type ConnectionOptions } from './shared.js';

export interface TrajectoryOptions extends ConnectionOptions {
  full?: boolean;
  json?: boolean;
}

export function formatTrajectorySummary(trajectory: TrajectoryResponse): string {
  const { summary } = trajectory;
  const header = [chalk.bold(trajectory.id), `${summary.turnCount} turns`];
  if (summary.durationSeconds !== null) {
    header.push(formatElapsed(summary.durationSeconds * 1000));
  }
  if (summary.model) {
    header.push(summary.model);
  }

  const tools = Object.entries(summary.toolSummary)
    .sort(([a, countA], [b, countB]) => countB - countA || a.localeCompare(b))
    .map(([name, count]) => `${name} ${count}`);
  const { usage } = summary;

  return [
    header.join('  '),
    `  tools: ${tools.length > 0 ? tools.join(', ') : 'none'}`,
    `  tokens: ${usage.inputTokens} in, ${usage.outputTokens} out ` +
      `(cache: ${usage.cacheCreationTokens} created, ${usage.cacheReadTokens} read)`,
  ].join('\n');
}

function inputValue(value: unknown): string {
  return typeof value === 'string' ? value : String(JSON.stringify(value));
}

/** Readable rendering of one transcript entry */
export function formatTrajectoryEntry(entry: TranscriptEntry): string {
  const lines: string[] = [];
  const texts: string[] = [];
  const tools: string[] = [];
  const results: string[] = [];

  for (const block of contentBlocks(entry)) {
    if (typeof block === 'string') {
      texts.push(block);
    } else if (block.type === 'text' && block.text !== undefined) {
      texts.push(block.text);
    } else if (block.type === 'tool_use') {
      tools.push(chalk.yellow(`  TOOL: ${block.name ?? 'unknown'}`));
      for (const [key, value] of Object.entries(block.input ?? {}).slice(0, 3)) {
        tools.push(`    ${key}: ${truncate(inputValue(value), 80)}`);
      }
    } else if (block.type === 'tool_result') {
      results.push(`  ${truncate(inputValue(block.content ?? ''), 150)}`);
    }
  }

  switch (entry.type) {
    case 'user':
      if (texts.length > 0) {
        lines.push(chalk.cyan.bold('USER:'), `  ${truncate(texts.join(' '), 200)}`);
      }
      if (results.length > 0) {
        lines.push(chalk.magenta('RESULT:'), ...results);
      }
      if (lines.length === 0) {
        lines.push(chalk.gray('[user]'));
      }
      break;
    case 'assistant':
      lines.push(chalk.green.bold('ASSISTANT:'));
      if (texts.length > 0) {
        lines.push(`  ${truncate(texts.join(' '), 200)}`);
      }
      lines.push(...tools);
      break;
    default:
      lines.push(chalk.gray(`[${entry.type}]`));
  }
  return lines.join('\n');
}

export async function trajectoryCommand(ref: string, options: TrajectoryOptions): Promise<void> {
  const client = new SessionctlClient(await resolveServerUrl(options));
  const trajectory = await client.trajectory(ref);

  if (options.json) {
    for (const entry of trajectory.entries) {
      console.log(JSON.stringify(entry));
    }
    return;
  }
  if (options.full) {
    console.log(trajectory.entries.map(formatTrajectoryEntry).join('\n\n'));
    return;
  }
  console.log(formatTrajectorySummary(trajectory));
}
