#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../errors/index.js';
import { abortCommand } from './commands/abort.js';
import { listCommand } from './commands/list.js';
import { pollCommand } from './commands/poll.js';
import { serveCommand } from './commands/serve.js';
import { spawnCommand } from './commands/spawn.js';
import { trajectoryCommand } from './commands/trajectory.js';
import { waitCommand } from './commands/wait.js';

function collect(value: string, previous: string[] = []): string[] {
  return previous.concat([value]);
}

const program = new Command();

program
  .name('sessionctl')
  .description(chalk.cyan('sessionctl') + ' - Supervise hierarchical agent sessions')
  .version('0.1.0');

const withConnection = (command: Command): Command =>
  command
    .option('-u, --url <url>', 'Orchestrator URL (defaults to $SESSIONCTL_URL, then the config)')
    .option('-c, --config <path>', 'Path to config directory');

program
  .command('serve')
  .description('Run the orchestrator: session API, hooks endpoint and worker supervision')
  .option('-c, --config <path>', 'Path to config directory')
  .option('-p, --port <port>', 'Port to listen on (overrides the config)')
  .action(serveCommand);

withConnection(
  program
    .command('spawn')
    .description('Create a session; prints its id')
    .argument('<task>', 'Work to delegate')
    .option('--alias <name>', 'Unique name usable wherever a session id is')
    .option('--parent <ref>', 'Parent session id or alias (defaults to $SESSIONCTL_SESSION_ID)')
    .option('--after <refs>', 'Predecessor ids or aliases (comma separated, repeatable)', collect)
    .option('--any', 'Start when the first predecessor is done')
    .option('--gate <n>', 'Start when N predecessors are done')
    .option('--tolerate-failures', 'Treat aborted or skipped predecessors as satisfied')
    .option('--on-pass <ref>', 'Run only if this session passed (repeatable)', collect)
    .option('--on-fail <ref>', 'Run only if this session failed (repeatable)', collect)
    .option('--pipe', "Include the predecessors' results in the contract")
    .option('--checker <command>', 'Shell command that verifies the work')
    .option('--checker-agent <criteria>', 'Criteria an agent checker verifies against')
    .option('--max-iterations <n>', 'Doer/checker cycles before giving up')
    .option('--no-verify', 'Accept the output without verification')
    .option('--phase <name>', 'Phase this session belongs to')
    .option('--phase-input <text>', 'What the previous phase produced')
    .option('--intent <text>', "Parent's goal, shown to the worker")
    .option('--scope <path>', 'Restrict edits to this path (repeatable)', collect)
    .option('--json', 'Print the full session record')
).action(spawnCommand);

withConnection(
  program
    .command('poll')
    .description('Show the current status of a session without waiting')
    .argument('<ref>', 'Session id or alias')
    .option('--json', 'Print JSON')
).action(pollCommand);

withConnection(
  program
    .command('wait')
    .description('Block until sessions (and their descendants) complete')
    .argument('<refs...>', 'Session ids or aliases')
    .option('-t, --timeout <seconds>', 'Give up after this long and print partial status')
    .option('--json', 'Print JSON')
).action(waitCommand);

withConnection(
  program
    .command('abort')
    .description('Abort a session and all of its open descendants')
    .argument('<ref>', 'Session id or alias')
    .option('-r, --reason <text>', 'Reason recorded on the session')
).action(abortCommand);

withConnection(
  program
    .command('trajectory')
    .description("Show the agent transcript of a session's worker (summary by default)")
    .argument('<ref>', 'Session id or alias')
    .option('--full', 'Print every turn and tool call')
    .option('--json', 'Print the raw transcript as JSONL')
).action(trajectoryCommand);

withConnection(
  program
    .command('list')
    .description('List sessions as a tree')
    .option('-s, --state <state>', 'Only sessions in this state (repeatable)', collect)
    .option('--parent <ref>', "Only direct children of this session id or alias ('root' for top level)")
    .option('--json', 'Print JSON')
).action(listCommand);

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  process.exit(1);
});
