import chalk from 'chalk';
import type { SpawnRequest } from '../../orchestrator/supervisor.js';
import type { CheckerSpecInput, DependencyRequestInput } from '../../session/types.js';
import { SessionctlClient } from '../client.js';
import { resolveServerUrl, type ConnectionOptions } from './shared.js';

export interface SpawnOptions extends ConnectionOptions {
  alias?: string;
  parent?: string;
  after?: string[];
  any?: boolean;
  gate?: string;
  tolerateFailures?: boolean;
  onPass?: string[];
  onFail?: string[];
  pipe?: boolean;
  checker?: string;
  checkerAgent?: string;
  maxIterations?: string;
  verify?: boolean; // --no-verify sets false
  phase?: string;
  phaseInput?: string;
  intent?: string;
  scope?: string[];
  json?: boolean;
}

/** Split "0,1 2" style id or alias lists given to repeatable options */
function splitIds(values: string[] | undefined): string[] {
  return (values ?? []).flatMap((value) => value.split(/[\s,]+/)).filter(Boolean);
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} expects a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Translate CLI flags into a spawn request. A worker's own session id
 * becomes the parent unless --parent says otherwise.
 */
export function buildSpawnRequest(
  task: string,
  options: SpawnOptions,
  env: NodeJS.ProcessEnv = process.env
): SpawnRequest {
  const after = splitIds(options.after);
  const conditions = [
    ...splitIds(options.onPass).map((sessionId) => ({ on: 'pass' as const, sessionId })),
    ...splitIds(options.onFail).map((sessionId) => ({ on: 'fail' as const, sessionId })),
  ];

  if (options.any && options.gate) {
    throw new Error('--any and --gate cannot be combined');
  }

  let dependencies: DependencyRequestInput | null = null;
  if (after.length > 0 || conditions.length > 0) {
    const rule: DependencyRequestInput['rule'] = options.any
      ? { kind: 'any' }
      : options.gate
        ? { kind: 'gate', required: parsePositiveInt(options.gate, '--gate') }
        : { kind: 'all', tolerateFailures: options.tolerateFailures ?? false };
    dependencies = { after, rule, conditions, pipe: options.pipe ?? false };
  }

  if (options.checker && options.checkerAgent) {
    throw new Error('--checker and --checker-agent cannot be combined');
  }
  const maxIterations = options.maxIterations ? parsePositiveInt(options.maxIterations, '--max-iterations') : undefined;
  let checker: CheckerSpecInput | null = null;
  if (options.checker) {
    checker = { kind: 'command', command: options.checker, maxIterations };
  } else if (options.checkerAgent) {
    checker = { kind: 'agent', prompt: options.checkerAgent, maxIterations };
  } else if (maxIterations !== undefined) {
    throw new Error('--max-iterations needs --checker or --checker-agent');
  }

  const parentId = options.parent ?? (env.SESSIONCTL_SESSION_ID || null);

  return {
    task,
    alias: options.alias ?? null,
    parentId,
    dependencies,
    checker,
    noVerify: options.verify === false,
    phase: options.phase ? { name: options.phase, previousOutput: options.phaseInput ?? null } : null,
    parentIntent: options.intent ?? null,
    fileScope: options.scope ?? [],
  };
}

export async function spawnCommand(task: string, options: SpawnOptions): Promise<void> {
  const client = new SessionctlClient(await resolveServerUrl(options));
  const session = await client.spawn(buildSpawnRequest(task, options));

  if (options.json) {
    console.log(JSON.stringify(session, null, 2));
    return;
  }
  // Bare id on stdout so callers can capture it
  console.log(session.id);
  console.error(chalk.gray(`spawned ${session.id} (${session.state})`));
}
