/**
 * Generate agent hooks configuration that reports worker events to the
 * orchestrator. Hook commands receive the event JSON on stdin and forward it
 * as the request body; the session is identified by header from the
 * worker's environment.
 */

interface HookMatcher {
  hooks: Hook[];
  matcher?: string; // Only for PreToolUse, PermissionRequest, PostToolUse
}

interface Hook {
  type: 'command';
  command: string;
  timeout?: number;
}

export interface HooksConfig {
  hooks: {
    Stop: HookMatcher[];
    PostToolUse: HookMatcher[];
  };
}

export type HookName = 'stop' | 'activity';

/**
 * curl invocation posting the hook's stdin to the orchestrator. The session
 * id is expanded by the worker's shell at hook time.
 */
export function buildHookCommand(orchestratorUrl: string, hookName: HookName): string {
  const url = `${orchestratorUrl.replace(/\/+$/, '')}/hooks/${hookName}`;
  return (
    'curl -s -X POST -H "Content-Type: application/json" ' +
    '-H "X-Session-Id: $SESSIONCTL_SESSION_ID" ' +
    `--data-binary @- ${url}`
  );
}

export function generateHooksConfig(orchestratorUrl: string): HooksConfig {
  return {
    hooks: {
      // Stop hooks take no matcher
      Stop: [
        {
          hooks: [{ type: 'command', command: buildHookCommand(orchestratorUrl, 'stop') }],
        },
      ],
      PostToolUse: [
        {
          matcher: '*',
          hooks: [{ type: 'command', command: buildHookCommand(orchestratorUrl, 'activity'), timeout: 10 }],
        },
      ],
    },
  };
}

/**
 * Full settings.json content for a worker: existing settings with the
 * orchestrator's hooks layered on top.
 */
export function generateWorkerSettings(
  orchestratorUrl: string,
  existingSettings: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    ...existingSettings,
    ...generateHooksConfig(orchestratorUrl),
  };
}
