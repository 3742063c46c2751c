import { z } from 'zod';

const portSchema = z.number().int().min(1024).max(65535);

export const SessionctlConfigSchema = z
  .object({
    stateDir: z.string().min(1).default('.sessionctl'),
    workDir: z.string().min(1).optional(), // where workers and command checkers run; defaults to the config directory
    logDirectory: z.string().min(1).optional(),
    serverHost: z.string().default('127.0.0.1'),
    serverPort: portSchema.default(3000),
    workerCommand: z.string().min(1).default('claude'),
    model: z.string().optional(), // 'haiku', 'sonnet', 'opus', or a full model name
    defaultMaxIterations: z.number().int().min(1).default(3),
    launchRetries: z.number().int().min(0).max(10).default(2),
    launchRetryDelayMs: z.number().int().min(0).default(2000),
    checkerTimeoutMs: z.number().int().min(1000).default(600000),
    classifierTimeoutMs: z.number().int().min(1000).default(120000),
    reconcileIntervalMs: z.number().int().min(1000).default(30000),
    waitRecheckMs: z.number().int().min(100).default(5000),
  })
  .strict();

export type SessionctlConfigInput = z.input<typeof SessionctlConfigSchema>;

/** Parsed configuration with every path made absolute */
export interface SessionctlConfig extends z.infer<typeof SessionctlConfigSchema> {
  configDir: string;
  workDir: string;
  logDirectory: string;
  /** Base URL workers and the CLI use to reach the server */
  serverUrl: string;
}
