import { ConfigLoader } from '../../config/loader.js';

export interface ConnectionOptions {
  url?: string;
  config?: string;
}

/**
 * Server to talk to: --url, then the URL a worker inherits from its
 * environment, then the configured host and port.
 */
export async function resolveServerUrl(
  options: ConnectionOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<string> {
  if (options.url) {
    return options.url;
  }
  if (env.SESSIONCTL_URL) {
    return env.SESSIONCTL_URL;
  }
  const config = await new ConfigLoader(options.config ?? process.cwd()).loadConfig();
  return config.serverUrl;
}

export function parseTimeoutSeconds(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`--timeout expects a number of seconds, got "${value}"`);
  }
  return Math.round(seconds * 1000);
}
