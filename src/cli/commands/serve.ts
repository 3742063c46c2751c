import chalk from 'chalk';
import { mkdir } from 'fs/promises';
import { ConfigLoader } from '../../config/loader.js';
import { createRuntime, type Runtime } from '../../runtime.js';
import { configureLogDirectory, logger } from '../../utils/logger.js';

interface ServeOptions {
  config?: string;
  port?: string;
}

export async function serveCommand(options: ServeOptions): Promise<void> {
  const loader = new ConfigLoader(options.config ?? process.cwd());
  const loaded = await loader.loadConfig();
  const port = options.port === undefined ? loaded.serverPort : Number(options.port);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`--port expects a TCP port, got "${options.port}"`);
  }
  const config = { ...loaded, serverPort: port };
  const serverUrl = options.port ? `http://${config.serverHost}:${config.serverPort}` : config.serverUrl;

  await mkdir(config.stateDir, { recursive: true });
  await mkdir(config.logDirectory, { recursive: true });
  configureLogDirectory(config.logDirectory);

  const runtime = createRuntime({ ...config, serverUrl });
  setupSignalHandlers(runtime);
  await runtime.start();

  console.log(chalk.cyan(`sessionctl serving on ${serverUrl}`));
  console.log(chalk.gray(`  state: ${config.stateDir}`));
  console.log(chalk.gray(`  logs:  ${config.logDirectory}`));
}

function setupSignalHandlers(runtime: Runtime): void {
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress, forcing exit...');
      process.exit(1);
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down (workers keep running)...`);

    try {
      await runtime.stop();
      process.exit(0);
    } catch (err) {
      logger.error('Error during shutdown', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((err) => logger.error('Shutdown failed', err));
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((err) => logger.error('Shutdown failed', err));
  });
}
