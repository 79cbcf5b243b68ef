import cron from 'node-cron';
import { getAccessToken, loadConfig } from '../services/config.js';
import { buildOrchestrator, setupLogging } from '../services/setup.js';
import { startHealthServer, stopServer } from '../services/health-server.js';
import type { PostOrchestrator } from '../services/post-orchestrator.js';
import { logger } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

interface ScheduleOptions {
  cron?: string;
  port?: number;
  debug?: boolean;
}

async function createDailyPost(orchestrator: PostOrchestrator, maxAttempts: number): Promise<void> {
  logger.info('Starting daily post creation...');
  const result = await orchestrator.createSeoPost(maxAttempts);

  if (result.success) {
    logger.success(`Successfully created post with ID: ${result.postId}`);
  } else {
    logger.error(`Failed to create post: ${result.error}`);
  }
}

export async function scheduleCommand(options: ScheduleOptions): Promise<void> {
  try {
    const config = loadConfig();
    setupLogging(config, options.debug);

    const expression = options.cron ?? config.schedule.cron;
    if (!cron.validate(expression)) {
      throw new ConfigError(`Invalid cron expression: '${expression}'`);
    }

    const { orchestrator } = buildOrchestrator(config, getAccessToken(), { debug: options.debug });
    const maxAttempts = config.generation.maxAttempts ?? 3;

    const task = cron.schedule(
      expression,
      () => {
        createDailyPost(orchestrator, maxAttempts).catch((error: unknown) => {
          logger.error(`Error in daily post job: ${errorMessage(error)}`);
        });
      },
      { timezone: config.schedule.timezone }
    );
    logger.success(`Started scheduler (${expression}, ${config.schedule.timezone})`);

    const server = await startHealthServer(config.server.host, options.port ?? config.server.port);

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down...`);
      task.stop();
      stopServer(server)
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`Failed to close health server: ${errorMessage(error)}`);
          process.exit(1);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error(errorMessage(error));
    process.exit(1);
  }
}
