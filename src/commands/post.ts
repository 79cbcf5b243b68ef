import { getAccessToken, loadConfig } from '../services/config.js';
import { buildOrchestrator, setupLogging } from '../services/setup.js';
import { logger } from '../utils/logger.js';
import { errorMessage, errorName } from '../utils/errors.js';
import type { PostResult } from '../types/post.js';
import type { Visibility } from '../types/linkedin.js';

interface PostOptions {
  maxAttempts?: number;
  visibility?: Visibility;
  debug?: boolean;
}

export function reportResult(result: PostResult): void {
  logger.blank();
  if (result.success) {
    logger.success('Post published successfully!');
    logger.info(`Post ID: ${result.postId}`);
  } else {
    logger.error('Publishing failed:');
    logger.info(`Error type: ${result.errorKind}`);
    logger.info(`Error message: ${result.error}`);
  }
}

export async function postCommand(options: PostOptions): Promise<void> {
  try {
    const config = loadConfig();
    setupLogging(config, options.debug);

    logger.section('Creating SEO-optimized LinkedIn post...');

    const { orchestrator, llm } = buildOrchestrator(config, getAccessToken(), {
      visibility: options.visibility,
      debug: options.debug,
    });

    await llm.ensureAvailable();
    logger.success(`Connected to ${config.llm.provider} (model: ${llm.getModelName()})`);

    const result = await orchestrator.createSeoPost(options.maxAttempts ?? config.generation.maxAttempts ?? 3);
    reportResult(result);

    if (!result.success) {
      process.exit(1);
    }
  } catch (error) {
    logger.blank();
    logger.error('Critical error:');
    logger.info(`Type: ${errorName(error)}`);
    logger.info(`Message: ${errorMessage(error)}`);
    process.exit(1);
  }
}
