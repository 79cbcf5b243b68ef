import { join } from 'path';
import type { SeopostConfig } from '../types/config.js';
import type { Visibility } from '../types/linkedin.js';
import { configureLogger } from '../utils/logger.js';
import { createLLMService } from './llm-factory.js';
import type { LLMService } from './llm-service.js';
import { ContentPipeline } from './content-pipeline.js';
import { LinkedInPublisher } from './linkedin-api.js';
import { PostRecordStore } from './post-records.js';
import { PostOrchestrator } from './post-orchestrator.js';
import { resolveProfile } from './config.js';

export const LOG_FILENAME = 'linkedin.log';

/**
 * Console plus {logging.dir}/linkedin.log; debug level when asked for
 */
export function setupLogging(config: SeopostConfig, debug: boolean = false): void {
  configureLogger({
    level: debug || config.linkedin.debug ? 'debug' : 'info',
    file: join(config.logging.dir, LOG_FILENAME),
  });
}

export interface OrchestratorOverrides {
  llm?: LLMService;
  visibility?: Visibility | string;
  debug?: boolean;
}

export function buildOrchestrator(
  config: SeopostConfig,
  accessToken: string,
  overrides: OrchestratorOverrides = {}
): { orchestrator: PostOrchestrator; llm: LLMService; store: PostRecordStore } {
  const profile = resolveProfile(config);
  const llm = overrides.llm ?? createLLMService(config);
  const pipeline = new ContentPipeline({ llm, profile });
  const publisher = new LinkedInPublisher(accessToken, {
    baseUrl: config.linkedin.baseUrl,
    apiVersion: config.linkedin.apiVersion,
    timeoutMs: config.linkedin.timeoutMs,
    debug: overrides.debug ?? config.linkedin.debug,
    visibility: overrides.visibility ?? config.linkedin.visibility,
  });
  const store = new PostRecordStore(config.records.path, profile.primaryKeywords);

  return {
    orchestrator: new PostOrchestrator({ pipeline, publisher, store }),
    llm,
    store,
  };
}
