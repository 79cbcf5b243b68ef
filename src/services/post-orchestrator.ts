import type { ContentPipeline } from './content-pipeline.js';
import type { Publisher } from './linkedin-api.js';
import type { PostRecordStore } from './post-records.js';
import type { FailureRecord, PostRecord, PostResult, PublishRecord } from '../types/post.js';
import { InvalidArgumentError, classifyError, errorMessage, type ErrorKind } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface PostOrchestratorOptions {
  pipeline: ContentPipeline;
  publisher: Publisher;
  store: PostRecordStore;
  now?: () => Date;
}

/**
 * One line per failure kind, for the retry log
 */
function describeFailure(kind: ErrorKind): string {
  switch (kind) {
    case 'AuthError':
      return 'authentication failed';
    case 'ValidationError':
    case 'InvalidArgument':
      return 'post rejected before sending';
    case 'TransientHttpError':
      return 'network or gateway error';
    case 'PublishError':
      return 'publish failed';
    case 'LengthValidationFailure':
      return 'content outside the word range';
    case 'ConcurrentRun':
      return 'another run is in progress';
    case 'Unclassified':
      return 'unexpected error';
  }
}

/**
 * Drives generate → format → validate → publish → record with bounded retry.
 * Every call ends with exactly one stored record and one returned result,
 * except calls refused because another run is still going.
 */
export class PostOrchestrator {
  private pipeline: ContentPipeline;
  private publisher: Publisher;
  private store: PostRecordStore;
  private now: () => Date;
  private running = false;

  constructor(options: PostOrchestratorOptions) {
    this.pipeline = options.pipeline;
    this.publisher = options.publisher;
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
  }

  isRunning(): boolean {
    return this.running;
  }

  async createSeoPost(maxAttempts: number = 3): Promise<PostResult> {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new InvalidArgumentError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }

    if (this.running) {
      logger.warn('A post run is already in progress; skipping');
      return {
        success: false,
        errorKind: 'ConcurrentRun',
        error: 'A post run is already in progress',
      };
    }

    this.running = true;
    try {
      return await this.runAttempts(maxAttempts);
    } finally {
      this.running = false;
    }
  }

  private async runAttempts(maxAttempts: number): Promise<PostResult> {
    let lastContent: string | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        logger.step(`Attempt ${attempt}/${maxAttempts}: Generating content...`);
        const { theme, content: raw } = await this.pipeline.generatePostContent();
        logger.debug(`Theme: ${theme.theme}`);

        logger.step('Optimizing content format...');
        const formatted = this.pipeline.format(raw);
        lastContent = formatted;

        if (!this.pipeline.validateLength(formatted)) {
          logger.warn('Content length validation failed. Retrying...');
          continue;
        }

        logger.step('Publishing to LinkedIn...');
        const result = await this.publisher.publish(formatted);

        this.save(this.buildPublishRecord(formatted, attempt, result));
        return result;
      } catch (error) {
        const kind = classifyError(error);
        logger.error(`Attempt ${attempt} failed (${describeFailure(kind)}): ${errorMessage(error)}`);

        if (attempt === maxAttempts) {
          return this.fail(kind, errorMessage(error), attempt, lastContent);
        }
      }
    }

    return this.fail(
      'LengthValidationFailure',
      `Content length stayed outside the allowed range after ${maxAttempts} attempt(s)`,
      maxAttempts,
      lastContent
    );
  }

  private buildPublishRecord(content: string, attempt: number, result: PostResult): PublishRecord {
    return {
      kind: 'post',
      date: this.now().toISOString(),
      content,
      postId: result.success ? result.postId : null,
      success: result.success,
      error: result.success ? null : result.error,
      errorKind: result.success ? null : result.errorKind,
      attempt,
      optimizationMetrics: {
        wordCount: content.split(/\s+/).filter((word) => word.length > 0).length,
        primaryKeywordsUsed: this.pipeline.keywordDensity(content),
      },
    };
  }

  private fail(kind: ErrorKind, message: string, attempts: number, content?: string): PostResult {
    const record: FailureRecord = {
      kind: 'error',
      date: this.now().toISOString(),
      error: {
        success: false,
        error: message,
        errorKind: kind,
        attempts,
        ...(content !== undefined ? { content } : {}),
      },
    };
    this.save(record);

    return { success: false, errorKind: kind, error: message };
  }

  private save(record: PostRecord): void {
    try {
      this.store.append(record);
    } catch (error) {
      // The run's outcome still goes back to the caller
      logger.error(`Error saving post record: ${errorMessage(error)}`);
    }
  }
}
