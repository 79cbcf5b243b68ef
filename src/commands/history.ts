import { loadConfig, resolveProfile } from '../services/config.js';
import { PostRecordStore } from '../services/post-records.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { PostRecord } from '../types/post.js';

interface HistoryOptions {
  count?: number;
  failed?: boolean;
}

function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) return iso;
  return date.toLocaleString('en-US', {
    month: 'short',
    day: 'numeric',
    year: 'numeric',
    hour: 'numeric',
    minute: '2-digit',
  });
}

function isFailure(record: PostRecord): boolean {
  return record.kind === 'error' || !record.success;
}

function displayRecord(record: PostRecord, index: number, total: number): void {
  const { style } = logger;
  const counter = `[${index + 1}/${total}]`;

  logger.blank();
  if (record.kind === 'post') {
    const status = record.success ? style.green('published') : style.red('publish failed');
    logger.info(`${counter} ${status} • attempt ${record.attempt} • ${formatTimestamp(record.date)}`);
    if (record.postId) {
      logger.info(`  Post ID: ${record.postId}`);
    }
    if (record.error) {
      logger.info(`  ${style.red(`${record.errorKind ?? 'Error'}: ${record.error}`)}`);
    }
  } else {
    logger.info(
      `${counter} ${style.red('failed')} • ${record.error.attempts} attempt(s) • ${formatTimestamp(record.date)}`
    );
    logger.info(`  ${style.red(`${record.error.errorKind}: ${record.error.error}`)}`);
  }

  if (record.seoMetrics) {
    const { contentLength, hashtagCount, emojiCount, keywordDensity } = record.seoMetrics;
    const topKeywords = Object.entries(keywordDensity)
      .filter(([, density]) => density > 0)
      .map(([keyword, density]) => `${keyword} ${density}%`);
    logger.info(
      style.dim(
        `  ${contentLength} words • ${hashtagCount} hashtags • ${emojiCount} emoji` +
          (topKeywords.length > 0 ? ` • ${topKeywords.join(', ')}` : '')
      )
    );
  }

  const content = record.kind === 'post' ? record.content : record.error.content;
  if (content) {
    logger.info('  ' + '─'.repeat(70));
    content.split('\n').forEach((line) => logger.info(`  ${line}`));
    logger.info('  ' + '─'.repeat(70));
  }
}

export async function historyCommand(options: HistoryOptions): Promise<void> {
  try {
    const config = loadConfig();
    const store = new PostRecordStore(config.records.path, resolveProfile(config).primaryKeywords);
    let records = store.readAll();

    if (options.failed) {
      records = records.filter(isFailure);
    }

    if (records.length === 0) {
      logger.info('No post records found.');
      return;
    }

    const count = options.count ?? 10;
    const recent = records.slice(-count).reverse();

    logger.section(`Showing ${recent.length} of ${records.length} record(s) from ${store.getPath()}`);
    recent.forEach((record, index) => displayRecord(record, index, recent.length));

    const published = records.filter((record) => record.kind === 'post' && record.success).length;
    logger.blank();
    logger.info(`📊 ${published} published, ${records.length - published} failed`);
  } catch (error) {
    logger.error(errorMessage(error));
    process.exit(1);
  }
}
