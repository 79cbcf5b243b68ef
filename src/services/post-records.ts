import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import type { PostRecord, SeoMetrics } from '../types/post.js';
import { FileSystemError, errorMessage } from '../utils/errors.js';
import { keywordDensity } from './content-pipeline.js';
import { METRIC_EMOJIS } from './content-defaults.js';

export function computeSeoMetrics(content: string, keywords: readonly string[]): SeoMetrics {
  const chars = Array.from(content);
  const emojiSet = new Set<string>(METRIC_EMOJIS);

  return {
    keywordDensity: keywordDensity(content, keywords),
    hashtagCount: chars.filter((char) => char === '#').length,
    contentLength: content.split(/\s+/).filter((word) => word.length > 0).length,
    emojiCount: chars.filter((char) => emojiSet.has(char)).length,
  };
}

function isPostRecord(value: unknown): value is PostRecord {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || !('date' in value) || typeof value.date !== 'string') return false;
  if (value.kind === 'post') return 'content' in value && typeof value.content === 'string';
  if (value.kind === 'error') return 'error' in value && typeof value.error === 'object' && value.error !== null;
  return false;
}

function recordContent(record: PostRecord): string | undefined {
  return record.kind === 'post' ? record.content : record.error.content;
}

/**
 * Audit trail of orchestration runs, kept as one pretty-printed JSON array.
 * Every append reads and rewrites the whole file, so only one process may
 * write to it at a time.
 */
export class PostRecordStore {
  private filePath: string;
  private keywords: readonly string[];

  constructor(filePath: string, keywords: readonly string[]) {
    this.filePath = resolve(filePath);
    this.keywords = keywords;
  }

  getPath(): string {
    return this.filePath;
  }

  readAll(): PostRecord[] {
    if (!existsSync(this.filePath)) {
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new FileSystemError(`Failed to read post records: ${errorMessage(error)}`);
    }

    if (!Array.isArray(parsed)) {
      throw new FileSystemError(`Post records file must contain a JSON array: ${this.filePath}`);
    }

    const records: PostRecord[] = [];
    parsed.forEach((entry: unknown, index: number) => {
      if (!isPostRecord(entry)) {
        throw new FileSystemError(`Unrecognised post record at index ${index} in ${this.filePath}`);
      }
      records.push(entry);
    });
    return records;
  }

  append(record: PostRecord): PostRecord {
    const dir = dirname(this.filePath);
    try {
      mkdirSync(dir, { recursive: true });
    } catch (error) {
      throw new FileSystemError(`Failed to create directory ${dir}: ${errorMessage(error)}`);
    }

    const records = this.readAll();
    const content = recordContent(record);
    const stored: PostRecord =
      content !== undefined ? { ...record, seoMetrics: computeSeoMetrics(content, this.keywords) } : record;
    records.push(stored);

    try {
      writeFileSync(this.filePath, JSON.stringify(records, null, 2), 'utf-8');
    } catch (error) {
      throw new FileSystemError(`Failed to write post records: ${errorMessage(error)}`);
    }

    return stored;
  }
}
