import type { ErrorKind } from '../utils/errors.js';

export interface SeoMetrics {
  keywordDensity: Record<string, number>;
  hashtagCount: number;
  contentLength: number;
  emojiCount: number;
}

export type PostResult =
  | {
      success: true;
      status: 'success';
      postId: string;
      details: {
        timestamp: string;
      };
    }
  | {
      success: false;
      errorKind: ErrorKind;
      error: string;
    };

/**
 * Written once a publish call has been made, whatever its outcome
 */
export interface PublishRecord {
  kind: 'post';
  date: string;
  content: string;
  postId: string | null;
  success: boolean;
  error: string | null;
  errorKind: ErrorKind | null;
  attempt: number;
  optimizationMetrics: {
    wordCount: number;
    primaryKeywordsUsed: Record<string, number>;
  };
  seoMetrics?: SeoMetrics;
}

/**
 * Written when no attempt reached a successful publish call
 */
export interface FailureRecord {
  kind: 'error';
  date: string;
  error: {
    success: false;
    error: string;
    errorKind: ErrorKind;
    attempts: number;
    content?: string;
  };
  seoMetrics?: SeoMetrics;
}

export type PostRecord = PublishRecord | FailureRecord;
