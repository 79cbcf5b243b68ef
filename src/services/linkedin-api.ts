import type { LinkedInUserInfo, PublishedPost, UgcPostBody, Visibility } from '../types/linkedin.js';
import { VISIBILITIES } from '../types/linkedin.js';
import type { PostResult } from '../types/post.js';
import {
  AuthError,
  InvalidArgumentError,
  PublishError,
  TransientHttpError,
  ValidationError,
  classifyError,
  errorMessage,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export const LINKEDIN_BASE_URL = 'https://api.linkedin.com/v2';
export const LINKEDIN_API_VERSION = '202304';

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface LinkedInClientOptions {
  baseUrl?: string;
  apiVersion?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  debug?: boolean;
  /** Total attempts for transient failures, first call included */
  maxAttempts?: number;
  /** Wait before the second attempt; doubles for each further one */
  backoffMs?: number;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isVisibility(value: string): value is Visibility {
  return VISIBILITIES.some((v) => v === value);
}

function isUserInfo(value: unknown): value is LinkedInUserInfo {
  return typeof value === 'object' && value !== null && 'sub' in value && typeof value.sub === 'string';
}

/**
 * Text-post publisher for the LinkedIn v2 API.
 * Use `LinkedInClient.connect()` so the token is checked before any post.
 */
export class LinkedInClient {
  private accessToken: string;
  private baseUrl: string;
  private apiVersion: string;
  private timeoutMs: number;
  private debug: boolean;
  private maxAttempts: number;
  private backoffMs: number;
  private fetchImpl: FetchLike;
  private sleep: (ms: number) => Promise<void>;
  private userUrn: string | null = null;

  constructor(accessToken: string, options: LinkedInClientOptions = {}) {
    this.accessToken = accessToken;
    this.baseUrl = options.baseUrl ?? LINKEDIN_BASE_URL;
    this.apiVersion = options.apiVersion ?? LINKEDIN_API_VERSION;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.debug = options.debug ?? false;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffMs = options.backoffMs ?? 500;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  static async connect(accessToken: string, options: LinkedInClientOptions = {}): Promise<LinkedInClient> {
    const client = new LinkedInClient(accessToken, options);
    await client.validateToken();
    return client;
  }

  getAuthorUrn(): string | null {
    return this.userUrn;
  }

  getHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.accessToken}`,
      'Content-Type': 'application/json',
      'X-Restli-Protocol-Version': '2.0.0',
      'LinkedIn-Version': this.apiVersion,
    };
  }

  /**
   * Check the token against /userinfo and derive the author URN from `sub`
   */
  async validateToken(): Promise<LinkedInUserInfo> {
    try {
      const response = await this.send(`${this.baseUrl}/userinfo`, {
        method: 'GET',
        headers: this.getHeaders(),
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
      }

      const userInfo: unknown = await response.json();
      if (!isUserInfo(userInfo)) {
        throw new Error('userinfo response has no subject identifier');
      }

      this.userUrn = `urn:li:person:${userInfo.sub}`;
      logger.info('Successfully validated access token');
      if (this.debug) {
        logger.debug(`User Info: ${JSON.stringify(userInfo, null, 2)}`);
      }
      return userInfo;
    } catch (error) {
      const message =
        `Token validation failed: ${errorMessage(error)}\n` +
        'Please ensure:\n' +
        '1. Your access token is valid and not expired\n' +
        '2. You have the required scopes (openid, profile, w_member_social)\n' +
        '3. Your application is properly configured in LinkedIn Developer Portal';
      logger.error(message);
      throw new AuthError(message);
    }
  }

  async createTextPost(text: string, visibility: Visibility | string = 'PUBLIC'): Promise<PublishedPost> {
    if (!text.trim()) {
      throw new ValidationError('Post text cannot be empty');
    }

    const normalized = visibility.toUpperCase();
    if (!isVisibility(normalized)) {
      throw new InvalidArgumentError(`Invalid visibility value. Must be one of: ${VISIBILITIES.join(', ')}`);
    }

    if (!this.userUrn) {
      throw new AuthError('Access token has not been validated. Use LinkedInClient.connect()');
    }

    const body: UgcPostBody = {
      author: this.userUrn,
      lifecycleState: 'PUBLISHED',
      specificContent: {
        'com.linkedin.ugc.ShareContent': {
          shareCommentary: {
            text,
          },
          shareMediaCategory: 'NONE',
        },
      },
      visibility: {
        'com.linkedin.ugc.MemberNetworkVisibility': normalized,
      },
    };

    logger.info('Creating text post...');
    if (this.debug) {
      logger.debug(`Post data: ${JSON.stringify(body, null, 2)}`);
    }

    let response: Response;
    try {
      response = await this.send(`${this.baseUrl}/ugcPosts`, {
        method: 'POST',
        headers: this.getHeaders(),
        body: JSON.stringify(body),
      });
    } catch (error) {
      const message = `Failed to create post: ${errorMessage(error)}`;
      logger.error(message);
      throw new PublishError(message, error instanceof TransientHttpError ? error.status : undefined);
    }

    if (!response.ok) {
      const responseText = await response.text();
      if (this.debug) {
        logger.debug(`Response body: ${responseText}`);
      }
      const message = `Failed to create post: HTTP ${response.status} ${response.statusText}`.trim();
      logger.error(message);
      throw new PublishError(message, response.status);
    }

    const postId = response.headers.get('x-restli-id');
    if (!postId) {
      const message = 'No post ID received in response';
      logger.error(message);
      throw new PublishError(message, response.status);
    }

    logger.success(`Successfully created post with ID: ${postId}`);

    return {
      status: 'success',
      postId,
      details: { timestamp: new Date().toISOString() },
    };
  }

  /**
   * Issue a request, retrying 429/5xx gateway statuses with exponential
   * backoff. Transport failures are retried for GET only: a POST that never
   * got a response may still have been published. Other statuses are
   * returned to the caller.
   */
  private async send(url: string, init: RequestInit): Promise<Response> {
    let lastError: TransientHttpError | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = this.backoffMs * 2 ** (attempt - 2);
        logger.warn(`Retrying ${init.method ?? 'GET'} ${url} in ${delay}ms (attempt ${attempt}/${this.maxAttempts})`);
        await this.sleep(delay);
      }

      const method = init.method ?? 'GET';
      let response: Response;
      try {
        response = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
      } catch (error) {
        lastError = new TransientHttpError(`Request failed: ${errorMessage(error)}`);
        logger.debug(`${method} ${url} failed: ${errorMessage(error)}`);
        if (method !== 'GET') {
          throw lastError;
        }
        continue;
      }

      logger.debug(`${method} ${url} -> ${response.status}`);

      if (RETRYABLE_STATUSES.has(response.status)) {
        lastError = new TransientHttpError(`HTTP ${response.status} after ${attempt} attempt(s)`, response.status);
        await response.body?.cancel();
        continue;
      }

      return response;
    }

    throw lastError ?? new TransientHttpError('No request attempts were made');
  }
}

export interface CreatePostOptions extends LinkedInClientOptions {
  visibility?: Visibility | string;
}

/**
 * Validate the token, publish `message` and fold every outcome into a
 * PostResult. Nothing is thrown.
 */
export async function createPost(
  accessToken: string,
  message: string,
  options: CreatePostOptions = {}
): Promise<PostResult> {
  try {
    const client = await LinkedInClient.connect(accessToken, options);
    const response = await client.createTextPost(message, options.visibility ?? 'PUBLIC');

    return {
      success: true,
      status: response.status,
      postId: response.postId,
      details: response.details,
    };
  } catch (error) {
    return {
      success: false,
      errorKind: classifyError(error),
      error: errorMessage(error),
    };
  }
}

/**
 * Anything that can take finished post text and report a PostResult
 */
export interface Publisher {
  publish(text: string): Promise<PostResult>;
}

export class LinkedInPublisher implements Publisher {
  constructor(
    private accessToken: string,
    private options: CreatePostOptions = {}
  ) {}

  publish(text: string): Promise<PostResult> {
    return createPost(this.accessToken, text, this.options);
  }
}
