import type { ProfileDescriptor } from './content.js';
import type { Visibility } from './linkedin.js';

export type LLMProvider = 'ollama' | 'anthropic';

export type LogLevel = 'info' | 'debug';

export interface SeopostConfig {
  llm: {
    provider: LLMProvider;
  };
  ollama?: {
    host: string;
    model: string;
    timeout?: number;
  };
  anthropic?: {
    apiKey?: string;
    model: string;
    maxTokens?: number;
  };
  generation: {
    temperature?: number;
    maxAttempts?: number;
  };
  linkedin: {
    baseUrl: string;
    apiVersion: string;
    visibility: Visibility;
    timeoutMs: number;
    debug?: boolean;
  };
  schedule: {
    cron: string;
    timezone: string;
  };
  server: {
    host: string;
    port: number;
  };
  records: {
    path: string;
  };
  logging: {
    dir: string;
  };
  profile?: ProfileDescriptor;
}

export const DEFAULT_CONFIG: SeopostConfig = {
  llm: {
    provider: 'ollama',
  },
  ollama: {
    host: 'http://127.0.0.1:11434',
    model: 'llama3.1',
    timeout: 60000,
  },
  anthropic: {
    model: 'claude-3-5-sonnet-20241022',
    maxTokens: 1024,
  },
  generation: {
    temperature: 0.7,
    maxAttempts: 3,
  },
  linkedin: {
    baseUrl: 'https://api.linkedin.com/v2',
    apiVersion: '202304',
    visibility: 'PUBLIC',
    timeoutMs: 30000,
    debug: false,
  },
  schedule: {
    // 10:00 every day
    cron: '0 10 * * *',
    timezone: 'UTC',
  },
  server: {
    host: '0.0.0.0',
    port: 5000,
  },
  records: {
    path: 'linkedin_posts_seo.json',
  },
  logging: {
    dir: 'logs',
  },
};

/**
 * Shape accepted in .seopostrc.json: any section, any subset of its fields
 */
export type SeopostConfigFile = {
  [K in keyof SeopostConfig]?: Partial<NonNullable<SeopostConfig[K]>>;
};
