import { existsSync, readFileSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import type { SeopostConfig, SeopostConfigFile } from '../types/config.js';
import type { ProfileDescriptor } from '../types/content.js';
import { DEFAULT_CONFIG } from '../types/config.js';
import { ConfigError, FileSystemError, errorMessage } from '../utils/errors.js';
import { validateConfig } from '../utils/validation.js';
import { DEFAULT_PROFILE } from './content-defaults.js';

export const CONFIG_FILENAME = '.seopostrc.json';

export type Env = Record<string, string | undefined>;

function mergeConfig(file: SeopostConfigFile): SeopostConfig {
  return {
    llm: { ...DEFAULT_CONFIG.llm, ...file.llm },
    ollama: DEFAULT_CONFIG.ollama && { ...DEFAULT_CONFIG.ollama, ...file.ollama },
    anthropic: DEFAULT_CONFIG.anthropic && { ...DEFAULT_CONFIG.anthropic, ...file.anthropic },
    generation: { ...DEFAULT_CONFIG.generation, ...file.generation },
    linkedin: { ...DEFAULT_CONFIG.linkedin, ...file.linkedin },
    schedule: { ...DEFAULT_CONFIG.schedule, ...file.schedule },
    server: { ...DEFAULT_CONFIG.server, ...file.server },
    records: { ...DEFAULT_CONFIG.records, ...file.records },
    logging: { ...DEFAULT_CONFIG.logging, ...file.logging },
    profile: file.profile && { ...DEFAULT_PROFILE, ...file.profile },
  };
}

function applyEnv(config: SeopostConfig, env: Env): SeopostConfig {
  const result = { ...config, server: { ...config.server }, linkedin: { ...config.linkedin } };

  if (env.PORT) {
    const port = Number.parseInt(env.PORT, 10);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError(`PORT must be a valid port number, got '${env.PORT}'`);
    }
    result.server.port = port;
  }
  if (env.HOST) {
    result.server.host = env.HOST;
  }
  if (env.SEOPOST_DEBUG === 'true' || env.SEOPOST_DEBUG === '1') {
    result.linkedin.debug = true;
  }

  return result;
}

/**
 * Defaults, overlaid with .seopostrc.json when present, overlaid with the
 * environment (PORT, HOST, SEOPOST_DEBUG).
 */
export function loadConfig(cwd: string = process.cwd(), env: Env = process.env): SeopostConfig {
  const configPath = join(cwd, CONFIG_FILENAME);
  let file: SeopostConfigFile = {};

  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new FileSystemError(`Failed to load config: ${errorMessage(error)}`);
    }

    if (!validateConfig(parsed)) {
      throw new ConfigError(`Invalid configuration format in ${CONFIG_FILENAME}`);
    }
    file = parsed;
  }

  const config = applyEnv(mergeConfig(file), env);
  // Relative paths are anchored at the project directory
  config.records = { path: resolve(cwd, config.records.path) };
  config.logging = { dir: resolve(cwd, config.logging.dir) };
  return config;
}

export function saveConfig(config: SeopostConfig, cwd: string = process.cwd()): void {
  const configPath = join(cwd, CONFIG_FILENAME);

  try {
    writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
  } catch (error) {
    throw new FileSystemError(`Failed to save config: ${errorMessage(error)}`);
  }
}

export function resolveProfile(config: SeopostConfig): ProfileDescriptor {
  return config.profile ?? DEFAULT_PROFILE;
}

export function getAccessToken(env: Env = process.env): string {
  const token = env.LINKEDIN_ACCESS_TOKEN;
  if (!token) {
    throw new ConfigError('LINKEDIN_ACCESS_TOKEN is not set. Add it to your .env file or environment.');
  }
  return token;
}
