import { VISIBILITIES } from '../types/linkedin.js';
import type { SeopostConfigFile } from '../types/config.js';

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isPositiveNumber(value: unknown): boolean {
  return typeof value === 'number' && value > 0;
}

function isNonEmptyStringArray(value: unknown): boolean {
  return isStringArray(value) && value.length > 0;
}

function optionalSection(c: Fields, key: string, check: (section: Fields) => boolean): boolean {
  if (c[key] === undefined) return true;
  const section = c[key];
  return isRecord(section) && check(section);
}

/**
 * Structural check of a parsed .seopostrc.json. Every section is optional;
 * whatever is present must have the right shape.
 */
export function validateConfig(config: unknown): config is SeopostConfigFile {
  if (!isRecord(config)) {
    return false;
  }

  const c = config;

  const llm = c.llm;
  if (llm !== undefined) {
    if (!isRecord(llm)) return false;
    const provider = llm.provider;
    if (typeof provider !== 'string' || !['ollama', 'anthropic'].includes(provider)) {
      return false;
    }
  }

  return (
    optionalSection(
      c,
      'ollama',
      (s) =>
        typeof s.host === 'string' &&
        typeof s.model === 'string' &&
        (s.timeout === undefined || isPositiveNumber(s.timeout))
    ) &&
    optionalSection(c, 'anthropic', (s) => typeof s.model === 'string') &&
    optionalSection(
      c,
      'generation',
      (s) =>
        (s.temperature === undefined || typeof s.temperature === 'number') &&
        (s.maxAttempts === undefined || (Number.isInteger(s.maxAttempts) && Number(s.maxAttempts) > 0))
    ) &&
    optionalSection(
      c,
      'linkedin',
      (s) =>
        (s.visibility === undefined || VISIBILITIES.some((v) => v === s.visibility)) &&
        (s.timeoutMs === undefined || isPositiveNumber(s.timeoutMs))
    ) &&
    optionalSection(c, 'schedule', (s) => s.cron === undefined || typeof s.cron === 'string') &&
    optionalSection(c, 'server', (s) => s.port === undefined || Number.isInteger(s.port)) &&
    optionalSection(c, 'records', (s) => s.path === undefined || typeof s.path === 'string') &&
    optionalSection(c, 'logging', (s) => s.dir === undefined || typeof s.dir === 'string') &&
    optionalSection(
      c,
      'profile',
      (s) =>
        typeof s.name === 'string' &&
        typeof s.pronouns === 'string' &&
        typeof s.title === 'string' &&
        typeof s.profileUrl === 'string' &&
        isStringArray(s.skills) &&
        isNonEmptyStringArray(s.primaryKeywords)
    )
  );
}
