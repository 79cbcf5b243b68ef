import { InvalidArgumentError } from 'commander';
import { VISIBILITIES, type Visibility } from '../types/linkedin.js';
import { isVisibility } from '../services/linkedin-api.js';

// Option parsers; commander reports their errors before any command runs

export function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseVisibility(value: string): Visibility {
  const normalized = value.toUpperCase();
  if (!isVisibility(normalized)) {
    throw new InvalidArgumentError(`Must be one of: ${VISIBILITIES.join(', ')}.`);
  }
  return normalized;
}
