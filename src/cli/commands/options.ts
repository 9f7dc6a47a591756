import { InvalidArgumentError } from 'commander';
import { MAX_AGE_YEARS } from '../../core/ledger/settings.js';

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive whole number.');
  }
  return n;
}

export function parseAge(value: string): number {
  const n = parsePositiveInt(value);
  if (n > MAX_AGE_YEARS) {
    throw new InvalidArgumentError(`Must be at most ${MAX_AGE_YEARS}.`);
  }
  return n;
}

export interface JsonOption {
  json?: boolean;
}
