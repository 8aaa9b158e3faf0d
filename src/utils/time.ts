import { DecodeError } from '../errors.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const HOUR_MS = 60 * 60 * 1000;

export const DAY_MS = 24 * HOUR_MS;

export function parseTimestamp(value: string, path: string = 'timestamp'): Date {
  // Date.parse only takes millisecond precision
  const parsed = Date.parse(value.replace(/(\.\d{3})\d+/, '$1'));
  if (Number.isNaN(parsed)) {
    throw new DecodeError(`${path} is not a valid timestamp: ${value}`, path);
  }

  return new Date(parsed);
}

export function describeAge(ageMs: number): string {
  if (ageMs < HOUR_MS) {
    return `${Math.max(0, Math.floor(ageMs / 60000))}m`;
  }

  const hours = Math.floor(ageMs / HOUR_MS);
  return hours < 48 ? `${hours}h` : `${Math.floor(hours / 24)}d`;
}
