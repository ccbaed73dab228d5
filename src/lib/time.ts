import type { TimeRange } from '../types';

export const SECOND_MS = 1000;
export const HOUR_MS = 3600 * SECOND_MS;
export const DAY_SECONDS = 86400;

export const RANGE_CONFIG = {
  '1h': { hours: 1 },
  '6h': { hours: 6 },
  '24h': { hours: 24 },
  '7d': { hours: 24 * 7 },
  '30d': { hours: 24 * 30 },
  '90d': { hours: 24 * 90 },
} as const;

export type RangeKey = keyof typeof RANGE_CONFIG;

const isRangeKey = (value: string): value is RangeKey => Object.hasOwn(RANGE_CONFIG, value);

export class InvalidRangeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRangeError';
  }
}

export function rangeEndingAt(end: Date, hours: number): TimeRange {
  return { start: new Date(end.getTime() - hours * HOUR_MS), end };
}

export function parseInstant(value: string): Date | null {
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * Resolves the dashboard range query. Either a named window (`24h`, `7d`, ...)
 * ending now, or an explicit ISO `start`/`end` pair.
 */
export function resolveRange(
  query: { range?: string; start?: string; end?: string },
  now: Date,
  fallback: RangeKey = '24h',
): TimeRange {
  if (query.start || query.end) {
    const start = query.start ? parseInstant(query.start) : null;
    const end = query.end ? parseInstant(query.end) : now;
    if (!start || !end) {
      throw new InvalidRangeError('start and end must be ISO-8601 instants');
    }
    if (end.getTime() <= start.getTime()) {
      throw new InvalidRangeError('end must be after start');
    }
    return { start, end };
  }

  const key = (query.range ?? fallback).toLowerCase();
  if (!isRangeKey(key)) {
    throw new InvalidRangeError(`range must be one of ${Object.keys(RANGE_CONFIG).join(', ')}`);
  }
  return rangeEndingAt(now, RANGE_CONFIG[key].hours);
}

export const rangeSeconds = (range: TimeRange) => (range.end.getTime() - range.start.getTime()) / SECOND_MS;
