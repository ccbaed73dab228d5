import type { SeriesSample, TimeRange } from '../types';
import { SECOND_MS } from './time';

/**
 * Time-series helpers shared by the analytics engine.
 *
 * Every integral here uses the same left-rectangle (sample-and-hold) rule:
 * a sample's value holds from its timestamp until the next sample of the
 * same series, or until the range end for the last one. Time before the
 * first sample in range contributes nothing.
 */

export type Sample = { t: number; v: number };
export type Interval = { start: number; end: number };

export const toWindow = (range: TimeRange): Interval => ({
  start: range.start.getTime(),
  end: range.end.getTime(),
});

export const intervalSeconds = (interval: Interval) => Math.max(0, interval.end - interval.start) / SECOND_MS;

export const totalSeconds = (intervals: readonly Interval[]) =>
  intervals.reduce((sum, interval) => sum + intervalSeconds(interval), 0);

export function toSamples(series: readonly SeriesSample[]): Sample[] {
  return series
    .map((point) => ({ t: point.timestamp.getTime(), v: point.value }))
    .sort((a, b) => a.t - b.t);
}

/** Groups query rows by logical name, each group sorted by time. */
export function groupByName(rows: readonly SeriesSample[]): Map<string, Sample[]> {
  const grouped = new Map<string, SeriesSample[]>();
  for (const row of rows) {
    const bucket = grouped.get(row.logicalName);
    if (bucket) {
      bucket.push(row);
    } else {
      grouped.set(row.logicalName, [row]);
    }
  }
  const result = new Map<string, Sample[]>();
  for (const [name, samples] of grouped) {
    result.set(name, toSamples(samples));
  }
  return result;
}

function forEachHeld(samples: readonly Sample[], window: Interval, visit: (held: Interval, value: number) => void) {
  for (let i = 0; i < samples.length; i += 1) {
    const sample = samples[i];
    const next = samples[i + 1];
    if (!sample) continue;
    const start = Math.max(sample.t, window.start);
    const end = Math.min(next ? next.t : window.end, window.end);
    if (end <= start) continue;
    visit({ start, end }, sample.v);
  }
}

/** Contiguous intervals during which `isOn` holds for the held value. */
export function onIntervals(
  samples: readonly Sample[],
  window: Interval,
  isOn: (value: number) => boolean = (value) => value > 0,
): Interval[] {
  const intervals: Interval[] = [];
  let current: Interval | null = null;
  forEachHeld(samples, window, (held, value) => {
    if (isOn(value)) {
      if (current && current.end === held.start) {
        current.end = held.end;
      } else {
        current = { ...held };
        intervals.push(current);
      }
    } else {
      current = null;
    }
  });
  return intervals;
}

export function unionIntervals(...groups: ReadonlyArray<readonly Interval[]>): Interval[] {
  const all = groups.flat().map((interval) => ({ ...interval }));
  all.sort((a, b) => a.start - b.start);
  const merged: Interval[] = [];
  for (const interval of all) {
    const last = merged[merged.length - 1];
    if (last && interval.start <= last.end) {
      last.end = Math.max(last.end, interval.end);
    } else {
      merged.push(interval);
    }
  }
  return merged;
}

/** Value-seconds of the held series inside `window`. Negative or non-finite values count as zero. */
export function integrate(samples: readonly Sample[], range: Interval, window: Interval = range): number {
  const bounded: Interval = { start: Math.max(range.start, window.start), end: Math.min(range.end, window.end) };
  let total = 0;
  for (let i = 0; i < samples.length; i += 1) {
    const sample = samples[i];
    const next = samples[i + 1];
    if (!sample) continue;
    const holdEnd = Math.min(next ? next.t : range.end, range.end);
    const start = Math.max(sample.t, bounded.start);
    const end = Math.min(holdEnd, bounded.end);
    if (end <= start) continue;
    const value = Number.isFinite(sample.v) && sample.v > 0 ? sample.v : 0;
    total += value * ((end - start) / SECOND_MS);
  }
  return total;
}

/** Samples that fall inside one of the sorted, disjoint `intervals` (start-inclusive, end-exclusive). */
export function insideIntervals(samples: readonly Sample[], intervals: readonly Interval[]): Sample[] {
  const kept: Sample[] = [];
  let index = 0;
  for (const sample of samples) {
    let interval = intervals[index];
    while (interval && interval.end <= sample.t) {
      index += 1;
      interval = intervals[index];
    }
    if (!interval) break;
    if (sample.t >= interval.start) kept.push(sample);
  }
  return kept;
}

/** Splits sorted samples across sorted, disjoint buckets in a single pass. */
export function splitByBucket(samples: readonly Sample[], buckets: readonly Interval[]): Sample[][] {
  const result: Sample[][] = [];
  let index = 0;
  for (const bucket of buckets) {
    const inBucket: Sample[] = [];
    let sample = samples[index];
    while (sample && sample.t < bucket.end) {
      if (sample.t >= bucket.start) inBucket.push(sample);
      index += 1;
      sample = samples[index];
    }
    result.push(inBucket);
  }
  return result;
}
