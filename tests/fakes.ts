import { readFileSync } from 'node:fs';
import path from 'node:path';

import { DEFAULT_CATALOG_DIR, loadRegisterCatalog } from '../src/lib/catalog';
import type { RegisterCatalog } from '../src/lib/catalog';
import type { MetricStore } from '../src/storage';
import type { PointTags, SeriesSample } from '../src/types';

export const T0 = Date.UTC(2024, 0, 15, 0, 0, 0);
export const MINUTE = 60_000;
export const HOUR = 60 * MINUTE;

export function loadCatalog(brand: string): RegisterCatalog {
  const text = readFileSync(path.join(DEFAULT_CATALOG_DIR, `${brand}.json`), 'utf8');
  return loadRegisterCatalog(JSON.parse(text));
}

type StoredPoint = {
  measurement: string;
  tags: PointTags;
  value: number;
  timestamp: Date;
};

export class MemoryMetricStore implements MetricStore {
  readonly points: StoredPoint[] = [];
  queries = 0;
  failWith: Error | null = null;

  /** Adds samples given as `[offsetMs from T0, value]` pairs. */
  seed(logicalName: string, samples: Array<[number, number]>) {
    for (const [offset, value] of samples) {
      this.points.push({
        measurement: 'heatpump',
        tags: { register_id: logicalName, logical_name: logicalName, value_class: 'unknown' },
        value,
        timestamp: new Date(T0 + offset),
      });
    }
    return this;
  }

  async writePoint(measurement: string, tags: PointTags, value: number, timestamp: Date) {
    if (this.failWith) throw this.failWith;
    this.points.push({ measurement, tags, value, timestamp });
  }

  async queryRange(logicalNames: readonly string[], start: Date, end: Date): Promise<SeriesSample[]> {
    this.queries += 1;
    if (this.failWith) throw this.failWith;
    return this.points
      .filter(
        (p) =>
          logicalNames.includes(p.tags.logical_name) &&
          p.timestamp.getTime() >= start.getTime() &&
          p.timestamp.getTime() <= end.getTime(),
      )
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
      .map((p) => ({ logicalName: p.tags.logical_name, timestamp: p.timestamp, value: p.value }));
  }

  async queryLatest(logicalNames: readonly string[], since: Date, until: Date): Promise<SeriesSample[]> {
    const rows = await this.queryRange(logicalNames, since, until);
    const latest = new Map<string, SeriesSample>();
    for (const row of rows) {
      latest.set(row.logicalName, row);
    }
    return Array.from(latest.values());
  }
}

/** Store whose calls never settle, for timeout paths. */
export class HangingMetricStore implements MetricStore {
  writePoint(): Promise<void> {
    return new Promise<void>(() => {});
  }

  queryRange(): Promise<SeriesSample[]> {
    return new Promise<SeriesSample[]>(() => {});
  }

  queryLatest(): Promise<SeriesSample[]> {
    return new Promise<SeriesSample[]>(() => {});
  }
}
