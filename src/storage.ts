import { AnalyticsAbortedError, StorageUnavailableError } from './errors';
import type { Database } from './lib/db';
import { TimeoutError, withTimeout } from './lib/timeout';
import type { PointTags, SeriesSample } from './types';

export const MEASUREMENT = 'heatpump';

export interface MetricStore {
  writePoint(measurement: string, tags: PointTags, value: number, timestamp: Date): Promise<void>;
  /** Samples for the given logical names with `start <= timestamp <= end`, ordered by timestamp. */
  queryRange(logicalNames: readonly string[], start: Date, end: Date): Promise<SeriesSample[]>;
  /** Most recent sample per logical name with `since <= timestamp <= until`. */
  queryLatest(logicalNames: readonly string[], since: Date, until: Date): Promise<SeriesSample[]>;
}

type MetricRow = {
  logical_name: string;
  ts_ms: number;
  value: number;
};

const placeholders = (count: number) => Array.from({ length: count }, () => '?').join(',');

const toSample = (row: MetricRow): SeriesSample => ({
  logicalName: row.logical_name,
  timestamp: new Date(row.ts_ms),
  value: row.value,
});

export class SqliteMetricStore implements MetricStore {
  readonly #db: Database;

  constructor(db: Database) {
    this.#db = db;
  }

  async writePoint(measurement: string, tags: PointTags, value: number, timestamp: Date): Promise<void> {
    await this.#db
      .prepare(
        `INSERT INTO metrics (measurement, register_id, logical_name, value_class, unit, value, ts_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .bind(
        measurement,
        tags.register_id,
        tags.logical_name,
        tags.value_class,
        tags.unit ? tags.unit : null,
        value,
        timestamp.getTime(),
      )
      .run();
  }

  async queryRange(logicalNames: readonly string[], start: Date, end: Date): Promise<SeriesSample[]> {
    if (logicalNames.length === 0) {
      return [];
    }
    const rows = await this.#db
      .prepare(
        `SELECT logical_name, ts_ms, value
           FROM metrics
          WHERE logical_name IN (${placeholders(logicalNames.length)})
            AND ts_ms >= ? AND ts_ms <= ?
          ORDER BY ts_ms ASC, id ASC`,
      )
      .bind(...logicalNames, start.getTime(), end.getTime())
      .all<MetricRow>();
    return rows.results.map(toSample);
  }

  async queryLatest(logicalNames: readonly string[], since: Date, until: Date): Promise<SeriesSample[]> {
    if (logicalNames.length === 0) {
      return [];
    }
    // SQLite returns the bare columns from the row holding MAX(ts_ms).
    const rows = await this.#db
      .prepare(
        `SELECT logical_name, MAX(ts_ms) AS ts_ms, value
           FROM metrics
          WHERE logical_name IN (${placeholders(logicalNames.length)})
            AND ts_ms >= ? AND ts_ms <= ?
          GROUP BY logical_name`,
      )
      .bind(...logicalNames, since.getTime(), until.getTime())
      .all<MetricRow>();
    return rows.results.map(toSample);
  }
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AnalyticsAbortedError();
  }
}

/**
 * Runs a storage call under a timeout. Any failure surfaces as a retryable
 * StorageUnavailableError; aborts surface as AnalyticsAbortedError.
 */
export async function guardStorage<T>(
  work: () => Promise<T>,
  options: { timeoutMs: number; label: string; signal?: AbortSignal },
): Promise<T> {
  throwIfAborted(options.signal);
  let result: T;
  try {
    result = await withTimeout(work(), options.timeoutMs, options.label);
  } catch (error) {
    if (error instanceof StorageUnavailableError) {
      throw error;
    }
    const reason = error instanceof TimeoutError ? 'timed out' : 'failed';
    throw new StorageUnavailableError(`Storage ${options.label} ${reason}`, { cause: error });
  }
  throwIfAborted(options.signal);
  return result;
}
