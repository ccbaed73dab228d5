import type { RegisterCatalog } from './lib/catalog';
import { DEFAULT_NORMALIZER_OPTIONS, normalizeValue } from './lib/normalize';
import type { NormalizerOptions } from './lib/normalize';
import { guardStorage, MEASUREMENT } from './storage';
import type { MetricStore } from './storage';
import type { MetricPoint } from './types';

export type IngestCounters = {
  accepted: number;
  unknown: number;
  rejected: number;
  failed: number;
  lastAcceptedAt: string | null;
};

export type PipelineOptions = {
  storageTimeoutMs?: number;
  normalizer?: NormalizerOptions;
};

export function registerIdFromTopic(topic: string): string | null {
  const segments = topic.split('/').filter((segment) => segment.trim().length > 0);
  const last = segments[segments.length - 1];
  return last ? last.trim().toUpperCase() : null;
}

/** Accepts `42.5` or `{"value": 42.5}` style payloads. */
export function payloadValue(payload: string | Uint8Array): string {
  const text = typeof payload === 'string' ? payload : Buffer.from(payload).toString('utf8');
  const trimmed = text.trim();
  if (!trimmed.startsWith('{')) {
    return trimmed;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (parsed && typeof parsed === 'object' && 'value' in parsed) {
      const value = parsed.value;
      if (typeof value === 'number' || typeof value === 'string') {
        return String(value);
      }
    }
  } catch (error) {
    console.debug('Payload is not JSON, treating as raw text', error instanceof Error ? error.message : error);
  }
  return trimmed;
}

/**
 * Turns raw register readings into canonical metric points and writes them.
 * At-most-once per arrival: a failed write is reported, never buffered.
 */
export class MetricPipeline {
  readonly #catalog: RegisterCatalog;
  readonly #store: MetricStore;
  readonly #timeoutMs: number;
  readonly #normalizer: NormalizerOptions;
  readonly #counters: IngestCounters = { accepted: 0, unknown: 0, rejected: 0, failed: 0, lastAcceptedAt: null };

  constructor(catalog: RegisterCatalog, store: MetricStore, options: PipelineOptions = {}) {
    this.#catalog = catalog;
    this.#store = store;
    this.#timeoutMs = options.storageTimeoutMs ?? 5000;
    this.#normalizer = options.normalizer ?? DEFAULT_NORMALIZER_OPTIONS;
  }

  get counters(): Readonly<IngestCounters> {
    return { ...this.#counters };
  }

  async ingest(registerId: string, rawValue: string, arrivalTime: Date): Promise<MetricPoint | null> {
    const id = registerId.trim().toUpperCase();
    const descriptor = this.#catalog.lookup(id);
    if (!descriptor) {
      this.#counters.unknown += 1;
      console.debug('Ignoring unknown register', id);
      return null;
    }

    const result = normalizeValue(descriptor.valueClass, rawValue, descriptor.hints, this.#normalizer);
    if (!result.ok) {
      this.#counters.rejected += 1;
      console.warn('Rejected register value', {
        registerId: id,
        logicalName: descriptor.logicalName,
        raw: rawValue,
        reason: result.reason,
      });
      return null;
    }

    const point: MetricPoint = Object.freeze({
      logicalName: descriptor.logicalName,
      valueClass: descriptor.valueClass,
      unit: descriptor.unit,
      value: result.value,
      timestamp: new Date(arrivalTime.getTime()),
    });

    try {
      await guardStorage(
        () =>
          this.#store.writePoint(
            MEASUREMENT,
            {
              register_id: descriptor.registerId,
              logical_name: descriptor.logicalName,
              value_class: descriptor.valueClass,
              ...(descriptor.unit ? { unit: descriptor.unit } : {}),
            },
            point.value,
            point.timestamp,
          ),
        { timeoutMs: this.#timeoutMs, label: 'write' },
      );
    } catch (error) {
      this.#counters.failed += 1;
      throw error;
    }

    this.#counters.accepted += 1;
    this.#counters.lastAcceptedAt = point.timestamp.toISOString();
    return point;
  }

  async handleMessage(topic: string, payload: string | Uint8Array, arrivalTime: Date): Promise<MetricPoint | null> {
    const registerId = registerIdFromTopic(topic);
    if (!registerId) {
      this.#counters.unknown += 1;
      console.debug('Ignoring message without register id', topic);
      return null;
    }
    return this.ingest(registerId, payloadValue(payload), arrivalTime);
  }
}
