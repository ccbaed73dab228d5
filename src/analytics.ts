import type { RegisterCatalog } from './lib/catalog';
import {
  clamp,
  COP_FALLBACK,
  COP_PLAUSIBLE_MAX,
  COP_PLAUSIBLE_MIN,
  DEFAULT_COP_MODEL,
  estimateCop,
  mean,
  round1,
  round2,
} from './lib/math';
import type { CopModel } from './lib/math';
import {
  groupByName,
  insideIntervals,
  integrate,
  intervalSeconds,
  onIntervals,
  splitByBucket,
  toWindow,
  totalSeconds,
  unionIntervals,
} from './lib/series';
import type { Interval, Sample } from './lib/series';
import { DAY_SECONDS, HOUR_MS, InvalidRangeError, rangeSeconds } from './lib/time';
import { guardStorage } from './storage';
import type { MetricStore } from './storage';
import type {
  CopPoint,
  CopResult,
  DisplayCop,
  EnergyCost,
  EnergyFlow,
  HotWaterCycle,
  HotWaterStats,
  MinMax,
  QueryOptions,
  RuntimeStats,
  SeriesSample,
  TimeRange,
} from './types';

export const METRICS = {
  compressor: 'compressor_status',
  hotWater: 'switch_valve_status',
  power: 'power_consumption',
  energy: 'energy_accumulated',
  reportedCop: 'estimated_cop',
  forward: 'radiator_forward',
  brine: ['brine_in_evaporator', 'brine_out_condenser'],
  aux: ['aux_heater_status', 'additional_heat_percent', 'add_heat_step_1', 'add_heat_step_2'],
} as const;

export type AnalyticsOptions = {
  storageTimeoutMs: number;
  /** How far back `getLatestValues` looks before treating a metric as absent. */
  latestLookbackHours: number;
  /** Hot-water runs shorter than this are sensor glitches. */
  hotWaterMinCycleSeconds: number;
  copModel: CopModel;
  maxCopBuckets: number;
  minBucketSeconds: number;
};

export const DEFAULT_ANALYTICS_OPTIONS: AnalyticsOptions = {
  storageTimeoutMs: 5000,
  latestLookbackHours: 24,
  hotWaterMinCycleSeconds: 60,
  copModel: DEFAULT_COP_MODEL,
  maxCopBuckets: 96,
  minBucketSeconds: 300,
};

const WATT_SECONDS_PER_KWH = 3_600_000;

const percentOf = (part: number, whole: number) => (whole > 0 ? clamp((part / whole) * 100, 0, 100) : 0);

/** Substitutes the documented fallback when the measured mean is missing or implausible. */
export function displayCop(result: CopResult): DisplayCop {
  const average = result.average;
  if (average == null || average < COP_PLAUSIBLE_MIN || average > COP_PLAUSIBLE_MAX) {
    return { value: result.fallback, estimated: true };
  }
  return { value: average, estimated: result.series.some((point) => point.quality === 'estimated') };
}

export class AnalyticsEngine {
  readonly #store: MetricStore;
  readonly #catalog: RegisterCatalog;
  readonly #options: AnalyticsOptions;

  constructor(store: MetricStore, catalog: RegisterCatalog, options: Partial<AnalyticsOptions> = {}) {
    this.#store = store;
    this.#catalog = catalog;
    this.#options = { ...DEFAULT_ANALYTICS_OPTIONS, ...options };
  }

  async #series(names: readonly string[], range: TimeRange, signal?: AbortSignal): Promise<Map<string, Sample[]>> {
    const present = this.#catalog.present(names);
    const rows = await guardStorage(() => this.#store.queryRange(present, range.start, range.end), {
      timeoutMs: this.#options.storageTimeoutMs,
      label: 'read',
      signal,
    });
    return groupByName(rows);
  }

  defaultBucketSeconds(range: TimeRange): number {
    const seconds = rangeSeconds(range);
    return Math.max(this.#options.minBucketSeconds, Math.ceil(seconds / this.#options.maxCopBuckets));
  }

  /** Requested bucket size, widened so the range never splits into more than `maxCopBuckets`. */
  bucketSecondsFor(range: TimeRange, requested?: number): number {
    if (requested === undefined) {
      return this.defaultBucketSeconds(range);
    }
    if (!Number.isFinite(requested) || requested <= 0) {
      throw new InvalidRangeError('bucket must be a positive number of seconds');
    }
    return Math.max(requested, Math.ceil(rangeSeconds(range) / this.#options.maxCopBuckets));
  }

  async calculateCop(range: TimeRange, options: QueryOptions = {}): Promise<CopResult> {
    const bucketMs = this.bucketSecondsFor(range, options.bucketSeconds) * 1000;
    const series = await this.#series(
      [METRICS.reportedCop, METRICS.forward, ...METRICS.brine, METRICS.compressor],
      range,
      options.signal,
    );
    const window = toWindow(range);
    const buckets: Interval[] = [];
    for (let start = window.start; start < window.end; start += bucketMs) {
      buckets.push({ start, end: Math.min(start + bucketMs, window.end) });
    }

    const compressor = series.get(METRICS.compressor);
    const running = compressor ? onIntervals(compressor, window) : null;
    const whileRunning = (samples: readonly Sample[]) => (running ? insideIntervals(samples, running) : samples);
    const reported = splitByBucket(series.get(METRICS.reportedCop) ?? [], buckets);
    const forward = splitByBucket(whileRunning(series.get(METRICS.forward) ?? []), buckets);
    const brine = METRICS.brine.map((name) => splitByBucket(whileRunning(series.get(name) ?? []), buckets));
    const valuesOf = (samples: readonly Sample[] | undefined) => (samples ?? []).map((sample) => sample.v);

    const points: CopPoint[] = [];
    buckets.forEach((bucket, index) => {
      const measured = mean(valuesOf(reported[index]).filter((value) => value > 0));
      if (measured != null) {
        points.push({ start: new Date(bucket.start), end: new Date(bucket.end), cop: round2(measured), quality: 'measured' });
        return;
      }

      const hot = mean(valuesOf(forward[index]));
      const cold = mean(
        brine.map((split) => mean(valuesOf(split[index]))).filter((value): value is number => value != null),
      );
      if (hot != null && cold != null) {
        points.push({
          start: new Date(bucket.start),
          end: new Date(bucket.end),
          cop: estimateCop(hot, cold, this.#options.copModel),
          quality: 'estimated',
        });
      }
    });

    const average = mean(points.map((point) => point.cop));
    return {
      series: points,
      average: average == null ? null : round2(average),
      noData: points.length === 0,
      fallback: COP_FALLBACK,
    };
  }

  async calculateRuntimeStats(range: TimeRange, options: QueryOptions = {}): Promise<RuntimeStats> {
    const series = await this.#series([METRICS.compressor, ...METRICS.aux], range, options.signal);
    const window = toWindow(range);
    const elapsedSeconds = rangeSeconds(range);

    const compressorOn = onIntervals(series.get(METRICS.compressor) ?? [], window);
    const auxOn = unionIntervals(...METRICS.aux.map((name) => onIntervals(series.get(name) ?? [], window)));
    const activeOn = unionIntervals(compressorOn, auxOn);

    const compressorSeconds = totalSeconds(compressorOn);
    const auxHeaterSeconds = totalSeconds(auxOn);
    const activeSeconds = totalSeconds(activeOn);
    const activePercent = round2(percentOf(activeSeconds, elapsedSeconds));
    let samples = 0;
    for (const group of series.values()) {
      samples += group.length;
    }

    return {
      elapsedSeconds,
      compressorSeconds,
      auxHeaterSeconds,
      activeSeconds,
      compressorHours: round2(compressorSeconds / 3600),
      auxHeaterHours: round2(auxHeaterSeconds / 3600),
      compressorPercent: round2(percentOf(compressorSeconds, elapsedSeconds)),
      auxHeaterPercent: round2(percentOf(auxHeaterSeconds, elapsedSeconds)),
      activePercent,
      inactivePercent: round2(100 - activePercent),
      samples,
    };
  }

  async calculateEnergyCosts(range: TimeRange, pricePerKwh: number, options: QueryOptions = {}): Promise<EnergyCost> {
    const series = await this.#series([METRICS.power, METRICS.energy], range, options.signal);
    const window = toWindow(range);
    const elapsedSeconds = rangeSeconds(range);
    const price = Number.isFinite(pricePerKwh) && pricePerKwh > 0 ? pricePerKwh : 0;
    const power = series.get(METRICS.power) ?? [];
    const counter = series.get(METRICS.energy) ?? [];

    let kwh = 0;
    let peakPowerW: number | null = null;
    let source: EnergyCost['source'] = 'none';

    if (power.length > 0) {
      kwh = integrate(power, window) / WATT_SECONDS_PER_KWH;
      peakPowerW = power.reduce((peak, sample) => (Number.isFinite(sample.v) ? Math.max(peak, sample.v) : peak), 0);
      source = 'power';
    } else if (counter.length > 1) {
      for (let i = 1; i < counter.length; i += 1) {
        const previous = counter[i - 1];
        const current = counter[i];
        if (!previous || !current) continue;
        const delta = current.v - previous.v;
        // A drop means the counter was reset; the next deltas continue from the new base.
        if (delta > 0) kwh += delta;
      }
      source = 'energy_counter';
    }

    const averagePowerW = elapsedSeconds > 0 ? (kwh * WATT_SECONDS_PER_KWH) / elapsedSeconds : 0;
    return {
      totalKwh: round2(kwh),
      totalCost: round2(kwh * price),
      pricePerKwh: price,
      averagePowerW: round1(averagePowerW),
      peakPowerW: peakPowerW == null ? null : round1(peakPowerW),
      source,
    };
  }

  async analyzeHotWaterCycles(
    range: TimeRange,
    options: QueryOptions & { minCycleSeconds?: number } = {},
  ): Promise<HotWaterStats> {
    const minCycleSeconds = options.minCycleSeconds ?? this.#options.hotWaterMinCycleSeconds;
    const series = await this.#series([METRICS.hotWater, METRICS.power], range, options.signal);
    const window = toWindow(range);
    const power = series.get(METRICS.power) ?? [];

    const cycles: HotWaterCycle[] = onIntervals(series.get(METRICS.hotWater) ?? [], window)
      .filter((interval) => intervalSeconds(interval) >= minCycleSeconds)
      .map((interval) => ({
        start: new Date(interval.start),
        end: new Date(interval.end),
        durationSeconds: intervalSeconds(interval),
        energyKwh: round2(integrate(power, window, interval) / WATT_SECONDS_PER_KWH),
      }));

    const days = rangeSeconds(range) / DAY_SECONDS;
    const avgDuration = mean(cycles.map((cycle) => cycle.durationSeconds));
    const avgEnergy = mean(cycles.map((cycle) => cycle.energyKwh));
    return {
      cycles,
      totalCycles: cycles.length,
      cyclesPerDay: days > 0 ? round2(cycles.length / days) : 0,
      avgDurationMinutes: avgDuration == null ? 0 : round1(avgDuration / 60),
      avgEnergyPerCycleKwh: avgEnergy == null ? 0 : round2(avgEnergy),
      minCycleSeconds,
    };
  }

  async getLatestValues(now: Date, options: QueryOptions = {}): Promise<Record<string, SeriesSample>> {
    const names = this.#catalog.allDescriptors().map((descriptor) => descriptor.logicalName);
    const since = new Date(now.getTime() - this.#options.latestLookbackHours * HOUR_MS);
    const rows = await guardStorage(() => this.#store.queryLatest(names, since, now), {
      timeoutMs: this.#options.storageTimeoutMs,
      label: 'read',
      signal: options.signal,
    });
    const latest: Record<string, SeriesSample> = {};
    for (const row of rows) {
      latest[row.logicalName] = row;
    }
    return latest;
  }

  async getMinMaxValues(range: TimeRange, options: QueryOptions = {}): Promise<Record<string, MinMax>> {
    const names = this.#catalog.allDescriptors().map((descriptor) => descriptor.logicalName);
    const series = await this.#series(names, range, options.signal);
    const result: Record<string, MinMax> = {};
    for (const [name, samples] of series) {
      let min = Number.POSITIVE_INFINITY;
      let max = Number.NEGATIVE_INFINITY;
      for (const sample of samples) {
        min = Math.min(min, sample.v);
        max = Math.max(max, sample.v);
      }
      if (samples.length > 0) {
        result[name] = { min, max };
      }
    }
    return result;
  }

  /** Raw samples for charting. Names the pump does not report are skipped. */
  async getSeries(
    names: readonly string[],
    range: TimeRange,
    options: QueryOptions = {},
  ): Promise<Record<string, Array<{ timestamp: Date; value: number }>>> {
    const series = await this.#series(names, range, options.signal);
    const result: Record<string, Array<{ timestamp: Date; value: number }>> = {};
    for (const [name, samples] of series) {
      result[name] = samples.map((sample) => ({ timestamp: new Date(sample.t), value: sample.v }));
    }
    return result;
  }

  async calculateEnergyFlow(range: TimeRange, options: QueryOptions = {}): Promise<EnergyFlow> {
    const [cop, runtime] = await Promise.all([
      this.calculateCop(range, options),
      this.calculateRuntimeStats(range, options),
    ]);
    return energyFlowFrom(displayCop(cop), runtime);
  }
}

/** Energy balance per 100 units of electricity, for the flow diagram. */
export function energyFlowFrom(cop: DisplayCop, runtime: RuntimeStats): EnergyFlow {
  const electricUnits = 100;
  const groundUnits = round1(electricUnits * (cop.value - 1));
  const auxUnits = runtime.auxHeaterPercent > 0 ? round1((runtime.auxHeaterPercent / 100) * 50) : 0;
  const deliveredUnits = round1(electricUnits + groundUnits + auxUnits);
  return {
    cop,
    electricUnits,
    groundUnits,
    auxUnits,
    deliveredUnits,
    freeEnergyPercent: deliveredUnits > 0 ? round1((groundUnits / deliveredUnits) * 100) : 0,
  };
}
