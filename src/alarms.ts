import { METRICS } from './analytics';
import type { RegisterCatalog } from './lib/catalog';
import { groupByName } from './lib/series';
import type { Sample } from './lib/series';
import { HOUR_MS } from './lib/time';
import { guardStorage } from './storage';
import type { MetricStore } from './storage';
import type { AlarmStatus, EventKind, PumpEvent, QueryOptions, Severity } from './types';

export type AlarmOptions = {
  storageTimeoutMs: number;
  /** Window searched for the current alarm run. */
  alarmLookbackHours: number;
  eventLookbackHours: number;
};

export const DEFAULT_ALARM_OPTIONS: AlarmOptions = {
  storageTimeoutMs: 5000,
  alarmLookbackHours: 24 * 7,
  eventLookbackHours: 24,
};

const NO_ALARM: AlarmStatus = {
  active: false,
  code: null,
  description: null,
  activeSince: null,
  sinceTruncated: false,
  lastSeen: null,
};

type Transition = { from: number; to: number; t: number };

function transitions(samples: readonly Sample[], same: (a: number, b: number) => boolean): Transition[] {
  const result: Transition[] = [];
  for (let i = 1; i < samples.length; i += 1) {
    const previous = samples[i - 1];
    const current = samples[i];
    if (!previous || !current) continue;
    if (!same(previous.v, current.v)) {
      result.push({ from: previous.v, to: current.v, t: current.t });
    }
  }
  return result;
}

const sameState = (a: number, b: number) => a > 0 === b > 0;
const sameCode = (a: number, b: number) => a === b;

export class AlarmMonitor {
  readonly #store: MetricStore;
  readonly #catalog: RegisterCatalog;
  readonly #options: AlarmOptions;

  constructor(store: MetricStore, catalog: RegisterCatalog, options: Partial<AlarmOptions> = {}) {
    this.#store = store;
    this.#catalog = catalog;
    this.#options = { ...DEFAULT_ALARM_OPTIONS, ...options };
  }

  async #read(names: readonly string[], since: Date, until: Date, signal?: AbortSignal) {
    const rows = await guardStorage(() => this.#store.queryRange(names, since, until), {
      timeoutMs: this.#options.storageTimeoutMs,
      label: 'read',
      signal,
    });
    return groupByName(rows);
  }

  /**
   * Current alarm state. `activeSince` is the first sample of the trailing run
   * holding the current code, so callers can compute how long it has been active.
   */
  async getAlarmStatus(now: Date, options: QueryOptions = {}): Promise<AlarmStatus> {
    const names = this.#catalog.logicalNamesOf('alarm');
    if (names.length === 0) {
      return NO_ALARM;
    }
    const since = new Date(now.getTime() - this.#options.alarmLookbackHours * HOUR_MS);
    const series = await this.#read(names, since, now, options.signal);

    let samples: Sample[] = [];
    for (const candidate of series.values()) {
      const last = candidate[candidate.length - 1];
      const best = samples[samples.length - 1];
      if (last && (!best || last.t > best.t)) {
        samples = candidate;
      }
    }
    const last = samples[samples.length - 1];
    if (!last) {
      return NO_ALARM;
    }

    const code = last.v;
    const description = this.#catalog.alarmDescription(code);
    if (code === 0) {
      return { ...NO_ALARM, code, description, lastSeen: new Date(last.t) };
    }

    let first = samples.length - 1;
    while (first > 0 && samples[first - 1]?.v === code) {
      first -= 1;
    }
    const runStart = samples[first] ?? last;
    return {
      active: true,
      code,
      description: description ?? `Alarm ${code}`,
      activeSince: new Date(runStart.t),
      sinceTruncated: first === 0,
      lastSeen: new Date(last.t),
    };
  }

  /** State changes over the event window, newest first. */
  async getEventLog(now: Date, limit = 50, options: QueryOptions = {}): Promise<PumpEvent[]> {
    const alarmNames = this.#catalog.logicalNamesOf('alarm');
    const auxNames = this.#catalog.present(METRICS.aux);
    const names = this.#catalog.present([METRICS.compressor, METRICS.hotWater, ...auxNames, ...alarmNames]);
    const since = new Date(now.getTime() - this.#options.eventLookbackHours * HOUR_MS);
    const series = await this.#read(names, since, now, options.signal);

    const events: PumpEvent[] = [];
    const push = (t: number, kind: EventKind, message: string, severity: Severity) =>
      events.push({ time: new Date(t), kind, message, severity });

    for (const change of transitions(series.get(METRICS.compressor) ?? [], sameState)) {
      push(change.t, 'compressor', change.to > 0 ? 'Compressor started' : 'Compressor stopped', 'info');
    }
    for (const change of transitions(series.get(METRICS.hotWater) ?? [], sameState)) {
      push(change.t, 'hot_water', change.to > 0 ? 'Hot water cycle started' : 'Hot water cycle ended', 'info');
    }
    for (const name of auxNames) {
      const label = this.#catalog.describe(name)?.description ?? name;
      for (const change of transitions(series.get(name) ?? [], sameState)) {
        push(change.t, 'aux_heater', `${label} ${change.to > 0 ? 'on' : 'off'}`, change.to > 0 ? 'warning' : 'info');
      }
    }
    for (const name of alarmNames) {
      for (const change of transitions(series.get(name) ?? [], sameCode)) {
        if (change.to === 0) {
          push(change.t, 'alarm', 'Alarm cleared', 'info');
        } else {
          const description = this.#catalog.alarmDescription(change.to) ?? 'Unknown alarm';
          push(change.t, 'alarm', `Alarm ${change.to}: ${description}`, 'critical');
        }
      }
    }

    events.sort((a, b) => b.time.getTime() - a.time.getTime());
    return events.slice(0, Math.max(0, limit));
  }
}
