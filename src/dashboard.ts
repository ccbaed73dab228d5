import type { AlarmMonitor } from './alarms';
import { displayCop, energyFlowFrom } from './analytics';
import type { AnalyticsEngine } from './analytics';
import type { DashboardSnapshot, TimeRange } from './types';

export type DashboardServices = {
  analytics: AnalyticsEngine;
  alarms: AlarmMonitor;
};

/** Everything the dashboard needs for one range, queried concurrently. */
export async function buildDashboard(
  services: DashboardServices,
  range: TimeRange,
  pricePerKwh: number,
  signal?: AbortSignal,
): Promise<DashboardSnapshot> {
  const { analytics, alarms } = services;
  const options = { signal };
  const [latest, minMax, cop, runtime, energy, hotWater, alarm] = await Promise.all([
    analytics.getLatestValues(range.end, options),
    analytics.getMinMaxValues(range, options),
    analytics.calculateCop(range, options),
    analytics.calculateRuntimeStats(range, options),
    analytics.calculateEnergyCosts(range, pricePerKwh, options),
    analytics.analyzeHotWaterCycles(range, options),
    alarms.getAlarmStatus(range.end, options),
  ]);
  const shownCop = displayCop(cop);

  return {
    range,
    latest,
    minMax,
    cop,
    displayCop: shownCop,
    runtime,
    energy,
    hotWater,
    energyFlow: energyFlowFrom(shownCop, runtime),
    alarm,
  };
}
