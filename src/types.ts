export type ValueClass =
  | 'temperature'
  | 'status'
  | 'power'
  | 'energy'
  | 'percentage'
  | 'setting'
  | 'alarm'
  | 'runtime'
  | 'unknown';

export const VALUE_CLASSES: readonly ValueClass[] = [
  'temperature',
  'status',
  'power',
  'energy',
  'percentage',
  'setting',
  'alarm',
  'runtime',
  'unknown',
];

export type DecodingHints = {
  /** Multiplier applied to the parsed raw value before class rules (e.g. 0.1 for COP x10 registers). */
  scale?: number;
};

export type RegisterDescriptor = {
  readonly registerId: string;
  readonly logicalName: string;
  readonly unit: string;
  readonly valueClass: ValueClass;
  readonly description: string;
  readonly hints?: Readonly<DecodingHints>;
};

export type MetricPoint = {
  readonly logicalName: string;
  readonly valueClass: ValueClass;
  readonly unit: string;
  readonly value: number;
  readonly timestamp: Date;
};

export type PointTags = {
  register_id: string;
  logical_name: string;
  value_class: ValueClass;
  unit?: string;
};

export type SeriesSample = {
  logicalName: string;
  timestamp: Date;
  value: number;
};

export type PumpCapabilities = {
  hasPowerMeasurement: boolean;
  hasEnergyMeasurement: boolean;
  hasHeatCarrierSensors: boolean;
  hasSeparateHeaterSteps: boolean;
  hasDetailedRuntime: boolean;
  hasExternalTankSensor: boolean;
  hasHotWaterIndicator: boolean;
  hasAlarm: boolean;
};

export type PumpMetadata = {
  brand: string;
  model: string;
  displayName: string;
};

export type TimeRange = {
  start: Date;
  end: Date;
};

export type QueryOptions = {
  signal?: AbortSignal;
  bucketSeconds?: number;
};

export type CopQuality = 'measured' | 'estimated';

export type CopPoint = {
  start: Date;
  end: Date;
  cop: number;
  quality: CopQuality;
};

export type CopResult = {
  series: CopPoint[];
  average: number | null;
  noData: boolean;
  fallback: number;
};

export type DisplayCop = {
  value: number;
  estimated: boolean;
};

export type RuntimeStats = {
  elapsedSeconds: number;
  compressorSeconds: number;
  auxHeaterSeconds: number;
  activeSeconds: number;
  compressorHours: number;
  auxHeaterHours: number;
  compressorPercent: number;
  auxHeaterPercent: number;
  activePercent: number;
  inactivePercent: number;
  samples: number;
};

export type EnergySource = 'power' | 'energy_counter' | 'none';

export type EnergyCost = {
  totalKwh: number;
  totalCost: number;
  pricePerKwh: number;
  averagePowerW: number;
  peakPowerW: number | null;
  source: EnergySource;
};

export type HotWaterCycle = {
  start: Date;
  end: Date;
  durationSeconds: number;
  energyKwh: number;
};

export type HotWaterStats = {
  cycles: HotWaterCycle[];
  totalCycles: number;
  cyclesPerDay: number;
  avgDurationMinutes: number;
  avgEnergyPerCycleKwh: number;
  minCycleSeconds: number;
};

export type MinMax = {
  min: number;
  max: number;
};

export type EnergyFlow = {
  cop: DisplayCop;
  electricUnits: number;
  groundUnits: number;
  auxUnits: number;
  deliveredUnits: number;
  freeEnergyPercent: number;
};

export type AlarmStatus = {
  active: boolean;
  code: number | null;
  description: string | null;
  activeSince: Date | null;
  sinceTruncated: boolean;
  lastSeen: Date | null;
};

export type EventKind = 'compressor' | 'aux_heater' | 'hot_water' | 'alarm';
export type Severity = 'info' | 'warning' | 'critical';

export type PumpEvent = {
  time: Date;
  kind: EventKind;
  message: string;
  severity: Severity;
};

export type DashboardSnapshot = {
  range: TimeRange;
  latest: Record<string, SeriesSample>;
  minMax: Record<string, MinMax>;
  cop: CopResult;
  displayCop: DisplayCop;
  runtime: RuntimeStats;
  energy: EnergyCost;
  hotWater: HotWaterStats;
  energyFlow: EnergyFlow;
  alarm: AlarmStatus;
};
