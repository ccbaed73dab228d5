import { ConfigError } from './errors';
import { DEFAULT_CATALOG_DIR } from './lib/catalog';
import { DEFAULT_COP_MODEL } from './lib/math';
import type { CopModel } from './lib/math';
import { DEFAULT_NORMALIZER_OPTIONS } from './lib/normalize';
import type { NormalizerOptions } from './lib/normalize';
import { describeErrors, validateConfig } from './lib/schemas';
import type { Env } from './types/env';
import { preflight } from './utils/preflight';
import { parseLogLevel } from './utils/log-level';
import type { LogLevel } from './utils/log-level';

export type AppConfig = {
  brand: string;
  catalogDir: string;
  gatewayId: string;
  mqttUrl: string;
  mqttUsername?: string;
  mqttPassword?: string;
  mqttClientId: string;
  dbPath: string;
  httpPort: number;
  apiJwtSecret?: string;
  electricityPrice: number;
  updateIntervalSeconds: number;
  storageTimeoutMs: number;
  latestLookbackHours: number;
  alarmLookbackHours: number;
  hotWaterMinCycleSeconds: number;
  normalizer: NormalizerOptions;
  copModel: CopModel;
  logLevel: LogLevel;
};

function num(env: Env, key: keyof Env, fallback: number): number {
  const raw = env[key];
  if (raw == null || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${key} must be a number`, [key]);
  }
  return parsed;
}

const text = (value: string | undefined) => (value && value.trim() ? value.trim() : undefined);

/** Turns the raw environment into a validated configuration. Throws ConfigError on anything unusable. */
export function resolveConfig(env: Env): AppConfig {
  preflight(env);

  const gatewayId = text(env.GATEWAY_ID) ?? '';
  const config: AppConfig = {
    brand: (text(env.HEATPUMP_BRAND) ?? '').toLowerCase(),
    catalogDir: text(env.CATALOG_DIR) ?? DEFAULT_CATALOG_DIR,
    gatewayId,
    mqttUrl: text(env.MQTT_URL) ?? '',
    mqttUsername: text(env.MQTT_USERNAME),
    mqttPassword: text(env.MQTT_PASSWORD),
    mqttClientId: text(env.MQTT_CLIENT_ID) ?? `heatpump-collector-${gatewayId}`,
    dbPath: text(env.DB_PATH) ?? 'data/heatpump.sqlite',
    httpPort: num(env, 'HTTP_PORT', 8080),
    apiJwtSecret: text(env.API_JWT_SECRET),
    electricityPrice: num(env, 'ELECTRICITY_PRICE', 2.0),
    updateIntervalSeconds: num(env, 'UPDATE_INTERVAL_SECONDS', 30),
    storageTimeoutMs: num(env, 'STORAGE_TIMEOUT_MS', 5000),
    latestLookbackHours: num(env, 'LATEST_LOOKBACK_HOURS', 24),
    alarmLookbackHours: num(env, 'ALARM_LOOKBACK_HOURS', 24 * 7),
    hotWaterMinCycleSeconds: num(env, 'HOT_WATER_MIN_CYCLE_SECONDS', 60),
    normalizer: {
      ...DEFAULT_NORMALIZER_OPTIONS,
      wrapThreshold: num(env, 'TEMP_WRAP_THRESHOLD', DEFAULT_NORMALIZER_OPTIONS.wrapThreshold),
    },
    copModel: {
      ...DEFAULT_COP_MODEL,
      carnotEfficiency: num(env, 'COP_CARNOT_EFFICIENCY', DEFAULT_COP_MODEL.carnotEfficiency),
    },
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };

  if (!validateConfig(config)) {
    throw new ConfigError(`Invalid configuration: ${describeErrors(validateConfig.errors).join('; ')}`);
  }
  return config;
}

/** Copies the variables this service knows about out of a process environment. */
export function envFromProcess(source: NodeJS.ProcessEnv): Env {
  return {
    HEATPUMP_BRAND: source.HEATPUMP_BRAND,
    CATALOG_DIR: source.CATALOG_DIR,
    GATEWAY_ID: source.GATEWAY_ID,
    MQTT_URL: source.MQTT_URL,
    MQTT_USERNAME: source.MQTT_USERNAME,
    MQTT_PASSWORD: source.MQTT_PASSWORD,
    MQTT_CLIENT_ID: source.MQTT_CLIENT_ID,
    DB_PATH: source.DB_PATH,
    STORAGE_TIMEOUT_MS: source.STORAGE_TIMEOUT_MS,
    HTTP_PORT: source.HTTP_PORT,
    API_JWT_SECRET: source.API_JWT_SECRET,
    ELECTRICITY_PRICE: source.ELECTRICITY_PRICE,
    UPDATE_INTERVAL_SECONDS: source.UPDATE_INTERVAL_SECONDS,
    LATEST_LOOKBACK_HOURS: source.LATEST_LOOKBACK_HOURS,
    ALARM_LOOKBACK_HOURS: source.ALARM_LOOKBACK_HOURS,
    HOT_WATER_MIN_CYCLE_SECONDS: source.HOT_WATER_MIN_CYCLE_SECONDS,
    TEMP_WRAP_THRESHOLD: source.TEMP_WRAP_THRESHOLD,
    COP_CARNOT_EFFICIENCY: source.COP_CARNOT_EFFICIENCY,
    LOG_LEVEL: source.LOG_LEVEL,
  };
}
