import assert from 'node:assert/strict';
import test from 'node:test';

import { resolveConfig } from '../src/config';
import { ConfigError } from '../src/errors';
import { DEFAULT_COP_MODEL } from '../src/lib/math';
import { DEFAULT_NORMALIZER_OPTIONS } from '../src/lib/normalize';
import { InvalidRangeError, resolveRange } from '../src/lib/time';
import { applyLogLevel, parseLogLevel } from '../src/utils/log-level';
import { preflight } from '../src/utils/preflight';

const baseEnv = { HEATPUMP_BRAND: ' NIBE ', GATEWAY_ID: 'gw-1', MQTT_URL: 'mqtt://broker.local:1883' };

test('preflight lists every missing variable', () => {
  assert.throws(
    () => preflight({}),
    (error: unknown) =>
      error instanceof ConfigError &&
      error.message === 'Preflight failed: missing PROFILE:HEATPUMP_BRAND, MQTT:GATEWAY_ID, MQTT:MQTT_URL' &&
      error.missing.length === 3,
  );
});

test('a broker username needs a password', () => {
  assert.throws(
    () => preflight({ ...baseEnv, MQTT_USERNAME: 'collector' }),
    (error: unknown) => error instanceof ConfigError && error.missing.join() === 'MQTT:MQTT_PASSWORD',
  );
  assert.doesNotThrow(() => preflight({ ...baseEnv, MQTT_USERNAME: 'collector', MQTT_PASSWORD: 'test-secret' }));
});

test('defaults fill everything that is not required', () => {
  const config = resolveConfig(baseEnv);

  assert.equal(config.brand, 'nibe');
  assert.equal(config.gatewayId, 'gw-1');
  assert.equal(config.mqttClientId, 'heatpump-collector-gw-1');
  assert.equal(config.dbPath, 'data/heatpump.sqlite');
  assert.equal(config.httpPort, 8080);
  assert.equal(config.electricityPrice, 2);
  assert.equal(config.updateIntervalSeconds, 30);
  assert.equal(config.storageTimeoutMs, 5000);
  assert.equal(config.latestLookbackHours, 24);
  assert.equal(config.alarmLookbackHours, 168);
  assert.equal(config.hotWaterMinCycleSeconds, 60);
  assert.equal(config.apiJwtSecret, undefined);
  assert.equal(config.logLevel, 'info');
  assert.deepEqual(config.normalizer, DEFAULT_NORMALIZER_OPTIONS);
  assert.deepEqual(config.copModel, DEFAULT_COP_MODEL);
});

test('numeric overrides are parsed', () => {
  const config = resolveConfig({
    ...baseEnv,
    HTTP_PORT: '9090',
    ELECTRICITY_PRICE: '1.25',
    UPDATE_INTERVAL_SECONDS: '10',
    TEMP_WRAP_THRESHOLD: '40000',
    COP_CARNOT_EFFICIENCY: '0.5',
    LOG_LEVEL: 'DEBUG',
  });
  assert.equal(config.httpPort, 9090);
  assert.equal(config.electricityPrice, 1.25);
  assert.equal(config.updateIntervalSeconds, 10);
  assert.equal(config.normalizer.wrapThreshold, 40000);
  assert.equal(config.copModel.carnotEfficiency, 0.5);
  assert.equal(config.logLevel, 'debug');
});

test('non-numeric numbers are rejected by name', () => {
  assert.throws(() => resolveConfig({ ...baseEnv, HTTP_PORT: 'eighty' }), {
    name: 'ConfigError',
    message: 'HTTP_PORT must be a number',
  });
});

test('schema validation rejects unusable values', () => {
  const invalid = [
    { MQTT_URL: 'http://broker.local' },
    { MQTT_URL: 'mqtt://broker local:1883' },
    { GATEWAY_ID: 'gw/1' },
    { HTTP_PORT: '70000' },
    { ELECTRICITY_PRICE: '-1' },
    { STORAGE_TIMEOUT_MS: '0' },
    { UPDATE_INTERVAL_SECONDS: '0' },
  ];
  for (const override of invalid) {
    assert.throws(
      () => resolveConfig({ ...baseEnv, ...override }),
      (error: unknown) => error instanceof ConfigError && error.message.startsWith('Invalid configuration: '),
      JSON.stringify(override),
    );
  }
});

test('log levels parse case-insensitively with a fallback', () => {
  assert.equal(parseLogLevel(' WARN '), 'warn');
  assert.equal(parseLogLevel('loud'), 'info');
  assert.equal(parseLogLevel(undefined, 'error'), 'error');
});

test('applying a log level silences the quieter methods until restored', () => {
  const { debug, info, warn, error } = console;
  const restore = applyLogLevel('warn');
  try {
    assert.notEqual(console.debug, debug);
    assert.notEqual(console.info, info);
    assert.equal(console.warn, warn);
    assert.equal(console.error, error);
  } finally {
    restore();
  }
  assert.equal(console.info, info);
});

test('named ranges end now and explicit ranges are validated', () => {
  const now = new Date('2024-01-15T12:00:00Z');
  assert.deepEqual(resolveRange({ range: '6h' }, now), { start: new Date('2024-01-15T06:00:00Z'), end: now });
  assert.deepEqual(resolveRange({}, now), { start: new Date('2024-01-14T12:00:00Z'), end: now });
  assert.deepEqual(resolveRange({ start: '2024-01-15T10:00:00Z' }, now), {
    start: new Date('2024-01-15T10:00:00Z'),
    end: now,
  });
  assert.throws(() => resolveRange({ range: '2w' }, now), InvalidRangeError);
  assert.throws(() => resolveRange({ range: 'constructor' }, now), InvalidRangeError);
  assert.throws(() => resolveRange({ start: 'yesterday' }, now), InvalidRangeError);
  assert.throws(
    () => resolveRange({ start: '2024-01-15T12:00:00Z', end: '2024-01-15T11:00:00Z' }, now),
    { message: 'end must be after start' },
  );
});
