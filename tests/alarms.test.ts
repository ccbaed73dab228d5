import assert from 'node:assert/strict';
import test from 'node:test';

import { AlarmMonitor } from '../src/alarms';
import { loadRegisterCatalog } from '../src/lib/catalog';
import { HOUR, loadCatalog, MemoryMetricStore, MINUTE, T0 } from './fakes';

const thermia = loadCatalog('thermia');
const now = new Date(T0 + HOUR);

test('active alarm reports its code, description and start of the run', async () => {
  const store = new MemoryMetricStore().seed('alarm_code', [
    [0, 0],
    [5 * MINUTE, 0],
    [10 * MINUTE, 4],
    [20 * MINUTE, 4],
  ]);
  const monitor = new AlarmMonitor(store, thermia);

  assert.deepEqual(await monitor.getAlarmStatus(now), {
    active: true,
    code: 4,
    description: 'Low brine flow',
    activeSince: new Date(T0 + 10 * MINUTE),
    sinceTruncated: false,
    lastSeen: new Date(T0 + 20 * MINUTE),
  });
});

test('a zero code means no active alarm', async () => {
  const store = new MemoryMetricStore().seed('alarm_code', [
    [0, 4],
    [10 * MINUTE, 0],
  ]);
  const monitor = new AlarmMonitor(store, thermia);

  assert.deepEqual(await monitor.getAlarmStatus(now), {
    active: false,
    code: 0,
    description: 'No alarm',
    activeSince: null,
    sinceTruncated: false,
    lastSeen: new Date(T0 + 10 * MINUTE),
  });
});

test('an alarm that fills the whole lookback is flagged as truncated', async () => {
  const store = new MemoryMetricStore().seed('alarm_code', [
    [0, 2],
    [10 * MINUTE, 2],
  ]);
  const monitor = new AlarmMonitor(store, thermia);

  const status = await monitor.getAlarmStatus(now);
  assert.equal(status.description, 'Low pressure switch');
  assert.deepEqual(status.activeSince, new Date(T0));
  assert.equal(status.sinceTruncated, true);
});

test('codes missing from the profile get a generic description', async () => {
  const store = new MemoryMetricStore().seed('alarm_code', [[0, 99]]);
  const monitor = new AlarmMonitor(store, thermia);

  const status = await monitor.getAlarmStatus(now);
  assert.equal(status.active, true);
  assert.equal(status.description, 'Alarm 99');
});

test('no alarm data, or no alarm register, is reported as inactive', async () => {
  const empty = new AlarmMonitor(new MemoryMetricStore(), thermia);
  assert.deepEqual(await empty.getAlarmStatus(now), {
    active: false,
    code: null,
    description: null,
    activeSince: null,
    sinceTruncated: false,
    lastSeen: null,
  });

  const noAlarmRegister = loadRegisterCatalog({
    brand: 'Acme',
    model: 'Basic',
    registers: [{ registerId: '1', logicalName: 'outdoor_temp', unit: '°C', valueClass: 'temperature', description: '' }],
  });
  const store = new MemoryMetricStore();
  const monitor = new AlarmMonitor(store, noAlarmRegister);
  assert.equal((await monitor.getAlarmStatus(now)).active, false);
  assert.equal(store.queries, 0);
});

test('samples older than the lookback are ignored', async () => {
  const store = new MemoryMetricStore().seed('alarm_code', [[0, 4]]);
  const monitor = new AlarmMonitor(store, thermia, { alarmLookbackHours: 0.5 });

  assert.equal((await monitor.getAlarmStatus(now)).code, null);
});

test('event log lists state changes newest first', async () => {
  const store = new MemoryMetricStore()
    .seed('compressor_status', [
      [0, 0],
      [5 * MINUTE, 1],
      [30 * MINUTE, 0],
    ])
    .seed('switch_valve_status', [
      [0, 0],
      [10 * MINUTE, 1],
      [15 * MINUTE, 0],
    ])
    .seed('additional_heat_percent', [
      [0, 0],
      [20 * MINUTE, 50],
      [22 * MINUTE, 60],
      [25 * MINUTE, 0],
    ])
    .seed('alarm_code', [
      [0, 0],
      [40 * MINUTE, 4],
      [50 * MINUTE, 0],
    ]);
  const monitor = new AlarmMonitor(store, thermia);

  const events = await monitor.getEventLog(now);

  assert.deepEqual(
    events.map((event) => [event.time.getTime() - T0, event.kind, event.message, event.severity]),
    [
      [50 * MINUTE, 'alarm', 'Alarm cleared', 'info'],
      [40 * MINUTE, 'alarm', 'Alarm 4: Low brine flow', 'critical'],
      [30 * MINUTE, 'compressor', 'Compressor stopped', 'info'],
      [25 * MINUTE, 'aux_heater', 'Additional heat output off', 'info'],
      [20 * MINUTE, 'aux_heater', 'Additional heat output on', 'warning'],
      [15 * MINUTE, 'hot_water', 'Hot water cycle ended', 'info'],
      [10 * MINUTE, 'hot_water', 'Hot water cycle started', 'info'],
      [5 * MINUTE, 'compressor', 'Compressor started', 'info'],
    ],
  );

  const limited = await monitor.getEventLog(now, 2);
  assert.deepEqual(
    limited.map((event) => event.message),
    ['Alarm cleared', 'Alarm 4: Low brine flow'],
  );
});
