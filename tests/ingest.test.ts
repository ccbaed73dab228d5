import assert from 'node:assert/strict';
import test from 'node:test';

import { StorageUnavailableError } from '../src/errors';
import { MetricPipeline, payloadValue, registerIdFromTopic } from '../src/ingest';
import { HangingMetricStore, loadCatalog, MemoryMetricStore, T0 } from './fakes';

const thermia = loadCatalog('thermia');

test('known register becomes a tagged point', async () => {
  const store = new MemoryMetricStore();
  const pipeline = new MetricPipeline(thermia, store);

  const point = await pipeline.ingest('0007', '65531', new Date(T0));

  assert.deepEqual(point, {
    logicalName: 'outdoor_temp',
    valueClass: 'temperature',
    unit: '°C',
    value: -5,
    timestamp: new Date(T0),
  });
  assert.equal(store.points.length, 1);
  assert.deepEqual(store.points[0], {
    measurement: 'heatpump',
    tags: { register_id: '0007', logical_name: 'outdoor_temp', value_class: 'temperature', unit: '°C' },
    value: -5,
    timestamp: new Date(T0),
  });
  assert.equal(pipeline.counters.accepted, 1);
  assert.equal(pipeline.counters.lastAcceptedAt, new Date(T0).toISOString());
});

test('unitless registers are written without a unit tag', async () => {
  const store = new MemoryMetricStore();
  const pipeline = new MetricPipeline(thermia, store);

  await pipeline.ingest('1a01', '1', new Date(T0));

  assert.deepEqual(store.points[0]?.tags, {
    register_id: '1A01',
    logical_name: 'compressor_status',
    value_class: 'status',
  });
});

test('unknown registers are ignored without a write', async (t) => {
  const debug = t.mock.method(console, 'debug', () => {});
  const store = new MemoryMetricStore();
  const pipeline = new MetricPipeline(thermia, store);

  assert.equal(await pipeline.ingest('FFFF', '12', new Date(T0)), null);

  assert.equal(store.points.length, 0);
  assert.equal(pipeline.counters.unknown, 1);
  assert.equal(debug.mock.calls.length, 1);
});

test('rejected values are counted and logged, never written', async (t) => {
  const warn = t.mock.method(console, 'warn', () => {});
  const store = new MemoryMetricStore();
  const pipeline = new MetricPipeline(thermia, store);

  assert.equal(await pipeline.ingest('0007', '33000', new Date(T0)), null);
  assert.equal(await pipeline.ingest('0007', 'n/a', new Date(T0)), null);

  assert.equal(store.points.length, 0);
  assert.equal(pipeline.counters.rejected, 2);
  assert.equal(warn.mock.calls.length, 2);
});

test('negative power is written as zero', async (t) => {
  t.mock.method(console, 'warn', () => {});
  const store = new MemoryMetricStore();
  const pipeline = new MetricPipeline(thermia, store);

  const point = await pipeline.ingest('CFAA', '-5', new Date(T0));

  assert.equal(point?.value, 0);
  assert.equal(store.points[0]?.value, 0);
});

test('points are immutable', async () => {
  const pipeline = new MetricPipeline(thermia, new MemoryMetricStore());
  const point = await pipeline.ingest('0002', '35.2', new Date(T0));
  assert.ok(point);
  assert.ok(Object.isFrozen(point));
});

test('topic parsing takes the last non-empty segment', () => {
  assert.equal(registerIdFromTopic('gw-1/HP/0007'), '0007');
  assert.equal(registerIdFromTopic('gw-1/HP/STATUS/1a01'), '1A01');
  assert.equal(registerIdFromTopic('gw-1/HP/cfaa/'), 'CFAA');
  assert.equal(registerIdFromTopic('///'), null);
});

test('payloads may be raw text or a JSON object with a value', () => {
  assert.equal(payloadValue(' 21.5\n'), '21.5');
  assert.equal(payloadValue(Buffer.from('65531')), '65531');
  assert.equal(payloadValue('{"value": 42.5}'), '42.5');
  assert.equal(payloadValue('{"value":"7"}'), '7');
  assert.equal(payloadValue('{"other":1}'), '{"other":1}');
});

test('malformed JSON payloads fall back to the raw text', (t) => {
  t.mock.method(console, 'debug', () => {});
  assert.equal(payloadValue('{oops'), '{oops');
});

test('messages route through the topic register id', async () => {
  const store = new MemoryMetricStore();
  const pipeline = new MetricPipeline(thermia, store);

  await pipeline.handleMessage('gw-1/HP/STATUS/1A07', Buffer.from('1'), new Date(T0));
  await pipeline.handleMessage('gw-1/HP/3104', '{"value": 120}', new Date(T0 + 1000));

  assert.deepEqual(
    store.points.map((p) => [p.tags.logical_name, p.value]),
    [
      ['switch_valve_status', 1],
      ['additional_heat_percent', 100],
    ],
  );
});

test('store failures surface as retryable storage errors', async () => {
  const store = new MemoryMetricStore();
  store.failWith = new Error('disk full');
  const pipeline = new MetricPipeline(thermia, store);

  await assert.rejects(
    pipeline.ingest('0007', '5', new Date(T0)),
    (error: unknown) =>
      error instanceof StorageUnavailableError && error.retryable && error.message === 'Storage write failed',
  );
  assert.equal(pipeline.counters.failed, 1);
  assert.equal(pipeline.counters.accepted, 0);
});

test('slow writes time out', async () => {
  const pipeline = new MetricPipeline(thermia, new HangingMetricStore(), { storageTimeoutMs: 20 });

  await assert.rejects(
    pipeline.ingest('0007', '5', new Date(T0)),
    (error: unknown) => error instanceof StorageUnavailableError && error.message === 'Storage write timed out',
  );
  assert.equal(pipeline.counters.failed, 1);
});
