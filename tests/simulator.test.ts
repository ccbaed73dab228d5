import assert from 'node:assert/strict';
import test from 'node:test';

import { parseArgs } from '../scripts/simulate';
import { MetricPipeline } from '../src/ingest';
import { encodeRegisterValue, HeatPumpSimulator, initialState, mulberry32 } from '../src/simulator';
import { loadCatalog, MemoryMetricStore, T0 } from './fakes';

const nibe = loadCatalog('nibe');

const run = (simulator: HeatPumpSimulator, steps: number, dt = 10) => {
  for (let i = 0; i < steps; i += 1) simulator.update(dt);
  return simulator.state;
};

test('the same seed gives the same run', () => {
  const a = run(new HeatPumpSimulator({ seed: 7 }), 500);
  const b = run(new HeatPumpSimulator({ seed: 7 }), 500);
  assert.deepEqual(a, b);
});

test('the seeded generator stays in [0, 1)', () => {
  const random = mulberry32(42);
  for (let i = 0; i < 1000; i += 1) {
    const value = random();
    assert.ok(value >= 0 && value < 1);
  }
});

test('the compressor starts once the first off phase has elapsed', () => {
  const simulator = new HeatPumpSimulator({ seed: 3 });

  run(simulator, 59);
  assert.equal(simulator.state.compressorOn, false);
  assert.equal(simulator.state.compressorStarts, 0);

  run(simulator, 1);
  assert.equal(simulator.state.compressorOn, true);
  assert.equal(simulator.state.compressorStarts, 1);
  assert.equal(simulator.state.elapsedSeconds, 600);
  assert.equal(simulator.state.hotWaterMode, false);
});

test('non-positive steps leave the state untouched', () => {
  const simulator = new HeatPumpSimulator();
  const before = simulator.state;
  simulator.update(0);
  simulator.update(-5);
  assert.equal(simulator.state, before);
  assert.deepEqual(simulator.state, initialState());
});

test('the auxiliary heater only runs in hard frost', () => {
  const mild = run(new HeatPumpSimulator({ seed: 11, outdoorTemp: -5 }), 500);
  assert.equal(mild.auxHeaterOnSeconds, 0);

  const cold = run(new HeatPumpSimulator({ seed: 11, outdoorTemp: -20 }), 500);
  assert.ok(cold.auxHeaterOnSeconds > 0);
});

test('energy accumulates and runtime counters never decrease', () => {
  const simulator = new HeatPumpSimulator({ seed: 5 });
  let previous = simulator.state;
  for (let i = 0; i < 300; i += 1) {
    const next = simulator.update(30);
    assert.ok(next.energyKwh > previous.energyKwh);
    assert.ok(next.compressorOnSeconds >= previous.compressorOnSeconds);
    previous = next;
  }
});

test('negative temperatures are published as unsigned 16-bit values', () => {
  const outdoor = nibe.lookup('40004');
  const cop = nibe.lookup('40072');
  assert.ok(outdoor);
  assert.ok(cop);
  assert.equal(encodeRegisterValue(outdoor, -5), '65531.0');
  assert.equal(encodeRegisterValue(outdoor, 21.5), '21.5');
  assert.equal(encodeRegisterValue(cop, 3.5), '35');
});

test('published register values decode back through the pipeline', async () => {
  const simulator = new HeatPumpSimulator({ seed: 2, outdoorTemp: -5 });
  run(simulator, 60);
  const store = new MemoryMetricStore();
  const pipeline = new MetricPipeline(nibe, store);

  const values = simulator.registerValues(nibe);
  for (const [registerId, raw] of Object.entries(values)) {
    await pipeline.ingest(registerId, raw, new Date(T0));
  }

  assert.equal(values['40004'], '65531.0');
  assert.equal(pipeline.counters.rejected, 0);
  assert.equal(pipeline.counters.accepted, nibe.allDescriptors().length);
  const stored = new Map(store.points.map((point) => [point.tags.logical_name, point.value]));
  assert.equal(stored.get('outdoor_temp'), -5);
  assert.equal(stored.get('compressor_status'), 1);
  assert.equal(stored.get('estimated_cop'), simulator.snapshot().estimated_cop);
});

test('simulator arguments fall back to the environment and defaults', () => {
  assert.deepEqual(parseArgs(['--brand', 'nibe', '--once', '--interval', '10'], { GATEWAY_ID: 'gw-7' }), {
    brand: 'nibe',
    gatewayId: 'gw-7',
    mqttUrl: 'mqtt://localhost:1883',
    intervalSeconds: 10,
    timeScale: 1,
    seed: 1,
    outdoorTemp: undefined,
    once: true,
  });
  assert.equal(parseArgs(['--outdoor', '-12']).outdoorTemp, -12);
});

test('simulator arguments are validated', () => {
  assert.throws(() => parseArgs(['--brand']), { message: 'Missing value for --brand' });
  assert.throws(() => parseArgs(['--interval', '0']), { message: '--interval must be positive' });
  assert.throws(() => parseArgs(['--seed', 'abc']), { message: '--seed must be a number' });
});
