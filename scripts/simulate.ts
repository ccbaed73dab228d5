import { pathToFileURL } from 'node:url';
import { connect } from 'mqtt';

import { readCatalogFile } from '../src/lib/catalog';
import { HeatPumpSimulator } from '../src/simulator';

export interface SimulateOptions {
  brand: string;
  gatewayId: string;
  mqttUrl: string;
  intervalSeconds: number;
  timeScale: number;
  seed: number;
  outdoorTemp?: number;
  once: boolean;
}

export function usage() {
  console.log('Usage: tsx scripts/simulate.ts [options]');
  console.log('');
  console.log('  --brand <thermia|ivt|nibe>   pump profile to publish (HEATPUMP_BRAND)');
  console.log('  --gateway <id>               gateway id used in topics (GATEWAY_ID)');
  console.log('  --mqtt <url>                 broker url (MQTT_URL)');
  console.log('  --interval <seconds>         publish interval, default 30');
  console.log('  --time-scale <n>             simulated seconds per real second, default 1');
  console.log('  --seed <n>                   random seed, default 1');
  console.log('  --outdoor <celsius>          fixed outdoor temperature');
  console.log('  --once                       publish one snapshot and exit');
}

function parseNumber(flag: string, raw: string | undefined, fallback: number): number {
  if (raw == null) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${flag} must be a number`);
  }
  return parsed;
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = {}): SimulateOptions {
  const args = new Map<string, string>();
  const valueFlags = new Set(['--brand', '--gateway', '--mqtt', '--interval', '--time-scale', '--seed', '--outdoor']);
  for (let index = 0; index < argv.length; index += 1) {
    const part = argv[index];
    if (!part || !part.startsWith('--')) continue;
    const next = argv[index + 1];
    if (valueFlags.has(part)) {
      if (!next || next.startsWith('--')) {
        throw new Error(`Missing value for ${part}`);
      }
      args.set(part, next);
      index += 1;
      continue;
    }
    args.set(part, 'true');
  }

  const intervalSeconds = parseNumber('--interval', args.get('--interval') ?? env.UPDATE_INTERVAL_SECONDS, 30);
  if (intervalSeconds <= 0) {
    throw new Error('--interval must be positive');
  }
  const outdoorRaw = args.get('--outdoor');

  return {
    brand: args.get('--brand') ?? env.HEATPUMP_BRAND ?? 'thermia',
    gatewayId: args.get('--gateway') ?? env.GATEWAY_ID ?? 'simulator',
    mqttUrl: args.get('--mqtt') ?? env.MQTT_URL ?? 'mqtt://localhost:1883',
    intervalSeconds,
    timeScale: parseNumber('--time-scale', args.get('--time-scale'), 1),
    seed: parseNumber('--seed', args.get('--seed'), 1),
    outdoorTemp: outdoorRaw == null ? undefined : parseNumber('--outdoor', outdoorRaw, -5),
    once: args.get('--once') === 'true',
  };
}

async function main() {
  const argv = process.argv.slice(2);
  if (argv.includes('--help')) {
    usage();
    return;
  }
  const options = parseArgs(argv, process.env);
  const catalog = await readCatalogFile(options.brand);
  const simulator = new HeatPumpSimulator({ seed: options.seed, outdoorTemp: options.outdoorTemp });
  const client = connect(options.mqttUrl, { clientId: `heatpump-simulator-${options.gatewayId}` });
  client.on('error', (error) => console.error('MQTT error', error.message));

  const publish = async () => {
    simulator.update(options.intervalSeconds * options.timeScale);
    const values = simulator.registerValues(catalog);
    await Promise.all(
      Object.entries(values).map(([registerId, raw]) => client.publishAsync(`${options.gatewayId}/HP/${registerId}`, raw)),
    );
    const s = simulator.state;
    console.info('Published snapshot', {
      registers: Object.keys(values).length,
      compressor: s.compressorOn,
      hotWater: s.hotWaterMode,
      auxHeater: s.auxHeaterOn,
    });
  };

  await new Promise<void>((resolve) => client.once('connect', () => resolve()));
  console.info(`Simulating ${catalog.metadata.displayName} on ${options.gatewayId}`);

  if (options.once) {
    await publish();
    await client.endAsync();
    return;
  }

  const timer = setInterval(() => {
    publish().catch((error: unknown) => console.error('Publish failed', error));
  }, options.intervalSeconds * 1000);
  const stop = () => {
    clearInterval(timer);
    client
      .endAsync()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('Failed to disconnect', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((error: unknown) => {
    console.error('Simulator failed', error);
    process.exit(1);
  });
}
