import { ConfigError } from '../errors';
import type { Env } from '../types/env';

type RequirementGroups = {
  profile: Array<keyof Env>;
  transport: Array<keyof Env>;
};

const REQ: RequirementGroups = {
  profile: ['HEATPUMP_BRAND'],
  transport: ['GATEWAY_ID', 'MQTT_URL'],
};

export function preflight(env: Env): void {
  const miss: string[] = [];

  for (const key of REQ.profile) {
    if (!env[key]?.trim()) {
      miss.push(`PROFILE:${key}`);
    }
  }

  for (const key of REQ.transport) {
    if (!env[key]?.trim()) {
      miss.push(`MQTT:${key}`);
    }
  }

  if (env.MQTT_USERNAME?.trim() && !env.MQTT_PASSWORD?.trim()) {
    miss.push('MQTT:MQTT_PASSWORD');
  }

  if (miss.length > 0) {
    throw new ConfigError(`Preflight failed: missing ${miss.join(', ')}`, miss);
  }
}
