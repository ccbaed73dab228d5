import Ajv from 'ajv';
import addFormats from 'ajv-formats';

import type { AppConfig } from '../config';
import type { ValueClass } from '../types';
import { VALUE_CLASSES } from '../types';

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

export type CatalogRegisterSource = {
  registerId: string;
  logicalName: string;
  unit: string;
  valueClass: ValueClass;
  description: string;
  hints?: { scale?: number };
};

export type CatalogSource = {
  brand: string;
  model: string;
  displayName?: string;
  registers: CatalogRegisterSource[];
  alarmCodes?: Record<string, string>;
};

export const CatalogSchema = {
  $id: 'heatpump:catalog-v1',
  type: 'object',
  required: ['brand', 'model', 'registers'],
  additionalProperties: false,
  properties: {
    brand: { type: 'string', minLength: 1 },
    model: { type: 'string', minLength: 1 },
    displayName: { type: 'string' },
    registers: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        required: ['registerId', 'logicalName', 'unit', 'valueClass', 'description'],
        additionalProperties: false,
        properties: {
          registerId: { type: 'string', minLength: 1, pattern: '^\\S+$' },
          logicalName: { type: 'string', pattern: '^[a-z][a-z0-9_]*$' },
          unit: { type: 'string' },
          valueClass: { type: 'string', enum: VALUE_CLASSES },
          description: { type: 'string' },
          hints: {
            type: 'object',
            additionalProperties: false,
            properties: {
              scale: { type: 'number', exclusiveMinimum: 0 },
            },
          },
        },
      },
    },
    alarmCodes: {
      type: 'object',
      propertyNames: { pattern: '^-?\\d+$' },
      additionalProperties: { type: 'string' },
    },
  },
} as const;

export const ConfigSchema = {
  $id: 'heatpump:config-v1',
  type: 'object',
  required: [
    'brand',
    'gatewayId',
    'mqttUrl',
    'dbPath',
    'httpPort',
    'electricityPrice',
    'storageTimeoutMs',
  ],
  properties: {
    brand: { type: 'string', minLength: 1 },
    gatewayId: { type: 'string', minLength: 1, pattern: '^[^/#+]+$' },
    mqttUrl: { type: 'string', format: 'uri', pattern: '^(mqtts?|wss?|tcp)://' },
    dbPath: { type: 'string', minLength: 1 },
    httpPort: { type: 'integer', minimum: 0, maximum: 65535 },
    electricityPrice: { type: 'number', minimum: 0 },
    updateIntervalSeconds: { type: 'number', exclusiveMinimum: 0 },
    storageTimeoutMs: { type: 'integer', minimum: 1 },
    latestLookbackHours: { type: 'number', exclusiveMinimum: 0 },
    alarmLookbackHours: { type: 'number', exclusiveMinimum: 0 },
    hotWaterMinCycleSeconds: { type: 'number', minimum: 0 },
  },
} as const;

export const SettingsUpdateSchema = {
  $id: 'heatpump:settings-v1',
  type: 'object',
  required: ['electricityPrice'],
  additionalProperties: false,
  properties: {
    electricityPrice: { type: 'number', minimum: 0 },
  },
} as const;

export type SettingsUpdate = { electricityPrice: number };

export const validateCatalog = ajv.compile<CatalogSource>(CatalogSchema);
export const validateConfig = ajv.compile<AppConfig>(ConfigSchema);
export const validateSettingsUpdate = ajv.compile<SettingsUpdate>(SettingsUpdateSchema);

export function describeErrors(errors: typeof validateCatalog.errors): string[] {
  return (errors ?? []).map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`);
}
