import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { CatalogLoadError, errorMessage } from '../errors';
import type { PumpCapabilities, PumpMetadata, RegisterDescriptor, ValueClass } from '../types';
import { describeErrors, validateCatalog } from './schemas';

export const DEFAULT_CATALOG_DIR = fileURLToPath(new URL('../../catalogs/', import.meta.url));

const BRAND_PATTERN = /^[a-z0-9_-]+$/;

const normalizeRegisterId = (registerId: string) => registerId.trim().toUpperCase();

/**
 * Immutable register table for one pump profile. Built once at startup and
 * injected wherever register ids or logical names need resolving.
 */
export class RegisterCatalog {
  readonly metadata: Readonly<PumpMetadata>;
  readonly capabilities: Readonly<PumpCapabilities>;
  readonly #byRegister: ReadonlyMap<string, RegisterDescriptor>;
  readonly #byLogicalName: ReadonlyMap<string, RegisterDescriptor>;
  readonly #descriptors: readonly RegisterDescriptor[];
  readonly #alarmCodes: ReadonlyMap<number, string>;

  constructor(metadata: PumpMetadata, descriptors: RegisterDescriptor[], alarmCodes: Map<number, string> = new Map()) {
    const byRegister = new Map<string, RegisterDescriptor>();
    const byLogicalName = new Map<string, RegisterDescriptor>();
    const issues: string[] = [];

    for (const source of descriptors) {
      const descriptor: RegisterDescriptor = Object.freeze({
        ...source,
        registerId: normalizeRegisterId(source.registerId),
        hints: source.hints ? Object.freeze({ ...source.hints }) : undefined,
      });
      if (byRegister.has(descriptor.registerId)) {
        issues.push(`duplicate register id ${descriptor.registerId}`);
        continue;
      }
      if (byLogicalName.has(descriptor.logicalName)) {
        issues.push(`duplicate logical name ${descriptor.logicalName}`);
        continue;
      }
      byRegister.set(descriptor.registerId, descriptor);
      byLogicalName.set(descriptor.logicalName, descriptor);
    }

    if (issues.length > 0) {
      throw new CatalogLoadError(`Invalid register catalog for ${metadata.brand}`, issues);
    }

    this.metadata = Object.freeze({ ...metadata });
    this.#byRegister = byRegister;
    this.#byLogicalName = byLogicalName;
    this.#descriptors = Object.freeze(Array.from(byRegister.values()));
    this.#alarmCodes = alarmCodes;
    this.capabilities = Object.freeze(detectCapabilities(this.#descriptors));
  }

  lookup(registerId: string): RegisterDescriptor | undefined {
    return this.#byRegister.get(normalizeRegisterId(registerId));
  }

  registerIdFor(logicalName: string): string | undefined {
    return this.#byLogicalName.get(logicalName)?.registerId;
  }

  describe(logicalName: string): RegisterDescriptor | undefined {
    return this.#byLogicalName.get(logicalName);
  }

  allDescriptors(): readonly RegisterDescriptor[] {
    return this.#descriptors;
  }

  logicalNamesOf(valueClass: ValueClass): string[] {
    return this.#descriptors.filter((d) => d.valueClass === valueClass).map((d) => d.logicalName);
  }

  /** Filters a list of logical names down to the ones this pump reports. */
  present(logicalNames: readonly string[]): string[] {
    return logicalNames.filter((name) => this.#byLogicalName.has(name));
  }

  alarmDescription(code: number): string | null {
    return this.#alarmCodes.get(code) ?? null;
  }
}

function detectCapabilities(descriptors: readonly RegisterDescriptor[]): PumpCapabilities {
  const names = new Set(descriptors.map((d) => d.logicalName));
  return {
    hasPowerMeasurement: names.has('power_consumption'),
    hasEnergyMeasurement: names.has('energy_accumulated'),
    hasHeatCarrierSensors: names.has('heat_carrier_return'),
    hasSeparateHeaterSteps: names.has('add_heat_step_1'),
    hasDetailedRuntime: names.has('compressor_runtime_heating'),
    hasExternalTankSensor: names.has('warm_water_2'),
    hasHotWaterIndicator: names.has('switch_valve_status'),
    hasAlarm: descriptors.some((d) => d.valueClass === 'alarm'),
  };
}

export function loadRegisterCatalog(source: unknown): RegisterCatalog {
  if (!validateCatalog(source)) {
    throw new CatalogLoadError('Malformed register catalog', describeErrors(validateCatalog.errors));
  }

  const alarmCodes = new Map<number, string>();
  for (const [code, description] of Object.entries(source.alarmCodes ?? {})) {
    alarmCodes.set(Number(code), description);
  }

  return new RegisterCatalog(
    {
      brand: source.brand,
      model: source.model,
      displayName: source.displayName ?? `${source.brand} ${source.model}`,
    },
    source.registers.map((register) => ({
      registerId: register.registerId,
      logicalName: register.logicalName,
      unit: register.unit,
      valueClass: register.valueClass,
      description: register.description,
      hints: register.hints,
    })),
    alarmCodes,
  );
}

export async function readCatalogFile(brand: string, dir: string = DEFAULT_CATALOG_DIR): Promise<RegisterCatalog> {
  const key = brand.trim().toLowerCase();
  if (!BRAND_PATTERN.test(key)) {
    throw new CatalogLoadError(`Invalid pump brand "${brand}"`);
  }

  const file = path.join(dir, `${key}.json`);
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new CatalogLoadError(`Pump profile not found for brand "${brand}"`, [errorMessage(error, 'unreadable')]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new CatalogLoadError(`Pump profile ${file} is not valid JSON`, [errorMessage(error, 'invalid JSON')]);
  }

  const catalog = loadRegisterCatalog(parsed);
  console.info('Loaded pump profile', {
    brand: catalog.metadata.brand,
    model: catalog.metadata.model,
    registers: catalog.allDescriptors().length,
  });
  return catalog;
}
