import type { RegisterCatalog } from './lib/catalog';
import { clamp, round1, round2 } from './lib/math';
import type { RegisterDescriptor } from './types';

export type Random = () => number;

/** Small seeded PRNG so simulated runs are reproducible. */
export function mulberry32(seed: number): Random {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface SimulatorState {
  elapsedSeconds: number;
  compressorOn: boolean;
  hotWaterMode: boolean;
  auxHeaterOn: boolean;
  compressorPhaseSeconds: number;
  compressorPhaseLimit: number;
  modePhaseSeconds: number;
  modePhaseLimit: number;
  compressorOnSeconds: number;
  compressorHotWaterSeconds: number;
  auxHeaterOnSeconds: number;
  compressorStarts: number;
  energyKwh: number;
  outdoorTemp: number;
  indoorSetpoint: number;
  indoorTemp: number;
  brineIn: number;
  brineOut: number;
  forward: number;
  return: number;
  hotWater: number;
  cop: number;
  powerW: number;
}

export type SimulatorOptions = {
  seed?: number;
  random?: Random;
  outdoorTemp?: number;
  /** Step length the per-update temperature increments are calibrated for. */
  referenceStepSeconds?: number;
};

const CYCLE = {
  compressorOn: [1200, 2700],
  compressorOff: [600, 1800],
  hotWaterOn: [1800, 3600],
  hotWaterOff: [7200, 14400],
} as const;

const AUX_OUTDOOR_LIMIT_C = -10;
const AUX_CHANCE = 0.3;

export function initialState(outdoorTemp = -5): SimulatorState {
  return {
    elapsedSeconds: 0,
    compressorOn: false,
    hotWaterMode: false,
    auxHeaterOn: false,
    compressorPhaseSeconds: 0,
    compressorPhaseLimit: CYCLE.compressorOff[0],
    modePhaseSeconds: 0,
    modePhaseLimit: CYCLE.hotWaterOff[0],
    compressorOnSeconds: 0,
    compressorHotWaterSeconds: 0,
    auxHeaterOnSeconds: 0,
    compressorStarts: 0,
    energyKwh: 0,
    outdoorTemp,
    indoorSetpoint: 21,
    indoorTemp: 20.5,
    brineIn: 0.5,
    brineOut: -3,
    forward: 35,
    return: 30,
    hotWater: 50,
    cop: 0,
    powerW: 35,
  };
}

/**
 * Ground-source heat pump model advanced by explicit time steps. Cycle
 * lengths are drawn when a phase starts, so `update(dt)` never reads the clock.
 */
export class HeatPumpSimulator {
  #state: SimulatorState;
  readonly #random: Random;
  readonly #step: number;

  constructor(options: SimulatorOptions = {}) {
    this.#random = options.random ?? mulberry32(options.seed ?? 1);
    this.#step = options.referenceStepSeconds ?? 10;
    this.#state = initialState(options.outdoorTemp);
  }

  get state(): Readonly<SimulatorState> {
    return this.#state;
  }

  #uniform(min: number, max: number) {
    return min + (max - min) * this.#random();
  }

  update(dtSeconds: number): Readonly<SimulatorState> {
    if (!(dtSeconds > 0)) {
      return this.#state;
    }
    const s = { ...this.#state };
    s.elapsedSeconds += dtSeconds;

    s.compressorPhaseSeconds += dtSeconds;
    if (s.compressorPhaseSeconds >= s.compressorPhaseLimit) {
      s.compressorOn = !s.compressorOn;
      s.compressorPhaseSeconds = 0;
      const [min, max] = s.compressorOn ? CYCLE.compressorOn : CYCLE.compressorOff;
      s.compressorPhaseLimit = this.#uniform(min, max);
      if (s.compressorOn) s.compressorStarts += 1;
    }

    s.modePhaseSeconds += dtSeconds;
    if (s.modePhaseSeconds >= s.modePhaseLimit) {
      s.hotWaterMode = !s.hotWaterMode;
      s.modePhaseSeconds = 0;
      const [min, max] = s.hotWaterMode ? CYCLE.hotWaterOn : CYCLE.hotWaterOff;
      s.modePhaseLimit = this.#uniform(min, max);
    }

    s.auxHeaterOn = s.outdoorTemp < AUX_OUTDOOR_LIMIT_C && s.compressorOn && this.#random() < AUX_CHANCE;

    if (s.compressorOn) {
      s.compressorOnSeconds += dtSeconds;
      if (s.hotWaterMode) s.compressorHotWaterSeconds += dtSeconds;
    }
    if (s.auxHeaterOn) s.auxHeaterOnSeconds += dtSeconds;

    this.#temperatures(s, dtSeconds / this.#step);
    s.cop = this.#cop(s);
    s.powerW = this.#power(s);
    s.energyKwh += (s.powerW * dtSeconds) / 3_600_000;

    this.#state = s;
    return s;
  }

  #temperatures(s: SimulatorState, k: number) {
    const approach = (current: number, target: number, rate: number) =>
      current + (target - current) * (1 - Math.pow(1 - rate, k));

    if (s.indoorTemp < s.indoorSetpoint - 0.5) {
      s.indoorTemp += this.#uniform(0.01, 0.05) * k;
    } else if (s.indoorTemp > s.indoorSetpoint + 0.5) {
      s.indoorTemp -= this.#uniform(0.01, 0.05) * k;
    } else {
      s.indoorTemp += this.#uniform(-0.02, 0.02) * k;
    }

    if (s.compressorOn) {
      s.brineIn = s.outdoorTemp + this.#uniform(0.5, 2);
      s.brineOut = s.brineIn - this.#uniform(3, 5);
      if (s.hotWaterMode) {
        s.forward = this.#uniform(50, 60);
        s.return = s.forward - this.#uniform(8, 12);
        if (s.hotWater < 55) s.hotWater += this.#uniform(0.5, 1.5) * k;
      } else {
        const target = clamp(45 - s.outdoorTemp * 1.2, 30, 55);
        s.forward = approach(s.forward, target, 0.1);
        s.return = s.forward - this.#uniform(5, 10);
        if (s.hotWater > 45) s.hotWater -= this.#uniform(0.05, 0.15) * k;
      }
      if (s.auxHeaterOn) s.forward += this.#uniform(2, 5);
    } else {
      s.brineIn = approach(s.brineIn, s.outdoorTemp, 0.05);
      s.brineOut = approach(s.brineOut, s.outdoorTemp, 0.05);
      // Circulation stops; the loop cools toward room temperature.
      s.forward = Math.max(s.indoorTemp, s.forward - this.#uniform(0.2, 0.5) * k);
      s.return = Math.max(s.indoorTemp, s.return - this.#uniform(0.1, 0.3) * k);
      if (s.hotWater > 40) s.hotWater -= this.#uniform(0.1, 0.2) * k;
    }
  }

  #cop(s: SimulatorState): number {
    if (!s.compressorOn) {
      return 0;
    }
    const lift = s.forward - (s.brineIn + s.brineOut) / 2;
    if (lift <= 0) {
      return 3.5;
    }
    return clamp(3.5 + (10 - lift) / 10 + this.#uniform(-0.2, 0.2), 1.5, 6);
  }

  #power(s: SimulatorState): number {
    if (!s.compressorOn) {
      return this.#uniform(20, 50);
    }
    let watts = this.#uniform(1200, 1600);
    if (s.hotWaterMode) watts += this.#uniform(200, 400);
    if (s.auxHeaterOn) watts += this.#uniform(2000, 3000);
    return watts * (1 + (-5 - s.outdoorTemp) * 0.02);
  }

  /** Canonical values keyed by logical name. */
  snapshot(): Record<string, number> {
    const s = this.#state;
    const on = s.compressorOn ? 1 : 0;
    return {
      outdoor_temp: round1(s.outdoorTemp),
      indoor_temp: round1(s.indoorTemp),
      room_temp_setpoint: s.indoorSetpoint,
      brine_in_evaporator: round1(s.brineIn),
      brine_out_condenser: round1(s.brineOut),
      radiator_forward: round1(s.forward),
      radiator_return: round1(s.return),
      heat_carrier_forward: round1(s.forward + 1),
      heat_carrier_return: round1(s.return + 1),
      hot_water_top: round1(s.hotWater),
      hot_water_charge: round1(s.hotWater - 5),
      warm_water_2: round1(s.hotWater - 2),
      hot_gas_compressor: round1(s.compressorOn ? s.forward + 25 : Math.max(s.indoorTemp, s.forward - 5)),
      compressor_status: on,
      brine_pump_status: on,
      radiator_pump_status: on,
      brine_pump_speed: s.compressorOn ? 80 : 0,
      radiator_pump_speed: s.compressorOn ? 70 : 0,
      switch_valve_status: s.hotWaterMode ? 1 : 0,
      operating_priority: s.hotWaterMode ? 30 : 10,
      aux_heater_status: s.auxHeaterOn ? 1 : 0,
      add_heat_step_1: s.auxHeaterOn ? 1 : 0,
      add_heat_step_2: 0,
      additional_heat_percent: s.auxHeaterOn ? 50 : 0,
      power_consumption: Math.round(s.powerW),
      energy_accumulated: round2(s.energyKwh),
      estimated_cop: round1(s.cop),
      degree_minutes: Math.round((18 - s.outdoorTemp) * 100),
      compressor_hours: round1(s.compressorOnSeconds / 3600),
      aux_heater_hours: round1(s.auxHeaterOnSeconds / 3600),
      compressor_runtime_heating: round1((s.compressorOnSeconds - s.compressorHotWaterSeconds) / 3600),
      compressor_runtime_hot_water: round1(s.compressorHotWaterSeconds / 3600),
      compressor_starts: s.compressorStarts,
      alarm_code: 0,
    };
  }

  /** Raw register payloads as the gateway would publish them for this catalog. */
  registerValues(catalog: RegisterCatalog): Record<string, string> {
    const values = this.snapshot();
    const raw: Record<string, string> = {};
    for (const descriptor of catalog.allDescriptors()) {
      const value = values[descriptor.logicalName];
      if (value !== undefined) {
        raw[descriptor.registerId] = encodeRegisterValue(descriptor, value);
      }
    }
    return raw;
  }
}

const UINT16_RANGE = 65536;

/** Inverse of the gateway decoding: scaled integers and unsigned 16-bit negative temperatures. */
export function encodeRegisterValue(descriptor: RegisterDescriptor, value: number): string {
  const scale = descriptor.hints?.scale;
  if (scale != null) {
    return String(Math.round(value / scale));
  }
  if (descriptor.valueClass === 'temperature' && value < 0) {
    return (value + UINT16_RANGE).toFixed(1);
  }
  return String(value);
}
