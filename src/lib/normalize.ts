import type { DecodingHints, ValueClass } from '../types';
import { clamp, round1, round2 } from './math';

export type RejectReason = 'not-numeric' | 'out-of-range';

export type NormalizeResult =
  | { ok: true; value: number; clamped: boolean }
  | { ok: false; reason: RejectReason };

export type NormalizerOptions = {
  /** Raw temperatures above this are unsigned 16-bit encodings of negative values. */
  wrapThreshold: number;
  minTemperatureC: number;
  maxTemperatureC: number;
};

export const DEFAULT_NORMALIZER_OPTIONS: NormalizerOptions = {
  wrapThreshold: 32768,
  minTemperatureC: -50,
  maxTemperatureC: 150,
};

const UINT16_RANGE = 65536;
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function parseDecimal(raw: string): number | null {
  const trimmed = raw.trim();
  if (!DECIMAL.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

const accept = (value: number, clamped = false): NormalizeResult => ({ ok: true, value, clamped });
const reject = (reason: RejectReason): NormalizeResult => ({ ok: false, reason });

function nonNegative(valueClass: ValueClass, value: number, round: (n: number) => number): NormalizeResult {
  if (value < 0) {
    console.warn(`Negative ${valueClass} value clamped to 0`, value);
    return accept(0, true);
  }
  return accept(round(value));
}

export function normalizeValue(
  valueClass: ValueClass,
  raw: string,
  hints: Readonly<DecodingHints> = {},
  options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS,
): NormalizeResult {
  const parsed = parseDecimal(raw);
  if (parsed == null) {
    return reject('not-numeric');
  }

  const decoded =
    valueClass === 'temperature' && parsed > options.wrapThreshold ? parsed - UINT16_RANGE : parsed;
  // Scaled registers are integers on the wire; trim float noise from the multiply.
  const value = hints.scale != null ? Number((decoded * hints.scale).toFixed(6)) : decoded;

  switch (valueClass) {
    case 'temperature': {
      if (value < options.minTemperatureC || value > options.maxTemperatureC) {
        return reject('out-of-range');
      }
      return accept(round1(value));
    }
    case 'power':
      return nonNegative(valueClass, value, round1);
    case 'energy':
      return nonNegative(valueClass, value, round2);
    case 'runtime':
      return nonNegative(valueClass, value, round1);
    case 'percentage': {
      const bounded = clamp(value, 0, 100);
      return accept(round1(bounded), bounded !== value);
    }
    case 'alarm':
    case 'status':
    case 'setting':
    case 'unknown':
      return accept(value);
    default: {
      const exhaustive: never = valueClass;
      throw new Error(`Unhandled value class ${String(exhaustive)}`);
    }
  }
}
