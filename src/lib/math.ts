export const round1 = (value: number) => Math.round(value * 10) / 10;
export const round2 = (value: number) => Math.round(value * 100) / 100;

export const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

const KELVIN_OFFSET = 273.15;

export type CopModel = {
  /** Fraction of the ideal Carnot COP a ground-source unit achieves in practice. */
  carnotEfficiency: number;
  /** Lower bound on the temperature lift (K) to keep the estimate finite. */
  minLiftK: number;
  minCop: number;
  maxCop: number;
};

export const DEFAULT_COP_MODEL: CopModel = {
  carnotEfficiency: 0.45,
  minLiftK: 5,
  minCop: 1.5,
  maxCop: 6.0,
};

/** COP reported when nothing better is available. Always flagged as an estimate. */
export const COP_FALLBACK = 3.0;
export const COP_PLAUSIBLE_MIN = 1.5;
export const COP_PLAUSIBLE_MAX = 6.0;

export function estimateCop(hotSideC: number, coldSideC: number, model: CopModel = DEFAULT_COP_MODEL): number {
  const hotK = hotSideC + KELVIN_OFFSET;
  const lift = Math.max(hotSideC - coldSideC, model.minLiftK);
  return round2(clamp((model.carnotEfficiency * hotK) / lift, model.minCop, model.maxCop));
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}
