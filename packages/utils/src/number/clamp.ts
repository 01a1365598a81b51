/** Clamp numeric value to the inclusive [min, max] range; returns min for NaN/Infinity. */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value) || !Number.isFinite(value)) return min;
  return Math.min(Math.max(value, min), max);
}
