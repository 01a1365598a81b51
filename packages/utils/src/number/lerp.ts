/**
 * Linear map of `x` along the line through (x0, y0) and (x1, y1).
 *
 * Not clamped: values of `x` outside [x0, x1] extrapolate.
 *
 * @example
 * ```ts
 * lerp(0.5, 0, 1, -3, -120); // -61.5
 * lerp(2, 0, 1, 0, 10); // 20
 * ```
 */
export function lerp(x: number, x0: number, x1: number, y0: number, y1: number): number {
  if (x1 === x0) return y0;
  return y0 + ((x - x0) * (y1 - y0)) / (x1 - x0);
}
