import { clamp, dbToLinear, lerp } from '@sampleformat/utils';

/** Per-channel level at center, in dB. -3 dB on both channels sums to unity power. */
export const DEFAULT_CENTER_DB = -3;
/** Level of the channel opposite a hard pan, in dB. Close enough to silence. */
export const DEFAULT_FLOOR_DB = -120;

export interface PanLawOptions {
  centerDb?: number;
  floorDb?: number;
  /**
   * Clamp positions to [-1, 1] before interpolating. When off, positions outside the range
   * extrapolate the curve. Defaults to true.
   */
  clampPosition?: boolean;
}

export interface ResolvedPanLaw {
  readonly centerDb: number;
  readonly floorDb: number;
  readonly clampPosition: boolean;
}

export interface PanGains {
  /** Position actually used, after clamping. */
  position: number;
  leftDb: number;
  rightDb: number;
  left: number;
  right: number;
}

/** Apply defaults and validate. Throws on a non-finite level or a floor at or above center. */
export function resolvePanLaw(options: PanLawOptions = {}): ResolvedPanLaw {
  const centerDb = options.centerDb ?? DEFAULT_CENTER_DB;
  const floorDb = options.floorDb ?? DEFAULT_FLOOR_DB;
  if (!Number.isFinite(centerDb) || centerDb > 0) {
    throw new Error(`centerDb must be a finite level at or below 0 dB, got ${centerDb}`);
  }
  if (!Number.isFinite(floorDb) || floorDb >= centerDb) {
    throw new Error(`floorDb must be a finite level below centerDb (${centerDb} dB), got ${floorDb}`);
  }
  return Object.freeze({
    centerDb,
    floorDb,
    clampPosition: options.clampPosition ?? true,
  } satisfies ResolvedPanLaw);
}

export const DEFAULT_PAN_LAW: ResolvedPanLaw = resolvePanLaw();

// NaN pans to center, infinities to the matching side.
const clampPosition = (position: number): number => {
  if (Number.isNaN(position)) return 0;
  if (!Number.isFinite(position)) return Math.sign(position);
  return clamp(position, -1, 1);
};

/**
 * Channel levels for a pan position in [-1, 1] (hard left … center 0 … hard right).
 *
 * Each channel runs linearly in dB from 0 dB at its own side, through `centerDb` at
 * center, down to `floorDb` at the opposite side.
 */
export function panGains(law: ResolvedPanLaw, position: number): PanGains {
  const g = law.clampPosition ? clampPosition(position) : position;
  const leftDb = g <= 0 ? lerp(g, -1, 0, 0, law.centerDb) : lerp(g, 0, 1, law.centerDb, law.floorDb);
  const rightDb = g >= 0 ? lerp(g, 0, 1, law.centerDb, 0) : lerp(g, -1, 0, law.floorDb, law.centerDb);
  return {
    position: g,
    leftDb,
    rightDb,
    left: dbToLinear(leftDb),
    right: dbToLinear(rightDb),
  };
}
