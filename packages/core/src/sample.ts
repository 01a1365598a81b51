import { dbToLinear, linearToDb } from '@sampleformat/utils';

/**
 * One channel at one instant. Held at float32 precision and conventionally in [-1, 1];
 * nothing here clamps it except the integer encoders.
 */
export type Sample = number;

/** Round a number to the precision a {@link Sample} is stored at. */
export const toSample = (value: number): Sample => Math.fround(value);

/**
 * Dimensionless multiplier at double precision. Kept apart from {@link Sample} so a level
 * cannot be passed where a signal value is expected.
 */
export class Gain {
  static readonly UNITY = new Gain(1);

  constructor(readonly value: number) {}

  static fromDb(db: number): Gain {
    return new Gain(dbToLinear(db));
  }

  toDb(): number {
    return linearToDb(this.value);
  }
}
