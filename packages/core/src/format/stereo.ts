import type { ConversionResult } from '../errors';
import { type Gain, type Sample, toSample } from '../sample';
import { decodeFrame, encodeBytes, encodeInt16, encodeInt24 } from './conversion';
import { DEFAULT_PAN_LAW, type PanLawOptions, panGains, type ResolvedPanLaw, resolvePanLaw } from './pan-law';
import type { Panner, SampleFormat, SampleFormatType } from './sample-format';

// √0.5 at sample precision: the per-channel level of an equal-power center image.
const SQRT_HALF = Math.fround(Math.SQRT1_2);

/** Two-channel sample. Left is always first when serialized. */
export class Stereo implements SampleFormat<Stereo> {
  left: Sample;
  right: Sample;

  constructor(left: Sample = 0, right: Sample = 0) {
    this.left = toSample(left);
    this.right = toSample(right);
  }

  static numSamples(): number {
    return 2;
  }

  /** Equal-power split: both channels get `x·√0.5`. */
  static fromSample(x: Sample): Stereo {
    const half = toSample(x) * SQRT_HALF;
    return new Stereo(half, half);
  }

  /** Pan with a double-precision position in [-1, 1]. */
  static toSampleFormat(s: Sample, position: number): Stereo {
    return panStereo(DEFAULT_PAN_LAW, s, position);
  }

  /** Pan with the position first rounded to single precision. */
  static toSampleFormatF32(s: Sample, position: number): Stereo {
    return panStereo(DEFAULT_PAN_LAW, s, Math.fround(position));
  }

  static tryFromBytes(input: ArrayLike<number>): ConversionResult<Stereo> {
    return decodeFrame(input, 2, 'u8', ([left, right]) => new Stereo(left, right));
  }

  static tryFromInt16(input: ArrayLike<number>): ConversionResult<Stereo> {
    return decodeFrame(input, 2, 'i16', ([left, right]) => new Stereo(left, right));
  }

  static tryFromInt24(input: ArrayLike<number>): ConversionResult<Stereo> {
    return decodeFrame(input, 2, 'i24', ([left, right]) => new Stereo(left, right));
  }

  negate(): Stereo {
    return new Stereo(-this.left, -this.right);
  }

  add(rhs: Stereo): Stereo {
    return new Stereo(this.left + rhs.left, this.right + rhs.right);
  }

  addAssign(rhs: Stereo): this {
    this.left = toSample(this.left + rhs.left);
    this.right = toSample(this.right + rhs.right);
    return this;
  }

  subtract(rhs: Stereo): Stereo {
    return new Stereo(this.left - rhs.left, this.right - rhs.right);
  }

  subtractAssign(rhs: Stereo): this {
    this.left = toSample(this.left - rhs.left);
    this.right = toSample(this.right - rhs.right);
    return this;
  }

  multiply(rhs: Stereo): Stereo {
    return new Stereo(this.left * rhs.left, this.right * rhs.right);
  }

  multiplyAssign(rhs: Stereo): this {
    this.left = toSample(this.left * rhs.left);
    this.right = toSample(this.right * rhs.right);
    return this;
  }

  scale(rhs: Sample): Stereo {
    const s = toSample(rhs);
    return new Stereo(this.left * s, this.right * s);
  }

  scaleAssign(rhs: Sample): this {
    const s = toSample(rhs);
    this.left = toSample(this.left * s);
    this.right = toSample(this.right * s);
    return this;
  }

  applyGain(gain: Gain): Stereo {
    return new Stereo(this.left * gain.value, this.right * gain.value);
  }

  applyGainAssign(gain: Gain): this {
    this.left = toSample(this.left * gain.value);
    this.right = toSample(this.right * gain.value);
    return this;
  }

  /** Downmix `(left + right)·√0.5`. Inverts {@link Stereo.fromSample}; lossy for off-center images. */
  intoSample(): Sample {
    return toSample(toSample(this.left + this.right) * SQRT_HALF);
  }

  toBytes(): Uint8Array {
    return encodeBytes(this.toArray());
  }

  toInt16(): Int16Array {
    return encodeInt16(this.toArray());
  }

  toInt24(): Int32Array {
    return encodeInt24(this.toArray());
  }

  toArray(): Sample[] {
    return [this.left, this.right];
  }

  equals(other: Stereo): boolean {
    return this.left === other.left && this.right === other.right;
  }

  clone(): Stereo {
    return new Stereo(this.left, this.right);
  }
}

function panStereo(law: ResolvedPanLaw, s: Sample, position: number): Stereo {
  const x = toSample(s);
  const gains = panGains(law, position);
  return new Stereo(gains.left * x, gains.right * x);
}

export type PanPrecision = 'f32' | 'f64';

/**
 * Panner for a custom pan law. With `'f32'` the position is rounded to single precision
 * before the law is evaluated; the law itself always runs at double precision.
 */
export function createStereoPanner(options?: PanLawOptions, precision: PanPrecision = 'f64'): Panner<Stereo, number> {
  const law = resolvePanLaw(options);
  return {
    toSampleFormat: (s, position) => panStereo(law, s, precision === 'f32' ? Math.fround(position) : position),
  };
}

export const stereoFormat: SampleFormatType<Stereo> = Stereo;

export const stereoPanner: Panner<Stereo, number> = {
  toSampleFormat: (s, position) => Stereo.toSampleFormat(s, position),
};

export const stereoPannerF32: Panner<Stereo, number> = {
  toSampleFormat: (s, position) => Stereo.toSampleFormatF32(s, position),
};
