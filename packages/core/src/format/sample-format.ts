import type { PcmEncoding } from '@sampleformat/utils';
import type { ConversionResult } from '../errors';
import type { Gain, Sample } from '../sample';

/**
 * Instance side of a channel layout: a fixed number of samples with element-wise arithmetic
 * and conversions to and from a single sample and integer PCM.
 *
 * Non-mutating operations return a new value; the `…Assign` variants update the receiver
 * and return it.
 */
export interface SampleFormat<F extends SampleFormat<F>> {
  negate(): F;
  add(rhs: F): F;
  addAssign(rhs: F): this;
  subtract(rhs: F): F;
  subtractAssign(rhs: F): this;
  /** Element-wise product. */
  multiply(rhs: F): F;
  multiplyAssign(rhs: F): this;
  /** Every channel times one sample value, at sample precision. */
  scale(rhs: Sample): F;
  scaleAssign(rhs: Sample): this;
  /** Every channel times a gain, computed at double precision. */
  applyGain(gain: Gain): F;
  applyGainAssign(gain: Gain): this;
  /** Collapse to one sample. Lossy for layouts with more than one channel. */
  intoSample(): Sample;
  toBytes(): Uint8Array;
  toInt16(): Int16Array;
  /** 24-bit values in the low three bytes, upper byte zero. */
  toInt24(): Int32Array;
  /** Channel samples in serialization order. */
  toArray(): Sample[];
  equals(other: F): boolean;
  clone(): F;
}

/** Static side of a channel layout. `new F()` is silence. */
export interface SampleFormatType<F extends SampleFormat<F>> {
  new (): F;
  numSamples(): number;
  fromSample(x: Sample): F;
  tryFromBytes(input: ArrayLike<number>): ConversionResult<F>;
  tryFromInt16(input: ArrayLike<number>): ConversionResult<F>;
  tryFromInt24(input: ArrayLike<number>): ConversionResult<F>;
}

/** Places a mono sample into a layout under a placement parameter of type `G`. */
export interface Panner<F, G> {
  toSampleFormat(s: Sample, g: G): F;
}

/** Build a frame of `format` from integer PCM of the given width. */
export function tryFromPcm<F extends SampleFormat<F>>(
  format: SampleFormatType<F>,
  input: ArrayLike<number>,
  encoding: PcmEncoding,
): ConversionResult<F> {
  switch (encoding) {
    case 'u8':
      return format.tryFromBytes(input);
    case 'i16':
      return format.tryFromInt16(input);
    case 'i24':
      return format.tryFromInt24(input);
  }
}
