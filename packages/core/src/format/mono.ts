import type { ConversionResult } from '../errors';
import { type Gain, type Sample, toSample } from '../sample';
import { decodeFrame, encodeBytes, encodeInt16, encodeInt24 } from './conversion';
import type { Panner, SampleFormat, SampleFormatType } from './sample-format';

/** Single-channel sample. */
export class Mono implements SampleFormat<Mono> {
  mono: Sample;

  constructor(mono: Sample = 0) {
    this.mono = toSample(mono);
  }

  static numSamples(): number {
    return 1;
  }

  static fromSample(x: Sample): Mono {
    return new Mono(x);
  }

  /** A single channel has no spatial dimension: the placement is ignored. */
  static toSampleFormat(s: Sample, _placement?: unknown): Mono {
    return new Mono(s);
  }

  static tryFromBytes(input: ArrayLike<number>): ConversionResult<Mono> {
    return decodeFrame(input, 1, 'u8', ([mono]) => new Mono(mono));
  }

  static tryFromInt16(input: ArrayLike<number>): ConversionResult<Mono> {
    return decodeFrame(input, 1, 'i16', ([mono]) => new Mono(mono));
  }

  static tryFromInt24(input: ArrayLike<number>): ConversionResult<Mono> {
    return decodeFrame(input, 1, 'i24', ([mono]) => new Mono(mono));
  }

  negate(): Mono {
    return new Mono(-this.mono);
  }

  add(rhs: Mono): Mono {
    return new Mono(this.mono + rhs.mono);
  }

  addAssign(rhs: Mono): this {
    this.mono = toSample(this.mono + rhs.mono);
    return this;
  }

  subtract(rhs: Mono): Mono {
    return new Mono(this.mono - rhs.mono);
  }

  subtractAssign(rhs: Mono): this {
    this.mono = toSample(this.mono - rhs.mono);
    return this;
  }

  multiply(rhs: Mono): Mono {
    return new Mono(this.mono * rhs.mono);
  }

  multiplyAssign(rhs: Mono): this {
    this.mono = toSample(this.mono * rhs.mono);
    return this;
  }

  scale(rhs: Sample): Mono {
    return new Mono(this.mono * toSample(rhs));
  }

  scaleAssign(rhs: Sample): this {
    this.mono = toSample(this.mono * toSample(rhs));
    return this;
  }

  applyGain(gain: Gain): Mono {
    return new Mono(this.mono * gain.value);
  }

  applyGainAssign(gain: Gain): this {
    this.mono = toSample(this.mono * gain.value);
    return this;
  }

  intoSample(): Sample {
    return this.mono;
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
    return [this.mono];
  }

  equals(other: Mono): boolean {
    return this.mono === other.mono;
  }

  clone(): Mono {
    return new Mono(this.mono);
  }
}

export const monoFormat: SampleFormatType<Mono> = Mono;

export const monoPanner: Panner<Mono, unknown> = {
  toSampleFormat: (s) => Mono.toSampleFormat(s),
};
