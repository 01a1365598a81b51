import {
  type PcmEncoding,
  sampleFromI16,
  sampleFromI24,
  sampleFromU8,
  sampleToI16,
  sampleToI24,
  sampleToU8,
} from '@sampleformat/utils';
import { ConversionError, type ConversionResult, conversionErr, conversionOk } from '../errors';
import type { Sample } from '../sample';

const DECODERS: Record<PcmEncoding, (value: number) => Sample> = {
  u8: sampleFromU8,
  i16: sampleFromI16,
  i24: sampleFromI24,
};

const ENCODERS: Record<PcmEncoding, (sample: Sample) => number> = {
  u8: sampleToU8,
  i16: sampleToI16,
  i24: sampleToI24,
};

/**
 * Decode the first `required` entries of `input` and hand them to `build` in channel order.
 * Shorter input is a {@link ConversionError}; anything past `required` is ignored.
 */
export function decodeFrame<F>(
  input: ArrayLike<number>,
  required: number,
  encoding: PcmEncoding,
  build: (channels: Sample[]) => F,
): ConversionResult<F> {
  if (input.length < required) {
    return conversionErr(new ConversionError(input.length, required, encoding));
  }
  const decode = DECODERS[encoding];
  const channels: Sample[] = [];
  for (let i = 0; i < required; i += 1) {
    channels.push(decode(input[i]));
  }
  return conversionOk(build(channels));
}

export const encodeBytes = (channels: readonly Sample[]): Uint8Array => Uint8Array.from(channels, ENCODERS.u8);

export const encodeInt16 = (channels: readonly Sample[]): Int16Array => Int16Array.from(channels, ENCODERS.i16);

export const encodeInt24 = (channels: readonly Sample[]): Int32Array => Int32Array.from(channels, ENCODERS.i24);
