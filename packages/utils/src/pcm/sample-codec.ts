// Scalar codec between normalized float samples and fixed-width integer PCM.
// Decoded samples are rounded to float32; encoders round to nearest (halves away from zero)
// and saturate.
// 24-bit values live in the low three bytes of a 32-bit integer, upper byte zero.

const U8_MID = 128;
const I16_SCALE = 32_768;
const I24_SCALE = 8_388_608;
const I24_MASK = 0xff_ff_ff;

/** Integer widths supported by the codec. */
export type PcmEncoding = 'u8' | 'i16' | 'i24';

// Symmetric around zero; `0 - …` keeps small negatives from producing -0.
const roundHalfAway = (value: number): number => (value < 0 ? 0 - Math.round(-value) : Math.round(value));

const quantize = (sample: number, scale: number, offset: number, min: number, max: number): number => {
  if (Number.isNaN(sample)) return offset;
  const scaled = roundHalfAway(sample * scale) + offset;
  return Math.min(Math.max(scaled, min), max);
};

/** Unsigned byte → sample. 128 is silence; 0 maps to -1. */
export function sampleFromU8(value: number): number {
  return Math.fround(((value & 0xff) - U8_MID) / U8_MID);
}

export function sampleToU8(sample: number): number {
  return quantize(sample, U8_MID, U8_MID, 0, 255);
}

/** Signed 16-bit → sample. Values outside the int16 range wrap like an Int16Array store. */
export function sampleFromI16(value: number): number {
  return Math.fround(((value << 16) >> 16) / I16_SCALE);
}

export function sampleToI16(sample: number): number {
  return quantize(sample, I16_SCALE, 0, -I16_SCALE, I16_SCALE - 1);
}

/** Signed 24-bit (low three bytes of `value`, upper byte ignored) → sample. */
export function sampleFromI24(value: number): number {
  return Math.fround(((value << 8) >> 8) / I24_SCALE);
}

/**
 * Sample → signed 24-bit two's complement in the low three bytes.
 * The result is always in [0, 0xffffff]; use {@link signExtendI24} to read it as a signed number.
 */
export function sampleToI24(sample: number): number {
  return quantize(sample, I24_SCALE, 0, -I24_SCALE, I24_SCALE - 1) & I24_MASK;
}

export function signExtendI24(value: number): number {
  return (value << 8) >> 8;
}
