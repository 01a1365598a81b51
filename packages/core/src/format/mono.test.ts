import { signExtendI24 } from '@sampleformat/utils';
import { describe, expect, it } from 'vitest';
import { ConversionError, type ConversionResult, unwrapConversion } from '../errors';
import { Gain } from '../sample';
import { Mono, monoPanner } from './mono';

const expectFailure = <F>(result: ConversionResult<F>): ConversionError => {
  if (result.ok) throw new Error('expected conversion to fail');
  return result.error;
};

describe('Mono', () => {
  it('defaults to silence with one channel', () => {
    expect(new Mono().mono).toBe(0);
    expect(Mono.numSamples()).toBe(1);
  });

  it('stores samples at single precision', () => {
    expect(new Mono(0.1).mono).toBe(Math.fround(0.1));
  });

  it('fromSample/intoSample are identity', () => {
    for (const s of [-1, -0.5, 0, 0.25, 1, Math.fround(0.3)]) {
      expect(Mono.fromSample(s).intoSample()).toBe(s);
    }
  });

  describe('arithmetic', () => {
    const a = new Mono(0.5);
    const b = new Mono(0.25);

    it('negates, adds and multiplies', () => {
      expect(a.negate().mono).toBe(-0.5);
      expect(a.add(b).mono).toBe(0.75);
      expect(a.multiply(b).mono).toBe(0.125);
    });

    it('subtract subtracts, matching subtractAssign', () => {
      expect(a.subtract(b).mono).toBe(0.25);
      expect(a.clone().subtractAssign(b).mono).toBe(0.25);
    });

    it('(a + b) - b returns a', () => {
      expect(a.add(b).subtract(b).equals(a)).toBe(true);
    });

    it('scales by a sample and by a gain', () => {
      expect(a.scale(0.5).mono).toBe(0.25);
      expect(a.applyGain(new Gain(2)).mono).toBe(1);
      expect(new Mono(1).applyGain(Gain.fromDb(-20)).mono).toBe(Math.fround(10 ** -1));
    });

    it('non-mutating operations leave operands untouched', () => {
      const sum = a.add(b);
      expect(sum).not.toBe(a);
      expect(a.mono).toBe(0.5);
      expect(b.mono).toBe(0.25);
    });

    it('in-place variants update and return the receiver', () => {
      const m = new Mono(0.5);
      expect(m.addAssign(b)).toBe(m);
      expect(m.mono).toBe(0.75);
      m.multiplyAssign(new Mono(2));
      expect(m.mono).toBe(1.5);
      m.scaleAssign(0.5);
      expect(m.mono).toBe(0.75);
      m.applyGainAssign(new Gain(4));
      expect(m.mono).toBe(3);
    });

    it('multiplying by silence yields silence', () => {
      expect(a.multiply(new Mono()).equals(new Mono())).toBe(true);
    });
  });

  describe('integer conversion', () => {
    it('decodes each width', () => {
      expect(unwrapConversion(Mono.tryFromBytes([192])).mono).toBe(0.5);
      expect(unwrapConversion(Mono.tryFromInt16(Int16Array.of(-16384))).mono).toBe(-0.5);
      expect(unwrapConversion(Mono.tryFromInt24([0xc00000])).mono).toBe(-0.5);
    });

    it('rejects empty input with the required length', () => {
      const error = expectFailure(Mono.tryFromInt16([]));
      expect(error).toBeInstanceOf(ConversionError);
      expect(error.message).toBe('ERROR: Given vector was length 0. This function requires length 1.');
      expect(error.actual).toBe(0);
      expect(error.required).toBe(1);
      expect(error.encoding).toBe('i16');
      expect(expectFailure(Mono.tryFromBytes(new Uint8Array(0))).encoding).toBe('u8');
      expect(expectFailure(Mono.tryFromInt24([])).encoding).toBe('i24');
    });

    it('ignores trailing elements', () => {
      expect(unwrapConversion(Mono.tryFromBytes([192, 0, 255])).mono).toBe(0.5);
    });

    it('encodes exactly one element per width', () => {
      const m = new Mono(-0.5);
      expect(Array.from(m.toBytes())).toEqual([64]);
      expect(Array.from(m.toInt16())).toEqual([-16384]);
      expect(Array.from(m.toInt24())).toEqual([0xc00000]);
    });

    it('negative 24-bit input comes back masked to three bytes', () => {
      const pcm = unwrapConversion(Mono.tryFromInt24([-4194304])).toInt24();
      expect(Array.from(pcm)).toEqual([12582912]);
      expect(signExtendI24(pcm[0])).toBe(-4194304);
    });

    it('16-bit values round-trip', () => {
      for (const v of [-32768, -12345, 0, 7, 32767]) {
        expect(Array.from(unwrapConversion(Mono.tryFromInt16([v])).toInt16())).toEqual([v]);
      }
    });
  });

  describe('panning', () => {
    it('ignores the placement', () => {
      expect(Mono.toSampleFormat(0.5, 0.9).mono).toBe(0.5);
      expect(monoPanner.toSampleFormat(-0.25, { anything: true }).mono).toBe(-0.25);
    });
  });
});
