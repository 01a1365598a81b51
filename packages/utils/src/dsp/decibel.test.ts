import { describe, expect, it } from 'vitest';
import { dbToLinear, linearToDb } from './decibel';

describe('dbToLinear', () => {
  it('0 dB is unity', () => {
    expect(dbToLinear(0)).toBe(1);
  });

  it('-20 dB is a tenth, -120 dB is a millionth', () => {
    expect(dbToLinear(-20)).toBeCloseTo(0.1, 12);
    expect(dbToLinear(-120)).toBeCloseTo(1e-6, 15);
  });

  it('-3 dB is about half power', () => {
    const g = dbToLinear(-3);
    expect(g).toBeCloseTo(0.7079457843841379, 10);
    expect(g * g).toBeCloseTo(0.5, 2);
  });

  it('positive levels boost', () => {
    expect(dbToLinear(6)).toBeCloseTo(1.9952623149688795, 10);
  });
});

describe('linearToDb', () => {
  it('inverts dbToLinear', () => {
    expect(linearToDb(dbToLinear(-42))).toBeCloseTo(-42, 10);
  });

  it('silence is -Infinity', () => {
    expect(linearToDb(0)).toBe(Number.NEGATIVE_INFINITY);
  });

  it('uses magnitude for negative ratios', () => {
    expect(linearToDb(-0.1)).toBeCloseTo(-20, 10);
  });
});
