import { describe, expect, test } from 'vitest';
import { lerp } from './lerp';

describe('number/lerp', () => {
  test('hits both endpoints', () => {
    expect(lerp(-1, -1, 0, 0, -3)).toBe(0);
    expect(lerp(0, -1, 0, 0, -3)).toBe(-3);
  });
  test('interpolates between endpoints', () => {
    expect(lerp(0.5, 0, 1, -3, -120)).toBe(-61.5);
    expect(lerp(0.25, 0, 1, 0, 8)).toBe(2);
  });
  test('descending domain', () => {
    expect(lerp(5, 10, 0, 0, 100)).toBe(50);
  });
  test('extrapolates outside the domain', () => {
    expect(lerp(2, 0, 1, 0, 10)).toBe(20);
    expect(lerp(-1, 0, 1, 0, 10)).toBe(-10);
  });
  test('degenerate domain returns y0', () => {
    expect(lerp(3, 1, 1, 7, 9)).toBe(7);
  });
});
