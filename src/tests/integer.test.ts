import { describe, expect, it } from 'vitest';
import { isIntegerValue, isIntegerVector } from '../lib/integer';

describe('isIntegerValue', () => {
  it('accepts whole numbers', () => {
    expect(isIntegerValue(1)).toBe(true);
    expect(isIntegerValue(0)).toBe(true);
    expect(isIntegerValue(-42)).toBe(true);
    expect(isIntegerValue(3.0)).toBe(true);
    expect(isIntegerValue(10n)).toBe(true);
  });

  it('rejects fractional and non-finite numbers', () => {
    expect(isIntegerValue(1.1)).toBe(false);
    expect(isIntegerValue(-0.5)).toBe(false);
    expect(isIntegerValue(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it('treats missing values according to allowMissing', () => {
    expect(isIntegerValue(null)).toBe(false);
    expect(isIntegerValue(null, true)).toBe(true);
    expect(isIntegerValue(undefined, true)).toBe(true);
    expect(isIntegerValue(Number.NaN, false)).toBe(false);
    expect(isIntegerValue(Number.NaN, true)).toBe(true);
  });

  it('never accepts non-numeric values', () => {
    expect(isIntegerValue('1')).toBe(false);
    expect(isIntegerValue('text', true)).toBe(false);
    expect(isIntegerValue(true)).toBe(false);
    expect(isIntegerValue({ value: 1 })).toBe(false);
  });
});

describe('isIntegerVector', () => {
  it('checks every element in order', () => {
    expect(isIntegerVector([1, 2, 3])).toEqual([true, true, true]);
    expect(isIntegerVector([1.1, 2, 3])).toEqual([false, true, true]);
  });

  it('applies allowMissing to each element', () => {
    expect(isIntegerVector([1, null, 3], false)).toEqual([true, false, true]);
    expect(isIntegerVector([1, null, 3], true)).toEqual([true, true, true]);
  });

  it('gives false for every element of a text collection', () => {
    expect(isIntegerVector(['1', '2', '3'])).toEqual([false, false, false]);
  });

  it('accepts any iterable', () => {
    expect(isIntegerVector(new Set([4, 4.5]))).toEqual([true, false]);
    expect(isIntegerVector([])).toEqual([]);
  });

  it('throws a TypeError for input that is not iterable', () => {
    expect(() => Reflect.apply(isIntegerVector, undefined, [5])).toThrow(TypeError);
  });
});
