import { describe, it, expect } from 'vitest';
import { Linalg } from '../src/Linalg';
import { DimensionMismatchError } from '../src/Errors';

describe('Linalg', () => {
  it('computes dot products', () => {
    expect(Linalg.dot([1, 2, 3], [4, 5, 6])).toBe(32);
    expect(Linalg.dot([], [])).toBe(0);
  });

  it('rejects vectors of different lengths', () => {
    expect(() => Linalg.dot([1, 2], [1])).toThrow(DimensionMismatchError);
    expect(() => Linalg.add([1], [1, 2])).toThrow('vector addition length: expected 1, got 2');
  });

  it('applies elementwise operations', () => {
    expect(Linalg.pow([2, -3], 2)).toEqual([4, 9]);
    expect(Linalg.pow([2, 0], 0)).toEqual([1, 1]);
    expect(Linalg.abs([-1.5, 2])).toEqual([1.5, 2]);
    expect(Linalg.sign([-2, 0, 3])).toEqual([-1, 0, 1]);
    expect(Linalg.scale([1, -2], 3)).toEqual([3, -6]);
    expect(Linalg.addScalar([1, 2], 1)).toEqual([2, 3]);
    expect(Linalg.sub([5, 5], [1, 2])).toEqual([4, 3]);
    expect(Linalg.sum([1, 2, 3.5])).toBe(6.5);
  });

  it('slices rows and columns', () => {
    const m = [[1, 2, 3], [4, 5, 6]];
    expect(Linalg.shape(m)).toEqual([2, 3]);
    expect(Linalg.row(m, 1)).toEqual([4, 5, 6]);
    expect(Linalg.column(m, 2)).toEqual([3, 6]);
    expect(Linalg.sliceColumns(m, 0, 2)).toEqual([[1, 2], [4, 5]]);
  });

  it('rejects ragged matrices', () => {
    expect(() => Linalg.shape([[1, 2], [3]])).toThrow(DimensionMismatchError);
  });

  it('transposes and multiplies', () => {
    const m = [[1, 2, 3], [4, 5, 6]];
    expect(Linalg.transpose(m)).toEqual([[1, 4], [2, 5], [3, 6]]);
    expect(Linalg.matVec(m, [1, 0, -1])).toEqual([-2, -2]);
  });

  it('concatenates horizontally', () => {
    expect(Linalg.horzcat([[1], [1]], [[2, 3], [4, 5]])).toEqual([[1, 2, 3], [1, 4, 5]]);
    expect(() => Linalg.horzcat([[1]], [[2], [3]])).toThrow(DimensionMismatchError);
  });

  it('does not mutate its inputs', () => {
    const v = [1, 2];
    Linalg.scale(v, 10);
    Linalg.pow(v, 3);
    expect(v).toEqual([1, 2]);
  });
});
