import { describe, it, expect } from 'vitest';
import { Zero } from '../src/Zero';

describe('Zero', () => {
  const f = new Zero();

  it('is 0 everywhere', () => {
    expect(f.apply([1, 2, 3])).toBe(0);
    expect(f.apply([])).toBe(0);
    expect(f.applyBatch([[1], [2, 3]])).toEqual([0, 0]);
  });

  it('has a zero gradient of the input length', () => {
    expect(f.gradient([4, -5])).toEqual([0, 0]);
    expect(f.gradientBatch([[1], [2, 3]])).toEqual([[0], [0, 0]]);
  });

  it('accepts any arity', () => {
    expect(f.arity()).toBe('any');
  });
});
