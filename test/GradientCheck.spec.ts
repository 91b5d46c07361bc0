import { describe, it, expect, vi, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { checkGradient, formatGradientCheck } from '../src/GradientCheck';
import { ANY_ARITY, applyRows, gradientRows, type DiffFunction } from '../src/DiffFunction';
import { Linear } from '../src/Linear';
import { Polynomial } from '../src/Polynomial';
import { LinearRegression, LogisticRegression } from '../src/Regression';
import { L1, L2 } from '../src/Regularization';
import { Sigmoid } from '../src/Sigmoid';
import { Zero } from '../src/Zero';
import { sumCombine } from '../src/Combinators';
import { Presets } from '../src/Presets';
import { withBias } from '../src/CoefficientTable';
import type { Matrix, Vector } from '../src/Linalg';

/** x0^2 with a gradient that forgets the factor 2. */
const brokenSquare: DiffFunction = {
  arity: () => ANY_ARITY,
  apply: (vars: Vector) => vars[0] * vars[0],
  applyBatch: (rows: Matrix) => applyRows(brokenSquare, rows),
  gradient: (vars: Vector) => [vars[0]],
  gradientBatch: (rows: Matrix) => gradientRows(brokenSquare, rows),
};

describe('checkGradient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('verifies the closed-form gradient of every smooth function', () => {
    const cases: [DiffFunction, number[]][] = [
      [new Zero(), [1, 2]],
      [new Linear([0.5, -2]), [3, 4]],
      [new Polynomial(Presets.doubleWell2d), [0.5, 0.3]],
      [new LinearRegression(withBias([[1, 2], [2, 4], [3, 7]])), [0.5, 1]],
      [new LogisticRegression(withBias([[1, 0], [2, 1], [3, 1]])), [0.1, -0.2]],
      [new L2(0.5), [1, -2, 3]],
      [new Sigmoid(), [0.3, 1]],
      [sumCombine(new Polynomial(Presets.bowl2d), new L2(0.1)), [1, -1]],
    ];
    for (const [f, vars] of cases) {
      const result = checkGradient(f, vars);
      expect(result.passed).toBe(true);
      expect(result.errors).toHaveLength(0);
      expect(result.totalChecks).toBe(vars.length);
    }
  });

  it('reports a wrong gradient', () => {
    const result = checkGradient(brokenSquare, [3]);
    expect(result.passed).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].index).toBe(0);
    expect(result.errors[0].analytical).toBe(3);
    expect(result.errors[0].numerical).toBeCloseTo(6);
    expect(result.maxError).toBeCloseTo(3);
  });

  it('flags the L1 gradient, which is lambda * sign(x) for a penalty of lambda/2 * |x|', () => {
    const result = checkGradient(new L1(), [2]);
    expect(result.passed).toBe(false);
    expect(result.errors[0].analytical).toBe(1);
    expect(result.errors[0].numerical).toBeCloseTo(0.5);
  });

  it('checks arity before differentiating', () => {
    expect(() => checkGradient(new Linear([1, 2]), [1])).toThrow('vars length does not match function arity');
  });

  it('rejects invalid options', () => {
    expect(() => checkGradient(new Zero(), [1], { epsilon: -1 })).toThrow(ZodError);
  });

  it('logs each entry when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    checkGradient(new Linear([1, 2]), [0, 0], { verbose: true });
    expect(log).toHaveBeenCalledTimes(3);
    expect(log).toHaveBeenNthCalledWith(1, '[GradientCheck] Checking 2 entries (eps=0.00001, tol=0.0001)');
  });

  it('stays quiet by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    checkGradient(new Linear([1, 2]), [0, 0]);
    expect(log).not.toHaveBeenCalled();
  });
});

describe('formatGradientCheck', () => {
  it('summarizes a pass on one line', () => {
    const text = formatGradientCheck({ passed: true, errors: [], maxError: 0.00012, totalChecks: 2 }, 'linearRegression');
    expect(text).toBe('✓ linearRegression: 2 gradients verified (max error: 1.20e-4)');
  });

  it('lists every failed entry', () => {
    const text = formatGradientCheck(
      {
        passed: false,
        errors: [{ index: 1, analytical: 3, numerical: 6, error: 3, relativeError: 0.5 }],
        maxError: 3,
        totalChecks: 2,
      },
      'broken'
    );
    expect(text.split('\n')).toEqual([
      '✗ broken: 1/2 gradients FAILED',
      '  [1]: analytical=3.000000, numerical=6.000000, error=3.00e+0',
    ]);
  });
});
