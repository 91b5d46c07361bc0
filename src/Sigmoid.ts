import { ANY_ARITY, applyRows, gradientRows, type Arity, type DiffFunction, type ElementwiseFunction } from './DiffFunction';
import { DimensionMismatchError } from './Errors';
import { Linalg, type Matrix, type Vector } from './Linalg';

/**
 * Logistic function `1 / (1 + e^-x)`.
 * @public
 */
export function logistic(x: number): number {
  return 1 / (1 + Math.exp(-x));
}

function logisticGradient(x: number): number {
  const s = logistic(x);
  return s - s * s;
}

/**
 * Elementwise logistic nonlinearity.
 *
 * `apply1`/`gradient1` act on every element of a scalar, vector or matrix.
 * The aggregate `apply`/`gradient` treat the function as single-input and
 * only read `vars[0]`.
 * @public
 */
export class Sigmoid implements DiffFunction, ElementwiseFunction {
  readonly kind = 'sigmoid';

  apply1(x: number): number;
  apply1(x: Vector): number[];
  apply1(x: Matrix): number[][];
  apply1(x: number | Vector | Matrix): number | number[] | number[][] {
    return elementwise(x, logistic);
  }

  gradient1(x: number): number;
  gradient1(x: Vector): number[];
  gradient1(x: Matrix): number[][];
  gradient1(x: number | Vector | Matrix): number | number[] | number[][] {
    return elementwise(x, logisticGradient);
  }

  arity(): Arity {
    return ANY_ARITY;
  }

  apply(vars: Vector): number {
    return logistic(first(vars));
  }

  applyBatch(rows: Matrix): number[] {
    return applyRows(this, rows);
  }

  /**
   * Partial derivatives of `sigmoid(vars[0])`: only entry 0 is non-zero.
   */
  gradient(vars: Vector): number[] {
    const grad = Linalg.zeros(vars.length);
    grad[0] = logisticGradient(first(vars));
    return grad;
  }

  gradientBatch(rows: Matrix): number[][] {
    return gradientRows(this, rows);
  }
}

function first(vars: Vector): number {
  if (vars.length === 0) {
    throw new DimensionMismatchError('sigmoid needs at least one input', 1, 0);
  }
  return vars[0];
}

function isMatrix(x: Vector | Matrix): x is Matrix {
  return x.length > 0 && Array.isArray(x[0]);
}

function elementwise(x: number | Vector | Matrix, fn: (v: number) => number): number | number[] | number[][] {
  if (typeof x === 'number') return fn(x);
  if (isMatrix(x)) return Linalg.mapMatrix(x, v => fn(v));
  return Linalg.map(x, v => fn(v));
}
