import { DimensionMismatchError } from './Errors';
import type { Matrix, Vector } from './Linalg';

/**
 * Expected length of the `vars` vector, or `'any'` when the function
 * accepts vectors of every length.
 * @public
 */
export type Arity = number | 'any';

/**
 * Sentinel for functions whose math does not depend on the input length.
 * @public
 */
export const ANY_ARITY = 'any' satisfies Arity;

/**
 * A function that can be evaluated at a point and returns its own gradient
 * in closed form.
 * @public
 */
export interface DiffFunction {
  /** Expected length of `vars`. */
  arity(): Arity;
  /** Evaluates the function at one point. */
  apply(vars: Vector): number;
  /** Evaluates the function at every row, preserving row order. */
  applyBatch(rows: Matrix): number[];
  /** Gradient with respect to `vars`, with the same length as `vars`. */
  gradient(vars: Vector): number[];
  /** Gradient at every row, stacked in row order. */
  gradientBatch(rows: Matrix): number[][];
}

/**
 * Functions that also act independently on every element of a scalar,
 * vector or matrix.
 * @public
 */
export interface ElementwiseFunction {
  apply1(x: number): number;
  apply1(x: Vector): number[];
  apply1(x: Matrix): number[][];
  gradient1(x: number): number;
  gradient1(x: Vector): number[];
  gradient1(x: Matrix): number[][];
}

/**
 * Throws a {@link DimensionMismatchError} when `vars` disagrees with a fixed arity.
 */
export function checkArity(f: DiffFunction, vars: Vector): void {
  const expected = f.arity();
  if (expected !== ANY_ARITY && vars.length !== expected) {
    throw new DimensionMismatchError('vars length does not match function arity', expected, vars.length);
  }
}

/**
 * Default batch evaluation: `apply` mapped over rows.
 */
export function applyRows(f: DiffFunction, rows: Matrix): number[] {
  return rows.map(r => f.apply(r));
}

/**
 * Default batch gradient: `gradient` mapped over rows.
 */
export function gradientRows(f: DiffFunction, rows: Matrix): number[][] {
  return rows.map(r => f.gradient(r));
}

export function arity(f: DiffFunction): Arity {
  return f.arity();
}

export function apply(f: DiffFunction, vars: Vector): number {
  return f.apply(vars);
}

export function applyBatch(f: DiffFunction, rows: Matrix): number[] {
  return f.applyBatch(rows);
}

export function gradient(f: DiffFunction, vars: Vector): number[] {
  return f.gradient(vars);
}

export function gradientBatch(f: DiffFunction, rows: Matrix): number[][] {
  return f.gradientBatch(rows);
}
