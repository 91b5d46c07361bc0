import { InvalidCoefficientTableError } from './Errors';
import { Linalg, type Matrix } from './Linalg';
import { Linear } from './Linear';
import { Polynomial } from './Polynomial';
import { L1, L2 } from './Regularization';
import { LinearRegression, LogisticRegression } from './Regression';
import { Sigmoid } from './Sigmoid';
import { Zero } from './Zero';

/**
 * Pure constructor mapping a coefficient table to one function instance.
 * @public
 */
export type Builder<F> = (coef: Matrix) => F;

export const zero: Builder<Zero> = () => new Zero();

/**
 * Only the first row of the table is used.
 */
export const linear: Builder<Linear> = coef => {
  if (coef.length === 0) {
    throw new InvalidCoefficientTableError('linear coefficient table must have at least 1 row');
  }
  return new Linear(Linalg.row(coef, 0));
};

/**
 * Each row of the table increases the exponent.
 */
export const polynomial: Builder<Polynomial> = coef => new Polynomial(coef);

export const linearRegression: Builder<LinearRegression> = coef => new LinearRegression(coef);

export const logisticRegression: Builder<LogisticRegression> = coef => new LogisticRegression(coef);

export function l1(lambda: number = 1.0, ignoreFirst: boolean = false): Builder<L1> {
  return () => new L1(lambda, ignoreFirst);
}

export function l2(lambda: number = 1.0, ignoreFirst: boolean = false): Builder<L2> {
  return () => new L2(lambda, ignoreFirst);
}

export const sigmoid: Builder<Sigmoid> = () => new Sigmoid();
