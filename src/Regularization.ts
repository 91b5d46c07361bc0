import { z } from 'zod';
import { ANY_ARITY, applyRows, gradientRows, type Arity, type DiffFunction } from './DiffFunction';
import { Linalg, type Matrix, type Vector } from './Linalg';

export const regularizerOptionsSchema = z.object({
  lambda: z.number().finite().default(1.0),
  ignoreFirst: z.boolean().default(false),
});

/** Coordinates that take part in the penalty. */
function included(vars: Vector, ignoreFirst: boolean): Vector {
  return ignoreFirst ? vars.slice(1) : vars;
}

/** Forces the gradient entry of an excluded first coordinate to exactly 0. */
function maskFirst(grad: number[], ignoreFirst: boolean): number[] {
  if (ignoreFirst && grad.length > 0) grad[0] = 0;
  return grad;
}

/**
 * L1 regularization, known as Lasso (Least Absolute Shrinkage and Selection Operator).
 * Penalizes the absolute magnitude of the coefficients: `lambda/2 * sum(|x|)`.
 *
 * With `ignoreFirst` the first coordinate (usually the bias) is left unpenalized.
 * @public
 */
export class L1 implements DiffFunction {
  readonly kind = 'l1';
  readonly lambda: number;
  readonly ignoreFirst: boolean;

  constructor(lambda: number = 1.0, ignoreFirst: boolean = false) {
    const options = regularizerOptionsSchema.parse({ lambda, ignoreFirst });
    this.lambda = options.lambda;
    this.ignoreFirst = options.ignoreFirst;
  }

  arity(): Arity {
    return ANY_ARITY;
  }

  apply(vars: Vector): number {
    return (this.lambda / 2) * Linalg.sum(Linalg.abs(included(vars, this.ignoreFirst)));
  }

  applyBatch(rows: Matrix): number[] {
    return applyRows(this, rows);
  }

  gradient(vars: Vector): number[] {
    return maskFirst(Linalg.scale(Linalg.sign(vars), this.lambda), this.ignoreFirst);
  }

  gradientBatch(rows: Matrix): number[][] {
    return gradientRows(this, rows);
  }
}

/**
 * L2 regularization, known as Ridge.
 * Penalizes the squared magnitude of the coefficients: `lambda/2 * sum(x^2)`.
 * @public
 */
export class L2 implements DiffFunction {
  readonly kind = 'l2';
  readonly lambda: number;
  readonly ignoreFirst: boolean;

  constructor(lambda: number = 1.0, ignoreFirst: boolean = false) {
    const options = regularizerOptionsSchema.parse({ lambda, ignoreFirst });
    this.lambda = options.lambda;
    this.ignoreFirst = options.ignoreFirst;
  }

  arity(): Arity {
    return ANY_ARITY;
  }

  apply(vars: Vector): number {
    return (this.lambda / 2) * Linalg.sum(Linalg.pow(included(vars, this.ignoreFirst), 2));
  }

  applyBatch(rows: Matrix): number[] {
    return applyRows(this, rows);
  }

  gradient(vars: Vector): number[] {
    return maskFirst(Linalg.scale(vars, this.lambda), this.ignoreFirst);
  }

  gradientBatch(rows: Matrix): number[][] {
    return gradientRows(this, rows);
  }
}
