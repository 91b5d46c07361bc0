import { applyRows, checkArity, gradientRows, type Arity, type DiffFunction } from './DiffFunction';
import { Linalg, type Matrix, type Vector } from './Linalg';

/**
 * Polynomial function
 * `(c00*x0^0 + ... + c0n*xn^0) + (c10*x0^1 + ... + c1n*xn^1) + ... + (cm0*x0^m + ... + cmn*xn^m)`.
 *
 * Row `i` of `coef` holds the coefficients of exponent `i`, one column per input dimension.
 * @public
 */
export class Polynomial implements DiffFunction {
  readonly kind = 'polynomial';

  constructor(readonly coef: Matrix) {}

  arity(): Arity {
    return Linalg.shape(this.coef)[1];
  }

  apply(vars: Vector): number {
    checkArity(this, vars);
    let sum = 0;
    for (let i = 0; i < this.coef.length; i++) {
      sum += Linalg.dot(this.coef[i], Linalg.pow(vars, i));
    }
    return sum;
  }

  applyBatch(rows: Matrix): number[] {
    return applyRows(this, rows);
  }

  /**
   * `d/dxj = sum_i c_ij * i * xj^max(0, i - 1)`.
   * The exponent is clamped at 0 so the constant row never raises to -1.
   */
  gradient(vars: Vector): number[] {
    checkArity(this, vars);
    const terms = Linalg.mapMatrix(this.coef, (c, i, j) => c * i * Math.pow(vars[j], Math.max(0, i - 1)));
    return Linalg.zeros(vars.length).map((_, j) => Linalg.sum(Linalg.column(terms, j)));
  }

  gradientBatch(rows: Matrix): number[][] {
    return gradientRows(this, rows);
  }
}
