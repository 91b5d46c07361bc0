import { checkArity, gradientRows, type Arity, type DiffFunction } from './DiffFunction';
import { Linalg, type Matrix, type Vector } from './Linalg';

/**
 * Linear function `k0*x0 + k1*x1 + ... + kn*xn`.
 * @public
 */
export class Linear implements DiffFunction {
  readonly kind = 'linear';

  constructor(readonly coef: Vector) {}

  arity(): Arity {
    return this.coef.length;
  }

  apply(vars: Vector): number {
    checkArity(this, vars);
    return Linalg.dot(this.coef, vars);
  }

  /**
   * One dot product per row.
   */
  applyBatch(rows: Matrix): number[] {
    for (const r of rows) checkArity(this, r);
    return Linalg.matVec(rows, this.coef);
  }

  /**
   * The gradient is the coefficient vector, independent of `vars`.
   */
  gradient(vars: Vector): number[] {
    checkArity(this, vars);
    return [...this.coef];
  }

  gradientBatch(rows: Matrix): number[][] {
    return gradientRows(this, rows);
  }
}
