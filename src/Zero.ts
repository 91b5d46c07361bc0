import { ANY_ARITY, applyRows, gradientRows, type Arity, type DiffFunction } from './DiffFunction';
import { Linalg, type Matrix, type Vector } from './Linalg';

/**
 * Function which always returns 0. Identity element for {@link sumCombine}.
 * @public
 */
export class Zero implements DiffFunction {
  readonly kind = 'zero';

  arity(): Arity {
    return ANY_ARITY;
  }

  apply(_vars: Vector): number {
    return 0;
  }

  applyBatch(rows: Matrix): number[] {
    return applyRows(this, rows);
  }

  gradient(vars: Vector): number[] {
    return Linalg.zeros(vars.length);
  }

  gradientBatch(rows: Matrix): number[][] {
    return gradientRows(this, rows);
  }
}
