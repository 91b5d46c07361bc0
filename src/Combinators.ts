import { ANY_ARITY, checkArity, type Arity, type DiffFunction } from './DiffFunction';
import { DimensionMismatchError } from './Errors';
import { Linalg, type Matrix, type Vector } from './Linalg';
import type { Builder } from './Builder';

/**
 * Pointwise sum of two functions. Is itself a {@link DiffFunction}, so sums nest.
 * @public
 */
export class CombinedFunction<A extends DiffFunction, B extends DiffFunction> implements DiffFunction {
  readonly kind = 'combined';

  constructor(
    readonly first: A,
    readonly second: B
  ) {}

  /**
   * Whichever operand's arity is fixed, or `'any'` if neither is.
   */
  arity(): Arity {
    const a = this.first.arity();
    const b = this.second.arity();
    if (a === ANY_ARITY) return b;
    if (b === ANY_ARITY) return a;
    if (a !== b) {
      throw new DimensionMismatchError('combined functions disagree on arity', a, b);
    }
    return a;
  }

  apply(vars: Vector): number {
    checkArity(this, vars);
    return this.first.apply(vars) + this.second.apply(vars);
  }

  applyBatch(rows: Matrix): number[] {
    return Linalg.add(this.first.applyBatch(rows), this.second.applyBatch(rows));
  }

  gradient(vars: Vector): number[] {
    checkArity(this, vars);
    return Linalg.add(this.first.gradient(vars), this.second.gradient(vars));
  }

  gradientBatch(rows: Matrix): number[][] {
    const a = this.first.gradientBatch(rows);
    const b = this.second.gradientBatch(rows);
    return a.map((g, i) => Linalg.add(g, b[i]));
  }
}

/**
 * Joins two functions into their pointwise sum.
 * @public
 */
export function sumCombine<A extends DiffFunction, B extends DiffFunction>(f1: A, f2: B): CombinedFunction<A, B> {
  return new CombinedFunction(f1, f2);
}

/**
 * Joins two builders into one that builds both functions from the same table.
 * @public
 */
export function pairBuilders<F1, F2>(b1: Builder<F1>, b2: Builder<F2>): Builder<readonly [F1, F2]> {
  return coef => [b1(coef), b2(coef)] as const;
}
