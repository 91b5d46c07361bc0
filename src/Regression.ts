import { applyRows, checkArity, gradientRows, type Arity, type DiffFunction } from './DiffFunction';
import { InvalidCoefficientTableError } from './Errors';
import { Linalg, type Matrix, type Vector } from './Linalg';
import { logistic } from './Sigmoid';

/**
 * Splits a training table into the feature matrix (every column but the last)
 * and the target vector (the last column).
 * @public
 */
export function splitFeaturesTarget(coef: Matrix): { xs: number[][]; y: number[] } {
  if (coef.length < 1) {
    throw new InvalidCoefficientTableError('regression table must have at least 1 row');
  }
  const [, cols] = Linalg.shape(coef);
  if (cols < 2) {
    throw new InvalidCoefficientTableError(
      `regression table must have at least 2 columns (features + target), got ${cols}`
    );
  }
  return {
    xs: Linalg.sliceColumns(coef, 0, cols - 1),
    y: Linalg.column(coef, cols - 1),
  };
}

function featureCount(coef: Matrix): number {
  return splitFeaturesTarget(coef).xs[0].length;
}

/**
 * Linear regression cost. Mean squared error (halved) of the linear model
 * parametrized by `vars` over the training set packed in `coef`:
 *
 * ```
 * J(t) = 1/2m * sum(X * t - y)^2
 * ```
 *
 * Taking the partial derivative of each `tj` and stacking them gives
 *
 * ```
 * grad(J, t) = 1/m * transpose(X) * (X * t - y)
 * ```
 *
 * where `X` is the feature matrix (bias column first), `y` the target column
 * and `m` the number of samples.
 * @public
 */
export class LinearRegression implements DiffFunction {
  readonly kind = 'linearRegression';

  constructor(readonly coef: Matrix) {}

  arity(): Arity {
    return featureCount(this.coef);
  }

  apply(vars: Vector): number {
    checkArity(this, vars);
    const { xs, y } = splitFeaturesTarget(this.coef);
    const residual = Linalg.sub(Linalg.matVec(xs, vars), y);
    return (0.5 / this.coef.length) * Linalg.sum(Linalg.pow(residual, 2));
  }

  applyBatch(rows: Matrix): number[] {
    return applyRows(this, rows);
  }

  gradient(vars: Vector): number[] {
    checkArity(this, vars);
    const { xs, y } = splitFeaturesTarget(this.coef);
    const residual = Linalg.sub(Linalg.matVec(xs, vars), y);
    return Linalg.scale(Linalg.matVec(Linalg.transpose(xs), residual), 1 / this.coef.length);
  }

  gradientBatch(rows: Matrix): number[][] {
    return gradientRows(this, rows);
  }
}

/**
 * Logistic regression cost (mean binary cross-entropy):
 *
 * ```
 * s = sigmoid(X * t)
 * J(t) = 1/m * sum(-y * log(s) - (1 - y) * log(1 - s))
 * grad(J, t) = 1/m * transpose(X) * (s - y)
 * ```
 *
 * `log` is not clamped: a saturated `s` on the wrong side of its target
 * yields `Infinity` or `NaN`.
 * @public
 */
export class LogisticRegression implements DiffFunction {
  readonly kind = 'logisticRegression';

  constructor(readonly coef: Matrix) {}

  arity(): Arity {
    return featureCount(this.coef);
  }

  apply(vars: Vector): number {
    checkArity(this, vars);
    const { xs, y } = splitFeaturesTarget(this.coef);
    const s = Linalg.map(Linalg.matVec(xs, vars), logistic);
    const losses = s.map((si, i) => -y[i] * Math.log(si) - (1 - y[i]) * Math.log(1 - si));
    return (1 / y.length) * Linalg.sum(losses);
  }

  applyBatch(rows: Matrix): number[] {
    return applyRows(this, rows);
  }

  gradient(vars: Vector): number[] {
    checkArity(this, vars);
    const { xs, y } = splitFeaturesTarget(this.coef);
    const s = Linalg.map(Linalg.matVec(xs, vars), logistic);
    return Linalg.scale(Linalg.matVec(Linalg.transpose(xs), Linalg.sub(s, y)), 1 / this.coef.length);
  }

  gradientBatch(rows: Matrix): number[][] {
    return gradientRows(this, rows);
  }
}
