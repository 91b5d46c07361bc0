import type { L1, L2 } from './Regularization';
import type { Linear } from './Linear';
import type { LinearRegression, LogisticRegression } from './Regression';
import type { Polynomial } from './Polynomial';
import type { Sigmoid } from './Sigmoid';
import type { Zero } from './Zero';

/**
 * The closed set of concrete differentiable functions.
 * @public
 */
export type FunctionVariant =
  | Zero
  | Linear
  | Polynomial
  | LinearRegression
  | LogisticRegression
  | L1
  | L2
  | Sigmoid;

/**
 * Discriminant of {@link FunctionVariant}.
 * @public
 */
export type FunctionKind = FunctionVariant['kind'];

/**
 * Short human-readable description of a variant, e.g. `l2(lambda=0.5, ignoreFirst)`.
 */
export function describeFunction(f: FunctionVariant): string {
  switch (f.kind) {
    case 'zero':
    case 'sigmoid':
      return f.kind;
    case 'linear':
      return `linear(n=${f.coef.length})`;
    case 'polynomial':
      return `polynomial(degree=${f.coef.length - 1}, n=${f.arity()})`;
    case 'linearRegression':
    case 'logisticRegression':
      return `${f.kind}(samples=${f.coef.length})`;
    case 'l1':
    case 'l2':
      return `${f.kind}(lambda=${f.lambda}${f.ignoreFirst ? ', ignoreFirst' : ''})`;
  }
}
