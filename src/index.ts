export { Linalg, type Matrix, type Vector } from './Linalg';
export { DimensionMismatchError, InvalidCoefficientTableError } from './Errors';
export {
  ANY_ARITY,
  apply,
  applyBatch,
  applyRows,
  arity,
  checkArity,
  gradient,
  gradientBatch,
  gradientRows,
  type Arity,
  type DiffFunction,
  type ElementwiseFunction,
} from './DiffFunction';

// Function variants
export { Zero } from './Zero';
export { Linear } from './Linear';
export { Polynomial } from './Polynomial';
export { LinearRegression, LogisticRegression, splitFeaturesTarget } from './Regression';
export { L1, L2, regularizerOptionsSchema } from './Regularization';
export { Sigmoid, logistic } from './Sigmoid';
export { describeFunction, type FunctionKind, type FunctionVariant } from './FunctionVariant';

// Builders and combinators
export {
  l1,
  l2,
  linear,
  linearRegression,
  logisticRegression,
  polynomial,
  sigmoid,
  zero,
  type Builder,
} from './Builder';
export { CombinedFunction, pairBuilders, sumCombine } from './Combinators';

export { Presets } from './Presets';
export { coefficientTableSchema, parseCoefficientTable, withBias } from './CoefficientTable';
export {
  checkGradient,
  formatGradientCheck,
  gradientCheckOptionsSchema,
  type GradientCheckError,
  type GradientCheckOptions,
  type GradientCheckResult,
} from './GradientCheck';
