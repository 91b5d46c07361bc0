import { z } from 'zod';
import { checkArity, type DiffFunction } from './DiffFunction';
import type { Vector } from './Linalg';

export const gradientCheckOptionsSchema = z.object({
  /** Finite-difference step (default: 1e-5) */
  epsilon: z.number().positive().default(1e-5),
  /** Maximum allowed absolute and relative error (default: 1e-4) */
  tolerance: z.number().positive().default(1e-4),
  /** Print every compared entry (default: false) */
  verbose: z.boolean().default(false),
});

/**
 * Configuration options for {@link checkGradient}.
 * @public
 */
export type GradientCheckOptions = z.input<typeof gradientCheckOptionsSchema>;

export interface GradientCheckError {
  index: number;
  analytical: number;
  numerical: number;
  error: number;
  relativeError: number;
}

/**
 * Result of comparing a closed-form gradient with central differences.
 * @public
 */
export interface GradientCheckResult {
  passed: boolean;
  errors: GradientCheckError[];
  maxError: number;
  totalChecks: number;
}

/**
 * Validates `f.gradient(vars)` against the central difference
 * `(f(x + eps*e_i) - f(x - eps*e_i)) / (2*eps)` for every coordinate.
 *
 * An entry fails when both its absolute and relative error exceed `tolerance`.
 *
 * @example
 * ```typescript
 * const result = checkGradient(new LinearRegression(table), [0, 0]);
 * console.log(formatGradientCheck(result, 'linearRegression'));
 * ```
 * @public
 */
export function checkGradient(f: DiffFunction, vars: Vector, options: GradientCheckOptions = {}): GradientCheckResult {
  const { epsilon, tolerance, verbose } = gradientCheckOptionsSchema.parse(options);
  checkArity(f, vars);

  const analyticalGradient = f.gradient(vars);
  const errors: GradientCheckError[] = [];
  let maxError = 0;

  if (verbose) {
    console.log(`[GradientCheck] Checking ${vars.length} entries (eps=${epsilon}, tol=${tolerance})`);
  }

  for (let i = 0; i < vars.length; i++) {
    const plus = vars.map((v, j) => (j === i ? v + epsilon : v));
    const minus = vars.map((v, j) => (j === i ? v - epsilon : v));
    const numerical = (f.apply(plus) - f.apply(minus)) / (2 * epsilon);
    const analytical = analyticalGradient[i];

    const error = Math.abs(analytical - numerical);
    const relativeError = error / (Math.abs(numerical) + 1e-10);
    maxError = Math.max(maxError, error);

    if (verbose) {
      console.log(`  [${i}] analytical=${analytical.toFixed(6)}, numerical=${numerical.toFixed(6)}, error=${error.toExponential(2)}`);
    }

    if (error > tolerance && relativeError > tolerance) {
      errors.push({ index: i, analytical, numerical, error, relativeError });
    }
  }

  return { passed: errors.length === 0, errors, maxError, totalChecks: vars.length };
}

/**
 * Formats gradient check results as a human-readable string.
 */
export function formatGradientCheck(result: GradientCheckResult, label: string): string {
  if (result.passed) {
    return `✓ ${label}: ${result.totalChecks} gradients verified (max error: ${result.maxError.toExponential(2)})`;
  }
  const lines = [`✗ ${label}: ${result.errors.length}/${result.totalChecks} gradients FAILED`];
  for (const e of result.errors) {
    lines.push(`  [${e.index}]: analytical=${e.analytical.toFixed(6)}, numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`);
  }
  return lines.join('\n');
}
