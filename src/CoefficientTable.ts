import { z } from 'zod';
import { InvalidCoefficientTableError } from './Errors';
import { Linalg, type Matrix } from './Linalg';

export const coefficientTableSchema = z
  .array(z.array(z.number().finite()).nonempty('row must not be empty'))
  .nonempty('table must have at least 1 row')
  .refine(rows => rows.every(r => r.length === rows[0].length), 'all rows must have the same number of columns');

/**
 * Validates an untrusted numeric table (e.g. parsed JSON or delimited text)
 * before it is handed to a builder.
 * @public
 */
export function parseCoefficientTable(input: unknown): Matrix {
  const result = coefficientTableSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
    throw new InvalidCoefficientTableError(`invalid coefficient table: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Prepends the bias (intercept) column of ones, giving the bias-first,
 * target-last layout the regression builders expect.
 * @public
 */
export function withBias(table: Matrix): number[][] {
  return Linalg.horzcat(
    table.map(() => [1.0]),
    table
  );
}
