/**
 * Raised when a vector or matrix row does not have the expected length.
 * @public
 */
export class DimensionMismatchError extends Error {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`${message}: expected ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
  }
}

/**
 * Raised when a coefficient table cannot be used by a builder,
 * e.g. a regression table that cannot be split into features and target.
 * @public
 */
export class InvalidCoefficientTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCoefficientTableError';
  }
}

export function assertLength(actual: number, expected: number, what: string): void {
  if (actual !== expected) {
    throw new DimensionMismatchError(what, expected, actual);
  }
}
