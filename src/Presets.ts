import type { Matrix } from './Linalg';

/**
 * Polynomial coefficient tables for simple test objectives.
 * Row `i` holds the coefficients of exponent `i`.
 * @public
 */
export class Presets {
  /** `x0^2`, minimum at 0. */
  static readonly square1d: Matrix = [[0.0], [0.0], [1.0]];

  /** `x0^2 + 5*x1^2 + 10`, convex with minimum 10 at (0, 0). */
  static readonly bowl2d: Matrix = [
    [0.0, 10.0],
    [0.0, 0.0],
    [1.0, 5.0],
  ];

  /**
   * `x0^4 - 2*x0^2 + x1^2`, non-convex with a saddle point at (0, 0)
   * and two minima at (-1, 0) and (1, 0).
   */
  static readonly doubleWell2d: Matrix = [
    [0.0, 0.0],
    [0.0, 0.0],
    [-2.0, 1.0],
    [0.0, 0.0],
    [1.0, 0.0],
  ];
}
