import { assertLength } from './Errors';

/**
 * Dense vector of doubles.
 * @public
 */
export type Vector = readonly number[];

/**
 * Dense row-major matrix of doubles.
 * @public
 */
export type Matrix = readonly (readonly number[])[];

/**
 * Dense vector and matrix operations used by the function variants.
 * Every operation returns a fresh array and never mutates its inputs.
 * @public
 */
export class Linalg {
  static zeros(n: number): number[] {
    return new Array<number>(n).fill(0);
  }

  static ones(n: number): number[] {
    return new Array<number>(n).fill(1);
  }

  static dot(a: Vector, b: Vector): number {
    assertLength(b.length, a.length, 'dot product length');
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      sum += a[i] * b[i];
    }
    return sum;
  }

  static add(a: Vector, b: Vector): number[] {
    assertLength(b.length, a.length, 'vector addition length');
    return a.map((v, i) => v + b[i]);
  }

  static sub(a: Vector, b: Vector): number[] {
    assertLength(b.length, a.length, 'vector subtraction length');
    return a.map((v, i) => v - b[i]);
  }

  static scale(a: Vector, k: number): number[] {
    return a.map(v => v * k);
  }

  static addScalar(a: Vector, k: number): number[] {
    return a.map(v => v + k);
  }

  static map(a: Vector, fn: (v: number, i: number) => number): number[] {
    return a.map(fn);
  }

  /**
   * Raises every element to `exponent`. `0 ** 0` is 1.
   */
  static pow(a: Vector, exponent: number): number[] {
    return a.map(v => Math.pow(v, exponent));
  }

  static abs(a: Vector): number[] {
    return a.map(v => Math.abs(v));
  }

  /**
   * Elementwise signum; the sign of 0 is 0.
   */
  static sign(a: Vector): number[] {
    return a.map(v => (v > 0 ? 1 : v < 0 ? -1 : 0));
  }

  static sum(a: Vector): number {
    let sum = 0;
    for (const v of a) sum += v;
    return sum;
  }

  /**
   * Returns `[rows, cols]`. The column count is taken from the first row
   * and checked against every other row.
   */
  static shape(m: Matrix): [number, number] {
    const cols = m.length > 0 ? m[0].length : 0;
    for (const r of m) {
      assertLength(r.length, cols, 'matrix row length');
    }
    return [m.length, cols];
  }

  static row(m: Matrix, i: number): number[] {
    return [...m[i]];
  }

  static column(m: Matrix, j: number): number[] {
    return m.map(r => r[j]);
  }

  /**
   * Columns `from` (inclusive) to `to` (exclusive) of every row.
   */
  static sliceColumns(m: Matrix, from: number, to: number): number[][] {
    return m.map(r => r.slice(from, to));
  }

  static transpose(m: Matrix): number[][] {
    const [rows, cols] = Linalg.shape(m);
    const t = Array.from({ length: cols }, () => new Array<number>(rows).fill(0));
    for (let i = 0; i < rows; i++) {
      for (let j = 0; j < cols; j++) {
        t[j][i] = m[i][j];
      }
    }
    return t;
  }

  /**
   * Matrix-vector product `m * v`.
   */
  static matVec(m: Matrix, v: Vector): number[] {
    return m.map(r => Linalg.dot(r, v));
  }

  /**
   * Concatenates matrices side by side; all must have the same row count.
   */
  static horzcat(...ms: Matrix[]): number[][] {
    if (ms.length === 0) return [];
    const rows = ms[0].length;
    for (const m of ms) {
      assertLength(m.length, rows, 'horizontal concatenation row count');
    }
    return Array.from({ length: rows }, (_, i) => ms.flatMap(m => m[i]));
  }

  static mapMatrix(m: Matrix, fn: (v: number, i: number, j: number) => number): number[][] {
    return m.map((r, i) => r.map((v, j) => fn(v, i, j)));
  }
}
