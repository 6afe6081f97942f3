/**
 * Matrix - dense double-precision matrices stored as column vectors
 *
 * A matrix is an ordered list of equal-length columns. Every operation
 * returns a new matrix; inputs are never mutated.
 *
 * Elimination routines use partial pivoting: the pivot is the
 * largest-magnitude entry at or below the current row, and a column whose
 * candidates are all below `epsilon` is skipped. Entries that fall below
 * `epsilon` during elimination are stored as exact zeros.
 *
 * @example
 * ```typescript
 * const m = fromRows([
 *   [1, 3, 5],
 *   [8, 30, 2],
 *   [1, 89, 2],
 * ]);
 * rowReduce(m);                 // identity(3)
 * determinant(fromRows([[1, 2], [3, 4]])); // -2
 * ```
 */

import { SingularMatrixError } from "@symcalc/core";

// ============================================================================
// Type Definitions
// ============================================================================

/**
 * Matrix as column vectors. `columns[j][i]` is the entry at row i, column j.
 */
export interface Matrix {
  readonly columns: readonly Float64Array[];
}

/** Zero test used by elimination when no epsilon is given */
export const DEFAULT_EPSILON = 1e-5;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a matrix from its columns.
 *
 * @throws RangeError if there are no columns, a column is empty or lengths differ
 */
export function matrix(columns: ReadonlyArray<ArrayLike<number>>): Matrix {
  if (columns.length === 0) {
    throw new RangeError("Cannot create matrix from empty columns array");
  }
  const height = columns[0].length;
  if (height === 0) {
    throw new RangeError("Matrix columns must not be empty");
  }
  for (const column of columns) {
    if (column.length !== height) {
      throw new RangeError(
        `All columns must have the same length (expected ${height}, got ${column.length})`
      );
    }
  }
  return { columns: columns.map((column) => Float64Array.from(column)) };
}

/**
 * Create a matrix from row arrays.
 */
export function fromRows(rowArrays: ReadonlyArray<ReadonlyArray<number>>): Matrix {
  if (rowArrays.length === 0) {
    throw new RangeError("Cannot create matrix from empty rows array");
  }
  const c = rowArrays[0].length;
  for (const r of rowArrays) {
    if (r.length !== c) {
      throw new RangeError("All rows must have the same length");
    }
  }
  const columns: number[][] = [];
  for (let j = 0; j < c; j++) {
    columns.push(rowArrays.map((r) => r[j]));
  }
  return matrix(columns);
}

/**
 * Create a zero matrix of given dimensions.
 */
export function zeros(r: number, c: number): Matrix {
  return matrix(Array.from({ length: c }, () => new Float64Array(r)));
}

/**
 * Create an identity matrix of size n.
 */
export function identity(n: number): Matrix {
  return matrix(
    Array.from({ length: n }, (_, j) => {
      const column = new Float64Array(n);
      column[j] = 1;
      return column;
    })
  );
}

// ============================================================================
// Dimension and Element Access
// ============================================================================

/** Get the number of rows */
export function rows(m: Matrix): number {
  return m.columns[0].length;
}

/** Get the number of columns */
export function cols(m: Matrix): number {
  return m.columns.length;
}

/**
 * Get element at (row, col).
 */
export function get(m: Matrix, i: number, j: number): number {
  return m.columns[j][i];
}

/**
 * Get a row as an array.
 */
export function row(m: Matrix, i: number): number[] {
  return m.columns.map((column) => column[i]);
}

/**
 * Get a column as an array.
 */
export function col(m: Matrix, j: number): number[] {
  return Array.from(m.columns[j]);
}

/**
 * Convert matrix to 2D row-major array representation.
 */
export function toArray(m: Matrix): number[][] {
  const result: number[][] = [];
  for (let i = 0; i < rows(m); i++) {
    result.push(row(m, i));
  }
  return result;
}

// ============================================================================
// Basic Operations
// ============================================================================

/**
 * Transpose a matrix.
 */
export function transpose(m: Matrix): Matrix {
  return matrix(toArray(m));
}

/**
 * Matrix multiplication: (R×K) × (K×C) → (R×C)
 *
 * @throws RangeError if the inner dimensions differ
 */
export function matMul(a: Matrix, b: Matrix): Matrix {
  const r = rows(a);
  const k = cols(a);
  if (k !== rows(b)) {
    throw new RangeError(
      `Matrix multiplication dimension mismatch: ${r}x${k} * ${rows(b)}x${cols(b)}`
    );
  }

  return matrix(
    b.columns.map((bColumn) => {
      const out = new Float64Array(r);
      for (let i = 0; i < r; i++) {
        let sum = 0;
        for (let m = 0; m < k; m++) {
          sum += a.columns[m][i] * bColumn[m];
        }
        out[i] = sum;
      }
      return out;
    })
  );
}

/**
 * Trace of a square matrix (sum of diagonal elements).
 */
export function trace(m: Matrix): number {
  requireSquare(m, "trace");
  let sum = 0;
  for (let i = 0; i < rows(m); i++) {
    sum += m.columns[i][i];
  }
  return sum;
}

function requireSquare(m: Matrix, operation: string): number {
  const n = rows(m);
  if (n !== cols(m)) {
    throw new RangeError(`${operation} requires a square matrix, got ${n}x${cols(m)}`);
  }
  return n;
}

// ============================================================================
// Gaussian Elimination
// ============================================================================

interface Elimination {
  /** Row-major working copy after elimination */
  readonly data: number[][];
  /** Columns that received a pivot, in row order */
  readonly pivotColumns: number[];
  /** Number of row interchanges performed */
  readonly swaps: number;
}

/**
 * Forward elimination on a copy of `source`. With `reduce`, pivots are
 * scaled to 1 and eliminated above as well as below (Gauss-Jordan).
 */
function eliminate(source: number[][], epsilon: number, reduce: boolean): Elimination {
  const data = source.map((r) => r.slice());
  const r = data.length;
  const c = data[0].length;
  const pivotColumns: number[] = [];
  let swaps = 0;
  let pivotRow = 0;

  for (let j = 0; j < c && pivotRow < r; j++) {
    let best = pivotRow;
    for (let i = pivotRow + 1; i < r; i++) {
      if (Math.abs(data[i][j]) > Math.abs(data[best][j])) {
        best = i;
      }
    }

    if (Math.abs(data[best][j]) < epsilon) {
      for (let i = pivotRow; i < r; i++) {
        data[i][j] = 0;
      }
      continue;
    }

    if (best !== pivotRow) {
      [data[best], data[pivotRow]] = [data[pivotRow], data[best]];
      swaps++;
    }

    const pivotValues = data[pivotRow];
    if (reduce) {
      const pivot = pivotValues[j];
      for (let k = j; k < c; k++) {
        pivotValues[k] = snap(pivotValues[k] / pivot, epsilon);
      }
      pivotValues[j] = 1;
    }

    for (let i = reduce ? 0 : pivotRow + 1; i < r; i++) {
      if (i === pivotRow) continue;
      const target = data[i];
      const factor = target[j] / pivotValues[j];
      if (factor === 0) continue;
      for (let k = j; k < c; k++) {
        target[k] = snap(target[k] - factor * pivotValues[k], epsilon);
      }
      target[j] = 0;
    }

    pivotColumns.push(j);
    pivotRow++;
  }

  return { data, pivotColumns, swaps };
}

function snap(value: number, epsilon: number): number {
  return Math.abs(value) < epsilon ? 0 : value;
}

/**
 * Row echelon form: zeros below every pivot.
 */
export function echelon(m: Matrix, epsilon = DEFAULT_EPSILON): Matrix {
  return fromRows(eliminate(toArray(m), epsilon, false).data);
}

/**
 * Reduced row echelon form: unit pivots, zeros above and below each pivot.
 */
export function rowReduce(m: Matrix, epsilon = DEFAULT_EPSILON): Matrix {
  return fromRows(eliminate(toArray(m), epsilon, true).data);
}

/**
 * Number of pivots found by elimination.
 */
export function rank(m: Matrix, epsilon = DEFAULT_EPSILON): number {
  return eliminate(toArray(m), epsilon, false).pivotColumns.length;
}

/**
 * Determinant: product of the echelon diagonal, negated once per row swap.
 *
 * @throws RangeError for non-square matrices
 */
export function determinant(m: Matrix, epsilon = DEFAULT_EPSILON): number {
  const n = requireSquare(m, "determinant");
  const { data, pivotColumns, swaps } = eliminate(toArray(m), epsilon, false);
  if (pivotColumns.length < n) {
    return 0;
  }
  let det = swaps % 2 === 0 ? 1 : -1;
  for (let i = 0; i < n; i++) {
    det *= data[i][i];
  }
  return det;
}

/**
 * Inverse by Gauss-Jordan elimination of the augmented matrix [A | I].
 *
 * @throws RangeError for non-square matrices
 * @throws SingularMatrixError when a column of A has no pivot
 */
export function inverse(m: Matrix, epsilon = DEFAULT_EPSILON): Matrix {
  const n = requireSquare(m, "inverse");
  const augmented = toArray(m).map((r, i) => {
    const unit = new Array<number>(n).fill(0);
    unit[i] = 1;
    return r.concat(unit);
  });

  const { data, pivotColumns } = eliminate(augmented, epsilon, true);
  for (let j = 0; j < n; j++) {
    if (pivotColumns[j] !== j) {
      throw new SingularMatrixError(j);
    }
  }

  return fromRows(data.map((r) => r.slice(n)));
}

/**
 * Coefficients of det(xI - A), highest degree first, by Faddeev-LeVerrier.
 *
 * @example
 * characteristicPolynomial(fromRows([[2, 0], [0, 3]])); // [1, -5, 6]
 */
export function characteristicPolynomial(m: Matrix): number[] {
  const n = requireSquare(m, "characteristicPolynomial");
  const coefficients = [1];
  let previous = zeros(n, n);

  for (let k = 1; k <= n; k++) {
    // M_k = A * M_(k-1) + c_(n-k+1) * I
    const shifted = addScaledIdentity(matMul(m, previous), coefficients[k - 1]);
    coefficients.push(-trace(matMul(m, shifted)) / k);
    previous = shifted;
  }

  return coefficients.map((c) => (Object.is(c, -0) ? 0 : c));
}

function addScaledIdentity(m: Matrix, factor: number): Matrix {
  return matrix(
    m.columns.map((column, j) => {
      const out = Float64Array.from(column);
      out[j] += factor;
      return out;
    })
  );
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Check if two matrices are approximately equal.
 */
export function approxEquals(a: Matrix, b: Matrix, tolerance = 1e-10): boolean {
  if (rows(a) !== rows(b) || cols(a) !== cols(b)) return false;
  for (let j = 0; j < cols(a); j++) {
    for (let i = 0; i < rows(a); i++) {
      if (Math.abs(a.columns[j][i] - b.columns[j][i]) > tolerance) return false;
    }
  }
  return true;
}

/**
 * Render each row as `[a b c]` with entries rounded to `places` decimals,
 * one row per line. The output parses back as a matrix literal.
 */
export function formatMatrix(m: Matrix, places = 5): string {
  return toArray(m)
    .map((r) => "[" + r.map((v) => formatEntry(v, places)).join(" ") + "]")
    .join("\n");
}

function formatEntry(value: number, places: number): string {
  const rounded = Number(value.toFixed(places));
  return String(Object.is(rounded, -0) ? 0 : rounded);
}
