/**
 * Matrix<R, C> - dense row-major matrices with a numeric precision
 *
 * Matrices are branded Float64Arrays that carry their dimensions and their
 * DType. They serve both as homogeneous affine matrices and as batches of
 * coordinates (one point per row). Values are stored already converted to the
 * matrix's dtype, so a float32 matrix only ever holds float32-rounded values.
 *
 * @example
 * ```typescript
 * const a = matrix(2, 3, [1, 2, 3, 4, 5, 6]);  // 2x3 float64 matrix
 * const b = matrix(3, 2, [1, 2, 3, 4, 5, 6]);  // 3x2 float64 matrix
 * const c = matMul(a, b);                      // 2x2
 * const i = identity(3, "int32");              // 3x3 int32 identity
 * ```
 */

import { DTYPES, canCast, castValue, isFloat, isRepresentable, safeDType, type DType } from "./dtype.js";

// ============================================================================
// Type Definitions
// ============================================================================

/** Type-level brand for row count */
export interface Rows<N extends number> {
  readonly __rows: N;
}

/** Type-level brand for column count */
export interface Cols<N extends number> {
  readonly __cols: N;
}

/** Brand for the precision of the stored values */
export interface Typed {
  readonly __dtype: DType;
}

/**
 * Matrix type - branded Float64Array with dimension and dtype tracking.
 * Data is stored in row-major order.
 */
export type Matrix<R extends number = number, C extends number = number> = Float64Array &
  Rows<R> &
  Cols<C> &
  Typed;

/** Anything that can be read as a batch of points: a matrix, one point, or rows of points */
export type MatrixLike = Matrix | readonly number[] | readonly (readonly number[])[];

function brand<R extends number, C extends number>(
  data: Float64Array,
  rows: R,
  cols: C,
  dtype: DType
): Matrix<R, C> {
  // Dimensions live on non-enumerable properties for runtime access
  Object.defineProperty(data, "__rows", { value: rows, enumerable: false });
  Object.defineProperty(data, "__cols", { value: cols, enumerable: false });
  Object.defineProperty(data, "__dtype", { value: dtype, enumerable: false });
  return data as Matrix<R, C>;
}

function castAll(data: Float64Array, dtype: DType): Float64Array {
  if (dtype === "float64") return data;
  for (let i = 0; i < data.length; i++) {
    data[i] = castValue(data[i], dtype);
  }
  return data;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a matrix from dimensions and data.
 *
 * @param data - Matrix data in row-major order, converted to `dtype`
 * @throws RangeError if data length doesn't match dimensions
 */
export function matrix<R extends number, C extends number>(
  rows: R,
  cols: C,
  data: ArrayLike<number>,
  dtype: DType = "float64"
): Matrix<R, C> {
  const expectedLength = rows * cols;
  if (data.length !== expectedLength) {
    throw new RangeError(
      `Matrix data length ${data.length} doesn't match dimensions ${rows}x${cols} (expected ${expectedLength})`
    );
  }
  return brand(castAll(Float64Array.from(data), dtype), rows, cols, dtype);
}

/**
 * Create a zero matrix of given dimensions.
 */
export function zeros<R extends number, C extends number>(
  rows: R,
  cols: C,
  dtype: DType = "float64"
): Matrix<R, C> {
  return brand(new Float64Array(rows * cols), rows, cols, dtype);
}

/**
 * Create an identity matrix of size n.
 */
export function identity<N extends number>(n: N, dtype: DType = "float64"): Matrix<N, N> {
  const arr = new Float64Array(n * n);
  for (let i = 0; i < n; i++) {
    arr[i * n + i] = 1;
  }
  return brand(arr, n, n, dtype);
}

/**
 * Create a matrix from row arrays.
 *
 * @throws RangeError if the rows are empty or ragged
 */
export function fromRows<R extends number, C extends number>(
  rowData: readonly (readonly number[])[],
  dtype: DType = "float64"
): Matrix<R, C> {
  if (rowData.length === 0) {
    throw new RangeError("Cannot create matrix from empty rows array");
  }
  const c = rowData[0].length;
  const data: number[] = [];
  for (const r of rowData) {
    if (r.length !== c) {
      throw new RangeError("All rows must have the same length");
    }
    data.push(...r);
  }
  return brand(castAll(Float64Array.from(data), dtype), rowData.length as R, c as C, dtype);
}

/**
 * Create a diagonal matrix from a vector.
 */
export function diag<N extends number>(values: readonly number[], dtype: DType = "float64"): Matrix<N, N> {
  const n = values.length;
  const arr = new Float64Array(n * n);
  for (let i = 0; i < n; i++) {
    arr[i * n + i] = values[i];
  }
  return brand(castAll(arr, dtype), n as N, n as N, dtype);
}

// ============================================================================
// Runtime Dimension Access
// ============================================================================

/** Get the number of rows */
export function rows<R extends number, C extends number>(m: Matrix<R, C>): R {
  return m.__rows;
}

/** Get the number of columns */
export function cols<R extends number, C extends number>(m: Matrix<R, C>): C {
  return m.__cols;
}

/** Get the precision of the stored values */
export function dtypeOf(m: Matrix): DType {
  return m.__dtype;
}

export function isMatrix(value: unknown): value is Matrix {
  return (
    value instanceof Float64Array &&
    typeof Reflect.get(value, "__rows") === "number" &&
    typeof Reflect.get(value, "__cols") === "number" &&
    typeof Reflect.get(value, "__dtype") === "string"
  );
}

/**
 * Read a matrix-like value as a 2-D batch.
 * A matrix passes through unchanged; a flat array is one row; nested arrays
 * are rows. Plain numbers are converted to `dtype`.
 *
 * @throws RangeError if nested rows are ragged
 */
export function toMatrix(value: MatrixLike, dtype: DType = "float64"): Matrix {
  if (isMatrix(value)) return value;
  if (value.length === 0) return zeros(1, 0, dtype);
  const first = value[0];
  if (typeof first === "number") {
    const flat: number[] = [];
    for (const v of value) {
      if (typeof v !== "number") {
        throw new RangeError("Cannot mix numbers and rows in one batch");
      }
      flat.push(v);
    }
    return matrix(1, flat.length, flat, dtype);
  }
  const nested: (readonly number[])[] = [];
  for (const v of value) {
    if (typeof v === "number") {
      throw new RangeError("Cannot mix numbers and rows in one batch");
    }
    nested.push(v);
  }
  return fromRows(nested, dtype);
}

// ============================================================================
// Element Access
// ============================================================================

/**
 * Get a row as an array.
 */
export function row(m: Matrix, i: number): number[] {
  const c = cols(m);
  const result: number[] = [];
  const start = i * c;
  for (let j = 0; j < c; j++) {
    result.push(m[start + j]);
  }
  return result;
}

// ============================================================================
// Basic Operations
// ============================================================================

/**
 * Independent copy with the same shape and dtype.
 */
export function copy<R extends number, C extends number>(m: Matrix<R, C>): Matrix<R, C> {
  return brand(Float64Array.from(m), rows(m), cols(m), dtypeOf(m));
}

/**
 * Copy converted to another dtype.
 */
export function astype<R extends number, C extends number>(
  m: Matrix<R, C>,
  dtype: DType
): Matrix<R, C> {
  return brand(castAll(Float64Array.from(m), dtype), rows(m), cols(m), dtype);
}

/**
 * Transpose a matrix.
 */
export function transpose<R extends number, C extends number>(m: Matrix<R, C>): Matrix<C, R> {
  const r = rows(m);
  const c = cols(m);
  const result = new Float64Array(r * c);
  for (let i = 0; i < r; i++) {
    for (let j = 0; j < c; j++) {
      result[j * r + i] = m[i * c + j];
    }
  }
  return brand(result, c, r, dtypeOf(m));
}

/**
 * Matrix multiplication.
 * The inner dimensions must match: (R×K) × (K×C) → (R×C).
 * The result dtype is the promotion of both operands.
 */
export function matMul<R extends number, K extends number, C extends number>(
  a: Matrix<R, K>,
  b: Matrix<K, C>
): Matrix<R, C> {
  const r = rows(a);
  const k = cols(a);
  const c = cols(b);

  if (k !== rows(b)) {
    throw new RangeError(`Matrix multiplication dimension mismatch: ${r}x${k} * ${rows(b)}x${c}`);
  }

  const result = new Float64Array(r * c);
  for (let i = 0; i < r; i++) {
    for (let j = 0; j < c; j++) {
      let sum = 0;
      for (let m = 0; m < k; m++) {
        sum += a[i * k + m] * b[m * c + j];
      }
      result[i * c + j] = sum;
    }
  }
  const dtype = safeDType(dtypeOf(a), dtypeOf(b));
  return brand(castAll(result, dtype), r, c, dtype);
}

// ============================================================================
// Slicing and Stacking
// ============================================================================

/**
 * Columns `[start, end)` of every row.
 */
export function sliceCols(m: Matrix, start: number, end: number): Matrix {
  const r = rows(m);
  const c = cols(m);
  if (start < 0 || end > c || start > end) {
    throw new RangeError(`Column slice [${start}, ${end}) out of range for ${r}x${c} matrix`);
  }
  const width = end - start;
  const result = new Float64Array(r * width);
  for (let i = 0; i < r; i++) {
    for (let j = 0; j < width; j++) {
      result[i * width + j] = m[i * c + start + j];
    }
  }
  return brand(result, r, width, dtypeOf(m));
}

/**
 * Concatenate matrices column-wise. All operands need the same row count.
 */
export function hstack(parts: readonly Matrix[]): Matrix {
  if (parts.length === 0) {
    throw new RangeError("Cannot stack an empty list of matrices");
  }
  const r = rows(parts[0]);
  for (const p of parts) {
    if (rows(p) !== r) {
      throw new RangeError(`Cannot stack matrices with ${r} and ${rows(p)} rows`);
    }
  }
  const c = parts.reduce((sum, p) => sum + cols(p), 0);
  const result = new Float64Array(r * c);
  let offset = 0;
  for (const p of parts) {
    const pc = cols(p);
    for (let i = 0; i < r; i++) {
      for (let j = 0; j < pc; j++) {
        result[i * c + offset + j] = p[i * pc + j];
      }
    }
    offset += pc;
  }
  const dtype = safeDType(...parts.map(dtypeOf));
  return brand(castAll(result, dtype), r, c, dtype);
}

/**
 * Block-diagonal matrix with `blocks` along the diagonal, zeros elsewhere.
 */
export function blockDiag(blocks: readonly Matrix[]): Matrix {
  if (blocks.length === 0) {
    throw new RangeError("Cannot build a block-diagonal matrix from no blocks");
  }
  const r = blocks.reduce((sum, b) => sum + rows(b), 0);
  const c = blocks.reduce((sum, b) => sum + cols(b), 0);
  const result = new Float64Array(r * c);
  let rowOffset = 0;
  let colOffset = 0;
  for (const b of blocks) {
    const br = rows(b);
    const bc = cols(b);
    for (let i = 0; i < br; i++) {
      for (let j = 0; j < bc; j++) {
        result[(rowOffset + i) * c + colOffset + j] = b[i * bc + j];
      }
    }
    rowOffset += br;
    colOffset += bc;
  }
  const dtype = safeDType(...blocks.map(dtypeOf));
  return brand(castAll(result, dtype), r, c, dtype);
}

// ============================================================================
// Homogeneous Coordinates
// ============================================================================

/**
 * Split a homogeneous matrix `[[A, b], [0, 1]]` into its linear block `A`
 * and translation `b`.
 */
export function toMatrixVector(affine: Matrix): { linear: Matrix; translation: Matrix } {
  const r = rows(affine);
  const c = cols(affine);
  if (r < 1 || c < 1) {
    throw new RangeError(`Homogeneous matrix must be at least 1x1, got ${r}x${c}`);
  }
  const nOut = r - 1;
  const nIn = c - 1;
  const linear = new Float64Array(nOut * nIn);
  const translation = new Float64Array(nOut);
  for (let i = 0; i < nOut; i++) {
    for (let j = 0; j < nIn; j++) {
      linear[i * nIn + j] = affine[i * c + j];
    }
    translation[i] = affine[i * c + nIn];
  }
  const dtype = dtypeOf(affine);
  return {
    linear: brand(linear, nOut, nIn, dtype),
    translation: brand(translation, 1, nOut, dtype),
  };
}

/**
 * Assemble the homogeneous matrix `[[A, b], [0, 1]]`.
 * The result takes the linear block's dtype, promoted until every
 * translation entry is representable.
 *
 * @throws RangeError if `translation` doesn't have one entry per row of `linear`
 */
export function fromMatrixVector(linear: Matrix, translation: ArrayLike<number>): Matrix {
  const nOut = rows(linear);
  const nIn = cols(linear);
  if (translation.length !== nOut) {
    throw new RangeError(
      `Translation length ${translation.length} doesn't match ${nOut} rows of the linear block`
    );
  }
  const c = nIn + 1;
  const result = new Float64Array((nOut + 1) * c);
  for (let i = 0; i < nOut; i++) {
    for (let j = 0; j < nIn; j++) {
      result[i * c + j] = linear[i * nIn + j];
    }
    result[i * c + nIn] = translation[i];
  }
  result[nOut * c + nIn] = 1;
  const values = Array.from(translation);
  const dtype =
    DTYPES.find((d) => canCast(dtypeOf(linear), d) && values.every((v) => isRepresentable(v, d))) ?? "float64";
  return brand(castAll(result, dtype), nOut + 1, c, dtype);
}

// ============================================================================
// Square Matrix Operations
// ============================================================================

function maxAbs(m: Float64Array): number {
  let max = 0;
  for (let i = 0; i < m.length; i++) {
    const v = Math.abs(m[i]);
    if (v > max) max = v;
  }
  return max;
}

/**
 * Inverse of a square matrix by Gauss-Jordan elimination with partial pivoting.
 *
 * Float matrices keep their dtype; any other dtype produces a float64 inverse.
 *
 * @param tolerance - a pivot smaller than `tolerance` times the largest
 * absolute entry counts as zero
 * @throws RangeError if matrix is singular
 */
export function inverse<N extends number>(m: Matrix<N, N>, tolerance = 1e-12): Matrix<N, N> {
  const n = rows(m);
  if (cols(m) !== n) {
    throw new RangeError(`Inverse requires a square matrix, got ${n}x${cols(m)}`);
  }
  const dtype = isFloat(dtypeOf(m)) ? dtypeOf(m) : "float64";
  const threshold = tolerance * maxAbs(m);
  const w = 2 * n;

  // Augmented matrix [A | I]
  const aug = new Float64Array(n * w);
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      aug[i * w + j] = m[i * n + j];
    }
    aug[i * w + n + i] = 1;
  }

  for (let i = 0; i < n; i++) {
    let maxRow = i;
    for (let k = i + 1; k < n; k++) {
      if (Math.abs(aug[k * w + i]) > Math.abs(aug[maxRow * w + i])) {
        maxRow = k;
      }
    }

    if (maxRow !== i) {
      for (let j = 0; j < w; j++) {
        const temp = aug[i * w + j];
        aug[i * w + j] = aug[maxRow * w + j];
        aug[maxRow * w + j] = temp;
      }
    }

    const pivot = aug[i * w + i];
    if (pivot === 0 || Math.abs(pivot) <= threshold) {
      throw new RangeError("Matrix is singular");
    }

    for (let j = 0; j < w; j++) {
      aug[i * w + j] /= pivot;
    }

    for (let k = 0; k < n; k++) {
      if (k !== i) {
        const factor = aug[k * w + i];
        if (factor === 0) continue;
        for (let j = 0; j < w; j++) {
          aug[k * w + j] -= factor * aug[i * w + j];
        }
      }
    }
  }

  const result = new Float64Array(n * n);
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      result[i * n + j] = aug[i * w + n + j];
    }
  }
  return brand(castAll(result, dtype), n, n, dtype);
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Convert matrix to 2D array representation.
 */
export function toArray(m: Matrix): number[][] {
  const result: number[][] = [];
  for (let i = 0; i < rows(m); i++) {
    result.push(row(m, i));
  }
  return result;
}

/**
 * Pretty-print a matrix.
 */
export function toString(m: Matrix): string {
  return toArray(m)
    .map((r) => "[ " + r.map((v) => v.toFixed(4).padStart(10)).join(" ") + " ]")
    .join("\n");
}
