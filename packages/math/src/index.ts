/**
 * @coordmap/math - precisions and dense matrices for coordinate algebra
 *
 * This package provides:
 * - **DType**: the precision model (`canCast`, `safeDType`, value conversion)
 * - **Matrix**: row-major matrices and coordinate batches carrying a dtype,
 *   with the homogeneous-coordinate helpers affine transforms are built on
 *
 * @example
 * ```typescript
 * import { diag, fromMatrixVector, matMul, safeDType } from "@coordmap/math";
 *
 * const scaling = fromMatrixVector(diag([2, 3]), [10, 20]);  // 3x3 homogeneous
 * const twice = matMul(scaling, scaling);
 * safeDType("int16", "float32");  // "float32"
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Precision
// ============================================================================

export {
  DTYPES,
  type DType,
  type DTypeKind,
  DTypeError,
  isDType,
  toDType,
  kindOf,
  bitsOf,
  isFloat,
  isInteger,
  canCast,
  safeDType,
  castValue,
  isRepresentable,
} from "./dtype.js";

// ============================================================================
// Matrices
// ============================================================================

export {
  // Types
  type Matrix,
  type MatrixLike,
  type Rows,
  type Cols,
  type Typed,
  // Constructors
  matrix,
  zeros,
  identity,
  fromRows,
  diag,
  toMatrix,
  // Runtime access
  rows,
  cols,
  dtypeOf,
  isMatrix,
  row,
  // Operations
  copy,
  astype,
  transpose,
  matMul,
  sliceCols,
  hstack,
  blockDiag,
  // Homogeneous coordinates
  toMatrixVector,
  fromMatrixVector,
  // Square matrices
  inverse as matrixInverse,
  // Utilities
  toArray,
  toString as matrixToString,
} from "./matrix.js";
