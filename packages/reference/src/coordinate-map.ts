/**
 * CoordinateMap and AffineTransform
 *
 * A coordinate map pairs an input and an output coordinate system with a
 * function between them, and optionally the inverse function. An affine
 * transform is a coordinate map whose function is a homogeneous matrix.
 *
 * Both are immutable: reordering, renaming, inverting and the algebra in
 * `algebra.ts` always build new maps.
 *
 * @example
 * ```typescript
 * const voxelToWorld = new AffineTransform(
 *   [[1, 0, 0, 0], [0, 2, 0, 0], [0, 0, 3, 0], [0, 0, 0, 1]],
 *   new CoordinateSystem("ijk"),
 *   new CoordinateSystem("xyz")
 * );
 * voxelToWorld.evaluate([1, 1, 1]);          // [[1, 2, 3]]
 * voxelToWorld.inverse?.evaluate([1, 2, 3]); // [[1, 1, 1]]
 * ```
 */

import { config, createLogger } from "@coordmap/core";
import {
  astype,
  cols,
  copy,
  diag,
  dtypeOf,
  fromMatrixVector,
  fromRows,
  identity,
  isMatrix,
  matrixInverse,
  matrixToString,
  rows,
  safeDType,
  transpose,
  zeros,
  type DType,
  type Matrix,
  type MatrixLike,
} from "@coordmap/math";
import { compose } from "./algebra.js";
import { CoordinateSystem, type AxisNames } from "./coordinate-system.js";
import { ConstructionError } from "./errors.js";
import {
  AffineFunction,
  isFunctionLike,
  toCoordinateFunction,
  type CoordinateFunction,
  type FunctionLike,
} from "./functions.js";

const log = createLogger("reference");

// ============================================================================
// Types
// ============================================================================

export type TransformKind = "general" | "affine";

/**
 * New axis order: each entry is an axis name or a position. A string is read
 * one character per axis name (`"kji"`).
 */
export type AxisOrder = string | readonly (string | number)[];

/** Old axis name to new axis name. */
export type AxisRenames = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

/** A homogeneous matrix, as a matrix or as rows. */
export type AffineLike = Matrix | readonly (readonly number[])[];

/** Homogeneous matrix, or its linear block and translation. */
export type AffineParams = AffineLike | { readonly linear: AffineLike; readonly translation: readonly number[] };

// ============================================================================
// CoordinateMap
// ============================================================================

export class CoordinateMap {
  readonly kind: TransformKind = "general";

  private readonly _function: CoordinateFunction;
  private readonly _inverseFunction: CoordinateFunction | undefined;
  private readonly _inputCoords: CoordinateSystem;
  private readonly _outputCoords: CoordinateSystem;

  /**
   * The function is probed with a batch of zeros in the input dimension and
   * precision, so a function of the wrong shape fails here and not on first
   * use. Whatever the probe throws propagates.
   *
   * @param fn - a callback or an object with `evaluate`
   * @param inverseFunction - intended to satisfy `x = inverse(fn(x))`
   * @throws ConstructionError if `fn` or a given `inverseFunction` is not invocable
   */
  constructor(
    fn: FunctionLike,
    inputCoords: CoordinateSystem,
    outputCoords: CoordinateSystem,
    inverseFunction?: FunctionLike
  ) {
    if (!isFunctionLike(fn)) {
      throw new ConstructionError("The function must be callable or have an evaluate method", "not_callable");
    }
    if (inverseFunction !== undefined && !isFunctionLike(inverseFunction)) {
      throw new ConstructionError(
        "The inverse function must be callable or have an evaluate method",
        "not_callable"
      );
    }
    this._function = toCoordinateFunction(fn);
    this._inverseFunction =
      inverseFunction === undefined ? undefined : toCoordinateFunction(inverseFunction);
    this._inputCoords = inputCoords;
    this._outputCoords = outputCoords;

    this.evaluate(zeros(config.get("probeRows"), inputCoords.ndim, inputCoords.coordDtype));
  }

  get inputCoords(): CoordinateSystem {
    return this._inputCoords;
  }

  get outputCoords(): CoordinateSystem {
    return this._outputCoords;
  }

  /** The unchecked function from input to output coordinates. */
  get function(): CoordinateFunction {
    return this._function;
  }

  /** The unchecked function from output to input coordinates, if known. */
  get inverseFunction(): CoordinateFunction | undefined {
    return this._inverseFunction;
  }

  /** Number of input and output axes. */
  get ndims(): readonly [number, number] {
    return [this._inputCoords.ndim, this._outputCoords.ndim];
  }

  /**
   * The map with coordinate systems and functions swapped, or `undefined`
   * when no inverse function is known.
   */
  get inverse(): CoordinateMap | undefined {
    if (this._inverseFunction === undefined) return undefined;
    return new CoordinateMap(this._inverseFunction, this._outputCoords, this._inputCoords, this._function);
  }

  isAffine(): this is AffineTransform {
    return this.kind === "affine";
  }

  /**
   * Map points from input to output coordinates.
   *
   * @param x - one point or a batch with one point per row
   * @returns a batch in the output precision, one row per point
   * @throws ValidationError if `x` or the function's result doesn't fit its
   * coordinate system
   */
  evaluate(x: MatrixLike): Matrix {
    const inVals = this._inputCoords.checkedValues(x);
    const outVals = this._function.evaluate(inVals);
    return this._outputCoords.checkedValues(outVals);
  }

  /** A new map sharing this map's function objects. */
  copy(): CoordinateMap {
    return new CoordinateMap(this._function, this._inputCoords, this._outputCoords, this._inverseFunction);
  }

  /**
   * Permute the input axes. Without `order` the axes are reversed.
   *
   * @param name - label of the new input system, defaults to the current one
   */
  reorderedInput(order?: AxisOrder, name?: string): CoordinateMap {
    return compose(this, inputPermutation(this, order, name));
  }

  /**
   * Permute the output axes. Without `order` the axes are reversed.
   *
   * @param name - label of the new output system, defaults to the current one
   */
  reorderedOutput(order?: AxisOrder, name?: string): CoordinateMap {
    return compose(outputPermutation(this, order, name), this);
  }

  /**
   * Rename some input axes, keeping their order.
   *
   * @throws ConstructionError naming the first key that is not an input axis
   */
  renamedInput(renames: AxisRenames, name?: string): CoordinateMap {
    return compose(this, inputRenaming(this, renames, name));
  }

  /**
   * Rename some output axes, keeping their order.
   *
   * @throws ConstructionError naming the first key that is not an output axis
   */
  renamedOutput(renames: AxisRenames, name?: string): CoordinateMap {
    return compose(outputRenaming(this, renames, name), this);
  }

  toString(): string {
    return `CoordinateMap(\n   function,\n   inputCoords=${this._inputCoords},\n   outputCoords=${this._outputCoords}\n)`;
  }
}

// ============================================================================
// AffineTransform
// ============================================================================

interface AffineLayout {
  affine: Matrix;
  inputCoords: CoordinateSystem;
  outputCoords: CoordinateSystem;
}

function toAffineMatrix(affine: AffineLike): Matrix {
  if (isMatrix(affine)) return affine;
  try {
    return fromRows(affine);
  } catch (error) {
    if (error instanceof RangeError) {
      throw new ConstructionError(`Invalid affine matrix: ${error.message}`, "shape_mismatch");
    }
    throw error;
  }
}

/**
 * Promote matrix and coordinate systems to one precision and check the
 * matrix is homogeneous with the right shape. The matrix is always copied.
 */
function affineLayout(
  affine: AffineLike,
  inputCoords: CoordinateSystem,
  outputCoords: CoordinateSystem
): AffineLayout {
  const source = toAffineMatrix(affine);
  const dtype = safeDType(dtypeOf(source), inputCoords.coordDtype, outputCoords.coordDtype);
  const expected = [outputCoords.ndim + 1, inputCoords.ndim + 1];
  const r = rows(source);
  const c = cols(source);

  if (r !== expected[0] || c !== expected[1]) {
    throw new ConstructionError(
      `coordinate lengths do not match affine matrix shape: expected ${expected[0]}x${expected[1]}, got ${r}x${c}`,
      "shape_mismatch"
    );
  }
  for (let j = 0; j < c; j++) {
    if (source[(r - 1) * c + j] !== (j === c - 1 ? 1 : 0)) {
      throw new ConstructionError(
        `last row of an affine matrix must be [0, ..., 0, 1], got [${Array.from(source.slice((r - 1) * c)).join(", ")}]`,
        "not_homogeneous"
      );
    }
  }

  return {
    affine: astype(source, dtype),
    inputCoords: inputCoords.withDtype(dtype),
    outputCoords: outputCoords.withDtype(dtype),
  };
}

function asAffineMatrix(params: AffineParams): Matrix {
  if (!isMatrix(params) && "linear" in params) {
    const linear = toAffineMatrix(params.linear);
    try {
      return fromMatrixVector(linear, params.translation);
    } catch (error) {
      if (error instanceof RangeError) {
        throw new ConstructionError(error.message, "shape_mismatch");
      }
      throw error;
    }
  }
  return toAffineMatrix(params);
}

export class AffineTransform extends CoordinateMap {
  readonly kind = "affine" as const;

  private readonly _affine: Matrix;

  /**
   * The precision of the transform is the promotion of the matrix's and both
   * coordinate systems' precisions; the coordinate systems are rebuilt in it.
   *
   * @param affine - `(ndimOut + 1) x (ndimIn + 1)` matrix with last row `[0, ..., 0, 1]`
   * @throws ConstructionError on a shape mismatch or a non-homogeneous last row
   */
  constructor(affine: AffineLike, inputCoords: CoordinateSystem, outputCoords: CoordinateSystem) {
    const layout = affineLayout(affine, inputCoords, outputCoords);
    super(new AffineFunction(layout.affine), layout.inputCoords, layout.outputCoords);
    this._affine = layout.affine;
  }

  /**
   * Build from axis names and either a homogeneous matrix or its linear block
   * and translation. Coordinate systems are labelled "input" and "output".
   *
   * @throws ConstructionError if the axis counts don't match the matrix shape
   */
  static fromParams(inNames: AxisNames, outNames: AxisNames, params: AffineParams): AffineTransform {
    const inputCoords = new CoordinateSystem(inNames, "input");
    const outputCoords = new CoordinateSystem(outNames, "output");
    const affine = asAffineMatrix(params);
    if (rows(affine) !== outputCoords.ndim + 1 || cols(affine) !== inputCoords.ndim + 1) {
      throw new ConstructionError("shape and number of axis names do not agree", "shape_mismatch");
    }
    return new AffineTransform(affine, inputCoords, outputCoords);
  }

  /**
   * Grid transform: output = start + step * input, axis by axis.
   *
   * @example
   * ```typescript
   * AffineTransform.fromStartStep("ijk", "xyz", [1, 2, 3], [4, 5, 6]).affine;
   * // [[4, 0, 0, 1], [0, 5, 0, 2], [0, 0, 6, 3], [0, 0, 0, 1]]
   * ```
   *
   * @throws ConstructionError if the name counts or the vector lengths differ
   */
  static fromStartStep(
    inNames: AxisNames,
    outNames: AxisNames,
    start: readonly number[],
    step: readonly number[]
  ): AffineTransform {
    const ndim = inNames.length;
    if (outNames.length !== ndim) {
      throw new ConstructionError(
        `number of input names (${ndim}) != number of output names (${outNames.length})`,
        "shape_mismatch"
      );
    }
    if (start.length !== ndim || step.length !== ndim) {
      throw new ConstructionError(
        `start (${start.length}) and step (${step.length}) must have one entry per axis (${ndim})`,
        "shape_mismatch"
      );
    }
    return AffineTransform.fromParams(inNames, outNames, { linear: diag(step), translation: start });
  }

  /** Identity on the given axes, with "input" and "output" labels. */
  static identity(names: AxisNames): AffineTransform {
    const ndim = names.length;
    return AffineTransform.fromStartStep(names, names, new Array<number>(ndim).fill(0), new Array<number>(ndim).fill(1));
  }

  /** A copy of the homogeneous matrix; changing it doesn't change the transform. */
  get affine(): Matrix {
    return copy(this._affine);
  }

  /** The inverse transform, or `undefined` if the matrix is singular. */
  get inverse(): AffineTransform | undefined {
    let inverted: Matrix;
    try {
      inverted = matrixInverse(this._affine, config.get("singularTolerance"));
    } catch (error) {
      if (error instanceof RangeError) {
        log.debug(`no inverse for singular affine from ${this.inputCoords} to ${this.outputCoords}`);
        return undefined;
      }
      throw error;
    }
    return new AffineTransform(inverted, this.outputCoords, this.inputCoords);
  }

  get inverseFunction(): CoordinateFunction | undefined {
    return this.inverse?.function;
  }

  /** Deep copy: the new transform owns its own matrix. */
  copy(): AffineTransform {
    return new AffineTransform(this._affine, this.inputCoords, this.outputCoords);
  }

  reorderedInput(order?: AxisOrder, name?: string): AffineTransform {
    return compose(this, inputPermutation(this, order, name));
  }

  reorderedOutput(order?: AxisOrder, name?: string): AffineTransform {
    return compose(outputPermutation(this, order, name), this);
  }

  renamedInput(renames: AxisRenames, name?: string): AffineTransform {
    return compose(this, inputRenaming(this, renames, name));
  }

  renamedOutput(renames: AxisRenames, name?: string): AffineTransform {
    return compose(outputRenaming(this, renames, name), this);
  }

  toString(): string {
    const affine = matrixToString(this._affine).split("\n").join("\n          ");
    return `AffineTransform(\n   affine=${affine},\n   inputCoords=${this.inputCoords},\n   outputCoords=${this.outputCoords}\n)`;
  }
}

// ============================================================================
// Axis Permutation and Renaming
// ============================================================================

type Side = "input" | "output";

function resolveOrder(coords: CoordinateSystem, order: AxisOrder | undefined, side: Side): number[] {
  const ndim = coords.ndim;
  if (order === undefined) {
    return Array.from({ length: ndim }, (_, i) => ndim - 1 - i);
  }

  const entries: readonly (string | number)[] = typeof order === "string" ? Array.from(order) : order;
  const positions = entries.map((entry) => {
    if (typeof entry === "number") return entry;
    if (!coords.has(entry)) {
      throw new ConstructionError(`no ${side} coordinate named ${entry}`, "unknown_axis");
    }
    return coords.index(entry);
  });

  const seen = new Set(positions);
  const valid =
    positions.length === ndim &&
    seen.size === ndim &&
    positions.every((p) => Number.isInteger(p) && p >= 0 && p < ndim);
  if (!valid) {
    throw new ConstructionError(
      `order [${entries.join(", ")}] is not a permutation of the ${ndim} ${side} axes`,
      "invalid_order"
    );
  }
  return positions;
}

/**
 * Homogeneous matrix taking a point in the new axis order to the old one:
 * entry (order[i], i) is 1.
 */
function permutationMatrix(order: readonly number[], dtype: DType): Matrix {
  const n = order.length;
  const perm = zeros(n + 1, n + 1);
  order.forEach((j, i) => {
    perm[j * (n + 1) + i] = 1;
  });
  perm[n * (n + 1) + n] = 1;
  return astype(perm, dtype);
}

function inputPermutation(cmap: CoordinateMap, order: AxisOrder | undefined, name?: string): AffineTransform {
  const coords = cmap.inputCoords;
  const positions = resolveOrder(coords, order, "input");
  const reordered = new CoordinateSystem(
    positions.map((i) => coords.coordNames[i]),
    name || coords.name,
    coords.coordDtype
  );
  return new AffineTransform(permutationMatrix(positions, coords.coordDtype), reordered, coords);
}

function outputPermutation(cmap: CoordinateMap, order: AxisOrder | undefined, name?: string): AffineTransform {
  const coords = cmap.outputCoords;
  const positions = resolveOrder(coords, order, "output");
  const reordered = new CoordinateSystem(
    positions.map((i) => coords.coordNames[i]),
    name || coords.name,
    coords.coordDtype
  );
  return new AffineTransform(transpose(permutationMatrix(positions, coords.coordDtype)), coords, reordered);
}

function isRenameMap(renames: AxisRenames): renames is ReadonlyMap<string, string> {
  return renames instanceof Map;
}

function renamedCoords(coords: CoordinateSystem, renames: AxisRenames, side: Side, name?: string): CoordinateSystem {
  const mapping: ReadonlyMap<string, string> = isRenameMap(renames) ? renames : new Map(Object.entries(renames));
  for (const key of mapping.keys()) {
    if (!coords.has(key)) {
      throw new ConstructionError(`no ${side} coordinate named ${key}`, "unknown_axis");
    }
  }
  return new CoordinateSystem(
    coords.coordNames.map((axis) => mapping.get(axis) ?? axis),
    name || coords.name,
    coords.coordDtype
  );
}

function inputRenaming(cmap: CoordinateMap, renames: AxisRenames, name?: string): AffineTransform {
  const coords = cmap.inputCoords;
  const renamed = renamedCoords(coords, renames, "input", name);
  return new AffineTransform(identity(coords.ndim + 1, coords.coordDtype), renamed, coords);
}

function outputRenaming(cmap: CoordinateMap, renames: AxisRenames, name?: string): AffineTransform {
  const coords = cmap.outputCoords;
  const renamed = renamedCoords(coords, renames, "output", name);
  return new AffineTransform(identity(coords.ndim + 1, coords.coordDtype), coords, renamed);
}
