/**
 * Function values carried by coordinate maps.
 *
 * A coordinate map's function is anything with `evaluate`. Plain callbacks are
 * wrapped; the algebra builds its own small value objects that own the
 * operands they need (a matrix, a chain of maps, a list of factors) instead of
 * closing over them.
 */

import {
  canCast,
  cols,
  dtypeOf,
  hstack,
  matMul,
  matrix,
  rows,
  sliceCols,
  toArray,
  toMatrixVector,
  transpose,
  type DType,
  type Matrix,
  type MatrixLike,
} from "@coordmap/math";
import type { CoordinateMap } from "./coordinate-map.js";

/** Maps a batch of points (one per row) to a batch of points. */
export interface CoordinateFunction {
  evaluate(x: Matrix): MatrixLike;
}

export type CoordinateCallback = (x: Matrix) => MatrixLike;

export type FunctionLike = CoordinateFunction | CoordinateCallback;

export function isFunctionLike(value: unknown): value is FunctionLike {
  return (
    typeof value === "function" ||
    (typeof value === "object" && value !== null && typeof Reflect.get(value, "evaluate") === "function")
  );
}

class CallbackFunction implements CoordinateFunction {
  constructor(private readonly callback: CoordinateCallback) {}

  evaluate(x: Matrix): MatrixLike {
    return this.callback(x);
  }
}

export function toCoordinateFunction(fn: FunctionLike): CoordinateFunction {
  return typeof fn === "function" ? new CallbackFunction(fn) : fn;
}

/** The batch itself when its dtype casts safely to `dtype`, else its plain values. */
function fitTo(x: Matrix, dtype: DType): MatrixLike {
  return canCast(dtypeOf(x), dtype) ? x : toArray(x);
}

/**
 * `x·Aᵀ + b` for a homogeneous matrix `[[A, b], [0, 1]]`.
 */
export class AffineFunction implements CoordinateFunction {
  private readonly linearT: Matrix;
  private readonly translation: Matrix;

  constructor(affine: Matrix) {
    const { linear, translation } = toMatrixVector(affine);
    this.linearT = transpose(linear);
    this.translation = translation;
  }

  evaluate(x: Matrix): Matrix {
    const product = matMul(x, this.linearT);
    const n = rows(product);
    const m = cols(product);
    const data = new Float64Array(n * m);
    for (let i = 0; i < n; i++) {
      for (let k = 0; k < m; k++) {
        data[i * m + k] = product[i * m + k] + this.translation[k];
      }
    }
    return matrix(n, m, data, dtypeOf(product));
  }
}

/**
 * Right-to-left chain: the last map is applied first. Every step validates
 * its own input and output, so a seam that breaks surfaces at that step.
 *
 * Inverses of integer affine steps compute in float64; a batch wider than the
 * next step's precision (or `outputDtype`) is handed on as plain values and
 * checked value by value.
 */
export class ComposedFunction implements CoordinateFunction {
  constructor(
    private readonly steps: readonly CoordinateMap[],
    private readonly outputDtype: DType
  ) {}

  evaluate(x: Matrix): MatrixLike {
    let value: Matrix = x;
    for (let i = this.steps.length - 1; i >= 0; i--) {
      const step = this.steps[i];
      value = step.evaluate(fitTo(value, step.inputCoords.coordDtype));
    }
    return fitTo(value, this.outputDtype);
  }
}

/**
 * Applies each factor to its own block of columns and concatenates the results.
 * Blocks and results wider than the precision they go to are passed as plain
 * values.
 */
export class ProductFunction implements CoordinateFunction {
  private readonly offsets: readonly number[];

  constructor(
    private readonly factors: readonly CoordinateMap[],
    private readonly outputDtype: DType
  ) {
    const offsets = [0];
    for (const factor of factors) {
      offsets.push(offsets[offsets.length - 1] + factor.inputCoords.ndim);
    }
    this.offsets = offsets;
  }

  evaluate(x: Matrix): MatrixLike {
    const parts = this.factors.map((factor, i) => {
      const block = sliceCols(x, this.offsets[i], this.offsets[i + 1]);
      return factor.evaluate(fitTo(block, factor.inputCoords.coordDtype));
    });
    return fitTo(hstack(parts), this.outputDtype);
  }
}
