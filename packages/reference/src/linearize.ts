/**
 * Finite-difference linearization of a coordinate function.
 */

import { config, createLogger } from "@coordmap/core";
import {
  cols,
  dtypeOf,
  isFloat,
  isMatrix,
  matrix,
  rows,
  toMatrix,
  type DType,
  type Matrix,
} from "@coordmap/math";
import { CoordinateMap } from "./coordinate-map.js";
import { ConstructionError } from "./errors.js";
import { toCoordinateFunction, type FunctionLike } from "./functions.js";

const log = createLogger("reference");

export interface LinearizeOptions {
  /** Forward-difference step, defaults to the `linearize.step` setting */
  step?: number;
  /** Point to linearize at, defaults to the origin */
  origin?: readonly number[] | Matrix;
  /** Precision of the result, defaults to the `linearize.dtype` setting */
  dtype?: DType;
}

/**
 * Homogeneous matrix of the affine approximation of `fn` at `origin`.
 *
 * Column `i` of the linear block is `(f(origin + step·eᵢ) − f(origin)) / step`,
 * the translation is `f(origin)`. Exact, up to rounding, when `fn` is affine.
 *
 * @example
 * ```typescript
 * linearize((x) => toArray(x).map(([a, b]) => [2 * a + 1, 3 * b]), 2);
 * // [[2, 0, 1], [0, 3, 0], [0, 0, 1]]
 * ```
 *
 * @param ndimIn - number of input coordinates of `fn`
 * @returns a `(ndimOut + 1) x (ndimIn + 1)` float matrix
 * @throws ConstructionError on a zero or non-finite step, a bad `ndimIn` or
 * an origin of the wrong length
 */
export function linearize(fn: FunctionLike | CoordinateMap, ndimIn: number, options: LinearizeOptions = {}): Matrix {
  const defaults = config.get("linearize");
  const step = options.step ?? defaults.step;
  const requested = options.dtype ?? defaults.dtype;
  const dtype: DType = isFloat(requested) ? requested : "float64";

  if (!Number.isInteger(ndimIn) || ndimIn < 0) {
    throw new ConstructionError(`ndimIn must be a non-negative integer, got ${ndimIn}`, "invalid_argument");
  }
  if (step === 0 || !Number.isFinite(step)) {
    throw new ConstructionError(`step must be finite and non-zero, got ${step}`, "invalid_argument");
  }

  let origin: number[];
  if (options.origin === undefined) {
    origin = new Array<number>(ndimIn).fill(0);
  } else {
    if (isMatrix(options.origin) && dtypeOf(options.origin) !== dtype) {
      log.warn(`origin dtype ${dtypeOf(options.origin)} differs from ${dtype}, using ${dtype}`);
    }
    origin = Array.from(options.origin);
    if (origin.length !== ndimIn) {
      throw new ConstructionError(`origin must have length ${ndimIn}, got ${origin.length}`, "invalid_argument");
    }
  }

  // Row 0 is the origin, row i + 1 is the origin stepped along axis i
  const points = [origin, ...origin.map((_, i) => origin.map((v, j) => (i === j ? v + step : v)))];
  const values = evaluateAt(fn, points, dtype);

  if (rows(values) !== ndimIn + 1) {
    throw new ConstructionError(
      `function returned ${rows(values)} rows for ${ndimIn + 1} points`,
      "shape_mismatch"
    );
  }

  const nOut = cols(values);
  const c = ndimIn + 1;
  const data = new Float64Array((nOut + 1) * c);
  for (let k = 0; k < nOut; k++) {
    const b = values[k];
    for (let i = 0; i < ndimIn; i++) {
      data[k * c + i] = (values[(i + 1) * nOut + k] - b) / step;
    }
    data[k * c + ndimIn] = b;
  }
  data[nOut * c + ndimIn] = 1;
  return matrix(nOut + 1, c, data, dtype);
}

function evaluateAt(fn: FunctionLike | CoordinateMap, points: number[][], dtype: DType): Matrix {
  // A coordinate map checks plain values against its own input precision
  if (fn instanceof CoordinateMap) return fn.evaluate(points);
  const batch = matrix(points.length, points[0].length, points.flat(), dtype);
  return toMatrix(toCoordinateFunction(fn).evaluate(batch));
}
