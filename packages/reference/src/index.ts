/**
 * @coordmap/reference - coordinate systems, coordinate maps and their algebra
 *
 * This package provides:
 * - **CoordinateSystem**: named axes with a precision, and value validation
 * - **CoordinateMap / AffineTransform**: functions between coordinate systems
 * - **Algebra**: `compose`, `product`, `concat`, and axis reordering and renaming
 * - **linearize**: finite-difference affine approximation of a function
 *
 * @example
 * ```typescript
 * import { AffineTransform, compose } from "@coordmap/reference";
 *
 * const scale = AffineTransform.fromStartStep("ijk", "xyz", [0, 0, 0], [2, 2, 2]);
 * const shift = AffineTransform.fromStartStep("xyz", "xyz", [10, 0, 0], [1, 1, 1]);
 * compose(shift, scale.renamedOutput({}, "input")).evaluate([1, 1, 1]); // [[12, 2, 2]]
 * ```
 *
 * @packageDocumentation
 */

export {
  CoordinateSystemError,
  ValidationError,
  CoordinateMapError,
  ConstructionError,
  CompositionError,
  type ValidationErrorReason,
  type ConstructionErrorReason,
} from "./errors.js";

export { CoordinateSystem, type AxisNames } from "./coordinate-system.js";

export {
  isFunctionLike,
  toCoordinateFunction,
  AffineFunction,
  ComposedFunction,
  ProductFunction,
  type CoordinateFunction,
  type CoordinateCallback,
  type FunctionLike,
} from "./functions.js";

export {
  CoordinateMap,
  AffineTransform,
  type TransformKind,
  type AxisOrder,
  type AxisRenames,
  type AffineLike,
  type AffineParams,
} from "./coordinate-map.js";

export { compose, product, concat } from "./algebra.js";

export { linearize, type LinearizeOptions } from "./linearize.js";
