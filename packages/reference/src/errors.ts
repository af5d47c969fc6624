/**
 * Error types for coordinate systems and coordinate maps.
 *
 * A transform without an inverse is not an error: `inverse` is `undefined`.
 */

/** Reason codes for values rejected by a coordinate system. */
export type ValidationErrorReason = "shape" | "dtype" | "ragged";

/** Reason codes for coordinate maps that cannot be built. */
export type ConstructionErrorReason =
  | "not_callable"
  | "shape_mismatch"
  | "not_homogeneous"
  | "unknown_axis"
  | "invalid_order"
  | "invalid_argument";

/**
 * Invalid coordinate system definition or axis lookup.
 */
export class CoordinateSystemError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CoordinateSystemError";
  }
}

/**
 * Thrown when values presented to a coordinate system have the wrong
 * dimension or a precision that does not fit.
 */
export class ValidationError extends CoordinateSystemError {
  constructor(
    message: string,
    readonly reason: ValidationErrorReason
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Base class for coordinate map failures.
 */
export class CoordinateMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CoordinateMapError";
  }
}

/**
 * Thrown when a coordinate map is built from inconsistent parts.
 */
export class ConstructionError extends CoordinateMapError {
  constructor(
    message: string,
    readonly reason: ConstructionErrorReason
  ) {
    super(message);
    this.name = "ConstructionError";
  }
}

/**
 * Thrown when adjacent coordinate maps don't agree on the coordinate system
 * between them.
 */
export class CompositionError extends CoordinateMapError {
  constructor(message: string) {
    super(message);
    this.name = "CompositionError";
  }
}
