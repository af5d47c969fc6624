/**
 * CoordinateSystem - ordered, named axes with a numeric precision
 *
 * @example
 * ```typescript
 * const voxels = new CoordinateSystem("ijk", "voxels", "int16");
 * voxels.index("k");                 // 2
 * voxels.checkedValues([1, 2, 3]);   // 1x3 int16 batch
 * voxels.checkedValues([1.5, 2, 3]); // ValidationError
 * ```
 */

import {
  astype,
  canCast,
  cols,
  dtypeOf,
  isMatrix,
  isRepresentable,
  safeDType,
  toDType,
  toMatrix,
  type DType,
  type Matrix,
  type MatrixLike,
} from "@coordmap/math";
import { CoordinateSystemError, ValidationError } from "./errors.js";

/** Axis names as a list, or a string read one character per axis (`"ijk"`). */
export type AxisNames = string | readonly string[];

export class CoordinateSystem {
  readonly coordNames: readonly string[];
  readonly name: string;
  readonly coordDtype: DType;

  /**
   * @throws CoordinateSystemError if an axis name repeats
   * @throws DTypeError if `coordDtype` is not a supported precision
   */
  constructor(coordNames: AxisNames, name = "", coordDtype: DType = "float64") {
    const names = typeof coordNames === "string" ? Array.from(coordNames) : [...coordNames];
    const seen = new Set<string>();
    for (const axis of names) {
      if (typeof axis !== "string") {
        throw new CoordinateSystemError(`Axis names must be strings, got ${String(axis)}`);
      }
      if (seen.has(axis)) {
        throw new CoordinateSystemError(`Axis names must be unique, "${axis}" repeats in [${names.join(", ")}]`);
      }
      seen.add(axis);
    }
    this.coordNames = Object.freeze(names);
    this.name = name;
    this.coordDtype = toDType(coordDtype);
  }

  /**
   * Axes of all `systems` in order, labelled "product", in their promoted
   * precision.
   *
   * @throws CoordinateSystemError if two systems share an axis name
   */
  static product(...systems: readonly CoordinateSystem[]): CoordinateSystem {
    if (systems.length === 0) {
      throw new CoordinateSystemError("CoordinateSystem.product requires at least one system");
    }
    return new CoordinateSystem(
      systems.flatMap((s) => s.coordNames),
      "product",
      safeDType(...systems.map((s) => s.coordDtype))
    );
  }

  get ndim(): number {
    return this.coordNames.length;
  }

  /**
   * Position of an axis.
   *
   * @throws CoordinateSystemError if there is no such axis
   */
  index(axis: string): number {
    const i = this.coordNames.indexOf(axis);
    if (i < 0) {
      throw new CoordinateSystemError(`No axis named "${axis}" in ${this.toString()}`);
    }
    return i;
  }

  has(axis: string): boolean {
    return this.coordNames.includes(axis);
  }

  equals(other: CoordinateSystem): boolean {
    return (
      this.name === other.name &&
      this.coordDtype === other.coordDtype &&
      this.coordNames.length === other.coordNames.length &&
      this.coordNames.every((axis, i) => axis === other.coordNames[i])
    );
  }

  /** Same axes and label in another precision. */
  withDtype(dtype: DType): CoordinateSystem {
    return dtype === this.coordDtype ? this : new CoordinateSystem(this.coordNames, this.name, dtype);
  }

  /**
   * Validate values presented in this system and return them as a fresh
   * batch in its precision. A single point becomes a one-row batch.
   *
   * A matrix must carry a dtype that casts safely to `coordDtype`; plain
   * numbers must each be representable in it.
   *
   * @throws ValidationError on a dimension or precision mismatch
   */
  checkedValues(values: MatrixLike): Matrix {
    if (isMatrix(values)) {
      this.checkWidth(cols(values));
      if (!canCast(dtypeOf(values), this.coordDtype)) {
        throw new ValidationError(
          `Cannot safely cast ${dtypeOf(values)} values to ${this.coordDtype}.\n  ${this.toString()}`,
          "dtype"
        );
      }
      return astype(values, this.coordDtype);
    }

    let batch: Matrix;
    try {
      batch = toMatrix(values);
    } catch (error) {
      if (error instanceof RangeError) {
        throw new ValidationError(error.message, "ragged");
      }
      throw error;
    }
    this.checkWidth(cols(batch));
    for (const value of batch) {
      if (!isRepresentable(value, this.coordDtype)) {
        throw new ValidationError(
          `Value ${value} is not representable as ${this.coordDtype}.\n  ${this.toString()}`,
          "dtype"
        );
      }
    }
    return astype(batch, this.coordDtype);
  }

  private checkWidth(width: number): void {
    if (width !== this.ndim) {
      throw new ValidationError(
        `Array shape[-1] (${width}) must match CoordinateSystem ndim (${this.ndim}).\n  ${this.toString()}`,
        "shape"
      );
    }
  }

  toString(): string {
    const names = this.coordNames.map((n) => JSON.stringify(n)).join(", ");
    return `CoordinateSystem(coordNames=[${names}], name=${JSON.stringify(this.name)}, coordDtype=${this.coordDtype})`;
  }
}
