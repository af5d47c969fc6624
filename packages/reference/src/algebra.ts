/**
 * Coordinate map algebra: composition, cartesian product and appending an
 * identity axis.
 *
 * When every operand is an AffineTransform the result is computed on the
 * matrices and is itself an AffineTransform; otherwise the result is a
 * general CoordinateMap over a function that chains the operands.
 */

import { createLogger } from "@coordmap/core";
import { blockDiag, fromMatrixVector, identity, matMul, toMatrixVector, type Matrix } from "@coordmap/math";
import { AffineTransform, CoordinateMap } from "./coordinate-map.js";
import { CoordinateSystem } from "./coordinate-system.js";
import { CompositionError } from "./errors.js";
import { ComposedFunction, ProductFunction } from "./functions.js";

const log = createLogger("reference");

function allAffine(cmaps: readonly CoordinateMap[]): cmaps is AffineTransform[] {
  return cmaps.every((cmap) => cmap.isAffine());
}

/** Inverse of every map, or `undefined` if any map has none. */
function inverseMaps(cmaps: readonly CoordinateMap[]): CoordinateMap[] | undefined {
  const inverses: CoordinateMap[] = [];
  for (const cmap of cmaps) {
    const inv = cmap.inverse;
    if (inv === undefined) return undefined;
    inverses.push(inv);
  }
  return inverses;
}

// ============================================================================
// Composition
// ============================================================================

/**
 * Compose maps right to left: `compose(f, g)` applies `g` first.
 *
 * Each map's input system must equal the next map's output system, including
 * label and precision. A single map gives back a copy.
 *
 * @example
 * ```typescript
 * const voxelToMm = compose(scannerToMm, voxelToScanner);
 * voxelToMm.inputCoords;  // voxelToScanner.inputCoords
 * voxelToMm.outputCoords; // scannerToMm.outputCoords
 * ```
 *
 * @throws CompositionError when no maps are given or a seam doesn't match
 */
export function compose(...cmaps: AffineTransform[]): AffineTransform;
export function compose(...cmaps: CoordinateMap[]): CoordinateMap;
export function compose(...cmaps: CoordinateMap[]): CoordinateMap {
  if (cmaps.length === 0) {
    throw new CompositionError("compose requires at least one coordinate map");
  }
  for (let i = 0; i < cmaps.length - 1; i++) {
    const outer = cmaps[i];
    const inner = cmaps[i + 1];
    if (!outer.inputCoords.equals(inner.outputCoords)) {
      throw new CompositionError(
        `input and output coordinates do not match: input=${outer.inputCoords}, output=${inner.outputCoords}`
      );
    }
  }

  if (cmaps.length === 1) return cmaps[0].copy();

  const first = cmaps[0];
  const last = cmaps[cmaps.length - 1];

  if (allAffine(cmaps)) {
    let affine: Matrix = cmaps[0].affine;
    for (let i = 1; i < cmaps.length; i++) {
      affine = matMul(affine, cmaps[i].affine);
    }
    return new AffineTransform(affine, last.inputCoords, first.outputCoords);
  }

  log.debug(`composing ${cmaps.length} maps into a general map`);
  const inverses = inverseMaps(cmaps);
  return new CoordinateMap(
    new ComposedFunction(cmaps, first.outputCoords.coordDtype),
    last.inputCoords,
    first.outputCoords,
    inverses === undefined ? undefined : new ComposedFunction(inverses.reverse(), last.inputCoords.coordDtype)
  );
}

// ============================================================================
// Product
// ============================================================================

/**
 * Cartesian product: each map acts on its own block of axes.
 *
 * Input and output systems are the products of the operands' systems (axis
 * names must stay unique), labelled "product". For affine operands the result
 * matrix is block-diagonal with the translations stacked.
 *
 * @throws CompositionError when no maps are given
 * @throws CoordinateSystemError if axis names collide across operands
 */
export function product(...cmaps: AffineTransform[]): AffineTransform;
export function product(...cmaps: CoordinateMap[]): CoordinateMap;
export function product(...cmaps: CoordinateMap[]): CoordinateMap {
  if (cmaps.length === 0) {
    throw new CompositionError("product requires at least one coordinate map");
  }
  const inputCoords = CoordinateSystem.product(...cmaps.map((c) => c.inputCoords));
  const outputCoords = CoordinateSystem.product(...cmaps.map((c) => c.outputCoords));

  if (allAffine(cmaps)) {
    const parts = cmaps.map((c) => toMatrixVector(c.affine));
    const linear = blockDiag(parts.map((p) => p.linear));
    const translation = parts.flatMap((p) => Array.from(p.translation));
    return new AffineTransform(fromMatrixVector(linear, translation), inputCoords, outputCoords);
  }

  const inverses = inverseMaps(cmaps);
  return new CoordinateMap(
    new ProductFunction(cmaps, outputCoords.coordDtype),
    inputCoords,
    outputCoords,
    inverses === undefined ? undefined : new ProductFunction(inverses, inputCoords.coordDtype)
  );
}

// ============================================================================
// Concatenation
// ============================================================================

/**
 * Add one identity axis to both systems of a map: at the front, or at the
 * end with `append`.
 *
 * @example
 * ```typescript
 * concat(voxelToWorld, "t").inputCoords.coordNames; // ["t", "i", "j", "k"]
 * ```
 */
export function concat(cmap: AffineTransform, axisName?: string, append?: boolean): AffineTransform;
export function concat(cmap: CoordinateMap, axisName?: string, append?: boolean): CoordinateMap;
export function concat(cmap: CoordinateMap, axisName = "concat", append = false): CoordinateMap {
  const dtype = cmap.inputCoords.coordDtype;
  const coords = new CoordinateSystem([axisName], "", dtype);
  const axis = new AffineTransform(identity(2, dtype), coords, coords);
  return append ? product(cmap, axis) : product(axis, cmap);
}
