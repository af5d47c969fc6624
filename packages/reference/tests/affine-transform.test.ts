import { afterEach, describe, it, expect } from "vitest";
import { config } from "@coordmap/core";
import { diag, dtypeOf, fromRows, identity, toArray, type Matrix } from "@coordmap/math";
import { AffineTransform, ConstructionError, CoordinateMap, CoordinateSystem } from "../src/index.js";

const EPSILON = 10;

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

function defined<T>(value: T | undefined): T {
  if (value === undefined) throw new Error("expected a value");
  return value;
}

function expectClose(actual: Matrix, expected: number[][]): void {
  const values = toArray(actual);
  expect(values.length).toBe(expected.length);
  values.forEach((r, i) => {
    expect(r.length).toBe(expected[i].length);
    r.forEach((v, j) => expect(v).toBeCloseTo(expected[i][j], EPSILON));
  });
}

describe("AffineTransform", () => {
  afterEach(() => {
    config.reset();
  });

  describe("construction", () => {
    it("scales voxel coordinates", () => {
      const a = new AffineTransform(diag([1, 2, 3, 1]), new CoordinateSystem("ijk"), new CoordinateSystem("xyz"));
      expect(toArray(a.evaluate([1, 1, 1]))).toEqual([[1, 2, 3]]);
      expectClose(defined(a.inverse).evaluate([1, 2, 3]), [[1, 1, 1]]);
      expect(a.kind).toBe("affine");
      expect(a.isAffine()).toBe(true);
      expect(a).toBeInstanceOf(CoordinateMap);
    });

    it("applies the translation", () => {
      const a = new AffineTransform(
        [
          [2, 0, 10],
          [0, 3, 20],
          [0, 0, 1],
        ],
        new CoordinateSystem("ij"),
        new CoordinateSystem("xy")
      );
      expect(toArray(a.evaluate([[1, 1], [0, 2]]))).toEqual([
        [12, 23],
        [10, 26],
      ]);
    });

    it("maps between different dimensions", () => {
      const slice = new AffineTransform(
        [
          [1, 0, 0],
          [0, 1, 0],
          [0, 0, 5],
          [0, 0, 1],
        ],
        new CoordinateSystem("ij"),
        new CoordinateSystem("xyz")
      );
      expect(toArray(slice.evaluate([3, 4]))).toEqual([[3, 4, 5]]);
      expect(slice.ndims).toEqual([2, 3]);
      expect(slice.inverse).toBeUndefined();
    });

    it("rejects a matrix of the wrong shape", () => {
      const error = thrown(
        () => new AffineTransform(identity(3), new CoordinateSystem("ijk"), new CoordinateSystem("xyz"))
      );
      expect(error).toBeInstanceOf(ConstructionError);
      expect(error).toMatchObject({ reason: "shape_mismatch" });
    });

    it("rejects ragged rows", () => {
      const error = thrown(
        () => new AffineTransform([[1, 0], [0]], new CoordinateSystem("i"), new CoordinateSystem("x"))
      );
      expect(error).toMatchObject({ name: "ConstructionError", reason: "shape_mismatch" });
    });

    it("rejects a last row other than [0, ..., 0, 1]", () => {
      const skewed = fromRows([
        [1, 0, 0],
        [0, 1, 0],
        [1, 0, 1],
      ]);
      expect(thrown(() => new AffineTransform(skewed, new CoordinateSystem("ij"), new CoordinateSystem("xy")))).toMatchObject({
        reason: "not_homogeneous",
      });
    });

    it("promotes matrix and coordinate systems to one precision", () => {
      const a = new AffineTransform(
        identity(3, "int16"),
        new CoordinateSystem("ij", "voxels", "int16"),
        new CoordinateSystem("xy", "world", "float32")
      );
      expect(dtypeOf(a.affine)).toBe("float32");
      expect(a.inputCoords.coordDtype).toBe("float32");
      expect(a.inputCoords.name).toBe("voxels");
      expect(a.outputCoords.coordDtype).toBe("float32");
    });

    it("copies the matrix it is given", () => {
      const m = identity(3);
      const a = new AffineTransform(m, new CoordinateSystem("ij"), new CoordinateSystem("xy"));
      m[2] = 7;
      expect(toArray(a.evaluate([0, 0]))).toEqual([[0, 0]]);
    });
  });

  describe("affine", () => {
    it("returns a copy", () => {
      const a = AffineTransform.identity("ij");
      a.affine[0] = 5;
      expect(toArray(a.affine)).toEqual([
        [1, 0, 0],
        [0, 1, 0],
        [0, 0, 1],
      ]);
    });
  });

  describe("inverse", () => {
    it("round-trips points", () => {
      const a = AffineTransform.fromParams("ij", "xy", {
        linear: [
          [2, 1],
          [1, 3],
        ],
        translation: [5, -4],
      });
      const inv = defined(a.inverse);
      expect(inv).toBeInstanceOf(AffineTransform);
      expect(inv.inputCoords).toBe(a.outputCoords);
      expect(inv.outputCoords).toBe(a.inputCoords);
      expectClose(inv.evaluate(a.evaluate([[1, 2], [-3, 0.5]])), [
        [1, 2],
        [-3, 0.5],
      ]);
    });

    it("is undefined for a singular matrix", () => {
      const flat = new AffineTransform(
        [
          [1, 0, 0],
          [0, 0, 0],
          [0, 0, 1],
        ],
        new CoordinateSystem("ij"),
        new CoordinateSystem("xy")
      );
      expect(flat.inverse).toBeUndefined();
      expect(flat.inverseFunction).toBeUndefined();
    });

    it("honours the configured singular tolerance", () => {
      const nearlyFlat = AffineTransform.fromStartStep("ij", "xy", [0, 0], [1, 1e-9]);
      expect(nearlyFlat.inverse).toBeDefined();
      config.set({ singularTolerance: 1e-6 });
      expect(nearlyFlat.inverse).toBeUndefined();
    });

    it("inverts integer transforms in float64", () => {
      const a = new AffineTransform(
        diag([2, 4, 1], "int32"),
        new CoordinateSystem("ij", "voxels", "int32"),
        new CoordinateSystem("xy", "world", "int32")
      );
      const inv = defined(a.inverse);
      expect(dtypeOf(inv.affine)).toBe("float64");
      expect(inv.inputCoords.coordDtype).toBe("float64");
      expect(toArray(inv.evaluate([2, 4]))).toEqual([[1, 1]]);
    });
  });

  describe("factories", () => {
    it("fromParams takes a homogeneous matrix", () => {
      const a = AffineTransform.fromParams("i", "x", diag([2, 1]));
      expect(a.inputCoords.equals(new CoordinateSystem("i", "input"))).toBe(true);
      expect(a.outputCoords.equals(new CoordinateSystem("x", "output"))).toBe(true);
      expect(toArray(a.evaluate([3]))).toEqual([[6]]);
    });

    it("fromParams takes a linear block and translation", () => {
      const a = AffineTransform.fromParams(["u", "v"], ["x", "y"], {
        linear: diag([2, 3]),
        translation: [1, 2],
      });
      expect(toArray(a.evaluate([1, 1]))).toEqual([[3, 5]]);
    });

    it("fromParams rejects names that don't fit the matrix", () => {
      expect(thrown(() => AffineTransform.fromParams("i", "xy", identity(3)))).toMatchObject({
        reason: "shape_mismatch",
      });
      expect(
        thrown(() => AffineTransform.fromParams("ij", "xy", { linear: diag([1, 1]), translation: [1] }))
      ).toMatchObject({ reason: "shape_mismatch" });
    });

    it("fromParams keeps a fractional translation on an integer block", () => {
      const a = AffineTransform.fromParams("ij", "xy", {
        linear: diag([2, 3], "int16"),
        translation: [0.5, 1.5],
      });
      expect(toArray(a.affine)).toEqual([
        [2, 0, 0.5],
        [0, 3, 1.5],
        [0, 0, 1],
      ]);
    });

    it("fromStartStep builds a grid transform", () => {
      const a = AffineTransform.fromStartStep("ijk", "xyz", [1, 2, 3], [4, 5, 6]);
      expect(toArray(a.affine)).toEqual([
        [4, 0, 0, 1],
        [0, 5, 0, 2],
        [0, 0, 6, 3],
        [0, 0, 0, 1],
      ]);
    });

    it("fromStartStep checks lengths", () => {
      expect(thrown(() => AffineTransform.fromStartStep("ij", "xyz", [0, 0], [1, 1]))).toMatchObject({
        name: "ConstructionError",
      });
      expect(thrown(() => AffineTransform.fromStartStep("ij", "xy", [0, 0, 0], [1, 1]))).toMatchObject({
        name: "ConstructionError",
      });
    });

    it("identity maps points to themselves", () => {
      expect(toArray(AffineTransform.identity("ij").evaluate([3, 4]))).toEqual([[3, 4]]);
    });
  });

  it("copy owns its matrix", () => {
    const a = AffineTransform.fromStartStep("ij", "xy", [1, 2], [3, 4]);
    const dup = a.copy();
    expect(dup).toBeInstanceOf(AffineTransform);
    expect(dup).not.toBe(a);
    expect(toArray(dup.affine)).toEqual(toArray(a.affine));
  });

  describe("reordering and renaming", () => {
    const a = AffineTransform.fromStartStep("ijk", "xyz", [0, 0, 0], [1, 2, 3]);

    it("reorders input columns of the matrix", () => {
      const b = a.reorderedInput("kji");
      expect(b).toBeInstanceOf(AffineTransform);
      expect(b.inputCoords.coordNames).toEqual(["k", "j", "i"]);
      expect(b.inputCoords.name).toBe("input");
      expect(toArray(b.affine)).toEqual([
        [0, 0, 1, 0],
        [0, 2, 0, 0],
        [3, 0, 0, 0],
        [0, 0, 0, 1],
      ]);
    });

    it("reorders output rows of the matrix", () => {
      const b = a.reorderedOutput("yzx");
      expect(b.outputCoords.coordNames).toEqual(["y", "z", "x"]);
      expect(toArray(b.affine)).toEqual([
        [0, 2, 0, 0],
        [0, 0, 3, 0],
        [1, 0, 0, 0],
        [0, 0, 0, 1],
      ]);
    });

    it("renames without changing the matrix", () => {
      const b = a.renamedOutput({ x: "u" });
      expect(b).toBeInstanceOf(AffineTransform);
      expect(b.outputCoords.coordNames).toEqual(["u", "y", "z"]);
      expect(b.outputCoords.name).toBe("output");
      expect(toArray(b.affine)).toEqual(toArray(a.affine));
      expect(a.renamedInput({ i: "r" }, "grid").inputCoords.name).toBe("grid");
    });

    it("restores the matrix when the input is reversed twice", () => {
      const twice = a.reorderedInput().reorderedInput();
      expect(twice.inputCoords.coordNames).toEqual(["i", "j", "k"]);
      expect(toArray(twice.affine)).toEqual(toArray(a.affine));
      expect(toArray(twice.evaluate([1, 2, 3]))).toEqual([[1, 4, 9]]);
    });

    it("keeps an integer precision when reordering", () => {
      const voxels = new AffineTransform(
        diag([2, 3, 1], "int16"),
        new CoordinateSystem("ij", "voxels", "int16"),
        new CoordinateSystem("xy", "scaled", "int16")
      );
      const b = voxels.reorderedInput();
      expect(dtypeOf(b.affine)).toBe("int16");
      expect(b.inputCoords.coordDtype).toBe("int16");
    });
  });

  it("prints its matrix and coordinate systems", () => {
    const text = AffineTransform.identity("i").toString();
    expect(text.split("\n")).toEqual([
      "AffineTransform(",
      "   affine=[     1.0000     0.0000 ]",
      "          [     0.0000     1.0000 ],",
      '   inputCoords=CoordinateSystem(coordNames=["i"], name="input", coordDtype=float64),',
      '   outputCoords=CoordinateSystem(coordNames=["i"], name="output", coordDtype=float64)',
      ")",
    ]);
  });
});
