import { describe, it, expect } from "vitest";
import { dtypeOf, matrix, rows, cols, toArray } from "@coordmap/math";
import { CoordinateSystem, CoordinateSystemError, ValidationError } from "../src/index.js";

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

describe("CoordinateSystem", () => {
  describe("construction", () => {
    it("reads a string one character per axis", () => {
      const cs = new CoordinateSystem("ijk");
      expect(cs.coordNames).toEqual(["i", "j", "k"]);
      expect(cs.ndim).toBe(3);
      expect(cs.name).toBe("");
      expect(cs.coordDtype).toBe("float64");
    });

    it("takes a list of names, a label and a precision", () => {
      const cs = new CoordinateSystem(["time", "x"], "world", "float32");
      expect(cs.coordNames).toEqual(["time", "x"]);
      expect(cs.name).toBe("world");
      expect(cs.coordDtype).toBe("float32");
    });

    it("rejects repeated axis names", () => {
      expect(() => new CoordinateSystem("iji")).toThrow(CoordinateSystemError);
    });
  });

  describe("axis lookup", () => {
    const cs = new CoordinateSystem("ijk");

    it("finds axes by name", () => {
      expect(cs.index("j")).toBe(1);
      expect(cs.has("k")).toBe(true);
      expect(cs.has("q")).toBe(false);
    });

    it("throws for unknown axes", () => {
      expect(() => cs.index("q")).toThrow(CoordinateSystemError);
    });
  });

  describe("equality", () => {
    it("compares names, label and precision", () => {
      const a = new CoordinateSystem("ij", "voxels");
      expect(a.equals(new CoordinateSystem(["i", "j"], "voxels"))).toBe(true);
      expect(a.equals(new CoordinateSystem("ji", "voxels"))).toBe(false);
      expect(a.equals(new CoordinateSystem("ij", "world"))).toBe(false);
      expect(a.equals(new CoordinateSystem("ij", "voxels", "float32"))).toBe(false);
    });

    it("withDtype keeps names and label", () => {
      const a = new CoordinateSystem("ij", "voxels", "int16");
      expect(a.withDtype("int16")).toBe(a);
      expect(a.withDtype("float64").equals(new CoordinateSystem("ij", "voxels", "float64"))).toBe(true);
    });
  });

  describe("product", () => {
    it("concatenates axes and promotes precision", () => {
      const p = CoordinateSystem.product(
        new CoordinateSystem("ij", "a", "int16"),
        new CoordinateSystem("k", "b", "float32")
      );
      expect(p.coordNames).toEqual(["i", "j", "k"]);
      expect(p.name).toBe("product");
      expect(p.coordDtype).toBe("float32");
    });

    it("rejects shared axis names", () => {
      expect(() => CoordinateSystem.product(new CoordinateSystem("ij"), new CoordinateSystem("jk"))).toThrow(
        CoordinateSystemError
      );
    });
  });

  describe("checkedValues", () => {
    const cs = new CoordinateSystem("ij");

    it("turns a point into a one-row batch", () => {
      const batch = cs.checkedValues([1, 2]);
      expect(rows(batch)).toBe(1);
      expect(cols(batch)).toBe(2);
      expect(dtypeOf(batch)).toBe("float64");
    });

    it("keeps batches of points", () => {
      expect(toArray(cs.checkedValues([[1, 2], [3, 4]]))).toEqual([
        [1, 2],
        [3, 4],
      ]);
    });

    it("returns a fresh batch", () => {
      const m = matrix(1, 2, [1, 2]);
      expect(cs.checkedValues(m)).not.toBe(m);
    });

    it("rejects the wrong number of coordinates", () => {
      const error = thrown(() => cs.checkedValues([1, 2, 3]));
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        reason: "shape",
        message:
          'Array shape[-1] (3) must match CoordinateSystem ndim (2).\n  CoordinateSystem(coordNames=["i", "j"], name="", coordDtype=float64)',
      });
    });

    it("rejects ragged batches", () => {
      expect(thrown(() => cs.checkedValues([[1, 2], [3]]))).toMatchObject({ name: "ValidationError", reason: "ragged" });
    });

    it("rejects values an integer system cannot hold", () => {
      const voxels = new CoordinateSystem("ij", "voxels", "int16");
      expect(thrown(() => voxels.checkedValues([1.5, 2]))).toMatchObject({ reason: "dtype" });
      expect(thrown(() => voxels.checkedValues([40000, 2]))).toMatchObject({ reason: "dtype" });
      expect(dtypeOf(voxels.checkedValues([1, 2]))).toBe("int16");
    });

    it("accepts matrices only in a precision that casts safely", () => {
      const voxels = new CoordinateSystem("ij", "voxels", "int16");
      expect(thrown(() => voxels.checkedValues(matrix(1, 2, [1, 2])))).toMatchObject({ reason: "dtype" });

      const world = new CoordinateSystem("ij", "world", "float32");
      const batch = world.checkedValues(matrix(1, 2, [1, 2], "int16"));
      expect(dtypeOf(batch)).toBe("float32");
      expect(toArray(batch)).toEqual([[1, 2]]);
    });
  });

  it("prints names, label and precision", () => {
    expect(new CoordinateSystem("ij", "voxels", "int16").toString()).toBe(
      'CoordinateSystem(coordNames=["i", "j"], name="voxels", coordDtype=int16)'
    );
  });
});
