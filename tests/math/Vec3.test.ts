import { Vec3 } from "@/math/Vec3";
import { describe, expect, it } from "vitest";

describe("Vec3", () => {
  describe("create", () => {
    it("should create a vector with given coordinates", () => {
      expect(Vec3.create(3, 4, 5)).toEqual({ x: 3, y: 4, z: 5 });
    });
  });

  describe("tuples", () => {
    it("should read and write [x, y, z]", () => {
      expect(Vec3.fromTuple([1, 2, 3])).toEqual({ x: 1, y: 2, z: 3 });
      expect(Vec3.toTuple({ x: 1, y: 2, z: 3 })).toEqual([1, 2, 3]);
    });
  });

  describe("add / subtract", () => {
    it("should add two vectors", () => {
      expect(Vec3.add({ x: 1, y: 2, z: 3 }, { x: 4, y: 5, z: 6 })).toEqual({ x: 5, y: 7, z: 9 });
    });

    it("should subtract two vectors", () => {
      expect(Vec3.subtract({ x: 5, y: 7, z: 9 }, { x: 1, y: 2, z: 3 })).toEqual({
        x: 4,
        y: 5,
        z: 6,
      });
    });
  });

  describe("scale", () => {
    it("should scale a vector by a scalar", () => {
      expect(Vec3.scale({ x: 2, y: 3, z: 4 }, 2)).toEqual({ x: 4, y: 6, z: 8 });
    });
  });

  describe("dot", () => {
    it("should calculate dot product", () => {
      expect(Vec3.dot({ x: 1, y: 2, z: 3 }, { x: 4, y: 5, z: 6 })).toBe(32); // 4 + 10 + 18
    });

    it("should return zero for perpendicular vectors", () => {
      expect(Vec3.dot({ x: 1, y: 0, z: 0 }, { x: 0, y: 1, z: 0 })).toBe(0);
    });
  });

  describe("cross", () => {
    it("should follow the right-hand rule", () => {
      expect(Vec3.cross({ x: 1, y: 0, z: 0 }, { x: 0, y: 1, z: 0 })).toEqual({ x: 0, y: 0, z: 1 });
      expect(Vec3.cross({ x: 0, y: 1, z: 0 }, { x: 0, y: 0, z: 1 })).toEqual({ x: 1, y: 0, z: 0 });
      expect(Vec3.cross({ x: 0, y: 0, z: 1 }, { x: 1, y: 0, z: 0 })).toEqual({ x: 0, y: 1, z: 0 });
    });

    it("should compute a general cross product", () => {
      // (2*6 - 3*5, 3*4 - 1*6, 1*5 - 2*4)
      expect(Vec3.cross({ x: 1, y: 2, z: 3 }, { x: 4, y: 5, z: 6 })).toEqual({
        x: -3,
        y: 6,
        z: -3,
      });
    });
  });

  describe("length", () => {
    it("should calculate squared length and length", () => {
      expect(Vec3.lengthSquared({ x: 2, y: 3, z: 6 })).toBe(49);
      expect(Vec3.length({ x: 2, y: 3, z: 6 })).toBe(7);
    });
  });

  describe("normalize", () => {
    it("should normalize to unit length", () => {
      const n = Vec3.normalize({ x: 2, y: 3, z: 6 });
      expect(n.x).toBeCloseTo(2 / 7);
      expect(n.y).toBeCloseTo(3 / 7);
      expect(n.z).toBeCloseTo(6 / 7);
    });

    it("should return zero vector for zero input", () => {
      expect(Vec3.normalize(Vec3.zero())).toEqual({ x: 0, y: 0, z: 0 });
    });
  });
});
