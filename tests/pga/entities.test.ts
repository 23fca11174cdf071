import { DirectionUtils } from "@/pga/components";
import { LineUtils } from "@/pga/Line";
import { PlaneUtils } from "@/pga/Plane";
import { PointUtils } from "@/pga/Point";
import { describe, expect, it } from "vitest";

describe("PointUtils", () => {
  describe("create", () => {
    it("should create a finite point with weight 1", () => {
      expect(PointUtils.create(1, 2, 3)).toEqual({
        kind: "point",
        direction: { kind: "direction", x: 1, y: 2, z: 3 },
        origin: { kind: "origin", w: 1 },
      });
    });
  });

  describe("infinite", () => {
    it("should create an ideal point with weight 0", () => {
      const p = PointUtils.infinite(0, 1, 0);
      expect(p.origin.w).toBe(0);
      expect(PointUtils.toTuple(p)).toEqual([0, 1, 0, 0]);
    });
  });

  describe("tuples", () => {
    it("should read and write [x, y, z, w]", () => {
      const p = PointUtils.fromTuple([2, 4, 6, 2]);
      expect(p).toEqual(PointUtils.homogeneous(2, 4, 6, 2));
      expect(PointUtils.toTuple(p)).toEqual([2, 4, 6, 2]);
    });
  });

  describe("toCartesian", () => {
    it("should divide by the weight", () => {
      expect(PointUtils.toCartesian(PointUtils.homogeneous(2, 4, 6, 2))).toEqual({
        x: 1,
        y: 2,
        z: 3,
      });
    });

    it("should return null for an ideal point", () => {
      expect(PointUtils.toCartesian(PointUtils.infinite(1, 0, 0))).toBeNull();
    });
  });

  describe("classify", () => {
    it("should report a finite point as a position", () => {
      expect(PointUtils.classify(PointUtils.homogeneous(3, 0, 0, 3))).toEqual({
        type: "point",
        position: { x: 1, y: 0, z: 0 },
      });
    });

    it("should report an ideal point as a direction", () => {
      expect(PointUtils.classify(PointUtils.infinite(0.5, 0, 0))).toEqual({
        type: "direction",
        direction: DirectionUtils.create(0.5, 0, 0),
      });
    });
  });

  it("should expose unit points on each axis", () => {
    expect(PointUtils.toTuple(PointUtils.ORIGIN)).toEqual([0, 0, 0, 1]);
    expect(PointUtils.toTuple(PointUtils.X1)).toEqual([1, 0, 0, 1]);
    expect(PointUtils.toTuple(PointUtils.Y1)).toEqual([0, 1, 0, 1]);
    expect(PointUtils.toTuple(PointUtils.Z1)).toEqual([0, 0, 1, 1]);
  });
});

describe("LineUtils", () => {
  it("should create a general line from direction and moment", () => {
    const line = LineUtils.create(1, 2, 3, 4, 5, 6);
    expect(line.direction).toEqual({ kind: "line-direction", x: 1, y: 2, z: 3 });
    expect(line.moment).toEqual({ kind: "line-moment", x: 4, y: 5, z: 6 });
    expect(LineUtils.toTuple(line)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(LineUtils.fromTuple([1, 2, 3, 4, 5, 6])).toEqual(line);
  });

  it("should create a line through the origin with zero moment", () => {
    expect(LineUtils.toTuple(LineUtils.throughOrigin(0, 1, 0))).toEqual([0, 1, 0, 0, 0, 0]);
  });

  it("should create an ideal line with zero direction", () => {
    expect(LineUtils.toTuple(LineUtils.ideal(0, 0, 1))).toEqual([0, 0, 0, 0, 0, 1]);
  });

  it("should replace direction or moment", () => {
    const line = LineUtils.create(1, 0, 0, 0, 1, 0);
    expect(LineUtils.toTuple(LineUtils.withDirection(line, 0, 0, 2))).toEqual([0, 0, 2, 0, 1, 0]);
    expect(LineUtils.toTuple(LineUtils.withMoment(line, 3, 0, 0))).toEqual([1, 0, 0, 3, 0, 0]);
  });

  it("should expose the coordinate axes", () => {
    expect(LineUtils.toTuple(LineUtils.X_AXIS)).toEqual([1, 0, 0, 0, 0, 0]);
    expect(LineUtils.toTuple(LineUtils.Y_AXIS)).toEqual([0, 1, 0, 0, 0, 0]);
    expect(LineUtils.toTuple(LineUtils.Z_AXIS)).toEqual([0, 0, 1, 0, 0, 0]);
  });
});

describe("PlaneUtils", () => {
  it("should create a plane from a, b, c, d", () => {
    const plane = PlaneUtils.create(1, 2, 3, 4);
    expect(plane.direction).toEqual({ kind: "plane-direction", x: 1, y: 2, z: 3 });
    expect(plane.horizon).toEqual({ kind: "horizon", w: 4 });
    expect(PlaneUtils.toTuple(plane)).toEqual([1, 2, 3, 4]);
    expect(PlaneUtils.fromTuple([1, 2, 3, 4])).toEqual(plane);
  });

  describe("fromNormalPoint", () => {
    it("should normalize the normal and pass through the point", () => {
      const plane = PlaneUtils.fromNormalPoint({ x: 0, y: 0, z: 2 }, { x: 5, y: 5, z: 3 });
      expect(PlaneUtils.toTuple(plane)).toEqual([0, 0, 1, -3]);
    });

    it("should give the zero plane for a zero normal", () => {
      const plane = PlaneUtils.fromNormalPoint({ x: 0, y: 0, z: 0 }, { x: 1, y: 1, z: 1 });
      expect(PlaneUtils.toTuple(plane).map(Math.abs)).toEqual([0, 0, 0, 0]);
    });
  });

  it("should take normal and distance as-is", () => {
    const plane = PlaneUtils.fromNormalDistance({ x: 0, y: 3, z: 0 }, 2);
    expect(PlaneUtils.toTuple(plane)).toEqual([0, 3, 0, 2]);
  });

  it("should return the normal as a direction", () => {
    expect(PlaneUtils.normal(PlaneUtils.create(-1, -1, 0, 1))).toEqual(
      DirectionUtils.create(-1, -1, 0)
    );
  });

  it("should expose the axis planes", () => {
    expect(PlaneUtils.toTuple(PlaneUtils.LEFT)).toEqual([1, 0, 0, 0]);
    expect(PlaneUtils.toTuple(PlaneUtils.UP)).toEqual([0, 1, 0, 0]);
    expect(PlaneUtils.toTuple(PlaneUtils.FORWARD)).toEqual([0, 0, 1, 0]);
  });
});

describe("DirectionUtils", () => {
  it("should convert to and from tuples and vectors", () => {
    const d = DirectionUtils.create(1, 2, 3);
    expect(DirectionUtils.toTuple(d)).toEqual([1, 2, 3]);
    expect(DirectionUtils.fromTuple([1, 2, 3])).toEqual(d);
    expect(DirectionUtils.toVector3(d)).toEqual({ x: 1, y: 2, z: 3 });
    expect(DirectionUtils.fromVector3({ x: 1, y: 2, z: 3 })).toEqual(d);
  });
});
