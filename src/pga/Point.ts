import { DEFAULT_KERNEL_OPTIONS } from "@/config/kernelConfig";
import type { Direction, Origin, Point, PointOrDirection, Vector3, Vector4Tuple } from "@/types";
import { DirectionUtils, OriginUtils } from "./components";

function point(x: number, y: number, z: number, w: number): Point {
  return {
    kind: "point",
    direction: DirectionUtils.create(x, y, z),
    origin: OriginUtils.create(w),
  };
}

/**
 * PointUtils - homogeneous points x e1 + y e2 + z e3 + w e4
 */
export const PointUtils = {
  /**
   * Finite point at (x, y, z), weight 1
   */
  create(x: number, y: number, z: number): Point {
    return point(x, y, z, 1);
  },

  /**
   * Ideal point (pure direction), weight 0
   */
  infinite(x: number, y: number, z: number): Point {
    return point(x, y, z, 0);
  },

  homogeneous: point,

  fromParts(direction: Direction, origin: Origin): Point {
    return { kind: "point", direction, origin };
  },

  fromVector3(v: Vector3): Point {
    return point(v.x, v.y, v.z, 1);
  },

  fromTuple(tuple: Vector4Tuple): Point {
    return point(tuple[0], tuple[1], tuple[2], tuple[3]);
  },

  toTuple(p: Point): Vector4Tuple {
    return [p.direction.x, p.direction.y, p.direction.z, p.origin.w];
  },

  /**
   * Euclidean position (x/w, y/w, z/w).
   * Returns null for ideal points, which have no position.
   */
  toCartesian(p: Point, epsilon: number = DEFAULT_KERNEL_OPTIONS.validityEpsilon): Vector3 | null {
    const w = p.origin.w;
    if (Math.abs(w) <= epsilon) return null;
    return { x: p.direction.x / w, y: p.direction.y / w, z: p.direction.z / w };
  },

  /**
   * Read a point back as a position, or as a direction when its weight vanishes
   */
  classify(p: Point, epsilon: number = DEFAULT_KERNEL_OPTIONS.validityEpsilon): PointOrDirection {
    const position = PointUtils.toCartesian(p, epsilon);
    if (position === null) {
      return { type: "direction", direction: p.direction };
    }
    return { type: "point", position };
  },

  ORIGIN: point(0, 0, 0, 1),
  X1: point(1, 0, 0, 1),
  Y1: point(0, 1, 0, 1),
  Z1: point(0, 0, 1, 1),
};
