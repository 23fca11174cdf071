import { Vec3 } from "@/math/Vec3";
import type { Direction, Horizon, Plane, PlaneDirection, Vector3, Vector4Tuple } from "@/types";
import { DirectionUtils, HorizonUtils, PlaneDirectionUtils } from "./components";

function plane(a: number, b: number, c: number, d: number): Plane {
  return {
    kind: "plane",
    direction: PlaneDirectionUtils.create(a, b, c),
    horizon: HorizonUtils.create(d),
  };
}

/**
 * PlaneUtils - planes a·x + b·y + c·z + d = 0
 */
export const PlaneUtils = {
  create: plane,

  fromParts(direction: PlaneDirection, horizon: Horizon): Plane {
    return { kind: "plane", direction, horizon };
  },

  /**
   * Plane with the given normal and horizon term, taken as-is
   */
  fromNormalDistance(normal: Vector3, distance: number): Plane {
    return plane(normal.x, normal.y, normal.z, distance);
  },

  /**
   * Plane with unit normal through a point.
   * A zero normal yields the zero plane.
   */
  fromNormalPoint(normal: Vector3, point: Vector3): Plane {
    const n = Vec3.normalize(normal);
    return plane(n.x, n.y, n.z, -Vec3.dot(n, point));
  },

  normal(p: Plane): Direction {
    return DirectionUtils.create(p.direction.x, p.direction.y, p.direction.z);
  },

  fromTuple(tuple: Vector4Tuple): Plane {
    return plane(tuple[0], tuple[1], tuple[2], tuple[3]);
  },

  toTuple(p: Plane): Vector4Tuple {
    return [p.direction.x, p.direction.y, p.direction.z, p.horizon.w];
  },

  LEFT: plane(1, 0, 0, 0),
  UP: plane(0, 1, 0, 0),
  FORWARD: plane(0, 0, 1, 0),
};
