import { Vec3 } from "@/math/Vec3";
import type {
  Direction,
  Horizon,
  LineDirection,
  LineMoment,
  Origin,
  PlaneDirection,
  Vector3,
  Vector3Tuple,
} from "@/types";

function direction(x: number, y: number, z: number): Direction {
  return { kind: "direction", x, y, z };
}

/**
 * DirectionUtils - free vectors (grade 1, no weight)
 */
export const DirectionUtils = {
  create: direction,

  fromVector3(v: Vector3): Direction {
    return DirectionUtils.create(v.x, v.y, v.z);
  },

  toVector3(d: Direction): Vector3 {
    return Vec3.create(d.x, d.y, d.z);
  },

  fromTuple(tuple: Vector3Tuple): Direction {
    return DirectionUtils.fromVector3(Vec3.fromTuple(tuple));
  },

  toTuple(d: Direction): Vector3Tuple {
    return Vec3.toTuple(d);
  },

  ZERO: direction(0, 0, 0),
  LEFT: direction(1, 0, 0),
  UP: direction(0, 1, 0),
  FORWARD: direction(0, 0, 1),
};

export const OriginUtils = {
  create(w: number): Origin {
    return { kind: "origin", w };
  },
};

export const LineDirectionUtils = {
  create(x: number, y: number, z: number): LineDirection {
    return { kind: "line-direction", x, y, z };
  },

  fromVector3(v: Vector3): LineDirection {
    return LineDirectionUtils.create(v.x, v.y, v.z);
  },
};

export const LineMomentUtils = {
  create(x: number, y: number, z: number): LineMoment {
    return { kind: "line-moment", x, y, z };
  },

  fromVector3(v: Vector3): LineMoment {
    return LineMomentUtils.create(v.x, v.y, v.z);
  },
};

export const PlaneDirectionUtils = {
  create(x: number, y: number, z: number): PlaneDirection {
    return { kind: "plane-direction", x, y, z };
  },

  fromVector3(v: Vector3): PlaneDirection {
    return PlaneDirectionUtils.create(v.x, v.y, v.z);
  },
};

export const HorizonUtils = {
  create(w: number): Horizon {
    return { kind: "horizon", w };
  },
};
