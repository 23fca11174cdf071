import type { Line, LineDirection, LineMoment, Vector6Tuple } from "@/types";
import { LineDirectionUtils, LineMomentUtils } from "./components";

function line(
  directionX: number,
  directionY: number,
  directionZ: number,
  momentX: number,
  momentY: number,
  momentZ: number
): Line {
  return {
    kind: "line",
    direction: LineDirectionUtils.create(directionX, directionY, directionZ),
    moment: LineMomentUtils.create(momentX, momentY, momentZ),
  };
}

/**
 * LineUtils - lines as (direction, moment) pairs
 *
 * For the line through finite points p and q the direction is q - p and
 * the moment is p × q.
 */
export const LineUtils = {
  create: line,

  throughOrigin(x: number, y: number, z: number): Line {
    return line(x, y, z, 0, 0, 0);
  },

  /**
   * Line at infinity (zero direction)
   */
  ideal(momentX: number, momentY: number, momentZ: number): Line {
    return line(0, 0, 0, momentX, momentY, momentZ);
  },

  fromParts(direction: LineDirection, moment: LineMoment): Line {
    return { kind: "line", direction, moment };
  },

  withDirection(l: Line, x: number, y: number, z: number): Line {
    return { kind: "line", direction: LineDirectionUtils.create(x, y, z), moment: l.moment };
  },

  withMoment(l: Line, x: number, y: number, z: number): Line {
    return { kind: "line", direction: l.direction, moment: LineMomentUtils.create(x, y, z) };
  },

  fromTuple(tuple: Vector6Tuple): Line {
    return line(tuple[0], tuple[1], tuple[2], tuple[3], tuple[4], tuple[5]);
  },

  /**
   * [dx, dy, dz, mx, my, mz]
   */
  toTuple(l: Line): Vector6Tuple {
    return [
      l.direction.x,
      l.direction.y,
      l.direction.z,
      l.moment.x,
      l.moment.y,
      l.moment.z,
    ];
  },

  X_AXIS: line(1, 0, 0, 0, 0, 0),
  Y_AXIS: line(0, 1, 0, 0, 0, 0),
  Z_AXIS: line(0, 0, 1, 0, 0, 0),
};
