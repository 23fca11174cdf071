/**
 * Meet (antiwedge / regressive product) - lowers grade
 *
 * meet(A, B) = dual(join(dual(A), dual(B))), evaluated in closed form:
 *
 *   Plane & Plane -> Line   direction = n_B × n_A,  moment = n_A·d_B - n_B·d_A
 *   Plane & Line  -> Point  w = -v·n,  (x, y, z) = m × n + v·d
 *   Line  & Plane -> Point  the negation of Plane & Line
 *
 * Parallel planes meet in the zero line. A line parallel to a plane meets
 * it in an ideal point (w = 0), or in the zero point when it lies in the
 * plane.
 */

import { Vec3 } from "@/math/Vec3";
import type { Line, Plane, Point } from "@/types";
import { negate } from "./arithmetic";
import { DirectionUtils, LineDirectionUtils, LineMomentUtils, OriginUtils } from "./components";
import { KernelDebugLogger } from "./KernelDebugLogger";

export type MeetOperand = Plane | Line;

function antiwedgePlanes(a: Plane, b: Plane): Line {
  const direction = Vec3.cross(b.direction, a.direction);
  const moment = Vec3.subtract(
    Vec3.scale(a.direction, b.horizon.w),
    Vec3.scale(b.direction, a.horizon.w)
  );
  return {
    kind: "line",
    direction: LineDirectionUtils.fromVector3(direction),
    moment: LineMomentUtils.fromVector3(moment),
  };
}

function antiwedgePlaneLine(plane: Plane, line: Line): Point {
  const bulk = Vec3.add(
    Vec3.cross(line.moment, plane.direction),
    Vec3.scale(line.direction, plane.horizon.w)
  );
  return {
    kind: "point",
    direction: DirectionUtils.fromVector3(bulk),
    origin: OriginUtils.create(-Vec3.dot(line.direction, plane.direction)),
  };
}

export function meet(a: Plane, b: Plane): Line;
export function meet(a: Plane, b: Line): Point;
export function meet(a: Line, b: Plane): Point;
export function meet(a: MeetOperand, b: MeetOperand): Line | Point;
export function meet(a: MeetOperand, b: MeetOperand): Line | Point {
  let result: Line | Point;

  if (a.kind === "plane" && b.kind === "plane") {
    result = antiwedgePlanes(a, b);
  } else if (a.kind === "plane" && b.kind === "line") {
    result = antiwedgePlaneLine(a, b);
  } else if (a.kind === "line" && b.kind === "plane") {
    result = negate(antiwedgePlaneLine(b, a));
  } else {
    throw new Error(`Cannot meet ${a.kind} with ${b.kind}`);
  }

  KernelDebugLogger.logResult("meet", [a, b], result);
  return result;
}

/**
 * Common point of three planes: (a & b) & c.
 * Planes sharing a line give the zero point; planes sharing only a
 * direction give an ideal point.
 */
export function meetPlanes(a: Plane, b: Plane, c: Plane): Point {
  return meet(meet(a, b), c);
}
