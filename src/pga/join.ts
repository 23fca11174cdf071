/**
 * Join (wedge / outer product) - raises grade
 *
 * join(A, B) is the smallest entity incident to both A and B:
 *
 *   Point ∧ Point     -> Line   direction = w_A·p_B - p_A·w_B,  moment = p_A × p_B
 *   Point ∧ Direction -> Line   (a direction is a point with w = 0)
 *   Line  ∧ Point     -> Plane  direction = v × p + m·w,  horizon = -m·p
 *   Point ∧ Line      -> Plane  the negation of Line ∧ Point
 *
 * The product is antisymmetric in every supported pair. Coincident or
 * collinear operands give the zero element of the target grade; callers
 * decide with isZero/isValid whether that means "no such entity".
 */

import { Vec3 } from "@/math/Vec3";
import type { Direction, Line, LineMoment, Plane, Point, Vector3 } from "@/types";
import { negate } from "./arithmetic";
import { HorizonUtils, LineDirectionUtils, LineMomentUtils, PlaneDirectionUtils } from "./components";
import { KernelDebugLogger } from "./KernelDebugLogger";

type PointLike = Point | Direction;
type LineLike = Line | LineMoment;

export type JoinOperand = PointLike | LineLike;

interface Homogeneous {
  readonly p: Vector3;
  readonly w: number;
}

interface Plucker {
  readonly v: Vector3;
  readonly m: Vector3;
}

function isPointLike(entity: JoinOperand): entity is PointLike {
  return entity.kind === "point" || entity.kind === "direction";
}

function isLineLike(entity: JoinOperand): entity is LineLike {
  return entity.kind === "line" || entity.kind === "line-moment";
}

function homogeneous(entity: PointLike): Homogeneous {
  if (entity.kind === "direction") {
    return { p: entity, w: 0 };
  }
  return { p: entity.direction, w: entity.origin.w };
}

function plucker(entity: LineLike): Plucker {
  if (entity.kind === "line-moment") {
    return { v: Vec3.zero(), m: entity };
  }
  return { v: entity.direction, m: entity.moment };
}

function wedgePoints(a: Homogeneous, b: Homogeneous): Line {
  const direction = Vec3.subtract(Vec3.scale(b.p, a.w), Vec3.scale(a.p, b.w));
  const moment = Vec3.cross(a.p, b.p);
  return {
    kind: "line",
    direction: LineDirectionUtils.fromVector3(direction),
    moment: LineMomentUtils.fromVector3(moment),
  };
}

function wedgeLinePoint(line: Plucker, point: Homogeneous): Plane {
  const direction = Vec3.add(Vec3.cross(line.v, point.p), Vec3.scale(line.m, point.w));
  return {
    kind: "plane",
    direction: PlaneDirectionUtils.fromVector3(direction),
    horizon: HorizonUtils.create(-Vec3.dot(line.m, point.p)),
  };
}

export function join(a: Point, b: Point): Line;
export function join(a: Point, b: Direction): Line;
export function join(a: Direction, b: Point): Line;
export function join(a: Direction, b: Direction): Line;
export function join(a: Line, b: Point): Plane;
export function join(a: Point, b: Line): Plane;
export function join(a: Line, b: Direction): Plane;
export function join(a: Direction, b: Line): Plane;
export function join(a: LineMoment, b: Point): Plane;
export function join(a: Point, b: LineMoment): Plane;
export function join(a: JoinOperand, b: JoinOperand): Line | Plane;
export function join(a: JoinOperand, b: JoinOperand): Line | Plane {
  let result: Line | Plane;

  if (isPointLike(a) && isPointLike(b)) {
    result = wedgePoints(homogeneous(a), homogeneous(b));
  } else if (isLineLike(a) && isPointLike(b)) {
    result = wedgeLinePoint(plucker(a), homogeneous(b));
  } else if (isPointLike(a) && isLineLike(b)) {
    result = negate(wedgeLinePoint(plucker(b), homogeneous(a)));
  } else {
    throw new Error(`Cannot join ${a.kind} with ${b.kind}`);
  }

  KernelDebugLogger.logResult("join", [a, b], result);
  return result;
}

/**
 * Plane through three points: (a ∧ b) ∧ c.
 * Collinear or coincident points give the zero plane.
 */
export function joinPoints(a: Point, b: Point, c: Point): Plane {
  return join(join(a, b), c);
}
