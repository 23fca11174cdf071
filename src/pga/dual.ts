/**
 * Duality - the grade-reversing complement map
 *
 * Pairing table (left to right / right to left):
 *
 *   Direction      <-> PlaneDirection   (x, y, z)  / (-x, -y, -z)
 *   LineDirection  <-> LineMoment       (-x,-y,-z) / (-x, -y, -z)
 *   Origin         <-> Horizon          (w)        / (-w)
 *
 * Composites dualize part by part, so bulk and weight swap roles:
 * Point <-> Plane and Line -> Line. Applying dual twice multiplies by
 * doubleDualSign(kind) from ./basis.
 */

import type {
  Direction,
  Entity,
  Horizon,
  Line,
  LineDirection,
  LineMoment,
  Origin,
  Plane,
  PlaneDirection,
  Point,
} from "@/types";
import {
  DirectionUtils,
  HorizonUtils,
  LineDirectionUtils,
  LineMomentUtils,
  OriginUtils,
  PlaneDirectionUtils,
} from "./components";

export function dual(entity: Direction): PlaneDirection;
export function dual(entity: PlaneDirection): Direction;
export function dual(entity: LineDirection): LineMoment;
export function dual(entity: LineMoment): LineDirection;
export function dual(entity: Origin): Horizon;
export function dual(entity: Horizon): Origin;
export function dual(entity: Point): Plane;
export function dual(entity: Plane): Point;
export function dual(entity: Line): Line;
export function dual(entity: Entity): Entity;
export function dual(entity: Entity): Entity {
  switch (entity.kind) {
    case "direction":
      return PlaneDirectionUtils.create(entity.x, entity.y, entity.z);
    case "plane-direction":
      return DirectionUtils.create(-entity.x, -entity.y, -entity.z);
    case "line-direction":
      return LineMomentUtils.create(-entity.x, -entity.y, -entity.z);
    case "line-moment":
      return LineDirectionUtils.create(-entity.x, -entity.y, -entity.z);
    case "origin":
      return HorizonUtils.create(entity.w);
    case "horizon":
      return OriginUtils.create(-entity.w);
    case "point":
      return { kind: "plane", direction: dual(entity.direction), horizon: dual(entity.origin) };
    case "plane":
      return { kind: "point", direction: dual(entity.direction), origin: dual(entity.horizon) };
    case "line":
      return { kind: "line", direction: dual(entity.moment), moment: dual(entity.direction) };
  }
}
