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

/**
 * Multiply every coordinate of an entity by a scalar
 */
export function scale(entity: Direction, s: number): Direction;
export function scale(entity: Origin, s: number): Origin;
export function scale(entity: LineDirection, s: number): LineDirection;
export function scale(entity: LineMoment, s: number): LineMoment;
export function scale(entity: PlaneDirection, s: number): PlaneDirection;
export function scale(entity: Horizon, s: number): Horizon;
export function scale(entity: Point, s: number): Point;
export function scale(entity: Line, s: number): Line;
export function scale(entity: Plane, s: number): Plane;
export function scale(entity: Entity, s: number): Entity;
export function scale(entity: Entity, s: number): Entity {
  switch (entity.kind) {
    case "direction":
      return DirectionUtils.create(entity.x * s, entity.y * s, entity.z * s);
    case "origin":
      return OriginUtils.create(entity.w * s);
    case "line-direction":
      return LineDirectionUtils.create(entity.x * s, entity.y * s, entity.z * s);
    case "line-moment":
      return LineMomentUtils.create(entity.x * s, entity.y * s, entity.z * s);
    case "plane-direction":
      return PlaneDirectionUtils.create(entity.x * s, entity.y * s, entity.z * s);
    case "horizon":
      return HorizonUtils.create(entity.w * s);
    case "point":
      return { kind: "point", direction: scale(entity.direction, s), origin: scale(entity.origin, s) };
    case "line":
      return { kind: "line", direction: scale(entity.direction, s), moment: scale(entity.moment, s) };
    case "plane":
      return { kind: "plane", direction: scale(entity.direction, s), horizon: scale(entity.horizon, s) };
  }
}

/**
 * Additive inverse; represents the same geometry with opposite orientation
 */
export function negate(entity: Direction): Direction;
export function negate(entity: Origin): Origin;
export function negate(entity: LineDirection): LineDirection;
export function negate(entity: LineMoment): LineMoment;
export function negate(entity: PlaneDirection): PlaneDirection;
export function negate(entity: Horizon): Horizon;
export function negate(entity: Point): Point;
export function negate(entity: Line): Line;
export function negate(entity: Plane): Plane;
export function negate(entity: Entity): Entity;
export function negate(entity: Entity): Entity {
  return scale(entity, -1);
}
