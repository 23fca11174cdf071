/**
 * Bulk/weight decomposition
 *
 * The weight vanishes for ideal elements (at infinity), the bulk vanishes
 * for elements through the origin:
 *
 *   Point: bulk = direction (x, y, z),  weight = origin (w)
 *   Line:  bulk = moment,               weight = direction
 *   Plane: bulk = horizon (d),          weight = direction (normal)
 */

import type {
  CompositeEntity,
  Direction,
  Entity,
  EntityComponent,
  Horizon,
  Line,
  LineDirection,
  LineMoment,
  Origin,
  Plane,
  PlaneDirection,
  Point,
} from "@/types";
import { normSquared } from "./coordinates";

export function bulk(entity: Point): Direction;
export function bulk(entity: Line): LineMoment;
export function bulk(entity: Plane): Horizon;
export function bulk(entity: CompositeEntity): EntityComponent;
export function bulk(entity: CompositeEntity): EntityComponent {
  switch (entity.kind) {
    case "point":
      return entity.direction;
    case "line":
      return entity.moment;
    case "plane":
      return entity.horizon;
  }
}

export function weight(entity: Point): Origin;
export function weight(entity: Line): LineDirection;
export function weight(entity: Plane): PlaneDirection;
export function weight(entity: CompositeEntity): EntityComponent;
export function weight(entity: CompositeEntity): EntityComponent {
  switch (entity.kind) {
    case "point":
      return entity.origin;
    case "line":
      return entity.direction;
    case "plane":
      return entity.direction;
  }
}

/**
 * Euclidean norm of the weight. A lone component is its own weight.
 */
export function weightNorm(entity: Entity): number {
  const part = isComposite(entity) ? weight(entity) : entity;
  return Math.sqrt(normSquared(part));
}

export function bulkNorm(entity: CompositeEntity): number {
  return Math.sqrt(normSquared(bulk(entity)));
}

export function isComposite(entity: Entity): entity is CompositeEntity {
  return entity.kind === "point" || entity.kind === "line" || entity.kind === "plane";
}
