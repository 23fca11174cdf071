/**
 * Projection / rejection - compound operators built from join, meet and dual
 *
 * No new algebra lives here. Results are not unitized: the scale that
 * falls out of the products is part of the answer, callers unitize when
 * they need a canonical representative.
 */

import type { Line, Plane, Point } from "@/types";
import { dual } from "./dual";
import { join } from "./join";
import { meet } from "./meet";

/**
 * Line through a point, perpendicular to a plane: point ∧ !plane.direction
 */
export function perpendicularLineThroughPoint(point: Point, plane: Plane): Line {
  return join(point, dual(plane.direction));
}

/**
 * Plane containing a line, perpendicular to a plane: line ∧ !plane.direction.
 * Zero when the line is itself perpendicular to the plane.
 */
export function perpendicularPlaneThroughLine(line: Line, plane: Plane): Plane {
  return join(line, dual(plane.direction));
}

/**
 * Plane through a point, perpendicular to a line: point ∧ !line.direction
 */
export function perpendicularPlaneThroughPoint(point: Point, line: Line): Plane {
  return join(point, dual(line.direction));
}

/**
 * Foot of the perpendicular from a point to a plane
 */
export function projectPointOntoPlane(point: Point, plane: Plane): Point {
  return meet(plane, perpendicularLineThroughPoint(point, plane));
}

/**
 * Plane through a point, parallel to the given plane.
 * The normal comes back reversed: (a, b, c, d) through p gives
 * (-a, -b, -c, a·x + b·y + c·z) for a finite p of weight 1.
 */
export function projectPlaneOntoPoint(plane: Plane, point: Point): Plane {
  return perpendicularPlaneThroughPoint(point, perpendicularLineThroughPoint(point, plane));
}

/**
 * Orthogonal projection of a line into a plane.
 * A line perpendicular to the plane projects to the zero line.
 */
export function projectLineOntoPlane(line: Line, plane: Plane): Line {
  return meet(plane, perpendicularPlaneThroughLine(line, plane));
}
