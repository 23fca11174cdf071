import { DEFAULT_KERNEL_OPTIONS, type KernelOptions } from "@/config/kernelConfig";
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
  Ref,
} from "@/types";
import { scale } from "./arithmetic";
import { weightNorm } from "./bulkWeight";
import { coordinates, normSquared } from "./coordinates";
import { KernelDebugLogger } from "./KernelDebugLogger";

/**
 * Euclidean norm over every stored coordinate
 */
export function norm(entity: Entity): number {
  return Math.sqrt(normSquared(entity));
}

/**
 * True for the additive identity: sum of squared coordinates within epsilon
 */
export function isZero(entity: Entity, epsilon: number = DEFAULT_KERNEL_OPTIONS.zeroEpsilon): boolean {
  return normSquared(entity) <= epsilon;
}

/**
 * True when the weight is non-negligible, i.e. the entity is a proper
 * finite point, line or plane
 */
export function isValid(
  entity: Entity,
  epsilon: number = DEFAULT_KERNEL_OPTIONS.validityEpsilon
): boolean {
  return weightNorm(entity) > epsilon;
}

/**
 * Rescale so the weight has unit length.
 *
 * Precondition: isValid(entity, epsilon). Without weight there is no scale
 * to divide by; the zero element of the same kind is returned instead and
 * the call is recorded by KernelDebugLogger.
 */
export function unitized(entity: Direction, epsilon?: number): Direction;
export function unitized(entity: Origin, epsilon?: number): Origin;
export function unitized(entity: LineDirection, epsilon?: number): LineDirection;
export function unitized(entity: LineMoment, epsilon?: number): LineMoment;
export function unitized(entity: PlaneDirection, epsilon?: number): PlaneDirection;
export function unitized(entity: Horizon, epsilon?: number): Horizon;
export function unitized(entity: Point, epsilon?: number): Point;
export function unitized(entity: Line, epsilon?: number): Line;
export function unitized(entity: Plane, epsilon?: number): Plane;
export function unitized(entity: Entity, epsilon?: number): Entity;
export function unitized(
  entity: Entity,
  epsilon: number = DEFAULT_KERNEL_OPTIONS.validityEpsilon
): Entity {
  const magnitude = weightNorm(entity);
  if (magnitude <= epsilon) {
    const zero = scale(entity, 0);
    KernelDebugLogger.logZeroWeight(entity, zero);
    return zero;
  }
  return scale(entity, 1 / magnitude);
}

/**
 * In-place unitize of the entity held by a ref
 */
export function unitize(ref: Ref<Direction>, epsilon?: number): Ref<Direction>;
export function unitize(ref: Ref<Point>, epsilon?: number): Ref<Point>;
export function unitize(ref: Ref<Line>, epsilon?: number): Ref<Line>;
export function unitize(ref: Ref<Plane>, epsilon?: number): Ref<Plane>;
export function unitize(ref: Ref<Entity>, epsilon?: number): Ref<Entity>;
export function unitize(
  ref: Ref<Entity>,
  epsilon: number = DEFAULT_KERNEL_OPTIONS.validityEpsilon
): Ref<Entity> {
  ref.current = unitized(ref.current, epsilon);
  return ref;
}

/**
 * Componentwise comparison: same kind and every coordinate within epsilon
 */
export function approxEq<T extends Entity>(
  a: T,
  b: T,
  epsilon: number = DEFAULT_KERNEL_OPTIONS.approxEpsilon
): boolean {
  if (a.kind !== b.kind) return false;
  const left = coordinates(a);
  const right = coordinates(b);
  return left.every((value, index) => Math.abs(value - (right[index] ?? Number.NaN)) <= epsilon);
}

export interface Tolerance {
  isZero(entity: Entity): boolean;
  isValid(entity: Entity): boolean;
  approxEq<T extends Entity>(a: T, b: T): boolean;
  unitized(entity: Direction): Direction;
  unitized(entity: Point): Point;
  unitized(entity: Line): Line;
  unitized(entity: Plane): Plane;
  unitized(entity: Entity): Entity;
}

/**
 * Bind the queries to the tolerances of a kernel configuration
 */
export function withTolerance(options: KernelOptions): Tolerance {
  function boundUnitized(entity: Direction): Direction;
  function boundUnitized(entity: Point): Point;
  function boundUnitized(entity: Line): Line;
  function boundUnitized(entity: Plane): Plane;
  function boundUnitized(entity: Entity): Entity;
  function boundUnitized(entity: Entity): Entity {
    return unitized(entity, options.validityEpsilon);
  }

  return {
    isZero: (entity) => isZero(entity, options.zeroEpsilon),
    isValid: (entity) => isValid(entity, options.validityEpsilon),
    approxEq: (a, b) => approxEq(a, b, options.approxEpsilon),
    unitized: boundUnitized,
  };
}
