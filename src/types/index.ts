/**
 * Core type definitions for the PGA kernel
 */

// =============================================================================
// MATH TYPES
// =============================================================================

/** 3D Vector representation (immutable) */
export interface Vector3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export type Vector3Tuple = readonly [number, number, number];
export type Vector4Tuple = readonly [number, number, number, number];
export type Vector6Tuple = readonly [number, number, number, number, number, number];

// =============================================================================
// ENTITY COMPONENTS
// =============================================================================

/** Free vector / ideal point: x e1 + y e2 + z e3 */
export interface Direction extends Vector3 {
  readonly kind: "direction";
}

/** Weight of a point: w e4 */
export interface Origin {
  readonly kind: "origin";
  readonly w: number;
}

/** Weight of a line: x e41 + y e42 + z e43 */
export interface LineDirection extends Vector3 {
  readonly kind: "line-direction";
}

/** Bulk of a line: x e23 + y e31 + z e12 */
export interface LineMoment extends Vector3 {
  readonly kind: "line-moment";
}

/** Weight of a plane (its normal): x e423 + y e431 + z e412 */
export interface PlaneDirection extends Vector3 {
  readonly kind: "plane-direction";
}

/** Bulk of a plane: w e321 */
export interface Horizon {
  readonly kind: "horizon";
  readonly w: number;
}

// =============================================================================
// ENTITIES
// =============================================================================

/** Homogeneous point. Finite when origin.w != 0, ideal when origin.w == 0 */
export interface Point {
  readonly kind: "point";
  readonly direction: Direction;
  readonly origin: Origin;
}

/** Line as a direction (weight) and moment about the origin (bulk) */
export interface Line {
  readonly kind: "line";
  readonly direction: LineDirection;
  readonly moment: LineMoment;
}

/** Plane n·x + d = 0 with n = direction, d = horizon.w */
export interface Plane {
  readonly kind: "plane";
  readonly direction: PlaneDirection;
  readonly horizon: Horizon;
}

export type EntityComponent =
  | Direction
  | Origin
  | LineDirection
  | LineMoment
  | PlaneDirection
  | Horizon;

export type CompositeEntity = Point | Line | Plane;

/** Every value the kernel produces */
export type Entity = EntityComponent | CompositeEntity;

export type EntityKind = Entity["kind"];

/** Result of reading a point back as either a position or a direction */
export type PointOrDirection =
  | { readonly type: "point"; readonly position: Vector3 }
  | { readonly type: "direction"; readonly direction: Direction };

/** Mutable cell holding an entity, for the in-place unitize convenience */
export interface Ref<T extends Entity> {
  current: T;
}
