import type { Vector3, Vector3Tuple } from "@/types";

/**
 * Vec3 - Pure utility functions for 3D vector operations
 * All functions are immutable and return new vectors
 */
export const Vec3 = {
  /**
   * Create a new vector
   */
  create(x: number, y: number, z: number): Vector3 {
    return { x, y, z };
  },

  /**
   * Return a zero vector
   */
  zero(): Vector3 {
    return { x: 0, y: 0, z: 0 };
  },

  fromTuple(tuple: Vector3Tuple): Vector3 {
    return { x: tuple[0], y: tuple[1], z: tuple[2] };
  },

  toTuple(v: Vector3): Vector3Tuple {
    return [v.x, v.y, v.z];
  },

  /**
   * Add two vectors
   */
  add(a: Vector3, b: Vector3): Vector3 {
    return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
  },

  /**
   * Subtract vector b from vector a
   */
  subtract(a: Vector3, b: Vector3): Vector3 {
    return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
  },

  /**
   * Scale a vector by a scalar
   */
  scale(v: Vector3, scalar: number): Vector3 {
    return { x: v.x * scalar, y: v.y * scalar, z: v.z * scalar };
  },

  /**
   * Calculate dot product of two vectors
   */
  dot(a: Vector3, b: Vector3): number {
    return a.x * b.x + a.y * b.y + a.z * b.z;
  },

  /**
   * Right-handed cross product a × b
   */
  cross(a: Vector3, b: Vector3): Vector3 {
    return {
      x: a.y * b.z - a.z * b.y,
      y: a.z * b.x - a.x * b.z,
      z: a.x * b.y - a.y * b.x,
    };
  },

  /**
   * Calculate squared length of a vector (faster than length, useful for comparisons)
   */
  lengthSquared(v: Vector3): number {
    return v.x * v.x + v.y * v.y + v.z * v.z;
  },

  /**
   * Calculate length (magnitude) of a vector
   */
  length(v: Vector3): number {
    return Math.sqrt(Vec3.lengthSquared(v));
  },

  /**
   * Normalize a vector to unit length
   * Returns zero vector if input is zero vector
   */
  normalize(v: Vector3): Vector3 {
    const len = Vec3.length(v);
    if (len === 0) return { x: 0, y: 0, z: 0 };
    return { x: v.x / len, y: v.y / len, z: v.z / len };
  },
};
