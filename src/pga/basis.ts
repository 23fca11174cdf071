/**
 * Basis - signature and blade naming of the 3D projective algebra
 *
 * Basis vectors e1, e2, e3 square to +1, e4 squares to 0 (the degenerate
 * direction carrying the homogeneous weight). Blades follow the
 * right-handed, y-up convention:
 *
 * - grade 1: e1 e2 e3 e4        (points, directions)
 * - grade 2: e41 e42 e43        (line direction)
 *            e23 e31 e12        (line moment)
 * - grade 3: e423 e431 e412     (plane normal)
 *            e321               (plane horizon)
 * - grade 4: e1234              (antiscalar)
 */

import type { EntityKind } from "@/types";

export type BasisVector = "e1" | "e2" | "e3" | "e4";

export type Blade =
  | "1"
  | BasisVector
  | "e41"
  | "e42"
  | "e43"
  | "e23"
  | "e31"
  | "e12"
  | "e423"
  | "e431"
  | "e412"
  | "e321"
  | "e1234";

/** Dimension of the underlying vector space */
export const DIMENSION = 4;

/** Square of each basis vector */
export const SIGNATURE: Readonly<Record<BasisVector, number>> = {
  e1: 1,
  e2: 1,
  e3: 1,
  e4: 0,
};

export const BLADE_GRADES: Readonly<Record<Blade, number>> = {
  "1": 0,
  e1: 1,
  e2: 1,
  e3: 1,
  e4: 1,
  e41: 2,
  e42: 2,
  e43: 2,
  e23: 2,
  e31: 2,
  e12: 2,
  e423: 3,
  e431: 3,
  e412: 3,
  e321: 3,
  e1234: 4,
};

/** Blades stored by each entity kind, in coordinate order */
export const ENTITY_BLADES: { readonly [K in EntityKind]: readonly Blade[] } = {
  direction: ["e1", "e2", "e3"],
  origin: ["e4"],
  point: ["e1", "e2", "e3", "e4"],
  "line-direction": ["e41", "e42", "e43"],
  "line-moment": ["e23", "e31", "e12"],
  line: ["e41", "e42", "e43", "e23", "e31", "e12"],
  "plane-direction": ["e423", "e431", "e412"],
  horizon: ["e321"],
  plane: ["e423", "e431", "e412", "e321"],
};

export function isDegenerate(vector: BasisVector): boolean {
  return SIGNATURE[vector] === 0;
}

/**
 * Grade shared by every blade an entity kind stores.
 */
export function gradeOf(kind: EntityKind): number {
  return BLADE_GRADES[ENTITY_BLADES[kind][0] ?? "1"];
}

/**
 * Sign s with dual(dual(x)) = s·x, i.e. (-1)^(g·(n-g)).
 * Grades 1 and 3 flip, grade 2 is preserved.
 */
export function doubleDualSign(kind: EntityKind): 1 | -1 {
  const grade = gradeOf(kind);
  return (grade * (DIMENSION - grade)) % 2 === 0 ? 1 : -1;
}
