import type { Entity } from "@/types";
import { ENTITY_BLADES } from "./basis";

/**
 * Flat coordinate list of an entity, in the blade order of ENTITY_BLADES
 */
export function coordinates(entity: Entity): readonly number[] {
  switch (entity.kind) {
    case "direction":
    case "line-direction":
    case "line-moment":
    case "plane-direction":
      return [entity.x, entity.y, entity.z];
    case "origin":
    case "horizon":
      return [entity.w];
    case "point":
      return [...coordinates(entity.direction), entity.origin.w];
    case "line":
      return [...coordinates(entity.direction), ...coordinates(entity.moment)];
    case "plane":
      return [...coordinates(entity.direction), entity.horizon.w];
  }
}

export function normSquared(entity: Entity): number {
  return coordinates(entity).reduce((sum, value) => sum + value * value, 0);
}

/**
 * Render an entity as a blade sum, e.g. "2e1 + 3e2 + 1e4".
 * Zero coordinates are skipped; the zero element renders as "0".
 */
export function format(entity: Entity): string {
  const blades = ENTITY_BLADES[entity.kind];
  const terms: string[] = [];

  coordinates(entity).forEach((value, index) => {
    if (value === 0) return;
    const term = `${Math.abs(value)}${blades[index]}`;
    if (terms.length === 0) {
      terms.push(value < 0 ? `-${term}` : term);
    } else {
      terms.push(value < 0 ? `- ${term}` : `+ ${term}`);
    }
  });

  return terms.length === 0 ? "0" : terms.join(" ");
}
