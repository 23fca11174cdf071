import {
  BLADE_GRADES,
  DIMENSION,
  ENTITY_BLADES,
  SIGNATURE,
  doubleDualSign,
  gradeOf,
  isDegenerate,
} from "@/pga/basis";
import type { EntityKind } from "@/types";
import { describe, expect, it } from "vitest";

describe("basis", () => {
  it("should have three positive basis vectors and one degenerate", () => {
    expect(DIMENSION).toBe(4);
    expect(SIGNATURE).toEqual({ e1: 1, e2: 1, e3: 1, e4: 0 });
    expect(isDegenerate("e4")).toBe(true);
    expect(isDegenerate("e1")).toBe(false);
  });

  it("should store blades of one grade per entity kind", () => {
    for (const blades of Object.values(ENTITY_BLADES)) {
      const grades = blades.map((blade) => BLADE_GRADES[blade]);
      expect(new Set(grades).size).toBe(1);
    }
  });

  it.each<[EntityKind, number]>([
    ["direction", 1],
    ["origin", 1],
    ["point", 1],
    ["line-direction", 2],
    ["line-moment", 2],
    ["line", 2],
    ["plane-direction", 3],
    ["horizon", 3],
    ["plane", 3],
  ])("should put %s at grade %i", (kind, grade) => {
    expect(gradeOf(kind)).toBe(grade);
  });

  it("should flip odd grades under double dual", () => {
    expect(doubleDualSign("point")).toBe(-1);
    expect(doubleDualSign("line")).toBe(1);
    expect(doubleDualSign("plane")).toBe(-1);
  });

  it("should order line coordinates direction first", () => {
    expect(ENTITY_BLADES.line).toEqual(["e41", "e42", "e43", "e23", "e31", "e12"]);
  });
});
