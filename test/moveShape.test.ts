import { describe, expect, it } from "vitest";

import { EngineInvariantError } from "../src/engine/errors";
import { footprint, inBounds, shapeSize } from "../src/engine/moveShape";
import { C, mv } from "./helpers";

describe("move shapes", () => {
  it("computes footprints in table order", () => {
    expect(footprint(mv(1, 1, "single"))).toEqual([]);
    expect(footprint(mv(1, 1, "oneUp"))).toEqual([C(0, 1)]);
    expect(footprint(mv(1, 1, "twoDown"))).toEqual([C(2, 1), C(3, 1)]);
    expect(footprint(mv(1, 2, "twoLeft"))).toEqual([C(1, 1), C(1, 0)]);
    expect(footprint(mv(1, 1, "upAndDown"))).toEqual([C(0, 1), C(2, 1)]);
    expect(footprint(mv(1, 1, "leftAndRight"))).toEqual([C(1, 0), C(1, 2)]);
  });

  it("checks shape limits against the grid", () => {
    expect(inBounds(mv(1, 0, "twoUp"))).toBe(false);
    expect(inBounds(mv(2, 0, "twoUp"))).toBe(true);
    expect(inBounds(mv(1, 0, "twoDown"))).toBe(true);
    expect(inBounds(mv(2, 0, "twoDown"))).toBe(false);
    expect(inBounds(mv(0, 2, "twoRight"))).toBe(true);
    expect(inBounds(mv(0, 3, "twoRight"))).toBe(false);
    expect(inBounds(mv(0, 0, "leftAndRight"))).toBe(false);
    expect(inBounds(mv(0, 4, "leftAndRight"))).toBe(false);
    expect(inBounds(mv(3, 2, "upAndDown"))).toBe(false);
    expect(inBounds(mv(0, 0, "single"))).toBe(true);
  });

  it("refuses to compute a footprint that leaves the grid", () => {
    expect(() => footprint(mv(0, 0, "oneUp"))).toThrow(EngineInvariantError);
    expect(() => footprint(mv(0, 0, "oneUp"))).toThrow(/OFF_GRID @ footprint/);
  });

  it("reports shape sizes", () => {
    expect(shapeSize("single")).toBe(1);
    expect(shapeSize("oneLeft")).toBe(2);
    expect(shapeSize("upAndDown")).toBe(3);
  });
});
