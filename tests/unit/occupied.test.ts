import { describe, expect, it } from "vitest";
import { OccupiedSpace } from "../../src/placement/occupied.js";

const SQUARE = { minX: 0, minY: 0, maxX: 10, maxY: 10 };

describe("OccupiedSpace", () => {
  it("counts touching boxes as collisions", () => {
    const space = new OccupiedSpace(0);
    space.addBox("a", SQUARE);
    expect(space.collides({ minX: 10, minY: 0, maxX: 20, maxY: 10 })).toBe(true);
    expect(space.collides({ minX: 10.5, minY: 0, maxX: 20, maxY: 10 })).toBe(false);
  });

  it("keeps the padding margin on both sides", () => {
    const space = new OccupiedSpace(1);
    space.addBox("a", SQUARE);
    expect(space.collides({ minX: 11.5, minY: 0, maxX: 20, maxY: 10 })).toBe(true);
    expect(space.collides({ minX: 12.5, minY: 0, maxX: 20, maxY: 10 })).toBe(false);
  });

  it("ignores boxes of the same group", () => {
    const space = new OccupiedSpace(0);
    space.addBox("dot", SQUARE, "city_a");
    expect(space.collides({ minX: 5, minY: 5, maxX: 15, maxY: 15 }, "city_a")).toBe(false);
    expect(space.collides({ minX: 5, minY: 5, maxX: 15, maxY: 15 }, "city_b")).toBe(true);
    expect(space.collides({ minX: 5, minY: 5, maxX: 15, maxY: 15 })).toBe(true);
  });

  it("reports overlap area per conflicting owner", () => {
    const space = new OccupiedSpace(0);
    space.addBox("a", SQUARE);
    space.addBox("b", { minX: 100, minY: 100, maxX: 110, maxY: 110 });
    expect(space.conflicts({ minX: 5, minY: 5, maxX: 15, maxY: 15 })).toEqual([{ ownerId: "a", cost: 25, overlap: 25 }]);
  });

  it("ranks on padded boxes but reports the unpadded overlap", () => {
    const space = new OccupiedSpace(1);
    space.addBox("a", SQUARE);
    expect(space.conflicts({ minX: 5, minY: 5, maxX: 15, maxY: 15 })).toEqual([{ ownerId: "a", cost: 49, overlap: 25 }]);
  });

  it("reports no stroke overlap when only the padding reaches the path", () => {
    const space = new OccupiedSpace(2);
    space.addPath(
      "road",
      [
        { x: 0, y: 0 },
        { x: 100, y: 0 },
      ],
      2,
    );
    const [conflict] = space.conflicts({ minX: 40, minY: 3, maxX: 50, maxY: 8 });
    expect(conflict.ownerId).toBe("road");
    expect(conflict.cost).toBeCloseTo(40, 9);
    expect(conflict.overlap).toBe(0);
  });

  it("tests path obstacles against the stroke, not the segment bounds", () => {
    const space = new OccupiedSpace(0);
    space.addPath(
      "coast",
      [
        { x: 0, y: 0 },
        { x: 100, y: 0 },
      ],
      4,
    );
    expect(space.collides({ minX: 40, minY: 3, maxX: 50, maxY: 8 })).toBe(false);
    expect(space.collides({ minX: 40, minY: 1, maxX: 50, maxY: 8 })).toBe(true);
    const [conflict] = space.conflicts({ minX: 40, minY: 1, maxX: 50, maxY: 8 });
    expect(conflict.ownerId).toBe("coast");
    expect(conflict.cost).toBeCloseTo(56, 9);
    expect(conflict.overlap).toBeCloseTo(56, 9);
  });

  it("misses a diagonal stroke whose bounds cover the box", () => {
    const space = new OccupiedSpace(0);
    space.addPath(
      "road",
      [
        { x: 0, y: 0 },
        { x: 100, y: 100 },
      ],
      2,
    );
    expect(space.collides({ minX: 70, minY: 10, maxX: 80, maxY: 20 })).toBe(false);
    expect(space.collides({ minX: 45, minY: 45, maxX: 55, maxY: 55 })).toBe(true);
  });

  it("stores one item per path segment", () => {
    const space = new OccupiedSpace(0);
    space.addBox("a", SQUARE);
    space.addPath(
      "river",
      [
        { x: 0, y: 0 },
        { x: 10, y: 0 },
        { x: 10, y: 10 },
      ],
      1,
    );
    expect(space.size).toBe(3);
    expect(space.all()).toHaveLength(3);
  });
});
