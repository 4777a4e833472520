import { describe, expect, it } from "vitest";
import {
  compassOffset,
  fixedPathCandidate,
  fixedPointCandidate,
  nearestDirection,
  pathCandidates,
  pointCandidates,
  rankSegments,
  uprightBearing,
} from "../../src/placement/anchor.js";
import { IMHOF_ORDER } from "../../src/placement/defaults.js";

const LABEL = { width: 8, height: 4 };

// Segment lengths 50, 30, 80.
const THREE_LEGS = [
  { x: 0, y: 0 },
  { x: 50, y: 0 },
  { x: 50, y: 30 },
  { x: 130, y: 30 },
];

describe("compass offsets", () => {
  it("keeps diagonals at the full radius", () => {
    const offset = compassOffset("NE", 10);
    expect(offset.x).toBeCloseTo(7.0711, 4);
    expect(offset.y).toBeCloseTo(-7.0711, 4);
    expect(Math.hypot(offset.x, offset.y)).toBeCloseTo(10, 9);
  });

  it("maps screen offsets to the nearest direction", () => {
    expect(nearestDirection(5, 0)).toBe("E");
    expect(nearestDirection(0, -5)).toBe("N");
    expect(nearestDirection(-3, 3)).toBe("SW");
    expect(nearestDirection(4, -3)).toBe("NE");
    expect(nearestDirection(0, 0)).toBeUndefined();
  });
});

describe("pointCandidates", () => {
  it("follows the Imhof order", () => {
    const candidates = pointCandidates({ x: 0, y: 0 }, LABEL, { radius: 6, tiers: [1], alignment: "outward" });
    expect(candidates.map((candidate) => candidate.direction)).toEqual(IMHOF_ORDER);
    expect(candidates.map((candidate) => candidate.rank)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
  });

  it("pushes an outward box away from the anchor", () => {
    const [, east] = pointCandidates({ x: 0, y: 0 }, LABEL, { radius: 6, tiers: [1], alignment: "outward" });
    expect(east.box).toEqual({ minX: 6, minY: -2, maxX: 14, maxY: 2 });
    expect(east.center).toEqual({ x: 10, y: 0 });
  });

  it("centers a marker box on the offset point", () => {
    const [, east] = pointCandidates({ x: 0, y: 0 }, LABEL, { radius: 6, tiers: [1], alignment: "centered" });
    expect(east.box).toEqual({ minX: 2, minY: -2, maxX: 10, maxY: 2 });
  });

  it("repeats the compass order for each clearance tier", () => {
    const candidates = pointCandidates({ x: 0, y: 0 }, LABEL, { radius: 5, tiers: [1, 2], alignment: "centered" });
    expect(candidates).toHaveLength(16);
    expect(candidates[8].direction).toBe("NE");
    expect(candidates[9].center).toEqual({ x: 10, y: 0 });
    expect(candidates[15].rank).toBe(15);
  });

  it("skips excluded directions without leaving rank gaps", () => {
    const candidates = pointCandidates({ x: 0, y: 0 }, LABEL, {
      radius: 6,
      tiers: [1],
      alignment: "centered",
      exclude: new Set(["NE"] as const),
    });
    expect(candidates).toHaveLength(7);
    expect(candidates[0].direction).toBe("E");
    expect(candidates[0].rank).toBe(0);
  });

  it("uses the rotated extent for the box", () => {
    const [north] = pointCandidates({ x: 0, y: 0 }, LABEL, { radius: 0, tiers: [1], alignment: "centered", rotation: 90 });
    expect(north.rotation).toBe(90);
    expect(north.box.maxX - north.box.minX).toBeCloseTo(4, 9);
    expect(north.box.maxY - north.box.minY).toBeCloseTo(8, 9);
  });
});

describe("fixedPointCandidate", () => {
  it("places at the exact offset and reports the nearest direction", () => {
    const candidate = fixedPointCandidate({ x: 100, y: 100 }, LABEL, 10, 0, "outward");
    expect(candidate.direction).toBe("E");
    expect(candidate.box).toEqual({ minX: 110, minY: 98, maxX: 118, maxY: 102 });
    expect(candidate.rank).toBe(0);
  });
});

describe("path anchors", () => {
  it("keeps bearings upright", () => {
    expect(uprightBearing({ x: 0, y: 0 }, { x: 10, y: 0 })).toBe(0);
    expect(uprightBearing({ x: 0, y: 0 }, { x: -10, y: 0 })).toBeCloseTo(0, 9);
    expect(uprightBearing({ x: 0, y: 0 }, { x: 10, y: 10 })).toBeCloseTo(45, 9);
    expect(uprightBearing({ x: 0, y: 0 }, { x: -10, y: 10 })).toBeCloseTo(-45, 9);
    expect(uprightBearing({ x: 10, y: 10 }, { x: 0, y: 0 })).toBeCloseTo(45, 9);
  });

  it("ranks segments by descending length", () => {
    expect(rankSegments(THREE_LEGS).map((segment) => segment.index)).toEqual([2, 0, 1]);
  });

  it("breaks length ties by segment index", () => {
    const square = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 },
    ];
    expect(rankSegments(square).map((segment) => segment.index)).toEqual([0, 1, 2]);
  });

  it("skips zero-length segments", () => {
    const points = [
      { x: 0, y: 0 },
      { x: 0, y: 0 },
      { x: 10, y: 0 },
    ];
    expect(rankSegments(points).map((segment) => segment.index)).toEqual([1]);
  });

  it("centers labels on segment midpoints in rank order", () => {
    const candidates = pathCandidates(THREE_LEGS, { width: 10, height: 4 }, { clearance: 0 });
    expect(candidates.map((candidate) => candidate.segmentIndex)).toEqual([2, 0, 1]);
    expect(candidates[0].center).toEqual({ x: 90, y: 30 });
    expect(candidates[0].rotation).toBe(0);
    expect(candidates[0].box).toEqual({ minX: 85, minY: 28, maxX: 95, maxY: 32 });
  });

  it("lifts a label off the line by its clearance", () => {
    const [candidate] = pathCandidates(
      [
        { x: 0, y: 0 },
        { x: 20, y: 0 },
      ],
      { width: 10, height: 4 },
      { clearance: 5 },
    );
    expect(candidate.center).toEqual({ x: 10, y: -7 });
    expect(candidate.box).toEqual({ minX: 5, minY: -9, maxX: 15, maxY: -5 });
  });

  it("lifts a below-side label under the line", () => {
    const [candidate] = pathCandidates(
      [
        { x: 0, y: 0 },
        { x: 20, y: 0 },
      ],
      { width: 10, height: 4 },
      { clearance: 5, side: "below" },
    );
    expect(candidate.center).toEqual({ x: 10, y: 7 });
    expect(candidate.box).toEqual({ minX: 5, minY: 5, maxX: 15, maxY: 9 });
  });

  it("offsets a fixed path label from the longest segment", () => {
    const candidate = fixedPathCandidate(THREE_LEGS, { width: 10, height: 4 }, 0, 3, { clearance: 0 });
    expect(candidate?.segmentIndex).toBe(2);
    expect(candidate?.center).toEqual({ x: 90, y: 33 });
  });

  it("applies the side lift before a fixed offset", () => {
    const candidate = fixedPathCandidate(THREE_LEGS, { width: 10, height: 4 }, 0, 3, { clearance: 5, side: "below" });
    expect(candidate?.center).toEqual({ x: 90, y: 40 });
    expect(candidate?.box).toEqual({ minX: 85, minY: 38, maxX: 95, maxY: 42 });
  });

  it("has nothing to offer on a degenerate path", () => {
    const points = [
      { x: 5, y: 5 },
      { x: 5, y: 5 },
    ];
    expect(pathCandidates(points, LABEL, { clearance: 0 })).toEqual([]);
    expect(fixedPathCandidate(points, LABEL, 1, 1, { clearance: 0 })).toBeUndefined();
  });
});
