import { describe, expect, it } from "vitest";
import { pathLabel, pointLabel } from "../../src/placement/elements.js";
import { resolveLayout } from "../../src/placement/index.js";
import { auditLayout, findOverlaps } from "../../src/quality/audit.js";
import type { AcceptedEntry, LayoutResult } from "../../src/types.js";

function placed(id: string, minX: number, maxX: number, group?: string): AcceptedEntry {
  return {
    id,
    kind: "pointLabel",
    status: "placed",
    x: (minX + maxX) / 2,
    y: 5,
    rotation: 0,
    box: { minX, minY: 0, maxX, maxY: 10 },
    rank: 0,
    group,
  };
}

describe("findOverlaps", () => {
  it("reports touching padded boxes with zero area", () => {
    expect(findOverlaps([placed("a", 0, 10), placed("b", 12, 20)], 1)).toEqual([{ a: "a", b: "b", area: 0 }]);
  });

  it("measures the padded overlap", () => {
    expect(findOverlaps([placed("a", 0, 10), placed("b", 12, 20)], 2)).toEqual([{ a: "a", b: "b", area: 28 }]);
  });

  it("skips pairs from the same group", () => {
    expect(findOverlaps([placed("a", 0, 10, "g"), placed("b", 5, 20, "g")], 0)).toEqual([]);
  });
});

describe("auditLayout", () => {
  it("scores a clean layout at 100", () => {
    const result = resolveLayout([
      pointLabel({ id: "a", priority: 1, anchor: { x: 0, y: 0 }, size: { width: 8, height: 4 } }),
      pointLabel({ id: "b", priority: 1, anchor: { x: 100, y: 0 }, size: { width: 8, height: 4 } }),
    ]);
    const audit = auditLayout(result);
    expect(audit.overlaps).toEqual([]);
    expect(audit.penalty).toBe(0);
    expect(audit.score).toBe(100);
    expect(audit.metrics.acceptedCount).toBe(2);
    expect(audit.metrics.anchorDistanceCount).toBe(0);
  });

  it("finds no overlaps among placed labels at the padding they were placed with", () => {
    const elements = [0, 6, 12, 18, 24].map((x, index) =>
      pointLabel({ id: `l${index}`, priority: index, anchor: { x, y: 0 }, size: { width: 10, height: 4 } }),
    );
    const result = resolveLayout(elements, { config: { fallback: { pointLabel: "suppress" } } });
    expect(result.diagnostics.placedCount).toBeGreaterThan(0);
    expect(auditLayout(result, { padding: 2 }).overlaps).toEqual([]);
  });

  it("measures how far labels sit from their anchors", () => {
    const label = pointLabel({ id: "a", priority: 1, anchor: { x: 0, y: 0 }, size: { width: 8, height: 4 } });
    const river = pathLabel({
      id: "r",
      priority: 2,
      anchor: [
        { x: 100, y: 0 },
        { x: 140, y: 0 },
      ],
      size: { width: 10, height: 4 },
      clearance: 3,
    });
    const audit = auditLayout(resolveLayout([label, river]), { elements: [label, river] });
    expect(audit.metrics.anchorDistanceCount).toBe(2);
    expect(audit.metrics.anchorDistanceMax).toBeCloseTo(6, 9);
    expect(audit.metrics.anchorDistanceMean).toBeCloseTo(5.5, 9);
  });

  it("counts suppressed and forced entries in the penalty", () => {
    const result: LayoutResult = {
      entries: [
        { ...placed("a", 0, 10), status: "forced", overlapArea: 0, overlapsWith: [] },
        { id: "b", kind: "pathLabel", status: "suppressed", reason: "no-free-candidate" },
      ],
      diagnostics: {
        placedCount: 0,
        forcedCount: 1,
        suppressedCount: 1,
        forcedIds: ["a"],
        suppressedIds: ["b"],
        warnings: [],
      },
    };
    const audit = auditLayout(result);
    expect(audit.metrics.forcedCount).toBe(1);
    expect(audit.metrics.suppressedCount).toBe(1);
    expect(audit.penalty).toBe(760);
  });
});
