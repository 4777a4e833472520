import type { AcceptedEntry, Box, LayoutResult, PlacementElement } from "../types.js";
import { DEFAULT_PLACEMENT_CONFIG } from "../placement/defaults.js";
import { boxCenter, boxesIntersect, overlapArea, padBox, pointBoxDistance, pointPolylineDistance, unionBounds } from "../placement/geometry.js";
import { isAccepted } from "../placement/index.js";

export interface OverlapPair {
  a: string;
  b: string;
  area: number;
}

export interface AuditMetrics {
  acceptedCount: number;
  forcedCount: number;
  suppressedCount: number;
  overlapPairCount: number;
  overlapArea: number;
  rankMean: number;
  rankMax: number;
  anchorDistanceCount: number;
  anchorDistanceMean: number;
  anchorDistanceMax: number;
}

export interface LayoutAudit {
  penalty: number;
  score: number;
  metrics: AuditMetrics;
  overlaps: OverlapPair[];
  bounds: Box | null;
}

export interface AuditOptions {
  padding?: number;
  elements?: readonly PlacementElement[];
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function sameGroup(a: AcceptedEntry, b: AcceptedEntry): boolean {
  return a.group !== undefined && a.group === b.group;
}

function anchorDistance(entry: AcceptedEntry, element: PlacementElement): number {
  if (element.kind === "pathLabel") {
    return pointPolylineDistance(boxCenter(entry.box), element.anchor);
  }
  return pointBoxDistance(element.anchor, entry.box);
}

export function findOverlaps(entries: readonly AcceptedEntry[], padding: number): OverlapPair[] {
  const padded = entries.map((entry) => padBox(entry.box, padding));
  const out: OverlapPair[] = [];
  for (let i = 0; i < entries.length; i += 1) {
    for (let j = i + 1; j < entries.length; j += 1) {
      if (sameGroup(entries[i], entries[j]) || !boxesIntersect(padded[i], padded[j])) {
        continue;
      }
      out.push({ a: entries[i].id, b: entries[j].id, area: overlapArea(padded[i], padded[j]) });
    }
  }
  return out;
}

export function auditLayout(result: LayoutResult, options: AuditOptions = {}): LayoutAudit {
  const padding = options.padding ?? DEFAULT_PLACEMENT_CONFIG.padding;
  const accepted = result.entries.filter(isAccepted);
  const overlaps = findOverlaps(accepted, padding);

  let rankSum = 0;
  let rankMax = 0;
  for (const entry of accepted) {
    rankSum += entry.rank;
    rankMax = Math.max(rankMax, entry.rank);
  }

  const elementById = new Map((options.elements ?? []).map((element) => [element.id, element]));
  let distanceSum = 0;
  let distanceMax = 0;
  let distanceCount = 0;
  for (const entry of accepted) {
    const element = elementById.get(entry.id);
    if (!element) {
      continue;
    }
    const d = anchorDistance(entry, element);
    distanceSum += d;
    distanceMax = Math.max(distanceMax, d);
    distanceCount += 1;
  }

  const metrics: AuditMetrics = {
    acceptedCount: accepted.length,
    forcedCount: accepted.filter((entry) => entry.status === "forced").length,
    suppressedCount: result.entries.length - accepted.length,
    overlapPairCount: overlaps.length,
    overlapArea: overlaps.reduce((sum, pair) => sum + pair.area, 0),
    rankMean: accepted.length > 0 ? rankSum / accepted.length : 0,
    rankMax,
    anchorDistanceCount: distanceCount,
    anchorDistanceMean: distanceCount > 0 ? distanceSum / distanceCount : 0,
    anchorDistanceMax: distanceMax,
  };

  const penalty =
    metrics.overlapPairCount * 560 +
    metrics.overlapArea * 8.8 +
    metrics.forcedCount * 300 +
    metrics.suppressedCount * 460 +
    metrics.rankMean * 20 +
    Math.max(0, metrics.anchorDistanceMean - 20) * 12;

  const score = clamp(100 - Math.log10(1 + penalty) * 18, 0, 100);
  return {
    penalty,
    score,
    metrics,
    overlaps,
    bounds: unionBounds(accepted.map((entry) => entry.box)),
  };
}
