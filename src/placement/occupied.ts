import RBush from "rbush";
import type { Box, Point } from "../types.js";
import { boxesIntersect, clippedSegmentLength, overlapArea, padBox, segmentBox } from "./geometry.js";

interface StrokeSegment {
  start: Point;
  end: Point;
  halfWidth: number;
  width: number;
}

export interface OccupiedItem extends Box {
  ownerId: string;
  group?: string;
  segment?: StrokeSegment;
}

export interface Conflict {
  ownerId: string;
  // Ranking cost, measured on the padded boxes.
  cost: number;
  // Area the unpadded boxes or the bare stroke actually share.
  overlap: number;
}

function sameGroup(a: string | undefined, b: string | undefined): boolean {
  return a !== undefined && a === b;
}

/**
 * Boxes committed during one resolution pass, indexed by an R-tree.
 * Every stored box is already grown by the padding margin, so a query only
 * has to pad the candidate side.
 */
export class OccupiedSpace {
  private readonly tree = new RBush<OccupiedItem>();
  private count = 0;

  constructor(private readonly padding: number) {}

  get size(): number {
    return this.count;
  }

  addBox(ownerId: string, box: Box, group?: string): void {
    this.tree.insert({ ...padBox(box, this.padding), ownerId, group });
    this.count += 1;
  }

  addPath(ownerId: string, points: readonly Point[], width: number, group?: string): void {
    const halfWidth = width / 2;
    const items: OccupiedItem[] = [];
    for (let i = 0; i < points.length - 1; i += 1) {
      const start = points[i];
      const end = points[i + 1];
      items.push({
        ...padBox(segmentBox(start, end), halfWidth + this.padding),
        ownerId,
        group,
        segment: { start, end, halfWidth, width },
      });
    }
    this.tree.load(items);
    this.count += items.length;
  }

  collides(box: Box, group?: string): boolean {
    const query = padBox(box, this.padding);
    return this.tree.search(query).some((item) => !sameGroup(item.group, group) && this.hits(item, box, query));
  }

  conflicts(box: Box, group?: string): Conflict[] {
    const query = padBox(box, this.padding);
    const out: Conflict[] = [];
    for (const item of this.tree.search(query)) {
      if (sameGroup(item.group, group) || !this.hits(item, box, query)) {
        continue;
      }
      out.push({ ownerId: item.ownerId, cost: this.cost(item, box, query), overlap: this.overlap(item, box) });
    }
    return out;
  }

  all(): OccupiedItem[] {
    return this.tree.all();
  }

  private strokeQuery(box: Box, segment: StrokeSegment): Box {
    return padBox(box, this.padding * 2 + segment.halfWidth);
  }

  private hits(item: OccupiedItem, box: Box, query: Box): boolean {
    if (!item.segment) {
      return boxesIntersect(item, query);
    }
    return clippedSegmentLength(item.segment.start, item.segment.end, this.strokeQuery(box, item.segment)) >= 0;
  }

  private cost(item: OccupiedItem, box: Box, query: Box): number {
    if (!item.segment) {
      return overlapArea(item, query);
    }
    const clipped = clippedSegmentLength(item.segment.start, item.segment.end, this.strokeQuery(box, item.segment));
    return Math.max(0, clipped) * item.segment.width;
  }

  private overlap(item: OccupiedItem, box: Box): number {
    if (!item.segment) {
      return overlapArea(padBox(item, -this.padding), box);
    }
    const clipped = clippedSegmentLength(item.segment.start, item.segment.end, padBox(box, item.segment.halfWidth));
    return Math.max(0, clipped) * item.segment.width;
  }
}
