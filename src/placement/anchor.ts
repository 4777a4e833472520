import type { Box, Candidate, CandidateAlignment, CompassDirection, PathSide, Point, Size } from "../types.js";
import { IMHOF_ORDER } from "./defaults.js";
import { boxCenter, boxFromCenter, distance, rotatedExtent } from "./geometry.js";

const COMPASS_VECTORS: Record<CompassDirection, Point> = {
  NE: { x: 1, y: -1 },
  E: { x: 1, y: 0 },
  NW: { x: -1, y: -1 },
  W: { x: -1, y: 0 },
  SE: { x: 1, y: 1 },
  SW: { x: -1, y: 1 },
  N: { x: 0, y: -1 },
  S: { x: 0, y: 1 },
};

// Counter-clockwise from east, 45° apart, in y-up terms.
const SECTOR_DIRECTIONS: readonly CompassDirection[] = ["E", "NE", "N", "NW", "W", "SW", "S", "SE"];

const MIN_SEGMENT_LENGTH = 1e-9;

export interface PointCandidateOptions {
  radius: number;
  tiers: number[];
  alignment: CandidateAlignment;
  rotation?: number;
  exclude?: ReadonlySet<CompassDirection>;
}

export interface PathCandidateOptions {
  clearance: number;
  side?: PathSide;
  rotation?: number;
}

export interface RankedSegment {
  index: number;
  start: Point;
  end: Point;
  length: number;
}

export function compassOffset(direction: CompassDirection, radius: number): Point {
  const vector = COMPASS_VECTORS[direction];
  const norm = Math.hypot(vector.x, vector.y);
  return {
    x: (vector.x / norm) * radius,
    y: (vector.y / norm) * radius,
  };
}

export function nearestDirection(dx: number, dy: number): CompassDirection | undefined {
  if (dx === 0 && dy === 0) {
    return undefined;
  }
  const angle = Math.atan2(-dy, dx);
  const sector = ((Math.round(angle / (Math.PI / 4)) % 8) + 8) % 8;
  return SECTOR_DIRECTIONS[sector];
}

function alignedBox(offsetPoint: Point, direction: CompassDirection | undefined, extent: Size, alignment: CandidateAlignment): Box {
  if (alignment === "centered" || !direction) {
    return boxFromCenter(offsetPoint, extent.width, extent.height);
  }
  const vector = COMPASS_VECTORS[direction];
  return boxFromCenter(
    {
      x: offsetPoint.x + (vector.x * extent.width) / 2,
      y: offsetPoint.y + (vector.y * extent.height) / 2,
    },
    extent.width,
    extent.height,
  );
}

export function pointCandidates(anchor: Point, size: Size, options: PointCandidateOptions): Candidate[] {
  const rotation = options.rotation ?? 0;
  const extent = rotatedExtent(size, rotation);
  const out: Candidate[] = [];

  for (const tier of options.tiers) {
    const radius = options.radius * tier;
    for (const direction of IMHOF_ORDER) {
      if (options.exclude?.has(direction)) {
        continue;
      }
      const offset = compassOffset(direction, radius);
      const box = alignedBox({ x: anchor.x + offset.x, y: anchor.y + offset.y }, direction, extent, options.alignment);
      out.push({
        center: boxCenter(box),
        rotation,
        box,
        rank: out.length,
        direction,
      });
    }
  }

  return out;
}

export function fixedPointCandidate(
  anchor: Point,
  size: Size,
  dx: number,
  dy: number,
  alignment: CandidateAlignment,
  rotation = 0,
): Candidate {
  const extent = rotatedExtent(size, rotation);
  const direction = nearestDirection(dx, dy);
  const box = alignedBox({ x: anchor.x + dx, y: anchor.y + dy }, direction, extent, alignment);
  return {
    center: boxCenter(box),
    rotation,
    box,
    rank: 0,
    direction,
  };
}

export function uprightBearing(start: Point, end: Point): number {
  let angle = (Math.atan2(end.y - start.y, end.x - start.x) * 180) / Math.PI;
  if (angle > 90) {
    angle -= 180;
  } else if (angle <= -90) {
    angle += 180;
  }
  return angle;
}

export function rankSegments(points: readonly Point[]): RankedSegment[] {
  const segments: RankedSegment[] = [];
  for (let i = 0; i < points.length - 1; i += 1) {
    const length = distance(points[i], points[i + 1]);
    if (length < MIN_SEGMENT_LENGTH) {
      continue;
    }
    segments.push({ index: i, start: points[i], end: points[i + 1], length });
  }
  return segments.sort((a, b) => b.length - a.length || a.index - b.index);
}

// Midpoint moved off the line along the upright normal; "below" takes the negated normal.
function labelPosition(segment: RankedSegment, size: Size, options: PathCandidateOptions): Point {
  const rad = (uprightBearing(segment.start, segment.end) * Math.PI) / 180;
  const distance = options.clearance > 0 ? options.clearance + size.height / 2 : 0;
  const lift = options.side === "below" ? -distance : distance;
  return {
    x: (segment.start.x + segment.end.x) / 2 + Math.sin(rad) * lift,
    y: (segment.start.y + segment.end.y) / 2 - Math.cos(rad) * lift,
  };
}

function segmentCandidate(segment: RankedSegment, size: Size, rank: number, options: PathCandidateOptions): Candidate {
  const rotation = options.rotation ?? uprightBearing(segment.start, segment.end);
  const center = labelPosition(segment, size, options);
  const extent = rotatedExtent(size, rotation);
  return {
    center,
    rotation,
    box: boxFromCenter(center, extent.width, extent.height),
    rank,
    segmentIndex: segment.index,
  };
}

export function pathCandidates(points: readonly Point[], size: Size, options: PathCandidateOptions): Candidate[] {
  return rankSegments(points).map((segment, rank) => segmentCandidate(segment, size, rank, options));
}

export function fixedPathCandidate(
  points: readonly Point[],
  size: Size,
  dx: number,
  dy: number,
  options: PathCandidateOptions,
): Candidate | undefined {
  const longest = rankSegments(points)[0];
  if (!longest) {
    return undefined;
  }
  const position = labelPosition(longest, size, options);
  const center = { x: position.x + dx, y: position.y + dy };
  const angle = options.rotation ?? uprightBearing(longest.start, longest.end);
  const extent = rotatedExtent(size, angle);
  return {
    center,
    rotation: angle,
    box: boxFromCenter(center, extent.width, extent.height),
    rank: 0,
    segmentIndex: longest.index,
  };
}
