import type { Box, Point, Size } from "../types.js";

const EPS = 1e-9;

export function boxFromCenter(center: Point, width: number, height: number): Box {
  return {
    minX: center.x - width / 2,
    minY: center.y - height / 2,
    maxX: center.x + width / 2,
    maxY: center.y + height / 2,
  };
}

export function boxCenter(box: Box): Point {
  return {
    x: (box.minX + box.maxX) / 2,
    y: (box.minY + box.maxY) / 2,
  };
}

export function padBox(box: Box, padding: number): Box {
  return {
    minX: box.minX - padding,
    minY: box.minY - padding,
    maxX: box.maxX + padding,
    maxY: box.maxY + padding,
  };
}

// Touching edges count as intersecting.
export function boxesIntersect(a: Box, b: Box): boolean {
  return !(a.maxX < b.minX || a.minX > b.maxX || a.maxY < b.minY || a.minY > b.maxY);
}

export function overlapArea(a: Box, b: Box): number {
  const ox = Math.max(0, Math.min(a.maxX, b.maxX) - Math.max(a.minX, b.minX));
  const oy = Math.max(0, Math.min(a.maxY, b.maxY) - Math.max(a.minY, b.minY));
  return ox * oy;
}

export function rotatedExtent(size: Size, rotationDeg: number): Size {
  const rad = (rotationDeg * Math.PI) / 180;
  const cos = Math.abs(Math.cos(rad));
  const sin = Math.abs(Math.sin(rad));
  return {
    width: size.width * cos + size.height * sin,
    height: size.width * sin + size.height * cos,
  };
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

export function pointSegmentDistance(p: Point, a: Point, b: Point): number {
  const vx = b.x - a.x;
  const vy = b.y - a.y;
  const wx = p.x - a.x;
  const wy = p.y - a.y;
  const c1 = vx * wx + vy * wy;
  if (c1 <= 0) {
    return Math.hypot(wx, wy);
  }
  const c2 = vx * vx + vy * vy;
  if (c2 <= c1) {
    return Math.hypot(p.x - b.x, p.y - b.y);
  }
  const t = c1 / c2;
  return Math.hypot(p.x - (a.x + vx * t), p.y - (a.y + vy * t));
}

export function pointPolylineDistance(p: Point, points: readonly Point[]): number {
  if (points.length === 0) {
    return Number.POSITIVE_INFINITY;
  }
  if (points.length === 1) {
    return distance(p, points[0]);
  }
  let best = Number.POSITIVE_INFINITY;
  for (let i = 0; i < points.length - 1; i += 1) {
    best = Math.min(best, pointSegmentDistance(p, points[i], points[i + 1]));
  }
  return best;
}

export function pointBoxDistance(p: Point, box: Box): number {
  const dx = Math.max(box.minX - p.x, 0, p.x - box.maxX);
  const dy = Math.max(box.minY - p.y, 0, p.y - box.maxY);
  return Math.hypot(dx, dy);
}

export function segmentBox(a: Point, b: Point): Box {
  return {
    minX: Math.min(a.x, b.x),
    minY: Math.min(a.y, b.y),
    maxX: Math.max(a.x, b.x),
    maxY: Math.max(a.y, b.y),
  };
}

/**
 * Length of the part of segment a→b that lies inside `box` (Liang–Barsky).
 * Returns -1 when the segment misses the box entirely, so that a segment
 * grazing a corner (clipped length 0) still reads as a hit.
 */
export function clippedSegmentLength(a: Point, b: Point, box: Box): number {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  let t0 = 0;
  let t1 = 1;

  const edges: Array<[number, number]> = [
    [-dx, a.x - box.minX],
    [dx, box.maxX - a.x],
    [-dy, a.y - box.minY],
    [dy, box.maxY - a.y],
  ];

  for (const [p, q] of edges) {
    if (Math.abs(p) < EPS) {
      if (q < 0) {
        return -1;
      }
      continue;
    }
    const r = q / p;
    if (p < 0) {
      if (r > t1) {
        return -1;
      }
      t0 = Math.max(t0, r);
    } else {
      if (r < t0) {
        return -1;
      }
      t1 = Math.min(t1, r);
    }
  }

  return (t1 - t0) * Math.hypot(dx, dy);
}

export function unionBounds(boxes: Box[]): Box | null {
  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;

  for (const box of boxes) {
    minX = Math.min(minX, box.minX);
    minY = Math.min(minY, box.minY);
    maxX = Math.max(maxX, box.maxX);
    maxY = Math.max(maxY, box.maxY);
  }

  if (!Number.isFinite(minX) || !Number.isFinite(minY) || !Number.isFinite(maxX) || !Number.isFinite(maxY)) {
    return null;
  }

  return { minX, minY, maxX, maxY };
}
