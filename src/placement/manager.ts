import type {
  Candidate,
  CompassDirection,
  LayoutDiagnostics,
  LayoutEntry,
  LayoutResult,
  Obstacle,
  PlacementConfig,
  PlacementElement,
} from "../types.js";
import { generateCandidates } from "./candidates.js";
import { OccupiedSpace } from "./occupied.js";

const NOTHING_TAKEN: ReadonlySet<CompassDirection> = new Set();

interface PassState {
  space: OccupiedSpace;
  resolved: Map<string, LayoutEntry>;
  declaredIds: Set<string>;
  warnings: string[];
}

interface ForcedChoice {
  candidate: Candidate;
  cost: number;
  overlap: number;
  overlapsWith: string[];
}

export function placementOrder(elements: readonly PlacementElement[]): number[] {
  return elements
    .map((element, index) => ({ priority: element.priority, index }))
    .sort((a, b) => a.priority - b.priority || a.index - b.index)
    .map((item) => item.index);
}

export function summarizeEntries(entries: readonly LayoutEntry[], warnings: string[] = []): LayoutDiagnostics {
  const forcedIds: string[] = [];
  const suppressedIds: string[] = [];
  let placedCount = 0;

  for (const entry of entries) {
    if (entry.status === "placed") {
      placedCount += 1;
    } else if (entry.status === "forced") {
      forcedIds.push(entry.id);
    } else {
      suppressedIds.push(entry.id);
    }
  }

  return {
    placedCount,
    forcedCount: forcedIds.length,
    suppressedCount: suppressedIds.length,
    forcedIds,
    suppressedIds,
    warnings,
  };
}

/**
 * Greedy, priority-ordered placement over one element set.
 *
 * Holds configuration and fixed obstacles only; every call to `resolve` gets
 * its own occupied-space set, so a single manager can run independent passes.
 * Once an element is accepted its box stays put for the rest of the pass.
 */
export class PlacementManager {
  constructor(
    private readonly config: PlacementConfig,
    private readonly obstacles: readonly Obstacle[] = [],
  ) {}

  resolve(elements: readonly PlacementElement[]): LayoutResult {
    const state: PassState = {
      space: this.seedSpace(),
      resolved: new Map(),
      declaredIds: new Set(elements.map((element) => element.id)),
      warnings: [],
    };
    const entries: LayoutEntry[] = [];

    for (const index of placementOrder(elements)) {
      const element = elements[index];
      const candidates = generateCandidates(element, this.config, this.takenDirections(element, state));
      const entry = this.place(element, candidates, state.space);
      state.resolved.set(element.id, entry);
      entries[index] = entry;
    }

    return {
      entries,
      diagnostics: summarizeEntries(entries, state.warnings),
    };
  }

  private seedSpace(): OccupiedSpace {
    const space = new OccupiedSpace(this.config.padding);
    for (const obstacle of this.obstacles) {
      if (obstacle.type === "box") {
        space.addBox(obstacle.id, obstacle.box, obstacle.group);
      } else {
        space.addPath(obstacle.id, obstacle.points, obstacle.width, obstacle.group);
      }
    }
    return space;
  }

  private takenDirections(element: PlacementElement, state: PassState): ReadonlySet<CompassDirection> {
    if (element.kind !== "arrowEndpoint" || !this.config.excludeLabelDirections) {
      return NOTHING_TAKEN;
    }

    const label = state.resolved.get(element.labelId);
    if (!label) {
      state.warnings.push(
        state.declaredIds.has(element.labelId)
          ? `arrow endpoint ${element.id} was placed before its label ${element.labelId}; label direction not excluded`
          : `arrow endpoint ${element.id} refers to unknown label ${element.labelId}`,
      );
      return NOTHING_TAKEN;
    }

    if (label.status === "suppressed" || !label.direction) {
      return NOTHING_TAKEN;
    }
    return new Set([label.direction]);
  }

  private place(element: PlacementElement, candidates: Candidate[], space: OccupiedSpace): LayoutEntry {
    if (candidates.length === 0) {
      return { id: element.id, kind: element.kind, status: "suppressed", reason: "no-candidates" };
    }

    for (const candidate of candidates) {
      if (space.collides(candidate.box, element.group)) {
        continue;
      }
      space.addBox(element.id, candidate.box, element.group);
      return { ...this.acceptedFields(element, candidate), status: "placed" };
    }

    if (this.config.fallback[element.kind] === "suppress") {
      return { id: element.id, kind: element.kind, status: "suppressed", reason: "no-free-candidate" };
    }

    const choice = this.leastOverlap(element, candidates, space);
    space.addBox(element.id, choice.candidate.box, element.group);
    return {
      ...this.acceptedFields(element, choice.candidate),
      status: "forced",
      overlapArea: choice.overlap,
      overlapsWith: choice.overlapsWith,
    };
  }

  private leastOverlap(element: PlacementElement, candidates: Candidate[], space: OccupiedSpace): ForcedChoice {
    let best: ForcedChoice | undefined;
    for (const candidate of candidates) {
      const conflicts = space.conflicts(candidate.box, element.group);
      const cost = conflicts.reduce((sum, conflict) => sum + conflict.cost, 0);
      if (best && cost >= best.cost) {
        continue;
      }
      best = {
        candidate,
        cost,
        overlap: conflicts.reduce((sum, conflict) => sum + conflict.overlap, 0),
        overlapsWith: [...new Set(conflicts.map((conflict) => conflict.ownerId))].sort(),
      };
    }
    if (!best) {
      throw new Error(`No candidates to force for ${element.id}`);
    }
    return best;
  }

  private acceptedFields(element: PlacementElement, candidate: Candidate) {
    return {
      id: element.id,
      kind: element.kind,
      x: candidate.center.x,
      y: candidate.center.y,
      rotation: candidate.rotation,
      box: candidate.box,
      rank: candidate.rank,
      direction: candidate.direction,
      segmentIndex: candidate.segmentIndex,
      group: element.group,
    };
  }
}
