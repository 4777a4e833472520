import type { AcceptedEntry, BoxObstacle, LayoutEntry, LayoutResult, PlacementElement, ResolveOptions } from "../types.js";
import { resolvePlacementConfig } from "./config.js";
import { PlacementManager } from "./manager.js";

export function isAccepted(entry: LayoutEntry): entry is AcceptedEntry {
  return entry.status !== "suppressed";
}

export function resolveLayout(elements: readonly PlacementElement[], options: ResolveOptions = {}): LayoutResult {
  const config = resolvePlacementConfig(options.config);
  const manager = new PlacementManager(config, options.obstacles);
  return manager.resolve(elements);
}

// Accepted boxes of a previous pass, reusable as fixed obstacles for the next one.
export function obstaclesFromLayout(result: LayoutResult): BoxObstacle[] {
  return result.entries.filter(isAccepted).map((entry): BoxObstacle => ({
    id: entry.id,
    type: "box",
    box: { ...entry.box },
    group: entry.group,
  }));
}
