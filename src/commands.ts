import path from "node:path";
import { obstaclesFromLayout, resolveLayout } from "./placement/index.js";
import type { LayoutDiagnostics, LayoutDocument, LayoutEntry, LayoutResult, PlacementConfigPatch } from "./types.js";

export interface ResolveDocumentOptions {
  config?: PlacementConfigPatch;
  // Layout of an earlier pass whose accepted boxes stay where they are.
  fixed?: LayoutResult;
}

export function defaultOutputPath(input: string): string {
  const parsed = path.parse(input);
  return path.join(parsed.dir, `${parsed.name}.layout.json`);
}

export function resolveDocument(document: LayoutDocument, options: ResolveDocumentOptions = {}): LayoutResult {
  const obstacles = options.fixed ? [...document.obstacles, ...obstaclesFromLayout(options.fixed)] : document.obstacles;
  return resolveLayout(document.elements, { config: options.config, obstacles });
}

export function strictExitCode(diagnostics: LayoutDiagnostics): number {
  return diagnostics.forcedCount + diagnostics.suppressedCount > 0 ? 1 : 0;
}

export function describeEntry(entry: LayoutEntry): string | undefined {
  if (entry.status === "forced") {
    const others = entry.overlapsWith.length > 0 ? entry.overlapsWith.join(", ") : "nothing";
    return `forced: ${entry.id} (${entry.kind}) conflicts with ${others}, overlap ${entry.overlapArea.toFixed(2)}`;
  }
  if (entry.status === "suppressed") {
    return `suppressed: ${entry.id} (${entry.kind}) ${entry.reason}`;
  }
  return undefined;
}
