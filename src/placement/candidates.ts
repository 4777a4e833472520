import type {
  ArrowEndpointElement,
  Candidate,
  CandidateAlignment,
  CompassDirection,
  EventMarkerElement,
  PathLabelElement,
  PlacementConfig,
  PlacementElement,
  PlacementOverride,
  PointLabelElement,
} from "../types.js";
import { fixedPathCandidate, fixedPointCandidate, pathCandidates, pointCandidates } from "./anchor.js";

const NO_EXCLUSIONS: ReadonlySet<CompassDirection> = new Set();

function hasOffset(override: PlacementOverride | undefined): override is PlacementOverride & ({ dx: number } | { dy: number }) {
  return override !== undefined && (override.dx !== undefined || override.dy !== undefined);
}

function compassCandidates(
  element: PointLabelElement | EventMarkerElement | ArrowEndpointElement,
  config: PlacementConfig,
  alignment: CandidateAlignment,
  exclude: ReadonlySet<CompassDirection> = NO_EXCLUSIONS,
): Candidate[] {
  const override = element.override;
  if (hasOffset(override)) {
    const fixed = fixedPointCandidate(element.anchor, element.size, override.dx ?? 0, override.dy ?? 0, alignment, override.rotation);
    return fixed.direction && exclude.has(fixed.direction) ? [] : [fixed];
  }

  return pointCandidates(element.anchor, element.size, {
    radius: element.clearance ?? config.clearance[element.kind],
    tiers: config.clearanceTiers,
    alignment,
    rotation: override?.rotation,
    exclude,
  });
}

export function pointLabelCandidates(element: PointLabelElement, config: PlacementConfig): Candidate[] {
  return compassCandidates(element, config, "outward");
}

export function eventMarkerCandidates(element: EventMarkerElement, config: PlacementConfig): Candidate[] {
  return compassCandidates(element, config, "centered");
}

export function arrowEndpointCandidates(
  element: ArrowEndpointElement,
  config: PlacementConfig,
  taken: ReadonlySet<CompassDirection>,
): Candidate[] {
  return compassCandidates(element, config, "centered", config.excludeLabelDirections ? taken : NO_EXCLUSIONS);
}

export function pathLabelCandidates(element: PathLabelElement, config: PlacementConfig): Candidate[] {
  const override = element.override;
  const options = {
    clearance: element.clearance ?? config.clearance.pathLabel,
    side: element.side,
    rotation: override?.rotation,
  };
  if (hasOffset(override)) {
    const fixed = fixedPathCandidate(element.anchor, element.size, override.dx ?? 0, override.dy ?? 0, options);
    return fixed ? [fixed] : [];
  }

  return pathCandidates(element.anchor, element.size, options);
}

export function generateCandidates(
  element: PlacementElement,
  config: PlacementConfig,
  taken: ReadonlySet<CompassDirection> = NO_EXCLUSIONS,
): Candidate[] {
  switch (element.kind) {
    case "pointLabel":
      return pointLabelCandidates(element, config);
    case "eventMarker":
      return eventMarkerCandidates(element, config);
    case "pathLabel":
      return pathLabelCandidates(element, config);
    case "arrowEndpoint":
      return arrowEndpointCandidates(element, config, taken);
    default: {
      const unreachable: never = element;
      throw new Error(`Unsupported element kind: ${JSON.stringify(unreachable)}`);
    }
  }
}
