import type { CityLevel, CompassDirection, ElementKind, LabelStyle, PlacementConfig } from "../types.js";

export const ELEMENT_KINDS: readonly ElementKind[] = ["pointLabel", "pathLabel", "eventMarker", "arrowEndpoint"];

// Imhof preference around a point. Part of the output contract: do not reorder.
export const IMHOF_ORDER: readonly CompassDirection[] = ["NE", "E", "NW", "W", "SE", "SW", "N", "S"];

export const DEFAULT_PLACEMENT_CONFIG: PlacementConfig = {
  clearance: {
    pointLabel: 6,
    pathLabel: 0,
    eventMarker: 12,
    arrowEndpoint: 6,
  },
  padding: 2,
  fallback: {
    pointLabel: "force-least-overlap",
    pathLabel: "suppress",
    eventMarker: "force-least-overlap",
    arrowEndpoint: "force-least-overlap",
  },
  excludeLabelDirections: true,
  clearanceTiers: [1],
};

// Lower tier is placed first. Arrow endpoints sit below every city label so
// the label at the shared anchor is always resolved before them.
export const PRIORITY_TIERS = {
  cityLabel1: 10,
  eventMarker: 20,
  cityLabel2: 30,
  cityLabel3: 40,
  eventLabel: 50,
  cityLabel4: 60,
  arrowEndpoint: 70,
  river: 80,
  region: 90,
} as const;

export type PriorityTierName = keyof typeof PRIORITY_TIERS;

export const CITY_LEVELS: Record<number, CityLevel> = {
  1: { anchorRadius: 8, dotSize: 6, labelStyle: "city1" },
  2: { anchorRadius: 6, dotSize: 4, labelStyle: "city2" },
  3: { anchorRadius: 5, dotSize: 3, labelStyle: "city3" },
  4: { anchorRadius: 4, dotSize: 2, labelStyle: "modernPlace" },
};

export const DEFAULT_CITY_LEVEL = 2;

function textStyle(fontSize: number): LabelStyle {
  return {
    fontSize,
    lineHeightRatio: 1.2,
    charWidthRatio: 0.6,
    paddingX: 0,
    paddingY: 0,
  };
}

export const LABEL_STYLES: Record<string, LabelStyle> = {
  city1: textStyle(10),
  city2: textStyle(9),
  city3: textStyle(8),
  modernPlace: textStyle(7),
  river: textStyle(6),
  region: textStyle(20),
  campaignAbove: textStyle(9),
  campaignBelow: textStyle(8),
  eventText: textStyle(9),
};

export function cityLevel(level: number | undefined): CityLevel {
  return CITY_LEVELS[level ?? DEFAULT_CITY_LEVEL] ?? CITY_LEVELS[DEFAULT_CITY_LEVEL];
}

export function cloneDefaultConfig(): PlacementConfig {
  return {
    clearance: { ...DEFAULT_PLACEMENT_CONFIG.clearance },
    padding: DEFAULT_PLACEMENT_CONFIG.padding,
    fallback: { ...DEFAULT_PLACEMENT_CONFIG.fallback },
    excludeLabelDirections: DEFAULT_PLACEMENT_CONFIG.excludeLabelDirections,
    clearanceTiers: [...DEFAULT_PLACEMENT_CONFIG.clearanceTiers],
  };
}
