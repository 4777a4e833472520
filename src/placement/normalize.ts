import yaml from "js-yaml";
import type {
  Box,
  CompassDirection,
  ElementKind,
  FootprintEstimator,
  LayoutDocument,
  LayoutEntry,
  LayoutResult,
  Obstacle,
  PathSide,
  PlacementElement,
  PlacementOverride,
  Point,
  Size,
  SuppressionReason,
} from "../types.js";
import { ELEMENT_KINDS, IMHOF_ORDER, PRIORITY_TIERS, type PriorityTierName } from "./defaults.js";
import { arrowEndpoint, eventMarker, pathLabel, pointLabel } from "./elements.js";
import { asNumber, isRecord } from "./guards.js";
import { summarizeEntries } from "./manager.js";
import { createTextEstimator, measureLabel } from "./measure.js";

interface NormalizeOptions {
  estimator?: FootprintEstimator;
}

const DEFAULT_TEXT_STYLE: Record<ElementKind, string | undefined> = {
  pointLabel: "city2",
  pathLabel: "river",
  eventMarker: "eventText",
  arrowEndpoint: undefined,
};

function isTierName(input: string): input is PriorityTierName {
  return Object.prototype.hasOwnProperty.call(PRIORITY_TIERS, input);
}

function isElementKind(input: unknown): input is ElementKind {
  return ELEMENT_KINDS.some((kind) => kind === input);
}

function isDirection(input: unknown): input is CompassDirection {
  return IMHOF_ORDER.some((direction) => direction === input);
}

function isSuppressionReason(input: unknown): input is SuppressionReason {
  return input === "no-free-candidate" || input === "no-candidates";
}

function isEntryStatus(input: unknown): input is LayoutEntry["status"] {
  return input === "placed" || input === "forced" || input === "suppressed";
}

function readDirection(input: unknown, path: string): CompassDirection | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (!isDirection(input)) {
    throw new Error(`${path} must be one of ${IMHOF_ORDER.join(", ")}`);
  }
  return input;
}

function readNumber(input: unknown, path: string): number {
  const value = asNumber(input);
  if (value === undefined) {
    throw new Error(`${path} must be a number`);
  }
  return value;
}

function readString(input: unknown, path: string): string {
  if (typeof input !== "string" || input.trim().length === 0) {
    throw new Error(`${path} must be a non-empty string`);
  }
  return input;
}

function readOptionalString(input: unknown, path: string): string | undefined {
  return input === undefined ? undefined : readString(input, path);
}

function readPoint(input: unknown, path: string): Point {
  if (Array.isArray(input) && input.length === 2) {
    const x = asNumber(input[0]);
    const y = asNumber(input[1]);
    if (x !== undefined && y !== undefined) {
      return { x, y };
    }
  }
  if (isRecord(input)) {
    const x = asNumber(input.x);
    const y = asNumber(input.y);
    if (x !== undefined && y !== undefined) {
      return { x, y };
    }
  }
  throw new Error(`${path} must be [x, y] or { x, y }`);
}

function readPolyline(input: unknown, path: string): Point[] {
  if (!Array.isArray(input) || input.length < 2) {
    throw new Error(`${path} must list at least two points`);
  }
  return input.map((point, index) => readPoint(point, `${path}[${index}]`));
}

function readSize(input: unknown, path: string): Size {
  let width: number | undefined;
  let height: number | undefined;
  if (Array.isArray(input) && input.length === 2) {
    width = asNumber(input[0]);
    height = asNumber(input[1]);
  } else if (isRecord(input)) {
    width = asNumber(input.width);
    height = asNumber(input.height);
  }
  if (width === undefined || height === undefined || width <= 0 || height <= 0) {
    throw new Error(`${path} must be [width, height] with positive values`);
  }
  return { width, height };
}

function readBox(input: unknown, path: string): Box {
  const values = isRecord(input) ? [input.minX, input.minY, input.maxX, input.maxY] : input;
  if (Array.isArray(values) && values.length === 4) {
    const [minX, minY, maxX, maxY] = values.map((value: unknown) => asNumber(value));
    if (minX !== undefined && minY !== undefined && maxX !== undefined && maxY !== undefined && minX <= maxX && minY <= maxY) {
      return { minX, minY, maxX, maxY };
    }
  }
  throw new Error(`${path} must be [minX, minY, maxX, maxY]`);
}

function readPriority(input: unknown, path: string): number {
  if (typeof input === "string" && isTierName(input)) {
    return PRIORITY_TIERS[input];
  }
  const value = asNumber(input);
  if (value === undefined) {
    throw new Error(`${path} must be a number or one of ${Object.keys(PRIORITY_TIERS).join(", ")}`);
  }
  return value;
}

function readOverride(input: unknown, path: string): PlacementOverride | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (!isRecord(input)) {
    throw new Error(`${path} must be a mapping`);
  }
  const override: PlacementOverride = {};
  for (const key of ["dx", "dy", "rotation"] as const) {
    if (input[key] === undefined) {
      continue;
    }
    const value = asNumber(input[key]);
    if (value === undefined) {
      throw new Error(`${path}.${key} must be a number`);
    }
    override[key] = value;
  }
  return override;
}

function readSide(input: unknown, path: string): PathSide | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (input !== "above" && input !== "below") {
    throw new Error(`${path} must be above or below`);
  }
  return input;
}

function readClearance(input: unknown, path: string): number | undefined {
  if (input === undefined) {
    return undefined;
  }
  const value = asNumber(input);
  if (value === undefined || value < 0) {
    throw new Error(`${path} must be a non-negative number`);
  }
  return value;
}

function resolveSize(raw: Record<string, unknown>, kind: ElementKind, path: string, estimator: FootprintEstimator): Size {
  if (raw.size !== undefined) {
    return readSize(raw.size, `${path}.size`);
  }
  if (raw.text === undefined) {
    throw new Error(`${path} needs either size or text`);
  }
  const text = readString(raw.text, `${path}.text`);
  const style = readOptionalString(raw.style, `${path}.style`) ?? DEFAULT_TEXT_STYLE[kind];
  if (!style) {
    throw new Error(`${path}.style is required to measure text for ${kind}`);
  }
  return measureLabel(text, style, estimator);
}

function normalizeElement(raw: unknown, path: string, estimator: FootprintEstimator): PlacementElement {
  if (!isRecord(raw)) {
    throw new Error(`${path} must be a mapping`);
  }
  if (!isElementKind(raw.kind)) {
    throw new Error(`${path}.kind must be one of ${ELEMENT_KINDS.join(", ")}`);
  }

  const kind = raw.kind;
  const common = {
    id: readString(raw.id, `${path}.id`),
    priority: readPriority(raw.priority, `${path}.priority`),
    size: resolveSize(raw, kind, path, estimator),
    group: readOptionalString(raw.group, `${path}.group`),
    override: readOverride(raw.override, `${path}.override`),
    clearance: readClearance(raw.clearance, `${path}.clearance`),
  };

  switch (kind) {
    case "pointLabel":
      return pointLabel({ ...common, anchor: readPoint(raw.anchor, `${path}.anchor`) });
    case "eventMarker":
      return eventMarker({ ...common, anchor: readPoint(raw.anchor, `${path}.anchor`) });
    case "pathLabel":
      return pathLabel({
        ...common,
        anchor: readPolyline(raw.anchor, `${path}.anchor`),
        side: readSide(raw.side, `${path}.side`),
      });
    case "arrowEndpoint":
      return arrowEndpoint({
        ...common,
        anchor: readPoint(raw.anchor, `${path}.anchor`),
        labelId: readString(raw.labelId, `${path}.labelId`),
      });
  }
}

function normalizeObstacle(raw: unknown, path: string): Obstacle {
  if (!isRecord(raw)) {
    throw new Error(`${path} must be a mapping`);
  }
  const id = readString(raw.id, `${path}.id`);
  const group = readOptionalString(raw.group, `${path}.group`);

  if (raw.box !== undefined) {
    return { id, type: "box", box: readBox(raw.box, `${path}.box`), group };
  }
  if (raw.path !== undefined) {
    const width = asNumber(raw.width) ?? 0;
    if (width < 0) {
      throw new Error(`${path}.width must be a non-negative number`);
    }
    return { id, type: "path", points: readPolyline(raw.path, `${path}.path`), width, group };
  }
  throw new Error(`${path} needs either box or path`);
}

export function normalizeDocument(input: unknown, options: NormalizeOptions = {}): LayoutDocument {
  if (!isRecord(input)) {
    throw new Error("layout input must be a mapping with an elements list");
  }
  const rawElements = input.elements;
  const rawObstacles = input.obstacles ?? [];
  if (!Array.isArray(rawElements)) {
    throw new Error("elements must be a list");
  }
  if (!Array.isArray(rawObstacles)) {
    throw new Error("obstacles must be a list");
  }

  const estimator = options.estimator ?? createTextEstimator();
  const elements = rawElements.map((raw: unknown, index) => normalizeElement(raw, `elements[${index}]`, estimator));
  const obstacles = rawObstacles.map((raw: unknown, index) => normalizeObstacle(raw, `obstacles[${index}]`));

  const seen = new Set<string>();
  for (const element of elements) {
    if (seen.has(element.id)) {
      throw new Error(`Duplicate element id: ${element.id}`);
    }
    seen.add(element.id);
  }

  return { elements, obstacles };
}

export function parseLayoutDocument(raw: string, options: NormalizeOptions = {}): LayoutDocument {
  return normalizeDocument(yaml.load(raw), options);
}

function normalizeEntry(raw: unknown, path: string): LayoutEntry {
  if (!isRecord(raw)) {
    throw new Error(`${path} must be a mapping`);
  }
  if (!isElementKind(raw.kind)) {
    throw new Error(`${path}.kind must be one of ${ELEMENT_KINDS.join(", ")}`);
  }
  const id = readString(raw.id, `${path}.id`);
  const kind = raw.kind;
  const status = raw.status;
  if (!isEntryStatus(status)) {
    throw new Error(`${path}.status must be placed, forced or suppressed`);
  }

  if (status === "suppressed") {
    if (!isSuppressionReason(raw.reason)) {
      throw new Error(`${path}.reason must be no-free-candidate or no-candidates`);
    }
    return { id, kind, status: "suppressed", reason: raw.reason };
  }
  const accepted = {
    id,
    kind,
    x: readNumber(raw.x, `${path}.x`),
    y: readNumber(raw.y, `${path}.y`),
    rotation: readNumber(raw.rotation ?? 0, `${path}.rotation`),
    box: readBox(raw.box, `${path}.box`),
    rank: readNumber(raw.rank ?? 0, `${path}.rank`),
    direction: readDirection(raw.direction, `${path}.direction`),
    segmentIndex: raw.segmentIndex === undefined ? undefined : readNumber(raw.segmentIndex, `${path}.segmentIndex`),
    group: readOptionalString(raw.group, `${path}.group`),
  };

  if (status === "placed") {
    return { ...accepted, status };
  }
  const overlapsWith = raw.overlapsWith ?? [];
  if (!Array.isArray(overlapsWith)) {
    throw new Error(`${path}.overlapsWith must be a list of ids`);
  }
  return {
    ...accepted,
    status,
    overlapArea: readNumber(raw.overlapArea ?? 0, `${path}.overlapArea`),
    overlapsWith: overlapsWith.map((value: unknown, index) => readString(value, `${path}.overlapsWith[${index}]`)),
  };
}

// Reads a layout result written by an earlier run.
export function normalizeLayoutResult(input: unknown): LayoutResult {
  const rawEntries = isRecord(input) ? input.entries : undefined;
  if (!isRecord(input) || !Array.isArray(rawEntries)) {
    throw new Error("layout result must be a mapping with an entries list");
  }
  const entries = rawEntries.map((raw: unknown, index) => normalizeEntry(raw, `entries[${index}]`));
  const diagnostics: Record<string, unknown> = isRecord(input.diagnostics) ? input.diagnostics : {};
  const warnings = Array.isArray(diagnostics.warnings)
    ? diagnostics.warnings.filter((warning: unknown): warning is string => typeof warning === "string")
    : [];
  return { entries, diagnostics: summarizeEntries(entries, warnings) };
}
