export type ElementKind = "pointLabel" | "pathLabel" | "eventMarker" | "arrowEndpoint";

export type CompassDirection = "NE" | "E" | "NW" | "W" | "SE" | "SW" | "N" | "S";

export type FallbackPolicy = "force-least-overlap" | "suppress";

export type CandidateAlignment = "outward" | "centered";

export type PathSide = "above" | "below";

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export interface Box {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface PlacementOverride {
  dx?: number;
  dy?: number;
  rotation?: number;
}

interface ElementBase {
  id: string;
  priority: number;
  size: Size;
  group?: string;
  override?: PlacementOverride;
}

export interface PointLabelElement extends ElementBase {
  kind: "pointLabel";
  anchor: Point;
  clearance?: number;
}

export interface EventMarkerElement extends ElementBase {
  kind: "eventMarker";
  anchor: Point;
  clearance?: number;
}

export interface PathLabelElement extends ElementBase {
  kind: "pathLabel";
  anchor: readonly Point[];
  clearance?: number;
  side?: PathSide;
}

export interface ArrowEndpointElement extends ElementBase {
  kind: "arrowEndpoint";
  anchor: Point;
  labelId: string;
  clearance?: number;
}

export type PlacementElement =
  | PointLabelElement
  | EventMarkerElement
  | PathLabelElement
  | ArrowEndpointElement;

export interface Candidate {
  center: Point;
  rotation: number;
  box: Box;
  rank: number;
  direction?: CompassDirection;
  segmentIndex?: number;
}

export interface BoxObstacle {
  id: string;
  type: "box";
  box: Box;
  group?: string;
}

export interface PathObstacle {
  id: string;
  type: "path";
  points: readonly Point[];
  width: number;
  group?: string;
}

export type Obstacle = BoxObstacle | PathObstacle;

export type KindTable<T> = Record<ElementKind, T>;

export interface PlacementConfig {
  clearance: KindTable<number>;
  padding: number;
  fallback: KindTable<FallbackPolicy>;
  excludeLabelDirections: boolean;
  clearanceTiers: number[];
}

export interface PlacementConfigPatch {
  clearance?: Partial<KindTable<number>>;
  padding?: number;
  fallback?: Partial<KindTable<FallbackPolicy>>;
  excludeLabelDirections?: boolean;
  clearanceTiers?: number[];
}

interface AcceptedEntryBase {
  id: string;
  kind: ElementKind;
  x: number;
  y: number;
  rotation: number;
  box: Box;
  rank: number;
  direction?: CompassDirection;
  segmentIndex?: number;
  group?: string;
}

export interface PlacedEntry extends AcceptedEntryBase {
  status: "placed";
}

export interface ForcedEntry extends AcceptedEntryBase {
  status: "forced";
  /** Unpadded overlap with the boxes and strokes it conflicts with; 0 when only the padding margins meet. */
  overlapArea: number;
  overlapsWith: string[];
}

export type SuppressionReason = "no-free-candidate" | "no-candidates";

export interface SuppressedEntry {
  id: string;
  kind: ElementKind;
  status: "suppressed";
  reason: SuppressionReason;
}

export type LayoutEntry = PlacedEntry | ForcedEntry | SuppressedEntry;

export type AcceptedEntry = PlacedEntry | ForcedEntry;

export interface LayoutDiagnostics {
  placedCount: number;
  forcedCount: number;
  suppressedCount: number;
  forcedIds: string[];
  suppressedIds: string[];
  warnings: string[];
}

export interface LayoutResult {
  entries: LayoutEntry[];
  diagnostics: LayoutDiagnostics;
}

export interface LabelStyle {
  fontSize: number;
  lineHeightRatio: number;
  charWidthRatio: number;
  paddingX: number;
  paddingY: number;
}

export interface LabelRequest {
  text: string;
  style: LabelStyle;
}

export interface FootprintEstimator {
  estimate(request: LabelRequest): Size;
}

export interface CityLevel {
  anchorRadius: number;
  dotSize: number;
  labelStyle: string;
}

export interface ResolveOptions {
  config?: PlacementConfigPatch;
  obstacles?: Obstacle[];
}

export interface LayoutDocument {
  elements: PlacementElement[];
  obstacles: Obstacle[];
}
