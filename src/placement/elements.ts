import type {
  ArrowEndpointElement,
  BoxObstacle,
  EventMarkerElement,
  FootprintEstimator,
  PathLabelElement,
  PlacementElement,
  PlacementOverride,
  Point,
  PointLabelElement,
} from "../types.js";
import { PRIORITY_TIERS, cityLevel } from "./defaults.js";
import { boxFromCenter } from "./geometry.js";
import { createTextEstimator, measureLabel } from "./measure.js";

type ElementInput<T extends PlacementElement> = Omit<T, "kind">;

function freezePoint(point: Point): Point {
  return Object.freeze({ x: point.x, y: point.y });
}

function freezeOverride(override: PlacementOverride | undefined): PlacementOverride | undefined {
  return override ? Object.freeze({ ...override }) : undefined;
}

export function pointLabel(input: ElementInput<PointLabelElement>): PointLabelElement {
  const element: PointLabelElement = {
    ...input,
    kind: "pointLabel",
    anchor: freezePoint(input.anchor),
    size: Object.freeze({ ...input.size }),
    override: freezeOverride(input.override),
  };
  return Object.freeze(element);
}

export function eventMarker(input: ElementInput<EventMarkerElement>): EventMarkerElement {
  const element: EventMarkerElement = {
    ...input,
    kind: "eventMarker",
    anchor: freezePoint(input.anchor),
    size: Object.freeze({ ...input.size }),
    override: freezeOverride(input.override),
  };
  return Object.freeze(element);
}

export function pathLabel(input: ElementInput<PathLabelElement>): PathLabelElement {
  const element: PathLabelElement = {
    ...input,
    kind: "pathLabel",
    anchor: Object.freeze(input.anchor.map(freezePoint)),
    size: Object.freeze({ ...input.size }),
    override: freezeOverride(input.override),
  };
  return Object.freeze(element);
}

export function arrowEndpoint(input: ElementInput<ArrowEndpointElement>): ArrowEndpointElement {
  const element: ArrowEndpointElement = {
    ...input,
    kind: "arrowEndpoint",
    anchor: freezePoint(input.anchor),
    size: Object.freeze({ ...input.size }),
    override: freezeOverride(input.override),
  };
  return Object.freeze(element);
}

export interface CityInput {
  name: string;
  anchor: Point;
  display?: string;
  level?: number;
  override?: PlacementOverride;
  estimator?: FootprintEstimator;
}

export interface CityElements {
  label: PointLabelElement;
  dot: BoxObstacle;
}

function cityPriority(level: number | undefined): number {
  switch (level) {
    case 1:
      return PRIORITY_TIERS.cityLabel1;
    case 3:
      return PRIORITY_TIERS.cityLabel3;
    case 4:
      return PRIORITY_TIERS.cityLabel4;
    default:
      return PRIORITY_TIERS.cityLabel2;
  }
}

export function city(input: CityInput): CityElements {
  const level = cityLevel(input.level);
  const group = `city_${input.name}`;
  const size = measureLabel(input.display ?? input.name, level.labelStyle, input.estimator ?? createTextEstimator());

  return {
    label: pointLabel({
      id: `city_label_${input.name}`,
      anchor: input.anchor,
      priority: cityPriority(input.level),
      size,
      group,
      clearance: level.anchorRadius,
      override: input.override,
    }),
    dot: {
      id: `city_dot_${input.name}`,
      type: "box",
      box: boxFromCenter(input.anchor, level.dotSize, level.dotSize),
      group,
    },
  };
}
