export { resolveLayout, obstaclesFromLayout, isAccepted } from "./placement/index.js";
export { defaultOutputPath, describeEntry, resolveDocument, strictExitCode } from "./commands.js";
export type { ResolveDocumentOptions } from "./commands.js";
export { PlacementManager, placementOrder, summarizeEntries } from "./placement/manager.js";
export { OccupiedSpace } from "./placement/occupied.js";
export { generateCandidates } from "./placement/candidates.js";
export { pointLabel, pathLabel, eventMarker, arrowEndpoint, city } from "./placement/elements.js";
export { createTextEstimator, measureLabel, labelStyle } from "./placement/measure.js";
export { parsePlacementConfig, parsePlacementConfigYaml, resolvePlacementConfig } from "./placement/config.js";
export { normalizeDocument, parseLayoutDocument, normalizeLayoutResult } from "./placement/normalize.js";
export { DEFAULT_PLACEMENT_CONFIG, IMHOF_ORDER, PRIORITY_TIERS, LABEL_STYLES, CITY_LEVELS } from "./placement/defaults.js";
export { auditLayout, findOverlaps } from "./quality/audit.js";
export type { AuditMetrics, AuditOptions, LayoutAudit, OverlapPair } from "./quality/audit.js";
export type * from "./types.js";
