// src/index.ts

export { classifyDrawing, extractContours } from "./core/pipeline";
export type { DrawingContours } from "./core/pipeline";
export { classifyContours } from "./core/role-classifier";
export type { ClassifyContoursParams } from "./core/role-classifier";
export {
  resolveUnitScale,
  resolveDrawingScale,
  rawDrawingBounds,
  unitFromInsunits,
  parseLengthUnit,
  UNIT_TO_MM,
} from "./core/unit-resolver";
export type {
  LengthUnit,
  UnitScaleParams,
  UnitScaleResolution,
  UnitScaleSource,
} from "./core/unit-resolver";
export { inspectDrawing } from "./core/inventory";
export type { DrawingInventory, DrawingEntityType } from "./core/inventory";
export { ConfigError } from "./core/errors";

export {
  assembleClosedPaths,
  assertJoinTolerance,
  endpointKey,
} from "./geometry/contour-assembler";
export type { AssemblyResult } from "./geometry/contour-assembler";
export { bulgeToSegment, bulgeToArc, polylineToClosedPath } from "./geometry/bulge";
export {
  pathArea,
  pathBoundingBox,
  pointInPath,
  boundingBoxCenter,
  boundingBoxOfEntities,
  angleInArc,
} from "./geometry/metrics";
export {
  lineSegment,
  arcSegment,
  reverseSegment,
  segmentStart,
  segmentEnd,
  arcSweep,
} from "./geometry/segments";
export { DEFAULT_JOIN_TOLERANCE_MM } from "./geometry/constants";

export {
  detectLayerRole,
  lookupLayerRole,
  parseRoleMapEntries,
} from "./io/layer-classifier";
export type { LayerRoleMap } from "./io/layer-classifier";
export { exportClassifiedToDxf, DEFAULT_DXF_LAYERS } from "./io/dxf-exporter";

export type * from "./types/board-model";
export { BOARD_ROLES } from "./types/board-model";
export type * from "./types/drawing";
export type * from "./types/options";
