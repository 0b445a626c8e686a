// src/types/options.ts
import type { LayerRoleMap } from "../io/layer-classifier";
import type { LengthUnit } from "../core/unit-resolver";

export type WarningSink = (message: string, ...details: unknown[]) => void;

export interface AssembleOptions {
  /**
   * Endpoint matching tolerance in millimeters. Endpoints that quantize to
   * the same tolerance-sized grid cell are treated as one point.
   */
  tolerance?: number;

  /** Layer name tagged on every produced path. */
  layer?: string;
}

export interface ClassifyDrawingOptions {
  tolerance?: number;

  /**
   * Optional explicit layer to role mapping. When present, layer-name
   * heuristics and containment tests are skipped entirely.
   */
  roleMap?: LayerRoleMap;

  /** Force unit interpretation instead of detecting it. */
  forcedUnit?: LengthUnit;

  /** Where pipeline warnings go. Defaults to console.warn. */
  warn?: WarningSink;
}

export interface DxfExportOptions {
  /** Translate all geometry so the outline's bounding box is centered on the origin. */
  recenter?: boolean;

  /** Override the default DXF layer names per role. */
  layerNames?: Partial<Record<DxfExportLayer, string>>;
}

export type DxfExportLayer =
  | "outline"
  | "cutouts"
  | "holes"
  | "keepouts"
  | "soldermask"
  | "unclassified"
  | "annotations";
