// src/core/inventory.ts

import type { BoundingBox } from "../types/board-model";
import type { ParsedDrawing } from "../types/drawing";
import { rawDrawingBounds, unitFromInsunits, type LengthUnit } from "./unit-resolver";

export type DrawingEntityType =
  | "LINE"
  | "ARC"
  | "CIRCLE"
  | "LWPOLYLINE"
  | "TEXT"
  | "HATCH"
  | "SPLINE";

/**
 * Summary of what a drawing contains, before any unit scaling.
 */
export interface DrawingInventory {
  version: string | null;
  units: LengthUnit | null;
  /** Entity count per layer. */
  layers: Record<string, number>;
  entityCounts: Partial<Record<DrawingEntityType, number>>;
  /** Raw-unit bounding box, null for an empty drawing. */
  boundingBox: BoundingBox | null;
}

export function inspectDrawing(drawing: ParsedDrawing): DrawingInventory {
  const layers: Record<string, number> = {};
  const entityCounts: Partial<Record<DrawingEntityType, number>> = {};

  const tally = (type: DrawingEntityType, items: readonly { layer: string }[] | undefined) => {
    if (!items || !items.length) return;
    entityCounts[type] = (entityCounts[type] ?? 0) + items.length;
    for (const item of items) {
      layers[item.layer] = (layers[item.layer] ?? 0) + 1;
    }
  };

  tally("LINE", drawing.lines);
  tally("ARC", drawing.arcs);
  tally("CIRCLE", drawing.circles);
  tally("LWPOLYLINE", drawing.polylines);
  tally("TEXT", drawing.texts);
  tally("HATCH", drawing.hatches);
  tally("SPLINE", drawing.splines);

  return {
    version: drawing.version ?? null,
    units: unitFromInsunits(drawing.insunits) ?? null,
    layers,
    entityCounts,
    boundingBox: rawDrawingBounds(drawing),
  };
}
