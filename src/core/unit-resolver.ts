// src/core/unit-resolver.ts

import type { BoundingBox } from "../types/board-model";
import type { ParsedDrawing } from "../types/drawing";
import { BoundsAccumulator } from "../geometry/metrics";
import { ConfigError } from "./errors";

export type LengthUnit =
  | "mm"
  | "cm"
  | "m"
  | "in"
  | "ft"
  | "mil"
  | "uin"
  | "um"
  | "yd";

/** Length unit -> millimeters. */
export const UNIT_TO_MM: Readonly<Record<LengthUnit, number>> = {
  mm: 1,
  cm: 10,
  m: 1000,
  in: 25.4,
  ft: 304.8,
  mil: 0.0254,
  uin: 0.0000254,
  um: 0.001,
  yd: 914.4,
};

/**
 * Drawing header unit codes. 0 means unitless; codes not listed here are
 * treated the same way.
 */
const INSUNITS_CODES: Readonly<Record<number, LengthUnit>> = {
  1: "in",
  2: "ft",
  4: "mm",
  5: "cm",
  6: "m",
  8: "uin",
  9: "um",
  10: "yd",
};

/** Largest plausible board extent, in mm, for a declared unit. */
export const MAX_PLAUSIBLE_EXTENT_MM = 5000;

/** Raw extents above this are assumed to be mils when nothing else applies. */
export const MIL_HEURISTIC_EXTENT = 500;

export type UnitScaleSource =
  | "forced"
  | "declared"
  | "empty"
  | "heuristic-mil"
  | "heuristic-mm";

export interface UnitScaleParams {
  forcedUnit?: LengthUnit;
  declaredUnit?: LengthUnit;
  /** Largest axis of the raw bounding box, in drawing units. */
  rawExtent: number;
}

export interface UnitScaleResolution {
  scale: number;
  source: UnitScaleSource;
}

/**
 * Work out the drawing-unit -> mm factor.
 *
 * 1. A forced unit always wins.
 * 2. A declared unit is trusted while it keeps the board at or below 5 m.
 * 3. No geometry at all means millimeters.
 * 4. Raw extents above 500 are taken as mils, anything else as mm.
 */
export function resolveUnitScale(params: UnitScaleParams): UnitScaleResolution {
  const { forcedUnit, declaredUnit, rawExtent } = params;

  if (forcedUnit) {
    return { scale: UNIT_TO_MM[forcedUnit], source: "forced" };
  }

  if (declaredUnit) {
    const scale = UNIT_TO_MM[declaredUnit];
    if (rawExtent * scale <= MAX_PLAUSIBLE_EXTENT_MM) {
      return { scale, source: "declared" };
    }
  }

  if (rawExtent === 0) {
    return { scale: 1, source: "empty" };
  }

  if (rawExtent > MIL_HEURISTIC_EXTENT) {
    return { scale: UNIT_TO_MM.mil, source: "heuristic-mil" };
  }
  return { scale: 1, source: "heuristic-mm" };
}

/**
 * Resolve the unit scale straight from a parsed drawing.
 */
export function resolveDrawingScale(
  drawing: ParsedDrawing,
  forcedUnit?: LengthUnit
): UnitScaleResolution {
  const bb = rawDrawingBounds(drawing);
  const rawExtent = bb ? Math.max(bb.max.x - bb.min.x, bb.max.y - bb.min.y) : 0;

  return resolveUnitScale({
    forcedUnit,
    declaredUnit: unitFromInsunits(drawing.insunits),
    rawExtent,
  });
}

export function unitFromInsunits(code: number | undefined): LengthUnit | undefined {
  if (code === undefined) return undefined;
  return INSUNITS_CODES[code];
}

/**
 * Parse a user supplied unit name such as "MM", "inch" or "µm".
 */
export function parseLengthUnit(value: string): LengthUnit {
  const name = value.trim().toLowerCase().replace(/^[\u00b5\u03bc]/, "u");

  switch (name) {
    case "mm":
    case "cm":
    case "m":
    case "in":
    case "ft":
    case "mil":
    case "uin":
    case "um":
    case "yd":
      return name;
    case "inch":
    case "inches":
      return "in";
    case "thou":
      return "mil";
    default:
      throw new ConfigError(
        `Unknown unit "${value}" (expected one of ${Object.keys(UNIT_TO_MM).join(", ")})`
      );
  }
}

/**
 * Bounding box of every coordinate in the drawing, in raw units. Arcs and
 * circles count as their full circle's box, splines as their control
 * points.
 */
export function rawDrawingBounds(drawing: ParsedDrawing): BoundingBox | null {
  const bounds = new BoundsAccumulator();

  for (const line of drawing.lines ?? []) {
    bounds.add(line.start);
    bounds.add(line.end);
  }
  for (const round of [...(drawing.arcs ?? []), ...(drawing.circles ?? [])]) {
    bounds.add({ x: round.center.x - round.radius, y: round.center.y - round.radius });
    bounds.add({ x: round.center.x + round.radius, y: round.center.y + round.radius });
  }
  for (const poly of drawing.polylines ?? []) {
    for (const v of poly.vertices) bounds.add(v);
  }
  for (const spline of drawing.splines ?? []) {
    for (const p of spline.controlPoints) bounds.add(p);
  }

  return bounds.result();
}
