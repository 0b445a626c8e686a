// src/core/pipeline.ts

import type {
  ArcSegment,
  Circle,
  ClassifiedEntities,
  ClosedPath,
  DrawingHatch,
  DrawingText,
  Vec2,
} from "../types/board-model";
import type {
  ParsedDrawing,
  RawArc,
  RawHatch,
  RawLine,
} from "../types/drawing";
import type { ClassifyDrawingOptions, WarningSink } from "../types/options";

import { assembleClosedPaths, assertJoinTolerance } from "../geometry/contour-assembler";
import { polylineToClosedPath } from "../geometry/bulge";
import { arcSegment } from "../geometry/segments";
import { DEFAULT_JOIN_TOLERANCE_MM } from "../geometry/constants";
import { classifyContours } from "./role-classifier";
import { resolveDrawingScale, type UnitScaleSource } from "./unit-resolver";

/**
 * Scaled, assembled but not yet classified drawing content.
 */
export interface DrawingContours {
  paths: ClosedPath[];
  circles: Circle[];
  texts: DrawingText[];
  hatches: DrawingHatch[];
  unitScale: number;
  unitSource: UnitScaleSource;
  /** Line/arc fragments, summed over all layers, that closed no loop. */
  leftoverFragments: number;
}

/**
 * Public entry point: take a parsed drawing in raw units and return its
 * entities classified by board role, in millimeters.
 */
export function classifyDrawing(
  drawing: ParsedDrawing,
  options: ClassifyDrawingOptions = {}
): ClassifiedEntities {
  const contours = extractContours(drawing, options);

  return classifyContours({
    paths: contours.paths,
    circles: contours.circles,
    texts: contours.texts,
    hatches: contours.hatches,
    unitScale: contours.unitScale,
    roleMap: options.roleMap,
  });
}

/**
 * Resolve units, scale every record to millimeters and assemble loose
 * fragments into closed paths, one layer at a time.
 */
export function extractContours(
  drawing: ParsedDrawing,
  options: ClassifyDrawingOptions = {}
): DrawingContours {
  const tolerance = options.tolerance ?? DEFAULT_JOIN_TOLERANCE_MM;
  assertJoinTolerance(tolerance);
  // eslint-disable-next-line no-console
  const warn: WarningSink = options.warn ?? console.warn;

  const { scale, source } = resolveDrawingScale(drawing, options.forcedUnit);

  const paths: ClosedPath[] = [];
  let leftoverFragments = 0;

  // Fragments only join within their own layer
  for (const [layer, group] of groupFragmentsByLayer(drawing.lines ?? [], drawing.arcs ?? [])) {
    const assembled = assembleClosedPaths(
      group.lines.map((l) => scaleLine(l, scale)),
      group.arcs.map((a) => scaleArc(a, scale)),
      { tolerance, layer }
    );
    paths.push(...assembled.paths);

    if (assembled.leftover.length) {
      leftoverFragments += assembled.leftover.length;
      warn(
        `[pipeline] ${assembled.leftover.length} of ${assembled.totalSegments} fragments on layer "${layer}" did not close into a loop`
      );
    }
  }

  // Open polylines are not board features
  for (const poly of drawing.polylines ?? []) {
    if (!poly.closed || poly.vertices.length < 2) continue;
    paths.push(
      polylineToClosedPath(
        poly.vertices.map((v) => scalePoint(v, scale)),
        poly.bulges,
        poly.layer
      )
    );
  }

  const circles: Circle[] = (drawing.circles ?? []).map((c) => ({
    center: scalePoint(c.center, scale),
    radius: c.radius * scale,
    layer: c.layer,
  }));

  const texts: DrawingText[] = (drawing.texts ?? []).map((t) => ({
    content: t.content,
    position: scalePoint(t.position, scale),
    height: t.height * scale,
    rotation: t.rotation ?? 0,
    layer: t.layer,
  }));

  const hatches: DrawingHatch[] = [];
  for (const raw of drawing.hatches ?? []) {
    const hatch = buildHatch(raw, scale, tolerance);
    if (hatch) hatches.push(hatch);
  }

  return {
    paths,
    circles,
    texts,
    hatches,
    unitScale: scale,
    unitSource: source,
    leftoverFragments,
  };
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

interface LayerFragments {
  lines: RawLine[];
  arcs: RawArc[];
}

function groupFragmentsByLayer(
  lines: readonly RawLine[],
  arcs: readonly RawArc[]
): Map<string, LayerFragments> {
  const groups = new Map<string, LayerFragments>();

  const groupOf = (layer: string): LayerFragments => {
    let group = groups.get(layer);
    if (!group) {
      group = { lines: [], arcs: [] };
      groups.set(layer, group);
    }
    return group;
  };

  for (const line of lines) groupOf(line.layer).lines.push(line);
  for (const arc of arcs) groupOf(arc.layer).arcs.push(arc);

  return groups;
}

/**
 * Hatch boundaries are either vertex loops with bulges or bags of
 * line/arc edges that still need assembling.
 */
function buildHatch(raw: RawHatch, scale: number, tolerance: number): DrawingHatch | null {
  const boundaryPaths: ClosedPath[] = [];

  for (const boundary of raw.boundaries) {
    if (boundary.kind === "polyline") {
      if (boundary.vertices.length < 3) continue;
      boundaryPaths.push(
        polylineToClosedPath(
          boundary.vertices.map((v) => scalePoint(v, scale)),
          boundary.bulges,
          raw.layer
        )
      );
      continue;
    }

    const lines: { start: Vec2; end: Vec2 }[] = [];
    const arcs: ArcSegment[] = [];
    for (const edge of boundary.edges) {
      if (edge.kind === "line") {
        lines.push(scaleLine(edge, scale));
      } else {
        arcs.push(scaleArc(edge, scale));
      }
    }
    if (lines.length || arcs.length) {
      const assembled = assembleClosedPaths(lines, arcs, { tolerance, layer: raw.layer });
      boundaryPaths.push(...assembled.paths);
    }
  }

  if (!boundaryPaths.length) return null;

  return { boundaryPaths, solid: raw.solid, layer: raw.layer };
}

function scalePoint(p: Vec2, scale: number): Vec2 {
  return { x: p.x * scale, y: p.y * scale };
}

function scaleLine(line: { start: Vec2; end: Vec2 }, scale: number): { start: Vec2; end: Vec2 } {
  return { start: scalePoint(line.start, scale), end: scalePoint(line.end, scale) };
}

function scaleArc(
  arc: Pick<RawArc, "center" | "radius" | "startAngle" | "endAngle"> & {
    counterClockwise?: boolean;
  },
  scale: number
): ArcSegment {
  return arcSegment(
    scalePoint(arc.center, scale),
    arc.radius * scale,
    arc.startAngle,
    arc.endAngle,
    arc.counterClockwise ?? true
  );
}
