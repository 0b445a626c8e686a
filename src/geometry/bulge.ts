// src/geometry/bulge.ts

import type {
  ArcSegment,
  ClosedPath,
  PathSegment,
  Vec2,
} from "../types/board-model";
import { BULGE_EPS, MIN_CHORD } from "./constants";
import { lineSegment } from "./segments";

/**
 * Convert one polyline edge p1 -> p2 with a bulge value into a segment.
 *
 * The bulge is the tangent of a quarter of the included angle. Positive
 * bulges sweep counter-clockwise from p1 to p2, negative ones clockwise,
 * and a (near) zero bulge is a straight edge.
 */
export function bulgeToSegment(p1: Vec2, p2: Vec2, bulge: number): PathSegment {
  if (Math.abs(bulge) < BULGE_EPS) {
    return lineSegment(p1, p2);
  }
  return bulgeToArc(p1, p2, bulge);
}

export function bulgeToArc(p1: Vec2, p2: Vec2, bulge: number): ArcSegment {
  const dx = p2.x - p1.x;
  const dy = p2.y - p1.y;
  const chord = Math.hypot(dx, dy);

  if (chord < MIN_CHORD) {
    // Coincident vertices: zero-extent placeholder
    return {
      kind: "arc",
      center: p1,
      radius: 0,
      startAngle: 0,
      endAngle: 0,
      sweep: 0,
      startPoint: p1,
      endPoint: p2,
    };
  }

  const sagitta = (bulge * chord) / 2;
  const radius = Math.abs(
    (chord * chord / 4 + sagitta * sagitta) / (2 * sagitta)
  );

  const mx = (p1.x + p2.x) / 2;
  const my = (p1.y + p2.y) / 2;

  // Left-hand unit normal of the chord
  const nx = -dy / chord;
  const ny = dx / chord;

  const d = (radius - Math.abs(sagitta)) * Math.sign(bulge);
  const center = { x: mx + d * nx, y: my + d * ny };

  return {
    kind: "arc",
    center,
    radius,
    startAngle: toDegrees(Math.atan2(p1.y - center.y, p1.x - center.x)),
    endAngle: toDegrees(Math.atan2(p2.y - center.y, p2.x - center.x)),
    // Included angle is 4·atan(bulge), signed like the bulge
    sweep: toDegrees(4 * Math.atan(bulge)),
    startPoint: p1,
    endPoint: p2,
  };
}

/**
 * Convert a closed polyline into a ClosedPath, one segment per edge
 * including the edge from the last vertex back to the first. Missing bulge
 * entries count as straight edges.
 */
export function polylineToClosedPath(
  vertices: readonly Vec2[],
  bulges: readonly number[],
  layer: string
): ClosedPath {
  const segments: PathSegment[] = [];
  const n = vertices.length;

  for (let i = 0; i < n; i++) {
    const p1 = vertices[i];
    const p2 = vertices[(i + 1) % n];
    const bulge = i < bulges.length ? bulges[i] : 0;
    segments.push(bulgeToSegment(p1, p2, bulge));
  }

  return { segments, layer };
}

function toDegrees(rad: number): number {
  return (rad * 180) / Math.PI;
}
