// src/geometry/segments.ts

import type {
  ArcSegment,
  LineSegment,
  PathSegment,
  Vec2,
} from "../types/board-model";

export function lineSegment(start: Vec2, end: Vec2): LineSegment {
  return { kind: "line", start, end };
}

/**
 * Build an arc from its circle and angles, deriving the endpoint
 * coordinates. The arc runs counter-clockwise from startAngle to endAngle
 * unless `counterClockwise` is false. Equal angles describe a full circle.
 */
export function arcSegment(
  center: Vec2,
  radius: number,
  startAngle: number,
  endAngle: number,
  counterClockwise = true
): ArcSegment {
  const span = counterClockwise
    ? normalizeAngle(endAngle - startAngle)
    : normalizeAngle(startAngle - endAngle);
  const magnitude = span === 0 ? 360 : span;

  return {
    kind: "arc",
    center,
    radius,
    startAngle,
    endAngle,
    sweep: counterClockwise ? magnitude : -magnitude,
    startPoint: pointOnCircle(center, radius, startAngle),
    endPoint: pointOnCircle(center, radius, endAngle),
  };
}

export function segmentStart(seg: PathSegment): Vec2 {
  return seg.kind === "line" ? seg.start : seg.startPoint;
}

export function segmentEnd(seg: PathSegment): Vec2 {
  return seg.kind === "line" ? seg.end : seg.endPoint;
}

/**
 * Same geometry traversed the other way round.
 */
export function reverseSegment(seg: PathSegment): PathSegment {
  switch (seg.kind) {
    case "line":
      return { kind: "line", start: seg.end, end: seg.start };
    case "arc":
      return {
        kind: "arc",
        center: seg.center,
        radius: seg.radius,
        startAngle: seg.endAngle,
        endAngle: seg.startAngle,
        sweep: -seg.sweep,
        startPoint: seg.endPoint,
        endPoint: seg.startPoint,
      };
    default:
      return assertNever(seg);
  }
}

/**
 * Signed sweep of an arc in degrees, positive counter-clockwise.
 */
export function arcSweep(arc: ArcSegment): number {
  return arc.sweep;
}

/**
 * Map an angle in degrees to [0, 360).
 */
export function normalizeAngle(deg: number): number {
  const a = deg % 360;
  if (a < 0) return (a + 360) % 360;
  // -360 % 360 is -0
  return a === 0 ? 0 : a;
}

export function pointOnCircle(center: Vec2, radius: number, angleDeg: number): Vec2 {
  const rad = (angleDeg * Math.PI) / 180;
  return {
    x: center.x + radius * Math.cos(rad),
    y: center.y + radius * Math.sin(rad),
  };
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected path segment: ${JSON.stringify(value)}`);
}
