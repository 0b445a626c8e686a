// src/geometry/metrics.ts

import type {
  ArcSegment,
  BoundingBox,
  Circle,
  ClosedPath,
  Vec2,
} from "../types/board-model";
import {
  ARC_FLATTEN_MIN_STEPS,
  ARC_FLATTEN_STEP_DEG,
  MIN_ARC_RADIUS,
} from "./constants";
import {
  assertNever,
  normalizeAngle,
  pointOnCircle,
} from "./segments";

const CARDINAL_ANGLES = [0, 90, 180, 270];

// -----------------------------------------------------------------------------
// Bounding box
// -----------------------------------------------------------------------------

/**
 * Axis-aligned bounding box of a closed path. Arcs contribute their
 * endpoints and every cardinal extreme their sweep passes through.
 * An empty path yields a zero box at the origin.
 */
export function pathBoundingBox(path: ClosedPath): BoundingBox {
  const bounds = new BoundsAccumulator();

  for (const seg of path.segments) {
    switch (seg.kind) {
      case "line":
        bounds.add(seg.start);
        bounds.add(seg.end);
        break;
      case "arc": {
        bounds.add(seg.startPoint);
        bounds.add(seg.endPoint);
        // A clockwise arc covers the span from its end angle to its start
        const [from, to] =
          seg.sweep < 0
            ? [seg.endAngle, seg.startAngle]
            : [seg.startAngle, seg.endAngle];
        const fullCircle = Math.abs(seg.sweep) >= 360;
        for (const angle of CARDINAL_ANGLES) {
          if (fullCircle || angleInArc(angle, from, to)) {
            bounds.add(pointOnCircle(seg.center, seg.radius, angle));
          }
        }
        break;
      }
      default:
        assertNever(seg);
    }
  }

  return bounds.result() ?? { min: { x: 0, y: 0 }, max: { x: 0, y: 0 } };
}

/**
 * Combined bounding box of paths and circles, or null when there is
 * nothing to measure.
 */
export function boundingBoxOfEntities(
  paths: readonly ClosedPath[],
  circles: readonly Circle[] = []
): BoundingBox | null {
  const bounds = new BoundsAccumulator();

  for (const path of paths) {
    if (!path.segments.length) continue;
    const bb = pathBoundingBox(path);
    bounds.add(bb.min);
    bounds.add(bb.max);
  }

  for (const c of circles) {
    bounds.add({ x: c.center.x - c.radius, y: c.center.y - c.radius });
    bounds.add({ x: c.center.x + c.radius, y: c.center.y + c.radius });
  }

  return bounds.result();
}

export function boundingBoxCenter(bb: BoundingBox): Vec2 {
  return {
    x: (bb.min.x + bb.max.x) / 2,
    y: (bb.min.y + bb.max.y) / 2,
  };
}

/**
 * Is `angle` inside the counter-clockwise span from `start` to `end`?
 * All three are normalized to [0, 360) first; a span with start > end
 * wraps through 0.
 */
export function angleInArc(angle: number, start: number, end: number): boolean {
  const a = normalizeAngle(angle);
  const s = normalizeAngle(start);
  const e = normalizeAngle(end);

  if (s <= e) {
    return s <= a && a <= e;
  }
  return a >= s || a <= e;
}

export class BoundsAccumulator {
  private minX = Infinity;
  private minY = Infinity;
  private maxX = -Infinity;
  private maxY = -Infinity;

  add(p: Vec2): void {
    if (p.x < this.minX) this.minX = p.x;
    if (p.x > this.maxX) this.maxX = p.x;
    if (p.y < this.minY) this.minY = p.y;
    if (p.y > this.maxY) this.maxY = p.y;
  }

  result(): BoundingBox | null {
    if (!isFinite(this.minX) || !isFinite(this.minY) || !isFinite(this.maxX) || !isFinite(this.maxY)) {
      return null;
    }
    return {
      min: { x: this.minX, y: this.minY },
      max: { x: this.maxX, y: this.maxY },
    };
  }
}

// -----------------------------------------------------------------------------
// Signed area
// -----------------------------------------------------------------------------

/**
 * Signed area of a closed path, positive for counter-clockwise winding.
 *
 * Every segment contributes the shoelace term of its chord; arcs add the
 * circular segment between chord and arc, r²(θ - sin θ)/2, with θ the
 * signed sweep. For line-only paths this is exactly the shoelace formula.
 */
export function pathArea(path: ClosedPath): number {
  let twiceArea = 0;
  let arcArea = 0;

  for (const seg of path.segments) {
    switch (seg.kind) {
      case "line":
        twiceArea += seg.start.x * seg.end.y - seg.end.x * seg.start.y;
        break;
      case "arc":
        twiceArea +=
          seg.startPoint.x * seg.endPoint.y - seg.endPoint.x * seg.startPoint.y;
        arcArea += circularSegmentArea(seg);
        break;
      default:
        assertNever(seg);
    }
  }

  return twiceArea / 2 + arcArea;
}

function circularSegmentArea(arc: ArcSegment): number {
  if (arc.radius < MIN_ARC_RADIUS) return 0;
  const theta = (arc.sweep * Math.PI) / 180;
  return (arc.radius * arc.radius * (theta - Math.sin(theta))) / 2;
}

// -----------------------------------------------------------------------------
// Containment
// -----------------------------------------------------------------------------

/**
 * Ray casting point-in-path test: counts crossings of a ray from `point`
 * towards +X. Arcs are flattened into short chords first.
 */
export function pointInPath(path: ClosedPath, point: Vec2): boolean {
  let crossings = 0;

  for (const seg of path.segments) {
    switch (seg.kind) {
      case "line":
        crossings += rayCrossesChord(point, seg.start, seg.end);
        break;
      case "arc":
        crossings += rayCrossesArc(point, seg);
        break;
      default:
        assertNever(seg);
    }
  }

  return crossings % 2 === 1;
}

function rayCrossesChord(p: Vec2, a: Vec2, b: Vec2): number {
  // Half-open in y so a vertex shared by two edges counts once
  if ((a.y <= p.y && p.y < b.y) || (b.y <= p.y && p.y < a.y)) {
    const t = (p.y - a.y) / (b.y - a.y);
    const xAt = a.x + t * (b.x - a.x);
    if (xAt > p.x) return 1;
  }
  return 0;
}

function rayCrossesArc(p: Vec2, arc: ArcSegment): number {
  const sweep = arc.sweep;
  const steps = Math.max(
    ARC_FLATTEN_MIN_STEPS,
    Math.floor(Math.abs(sweep) / ARC_FLATTEN_STEP_DEG)
  );

  let crossings = 0;
  let prev = pointOnCircle(arc.center, arc.radius, arc.startAngle);
  for (let i = 1; i <= steps; i++) {
    const next = pointOnCircle(
      arc.center,
      arc.radius,
      arc.startAngle + (i / steps) * sweep
    );
    crossings += rayCrossesChord(p, prev, next);
    prev = next;
  }
  return crossings;
}
