// tests/helpers.ts

import type { ClosedPath } from "../src/types/board-model";
import type { RawLine } from "../src/types/drawing";
import { lineSegment } from "../src/geometry/segments";

/**
 * Counter-clockwise rectangle as four loose lines.
 */
export function rectLines(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  layer = "0"
): RawLine[] {
  return [
    { start: { x: x0, y: y0 }, end: { x: x1, y: y0 }, layer },
    { start: { x: x1, y: y0 }, end: { x: x1, y: y1 }, layer },
    { start: { x: x1, y: y1 }, end: { x: x0, y: y1 }, layer },
    { start: { x: x0, y: y1 }, end: { x: x0, y: y0 }, layer },
  ];
}

/**
 * Counter-clockwise rectangle as an already closed path.
 */
export function rectPath(
  x0: number,
  y0: number,
  x1: number,
  y1: number,
  layer = "0"
): ClosedPath {
  return {
    layer,
    segments: rectLines(x0, y0, x1, y1, layer).map((l) => lineSegment(l.start, l.end)),
  };
}
