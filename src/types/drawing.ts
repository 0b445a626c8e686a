// src/types/drawing.ts

import type { Vec2 } from "./board-model";

/**
 * Records handed over by a drawing-file parser. Coordinates are in raw
 * drawing units; the pipeline scales them to millimeters.
 */

export interface RawLine {
  start: Vec2;
  end: Vec2;
  layer: string;
}

export interface RawArc {
  center: Vec2;
  radius: number;
  startAngle: number; // degrees, counter-clockwise sweep
  endAngle: number;
  layer: string;
}

export interface RawCircle {
  center: Vec2;
  radius: number;
  layer: string;
}

export interface RawPolyline {
  vertices: Vec2[];
  /** One bulge per vertex, describing the edge to the next vertex. */
  bulges: number[];
  closed: boolean;
  layer: string;
}

export interface RawText {
  content: string;
  position: Vec2;
  height: number;
  rotation?: number;
  layer: string;
}

export interface RawSpline {
  controlPoints: Vec2[];
  layer: string;
}

export type RawHatchEdge =
  | { kind: "line"; start: Vec2; end: Vec2 }
  | {
      kind: "arc";
      center: Vec2;
      radius: number;
      startAngle: number;
      endAngle: number;
      /** False when the edge runs clockwise from startAngle to endAngle. */
      counterClockwise?: boolean;
    };

export type RawHatchBoundary =
  | { kind: "polyline"; vertices: Vec2[]; bulges: number[] }
  | { kind: "edges"; edges: RawHatchEdge[] };

export interface RawHatch {
  solid: boolean;
  layer: string;
  boundaries: RawHatchBoundary[];
}

export interface ParsedDrawing {
  /** Format version string reported by the parser, if any. */
  version?: string;
  /** Header unit code as stored in the drawing file. */
  insunits?: number;
  lines?: RawLine[];
  arcs?: RawArc[];
  circles?: RawCircle[];
  polylines?: RawPolyline[];
  texts?: RawText[];
  hatches?: RawHatch[];
  splines?: RawSpline[];
}
