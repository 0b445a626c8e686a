// src/types/board-model.ts

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export interface LineSegment {
  readonly kind: "line";
  readonly start: Vec2;
  readonly end: Vec2;
}

/**
 * Circular arc. Angles are in degrees. The arc runs from startAngle by
 * `sweep` degrees, counter-clockwise when positive and clockwise when
 * negative, so it ends at endAngle. startPoint/endPoint are kept alongside
 * the angles so chain assembly never has to re-derive them.
 */
export interface ArcSegment {
  readonly kind: "arc";
  readonly center: Vec2;
  readonly radius: number;
  readonly startAngle: number;
  readonly endAngle: number;
  /** Signed sweep in degrees, in [-360, 360]. */
  readonly sweep: number;
  readonly startPoint: Vec2;
  readonly endPoint: Vec2;
}

export type PathSegment = LineSegment | ArcSegment;

/**
 * Ordered, head-to-tail loop of segments. `layer` is the drawing layer the
 * fragments came from.
 */
export interface ClosedPath {
  readonly segments: readonly PathSegment[];
  readonly layer: string;
}

export interface Circle {
  readonly center: Vec2;
  readonly radius: number;
  readonly layer: string;
}

export interface DrawingText {
  readonly content: string;
  readonly position: Vec2;
  readonly height: number;
  readonly rotation: number; // degrees
  readonly layer: string;
}

export interface DrawingHatch {
  readonly boundaryPaths: readonly ClosedPath[];
  readonly solid: boolean;
  readonly layer: string;
}

export interface BoundingBox {
  min: Vec2;
  max: Vec2;
}

export type BoardRole =
  | "outline"
  | "cutout"
  | "hole"
  | "keepout"
  | "soldermask"
  | "annotation";

export const BOARD_ROLES: readonly BoardRole[] = [
  "outline",
  "cutout",
  "hole",
  "keepout",
  "soldermask",
  "annotation",
];

/**
 * Output of the role classifier. Every path and circle handed to the
 * classifier lands in exactly one of outline, cutouts, holes, keepouts,
 * soldermaskOpenings, unclassifiedPaths or unclassifiedCircles.
 */
export interface ClassifiedEntities {
  outline: ClosedPath | null;
  cutouts: ClosedPath[];
  holes: Circle[];
  keepouts: ClosedPath[];
  soldermaskOpenings: ClosedPath[];
  texts: DrawingText[];
  hatches: DrawingHatch[];
  unclassifiedPaths: ClosedPath[];
  unclassifiedCircles: Circle[];
  /** Multiplier that converted drawing units to millimeters. */
  unitScale: number;
}
