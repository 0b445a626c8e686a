// src/geometry/constants.ts

/**
 * Default endpoint matching tolerance in millimeters used when assembling
 * loose fragments into closed paths.
 */
export const DEFAULT_JOIN_TOLERANCE_MM = 0.001;

// Bulges below this magnitude are straight edges
export const BULGE_EPS = 1e-10;

// Chords shorter than this produce a zero-radius placeholder arc
export const MIN_CHORD = 1e-12;

// Arcs below this radius contribute no area
export const MIN_ARC_RADIUS = 1e-12;

// Ray casting flattens arcs into chords of at most this many degrees
export const ARC_FLATTEN_STEP_DEG = 5;
export const ARC_FLATTEN_MIN_STEPS = 8;
