// src/geometry/contour-assembler.ts

import type {
  ArcSegment,
  ClosedPath,
  PathSegment,
  Vec2,
} from "../types/board-model";
import type { RawLine } from "../types/drawing";
import type { AssembleOptions } from "../types/options";
import { ConfigError } from "../core/errors";
import { DEFAULT_JOIN_TOLERANCE_MM } from "./constants";
import {
  lineSegment,
  reverseSegment,
  segmentEnd,
  segmentStart,
} from "./segments";

export interface AssemblyResult {
  paths: ClosedPath[];
  /** Number of input segments (lines + arcs). */
  totalSegments: number;
  /** Number of input segments that ended up in one of `paths`. */
  consumedSegments: number;
  /** Input segments, in their original orientation, that closed no loop. */
  leftover: PathSegment[];
}

/**
 * Incident segment at a grid cell. `idx` points into the segment arena.
 */
interface EndpointHandle {
  idx: number;
  atStart: boolean;
}

type EndpointIndex = Map<string, EndpointHandle[]>;

// -----------------------------------------------------------------------------
// Public API
// -----------------------------------------------------------------------------

/**
 * Assemble loose line and arc fragments into closed paths.
 *
 * Endpoints are quantized to a grid of `tolerance`-sized cells; fragments
 * whose endpoints share a cell are connected. Each unconsumed fragment is
 * used once as the seed of a walk that follows the first unused neighbour at
 * every cell until it gets back to the seed's start. Walks that dead-end
 * release their fragments for later seeds. Fragments that never close a
 * loop are reported in `leftover`. A tolerance that is not a positive
 * finite number throws ConfigError.
 */
export function assembleClosedPaths(
  lines: readonly Pick<RawLine, "start" | "end">[],
  arcs: readonly ArcSegment[],
  options: AssembleOptions = {}
): AssemblyResult {
  const tolerance = options.tolerance ?? DEFAULT_JOIN_TOLERANCE_MM;
  const layer = options.layer ?? "";
  assertJoinTolerance(tolerance);

  const segments: PathSegment[] = [
    ...lines.map((l) => lineSegment(l.start, l.end)),
    ...arcs,
  ];

  const paths: ClosedPath[] = [];
  if (!segments.length) {
    return { paths, totalSegments: 0, consumedSegments: 0, leftover: [] };
  }

  const index = buildEndpointIndex(segments, tolerance);
  const used = new Array<boolean>(segments.length).fill(false);

  for (let i = 0; i < segments.length; i++) {
    if (used[i]) continue;

    const loop = walkLoop(segments, index, used, i, tolerance);
    if (loop) {
      paths.push({ segments: loop, layer });
    }
  }

  const leftover = segments.filter((_, i) => !used[i]);

  return {
    paths,
    totalSegments: segments.length,
    consumedSegments: segments.length - leftover.length,
    leftover,
  };
}

export function assertJoinTolerance(tolerance: number): void {
  if (!Number.isFinite(tolerance) || tolerance <= 0) {
    throw new ConfigError(
      `Join tolerance must be a positive number of millimeters, got ${tolerance}`
    );
  }
}

/**
 * Grid cell key of a point for the given tolerance.
 */
export function endpointKey(p: Vec2, tolerance: number): string {
  const ix = Math.round(p.x / tolerance);
  const iy = Math.round(p.y / tolerance);
  // `${-0}` is "0", so negative zero lands in the same cell
  return `${ix}:${iy}`;
}

// -----------------------------------------------------------------------------
// Loop walking
// -----------------------------------------------------------------------------

function buildEndpointIndex(
  segments: PathSegment[],
  tolerance: number
): EndpointIndex {
  const index: EndpointIndex = new Map();

  const add = (key: string, handle: EndpointHandle) => {
    const list = index.get(key);
    if (list) {
      list.push(handle);
    } else {
      index.set(key, [handle]);
    }
  };

  segments.forEach((seg, idx) => {
    add(endpointKey(segmentStart(seg), tolerance), { idx, atStart: true });
    add(endpointKey(segmentEnd(seg), tolerance), { idx, atStart: false });
  });

  return index;
}

function walkLoop(
  segments: PathSegment[],
  index: EndpointIndex,
  used: boolean[],
  seedIdx: number,
  tolerance: number
): PathSegment[] | null {
  const seed = segments[seedIdx];
  const loopStartKey = endpointKey(segmentStart(seed), tolerance);

  const chain: PathSegment[] = [seed];
  const chainIdx: number[] = [seedIdx];
  used[seedIdx] = true;

  let currentKey = endpointKey(segmentEnd(seed), tolerance);

  // Every step consumes a fresh segment, so this bound is never the
  // limiting factor on well-formed input.
  const maxSteps = segments.length;
  for (let step = 0; step < maxSteps; step++) {
    if (currentKey === loopStartKey && chain.length > 1) {
      return chain;
    }

    const next = findNextHandle(index, used, currentKey);
    if (!next) {
      release(used, chainIdx);
      return null;
    }

    used[next.idx] = true;
    const candidate = segments[next.idx];
    const oriented = next.atStart ? candidate : reverseSegment(candidate);

    chain.push(oriented);
    chainIdx.push(next.idx);
    currentKey = endpointKey(segmentEnd(oriented), tolerance);
  }

  release(used, chainIdx);
  return null;
}

/**
 * First unused segment touching the given cell. At junctions with more than
 * two incident segments this is simply the earliest one in the arena.
 */
function findNextHandle(
  index: EndpointIndex,
  used: boolean[],
  key: string
): EndpointHandle | null {
  const incidents = index.get(key) || [];
  for (const handle of incidents) {
    if (!used[handle.idx]) return handle;
  }
  return null;
}

function release(used: boolean[], indices: number[]): void {
  for (const idx of indices) {
    used[idx] = false;
  }
}
