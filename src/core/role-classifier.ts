// src/core/role-classifier.ts

import type {
  BoardRole,
  Circle,
  ClassifiedEntities,
  ClosedPath,
  DrawingHatch,
  DrawingText,
} from "../types/board-model";
import {
  detectLayerRole,
  lookupLayerRole,
  type LayerRoleMap,
} from "../io/layer-classifier";
import {
  boundingBoxCenter,
  pathArea,
  pathBoundingBox,
  pointInPath,
} from "../geometry/metrics";

export interface ClassifyContoursParams {
  paths: readonly ClosedPath[];
  circles: readonly Circle[];
  texts?: readonly DrawingText[];
  hatches?: readonly DrawingHatch[];
  unitScale?: number;
  /**
   * Explicit layer -> role mapping. When it has at least one entry, layer
   * heuristics and containment tests are not used.
   */
  roleMap?: LayerRoleMap;
}

/**
 * Assign every closed path and circle a board role.
 */
export function classifyContours(params: ClassifyContoursParams): ClassifiedEntities {
  const result = emptyResult(params);

  if (params.roleMap && Object.keys(params.roleMap).length > 0) {
    classifyByRoleMap(result, params.paths, params.circles, params.roleMap);
  } else {
    classifyByHeuristics(result, params.paths, params.circles);
  }

  return result;
}

function emptyResult(params: ClassifyContoursParams): ClassifiedEntities {
  return {
    outline: null,
    cutouts: [],
    holes: [],
    keepouts: [],
    soldermaskOpenings: [],
    texts: [...(params.texts ?? [])],
    hatches: [...(params.hatches ?? [])],
    unclassifiedPaths: [],
    unclassifiedCircles: [],
    unitScale: params.unitScale ?? 1,
  };
}

// -----------------------------------------------------------------------------
// Explicit role map
// -----------------------------------------------------------------------------

function classifyByRoleMap(
  result: ClassifiedEntities,
  paths: readonly ClosedPath[],
  circles: readonly Circle[],
  roleMap: LayerRoleMap
): void {
  const outlineCandidates: ClosedPath[] = [];

  for (const path of paths) {
    const role = lookupLayerRole(path.layer, roleMap);
    if (role === "outline") {
      outlineCandidates.push(path);
    } else if (!routeRolePath(result, path, role)) {
      result.unclassifiedPaths.push(path);
    }
  }

  pickOutline(result, outlineCandidates);

  for (const circle of circles) {
    if (lookupLayerRole(circle.layer, roleMap) === "hole") {
      result.holes.push(circle);
    } else {
      result.unclassifiedCircles.push(circle);
    }
  }
}

// -----------------------------------------------------------------------------
// Layer-name heuristics + containment
// -----------------------------------------------------------------------------

function classifyByHeuristics(
  result: ClassifiedEntities,
  paths: readonly ClosedPath[],
  circles: readonly Circle[]
): void {
  const outlineCandidates: ClosedPath[] = [];
  const unresolvedPaths: ClosedPath[] = [];
  const unresolvedCircles: Circle[] = [];

  for (const path of paths) {
    const role = detectLayerRole(path.layer);
    if (role === "outline") {
      outlineCandidates.push(path);
    } else if (!routeRolePath(result, path, role)) {
      unresolvedPaths.push(path);
    }
  }

  for (const circle of circles) {
    if (detectLayerRole(circle.layer) === "hole") {
      result.holes.push(circle);
    } else {
      unresolvedCircles.push(circle);
    }
  }

  if (outlineCandidates.length) {
    pickOutline(result, outlineCandidates);
  } else if (unresolvedPaths.length) {
    // A board always has one largest contour
    const largest = largestByArea(unresolvedPaths);
    result.outline = unresolvedPaths[largest];
    unresolvedPaths.splice(largest, 1);
  }

  const outline = result.outline;
  if (!outline) {
    result.unclassifiedPaths.push(...unresolvedPaths);
    result.unclassifiedCircles.push(...unresolvedCircles);
    return;
  }

  for (const path of unresolvedPaths) {
    const center = boundingBoxCenter(pathBoundingBox(path));
    if (pointInPath(outline, center)) {
      result.cutouts.push(path);
    } else {
      result.unclassifiedPaths.push(path);
    }
  }

  for (const circle of unresolvedCircles) {
    if (pointInPath(outline, circle.center)) {
      result.holes.push(circle);
    } else {
      result.unclassifiedCircles.push(circle);
    }
  }
}

// -----------------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------------

/**
 * Push a path into the list for its role. Returns false for roles that
 * have no path list (outline is handled by the caller).
 */
function routeRolePath(
  result: ClassifiedEntities,
  path: ClosedPath,
  role: BoardRole | null
): boolean {
  switch (role) {
    case "cutout":
      result.cutouts.push(path);
      return true;
    case "keepout":
      result.keepouts.push(path);
      return true;
    case "soldermask":
      result.soldermaskOpenings.push(path);
      return true;
    default:
      return false;
  }
}

/**
 * Only one outline may exist: the candidate with the largest absolute area
 * wins and the rest are demoted to unclassified.
 */
function pickOutline(result: ClassifiedEntities, candidates: ClosedPath[]): void {
  if (!candidates.length) return;

  const largest = largestByArea(candidates);
  result.outline = candidates[largest];
  candidates.forEach((path, i) => {
    if (i !== largest) result.unclassifiedPaths.push(path);
  });
}

// Ties go to the earliest path
function largestByArea(paths: readonly ClosedPath[]): number {
  let bestIdx = 0;
  let bestArea = -Infinity;
  paths.forEach((path, i) => {
    const area = Math.abs(pathArea(path));
    if (area > bestArea) {
      bestArea = area;
      bestIdx = i;
    }
  });
  return bestIdx;
}
