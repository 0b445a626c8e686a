// src/io/layer-classifier.ts
import { BOARD_ROLES, type BoardRole } from "../types/board-model";
import { ConfigError } from "../core/errors";

/**
 * Explicit layer name -> role mapping. Keys are exact layer names, or
 * patterns containing "*" wildcards, for example "MOUNT_*".
 */
export type LayerRoleMap = Record<string, BoardRole>;

/**
 * Substring keywords per role, checked in this order. The first role with
 * a matching keyword wins, so "board_mask" is an outline layer.
 */
const ROLE_KEYWORDS: ReadonlyArray<readonly [BoardRole, readonly string[]]> = [
  ["outline", ["outline", "board", "boundary", "profile", "edge", "border"]],
  ["cutout", ["cutout", "route", "rout", "slot"]],
  ["hole", ["hole", "drill", "mount"]],
  ["keepout", ["keepout", "keep-out", "keep_out", "restrict"]],
  ["soldermask", ["mask", "soldermask", "solder"]],
  ["annotation", ["dim", "dimension", "note", "text", "anno"]],
];

/**
 * Guess a layer's role from common naming schemes. Returns null when no
 * keyword matches.
 */
export function detectLayerRole(layerName: string): BoardRole | null {
  const lower = layerName.toLowerCase();

  for (const [role, keywords] of ROLE_KEYWORDS) {
    for (const keyword of keywords) {
      if (lower.includes(keyword)) {
        return role;
      }
    }
  }

  return null;
}

/**
 * Look a layer up in an explicit role map: exact names first, then
 * wildcard patterns in insertion order. Unmapped layers return null.
 */
export function lookupLayerRole(
  layerName: string,
  roleMap: LayerRoleMap
): BoardRole | null {
  if (Object.prototype.hasOwnProperty.call(roleMap, layerName)) {
    return roleMap[layerName];
  }

  for (const [pattern, role] of Object.entries(roleMap)) {
    if (pattern.includes("*") && matchesPattern(layerName, pattern)) {
      return role;
    }
  }

  return null;
}

/**
 * Build a role map from "LAYER=role" entries as typed on a command line.
 * Later entries override earlier ones for the same layer.
 */
export function parseRoleMapEntries(entries: readonly string[]): LayerRoleMap {
  const roleMap: LayerRoleMap = {};

  for (const entry of entries) {
    const eq = entry.indexOf("=");
    if (eq < 0) {
      throw new ConfigError(
        `Invalid layer map entry (expected LAYER=ROLE): ${entry}`
      );
    }

    const layer = entry.slice(0, eq).trim();
    const roleName = entry.slice(eq + 1).trim().toLowerCase();

    if (!layer) {
      throw new ConfigError(`Layer map entry has an empty layer name: ${entry}`);
    }

    const role = BOARD_ROLES.find((r) => r === roleName);
    if (!role) {
      throw new ConfigError(
        `Unknown role "${roleName}" for layer ${layer} (expected one of ${BOARD_ROLES.join(", ")})`
      );
    }

    roleMap[layer] = role;
  }

  return roleMap;
}

/**
 * Simple pattern match helper:
 * - If pattern contains "*" treat as wildcard
 * - Else do case sensitive equality
 */
function matchesPattern(name: string, pattern: string): boolean {
  if (pattern.includes("*")) {
    const regexPattern = "^" + pattern.split("*").map(escapeRegex).join(".*") + "$";
    return new RegExp(regexPattern).test(name);
  }
  return name === pattern;
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
