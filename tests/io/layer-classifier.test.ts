import { describe, expect, it } from "vitest";

import {
  detectLayerRole,
  lookupLayerRole,
  parseRoleMapEntries,
} from "../../src/io/layer-classifier";
import { ConfigError } from "../../src/core/errors";

describe("detectLayerRole", () => {
  it("recognises common layer names", () => {
    expect(detectLayerRole("Board_Outline")).toBe("outline");
    expect(detectLayerRole("Edge.Cuts")).toBe("outline");
    expect(detectLayerRole("SLOTS")).toBe("cutout");
    expect(detectLayerRole("MOUNTING_HOLES")).toBe("hole");
    expect(detectLayerRole("Keep-Out Area")).toBe("keepout");
    expect(detectLayerRole("F.Mask")).toBe("soldermask");
    expect(detectLayerRole("DIMENSIONS")).toBe("annotation");
  });

  it("checks roles in a fixed order", () => {
    expect(detectLayerRole("board_mask")).toBe("outline");
  });

  it("returns null when nothing matches", () => {
    expect(detectLayerRole("0")).toBeNull();
    expect(detectLayerRole("Layer1")).toBeNull();
  });
});

describe("lookupLayerRole", () => {
  const roleMap = { EDGE: "outline", "MH_*": "hole" } as const;

  it("matches exact names case sensitively", () => {
    expect(lookupLayerRole("EDGE", roleMap)).toBe("outline");
    expect(lookupLayerRole("edge", roleMap)).toBeNull();
  });

  it("matches wildcard patterns", () => {
    expect(lookupLayerRole("MH_1", roleMap)).toBe("hole");
    expect(lookupLayerRole("XMH_1", roleMap)).toBeNull();
  });

  it("returns null for unmapped layers", () => {
    expect(lookupLayerRole("OTHER", roleMap)).toBeNull();
  });
});

describe("parseRoleMapEntries", () => {
  it("builds a map from LAYER=role entries", () => {
    expect(parseRoleMapEntries(["OUTER=outline", "INNER = Hole"])).toEqual({
      OUTER: "outline",
      INNER: "hole",
    });
  });

  it("keeps the last entry for a repeated layer", () => {
    expect(parseRoleMapEntries(["A=cutout", "A=keepout"])).toEqual({ A: "keepout" });
  });

  it("rejects malformed entries", () => {
    expect(() => parseRoleMapEntries(["OUTER"])).toThrow(ConfigError);
    expect(() => parseRoleMapEntries(["=outline"])).toThrow(
      "Layer map entry has an empty layer name: =outline"
    );
  });

  it("rejects unknown roles", () => {
    expect(() => parseRoleMapEntries(["X=silkscreen"])).toThrow('Unknown role "silkscreen" for layer X');
  });
});
