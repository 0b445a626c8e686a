import { describe, expect, it } from "vitest";

import {
  parseLengthUnit,
  rawDrawingBounds,
  resolveDrawingScale,
  resolveUnitScale,
  unitFromInsunits,
} from "../../src/core/unit-resolver";
import { ConfigError } from "../../src/core/errors";
import { rectLines } from "../helpers";

describe("resolveUnitScale", () => {
  it("always honours a forced unit", () => {
    expect(resolveUnitScale({ forcedUnit: "in", declaredUnit: "mm", rawExtent: 100000 })).toEqual({
      scale: 25.4,
      source: "forced",
    });
  });

  it("accepts a declared unit that keeps the board under 5 m", () => {
    expect(resolveUnitScale({ declaredUnit: "in", rawExtent: 4 })).toEqual({
      scale: 25.4,
      source: "declared",
    });
    expect(resolveUnitScale({ declaredUnit: "m", rawExtent: 5 })).toEqual({
      scale: 1000,
      source: "declared",
    });
  });

  it("ignores a declared unit that makes the board implausibly large", () => {
    expect(resolveUnitScale({ declaredUnit: "m", rawExtent: 200 })).toEqual({
      scale: 1,
      source: "heuristic-mm",
    });
  });

  it("assumes mils for large undeclared extents", () => {
    expect(resolveUnitScale({ rawExtent: 2000 })).toEqual({
      scale: 0.0254,
      source: "heuristic-mil",
    });
  });

  it("assumes millimeters up to an extent of 500", () => {
    expect(resolveUnitScale({ rawExtent: 500 })).toEqual({ scale: 1, source: "heuristic-mm" });
  });

  it("defaults to millimeters without geometry", () => {
    expect(resolveUnitScale({ rawExtent: 0 })).toEqual({ scale: 1, source: "empty" });
  });
});

describe("resolveDrawingScale", () => {
  it("measures the raw extent from the drawing", () => {
    const drawing = { lines: rectLines(0, 0, 1500, 800) };
    expect(resolveDrawingScale(drawing).source).toBe("heuristic-mil");
  });

  it("uses the header unit code", () => {
    const drawing = { insunits: 1, lines: rectLines(0, 0, 4, 2) };
    expect(resolveDrawingScale(drawing)).toEqual({ scale: 25.4, source: "declared" });
  });

  it("lets a forced unit override the header", () => {
    const drawing = { insunits: 1, lines: rectLines(0, 0, 4, 2) };
    expect(resolveDrawingScale(drawing, "mm")).toEqual({ scale: 1, source: "forced" });
  });
});

describe("rawDrawingBounds", () => {
  it("counts arcs and circles as full circles and splines by control points", () => {
    const bb = rawDrawingBounds({
      arcs: [{ center: { x: 0, y: 0 }, radius: 2, startAngle: 0, endAngle: 90, layer: "0" }],
      circles: [{ center: { x: 10, y: 0 }, radius: 1, layer: "0" }],
      splines: [{ controlPoints: [{ x: 5, y: 7 }], layer: "0" }],
    });
    expect(bb).toEqual({ min: { x: -2, y: -2 }, max: { x: 11, y: 7 } });
  });

  it("is null for an empty drawing", () => {
    expect(rawDrawingBounds({})).toBeNull();
  });
});

describe("unitFromInsunits", () => {
  it("maps known header codes", () => {
    expect(unitFromInsunits(1)).toBe("in");
    expect(unitFromInsunits(4)).toBe("mm");
    expect(unitFromInsunits(6)).toBe("m");
  });

  it("leaves unitless and unknown codes undefined", () => {
    expect(unitFromInsunits(0)).toBeUndefined();
    expect(unitFromInsunits(3)).toBeUndefined();
    expect(unitFromInsunits(undefined)).toBeUndefined();
  });
});

describe("parseLengthUnit", () => {
  it("accepts unit names in any case", () => {
    expect(parseLengthUnit("MM")).toBe("mm");
    expect(parseLengthUnit(" mil ")).toBe("mil");
    expect(parseLengthUnit("Inch")).toBe("in");
  });

  it("accepts both micro signs", () => {
    expect(parseLengthUnit("\u00b5m")).toBe("um");
    expect(parseLengthUnit("\u03bcin")).toBe("uin");
  });

  it("rejects unknown units", () => {
    expect(() => parseLengthUnit("furlong")).toThrow(ConfigError);
    expect(() => parseLengthUnit("furlong")).toThrow('Unknown unit "furlong"');
  });
});
