import { describe, expect, it } from "vitest";

import {
  arcSegment,
  arcSweep,
  lineSegment,
  normalizeAngle,
  reverseSegment,
  segmentEnd,
  segmentStart,
} from "../../src/geometry/segments";

describe("reverseSegment", () => {
  it("swaps line endpoints", () => {
    const line = lineSegment({ x: 1, y: 2 }, { x: 3, y: 4 });
    expect(reverseSegment(line)).toEqual(lineSegment({ x: 3, y: 4 }, { x: 1, y: 2 }));
  });

  it("swaps arc points and angles but keeps the circle", () => {
    const arc = arcSegment({ x: 0, y: 0 }, 2, 30, 120);
    const rev = reverseSegment(arc);

    expect(segmentStart(rev)).toEqual(arc.endPoint);
    expect(segmentEnd(rev)).toEqual(arc.startPoint);
    expect(rev).toMatchObject({
      center: arc.center,
      radius: 2,
      startAngle: 120,
      endAngle: 30,
      sweep: -90,
    });
  });

  it("is its own inverse", () => {
    const arc = arcSegment({ x: 5, y: -1 }, 3, 200, 10);
    expect(reverseSegment(reverseSegment(arc))).toEqual(arc);
  });
});

describe("arcSegment", () => {
  it("derives endpoints from the angles", () => {
    const arc = arcSegment({ x: 1, y: 1 }, 2, 0, 90);

    expect(arc.startPoint).toEqual({ x: 3, y: 1 });
    expect(arc.endPoint.x).toBeCloseTo(1, 12);
    expect(arc.endPoint.y).toBeCloseTo(3, 12);
  });
});

describe("arcSweep", () => {
  it("is the counter-clockwise span from start to end", () => {
    expect(arcSweep(arcSegment({ x: 0, y: 0 }, 1, 0, 90))).toBe(90);
    expect(arcSweep(arcSegment({ x: 0, y: 0 }, 1, 350, 10))).toBe(20);
    expect(arcSweep(arcSegment({ x: 0, y: 0 }, 1, 90, 0))).toBe(270);
    expect(arcSweep(arcSegment({ x: 0, y: 0 }, 1, 180, 0))).toBe(180);
  });

  it("treats equal angles as a full circle", () => {
    expect(arcSweep(arcSegment({ x: 0, y: 0 }, 1, 30, 30))).toBe(360);
    expect(arcSweep(arcSegment({ x: 0, y: 0 }, 1, 30, 30, false))).toBe(-360);
  });

  it("is negative for clockwise arcs", () => {
    expect(arcSweep(arcSegment({ x: 0, y: 0 }, 1, 90, 0, false))).toBe(-90);
    expect(arcSweep(arcSegment({ x: 0, y: 0 }, 1, 0, 90, false))).toBe(-270);
  });

  it("changes sign when the arc is reversed", () => {
    const half = arcSegment({ x: 0, y: 0 }, 1, 0, 180);
    const rev = reverseSegment(half);
    if (rev.kind !== "arc") throw new Error("expected an arc");

    expect(arcSweep(rev)).toBe(-180);

    const long = reverseSegment(arcSegment({ x: 0, y: 0 }, 1, 45, 315));
    if (long.kind !== "arc") throw new Error("expected an arc");
    expect(arcSweep(long)).toBe(-270);
  });
});

describe("normalizeAngle", () => {
  it("maps into [0, 360)", () => {
    expect(normalizeAngle(-90)).toBe(270);
    expect(normalizeAngle(720)).toBe(0);
    expect(normalizeAngle(45)).toBe(45);
    expect(normalizeAngle(-360)).toBe(0);
  });
});
