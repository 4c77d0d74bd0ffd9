import { describe, expect, it } from "vitest";
import { Point } from "../Point";

describe("Point", () => {
  it("reports an upright pen for zero tilt", () => {
    const point = new Point();
    expect(point.azimuthDeg).toBe(0);
    expect(point.altitudeDeg).toBeCloseTo(90);
  });

  it("derives azimuth and altitude from a single-axis tilt", () => {
    const towardY = new Point({ tiltYDeg: 30 });
    expect(towardY.azimuthDeg).toBeCloseTo(90);
    expect(towardY.altitudeDeg).toBeCloseTo(60);

    const towardNegX = new Point({ tiltXDeg: -45 });
    expect(towardNegX.azimuthDeg).toBeCloseTo(180);
    expect(towardNegX.altitudeDeg).toBeCloseTo(45);
  });

  it("clamps and wraps out-of-range values", () => {
    const point = new Point({ pressure: 1.5, twistDeg: -90, tiltXDeg: 120 });
    expect(point.pressure).toBe(1);
    expect(point.twistDeg).toBe(270);
    expect(point.tiltXDeg).toBe(90);
    expect(point.altitudeDeg).toBe(0);
  });

  it("uses the position as the precise position by default", () => {
    const point = new Point({ position: { x: 3, y: 4 } });
    expect(point.precisePosition).toEqual({ x: 3, y: 4 });
  });

  it("copies with a patch", () => {
    const point = new Point({ position: { x: 1, y: 2 }, pressure: 0.25, tiltYDeg: 30 });
    const next = point.with({ pressure: 0.75 });
    expect(next.pressure).toBe(0.75);
    expect(next.position).toEqual({ x: 1, y: 2 });
    expect(next.altitudeDeg).toBeCloseTo(60);
    expect(point.pressure).toBe(0.25);
  });
});
