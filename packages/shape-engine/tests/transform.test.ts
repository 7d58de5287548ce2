import { describe, expect, it } from "vitest";
import { DegeneratePath, InvalidParameters, type Point, type Polyline } from "@gpsart/domain";
import { polylineLength } from "../src/metrics.js";
import { transform } from "../src/transform.js";

const square: Polyline = [
  { x: 0, y: 0 },
  { x: 10, y: 0 },
  { x: 10, y: 10 },
  { x: 0, y: 10 },
  { x: 0, y: 0 }
];

function expectPointsClose(actual: Polyline, expected: readonly Point[]) {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((point, index) => {
    expect(point.x).toBeCloseTo(expected[index].x, 9);
    expect(point.y).toBeCloseTo(expected[index].y, 9);
  });
}

describe("transform", () => {
  it("scales to the target length about the anchor", () => {
    const result = transform(square, { rotationDegrees: 0, targetLengthMeters: 4000, stretch: 1 }, { x: 0, y: 0 });
    expect(result).toEqual([
      { x: 0, y: 0 },
      { x: 1000, y: 0 },
      { x: 1000, y: 1000 },
      { x: 0, y: 1000 },
      { x: 0, y: 0 }
    ]);
  });

  it("hits the target length for any rotation and stretch", () => {
    const zigzag = [
      { x: 3, y: -1 },
      { x: 7, y: 4 },
      { x: 11, y: -2 },
      { x: 16, y: 6 }
    ];
    const result = transform(zigzag, { rotationDegrees: 33, targetLengthMeters: 2500, stretch: 1.7 }, { x: 5, y: 5 });
    expect(polylineLength(result)).toBeCloseTo(2500, 6);
  });

  it("rotates counter-clockwise before stretching the x axis", () => {
    const corner = [
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 }
    ];
    const result = transform(corner, { rotationDegrees: 90, targetLengthMeters: 30, stretch: 2 }, { x: 0, y: 0 });
    expectPointsClose(result, [
      { x: 0, y: 0 },
      { x: 0, y: 10 },
      { x: -20, y: 10 }
    ]);
  });

  it("returns the input shape after a full turn at its own length", () => {
    const result = transform(
      square,
      { rotationDegrees: 360, targetLengthMeters: polylineLength(square), stretch: 1 },
      { x: 3, y: 4 }
    );
    expectPointsClose(result, square);
  });

  it("leaves the anchor point fixed", () => {
    const result = transform(square, { rotationDegrees: 45, targetLengthMeters: 123, stretch: 0.5 }, { x: 10, y: 10 });
    expect(result[2]).toEqual({ x: 10, y: 10 });
  });

  it("does not modify its input", () => {
    const input = [
      { x: 1, y: 1 },
      { x: 2, y: 3 }
    ];
    transform(input, { rotationDegrees: 10, targetLengthMeters: 50, stretch: 2 }, { x: 0, y: 0 });
    expect(input).toEqual([
      { x: 1, y: 1 },
      { x: 2, y: 3 }
    ]);
  });

  it("rejects paths without length", () => {
    const params = { rotationDegrees: 0, targetLengthMeters: 100, stretch: 1 };
    expect(() => transform([{ x: 1, y: 1 }], params, { x: 0, y: 0 })).toThrow(DegeneratePath);
    expect(() => transform([], params, { x: 0, y: 0 })).toThrow(DegeneratePath);
  });

  it("rejects non-positive or non-finite parameters", () => {
    const anchor = { x: 0, y: 0 };
    expect(() => transform(square, { rotationDegrees: 0, targetLengthMeters: 0, stretch: 1 }, anchor)).toThrow(
      InvalidParameters
    );
    expect(() => transform(square, { rotationDegrees: 0, targetLengthMeters: -5, stretch: 1 }, anchor)).toThrow(
      InvalidParameters
    );
    expect(() => transform(square, { rotationDegrees: 0, targetLengthMeters: 10, stretch: 0 }, anchor)).toThrow(
      "Stretch must be a positive ratio, got 0."
    );
    expect(() =>
      transform(square, { rotationDegrees: Number.NaN, targetLengthMeters: 10, stretch: 1 }, anchor)
    ).toThrow(InvalidParameters);
  });
});
