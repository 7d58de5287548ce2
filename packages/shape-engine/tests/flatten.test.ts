import { describe, expect, it } from "vitest";
import { InvalidParameters, ParseError, type PathOutline, type Point, type Polyline } from "@gpsart/domain";
import { arcGeometry, distanceToSegment, flatten, pointOnArc } from "../src/flatten.js";

function distanceToPolyline(point: Point, polyline: Polyline) {
  let nearest = Number.POSITIVE_INFINITY;
  for (let i = 1; i < polyline.length; i += 1) {
    nearest = Math.min(nearest, distanceToSegment(point, polyline[i - 1], polyline[i]));
  }
  return nearest;
}

function cubicAt(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  const u = 1 - t;
  return {
    x: u * u * u * p0.x + 3 * u * u * t * p1.x + 3 * u * t * t * p2.x + t * t * t * p3.x,
    y: u * u * u * p0.y + 3 * u * u * t * p1.y + 3 * u * t * t * p2.y + t * t * t * p3.y
  };
}

function quadraticAt(p0: Point, p1: Point, p2: Point, t: number): Point {
  const u = 1 - t;
  return {
    x: u * u * p0.x + 2 * u * t * p1.x + t * t * p2.x,
    y: u * u * p0.y + 2 * u * t * p1.y + t * t * p2.y
  };
}

const samples = Array.from({ length: 1001 }, (_, i) => i / 1000);

describe("flatten", () => {
  it("keeps straight outlines exactly and closes them at the start", () => {
    const outline: PathOutline = {
      commands: [
        { type: "move", to: { x: 0, y: 0 } },
        { type: "line", to: { x: 10, y: 0 } },
        { type: "line", to: { x: 10, y: 10 } },
        { type: "line", to: { x: 0, y: 10 } },
        { type: "close" }
      ]
    };

    expect(flatten(outline, 0.01)).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 },
      { x: 0, y: 10 },
      { x: 0, y: 0 }
    ]);
  });

  it("does not repeat the start when the outline already returned to it", () => {
    const outline: PathOutline = {
      commands: [
        { type: "move", to: { x: 0, y: 0 } },
        { type: "line", to: { x: 5, y: 0 } },
        { type: "line", to: { x: 5, y: 5 } },
        { type: "line", to: { x: 0, y: 0 } },
        { type: "close" }
      ]
    };

    expect(flatten(outline, 0.01)).toEqual([
      { x: 0, y: 0 },
      { x: 5, y: 0 },
      { x: 5, y: 5 },
      { x: 0, y: 0 }
    ]);
  });

  it("drops repeated points", () => {
    const outline: PathOutline = {
      commands: [
        { type: "move", to: { x: 1, y: 1 } },
        { type: "line", to: { x: 1, y: 1 } },
        { type: "line", to: { x: 2, y: 1 } }
      ]
    };

    expect(flatten(outline, 0.5)).toEqual([
      { x: 1, y: 1 },
      { x: 2, y: 1 }
    ]);
  });

  it("keeps a cubic curve within tolerance", () => {
    const p0 = { x: 0, y: 0 };
    const p1 = { x: 0, y: 100 };
    const p2 = { x: 100, y: 100 };
    const p3 = { x: 100, y: 0 };
    const tolerance = 0.05;
    const polyline = flatten(
      {
        commands: [
          { type: "move", to: p0 },
          { type: "cubic", control1: p1, control2: p2, to: p3 }
        ]
      },
      tolerance
    );

    expect(polyline[0]).toEqual(p0);
    expect(polyline[polyline.length - 1]).toEqual(p3);
    expect(polyline.length).toBeGreaterThan(10);
    for (const t of samples) {
      expect(distanceToPolyline(cubicAt(p0, p1, p2, p3, t), polyline)).toBeLessThanOrEqual(tolerance + 1e-9);
    }
  });

  it("keeps a quadratic curve within tolerance", () => {
    const p0 = { x: -20, y: 5 };
    const p1 = { x: 0, y: 60 };
    const p2 = { x: 20, y: 5 };
    const tolerance = 0.02;
    const polyline = flatten(
      {
        commands: [
          { type: "move", to: p0 },
          { type: "quadratic", control: p1, to: p2 }
        ]
      },
      tolerance
    );

    for (const t of samples) {
      expect(distanceToPolyline(quadraticAt(p0, p1, p2, t), polyline)).toBeLessThanOrEqual(tolerance + 1e-9);
    }
  });

  it("follows a circular arc on the swept side", () => {
    const tolerance = 0.01;
    const polyline = flatten(
      {
        commands: [
          { type: "move", to: { x: 0, y: 0 } },
          {
            type: "arc",
            rx: 5,
            ry: 5,
            xAxisRotation: 0,
            largeArc: false,
            sweep: true,
            to: { x: 10, y: 0 }
          }
        ]
      },
      tolerance
    );

    // 2 * acos(1 - 0.01 / 5) allows 25 steps over half a turn.
    expect(polyline).toHaveLength(26);
    expect(polyline[polyline.length - 1]).toEqual({ x: 10, y: 0 });
    for (const point of polyline) {
      expect(Math.hypot(point.x - 5, point.y)).toBeCloseTo(5, 9);
      expect(point.y).toBeLessThanOrEqual(1e-9);
    }
    for (const t of samples) {
      const angle = Math.PI + Math.PI * t;
      const onArc = { x: 5 + 5 * Math.cos(angle), y: 5 * Math.sin(angle) };
      expect(distanceToPolyline(onArc, polyline)).toBeLessThanOrEqual(tolerance + 1e-9);
    }
  });

  it("keeps a rotated elliptical arc within tolerance", () => {
    const start = { x: 0, y: 0 };
    const arc = {
      type: "arc",
      rx: 20,
      ry: 8,
      xAxisRotation: 30,
      largeArc: true,
      sweep: false,
      to: { x: 25, y: 10 }
    } as const;
    const geometry = arcGeometry(start, arc);
    if (!geometry) {
      throw new Error("arc should have a center parameterisation");
    }
    const first = pointOnArc(geometry, geometry.startAngle);
    const last = pointOnArc(geometry, geometry.startAngle + geometry.sweepAngle);
    expect(first.x).toBeCloseTo(0, 9);
    expect(first.y).toBeCloseTo(0, 9);
    expect(last.x).toBeCloseTo(25, 9);
    expect(last.y).toBeCloseTo(10, 9);
    expect(Math.abs(geometry.sweepAngle)).toBeGreaterThan(Math.PI);

    const tolerance = 0.01;
    const polyline = flatten({ commands: [{ type: "move", to: start }, arc] }, tolerance);

    expect(polyline[polyline.length - 1]).toEqual({ x: 25, y: 10 });
    for (const t of samples) {
      const onArc = pointOnArc(geometry, geometry.startAngle + geometry.sweepAngle * t);
      expect(distanceToPolyline(onArc, polyline)).toBeLessThanOrEqual(tolerance + 1e-9);
    }
  });

  it("treats an arc with a zero radius as a straight line", () => {
    const polyline = flatten(
      {
        commands: [
          { type: "move", to: { x: 0, y: 0 } },
          { type: "arc", rx: 0, ry: 4, xAxisRotation: 0, largeArc: true, sweep: true, to: { x: 10, y: 0 } }
        ]
      },
      0.1
    );
    expect(polyline).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 }
    ]);
  });

  it("applies the outline transform", () => {
    const polyline = flatten(
      {
        commands: [
          { type: "move", to: { x: 0, y: 0 } },
          { type: "line", to: { x: 1, y: 0 } }
        ],
        transform: { a: 2, b: 0, c: 0, d: 2, e: 1, f: 1 }
      },
      0.1
    );
    expect(polyline).toEqual([
      { x: 1, y: 1 },
      { x: 3, y: 1 }
    ]);
  });

  it("measures tolerance after the transform", () => {
    const scale = 10;
    const p0 = { x: 0, y: 0 };
    const p1 = { x: 0, y: 10 };
    const p2 = { x: 10, y: 10 };
    const p3 = { x: 10, y: 0 };
    const tolerance = 0.05;
    const polyline = flatten(
      {
        commands: [
          { type: "move", to: p0 },
          { type: "cubic", control1: p1, control2: p2, to: p3 }
        ],
        transform: { a: scale, b: 0, c: 0, d: scale, e: 0, f: 0 }
      },
      tolerance
    );

    for (const t of samples) {
      const local = cubicAt(p0, p1, p2, p3, t);
      const mapped = { x: local.x * scale, y: local.y * scale };
      expect(distanceToPolyline(mapped, polyline)).toBeLessThanOrEqual(tolerance + 1e-9);
    }
  });

  it("rejects invalid outlines and tolerances", () => {
    const line: PathOutline = {
      commands: [
        { type: "move", to: { x: 0, y: 0 } },
        { type: "line", to: { x: 1, y: 0 } }
      ]
    };

    expect(() => flatten(line, 0)).toThrow(InvalidParameters);
    expect(() => flatten(line, Number.NaN)).toThrow(InvalidParameters);
    expect(() => flatten({ commands: [] }, 1)).toThrow(ParseError);
    expect(() => flatten({ commands: [{ type: "line", to: { x: 1, y: 1 } }] }, 1)).toThrow(
      "Outline must start with a move command."
    );
    expect(() =>
      flatten({ commands: [...line.commands, { type: "move", to: { x: 4, y: 4 } }] }, 1)
    ).toThrow(ParseError);
    expect(() =>
      flatten({ commands: [...line.commands, { type: "line", to: { x: Number.POSITIVE_INFINITY, y: 0 } }] }, 1)
    ).toThrow("Outline contains a non-finite coordinate.");
  });
});
