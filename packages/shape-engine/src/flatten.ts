import {
  InvalidParameters,
  ParseError,
  type AffineMatrix,
  type PathCommand,
  type PathOutline,
  type Point,
  type Polyline
} from "@gpsart/domain";
import { applyMatrix } from "@gpsart/svg";
import { distance, dropConsecutiveDuplicates, pointsEqual } from "./metrics.js";

const MAX_SUBDIVISION_DEPTH = 18;
const MAX_ARC_SEGMENTS = 1 << 16;

function midpoint(a: Point, b: Point): Point {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

export function distanceToSegment(point: Point, start: Point, end: Point) {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const lengthSquared = dx * dx + dy * dy;
  if (lengthSquared === 0) {
    return distance(point, start);
  }
  const t = Math.max(
    0,
    Math.min(1, ((point.x - start.x) * dx + (point.y - start.y) * dy) / lengthSquared)
  );
  return distance(point, { x: start.x + t * dx, y: start.y + t * dy });
}

// A Bézier curve lies inside the hull of its control points, so once every
// control point is within tolerance of the chord the whole piece is too.
function flattenQuadratic(
  start: Point,
  control: Point,
  end: Point,
  tolerance: number,
  out: Point[],
  depth = 0
) {
  if (depth >= MAX_SUBDIVISION_DEPTH || distanceToSegment(control, start, end) <= tolerance) {
    out.push(end);
    return;
  }
  const left = midpoint(start, control);
  const right = midpoint(control, end);
  const split = midpoint(left, right);
  flattenQuadratic(start, left, split, tolerance, out, depth + 1);
  flattenQuadratic(split, right, end, tolerance, out, depth + 1);
}

function flattenCubic(
  start: Point,
  control1: Point,
  control2: Point,
  end: Point,
  tolerance: number,
  out: Point[],
  depth = 0
) {
  if (
    depth >= MAX_SUBDIVISION_DEPTH ||
    (distanceToSegment(control1, start, end) <= tolerance &&
      distanceToSegment(control2, start, end) <= tolerance)
  ) {
    out.push(end);
    return;
  }
  const a = midpoint(start, control1);
  const b = midpoint(control1, control2);
  const c = midpoint(control2, end);
  const ab = midpoint(a, b);
  const bc = midpoint(b, c);
  const split = midpoint(ab, bc);
  flattenCubic(start, a, ab, split, tolerance, out, depth + 1);
  flattenCubic(split, bc, c, end, tolerance, out, depth + 1);
}

function vectorAngle(ux: number, uy: number, vx: number, vy: number) {
  return Math.atan2(ux * vy - uy * vx, ux * vx + uy * vy);
}

type ArcCommand = Extract<PathCommand, { type: "arc" }>;

export type ArcGeometry = {
  center: Point;
  rx: number;
  ry: number;
  phi: number;
  startAngle: number;
  sweepAngle: number;
};

/** Endpoint to center parameterisation of an SVG elliptical arc. */
export function arcGeometry(start: Point, arc: ArcCommand): ArcGeometry | undefined {
  let rx = Math.abs(arc.rx);
  let ry = Math.abs(arc.ry);
  if (rx === 0 || ry === 0 || pointsEqual(start, arc.to)) {
    return undefined;
  }

  const phi = (arc.xAxisRotation * Math.PI) / 180;
  const cosPhi = Math.cos(phi);
  const sinPhi = Math.sin(phi);
  const halfDx = (start.x - arc.to.x) / 2;
  const halfDy = (start.y - arc.to.y) / 2;
  const x1 = cosPhi * halfDx + sinPhi * halfDy;
  const y1 = -sinPhi * halfDx + cosPhi * halfDy;

  const lambda = (x1 * x1) / (rx * rx) + (y1 * y1) / (ry * ry);
  if (lambda > 1) {
    const grow = Math.sqrt(lambda);
    rx *= grow;
    ry *= grow;
  }

  const numerator = rx * rx * ry * ry - rx * rx * y1 * y1 - ry * ry * x1 * x1;
  const denominator = rx * rx * y1 * y1 + ry * ry * x1 * x1;
  const sign = arc.largeArc !== arc.sweep ? 1 : -1;
  const coefficient = sign * Math.sqrt(Math.max(0, numerator / denominator));
  const cx1 = (coefficient * rx * y1) / ry;
  const cy1 = (-coefficient * ry * x1) / rx;

  const center = {
    x: cosPhi * cx1 - sinPhi * cy1 + (start.x + arc.to.x) / 2,
    y: sinPhi * cx1 + cosPhi * cy1 + (start.y + arc.to.y) / 2
  };

  const ux = (x1 - cx1) / rx;
  const uy = (y1 - cy1) / ry;
  const vx = (-x1 - cx1) / rx;
  const vy = (-y1 - cy1) / ry;
  const startAngle = vectorAngle(1, 0, ux, uy);
  let sweepAngle = vectorAngle(ux, uy, vx, vy);
  if (!arc.sweep && sweepAngle > 0) {
    sweepAngle -= 2 * Math.PI;
  } else if (arc.sweep && sweepAngle < 0) {
    sweepAngle += 2 * Math.PI;
  }

  return { center, rx, ry, phi, startAngle, sweepAngle };
}

export function pointOnArc(geometry: ArcGeometry, angle: number): Point {
  const cosPhi = Math.cos(geometry.phi);
  const sinPhi = Math.sin(geometry.phi);
  const ex = geometry.rx * Math.cos(angle);
  const ey = geometry.ry * Math.sin(angle);
  return {
    x: geometry.center.x + ex * cosPhi - ey * sinPhi,
    y: geometry.center.y + ex * sinPhi + ey * cosPhi
  };
}

// The ellipse is a linear image of a circle of radius max(rx, ry) at most, so
// keeping each step's circular sagitta under tolerance bounds the chord error.
function flattenArc(start: Point, arc: ArcCommand, tolerance: number, out: Point[]) {
  const geometry = arcGeometry(start, arc);
  if (!geometry) {
    if (!pointsEqual(start, arc.to)) {
      out.push(arc.to);
    }
    return;
  }

  const radius = Math.max(geometry.rx, geometry.ry);
  const maxStep = 2 * Math.acos(1 - Math.min(1, tolerance / radius));
  const segments = Math.min(
    MAX_ARC_SEGMENTS,
    Math.max(1, Math.ceil(Math.abs(geometry.sweepAngle) / maxStep))
  );
  for (let i = 1; i < segments; i += 1) {
    out.push(pointOnArc(geometry, geometry.startAngle + (geometry.sweepAngle * i) / segments));
  }
  out.push(arc.to);
}

function commandPoints(command: PathCommand): Point[] {
  switch (command.type) {
    case "move":
    case "line":
    case "arc":
      return [command.to];
    case "quadratic":
      return [command.control, command.to];
    case "cubic":
      return [command.control1, command.control2, command.to];
    case "close":
      return [];
  }
}

/** Upper bound on how much a matrix can stretch a length. */
export function matrixStretchBound(matrix: AffineMatrix) {
  return Math.hypot(matrix.a, matrix.b, matrix.c, matrix.d);
}

/** Every coordinate an outline mentions, mapped through its transform. */
export function outlineControlPoints(outline: PathOutline): Point[] {
  const points = outline.commands.flatMap(commandPoints);
  const matrix = outline.transform;
  return matrix ? points.map((point) => applyMatrix(matrix, point)) : points;
}

/**
 * Flattens one outline into straight segments whose distance to the true
 * curve never exceeds `tolerance` (in the outline's output units).
 */
export function flatten(outline: PathOutline, tolerance: number): Polyline {
  if (!Number.isFinite(tolerance) || tolerance <= 0) {
    throw new InvalidParameters(`Flattening tolerance must be a positive number, got ${tolerance}.`);
  }

  const [first, ...rest] = outline.commands;
  if (!first || first.type !== "move") {
    throw new ParseError("Outline must start with a move command.");
  }
  const invalid = outline.commands
    .flatMap(commandPoints)
    .some((point) => !Number.isFinite(point.x) || !Number.isFinite(point.y));
  if (invalid) {
    throw new ParseError("Outline contains a non-finite coordinate.");
  }

  const matrix = outline.transform;
  const stretch = matrix ? matrixStretchBound(matrix) : 1;
  const localTolerance = stretch > 0 ? tolerance / stretch : tolerance;

  const start = first.to;
  const points: Point[] = [start];
  let current = start;

  for (const command of rest) {
    switch (command.type) {
      case "move":
        throw new ParseError("Outline contains more than one subpath.");
      case "line":
        points.push(command.to);
        break;
      case "quadratic":
        flattenQuadratic(current, command.control, command.to, localTolerance, points);
        break;
      case "cubic":
        flattenCubic(current, command.control1, command.control2, command.to, localTolerance, points);
        break;
      case "arc":
        flattenArc(current, command, localTolerance, points);
        break;
      case "close":
        if (distance(current, start) > localTolerance) {
          points.push(start);
        }
        break;
    }
    current = command.type === "close" ? start : command.to;
  }

  const mapped = matrix ? points.map((point) => applyMatrix(matrix, point)) : points;
  return dropConsecutiveDuplicates(mapped);
}
