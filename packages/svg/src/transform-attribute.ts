import { ParseError, type AffineMatrix, type Point } from "@gpsart/domain";

export const IDENTITY_MATRIX: AffineMatrix = { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 };

const TRANSFORM_PATTERN = /\s*,?\s*([A-Za-z]+)\s*\(([^)]*)\)\s*/y;
const ARGUMENT_PATTERN = /[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/g;
const SEPARATORS_ONLY = /^[\s,]*$/;

/** Returns the matrix applying `second` first, then `first`. */
export function multiplyMatrices(first: AffineMatrix, second: AffineMatrix): AffineMatrix {
  return {
    a: first.a * second.a + first.c * second.b,
    b: first.b * second.a + first.d * second.b,
    c: first.a * second.c + first.c * second.d,
    d: first.b * second.c + first.d * second.d,
    e: first.a * second.e + first.c * second.f + first.e,
    f: first.b * second.e + first.d * second.f + first.f
  };
}

export function applyMatrix(matrix: AffineMatrix, point: Point): Point {
  return {
    x: matrix.a * point.x + matrix.c * point.y + matrix.e,
    y: matrix.b * point.x + matrix.d * point.y + matrix.f
  };
}

export function isIdentityMatrix(matrix: AffineMatrix) {
  return (
    matrix.a === 1 &&
    matrix.b === 0 &&
    matrix.c === 0 &&
    matrix.d === 1 &&
    matrix.e === 0 &&
    matrix.f === 0
  );
}

function degreesToRadians(degrees: number) {
  return (degrees * Math.PI) / 180;
}

function rotation(degrees: number, cx = 0, cy = 0): AffineMatrix {
  const radians = degreesToRadians(degrees);
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  const rotate: AffineMatrix = { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 };
  if (cx === 0 && cy === 0) {
    return rotate;
  }
  return multiplyMatrices(
    multiplyMatrices({ ...IDENTITY_MATRIX, e: cx, f: cy }, rotate),
    { ...IDENTITY_MATRIX, e: -cx, f: -cy }
  );
}

function toMatrix(name: string, args: number[]): AffineMatrix | undefined {
  switch (name) {
    case "matrix":
      if (args.length !== 6) return undefined;
      return { a: args[0], b: args[1], c: args[2], d: args[3], e: args[4], f: args[5] };
    case "translate":
      if (args.length !== 1 && args.length !== 2) return undefined;
      return { ...IDENTITY_MATRIX, e: args[0], f: args[1] ?? 0 };
    case "scale":
      if (args.length !== 1 && args.length !== 2) return undefined;
      return { ...IDENTITY_MATRIX, a: args[0], d: args[1] ?? args[0] };
    case "rotate":
      if (args.length === 1) return rotation(args[0]);
      if (args.length === 3) return rotation(args[0], args[1], args[2]);
      return undefined;
    case "skewX":
      if (args.length !== 1) return undefined;
      return { ...IDENTITY_MATRIX, c: Math.tan(degreesToRadians(args[0])) };
    case "skewY":
      if (args.length !== 1) return undefined;
      return { ...IDENTITY_MATRIX, b: Math.tan(degreesToRadians(args[0])) };
    default:
      return undefined;
  }
}

/** Parses an SVG `transform` attribute into a single matrix. */
export function parseTransformList(value: string): AffineMatrix {
  let matrix = IDENTITY_MATRIX;
  let offset = 0;
  const source = value.trim();

  while (offset < source.length) {
    TRANSFORM_PATTERN.lastIndex = offset;
    const match = TRANSFORM_PATTERN.exec(source);
    if (!match) {
      throw new ParseError(`Malformed transform '${value}'.`);
    }
    const [, name, rawArgs] = match;
    if (!SEPARATORS_ONLY.test(rawArgs.replace(ARGUMENT_PATTERN, " "))) {
      throw new ParseError(`Invalid transform function '${name}(${rawArgs.trim()})'.`);
    }
    const args = (rawArgs.match(ARGUMENT_PATTERN) ?? []).map(Number);
    const next = toMatrix(name, args);
    if (!next || args.some((arg) => !Number.isFinite(arg))) {
      throw new ParseError(`Invalid transform function '${name}(${rawArgs.trim()})'.`);
    }
    matrix = multiplyMatrices(matrix, next);
    offset = TRANSFORM_PATTERN.lastIndex;
  }

  return matrix;
}
