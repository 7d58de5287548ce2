export * from "./errors.js";

export type Point = {
  x: number;
  y: number;
};

/** Ordered points, at least one, with no two consecutive points equal. */
export type Polyline = readonly Point[];

export type GeoPoint = {
  lat: number;
  lon: number;
};

export type GeoAnchor = {
  geo: GeoPoint;
  planar: Point;
};

export type TransformParameters = {
  rotationDegrees: number;
  targetLengthMeters: number;
  stretch: number;
};

/** SVG matrix convention: x' = a·x + c·y + e, y' = b·x + d·y + f. */
export type AffineMatrix = {
  a: number;
  b: number;
  c: number;
  d: number;
  e: number;
  f: number;
};

export type PathCommand =
  | { type: "move"; to: Point }
  | { type: "line"; to: Point }
  | { type: "quadratic"; control: Point; to: Point }
  | { type: "cubic"; control1: Point; control2: Point; to: Point }
  | {
      type: "arc";
      rx: number;
      ry: number;
      xAxisRotation: number;
      largeArc: boolean;
      sweep: boolean;
      to: Point;
    }
  | { type: "close" };

export type PathOutline = {
  commands: readonly PathCommand[];
  transform?: AffineMatrix;
};
