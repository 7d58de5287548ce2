import {
  DegeneratePath,
  type GeoAnchor,
  type GeoPoint,
  type PathOutline,
  type Point,
  type Polyline,
  type TransformParameters
} from "@gpsart/domain";
import { decodeGpx, encodeGpx, type GpxEncodeOptions } from "@gpsart/gpx";
import { readSvgDrawing } from "@gpsart/svg";
import { flatten, outlineControlPoints } from "./flatten.js";
import { merge } from "./merge.js";
import { meanGeoPoint, polylineBounds, polylineCentroid, polylineLength } from "./metrics.js";
import { defaultProjection, toGeo, toPlanar, type PlanarProjection } from "./projection.js";
import { transform } from "./transform.js";

/** Fraction of the drawing's diagonal used as flattening tolerance by default. */
export const DEFAULT_TOLERANCE_RATIO = 0.001;

export type LoadDrawingOptions = {
  tolerance?: number;
  toleranceRatio?: number;
};

export type LoadedRoute = {
  polyline: Polyline;
  anchor: GeoAnchor;
};

export function drawingTolerance(
  outlines: readonly PathOutline[],
  toleranceRatio = DEFAULT_TOLERANCE_RATIO
) {
  const bounds = polylineBounds(outlines.flatMap(outlineControlPoints));
  const diagonal = bounds ? Math.hypot(bounds.maxX - bounds.minX, bounds.maxY - bounds.minY) : 0;
  return diagonal > 0 ? diagonal * toleranceRatio : toleranceRatio;
}

// Drawings grow y downward; the planar frame grows y northward. Subtracting
// from zero keeps a zero coordinate positive.
function flipY(point: Point): Point {
  return { x: point.x, y: 0 - point.y };
}

export function loadDrawing(source: string | Uint8Array, options: LoadDrawingOptions = {}): Polyline {
  const outlines = readSvgDrawing(source);
  const tolerance = options.tolerance ?? drawingTolerance(outlines, options.toleranceRatio);
  const merged = merge(outlines.map((outline) => flatten(outline, tolerance)));
  return merged.map(flipY);
}

export function loadRoute(
  source: string | Uint8Array,
  projection: PlanarProjection = defaultProjection
): LoadedRoute {
  const points = decodeGpx(source);
  const anchor: GeoAnchor = { geo: meanGeoPoint(points), planar: { x: 0, y: 0 } };
  return { polyline: toPlanar(points, anchor, projection), anchor };
}

export function render(
  polyline: Polyline,
  params: TransformParameters,
  anchor: GeoAnchor,
  projection: PlanarProjection = defaultProjection
): GeoPoint[] {
  return toGeo(transform(polyline, params, anchor.planar), anchor, projection);
}

export function saveRoute(points: readonly GeoPoint[], options?: GpxEncodeOptions): Uint8Array {
  return new TextEncoder().encode(encodeGpx(points, options));
}

/** Pins the polyline's centroid to a geographic location. */
export function anchorPolyline(polyline: Polyline, geo: GeoPoint): GeoAnchor {
  return { geo, planar: polylineCentroid(polyline) };
}

/** Moves a route on the map without touching its planar shape. */
export function moveAnchor(anchor: GeoAnchor, geo: GeoPoint): GeoAnchor {
  return { geo, planar: anchor.planar };
}

/** Parameters under which `render` reproduces the polyline as it is. */
export function identityParameters(polyline: Polyline): TransformParameters {
  const length = polylineLength(polyline);
  if (!(length > 0)) {
    throw new DegeneratePath("Path has zero length.");
  }
  return { rotationDegrees: 0, stretch: 1, targetLengthMeters: length };
}
