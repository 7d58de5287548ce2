import { geoLength } from "d3-geo";
import type { GeoPoint, Point, Polyline } from "@gpsart/domain";

/** Mean Earth radius (IUGG), shared by every projection and distance estimate. */
export const EARTH_RADIUS_METERS = 6_371_008.8;

export type PlanarBounds = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
};

export function distance(a: Point, b: Point) {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function pointsEqual(a: Point, b: Point) {
  return a.x === b.x && a.y === b.y;
}

export function dropConsecutiveDuplicates(points: readonly Point[]): Point[] {
  return points.filter((point, index) => index === 0 || !pointsEqual(point, points[index - 1]));
}

export function polylineLength(polyline: Polyline) {
  let total = 0;
  for (let i = 1; i < polyline.length; i += 1) {
    total += distance(polyline[i - 1], polyline[i]);
  }
  return total;
}

export function polylineCentroid(polyline: Polyline): Point {
  if (polyline.length === 0) {
    return { x: 0, y: 0 };
  }
  const sum = polyline.reduce((acc, point) => ({ x: acc.x + point.x, y: acc.y + point.y }), {
    x: 0,
    y: 0
  });
  return { x: sum.x / polyline.length, y: sum.y / polyline.length };
}

export function polylineBounds(points: readonly Point[]): PlanarBounds | undefined {
  if (points.length === 0) {
    return undefined;
  }
  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;
  for (const point of points) {
    minX = Math.min(minX, point.x);
    minY = Math.min(minY, point.y);
    maxX = Math.max(maxX, point.x);
    maxY = Math.max(maxY, point.y);
  }
  return { minX, minY, maxX, maxY };
}

export function meanGeoPoint(points: readonly GeoPoint[]): GeoPoint {
  if (points.length === 0) {
    return { lat: 0, lon: 0 };
  }
  const sum = points.reduce((acc, point) => ({ lat: acc.lat + point.lat, lon: acc.lon + point.lon }), {
    lat: 0,
    lon: 0
  });
  return { lat: sum.lat / points.length, lon: sum.lon / points.length };
}

/** Great-circle length of a geographic route on a sphere of mean Earth radius. */
export function routeDistanceMeters(points: readonly GeoPoint[]) {
  if (points.length < 2) {
    return 0;
  }
  return (
    geoLength({
      type: "LineString",
      coordinates: points.map((point) => [point.lon, point.lat])
    }) * EARTH_RADIUS_METERS
  );
}
