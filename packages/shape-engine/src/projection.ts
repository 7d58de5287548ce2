import { geoAzimuthalEquidistant } from "d3-geo";
import {
  InvalidAnchor,
  type GeoAnchor,
  type GeoPoint,
  type Point,
  type Polyline
} from "@gpsart/domain";
import { EARTH_RADIUS_METERS, dropConsecutiveDuplicates } from "./metrics.js";

/**
 * Maps planar meters (x east, y north) around an anchor to geographic
 * coordinates and back. The anchor has already been validated.
 */
export interface PlanarProjection {
  readonly name: string;
  project(polyline: Polyline, anchor: GeoAnchor): GeoPoint[];
  unproject(points: readonly GeoPoint[], anchor: GeoAnchor): Point[];
}

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;
const toDegrees = (radians: number) => (radians * 180) / Math.PI;

function wrapLongitudeDelta(delta: number) {
  if (delta > 180) return delta - 360;
  if (delta < -180) return delta + 360;
  return delta;
}

/**
 * Local tangent-plane approximation. Accurate for city-scale drawings; the
 * error grows with extent and with distance of the anchor from the equator.
 */
export class EquirectangularProjection implements PlanarProjection {
  readonly name = "equirectangular";

  constructor(private readonly radiusMeters = EARTH_RADIUS_METERS) {}

  project(polyline: Polyline, anchor: GeoAnchor): GeoPoint[] {
    const parallelRadius = this.radiusMeters * Math.cos(toRadians(anchor.geo.lat));
    return polyline.map((point) => ({
      lat: anchor.geo.lat + toDegrees((point.y - anchor.planar.y) / this.radiusMeters),
      lon: anchor.geo.lon + toDegrees((point.x - anchor.planar.x) / parallelRadius)
    }));
  }

  unproject(points: readonly GeoPoint[], anchor: GeoAnchor): Point[] {
    const parallelRadius = this.radiusMeters * Math.cos(toRadians(anchor.geo.lat));
    return points.map((point) => ({
      x: anchor.planar.x + toRadians(wrapLongitudeDelta(point.lon - anchor.geo.lon)) * parallelRadius,
      y: anchor.planar.y + toRadians(point.lat - anchor.geo.lat) * this.radiusMeters
    }));
  }
}

/** Spherical azimuthal equidistant projection centred on the anchor. */
export class AzimuthalEquidistantProjection implements PlanarProjection {
  readonly name = "azimuthal-equidistant";

  constructor(private readonly radiusMeters = EARTH_RADIUS_METERS) {}

  private projectionFor(anchor: GeoAnchor) {
    return geoAzimuthalEquidistant()
      .rotate([-anchor.geo.lon, -anchor.geo.lat])
      .scale(this.radiusMeters)
      .translate([0, 0]);
  }

  project(polyline: Polyline, anchor: GeoAnchor): GeoPoint[] {
    const projection = this.projectionFor(anchor);
    const invert = projection.invert;
    if (!invert) {
      throw new InvalidAnchor("Projection cannot be inverted.");
    }
    return polyline.map((point) => {
      // d3 screen coordinates grow downward.
      const result = invert([point.x - anchor.planar.x, anchor.planar.y - point.y]);
      if (!result) {
        throw new InvalidAnchor("Point lies outside the projection around this anchor.");
      }
      return { lat: result[1], lon: result[0] };
    });
  }

  unproject(points: readonly GeoPoint[], anchor: GeoAnchor): Point[] {
    const projection = this.projectionFor(anchor);
    return points.map((point) => {
      const result = projection([point.lon, point.lat]);
      if (!result) {
        throw new InvalidAnchor("Point lies outside the projection around this anchor.");
      }
      return { x: anchor.planar.x + result[0], y: anchor.planar.y - result[1] };
    });
  }
}

export const defaultProjection: PlanarProjection = new EquirectangularProjection();

export function assertValidAnchor(anchor: GeoAnchor) {
  const { lat, lon } = anchor.geo;
  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    throw new InvalidAnchor("Anchor coordinates must be finite.");
  }
  if (Math.abs(lat) >= 90) {
    throw new InvalidAnchor(`Anchor latitude ${lat} must lie strictly between -90 and 90.`);
  }
  if (Math.abs(lon) > 180) {
    throw new InvalidAnchor(`Anchor longitude ${lon} must lie within -180 and 180.`);
  }
  if (!Number.isFinite(anchor.planar.x) || !Number.isFinite(anchor.planar.y)) {
    throw new InvalidAnchor("Anchor planar point must be finite.");
  }
}

function normalizeGeoPoint(point: GeoPoint): GeoPoint {
  if (!(Math.abs(point.lat) <= 90)) {
    throw new InvalidAnchor("Route extends past a pole from this anchor.");
  }
  if (Math.abs(point.lon) <= 180) {
    return point;
  }
  const wrapped = ((((point.lon + 180) % 360) + 360) % 360) - 180;
  return { lat: point.lat, lon: wrapped };
}

export function toGeo(
  polyline: Polyline,
  anchor: GeoAnchor,
  projection: PlanarProjection = defaultProjection
): GeoPoint[] {
  assertValidAnchor(anchor);
  return projection.project(polyline, anchor).map(normalizeGeoPoint);
}

export function toPlanar(
  points: readonly GeoPoint[],
  anchor: GeoAnchor,
  projection: PlanarProjection = defaultProjection
): Polyline {
  assertValidAnchor(anchor);
  return dropConsecutiveDuplicates(projection.unproject(points, anchor));
}
