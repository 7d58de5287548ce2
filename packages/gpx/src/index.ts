import { DOMParser, type Element } from "@xmldom/xmldom";
import { CorruptRoute, type GeoPoint } from "@gpsart/domain";

export type GpxEncodeOptions = {
  name?: string;
  creator?: string;
};

/** Placeholders for the elevation and time fields that track consumers expect. */
export const PLACEHOLDER_ELEVATION = 0;
export const PLACEHOLDER_TIME = "1970-01-01T00:00:00Z";

function escapeXml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function formatCoordinate(value: number) {
  return Object.is(value, -0) ? "-0" : String(value);
}

function isValidGeoPoint(point: GeoPoint) {
  return (
    Number.isFinite(point.lat) &&
    Number.isFinite(point.lon) &&
    Math.abs(point.lat) <= 90 &&
    Math.abs(point.lon) <= 180
  );
}

export function encodeGpx(points: readonly GeoPoint[], options: GpxEncodeOptions = {}): string {
  if (points.length === 0) {
    throw new CorruptRoute("A route needs at least one point.");
  }
  const invalidIndex = points.findIndex((point) => !isValidGeoPoint(point));
  if (invalidIndex !== -1) {
    throw new CorruptRoute(`Route point ${invalidIndex} has an out-of-range coordinate.`);
  }

  const creator = escapeXml(options.creator ?? "gpsart");
  const name = options.name ? `<name>${escapeXml(options.name)}</name>` : "";
  const trackPoints = points
    .map(
      (point) =>
        `<trkpt lat="${formatCoordinate(point.lat)}" lon="${formatCoordinate(point.lon)}">` +
        `<ele>${PLACEHOLDER_ELEVATION}</ele><time>${PLACEHOLDER_TIME}</time></trkpt>`
    )
    .join("");

  return `<?xml version="1.0" encoding="UTF-8"?><gpx version="1.1" creator="${creator}" xmlns="http://www.topografix.com/GPX/1/1"><trk>${name}<trkseg>${trackPoints}</trkseg></trk></gpx>`;
}

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function notWellFormed(message: string) {
  return new CorruptRoute(`Route file is not well-formed XML: ${message.trim()}`);
}

function parseDocument(text: string) {
  const parser = new DOMParser({
    onError: (level, message) => {
      if (level !== "warning") {
        throw notWellFormed(message);
      }
    }
  });
  try {
    return parser.parseFromString(text, "application/xml");
  } catch (error) {
    if (error instanceof CorruptRoute) {
      throw error;
    }
    throw notWellFormed(error instanceof Error ? error.message : String(error));
  }
}

function readCoordinate(element: Element, name: "lat" | "lon", index: number) {
  const raw = element.getAttribute(name)?.trim();
  if (!raw) {
    throw new CorruptRoute(`Route point ${index} is missing its ${name} attribute.`);
  }
  if (!DECIMAL_PATTERN.test(raw)) {
    throw new CorruptRoute(`Route point ${index} has a non-numeric ${name} '${raw}'.`);
  }
  const value = Number(raw);
  const limit = name === "lat" ? 90 : 180;
  if (!Number.isFinite(value) || Math.abs(value) > limit) {
    throw new CorruptRoute(`Route point ${index} has an invalid ${name} '${raw}'.`);
  }
  return value;
}

/**
 * Reads the points of a GPX file in traversal order: track points first,
 * route points when the file holds no track.
 */
export function decodeGpx(source: string | Uint8Array): GeoPoint[] {
  const text = typeof source === "string" ? source : new TextDecoder("utf-8").decode(source);
  const doc = parseDocument(text);
  const root = doc.documentElement;
  if (!root || (root.localName ?? root.nodeName) !== "gpx") {
    throw new CorruptRoute("Route file root element must be <gpx>.");
  }

  // Any namespace, so prefixed GPX documents are read too.
  let elements = root.getElementsByTagNameNS("*", "trkpt");
  if (elements.length === 0) {
    elements = root.getElementsByTagNameNS("*", "rtept");
  }
  if (elements.length === 0) {
    throw new CorruptRoute("Route file contains no track points.");
  }

  const points: GeoPoint[] = [];
  for (let i = 0; i < elements.length; i += 1) {
    const element = elements.item(i);
    if (!element) {
      continue;
    }
    points.push({
      lat: readCoordinate(element, "lat", i),
      lon: readCoordinate(element, "lon", i)
    });
  }
  return points;
}
