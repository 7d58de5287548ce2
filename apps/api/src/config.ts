import type { GeoPoint } from "@gpsart/domain";
import {
  DEFAULT_TOLERANCE_RATIO,
  isProjectionKind,
  type ProjectionKind
} from "@gpsart/shape-engine";

export type ServerConfig = {
  port: number;
  host: string;
  logLevel: string;
  bodyLimitBytes: number;
  toleranceRatio: number;
  defaultAnchor: GeoPoint;
  defaultTargetLengthMeters: number;
  projection: ProjectionKind;
};

function numberFrom(value: string | undefined, fallback: number) {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function positiveNumberFrom(value: string | undefined, fallback: number) {
  const parsed = numberFrom(value, fallback);
  return parsed > 0 ? parsed : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const projection = env.PROJECTION?.trim().toLowerCase();
  return {
    port: numberFrom(env.PORT, 4000),
    host: env.HOST ?? "0.0.0.0",
    logLevel: env.LOG_LEVEL ?? "info",
    bodyLimitBytes: positiveNumberFrom(env.BODY_LIMIT_BYTES, 5 * 1024 * 1024),
    toleranceRatio: positiveNumberFrom(env.FLATTEN_TOLERANCE_RATIO, DEFAULT_TOLERANCE_RATIO),
    defaultAnchor: {
      lat: numberFrom(env.DEFAULT_ANCHOR_LAT, 54.904643),
      lon: numberFrom(env.DEFAULT_ANCHOR_LON, 23.957831)
    },
    defaultTargetLengthMeters: positiveNumberFrom(env.DEFAULT_TARGET_LENGTH_METERS, 1000),
    projection: isProjectionKind(projection) ? projection : "equirectangular"
  };
}
