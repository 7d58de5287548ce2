import {
  DegeneratePath,
  InvalidParameters,
  type Point,
  type Polyline,
  type TransformParameters
} from "@gpsart/domain";
import { polylineLength } from "./metrics.js";

function assertParameters(params: TransformParameters) {
  if (!Number.isFinite(params.rotationDegrees)) {
    throw new InvalidParameters(`Rotation must be a finite angle, got ${params.rotationDegrees}.`);
  }
  if (!Number.isFinite(params.targetLengthMeters) || params.targetLengthMeters <= 0) {
    throw new InvalidParameters(
      `Target length must be a positive number of meters, got ${params.targetLengthMeters}.`
    );
  }
  if (!Number.isFinite(params.stretch) || params.stretch <= 0) {
    throw new InvalidParameters(`Stretch must be a positive ratio, got ${params.stretch}.`);
  }
}

/**
 * Rotates (counter-clockwise, degrees), stretches the x axis and finally
 * scales the polyline to the target arc length, all about `anchor`.
 */
export function transform(polyline: Polyline, params: TransformParameters, anchor: Point): Polyline {
  assertParameters(params);

  const radians = (params.rotationDegrees * Math.PI) / 180;
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  const offsets = polyline.map((point) => {
    const dx = point.x - anchor.x;
    const dy = point.y - anchor.y;
    return {
      x: (dx * cos - dy * sin) * params.stretch,
      y: dx * sin + dy * cos
    };
  });

  const length = polylineLength(offsets);
  if (!(length > 0) || !Number.isFinite(length)) {
    throw new DegeneratePath("Path has zero length and cannot be scaled to a target length.");
  }

  const scale = params.targetLengthMeters / length;
  return offsets.map((offset) => ({
    x: anchor.x + offset.x * scale,
    y: anchor.y + offset.y * scale
  }));
}
