import {
  AzimuthalEquidistantProjection,
  EquirectangularProjection,
  type PlanarProjection
} from "./projection.js";

export type ProjectionKind = "equirectangular" | "azimuthal-equidistant";

export const PROJECTION_KINDS: readonly ProjectionKind[] = [
  "equirectangular",
  "azimuthal-equidistant"
];

export type ProjectionConfig = {
  kind?: ProjectionKind;
  radiusMeters?: number;
};

export function isProjectionKind(value: unknown): value is ProjectionKind {
  return PROJECTION_KINDS.some((kind) => kind === value);
}

export function createProjection(config: ProjectionConfig = {}): PlanarProjection {
  const kind = config.kind ?? "equirectangular";

  if (kind === "azimuthal-equidistant") {
    return new AzimuthalEquidistantProjection(config.radiusMeters);
  }

  return new EquirectangularProjection(config.radiusMeters);
}
