import cors from "@fastify/cors";
import Fastify, { type FastifyError } from "fastify";
import {
  isPipelineError,
  type GeoAnchor,
  type GeoPoint,
  type Point,
  type TransformParameters
} from "@gpsart/domain";
import {
  anchorPolyline,
  createProjection,
  identityParameters,
  loadDrawing,
  loadRoute,
  polylineLength,
  PROJECTION_KINDS,
  render,
  routeDistanceMeters,
  saveRoute,
  type ProjectionKind
} from "@gpsart/shape-engine";
import { loadConfig, type ServerConfig } from "./config.js";

type DrawingQuery = {
  tolerance?: number;
};

type RenderRequest = {
  polyline: Point[];
  parameters: TransformParameters;
  anchor: GeoAnchor;
  projection?: ProjectionKind;
};

type ExportRequest = {
  name?: string;
  points: GeoPoint[];
};

const pointSchema = {
  type: "object",
  required: ["x", "y"],
  properties: { x: { type: "number" }, y: { type: "number" } }
} as const;

const geoPointSchema = {
  type: "object",
  required: ["lat", "lon"],
  properties: { lat: { type: "number" }, lon: { type: "number" } }
} as const;

const renderBodySchema = {
  type: "object",
  required: ["polyline", "parameters", "anchor"],
  properties: {
    polyline: { type: "array", minItems: 1, items: pointSchema },
    parameters: {
      type: "object",
      required: ["rotationDegrees", "targetLengthMeters", "stretch"],
      properties: {
        rotationDegrees: { type: "number" },
        targetLengthMeters: { type: "number" },
        stretch: { type: "number" }
      }
    },
    anchor: {
      type: "object",
      required: ["geo", "planar"],
      properties: { geo: geoPointSchema, planar: pointSchema }
    },
    projection: { type: "string", enum: [...PROJECTION_KINDS] }
  }
} as const;

const exportBodySchema = {
  type: "object",
  required: ["points"],
  properties: {
    name: { type: "string", maxLength: 200 },
    points: { type: "array", minItems: 1, items: geoPointSchema }
  }
} as const;

const textBodySchema = { type: "string", minLength: 1 } as const;

function attachmentName(name: string | undefined) {
  const slug = (name ?? "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return `${slug || "route"}.gpx`;
}

export function buildServer(config: ServerConfig = loadConfig()) {
  const app = Fastify({
    logger: { level: config.logLevel },
    bodyLimit: config.bodyLimitBytes
  });
  const defaultProjection = createProjection({ kind: config.projection });

  void app.register(cors, { origin: true });

  app.addContentTypeParser(
    ["image/svg+xml", "application/gpx+xml", "application/xml", "text/xml"],
    { parseAs: "string" },
    (_request, body, done) => {
      done(null, body);
    }
  );

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (isPipelineError(error)) {
      request.log.info({ kind: error.kind }, error.message);
      void reply.status(422).send({ error: error.message, kind: error.kind });
      return;
    }
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      void reply.status(statusCode).send({ error: error.message });
      return;
    }
    request.log.error(error);
    void reply.status(500).send({ error: "Route processing failed." });
  });

  app.get("/health", async () => {
    return { status: "ok" };
  });

  app.get("/", async () => {
    return {
      service: "gpsart-api",
      message: "GPS art API is running."
    };
  });

  app.post<{ Body: string; Querystring: DrawingQuery }>(
    "/drawings",
    {
      schema: {
        body: textBodySchema,
        querystring: {
          type: "object",
          properties: { tolerance: { type: "number", exclusiveMinimum: 0 } }
        }
      }
    },
    async (request) => {
      const polyline = loadDrawing(request.body, {
        tolerance: request.query.tolerance,
        toleranceRatio: config.toleranceRatio
      });
      return {
        polyline,
        lengthUnits: polylineLength(polyline),
        anchor: anchorPolyline(polyline, config.defaultAnchor),
        parameters: {
          rotationDegrees: 0,
          stretch: 1,
          targetLengthMeters: config.defaultTargetLengthMeters
        } satisfies TransformParameters
      };
    }
  );

  app.post<{ Body: RenderRequest }>(
    "/routes/render",
    { schema: { body: renderBodySchema } },
    async (request) => {
      const { polyline, parameters, anchor } = request.body;
      const projection = request.body.projection
        ? createProjection({ kind: request.body.projection })
        : defaultProjection;
      const points = render(polyline, parameters, anchor, projection);
      return {
        points,
        distanceMeters: routeDistanceMeters(points)
      };
    }
  );

  app.post<{ Body: string }>(
    "/routes/import",
    { schema: { body: textBodySchema } },
    async (request) => {
      const { polyline, anchor } = loadRoute(request.body, defaultProjection);
      // A single-point route has no length to keep; render reports it later.
      const parameters: TransformParameters =
        polylineLength(polyline) > 0
          ? identityParameters(polyline)
          : { rotationDegrees: 0, stretch: 1, targetLengthMeters: config.defaultTargetLengthMeters };
      return { polyline, anchor, parameters };
    }
  );

  app.post<{ Body: ExportRequest }>(
    "/routes/export.gpx",
    { schema: { body: exportBodySchema } },
    async (request, reply) => {
      const { name, points } = request.body;
      const bytes = saveRoute(points, { name });

      reply.header("Content-Type", "application/gpx+xml");
      reply.header("Content-Disposition", `attachment; filename="${attachmentName(name)}"`);
      return Buffer.from(bytes);
    }
  );

  return app;
}
