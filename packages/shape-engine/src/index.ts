export * from "./flatten.js";
export * from "./merge.js";
export * from "./metrics.js";
export * from "./pipeline.js";
export * from "./projection-factory.js";
export * from "./projection.js";
export * from "./transform.js";
