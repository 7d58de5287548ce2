export * from "./path-data.js";
export * from "./reader.js";
export * from "./transform-attribute.js";
