export const AUTOSCRIPT_VERSION = "0.1.0";

export * from "./core/errors.js";
export * from "./core/types.js";
export * from "./compiler/index.js";
export * from "./runtime/index.js";
export * from "./definitions/index.js";
export * from "./api.js";
