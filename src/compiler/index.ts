export * from "./compiler.js";
export * from "./crc64.js";
export * from "./localize.js";
export * from "./predefined.js";
export * from "./string-pool.js";
export * from "./values.js";
