export * from "./parse.js";
export * from "./registry.js";
export * from "./xml.js";
