export * from "./lock.js";
export * from "./log-channel.js";
export * from "./macro.js";
export * from "./runtime.js";
export * from "./scopes.js";
