export * from "./types.js";
export * from "./errors.js";
export * from "./layout.js";
export * from "./flatten.js";
export * from "./config.js";
export { Registry } from "./registry.js";
