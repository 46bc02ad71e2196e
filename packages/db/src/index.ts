export { createDb, type DbOptions } from "./client.js";
export { migrate, currentSchemaVersion } from "./migrate.js";
export { migrations } from "./schema.js";
export * from "./runs.js";
export * from "./sync.js";
export type * from "./types.js";
