/**
 * Core types for the labtrack system.
 */

// ── JSON values ────────────────────────────────────────────────────────────
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/** A run's data with dot-qualified keys, e.g. `config.lr` or `metrics.loss`. */
export type FlatRecord = Record<string, JsonValue>;

/** Marks a flattened key whose data lives in a metrics file, not in metadata. */
export const LAZY_DATA = "LAZYDATA";

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Coarse type name recorded in the fields index. */
export function fieldType(value: JsonValue): string {
  if (value === LAZY_DATA) return "lazy";
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

// ── Run status ─────────────────────────────────────────────────────────────
export type RunStatus = "STARTING" | "RUNNING" | "COMPLETE" | "FAILED";

// ── Run info ───────────────────────────────────────────────────────────────
export interface RunInfo {
  readonly run_id: number;
  readonly log_dir: string;
  readonly hostname: string;
  readonly process_id: number;
  readonly date: string;
  readonly time: string;
  readonly status: RunStatus;
}
