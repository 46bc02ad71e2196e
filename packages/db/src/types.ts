/**
 * Database row types for @labtrack/db.
 */
import type { FlatRecord } from "@labtrack/core";

export interface DbRun {
  id: number;
  log_dir: string;
  /** Flattened metadata; lazy keys hold the LAZY_DATA sentinel. */
  metadata: FlatRecord;
  indexed_at: string;
}

export interface DbField {
  key: string;
  type: string;
}

/** Equality constraints on flattened keys, e.g. `{ "config.lr": 0.1 }`. */
export type RunFilter = Record<string, string | number | boolean | null>;
