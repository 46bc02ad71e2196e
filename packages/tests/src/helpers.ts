/**
 * Fixture helpers: temporary run roots and hand-written run directories.
 */
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { FlatRecord, JsonObject } from "@labtrack/core";
import { RunRecord } from "@labtrack/reader";

export function makeTempDir(prefix = "labtrack-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export interface RunFixture {
  config: JsonObject;
  /** Points written to metrics/<file>.jsonl, keyed by file name. */
  metrics?: Record<string, JsonObject[]>;
  status?: string;
}

/** Write a run directory with the same layout RunLogger produces. */
export function writeRun(root: string, id: number, fixture: RunFixture): string {
  const dir = join(root, String(id));
  mkdirSync(join(dir, "metadata"), { recursive: true });
  mkdirSync(join(dir, "metrics", ".keys"), { recursive: true });
  writeFileSync(join(dir, "metadata", "config.json"), JSON.stringify(fixture.config));
  writeFileSync(
    join(dir, "metadata", "info.json"),
    JSON.stringify({ run_id: id, log_dir: dir, status: fixture.status ?? "COMPLETE" }),
  );
  for (const [file, points] of Object.entries(fixture.metrics ?? {})) {
    writeFileSync(join(dir, "metrics", `${file}.jsonl`), points.map((p) => `${JSON.stringify(p)}\n`).join(""));
    const keys: Record<string, string> = {};
    for (const point of points) for (const key of Object.keys(point)) keys[key] = "";
    writeFileSync(join(dir, "metrics", ".keys", `${file}.json`), JSON.stringify(keys));
  }
  return dir;
}

/** A run with only in-memory values, backed by a directory that need not exist. */
export function eagerRun(values: FlatRecord, runDir = "/nonexistent/run"): RunRecord {
  return new RunRecord(values, runDir);
}
