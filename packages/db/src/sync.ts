/**
 * Sync run directories from disk into the database.
 *
 * Each numeric subdirectory of the source directory is one run. Its metadata
 * files are flattened under their section name; every key listed in a metrics
 * key registry is recorded as lazy, without reading the metrics themselves.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import type { Client } from "@libsql/client";
import {
  Directories,
  LAZY_DATA,
  METADATA_SECTIONS,
  fieldType,
  flattenObject,
  isJsonObject,
  isReservedMetricsName,
  isRunDirName,
  metadataPath,
  runPaths,
  type FlatRecord,
  type JsonObject,
} from "@labtrack/core";
import { replaceIndex, type IndexedRun } from "./runs.js";

export interface SyncResult {
  runsScanned: number;
  runsIndexed: number;
  /** Run directories without readable metadata. */
  missing: string[];
}

function readJsonObject(filePath: string): JsonObject | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Numeric run directories under `srcDir`, by ascending id. */
export function listRunDirs(srcDir: string): Array<{ id: number; dir: string }> {
  if (!fs.existsSync(srcDir)) return [];
  return fs
    .readdirSync(srcDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && isRunDirName(entry.name))
    .map((entry) => ({ id: parseInt(entry.name, 10), dir: path.join(srcDir, entry.name) }))
    .sort((a, b) => a.id - b.id);
}

/**
 * Keys of every metrics key registry, as lazy `<file>.<key>` entries.
 * Registries named after a metadata section are ignored.
 */
export function readLazyKeys(runDir: string): FlatRecord {
  const { keysDir } = runPaths(runDir);
  const out: FlatRecord = {};
  if (!fs.existsSync(keysDir)) return out;
  for (const fileName of fs.readdirSync(keysDir).sort()) {
    if (!fileName.endsWith(".json")) continue;
    const registry = readJsonObject(path.join(keysDir, fileName));
    if (!registry) continue;
    const prefix = fileName.slice(0, -".json".length);
    if (isReservedMetricsName(prefix)) continue;
    for (const key of Object.keys(registry)) out[`${prefix}.${key}`] = LAZY_DATA;
  }
  return out;
}

/**
 * Flattened metadata of one run, or null when a metadata file is missing or
 * unreadable.
 */
export function readRunMetadata(runDir: string): FlatRecord | null {
  const nested: JsonObject = {};
  for (const section of METADATA_SECTIONS) {
    const data = readJsonObject(metadataPath(runDir, section));
    if (!data) return null;
    nested[section] = data;
  }
  return { ...flattenObject(nested), ...readLazyKeys(runDir) };
}

/** Rebuild the runs and fields tables from the run directories in `srcDir`. */
export async function syncRuns(client: Client, srcDir: string): Promise<SyncResult> {
  const runs: IndexedRun[] = [];
  const fields: Record<string, string> = {};
  const missing: string[] = [];
  const dirs = listRunDirs(srcDir);

  for (const { id, dir } of dirs) {
    const metadata = readRunMetadata(dir);
    if (!metadata) {
      missing.push(path.join(dir, Directories.Metadata));
      continue;
    }
    runs.push({ id, logDir: path.resolve(dir), metadata });
    for (const [key, value] of Object.entries(metadata)) fields[key] = fieldType(value);
  }

  await replaceIndex(client, runs, fields);
  return { runsScanned: dirs.length, runsIndexed: runs.length, missing };
}
