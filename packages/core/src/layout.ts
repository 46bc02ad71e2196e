/**
 * On-disk layout of a run directory.
 *
 *   <root>/<run_id>/
 *     metadata/config.json    user configuration
 *     metadata/info.json      run info (id, host, status, ...)
 *     metrics/<name>.jsonl    one JSON object per logged point
 *     metrics/.keys/<name>.json  keys ever written to <name>.jsonl
 *     artifacts/              free-form outputs
 */
import { join } from "node:path";

export const Directories = {
  Metadata: "metadata",
  Metrics: "metrics",
  Artifacts: "artifacts",
  Keys: ".keys",
} as const;

/** Metadata files, each flattened under its own prefix. */
export const METADATA_SECTIONS = ["config", "info"] as const;
export type MetadataSection = (typeof METADATA_SECTIONS)[number];

export interface RunPaths {
  readonly runDir: string;
  readonly metadataDir: string;
  readonly metricsDir: string;
  readonly artifactsDir: string;
  readonly keysDir: string;
}

export function runPaths(runDir: string): RunPaths {
  const metricsDir = join(runDir, Directories.Metrics);
  return {
    runDir,
    metadataDir: join(runDir, Directories.Metadata),
    metricsDir,
    artifactsDir: join(runDir, Directories.Artifacts),
    keysDir: join(metricsDir, Directories.Keys),
  };
}

/** Metrics files may not share a name with a metadata section. */
export function isReservedMetricsName(fileName: string): boolean {
  return METADATA_SECTIONS.some((section) => section === fileName);
}

export function metadataPath(runDir: string, section: MetadataSection): string {
  return join(runDir, Directories.Metadata, `${section}.json`);
}

export function metricsPath(runDir: string, fileName: string): string {
  return join(runDir, Directories.Metrics, `${fileName}.jsonl`);
}

export function keysPath(runDir: string, fileName: string): string {
  return join(runDir, Directories.Metrics, Directories.Keys, `${fileName}.json`);
}

/** Run ids are directory names made only of digits. */
export function isRunDirName(name: string): boolean {
  return /^\d+$/.test(name);
}
