/**
 * Build a RunCollection straight from run directories, without the index.
 */
import { join } from "node:path";
import { Directories } from "@labtrack/core";
import { listRunDirs, readRunMetadata } from "@labtrack/db";
import { RunCollection } from "./run-collection.js";
import { RunRecord } from "./run-record.js";

export interface ScanResult {
  readonly runs: RunCollection;
  /** Metadata directories that could not be read. */
  readonly missing: string[];
}

export function scanRuns(srcDir: string): ScanResult {
  const records: RunRecord[] = [];
  const missing: string[] = [];
  for (const { dir } of listRunDirs(srcDir)) {
    const metadata = readRunMetadata(dir);
    if (metadata) records.push(new RunRecord(metadata, dir));
    else missing.push(join(dir, Directories.Metadata));
  }
  return { runs: new RunCollection(records), missing };
}
