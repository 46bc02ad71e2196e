/**
 * Reader: an index of the runs under a source directory.
 *
 * The index is a libsql database (`database.db`, in the source directory
 * unless another destination is given) holding each run's flattened metadata
 * and the type of every field. Searching returns RunRecords whose metric
 * columns load lazily from the run directories.
 */
import { accessSync, constants, mkdirSync } from "node:fs";
import { join, resolve } from "node:path";
import type { Client } from "@libsql/client";
import { IndexError } from "@labtrack/core";
import { countRuns, createDb, listFields, listRuns, syncRuns, type RunFilter, type SyncResult } from "@labtrack/db";
import { RunCollection } from "./run-collection.js";
import { RunRecord } from "./run-record.js";

export interface ReaderOptions {
  /** Directory holding one numbered subdirectory per run. */
  srcDir: string;
  /** Where the index database is created; defaults to `srcDir`. */
  dstDir?: string;
  /** Rebuild the index even if it already has runs. */
  reload?: boolean;
}

export const DATABASE_FILE = "database.db";

function ensureWritable(dir: string): string {
  const hint = "Please select a different destination directory.";
  try {
    mkdirSync(dir, { recursive: true });
  } catch (cause) {
    throw new IndexError({ message: `Unable to create the destination directory ${dir}. ${hint}`, cause });
  }
  try {
    accessSync(dir, constants.W_OK);
  } catch (cause) {
    throw new IndexError({ message: `Unable to access the destination directory ${dir}. ${hint}`, cause });
  }
  return dir;
}

export class Reader {
  readonly srcDir: string;
  readonly dbPath: string;
  /** Result of the sync performed by `open` or `reload`, if any. */
  lastSync: SyncResult | null = null;
  private readonly client: Client;

  private constructor(srcDir: string, dbPath: string, client: Client) {
    this.srcDir = srcDir;
    this.dbPath = dbPath;
    this.client = client;
  }

  static async open(options: ReaderOptions): Promise<Reader> {
    const srcDir = resolve(options.srcDir);
    const dstDir = ensureWritable(resolve(options.dstDir ?? srcDir));
    const dbPath = join(dstDir, DATABASE_FILE);
    const client = await createDb({ url: `file:${dbPath}` });
    const reader = new Reader(srcDir, dbPath, client);
    if (options.reload || (await countRuns(client)) === 0) {
      await reader.reload();
    }
    return reader;
  }

  async reload(): Promise<SyncResult> {
    this.lastSync = await syncRuns(this.client, this.srcDir);
    return this.lastSync;
  }

  /** Runs whose flattened metadata equals every value in `filter`. */
  async search(filter: RunFilter = {}): Promise<RunCollection> {
    const rows = await listRuns(this.client, filter);
    return new RunCollection(rows.map((row) => new RunRecord(row.metadata, row.log_dir)));
  }

  /** Searchable field names and their types. */
  async fields(): Promise<Record<string, string>> {
    const out: Record<string, string> = {};
    for (const { key, type } of await listFields(this.client)) out[key] = type;
    return out;
  }

  close(): void {
    this.client.close();
  }
}
