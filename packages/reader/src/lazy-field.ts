/**
 * A file-backed output stream of a run, read on first access.
 *
 * The backing file holds one JSON object per line, one line per logged point.
 * Loading accumulates each key's values, in file order, into one sequence per
 * column. Columns that were never read can be dropped with `freeUnused`; a
 * later read of a dropped column reloads the whole file.
 */
import { readFileSync } from "node:fs";
import { isJsonObject, type JsonValue } from "@labtrack/core";

export type ColumnData = Map<string, JsonValue[]>;

/** Parse an NDJSON metrics file. A missing or unreadable file yields no columns. */
export function loadColumns(path: string): ColumnData {
  const columns: ColumnData = new Map();
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch {
    return columns;
  }

  for (const line of content.split(/\r?\n/)) {
    if (!line.trim()) continue;
    let point: unknown;
    try {
      point = JSON.parse(line);
    } catch {
      continue;
    }
    if (!isJsonObject(point)) continue;
    for (const [key, value] of Object.entries(point)) {
      const column = columns.get(key);
      if (column) column.push(value);
      else columns.set(key, [value]);
    }
  }
  return columns;
}

export class LazyField {
  readonly name: string;
  readonly path: string;
  private cache: ColumnData | null = null;
  private readonly touched = new Set<string>();

  constructor(name: string, path: string) {
    this.name = name;
    this.path = path;
  }

  get isMaterialized(): boolean {
    return this.cache !== null;
  }

  /** A copy of `column`; the cache is never handed out. */
  get(column: string): JsonValue[] | undefined {
    if (this.cache === null || (!this.cache.has(column) && !this.touched.has(column))) {
      this.cache = loadColumns(this.path);
    }
    this.touched.add(column);
    const values = this.cache.get(column);
    return values === undefined ? undefined : structuredClone(values);
  }

  /** Drop every cached column that has not been read. */
  freeUnused(): void {
    if (this.cache === null) return;
    for (const column of [...this.cache.keys()]) {
      if (!this.touched.has(column)) this.cache.delete(column);
    }
  }

  cachedColumns(): string[] {
    return this.cache ? [...this.cache.keys()] : [];
  }

  touchedColumns(): string[] {
    return [...this.touched];
  }

  clone(): LazyField {
    const copy = new LazyField(this.name, this.path);
    if (this.cache !== null) copy.cache = structuredClone(this.cache);
    for (const column of this.touched) copy.touched.add(column);
    return copy;
  }
}
