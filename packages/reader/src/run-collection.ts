/**
 * An ordered list of runs viewed as a table: one row per run, one column per
 * key seen in any run.
 */
import { isDeepStrictEqual } from "node:util";
import { InvalidKeyError, type FlatRecord, type JsonValue } from "@labtrack/core";
import { GroupedRuns, type GroupKey } from "./grouped-runs.js";
import type { RunRecord } from "./run-record.js";

export interface RunTable {
  readonly columns: readonly string[];
  readonly rows: readonly FlatRecord[];
}

/** String form of a grouping value; unset values have none. */
export function groupLabel(value: JsonValue | undefined): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

export class RunCollection implements Iterable<RunRecord> {
  private readonly runs: readonly RunRecord[];
  private _columns: string[] | null = null;
  private _table: RunTable | null = null;

  constructor(runs: Iterable<RunRecord> = []) {
    this.runs = [...runs];
  }

  get length(): number {
    return this.runs.length;
  }

  [Symbol.iterator](): Iterator<RunRecord> {
    return this.runs[Symbol.iterator]();
  }

  at(index: number): RunRecord | undefined {
    return this.runs.at(index);
  }

  toArray(): RunRecord[] {
    return [...this.runs];
  }

  /** Every key present in at least one run, in first-seen order. */
  columns(): string[] {
    if (this._columns === null) {
      const seen = new Set<string>();
      for (const run of this.runs) {
        for (const key of run.keys()) seen.add(key);
      }
      this._columns = [...seen];
    }
    return this._columns;
  }

  toTable(): RunTable {
    if (this._table === null) {
      this._table = { columns: this.columns(), rows: this.runs.map((run) => run.flattened()) };
    }
    return this._table;
  }

  filter(predicate: (run: RunRecord, index: number) => boolean): RunCollection {
    return new RunCollection(this.runs.filter(predicate));
  }

  /**
   * Keys starting with `prefix` that vary across runs: some run has a
   * different value, or lacks the key while another has it.
   */
  diff(prefix = "config."): string[] {
    const [first, ...rest] = this.runs;
    if (!first) return [];
    return this.columns().filter((key) => {
      if (!key.startsWith(prefix)) return false;
      const present = first.has(key);
      const value = first.get(key);
      return rest.some((run) => run.has(key) !== present || !isDeepStrictEqual(run.get(key), value));
    });
  }

  /** Partition runs by their values at `keys`, keeping run order within each group. */
  groupBy(keys: readonly string[]): GroupedRuns {
    const valid = this.columns();
    for (const key of keys) {
      if (!valid.includes(key)) {
        throw new InvalidKeyError({
          message: `The provided key ${key} is invalid! Valid keys are: ${valid.join(", ")}`,
          key,
          validKeys: valid,
        });
      }
    }

    const buckets = new Map<string, { key: GroupKey; runs: RunRecord[] }>();
    for (const run of this.runs) {
      const key = keys.map((k) => groupLabel(run.get(k)));
      const id = JSON.stringify(key);
      const bucket = buckets.get(id);
      if (bucket) bucket.runs.push(run);
      else buckets.set(id, { key, runs: [run] });
    }

    return new GroupedRuns(
      keys,
      [...buckets.values()].map(({ key, runs }) => [key, new RunCollection(runs)] as const),
    );
  }
}
