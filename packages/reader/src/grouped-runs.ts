/**
 * Runs partitioned by the values of one or more group keys.
 *
 * Groups are stored flat, keyed by the full tuple of group values. A nested
 * view, one level per group key, is built on demand by `toNested`.
 */
import { InvalidAggregationMapError, type FlatRecord, type JsonValue } from "@labtrack/core";
import { inspect } from "node:util";
import { AggregationMap, requiredKeys, type AggregateResult, type FieldValues } from "./aggregation.js";
import { RunCollection } from "./run-collection.js";
import type { RunRecord } from "./run-record.js";

/** Stringified group values in key order; `null` where the run has no value. */
export type GroupKey = readonly (string | null)[];

export type NestedGroups = Map<string | null, NestedGroups | RunCollection>;

export interface GroupedRow {
  readonly index: GroupKey;
  readonly values: FlatRecord;
}

export interface GroupedTable {
  readonly indexColumns: readonly string[];
  readonly columns: readonly string[];
  readonly rows: readonly GroupedRow[];
}

function assertAggregationMap(map: unknown): void {
  if (!(map instanceof AggregationMap)) {
    throw new InvalidAggregationMapError({
      message: `The map ${inspect(map, { depth: 1 })} must be an instance of a subclass of ${AggregationMap.name}`,
    });
  }
}

function buildCollection(runs: RunCollection, result: AggregateResult): RunCollection {
  switch (result.kind) {
    case "select": {
      const run = result.index >= 0 ? runs.at(result.index) : undefined;
      return new RunCollection(run ? [run.clone().update(result.values)] : []);
    }
    case "broadcast":
      return new RunCollection(runs.toArray().map((run) => run.clone().update(result.values)));
    case "per-run": {
      const out: RunRecord[] = [];
      runs.toArray().forEach((run, i) => {
        const values = result.values[i];
        if (values) out.push(run.clone().update(values));
      });
      return new RunCollection(out);
    }
  }
}

/**
 * Apply `maps` to one group. Each run's needed keys are read once, then the
 * run's unread metric columns are released.
 */
export function aggregateRuns(runs: RunCollection, maps: readonly AggregationMap[]): Map<string, RunCollection> {
  const keys = requiredKeys(maps);
  const data: FieldValues[] = [];
  for (const run of runs) {
    const values: Record<string, JsonValue | undefined> = {};
    for (const key of keys) values[key] = run.get(key);
    data.push(values);
    run.freeUnused();
  }

  const out = new Map<string, RunCollection>();
  for (const map of maps) out.set(map.name, buildCollection(runs, map.apply(data)));
  return out;
}

export class GroupedRuns implements Iterable<[GroupKey, RunCollection]> {
  readonly groupKeys: readonly string[];
  private readonly groups = new Map<string, { key: GroupKey; runs: RunCollection }>();
  private _table: GroupedTable | null = null;

  constructor(groupKeys: readonly string[], groups: Iterable<readonly [GroupKey, RunCollection]>) {
    this.groupKeys = [...groupKeys];
    for (const [key, runs] of groups) {
      if (key.length !== this.groupKeys.length) {
        throw new RangeError(
          `Group key ${JSON.stringify(key)} has ${key.length} values, expected ${this.groupKeys.length}`,
        );
      }
      this.groups.set(JSON.stringify(key), { key: [...key], runs });
    }
  }

  get size(): number {
    return this.groups.size;
  }

  get(key: GroupKey): RunCollection | undefined {
    return this.groups.get(JSON.stringify(key))?.runs;
  }

  keys(): GroupKey[] {
    return [...this.groups.values()].map((g) => g.key);
  }

  entries(): [GroupKey, RunCollection][] {
    return [...this.groups.values()].map((g) => [g.key, g.runs]);
  }

  [Symbol.iterator](): Iterator<[GroupKey, RunCollection]> {
    return this.entries()[Symbol.iterator]();
  }

  /** All runs of all groups, in group order. */
  flatten(): RunCollection {
    const all: RunRecord[] = [];
    for (const { runs } of this.groups.values()) all.push(...runs);
    return new RunCollection(all);
  }

  toTable(): GroupedTable {
    if (this._table === null) {
      const index = new Set(this.groupKeys);
      const rows: GroupedRow[] = [];
      for (const { key, runs } of this.groups.values()) {
        for (const row of runs.toTable().rows) {
          const values: FlatRecord = {};
          for (const [k, v] of Object.entries(row)) {
            if (!index.has(k)) values[k] = v;
          }
          rows.push({ index: key, values });
        }
      }
      const columns = this.flatten().columns().filter((c) => !index.has(c));
      this._table = { indexColumns: this.groupKeys, columns, rows };
    }
    return this._table;
  }

  toNested(): NestedGroups {
    const root: NestedGroups = new Map();
    for (const { key, runs } of this.groups.values()) {
      let level = root;
      key.forEach((value, depth) => {
        if (depth === key.length - 1) {
          level.set(value, runs);
          return;
        }
        const next = level.get(value);
        if (next instanceof Map) {
          level = next;
        } else {
          const created: NestedGroups = new Map();
          level.set(value, created);
          level = created;
        }
      });
    }
    return root;
  }

  /**
   * Aggregate every group with every map. Returns one GroupedRuns per map
   * name, each with the same group keys as this one.
   */
  aggregate(maps: readonly AggregationMap[]): Record<string, GroupedRuns> {
    for (const map of maps) assertAggregationMap(map);

    const perMap = new Map<string, [GroupKey, RunCollection][]>();
    for (const map of maps) perMap.set(map.name, []);

    for (const { key, runs } of this.groups.values()) {
      const aggregated = aggregateRuns(runs, maps);
      for (const [name, collection] of aggregated) perMap.get(name)?.push([key, collection]);
    }

    const out: Record<string, GroupedRuns> = {};
    for (const [name, groups] of perMap) out[name] = new GroupedRuns(this.groupKeys, groups);
    return out;
  }
}
