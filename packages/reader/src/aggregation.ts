/**
 * Aggregation maps: reductions over the runs of one leaf group.
 *
 * A map receives one value-dict per run (the keys it declared, read once per
 * run) and answers in one of three shapes:
 *   select     one representative run, annotated with the aggregate (min, max)
 *   broadcast  the same aggregate attached to every run (avgstd)
 *   per-run    a separate aggregate for each run; runs without one are dropped (last)
 */
import { Registry, type FlatRecord, type JsonValue } from "@labtrack/core";

export type FieldValues = Readonly<Record<string, JsonValue | undefined>>;

export type AggregationKind = "last" | "min" | "max" | "avgstd";

export type AggregateResult =
  | { readonly kind: "select"; readonly index: number; readonly values: FlatRecord }
  | { readonly kind: "broadcast"; readonly values: FlatRecord }
  | { readonly kind: "per-run"; readonly values: readonly (FlatRecord | undefined)[] };

export abstract class AggregationMap {
  abstract readonly kind: AggregationKind;
  readonly keys: readonly string[];
  /** e.g. `min(metrics.loss)`; also the key the aggregate is stored under. */
  readonly name: string;

  protected constructor(mapName: AggregationKind, keys: readonly string[]) {
    this.keys = keys;
    this.name = `${mapName}(${keys.join(",")})`;
  }

  abstract apply(data: readonly FieldValues[]): AggregateResult;
}

function isComparable(value: JsonValue | undefined): value is number {
  return typeof value === "number" && !Number.isNaN(value);
}

/**
 * Index of the best comparable entry (first on ties). When nothing is
 * comparable the last index is returned.
 */
export function argBest(
  values: readonly (JsonValue | undefined)[],
  better: (candidate: number, current: number) => boolean,
): number {
  let bestIndex = -1;
  let bestValue = 0;
  values.forEach((value, index) => {
    if (!isComparable(value)) return;
    if (bestIndex < 0 || better(value, bestValue)) {
      bestIndex = index;
      bestValue = value;
    }
  });
  return bestIndex < 0 ? values.length - 1 : bestIndex;
}

/** A run's scalar for selection: the final point of a sequence, a scalar as is. */
export function finalValue(value: JsonValue | undefined): JsonValue | undefined {
  return Array.isArray(value) ? value[value.length - 1] : value;
}

abstract class SelectingMap extends AggregationMap {
  protected readonly key: string;

  protected constructor(mapName: "min" | "max", key: string) {
    super(mapName, [key]);
    this.key = key;
  }

  protected abstract better(candidate: number, current: number): boolean;

  apply(data: readonly FieldValues[]): AggregateResult {
    const selected = data.map((d) => finalValue(d[this.key]));
    const index = argBest(selected, (a, b) => this.better(a, b));
    const value = selected[index];
    return { kind: "select", index, values: value === undefined ? {} : { [this.name]: value } };
  }
}

export class Min extends SelectingMap {
  readonly kind = "min";

  constructor(key: string) {
    super("min", key);
  }

  protected better(candidate: number, current: number): boolean {
    return candidate < current;
  }
}

export class Max extends SelectingMap {
  readonly kind = "max";

  constructor(key: string) {
    super("max", key);
  }

  protected better(candidate: number, current: number): boolean {
    return candidate > current;
  }
}

export class Last extends AggregationMap {
  readonly kind = "last";
  private readonly key: string;

  constructor(key: string) {
    super("last", [key]);
    this.key = key;
  }

  apply(data: readonly FieldValues[]): AggregateResult {
    return {
      kind: "per-run",
      values: data.map((d) => {
        const seq = d[this.key];
        if (seq === undefined || seq === null) return undefined;
        const last = Array.isArray(seq) ? seq[seq.length - 1] : seq;
        return last === undefined ? undefined : { [this.name]: last };
      }),
    };
  }
}

/** Numeric view of a field: sequences element-wise, a lone number as length 1. */
export function toSequence(value: JsonValue | undefined): number[] | undefined {
  if (typeof value === "number") return [value];
  if (!Array.isArray(value)) return undefined;
  return value.map((v) => (typeof v === "number" ? v : NaN));
}

export interface MeanStd {
  readonly mean: number[];
  readonly std: number[];
}

/**
 * Element-wise mean and population standard deviation. Running sums are cut
 * to the shorter length whenever a shorter sequence is added.
 */
export function meanAndStd(sequences: readonly (readonly number[] | undefined)[]): MeanStd | undefined {
  let sum: number[] | undefined;
  let sumSq: number[] = [];
  let n = 0;

  for (const seq of sequences) {
    if (!seq) continue;
    if (!sum) {
      sum = [...seq];
      sumSq = seq.map((x) => x * x);
      n = 1;
      continue;
    }
    const len = Math.min(sum.length, seq.length);
    sum.length = len;
    sumSq.length = len;
    for (let i = 0; i < len; i++) {
      sum[i] += seq[i];
      sumSq[i] += seq[i] * seq[i];
    }
    n++;
  }

  if (!sum) return undefined;
  const mean = sum.map((s) => s / n);
  // clamp: rounding can leave a tiny negative variance
  const std = sumSq.map((s, i) => Math.sqrt(Math.max(0, s / n - mean[i] * mean[i])));
  return { mean, std };
}

export class AvgStd extends AggregationMap {
  readonly kind = "avgstd";

  constructor(...keys: [string, ...string[]]) {
    super("avgstd", keys);
  }

  apply(data: readonly FieldValues[]): AggregateResult {
    const values: FlatRecord = {};
    for (const key of this.keys) {
      const stats = meanAndStd(data.map((d) => toSequence(d[key])));
      if (!stats) continue;
      values[`${key}_avg`] = stats.mean;
      values[`${key}_std`] = stats.std;
    }
    return { kind: "broadcast", values };
  }
}

/** Built-in maps by short name, for command-line specs like `min:metrics.loss`. */
export const aggregationMaps = new Registry<[string], AggregationMap>("aggregation")
  .register("last", (key) => new Last(key))
  .register("min", (key) => new Min(key))
  .register("max", (key) => new Max(key))
  .register("avgstd", (key) => new AvgStd(key));

/** Keys needed by `maps`, first-seen order, no duplicates. */
export function requiredKeys(maps: readonly AggregationMap[]): string[] {
  const seen = new Set<string>();
  for (const map of maps) {
    for (const key of map.keys) seen.add(key);
  }
  return [...seen];
}
