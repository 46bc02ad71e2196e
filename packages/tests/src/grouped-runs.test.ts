import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidAggregationMapError } from "@labtrack/core";
import {
  AvgStd,
  GroupedRuns,
  Last,
  LazyField,
  Min,
  RunCollection,
  scanRuns,
  type AggregationMap,
} from "@labtrack/reader";
import { resolveAggregationMaps } from "@labtrack/cli/resolve";
import { eagerRun, makeTempDir, removeDir, writeRun } from "./helpers.js";

const ids = (runs: RunCollection | undefined) => runs?.toArray().map((r) => r.id);

function sample(): RunCollection {
  return new RunCollection([
    eagerRun({ "config.model": "a", "config.seed": 1, "info.run_id": 1 }),
    eagerRun({ "config.model": "b", "config.seed": 1, "info.run_id": 2 }),
    eagerRun({ "config.model": "a", "config.seed": 2, "info.run_id": 3 }),
    eagerRun({ "config.model": "a", "config.seed": 1, "info.run_id": 4 }),
  ]);
}

describe("GroupedRuns", () => {
  it("orders groups by first appearance", () => {
    const grouped = sample().groupBy(["config.model", "config.seed"]);
    expect(grouped.groupKeys).toEqual(["config.model", "config.seed"]);
    expect(grouped.size).toBe(3);
    expect(grouped.keys()).toEqual([
      ["a", "1"],
      ["b", "1"],
      ["a", "2"],
    ]);
    expect(ids(grouped.get(["a", "1"]))).toEqual([1, 4]);
    expect(grouped.get(["c", "1"])).toBeUndefined();
  });

  it("flattens back to every run in group order", () => {
    const grouped = sample().groupBy(["config.model", "config.seed"]);
    expect(ids(grouped.flatten())).toEqual([1, 4, 2, 3]);
  });

  it("builds a table with group values as the index", () => {
    const table = sample().groupBy(["config.model"]).toTable();
    expect(table.indexColumns).toEqual(["config.model"]);
    expect(table.columns).toEqual(["config.seed", "info.run_id"]);
    expect(table.rows.map((r) => r.index)).toEqual([["a"], ["a"], ["a"], ["b"]]);
    expect(table.rows[3]).toEqual({ index: ["b"], values: { "config.seed": 1, "info.run_id": 2 } });
  });

  it("nests one map level per group key", () => {
    const nested = sample().groupBy(["config.model", "config.seed"]).toNested();
    expect([...nested.keys()]).toEqual(["a", "b"]);
    const a = nested.get("a");
    expect(a).toBeInstanceOf(Map);
    if (!(a instanceof Map)) return;
    expect([...a.keys()]).toEqual(["1", "2"]);
    const leaf = a.get("2");
    expect(leaf).toBeInstanceOf(RunCollection);
    if (leaf instanceof RunCollection) expect(ids(leaf)).toEqual([3]);
  });

  it("rejects group keys of the wrong arity", () => {
    expect(() => new GroupedRuns(["a", "b"], [[["x"], new RunCollection()]])).toThrowError(RangeError);
  });
});

describe("GroupedRuns.aggregate", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
    writeRun(root, 1, {
      config: { model: "a", seed: 1 },
      metrics: { metrics: [{ loss: 3, acc: 0.1 }, { loss: 2 }, { loss: 1 }] },
    });
    writeRun(root, 2, {
      config: { model: "a", seed: 2 },
      metrics: { metrics: [{ loss: 4, acc: 0.2 }, { loss: 3 }, { loss: 0.5 }] },
    });
    writeRun(root, 3, {
      config: { model: "b", seed: 1 },
      metrics: { metrics: [{ loss: 5, acc: 0.3 }, { loss: 5 }, { loss: 5 }] },
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(root);
  });

  function grouped(): GroupedRuns {
    return scanRuns(root).runs.groupBy(["config.model"]);
  }

  it("returns one grouped result per map with the same group keys", () => {
    const result = grouped().aggregate([new Last("metrics.loss"), new AvgStd("metrics.loss")]);
    expect(Object.keys(result)).toEqual(["last(metrics.loss)", "avgstd(metrics.loss)"]);

    const last = result["last(metrics.loss)"];
    expect(last?.keys()).toEqual([["a"], ["b"]]);
    expect(last?.get(["a"])?.toArray().map((r) => r.get("last(metrics.loss)"))).toEqual([1, 0.5]);
    expect(last?.get(["b"])?.toArray().map((r) => r.get("last(metrics.loss)"))).toEqual([5]);

    const avg = result["avgstd(metrics.loss)"];
    const first = avg?.get(["a"])?.at(0);
    expect(first?.get("metrics.loss_avg")).toEqual([3.5, 2.5, 0.75]);
    expect(first?.get("metrics.loss_std")).toEqual([0.5, 0.5, 0.25]);
    expect(avg?.get(["a"])?.length).toBe(2);
    expect(avg?.get(["b"])?.at(0)?.get("metrics.loss_std")).toEqual([0, 0, 0]);
  });

  it("chains a selection over per-run results", () => {
    const last = grouped().aggregate([new Last("metrics.loss")])["last(metrics.loss)"];
    expect(last).toBeDefined();
    if (!last) return;
    const best = last.aggregate([new Min("last(metrics.loss)")])["min(last(metrics.loss))"];
    const a = best?.get(["a"]);
    expect(a?.length).toBe(1);
    expect(a?.at(0)?.id).toBe(2);
    expect(a?.at(0)?.get("min(last(metrics.loss))")).toBe(0.5);
    expect(best?.get(["b"])?.at(0)?.get("min(last(metrics.loss))")).toBe(5);
  });

  it("selects the run with the best final metric", () => {
    const [min] = resolveAggregationMaps(["min:metrics.loss"]);
    expect(min).toBeDefined();
    if (!min) return;
    const best = grouped().aggregate([min])["min(metrics.loss)"];
    const a = best?.get(["a"]);
    expect(a?.length).toBe(1);
    expect(a?.at(0)?.id).toBe(2);
    expect(a?.at(0)?.get("min(metrics.loss)")).toBe(0.5);
    expect(best?.get(["b"])?.at(0)?.get("min(metrics.loss)")).toBe(5);
  });

  it("leaves the source runs untouched apart from freed columns", () => {
    const groups = grouped();
    groups.aggregate([new Last("metrics.loss")]);
    const run = groups.get(["a"])?.at(0);
    expect(run?.has("last(metrics.loss)")).toBe(false);
    expect(run?.lazyField("metrics")?.cachedColumns()).toEqual(["loss"]);
  });

  it("rejects objects that are not aggregation maps before reading any data", () => {
    const impostor: AggregationMap = {
      kind: "min",
      keys: ["metrics.loss"],
      name: "min(metrics.loss)",
      apply: () => ({ kind: "broadcast", values: {} }),
    };
    const read = vi.spyOn(LazyField.prototype, "get");
    const groups = grouped();
    expect(() => groups.aggregate([new Last("metrics.loss"), impostor])).toThrowError(InvalidAggregationMapError);
    expect(() => groups.aggregate([impostor])).toThrowError(
      /must be an instance of a subclass of AggregationMap/,
    );
    expect(read).not.toHaveBeenCalled();
  });

  it("produces empty groups when a selection finds no runs", () => {
    const empty = new GroupedRuns(["config.model"], [[["a"], new RunCollection()]]);
    const result = empty.aggregate([new Min("metrics.loss")])["min(metrics.loss)"];
    expect(result?.get(["a"])?.length).toBe(0);
  });
});
