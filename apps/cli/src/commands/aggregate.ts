/**
 * Command: labtrack aggregate
 *
 * Groups runs by config values and reduces each group.
 *
 * Usage:
 *   labtrack aggregate --dir=runs/mnist --by=config.lr --agg=last:metrics.loss
 *   labtrack aggregate --dir=runs/mnist --by=config.lr,config.seed --agg=min:config.score,avgstd:metrics.loss
 */
import { renderGroupedTable, type AggregationMap } from "@labtrack/reader";
import { parseKV, requireArg, listArg } from "../parse.js";
import { resolveAggregationMaps, resolveConfig, resolveFilter } from "../resolve.js";
import { openReader } from "../context.js";

export async function aggregateCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await resolveConfig(kv);
  const groupKeys = listArg(kv, "by");
  const maps = resolveAggregationMaps(listArg(kv, "agg"));
  if (maps.length === 0) throw new Error("Missing required argument: --agg (e.g. min:metrics.loss)");

  const reader = await openReader(config, requireArg(kv, "dir", "directory of runs"), kv["out"]);
  try {
    const runs = await reader.search(resolveFilter(listArg(kv, "where")));
    const grouped = runs.groupBy(groupKeys);
    const results = grouped.aggregate(maps);
    for (const map of maps) {
      const result = results[map.name];
      console.log(`── ${map.name} ──`);
      console.log(renderGroupedTable(result, { columns: resultColumns(map, result.toTable().columns) }));
      console.log();
    }
  } finally {
    reader.close();
  }
}

/** The run id plus the columns the map wrote. */
function resultColumns(map: AggregationMap, columns: readonly string[]): string[] {
  const written = new Set([map.name, ...map.keys.flatMap((k) => [`${k}_avg`, `${k}_std`])]);
  return columns.filter((c) => c === "info.run_id" || written.has(c));
}
