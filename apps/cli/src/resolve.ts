/**
 * Resolve CLI args into config, filters and aggregation maps.
 */
import { loadLabtrackConfig, resolveLabtrackConfig, type LabtrackConfig } from "@labtrack/core";
import type { RunFilter } from "@labtrack/db";
import { aggregationMaps, type AggregationMap } from "@labtrack/reader";

export async function resolveConfig(kv: Record<string, string>): Promise<LabtrackConfig> {
  const config = await loadLabtrackConfig(kv["config"]);
  const logLevel = kv["logLevel"];
  if (!logLevel) return config;
  return resolveLabtrackConfig({ ...config, logLevel });
}

/** `true`, `false`, `null` and numbers keep their JSON type; anything else is a string. */
export function parseFilterValue(raw: string): string | number | boolean | null {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (raw === "null") return null;
  if (raw.trim() !== "" && !Number.isNaN(Number(raw))) return Number(raw);
  return raw;
}

/** `key=value` pairs into an equality filter. */
export function resolveFilter(pairs: readonly string[]): RunFilter {
  const filter: RunFilter = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new Error(`Invalid filter "${pair}", expected key=value`);
    filter[pair.slice(0, eq)] = parseFilterValue(pair.slice(eq + 1));
  }
  return filter;
}

/** `kind:key` specs, e.g. `min:metrics.loss`, into aggregation maps. */
export function resolveAggregationMaps(specs: readonly string[]): AggregationMap[] {
  return specs.map((spec) => {
    const colon = spec.indexOf(":");
    if (colon <= 0 || colon === spec.length - 1) {
      throw new Error(`Invalid aggregation "${spec}", expected kind:key (kinds: ${aggregationMaps.list().join(", ")})`);
    }
    return aggregationMaps.create(spec.slice(0, colon), spec.slice(colon + 1));
  });
}
