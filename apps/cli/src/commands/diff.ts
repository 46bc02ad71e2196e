/**
 * Command: labtrack diff
 *
 * Lists the keys under a prefix whose values vary across the selected runs.
 *
 * Usage:
 *   labtrack diff --dir=runs/mnist [--prefix=config.] [--where=...]
 */
import { parseKV, requireArg, listArg, strArg } from "../parse.js";
import { resolveConfig, resolveFilter } from "../resolve.js";
import { openReader } from "../context.js";

export async function diffCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await resolveConfig(kv);
  const prefix = strArg(kv, "prefix", config.diffPrefix);
  const reader = await openReader(config, requireArg(kv, "dir", "directory of runs"), kv["out"]);
  try {
    const runs = await reader.search(resolveFilter(listArg(kv, "where")));
    const keys = runs.diff(prefix);
    if (keys.length === 0) {
      console.log(`No key under "${prefix}" varies across ${runs.length} run(s)`);
      return;
    }
    for (const key of keys) console.log(key);
  } finally {
    reader.close();
  }
}
