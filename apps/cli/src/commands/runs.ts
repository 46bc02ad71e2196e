/**
 * Command: labtrack runs
 *
 * Usage:
 *   labtrack runs --dir=runs/mnist [--where=config.lr=0.1,info.status=COMPLETE] [--columns=config.lr,info.status]
 */
import { renderTable } from "@labtrack/reader";
import { parseKV, requireArg, listArg } from "../parse.js";
import { resolveConfig, resolveFilter } from "../resolve.js";
import { openReader } from "../context.js";

export async function runsCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await resolveConfig(kv);
  const reader = await openReader(config, requireArg(kv, "dir", "directory of runs"), kv["out"]);
  try {
    const runs = await reader.search(resolveFilter(listArg(kv, "where")));
    const columns = listArg(kv, "columns");
    console.log(renderTable(runs, columns.length > 0 ? { columns } : {}));
    console.log(`\n${runs.length} run(s)`);
  } finally {
    reader.close();
  }
}
