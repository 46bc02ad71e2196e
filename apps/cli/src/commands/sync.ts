/**
 * Command: labtrack sync
 *
 * Usage:
 *   labtrack sync --dir=runs/mnist [--out=index/] [--reload]
 */
import { Effect } from "effect";
import { Reader } from "@labtrack/reader";
import { parseKV, requireArg, boolArg } from "../parse.js";
import { resolveConfig } from "../resolve.js";
import { runLogged } from "../context.js";

export async function syncCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const config = await resolveConfig(kv);
  const srcDir = requireArg(kv, "dir", "directory of runs");
  const reload = boolArg(kv, "reload", true);

  const reader = await Reader.open({ srcDir, dstDir: kv["out"], reload });
  try {
    const result = reader.lastSync;
    if (!result) {
      console.log(`Index at ${reader.dbPath} already populated (use --reload to rebuild)`);
      return;
    }
    await runLogged(config, Effect.forEach(result.missing, (dir) => Effect.logWarning(`metadata not found: ${dir}`)));
    console.log(`Scanned: ${result.runsScanned}`);
    console.log(`Indexed: ${result.runsIndexed}`);
    console.log(`Index:   ${reader.dbPath}`);
  } finally {
    reader.close();
  }
}
