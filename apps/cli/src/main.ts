#!/usr/bin/env npx tsx
/**
 * labtrack CLI: the main entry point.
 *
 * Commands: sync, runs, diff, aggregate
 *
 * Usage: npx tsx apps/cli/src/main.ts <command> [options]  (or `npm run labtrack -- <command>`)
 */
import { syncCmd } from "./commands/sync.js";
import { runsCmd } from "./commands/runs.js";
import { diffCmd } from "./commands/diff.js";
import { aggregateCmd } from "./commands/aggregate.js";

const USAGE = `
labtrack — inspect, group and aggregate experiment runs

Commands:
  sync             Rebuild the metadata index of a runs directory
  runs             Print the runs as a table
  diff             List config keys that vary across runs
  aggregate        Group runs and reduce each group

Options:
  --dir=<path>     Directory holding one numbered subdirectory per run
  --out=<path>     Where the index database lives (default: --dir)
  --where=k=v,...  Only runs whose flattened metadata matches
  --config=<file>  JSON file overriding labtrack defaults
  --logLevel=<l>   debug | info | warn | error
  --help, -h       Show this help

Examples:
  labtrack sync --dir=runs/mnist
  labtrack runs --dir=runs/mnist --where=info.status=COMPLETE --columns=info.run_id,config.lr
  labtrack diff --dir=runs/mnist --prefix=config.
  labtrack aggregate --dir=runs/mnist --by=config.lr --agg=last:metrics.loss,avgstd:metrics.loss
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "sync") {
    await syncCmd(args.slice(1));
  } else if (command === "runs") {
    await runsCmd(args.slice(1));
  } else if (command === "diff") {
    await diffCmd(args.slice(1));
  } else if (command === "aggregate") {
    await aggregateCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err instanceof Error ? err.message : err);
  process.exit(1);
});
