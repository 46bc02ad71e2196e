/**
 * Shared command plumbing: opening the index and running logged effects.
 */
import { Effect } from "effect";
import type { LabtrackConfig } from "@labtrack/core";
import { LoggingLive } from "@labtrack/effect-runtime";
import { Reader } from "@labtrack/reader";

export function runLogged<A, E>(config: LabtrackConfig, effect: Effect.Effect<A, E>): Promise<A> {
  return Effect.runPromise(effect.pipe(Effect.provide(LoggingLive(config.logLevel))));
}

/** Open (and, on first use, build) the index for the runs under `srcDir`. */
export async function openReader(config: LabtrackConfig, srcDir: string, dstDir?: string): Promise<Reader> {
  const reader = await Reader.open({ srcDir, dstDir });
  if (reader.lastSync) {
    const { runsIndexed, missing } = reader.lastSync;
    await runLogged(
      config,
      Effect.logInfo(`indexed ${runsIndexed} runs from ${srcDir}`).pipe(
        Effect.zipRight(Effect.forEach(missing, (dir) => Effect.logWarning(`metadata not found: ${dir}`))),
      ),
    );
  }
  return reader;
}
