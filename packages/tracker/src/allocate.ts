/**
 * Run directory allocation.
 *
 * A run id is the name of a numeric subdirectory of the root. No counter is
 * stored: the next id is always `max(existing) + 1`, claimed with a
 * non-recursive mkdir. When another process claims the same id first, mkdir
 * fails with EEXIST and the claim is retried after a random delay, re-scanning
 * the root each time.
 */
import { mkdirSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { Data, Duration, Effect, Schedule } from "effect";
import { RunDirError, defaultLabtrackConfig, isRunDirName } from "@labtrack/core";

export interface AllocatedRun {
  readonly id: number;
  readonly dir: string;
}

export interface AllocateOptions {
  /** Collisions tolerated before giving up. */
  readonly maxRetries?: number;
  /** Delays are drawn uniformly from [0, 2 × backoffMs). */
  readonly backoffMs?: number;
}

class RunIdCollision extends Data.TaggedError("RunIdCollision")<{
  readonly id: number;
}> {}

function errnoCode(cause: unknown): string | undefined {
  if (typeof cause === "object" && cause !== null && "code" in cause) {
    const code = cause.code;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/** Largest numeric subdirectory name under `root`, or 0 if there is none. */
export function maxExistingRunId(root: string): number {
  let max = 0;
  for (const entry of readdirSync(root, { withFileTypes: true })) {
    if (!entry.isDirectory() || !isRunDirName(entry.name)) continue;
    const id = parseInt(entry.name, 10);
    if (id > max) max = id;
  }
  return max;
}

const ensureRoot = (root: string) =>
  Effect.try({
    try: () => {
      mkdirSync(root, { recursive: true });
    },
    catch: (cause) => new RunDirError({ message: `Cannot create run root "${root}"`, root, cause }),
  });

const claimNext = (root: string) =>
  Effect.try({
    try: (): AllocatedRun => {
      const id = maxExistingRunId(root) + 1;
      const dir = join(root, String(id));
      try {
        mkdirSync(dir);
      } catch (cause) {
        if (errnoCode(cause) === "EEXIST") throw new RunIdCollision({ id });
        throw cause;
      }
      return { id, dir };
    },
    catch: (cause) =>
      cause instanceof RunIdCollision
        ? cause
        : new RunDirError({ message: `Cannot create a run directory under "${root}"`, root, cause }),
  });

/**
 * Claim a run directory under `root`.
 *
 * With `requestedId` the directory is created if missing and returned as is;
 * the caller owns that id. Without it a fresh id is allocated.
 */
export function allocateRunDir(
  root: string,
  requestedId?: number,
  options: AllocateOptions = {},
): Effect.Effect<AllocatedRun, RunDirError> {
  if (requestedId !== undefined) {
    if (!Number.isInteger(requestedId) || requestedId < 0) {
      return Effect.fail(
        new RunDirError({ message: `Run id must be a non-negative integer, got ${requestedId}`, root }),
      );
    }
    const dir = join(root, String(requestedId));
    return Effect.try({
      try: () => {
        mkdirSync(dir, { recursive: true });
        return { id: requestedId, dir };
      },
      catch: (cause) => new RunDirError({ message: `Cannot create run directory "${dir}"`, root, cause }),
    });
  }

  const maxRetries = options.maxRetries ?? defaultLabtrackConfig.maxAllocRetries;
  const backoffMs = options.backoffMs ?? defaultLabtrackConfig.allocBackoffMs;
  const schedule = Schedule.jitteredWith(Schedule.spaced(Duration.millis(backoffMs)), { min: 0, max: 2 });

  return ensureRoot(root).pipe(
    Effect.zipRight(
      claimNext(root).pipe(
        Effect.tapError((e) =>
          e._tag === "RunIdCollision" ? Effect.logDebug(`run id ${e.id} taken, retrying`) : Effect.void,
        ),
        Effect.retry({
          schedule,
          times: maxRetries,
          while: (e) => e._tag === "RunIdCollision",
        }),
      ),
    ),
    Effect.catchTag("RunIdCollision", (e) =>
      Effect.logWarning(`Gave up allocating a run id under ${root} after ${maxRetries} retries`).pipe(
        Effect.zipRight(
          Effect.fail(
            new RunDirError({
              message: `Run id ${e.id} still taken after ${maxRetries} retries under "${root}"`,
              root,
              cause: e,
            }),
          ),
        ),
      ),
    ),
  );
}
