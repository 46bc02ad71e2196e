/**
 * Write path for a single run.
 *
 * `RunLogger.create` claims a run directory, lays out its subdirectories and
 * writes the metadata files. Metrics are appended one JSON object per line;
 * every key ever written to a metrics file is also recorded in a small key
 * registry so readers know which fields exist without reading the data.
 */
import { appendFile, mkdir, readFile, writeFile } from "node:fs/promises";
import { hostname } from "node:os";
import { basename, join, resolve } from "node:path";
import { Effect } from "effect";
import {
  RunLoggerError,
  type RunDirError,
  type JsonObject,
  type JsonValue,
  type RunInfo,
  type RunStatus,
  defaultLabtrackConfig,
  isJsonObject,
  isReservedMetricsName,
  keysPath,
  metadataPath,
  metricsPath,
  runPaths,
  type RunPaths,
} from "@labtrack/core";
import { allocateRunDir, type AllocateOptions } from "./allocate.js";

export interface RunLoggerOptions {
  /** Directory holding one numbered subdirectory per run. */
  readonly parentDir: string;
  /** Reuse this run id instead of allocating a fresh one. */
  readonly forcedId?: number;
  readonly config?: JsonObject;
  readonly metricsFile?: string;
  readonly allocate?: AllocateOptions;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function writeJson(path: string, value: JsonValue): Effect.Effect<void, RunLoggerError> {
  return Effect.tryPromise({
    try: () => writeFile(path, `${JSON.stringify(value, null, 2)}\n`, "utf-8"),
    catch: (cause) => new RunLoggerError({ message: `Failed to write "${path}"`, cause }),
  });
}

async function readRegistry(path: string): Promise<JsonObject> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (cause) {
    if (typeof cause === "object" && cause !== null && "code" in cause && cause.code === "ENOENT") return {};
    throw cause;
  }
  const parsed: unknown = JSON.parse(raw);
  return isJsonObject(parsed) ? parsed : {};
}

export class RunLogger {
  readonly id: number;
  readonly paths: RunPaths;
  private info: RunInfo;
  private readonly defaultMetricsFile: string;
  private readonly knownKeys = new Map<string, Set<string>>();

  private constructor(id: number, paths: RunPaths, info: RunInfo, metricsFile: string) {
    this.id = id;
    this.paths = paths;
    this.info = info;
    this.defaultMetricsFile = metricsFile;
  }

  get runDir(): string {
    return this.paths.runDir;
  }

  get status(): RunStatus {
    return this.info.status;
  }

  static create(options: RunLoggerOptions): Effect.Effect<RunLogger, RunDirError | RunLoggerError> {
    const parentDir = resolve(options.parentDir);
    return Effect.gen(function* () {
      const { id, dir } = yield* allocateRunDir(parentDir, options.forcedId, options.allocate);
      const paths = runPaths(dir);

      yield* Effect.tryPromise({
        try: async () => {
          await mkdir(paths.metadataDir, { recursive: true });
          await mkdir(paths.metricsDir, { recursive: true });
          await mkdir(paths.artifactsDir, { recursive: true });
        },
        catch: (cause) => new RunLoggerError({ message: `Failed to lay out run directory "${dir}"`, cause }),
      });

      const now = new Date();
      const info: RunInfo = {
        run_id: id,
        log_dir: dir,
        hostname: hostname(),
        process_id: process.pid,
        date: `${pad(now.getDate())}/${pad(now.getMonth() + 1)}/${now.getFullYear()}`,
        time: `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`,
        status: "STARTING",
      };

      const logger = new RunLogger(id, paths, info, options.metricsFile ?? defaultLabtrackConfig.metricsFile);
      yield* writeJson(metadataPath(dir, "config"), options.config ?? {});
      yield* logger.writeInfo();
      yield* Effect.logDebug(`created run ${id} at ${dir}`);
      return logger;
    });
  }

  /** Append one point to `metrics/<fileName>.jsonl` and register its keys. */
  logMetrics(values: JsonObject, fileName: string = this.defaultMetricsFile): Effect.Effect<void, RunLoggerError> {
    if (isReservedMetricsName(fileName)) {
      return Effect.fail(
        new RunLoggerError({ message: `Metrics file name "${fileName}" is reserved for run metadata` }),
      );
    }
    const path = metricsPath(this.runDir, fileName);
    return this.registerKeys(Object.keys(values), fileName).pipe(
      Effect.zipRight(
        Effect.tryPromise({
          try: () => appendFile(path, `${JSON.stringify(values)}\n`, "utf-8"),
          catch: (cause) => new RunLoggerError({ message: `Failed to append metrics to "${path}"`, cause }),
        }),
      ),
    );
  }

  /** Write raw bytes or text to `artifacts/<name>`. */
  logArtifact(name: string, data: string | Uint8Array): Effect.Effect<string, RunLoggerError> {
    const path = join(this.paths.artifactsDir, basename(name));
    return Effect.tryPromise({
      try: async () => {
        await writeFile(path, data);
        return path;
      },
      catch: (cause) => new RunLoggerError({ message: `Failed to save artifact "${name}"`, cause }),
    });
  }

  setStatus(status: Exclude<RunStatus, "STARTING">): Effect.Effect<void, RunLoggerError> {
    this.info = { ...this.info, status };
    return this.writeInfo();
  }

  private writeInfo(): Effect.Effect<void, RunLoggerError> {
    const { run_id, log_dir, hostname: host, process_id, date, time, status } = this.info;
    return writeJson(metadataPath(this.runDir, "info"), { run_id, log_dir, hostname: host, process_id, date, time, status });
  }

  private registerKeys(keys: readonly string[], fileName: string): Effect.Effect<void, RunLoggerError> {
    const known = this.knownKeys.get(fileName) ?? new Set<string>();
    this.knownKeys.set(fileName, known);
    const fresh = keys.filter((key) => !known.has(key));
    if (fresh.length === 0) return Effect.void;

    const path = keysPath(this.runDir, fileName);
    return Effect.tryPromise({
      try: async () => {
        await mkdir(this.paths.keysDir, { recursive: true });
        const registry = await readRegistry(path);
        for (const key of fresh) registry[key] = "";
        await writeFile(path, `${JSON.stringify(registry, null, 2)}\n`, "utf-8");
        for (const key of fresh) known.add(key);
      },
      catch: (cause) => new RunLoggerError({ message: `Failed to update key registry "${path}"`, cause }),
    });
  }
}
