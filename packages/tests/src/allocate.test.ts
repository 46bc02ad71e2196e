import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdirSync, rmSync, statSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { Effect, Layer, LogLevel, Logger } from "effect";
import { allocateRunDir, maxExistingRunId } from "@labtrack/tracker";
import { makeTempDir, removeDir } from "./helpers.js";

const quiet = <A, E>(effect: Effect.Effect<A, E>) => effect.pipe(Effect.provide(Logger.remove(Logger.defaultLogger)));

describe("allocateRunDir", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it("starts at 1 in an empty root", async () => {
    const run = await Effect.runPromise(allocateRunDir(root));
    expect(run).toEqual({ id: 1, dir: join(root, "1") });
    expect(statSync(run.dir).isDirectory()).toBe(true);
  });

  it("creates a missing root", async () => {
    const nested = join(root, "a", "b");
    const run = await Effect.runPromise(allocateRunDir(nested));
    expect(run.id).toBe(1);
    expect(existsSync(join(nested, "1"))).toBe(true);
  });

  it("allocates max(existing) + 1, ignoring gaps", async () => {
    mkdirSync(join(root, "2"));
    mkdirSync(join(root, "7"));
    const run = await Effect.runPromise(allocateRunDir(root));
    expect(run.id).toBe(8);
  });

  it("ignores non-numeric directories and numeric files", async () => {
    mkdirSync(join(root, "3"));
    mkdirSync(join(root, "12a"));
    mkdirSync(join(root, "-4"));
    writeFileSync(join(root, "40"), "not a run");
    expect(maxExistingRunId(root)).toBe(3);
  });

  it("yields consecutive ids when called repeatedly", async () => {
    mkdirSync(join(root, "4"));
    const ids: number[] = [];
    for (let i = 0; i < 5; i++) {
      ids.push((await Effect.runPromise(allocateRunDir(root))).id);
    }
    expect(ids).toEqual([5, 6, 7, 8, 9]);
  });

  it("retries a taken id and claims it once it frees up", async () => {
    mkdirSync(join(root, "1"));
    const blocker = join(root, "2");
    writeFileSync(blocker, "");

    const messages: string[] = [];
    const capture = Logger.make(({ message }) => {
      const parts: unknown[] = Array.isArray(message) ? message : [message];
      messages.push(parts.map(String).join(" "));
    });
    const allocation = Effect.runPromise(
      allocateRunDir(root, undefined, { maxRetries: 1000, backoffMs: 20 }).pipe(
        Effect.provide(Layer.merge(Logger.replace(Logger.defaultLogger, capture), Logger.minimumLogLevel(LogLevel.Debug))),
      ),
    );
    setTimeout(() => rmSync(blocker), 50);

    const run = await allocation;
    expect(run).toEqual({ id: 2, dir: join(root, "2") });
    expect(statSync(run.dir).isDirectory()).toBe(true);
    expect(messages.length).toBeGreaterThan(0);
    expect(messages.every((m) => m === "run id 2 taken, retrying")).toBe(true);
  });

  it("re-scans the root between attempts", async () => {
    writeFileSync(join(root, "1"), "");
    const allocation = Effect.runPromise(quiet(allocateRunDir(root, undefined, { maxRetries: 1000, backoffMs: 20 })));
    setTimeout(() => mkdirSync(join(root, "5")), 50);
    expect(await allocation).toEqual({ id: 6, dir: join(root, "6") });
  });

  it("claims a requested id as given, even if it exists", async () => {
    mkdirSync(join(root, "3"));
    const first = await Effect.runPromise(allocateRunDir(root, 3));
    const second = await Effect.runPromise(allocateRunDir(root, 42));
    expect(first).toEqual({ id: 3, dir: join(root, "3") });
    expect(second.id).toBe(42);
    expect(existsSync(join(root, "42"))).toBe(true);
  });

  it("rejects negative or fractional requested ids", async () => {
    const error = await Effect.runPromise(Effect.flip(allocateRunDir(root, -1)));
    expect(error._tag).toBe("RunDirError");
    const fractional = await Effect.runPromise(Effect.flip(allocateRunDir(root, 1.5)));
    expect(fractional._tag).toBe("RunDirError");
  });

  it("gives up after the retry budget when the next id stays taken", async () => {
    // A plain file named "2" is skipped by the scan but blocks mkdir forever.
    mkdirSync(join(root, "1"));
    writeFileSync(join(root, "2"), "");
    const error = await Effect.runPromise(
      quiet(Effect.flip(allocateRunDir(root, undefined, { maxRetries: 3, backoffMs: 1 }))),
    );
    expect(error._tag).toBe("RunDirError");
    expect(error.message).toBe(`Run id 2 still taken after 3 retries under "${root}"`);
  });

  it("fails without retrying when the root cannot be created", async () => {
    const file = join(root, "file");
    writeFileSync(file, "");
    const error = await Effect.runPromise(Effect.flip(allocateRunDir(join(file, "runs"))));
    expect(error._tag).toBe("RunDirError");
    expect(error.message).toBe(`Cannot create run root "${join(file, "runs")}"`);
  });
});
