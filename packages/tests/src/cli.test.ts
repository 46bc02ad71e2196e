import { describe, expect, it } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { isJsonObject, type JsonObject } from "@labtrack/core";

const repoRoot = join(dirname(fileURLToPath(import.meta.url)), "..", "..", "..");

function readManifest(path: string): JsonObject {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return isJsonObject(parsed) ? parsed : {};
}

describe("labtrack entry point", () => {
  const manifest = readManifest(join(repoRoot, "package.json"));

  it("runs the CLI from its TypeScript source through tsx", () => {
    expect(manifest["scripts"]).toMatchObject({ labtrack: "tsx apps/cli/src/main.ts" });
    expect(existsSync(join(repoRoot, "apps", "cli", "src", "main.ts"))).toBe(true);
    expect(manifest["devDependencies"]).toHaveProperty("tsx");
  });

  it("declares no compiled bin that would load workspace sources from dist", () => {
    expect(manifest).not.toHaveProperty("bin");
  });

  it("starts main.ts with a tsx shebang", () => {
    const firstLine = readFileSync(join(repoRoot, "apps", "cli", "src", "main.ts"), "utf-8").split("\n")[0];
    expect(firstLine).toBe("#!/usr/bin/env npx tsx");
  });
});
