/**
 * LabtrackConfig type, defaults, loading and validation.
 */
import { readFile } from "node:fs/promises";
import { ConfigError } from "./errors.js";
import { isReservedMetricsName } from "./layout.js";
import { isJsonObject } from "./types.js";

export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface LabtrackConfig {
  /** Collisions tolerated while claiming a fresh run id. */
  readonly maxAllocRetries: number;
  /** Mean delay between allocation attempts; each delay is drawn from [0, 2 × this). */
  readonly allocBackoffMs: number;
  /** Default metrics file name for `RunLogger.logMetrics`. */
  readonly metricsFile: string;
  /** Key prefix inspected by `RunCollection.diff`. */
  readonly diffPrefix: string;
  readonly logLevel: LogLevelName;
}

const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some((level) => level === value);
}

function envLogLevel(): LogLevelName {
  const raw = process.env.LABTRACK_LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

export const defaultLabtrackConfig: LabtrackConfig = {
  maxAllocRetries: 1000,
  allocBackoffMs: 500,
  metricsFile: "metrics",
  diffPrefix: "config.",
  logLevel: envLogLevel(),
};

function numberField(raw: Record<string, unknown>, key: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new ConfigError({ message: `${key} must be a number, got ${JSON.stringify(value)}` });
  }
  return value;
}

function stringField(raw: Record<string, unknown>, key: string, fallback: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "string") {
    throw new ConfigError({ message: `${key} must be a string, got ${JSON.stringify(value)}` });
  }
  return value;
}

/** Merge raw overrides onto the defaults, throwing on unknown or ill-typed fields. */
export function resolveLabtrackConfig(raw: Record<string, unknown> = {}): LabtrackConfig {
  const validKeys = Object.keys(defaultLabtrackConfig);
  for (const key of Object.keys(raw)) {
    if (!validKeys.includes(key)) {
      throw new ConfigError({ message: `Unknown config field "${key}". Valid: ${validKeys.join(", ")}` });
    }
  }

  const logLevel = stringField(raw, "logLevel", defaultLabtrackConfig.logLevel).toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError({ message: `Invalid logLevel "${logLevel}". Valid: ${LOG_LEVELS.join(", ")}` });
  }

  const config: LabtrackConfig = {
    maxAllocRetries: numberField(raw, "maxAllocRetries", defaultLabtrackConfig.maxAllocRetries),
    allocBackoffMs: numberField(raw, "allocBackoffMs", defaultLabtrackConfig.allocBackoffMs),
    metricsFile: stringField(raw, "metricsFile", defaultLabtrackConfig.metricsFile),
    diffPrefix: stringField(raw, "diffPrefix", defaultLabtrackConfig.diffPrefix),
    logLevel,
  };
  validateLabtrackConfig(config);
  return config;
}

/** Validate a LabtrackConfig, throwing on invalid values. */
export function validateLabtrackConfig(config: LabtrackConfig): void {
  if (!Number.isInteger(config.maxAllocRetries) || config.maxAllocRetries < 0) {
    throw new ConfigError({ message: `maxAllocRetries must be an integer >= 0, got ${config.maxAllocRetries}` });
  }
  if (config.allocBackoffMs < 0) {
    throw new ConfigError({ message: `allocBackoffMs must be >= 0, got ${config.allocBackoffMs}` });
  }
  if (!/^[\w-]+$/.test(config.metricsFile)) {
    throw new ConfigError({ message: `metricsFile must be a plain file name, got "${config.metricsFile}"` });
  }
  if (isReservedMetricsName(config.metricsFile)) {
    throw new ConfigError({ message: `metricsFile "${config.metricsFile}" is reserved for run metadata` });
  }
}

/** Load a LabtrackConfig from a JSON file path, merging with defaults. */
export async function loadLabtrackConfig(path?: string): Promise<LabtrackConfig> {
  if (!path) return { ...defaultLabtrackConfig };

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (cause) {
    throw new ConfigError({ message: `Failed to read labtrack config at ${path}`, cause });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (cause) {
    throw new ConfigError({ message: `Failed to parse labtrack config at ${path}: invalid JSON`, cause });
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigError({ message: `Labtrack config at ${path} must be a JSON object` });
  }
  return resolveLabtrackConfig(parsed);
}
