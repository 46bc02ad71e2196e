/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** A grouping key that is not a column of the collection. */
export class InvalidKeyError extends Data.TaggedError("InvalidKeyError")<{
  readonly message: string;
  readonly key: string;
  readonly validKeys: readonly string[];
}> {}

/** An object passed to `aggregate` that is not an aggregation map. */
export class InvalidAggregationMapError extends Data.TaggedError("InvalidAggregationMapError")<{
  readonly message: string;
}> {}

export class RunDirError extends Data.TaggedError("RunDirError")<{
  readonly message: string;
  readonly root: string;
  readonly cause?: unknown;
}> {}

export class RunLoggerError extends Data.TaggedError("RunLoggerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class IndexError extends Data.TaggedError("IndexError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
