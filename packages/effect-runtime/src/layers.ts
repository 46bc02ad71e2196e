/**
 * Effect layers for the runtime services labtrack programs share.
 */
import { Layer, Logger } from "effect";
import { prettyLogger, parseLogLevel } from "./logging.js";

// ── Logging Layer ──────────────────────────────────────────────────────────

/** Swap the default logger for `prettyLogger` and drop messages below `level`. */
export const LoggingLive = (level: string) =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(parseLogLevel(level)),
  );
