/**
 * Structured logging integration.
 *
 * A compact console logger for Effect programs.
 */
import { Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((p) => (typeof p === "string" ? p : JSON.stringify(p))).join(" ");
  let extra = "";
  for (const [key, value] of annotations) {
    extra += ` ${key}=${typeof value === "string" ? value : JSON.stringify(value)}`;
  }
  const line = `[${ts}] ${lvl} ${msg}${extra}`;
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) {
    console.error(line);
  } else {
    console.log(line);
  }
});

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}
