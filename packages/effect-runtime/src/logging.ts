/**
 * Structured logging.
 *
 * A pretty console logger plus a synchronous bridge so hot, non-Effect code
 * (allocator, model conversion, optimizers) can log through the same
 * Effect logger and minimum level as the Effect programs.
 */
import { Effect, Logger, LogLevel } from "effect";
import type { LogLevelName } from "@tensorgrad/core";

// ── Pretty logger ──────────────────────────────────────────────────────────

function renderMessage(message: unknown): string {
  const parts: readonly unknown[] = Array.isArray(message) ? message : [message];
  return parts.map((p) => (typeof p === "string" ? p : JSON.stringify(p))).join(" ");
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const line = `[${ts}] ${lvl} ${renderMessage(message)}`;
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) {
    console.error(line);
  } else {
    console.log(line);
  }
});

export const PrettyLoggerLive = Logger.replace(Logger.defaultLogger, prettyLogger);

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "fatal": return LogLevel.Fatal;
    default: return LogLevel.Info;
  }
}

// ── Synchronous bridge ─────────────────────────────────────────────────────

let minimumLevel: LogLevel.LogLevel = LogLevel.Info;

export function setMinimumLogLevel(level: LogLevelName | LogLevel.LogLevel): void {
  minimumLevel = typeof level === "string" ? parseLogLevel(level) : level;
}

export function getMinimumLogLevel(): LogLevel.LogLevel {
  return minimumLevel;
}

export type SyncLogLevel = LogLevelName | "fatal";

function logEffect(level: SyncLogLevel, message: string): Effect.Effect<void> {
  switch (level) {
    case "debug": return Effect.logDebug(message);
    case "info": return Effect.logInfo(message);
    case "warn": return Effect.logWarning(message);
    case "error": return Effect.logError(message);
    case "fatal": return Effect.logFatal(message);
  }
}

/** Log from synchronous code through the pretty logger at the configured minimum level. */
export function logSync(level: SyncLogLevel, message: string): void {
  Effect.runSync(
    logEffect(level, message).pipe(
      Logger.withMinimumLogLevel(minimumLevel),
      Effect.provide(PrettyLoggerLive),
    ),
  );
}
