import { describe, it, expect, vi, afterEach } from "vitest";
import { Effect, LogLevel } from "effect";
import {
  PrettyLoggerLive,
  getMinimumLogLevel,
  logSync,
  parseLogLevel,
  setMinimumLogLevel,
} from "@tensorgrad/effect-runtime";

afterEach(() => {
  setMinimumLogLevel("info");
  vi.restoreAllMocks();
});

describe("parseLogLevel", () => {
  it("maps names to Effect levels", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.Debug);
    expect(parseLogLevel("WARNING")).toBe(LogLevel.Warning);
    expect(parseLogLevel("fatal")).toBe(LogLevel.Fatal);
    expect(parseLogLevel("unknown")).toBe(LogLevel.Info);
  });
});

describe("prettyLogger", () => {
  it("writes info lines to stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    Effect.runSync(Effect.logInfo("hello", 3).pipe(Effect.provide(PrettyLoggerLive)));
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0][0])).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] INFO  hello 3$/);
  });

  it("writes warnings and errors to stderr", () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => undefined);
    Effect.runSync(Effect.logWarning("careful").pipe(Effect.provide(PrettyLoggerLive)));
    expect(String(err.mock.calls[0][0])).toMatch(/\] WARN  careful$/);
  });
});

describe("logSync", () => {
  it("respects the minimum level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const err = vi.spyOn(console, "error").mockImplementation(() => undefined);
    setMinimumLogLevel("error");
    expect(getMinimumLogLevel()).toBe(LogLevel.Error);
    logSync("info", "hidden");
    logSync("warn", "hidden");
    logSync("error", "shown");
    expect(log).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
    expect(String(err.mock.calls[0][0])).toMatch(/\] ERROR shown$/);
  });

  it("emits debug lines once the level allows it", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    logSync("debug", "quiet");
    expect(log).not.toHaveBeenCalled();
    setMinimumLogLevel(LogLevel.Debug);
    logSync("debug", "loud");
    expect(String(log.mock.calls[0][0])).toMatch(/\] DEBUG loud$/);
  });
});
