/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { Effect } from "effect";
import { ConfigError } from "@tensorgrad/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` });
  }
  return val;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function positiveIntArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError({ message: `--${key} must be a positive integer, got "${val}"` });
  }
  return n;
}

/** Environment variables that override config file values (flags still win). */
const ENV_KEYS: Readonly<Record<string, string>> = {
  TENSORGRAD_LOG_LEVEL: "logLevel",
};

export function envOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const val = env[name];
    if (val) result[key] = val;
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load a JSON config file (`--config=path`) and merge it under the
 * environment overrides and the CLI flags.
 */
export function loadConfig(
  kv: Record<string, string>,
  env: NodeJS.ProcessEnv = process.env,
): Effect.Effect<Record<string, string>, ConfigError> {
  const configPath = kv["config"];
  const overrides = { ...envOverrides(env), ...kv };
  if (!configPath) return Effect.succeed(overrides);
  return Effect.tryPromise({
    try: async () => {
      const fs = await import("node:fs/promises");
      const parsed: unknown = JSON.parse(await fs.readFile(configPath, "utf-8"));
      return parsed;
    },
    catch: (e) => new ConfigError({ message: `Failed to read config ${configPath}: ${e}`, cause: e }),
  }).pipe(
    Effect.flatMap((parsed) => {
      if (!isPlainObject(parsed)) {
        return Effect.fail(new ConfigError({ message: `Config ${configPath} must contain a JSON object` }));
      }
      const fromFile: Record<string, string> = {};
      for (const [key, value] of Object.entries(parsed)) {
        if (value !== null && value !== undefined) fromFile[key] = String(value);
      }
      return Effect.succeed({ ...fromFile, ...overrides });
    }),
  );
}
