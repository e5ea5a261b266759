/**
 * Config resolution: string key/value overrides (CLI flags, JSON files,
 * environment) merged over the typed defaults.
 */
import { ConfigError } from "./errors.js";
import {
  defaultEngineConfig,
  defaultTrainConfig,
  type EngineConfig,
  type LogLevelName,
  type TrainConfig,
} from "./types.js";

export type RawConfig = Readonly<Record<string, string | number | boolean | undefined>>;

const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

export function parseLogLevelName(value: string): LogLevelName {
  const v = value.toLowerCase();
  if (v === "warning") return "warn";
  for (const level of LOG_LEVELS) {
    if (level === v) return level;
  }
  throw new ConfigError({ message: `Invalid log level "${value}". Expected one of: ${LOG_LEVELS.join(", ")}` });
}

function num(raw: RawConfig, key: string, fallback: number, check: (n: number) => boolean, rule: string): number {
  const v = raw[key];
  if (v === undefined || v === "") return fallback;
  const n = typeof v === "number" ? v : Number(v);
  if (!Number.isFinite(n) || !check(n)) {
    throw new ConfigError({ message: `Invalid value for "${key}": ${String(v)} (${rule})` });
  }
  return n;
}

function bool(raw: RawConfig, key: string, fallback: boolean): boolean {
  const v = raw[key];
  if (v === undefined || v === "") return fallback;
  if (typeof v === "boolean") return v;
  const s = String(v);
  if (s === "true" || s === "1") return true;
  if (s === "false" || s === "0") return false;
  throw new ConfigError({ message: `Invalid value for "${key}": ${s} (expected true/false)` });
}

function str(raw: RawConfig, key: string, fallback: string): string {
  const v = raw[key];
  return v === undefined || v === "" ? fallback : String(v);
}

const positive = (n: number) => n > 0;
const nonNegative = (n: number) => n >= 0;
const positiveInt = (n: number) => Number.isInteger(n) && n > 0;
const unitInterval = (n: number) => n >= 0 && n < 1;

export function resolveTrainConfig(raw: RawConfig): TrainConfig {
  const d = defaultTrainConfig;
  return {
    optimizer: str(raw, "optimizer", d.optimizer),
    lr: num(raw, "lr", d.lr, positive, "must be > 0"),
    momentum: num(raw, "momentum", d.momentum, unitInterval, "must be in [0, 1)"),
    weightDecay: num(raw, "weightDecay", d.weightDecay, nonNegative, "must be >= 0"),
    beta1: num(raw, "beta1", d.beta1, unitInterval, "must be in [0, 1)"),
    beta2: num(raw, "beta2", d.beta2, unitInterval, "must be in [0, 1)"),
    eps: num(raw, "eps", d.eps, positive, "must be > 0"),
    batchSize: num(raw, "batchSize", d.batchSize, positiveInt, "must be a positive integer"),
    epochs: num(raw, "epochs", d.epochs, positiveInt, "must be a positive integer"),
    shuffle: bool(raw, "shuffle", d.shuffle),
    seed: num(raw, "seed", d.seed, Number.isInteger, "must be an integer"),
    logLevel: parseLogLevelName(str(raw, "logLevel", d.logLevel)),
  };
}

export function resolveEngineConfig(raw: RawConfig): EngineConfig {
  const d = defaultEngineConfig;
  return {
    logLevel: parseLogLevelName(str(raw, "logLevel", d.logLevel)),
    maxAllocationElements: num(
      raw, "maxAllocationElements", d.maxAllocationElements, positiveInt, "must be a positive integer",
    ),
    seed: num(raw, "seed", d.seed, Number.isInteger, "must be an integer"),
  };
}
