/**
 * Shared command plumbing: config resolution and running an Effect program
 * under the pretty logger at the configured level.
 */
import { Effect, Layer, Logger } from "effect";
import {
  ConfigError,
  resolveEngineConfig,
  resolveTrainConfig,
  type EngineConfig,
  type ModelStoreService,
  type RngService,
  type TrainConfig,
} from "@tensorgrad/core";
import {
  ModelStoreFrom,
  PrettyLoggerLive,
  RngLive,
  parseLogLevel,
  setMinimumLogLevel,
} from "@tensorgrad/effect-runtime";
import { allocator } from "@tensorgrad/tensor";
import { FileModelStore } from "@tensorgrad/train";
import { loadConfig, parseKV } from "./parse.js";

export function toConfigError(e: unknown): ConfigError {
  return e instanceof ConfigError ? e : new ConfigError({ message: String(e), cause: e });
}

export interface ResolvedArgs {
  kv: Record<string, string>;
  config: TrainConfig;
  engine: EngineConfig;
}

/** Flags > environment > --config file > defaults. */
export function resolveArgs(args: string[]): Effect.Effect<ResolvedArgs, ConfigError> {
  return loadConfig(parseKV(args)).pipe(
    Effect.flatMap((kv) => Effect.try({
      try: () => ({ kv, config: resolveTrainConfig(kv), engine: resolveEngineConfig(kv) }),
      catch: toConfigError,
    })),
  );
}

export function serviceLayer(seed: number): Layer.Layer<RngService | ModelStoreService> {
  return Layer.mergeAll(RngLive(seed), ModelStoreFrom(new FileModelStore()));
}

/** Run `program` with its services, logging any failure before rethrowing. */
export function runCommand<A, E extends { readonly message: string }>(
  engine: EngineConfig,
  program: Effect.Effect<A, E, RngService | ModelStoreService>,
): Promise<A> {
  const { logLevel, seed } = engine;
  setMinimumLogLevel(logLevel);
  allocator.maxElements = engine.maxAllocationElements;
  return Effect.runPromise(
    program.pipe(
      Effect.tapError((e) => Effect.logError(e.message)),
      Effect.provide(serviceLayer(seed)),
      Logger.withMinimumLogLevel(parseLogLevel(logLevel)),
      Effect.provide(PrettyLoggerLive),
    ),
  );
}
