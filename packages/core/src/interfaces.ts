/**
 * Subsystem interfaces (ports). Peripheral collaborators implement one of these.
 */
import { Context, Effect } from "effect";
import type { CheckpointError } from "./errors.js";
import type { Dims } from "./types.js";

// ── Model persistence ──────────────────────────────────────────────────────

/** One parameter as stored on disk: dims followed by raw f32 values. */
export interface ParameterRecord {
  readonly dims: Dims;
  readonly data: Float32Array;
}

/** A module flattened for persistence: its type tag and parameters in order. */
export interface ModelRecord {
  readonly tag: string;
  readonly params: readonly ParameterRecord[];
}

export interface ModelStore {
  save(path: string, record: ModelRecord): Effect.Effect<void, CheckpointError>;
  load(path: string): Effect.Effect<ModelRecord, CheckpointError>;
}

export class ModelStoreService extends Context.Tag("ModelStoreService")<
  ModelStoreService,
  ModelStore
>() {}

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  next(): number;
  nextGauss(): number;
  state(): number;
  setState(s: number): void;
  seed(s: number): void;
}

export class RngService extends Context.Tag("RngService")<
  RngService,
  Rng
>() {}
