/**
 * Effect layers for dependency injection.
 *
 * Each port gets a Layer that constructs it from config or wraps an instance.
 */
import { Layer } from "effect";
import {
  RngService, ModelStoreService,
  type ModelStore, type Rng,
  SeededRng,
} from "@tensorgrad/core";

// ── RNG Layer ──────────────────────────────────────────────────────────────

export const RngLive = (seed: number) =>
  Layer.succeed(RngService, new SeededRng(seed));

export const RngFrom = (rng: Rng) =>
  Layer.succeed(RngService, rng);

// ── Model store Layer ──────────────────────────────────────────────────────

export const ModelStoreFrom = (store: ModelStore) =>
  Layer.succeed(ModelStoreService, store);
