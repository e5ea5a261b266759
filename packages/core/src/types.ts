/**
 * Core types for the tensorgrad system.
 */

// ── Dtype ──────────────────────────────────────────────────────────────────
export type Dtype = "f32" | "f64" | "i32";

/** Array types backing tensor storage. */
export type NumericArray = Float32Array | Float64Array | Int32Array;

export function dtypeBytes(d: Dtype): number {
  switch (d) {
    case "f32": return 4;
    case "f64": return 8;
    case "i32": return 4;
  }
}

export function dtypeArray(d: Dtype) {
  switch (d) {
    case "f32": return Float32Array;
    case "f64": return Float64Array;
    case "i32": return Int32Array;
  }
}

/** Resolve the common dtype for a binary op (promote to wider float if mixed). */
export function promoteDtypes(a: Dtype, b: Dtype): Dtype {
  if (a === b) return a;
  if (a === "f64" || b === "f64") return "f64";
  if (a === "f32" || b === "f32") return "f32";
  return "i32";
}

/** Gradients are always floating point; integer tensors accumulate in f32. */
export function gradDtype(d: Dtype): Dtype {
  return d === "i32" ? "f32" : d;
}

// ── Dims helpers ───────────────────────────────────────────────────────────
export type Dims = readonly number[];

export function dimsSize(dims: Dims): number {
  let s = 1;
  for (const d of dims) s *= d;
  return s;
}

export function rowMajorStrides(dims: Dims): number[] {
  const strides: number[] = new Array(dims.length);
  let stride = 1;
  for (let i = dims.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= dims[i];
  }
  return strides;
}

export function formatDims(dims: Dims): string {
  return `[${dims.join(", ")}]`;
}

// ── Engine config ──────────────────────────────────────────────────────────
export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface EngineConfig {
  readonly logLevel: LogLevelName;
  /** Largest single buffer the allocator hands out, in elements. */
  readonly maxAllocationElements: number;
  readonly seed: number;
}

export const defaultEngineConfig: EngineConfig = {
  logLevel: "info",
  maxAllocationElements: 1 << 28,
  seed: 42,
};

// ── Training config ────────────────────────────────────────────────────────
export interface TrainConfig {
  readonly optimizer: string;
  readonly lr: number;
  readonly momentum: number;
  readonly weightDecay: number;
  readonly beta1: number;
  readonly beta2: number;
  readonly eps: number;
  readonly batchSize: number;
  readonly epochs: number;
  readonly shuffle: boolean;
  readonly seed: number;
  readonly logLevel: LogLevelName;
}

export const defaultTrainConfig: TrainConfig = {
  optimizer: "sgd",
  lr: 0.05,
  momentum: 0,
  weightDecay: 0,
  beta1: 0.9,
  beta2: 0.999,
  eps: 1e-8,
  batchSize: 8,
  epochs: 50,
  shuffle: true,
  seed: 42,
  logLevel: "info",
};
