/**
 * Optimizers: SGD (with momentum and weight decay) and Adam.
 *
 * Both work over a flat, ordered parameter list (as returned by
 * `Module.parameters()`); per-parameter state is keyed by list index and
 * allocated lazily on the first step that sees a gradient.
 */
import { OptimizerError, Registry } from "@tensorgrad/core";
import type { Tensor } from "@tensorgrad/tensor";

export interface OptimizerState {
  step: number;
  buffers: Map<string, Float32Array>;
}

export interface Optimizer {
  readonly name: string;
  readonly params: readonly Tensor[];
  /** Apply one update from the current gradients, then zero them. */
  step(): void;
  zeroGrad(): void;
  stateDict(): OptimizerState;
  loadStateDict(state: OptimizerState): void;
  setLr(lr: number): void;
}

/** Hyperparameters accepted by every optimizer factory; each uses its own subset. */
export interface OptimizerConfig {
  lr?: number;
  momentum?: number;
  weightDecay?: number;
  beta1?: number;
  beta2?: number;
  eps?: number;
}

function checkParams(params: readonly Tensor[]): void {
  params.forEach((p, i) => {
    if (!p.isContiguous()) {
      throw new OptimizerError({ message: `parameter ${i} (${p.shape}) is not contiguous` });
    }
  });
}

function zeroAll(params: readonly Tensor[]): void {
  for (const p of params) p.grad?.zero();
}

function loadBuffers(
  target: Map<number, Float32Array>,
  state: OptimizerState,
  suffix: string,
  params: readonly Tensor[],
): void {
  target.clear();
  for (const [key, buf] of state.buffers) {
    if (!key.endsWith(suffix)) continue;
    const index = Number(key.slice(0, -suffix.length));
    const p = params[index];
    if (!Number.isInteger(index) || !p) {
      throw new OptimizerError({ message: `state buffer "${key}" has no matching parameter` });
    }
    if (buf.length !== p.numel) {
      throw new OptimizerError({
        message: `state buffer "${key}" has ${buf.length} elements, parameter ${index} has ${p.numel}`,
      });
    }
    target.set(index, new Float32Array(buf));
  }
}

function lazyBuffer(map: Map<number, Float32Array>, index: number, size: number): Float32Array {
  let buf = map.get(index);
  if (!buf) {
    buf = new Float32Array(size);
    map.set(index, buf);
  }
  return buf;
}

// ── SGD ────────────────────────────────────────────────────────────────────

export interface SGDConfig {
  lr: number;
  momentum: number;
  weightDecay: number;
}

export class SGD implements Optimizer {
  readonly name = "sgd";
  readonly params: readonly Tensor[];
  private _step = 0;
  private _velocity = new Map<number, Float32Array>();
  private config: SGDConfig;

  constructor(params: readonly Tensor[], config: Partial<SGDConfig> = {}) {
    checkParams(params);
    this.params = params;
    this.config = {
      lr: config.lr ?? 0.01,
      momentum: config.momentum ?? 0,
      weightDecay: config.weightDecay ?? 0,
    };
  }

  step(): void {
    this._step++;
    const { lr, momentum, weightDecay } = this.config;
    this.params.forEach((p, i) => {
      const grad = p.grad;
      if (!grad) return;
      const pData = p.data;
      const gData = grad.data;
      const base = p.offset;
      const size = p.numel;
      if (weightDecay !== 0) {
        for (let j = 0; j < size; j++) gData[j] += weightDecay * pData[base + j];
      }
      if (momentum !== 0) {
        const v = lazyBuffer(this._velocity, i, size);
        for (let j = 0; j < size; j++) {
          v[j] = momentum * v[j] - lr * gData[j];
          pData[base + j] += v[j];
        }
      } else {
        for (let j = 0; j < size; j++) pData[base + j] -= lr * gData[j];
      }
      grad.zero();
    });
  }

  zeroGrad(): void {
    zeroAll(this.params);
  }

  stateDict(): OptimizerState {
    const buffers = new Map<string, Float32Array>();
    for (const [i, v] of this._velocity) buffers.set(`${i}.v`, new Float32Array(v));
    return { step: this._step, buffers };
  }

  loadStateDict(state: OptimizerState): void {
    loadBuffers(this._velocity, state, ".v", this.params);
    this._step = state.step;
  }

  setLr(lr: number): void {
    this.config.lr = lr;
  }
}

// ── Adam ───────────────────────────────────────────────────────────────────

export interface AdamConfig {
  lr: number;
  beta1: number;
  beta2: number;
  eps: number;
}

/**
 * Adam. The step size is bias-corrected (`lr * sqrt(1-β2ⁿ) / (1-β1ⁿ)`) and
 * the moments are bias-corrected as well, so early steps are larger than in
 * the textbook formulation.
 */
export class Adam implements Optimizer {
  readonly name = "adam";
  readonly params: readonly Tensor[];
  private _step = 0;
  private _m = new Map<number, Float32Array>();
  private _v = new Map<number, Float32Array>();
  private config: AdamConfig;

  constructor(params: readonly Tensor[], config: Partial<AdamConfig> = {}) {
    checkParams(params);
    this.params = params;
    this.config = {
      lr: config.lr ?? 1e-3,
      beta1: config.beta1 ?? 0.9,
      beta2: config.beta2 ?? 0.999,
      eps: config.eps ?? 1e-8,
    };
  }

  get stepCount(): number {
    return this._step;
  }

  step(): void {
    this._step++;
    const { lr, beta1, beta2, eps } = this.config;
    const bc1 = 1 - Math.pow(beta1, this._step);
    const bc2 = 1 - Math.pow(beta2, this._step);
    const lrCorrected = lr * Math.sqrt(bc2) / bc1;

    this.params.forEach((p, i) => {
      const grad = p.grad;
      if (!grad) return;
      const pData = p.data;
      const gData = grad.data;
      const base = p.offset;
      const size = p.numel;
      const m = lazyBuffer(this._m, i, size);
      const v = lazyBuffer(this._v, i, size);
      for (let j = 0; j < size; j++) {
        const g = gData[j];
        m[j] = beta1 * m[j] + (1 - beta1) * g;
        v[j] = beta2 * v[j] + (1 - beta2) * g * g;
        const mHat = m[j] / bc1;
        const vHat = v[j] / bc2;
        pData[base + j] -= lrCorrected * mHat / (Math.sqrt(vHat) + eps);
      }
      grad.zero();
    });
  }

  zeroGrad(): void {
    zeroAll(this.params);
  }

  /** Moment buffer for parameter `index` (first or second), if allocated. */
  moment(index: number, which: 1 | 2): Float32Array | undefined {
    return (which === 1 ? this._m : this._v).get(index);
  }

  stateDict(): OptimizerState {
    const buffers = new Map<string, Float32Array>();
    for (const [i, m] of this._m) buffers.set(`${i}.m`, new Float32Array(m));
    for (const [i, v] of this._v) buffers.set(`${i}.v`, new Float32Array(v));
    return { step: this._step, buffers };
  }

  loadStateDict(state: OptimizerState): void {
    loadBuffers(this._m, state, ".m", this.params);
    loadBuffers(this._v, state, ".v", this.params);
    this._step = state.step;
  }

  setLr(lr: number): void {
    this.config.lr = lr;
  }
}

// ── Registry ───────────────────────────────────────────────────────────────

export function createOptimizerRegistry() {
  const registry = new Registry<Optimizer, [readonly Tensor[], OptimizerConfig]>("optimizer");
  registry.register("sgd", (params, c) => new SGD(params, {
    lr: c.lr, momentum: c.momentum, weightDecay: c.weightDecay,
  }));
  registry.register("adam", (params, c) => new Adam(params, {
    lr: c.lr, beta1: c.beta1, beta2: c.beta2, eps: c.eps,
  }));
  return registry;
}
