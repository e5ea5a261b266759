/**
 * Built-in layers.
 */
import { SeededRng, ShapeMismatch, defaultEngineConfig, type Rng } from "@tensorgrad/core";
import { Tensor } from "@tensorgrad/tensor";
import * as ag from "@tensorgrad/autograd";
import { BaseModule } from "./module.js";

export interface LinearOptions {
  bias?: boolean;
  /** Source for the weight init; a fixed-seed generator when omitted. */
  rng?: Rng;
}

/** Weight init range: U(-INIT_SCALE, INIT_SCALE). */
const INIT_SCALE = 0.05;

/** y = x @ Wᵀ + b, with W of shape [out, in]. */
export class Linear extends BaseModule {
  readonly name = "Linear";
  readonly inFeatures: number;
  readonly outFeatures: number;
  readonly weight: Tensor;
  readonly bias: Tensor | null;

  constructor(inFeatures: number, outFeatures: number, options: LinearOptions = {}) {
    super();
    this.inFeatures = inFeatures;
    this.outFeatures = outFeatures;
    const rng = options.rng ?? new SeededRng(defaultEngineConfig.seed);
    this.weight = Tensor.rand([outFeatures, inFeatures], rng, "f32", -INIT_SCALE, INIT_SCALE).setRequiresGrad();
    this.bias = options.bias === false ? null : Tensor.zeros([outFeatures]).setRequiresGrad();
  }

  protected compute(ctx: ag.GradContext, x: Tensor): Tensor {
    if (x.ndim !== 2 || x.dims[1] !== this.inFeatures) {
      throw new ShapeMismatch({
        message: `Linear(${this.inFeatures}, ${this.outFeatures}) expects input [batch, ${this.inFeatures}], got ${x.shape}`,
      });
    }
    const wt = this.scoped(ag.transpose(ctx, this.weight, 0, 1));
    const y = ag.matmul(ctx, x, wt);
    return this.bias ? ag.add(ctx, y, this.bias) : y;
  }

  parameters(): Tensor[] {
    return this.bias ? [this.weight, this.bias] : [this.weight];
  }
}

export class ReLU extends BaseModule {
  readonly name = "ReLU";

  protected compute(ctx: ag.GradContext, x: Tensor): Tensor {
    return ag.relu(ctx, x);
  }
}

export class Sigmoid extends BaseModule {
  readonly name = "Sigmoid";

  protected compute(ctx: ag.GradContext, x: Tensor): Tensor {
    return ag.sigmoid(ctx, x);
  }
}

export class Tanh extends BaseModule {
  readonly name = "Tanh";

  protected compute(ctx: ag.GradContext, x: Tensor): Tensor {
    return ag.tanh(ctx, x);
  }
}
