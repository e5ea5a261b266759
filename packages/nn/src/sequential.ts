import type { Tensor } from "@tensorgrad/tensor";
import type { GradContext } from "@tensorgrad/autograd";
import { BaseModule, type Module } from "./module.js";

/** Runs children in order; parameters are the children's, flattened. */
export class Sequential extends BaseModule {
  readonly name = "Sequential";
  readonly layers: readonly Module[];

  constructor(layers: readonly Module[]) {
    super();
    this.layers = layers;
  }

  protected compute(ctx: GradContext, x: Tensor): Tensor {
    let h = x;
    for (const layer of this.layers) h = layer.forward(ctx, h);
    return h;
  }

  parameters(): Tensor[] {
    return this.layers.flatMap((l) => l.parameters());
  }

  zeroGrad(): void {
    for (const l of this.layers) l.zeroGrad();
  }

  release(): void {
    this.releaseScratch();
    for (const l of this.layers) l.release();
    this.lastOutput = null;
  }

  train(mode = true): this {
    this.training = mode;
    for (const l of this.layers) l.train(mode);
    return this;
  }

  tag(): string {
    return `Sequential[${this.layers.map((l) => l.tag()).join(",")}]`;
  }
}
