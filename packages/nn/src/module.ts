/**
 * Module: the capability set every layer exposes. Sequential composes
 * children over this interface without knowing their concrete types.
 */
import { AutogradError } from "@tensorgrad/core";
import type { Tensor } from "@tensorgrad/tensor";
import { backward, zeroGrad, type GradContext } from "@tensorgrad/autograd";

export interface Module {
  /** Layer type name (`Linear`, `ReLU`, ...). */
  readonly name: string;
  readonly training: boolean;
  forward(ctx: GradContext, x: Tensor): Tensor;
  /** Backpropagate `gradOutput` from the most recent forward output. */
  backward(ctx: GradContext, gradOutput?: Tensor): void;
  parameters(): Tensor[];
  zeroGrad(): void;
  release(): void;
  train(mode?: boolean): this;
  /** Serialization tag, e.g. `Linear` or `Sequential[Linear,ReLU]`. */
  tag(): string;
}

export abstract class BaseModule implements Module {
  abstract readonly name: string;
  training = true;
  protected lastOutput: Tensor | null = null;
  /** Views of parameters made by `compute`, held until the next forward or release. */
  private scratch: Tensor[] = [];

  protected abstract compute(ctx: GradContext, x: Tensor): Tensor;

  /** Register a view `compute` made; it is released on the next forward or on `release()`. */
  protected scoped(view: Tensor): Tensor {
    this.scratch.push(view);
    return view;
  }

  protected releaseScratch(): void {
    for (const v of this.scratch) v.release();
    this.scratch = [];
  }

  forward(ctx: GradContext, x: Tensor): Tensor {
    this.releaseScratch();
    const out = this.compute(ctx, x);
    this.lastOutput = out;
    return out;
  }

  backward(ctx: GradContext, gradOutput?: Tensor): void {
    if (!this.lastOutput) {
      throw new AutogradError({ message: `${this.name}.backward() called before forward()` });
    }
    backward(ctx, this.lastOutput, gradOutput);
  }

  parameters(): Tensor[] {
    return [];
  }

  zeroGrad(): void {
    for (const p of this.parameters()) zeroGrad(p);
  }

  release(): void {
    this.releaseScratch();
    for (const p of this.parameters()) p.release();
    this.lastOutput = null;
  }

  train(mode = true): this {
    this.training = mode;
    return this;
  }

  tag(): string {
    return this.name;
  }
}
