/**
 * Differentiable operations: each runs a raw kernel eagerly, then stamps the
 * result with its op record and parents so `backward()` can replay it.
 *
 * Every function takes the GradContext first. Nothing is recorded when grad
 * mode is off or no operand requires grad.
 */
import { Tensor, kernels, type OpRecord } from "@tensorgrad/tensor";
import type { Dims } from "@tensorgrad/core";
import type { GradContext } from "./context.js";

// helper: link the output into the graph when recording applies
function record(ctx: GradContext, out: Tensor, parents: readonly Tensor[], op: OpRecord): Tensor {
  if (!ctx.gradEnabled || !parents.some((p) => p.requiresGrad)) return out;
  out.requiresGrad = true;
  out.isLeaf = false;
  out.op = op;
  out.parents = parents;
  out.gradState = "computed";
  return out;
}

// ── Arithmetic ─────────────────────────────────────────────────────────────

export function add(ctx: GradContext, a: Tensor, b: Tensor): Tensor {
  return record(ctx, kernels.add(a, b), [a, b], { tag: "add" });
}

export function sub(ctx: GradContext, a: Tensor, b: Tensor): Tensor {
  return record(ctx, kernels.sub(a, b), [a, b], { tag: "sub" });
}

export function mul(ctx: GradContext, a: Tensor, b: Tensor): Tensor {
  return record(ctx, kernels.mul(a, b), [a, b], { tag: "mul" });
}

export function div(ctx: GradContext, a: Tensor, b: Tensor): Tensor {
  return record(ctx, kernels.div(a, b), [a, b], { tag: "div" });
}

export function neg(ctx: GradContext, a: Tensor): Tensor {
  return record(ctx, kernels.neg(a), [a], { tag: "neg" });
}

export function matmul(ctx: GradContext, a: Tensor, b: Tensor): Tensor {
  return record(ctx, kernels.matmul(a, b), [a, b], { tag: "matmul" });
}

// ── Reductions ─────────────────────────────────────────────────────────────

export function sum(ctx: GradContext, a: Tensor, axis: number | null = null, keepdims = false): Tensor {
  return record(ctx, kernels.sum(a, axis, keepdims), [a], { tag: "sum", axis, keepdims });
}

export function mean(ctx: GradContext, a: Tensor, axis: number | null = null, keepdims = false): Tensor {
  return record(ctx, kernels.mean(a, axis, keepdims), [a], { tag: "mean", axis, keepdims });
}

// ── Activations ────────────────────────────────────────────────────────────

export function relu(ctx: GradContext, a: Tensor): Tensor {
  return record(ctx, kernels.relu(a), [a], { tag: "relu" });
}

export function sigmoid(ctx: GradContext, a: Tensor): Tensor {
  return record(ctx, kernels.sigmoid(a), [a], { tag: "sigmoid" });
}

export function tanh(ctx: GradContext, a: Tensor): Tensor {
  return record(ctx, kernels.tanh(a), [a], { tag: "tanh" });
}

// ── Views ──────────────────────────────────────────────────────────────────

export function reshape(ctx: GradContext, a: Tensor, dims: Dims): Tensor {
  return record(ctx, a.reshape(dims), [a], { tag: "reshape", dims: [...dims] });
}

export function permute(ctx: GradContext, a: Tensor, axes: readonly number[]): Tensor {
  return record(ctx, a.permute(axes), [a], { tag: "permute", axes: [...axes] });
}

export function transpose(ctx: GradContext, a: Tensor, dim0 = 0, dim1 = 1): Tensor {
  const out = a.transpose(dim0, dim1);
  const axes = Array.from({ length: a.ndim }, (_, i) => i);
  axes[dim0] = dim1;
  axes[dim1] = dim0;
  return record(ctx, out, [a], { tag: "permute", axes });
}

export function expand(ctx: GradContext, a: Tensor, dims: Dims): Tensor {
  return record(ctx, a.expand(dims), [a], { tag: "expand", dims: [...dims] });
}
