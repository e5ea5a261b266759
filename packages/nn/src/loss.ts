import type { Tensor } from "@tensorgrad/tensor";
import * as ag from "@tensorgrad/autograd";

/** Mean squared error over all elements; a 0-dim tensor. */
export function mseLoss(ctx: ag.GradContext, pred: Tensor, target: Tensor): Tensor {
  const diff = ag.sub(ctx, pred, target);
  const sq = ag.mul(ctx, diff, diff);
  return ag.mean(ctx, sq);
}
