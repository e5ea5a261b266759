/**
 * Resolve pluggable implementations from CLI args.
 */
import { createOptimizerRegistry, type Optimizer, type OptimizerConfig } from "@tensorgrad/train";
import type { Tensor } from "@tensorgrad/tensor";
import type { TrainConfig } from "@tensorgrad/core";

const optimizerRegistry = createOptimizerRegistry();

export function resolveOptimizer(config: TrainConfig, params: readonly Tensor[]): Optimizer {
  const hyper: OptimizerConfig = {
    lr: config.lr,
    momentum: config.momentum,
    weightDecay: config.weightDecay,
    beta1: config.beta1,
    beta2: config.beta2,
    eps: config.eps,
  };
  return optimizerRegistry.get(config.optimizer, params, hyper);
}

export function listImplementations(): string {
  return `  optimizer: ${optimizerRegistry.list().join(", ")}`;
}
