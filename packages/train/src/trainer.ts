/**
 * Training loop orchestrator.
 *
 * Pure orchestration over a model, an optimizer and a data loader: forward,
 * MSE loss, backward, optimizer step, once per batch. Logs one line per epoch.
 */
import { Effect } from "effect";
import { TrainingError } from "@tensorgrad/core";
import { GradContext, backward, releaseGraph } from "@tensorgrad/autograd";
import { mseLoss, type Module } from "@tensorgrad/nn";
import type { DataLoader } from "./data.js";
import type { Optimizer } from "./optimizers.js";

export interface EpochMetrics {
  epoch: number;
  /** Mean batch loss over the epoch. */
  loss: number;
  batches: number;
  elapsedMs: number;
}

export interface TrainerDeps {
  model: Module;
  optimizer: Optimizer;
  loader: DataLoader;
  epochs: number;
  ctx?: GradContext;
  onEpoch?: (metrics: EpochMetrics) => void;
}

function runEpoch(ctx: GradContext, model: Module, optimizer: Optimizer, loader: DataLoader): { loss: number; batches: number } {
  let total = 0;
  let batches = 0;
  for (const batch of loader) {
    const pred = model.forward(ctx, batch.data);
    const loss = mseLoss(ctx, pred, batch.labels);
    backward(ctx, loss);
    optimizer.step();
    total += loss.item();
    batches++;
    releaseGraph(loss);
    batch.data.release();
    batch.labels.release();
  }
  return { loss: batches > 0 ? total / batches : 0, batches };
}

export function train(deps: TrainerDeps): Effect.Effect<EpochMetrics[], TrainingError> {
  const { model, optimizer, loader, epochs, onEpoch } = deps;
  const ctx = deps.ctx ?? new GradContext();
  return Effect.gen(function* () {
    yield* Effect.logInfo(
      `training ${model.tag()} | optimizer: ${optimizer.name} | samples: ${loader.length} | batch: ${loader.batchSize} | epochs: ${epochs}`,
    );
    model.train(true);
    const history: EpochMetrics[] = [];
    for (let epoch = 1; epoch <= epochs; epoch++) {
      const start = performance.now();
      const { loss, batches } = yield* Effect.try({
        try: () => runEpoch(ctx, model, optimizer, loader),
        catch: (e) => new TrainingError({ message: `epoch ${epoch} failed: ${e}`, cause: e }),
      });
      const metrics: EpochMetrics = { epoch, loss, batches, elapsedMs: performance.now() - start };
      history.push(metrics);
      yield* Effect.logInfo(`epoch ${epoch}/${epochs} | loss ${loss.toFixed(6)} | ${metrics.elapsedMs.toFixed(1)}ms`);
      if (onEpoch) onEpoch(metrics);
    }
    model.train(false);
    return history;
  });
}
