import { describe, it, expect } from "vitest";
import { Effect, Logger } from "effect";
import { TrainingError } from "@tensorgrad/core";
import { Tensor } from "@tensorgrad/tensor";
import { Linear, Sequential } from "@tensorgrad/nn";
import { DataLoader, SGD, train, type EpochMetrics } from "@tensorgrad/train";

const quiet = <A, E>(program: Effect.Effect<A, E>) =>
  program.pipe(Effect.provide(Logger.replace(Logger.defaultLogger, Logger.none)));

function lineDataset() {
  // y = 2x + 1
  const data = Tensor.fromArray([[0], [1], [2], [3]]);
  const labels = Tensor.fromArray([[1], [3], [5], [7]]);
  return new DataLoader(data, labels, { batchSize: 4 });
}

describe("train", () => {
  it("reduces the loss every epoch on a linear target", async () => {
    const model = new Linear(1, 1);
    const optimizer = new SGD(model.parameters(), { lr: 0.05 });
    const seen: number[] = [];
    const history = await Effect.runPromise(
      quiet(train({ model, optimizer, loader: lineDataset(), epochs: 20, onEpoch: (m) => seen.push(m.epoch) })),
    );
    expect(history).toHaveLength(20);
    expect(seen).toEqual(Array.from({ length: 20 }, (_, i) => i + 1));
    for (let i = 1; i < history.length; i++) {
      expect(history[i].loss).toBeLessThan(history[i - 1].loss);
    }
    expect(history.every((m: EpochMetrics) => m.batches === 1)).toBe(true);
    expect(model.training).toBe(false);
    expect(model.weight.storage.refCount).toBe(1);
  });

  it("reports a failing epoch as TrainingError", async () => {
    const model = new Sequential([new Linear(3, 1)]);
    const optimizer = new SGD(model.parameters());
    const error = await Effect.runPromise(
      Effect.flip(quiet(train({ model, optimizer, loader: lineDataset(), epochs: 1 }))),
    );
    expect(error).toBeInstanceOf(TrainingError);
    expect(error.message).toMatch(/^epoch 1 failed: /);
  });
});
