/**
 * Command: tensorgrad train
 *
 * Fits a small MLP to a synthetic linear-regression dataset and saves it.
 */
import { Effect } from "effect";
import {
  ModelStoreService,
  RngService,
  hashConfig,
  normal,
  uniform,
  type Rng,
} from "@tensorgrad/core";
import { Tensor } from "@tensorgrad/tensor";
import { withSpan } from "@tensorgrad/effect-runtime";
import { Linear, Sequential, Tanh, moduleToRecord } from "@tensorgrad/nn";
import { DataLoader, train as runTrain } from "@tensorgrad/train";
import { positiveIntArg, strArg } from "../parse.js";
import { listImplementations, resolveOptimizer } from "../resolve.js";
import { resolveArgs, runCommand, toConfigError } from "../runtime.js";

/** Target function: y = 2·x0 - 3·x1 + 0.5, plus small Gaussian noise. */
const TRUE_WEIGHTS = [2, -3];
const TRUE_BIAS = 0.5;
const NOISE_STD = 0.01;

export function syntheticRegression(rng: Rng, samples: number): { x: Tensor; y: Tensor } {
  const features = TRUE_WEIGHTS.length;
  const x = Tensor.create([samples, features]);
  const y = Tensor.create([samples, 1]);
  for (let i = 0; i < samples; i++) {
    let target = TRUE_BIAS;
    for (let j = 0; j < features; j++) {
      const v = uniform(rng, -1, 1);
      x.set([i, j], v);
      target += TRUE_WEIGHTS[j] * v;
    }
    y.set([i, 0], target + normal(rng, 0, NOISE_STD));
  }
  return { x, y };
}

export async function trainCmd(args: string[]): Promise<void> {
  const { kv, config, engine } = await Effect.runPromise(resolveArgs(args));
  const out = strArg(kv, "out", "out/model.bin");
  const samples = positiveIntArg(kv, "samples", 64);
  const hidden = positiveIntArg(kv, "hidden", 8);

  const program = Effect.gen(function* () {
    const rng = yield* RngService;
    const store = yield* ModelStoreService;

    yield* Effect.logInfo(`config_hash: ${hashConfig(config)} | seed: ${config.seed}`);
    yield* Effect.logDebug(`implementations:\n${listImplementations()}`);

    const { x, y } = syntheticRegression(rng, samples);
    const model = new Sequential([
      new Linear(TRUE_WEIGHTS.length, hidden, { rng }),
      new Tanh(),
      new Linear(hidden, 1, { rng }),
    ]);
    const optimizer = yield* Effect.try({
      try: () => resolveOptimizer(config, model.parameters()),
      catch: toConfigError,
    });
    const loader = yield* Effect.try({
      try: () => new DataLoader(x, y, { batchSize: config.batchSize, shuffle: config.shuffle, rng }),
      catch: toConfigError,
    });

    const history = yield* withSpan("train", runTrain({ model, optimizer, loader, epochs: config.epochs }));
    const final = history[history.length - 1];
    if (final) yield* Effect.logInfo(`final loss: ${final.loss.toFixed(6)}`);

    yield* store.save(out, moduleToRecord(model));
    yield* Effect.logInfo(`model saved: ${out}`);
  });

  await runCommand(engine, program);
}
