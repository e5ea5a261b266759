#!/usr/bin/env node
/**
 * tensorgrad CLI entry point.
 *
 * Commands: demo, train, inspect
 */
import { demoCmd } from "./commands/demo.js";
import { trainCmd } from "./commands/train.js";
import { inspectCmd } from "./commands/inspect.js";

const USAGE = `
tensorgrad: a small tensor engine with reverse-mode autodiff

Commands:
  demo             Run the built-in walkthrough (views, arithmetic, autograd, SGD)
  train            Fit a small MLP to synthetic regression data and save it
  inspect          Load a saved model and print its parameters

Options:
  --config=file.json   Read options from a JSON file (flags take precedence)
  --logLevel=LEVEL     debug | info | warn | error (env: TENSORGRAD_LOG_LEVEL)
  --seed=N             Seed for data generation, init and shuffling
  --maxAllocationElements=N   Largest single buffer the allocator hands out
  --help, -h           Show this help

Train options:
  --optimizer=sgd|adam --lr --momentum --weightDecay --beta1 --beta2 --eps
  --batchSize --epochs --shuffle --samples --hidden --out

Examples:
  tensorgrad demo
  tensorgrad train --optimizer=adam --lr=0.01 --epochs=100 --out=out/model.bin
  tensorgrad inspect --model=out/model.bin
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "demo") {
    await demoCmd(args.slice(1));
  } else if (command === "train") {
    await trainCmd(args.slice(1));
  } else if (command === "inspect") {
    await inspectCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
