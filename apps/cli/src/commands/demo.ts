/**
 * Command: tensorgrad demo
 *
 * Walks through views, arithmetic, autograd and one optimizer step.
 */
import { Effect } from "effect";
import { DivisionByZero } from "@tensorgrad/core";
import { Tensor, formatTensor, kernels } from "@tensorgrad/tensor";
import * as ag from "@tensorgrad/autograd";
import { SGD } from "@tensorgrad/train";
import { resolveArgs, runCommand } from "../runtime.js";

function show(label: string, t: Tensor): void {
  console.log(`${label}:\n${formatTensor(t)}\n`);
}

export function runDemo(): void {
  const ctx = new ag.GradContext();

  // Arithmetic
  const a = Tensor.fromArray([[1, 2], [3, 4]]);
  const b = Tensor.fromArray([[5, 6], [7, 8]]);
  show("a + b", kernels.add(a, b));
  show("a @ b", kernels.matmul(a, b));

  // Views share storage
  const at = a.transpose(0, 1);
  at.set([0, 1], 30);
  show("a after writing 30 through its transpose at [0, 1]", a);

  // Autograd
  const x = Tensor.fromArray([2, 3]).setRequiresGrad();
  const y = Tensor.fromArray([4, 5]).setRequiresGrad();
  const z = ag.sum(ctx, ag.mul(ctx, x, y));
  ag.backward(ctx, z);
  if (x.grad && y.grad) {
    show("d(sum(x*y))/dx", x.grad);
    show("d(sum(x*y))/dy", y.grad);
  }

  // One SGD step
  const p = Tensor.fromArray([1]).setRequiresGrad();
  ag.accumulateGrad(p, Tensor.fromArray([2]));
  new SGD([p], { lr: 0.1 }).step();
  show("p after SGD(lr=0.1) with grad 2", p);

  // Division by zero is rejected before any output exists
  try {
    kernels.div(a, Tensor.fromArray([1, 0]));
  } catch (e) {
    if (!(e instanceof DivisionByZero)) throw e;
    console.log(`a / [1, 0]: ${e._tag}: ${e.message}`);
  }
}

export async function demoCmd(args: string[]): Promise<void> {
  const { engine } = await Effect.runPromise(resolveArgs(args));
  await runCommand(engine, Effect.sync(runDemo));
}
