import { describe, it, expect } from "vitest";
import { AutogradError, CheckpointError, SeededRng, ShapeMismatch } from "@tensorgrad/core";
import { Tensor, allocator } from "@tensorgrad/tensor";
import { GradContext, backward, releaseGraph } from "@tensorgrad/autograd";
import {
  Linear,
  ReLU,
  Sequential,
  Sigmoid,
  Tanh,
  moduleFromRecord,
  moduleToRecord,
  mseLoss,
} from "@tensorgrad/nn";

function fixedLinear(): Linear {
  const layer = new Linear(2, 1);
  layer.weight.set([0, 0], 2);
  layer.weight.set([0, 1], -3);
  layer.bias?.set([0], 0.5);
  return layer;
}

describe("Linear", () => {
  it("initializes small weights and a zero bias", () => {
    const layer = new Linear(4, 3, { rng: new SeededRng(1) });
    expect(layer.weight.dims).toEqual([3, 4]);
    expect(layer.weight.requiresGrad).toBe(true);
    for (const w of layer.weight.toArray()) expect(Math.abs(w)).toBeLessThanOrEqual(0.05);
    expect(layer.bias?.toArray()).toEqual([0, 0, 0]);
    expect(layer.parameters()).toHaveLength(2);
    expect(new Linear(4, 3, { bias: false }).parameters()).toHaveLength(1);
  });

  it("computes x @ W^T + b", () => {
    const y = fixedLinear().forward(new GradContext(), Tensor.fromArray([[1, 1], [0, 2]]));
    expect(y.dims).toEqual([2, 1]);
    expect(y.toArray()).toEqual([-0.5, -5.5]);
  });

  it("backpropagates into its parameters", () => {
    const ctx = new GradContext();
    const layer = fixedLinear();
    layer.forward(ctx, Tensor.fromArray([[1, 1], [0, 2]]));
    layer.backward(ctx, Tensor.ones([2, 1]));
    expect(layer.weight.grad?.toArray()).toEqual([1, 3]);
    expect(layer.bias?.grad?.toArray()).toEqual([2]);
  });

  it("rejects inputs of the wrong shape", () => {
    const layer = new Linear(2, 1);
    expect(() => layer.forward(new GradContext(), Tensor.zeros([2, 3]))).toThrow(ShapeMismatch);
    expect(() => layer.forward(new GradContext(), Tensor.zeros([2]))).toThrow(ShapeMismatch);
  });

  it("backward before forward fails", () => {
    expect(() => new Linear(2, 1).backward(new GradContext())).toThrow(AutogradError);
  });

  it("does not keep the weight alive across forwards", () => {
    const ctx = new GradContext();
    const layer = new Linear(4, 3);
    const x = Tensor.ones([2, 4]);
    for (let i = 0; i < 3; i++) layer.forward(ctx, x);
    expect(layer.weight.storage.refCount).toBe(2);
    layer.release();
    expect(layer.weight.storage.isReleased).toBe(true);
    expect(layer.bias?.storage.isReleased).toBe(true);
  });

  it("returns every byte after forward, backward and release", () => {
    const before = allocator.liveBytes;
    const ctx = new GradContext();
    const layer = fixedLinear();
    const x = Tensor.fromArray([[1, 1], [0, 2]]);
    const seed = Tensor.ones([2, 1]);
    const y = layer.forward(ctx, x);
    backward(ctx, y, seed);
    releaseGraph(y);
    expect(y.isReleased).toBe(true);
    expect(layer.weight.isReleased).toBe(false);
    layer.release();
    x.release();
    seed.release();
    expect(allocator.liveBytes).toBe(before);
  });
});

describe("activations", () => {
  it("apply elementwise", () => {
    const ctx = new GradContext();
    const x = Tensor.fromArray([[-1, 0]]);
    expect(new ReLU().forward(ctx, x).toArray()).toEqual([0, 0]);
    expect(new Sigmoid().forward(ctx, x).get([0, 1])).toBe(0.5);
    expect(new Tanh().forward(ctx, x).get([0, 1])).toBe(0);
    expect(new ReLU().parameters()).toEqual([]);
  });
});

describe("Sequential", () => {
  const make = () => new Sequential([new Linear(2, 3), new ReLU(), new Linear(3, 1)]);

  it("flattens parameters in layer order", () => {
    const model = make();
    expect(model.parameters().map((p) => p.dims)).toEqual([[3, 2], [3], [1, 3], [1]]);
    expect(model.tag()).toBe("Sequential[Linear,ReLU,Linear]");
  });

  it("chains forward passes", () => {
    const y = make().forward(new GradContext(), Tensor.zeros([4, 2]));
    expect(y.dims).toEqual([4, 1]);
  });

  it("zeroGrad and train propagate to children", () => {
    const model = make();
    model.zeroGrad();
    for (const p of model.parameters()) expect(p.grad?.toArray().every((v) => v === 0)).toBe(true);
    model.train(false);
    expect(model.training).toBe(false);
    expect(model.layers.every((l) => !l.training)).toBe(true);
  });

  it("release frees every parameter", () => {
    const model = make();
    const params = model.parameters();
    model.release();
    expect(params.every((p) => p.isReleased)).toBe(true);
  });
});

describe("mseLoss", () => {
  it("averages squared error and differentiates to 2(pred - target)/n", () => {
    const ctx = new GradContext();
    const pred = Tensor.fromArray([[1], [2]]).setRequiresGrad();
    const loss = mseLoss(ctx, pred, Tensor.zeros([2, 1]));
    expect(loss.dims).toEqual([]);
    expect(loss.item()).toBe(2.5);
    backward(ctx, loss);
    expect(pred.grad?.toArray()).toEqual([1, 2]);
  });
});

describe("module records", () => {
  it("round-trip a Sequential with and without biases", () => {
    const model = new Sequential([new Linear(2, 3, { bias: false }), new Tanh(), new Linear(3, 1)]);
    const record = moduleToRecord(model);
    expect(record.tag).toBe("Sequential[Linear,Tanh,Linear]");
    expect(record.params.map((p) => p.dims)).toEqual([[3, 2], [1, 3], [1]]);

    const restored = moduleFromRecord(record);
    expect(restored.parameters().map((p) => p.toArray())).toEqual(model.parameters().map((p) => p.toArray()));
  });

  it("rebuilds nested containers", () => {
    const model = new Sequential([new Sequential([new Linear(1, 1)]), new Sigmoid()]);
    const restored = moduleFromRecord(moduleToRecord(model));
    expect(restored.tag()).toBe("Sequential[Sequential[Linear],Sigmoid]");
  });

  it("rejects unknown layers and malformed tags", () => {
    expect(() => moduleFromRecord({ tag: "Conv", params: [] })).toThrow('Unknown layer type "Conv"');
    expect(() => moduleFromRecord({ tag: "Sequential[ReLU", params: [] })).toThrow(CheckpointError);
    expect(() => moduleFromRecord({ tag: "ReLU]", params: [] })).toThrow(CheckpointError);
  });

  it("rejects parameter lists that do not fit the tag", () => {
    const extra = { dims: [2], data: new Float32Array(2) };
    expect(() => moduleFromRecord({ tag: "ReLU", params: [extra] })).toThrow(CheckpointError);
    expect(() => moduleFromRecord({ tag: "Linear", params: [] })).toThrow(CheckpointError);
  });
});
