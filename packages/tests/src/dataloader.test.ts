import { describe, it, expect } from "vitest";
import { ConfigError, SeededRng, ShapeMismatch } from "@tensorgrad/core";
import { Tensor } from "@tensorgrad/tensor";
import { DataLoader } from "@tensorgrad/train";

function dataset() {
  const data = Tensor.fromData([0, 1, 2, 3, 4, 5, 6, 7, 8, 9], [5, 2]);
  const labels = Tensor.fromData([0, 1, 2, 3, 4], [5, 1]);
  return { data, labels };
}

describe("DataLoader", () => {
  it("serves fixed-size batches with a short last batch", () => {
    const { data, labels } = dataset();
    const loader = new DataLoader(data, labels, { batchSize: 2 });
    expect(loader.length).toBe(5);
    expect(loader.numBatches).toBe(3);

    const first = loader.next();
    expect(first?.data.dims).toEqual([2, 2]);
    expect(first?.data.toArray()).toEqual([0, 1, 2, 3]);
    expect(first?.labels.toArray()).toEqual([0, 1]);

    expect(loader.next()?.labels.toArray()).toEqual([2, 3]);

    const last = loader.next();
    expect(last?.data.dims).toEqual([1, 2]);
    expect(last?.data.toArray()).toEqual([8, 9]);
    expect(last?.labels.toArray()).toEqual([4]);

    expect(loader.next()).toBeNull();
  });

  it("reset starts a new epoch", () => {
    const { data, labels } = dataset();
    const loader = new DataLoader(data, labels, { batchSize: 4 });
    loader.next();
    loader.next();
    expect(loader.next()).toBeNull();
    loader.reset();
    expect(loader.next()?.labels.toArray()).toEqual([0, 1, 2, 3]);
  });

  it("iterates a full epoch each time", () => {
    const { data, labels } = dataset();
    const loader = new DataLoader(data, labels, { batchSize: 2 });
    loader.next();
    const sizes = [...loader].map((b) => b.labels.numel);
    expect(sizes).toEqual([2, 2, 1]);
    expect([...loader].length).toBe(3);
  });

  it("shuffles rows and labels together", () => {
    const { data, labels } = dataset();
    const loader = new DataLoader(data, labels, { batchSize: 2, shuffle: true, rng: new SeededRng(11) });
    const seen: number[] = [];
    for (const batch of loader) {
      const rows = batch.data.toArray();
      batch.labels.toArray().forEach((label, k) => {
        expect(rows.slice(2 * k, 2 * k + 2)).toEqual([2 * label, 2 * label + 1]);
        seen.push(label);
      });
    }
    expect([...seen].sort()).toEqual([0, 1, 2, 3, 4]);
  });

  it("does not alias the source tensors", () => {
    const { data, labels } = dataset();
    const loader = new DataLoader(data, labels, { batchSize: 5 });
    data.fill(-1);
    expect(loader.next()?.data.toArray()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("accepts non-contiguous input", () => {
    const data = Tensor.fromArray([[1, 2, 3], [4, 5, 6]]).transpose();
    const labels = Tensor.fromArray([7, 8, 9]);
    const loader = new DataLoader(data, labels, { batchSize: 3 });
    expect(loader.next()?.data.toArray()).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it("validates its inputs", () => {
    const { data, labels } = dataset();
    expect(() => new DataLoader(data, labels, { batchSize: 0 })).toThrow(ConfigError);
    expect(() => new DataLoader(data, labels, { batchSize: 1.5 })).toThrow(ConfigError);
    expect(() => new DataLoader(data, Tensor.zeros([4, 1]), { batchSize: 2 })).toThrow(ShapeMismatch);
    expect(() => new DataLoader(Tensor.scalar(1), labels, { batchSize: 2 })).toThrow(ShapeMismatch);
  });
});
