import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import { CheckpointError, SeededRng, type ModelRecord } from "@tensorgrad/core";
import { Linear, ReLU, Sequential, moduleFromRecord, moduleToRecord } from "@tensorgrad/nn";
import { FileModelStore, decodeModel, encodeModel } from "@tensorgrad/train";

const linearRecord: ModelRecord = {
  tag: "Linear",
  params: [
    { dims: [1, 2], data: Float32Array.from([0.5, -1]) },
    { dims: [1], data: Float32Array.from([0.25]) },
  ],
};

describe("model encoding", () => {
  it("writes the tag, a NUL and each parameter", () => {
    const buf = encodeModel(linearRecord);
    expect(buf.length).toBe(39);
    expect(buf.subarray(0, 7).toString("utf-8")).toBe("Linear\0");
    expect(buf.readInt32LE(7)).toBe(2);
    expect(buf.readInt32LE(11)).toBe(1);
    expect(buf.readInt32LE(15)).toBe(2);
    expect(buf.readFloatLE(19)).toBe(0.5);
    expect(buf.readFloatLE(23)).toBe(-1);
    expect(buf.readInt32LE(27)).toBe(1);
    expect(buf.readFloatLE(35)).toBe(0.25);
  });

  it("decodes what it encodes", () => {
    expect(decodeModel(encodeModel(linearRecord))).toEqual(linearRecord);
  });

  it("rejects a tag containing NUL", () => {
    expect(() => encodeModel({ tag: "a\0b", params: [] })).toThrow(CheckpointError);
  });

  it("rejects a missing tag terminator", () => {
    expect(() => decodeModel(Buffer.from("Linear"))).toThrow("model file has no type tag terminator");
  });

  it("rejects truncated parameter data", () => {
    const buf = encodeModel(linearRecord);
    expect(() => decodeModel(buf.subarray(0, 30))).toThrow(
      "model file truncated reading ndim of parameter 1 (offset 27)",
    );
    expect(() => decodeModel(buf.subarray(0, 21))).toThrow(
      "model file truncated reading data of parameter 0 (offset 19)",
    );
  });

  it("rejects a negative ndim", () => {
    const buf = Buffer.alloc(6);
    buf.write("T\0", 0);
    buf.writeInt32LE(-1, 2);
    expect(() => decodeModel(buf)).toThrow(CheckpointError);
  });
});

describe("FileModelStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tensorgrad-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("saves and reloads a model", async () => {
    const rng = new SeededRng(5);
    const model = new Sequential([new Linear(2, 3, { rng }), new ReLU(), new Linear(3, 1, { rng })]);
    const store = new FileModelStore();
    const path = join(dir, "nested", "model.bin");

    await Effect.runPromise(store.save(path, moduleToRecord(model)));
    const record = await Effect.runPromise(store.load(path));
    expect(record.tag).toBe("Sequential[Linear,ReLU,Linear]");

    const restored = moduleFromRecord(record);
    expect(restored.tag()).toBe(model.tag());
    const before = model.parameters().map((p) => p.toArray());
    const after = restored.parameters().map((p) => p.toArray());
    expect(after).toEqual(before);
  });

  it("fails with CheckpointError for a missing file", async () => {
    const error = await Effect.runPromise(Effect.flip(new FileModelStore().load(join(dir, "missing.bin"))));
    expect(error).toBeInstanceOf(CheckpointError);
    expect(error.message).toContain("Failed to load model from");
  });

  it("passes decode failures through unchanged", async () => {
    const path = join(dir, "bad.bin");
    await writeFile(path, Buffer.from("no terminator"));
    const error = await Effect.runPromise(Effect.flip(new FileModelStore().load(path)));
    expect(error.message).toBe("model file has no type tag terminator");
  });
});
