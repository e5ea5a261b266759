/**
 * Conversion between modules and the flat ModelRecord the model store
 * persists: a type tag plus every parameter, in `parameters()` order.
 */
import { CheckpointError, formatDims, type ModelRecord, type ParameterRecord } from "@tensorgrad/core";
import type { Module } from "./module.js";
import { Linear, ReLU, Sigmoid, Tanh } from "./layers.js";
import { Sequential } from "./sequential.js";

export function moduleToRecord(module: Module): ModelRecord {
  return {
    tag: module.tag(),
    params: module.parameters().map((p) => ({
      dims: [...p.dims],
      data: Float32Array.from(p.toArray()),
    })),
  };
}

// ── Tag parsing ────────────────────────────────────────────────────────────

interface TagNode {
  readonly name: string;
  readonly children: readonly TagNode[] | null;
}

function parseTag(tag: string): TagNode {
  let pos = 0;
  const fail = (why: string): never => {
    throw new CheckpointError({ message: `Malformed module tag "${tag}": ${why} at position ${pos}` });
  };
  const node = (): TagNode => {
    const start = pos;
    while (pos < tag.length && /[A-Za-z0-9_]/.test(tag[pos])) pos++;
    if (pos === start) fail("expected a layer name");
    const name = tag.slice(start, pos);
    if (tag[pos] !== "[") return { name, children: null };
    pos++;
    const children: TagNode[] = [];
    if (tag[pos] === "]") {
      pos++;
      return { name, children };
    }
    for (;;) {
      children.push(node());
      if (tag[pos] === ",") {
        pos++;
      } else if (tag[pos] === "]") {
        pos++;
        return { name, children };
      } else {
        fail("expected ',' or ']'");
      }
    }
  };
  const root = node();
  if (pos !== tag.length) fail("trailing characters");
  return root;
}

// ── Reconstruction ─────────────────────────────────────────────────────────

function build(node: TagNode, params: readonly ParameterRecord[], cursor: { i: number }): Module {
  if (node.name === "Sequential") {
    return new Sequential((node.children ?? []).map((child) => build(child, params, cursor)));
  }
  if (node.children !== null) {
    throw new CheckpointError({ message: `Layer ${node.name} cannot have children` });
  }
  switch (node.name) {
    case "Linear": {
      const w = params[cursor.i];
      if (!w || w.dims.length !== 2) {
        throw new CheckpointError({
          message: `Linear layer expects a 2-D weight at parameter ${cursor.i}, got ${w ? formatDims(w.dims) : "end of data"}`,
        });
      }
      const [out, inp] = w.dims;
      const b = params[cursor.i + 1];
      const hasBias = b !== undefined && b.dims.length === 1 && b.dims[0] === out;
      cursor.i += hasBias ? 2 : 1;
      return new Linear(inp, out, { bias: hasBias });
    }
    case "ReLU": return new ReLU();
    case "Sigmoid": return new Sigmoid();
    case "Tanh": return new Tanh();
    default:
      throw new CheckpointError({ message: `Unknown layer type "${node.name}"` });
  }
}

/** Rebuild the module a record describes and copy its parameter values in. */
export function moduleFromRecord(record: ModelRecord): Module {
  const cursor = { i: 0 };
  const module = build(parseTag(record.tag), record.params, cursor);
  const params = module.parameters();
  if (cursor.i !== record.params.length || params.length !== record.params.length) {
    throw new CheckpointError({
      message: `Model ${record.tag} has ${params.length} parameters but the record holds ${record.params.length}`,
    });
  }
  params.forEach((p, i) => {
    const src = record.params[i];
    if (!p.shape.equals(src.dims)) {
      throw new CheckpointError({
        message: `Parameter ${i} shape mismatch: model ${p.shape}, record ${formatDims(src.dims)}`,
      });
    }
    p.data.set(src.data);
  });
  return module;
}
