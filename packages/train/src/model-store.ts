/**
 * Model save/load.
 *
 * Binary layout (all integers int32 LE, all values float32 LE):
 *   [N bytes: module type tag (UTF-8)] [1 byte: NUL]
 *   per parameter, in order:
 *     [4 bytes: ndim] [ndim × 4 bytes: dims] [prod(dims) × 4 bytes: data]
 *
 * There is no magic number and no version field; the parameter list simply
 * runs to the end of the file.
 */
import { Effect } from "effect";
import {
  CheckpointError,
  type ModelRecord,
  type ModelStore,
  type ParameterRecord,
} from "@tensorgrad/core";

export function encodeModel(record: ModelRecord): Buffer {
  const tag = Buffer.from(record.tag, "utf-8");
  if (tag.includes(0)) {
    throw new CheckpointError({ message: `module tag "${record.tag}" contains a NUL byte` });
  }
  let size = tag.length + 1;
  for (const p of record.params) size += 4 + 4 * p.dims.length + 4 * p.data.length;

  const buf = Buffer.alloc(size);
  tag.copy(buf, 0);
  let offset = tag.length + 1;
  for (const p of record.params) {
    offset = buf.writeInt32LE(p.dims.length, offset);
    for (const d of p.dims) offset = buf.writeInt32LE(d, offset);
    for (let i = 0; i < p.data.length; i++) offset = buf.writeFloatLE(p.data[i], offset);
  }
  return buf;
}

export function decodeModel(buf: Buffer): ModelRecord {
  const end = buf.indexOf(0);
  if (end < 0) {
    throw new CheckpointError({ message: "model file has no type tag terminator" });
  }
  const tag = buf.subarray(0, end).toString("utf-8");
  const params: ParameterRecord[] = [];
  let offset = end + 1;

  const need = (bytes: number, what: string): void => {
    if (offset + bytes > buf.length) {
      throw new CheckpointError({
        message: `model file truncated reading ${what} of parameter ${params.length} (offset ${offset})`,
      });
    }
  };

  while (offset < buf.length) {
    need(4, "ndim");
    const ndim = buf.readInt32LE(offset);
    offset += 4;
    if (ndim < 0) {
      throw new CheckpointError({ message: `invalid ndim ${ndim} for parameter ${params.length}` });
    }
    need(4 * ndim, "dims");
    const dims: number[] = [];
    let count = 1;
    for (let i = 0; i < ndim; i++) {
      const d = buf.readInt32LE(offset);
      offset += 4;
      if (d < 0) {
        throw new CheckpointError({ message: `invalid dimension ${d} for parameter ${params.length}` });
      }
      dims.push(d);
      count *= d;
    }
    need(4 * count, "data");
    const data = new Float32Array(count);
    for (let i = 0; i < count; i++) {
      data[i] = buf.readFloatLE(offset);
      offset += 4;
    }
    params.push({ dims, data });
  }
  return { tag, params };
}

// ── FileModelStore ─────────────────────────────────────────────────────────

export class FileModelStore implements ModelStore {
  save(path: string, record: ModelRecord): Effect.Effect<void, CheckpointError> {
    return Effect.tryPromise({
      try: async () => {
        const fs = await import("node:fs/promises");
        const fspath = await import("node:path");
        const bytes = encodeModel(record);
        await fs.mkdir(fspath.dirname(path), { recursive: true });
        await fs.writeFile(path, bytes);
      },
      catch: (e) => e instanceof CheckpointError
        ? e
        : new CheckpointError({ message: `Failed to save model to ${path}: ${e}`, cause: e }),
    }).pipe(
      Effect.tap(() => Effect.logDebug(`saved ${record.tag} (${record.params.length} parameters) to ${path}`)),
    );
  }

  load(path: string): Effect.Effect<ModelRecord, CheckpointError> {
    return Effect.tryPromise({
      try: async () => {
        const fs = await import("node:fs/promises");
        return decodeModel(await fs.readFile(path));
      },
      catch: (e) => e instanceof CheckpointError
        ? e
        : new CheckpointError({ message: `Failed to load model from ${path}: ${e}`, cause: e }),
    });
  }
}
