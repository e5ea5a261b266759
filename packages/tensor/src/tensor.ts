/**
 * Tensor: a Shape laid over a (possibly shared) Storage, plus the autograd
 * linkage the differentiable ops stamp on their results.
 *
 * Views (reshape, permute, transpose, expand) never copy: they retain the
 * parent's Storage and carry a new Shape. Mutation through any view is
 * visible through every alias.
 */
import {
  IndexOutOfBounds,
  NotContiguous,
  ShapeMismatch,
  UseAfterRelease,
  dimsSize,
  formatDims,
  normal,
  uniform,
  type Dims,
  type Dtype,
  type NumericArray,
  type Rng,
} from "@tensorgrad/core";
import { Shape } from "./shape.js";
import { Storage } from "./storage.js";
import { NO_OP, type GradState, type OpRecord } from "./op.js";

/** Nested JS arrays of numbers, e.g. `[[1, 2], [3, 4]]`. */
export type NestedNumbers = number | readonly NestedNumbers[];

function inferDims(values: NestedNumbers): number[] {
  const dims: number[] = [];
  let cur: NestedNumbers = values;
  while (typeof cur !== "number") {
    dims.push(cur.length);
    if (cur.length === 0) break;
    cur = cur[0];
  }
  return dims;
}

function flattenInto(values: NestedNumbers, dims: Dims, depth: number, out: number[]): void {
  if (typeof values === "number") {
    if (depth !== dims.length) {
      throw new ShapeMismatch({ message: `ragged nested array: expected shape ${formatDims(dims)}` });
    }
    out.push(values);
    return;
  }
  if (depth >= dims.length || values.length !== dims[depth]) {
    throw new ShapeMismatch({ message: `ragged nested array: expected shape ${formatDims(dims)}` });
  }
  for (const v of values) flattenInto(v, dims, depth + 1, out);
}

export class Tensor {
  readonly shape: Shape;
  readonly storage: Storage;
  /** Element offset into `storage`. */
  readonly offset: number;
  readonly dtype: Dtype;
  /** True when this tensor allocated its storage (false for views). */
  readonly ownsData: boolean;

  // ── Autograd linkage ──
  requiresGrad = false;
  grad: Tensor | null = null;
  isLeaf = true;
  parents: readonly Tensor[] = [];
  op: OpRecord = NO_OP;
  gradState: GradState = "leaf";

  private _released = false;

  private constructor(storage: Storage, shape: Shape, offset: number, ownsData: boolean) {
    this.storage = storage;
    this.shape = shape;
    this.offset = offset;
    this.dtype = storage.dtype;
    this.ownsData = ownsData;
  }

  // ── Factories ────────────────────────────────────────────────────────────

  /** Zero-filled tensor with freshly allocated storage. */
  static create(dims: Dims | Shape, dtype: Dtype = "f32"): Tensor {
    const shape = dims instanceof Shape ? Shape.create(dims.dims) : Shape.create(dims);
    const storage = Storage.allocate(dtype, shape.elementsCount, "Tensor.create");
    return new Tensor(storage, shape, 0, true);
  }

  static zeros(dims: Dims | Shape, dtype: Dtype = "f32"): Tensor {
    return Tensor.create(dims, dtype);
  }

  static full(dims: Dims | Shape, value: number, dtype: Dtype = "f32"): Tensor {
    const t = Tensor.create(dims, dtype);
    t.storage.data.fill(value);
    return t;
  }

  static ones(dims: Dims | Shape, dtype: Dtype = "f32"): Tensor {
    return Tensor.full(dims, 1, dtype);
  }

  /** Copies `buffer`; its length must equal the element count of `dims`. */
  static fromData(buffer: ArrayLike<number>, dims: Dims | Shape, dtype: Dtype = "f32"): Tensor {
    const d = dims instanceof Shape ? dims.dims : dims;
    const count = dimsSize(d);
    if (buffer.length !== count) {
      throw new ShapeMismatch({
        message: `data of length ${buffer.length} does not match shape ${formatDims(d)} (${count} elements)`,
      });
    }
    const t = Tensor.create(d, dtype);
    const data = t.storage.data;
    for (let i = 0; i < count; i++) data[i] = buffer[i];
    return t;
  }

  /** Infers the shape from nested arrays; ragged input fails with ShapeMismatch. */
  static fromArray(values: NestedNumbers, dtype: Dtype = "f32"): Tensor {
    const dims = inferDims(values);
    const flat: number[] = [];
    if (dimsSize(dims) > 0) flattenInto(values, dims, 0, flat);
    return Tensor.fromData(flat, dims, dtype);
  }

  /** 0-dim tensor holding one value. */
  static scalar(value: number, dtype: Dtype = "f32"): Tensor {
    return Tensor.full([], value, dtype);
  }

  /** Uniform samples in [min, max). */
  static rand(dims: Dims, rng: Rng, dtype: Dtype = "f32", min = 0, max = 1): Tensor {
    const t = Tensor.create(dims, dtype);
    const data = t.storage.data;
    for (let i = 0; i < data.length; i++) data[i] = uniform(rng, min, max);
    return t;
  }

  /** Gaussian samples. */
  static randn(dims: Dims, rng: Rng, dtype: Dtype = "f32", mean = 0, std = 1): Tensor {
    const t = Tensor.create(dims, dtype);
    const data = t.storage.data;
    for (let i = 0; i < data.length; i++) data[i] = normal(rng, mean, std);
    return t;
  }

  /**
   * Non-owning tensor over existing storage. Takes a storage reference that
   * is dropped again on `release()`.
   */
  static createView(storage: Storage, shape: Shape, offset = 0): Tensor {
    if (shape.elementsCount > 0) {
      let last = offset;
      for (let i = 0; i < shape.ndim; i++) last += (shape.dims[i] - 1) * shape.strides[i];
      if (offset < 0 || last >= storage.length) {
        throw new IndexOutOfBounds({
          message: `view ${shape} at offset ${offset} exceeds storage of ${storage.length} elements`,
        });
      }
    }
    return new Tensor(storage.retain(), shape, offset, false);
  }

  // ── Introspection ────────────────────────────────────────────────────────

  get dims(): readonly number[] {
    return this.shape.dims;
  }

  get ndim(): number {
    return this.shape.ndim;
  }

  get numel(): number {
    return this.shape.elementsCount;
  }

  get isReleased(): boolean {
    return this._released;
  }

  /** Backing buffer; indices must go through `offset` and the strides. */
  get data(): NumericArray {
    if (this._released) {
      throw new UseAfterRelease({ message: `tensor ${this.shape} was released` });
    }
    return this.storage.data;
  }

  isContiguous(): boolean {
    return this.shape.isContiguous();
  }

  setRequiresGrad(flag = true): this {
    this.requiresGrad = flag;
    if (!flag && this.grad) {
      this.grad.release();
      this.grad = null;
    }
    return this;
  }

  // ── Views ────────────────────────────────────────────────────────────────

  reshape(dims: Dims): Tensor {
    const count = dimsSize(dims);
    if (count !== this.numel) {
      throw new ShapeMismatch({
        message: `cannot reshape ${this.shape} (${this.numel} elements) into ${formatDims(dims)} (${count} elements)`,
      });
    }
    if (!this.isContiguous()) {
      throw new NotContiguous({ message: `cannot reshape non-contiguous tensor ${this.shape}; call contiguous() first` });
    }
    return Tensor.createView(this.liveStorage(), Shape.create(dims), this.offset);
  }

  permute(axes: readonly number[]): Tensor {
    return Tensor.createView(this.liveStorage(), this.shape.permute(axes), this.offset);
  }

  transpose(dim0 = 0, dim1 = 1): Tensor {
    return Tensor.createView(this.liveStorage(), this.shape.transpose(dim0, dim1), this.offset);
  }

  expand(target: Dims | Shape): Tensor {
    return Tensor.createView(this.liveStorage(), this.shape.expand(target), this.offset);
  }

  // ── Materialization ──────────────────────────────────────────────────────

  /** Always a new owning tensor with canonical strides. */
  contiguous(): Tensor {
    const src = this.data;
    const out = Tensor.create(this.shape.dims, this.dtype);
    const dst = out.storage.data;
    if (this.isContiguous()) {
      dst.set(src.subarray(this.offset, this.offset + this.numel));
    } else {
      this.shape.forEachOffset((off, i) => {
        dst[i] = src[off];
      }, this.offset);
    }
    return out;
  }

  /** Deep copy (row-major) with no autograd linkage. */
  copy(): Tensor {
    return this.contiguous();
  }

  // ── Element access ───────────────────────────────────────────────────────

  elementOffset(coords: readonly number[]): number {
    return this.offset + this.shape.offsetOf(coords);
  }

  get(coords: readonly number[]): number {
    return this.data[this.elementOffset(coords)];
  }

  set(coords: readonly number[], value: number): void {
    this.data[this.elementOffset(coords)] = value;
  }

  /** Logical values in row-major order. */
  toArray(): number[] {
    const src = this.data;
    const out = new Array<number>(this.numel);
    this.shape.forEachOffset((off, i) => {
      out[i] = src[off];
    }, this.offset);
    return out;
  }

  item(): number {
    if (this.numel !== 1) {
      throw new ShapeMismatch({ message: `item() requires a single-element tensor, got ${this.shape}` });
    }
    return this.data[this.offset];
  }

  fill(value: number): this {
    const dst = this.data;
    this.shape.forEachOffset((off) => {
      dst[off] = value;
    }, this.offset);
    return this;
  }

  zero(): this {
    return this.fill(0);
  }

  // ── Lifecycle ────────────────────────────────────────────────────────────

  /** Drop the gradient, the graph links and one storage reference. Idempotent. */
  release(): void {
    if (this._released) return;
    this._released = true;
    if (this.grad) {
      this.grad.release();
      this.grad = null;
    }
    this.parents = [];
    this.op = NO_OP;
    this.storage.release();
  }

  private liveStorage(): Storage {
    if (this._released) {
      throw new UseAfterRelease({ message: `cannot create a view of released tensor ${this.shape}` });
    }
    return this.storage;
  }
}
