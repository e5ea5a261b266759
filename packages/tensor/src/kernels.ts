/**
 * Raw tensor kernels. Straightforward loops over typed arrays, reading every
 * operand through its strides so views work without a copy. No autograd here:
 * the differentiable wrappers live in @tensorgrad/autograd.
 */
import {
  DivisionByZero,
  InvalidAxes,
  ShapeMismatch,
  broadcastShapes,
  canBroadcastTo,
  formatDims,
  gradDtype,
  promoteDtypes,
  rowMajorStrides,
  type Dims,
  type Dtype,
} from "@tensorgrad/core";
import { Shape } from "./shape.js";
import { Tensor } from "./tensor.js";
import { parallelFor } from "./parallel.js";

export type BinaryKind = "add" | "sub" | "mul" | "div";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Walk `dims` in row-major order, tracking two physical offsets at once
 * (one per stride vector).
 */
function forEach2(
  dims: Dims,
  stridesA: readonly number[],
  baseA: number,
  stridesB: readonly number[],
  baseB: number,
  fn: (offA: number, offB: number, i: number) => void,
): void {
  let count = 1;
  for (const d of dims) count *= d;
  if (count === 0) return;
  const ndim = dims.length;
  const coords = new Array<number>(ndim).fill(0);
  let offA = baseA;
  let offB = baseB;
  for (let i = 0; i < count; i++) {
    fn(offA, offB, i);
    for (let d = ndim - 1; d >= 0; d--) {
      coords[d]++;
      offA += stridesA[d];
      offB += stridesB[d];
      if (coords[d] < dims[d]) break;
      offA -= coords[d] * stridesA[d];
      offB -= coords[d] * stridesB[d];
      coords[d] = 0;
    }
  }
}

function apply(kind: BinaryKind, x: number, y: number, intDiv: boolean): number {
  switch (kind) {
    case "add": return x + y;
    case "sub": return x - y;
    case "mul": return x * y;
    case "div": return intDiv ? Math.trunc(x / y) : x / y;
  }
}

/** Fails if any element `t` would contribute as a divisor is zero. */
function checkDivisor(t: Tensor, readShape: Shape): void {
  const data = t.data;
  readShape.forEachOffset((off) => {
    if (data[off] === 0) {
      throw new DivisionByZero({ message: `division by zero: divisor ${t.shape} contains 0` });
    }
  }, t.offset);
}

function normalizeAxis(axis: number, ndim: number): number {
  if (!Number.isInteger(axis) || axis < 0 || axis >= ndim) {
    throw new InvalidAxes({ message: `axis ${axis} is out of bounds for tensor of dimension ${ndim}` });
  }
  return axis;
}

// ---------------------------------------------------------------------------
// Binary elementwise
// ---------------------------------------------------------------------------

/** Broadcasting elementwise op into a new tensor of the promoted dtype. */
export function binary(kind: BinaryKind, a: Tensor, b: Tensor): Tensor {
  const dims = broadcastShapes(a.dims, b.dims);
  const dtype = promoteDtypes(a.dtype, b.dtype);
  const aShape = a.shape.expand(dims);
  const bShape = b.shape.expand(dims);
  if (kind === "div") checkDivisor(b, bShape);
  const ad = a.data;
  const bd = b.data;
  const out = Tensor.create(dims, dtype);
  const od = out.data;
  const intDiv = dtype === "i32";
  forEach2(dims, aShape.strides, a.offset, bShape.strides, b.offset, (ia, ib, i) => {
    od[i] = apply(kind, ad[ia], bd[ib], intDiv);
  });
  return out;
}

export const add = (a: Tensor, b: Tensor): Tensor => binary("add", a, b);
export const sub = (a: Tensor, b: Tensor): Tensor => binary("sub", a, b);
export const mul = (a: Tensor, b: Tensor): Tensor => binary("mul", a, b);
export const div = (a: Tensor, b: Tensor): Tensor => binary("div", a, b);

// ---------------------------------------------------------------------------
// In-place
// ---------------------------------------------------------------------------

/**
 * `a op= b`: `b` broadcasts onto `a`'s shape, results are written through
 * `a`'s strides. Autograd linkage is never touched, so these are for
 * non-differentiated fast paths only (optimizer updates, accumulation).
 */
export function binaryInplace(kind: BinaryKind, a: Tensor, b: Tensor): Tensor {
  if (!canBroadcastTo(b.dims, a.dims)) {
    throw new ShapeMismatch({
      message: `in-place ${kind}: cannot broadcast ${formatDims(b.dims)} onto ${formatDims(a.dims)}`,
    });
  }
  const bShape = b.shape.expand(a.dims);
  if (kind === "div") checkDivisor(b, bShape);
  const ad = a.data;
  const bd = b.data;
  const intDiv = a.dtype === "i32";
  forEach2(a.dims, a.shape.strides, a.offset, bShape.strides, b.offset, (ia, ib) => {
    ad[ia] = apply(kind, ad[ia], bd[ib], intDiv);
  });
  return a;
}

export const add_ = (a: Tensor, b: Tensor): Tensor => binaryInplace("add", a, b);
export const sub_ = (a: Tensor, b: Tensor): Tensor => binaryInplace("sub", a, b);
export const mul_ = (a: Tensor, b: Tensor): Tensor => binaryInplace("mul", a, b);
export const div_ = (a: Tensor, b: Tensor): Tensor => binaryInplace("div", a, b);

// ---------------------------------------------------------------------------
// Matmul
// ---------------------------------------------------------------------------

/** [m, k] @ [k, n] -> [m, n]. One output row per parallel iteration. */
export function matmul(a: Tensor, b: Tensor): Tensor {
  if (a.ndim !== 2 || b.ndim !== 2) {
    throw new ShapeMismatch({
      message: `matmul expects 2-D operands, got ${a.shape} and ${b.shape}`,
    });
  }
  const [m, k] = a.dims;
  const [k2, n] = b.dims;
  if (k !== k2) {
    throw new ShapeMismatch({
      message: `matmul inner dimensions differ: ${a.shape} @ ${b.shape}`,
    });
  }
  const ad = a.data;
  const bd = b.data;
  const [sa0, sa1] = a.shape.strides;
  const [sb0, sb1] = b.shape.strides;
  const out = Tensor.create([m, n], promoteDtypes(a.dtype, b.dtype));
  const od = out.data;
  parallelFor(m, (i) => {
    const rowA = a.offset + i * sa0;
    for (let j = 0; j < n; j++) {
      let acc = 0;
      let ia = rowA;
      let ib = b.offset + j * sb1;
      for (let p = 0; p < k; p++) {
        acc += ad[ia] * bd[ib];
        ia += sa1;
        ib += sb0;
      }
      od[i * n + j] = acc;
    }
  });
  return out;
}

// ---------------------------------------------------------------------------
// Unary
// ---------------------------------------------------------------------------

/** Elementwise `fn` into a new contiguous tensor (dtype defaults to the input's). */
export function map(t: Tensor, fn: (x: number) => number, dtype: Dtype = t.dtype): Tensor {
  const src = t.data;
  const out = Tensor.create(t.dims, dtype);
  const od = out.data;
  t.shape.forEachOffset((off, i) => {
    od[i] = fn(src[off]);
  }, t.offset);
  return out;
}

export const neg = (t: Tensor): Tensor => map(t, (x) => -x);
export const scale = (t: Tensor, s: number): Tensor => map(t, (x) => x * s);
export const relu = (t: Tensor): Tensor => map(t, (x) => (x > 0 ? x : 0));
export const sigmoid = (t: Tensor): Tensor => map(t, (x) => 1 / (1 + Math.exp(-x)), gradDtype(t.dtype));
export const tanh = (t: Tensor): Tensor => map(t, Math.tanh, gradDtype(t.dtype));

// ---------------------------------------------------------------------------
// Reductions
// ---------------------------------------------------------------------------

function reduce(t: Tensor, axis: number | null, keepdims: boolean, dtype: Dtype): Tensor {
  const dims = t.dims;
  if (axis === null) {
    const out = Tensor.create(keepdims ? dims.map(() => 1) : [], dtype);
    const src = t.data;
    let acc = 0;
    t.shape.forEachOffset((off) => {
      acc += src[off];
    }, t.offset);
    out.data[0] = acc;
    return out;
  }
  const ax = normalizeAxis(axis, t.ndim);
  const keptDims = dims.map((d, i) => (i === ax ? 1 : d));
  const iterStrides = rowMajorStrides(keptDims);
  iterStrides[ax] = 0;
  const out = Tensor.create(keepdims ? keptDims : dims.filter((_, i) => i !== ax), dtype);
  const src = t.data;
  const od = out.data;
  forEach2(dims, t.shape.strides, t.offset, iterStrides, 0, (is, io) => {
    od[io] += src[is];
  });
  return out;
}

/** Sum over all elements (`axis` null) or along one axis. */
export function sum(t: Tensor, axis: number | null = null, keepdims = false): Tensor {
  return reduce(t, axis, keepdims, t.dtype);
}

/** Arithmetic mean; integer input produces a float result. */
export function mean(t: Tensor, axis: number | null = null, keepdims = false): Tensor {
  const out = reduce(t, axis, keepdims, gradDtype(t.dtype));
  const n = axis === null ? t.numel : t.dims[normalizeAxis(axis, t.ndim)];
  const od = out.data;
  for (let i = 0; i < od.length; i++) od[i] /= n;
  return out;
}

/**
 * Sum `g` over the axes along which a tensor of shape `dims` was broadcast
 * to produce it. The result has shape `dims`.
 */
export function reduceToShape(g: Tensor, dims: Dims): Tensor {
  if (!canBroadcastTo(dims, g.dims)) {
    throw new ShapeMismatch({
      message: `cannot reduce gradient ${g.shape} to ${formatDims(dims)}`,
    });
  }
  const out = Tensor.create(dims, g.dtype);
  const od = out.data;
  const src = g.data;
  const outStrides = out.shape.expand(g.dims).strides;
  forEach2(g.dims, g.shape.strides, g.offset, outStrides, 0, (is, io) => {
    od[io] += src[is];
  });
  return out;
}
