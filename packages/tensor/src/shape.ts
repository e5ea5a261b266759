/**
 * Shape: dimension sizes plus per-dimension strides (in elements).
 *
 * Shapes are immutable values. View operations (permute, expand, transpose)
 * derive new shapes from existing strides rather than recomputing them, which
 * is what lets several tensors read one buffer under different layouts.
 */
import {
  IncompatibleShape,
  IndexOutOfBounds,
  InvalidAxes,
  ShapeMismatch,
  dimsSize,
  formatDims,
  rowMajorStrides,
  type Dims,
} from "@tensorgrad/core";

function validateDims(dims: Dims): void {
  for (const d of dims) {
    if (!Number.isInteger(d) || d < 0) {
      throw new ShapeMismatch({ message: `Invalid dimension ${d} in ${formatDims(dims)}` });
    }
  }
}

export class Shape {
  readonly dims: readonly number[];
  readonly strides: readonly number[];

  private constructor(dims: readonly number[], strides: readonly number[]) {
    this.dims = Object.freeze(dims.slice());
    this.strides = Object.freeze(strides.slice());
  }

  /** Shape with canonical row-major strides. */
  static create(dims: Dims): Shape {
    validateDims(dims);
    return new Shape(dims, rowMajorStrides(dims));
  }

  static scalar(): Shape {
    return new Shape([], []);
  }

  /** Shape with explicit strides (views onto existing storage). */
  static withStrides(dims: Dims, strides: readonly number[]): Shape {
    validateDims(dims);
    if (strides.length !== dims.length) {
      throw new ShapeMismatch({
        message: `strides ${formatDims(strides)} do not match dims ${formatDims(dims)}`,
      });
    }
    for (const s of strides) {
      if (!Number.isInteger(s) || s < 0) {
        throw new ShapeMismatch({ message: `Invalid stride ${s} in ${formatDims(strides)}` });
      }
    }
    return new Shape(dims, strides);
  }

  static from(dimsOrShape: Dims | Shape): Shape {
    return dimsOrShape instanceof Shape ? dimsOrShape : Shape.create(dimsOrShape);
  }

  get ndim(): number {
    return this.dims.length;
  }

  /** Product of dims; 1 for a 0-dim scalar. */
  get elementsCount(): number {
    return dimsSize(this.dims);
  }

  copy(): Shape {
    return new Shape(this.dims, this.strides);
  }

  dim(axis: number): number {
    if (!Number.isInteger(axis) || axis < 0 || axis >= this.ndim) {
      throw new InvalidAxes({ message: `axis ${axis} is out of bounds for shape of dimension ${this.ndim}` });
    }
    return this.dims[axis];
  }

  /** Dimension-wise equality; strides are not compared. */
  equals(other: Shape | Dims): boolean {
    const dims = other instanceof Shape ? other.dims : other;
    if (dims.length !== this.dims.length) return false;
    for (let i = 0; i < dims.length; i++) {
      if (dims[i] !== this.dims[i]) return false;
    }
    return true;
  }

  isContiguous(): boolean {
    let expected = 1;
    for (let i = this.ndim - 1; i >= 0; i--) {
      if (this.dims[i] !== 1 && this.strides[i] !== expected) return false;
      expected *= this.dims[i];
    }
    return true;
  }

  permute(axes: readonly number[]): Shape {
    const ndim = this.ndim;
    if (axes.length !== ndim) {
      throw new InvalidAxes({
        message: `permute expects ${ndim} axes, got ${axes.length} (${formatDims(axes)})`,
      });
    }
    const seen = new Array<boolean>(ndim).fill(false);
    for (const axis of axes) {
      if (!Number.isInteger(axis) || axis < 0 || axis >= ndim) {
        throw new InvalidAxes({ message: `axis ${axis} is out of bounds for tensor of dimension ${ndim}` });
      }
      if (seen[axis]) {
        throw new InvalidAxes({ message: `duplicate axis ${axis} found in axes ${formatDims(axes)}` });
      }
      seen[axis] = true;
    }
    return new Shape(
      axes.map((a) => this.dims[a]),
      axes.map((a) => this.strides[a]),
    );
  }

  transpose(dim0: number, dim1: number): Shape {
    const axes = Array.from({ length: this.ndim }, (_, i) => i);
    if (dim0 < 0 || dim0 >= this.ndim || dim1 < 0 || dim1 >= this.ndim) {
      throw new InvalidAxes({
        message: `transpose axes (${dim0}, ${dim1}) out of bounds for tensor of dimension ${this.ndim}`,
      });
    }
    axes[dim0] = dim1;
    axes[dim1] = dim0;
    return this.permute(axes);
  }

  /**
   * Broadcast to `target` (right-aligned). Newly introduced dimensions and
   * size-1 dimensions that grow get stride 0.
   */
  expand(target: Shape | Dims): Shape {
    const targetDims = target instanceof Shape ? target.dims : target;
    validateDims(targetDims);
    const srcNdim = this.ndim;
    const dstNdim = targetDims.length;
    if (srcNdim > dstNdim) {
      throw new IncompatibleShape({
        message: `cannot expand ${this} to ${formatDims(targetDims)}: target has fewer dimensions`,
      });
    }
    for (let i = 1; i <= srcNdim; i++) {
      const from = this.dims[srcNdim - i];
      const to = targetDims[dstNdim - i];
      if (from !== to && from !== 1) {
        throw new IncompatibleShape({
          message: `cannot expand ${this} to ${formatDims(targetDims)}: dimension of size ${from} must be 1 to be expanded`,
        });
      }
    }
    const pad = dstNdim - srcNdim;
    const strides = new Array<number>(dstNdim);
    for (let i = 0; i < dstNdim; i++) {
      const src = i - pad;
      strides[i] = src < 0 || (this.dims[src] === 1 && targetDims[i] !== 1) ? 0 : this.strides[src];
    }
    return new Shape(targetDims, strides);
  }

  /** Physical element offset of `coords`, bounds-checked. */
  offsetOf(coords: readonly number[]): number {
    if (coords.length !== this.ndim) {
      throw new IndexOutOfBounds({
        message: `expected ${this.ndim} coordinates, got ${coords.length}`,
      });
    }
    let offset = 0;
    for (let i = 0; i < coords.length; i++) {
      const c = coords[i];
      if (!Number.isInteger(c) || c < 0 || c >= this.dims[i]) {
        throw new IndexOutOfBounds({
          message: `index ${c} is out of bounds for dimension ${i} with size ${this.dims[i]}`,
        });
      }
      offset += c * this.strides[i];
    }
    return offset;
  }

  /**
   * Visit every logical position in row-major order with its physical
   * offset (mixed-radix odometer over the coordinates).
   */
  forEachOffset(fn: (offset: number, index: number) => void, base = 0): void {
    const ndim = this.ndim;
    const count = this.elementsCount;
    if (count === 0) return;
    const coords = new Array<number>(ndim).fill(0);
    let offset = base;
    for (let i = 0; i < count; i++) {
      fn(offset, i);
      let d = ndim - 1;
      while (d >= 0) {
        coords[d]++;
        offset += this.strides[d];
        if (coords[d] < this.dims[d]) break;
        offset -= coords[d] * this.strides[d];
        coords[d] = 0;
        d--;
      }
    }
  }

  toString(): string {
    return `Shape[${this.dims.join(", ")}]`;
  }
}
