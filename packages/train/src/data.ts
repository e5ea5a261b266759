/**
 * Minimal data pipeline: slices a dataset along its first dimension into
 * fixed-size batches, optionally in shuffled order.
 */
import {
  ConfigError,
  SeededRng,
  ShapeMismatch,
  defaultEngineConfig,
  permutation,
  type Rng,
} from "@tensorgrad/core";
import { Tensor } from "@tensorgrad/tensor";

export interface DataBatch {
  /** Samples [B, ...] */
  data: Tensor;
  /** Labels [B, ...] */
  labels: Tensor;
}

export interface DataLoaderOptions {
  batchSize: number;
  shuffle?: boolean;
  /** Shuffle source; a fixed-seed generator when omitted. */
  rng?: Rng;
}

function gatherRows(src: Tensor, order: readonly number[], start: number, count: number): Tensor {
  const rows = src.dims[0];
  const rowSize = rows === 0 ? 0 : src.numel / rows;
  const out = Tensor.create([count, ...src.dims.slice(1)], src.dtype);
  const from = src.data;
  const to = out.data;
  for (let k = 0; k < count; k++) {
    const row = order[start + k];
    to.set(from.subarray(row * rowSize, (row + 1) * rowSize), k * rowSize);
  }
  return out;
}

export class DataLoader implements Iterable<DataBatch> {
  readonly batchSize: number;
  readonly shuffle: boolean;
  private data: Tensor;
  private labels: Tensor;
  private rng: Rng;
  private order: number[];
  private position = 0;

  constructor(data: Tensor, labels: Tensor, options: DataLoaderOptions) {
    const { batchSize } = options;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new ConfigError({ message: `batchSize must be a positive integer, got ${batchSize}` });
    }
    if (data.ndim === 0 || labels.ndim === 0 || data.dims[0] !== labels.dims[0]) {
      throw new ShapeMismatch({
        message: `data ${data.shape} and labels ${labels.shape} must share their leading dimension`,
      });
    }
    this.batchSize = batchSize;
    this.shuffle = options.shuffle ?? false;
    this.rng = options.rng ?? new SeededRng(defaultEngineConfig.seed);
    // Own contiguous copies so rows can be sliced directly.
    this.data = data.contiguous();
    this.labels = labels.contiguous();
    this.order = this.makeOrder();
  }

  /** Number of samples. */
  get length(): number {
    return this.data.dims[0];
  }

  /** Batches per epoch (the last one may be short). */
  get numBatches(): number {
    return Math.ceil(this.length / this.batchSize);
  }

  /** Next batch of the epoch, or null once every sample has been served. */
  next(): DataBatch | null {
    if (this.position >= this.length) return null;
    const count = Math.min(this.batchSize, this.length - this.position);
    const batch = {
      data: gatherRows(this.data, this.order, this.position, count),
      labels: gatherRows(this.labels, this.order, this.position, count),
    };
    this.position += count;
    return batch;
  }

  /** Start a new epoch (reshuffling when enabled). */
  reset(): void {
    this.position = 0;
    this.order = this.makeOrder();
  }

  *[Symbol.iterator](): Iterator<DataBatch> {
    this.reset();
    for (let batch = this.next(); batch !== null; batch = this.next()) {
      yield batch;
    }
  }

  /** Drop the loader's copies of the dataset. */
  release(): void {
    this.data.release();
    this.labels.release();
  }

  private makeOrder(): number[] {
    const n = this.data.dims[0];
    return this.shuffle ? permutation(this.rng, n) : Array.from({ length: n }, (_, i) => i);
  }
}
