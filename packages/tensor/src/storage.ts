/**
 * Reference-counted element buffer.
 *
 * The tensor that allocates a Storage holds the first reference; every view
 * onto it takes another. The buffer is dropped when the last reference is
 * released, so a view can never observe freed memory: it either keeps the
 * buffer alive or fails with UseAfterRelease.
 */
import { UseAfterRelease, type Dtype, type NumericArray } from "@tensorgrad/core";
import { allocator } from "./allocator.js";

export class Storage {
  readonly dtype: Dtype;
  readonly length: number;
  private _data: NumericArray | null;
  private _refs = 1;

  private constructor(dtype: Dtype, data: NumericArray) {
    this.dtype = dtype;
    this.length = data.length;
    this._data = data;
  }

  /** Fresh zero-filled storage with a single owner. */
  static allocate(dtype: Dtype, length: number, site: string): Storage {
    return new Storage(dtype, allocator.allocate(dtype, length, site));
  }

  get data(): NumericArray {
    if (this._data === null) {
      throw new UseAfterRelease({ message: `storage of ${this.length} ${this.dtype} elements was released` });
    }
    return this._data;
  }

  get refCount(): number {
    return this._refs;
  }

  get isReleased(): boolean {
    return this._data === null;
  }

  /** Take another reference (a new view). */
  retain(): this {
    if (this._data === null) {
      throw new UseAfterRelease({ message: "cannot create a view of released storage" });
    }
    this._refs++;
    return this;
  }

  /** Drop one reference; frees the buffer when none remain. */
  release(): void {
    if (this._data === null) return;
    this._refs--;
    if (this._refs === 0) {
      allocator.free(this._data);
      this._data = null;
    }
  }
}
