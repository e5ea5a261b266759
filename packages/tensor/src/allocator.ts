/**
 * Fail-fast buffer allocator.
 *
 * All tensor storage is obtained here. Requests are validated against the
 * configured element ceiling; failures are logged with the requesting call
 * site, handed to the installed error handler, then thrown as
 * AllocationFailure. Zero-size requests are legal (empty tensors) but logged.
 */
import {
  AllocationFailure,
  defaultEngineConfig,
  dtypeArray,
  dtypeBytes,
  type Dtype,
  type NumericArray,
} from "@tensorgrad/core";
import { logSync } from "@tensorgrad/effect-runtime";

export type AllocationErrorHandler = (error: AllocationFailure) => void;

export interface AllocatorOptions {
  maxElements?: number;
}

export class Allocator {
  private _maxElements: number;
  private _handler: AllocationErrorHandler | null = null;
  private _liveBytes = 0;

  constructor(options: AllocatorOptions = {}) {
    this._maxElements = options.maxElements ?? defaultEngineConfig.maxAllocationElements;
  }

  get maxElements(): number {
    return this._maxElements;
  }

  set maxElements(n: number) {
    this._maxElements = n;
  }

  /** Bytes handed out and not yet returned through `free`. */
  get liveBytes(): number {
    return this._liveBytes;
  }

  /**
   * Install a handler that receives allocation failures instead of the
   * default fatal log line. Returns the previously installed handler.
   */
  setErrorHandler(handler: AllocationErrorHandler | null): AllocationErrorHandler | null {
    const prev = this._handler;
    this._handler = handler;
    return prev;
  }

  /** Zero-filled typed array of `count` elements. */
  allocate(dtype: Dtype, count: number, site: string): NumericArray {
    if (!Number.isInteger(count) || count < 0) {
      return this.fail(site, `invalid allocation of ${count} ${dtype} elements`);
    }
    if (count === 0) {
      logSync("warn", `allocation of 0 bytes requested at ${site}`);
      return new (dtypeArray(dtype))(0);
    }
    if (count > this._maxElements) {
      return this.fail(site, `allocation of ${count} ${dtype} elements exceeds limit of ${this._maxElements}`);
    }
    let buffer: NumericArray;
    try {
      buffer = new (dtypeArray(dtype))(count);
    } catch (cause) {
      return this.fail(site, `allocation of ${count * dtypeBytes(dtype)} bytes failed`, cause);
    }
    this._liveBytes += buffer.byteLength;
    return buffer;
  }

  /** Account for a buffer whose last reference was dropped. */
  free(buffer: NumericArray): void {
    this._liveBytes = Math.max(0, this._liveBytes - buffer.byteLength);
  }

  private fail(site: string, message: string, cause?: unknown): never {
    const error = new AllocationFailure({ message, site, cause });
    if (this._handler) {
      this._handler(error);
    } else {
      logSync("fatal", `${message} at ${site}`);
    }
    throw error;
  }
}

/** Process-wide allocator used by every Storage. */
export const allocator = new Allocator();
