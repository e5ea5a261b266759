import { describe, it, expect, vi, afterEach } from "vitest";
import { AllocationFailure, UseAfterRelease } from "@tensorgrad/core";
import { Allocator, Storage, Tensor, allocator } from "@tensorgrad/tensor";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("Allocator", () => {
  it("hands out zero-filled buffers and tracks live bytes", () => {
    const a = new Allocator({ maxElements: 10 });
    const buf = a.allocate("f32", 4, "test");
    expect(buf).toBeInstanceOf(Float32Array);
    expect(Array.from(buf)).toEqual([0, 0, 0, 0]);
    expect(a.liveBytes).toBe(16);
    a.free(buf);
    expect(a.liveBytes).toBe(0);
  });

  it("reports failures to the installed handler with the call site", () => {
    const a = new Allocator({ maxElements: 10 });
    const seen: AllocationFailure[] = [];
    expect(a.setErrorHandler((e) => seen.push(e))).toBeNull();
    expect(() => a.allocate("f64", 11, "test-site")).toThrow(AllocationFailure);
    expect(seen).toHaveLength(1);
    expect(seen[0].site).toBe("test-site");
    expect(seen[0].message).toBe("allocation of 11 f64 elements exceeds limit of 10");
  });

  it("logs a fatal line when no handler is installed", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const a = new Allocator({ maxElements: 10 });
    expect(() => a.allocate("f32", 20, "big-site")).toThrow(AllocationFailure);
    expect(errors).toHaveBeenCalledTimes(1);
    expect(String(errors.mock.calls[0][0])).toMatch(
      /\] FATAL allocation of 20 f32 elements exceeds limit of 10 at big-site$/,
    );
  });

  it("rejects invalid counts", () => {
    const a = new Allocator();
    a.setErrorHandler(() => undefined);
    expect(() => a.allocate("i32", -1, "neg")).toThrow("invalid allocation of -1 i32 elements");
    expect(() => a.allocate("i32", 1.5, "frac")).toThrow(AllocationFailure);
  });

  it("allows zero-size buffers with a warning", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const buf = new Allocator().allocate("f32", 0, "zero-site");
    expect(buf.length).toBe(0);
    expect(String(errors.mock.calls[0][0])).toMatch(/\] WARN  allocation of 0 bytes requested at zero-site$/);
  });

  it("the shared allocator bounds tensor creation", () => {
    const previousLimit = allocator.maxElements;
    const previousHandler = allocator.setErrorHandler(() => undefined);
    allocator.maxElements = 4;
    try {
      expect(() => Tensor.zeros([5])).toThrow(AllocationFailure);
      expect(Tensor.zeros([4]).numel).toBe(4);
    } finally {
      allocator.maxElements = previousLimit;
      allocator.setErrorHandler(previousHandler);
    }
  });
});

describe("Storage", () => {
  it("frees its buffer when the last reference is released", () => {
    const s = Storage.allocate("f32", 3, "test");
    s.retain();
    expect(s.refCount).toBe(2);
    s.release();
    expect(s.isReleased).toBe(false);
    s.release();
    expect(s.isReleased).toBe(true);
    expect(() => s.data).toThrow(UseAfterRelease);
    expect(() => s.retain()).toThrow(UseAfterRelease);
  });

  it("returns released bytes to the allocator", () => {
    const before = allocator.liveBytes;
    const t = Tensor.zeros([8], "f64");
    expect(allocator.liveBytes).toBe(before + 64);
    t.release();
    expect(allocator.liveBytes).toBe(before);
  });
});
