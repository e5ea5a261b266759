import { describe, it, expect, vi } from "vitest";
import { Tensor, formatTensor, printTensor } from "@tensorgrad/tensor";

describe("formatTensor", () => {
  it("prints integers with a shared width", () => {
    expect(formatTensor(Tensor.fromArray([[19, 22], [43, 50]]))).toBe(
      "[[ 19,  22],\n [ 43,  50]]\n[Tensor of shape: Shape[2, 2]]",
    );
  });

  it("prints zeros", () => {
    expect(formatTensor(Tensor.zeros([2]))).toBe("[ 0,  0]\n[Tensor of shape: Shape[2]]");
  });

  it("prints floats in fixed point", () => {
    expect(formatTensor(Tensor.fromArray([0.5, 1.25]))).toBe("[0.5000, 1.2500]\n[Tensor of shape: Shape[2]]");
  });

  it("switches to scientific notation for a wide range", () => {
    expect(formatTensor(Tensor.fromArray([0.001, 1000], "f64"))).toBe(
      "[ 1.0000e-03,  1.0000e+03]\n[Tensor of shape: Shape[2]]",
    );
  });

  it("prints integers of a million and up with six significant digits", () => {
    expect(formatTensor(Tensor.fromArray([1000000, 1234567, 5], "f64"))).toBe(
      "[   1e+06, 1.23457e+06,        5]\n[Tensor of shape: Shape[3]]",
    );
  });

  it("switches to scientific notation for large integers", () => {
    expect(formatTensor(Tensor.fromArray([1e10, 1], "f64"))).toBe(
      "[ 1.0000e+10,  1.0000e+00]\n[Tensor of shape: Shape[2]]",
    );
  });

  it("prints non-finite values", () => {
    expect(formatTensor(Tensor.fromArray([NaN, Infinity, -Infinity, 1]))).toBe(
      "[nan, inf, -inf,  1]\n[Tensor of shape: Shape[4]]",
    );
  });

  it("nests higher dimensions", () => {
    expect(formatTensor(Tensor.fromArray([[[1, 2]], [[3, 4]]]))).toBe(
      "[[[ 1,  2]],\n [[ 3,  4]]]\n[Tensor of shape: Shape[2, 1, 2]]",
    );
  });

  it("prints views in logical order", () => {
    expect(formatTensor(Tensor.fromArray([[1, 2], [3, 4]]).transpose())).toBe(
      "[[ 1,  3],\n [ 2,  4]]\n[Tensor of shape: Shape[2, 2]]",
    );
  });

  it("prints scalars and empty tensors", () => {
    expect(formatTensor(Tensor.scalar(3.14159, "f64"))).toBe("3.1416\n[Tensor of shape: Shape[]]");
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    expect(formatTensor(Tensor.zeros([0, 3]))).toBe("[]\n[Tensor of shape: Shape[0, 3]]");
    vi.restoreAllMocks();
  });

  it("printTensor writes to stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    printTensor(Tensor.fromArray([7]));
    expect(log).toHaveBeenCalledWith("[ 7]\n[Tensor of shape: Shape[1]]");
    vi.restoreAllMocks();
  });
});
