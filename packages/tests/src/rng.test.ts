import { describe, it, expect } from "vitest";
import { SeededRng, normal, permutation, uniform } from "@tensorgrad/core";

describe("SeededRng", () => {
  it("produces deterministic sequences", () => {
    const rng1 = new SeededRng(42);
    const rng2 = new SeededRng(42);

    const seq1 = Array.from({ length: 10 }, () => rng1.next());
    const seq2 = Array.from({ length: 10 }, () => rng2.next());

    expect(seq1).toEqual(seq2);
  });

  it("produces values in [0, 1)", () => {
    const rng = new SeededRng(123);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("nextGauss has roughly zero mean", () => {
    const rng = new SeededRng(42);
    let sum = 0;
    const n = 10000;
    for (let i = 0; i < n; i++) sum += rng.nextGauss();
    expect(Math.abs(sum / n)).toBeLessThan(0.1);
  });

  it("different seeds give different sequences", () => {
    const rng1 = new SeededRng(1);
    const rng2 = new SeededRng(2);
    const v1 = rng1.next();
    const v2 = rng2.next();
    expect(v1).not.toBe(v2);
  });

  it("seed() restarts the sequence", () => {
    const rng = new SeededRng(9);
    const first = Array.from({ length: 3 }, () => rng.next());
    rng.seed(9);
    expect(Array.from({ length: 3 }, () => rng.next())).toEqual(first);
    expect(rng.state()).toBe(9);
  });
});

describe("sampling helpers", () => {
  it("uniform stays in range", () => {
    const rng = new SeededRng(4);
    for (let i = 0; i < 200; i++) {
      const v = uniform(rng, -3, 5);
      expect(v).toBeGreaterThanOrEqual(-3);
      expect(v).toBeLessThan(5);
    }
  });

  it("normal shifts and scales", () => {
    const rng = new SeededRng(8);
    let sum = 0;
    const n = 5000;
    for (let i = 0; i < n; i++) sum += normal(rng, 10, 0.5);
    expect(Math.abs(sum / n - 10)).toBeLessThan(0.05);
  });

  it("permutation contains every index once", () => {
    const order = permutation(new SeededRng(3), 10);
    expect([...order].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(permutation(new SeededRng(3), 10)).toEqual(order);
    expect(permutation(new SeededRng(3), 0)).toEqual([]);
  });
});
