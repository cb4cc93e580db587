import { describe, expect, test } from "vitest";
import { Minstd0, xorFold } from "./prng";

describe("Minstd0", () => {
  test("produces the reference sequence from seed 1", () => {
    const rng = new Minstd0(1);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([16807, 282475249, 1622650073]);
  });

  test("reaches the standard 10000th value", () => {
    const rng = new Minstd0(1);
    let value = 0;
    for (let i = 0; i < 10000; i++) {
      value = rng.next();
    }
    expect(value).toBe(1043618065);
  });

  test("maps seed 0 to 1", () => {
    expect(new Minstd0(0).next()).toBe(16807);
  });

  test("seeds deterministically", () => {
    const rng = new Minstd0(42);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([705894, 1126542223, 1579310009]);
  });

  test("uniformInt stays within bounds", () => {
    const rng = new Minstd0(7);
    for (let i = 0; i < 1000; i++) {
      const value = rng.uniformInt(4, 10);
      expect(value).toBeGreaterThanOrEqual(4);
      expect(value).toBeLessThanOrEqual(10);
      expect(Number.isInteger(value)).toBe(true);
    }
  });

  test("uniformInt rejects an inverted range", () => {
    expect(() => new Minstd0(1).uniformInt(3, 2)).toThrow(RangeError);
  });
});

describe("xorFold", () => {
  test("folds every byte", () => {
    expect(xorFold("example.com")).toBe(39);
    expect(xorFold("a")).toBe(97);
    expect(xorFold("test.org")).toBe(66);
  });

  test("returns 0 for an empty string", () => {
    expect(xorFold("")).toBe(0);
  });
});
