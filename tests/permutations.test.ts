import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "../generator/alphabet.ts";
import {
  buildCoveredSet,
  cartesianPower,
  enumerateSwizzles,
  swizzleCode,
} from "../generator/permutations.ts";

describe("cartesianPower", () => {
  it("advances the rightmost position fastest", () => {
    const codes = [...cartesianPower(["a", "b"], 3)].map(swizzleCode);
    expect(codes).toEqual(["aaa", "aab", "aba", "abb", "baa", "bab", "bba", "bbb"]);
  });

  it("yields 64 tuples for four symbols", () => {
    const tuples = [...cartesianPower(["x", "y", "z", "w"], 3)];
    expect(tuples).toHaveLength(64);
    expect(tuples[0]).toEqual(["x", "x", "x"]);
    expect(tuples[3]).toEqual(["x", "x", "w"]);
    expect(tuples[63]).toEqual(["w", "w", "w"]);
  });

  it("yields a single empty tuple for arity 0", () => {
    expect([...cartesianPower(["x"], 0)]).toEqual([[]]);
  });

  it("yields nothing for an empty alphabet", () => {
    expect([...cartesianPower([], 2)]).toEqual([]);
  });

  it("is lazy", () => {
    const iter = cartesianPower(["x", "y", "z", "w"], 3);
    expect(iter.next().value).toEqual(["x", "x", "x"]);
    expect(iter.next().value).toEqual(["x", "x", "y"]);
  });
});

describe("buildCoveredSet", () => {
  it("contains the 27 xyz codes", () => {
    const covered = buildCoveredSet(["x", "y", "z"], 3);
    expect(covered.size).toBe(27);
    expect(covered.has("xxx")).toBe(true);
    expect(covered.has("zyx")).toBe(true);
    expect(covered.has("xyw")).toBe(false);
  });
});

describe("enumerateSwizzles", () => {
  it("drops covered tuples in place", () => {
    const codes = [...enumerateSwizzles(DEFAULT_CONFIG)].map(swizzleCode);
    expect(codes).toHaveLength(37);
    expect(codes.slice(0, 3)).toEqual(["xxw", "xyw", "xzw"]);
    expect(codes.slice(-4)).toEqual(["wwx", "wwy", "wwz", "www"]);
  });

  it("yields everything when nothing is covered", () => {
    const codes = [...enumerateSwizzles({ ...DEFAULT_CONFIG, covered: [] })];
    expect(codes).toHaveLength(64);
  });
});
