/**
 * Enumeration of swizzle tuples.
 * Tuples come out in lexicographic product order over the alphabet
 * (rightmost position advances fastest), and tuples made entirely of
 * covered components are dropped in place.
 */

import type { Component, EmitterConfig, Swizzle } from "./alphabet.ts";

/** Concatenated form of a swizzle, e.g. `["x", "y", "w"]` → `"xyw"`. */
export function swizzleCode(swizzle: Swizzle): string {
  return swizzle.join("");
}

/**
 * Lazily yield every `arity`-length tuple over `symbols`, odometer style.
 * `arity` 0 yields one empty tuple.
 */
export function* cartesianPower(
  symbols: readonly Component[],
  arity: number
): Generator<Swizzle> {
  if (arity > 0 && symbols.length === 0) return;

  const digits = new Array<number>(arity).fill(0);
  while (true) {
    yield digits.map((d) => symbols[d] ?? "");

    // Increment from the rightmost position, carrying left
    let pos = arity - 1;
    while (pos >= 0) {
      const next = (digits[pos] ?? 0) + 1;
      if (next < symbols.length) {
        digits[pos] = next;
        break;
      }
      digits[pos] = 0;
      pos--;
    }
    if (pos < 0) return;
  }
}

/** Codes of every swizzle built only from `covered`. */
export function buildCoveredSet(covered: readonly Component[], arity: number): ReadonlySet<string> {
  const codes = new Set<string>();
  for (const swizzle of cartesianPower(covered, arity)) {
    codes.add(swizzleCode(swizzle));
  }
  return codes;
}

/** Swizzles over `config.alphabet` that aren't already covered, in enumeration order. */
export function* enumerateSwizzles(config: EmitterConfig): Generator<Swizzle> {
  const covered = buildCoveredSet(config.covered, config.arity);
  for (const swizzle of cartesianPower(config.alphabet, config.arity)) {
    if (covered.has(swizzleCode(swizzle))) continue;
    yield swizzle;
  }
}
