import type { EmitterConfig, Swizzle } from "../alphabet.ts";
import { swizzleCode } from "../permutations.ts";

/**
 * Format one macro invocation line.
 *
 * @example
 * ```ts
 * formatSwizzleLine(["w", "x", "y"], DEFAULT_CONFIG);
 * // "impl_swizzle_for_vec!($n -> 3: wxy => w, x, y);"
 * ```
 */
export function formatSwizzleLine(swizzle: Swizzle, config: EmitterConfig): string {
  return `${config.macro}!(${config.sizeParam} -> ${swizzle.length}: ${swizzleCode(swizzle)} => ${swizzle.join(", ")});`;
}
