/**
 * Swizzle emitter — enumerates the uncovered swizzles and writes one macro
 * invocation per line.
 */

import { DEFAULT_CONFIG, validateConfig, type EmitterConfig } from "./alphabet.ts";
import { enumerateSwizzles } from "./permutations.ts";
import { formatSwizzleLine } from "./templates/swizzle.ts";

export type LineSink = (line: string) => void;

const stdoutSink: LineSink = (line) => console.log(line);

/** All output lines for `config`, in emission order. */
export function renderSwizzles(config: EmitterConfig = DEFAULT_CONFIG): string[] {
  validateConfig(config);
  const lines: string[] = [];
  for (const swizzle of enumerateSwizzles(config)) {
    lines.push(formatSwizzleLine(swizzle, config));
  }
  return lines;
}

/**
 * Write every uncovered swizzle to `sink` (stdout by default).
 * Returns the number of lines written.
 */
export function run(config: EmitterConfig = DEFAULT_CONFIG, sink: LineSink = stdoutSink): number {
  validateConfig(config);
  let count = 0;
  for (const swizzle of enumerateSwizzles(config)) {
    sink(formatSwizzleLine(swizzle, config));
    count++;
  }
  return count;
}
