/**
 * Generator entry — prints the vec4 swizzle macro invocations to stdout,
 * skipping the ones the vec3 pass already produces.
 *
 * Usage: npm run generate > swizzles.rs
 */

import { run } from "./emitter.ts";

function main(): void {
  run();
}

try {
  main();
} catch (err) {
  console.error("Generator failed:", err);
  process.exit(1);
}
