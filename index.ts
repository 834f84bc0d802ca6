export {
  DEFAULT_CONFIG,
  VEC3_COMPONENTS,
  VEC4_COMPONENTS,
  validateConfig,
  type Component,
  type EmitterConfig,
  type Swizzle,
} from "./generator/alphabet.ts";
export { buildCoveredSet, cartesianPower, enumerateSwizzles, swizzleCode } from "./generator/permutations.ts";
export { formatSwizzleLine } from "./generator/templates/swizzle.ts";
export { renderSwizzles, run, type LineSink } from "./generator/emitter.ts";
