/**
 * Component alphabets and the default emitter configuration.
 *
 * The 4-component vector names its fields x, y, z, w. Every swizzle whose
 * fields all come from x, y, z is already generated for the 3-component
 * vector, so the vec4 pass only needs the ones that touch w.
 */

/** A single vector component name, e.g. `"x"`. */
export type Component = string;

/** A swizzle expressed as its ordered component names. */
export type Swizzle = readonly Component[];

/** Components of the 4-component vector, in declaration order. */
export const VEC4_COMPONENTS = ["x", "y", "z", "w"] as const;

/** Components of the 3-component vector. Same relative order as VEC4_COMPONENTS. */
export const VEC3_COMPONENTS = ["x", "y", "z"] as const;

export interface EmitterConfig {
  /** Ordered alphabet to enumerate over */
  readonly alphabet: readonly Component[];
  /** Sub-alphabet whose swizzles are already generated elsewhere */
  readonly covered: readonly Component[];
  /** Swizzle length (number of components per tuple) */
  readonly arity: number;
  /** Macro name, without the trailing `!` */
  readonly macro: string;
  /** Size token passed through to the macro unchanged */
  readonly sizeParam: string;
}

export const DEFAULT_CONFIG: EmitterConfig = Object.freeze({
  alphabet: VEC4_COMPONENTS,
  covered: VEC3_COMPONENTS,
  arity: 3,
  macro: "impl_swizzle_for_vec",
  sizeParam: "$n",
});

/**
 * Throws if `config` can't produce a well-defined enumeration.
 * The default config always passes.
 */
export function validateConfig(config: EmitterConfig): void {
  if (config.alphabet.length === 0) {
    throw new Error("alphabet must contain at least one component");
  }
  const seen = new Set<Component>();
  for (const c of config.alphabet) {
    if (c.length !== 1) {
      throw new Error(`alphabet component must be a single character: "${c}"`);
    }
    if (seen.has(c)) {
      throw new Error(`alphabet contains duplicate component: "${c}"`);
    }
    seen.add(c);
  }
  for (const c of config.covered) {
    if (!seen.has(c)) {
      throw new Error(`covered component "${c}" is not in alphabet`);
    }
  }
  if (!Number.isInteger(config.arity) || config.arity < 1) {
    throw new Error(`arity must be a positive integer, got ${config.arity}`);
  }
}
