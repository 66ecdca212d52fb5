import { ConversionError } from '@adapterlab/shared';

/** Root every converted parameter name starts with */
export const PEFT_ROOT_PREFIX = 'base_model.';

/** MLX low-rank matrix suffixes and their converted counterparts */
const SUFFIX_PAIRS: ReadonlyArray<readonly [mlx: string, peft: string]> = [
  ['.lora_a', '.lora_A.weight'],
  ['.lora_b', '.lora_B.weight'],
];

function replaceSuffix(name: string, from: string, to: string): string | undefined {
  return name.endsWith(from) ? name.slice(0, name.length - from.length) + to : undefined;
}

/**
 * `model.layers.0.self_attn.q_proj.lora_a` becomes
 * `base_model.model.layers.0.self_attn.q_proj.lora_A.weight`. Only the root
 * prefix and the trailing matrix suffix change.
 */
export function toPeftParameterName(name: string): string {
  const rooted = name.startsWith(PEFT_ROOT_PREFIX) ? name : `${PEFT_ROOT_PREFIX}${name}`;
  for (const [mlx, peft] of SUFFIX_PAIRS) {
    const renamed = replaceSuffix(rooted, mlx, peft);
    if (renamed !== undefined) return renamed;
  }
  return rooted;
}

/** Inverse of {@link toPeftParameterName} for names it produced. */
export function toMlxParameterName(name: string): string {
  const unrooted = name.startsWith(PEFT_ROOT_PREFIX) ? name.slice(PEFT_ROOT_PREFIX.length) : name;
  for (const [mlx, peft] of SUFFIX_PAIRS) {
    const renamed = replaceSuffix(unrooted, peft, mlx);
    if (renamed !== undefined) return renamed;
  }
  return unrooted;
}

/**
 * Re-keys a tensor dictionary, keeping every value as-is.
 *
 * @throws ConversionError if two source names map to the same target name
 */
export function renameParameters<T>(
  parameters: ReadonlyMap<string, T>,
  rename: (name: string) => string,
): Map<string, T> {
  const renamed = new Map<string, T>();
  const origins = new Map<string, string>();
  for (const [name, value] of parameters) {
    const target = rename(name);
    const previous = origins.get(target);
    if (previous !== undefined) {
      throw new ConversionError(
        `Parameters "${previous}" and "${name}" both convert to "${target}"`,
        { details: { parameters: [previous, name], target } },
      );
    }
    origins.set(target, name);
    renamed.set(target, value);
  }
  return renamed;
}
