/**
 * Narrows an unknown value to a plain JSON object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns a deep copy of `value` with object keys sorted, so serialization
 * does not depend on property insertion order. Array order is preserved.
 */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sortKeysDeep(item));
  }
  if (isRecord(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const item = value[key];
      if (item !== undefined) {
        sorted[key] = sortKeysDeep(item);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * JSON with recursively sorted keys, two-space indented, newline-terminated.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(sortKeysDeep(value), null, 2) + '\n';
}

/**
 * Parses JSON text, prefixing failures with `context`.
 *
 * @throws Error if the text is not valid JSON
 */
export function parseJson(text: string, context?: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (e) {
    const contextStr = context ? ` in ${context}` : '';
    throw new Error(
      `Failed to parse JSON${contextStr}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
}
