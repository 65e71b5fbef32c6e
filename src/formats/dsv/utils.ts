/**
 * DSV Utility Functions
 */

/**
 * Remove a UTF-8 Byte Order Mark from the start of text
 */
export function removeBOM(text: string): string {
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Pair fields with header names
 *
 * Later duplicates of a column name win. Missing trailing fields stay
 * absent; surplus fields are returned separately.
 */
export function zipHeader(
  headers: readonly string[],
  fields: readonly string[]
): { values: Record<string, string | undefined>; extra: string[] } {
  const values: Record<string, string | undefined> = {};
  headers.forEach((name, index) => {
    values[name] = fields[index];
  });
  return { values, extra: fields.slice(headers.length) };
}
