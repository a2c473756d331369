export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a JSON column holding an object. Empty or non-object content
 * yields `{}`.
 */
export function parseJsonObject(text: string | null | undefined): Record<string, unknown> {
  if (!text) {
    return {};
  }
  const value: unknown = JSON.parse(text);
  return isPlainObject(value) ? value : {};
}
