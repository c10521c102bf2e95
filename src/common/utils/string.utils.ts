/**
 * Resolves a value to an optional non-empty string.
 * Returns undefined if value is not a string or is empty after trim.
 */
export function resolveOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Splits a comma-separated value, dropping blank entries. */
export function splitCsv(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
