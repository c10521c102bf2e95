/**
 * Resolves a config value to a boolean.
 * Accepts boolean, string (true/false/1/0/yes/no/on/off, case-insensitive), or undefined.
 * Returns fallback when value is undefined or not a recognized string.
 */
export function resolveBooleanFlag(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value !== 'string') {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes' || normalized === 'on') {
    return true;
  }
  if (normalized === 'false' || normalized === '0' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

/**
 * Resolves a config value to a number. Blank values take the fallback;
 * anything that does not parse throws with the variable name.
 */
export function resolveNumber(name: string, value: unknown, fallback: number): number {
  if (value === undefined || value === null || (typeof value === 'string' && value.trim() === '')) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid number value for ${name}: ${String(value)}`);
  }

  return parsed;
}

export function clampAtLeast(value: number, minimum: number): number {
  return Math.max(minimum, value);
}
