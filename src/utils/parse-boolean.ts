const TRUTHY = ['true', '1', 'yes', 'y', 'on'];
const FALSY = ['false', '0', 'no', 'n', 'off'];

/**
 * Parse a query-string or env style flag. Values that are neither truthy nor
 * falsy (including absent ones) resolve to `fallback`.
 */
export function parseBoolean(value: unknown, fallback = false): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value !== 'string') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUTHY.includes(normalized)) {
    return true;
  }
  if (FALSY.includes(normalized)) {
    return false;
  }
  return fallback;
}
