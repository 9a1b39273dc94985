/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values and `NaN` for anything that is
 * not an integer.
 */
export function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

/** Parses a route id param; null unless it is a positive integer. */
export function parseId(value: string): number | null {
  const n = safeInt(value);
  if (n === undefined || Number.isNaN(n) || n < 1) return null;
  return n;
}
