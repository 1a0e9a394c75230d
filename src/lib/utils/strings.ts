/** Narrow unknown input to a non-empty string. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** Length in code points, so a surrogate pair such as `𝑘` counts once. */
export function codePointLength(value: string): number {
  return Array.from(value).length;
}

/** `"12"` / `12` -> 12; anything else (including `""`) -> undefined. */
export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string' || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}
