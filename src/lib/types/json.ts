/** Plain object (not null, not an array). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Array guard that keeps the element type of a typed readonly array. */
export function isArray(value: unknown): value is ReadonlyArray<unknown> {
  return Array.isArray(value);
}
