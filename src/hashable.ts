/**
 * A value that supplies its own stable hash input.
 */
export interface HashableObject {
  hashKey(): string;
}

/**
 * Values that can be placed on the ring or looked up on it.
 * Two values are the same node when their hash inputs are equal.
 */
export type Hashable = string | number | bigint | boolean | HashableObject;

/**
 * Canonical hash input for a value. The type tag keeps `1`, `1n` and `'1'` apart.
 */
export function hashInput(value: Hashable): string {
  switch (typeof value) {
    case 'string':
      return `s:${value}`;
    case 'number':
      return `n:${value}`;
    case 'bigint':
      return `i:${value}`;
    case 'boolean':
      return `b:${value}`;
    default:
      return `o:${value.hashKey()}`;
  }
}

/** Value equality between nodes. */
export function sameNode(a: Hashable, b: Hashable): boolean {
  return a === b || hashInput(a) === hashInput(b);
}
