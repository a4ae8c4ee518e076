/**
 * Position on the ring: an unsigned 64-bit integer.
 */
export type RingPosition = bigint;

/** Largest position on the ring; the next position clockwise is `0n`. */
export const MAX_POSITION: RingPosition = 0xffff_ffff_ffff_ffffn;

/**
 * Throws if `value` is not a valid 64-bit unsigned position.
 * @param value - Position to validate
 * @param label - Name used in the error message
 */
export function assertPosition(value: bigint, label = 'Position'): void {
  if (value < 0n || value > MAX_POSITION) {
    throw new RangeError(`${label} must be within [0, 2^64 - 1], got ${value}`);
  }
}

/**
 * Clockwise distance from `from` to `to`, wrapping at the maximum position.
 */
export function distance(from: RingPosition, to: RingPosition): RingPosition {
  return to >= from ? to - from : MAX_POSITION - from + to;
}

/** Adds positions modulo 2^64. */
export function wrappingAdd(a: RingPosition, b: RingPosition): RingPosition {
  return BigInt.asUintN(64, a + b);
}

/** Multiplies positions modulo 2^64. */
export function wrappingMul(a: RingPosition, b: RingPosition): RingPosition {
  return BigInt.asUintN(64, a * b);
}
