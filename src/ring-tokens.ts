import type { Hashable } from './hashable.js';
import type { RingPosition } from './position.js';
import type { RingToken } from './ring-token.js';

/** Direction in which the ring is traversed. */
export type RingDirection = 'clockwise' | 'counter-clockwise';

/**
 * Index of the first token at or after `position`, or `tokens.length`.
 */
export function lowerBound<N extends Hashable>(
  tokens: readonly RingToken<N>[],
  position: RingPosition
): number {
  let low = 0;
  let high = tokens.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (tokens[mid].position < position) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Index of the first token strictly after `position`, or `tokens.length`.
 */
export function upperBound<N extends Hashable>(
  tokens: readonly RingToken<N>[],
  position: RingPosition
): number {
  let low = 0;
  let high = tokens.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (tokens[mid].position <= position) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Tokens of a ring seen from a starting position, wrapping around the origin.
 *
 * Clockwise: tokens at or after `start` in ascending order, then those before
 * it. Counter-clockwise: tokens at or before `start` in descending order, then
 * those after it. Both directions begin at the token sitting on `start`, if
 * any, so one is not the reverse of the other.
 *
 * The view is bound to the ring contents at the time it was created, can be
 * iterated any number of times, and reads either end without walking the
 * sequence.
 */
export class RingTokens<N extends Hashable> implements Iterable<RingToken<N>> {
  private readonly pivot: number;

  constructor(
    private readonly entries: readonly RingToken<N>[],
    readonly start: RingPosition,
    readonly direction: RingDirection
  ) {
    this.pivot =
      direction === 'clockwise'
        ? lowerBound(entries, start)
        : upperBound(entries, start) - 1;
  }

  get length(): number {
    return this.entries.length;
  }

  /**
   * Token at `index` steps from the start of the traversal.
   */
  at(index: number): RingToken<N> | undefined {
    const count = this.entries.length;
    if (!Number.isInteger(index) || index < 0 || index >= count) {
      return undefined;
    }

    const offset = this.direction === 'clockwise' ? this.pivot + index : this.pivot - index;
    return this.entries[((offset % count) + count) % count];
  }

  first(): RingToken<N> | undefined {
    return this.at(0);
  }

  last(): RingToken<N> | undefined {
    return this.at(this.entries.length - 1);
  }

  *[Symbol.iterator](): Iterator<RingToken<N>> {
    for (let i = 0; i < this.entries.length; i++) {
      const token = this.at(i);
      if (token) yield token;
    }
  }

  toArray(): RingToken<N>[] {
    return [...this];
  }
}
