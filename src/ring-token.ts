import { hashInput, sameNode, type Hashable } from './hashable.js';
import type { RingPosition } from './position.js';

/**
 * A node's ownership of one position on the ring.
 * Tokens are ordered, and compared with `equals`, by position only.
 */
export class RingToken<N extends Hashable> {
  constructor(
    readonly position: RingPosition,
    readonly node: N
  ) {}

  /** Orders tokens by ascending position. */
  static compare<N extends Hashable>(a: RingToken<N>, b: RingToken<N>): number {
    return a.compareTo(b);
  }

  compareTo(other: RingToken<N>): number {
    if (this.position === other.position) return 0;
    return this.position < other.position ? -1 : 1;
  }

  equals(other: RingToken<N>): boolean {
    return this.position === other.position;
  }

  /** Whether this token belongs to `node` (value equality). */
  holds(node: N): boolean {
    return sameNode(this.node, node);
  }

  toString(): string {
    return `${hashInput(this.node)}@${this.position}`;
  }
}
