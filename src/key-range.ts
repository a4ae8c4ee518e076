import { assertPosition, MAX_POSITION, type RingPosition } from './position.js';

/**
 * A half-open range of ring positions, `[start, end)`.
 *
 * When `start >= end` the range is inverted and wraps around the origin: it is
 * the union of `[start, MAX]` and `[0, end)`. When `start === end` the range
 * covers the whole ring.
 */
export class KeyRange {
  readonly start: RingPosition;
  readonly end: RingPosition;

  constructor(start: RingPosition, end: RingPosition) {
    assertPosition(start, 'Range start');
    assertPosition(end, 'Range end');
    this.start = start;
    this.end = end;
  }

  /** Canonical whole-ring range, `[0, 0)`. */
  static wholeRing(): KeyRange {
    return new KeyRange(0n, 0n);
  }

  /** `start >= end`. */
  isInverted(): boolean {
    return this.start >= this.end;
  }

  /**
   * `end === 0`. Such a range is inverted but never actually crosses the origin.
   */
  endsAtOrigin(): boolean {
    return this.end === 0n;
  }

  isWrapping(): boolean {
    return this.isInverted() && !this.endsAtOrigin();
  }

  coversWholeRing(): boolean {
    return this.start === this.end;
  }

  contains(position: RingPosition): boolean {
    if (this.isInverted()) {
      return position >= this.start || position < this.end;
    }
    return position >= this.start && position < this.end;
  }

  isOverlapping(other: KeyRange): boolean {
    return this.contains(other.start) || other.contains(this.start);
  }

  /**
   * Whether the ranges share a boundary, e.g. `[a, b)` and `[b, c)`.
   * Always false when either range covers the whole ring.
   */
  isContinuous(other: KeyRange): boolean {
    if (this.coversWholeRing() || other.coversWholeRing()) {
      return false;
    }
    return this.end === other.start || other.end === this.start;
  }

  /**
   * Union of both ranges when it is a single interval, `undefined` otherwise.
   * Any merge that spans the whole ring yields `[0, 0)`.
   */
  merged(other: KeyRange): KeyRange | undefined {
    if (this.coversWholeRing() || other.coversWholeRing()) {
      return KeyRange.wholeRing();
    }
    if (!this.isOverlapping(other) && !this.isContinuous(other)) {
      return undefined;
    }

    let start: RingPosition;
    let end: RingPosition;

    if (this.isInverted() === other.isInverted()) {
      start = min(this.start, other.start);
      end = max(this.end, other.end);
    } else {
      const [a, b] = this.isInverted() ? [this, other] : [other, this];
      if (a.start <= b.end) {
        // b touches a from the left
        start = min(a.start, b.start);
        end = a.end;
      } else {
        start = a.start;
        end = max(a.end, b.end);
      }
    }

    return start === end ? KeyRange.wholeRing() : new KeyRange(start, end);
  }

  /**
   * Number of positions in the range. The whole ring reports `MAX`, one less
   * than the 2^64 positions it actually spans.
   */
  get size(): RingPosition {
    if (this.isInverted()) {
      return MAX_POSITION - (this.start - this.end);
    }
    return this.end - this.start;
  }

  equals(other: KeyRange): boolean {
    return this.start === other.start && this.end === other.end;
  }

  toString(): string {
    return `[${this.start}, ${this.end})`;
  }
}

function min(a: RingPosition, b: RingPosition): RingPosition {
  return a < b ? a : b;
}

function max(a: RingPosition, b: RingPosition): RingPosition {
  return a > b ? a : b;
}
