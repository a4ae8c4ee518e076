import {
  DEFAULT_SEED1,
  DEFAULT_SEED2,
  hashInput,
  type Hashable,
  type Partitioner,
  type RingPosition,
} from '../src/index.js';

/**
 * Partitioner with hand-picked hashes: each key maps to `[h1, h2]`, the
 * positions under the first and second double-hashing seeds.
 */
export class TablePartitioner implements Partitioner<Hashable> {
  constructor(private readonly table: Record<string, [RingPosition, RingPosition]>) {}

  position(key: Hashable): RingPosition {
    return this.positionSeeded(key, DEFAULT_SEED1);
  }

  positionSeeded(key: Hashable, seed: RingPosition): RingPosition {
    const name = typeof key === 'string' ? key : hashInput(key);
    const entry = this.table[name];
    if (!entry) throw new Error(`No hashes for key ${name}`);
    if (seed === DEFAULT_SEED1) return entry[0];
    if (seed === DEFAULT_SEED2) return entry[1];
    throw new Error(`Unexpected seed ${seed}`);
  }
}
