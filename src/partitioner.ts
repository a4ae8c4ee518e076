import murmur from 'murmur-hash';
import { hashInput, type Hashable } from './hashable.js';
import { wrappingAdd, wrappingMul, type RingPosition } from './position.js';

/** Seed of the default hash, and of the first hash in double hashing. */
export const DEFAULT_SEED1: RingPosition = 12345n;

/** Seed of the second hash in double hashing (the probe stride). */
export const DEFAULT_SEED2: RingPosition = 67890n;

/**
 * A keyspace partitioning strategy: maps keys to positions on the ring.
 */
export interface Partitioner<K> {
  /** Position of `key` under the default seed. */
  position(key: K): RingPosition;

  /**
   * Position of `key` under an arbitrary seed. Different seeds give
   * independent positions for the same key.
   */
  positionSeeded(key: K, seed: RingPosition): RingPosition;

  /** Probe sequence of `count` positions for `key`. */
  positions?(key: K, count: number): Iterable<RingPosition>;
}

/**
 * Double-hashing probe sequence `h1 + i * h2` (mod 2^64) for `i` in `[0, count)`.
 * Both hashes are computed once, before the first probe is yielded.
 */
export function* probePositions<K>(
  partitioner: Partitioner<K>,
  key: K,
  count: number
): Generator<RingPosition, void, undefined> {
  const h1 = partitioner.positionSeeded(key, DEFAULT_SEED1);
  const h2 = partitioner.positionSeeded(key, DEFAULT_SEED2);

  for (let i = 0; i < count; i++) {
    yield wrappingAdd(h1, wrappingMul(BigInt(i), h2));
  }
}

/**
 * Default partitioner.
 *
 * A 64-bit position is assembled from two 32-bit MurmurHash3 (x86) values of
 * the key's hash input. The 64-bit seed is split into two 32-bit lane seeds:
 * lane 0 is the low half of the seed and gives the high word, lane 1 mixes
 * both halves and gives the low word.
 */
export class MurmurPartitioner implements Partitioner<Hashable> {
  position(key: Hashable): RingPosition {
    return this.positionSeeded(key, DEFAULT_SEED1);
  }

  positionSeeded(key: Hashable, seed: RingPosition): RingPosition {
    const input = hashInput(key);
    const [seed0, seed1] = laneSeeds(seed);
    const high = murmur.v3.x86.hash32(input, seed0) >>> 0;
    const low = murmur.v3.x86.hash32(input, seed1) >>> 0;
    return (BigInt(high) << 32n) | BigInt(low);
  }

  positions(key: Hashable, count: number): Iterable<RingPosition> {
    return probePositions(this, key, count);
  }
}

function laneSeeds(seed: RingPosition): [number, number] {
  const low = Number(BigInt.asUintN(32, seed));
  const high = Number(BigInt.asUintN(32, seed >> 32n));
  return [low, (low ^ high ^ 0x9e3779b9) >>> 0];
}
