/**
 * probe-ring: Multi-probe consistent hashing for distributed systems
 * @module probe-ring
 */

export { DEFAULT_PROBE_COUNT, HashRing } from './hash-ring.js';
export type { HashRingOptions, HashRingSnapshot } from './hash-ring.js';
export { hashInput, sameNode } from './hashable.js';
export type { Hashable, HashableObject } from './hashable.js';
export { KeyRange } from './key-range.js';
export {
  DEFAULT_SEED1,
  DEFAULT_SEED2,
  MurmurPartitioner,
  probePositions,
} from './partitioner.js';
export type { Partitioner } from './partitioner.js';
export { assertPosition, distance, MAX_POSITION, wrappingAdd, wrappingMul } from './position.js';
export type { RingPosition } from './position.js';
export { RingToken } from './ring-token.js';
export { lowerBound, RingTokens, upperBound } from './ring-tokens.js';
export type { RingDirection } from './ring-tokens.js';
