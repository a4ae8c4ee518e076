import { hashInput, type Hashable } from './hashable.js';
import { KeyRange } from './key-range.js';
import { MurmurPartitioner, probePositions, type Partitioner } from './partitioner.js';
import { assertPosition, distance, MAX_POSITION, type RingPosition } from './position.js';
import { RingToken } from './ring-token.js';
import { lowerBound, RingTokens, type RingDirection } from './ring-tokens.js';

/**
 * Number of probes computed for a key before its owner is selected.
 */
export const DEFAULT_PROBE_COUNT = 23;

const DECIMAL = /^\d+$/;

/**
 * Configuration options for HashRing
 */
export interface HashRingOptions {
  /**
   * Strategy mapping nodes and keys to ring positions
   * @default MurmurPartitioner
   */
  partitioner?: Partitioner<Hashable>;

  /**
   * Number of probe positions computed per key
   * More probes = more even load, slower lookups
   * @default 23
   */
  probes?: number;
}

/**
 * Serializable snapshot of a ring. Positions are decimal strings.
 */
export interface HashRingSnapshot<N extends Hashable> {
  probes: number;
  tokens: Array<{ position: string; node: N }>;
}

/**
 * HashRing - multi-probe consistent hashing without virtual nodes
 *
 * Every node holds exactly one position on the ring and owns the keys between
 * its counter-clockwise neighbour and itself. A key is hashed into several
 * probe positions; the probe lying closest to the node that answers it
 * decides the owner.
 *
 * Mutations replace the internal token array instead of editing it, so
 * traversal views taken earlier keep their snapshot.
 *
 * @example
 * const ring = new HashRing();
 * ring.add('server-1');
 * ring.add('server-2');
 * ring.primaryNode('user:42'); // 'server-1' or 'server-2'
 */
export class HashRing<N extends Hashable = string> {
  private readonly partitioner: Partitioner<Hashable>;
  private readonly probes: number;
  private entries: readonly RingToken<N>[] = [];

  /**
   * Creates an empty ring
   * @param options - Configuration options for the hash ring
   */
  constructor(options: HashRingOptions = {}) {
    const probes = options.probes ?? DEFAULT_PROBE_COUNT;
    if (!Number.isSafeInteger(probes) || probes < 1) {
      throw new RangeError(`Probe count must be a positive integer, got ${probes}`);
    }

    this.partitioner = options.partitioner ?? new MurmurPartitioner();
    this.probes = probes;
  }

  /**
   * Rebuilds a ring from `toJSON()` output, keeping every stored position.
   * Positions must be plain decimal digit strings.
   */
  static fromJSON<N extends Hashable>(
    snapshot: HashRingSnapshot<N>,
    options: Omit<HashRingOptions, 'probes'> = {}
  ): HashRing<N> {
    const ring = new HashRing<N>({ ...options, probes: snapshot.probes });
    for (const { position, node } of snapshot.tokens) {
      if (!DECIMAL.test(position)) {
        throw new SyntaxError(`Invalid ring position in snapshot: '${position}'`);
      }
      ring.insert(BigInt(position), node);
    }
    return ring;
  }

  /**
   * Number of positions (tokens) on the ring
   */
  get size(): number {
    return this.entries.length;
  }

  /**
   * Distinct nodes in ascending position order
   */
  get nodes(): N[] {
    const seen = new Set<string>();
    const nodes: N[] = [];

    for (const token of this.entries) {
      const id = hashInput(token.node);
      if (seen.has(id)) continue;
      seen.add(id);
      nodes.push(token.node);
    }

    return nodes;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /**
   * Ring position a key or node hashes to
   */
  position(key: Hashable): RingPosition {
    return this.partitioner.position(key);
  }

  /**
   * Places a node at the position its value hashes to.
   * @returns The node previously at that position, if any
   */
  add(node: N): N | undefined {
    return this.insert(this.partitioner.position(node), node);
  }

  /**
   * Places a node at an explicit position, replacing any current occupant.
   * Meant for tests and simulations; `add` covers everything else.
   * @returns The node previously at that position, if any
   */
  insert(position: RingPosition, node: N): N | undefined {
    assertPosition(position);

    const token = new RingToken(position, node);
    const index = lowerBound(this.entries, position);
    const next = this.entries.slice();

    if (index < next.length && next[index].position === position) {
      const previous = next[index].node;
      next[index] = token;
      this.entries = next;
      return previous;
    }

    next.splice(index, 0, token);
    this.entries = next;
    return undefined;
  }

  /**
   * Removes the token at the position the node hashes to.
   *
   * The position is recomputed from the node value, so a node placed with
   * `insert` anywhere else is not found.
   * @returns The removed node, if the position was occupied
   */
  remove(node: N): N | undefined {
    const index = this.indexOf(this.partitioner.position(node));
    if (index === -1) return undefined;

    const removed = this.entries[index].node;
    this.entries = [...this.entries.slice(0, index), ...this.entries.slice(index + 1)];
    return removed;
  }

  /**
   * Token of the node owning `key`.
   *
   * Each probe is answered by the first token at or after it (wrapping), and
   * the probe with the shortest clockwise distance to its token wins; the
   * earliest probe wins ties.
   */
  primaryToken(key: Hashable): RingToken<N> | undefined {
    if (this.entries.length === 0) return undefined;

    const probes =
      this.partitioner.positions?.(key, this.probes) ??
      probePositions(this.partitioner, key, this.probes);

    let owner: RingToken<N> | undefined;
    let minDistance = MAX_POSITION;

    for (const probe of probes) {
      const token = this.successor(probe);
      const gap = distance(probe, token.position);
      if (owner === undefined || gap < minDistance) {
        owner = token;
        minDistance = gap;
      }
    }

    return owner;
  }

  /**
   * Node owning `key`, or `undefined` on an empty ring
   */
  primaryNode(key: Hashable): N | undefined {
    return this.primaryToken(key)?.node;
  }

  /**
   * Up to `count` distinct nodes for `key`: the primary, then the next nodes
   * clockwise from it.
   */
  replicas(key: Hashable, count: number): N[] {
    if (count <= 0) return [];

    const primary = this.primaryToken(key);
    if (!primary) return [];

    const seen = new Set<string>();
    const nodes: N[] = [];

    for (const token of this.tokens(primary.position, 'clockwise')) {
      const id = hashInput(token.node);
      if (seen.has(id)) continue;
      seen.add(id);
      nodes.push(token.node);
      if (nodes.length >= count) break;
    }

    return nodes;
  }

  /**
   * Tokens starting from `start`, wrapping around the ring
   */
  tokens(start: RingPosition, direction: RingDirection = 'clockwise'): RingTokens<N> {
    assertPosition(start);
    return new RingTokens(this.entries, start, direction);
  }

  /**
   * Key range a node at `position` would own: from its counter-clockwise
   * neighbour up to `position`. Starts at `0` when no other position precedes
   * it, so a lone node at `position` gets `[0, position)` rather than the
   * whole ring. `undefined` on an empty ring.
   */
  keyRange(position: RingPosition): KeyRange | undefined {
    assertPosition(position);
    if (this.entries.length === 0) return undefined;

    const previous = this.tokens(position, 'clockwise').last();
    const start = previous && previous.position !== position ? previous.position : 0n;
    return new KeyRange(start, position);
  }

  /**
   * Key ranges owned by `node`. Without virtual nodes this is a single range.
   * `undefined` when the node is not at its hashed position.
   */
  intervals(node: N): KeyRange[] | undefined {
    const position = this.partitioner.position(node);
    const index = this.indexOf(position);
    if (index === -1 || !this.entries[index].holds(node)) return undefined;

    const range = this.keyRange(position);
    return range ? [range] : undefined;
  }

  /**
   * Serializes the ring, positions included
   */
  toJSON(): HashRingSnapshot<N> {
    return {
      probes: this.probes,
      tokens: this.entries.map((token) => ({
        position: token.position.toString(),
        node: token.node,
      })),
    };
  }

  /**
   * Returns a string representation of the ring
   */
  toString(): string {
    return `HashRing(positions=${this.size}, nodes=${this.nodes.length}, probes=${this.probes})`;
  }

  private indexOf(position: RingPosition): number {
    const index = lowerBound(this.entries, position);
    return index < this.entries.length && this.entries[index].position === position ? index : -1;
  }

  // Callers guarantee a non-empty ring.
  private successor(position: RingPosition): RingToken<N> {
    const index = lowerBound(this.entries, position);
    return this.entries[index % this.entries.length];
  }
}
