import murmur from 'murmur-hash';
import { describe, test, expect } from 'vitest';
import {
  DEFAULT_SEED1,
  DEFAULT_SEED2,
  MAX_POSITION,
  MurmurPartitioner,
  distance,
  hashInput,
  probePositions,
  sameNode,
  wrappingAdd,
  wrappingMul,
} from '../src/index.js';
import { TablePartitioner } from './fixtures.js';

describe('MurmurPartitioner', () => {
  const partitioner = new MurmurPartitioner();

  test('hashes with MurmurHash3 x86 32-bit', () => {
    expect(murmur.v3.x86.hash32('hello', 0) >>> 0).toBe(613153351);
    expect(murmur.v3.x86.hash32('hello', 1) >>> 0).toBe(3142237357);
  });

  test('positions are pinned to known values', () => {
    expect(partitioner.positionSeeded('user:123', DEFAULT_SEED1)).toBe(15299408417920981270n);
    expect(partitioner.positionSeeded('user:123', 0n)).toBe(12630390652992454155n);
    expect(partitioner.positionSeeded('user:123', (1n << 40n) + 5n)).toBe(12370779839406237469n);
    expect(partitioner.position(42)).toBe(7716833789715070103n);
  });

  test('positions are deterministic across instances', () => {
    const other = new MurmurPartitioner();
    for (const key of ['a', 'user:123', 42, 7n, true]) {
      expect(other.position(key)).toBe(partitioner.position(key));
    }
  });

  test('positions are 64-bit unsigned integers', () => {
    for (let i = 0; i < 100; i++) {
      const position = partitioner.position(`key:${i}`);
      expect(typeof position).toBe('bigint');
      expect(position >= 0n && position <= MAX_POSITION).toBe(true);
    }
  });

  test('positions use the high word', () => {
    const high = Array.from({ length: 100 }, (_, i) => partitioner.position(`key:${i}`) >> 32n);
    expect(high.some((word) => word > 0n)).toBe(true);
  });

  test('default position uses the first seed', () => {
    expect(partitioner.position('user:123')).toBe(partitioner.positionSeeded('user:123', DEFAULT_SEED1));
  });

  test('different seeds give different positions', () => {
    expect(partitioner.positionSeeded('user:123', 0n)).not.toBe(partitioner.positionSeeded('user:123', 1n));
    expect(partitioner.positionSeeded('user:123', DEFAULT_SEED1)).not.toBe(
      partitioner.positionSeeded('user:123', DEFAULT_SEED2)
    );
  });

  test('values of different types hash apart', () => {
    expect(partitioner.position(1)).not.toBe(partitioner.position('1'));
    expect(partitioner.position(1n)).not.toBe(partitioner.position(1));
  });

  test('probe sequence follows h1 + i * h2', () => {
    const h1 = partitioner.positionSeeded('user:123', DEFAULT_SEED1);
    const h2 = partitioner.positionSeeded('user:123', DEFAULT_SEED2);
    const probes = [...partitioner.positions('user:123', 5)];

    expect(probes).toHaveLength(5);
    probes.forEach((probe, i) => {
      expect(probe).toBe(BigInt.asUintN(64, h1 + BigInt(i) * h2));
    });
  });

  test('empty probe sequence', () => {
    expect([...partitioner.positions('user:123', 0)]).toEqual([]);
  });
});

describe('probePositions()', () => {
  test('wraps around the maximum position', () => {
    const table = new TablePartitioner({ k: [MAX_POSITION, 2n] });
    expect([...probePositions(table, 'k', 3)]).toEqual([MAX_POSITION, 1n, 3n]);
  });

  test('zero stride repeats the first position', () => {
    const table = new TablePartitioner({ k: [15n, 0n] });
    expect([...probePositions(table, 'k', 3)]).toEqual([15n, 15n, 15n]);
  });
});

describe('ring arithmetic', () => {
  test('distance() measures clockwise', () => {
    expect(distance(5n, 10n)).toBe(5n);
    expect(distance(7n, 7n)).toBe(0n);
    expect(distance(10n, 5n)).toBe(MAX_POSITION - 5n);
    expect(distance(0n, MAX_POSITION)).toBe(MAX_POSITION);
  });

  test('wrapping operations stay within 64 bits', () => {
    expect(wrappingAdd(MAX_POSITION, 1n)).toBe(0n);
    expect(wrappingAdd(MAX_POSITION, 5n)).toBe(4n);
    expect(wrappingMul(1n << 63n, 2n)).toBe(0n);
    expect(wrappingMul(3n, 4n)).toBe(12n);
  });
});

describe('hashInput()', () => {
  test('tags values by type', () => {
    expect(hashInput('1')).toBe('s:1');
    expect(hashInput(1)).toBe('n:1');
    expect(hashInput(1n)).toBe('i:1');
    expect(hashInput(true)).toBe('b:true');
    expect(hashInput({ hashKey: () => 'node-a' })).toBe('o:node-a');
  });

  test('sameNode() compares by value', () => {
    expect(sameNode('a', 'a')).toBe(true);
    expect(sameNode({ hashKey: () => 'a' }, { hashKey: () => 'a' })).toBe(true);
    expect(sameNode(1, '1')).toBe(false);
  });
});
