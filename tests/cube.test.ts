/**
 * attribute-cube — Cube store tests
 *
 * Writes, cardinality, value semantics and input validation. Nothing here
 * builds a view.
 */

import { describe, it, expect } from 'vitest';
import {
  ABSENT,
  Cube,
  CubeInputError,
  countCells,
  createCube,
  parseCoordinates,
  setFact,
} from '../src/index';

// ─── cardinality ─────────────────────────────────────────────────────────────

describe('count', () => {
  it('is 0 for a new cube', () => {
    expect(createCube().count).toBe(0);
    expect(countCells(Cube.empty())).toBe(0);
  });

  it('is 1 after a single one-dimension write', () => {
    const cube = createCube<number>().set({ a: 'v1' }, 'x', 10);
    expect(cube.count).toBe(1);
  });

  it('is the product of member counts across every dimension touched', () => {
    const cube = createCube<number>()
      .set({ a: 1, b: 'x' }, 'p', 1)
      .set({ a: 2 }, 'p', 2)
      .set({ b: 'y' }, 'q', 3)
      .set({ c: true }, 'q', 4);

    expect(cube.members('a').size).toBe(2);
    expect(cube.members('b').size).toBe(2);
    expect(cube.members('c').size).toBe(1);
    expect(cube.count).toBe(4);
    expect(countCells(cube)).toBe(4);
  });

  it('does not grow when a write reuses known members', () => {
    const cube = createCube<number>()
      .set({ region: 'US' }, 'tax', 1)
      .set({ region: 'US' }, 'fee', 2);
    expect(cube.count).toBe(1);
    expect(cube.factCount).toBe(2);
  });
});

// ─── value semantics ─────────────────────────────────────────────────────────

describe('set', () => {
  it('returns a new cube and leaves the receiver untouched', () => {
    const before = createCube<number>();
    const after  = before.set({ region: 'US' }, 'price', 10);

    expect(after).not.toBe(before);
    expect(before.count).toBe(0);
    expect(before.labels).toEqual([]);
    expect(before.dimensionNames).toEqual([]);
    expect(after.labels).toEqual(['price']);
  });

  it('overwrites a value at the same coordinates, in any key order', () => {
    const cube = createCube<number>()
      .set({ region: 'US', product: 'A' }, 'price', 10)
      .set({ product: 'A', region: 'US' }, 'price', 12);

    expect(cube.factCount).toBe(1);
    expect(cube.facts('price')).toEqual([
      { coordinates: { product: 'A', region: 'US' }, value: 12 },
    ]);
  });

  it('is idempotent', () => {
    const once  = createCube<number>().set({ a: 1 }, 'x', 10);
    const twice = once.set({ a: 1 }, 'x', 10);

    expect(twice).toBe(once);
    expect(twice.equals(once)).toBe(true);
  });

  it('shares dimension storage when no new member appears', () => {
    const first  = createCube<number>().set({ a: 1 }, 'x', 1);
    const second = first.set({ a: 1 }, 'y', 2);
    expect(second.dimensions).toBe(first.dimensions);
    expect(second.attributes).not.toBe(first.attributes);
  });

  it('accepts a Map as coordinates', () => {
    const cube = createCube<string>().set(new Map([['region', 'US']]), 'currency', 'USD');
    expect(cube.facts('currency')).toEqual([
      { coordinates: { region: 'US' }, value: 'USD' },
    ]);
  });

  it('is reachable through setFact()', () => {
    const cube = setFact(createCube<number>(), { a: 'v1' }, 'x', 10);
    expect(cube.facts('x')).toEqual([{ coordinates: { a: 'v1' }, value: 10 }]);
  });
});

describe('members', () => {
  it('keeps 1, 1n and "1" apart', () => {
    const cube = createCube<number>()
      .set({ a: 1 },   'x', 1)
      .set({ a: 1n },  'x', 2)
      .set({ a: '1' }, 'x', 3);
    expect([...cube.members('a')]).toEqual([1, 1n, '1']);
    expect(cube.factCount).toBe(3);
  });

  it('treats -0 and 0 as one member', () => {
    const cube = createCube<number>()
      .set({ a: -0 }, 'x', 1)
      .set({ a: 0 },  'x', 2);
    expect(cube.members('a').size).toBe(1);
    expect(cube.facts('x').map(f => f.value)).toEqual([2]);
  });

  it('stores -0 as 0', () => {
    const cube = createCube<number>()
      .set({ a: -0 }, 'x', 1)
      .set({ a: 0 },  'y', 2);
    expect([...cube.members('a')][0]).toBe(0);
    expect(cube.facts('x')[0]?.coordinates.a).toBe(0);
    expect(cube.view().at(0)?.coordinates.a).toBe(0);
  });

  it('is empty for an unknown dimension', () => {
    expect(createCube().members('nope').size).toBe(0);
  });
});

// ─── introspection ───────────────────────────────────────────────────────────

describe('introspection', () => {
  it('lists dimensions and labels in first-write order', () => {
    const cube = createCube<number>()
      .set({ b: 1 }, 'y', 1)
      .set({ a: 2 }, 'x', 2);
    expect(cube.dimensionNames).toEqual(['b', 'a']);
    expect(cube.labels).toEqual(['y', 'x']);
  });

  it('returns no facts for an unknown label', () => {
    expect(createCube().facts('missing')).toEqual([]);
  });

  it('describes itself for log lines', () => {
    const cube = createCube<number>()
      .set({ region: 'US', product: 'A' }, 'price', 10)
      .set({ product: 'B' }, 'price', 5);
    expect(cube.describe()).toEqual({
      cells:      2,
      facts:      2,
      labels:     ['price'],
      dimensions: { product: 2, region: 1 },
    });
  });
});

describe('equals', () => {
  it('ignores write order', () => {
    const left  = createCube<number>().set({ a: 1 }, 'x', 1).set({ b: 2 }, 'y', 2);
    const right = createCube<number>().set({ b: 2 }, 'y', 2).set({ a: 1 }, 'x', 1);
    expect(left.equals(right)).toBe(true);
  });

  it('compares values with Object.is', () => {
    const nan = createCube<number>().set({ a: 1 }, 'x', NaN);
    expect(nan.equals(createCube<number>().set({ a: 1 }, 'x', NaN))).toBe(true);
    expect(nan.equals(createCube<number>().set({ a: 1 }, 'x', 0))).toBe(false);
  });

  it('sees a different member set', () => {
    const left  = createCube<number>().set({ a: 1 }, 'x', 1);
    const right = createCube<number>().set({ a: 2 }, 'x', 1);
    expect(left.equals(right)).toBe(false);
  });
});

// ─── validation ──────────────────────────────────────────────────────────────

describe('input validation', () => {
  const cube = createCube<unknown>().set({ a: 1 }, 'x', 1);

  it('rejects an array', () => {
    expect(() => parseCoordinates([], 'set')).toThrow(CubeInputError);
    expect(() => parseCoordinates([], 'set')).toThrow(
      'set: coordinates must be a plain object or a Map, received array.',
    );
  });

  it('rejects null and primitives', () => {
    expect(() => parseCoordinates(null, 'set')).toThrow('received null.');
    expect(() => parseCoordinates('a=1', 'set')).toThrow('received string.');
  });

  it('rejects class instances', () => {
    expect(() => parseCoordinates(new Date(0), 'set')).toThrow('received Date.');
  });

  it('rejects empty coordinates', () => {
    expect(() => cube.set({}, 'x', 1)).toThrow(
      'set: coordinates must name at least one dimension',
    );
    expect(() => cube.set(new Map(), 'x', 1)).toThrow(
      'set: coordinates must name at least one dimension',
    );
  });

  it('rejects empty dimension names', () => {
    expect(() => cube.set({ '': 1 }, 'x', 1)).toThrow(/dimension names must be non-empty strings/);
  });

  it('rejects non-finite and non-scalar members', () => {
    expect(() => cube.set({ a: NaN }, 'x', 1)).toThrow(CubeInputError);
    expect(() => cube.set({ a: Infinity }, 'x', 1)).toThrow(CubeInputError);
    expect(() => parseCoordinates(new Map([['a', { nested: true }]]), 'set')).toThrow(CubeInputError);
  });

  it('rejects an empty label', () => {
    expect(() => cube.set({ a: 1 }, '', 1)).toThrow(
      'set: attribute labels must be non-empty strings',
    );
  });

  it('rejects undefined and ABSENT values', () => {
    expect(() => cube.set({ a: 1 }, 'x', undefined)).toThrow('set: value must not be undefined');
    expect(() => cube.set({ a: 1 }, 'x', ABSENT)).toThrow('set: value must not be the ABSENT marker');
  });

  it('carries the zod issues and leaves the cube unchanged', () => {
    let caught: unknown;
    try {
      cube.set({}, 'x', 1);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CubeInputError);
    expect(caught).toBeInstanceOf(TypeError);
    if (caught instanceof CubeInputError) {
      expect(caught.name).toBe('CubeInputError');
      expect(caught.issues).toHaveLength(1);
    }
    expect(cube.count).toBe(1);
    expect(cube.factCount).toBe(1);
  });
});
