import { describe, it, expect } from 'vitest';
import {
  compareMembers,
  compareNames,
  coordinateKey,
  encodeMember,
  memberOf,
  projectionKey,
  shapeKey,
  shapeOf,
} from '../src/index';

describe('compareMembers', () => {
  it('orders booleans, then numerics by value, then strings', () => {
    const sorted = ['b', 2, true, 1n, 'a', false, 1.5, -3].sort(compareMembers);
    expect(sorted).toEqual([false, true, -3, 1n, 1.5, 2, 'a', 'b']);
  });

  it('puts a number before a bigint of equal value', () => {
    expect(compareMembers(1, 1n)).toBe(-1);
    expect(compareMembers(1n, 1)).toBe(1);
    expect(compareMembers(1, 1)).toBe(0);
    expect(compareMembers(7n, 7n)).toBe(0);
  });

  it('compares strings by code unit', () => {
    expect(compareMembers('B', 'a')).toBe(-1);
    expect(compareNames('a', 'B')).toBe(1);
    expect(compareNames('x', 'x')).toBe(0);
  });
});

describe('encodeMember', () => {
  it('tags each member type', () => {
    expect(encodeMember(true)).toBe('b:true');
    expect(encodeMember(2024)).toBe('n:2024');
    expect(encodeMember(2024n)).toBe('i:2024');
    expect(encodeMember('US')).toBe('s:US');
    expect(encodeMember(-0)).toBe('n:0');
  });
});

describe('coordinateKey', () => {
  it('ignores key order', () => {
    const expected = '[["region","s:US"],["year","n:2024"]]';
    expect(coordinateKey({ region: 'US', year: 2024 })).toBe(expected);
    expect(coordinateKey({ year: 2024, region: 'US' })).toBe(expected);
  });

  it('keeps same-looking members of different types apart', () => {
    expect(coordinateKey({ a: 1 })).toBe('[["a","n:1"]]');
    expect(coordinateKey({ a: 1n })).toBe('[["a","i:1"]]');
    expect(coordinateKey({ a: '1' })).toBe('[["a","s:1"]]');
  });
});

describe('projections', () => {
  it('projects onto a sub-shape', () => {
    expect(projectionKey({ a: 1, b: 'x' }, ['b'])).toBe('[["b","s:x"]]');
  });

  it('is undefined when a shape dimension is missing', () => {
    expect(projectionKey({ a: 1 }, ['a', 'b'])).toBeUndefined();
  });

  it('sorts shapes by name', () => {
    expect(shapeOf({ b: 1, a: 2 })).toEqual(['a', 'b']);
    expect(shapeKey(shapeOf({ b: 1, a: 2 }))).toBe('["a","b"]');
  });

  it('reads only own properties', () => {
    expect(memberOf({}, 'toString')).toBeUndefined();
    expect(memberOf({ toString: 'x' }, 'toString')).toBe('x');
  });
});
