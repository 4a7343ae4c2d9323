/**
 * attribute-cube — member ordering and canonical keys
 *
 * Fact tables are keyed by map equality of coordinates, not object identity,
 * so every coordinates value is reduced to a canonical string before lookup:
 *
 *   coordinateKey({ region: 'US', year: 2024 })
 *     → '[["region","s:US"],["year","n:2024"]]'
 *
 * Entries are sorted by dimension name and each member carries a type tag,
 * so `{ a: 1 }`, `{ a: 1n }` and `{ a: '1' }` produce three different keys
 * while key order in the input never matters.
 *
 * Member tags:
 *   b:  boolean     'b:true'
 *   n:  number      'n:2024'   (-0 encodes as 'n:0', the same key as 0)
 *   i:  bigint      'i:2024'
 *   s:  string      's:US'
 */

import type { Coordinates, DimensionName, KeyShape, Member } from './types';

// ─── Ordering ─────────────────────────────────────────────────────────────────

// Cross-type order: booleans, then numerics (number and bigint together),
// then strings.
function typeRank(m: Member): number {
  if (typeof m === 'boolean') return 0;
  if (typeof m === 'string')  return 2;
  return 1;
}

/** UTF-16 code-unit order. Locale-independent, unlike localeCompare(). */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order over members.
 *
 * false < true < numerics (by value) < strings (code-unit order).
 * A number and a bigint of equal value sort number first, so the order
 * stays total even though they are distinct members.
 */
export function compareMembers(a: Member, b: Member): number {
  const rankDelta = typeRank(a) - typeRank(b);
  if (rankDelta !== 0) return rankDelta;

  if (typeof a === 'boolean' || typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  if (typeof a === 'string' || typeof b === 'string') {
    return compareNames(String(a), String(b));
  }

  if (a < b) return -1;
  if (a > b) return 1;
  if (typeof a === typeof b) return 0;
  return typeof a === 'number' ? -1 : 1;
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

export function encodeMember(m: Member): string {
  if (typeof m === 'boolean') return `b:${m}`;
  if (typeof m === 'number')  return `n:${m}`;
  if (typeof m === 'bigint')  return `i:${m}`;
  return `s:${m}`;
}

/**
 * Own-property read of one dimension. Inherited names such as 'toString'
 * must not be mistaken for a coordinate.
 */
export function memberOf(coordinates: Coordinates, dimension: DimensionName): Member | undefined {
  return Object.hasOwn(coordinates, dimension) ? coordinates[dimension] : undefined;
}

/** The key shape of a coordinates value: its dimension names, sorted. */
export function shapeOf(coordinates: Coordinates): KeyShape {
  return Object.keys(coordinates).sort(compareNames);
}

/** Canonical identity of a key shape. */
export function shapeKey(shape: KeyShape): string {
  return JSON.stringify(shape);
}

/** Canonical fact-table key of a coordinates value. Input key order is irrelevant. */
export function coordinateKey(coordinates: Coordinates): string {
  const key = projectionKey(coordinates, shapeOf(coordinates));
  // shapeOf() only yields own keys, so every projection succeeds.
  return key ?? '[]';
}

/**
 * Fact-table key of `coordinates` restricted to the dimensions of `shape`.
 *
 * `shape` must already be sorted (every KeyShape the cube produces is).
 * Returns undefined when `coordinates` lacks one of the shape's dimensions:
 * such a shape can never match.
 */
export function projectionKey(coordinates: Coordinates, shape: KeyShape): string | undefined {
  const pairs: [DimensionName, string][] = [];
  for (const dimension of shape) {
    const member = memberOf(coordinates, dimension);
    if (member === undefined) return undefined;
    pairs.push([dimension, encodeMember(member)]);
  }
  return JSON.stringify(pairs);
}
