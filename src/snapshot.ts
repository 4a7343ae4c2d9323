/**
 * attribute-cube — snapshot: ordering, aggregation, indexing, resolution
 *
 * A CubeSnapshot fixes everything a traversal needs, once:
 *
 *   dimensions  sorted by name; members sorted by compareMembers()
 *   attributes  sorted by label; each with the distinct key shapes of its
 *               facts, arranged by ShapeOrder
 *   total       product of member counts (equals cube.count)
 *
 * ── Row index ↔ coordinates ──────────────────────────────────────────────────
 *
 * Rows are numbered by mixed-radix decomposition over the ordered member
 * counts. The LAST dimension in name order is the least-significant digit,
 * so it varies fastest:
 *
 *   dimensions: product ∈ [A, B], region ∈ [EU, US]
 *     0 → { product: A, region: EU }
 *     1 → { product: A, region: US }
 *     2 → { product: B, region: EU }
 *     3 → { product: B, region: US }
 *
 * The mapping is a bijection between [0, total) and the cartesian product.
 * indexOf() is its inverse.
 *
 * ── Resolution ───────────────────────────────────────────────────────────────
 *
 * For each key shape of the attribute, in order: project the row's
 * coordinates onto the shape, look the projection up in the fact table.
 * The first hit wins. No hit → ABSENT.
 */

import { ABSENT } from './constants';
import {
  compareMembers,
  compareNames,
  encodeMember,
  memberOf,
  projectionKey,
  shapeKey,
  shapeOf,
} from './keys';
import type { Cube } from './cube';
import type {
  AggregatedAttribute,
  AttributeLabel,
  Coordinates,
  DimensionName,
  Fact,
  KeyShape,
  Member,
  OrderedDimension,
  Resolved,
  Row,
  ShapeOrder,
} from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown for row indexes and slice bounds outside what the snapshot holds:
 * negative or fractional indexes, rowAt() past the last row, or an
 * overflowing slice under sliceOverflow: 'throw'. Also thrown when a
 * snapshot would span more rows than Number.MAX_SAFE_INTEGER.
 */
export class CubeRangeError extends RangeError {
  constructor(message: string) {
    super(message);
    this.name = 'CubeRangeError';
  }
}

// ─── Snapshot ─────────────────────────────────────────────────────────────────

/** What rowAt() needs: the ordered axes and the aggregated attributes. */
export interface RowSource<V> {
  readonly dimensions: readonly OrderedDimension[];
  readonly attributes: readonly AggregatedAttribute<V>[];
}

export interface CubeSnapshot<V> extends RowSource<V> {
  readonly total:      number;
  readonly shapeOrder: ShapeOrder;
  /** Dimension name → encodeMember() → position in the ordered member list. */
  readonly memberIndex: ReadonlyMap<DimensionName, ReadonlyMap<string, number>>;
}

/** Distinct key shapes of `facts` in first-observed order. */
export function collectShapes<V>(facts: Iterable<Fact<V>>): KeyShape[] {
  const seen   = new Set<string>();
  const shapes: KeyShape[] = [];
  for (const fact of facts) {
    const shape = shapeOf(fact.coordinates);
    const id    = shapeKey(shape);
    if (seen.has(id)) continue;
    seen.add(id);
    shapes.push(shape);
  }
  return shapes;
}

/**
 * Arrange first-observed shapes for resolution.
 * Array.prototype.sort is stable, so equal-length shapes keep their order.
 */
export function orderShapes(shapes: readonly KeyShape[], order: ShapeOrder): KeyShape[] {
  const copy = [...shapes];
  if (order === 'specificity') copy.sort((a, b) => b.length - a.length);
  return copy;
}

export function orderDimensions(
  dimensions: ReadonlyMap<DimensionName, ReadonlySet<Member>>,
): OrderedDimension[] {
  return [...dimensions.keys()].sort(compareNames).map(name => {
    const members = [...(dimensions.get(name) ?? [])].sort(compareMembers);
    return { name, members, memberCount: members.length };
  });
}

export function aggregateAttributes<V>(
  attributes: ReadonlyMap<AttributeLabel, ReadonlyMap<string, Fact<V>>>,
  order:      ShapeOrder,
): AggregatedAttribute<V>[] {
  return [...attributes.keys()].sort(compareNames).map(label => {
    const facts = attributes.get(label) ?? new Map<string, Fact<V>>();
    return { label, facts, shapes: orderShapes(collectShapes(facts.values()), order) };
  });
}

/** Number of rows spanned by `dimensions`; 0 for none. */
export function sizeOf(dimensions: readonly OrderedDimension[]): number {
  if (dimensions.length === 0) return 0;
  let product = 1;
  for (const d of dimensions) product *= d.memberCount;
  return product;
}

/**
 * Freeze a cube's current state into a CubeSnapshot.
 * The cube is a value, so the snapshot can never go stale.
 *
 * @throws CubeRangeError when the row count exceeds Number.MAX_SAFE_INTEGER;
 *         past that, neighbouring row indexes are no longer distinct numbers.
 */
export function buildSnapshot<V>(cube: Cube<V>, shapeOrder: ShapeOrder): CubeSnapshot<V> {
  const dimensions = orderDimensions(cube.dimensions);
  const total      = sizeOf(dimensions);
  if (total > Number.MAX_SAFE_INTEGER) {
    throw new CubeRangeError(
      `buildSnapshot: the cube spans ${total} rows, more than ${Number.MAX_SAFE_INTEGER} ` +
      `(Number.MAX_SAFE_INTEGER). Rows past that limit cannot be indexed exactly.`,
    );
  }

  const attributes = aggregateAttributes(cube.attributes, shapeOrder);

  const memberIndex = new Map<DimensionName, ReadonlyMap<string, number>>();
  for (const d of dimensions) {
    memberIndex.set(d.name, new Map(d.members.map((m, i): [string, number] => [encodeMember(m), i])));
  }

  return { total, shapeOrder, dimensions, attributes, memberIndex };
}

// ─── Index ↔ coordinates ──────────────────────────────────────────────────────

function assertRowIndex(index: number, total: number, operation: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= total) {
    throw new CubeRangeError(
      `${operation}: row index ${index} is outside [0, ${total}). ` +
      `Row indexes are integers below the cube's cell count.`,
    );
  }
}

/**
 * Per-dimension member positions of row `index`, in dimension order.
 * Digits are peeled from the last dimension backwards, then reversed.
 */
export function memberIndexes(dimensions: readonly OrderedDimension[], index: number): number[] {
  const digits: number[] = [];
  let rest = index;
  for (let d = dimensions.length - 1; d >= 0; d--) {
    const count = dimensions[d]?.memberCount ?? 1;
    digits.push(rest % count);
    rest = Math.floor(rest / count);
  }
  return digits.reverse();
}

/** @throws CubeRangeError unless 0 <= index < row count. */
export function coordinatesAt(source: RowSource<unknown>, index: number): Coordinates {
  assertRowIndex(index, sizeOf(source.dimensions), 'coordinatesAt');

  const digits = memberIndexes(source.dimensions, index);
  const entries: [DimensionName, Member][] = [];
  source.dimensions.forEach((d, i) => {
    const member = d.members[digits[i] ?? 0];
    if (member !== undefined) entries.push([d.name, member]);
  });
  return Object.freeze(Object.fromEntries(entries));
}

/**
 * Row index of `coordinates`, or -1 when they are not a point of the
 * snapshot's product (a dimension missing, an extra dimension, or a member
 * the snapshot does not know).
 */
export function indexOf(snapshot: CubeSnapshot<unknown>, coordinates: Coordinates): number {
  if (snapshot.total === 0) return -1;
  if (Object.keys(coordinates).length !== snapshot.dimensions.length) return -1;

  let index = 0;
  for (const d of snapshot.dimensions) {
    const member = memberOf(coordinates, d.name);
    if (member === undefined) return -1;
    const position = snapshot.memberIndex.get(d.name)?.get(encodeMember(member));
    if (position === undefined) return -1;
    index = index * d.memberCount + position;
  }
  return index;
}

// ─── Resolution ───────────────────────────────────────────────────────────────

/** First fact, in shape order, whose key is a projection of `coordinates`. */
export function resolveAttribute<V>(
  attribute:   AggregatedAttribute<V>,
  coordinates: Coordinates,
): Resolved<V> {
  for (const shape of attribute.shapes) {
    const key = projectionKey(coordinates, shape);
    if (key === undefined) continue;
    const fact = attribute.facts.get(key);
    if (fact !== undefined) return fact.value;
  }
  return ABSENT;
}

/** Every attribute resolved against `coordinates`, keyed by label. */
export function resolveAll<V>(
  attributes:  readonly AggregatedAttribute<V>[],
  coordinates: Coordinates,
): Record<AttributeLabel, Resolved<V>> {
  return Object.fromEntries(
    attributes.map(a => [a.label, resolveAttribute(a, coordinates)] as const),
  );
}

/** @throws CubeRangeError unless 0 <= index < row count. */
export function rowAt<V>(source: RowSource<V>, index: number): Row<V> {
  const coordinates = coordinatesAt(source, index);
  return {
    coordinates,
    attributes: Object.freeze(resolveAll(source.attributes, coordinates)),
  };
}
