/**
 * attribute-cube — type definitions
 *
 * A cube stores facts against partial coordinates and answers for full
 * coordinates. These types describe both halves: what a write carries and
 * what a resolved row looks like.
 */

import type { ABSENT } from './constants';

// ─── Coordinates ──────────────────────────────────────────────────────────────

/**
 * One member of a dimension.
 *
 * Members are opaque scalars with a total order (see compareMembers()).
 * `1`, `1n` and `'1'` are three different members. Numbers must be finite;
 * -0 is stored as 0.
 */
export type Member = string | number | bigint | boolean;

export type DimensionName  = string;
export type AttributeLabel = string;

/**
 * Dimension name → member.
 *
 * Partial when it names only some of the cube's dimensions, full when it
 * names exactly all of them. Every Coordinates value handed out by the cube
 * is frozen and has its keys in ascending name order.
 */
export type Coordinates = Readonly<Record<DimensionName, Member>>;

/** What set() accepts: a plain object or a Map. */
export type CoordinatesInput = Coordinates | ReadonlyMap<DimensionName, Member>;

/**
 * The sorted list of dimension names used by one recorded key.
 * Two keys with the same names but different members share a shape.
 */
export type KeyShape = readonly DimensionName[];

// ─── Facts ────────────────────────────────────────────────────────────────────

/** A value written at the exact coordinates it was written with. */
export interface Fact<V> {
  readonly coordinates: Coordinates;
  readonly value:       V;
}

/** A stored value, or ABSENT when no recorded key matches. */
export type Resolved<V> = V | typeof ABSENT;

// ─── Rows ─────────────────────────────────────────────────────────────────────

/**
 * One point of the cartesian product of all dimension members, with every
 * attribute label resolved against it.
 */
export interface Row<V> {
  readonly coordinates: Coordinates;
  readonly attributes:  Readonly<Record<AttributeLabel, Resolved<V>>>;
}

// ─── Snapshot pieces ──────────────────────────────────────────────────────────

/** A dimension with its members in ascending compareMembers() order. */
export interface OrderedDimension {
  readonly name:        DimensionName;
  readonly members:     readonly Member[];
  readonly memberCount: number;
}

/**
 * An attribute's fact table plus the key shapes seen across its facts.
 *
 * `facts` is keyed by coordinateKey(); `shapes` is in resolution order,
 * already arranged by the view's ShapeOrder.
 */
export interface AggregatedAttribute<V> {
  readonly label:  AttributeLabel;
  readonly shapes: readonly KeyShape[];
  readonly facts:  ReadonlyMap<string, Fact<V>>;
}

// ─── View configuration ───────────────────────────────────────────────────────

/**
 * How a view orders an attribute's key shapes before first-match resolution.
 *
 * specificity: most dimensions first; ties keep first-observed order.
 *              A fact written against more dimensions always wins.
 * observed:    first-observed order across the attribute's facts
 *              (first-write order of the keys).
 */
export type ShapeOrder = 'specificity' | 'observed';

/**
 * What slice() does when start + length runs past the last row.
 *
 * clamp: return the rows that exist (possibly none).
 * throw: raise CubeRangeError.
 */
export type SliceOverflow = 'clamp' | 'throw';
