/**
 * attribute-cube — CubeView
 *
 * Read-only lens over one Cube value. The view:
 *   1. Validates its options and freezes a CubeSnapshot on construction
 *      (dimension/member order, per-attribute key shapes, row count).
 *   2. Exposes the cube as a RowSequence: lazy iteration, O(1) count,
 *      random access, slicing and membership, without materializing the
 *      cartesian product.
 *   3. Hands out RowCursors for seek-in-place reads.
 *
 * Because set() returns a new Cube, a view is never invalidated: it keeps
 * answering for the cube it was built from.
 *
 *   const view = cube.view();
 *
 *   for (const row of view) {                    // lazy; break stops work
 *     if (row.attributes.price === ABSENT) continue;
 *     render(row.coordinates, row.attributes.price);
 *   }
 *
 *   const page   = view.slice(100, 20);           // rows 100..119 only
 *   const cursor = view.allocateCursor();
 *   cursor.seek(42);
 *   cursor.get('price');                         // resolved once, then cached
 */

import { DEFAULT_LOGGER, DEFAULT_SHAPE_ORDER, DEFAULT_SLICE_OVERFLOW } from './constants';
import { memberOf } from './keys';
import type { Logger } from './logger';
import {
  parseCoordinates,
  parseViewOptions,
  type CubeViewOptions,
  type ResolvedViewOptions,
} from './schema';
import {
  buildSnapshot,
  coordinatesAt,
  CubeRangeError,
  indexOf,
  resolveAll,
  resolveAttribute,
  rowAt,
  type CubeSnapshot,
} from './snapshot';
import {
  begin,
  resume,
  RowIterator,
  type ActiveState,
  type ResumeResult,
  type TraversalState,
} from './traversal';
import type { Cube } from './cube';
import type {
  AggregatedAttribute,
  AttributeLabel,
  Coordinates,
  CoordinatesInput,
  DimensionName,
  Member,
  OrderedDimension,
  Resolved,
  Row,
} from './types';

// ─── RowSequence ──────────────────────────────────────────────────────────────

/**
 * What any producer of cube rows offers. Iteration order is ascending row
 * index; every method agrees with it.
 */
export interface RowSequence<V> extends Iterable<Row<V>> {
  /** Row count, O(1). */
  readonly count: number;
  /** A fresh lazy iterator from row 0. */
  rows(): RowIterator<V>;
  /** Row at `index` (negative counts from the end), or undefined. */
  at(index: number): Row<V> | undefined;
  /** Rows [start, start + length), computed without touching any other row. */
  slice(start: number, length: number): Row<V>[];
  /** True iff re-resolving row.coordinates gives exactly row.attributes. */
  has(row: Row<V>): boolean;
}

function sameAttributes<V>(
  a: Readonly<Record<AttributeLabel, Resolved<V>>>,
  b: Readonly<Record<AttributeLabel, Resolved<V>>>,
): boolean {
  const labels = Object.keys(a);
  if (labels.length !== Object.keys(b).length) return false;
  return labels.every(label => Object.hasOwn(b, label) && Object.is(a[label], b[label]));
}

// ─── RowCursor ────────────────────────────────────────────────────────────────

/**
 * A seek-in-place cursor over one view's rows.
 *
 * Allocate once with CubeView.allocateCursor(), then seek(index) for each
 * row you want. Attributes are resolved lazily on get() and cached for the
 * current row; the cache is cleared when the cursor moves to another index.
 * Seeking to the current index again is free.
 */
export class RowCursor<V> {
  /** Current row index. -1 before the first successful seek. */
  index: number = -1;

  private _coordinates: Coordinates | null = null;
  private readonly _cache = new Map<AttributeLabel, Resolved<V>>();

  /** @internal — use CubeView.allocateCursor() */
  constructor(
    private readonly _snapshot:       CubeSnapshot<V>,
    private readonly _attributeIndex: ReadonlyMap<AttributeLabel, AggregatedAttribute<V>>,
  ) {}

  /**
   * Position the cursor on row `index`.
   *
   * Returns false (and stays where it was) when `index` is not an integer
   * in [0, count).
   */
  seek(index: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index >= this._snapshot.total) return false;

    if (index !== this.index) {
      this._cache.clear();
      this._coordinates = coordinatesAt(this._snapshot, index);
      this.index        = index;
    }
    return true;
  }

  /** Full coordinates of the current row; null before the first seek. */
  get coordinates(): Coordinates | null {
    return this._coordinates;
  }

  /** Member of `dimension` at the current row. */
  member(dimension: DimensionName): Member | undefined {
    return this._coordinates === null ? undefined : memberOf(this._coordinates, dimension);
  }

  /**
   * Resolved value of `label` at the current row: the stored value, or
   * ABSENT when no fact matches. undefined before the first seek or for a
   * label the cube has never seen.
   */
  get(label: AttributeLabel): Resolved<V> | undefined {
    if (this._coordinates === null) return undefined;
    if (this._cache.has(label)) return this._cache.get(label);

    const attribute = this._attributeIndex.get(label);
    if (attribute === undefined) return undefined;

    const value = resolveAttribute(attribute, this._coordinates);
    this._cache.set(label, value);
    return value;
  }

  /** The current row with every attribute resolved; undefined before the first seek. */
  row(): Row<V> | undefined {
    if (this._coordinates === null) return undefined;
    const attributes: Record<AttributeLabel, Resolved<V>> = {};
    for (const label of this._attributeIndex.keys()) {
      const value = this.get(label);
      if (value !== undefined) attributes[label] = value;
    }
    return { coordinates: this._coordinates, attributes: Object.freeze(attributes) };
  }
}

// ─── CubeView ─────────────────────────────────────────────────────────────────

const DEFAULT_OPTIONS: ResolvedViewOptions = {
  shapeOrder:    DEFAULT_SHAPE_ORDER,
  sliceOverflow: DEFAULT_SLICE_OVERFLOW,
  logger:        DEFAULT_LOGGER,
};

export class CubeView<V> implements RowSequence<V> {
  readonly snapshot: CubeSnapshot<V>;
  readonly options:  ResolvedViewOptions;

  private readonly logger:         Logger;
  private readonly attributeIndex: ReadonlyMap<AttributeLabel, AggregatedAttribute<V>>;

  /**
   * @throws CubeInputError on unknown or malformed options.
   * @throws CubeRangeError when the cube spans more than
   *         Number.MAX_SAFE_INTEGER rows.
   */
  constructor(cube: Cube<V>, options?: CubeViewOptions) {
    this.options        = parseViewOptions(options, DEFAULT_OPTIONS);
    this.logger         = this.options.logger.child('view');
    this.snapshot       = buildSnapshot(cube, this.options.shapeOrder);
    this.attributeIndex = new Map(
      this.snapshot.attributes.map((a): [AttributeLabel, AggregatedAttribute<V>] => [a.label, a]),
    );

    if (this.logger.enabled('debug')) {
      this.logger.debug('snapshot built', {
        ...cube.describe(),
        rows:       this.snapshot.total,
        shapeOrder: this.snapshot.shapeOrder,
        shapes:     Object.fromEntries(this.snapshot.attributes.map(a => [a.label, a.shapes])),
      });
    }
  }

  // ── Shape ──────────────────────────────────────────────────────────────────

  get count(): number {
    return this.snapshot.total;
  }

  /** Dimensions in row-numbering order (by name), members sorted. */
  get dimensions(): readonly OrderedDimension[] {
    return this.snapshot.dimensions;
  }

  /** Attribute labels in the order rows list them. */
  get labels(): AttributeLabel[] {
    return this.snapshot.attributes.map(a => a.label);
  }

  // ── Traversal ──────────────────────────────────────────────────────────────

  rows(): RowIterator<V> {
    return new RowIterator(begin(this.snapshot));
  }

  [Symbol.iterator](): RowIterator<V> {
    return this.rows();
  }

  /**
   * Continuation over rows [start, end). Drive it with resume()/halt() from
   * './traversal', or wrap it with view.resume().
   *
   * @throws CubeRangeError unless 0 <= start <= end <= count.
   */
  begin(start: number = 0, end: number = this.snapshot.total): ActiveState<V> {
    return begin(this.snapshot, start, end);
  }

  /** Iterator that picks up exactly where `state` left off. */
  resume(state: TraversalState<V>): RowIterator<V> {
    return new RowIterator(state);
  }

  // ── Random access ──────────────────────────────────────────────────────────

  /** Row at `index`; negative indexes count back from the end. */
  at(index: number): Row<V> | undefined {
    if (!Number.isInteger(index)) return undefined;
    const i = index < 0 ? index + this.snapshot.total : index;
    if (i < 0 || i >= this.snapshot.total) return undefined;
    return rowAt(this.snapshot, i);
  }

  /**
   * Rows [start, start + length) in index order. Only those rows are
   * computed.
   *
   * A window running past the last row is clamped to the rows that exist
   * (empty when start >= count), or rejected when the view was built with
   * sliceOverflow: 'throw'.
   *
   * @throws CubeRangeError if start or length is negative or not an
   *         integer, or on overflow under sliceOverflow: 'throw'.
   */
  slice(start: number, length: number): Row<V>[] {
    if (!Number.isInteger(start) || !Number.isInteger(length) || start < 0 || length < 0) {
      throw new CubeRangeError(
        `slice: start (${start}) and length (${length}) must be non-negative integers.`,
      );
    }

    const total = this.snapshot.total;
    let   end   = start + length;
    if (end > total) {
      if (this.options.sliceOverflow === 'throw') {
        throw new CubeRangeError(
          `slice: [${start}, ${end}) runs past the last row; the view has ${total} rows.`,
        );
      }
      this.logger.debug('slice clamped', { start, length, total });
      end = total;
    }

    const rows: Row<V>[] = [];
    let state: TraversalState<V> = begin(this.snapshot, Math.min(start, end), end);
    for (;;) {
      const step: ResumeResult<V> = resume(state);
      if (step.status !== 'row') break;
      rows.push(step.row);
      state = step.state;
    }
    return rows;
  }

  /**
   * Row index of full coordinates, or -1 when they are not a point of this
   * view's product.
   *
   * @throws CubeInputError when `coordinates` is not a non-empty mapping.
   */
  indexOf(coordinates: CoordinatesInput): number {
    return indexOf(this.snapshot, parseCoordinates(coordinates, 'indexOf'));
  }

  /**
   * The row at full coordinates, or undefined when they are not a point of
   * this view's product.
   *
   * @throws CubeInputError when `coordinates` is not a non-empty mapping.
   */
  rowFor(coordinates: CoordinatesInput): Row<V> | undefined {
    const index = this.indexOf(coordinates);
    return index === -1 ? undefined : rowAt(this.snapshot, index);
  }

  /**
   * Resolve one attribute at any coordinates, partial or full. undefined
   * for a label the cube has never seen; ABSENT when no fact matches.
   *
   * @throws CubeInputError when `coordinates` is not a non-empty mapping.
   */
  resolve(coordinates: CoordinatesInput, label: AttributeLabel): Resolved<V> | undefined {
    const attribute = this.attributeIndex.get(label);
    if (attribute === undefined) return undefined;
    return resolveAttribute(attribute, parseCoordinates(coordinates, 'resolve'));
  }

  // ── Membership ─────────────────────────────────────────────────────────────

  /**
   * Re-resolve every attribute at row.coordinates and compare with
   * row.attributes: same labels, values equal by Object.is.
   */
  has(row: Row<V>): boolean {
    return sameAttributes(resolveAll(this.snapshot.attributes, row.coordinates), row.attributes);
  }

  // ── Cursors ────────────────────────────────────────────────────────────────

  /**
   * A RowCursor sharing this view's snapshot. Allocate one per scan and
   * reuse it across seek() calls.
   */
  allocateCursor(): RowCursor<V> {
    return new RowCursor(this.snapshot, this.attributeIndex);
  }

  // ── Combinators ────────────────────────────────────────────────────────────

  reduce<A>(fn: (acc: A, row: Row<V>, index: number) => A, initial: A): A {
    let acc   = initial;
    let index = 0;
    for (const row of this) acc = fn(acc, row, index++);
    return acc;
  }

  /** Lazy: each row is computed only when the consumer pulls past it. */
  *filter(predicate: (row: Row<V>, index: number) => boolean): Generator<Row<V>, void, undefined> {
    let index = 0;
    for (const row of this) {
      if (predicate(row, index++)) yield row;
    }
  }

  /** First matching row; rows after it are never computed. */
  find(predicate: (row: Row<V>, index: number) => boolean): Row<V> | undefined {
    let index = 0;
    for (const row of this) {
      if (predicate(row, index++)) return row;
    }
    return undefined;
  }

  toArray(): Row<V>[] {
    return this.slice(0, this.snapshot.total);
  }
}
