/**
 * attribute-cube — Cube (store)
 *
 * The single source of truth for facts. A Cube holds:
 *
 *   dimensions  name → set of every member ever written for that name
 *   attributes  label → fact table, keyed by coordinateKey() of the exact
 *               coordinates used at write time
 *
 * Cubes are values. set() validates its input, then builds a new Cube from
 * the old one plus the delta; the receiver is never touched. Maps and member
 * sets that the write does not change are shared between the two Cubes.
 *
 *   const a = createCube<number>();
 *   const b = a.set({ region: 'US', product: 'A' }, 'price', 10);
 *   const c = b.set({ product: 'B' }, 'price', 5);
 *   a.count // 0
 *   c.count // 2   (region: 1 member × product: 2 members)
 *
 * Nothing here resolves partial keys against full coordinates. That needs
 * aggregate knowledge of every key shape an attribute was written with, so
 * it lives in the view: cube.view() / new CubeView(cube).
 */

import { coordinateKey } from './keys';
import { parseCoordinates, parseLabel, parseValue, type CubeViewOptions } from './schema';
import { CubeView } from './view';
import type {
  AttributeLabel,
  CoordinatesInput,
  DimensionName,
  Fact,
  Member,
} from './types';

const EMPTY_MEMBERS: ReadonlySet<Member> = new Set();

export class Cube<V = unknown> {
  /** Dimension name → members, in first-write order of both. */
  readonly dimensions: ReadonlyMap<DimensionName, ReadonlySet<Member>>;

  /** Attribute label → coordinateKey() → fact, in first-write order of both. */
  readonly attributes: ReadonlyMap<AttributeLabel, ReadonlyMap<string, Fact<V>>>;

  private constructor(
    dimensions: ReadonlyMap<DimensionName, ReadonlySet<Member>>,
    attributes: ReadonlyMap<AttributeLabel, ReadonlyMap<string, Fact<V>>>,
  ) {
    this.dimensions = dimensions;
    this.attributes = attributes;
  }

  /** A cube with no dimensions and no attributes. */
  static empty<V = unknown>(): Cube<V> {
    return new Cube<V>(new Map(), new Map());
  }

  // ── Writes ─────────────────────────────────────────────────────────────────

  /**
   * Record `value` for `label` at `coordinates` and return the resulting cube.
   *
   * Every member in `coordinates` joins its dimension's member set. A write
   * at coordinates already recorded for `label` (same names, same members,
   * any key order) replaces the old value in place.
   *
   * When the write changes nothing (same value by Object.is, all members
   * already known) the receiver itself is returned.
   *
   * @throws CubeInputError if `coordinates` is not a non-empty plain object
   *         or Map of non-empty names to finite scalar members, if `label`
   *         is empty, or if `value` is undefined or ABSENT. No cube is
   *         built in that case.
   */
  set(coordinates: CoordinatesInput, label: AttributeLabel, value: V): Cube<V> {
    const coords = parseCoordinates(coordinates, 'set');
    parseLabel(label, 'set');
    parseValue(value, 'set');

    const key      = coordinateKey(coords);
    const previous = this.attributes.get(label);
    const existing = previous?.get(key);

    // Member sets are copied only for dimensions that gain a member.
    let dimensions: Map<DimensionName, ReadonlySet<Member>> | null = null;
    for (const [name, member] of Object.entries(coords)) {
      const members = this.dimensions.get(name);
      if (members?.has(member)) continue;
      dimensions ??= new Map<DimensionName, ReadonlySet<Member>>(this.dimensions);
      dimensions.set(name, new Set(members ?? EMPTY_MEMBERS).add(member));
    }

    if (dimensions === null && existing !== undefined && Object.is(existing.value, value)) {
      return this;
    }

    // Overwrites keep the fact's original position: Map.set on an existing
    // key does not move it, so first-observed shape order is stable.
    const facts = new Map<string, Fact<V>>(previous ?? []);
    facts.set(key, { coordinates: coords, value });

    const attributes = new Map<AttributeLabel, ReadonlyMap<string, Fact<V>>>(this.attributes);
    attributes.set(label, facts);

    return new Cube<V>(dimensions ?? this.dimensions, attributes);
  }

  // ── Cardinality ────────────────────────────────────────────────────────────

  /**
   * Number of cells: the product of every dimension's member count, or 0
   * when nothing has been written. Closed form; no row is enumerated.
   * Exact up to Number.MAX_SAFE_INTEGER, which is also the largest cube
   * view() accepts.
   */
  get count(): number {
    if (this.dimensions.size === 0) return 0;
    let product = 1;
    for (const members of this.dimensions.values()) product *= members.size;
    return product;
  }

  /** Number of recorded facts across all attributes. */
  get factCount(): number {
    let total = 0;
    for (const facts of this.attributes.values()) total += facts.size;
    return total;
  }

  // ── Introspection ──────────────────────────────────────────────────────────

  get dimensionNames(): DimensionName[] {
    return [...this.dimensions.keys()];
  }

  /** Members of `dimension` in first-write order. Empty for an unknown dimension. */
  members(dimension: DimensionName): ReadonlySet<Member> {
    return this.dimensions.get(dimension) ?? EMPTY_MEMBERS;
  }

  get labels(): AttributeLabel[] {
    return [...this.attributes.keys()];
  }

  /** Recorded facts of `label` in first-write order of their coordinates. */
  facts(label: AttributeLabel): Fact<V>[] {
    return [...(this.attributes.get(label)?.values() ?? [])];
  }

  /**
   * Same dimension registry and same fact tables. Values are compared with
   * Object.is; insertion order is ignored.
   */
  equals(other: Cube<V>): boolean {
    if (other === this) return true;
    if (other.dimensions.size !== this.dimensions.size) return false;
    if (other.attributes.size !== this.attributes.size) return false;

    for (const [name, members] of this.dimensions) {
      const theirs = other.dimensions.get(name);
      if (theirs === undefined || theirs.size !== members.size) return false;
      for (const m of members) if (!theirs.has(m)) return false;
    }

    for (const [label, facts] of this.attributes) {
      const theirs = other.attributes.get(label);
      if (theirs === undefined || theirs.size !== facts.size) return false;
      for (const [key, fact] of facts) {
        const match = theirs.get(key);
        if (match === undefined || !Object.is(match.value, fact.value)) return false;
      }
    }
    return true;
  }

  /** Summary for log lines: cell and fact counts, member count per dimension. */
  describe(): Readonly<Record<string, unknown>> {
    return {
      cells:      this.count,
      facts:      this.factCount,
      labels:     this.labels,
      dimensions: Object.fromEntries(
        [...this.dimensions].map(([name, members]) => [name, members.size]),
      ),
    };
  }

  // ── Reads ──────────────────────────────────────────────────────────────────

  /**
   * Build a read-only view of this cube as it is now. Later writes produce
   * new Cubes and never reach an existing view.
   *
   * @throws CubeInputError on unknown or malformed options.
   * @throws CubeRangeError when the cube spans more than
   *         Number.MAX_SAFE_INTEGER rows.
   */
  view(options?: CubeViewOptions): CubeView<V> {
    return new CubeView(this, options);
  }
}

// ─── Functional surface ───────────────────────────────────────────────────────

export function createCube<V = unknown>(): Cube<V> {
  return Cube.empty<V>();
}

/** Equivalent to cube.set(); returns the new cube. */
export function setFact<V>(
  cube:        Cube<V>,
  coordinates: CoordinatesInput,
  label:       AttributeLabel,
  value:       V,
): Cube<V> {
  return cube.set(coordinates, label, value);
}

/** Equivalent to cube.count. */
export function countCells<V>(cube: Cube<V>): number {
  return cube.count;
}
