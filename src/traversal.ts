/**
 * attribute-cube — traversal state machine
 *
 * A traversal is an explicit continuation, not a closure. Any state can be
 * stored, passed around, and resumed later; nothing is recomputed.
 *
 *   active(index)  ── resume, index < end ──▶  active(index + 1), yields row(index)
 *   active(end)    ── resume ───────────────▶  done                (no row)
 *   active(index)  ── halt ─────────────────▶  halted(index)
 *   done / halted  ── resume / halt ────────▶  unchanged           (terminal)
 *
 * `end` is the exclusive stop index: the row count for a full traversal,
 * start + length for a slice. An ActiveState carries the ordered dimensions
 * and aggregated attributes, so it is a complete RowSource on its own.
 *
 *   let state = begin(snapshot);
 *   for (;;) {
 *     const step = resume(state);
 *     if (step.status !== 'row') break;
 *     use(step.row);
 *     state = step.state;          // store this to pause here
 *   }
 */

import { CubeRangeError, rowAt, type CubeSnapshot, type RowSource } from './snapshot';
import type { Row } from './types';

// ─── States ───────────────────────────────────────────────────────────────────

export interface ActiveState<V> extends RowSource<V> {
  readonly status: 'active';
  /** Next row to produce. */
  readonly index:  number;
  /** Exclusive stop index. */
  readonly end:    number;
}

export interface DoneState {
  readonly status: 'done';
  readonly index:  number;
}

export interface HaltedState {
  readonly status: 'halted';
  /** First row that was NOT produced. */
  readonly index:  number;
}

export type TerminalState = DoneState | HaltedState;

export type TraversalState<V> = ActiveState<V> | TerminalState;

export type TraversalStatus = TraversalState<unknown>['status'];

/** One produced row plus the state positioned after it. */
export interface RowStep<V> {
  readonly status: 'row';
  readonly row:    Row<V>;
  readonly state:  ActiveState<V>;
}

export type ResumeResult<V> = RowStep<V> | TerminalState;

// ─── Transitions ──────────────────────────────────────────────────────────────

/**
 * Active state over rows [start, end) of `snapshot`.
 *
 * @throws CubeRangeError unless 0 <= start <= end <= snapshot.total and
 *         both are integers.
 */
export function begin<V>(
  snapshot: CubeSnapshot<V>,
  start:    number = 0,
  end:      number = snapshot.total,
): ActiveState<V> {
  if (!Number.isInteger(start) || !Number.isInteger(end) ||
      start < 0 || start > end || end > snapshot.total) {
    throw new CubeRangeError(
      `begin: range [${start}, ${end}) is not within [0, ${snapshot.total}].`,
    );
  }
  return {
    status:     'active',
    index:      start,
    end,
    dimensions: snapshot.dimensions,
    attributes: snapshot.attributes,
  };
}

/**
 * Produce the row at state.index and the state after it, or move to `done`
 * once state.index reaches state.end. Terminal states come back unchanged.
 */
export function resume<V>(state: TraversalState<V>): ResumeResult<V> {
  if (state.status !== 'active') return state;
  if (state.index >= state.end) return { status: 'done', index: state.index };

  return {
    status: 'row',
    row:    rowAt(state, state.index),
    state:  { ...state, index: state.index + 1 },
  };
}

/** Stop an active traversal where it stands. Terminal states come back unchanged. */
export function halt<V>(state: TraversalState<V>): TerminalState {
  if (state.status !== 'active') return state;
  return { status: 'halted', index: state.index };
}

/** Rows an active state has left to produce; 0 for terminal states. */
export function remaining(state: TraversalState<unknown>): number {
  return state.status === 'active' ? state.end - state.index : 0;
}

// ─── RowIterator ──────────────────────────────────────────────────────────────

/**
 * Lazy iterator over a traversal. Rows are computed one at a time on next();
 * a `break` out of for…of calls return(), which halts the traversal, so no
 * row past the break is ever computed.
 *
 * Not restartable: once done or halted it stays that way. Build a new one
 * (view.rows()) to start over, or keep `state` and pass it to
 * view.resume() to continue from exactly where this one stopped.
 */
export class RowIterator<V> implements IterableIterator<Row<V>> {
  private _state:  TraversalState<V>;
  // Row computed by peek() and not yet handed out by next().
  private _peeked: RowStep<V> | null = null;

  constructor(state: TraversalState<V>) {
    this._state = state;
  }

  /**
   * Continuation positioned at the next row next() would return.
   * Peeking does not advance it.
   */
  get state(): TraversalState<V> {
    return this._state;
  }

  get status(): TraversalStatus {
    return this._state.status;
  }

  next(): IteratorResult<Row<V>, undefined> {
    const step = this._peeked ?? resume(this._state);
    this._peeked = null;

    if (step.status !== 'row') {
      this._state = step;
      return { done: true, value: undefined };
    }
    this._state = step.state;
    return { done: false, value: step.row };
  }

  /** The row next() will return, computed once; undefined at the end. */
  peek(): Row<V> | undefined {
    if (this._peeked !== null) return this._peeked.row;

    const step = resume(this._state);
    if (step.status !== 'row') {
      this._state = step;
      return undefined;
    }
    this._peeked = step;
    return step.row;
  }

  /** Halt. Called by for…of on break/throw/return. */
  return(): IteratorResult<Row<V>, undefined> {
    this._peeked = null;
    this._state  = halt(this._state);
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): RowIterator<V> {
    return this;
  }
}
