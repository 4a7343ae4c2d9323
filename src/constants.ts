/**
 * attribute-cube — constants
 *
 * The absence marker and the defaults every CubeView starts from.
 */

import { createLogger } from './logger';
import type { ShapeOrder, SliceOverflow } from './types';

// ─── Absence ──────────────────────────────────────────────────────────────────

/**
 * Resolved value of an attribute with no matching fact for a row.
 *
 * A unique symbol, so it can never collide with a stored value; set()
 * rejects it as a value.
 */
export const ABSENT: unique symbol = Symbol('attribute-cube.absent');

export function isAbsent(value: unknown): value is typeof ABSENT {
  return value === ABSENT;
}

// ─── View defaults ────────────────────────────────────────────────────────────

export const DEFAULT_SHAPE_ORDER:    ShapeOrder    = 'specificity';
export const DEFAULT_SLICE_OVERFLOW: SliceOverflow = 'clamp';

/** Logger used by views that were not handed one. Warnings and errors only. */
export const DEFAULT_LOGGER = createLogger({ level: 'warn', context: 'attribute-cube' });
