/**
 * attribute-cube — input validation
 *
 * Every value that enters the cube from outside passes through one of the
 * zod schemas below. A failed parse becomes a CubeInputError before any
 * state changes, so a rejected set() leaves the cube exactly as it was.
 *
 * Coordinates are checked in two steps:
 *   1. shape:   a plain object or a Map (arrays, null, class instances and
 *               primitives are not mappings)
 *   2. entries: [name, member] pairs, validated by coordinateEntriesSchema
 *
 * Normalizing to entries first lets one schema cover both input forms and
 * keeps dimension names such as '__proto__' intact.
 */

import { z } from 'zod';
import { ABSENT } from './constants';
import { compareNames } from './keys';
import { Logger } from './logger';
import type { AttributeLabel, Coordinates, ShapeOrder, SliceOverflow } from './types';

// ─── Errors ───────────────────────────────────────────────────────────────────

/**
 * Thrown when a caller hands the cube malformed input: coordinates that are
 * not a non-empty mapping of dimension name to member, an empty label, an
 * undefined or ABSENT value, or unknown view options.
 *
 * `issues` holds the zod issues when the failure came from a schema parse.
 */
export class CubeInputError extends TypeError {
  readonly issues: readonly z.ZodIssue[];

  constructor(message: string, issues: readonly z.ZodIssue[] = []) {
    super(message);
    this.name   = 'CubeInputError';
    this.issues = issues;
  }
}

// ─── Schemas ──────────────────────────────────────────────────────────────────

/**
 * A finite number, a bigint, a boolean or a string. NaN and ±Infinity break
 * the member order. -0 is stored as 0, so one member never shows two signs.
 */
export const memberSchema = z.union([
  z.string(),
  z.number().finite().transform(n => (n === 0 ? 0 : n)),
  z.bigint(),
  z.boolean(),
]);

export const dimensionNameSchema = z.string().min(1, 'dimension names must be non-empty strings');

export const labelSchema = z.string().min(1, 'attribute labels must be non-empty strings');

export const coordinateEntriesSchema = z
  .array(z.tuple([dimensionNameSchema, memberSchema]))
  .min(1, 'coordinates must name at least one dimension');

/** Any storable value. undefined and ABSENT are reserved for "no value". */
export const valueSchema = z
  .unknown()
  .refine(v => v !== undefined, 'value must not be undefined')
  .refine(v => v !== ABSENT, 'value must not be the ABSENT marker');

export const viewOptionsSchema = z
  .object({
    shapeOrder:    z.enum(['specificity', 'observed']).optional(),
    sliceOverflow: z.enum(['clamp', 'throw']).optional(),
    logger:        z.instanceof(Logger).optional(),
  })
  .strict();

export type CubeViewOptions = z.infer<typeof viewOptionsSchema>;

/** CubeViewOptions with every default filled in. */
export interface ResolvedViewOptions {
  readonly shapeOrder:    ShapeOrder;
  readonly sliceOverflow: SliceOverflow;
  readonly logger:        Logger;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function describeInput(value: unknown): string {
  if (value === null)       return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value !== 'object') return typeof value;

  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto === 'object' && proto !== null && 'constructor' in proto &&
      typeof proto.constructor === 'function' && proto.constructor.name !== '') {
    return proto.constructor.name;
  }
  return 'object';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function failure(operation: string, error: z.ZodError): CubeInputError {
  const detail = error.issues
    .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
  return new CubeInputError(`${operation}: ${detail}`, error.issues);
}

// ─── Parsers ──────────────────────────────────────────────────────────────────

/**
 * Validate coordinates and return them as a frozen plain object built from
 * the entries in ascending name order.
 *
 * @param operation  Prefix for the error message, e.g. 'set'.
 * @throws CubeInputError when the input is not a non-empty mapping of
 *         non-empty names to finite scalar members.
 */
export function parseCoordinates(input: unknown, operation: string): Coordinates {
  let entries: unknown;
  if (input instanceof Map) {
    entries = [...input.entries()];
  } else if (isPlainObject(input)) {
    entries = Object.entries(input);
  } else {
    throw new CubeInputError(
      `${operation}: coordinates must be a plain object or a Map, received ${describeInput(input)}.`,
    );
  }

  const parsed = coordinateEntriesSchema.safeParse(entries);
  if (!parsed.success) throw failure(operation, parsed.error);

  const sorted = parsed.data.sort((a, b) => compareNames(a[0], b[0]));
  return Object.freeze(Object.fromEntries(sorted));
}

export function parseLabel(input: unknown, operation: string): AttributeLabel {
  const parsed = labelSchema.safeParse(input);
  if (!parsed.success) throw failure(operation, parsed.error);
  return parsed.data;
}

export function parseValue<V>(input: V, operation: string): V {
  const parsed = valueSchema.safeParse(input);
  if (!parsed.success) throw failure(operation, parsed.error);
  return input;
}

export function parseViewOptions(
  input:    unknown,
  defaults: ResolvedViewOptions,
): ResolvedViewOptions {
  const parsed = viewOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) throw failure('view', parsed.error);
  return {
    shapeOrder:    parsed.data.shapeOrder    ?? defaults.shapeOrder,
    sliceOverflow: parsed.data.sliceOverflow ?? defaults.sliceOverflow,
    logger:        parsed.data.logger        ?? defaults.logger,
  };
}
