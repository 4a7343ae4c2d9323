// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  Member,
  DimensionName,
  AttributeLabel,
  Coordinates,
  CoordinatesInput,
  KeyShape,
  Fact,
  Resolved,
  Row,
  OrderedDimension,
  AggregatedAttribute,
  ShapeOrder,
  SliceOverflow,
} from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  ABSENT,
  isAbsent,
  DEFAULT_SHAPE_ORDER,
  DEFAULT_SLICE_OVERFLOW,
  DEFAULT_LOGGER,
} from './constants';

// ─── Keys ─────────────────────────────────────────────────────────────────────
export {
  compareMembers,
  compareNames,
  encodeMember,
  coordinateKey,
  projectionKey,
  shapeKey,
  shapeOf,
  memberOf,
} from './keys';

// ─── Validation ───────────────────────────────────────────────────────────────
export {
  CubeInputError,
  memberSchema,
  dimensionNameSchema,
  labelSchema,
  coordinateEntriesSchema,
  valueSchema,
  viewOptionsSchema,
  parseCoordinates,
} from './schema';
export type { CubeViewOptions, ResolvedViewOptions } from './schema';

// ─── Logging ──────────────────────────────────────────────────────────────────
export { Logger, createLogger } from './logger';
export type { LogLevel, LogData, LogSink, LoggerOptions } from './logger';

// ─── Cube ─────────────────────────────────────────────────────────────────────
export { Cube, createCube, setFact, countCells } from './cube';

// ─── Snapshot ─────────────────────────────────────────────────────────────────
export {
  CubeRangeError,
  buildSnapshot,
  collectShapes,
  orderShapes,
  orderDimensions,
  aggregateAttributes,
  sizeOf,
  memberIndexes,
  coordinatesAt,
  indexOf,
  resolveAttribute,
  resolveAll,
  rowAt,
} from './snapshot';
export type { CubeSnapshot, RowSource } from './snapshot';

// ─── Traversal ────────────────────────────────────────────────────────────────
export { begin, resume, halt, remaining, RowIterator } from './traversal';
export type {
  ActiveState,
  DoneState,
  HaltedState,
  TerminalState,
  TraversalState,
  TraversalStatus,
  RowStep,
  ResumeResult,
} from './traversal';

// ─── View ─────────────────────────────────────────────────────────────────────
export { CubeView, RowCursor } from './view';
export type { RowSequence } from './view';
