/**
 * @zipmap/pmap: map a callable over several sequences in parallel.
 *
 * ```typescript
 * import { map2, pmap, pmapDbl, formula, table } from "@zipmap/pmap";
 *
 * map2([1, 10, 100], [1, 2, 3], (a: number, b: number) => a + b).values;  // [2, 12, 103]
 * pmap({ a: [1, 2], b: [3, 4] }, (b: number, a: number) => a * b).values;  // [3, 8]
 * pmapDbl(table({ x: [1, 2, 5], y: [5, 4, 8] }), Math.min).values;        // Float64Array [1, 2, 5]
 * map2([1, 2], [10, 20], formula("$x * $y")).values;                        // [10, 40]
 * ```
 *
 * @packageDocumentation
 */

export type {
  OutputMode,
  ModeValues,
  Mapped,
  TypedArray,
  Sequence,
  Seq,
  ArgumentTuple,
  Formula,
  PathSegment,
  PathSpec,
  MapperSpec,
  MapOptions,
  ExtraOptions,
} from "./types.js";
export { OUTPUT_MODES } from "./types.js";

export {
  ZipmapError,
  InvalidCallableError,
  InvalidInputError,
  LengthMismatchError,
  ArgumentMismatchError,
  TypeCoercionError,
  LengthOneViolationError,
  UserCallableError,
  describeValue,
} from "./errors.js";
export type { ZipmapErrorReason } from "./errors.js";

export { toSequence, toInputs } from "./sequence.js";
export type { Inputs, SequenceList } from "./sequence.js";
export { Table, table, fromRows } from "./table.js";

export { commonLength, recycle } from "./recycle.js";
export { transpose } from "./transpose.js";

export { formula, isFormula, compileFormula } from "./formula.js";
export { toPath, pluck } from "./pluck.js";
export { classify, asMapper } from "./mapper.js";
export type { Mapper, Invocable, AdapterOptions } from "./mapper.js";

export { createBuilder } from "./collectors.js";
export type { Builder } from "./collectors.js";
export { run } from "./run.js";

export {
  pmap,
  map2,
  pwalk,
  walk2,
  map2Lgl,
  map2Int,
  map2Dbl,
  map2Chr,
  map2Raw,
  pmapLgl,
  pmapInt,
  pmapDbl,
  pmapChr,
  pmapRaw,
  toRecord,
} from "./pmap.js";
