/**
 * Public mapping entry points.
 *
 * Every entry point goes through the same pipeline: adapt the callable,
 * normalize the inputs, recycle them to a common length, transpose them
 * into argument tuples and run the callable over the tuples.
 */

import { createLogger } from "@zipmap/core";
import { InvalidInputError, describeValue } from "./errors.js";
import { asMapper } from "./mapper.js";
import { recycle } from "./recycle.js";
import { run } from "./run.js";
import { toInputs, toSequence } from "./sequence.js";
import type { Inputs, SequenceList } from "./sequence.js";
import { transpose } from "./transpose.js";
import { OUTPUT_MODES } from "./types.js";
import type {
  ExtraOptions,
  Formula,
  MapOptions,
  MapperSpec,
  Mapped,
  ModeValues,
  OutputMode,
  PathSpec,
  Sequence,
} from "./types.js";

const log = createLogger("pmap");

function execute<M extends OutputMode>(
  inputs: () => Inputs,
  f: unknown,
  mode: M,
  options: ExtraOptions,
): Mapped<ModeValues[M]> {
  const invocable = asMapper(f, options);
  const { sequences, fields, labels } = inputs();
  log.debug(`mapping ${invocable.label} over ${sequences.length} input(s)`);

  const tuples = transpose(recycle(sequences, labels), fields);
  return run(tuples, invocable, mode);
}

function checkMode(mode: unknown): OutputMode {
  const known = OUTPUT_MODES.find((m) => m === mode);
  if (known === undefined) {
    throw new InvalidInputError(
      `Unknown output mode ${describeValue(mode)}; expected one of ${OUTPUT_MODES.join(", ")}`,
    );
  }
  return known;
}

function pairOf(x: Sequence, y: Sequence): () => Inputs {
  return () => ({
    sequences: [toSequence(x, ".x"), toSequence(y, ".y")],
    fields: [null, null],
    labels: [".x", ".y"],
  });
}

function listOf(l: SequenceList): () => Inputs {
  return () => toInputs(l);
}

/**
 * Map a callable over several sequences in parallel.
 *
 * Call `i` receives element `i` of every input. Inputs of length 1 are
 * recycled; when `l` is a record or a table its keys name the fields, and
 * fields whose name matches a parameter are passed to that parameter.
 *
 * @example
 * ```typescript
 * pmap([[1, 2], [10, 20], [100, 200]], (a: number, b: number, c: number) => a + b + c).values;
 * // [111, 222]
 *
 * pmap({ x: [1, 2], y: [3, 4] }, (y: number, x: number) => x - y, { mode: "double" }).values;
 * // Float64Array [-2, -2]
 * ```
 */
export function pmap<R, M extends OutputMode = "list">(
  l: SequenceList,
  f: (...args: never[]) => R,
  options?: MapOptions<M>,
): Mapped<ModeValues<R>[M]>;
export function pmap<M extends OutputMode = "list">(
  l: SequenceList,
  f: Formula | PathSpec,
  options?: MapOptions<M>,
): Mapped<ModeValues[M]>;
export function pmap(l: SequenceList, f: MapperSpec, options: MapOptions = {}): Mapped<unknown> {
  return execute(listOf(l), f, checkMode(options.mode ?? "list"), options);
}

/**
 * Map a callable over two sequences in parallel.
 *
 * @example
 * ```typescript
 * map2([1, 10, 100], [1, 2, 3], (a: number, b: number) => a + b).values;   // [2, 12, 103]
 * map2([1, 2, 3], [10], (a: number, b: number) => a + b).values;            // [11, 12, 13]
 * ```
 */
export function map2<R, M extends OutputMode = "list">(
  x: Sequence,
  y: Sequence,
  f: (...args: never[]) => R,
  options?: MapOptions<M>,
): Mapped<ModeValues<R>[M]>;
export function map2<M extends OutputMode = "list">(
  x: Sequence,
  y: Sequence,
  f: Formula | PathSpec,
  options?: MapOptions<M>,
): Mapped<ModeValues[M]>;
export function map2(x: Sequence, y: Sequence, f: MapperSpec, options: MapOptions = {}): Mapped<unknown> {
  return execute(pairOf(x, y), f, checkMode(options.mode ?? "list"), options);
}

/** Call `f` for its side effects over `l` in parallel; returns `l`. */
export function pwalk<L extends SequenceList>(l: L, f: MapperSpec, options: ExtraOptions = {}): L {
  execute(listOf(l), f, "list", options);
  return l;
}

/** Call `f` for its side effects over `x` and `y` in parallel; returns `x`. */
export function walk2<X extends Sequence>(x: X, y: Sequence, f: MapperSpec, options: ExtraOptions = {}): X {
  execute(pairOf(x, y), f, "list", options);
  return x;
}

export function map2Lgl(x: Sequence, y: Sequence, f: MapperSpec, options: ExtraOptions = {}): Mapped<boolean[]> {
  return execute(pairOf(x, y), f, "logical", options);
}

export function map2Int(x: Sequence, y: Sequence, f: MapperSpec, options: ExtraOptions = {}): Mapped<Int32Array> {
  return execute(pairOf(x, y), f, "integer", options);
}

export function map2Dbl(x: Sequence, y: Sequence, f: MapperSpec, options: ExtraOptions = {}): Mapped<Float64Array> {
  return execute(pairOf(x, y), f, "double", options);
}

export function map2Chr(x: Sequence, y: Sequence, f: MapperSpec, options: ExtraOptions = {}): Mapped<string[]> {
  return execute(pairOf(x, y), f, "character", options);
}

export function map2Raw(x: Sequence, y: Sequence, f: MapperSpec, options: ExtraOptions = {}): Mapped<Uint8Array> {
  return execute(pairOf(x, y), f, "raw", options);
}

export function pmapLgl(l: SequenceList, f: MapperSpec, options: ExtraOptions = {}): Mapped<boolean[]> {
  return execute(listOf(l), f, "logical", options);
}

export function pmapInt(l: SequenceList, f: MapperSpec, options: ExtraOptions = {}): Mapped<Int32Array> {
  return execute(listOf(l), f, "integer", options);
}

export function pmapDbl(l: SequenceList, f: MapperSpec, options: ExtraOptions = {}): Mapped<Float64Array> {
  return execute(listOf(l), f, "double", options);
}

export function pmapChr(l: SequenceList, f: MapperSpec, options: ExtraOptions = {}): Mapped<string[]> {
  return execute(listOf(l), f, "character", options);
}

export function pmapRaw(l: SequenceList, f: MapperSpec, options: ExtraOptions = {}): Mapped<Uint8Array> {
  return execute(listOf(l), f, "raw", options);
}

/**
 * Convert a named result to a record. Later duplicate names overwrite
 * earlier ones.
 *
 * @throws InvalidInputError when the result is unnamed
 */
export function toRecord<E>(mapped: Mapped<ArrayLike<E>>): Record<string, E> {
  const { names, values } = mapped;
  if (names === null) {
    throw new InvalidInputError("Can't convert an unnamed result to a record");
  }
  return Object.fromEntries(names.map((name, i): [string, E] => [name, values[i]]));
}
