import type { AnyFunction } from "@zipmap/named-args";

/** The output container kinds a caller can request. */
export type OutputMode = "list" | "logical" | "integer" | "double" | "character" | "raw";

export const OUTPUT_MODES: ReadonlyArray<OutputMode> = [
  "list",
  "logical",
  "integer",
  "double",
  "character",
  "raw",
];

/** The `values` container built for each mode. */
export interface ModeValues<T = unknown> {
  list: T[];
  logical: boolean[];
  integer: Int32Array;
  double: Float64Array;
  character: string[];
  raw: Uint8Array;
}

/**
 * The output of one mapping call. `names` holds one name per value when
 * the tuples carried names, else `null`.
 */
export interface Mapped<V> {
  readonly mode: OutputMode;
  readonly values: V;
  readonly names: ReadonlyArray<string> | null;
}

export type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

/**
 * Caller-facing sequence forms: arrays and typed arrays are unnamed,
 * records and maps are named, `null`/`undefined` are empty.
 */
export type Sequence =
  | ReadonlyArray<unknown>
  | TypedArray
  | ReadonlyMap<unknown, unknown>
  | Readonly<Record<string, unknown>>
  | null
  | undefined;

/** The engine's internal sequence form. */
export interface Seq {
  readonly values: ReadonlyArray<unknown>;
  readonly names: ReadonlyArray<string> | null;
}

/** One aligned set of elements, one per input, for a single call. */
export interface ArgumentTuple {
  readonly values: ReadonlyArray<unknown>;
  /** Per-field names, shared by every tuple of a run. */
  readonly fields: ReadonlyArray<string | null>;
  /** Tuple-level name, used to name the output at this position. */
  readonly name: string | null;
}

/** A formula shorthand built by `formula()`. */
export interface Formula {
  readonly kind: "formula";
  readonly source: string;
}

export type PathSegment = string | number;

/** Extraction shorthand: a field name, a 0-based index, or a path of them. */
export type PathSpec = PathSegment | ReadonlyArray<PathSegment>;

/** Everything the function adapter accepts. */
export type MapperSpec = AnyFunction | Formula | PathSpec;

export interface MapOptions<M extends OutputMode = OutputMode> {
  /** Output container kind (default `list`). */
  readonly mode?: M;
  /** Fixed positional arguments appended to every call. */
  readonly args?: ReadonlyArray<unknown>;
  /** Fixed arguments bound by parameter name on every call. */
  readonly namedArgs?: Readonly<Record<string, unknown>>;
  /** Value an extraction shorthand yields for a missing field. */
  readonly default?: unknown;
}

/** Options of the mode-specific aliases. */
export type ExtraOptions = Omit<MapOptions, "mode">;
