/**
 * Any function value, whatever its parameters. Every function type is
 * assignable to this; calls go through `Reflect.apply`.
 */
export type AnyFunction = (...args: never[]) => unknown;

/** Metadata for a single declared parameter. */
export interface ParamMeta {
  /** Declared name, or `null` for a destructured parameter. */
  readonly name: string | null;
  /** `false` when the parameter declares a default value. */
  readonly required: boolean;
  readonly position: number;
}

/**
 * What a function declares about the arguments it takes.
 *
 * An `opaque` signature could not be read (native, bound or class-like
 * functions) and accepts any arguments positionally.
 */
export interface Signature {
  readonly name: string;
  readonly params: ReadonlyArray<ParamMeta>;
  /** Declares a rest parameter (`...rest`) that absorbs leftover arguments. */
  readonly rest: boolean;
  readonly opaque: boolean;
}

/** Metadata attached by `namedArgs()` to a wrapped function. */
export interface NamedArgsFunctionMeta {
  readonly functionName: string;
  readonly params: ReadonlyArray<ParamMeta>;
  readonly requiredParams: ReadonlyArray<string>;
  readonly optionalParams: ReadonlyArray<string>;
}

/**
 * A function augmented with named-argument calling support.
 *
 * Calls the original positionally and adds a `.namedCall()` method
 * that accepts an object keyed by parameter name.
 */
export type WithNamedArgs<F extends AnyFunction> = ((...args: unknown[]) => ReturnType<F>) & {
  namedCall(args: Record<string, unknown>): ReturnType<F>;
  readonly __namedArgsMeta__: NamedArgsFunctionMeta;
};

/** Where one argument of a planned call comes from. */
export type ArgumentSource =
  | { readonly kind: "field"; readonly index: number }
  | { readonly kind: "extra"; readonly index: number }
  | { readonly kind: "named"; readonly key: string }
  | { readonly kind: "missing" };

/**
 * The shape of every call in one run: the tuple's field names, the number
 * of fixed positional extras and the keys of fixed named extras.
 */
export interface CallShape {
  readonly fields: ReadonlyArray<string | null>;
  readonly extras: number;
  readonly namedExtras: ReadonlyArray<string>;
}

/**
 * How tuple fields and extras map onto a call's positional argument list.
 *
 * - `positional` fills parameters in order
 * - `keyed` matched at least one field or extra by parameter name
 * - `variadic` passes everything in call order to an opaque signature
 */
export interface BindingPlan {
  readonly strategy: "positional" | "keyed" | "variadic";
  readonly sources: ReadonlyArray<ArgumentSource>;
}
