/**
 * Function adapter.
 *
 * Resolves a callable spec once into an `Invocable`: a uniform
 * `call(args)` plus the signature the binder needs and the fixed extra
 * arguments bound to every call.
 */

import { unreachable } from "@zipmap/core";
import { introspect, opaqueSignature } from "@zipmap/named-args";
import type { AnyFunction, Signature } from "@zipmap/named-args";
import { InvalidCallableError, describeValue } from "./errors.js";
import { compileFormula, isFormula } from "./formula.js";
import { isCallable } from "./guards.js";
import { pluck, toPath } from "./pluck.js";
import type { Formula, MapOptions, PathSegment } from "./types.js";

/** A callable spec, classified. */
export type Mapper =
  | { readonly kind: "function"; readonly fn: AnyFunction }
  | { readonly kind: "formula"; readonly formula: Formula }
  | { readonly kind: "extractor"; readonly path: ReadonlyArray<PathSegment> };

export interface Invocable {
  readonly kind: Mapper["kind"];
  /** Name used in error messages. */
  readonly label: string;
  readonly signature: Signature;
  /** Fixed positional arguments appended to every call. */
  readonly args: ReadonlyArray<unknown>;
  /** Fixed arguments bound by parameter name on every call. */
  readonly namedArgs: Readonly<Record<string, unknown>>;
  call(args: ReadonlyArray<unknown>): unknown;
}

export type AdapterOptions = Omit<MapOptions, "mode">;

/**
 * Classify a callable spec.
 *
 * @throws InvalidCallableError for anything that is not a function, a
 *   formula, a field name, an index or a path
 */
export function classify(spec: unknown): Mapper {
  if (isCallable(spec)) {
    return { kind: "function", fn: spec };
  }
  if (isFormula(spec)) {
    return { kind: "formula", formula: spec };
  }
  if (typeof spec === "string" || typeof spec === "number") {
    return { kind: "extractor", path: toPath(spec) };
  }
  if (Array.isArray(spec)) {
    return { kind: "extractor", path: toPath(spec) };
  }
  throw new InvalidCallableError(
    `Can't use ${describeValue(spec)} as a callable: expected a function, a formula, ` +
      "a field name, an index or a path",
  );
}

/**
 * Adapt a callable spec into an `Invocable`.
 *
 * @example
 * ```typescript
 * asMapper("name").call([{ name: "ada" }]);          // "ada"
 * asMapper(formula("$x + $y")).call([1, 2]);          // 3
 * asMapper(Math.pow, { args: [2] }).args;             // [2]
 * ```
 */
export function asMapper(spec: unknown, options: AdapterOptions = {}): Invocable {
  const mapper = classify(spec);
  const args = options.args ?? [];
  const namedArgs = options.namedArgs ?? {};

  switch (mapper.kind) {
    case "function": {
      const { fn } = mapper;
      const signature = introspect(fn);
      return {
        kind: "function",
        label: signature.name,
        signature,
        args,
        namedArgs,
        call: (callArgs) => Reflect.apply(fn, undefined, callArgs),
      };
    }
    case "formula": {
      const fn = compileFormula(mapper.formula);
      return {
        kind: "formula",
        label: `formula(${JSON.stringify(mapper.formula.source)})`,
        signature: opaqueSignature("formula"),
        args,
        namedArgs,
        call: (callArgs) => fn(...callArgs),
      };
    }
    case "extractor": {
      const { path } = mapper;
      const fallback = options.default;
      return {
        kind: "extractor",
        label: `pluck(${path.map((segment) => JSON.stringify(segment)).join(", ")})`,
        signature: opaqueSignature("pluck"),
        args,
        namedArgs,
        call: (callArgs) => pluck(callArgs[0], path, fallback),
      };
    }
    default:
      return unreachable(mapper);
  }
}
