/**
 * Output builders, one per mode.
 *
 * The list builder stores results as returned. Scalar builders require each
 * result to be exactly one value of their target type: a one-element array
 * is unwrapped, `null`, `undefined` and other lengths are length
 * violations, anything else of the wrong type is a coercion failure.
 */

import { createLogger } from "@zipmap/core";
import { LengthOneViolationError, TypeCoercionError, describeValue } from "./errors.js";
import { isThenable, isTypedArray } from "./guards.js";
import type { ModeValues, OutputMode } from "./types.js";

const log = createLogger("collect");

export interface Builder<V> {
  /** Check and store the result of the call at `index`. */
  push(result: unknown, index: number): void;
  finish(): V;
}

type Builders = { readonly [M in OutputMode]: (length: number) => Builder<ModeValues[M]> };

type Coerce<E> = (value: unknown, index: number) => E;

const BUILDERS: Builders = {
  list: () => {
    const values: unknown[] = [];
    let warned = false;
    return {
      push(result, index) {
        if (!warned && isThenable(result)) {
          log.warn(`The result at index ${index} is a Promise; results are stored without awaiting them`);
          warned = true;
        }
        values.push(result);
      },
      finish: () => values,
    };
  },
  logical: () => arrayBuilder("logical", toLogical),
  integer: (length) => numericBuilder("integer", new Int32Array(length), toInteger),
  double: (length) => numericBuilder("double", new Float64Array(length), toDouble),
  character: () => arrayBuilder("character", toCharacter),
  raw: (length) => numericBuilder("raw", new Uint8Array(length), toRaw),
};

/** Create the builder for `mode`, sized for `length` results. */
export function createBuilder<M extends OutputMode>(mode: M, length: number): Builder<ModeValues[M]> {
  return BUILDERS[mode](length);
}

function arrayBuilder<E>(mode: OutputMode, coerce: Coerce<E>): Builder<E[]> {
  const values: E[] = [];
  return {
    push(result, index) {
      values.push(coerce(scalarOf(result, index, mode), index));
    },
    finish: () => values,
  };
}

function numericBuilder<V extends Int32Array | Float64Array | Uint8Array>(
  mode: OutputMode,
  values: V,
  coerce: Coerce<number>,
): Builder<V> {
  const slots: { [index: number]: number } = values;
  return {
    push(result, index) {
      slots[index] = coerce(scalarOf(result, index, mode), index);
    },
    finish: () => values,
  };
}

function scalarOf(result: unknown, index: number, mode: OutputMode): unknown {
  let value = result;
  if (Array.isArray(value) || isTypedArray(value)) {
    if (value.length !== 1) {
      throw new LengthOneViolationError(index, mode, describeValue(value));
    }
    value = value[0];
  }
  if (value === null || value === undefined) {
    throw new LengthOneViolationError(index, mode, describeValue(value));
  }
  return value;
}

function toLogical(value: unknown, index: number): boolean {
  if (typeof value === "boolean") return value;
  throw new TypeCoercionError(index, "logical", describeValue(value));
}

function toInteger(value: unknown, index: number): number {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number" && Number.isInteger(value) && value === (value | 0)) return value;
  throw new TypeCoercionError(index, "integer", describeValue(value));
}

function toDouble(value: unknown, index: number): number {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") return value;
  throw new TypeCoercionError(index, "double", describeValue(value));
}

function toCharacter(value: unknown, index: number): string {
  switch (typeof value) {
    case "string":
      return value;
    case "number":
    case "boolean":
    case "bigint":
      return String(value);
    default:
      throw new TypeCoercionError(index, "character", describeValue(value));
  }
}

function toRaw(value: unknown, index: number): number {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255) return value;
  throw new TypeCoercionError(index, "raw", describeValue(value));
}
