import { config } from "@zipmap/core";
import type { NamedArgsError } from "@zipmap/named-args";
import { isThenable, isTypedArray } from "./guards.js";
import type { OutputMode } from "./types.js";

/** Reason codes of every failure the engine raises. */
export type ZipmapErrorReason =
  | "invalid_callable"
  | "invalid_input"
  | "length_mismatch"
  | "argument_mismatch"
  | "type_coercion"
  | "length_one"
  | "user_callable";

/**
 * Base class of engine errors. Errors raised while iterating carry the
 * 0-based `index` of the tuple whose call failed.
 */
export abstract class ZipmapError extends Error {
  abstract readonly reason: ZipmapErrorReason;
}

/** The callable spec cannot be adapted. Raised before any call. */
export class InvalidCallableError extends ZipmapError {
  readonly reason = "invalid_callable";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvalidCallableError";
  }
}

/** An input is not a sequence, or an option is not recognized. */
export class InvalidInputError extends ZipmapError {
  readonly reason = "invalid_input";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/** Input lengths cannot be recycled to a common length. */
export class LengthMismatchError extends ZipmapError {
  readonly reason = "length_mismatch";

  constructor(
    readonly position: number,
    readonly label: string,
    readonly length: number,
    readonly expected: number,
  ) {
    super(
      `Input ${position} (${label}) must have length 1 or ${expected}, not ${length}`,
    );
    this.name = "LengthMismatchError";
  }
}

/** A tuple's elements cannot be bound to the callable's parameters. */
export class ArgumentMismatchError extends ZipmapError {
  readonly reason = "argument_mismatch";

  constructor(
    readonly index: number,
    readonly failure: NamedArgsError,
  ) {
    super(`Can't bind the arguments of the call at index ${index}: ${failure.message}`, {
      cause: failure,
    });
    this.name = "ArgumentMismatchError";
  }
}

/** A scalar-mode result is a single value of the wrong type. */
export class TypeCoercionError extends ZipmapError {
  readonly reason = "type_coercion";

  constructor(
    readonly index: number,
    readonly mode: OutputMode,
    readonly received: string,
  ) {
    super(`Can't coerce the result at index ${index} from ${received} to ${article(mode)}`);
    this.name = "TypeCoercionError";
  }
}

/** A scalar-mode result is not exactly one value. */
export class LengthOneViolationError extends ZipmapError {
  readonly reason = "length_one";

  constructor(
    readonly index: number,
    readonly mode: OutputMode,
    readonly received: string,
  ) {
    super(`The result at index ${index} must be a single ${mode}, not ${received}`);
    this.name = "LengthOneViolationError";
  }
}

/** The callable threw. `cause` is what it threw. */
export class UserCallableError extends ZipmapError {
  readonly reason = "user_callable";

  constructor(
    readonly index: number,
    readonly callable: string,
    cause: unknown,
  ) {
    super(`The call of ${callable} at index ${index} failed: ${messageOf(cause)}`, { cause });
    this.name = "UserCallableError";
  }
}

function article(mode: OutputMode): string {
  return mode === "integer" ? "an integer" : `a ${mode}`;
}

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : describeValue(cause);
}

/**
 * Short human description of a value for error messages, e.g.
 * `a string ("abc")` or `an array of length 2`.
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (Array.isArray(value)) return `an array of length ${value.length}`;
  if (isTypedArray(value)) return `a ${value.constructor.name} of length ${value.length}`;

  switch (typeof value) {
    case "string":
      return `a string (${preview(JSON.stringify(value))})`;
    case "number":
    case "bigint":
    case "boolean":
      return `a ${typeof value} (${preview(String(value))})`;
    case "symbol":
      return "a symbol";
    case "function":
      return "a function";
    default:
      return isThenable(value) ? "a Promise" : "an object";
  }
}

function preview(text: string): string {
  const limit = config.getPreviewLength();
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}
