/** Reason codes for argument binding failures. */
export type NamedArgsErrorReason =
  | "missing_required"
  | "unknown_param"
  | "duplicate_param"
  | "unused_argument";

/** Error thrown when arguments cannot be bound to a function's parameters. */
export class NamedArgsError extends Error {
  constructor(
    readonly functionName: string,
    readonly paramName: string,
    readonly reason: NamedArgsErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "NamedArgsError";
  }
}
