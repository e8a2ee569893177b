/**
 * @zipmap/named-args: parameter introspection and name-or-position
 * argument binding.
 *
 * Reads the declared parameters of plain JavaScript functions, plans how a
 * call's named and unnamed actuals map onto them, and offers object-style
 * calling with `namedArgs()`.
 *
 * @packageDocumentation
 */

export type {
  AnyFunction,
  ParamMeta,
  Signature,
  NamedArgsFunctionMeta,
  WithNamedArgs,
  ArgumentSource,
  CallShape,
  BindingPlan,
} from "./types.js";

export { NamedArgsError } from "./errors.js";
export type { NamedArgsErrorReason } from "./errors.js";

export { introspect, registerSignature, opaqueSignature } from "./introspect.js";
export { planBinding, bind } from "./binding.js";
export { namedArgs, callWithNamedArgs } from "./named-args.js";
