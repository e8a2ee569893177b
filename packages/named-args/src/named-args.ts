import type { AnyFunction, NamedArgsFunctionMeta, ParamMeta, WithNamedArgs } from "./types.js";
import { NamedArgsError } from "./errors.js";
import { introspect, registerSignature } from "./introspect.js";

/**
 * Call a function with named arguments.
 *
 * Resolves parameter order from `params` and validates that all required
 * params are present. Missing optional params are passed as `undefined`
 * so the function's own default applies. Unknown keys in `args` are
 * rejected.
 */
export function callWithNamedArgs<F extends AnyFunction>(
  fn: F,
  params: ReadonlyArray<ParamMeta>,
  args: Record<string, unknown>,
): ReturnType<F> {
  const fnName = fn.name || "<anonymous>";
  const knownNames = new Set(params.flatMap((p) => (p.name === null ? [] : [p.name])));

  for (const key of Object.keys(args)) {
    if (!knownNames.has(key)) {
      throw new NamedArgsError(
        fnName,
        key,
        "unknown_param",
        `Unknown parameter '${key}' for function '${fnName}'. ` +
          `Known parameters: ${[...knownNames].join(", ")}`,
      );
    }
  }

  const positionalArgs: unknown[] = [];

  for (const param of params) {
    const hasKey = param.name !== null && Object.prototype.hasOwnProperty.call(args, param.name);

    if (hasKey && param.name !== null) {
      positionalArgs[param.position] = args[param.name];
    } else if (param.required) {
      const label = param.name ?? `#${param.position}`;
      throw new NamedArgsError(
        fnName,
        label,
        "missing_required",
        `Missing required parameter '${label}' for function '${fnName}'`,
      );
    } else {
      positionalArgs[param.position] = undefined;
    }
  }

  return Reflect.apply(fn, undefined, positionalArgs);
}

/**
 * Create a named-args wrapper for a function.
 *
 * Returns a function that calls `fn` positionally, augmented with:
 * - `.namedCall(obj)`: call with an object of named parameters
 * - `.__namedArgsMeta__`: the parameter metadata
 *
 * `params` defaults to the parameters read from `fn`'s source. Passing them
 * explicitly names the parameters of functions whose source is unreadable
 * (bound or native functions); the wrapper's signature is registered so the
 * mapping engine can match fields to them by name.
 */
export function namedArgs<F extends AnyFunction>(
  fn: F,
  params?: ReadonlyArray<ParamMeta>,
): WithNamedArgs<F> {
  const base = introspect(fn);
  const sorted = [...(params ?? base.params)].sort((a, b) => a.position - b.position);
  const named = sorted.flatMap((p) => (p.name === null ? [] : [{ name: p.name, required: p.required }]));

  const meta: NamedArgsFunctionMeta = {
    functionName: fn.name || "<anonymous>",
    params: sorted,
    requiredParams: named.filter((p) => p.required).map((p) => p.name),
    optionalParams: named.filter((p) => !p.required).map((p) => p.name),
  };

  const call = (...args: unknown[]): ReturnType<F> => Reflect.apply(fn, undefined, args);
  Object.defineProperty(call, "name", { value: fn.name, configurable: true });

  const wrapper = Object.assign(call, {
    namedCall(args: Record<string, unknown>): ReturnType<F> {
      return callWithNamedArgs(fn, sorted, args);
    },
    __namedArgsMeta__: meta,
  });

  registerSignature(wrapper, {
    name: meta.functionName,
    params: sorted,
    rest: params ? false : base.rest,
    opaque: false,
  });

  return wrapper;
}
