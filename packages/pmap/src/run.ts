import { config, createLogger } from "@zipmap/core";
import { NamedArgsError, bind, planBinding } from "@zipmap/named-args";
import type { BindingPlan } from "@zipmap/named-args";
import { createBuilder } from "./collectors.js";
import { ArgumentMismatchError, UserCallableError } from "./errors.js";
import type { Invocable } from "./mapper.js";
import type { ArgumentTuple, Mapped, ModeValues, OutputMode } from "./types.js";

const log = createLogger("run");

/**
 * Call `invocable` once per tuple, in order, and collect the results into
 * the container for `mode`.
 *
 * The binding plan is computed once from the first tuple's fields; with no
 * tuples there are no calls and no binding errors. The first failure aborts
 * the run.
 *
 * @throws ArgumentMismatchError when the tuple fields and extras cannot be
 *   bound to the callable's parameters
 * @throws UserCallableError when the callable throws
 * @throws TypeCoercionError or LengthOneViolationError when a result does
 *   not fit a scalar mode
 */
export function run<M extends OutputMode>(
  tuples: ReadonlyArray<ArgumentTuple>,
  invocable: Invocable,
  mode: M,
): Mapped<ModeValues[M]> {
  const builder = createBuilder(mode, tuples.length);

  if (tuples.length > 0) {
    const plan = planFor(invocable, tuples[0]);
    log.debug(`${invocable.label}: ${plan.strategy} binding, ${tuples.length} call(s) into ${mode}`);

    for (let index = 0; index < tuples.length; index++) {
      const args = bind(plan, tuples[index].values, invocable.args, invocable.namedArgs);

      let result: unknown;
      try {
        result = invocable.call(args);
      } catch (error: unknown) {
        throw new UserCallableError(index, invocable.label, error);
      }
      builder.push(result, index);
    }
  }

  return { mode, values: builder.finish(), names: namesOf(tuples) };
}

function planFor(invocable: Invocable, first: ArgumentTuple): BindingPlan {
  try {
    return planBinding(
      invocable.signature,
      {
        fields: first.fields,
        extras: invocable.args.length,
        namedExtras: Object.keys(invocable.namedArgs),
      },
      config.getBindingMode(),
    );
  } catch (error: unknown) {
    if (error instanceof NamedArgsError) {
      throw new ArgumentMismatchError(0, error);
    }
    throw error;
  }
}

function namesOf(tuples: ReadonlyArray<ArgumentTuple>): string[] | null {
  const names = tuples.flatMap((tuple) => (tuple.name === null ? [] : [tuple.name]));
  return names.length > 0 && names.length === tuples.length ? names : null;
}
