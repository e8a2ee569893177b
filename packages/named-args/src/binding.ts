/**
 * Name-or-position argument binding.
 *
 * A binding plan is computed once per run from the callee's signature and
 * the call shape (tuple field names plus fixed extras), then applied to
 * every tuple. Matching follows the usual rules for keyword arguments:
 *
 * 1. named actuals fill the parameter with the same name
 * 2. unnamed actuals fill the remaining parameters left to right
 * 3. named actuals without a parameter, and positional overflow, go to the
 *    rest parameter in call order, or the plan is rejected
 */

import { NamedArgsError } from "./errors.js";
import type { ArgumentSource, BindingPlan, CallShape, Signature } from "./types.js";

interface Actual {
  readonly source: ArgumentSource;
  readonly name: string | null;
  readonly label: string;
  readonly order: number;
}

function actualsOf(shape: CallShape, useNames: boolean): Actual[] {
  const actuals: Actual[] = [];

  shape.fields.forEach((field, index) => {
    const name = useNames ? field : null;
    actuals.push({
      source: { kind: "field", index },
      name,
      label: field ?? `field ${index}`,
      order: actuals.length,
    });
  });

  for (let index = 0; index < shape.extras; index++) {
    actuals.push({
      source: { kind: "extra", index },
      name: null,
      label: `extra argument ${index}`,
      order: actuals.length,
    });
  }

  for (const key of shape.namedExtras) {
    actuals.push({
      source: { kind: "named", key },
      name: useNames ? key : null,
      label: key,
      order: actuals.length,
    });
  }

  return actuals;
}

/**
 * Plan how every call of one run binds its arguments.
 *
 * @param mode - `positional` ignores all names
 * @throws NamedArgsError when an actual cannot be bound
 */
export function planBinding(
  signature: Signature,
  shape: CallShape,
  mode: "auto" | "positional" = "auto",
): BindingPlan {
  const actuals = actualsOf(shape, mode === "auto" && !signature.opaque);

  if (signature.opaque) {
    return { strategy: "variadic", sources: actuals.map((a) => a.source) };
  }

  const slots: Array<Actual | undefined> = signature.params.map(() => undefined);
  const rest: Actual[] = [];
  let keyed = false;

  const overflow = (actual: Actual, unmatchedName: boolean): void => {
    if (signature.rest) {
      rest.push(actual);
      return;
    }
    const detail = unmatchedName
      ? `Unused argument '${actual.label}' for function '${signature.name}': ` +
        `no parameter has that name. Known parameters: ${knownNames(signature)}`
      : `Unused argument '${actual.label}' for function '${signature.name}': ` +
        `it takes ${signature.params.length} positional argument(s)`;
    throw new NamedArgsError(signature.name, actual.label, "unused_argument", detail);
  };

  for (const actual of actuals) {
    if (actual.name === null) continue;

    const position = signature.params.findIndex((p) => p.name === actual.name);
    if (position < 0) {
      overflow(actual, true);
      continue;
    }

    const previous = slots[position];
    if (previous) {
      throw new NamedArgsError(
        signature.name,
        actual.name,
        "duplicate_param",
        `Parameter '${actual.name}' of function '${signature.name}' is matched by both ` +
          `'${previous.label}' and '${actual.label}'`,
      );
    }
    slots[position] = actual;
    keyed = true;
  }

  let cursor = 0;
  for (const actual of actuals) {
    if (actual.name !== null) continue;

    while (cursor < slots.length && slots[cursor]) cursor++;
    if (cursor < slots.length) {
      slots[cursor] = actual;
    } else {
      overflow(actual, false);
    }
  }

  rest.sort((a, b) => a.order - b.order);

  const filled = rest.length > 0 ? slots.length : lastFilled(slots) + 1;
  const sources: ArgumentSource[] = [];
  for (let i = 0; i < filled; i++) {
    sources.push(slots[i]?.source ?? { kind: "missing" });
  }
  for (const actual of rest) {
    sources.push(actual.source);
  }

  return { strategy: keyed ? "keyed" : "positional", sources };
}

/**
 * Build the positional argument list of one call.
 */
export function bind(
  plan: BindingPlan,
  fields: ReadonlyArray<unknown>,
  extras: ReadonlyArray<unknown> = [],
  namedExtras: Readonly<Record<string, unknown>> = {},
): unknown[] {
  return plan.sources.map((source) => {
    switch (source.kind) {
      case "field":
        return fields[source.index];
      case "extra":
        return extras[source.index];
      case "named":
        return namedExtras[source.key];
      case "missing":
        return undefined;
    }
  });
}

function lastFilled(slots: ReadonlyArray<Actual | undefined>): number {
  for (let i = slots.length - 1; i >= 0; i--) {
    if (slots[i]) return i;
  }
  return -1;
}

function knownNames(signature: Signature): string {
  const names = signature.params.flatMap((p) => (p.name === null ? [] : [p.name]));
  return names.length > 0 ? names.join(", ") : "(none)";
}
