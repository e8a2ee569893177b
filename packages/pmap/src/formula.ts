/**
 * Formula shorthand.
 *
 * `formula("$x + $y")` describes a function of positional placeholders:
 *
 *   $, $x, $1   first argument
 *   $y, $2      second argument
 *   $3 … $9     third to ninth argument
 *
 * The source is transpiled with the TypeScript compiler (so it may use
 * TypeScript syntax) and compiled once per distinct source.
 */

import ts from "typescript";
import * as vm from "node:vm";
import { InvalidCallableError } from "./errors.js";
import type { Formula } from "./types.js";

const PLACEHOLDERS = [
  "const $ = $args[0], $x = $args[0], $y = $args[1];",
  "const $1 = $args[0], $2 = $args[1], $3 = $args[2], $4 = $args[3], $5 = $args[4];",
  "const $6 = $args[5], $7 = $args[6], $8 = $args[7], $9 = $args[8];",
].join("\n");

const compiled = new Map<string, (...args: unknown[]) => unknown>();

/**
 * @example
 * ```typescript
 * map2([1, 2], [10, 20], formula("$x * $y")).values;   // [10, 40]
 * ```
 */
export function formula(source: string): Formula {
  return Object.freeze({ kind: "formula", source });
}

export function isFormula(value: unknown): value is Formula {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "formula" &&
    "source" in value &&
    typeof value.source === "string"
  );
}

/**
 * Compile a formula into a variadic function.
 *
 * @throws InvalidCallableError when the source does not parse
 */
export function compileFormula(f: Formula): (...args: unknown[]) => unknown {
  const cached = compiled.get(f.source);
  if (cached) return cached;

  if (f.source.trim() === "") {
    throw new InvalidCallableError("A formula needs a non-empty expression");
  }

  const code = `(function formula(...$args) {\n${PLACEHOLDERS}\nreturn (${f.source}\n);\n})`;

  const { outputText, diagnostics } = ts.transpileModule(code, {
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.CommonJS,
      strict: false,
      removeComments: true,
    },
    reportDiagnostics: true,
  });

  if (diagnostics && diagnostics.length > 0) {
    const messages = diagnostics.map((d) => ts.flattenDiagnosticMessageText(d.messageText, "\n"));
    throw new InvalidCallableError(
      `Formula ${JSON.stringify(f.source)} does not parse: ${messages.join("; ")}`,
    );
  }

  // Strip the module prologue transpileModule may add
  const cleanedJs = outputText
    .replace(/^"use strict";\s*/, "")
    .replace(/\s*Object\.defineProperty\(exports.*\n?/g, "")
    .replace(/\s*exports\.\S+ = void 0;\s*/g, "");

  let fn: unknown;
  try {
    fn = vm.runInThisContext(cleanedJs, { filename: "formula.js" });
  } catch (error: unknown) {
    throw new InvalidCallableError(`Formula ${JSON.stringify(f.source)} does not compile`, {
      cause: error,
    });
  }

  if (typeof fn !== "function") {
    throw new InvalidCallableError(`Formula ${JSON.stringify(f.source)} did not compile to a function`);
  }

  const target = fn;
  const invoke = (...args: unknown[]): unknown => Reflect.apply(target, undefined, args);
  compiled.set(f.source, invoke);
  return invoke;
}
