/**
 * Signature introspection.
 *
 * Reads the declared parameters of a function value by parsing its source
 * text (`Function.prototype.toString`) with the TypeScript parser. Results
 * are cached per function object; `registerSignature` seeds the same cache
 * for functions whose source cannot be read.
 */

import ts from "typescript";
import type { AnyFunction, ParamMeta, Signature } from "./types.js";

const NATIVE_CODE = /\{\s*\[native code\]\s*\}\s*$/;
const CLASS_SOURCE = /^class\b/;

const signatures = new WeakMap<AnyFunction, Signature>();

/** Record the signature of `fn`, overriding whatever its source says. */
export function registerSignature(fn: AnyFunction, signature: Signature): void {
  signatures.set(fn, signature);
}

/** A signature that accepts any arguments positionally. */
export function opaqueSignature(name: string): Signature {
  return { name, params: [], rest: true, opaque: true };
}

/**
 * Read the declared parameters of `fn`.
 *
 * @example
 * ```typescript
 * introspect((c, b, ...rest) => c);
 * // { name: "<anonymous>", params: [c, b], rest: true, opaque: false }
 * ```
 */
export function introspect(fn: AnyFunction): Signature {
  const cached = signatures.get(fn);
  if (cached) return cached;

  const signature = readSignature(fn);
  signatures.set(fn, signature);
  return signature;
}

function readSignature(fn: AnyFunction): Signature {
  const name = fn.name || "<anonymous>";
  const source = Function.prototype.toString.call(fn);

  if (NATIVE_CODE.test(source) || CLASS_SOURCE.test(source)) {
    return opaqueSignature(name);
  }

  const declaration = parseFunctionLike(source);
  if (!declaration) return opaqueSignature(name);

  const params: ParamMeta[] = [];
  let rest = false;

  declaration.parameters.forEach((param, position) => {
    if (param.dotDotDotToken) {
      rest = true;
      return;
    }
    params.push({
      name: ts.isIdentifier(param.name) ? param.name.text : null,
      required: param.initializer === undefined,
      position,
    });
  });

  return { name, params, rest, opaque: false };
}

/**
 * Function declarations, expressions and arrows parse as a parenthesized
 * expression; method shorthand (`add(a, b) { ... }`) only parses inside an
 * object literal.
 */
function parseFunctionLike(source: string): ts.SignatureDeclarationBase | undefined {
  const expression = parseSingleExpression(`(${source}\n)`);
  if (expression && (ts.isFunctionExpression(expression) || ts.isArrowFunction(expression))) {
    return expression;
  }

  const literal = parseSingleExpression(`({${source}\n})`);
  if (literal && ts.isObjectLiteralExpression(literal) && literal.properties.length === 1) {
    const [member] = literal.properties;
    if (ts.isMethodDeclaration(member)) return member;
  }

  return undefined;
}

function parseSingleExpression(text: string): ts.Expression | undefined {
  const file = ts.createSourceFile(
    "signature.js",
    text,
    ts.ScriptTarget.Latest,
    false,
    ts.ScriptKind.JS,
  );
  if (file.statements.length !== 1) return undefined;

  const [statement] = file.statements;
  if (!ts.isExpressionStatement(statement)) return undefined;

  let expression = statement.expression;
  while (ts.isParenthesizedExpression(expression)) {
    expression = expression.expression;
  }
  return expression;
}
