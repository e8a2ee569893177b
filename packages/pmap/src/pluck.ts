import { InvalidCallableError, describeValue } from "./errors.js";
import { isPlainRecord, isTypedArray } from "./guards.js";
import type { PathSegment, PathSpec } from "./types.js";

/**
 * Validate an extraction shorthand and return it as a path.
 *
 * @throws InvalidCallableError for empty paths, negative or fractional
 *   indices, and segments that are neither strings nor numbers
 */
export function toPath(spec: PathSpec): PathSegment[] {
  const path: ReadonlyArray<unknown> = typeof spec === "string" || typeof spec === "number" ? [spec] : spec;

  if (path.length === 0) {
    throw new InvalidCallableError("An extraction path needs at least one field name or index");
  }

  return path.map((segment, i) => {
    if (typeof segment === "string") return segment;
    if (typeof segment === "number" && Number.isInteger(segment) && segment >= 0) return segment;
    throw new InvalidCallableError(
      `Segment ${i} of an extraction path must be a field name or a non-negative integer index, ` +
        `not ${describeValue(segment)}`,
    );
  });
}

/**
 * Walk `path` into `value`: names select record properties and `Map`
 * entries, indices select array elements (or the n-th value of a record).
 * A missing step, `null` or `undefined` yields `fallback`.
 */
export function pluck(value: unknown, path: ReadonlyArray<PathSegment>, fallback: unknown): unknown {
  let current: unknown = value;

  for (const segment of path) {
    if (current === null || current === undefined) return fallback;
    current = step(current, segment);
  }

  return current === null || current === undefined ? fallback : current;
}

function step(current: unknown, segment: PathSegment): unknown {
  if (current instanceof Map) {
    return current.get(segment);
  }

  if (Array.isArray(current) || isTypedArray(current)) {
    return typeof segment === "number" && segment < current.length ? current[segment] : undefined;
  }

  if (typeof segment === "number") {
    return isPlainRecord(current) ? Object.values(current)[segment] : undefined;
  }

  if ((typeof current === "object" || typeof current === "function") && current !== null) {
    return Reflect.get(current, segment);
  }

  return undefined;
}
