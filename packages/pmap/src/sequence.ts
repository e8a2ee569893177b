/**
 * Boundary adapters: caller-facing sequence forms in, the engine's
 * `{ values, names }` form out.
 */

import { InvalidInputError, describeValue } from "./errors.js";
import { isPlainRecord, isTypedArray } from "./guards.js";
import { Table } from "./table.js";
import type { Seq, Sequence } from "./types.js";

/** The inputs of one mapping call, normalized. */
export interface Inputs {
  readonly sequences: ReadonlyArray<Seq>;
  /** Field name per input, from the keys of a record or table of inputs. */
  readonly fields: ReadonlyArray<string | null>;
  /** Human label per input for error messages (`.x`, `.l[1]`, `.l.b`). */
  readonly labels: ReadonlyArray<string>;
}

/** Anything `pmap` takes as its list of inputs. */
export type SequenceList =
  | ReadonlyArray<Sequence>
  | Readonly<Record<string, Sequence>>
  | Table
  | null
  | undefined;

/**
 * Normalize one caller-facing sequence.
 *
 * @throws InvalidInputError for values that are not sequences
 */
export function toSequence(value: unknown, label: string): Seq {
  if (value === null || value === undefined) {
    return { values: [], names: null };
  }
  if (Array.isArray(value)) {
    return { values: value.slice(), names: null };
  }
  if (isTypedArray(value)) {
    return { values: Array.from<unknown>(value), names: null };
  }
  if (value instanceof Map) {
    const names: string[] = [];
    const values: unknown[] = [];
    for (const [key, element] of value) {
      names.push(String(key));
      values.push(element);
    }
    return { values, names };
  }
  if (isPlainRecord(value)) {
    return { values: Object.values(value), names: Object.keys(value) };
  }
  throw new InvalidInputError(
    `${label} must be an array, a typed array, a Map or a record, not ${describeValue(value)}`,
  );
}

/**
 * Normalize the list of inputs. Arrays give unnamed fields; records and
 * tables give one named field per key or column.
 */
export function toInputs(list: unknown, label = ".l"): Inputs {
  if (list === null || list === undefined) {
    return { sequences: [], fields: [], labels: [] };
  }

  if (list instanceof Table) {
    return toInputs(list.columns(), label);
  }

  if (Array.isArray(list)) {
    const labels = list.map((_, i) => `${label}[${i}]`);
    return {
      sequences: list.map((element, i) => toSequence(element, labels[i])),
      fields: list.map(() => null),
      labels,
    };
  }

  if (isPlainRecord(list)) {
    const keys = Object.keys(list);
    const labels = keys.map((key) => `${label}.${key}`);
    return {
      sequences: keys.map((key, i) => toSequence(list[key], labels[i])),
      fields: keys,
      labels,
    };
  }

  throw new InvalidInputError(
    `${label} must be an array, a record or a table of sequences, not ${describeValue(list)}`,
  );
}
