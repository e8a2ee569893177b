import { invariant } from "@zipmap/core";
import type { ArgumentTuple, Seq } from "./types.js";

/**
 * Turn equal-length sequences into one argument tuple per position.
 *
 * Tuple `i` holds element `i` of every sequence, in input order. Tuples are
 * named after the first input that carries names; inputs that were
 * recycled carry none.
 *
 * @param fields - per-input field names, shared by every tuple
 */
export function transpose(
  sequences: ReadonlyArray<Seq>,
  fields: ReadonlyArray<string | null> = sequences.map(() => null),
): ArgumentTuple[] {
  invariant(
    fields.length === sequences.length,
    `transpose() got ${fields.length} field name(s) for ${sequences.length} sequence(s)`,
  );

  const length = sequences.length > 0 ? sequences[0].values.length : 0;
  for (const seq of sequences) {
    invariant(
      seq.values.length === length,
      `transpose() needs equal lengths, got ${seq.values.length} and ${length}`,
    );
  }

  const names = sequences.find((seq) => seq.names !== null)?.names ?? null;

  const tuples: ArgumentTuple[] = [];
  for (let i = 0; i < length; i++) {
    tuples.push({
      values: sequences.map((seq) => seq.values[i]),
      fields,
      name: names ? names[i] : null,
    });
  }
  return tuples;
}
