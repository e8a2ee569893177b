import { createLogger } from "@zipmap/core";
import { LengthMismatchError } from "./errors.js";
import type { Seq } from "./types.js";

const log = createLogger("recycle");

/**
 * The common length of a set of inputs: 0 when there are none or any is
 * empty, else the longest length.
 */
export function commonLength(sequences: ReadonlyArray<Seq>): number {
  let length = 0;
  for (const seq of sequences) {
    if (seq.values.length === 0) return 0;
    length = Math.max(length, seq.values.length);
  }
  return length;
}

/**
 * Align inputs to their common length.
 *
 * Inputs of the common length pass through unchanged. Length-1 inputs are
 * replicated and lose their name. When any input is empty every input
 * becomes empty and no lengths are checked.
 *
 * @param labels - per-input labels used in error messages
 * @throws LengthMismatchError naming the first input whose length is
 *   neither 1 nor the common length
 */
export function recycle(
  sequences: ReadonlyArray<Seq>,
  labels: ReadonlyArray<string> = [],
): Seq[] {
  const length = commonLength(sequences);
  log.debug(`common length ${length} over ${sequences.length} input(s)`);

  return sequences.map((seq, position) => {
    const n = seq.values.length;
    if (n === length) return seq;
    if (length === 0) return { values: [], names: seq.names && [] };
    if (n === 1) {
      return { values: new Array<unknown>(length).fill(seq.values[0]), names: null };
    }
    throw new LengthMismatchError(position, labels[position] ?? `input ${position}`, n, length);
  });
}
