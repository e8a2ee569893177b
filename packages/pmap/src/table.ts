import { LengthMismatchError } from "./errors.js";
import { recycle } from "./recycle.js";
import { toSequence } from "./sequence.js";
import type { Sequence } from "./types.js";

/**
 * A column-oriented table. Mapping over a table treats each column as one
 * named input, so the callable runs once per row.
 */
export class Table {
  private constructor(
    private readonly data: ReadonlyMap<string, ReadonlyArray<unknown>>,
    readonly nrow: number,
  ) {}

  /** @internal use `table()` or `fromRows()` */
  static create(columns: Readonly<Record<string, Sequence>>): Table {
    const names = Object.keys(columns);
    const labels = names.map((name) => `column ${name}`);
    const sequences = names.map((name, i) => toSequence(columns[name], labels[i]));
    // An empty column only fits beside columns of length 0 or 1.
    const longest = Math.max(0, ...sequences.map((s) => s.values.length));
    if (longest > 1) {
      const empty = sequences.findIndex((s) => s.values.length === 0);
      if (empty !== -1) {
        throw new LengthMismatchError(empty, labels[empty], 0, longest);
      }
    }
    const recycled = recycle(sequences, labels);
    const data = new Map<string, ReadonlyArray<unknown>>();
    names.forEach((name, i) => data.set(name, recycled[i].values));
    return new Table(data, recycled.length > 0 ? recycled[0].values.length : 0);
  }

  get names(): string[] {
    return [...this.data.keys()];
  }

  get ncol(): number {
    return this.data.size;
  }

  column(name: string): ReadonlyArray<unknown> | undefined {
    return this.data.get(name);
  }

  /** The name-keyed column record the mapping engine consumes. */
  columns(): Record<string, ReadonlyArray<unknown>> {
    return Object.fromEntries(this.data);
  }

  rows(): Array<Record<string, unknown>> {
    const rows: Array<Record<string, unknown>> = [];
    for (let i = 0; i < this.nrow; i++) {
      const row: Record<string, unknown> = {};
      for (const [name, values] of this.data) {
        row[name] = values[i];
      }
      rows.push(row);
    }
    return rows;
  }
}

/**
 * Build a table from columns. Length-1 columns are recycled to the common
 * length.
 *
 * @throws LengthMismatchError when column lengths cannot be reconciled
 *
 * @example
 * ```typescript
 * const df = table({ x: [1, 2, 5], y: [5, 4, 8] });
 * pmapDbl(df, Math.min).values;   // Float64Array [1, 2, 5]
 * ```
 */
export function table(columns: Readonly<Record<string, Sequence>>): Table {
  return Table.create(columns);
}

/**
 * Build a table from row records. Columns appear in first-seen key order;
 * rows missing a key hold `undefined` in that column.
 */
export function fromRows(rows: ReadonlyArray<Readonly<Record<string, unknown>>>): Table {
  const names: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        names.push(key);
      }
    }
  }

  const columns: Record<string, unknown[]> = {};
  for (const name of names) {
    columns[name] = rows.map((row) => row[name]);
  }
  return Table.create(columns);
}
