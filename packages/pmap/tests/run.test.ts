import { describe, it, expect, afterEach, vi } from "vitest";
import { config } from "@zipmap/core";
import { NamedArgsError } from "@zipmap/named-args";
import { ArgumentMismatchError, TypeCoercionError, UserCallableError } from "../src/errors.js";
import { asMapper } from "../src/mapper.js";
import { run } from "../src/run.js";
import { transpose } from "../src/transpose.js";
import type { Seq } from "../src/types.js";

const seq = (values: unknown[], names: string[] | null = null): Seq => ({ values, names });

describe("run", () => {
  afterEach(() => {
    config.reset();
    vi.restoreAllMocks();
  });

  it("calls once per tuple, in order", () => {
    const calls: unknown[][] = [];
    const record = (a: number, b: number): number => {
      calls.push([a, b]);
      return a * b;
    };
    const out = run(transpose([seq([1, 2, 3]), seq([4, 5, 6])]), asMapper(record), "list");
    expect(calls).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ]);
    expect(out).toEqual({ mode: "list", values: [4, 10, 18], names: null });
  });

  it("names the output after the tuples", () => {
    const out = run(transpose([seq([1, 2], ["a", "b"])]), asMapper((x: number) => x + 1), "double");
    expect(out.names).toEqual(["a", "b"]);
    expect(out.values).toEqual(new Float64Array([2, 3]));
  });

  it("passes tuple fields to parameters of the same name", () => {
    const seen: string[] = [];
    const show = (c: number, b: number, a: number): string => {
      const line = `c=${c},b=${b},a=${a}`;
      seen.push(line);
      return line;
    };
    const tuples = transpose([seq([1, 2]), seq([3, 4]), seq([5, 6])], ["a", "b", "c"]);
    run(tuples, asMapper(show), "character");
    expect(seen).toEqual(["c=5,b=3,a=1", "c=6,b=4,a=2"]);
  });

  it("binds by position when configured to", () => {
    config.set({ binding: { mode: "positional" } });
    const tuples = transpose([seq([1]), seq([2])], ["b", "a"]);
    const out = run(tuples, asMapper((a: number, b: number) => `${a}-${b}`), "list");
    expect(out.values).toEqual(["1-2"]);
  });

  it("appends positional extras and binds named extras by name", () => {
    const f = (x: number, scale: number, offset: number): number => x * scale + offset;
    const out = run(
      transpose([seq([1, 2])]),
      asMapper(f, { args: [10], namedArgs: { offset: 5 } }),
      "list",
    );
    expect(out.values).toEqual([15, 25]);
  });

  it("absorbs unmatched named fields into a rest parameter", () => {
    const f = (a: number, ...rest: unknown[]): string => `${a}|${rest.join(",")}`;
    const tuples = transpose([seq([1]), seq([2]), seq([3])], ["a", "extra", "more"]);
    expect(run(tuples, asMapper(f), "list").values).toEqual(["1|2,3"]);
  });

  it("fails at index 0 when a field cannot be bound", () => {
    const f = (x: number, y: number): number => x + y;
    const tuples = transpose([seq([1, 2]), seq([3, 4])], ["x", "z"]);
    try {
      run(tuples, asMapper(f), "list");
      expect.fail("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ArgumentMismatchError);
      if (error instanceof ArgumentMismatchError) {
        expect(error.index).toBe(0);
        expect(error.failure).toBeInstanceOf(NamedArgsError);
        expect(error.failure.reason).toBe("unused_argument");
        expect(error.cause).toBe(error.failure);
        expect(error.message).toBe(
          "Can't bind the arguments of the call at index 0: Unused argument 'z' for function 'f': " +
            "no parameter has that name. Known parameters: x, y",
        );
      }
    }
  });

  it("does not bind anything when there are no tuples", () => {
    let calls = 0;
    const f = (x: number): number => {
      calls++;
      return x;
    };
    const out = run([], asMapper(f), "integer");
    expect(calls).toBe(0);
    expect(out).toEqual({ mode: "integer", values: new Int32Array(0), names: null });
  });

  it("wraps a throw with the failing index and stops", () => {
    const boom = new Error("boom");
    let calls = 0;
    const f = (x: number): number => {
      calls++;
      if (x === 3) throw boom;
      return x;
    };
    const tuples = transpose([seq([1, 2, 3, 4, 5])]);
    try {
      run(tuples, asMapper(f), "list");
      expect.fail("should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(UserCallableError);
      if (error instanceof UserCallableError) {
        expect(error.index).toBe(2);
        expect(error.cause).toBe(boom);
        expect(error.callable).toBe("f");
        expect(error.message).toBe("The call of f at index 2 failed: boom");
      }
    }
    expect(calls).toBe(3);
  });

  it("describes a thrown value that is not an error", () => {
    const tuples = transpose([seq([1])]);
    const f = (_x: unknown): never => {
      throw "bad input";
    };
    expect(() => run(tuples, asMapper(f), "list")).toThrow(
      'The call of f at index 0 failed: a string ("bad input")',
    );
  });

  it("fails fast on a result of the wrong type", () => {
    let calls = 0;
    const f = (x: number): number | string => {
      calls++;
      return x > 1 ? "two" : x;
    };
    const tuples = transpose([seq([1, 2, 3])]);
    expect(() => run(tuples, asMapper(f), "integer")).toThrow(TypeCoercionError);
    expect(calls).toBe(2);
  });

  it("gives equal containers when run twice", () => {
    const tuples = transpose([seq([1, 2, 3]), seq([4, 5, 6])]);
    const invocable = asMapper((a: number, b: number) => a - b);
    expect(run(tuples, invocable, "double")).toEqual(run(tuples, invocable, "double"));
  });

  it("logs the binding strategy at debug level", () => {
    config.set({ debug: true });
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    function twice(x: number): number {
      return x * 2;
    }
    run(transpose([seq([1, 2])]), asMapper(twice), "list");
    expect(debug).toHaveBeenCalledWith("[zipmap:run] twice: positional binding, 2 call(s) into list");
  });
});
