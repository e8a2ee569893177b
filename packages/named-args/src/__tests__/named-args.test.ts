import { describe, it, expect } from "vitest";
import { namedArgs, callWithNamedArgs, introspect, NamedArgsError } from "../index.js";
import type { ParamMeta } from "../index.js";

function add(a: number, b: number): number {
  return a + b;
}

function greet(name: string, greeting: string = "Hello"): string {
  return `${greeting}, ${name}!`;
}

const addParams: ParamMeta[] = [
  { name: "a", required: true, position: 0 },
  { name: "b", required: true, position: 1 },
];

describe("namedArgs", () => {
  describe("basic usage", () => {
    it("wraps a function and preserves positional calling", () => {
      const wrapped = namedArgs(add);
      expect(wrapped(3, 4)).toBe(7);
    });

    it("supports named calling via .namedCall()", () => {
      const wrapped = namedArgs(add);
      expect(wrapped.namedCall({ a: 10, b: 20 })).toBe(30);
    });

    it("reads parameter metadata from the source", () => {
      const wrapped = namedArgs(greet);
      expect(wrapped.__namedArgsMeta__.functionName).toBe("greet");
      expect(wrapped.__namedArgsMeta__.requiredParams).toEqual(["name"]);
      expect(wrapped.__namedArgsMeta__.optionalParams).toEqual(["greeting"]);
    });

    it("keeps the wrapped function's name", () => {
      expect(namedArgs(add).name).toBe("add");
    });
  });

  describe("reordering", () => {
    it("handles params in different order", () => {
      const wrapped = namedArgs(add);
      expect(wrapped.namedCall({ b: 5, a: 3 })).toBe(8);
    });

    it("reorders many params correctly", () => {
      function create(x: number, y: number, z: number, w: number) {
        return [x, y, z, w];
      }
      const wrapped = namedArgs(create);
      expect(wrapped.namedCall({ w: 4, z: 3, x: 1, y: 2 })).toEqual([1, 2, 3, 4]);
    });
  });

  describe("defaults", () => {
    it("lets the function's own default apply for missing optional params", () => {
      const wrapped = namedArgs(greet);
      expect(wrapped.namedCall({ name: "World" })).toBe("Hello, World!");
    });

    it("overrides defaults when provided", () => {
      const wrapped = namedArgs(greet);
      expect(wrapped.namedCall({ name: "World", greeting: "Hi" })).toBe("Hi, World!");
    });
  });

  describe("validation", () => {
    it("throws NamedArgsError for a missing required param", () => {
      const wrapped = namedArgs(add);
      expect(() => wrapped.namedCall({ a: 1 })).toThrow(NamedArgsError);
      expect(() => wrapped.namedCall({ a: 1 })).toThrow(/Missing required parameter 'b'/);
    });

    it("throws NamedArgsError for an unknown param", () => {
      const wrapped = namedArgs(add);
      expect(() => wrapped.namedCall({ a: 1, b: 2, z: 99 })).toThrow(
        "Unknown parameter 'z' for function 'add'. Known parameters: a, b",
      );
    });

    it("error has correct properties", () => {
      const wrapped = namedArgs(add);
      try {
        wrapped.namedCall({});
        expect.fail("should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(NamedArgsError);
        expect(err).toMatchObject({ reason: "missing_required", functionName: "add", paramName: "a" });
      }
    });
  });

  describe("explicit params", () => {
    it("names the parameters of a bound function", () => {
      const bound = add.bind(null, 100);
      const wrapped = namedArgs(bound, [{ name: "b", required: true, position: 0 }]);
      expect(wrapped.namedCall({ b: 1 })).toBe(101);
    });

    it("registers the wrapper's signature", () => {
      const wrapped = namedArgs(Math.pow, [
        { name: "base", required: true, position: 0 },
        { name: "exponent", required: true, position: 1 },
      ]);
      expect(introspect(wrapped)).toEqual({
        name: "pow",
        params: [
          { name: "base", required: true, position: 0 },
          { name: "exponent", required: true, position: 1 },
        ],
        rest: false,
        opaque: false,
      });
      expect(wrapped.namedCall({ exponent: 3, base: 2 })).toBe(8);
    });
  });

  describe("edge cases", () => {
    it("works with no params", () => {
      function noArgs() {
        return 42;
      }
      expect(namedArgs(noArgs).namedCall({})).toBe(42);
    });

    it("distinguishes undefined value from missing param", () => {
      function identity(x: unknown) {
        return x;
      }
      const wrapped = namedArgs(identity);
      expect(wrapped.namedCall({ x: undefined })).toBeUndefined();
      expect(() => wrapped.namedCall({})).toThrow(NamedArgsError);
    });
  });
});

describe("callWithNamedArgs (standalone)", () => {
  it("calls function with reordered args", () => {
    expect(callWithNamedArgs(add, addParams, { b: 10, a: 5 })).toBe(15);
  });

  it("requires destructured params by position label", () => {
    const sum = ({ a, b }: { a: number; b: number }) => a + b;
    expect(() => callWithNamedArgs(sum, introspect(sum).params, {})).toThrow(
      "Missing required parameter '#0' for function 'sum'",
    );
  });
});
