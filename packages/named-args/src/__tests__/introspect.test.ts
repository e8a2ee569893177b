import { describe, it, expect } from "vitest";
import { introspect, registerSignature, opaqueSignature } from "../index.js";

describe("introspect", () => {
  describe("readable sources", () => {
    it("reads a function declaration", () => {
      function add(a: number, b: number): number {
        return a + b;
      }
      expect(introspect(add)).toEqual({
        name: "add",
        params: [
          { name: "a", required: true, position: 0 },
          { name: "b", required: true, position: 1 },
        ],
        rest: false,
        opaque: false,
      });
    });

    it("reads an arrow function without parentheses", () => {
      const double = (x: number) => x * 2;
      const sig = introspect(double);
      expect(sig.params.map((p) => p.name)).toEqual(["x"]);
      expect(sig.name).toBe("double");
    });

    it("marks parameters with defaults as optional", () => {
      const scale = (value: number, factor = 2) => value * factor;
      expect(introspect(scale).params).toEqual([
        { name: "value", required: true, position: 0 },
        { name: "factor", required: false, position: 1 },
      ]);
    });

    it("detects a rest parameter", () => {
      const plus = (x: number, y: number, ...rest: unknown[]) => x + y + rest.length;
      const sig = introspect(plus);
      expect(sig.rest).toBe(true);
      expect(sig.params.map((p) => p.name)).toEqual(["x", "y"]);
    });

    it("leaves destructured parameters unnamed", () => {
      const pick = ({ a }: { a: number }, [b]: number[]) => a + b;
      expect(introspect(pick).params).toEqual([
        { name: null, required: true, position: 0 },
        { name: null, required: true, position: 1 },
      ]);
    });

    it("reads method shorthand", () => {
      const ops = {
        scale(value: number, factor: number) {
          return value * factor;
        },
      };
      const sig = introspect(ops.scale);
      expect(sig.opaque).toBe(false);
      expect(sig.params.map((p) => p.name)).toEqual(["value", "factor"]);
    });

    it("reads async functions", () => {
      const load = async (id: string, retries: number) => `${id}:${retries}`;
      expect(introspect(load).params.map((p) => p.name)).toEqual(["id", "retries"]);
    });

    it("reads an anonymous function expression", () => {
      const sig = introspect(
        [function (left: number, right: number) {
          return left - right;
        }][0],
      );
      expect(sig.name).toBe("<anonymous>");
      expect(sig.params.map((p) => p.name)).toEqual(["left", "right"]);
    });
  });

  describe("unreadable sources", () => {
    it("treats native functions as opaque", () => {
      expect(introspect(Math.max)).toEqual({
        name: "max",
        params: [],
        rest: true,
        opaque: true,
      });
    });

    it("treats bound functions as opaque", () => {
      function add(a: number, b: number): number {
        return a + b;
      }
      expect(introspect(add.bind(null)).opaque).toBe(true);
    });
  });

  describe("cache and registry", () => {
    it("returns the same signature object on repeated calls", () => {
      const f = (a: number) => a;
      expect(introspect(f)).toBe(introspect(f));
    });

    it("registerSignature overrides what the source says", () => {
      const bound = Math.min.bind(null);
      registerSignature(bound, {
        name: "min",
        params: [{ name: "low", required: true, position: 0 }],
        rest: true,
        opaque: false,
      });
      expect(introspect(bound).params[0].name).toBe("low");
    });
  });
});

describe("opaqueSignature", () => {
  it("accepts anything", () => {
    expect(opaqueSignature("f")).toEqual({ name: "f", params: [], rest: true, opaque: true });
  });
});
