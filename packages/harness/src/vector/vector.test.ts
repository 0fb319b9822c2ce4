/**
 * Vector2 and permissive conversion tests
 */

import { inspect } from "node:util";
import { describe, it, expect } from "vitest";
import { Vector2, convertToVector, isVector2, toVectorOrValue } from "./vector.js";

describe("Vector2", () => {
  it("defaults both components to null", () => {
    const vector = new Vector2();
    expect(vector.x).toBeNull();
    expect(vector.y).toBeNull();
  });

  it("compares by value", () => {
    expect(new Vector2(1, 2).equals(new Vector2(1, 2))).toBe(true);
    expect(new Vector2(1, null).equals(new Vector2(1, null))).toBe(true);
    expect(new Vector2(1, 2).equals(new Vector2(1, null))).toBe(false);
    expect(new Vector2(1, 2).equals([1, 2])).toBe(false);
  });

  it("is frozen", () => {
    const vector = new Vector2(1, 2);
    expect(Object.isFrozen(vector)).toBe(true);
    expect(Reflect.set(vector, "x", 3)).toBe(false);
    expect(vector.x).toBe(1);
  });

  it("iterates as [x, y]", () => {
    expect([...new Vector2(1, null)]).toEqual([1, null]);
    expect(new Vector2(3, 4).toArray()).toEqual([3, 4]);
  });

  it("renders readable text", () => {
    expect(new Vector2(5, null).toString()).toBe("Vector2(5, null)");
    expect(inspect(new Vector2(800, 600))).toBe("Vector2(800, 600)");
  });
});

describe("convertToVector", () => {
  it("returns an existing vector as the same instance", () => {
    const vector = new Vector2(1, 2);
    const result = convertToVector(vector);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.vector).toBe(vector);
    }
  });

  it("broadcasts a single integer", () => {
    expect(convertToVector(7)).toEqual({ ok: true, vector: new Vector2(7, 7) });
  });

  it("broadcasts a boolean as 0 or 1", () => {
    expect(convertToVector(true)).toEqual({ ok: true, vector: new Vector2(1, 1) });
    expect(convertToVector(false)).toEqual({ ok: true, vector: new Vector2(0, 0) });
  });

  it("broadcasts null and undefined", () => {
    expect(convertToVector(null)).toEqual({ ok: true, vector: new Vector2(null, null) });
    expect(convertToVector(undefined)).toEqual({ ok: true, vector: new Vector2(null, null) });
  });

  it("takes the first two elements of an iterable", () => {
    expect(convertToVector([5, null])).toEqual({ ok: true, vector: new Vector2(5, null) });
    expect(convertToVector([1, 2, 3])).toEqual({ ok: true, vector: new Vector2(1, 2) });
    expect(convertToVector(new Set([10, 20]))).toEqual({ ok: true, vector: new Vector2(10, 20) });
  });

  it("coerces elements to integers", () => {
    expect(convertToVector(["7", " -3 "])).toEqual({ ok: true, vector: new Vector2(7, -3) });
    expect(convertToVector([1.9, true])).toEqual({ ok: true, vector: new Vector2(1, 1) });
    expect(convertToVector([undefined, "0"])).toEqual({ ok: true, vector: new Vector2(null, 0) });
  });

  it("rejects components beyond the safe integer range", () => {
    const tooLong = "9".repeat(400);
    expect(convertToVector([tooLong, 1])).toEqual({ ok: false, value: [tooLong, 1] });
    expect(convertToVector([1e300, 1])).toEqual({ ok: false, value: [1e300, 1] });
    expect(convertToVector(2 ** 53)).toEqual({ ok: false, value: 2 ** 53 });
    expect(convertToVector(["9007199254740991", 0])).toEqual({
      ok: true,
      vector: new Vector2(9007199254740991, 0),
    });
  });

  it("iterates strings by character", () => {
    expect(convertToVector("12")).toEqual({ ok: true, vector: new Vector2(1, 2) });
  });

  it("hands back the input unchanged when it can't convert", () => {
    expect(convertToVector("not-a-pair-object")).toEqual({ ok: false, value: "not-a-pair-object" });
    expect(convertToVector([1])).toEqual({ ok: false, value: [1] });
    expect(convertToVector(3.5)).toEqual({ ok: false, value: 3.5 });
    expect(convertToVector([Number.NaN, 1])).toEqual({ ok: false, value: [Number.NaN, 1] });
    expect(convertToVector([{}, 1])).toEqual({ ok: false, value: [{}, 1] });
  });

  it("does not throw when iteration fails", () => {
    function* broken(): Generator<number> {
      yield 1;
      throw new Error("boom");
    }
    const input = broken();
    const result = convertToVector(input);
    expect(result).toEqual({ ok: false, value: input });
  });
});

describe("toVectorOrValue", () => {
  it("unwraps both outcomes", () => {
    const input = { width: 1 };
    expect(toVectorOrValue(input)).toBe(input);
    expect(toVectorOrValue([2, 3])).toEqual(new Vector2(2, 3));
  });

  it("pairs with isVector2", () => {
    expect(isVector2(toVectorOrValue(4))).toBe(true);
    expect(isVector2(toVectorOrValue("abc"))).toBe(false);
  });
});
