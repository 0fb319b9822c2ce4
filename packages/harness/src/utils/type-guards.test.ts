/**
 * Type guard and formatting tests
 */

import { describe, it, expect } from "vitest";
import { Vector2 } from "../vector/vector.js";
import { describeType, formatValue } from "./format.js";
import { isInteger, isIterable, isRecord } from "./type-guards.js";

describe("isIterable", () => {
  it("accepts strings, collections and iterable objects", () => {
    expect(isIterable("ab")).toBe(true);
    expect(isIterable([1, 2])).toBe(true);
    expect(isIterable(new Map())).toBe(true);
    expect(isIterable(new Vector2(1, 2))).toBe(true);
  });

  it("rejects everything else", () => {
    expect(isIterable(null)).toBe(false);
    expect(isIterable(12)).toBe(false);
    expect(isIterable({ length: 2 })).toBe(false);
  });
});

describe("isInteger", () => {
  it("accepts integer numbers only", () => {
    expect(isInteger(3)).toBe(true);
    expect(isInteger(-0)).toBe(true);
    expect(isInteger(3.5)).toBe(false);
    expect(isInteger("3")).toBe(false);
  });
});

describe("isRecord", () => {
  it("excludes arrays and null", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });
});

describe("format helpers", () => {
  it("describe runtime types", () => {
    expect(describeType(null)).toBe("null");
    expect(describeType(undefined)).toBe("undefined");
    expect(describeType([])).toBe("Array");
    expect(describeType(new Vector2())).toBe("Vector2");
    expect(describeType(Object.create(null))).toBe("Object");
  });

  it("format values for messages", () => {
    expect(formatValue("abc")).toBe("'abc'");
    expect(formatValue([1, null])).toBe("[ 1, null ]");
    expect(formatValue(new Vector2(1, 2))).toBe("Vector2(1, 2)");
  });
});
