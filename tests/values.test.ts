import { describe, it, expect } from "vitest";
import { asString, coerceNumberForGlobal, numericValue, truthy } from "../src/runtime/coerce";
import { looseEqual, sameValueZero, strictEqual } from "../src/runtime/equality";
import { formatConsoleArgs, inspect } from "../src/runtime/inspect";
import { arr, big, bool, errorObject, float, nul, num, obj, str, undef } from "../src/runtime/value";

describe("num", () => {
  it("keeps safe integers as Number", () => {
    expect(num(3)).toEqual({ kind: "Number", value: 3 });
    expect(num(1.5)).toEqual({ kind: "Float", value: 1.5 });
    expect(num(-0)).toEqual({ kind: "Float", value: -0 });
    expect(num(2 ** 60)).toEqual({ kind: "Float", value: 2 ** 60 });
  });
});

describe("coercion", () => {
  it("decides truthiness", () => {
    expect([str(""), num(0), float(NaN), big(0n), nul(), undef()].map(truthy)).toEqual([
      false,
      false,
      false,
      false,
      false,
      false,
    ]);
    expect([str("0"), arr(), obj(), bool(true)].map(truthy)).toEqual([true, true, true, true]);
  });

  it("converts values to strings", () => {
    expect(asString(arr([num(1), nul(), str("a")]))).toBe("1,,a");
    expect(asString(obj())).toBe("[object Object]");
    expect(asString(errorObject("TypeError", "bad"))).toBe("TypeError: bad");
    expect(asString(float(-0))).toBe("0");
    expect(asString(big(12n))).toBe("12");
  });

  it("reads numbers for arithmetic", () => {
    expect(numericValue(str("12.5"))).toBe(12.5);
    expect(numericValue(str("abc"))).toBe(0);
    expect(numericValue(nul())).toBe(0);
    expect(numericValue(undef())).toBeNaN();
  });

  it("reads numbers the way Number() does", () => {
    expect(coerceNumberForGlobal(str(" 0x1F "))).toBe(31);
    expect(coerceNumberForGlobal(str(""))).toBe(0);
    expect(coerceNumberForGlobal(str("abc"))).toBeNaN();
    expect(coerceNumberForGlobal(bool(true))).toBe(1);
    expect(coerceNumberForGlobal(arr([num(7)]))).toBe(7);
  });
});

describe("equality", () => {
  it("compares strictly", () => {
    const a = arr();
    expect(strictEqual(num(1), float(1))).toBe(true);
    expect(strictEqual(str("a"), str("a"))).toBe(true);
    expect(strictEqual(arr(), arr())).toBe(false);
    expect(strictEqual(a, a)).toBe(true);
    expect(strictEqual(nul(), undef())).toBe(false);
  });

  it("compares loosely", () => {
    expect(looseEqual(nul(), undef())).toBe(true);
    expect(looseEqual(num(1), str("1"))).toBe(true);
    expect(looseEqual(bool(true), num(1))).toBe(true);
    expect(looseEqual(big(2n), str("2"))).toBe(true);
    expect(looseEqual(arr([num(1), num(2)]), str("1,2"))).toBe(true);
    expect(looseEqual(nul(), num(0))).toBe(false);
  });

  it("compares bigints with numbers exactly", () => {
    expect(looseEqual(big(2n), num(2))).toBe(true);
    expect(looseEqual(float(2.5), big(2n))).toBe(false);
    expect(looseEqual(big(9007199254740993n), float(9007199254740992))).toBe(false);
    expect(looseEqual(float(9007199254740992), big(9007199254740992n))).toBe(true);
    expect(looseEqual(big(1n), float(Infinity))).toBe(false);
  });

  it("treats NaN as equal to itself under SameValueZero", () => {
    expect(sameValueZero(float(NaN), float(NaN))).toBe(true);
    expect(strictEqual(float(NaN), float(NaN))).toBe(false);
  });
});

describe("inspect", () => {
  it("quotes nested strings only", () => {
    expect(inspect(str("it's"))).toBe("it's");
    expect(inspect(arr([str("it's")]))).toBe("[ 'it\\'s' ]");
  });

  it("formats object keys and empty containers", () => {
    expect(inspect(obj([["a-b", num(1)], ["c", arr()]]))).toBe("{ 'a-b': 1, c: [] }");
    expect(inspect(obj())).toBe("{}");
  });

  it("marks cycles", () => {
    const a = arr();
    a.elements.push(a);
    expect(inspect(a)).toBe("[ [Circular] ]");
  });

  it("prints numbers, bigints and errors", () => {
    expect(inspect(float(-0))).toBe("-0");
    expect(inspect(big(5n))).toBe("5n");
    expect(inspect(errorObject("TypeError", "bad"))).toBe("TypeError: bad");
  });

  it("joins console arguments with spaces", () => {
    expect(formatConsoleArgs([str("a"), num(1), arr([str("b")])])).toBe("a 1 [ 'b' ]");
  });
});
