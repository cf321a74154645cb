import { describe, expect, it } from "vitest";

import {
  NULL_VALUE,
  boolValue,
  formatValue,
  listValue,
  mapValue,
  numberValue,
  stringValue,
  toPlainJson,
  valuesEqual,
} from "./canonical.js";

describe("valuesEqual", () => {
  it("distinguishes kinds even when the text matches", () => {
    expect(valuesEqual(stringValue("20"), numberValue(20))).toBe(false);
    expect(valuesEqual(stringValue("true"), boolValue(true))).toBe(false);
    expect(valuesEqual(NULL_VALUE, stringValue("null"))).toBe(false);
  });

  it("compares numbers by normalized value", () => {
    expect(valuesEqual(numberValue("1.0"), numberValue(1))).toBe(true);
  });

  it("ignores map key order", () => {
    const left = mapValue([
      ["a", numberValue(1)],
      ["b", numberValue(2)],
    ]);
    const right = mapValue([
      ["b", numberValue(2)],
      ["a", numberValue(1)],
    ]);
    expect(valuesEqual(left, right)).toBe(true);
  });

  it("compares lists positionally", () => {
    const left = listValue([stringValue("x"), stringValue("y")]);
    const right = listValue([stringValue("y"), stringValue("x")]);
    expect(valuesEqual(left, right)).toBe(false);
  });
});

describe("numberValue", () => {
  it("rejects text that is not a decimal", () => {
    expect(() => numberValue("twelve")).toThrow("Not a decimal number: twelve");
  });
});

describe("formatValue", () => {
  it("prints scalars unquoted and containers as JSON", () => {
    expect(formatValue(stringValue("prod"))).toBe("prod");
    expect(formatValue(boolValue(false))).toBe("false");
    expect(formatValue(NULL_VALUE)).toBe("null");
    expect(formatValue(mapValue([["port", numberValue(80)]]))).toBe('{"port":80}');
    expect(formatValue(listValue([]))).toBe("[]");
  });
});

describe("toPlainJson", () => {
  it("keeps numbers that do not fit a JS number as text", () => {
    expect(toPlainJson(numberValue("12345678901234567890"))).toBe("12345678901234567890");
    expect(toPlainJson(numberValue("2.5"))).toBe(2.5);
  });

  it("tags NaN and the infinities so they differ from strings", () => {
    expect(toPlainJson(numberValue("NaN"))).toEqual({ $number: "NaN" });
    expect(toPlainJson(numberValue("-Infinity"))).toEqual({ $number: "-Infinity" });
    expect(toPlainJson(stringValue("NaN"))).toBe("NaN");
    expect(formatValue(listValue([numberValue("Infinity"), stringValue("Infinity")]))).toBe(
      '[{"$number":"Infinity"},"Infinity"]',
    );
  });

  it("keeps a __proto__ key as an own property", () => {
    const plain = toPlainJson(mapValue([["__proto__", stringValue("x")]]));
    expect(Object.keys(plain ?? {})).toEqual(["__proto__"]);
  });
});
