import { describe, expect, it } from "vitest";
import { numberToText, textToBoolean, textToNumber } from "./numberCodec.js";

const toNumber = (text: string): number => {
  const units = Buffer.from(text, "latin1");
  return textToNumber(units, 0, units.length);
};

const toBoolean = (text: string): boolean => {
  const units = Buffer.from(text, "latin1");
  return textToBoolean(units, 0, units.length);
};

describe("textToNumber", () => {
  it("reads integers, fractions and exponents", () => {
    expect(toNumber("123")).toBe(123);
    expect(toNumber("-1.5e3")).toBe(-1500);
    expect(toNumber("2E-2")).toBe(0.02);
    expect(toNumber(".5")).toBe(0.5);
  });

  it("stops at the first character that cannot continue the number", () => {
    expect(toNumber("12abc")).toBe(12);
    expect(toNumber("1e")).toBe(1);
    expect(toNumber("7.25.1")).toBe(7.25);
  });

  it("maps text without a numeric prefix to zero", () => {
    expect(toNumber("")).toBe(0);
    expect(toNumber("abc")).toBe(0);
    expect(toNumber("-")).toBe(0);
    expect(toNumber("null")).toBe(0);
  });

  it("reads the literal true as one", () => {
    expect(toNumber("true")).toBe(1);
    expect(toNumber("false")).toBe(0);
  });

  it("respects the range bounds", () => {
    const units = Buffer.from("[42,7]", "latin1");

    expect(textToNumber(units, 1, 3)).toBe(42);
    expect(textToNumber(units, 4, 5)).toBe(7);
  });

  it("works on wider units", () => {
    expect(textToNumber(new Uint32Array([0x2d, 0x38]), 0, 2)).toBe(-8);
  });
});

describe("textToBoolean", () => {
  it("reads the literals and falls back to the number", () => {
    expect(toBoolean("true")).toBe(true);
    expect(toBoolean("false")).toBe(false);
    expect(toBoolean("")).toBe(false);
    expect(toBoolean("0")).toBe(false);
    expect(toBoolean("2")).toBe(true);
    expect(toBoolean("-0.5")).toBe(true);
    expect(toBoolean("null")).toBe(false);
  });
});

describe("numberToText", () => {
  it("prints fixed notation without trailing zeros", () => {
    expect(numberToText(1)).toEqual({ text: "1", finite: true });
    expect(numberToText(0.5).text).toBe("0.5");
    expect(numberToText(-2.25).text).toBe("-2.25");
    expect(numberToText(1234.125).text).toBe("1234.125");
  });

  it("switches to scientific notation for very large and very small magnitudes", () => {
    expect(numberToText(1e13).text).toBe("1e+13");
    expect(numberToText(-2.5e20).text).toBe("-2.5e+20");
    expect(numberToText(1.5e-10).text).toBe("1.5e-10");
  });

  it("flushes tiny magnitudes to zero", () => {
    expect(numberToText(0).text).toBe("0");
    expect(numberToText(1e-13).text).toBe("0");
  });

  it("marks values JSON cannot carry as numbers", () => {
    expect(numberToText(Number.NaN)).toEqual({ text: "NaN", finite: false });
    expect(numberToText(Number.POSITIVE_INFINITY)).toEqual({ text: "Inf", finite: false });
    expect(numberToText(Number.NEGATIVE_INFINITY)).toEqual({ text: "-Inf", finite: false });
  });
});
