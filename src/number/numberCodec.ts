import { isDigit } from "../unicode/tables.js";

type Units = ArrayLike<number>;

const TRUE_UNITS = [0x74, 0x72, 0x75, 0x65];
const FALSE_UNITS = [0x66, 0x61, 0x6c, 0x73, 0x65];

const matches = (units: Units, start: number, end: number, literal: number[]): boolean => {
  if (end - start !== literal.length) {
    return false;
  }
  for (let index = 0; index < literal.length; index += 1) {
    if (units[start + index] !== literal[index]) {
      return false;
    }
  }
  return true;
};

/**
 * Reads the longest numeric prefix of `units[start, end)`: optional `-`,
 * digits, optional fraction and exponent. Anything after the prefix is
 * ignored. An empty range is 0 and the literal `true` is 1.
 */
export const textToNumber = (units: Units, start: number, end: number): number => {
  if (matches(units, start, end, TRUE_UNITS)) {
    return 1;
  }

  const at = (index: number): number => (index < end ? units[index] ?? 0 : 0);
  let index = start;
  let accepted = start;
  let text = "";

  if (at(index) === 0x2d) {
    index += 1;
  }
  while (isDigit(at(index))) {
    index += 1;
    accepted = index;
  }
  if (at(index) === 0x2e) {
    index += 1;
    while (isDigit(at(index))) {
      index += 1;
      accepted = index;
    }
  }
  if (accepted > start && (at(index) === 0x65 || at(index) === 0x45)) {
    index += 1;
    if (at(index) === 0x2b || at(index) === 0x2d) {
      index += 1;
    }
    while (isDigit(at(index))) {
      index += 1;
      accepted = index;
    }
  }

  for (let position = start; position < accepted; position += 1) {
    text += String.fromCharCode(units[position] ?? 0);
  }
  const value = text.length > 0 ? Number(text) : 0;
  return Number.isNaN(value) ? 0 : value;
};

export const textToBoolean = (units: Units, start: number, end: number): boolean => {
  if (start === end) {
    return false;
  }
  if (matches(units, start, end, TRUE_UNITS)) {
    return true;
  }
  if (matches(units, start, end, FALSE_UNITS)) {
    return false;
  }
  return textToNumber(units, start, end) !== 0;
};

export type NumberText = {
  text: string;
  /** False for NaN and the infinities, which JSON can only carry as strings. */
  finite: boolean;
};

const stripFraction = (digits: string): string => {
  if (!digits.includes(".")) {
    return digits;
  }
  return digits.replace(/0+$/, "").replace(/\.$/, "");
};

// Matches printf %.12g where it switches to scientific notation.
const toGeneral12 = (value: number): string => {
  const [mantissa = "0", exponent = "+0"] = value.toExponential(11).split("e");
  const sign = exponent.startsWith("-") ? "-" : "+";
  const magnitude = exponent.replace(/^[+-]/, "").padStart(2, "0");
  return `${stripFraction(mantissa)}e${sign}${magnitude}`;
};

export const numberToText = (value: number): NumberText => {
  if (Number.isNaN(value)) {
    return { text: "NaN", finite: false };
  }
  if (!Number.isFinite(value)) {
    return { text: value > 0 ? "Inf" : "-Inf", finite: false };
  }

  const magnitude = Math.abs(value);
  if (magnitude < 1e-12) {
    return { text: "0", finite: true };
  }
  if (magnitude < 1e-9 || magnitude > 1e12) {
    return { text: toGeneral12(value), finite: true };
  }
  return { text: stripFraction(value.toFixed(12)), finite: true };
};
