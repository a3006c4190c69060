const buildUtf8Lengths = (): Uint8Array => {
  const table = new Uint8Array(64);
  // Keyed by lead byte >> 2.
  const ranges: Array<[from: number, to: number, length: number]> = [
    [0x00, 0x7f, 1],
    [0xc0, 0xdf, 2],
    [0xe0, 0xef, 3],
    [0xf0, 0xf7, 4],
  ];
  for (const [from, to, length] of ranges) {
    for (let lead = from; lead <= to; lead += 4) {
      table[lead >> 2] = length;
    }
  }
  return table;
};

export const UTF8_LENGTHS = buildUtf8Lengths();

export const HEX_DIGITS = "0123456789abcdef";

export const hexValue = (unit: number): number => {
  if (unit >= 0x30 && unit <= 0x39) {
    return unit - 0x30;
  }
  if (unit >= 0x61 && unit <= 0x66) {
    return unit - 0x61 + 10;
  }
  if (unit >= 0x41 && unit <= 0x46) {
    return unit - 0x41 + 10;
  }
  return -1;
};

export const isWhitespace = (unit: number): boolean =>
  unit === 0x20 || unit === 0x09 || unit === 0x0a || unit === 0x0d;

export const isDigit = (unit: number): boolean => unit >= 0x30 && unit <= 0x39;
