import { endianness } from "node:os";
import type { UnitWidth } from "./units.js";

/** Input encodings. "Swapped" means the opposite of the host's byte order. */
export enum Encoding {
  Utf8 = "utf8",
  Utf16 = "utf16",
  Utf16Swapped = "utf16-swapped",
  Utf32 = "utf32",
  Utf32Swapped = "utf32-swapped",
}

export const HOST_LITTLE_ENDIAN = endianness() === "LE";

export const encodingWidth = (encoding: Encoding): UnitWidth => {
  switch (encoding) {
    case Encoding.Utf8:
      return 1;
    case Encoding.Utf16:
    case Encoding.Utf16Swapped:
      return 2;
    case Encoding.Utf32:
    case Encoding.Utf32Swapped:
      return 4;
  }
};

export const isSwapped = (encoding: Encoding): boolean =>
  encoding === Encoding.Utf16Swapped || encoding === Encoding.Utf32Swapped;

export const nativeEncoding = (width: UnitWidth): Encoding =>
  width === 1 ? Encoding.Utf8 : width === 2 ? Encoding.Utf16 : Encoding.Utf32;

const orderedEncoding = (native: Encoding, swapped: Encoding, littleEndian: boolean): Encoding =>
  littleEndian === HOST_LITTLE_ENDIAN ? native : swapped;

/**
 * Maps a user-facing name ("utf8", "utf16le", "utf32be", ...) to an
 * {@link Encoding}. Names without a byte order mean host order.
 */
export const resolveEncoding = (name: string): Encoding | undefined => {
  switch (name.toLowerCase().replace(/-/g, "")) {
    case "utf8":
      return Encoding.Utf8;
    case "utf16":
      return Encoding.Utf16;
    case "utf16le":
      return orderedEncoding(Encoding.Utf16, Encoding.Utf16Swapped, true);
    case "utf16be":
      return orderedEncoding(Encoding.Utf16, Encoding.Utf16Swapped, false);
    case "utf32":
      return Encoding.Utf32;
    case "utf32le":
      return orderedEncoding(Encoding.Utf32, Encoding.Utf32Swapped, true);
    case "utf32be":
      return orderedEncoding(Encoding.Utf32, Encoding.Utf32Swapped, false);
    default:
      return undefined;
  }
};

/**
 * Guesses the encoding from the first four bytes, reading them in host order.
 * Returns `undefined` when the first 32-bit unit is zero.
 */
export const detectEncoding = (
  bytes: Uint8Array,
  byteLength: number = bytes.byteLength
): Encoding | undefined => {
  if (byteLength % 4 !== 0 && byteLength % 4 !== 2) {
    return Encoding.Utf8;
  }

  const head = new Uint8Array(4);
  head.set(bytes.subarray(0, Math.min(4, byteLength)));
  if (head[0] !== 0 && head[1] !== 0) {
    return Encoding.Utf8;
  }

  const view = new DataView(head.buffer);
  const first16 = view.getUint16(0, HOST_LITTLE_ENDIAN);
  const second16 = view.getUint16(2, HOST_LITTLE_ENDIAN);
  if (first16 !== 0 && second16 !== 0) {
    return first16 < 256 ? Encoding.Utf16 : Encoding.Utf16Swapped;
  }

  const first32 = view.getUint32(0, HOST_LITTLE_ENDIAN);
  if (first32 === 0) {
    return undefined;
  }
  return first32 < 256 ? Encoding.Utf32 : Encoding.Utf32Swapped;
};
