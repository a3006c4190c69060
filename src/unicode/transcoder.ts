import { Encoding, encodingWidth, isSwapped } from "./encoding.js";
import { UTF8_LENGTHS } from "./tables.js";
import {
  allocateUnits,
  createUnitSource,
  createUnitView,
  type UnitArray,
  type UnitSource,
  type UnitWidth,
} from "./units.js";

export const MAX_CODE_POINT = 0x10ffff;
export const REPLACEMENT_CHARACTER = 0xfffd;

export type TranscodeFail = (message: string, index: number) => never;

/**
 * Decodes one code point at a time from a {@link UnitSource}. `decode`
 * returns -1 on malformed input and leaves the reason in `error`; on success
 * `length` holds the number of units consumed.
 */
export interface CodePointDecoder {
  length: number;
  error: string;
  decode(source: UnitSource, index: number, end: number): number;
}

/**
 * Encodes a code point into `out` at `position` and returns the number of
 * units it takes. With a null `out` nothing is written, so the same call
 * measures. Returns 0 for a code point the target cannot represent.
 */
export interface UnitEncoder {
  readonly width: UnitWidth;
  encode(codePoint: number, out: UnitArray | null, position: number): number;
}

class Utf8Decoder implements CodePointDecoder {
  length = 0;
  error = "";

  decode(source: UnitSource, index: number, end: number): number {
    const lead = source.at(index);
    const length = UTF8_LENGTHS[lead >> 2] ?? 0;
    if (length === 0 || index + length > end) {
      return this.fail();
    }
    if (length === 1) {
      this.length = 1;
      return lead;
    }

    let codePoint = lead & (0xff >> (length + 1));
    for (let offset = 1; offset < length; offset += 1) {
      const unit = source.at(index + offset);
      if ((unit & 0xc0) !== 0x80) {
        return this.fail();
      }
      codePoint = (codePoint << 6) | (unit & 0x3f);
    }
    this.length = length;
    return codePoint;
  }

  private fail(): number {
    this.error = "Invalid UTF-8 sequence";
    return -1;
  }
}

class Utf16Decoder implements CodePointDecoder {
  length = 0;
  error = "";

  decode(source: UnitSource, index: number, end: number): number {
    const unit = source.at(index);
    if (unit < 0xd800 || unit > 0xdfff) {
      this.length = 1;
      return unit;
    }
    if (unit >= 0xdc00) {
      this.error = "Invalid UTF-16 character";
      return -1;
    }
    const low = index + 1 < end ? source.at(index + 1) : 0;
    if (low < 0xdc00 || low > 0xdfff) {
      this.error = "Invalid UTF-16 surrogate pair";
      return -1;
    }
    this.length = 2;
    return combineSurrogates(unit, low);
  }
}

class Utf32Decoder implements CodePointDecoder {
  length = 1;
  error = "";

  decode(source: UnitSource, index: number): number {
    return source.at(index);
  }
}

export const combineSurrogates = (high: number, low: number): number =>
  0x10000 + ((high - 0xd800) << 10) + (low - 0xdc00);

export const createDecoder = (width: UnitWidth): CodePointDecoder => {
  switch (width) {
    case 1:
      return new Utf8Decoder();
    case 2:
      return new Utf16Decoder();
    case 4:
      return new Utf32Decoder();
  }
};

const utf8Encoder: UnitEncoder = {
  width: 1,
  encode(codePoint, out, position) {
    if (codePoint < 0x80) {
      if (out) {
        out[position] = codePoint;
      }
      return 1;
    }
    if (codePoint < 0x800) {
      if (out) {
        out[position] = 0xc0 | (codePoint >> 6);
        out[position + 1] = 0x80 | (codePoint & 0x3f);
      }
      return 2;
    }
    if (codePoint < 0x10000) {
      if (out) {
        out[position] = 0xe0 | (codePoint >> 12);
        out[position + 1] = 0x80 | ((codePoint >> 6) & 0x3f);
        out[position + 2] = 0x80 | (codePoint & 0x3f);
      }
      return 3;
    }
    if (codePoint > MAX_CODE_POINT) {
      return 0;
    }
    if (out) {
      out[position] = 0xf0 | (codePoint >> 18);
      out[position + 1] = 0x80 | ((codePoint >> 12) & 0x3f);
      out[position + 2] = 0x80 | ((codePoint >> 6) & 0x3f);
      out[position + 3] = 0x80 | (codePoint & 0x3f);
    }
    return 4;
  },
};

const utf16Encoder: UnitEncoder = {
  width: 2,
  encode(codePoint, out, position) {
    if (codePoint < 0x10000) {
      if (out) {
        out[position] = codePoint;
      }
      return 1;
    }
    if (codePoint > MAX_CODE_POINT) {
      return 0;
    }
    if (out) {
      const offset = codePoint - 0x10000;
      out[position] = 0xd800 | (offset >> 10);
      out[position + 1] = 0xdc00 | (offset & 0x3ff);
    }
    return 2;
  },
};

const utf32Encoder: UnitEncoder = {
  width: 4,
  encode(codePoint, out, position) {
    if (out) {
      out[position] = codePoint;
    }
    return 1;
  },
};

export const createEncoder = (width: UnitWidth): UnitEncoder => {
  switch (width) {
    case 1:
      return utf8Encoder;
    case 2:
      return utf16Encoder;
    case 4:
      return utf32Encoder;
  }
};

/**
 * Converts `source[start, end)` into `encoder`'s width, writing at
 * `outPosition` (or only counting when `out` is null), and returns the number
 * of units produced. Measuring and converting share this one traversal.
 */
export const transcodeUnits = (
  source: UnitSource,
  start: number,
  end: number,
  encoder: UnitEncoder,
  out: UnitArray | null,
  outPosition: number,
  fail: TranscodeFail
): number => {
  const decoder = createDecoder(source.width);
  const verbatim = source.width === encoder.width && !source.swapped;
  let written = 0;
  let index = start;

  while (index < end) {
    const unit = source.at(index);
    if (unit < 0x80) {
      if (out) {
        out[outPosition + written] = unit;
      }
      written += 1;
      index += 1;
      continue;
    }

    const codePoint = decoder.decode(source, index, end);
    if (codePoint < 0) {
      fail(decoder.error, index);
    }

    if (verbatim) {
      // Validated above; copy the units as they are.
      for (let offset = 0; offset < decoder.length; offset += 1) {
        if (out) {
          out[outPosition + written] = source.at(index + offset);
        }
        written += 1;
      }
    } else {
      const count = encoder.encode(codePoint, out, outPosition + written);
      if (count === 0) {
        fail("Invalid Unicode code point", index);
      }
      written += count;
    }
    index += decoder.length;
  }

  return written;
};

const rejectTranscode: TranscodeFail = (message, index) => {
  throw new RangeError(`${message} at unit ${index}`);
};

const sourceForBytes = (bytes: Uint8Array, encoding: Encoding): UnitSource => {
  const width = encodingWidth(encoding);
  const length = Math.floor(bytes.byteLength / width);
  let view: Uint8Array = bytes;
  if (bytes.byteOffset % width !== 0) {
    view = bytes.slice();
  }
  return createUnitSource(width, createUnitView(width, view.buffer, view.byteOffset, length), isSwapped(encoding));
};

/** Number of `width` units the text in `bytes` occupies once transcoded. */
export const measureTranscoded = (bytes: Uint8Array, encoding: Encoding, width: UnitWidth): number => {
  const source = sourceForBytes(bytes, encoding);
  return transcodeUnits(source, 0, source.units.length, createEncoder(width), null, 0, rejectTranscode);
};

/** Converts encoded text into host-order units of `width`. Throws RangeError on malformed input. */
export const transcode = (bytes: Uint8Array, encoding: Encoding, width: UnitWidth): UnitArray => {
  const source = sourceForBytes(bytes, encoding);
  const encoder = createEncoder(width);
  const length = transcodeUnits(source, 0, source.units.length, encoder, null, 0, rejectTranscode);
  const out = allocateUnits(width, length);
  transcodeUnits(source, 0, source.units.length, encoder, out, 0, rejectTranscode);
  return out;
};

export const transcodeToUtf8 = (bytes: Uint8Array, encoding: Encoding): Uint8Array => {
  const source = sourceForBytes(bytes, encoding);
  const length = transcodeUnits(source, 0, source.units.length, utf8Encoder, null, 0, rejectTranscode);
  const out = new Uint8Array(length);
  transcodeUnits(source, 0, source.units.length, utf8Encoder, out, 0, rejectTranscode);
  return out;
};

/** Bytes of `units` laid out in `encoding`'s byte order. */
export const unitsToBytes = (units: UnitArray, swapped: boolean): Uint8Array => {
  const bytes = new Uint8Array(units.buffer, units.byteOffset, units.byteLength).slice();
  if (swapped && units.BYTES_PER_ELEMENT > 1) {
    const width = units.BYTES_PER_ELEMENT;
    for (let offset = 0; offset < bytes.length; offset += width) {
      bytes.subarray(offset, offset + width).reverse();
    }
  }
  return bytes;
};

const CHUNK = 8192;

/**
 * Decodes host-order units into a JS string. Malformed sequences become
 * U+FFFD, one unit at a time.
 */
export const unitsToString = (units: UnitArray, start: number, end: number): string => {
  if (units.BYTES_PER_ELEMENT === 1) {
    return Buffer.from(units.buffer, units.byteOffset + start, end - start).toString("utf8");
  }
  const codes: number[] = [];
  let result = "";
  for (let index = start; index < end; index += 1) {
    let unit = units[index] ?? 0;
    if (units.BYTES_PER_ELEMENT === 4) {
      if (unit > MAX_CODE_POINT || (unit >= 0xd800 && unit <= 0xdfff)) {
        unit = REPLACEMENT_CHARACTER;
      }
      if (unit >= 0x10000) {
        const offset = unit - 0x10000;
        codes.push(0xd800 | (offset >> 10));
        unit = 0xdc00 | (offset & 0x3ff);
      }
    }
    codes.push(unit);
    if (codes.length >= CHUNK) {
      result += String.fromCharCode(...codes);
      codes.length = 0;
    }
  }
  return result + String.fromCharCode(...codes);
};

/** Encodes a JS string into host-order units of `width`. Lone surrogates become U+FFFD. */
export const stringToUnits = (text: string, width: UnitWidth): UnitArray => {
  if (width === 1) {
    return new Uint8Array(Buffer.from(text, "utf8"));
  }
  const encoder = createEncoder(width);
  const codePoints: number[] = [];
  let length = 0;
  for (const character of text) {
    let codePoint = character.codePointAt(0) ?? REPLACEMENT_CHARACTER;
    if (codePoint >= 0xd800 && codePoint <= 0xdfff) {
      codePoint = REPLACEMENT_CHARACTER;
    }
    codePoints.push(codePoint);
    length += encoder.encode(codePoint, null, 0);
  }
  const out = allocateUnits(width, length);
  let position = 0;
  for (const codePoint of codePoints) {
    position += encoder.encode(codePoint, out, position);
  }
  return out;
};
