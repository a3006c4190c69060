import { NONE, type ValueStore } from "../tree/store.js";
import { hexValue } from "../unicode/tables.js";
import {
  combineSurrogates,
  createDecoder,
  type CodePointDecoder,
  type UnitEncoder,
} from "../unicode/transcoder.js";
import type { UnitArray, UnitSource } from "../unicode/units.js";
import type { ParseMode } from "./flags.js";

/** Fails at a unit index of the input. */
export type UnitFail = (message: string, index: number) => never;

export type CaptureContext = {
  store: ValueStore;
  source: UnitSource;
  end: number;
  encoder: UnitEncoder;
  mode: ParseMode;
  /** Document-width view over the input bytes; null when the tree is wider than the input. */
  inPlace: { units: UnitArray; buffer: number } | null;
  fail: UnitFail;
};

const SIMPLE_ESCAPES = new Map<number, number>([
  [0x22, 0x22],
  [0x5c, 0x5c],
  [0x2f, 0x2f],
  [0x62, 0x08],
  [0x66, 0x0c],
  [0x6e, 0x0a],
  [0x72, 0x0d],
  [0x74, 0x09],
]);

/**
 * Unescapes and transcodes the body of a string literal. With a null `out`
 * it only measures and validates; both passes run the same code.
 */
export class StringTranslator {
  /** Index of the closing quote after {@link run}. */
  close = 0;
  escaped = false;

  private readonly decoder: CodePointDecoder;

  constructor(private readonly context: CaptureContext) {
    this.decoder = createDecoder(context.source.width);
  }

  run(begin: number, out: UnitArray | null, outPosition: number): number {
    const { source, end, encoder, fail } = this.context;
    let index = begin;
    let written = 0;
    this.escaped = false;

    for (;;) {
      const unit = source.at(index);
      if (unit === 0x22) {
        this.close = index;
        return written;
      }
      if (unit === 0 || index >= end) {
        fail("Expected end-of-string '\"'", index);
      }

      if (unit === 0x5c) {
        this.escaped = true;
        const escape = source.at(index + 1);
        const simple = SIMPLE_ESCAPES.get(escape);
        if (simple !== undefined) {
          if (out) {
            out[outPosition + written] = simple;
          }
          written += 1;
          index += 2;
          continue;
        }
        if (escape !== 0x75) {
          fail("Invalid escaped character", index + 1);
        }
        const [codePoint, length] = this.readUnicodeEscape(index);
        written += encoder.encode(codePoint, out, outPosition + written);
        index += length;
        continue;
      }

      if (unit < 0x80) {
        if (out) {
          out[outPosition + written] = unit;
        }
        written += 1;
        index += 1;
        continue;
      }

      const codePoint = this.decoder.decode(source, index, end);
      if (codePoint < 0) {
        fail(this.decoder.error, index);
      }
      const count = encoder.encode(codePoint, out, outPosition + written);
      if (count === 0) {
        fail("Invalid Unicode code point", index);
      }
      written += count;
      index += this.decoder.length;
    }
  }

  private readUnicodeEscape(index: number): [codePoint: number, length: number] {
    const { end, fail } = this.context;
    if (end - index < 6) {
      fail("Invalid \\u escape sequence", index);
    }
    const high = this.readHex(index + 2);
    if (high >= 0xdc00 && high <= 0xdfff) {
      fail("Invalid UTF-16 surrogate pair", index);
    }
    if (high < 0xd800 || high > 0xdbff) {
      return [high, 6];
    }

    const second = index + 6;
    if (end - second < 6) {
      fail("Expected UTF-16 surrogate pair", second);
    }
    const { source } = this.context;
    if (source.at(second) !== 0x5c || source.at(second + 1) !== 0x75) {
      fail("Expected \\uXXXX", second);
    }
    const low = this.readHex(second + 2);
    if (low < 0xdc00 || low > 0xdfff) {
      fail("Expected UTF-16 surrogate pair", second);
    }
    return [combineSurrogates(high, low), 12];
  }

  private readHex(index: number): number {
    const { source, fail } = this.context;
    let value = 0;
    for (let offset = 0; offset < 4; offset += 1) {
      const digit = hexValue(source.at(index + offset));
      if (digit < 0) {
        fail("Expected hex character (0-9, a-f, A-F)", index + offset);
      }
      value = (value << 4) | digit;
    }
    return value;
  }
}

/** Where the last capture landed. */
export type CapturedSpan = {
  buffer: number;
  start: number;
  end: number;
};

export interface StringCapture {
  /** Captures the literal opening at `open` and returns the index after its closing quote. */
  capture(open: number, span: CapturedSpan): number;
}

export interface NumberCapture {
  /**
   * Captures the number text `[start, end)`. Returns the document-view
   * position that still needs a terminator once the following separator is
   * consumed, or {@link NONE}.
   */
  capture(start: number, end: number, span: CapturedSpan): number;
}

const sameLayout = (context: CaptureContext): boolean =>
  context.source.width === context.encoder.width && !context.source.swapped;

const toDocPosition = (context: CaptureContext, index: number): number =>
  (index * context.source.width) / context.encoder.width;

/** Translates strings inside the input buffer, writing over consumed text. */
class InPlaceStringCapture implements StringCapture {
  private readonly translator: StringTranslator;
  private readonly measureFirst: boolean;
  private readonly plain: boolean;

  constructor(
    private readonly context: CaptureContext,
    private readonly target: { units: UnitArray; buffer: number }
  ) {
    this.translator = new StringTranslator(context);
    this.plain = sameLayout(context);
    this.measureFirst = !context.mode.terminators || !this.plain;
  }

  capture(open: number, span: CapturedSpan): number {
    const begin = open + 1;
    const { units, buffer } = this.target;
    const { terminators } = this.context.mode;

    if (this.measureFirst) {
      this.translator.run(begin, null, 0);
      if (this.plain && !this.translator.escaped) {
        const close = this.translator.close;
        if (terminators) {
          units[close] = 0;
        }
        span.buffer = buffer;
        span.start = begin;
        span.end = close;
        return close + 1;
      }
    }

    const start = toDocPosition(this.context, begin);
    const written = this.translator.run(begin, units, start);
    if (terminators) {
      units[start + written] = 0;
    }
    span.buffer = buffer;
    span.start = start;
    span.end = start + written;
    return this.translator.close + 1;
  }
}

/** Measures each string, then copies it into one exactly sized arena allocation. */
class MeasuredStringCapture implements StringCapture {
  private readonly translator: StringTranslator;
  private readonly viewable: boolean;

  constructor(
    private readonly context: CaptureContext,
    private readonly target: { units: UnitArray; buffer: number } | null
  ) {
    this.translator = new StringTranslator(context);
    this.viewable = sameLayout(context) && !context.mode.terminators && target !== null;
  }

  capture(open: number, span: CapturedSpan): number {
    const begin = open + 1;
    const { store, mode } = this.context;
    const length = this.translator.run(begin, null, 0);
    const close = this.translator.close;

    if (this.viewable && this.target && !this.translator.escaped) {
      span.buffer = this.target.buffer;
      span.start = begin;
      span.end = close;
      return close + 1;
    }

    const allocation = store.allocateUnits(length + (mode.terminators ? 1 : 0));
    this.translator.run(begin, allocation.units, allocation.start);
    if (mode.terminators) {
      allocation.units[allocation.start + length] = 0;
    }
    span.buffer = allocation.buffer;
    span.start = allocation.start;
    span.end = allocation.start + length;
    return close + 1;
  }
}

class ViewNumberCapture implements NumberCapture {
  constructor(
    private readonly target: { units: UnitArray; buffer: number },
    private readonly terminators: boolean
  ) {}

  capture(start: number, end: number, span: CapturedSpan): number {
    span.buffer = this.target.buffer;
    span.start = start;
    span.end = end;
    return this.terminators ? end : NONE;
  }
}

/** Narrows or byte-swaps the digits where they sit. */
class InPlaceNumberCapture implements NumberCapture {
  constructor(
    private readonly context: CaptureContext,
    private readonly target: { units: UnitArray; buffer: number }
  ) {}

  capture(start: number, end: number, span: CapturedSpan): number {
    const { source, mode } = this.context;
    const docStart = toDocPosition(this.context, start);
    const length = end - start;
    for (let offset = 0; offset < length; offset += 1) {
      this.target.units[docStart + offset] = source.at(start + offset);
    }
    span.buffer = this.target.buffer;
    span.start = docStart;
    span.end = docStart + length;
    return mode.terminators ? docStart + length : NONE;
  }
}

class CopyNumberCapture implements NumberCapture {
  constructor(private readonly context: CaptureContext) {}

  capture(start: number, end: number, span: CapturedSpan): number {
    const { source, store, mode } = this.context;
    const length = end - start;
    const allocation = store.allocateUnits(length + (mode.terminators ? 1 : 0));
    for (let offset = 0; offset < length; offset += 1) {
      allocation.units[allocation.start + offset] = source.at(start + offset);
    }
    if (mode.terminators) {
      allocation.units[allocation.start + length] = 0;
    }
    span.buffer = allocation.buffer;
    span.start = allocation.start;
    span.end = allocation.start + length;
    return NONE;
  }
}

/**
 * Picks the string strategy for one parse. Copies are required when the tree
 * is wider than the input, when terminators are forced, and for UTF-16 input
 * into a UTF-8 tree, where one input unit may expand to three bytes.
 */
export const selectStringCapture = (context: CaptureContext): StringCapture => {
  const inputWidth = context.source.width;
  const docWidth = context.encoder.width;
  const requireCopy =
    context.mode.force || docWidth > inputWidth || (inputWidth === 2 && docWidth === 1);
  if (requireCopy || context.mode.noInline || context.inPlace === null) {
    return new MeasuredStringCapture(context, context.inPlace);
  }
  return new InPlaceStringCapture(context, context.inPlace);
};

export const selectNumberCapture = (context: CaptureContext): NumberCapture => {
  const { mode, inPlace } = context;
  if (mode.force || inPlace === null) {
    return new CopyNumberCapture(context);
  }
  if (sameLayout(context)) {
    return new ViewNumberCapture(inPlace, mode.terminators);
  }
  if (mode.noInline) {
    return new CopyNumberCapture(context);
  }
  return new InPlaceNumberCapture(context, inPlace);
};
