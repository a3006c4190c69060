import { JsonDocument } from "../tree/document.js";
import { ValueKind, type TextView } from "../tree/store.js";
import type { JsonValue } from "../tree/value.js";
import { HEX_DIGITS, UTF8_LENGTHS } from "../unicode/tables.js";
import { MAX_CODE_POINT } from "../unicode/transcoder.js";
import { StringSink, type OutputSink } from "./sinks.js";

export const SerializeFlags = {
  None: 0,
  /** Indent widths when spaces are used. OR-able; 4 when none is given. */
  Indent1: 0x1,
  Indent2: 0x2,
  Indent4: 0x4,
  Indent8: 0x8,
  /** No inserted spaces or newlines. */
  Compact: 0x10,
  /** Indent with spaces instead of tabs. */
  UseSpaces: 0x20,
} as const;

const FLUSH_THRESHOLD = 16 * 1024;

const hex4 = (code: number): string =>
  `\\u${HEX_DIGITS[(code >> 12) & 0xf]}${HEX_DIGITS[(code >> 8) & 0xf]}${HEX_DIGITS[(code >> 4) & 0xf]}${HEX_DIGITS[code & 0xf]}`;

const REPLACEMENT = hex4(0xfffd);

const escapeCodePoint = (codePoint: number): string => {
  if (codePoint < 0x10000) {
    return hex4(codePoint);
  }
  const offset = codePoint - 0x10000;
  return hex4(0xd800 | (offset >> 10)) + hex4(0xdc00 | (offset & 0x3ff));
};

const escapeAscii = (unit: number): string => {
  switch (unit) {
    case 0x22:
      return '\\"';
    case 0x5c:
      return "\\\\";
    case 0x08:
      return "\\b";
    case 0x0c:
      return "\\f";
    case 0x0a:
      return "\\n";
    case 0x0d:
      return "\\r";
    case 0x09:
      return "\\t";
    default:
      return unit < 0x20 ? hex4(unit) : String.fromCharCode(unit);
  }
};

/**
 * Escapes the text in `view` as a quoted JSON string. Anything outside
 * printable ASCII becomes a `\u` escape; malformed sequences become U+FFFD.
 */
export const quoteText = ({ units, start, end }: TextView): string => {
  const width = units.BYTES_PER_ELEMENT;
  let out = '"';
  let index = start;
  while (index < end) {
    const unit = units[index] ?? 0;
    if (unit < 0x80) {
      out += escapeAscii(unit);
      index += 1;
      continue;
    }

    if (width === 1) {
      const length = UTF8_LENGTHS[unit >> 2] ?? 0;
      let codePoint = length > 1 ? unit & (0xff >> (length + 1)) : -1;
      for (let offset = 1; codePoint >= 0 && offset < length; offset += 1) {
        const next = index + offset < end ? units[index + offset] ?? 0 : 0;
        codePoint = (next & 0xc0) === 0x80 ? (codePoint << 6) | (next & 0x3f) : -1;
      }
      if (codePoint < 0) {
        out += REPLACEMENT;
        index += 1;
      } else {
        out += escapeCodePoint(codePoint);
        index += length;
      }
    } else if (width === 2) {
      const low = index + 1 < end ? units[index + 1] ?? 0 : 0;
      if (unit >= 0xd800 && unit <= 0xdbff && low >= 0xdc00 && low <= 0xdfff) {
        out += hex4(unit) + hex4(low);
        index += 2;
      } else {
        out += unit >= 0xd800 && unit <= 0xdfff ? REPLACEMENT : hex4(unit);
        index += 1;
      }
    } else {
      const valid = unit <= MAX_CODE_POINT && (unit < 0xd800 || unit > 0xdfff);
      out += valid ? escapeCodePoint(unit) : REPLACEMENT;
      index += 1;
    }
  }
  return `${out}"`;
};

const plainText = ({ units, start, end }: TextView): string => {
  let out = "";
  for (let index = start; index < end; index += 1) {
    out += String.fromCharCode(units[index] ?? 0);
  }
  return out;
};

class Serializer {
  private out = "";
  private readonly compact: boolean;
  private readonly indentUnit: string;

  constructor(
    private readonly sink: OutputSink,
    flags: number
  ) {
    this.compact = (flags & SerializeFlags.Compact) !== 0;
    if ((flags & SerializeFlags.UseSpaces) !== 0) {
      this.indentUnit = " ".repeat(flags & 0xf || SerializeFlags.Indent4);
    } else {
      this.indentUnit = "\t";
    }
  }

  run(value: JsonValue): void {
    this.printValue(value, 0, false);
    this.flush();
  }

  private emit(text: string): void {
    this.out += text;
    if (this.out.length >= FLUSH_THRESHOLD) {
      this.flush();
    }
  }

  private flush(): void {
    if (this.out.length > 0) {
      this.sink.append(this.out);
      this.out = "";
    }
  }

  private indent(depth: number): void {
    if (!this.compact && depth > 0) {
      this.emit(this.indentUnit.repeat(depth));
    }
  }

  private printValue(value: JsonValue, depth: number, named: boolean): void {
    this.indent(depth);
    if (named) {
      this.emit(quoteText(value.name));
      this.emit(this.compact ? ":" : ": ");
    }

    const kind = value.kind;
    if (kind === ValueKind.String) {
      this.emit(quoteText(value.text));
      return;
    }
    const container = value.asContainer();
    if (container === null) {
      this.emit(plainText(value.text));
      return;
    }

    const isArray = kind === ValueKind.Array;
    this.emit(isArray ? "[" : "{");
    let first = true;
    for (const child of container.children()) {
      if (!first) {
        this.emit(isArray && !this.compact ? ", " : ",");
      }
      if (!isArray && !this.compact) {
        this.emit("\n");
      }
      this.printValue(child, isArray ? 0 : depth + 1, !isArray);
      first = false;
    }
    if (!first && !isArray && !this.compact) {
      this.emit("\n");
      this.indent(depth);
    }
    this.emit(isArray ? "]" : "}");
  }
}

/**
 * Writes `target` as JSON text. A document prints its root; any other value
 * prints without its own member name.
 */
export const serialize = (target: JsonDocument | JsonValue, sink: OutputSink, flags: number = SerializeFlags.None): void => {
  new Serializer(sink, flags).run(target instanceof JsonDocument ? target.root : target);
};

export const stringify = (target: JsonDocument | JsonValue, flags: number = SerializeFlags.None): string => {
  const sink = new StringSink();
  serialize(target, sink, flags);
  return sink.toString();
};
