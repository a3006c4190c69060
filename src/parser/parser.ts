import {
  FALSE_END,
  FALSE_START,
  LAST_CHILD,
  LITERAL_BUFFER,
  NONE,
  NULL_END,
  NULL_START,
  TRUE_END,
  TRUE_START,
  ValueKind,
} from "../tree/store.js";
import { isDigit, isWhitespace } from "../unicode/tables.js";
import {
  selectNumberCapture,
  selectStringCapture,
  type CaptureContext,
  type CapturedSpan,
  type NumberCapture,
  type StringCapture,
} from "./capture.js";

const QUOTE = 0x22;
const HASH = 0x23;
const STAR = 0x2a;
const PLUS = 0x2b;
const COMMA = 0x2c;
const MINUS = 0x2d;
const DOT = 0x2e;
const SLASH = 0x2f;
const ZERO = 0x30;
const COLON = 0x3a;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const LOWER_E = 0x65;
const UPPER_E = 0x45;
const LOWER_F = 0x66;
const LOWER_N = 0x6e;
const LOWER_T = 0x74;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const NEWLINE = 0x0a;

/** Containers nested deeper than this fail instead of exhausting the call stack. */
export const DEFAULT_MAX_DEPTH = 1024;

export type ParserContext = CaptureContext & {
  maxDepth: number;
};

const TRUE_TEXT = [0x74, 0x72, 0x75, 0x65];
const FALSE_TEXT = [0x66, 0x61, 0x6c, 0x73, 0x65];
const NULL_TEXT = [0x6e, 0x75, 0x6c, 0x6c];

/**
 * Recursive-descent parser over one input. Builds value records directly in
 * the store and returns the root record. Every error goes through the
 * context's `fail`, which never returns.
 */
export class JsonParser {
  private readonly strings: StringCapture;
  private readonly numbers: NumberCapture;
  private readonly span: CapturedSpan = { buffer: 0, start: 0, end: 0 };
  private pendingTerminator = NONE;
  private depth = 0;

  constructor(private readonly context: ParserContext) {
    this.strings = selectStringCapture(context);
    this.numbers = selectNumberCapture(context);
  }

  parseDocument(): number {
    const { store, fail } = this.context;
    let index = this.skip(0);
    const unit = this.at(index);
    let root: number;
    if (unit === OPEN_BRACE) {
      root = store.create(ValueKind.Object);
      index = this.parseObject(root, index);
    } else if (unit === OPEN_BRACKET) {
      root = store.create(ValueKind.Array);
      index = this.parseArray(root, index);
    } else {
      return fail("Expected '{' or '['", index);
    }

    index = this.skip(index);
    if (index < this.context.end && this.at(index) !== 0) {
      fail("Expected end of document", index);
    }
    return root;
  }

  private at(index: number): number {
    return index < this.context.end ? this.context.source.at(index) : 0;
  }

  private skip(start: number): number {
    const { comments } = this.context.mode;
    let index = start;
    for (;;) {
      const unit = this.at(index);
      if (isWhitespace(unit)) {
        index += 1;
        continue;
      }
      if (!comments) {
        return index;
      }
      if (unit === HASH || (unit === SLASH && this.at(index + 1) === SLASH)) {
        while (this.at(index) !== 0 && this.at(index) !== NEWLINE) {
          index += 1;
        }
        continue;
      }
      if (unit === SLASH && this.at(index + 1) === STAR) {
        index += 2;
        while (this.at(index) !== 0 && !(this.at(index) === STAR && this.at(index + 1) === SLASH)) {
          index += 1;
        }
        if (this.at(index) !== 0) {
          index += 2;
        }
        continue;
      }
      return index;
    }
  }

  private flushTerminator(): void {
    const { inPlace } = this.context;
    if (this.pendingTerminator !== NONE && inPlace) {
      if (inPlace.units[this.pendingTerminator] !== 0) {
        inPlace.units[this.pendingTerminator] = 0;
      }
    }
    this.pendingTerminator = NONE;
  }

  private parseArray(array: number, open: number): number {
    this.descend(open);
    const next = this.parseElements(array, open);
    this.depth -= 1;
    return next;
  }

  private parseObject(object: number, open: number): number {
    this.descend(open);
    const next = this.parseMembers(object, open);
    this.depth -= 1;
    return next;
  }

  private descend(open: number): void {
    this.depth += 1;
    if (this.depth > this.context.maxDepth) {
      this.context.fail("Maximum nesting depth exceeded", open);
    }
  }

  private parseElements(array: number, open: number): number {
    const { fail, mode } = this.context;
    let index = this.skip(open + 1);
    if (this.at(index) === CLOSE_BRACKET) {
      return index + 1;
    }

    for (;;) {
      index = this.parseValue(array, index);
      index = this.skip(index);
      const unit = this.at(index);
      if (unit === COMMA) {
        this.flushTerminator();
        index = this.skip(index + 1);
        if (mode.trailingCommas && this.at(index) === CLOSE_BRACKET) {
          return index + 1;
        }
        continue;
      }
      if (unit === CLOSE_BRACKET) {
        this.flushTerminator();
        return index + 1;
      }
      return fail("Expected value-separator ',' or end-of-array ']'", index);
    }
  }

  private parseMembers(object: number, open: number): number {
    const { fail, mode, store } = this.context;
    let index = this.skip(open + 1);
    if (this.at(index) === CLOSE_BRACE) {
      return index + 1;
    }

    let first = true;
    for (;;) {
      if (this.at(index) !== QUOTE) {
        fail(first ? "Expected end-of-object '}' or name (string)" : "Expected name (string)", index);
      }
      index = this.strings.capture(index, this.span);
      const nameBuffer = this.span.buffer;
      const nameStart = this.span.start;
      const nameEnd = this.span.end;

      index = this.skip(index);
      if (this.at(index) !== COLON) {
        fail("Expected name separator (:)", index);
      }
      index = this.skip(index + 1);
      index = this.parseValue(object, index);
      const member = store.get(object, LAST_CHILD);
      store.setName(member, nameBuffer, nameStart, nameEnd);

      index = this.skip(index);
      const unit = this.at(index);
      if (unit === COMMA) {
        this.flushTerminator();
        index = this.skip(index + 1);
        if (mode.trailingCommas && this.at(index) === CLOSE_BRACE) {
          return index + 1;
        }
        first = false;
        continue;
      }
      if (unit === CLOSE_BRACE) {
        this.flushTerminator();
        return index + 1;
      }
      return fail("Expected value-separator ',' or end-of-object '}'", index);
    }
  }

  /** Parses one value at `index`, appends it to `parent` and returns the index after it. */
  private parseValue(parent: number, index: number): number {
    const { store, fail } = this.context;
    const unit = this.at(index);
    switch (unit) {
      case OPEN_BRACE: {
        const object = store.create(ValueKind.Object);
        store.appendChild(parent, object);
        return this.parseObject(object, index);
      }
      case OPEN_BRACKET: {
        const array = store.create(ValueKind.Array);
        store.appendChild(parent, array);
        return this.parseArray(array, index);
      }
      case QUOTE: {
        const next = this.strings.capture(index, this.span);
        const value = store.create(ValueKind.String);
        store.setText(value, this.span.buffer, this.span.start, this.span.end);
        store.appendChild(parent, value);
        return next;
      }
      case LOWER_T:
        return this.parseLiteral(parent, index, TRUE_TEXT, ValueKind.Bool, TRUE_START, TRUE_END);
      case LOWER_F:
        return this.parseLiteral(parent, index, FALSE_TEXT, ValueKind.Bool, FALSE_START, FALSE_END);
      case LOWER_N:
        return this.parseLiteral(parent, index, NULL_TEXT, ValueKind.Null, NULL_START, NULL_END);
      default:
        if (unit === MINUS || unit === DOT || isDigit(unit)) {
          return this.parseNumber(parent, index);
        }
        return fail("Expected value", index);
    }
  }

  private parseLiteral(
    parent: number,
    index: number,
    text: number[],
    kind: ValueKind,
    start: number,
    end: number
  ): number {
    const { store, fail } = this.context;
    for (let offset = 0; offset < text.length; offset += 1) {
      if (this.at(index + offset) !== text[offset]) {
        fail("Expected value", index);
      }
    }
    const value = store.create(kind);
    store.setText(value, LITERAL_BUFFER, start, end);
    store.appendChild(parent, value);
    return index + text.length;
  }

  private parseNumber(parent: number, start: number): number {
    const { store, fail } = this.context;
    let index = start;
    if (this.at(index) === MINUS) {
      index += 1;
    }
    if (this.at(index) === ZERO) {
      index += 1;
    } else if (isDigit(this.at(index))) {
      index = this.skipDigits(index);
    } else {
      fail("Expected digit", index);
    }

    if (this.at(index) === DOT) {
      index += 1;
      if (!isDigit(this.at(index))) {
        fail("Expected fractional digits", index);
      }
      index = this.skipDigits(index);
    }

    const exponent = this.at(index);
    if (exponent === LOWER_E || exponent === UPPER_E) {
      index += 1;
      const sign = this.at(index);
      if (sign === PLUS || sign === MINUS) {
        index += 1;
      }
      if (!isDigit(this.at(index))) {
        fail("Expected exponent digits", index);
      }
      index = this.skipDigits(index);
    }

    const value = store.create(ValueKind.Number);
    this.pendingTerminator = this.numbers.capture(start, index, this.span);
    store.setText(value, this.span.buffer, this.span.start, this.span.end);
    store.appendChild(parent, value);
    return index;
  }

  private skipDigits(start: number): number {
    let index = start;
    while (isDigit(this.at(index))) {
      index += 1;
    }
    return index;
  }
}
