import { Arena, type ArenaOptions, type ArenaStats } from "../arena/arena.js";
import { throwingHandler, toFail, type ErrorHandler, type Fail } from "../errors.js";
import { numberToText } from "../number/numberCodec.js";
import type { CaptureContext } from "../parser/capture.js";
import { resolveParseFlags } from "../parser/flags.js";
import { DEFAULT_MAX_DEPTH, JsonParser } from "../parser/parser.js";
import { detectEncoding, encodingWidth, isSwapped, type Encoding } from "../unicode/encoding.js";
import { createEncoder, stringToUnits } from "../unicode/transcoder.js";
import { createUnitSource, createUnitView, isUnitWidth, type UnitWidth } from "../unicode/units.js";
import {
  FALSE_END,
  FALSE_START,
  LITERAL_BUFFER,
  NULL_END,
  NULL_START,
  TRUE_END,
  TRUE_START,
  ValueKind,
  ValueStore,
  type TextView,
} from "./store.js";
import { JsonContainer, JsonValue, wrapContainer, wrapValue } from "./value.js";

/** `byteLength` sentinel: the input ends at its first NUL code unit. */
export const NUL_TERMINATED = -1;

export type DocumentOptions = {
  /** Bytes per code unit of the tree's text: 1 (UTF-8), 2 (UTF-16) or 4 (UTF-32). */
  width?: UnitWidth;
  arena?: ArenaOptions;
  errorHandler?: ErrorHandler;
};

export type ParseOptions = {
  flags?: number;
  /** Skips detection. Required with {@link NUL_TERMINATED}. */
  encoding?: Encoding;
  byteLength?: number;
  /** Deepest container nesting accepted; defaults to {@link DEFAULT_MAX_DEPTH}. */
  maxDepth?: number;
};

export type DocumentStats = ArenaStats & {
  values: number;
};

/**
 * Owns one arena and the value tree built in it. Parsing replaces the root
 * only on success; earlier values stay valid until {@link clear} or
 * {@link dispose}.
 */
export class JsonDocument {
  readonly width: UnitWidth;
  private readonly arena: Arena;
  private readonly store: ValueStore;
  private readonly fail: Fail;
  private disposed = false;

  constructor(options: DocumentOptions = {}) {
    const width = options.width ?? 1;
    if (!isUnitWidth(width)) {
      throw new RangeError(`Unsupported code unit width ${width}`);
    }
    this.width = width;
    this.arena = new Arena(options.arena);
    if (this.arena.alignment < 4) {
      throw new RangeError("Document arenas need an alignment of at least 4");
    }
    this.fail = toFail(options.errorHandler ?? throwingHandler);
    this.store = new ValueStore(this.arena, width, this.fail);
    this.store.root = this.store.create(ValueKind.Object);
  }

  get root(): JsonContainer {
    return wrapContainer(this.live(), this.store.root);
  }

  /**
   * Parses `input` into a new root. Unless flags say otherwise the input is
   * modified: strings are unescaped in place and captures are NUL-terminated.
   * Inputs whose offset is not a multiple of the unit width are copied first.
   */
  parse(input: Uint8Array | ArrayBuffer, options: ParseOptions = {}): JsonContainer {
    const store = this.live();
    const mode = resolveParseFlags(options.flags ?? 0);
    let bytes = input instanceof Uint8Array ? input : new Uint8Array(input);
    const byteLength = options.byteLength ?? bytes.byteLength;
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`Invalid maximum depth ${maxDepth}`);
    }

    if (byteLength === NUL_TERMINATED) {
      if (options.encoding === undefined) {
        this.fail("Encoding must be specified with NUL-terminated data", 0);
      }
    } else if (!Number.isInteger(byteLength) || byteLength < 0 || byteLength > bytes.byteLength) {
      throw new RangeError(`Invalid byte length ${byteLength}`);
    }
    if (byteLength === 0) {
      this.fail("Expected '{' or '['", 0);
    }

    const encoding =
      options.encoding ?? detectEncoding(bytes, byteLength) ?? this.fail("Unable to determine encoding", 0);
    const inputWidth = encodingWidth(encoding);
    const usable = byteLength === NUL_TERMINATED ? bytes.byteLength : byteLength;
    if (bytes.byteOffset % inputWidth !== 0) {
      bytes = bytes.slice(0, usable);
    }

    const units = createUnitView(inputWidth, bytes.buffer, bytes.byteOffset, Math.floor(usable / inputWidth));
    const source = createUnitSource(inputWidth, units, isSwapped(encoding));
    let end = units.length;
    if (byteLength === NUL_TERMINATED) {
      end = 0;
      while (end < units.length && source.at(end) !== 0) {
        end += 1;
      }
    }

    let inPlace: CaptureContext["inPlace"] = null;
    if (this.width <= inputWidth) {
      const docUnits =
        this.width === inputWidth
          ? units
          : createUnitView(this.width, bytes.buffer, bytes.byteOffset, Math.floor(usable / this.width));
      inPlace = { units: docUnits, buffer: store.registerBuffer(docUnits) };
    }

    const parser = new JsonParser({
      store,
      source,
      end,
      encoder: createEncoder(this.width),
      mode,
      inPlace,
      maxDepth,
      fail: (message, index) => this.fail(message, index * inputWidth),
    });
    store.root = parser.parseDocument();
    return this.root;
  }

  createNull(): JsonValue {
    return this.literal(ValueKind.Null, NULL_START, NULL_END);
  }

  createBool(value: boolean): JsonValue {
    return value
      ? this.literal(ValueKind.Bool, TRUE_START, TRUE_END)
      : this.literal(ValueKind.Bool, FALSE_START, FALSE_END);
  }

  /** NaN and the infinities become the strings "NaN", "Inf" and "-Inf". */
  createNumber(value: number): JsonValue {
    const { text, finite } = numberToText(value);
    return this.textValue(finite ? ValueKind.Number : ValueKind.String, text);
  }

  createString(value: string): JsonValue {
    return this.textValue(ValueKind.String, value);
  }

  createArray(): JsonContainer {
    const store = this.live();
    return wrapContainer(store, store.create(ValueKind.Array));
  }

  createObject(): JsonContainer {
    const store = this.live();
    return wrapContainer(store, store.create(ValueKind.Object));
  }

  /** Encodes `text` into the arena at the document's width, NUL-terminated. */
  allocateText(text: string): TextView {
    const store = this.live();
    const units = stringToUnits(text, this.width);
    const allocation = store.storeUnits(units, true);
    return { units: allocation.units, start: allocation.start, end: allocation.start + units.length };
  }

  /** Releases every value and starts over with an empty object root. */
  clear(): void {
    const store = this.live();
    this.arena.release();
    store.reset();
    store.root = store.create(ValueKind.Object);
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.arena.release();
    this.store.reset();
    this.disposed = true;
  }

  stats(): DocumentStats {
    return { ...this.arena.stats(), values: this.live().records };
  }

  private live(): ValueStore {
    if (this.disposed) {
      throw new Error("Document has been disposed");
    }
    return this.store;
  }

  private literal(kind: ValueKind, start: number, end: number): JsonValue {
    const store = this.live();
    const id = store.create(kind);
    store.setText(id, LITERAL_BUFFER, start, end);
    return wrapValue(store, id);
  }

  private textValue(kind: ValueKind, text: string): JsonValue {
    const store = this.live();
    const units = stringToUnits(text, this.width);
    const allocation = store.storeUnits(units, true);
    const id = store.create(kind);
    store.setText(id, allocation.buffer, allocation.start, allocation.start + units.length);
    return wrapValue(store, id);
  }
}
