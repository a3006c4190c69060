import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import pkg from "stream-json";
import { ValueKind } from "../tree/store.js";
import type { JsonValue } from "../tree/value.js";
const { parser } = pkg;

export interface TokenWriter {
  writeStartObject(): void;
  writeEndObject(): void;
  writeStartArray(): void;
  writeEndArray(): void;
  writeKey(key: string): void;
  writeString(value: string): void;
  /** Raw number text as it appeared in the source. */
  writeNumber(value: string): void;
  writeBoolean(value: boolean): void;
  writeNull(): void;
}

export type Token =
  | { name: "startObject" | "endObject" | "startArray" | "endArray" | "nullValue" }
  | { name: "keyValue" | "stringValue" | "numberValue"; value: string }
  | { name: "booleanValue"; value: boolean };

/** Walks a value depth first, reporting it the way a streaming tokenizer would. */
export const emitTokens = (value: JsonValue, writer: TokenWriter): void => {
  switch (value.kind) {
    case ValueKind.Null:
      return writer.writeNull();
    case ValueKind.Bool:
      return writer.writeBoolean(value.asBoolean());
    case ValueKind.Number:
      return writer.writeNumber(value.asString());
    case ValueKind.String:
      return writer.writeString(value.asString());
    case ValueKind.Array:
    case ValueKind.Object: {
      const container = value.asContainer();
      if (container === null) {
        throw new Error("Container record without container handle");
      }
      const isObject = value.kind === ValueKind.Object;
      if (isObject) {
        writer.writeStartObject();
      } else {
        writer.writeStartArray();
      }
      for (const child of container.children()) {
        if (isObject) {
          writer.writeKey(child.nameString());
        }
        emitTokens(child, writer);
      }
      return isObject ? writer.writeEndObject() : writer.writeEndArray();
    }
  }
};

export class TokenRecorder implements TokenWriter {
  readonly tokens: Token[] = [];

  writeStartObject(): void {
    this.tokens.push({ name: "startObject" });
  }

  writeEndObject(): void {
    this.tokens.push({ name: "endObject" });
  }

  writeStartArray(): void {
    this.tokens.push({ name: "startArray" });
  }

  writeEndArray(): void {
    this.tokens.push({ name: "endArray" });
  }

  writeKey(key: string): void {
    this.tokens.push({ name: "keyValue", value: key });
  }

  writeString(value: string): void {
    this.tokens.push({ name: "stringValue", value });
  }

  writeNumber(value: string): void {
    this.tokens.push({ name: "numberValue", value });
  }

  writeBoolean(value: boolean): void {
    this.tokens.push({ name: "booleanValue", value });
  }

  writeNull(): void {
    this.tokens.push({ name: "nullValue" });
  }
}

export type TokenMismatch = {
  index: number;
  expected: Token | undefined;
  actual: Token | undefined;
};

const sameToken = (left: Token, right: Token): boolean =>
  left.name === right.name && ("value" in left ? left.value : undefined) === ("value" in right ? right.value : undefined);

/** First position where the two token lists differ, or null when they match. */
export const compareTokens = (expected: readonly Token[], actual: readonly Token[]): TokenMismatch | null => {
  const length = Math.max(expected.length, actual.length);
  for (let index = 0; index < length; index += 1) {
    const left = expected[index];
    const right = actual[index];
    if (left === undefined || right === undefined || !sameToken(left, right)) {
      return { index, expected: left, actual: right };
    }
  }
  return null;
};

type PackedToken = {
  name: string;
  value?: unknown;
};

const isPackedToken = (chunk: unknown): chunk is PackedToken =>
  typeof chunk === "object" && chunk !== null && "name" in chunk && typeof chunk.name === "string";

/** stream-json's packed tokens; its string and number chunk tokens have no counterpart here. */
const fromPacked = ({ name, value }: PackedToken): Token | undefined => {
  switch (name) {
    case "startObject":
      return { name: "startObject" };
    case "endObject":
      return { name: "endObject" };
    case "startArray":
      return { name: "startArray" };
    case "endArray":
      return { name: "endArray" };
    case "nullValue":
      return { name: "nullValue" };
    case "trueValue":
      return { name: "booleanValue", value: true };
    case "falseValue":
      return { name: "booleanValue", value: false };
    case "keyValue":
      return { name: "keyValue", value: String(value ?? "") };
    case "stringValue":
      return { name: "stringValue", value: String(value ?? "") };
    case "numberValue":
      if (value === undefined) {
        throw new Error("Number token missing value");
      }
      return { name: "numberValue", value: String(value) };
    default:
      return undefined;
  }
};

/** Tokenizes UTF-8 JSON text with stream-json, independently of this library's parser. */
export const collectReferenceTokens = async (readable: Readable): Promise<Token[]> => {
  const tokens: Token[] = [];
  await pipeline(readable, parser(), async (source: AsyncIterable<unknown>) => {
    for await (const chunk of source) {
      const token = isPackedToken(chunk) ? fromPacked(chunk) : undefined;
      if (token !== undefined) {
        tokens.push(token);
      }
    }
  });
  return tokens;
};

export const readReferenceTokens = (utf8: Uint8Array | string): Promise<Token[]> => {
  const text = typeof utf8 === "string" ? utf8 : Buffer.from(utf8.buffer, utf8.byteOffset, utf8.byteLength);
  return collectReferenceTokens(Readable.from([text]));
};

/** Checks a parsed tree against stream-json's reading of the same UTF-8 text. */
export const verifyTree = async (value: JsonValue, utf8: Uint8Array | string): Promise<TokenMismatch | null> => {
  const expected = await readReferenceTokens(utf8);
  const recorder = new TokenRecorder();
  emitTokens(value, recorder);
  return compareTokens(expected, recorder.tokens);
};

export const describeToken = (token: Token | undefined): string => {
  if (token === undefined) {
    return "end of input";
  }
  return "value" in token ? `${token.name} ${JSON.stringify(token.value)}` : token.name;
};
