import { describe, expect, it } from "vitest";
import { ParseAbortedError, ParseError } from "../errors.js";
import { JsonDocument, NUL_TERMINATED } from "../tree/document.js";
import { ValueKind } from "../tree/store.js";
import type { JsonContainer, JsonValue } from "../tree/value.js";
import { Encoding, resolveEncoding } from "../unicode/encoding.js";
import type { UnitWidth } from "../unicode/units.js";
import { ParseFlags } from "./flags.js";
import { DEFAULT_MAX_DEPTH } from "./parser.js";

const utf16le = (text: string): Uint8Array => Buffer.from(text, "utf16le");
const utf16be = (text: string): Uint8Array => Buffer.from(text, "utf16le").swap16();

const utf32 = (text: string, littleEndian: boolean): Uint8Array => {
  const codePoints = Array.from(text, (character) => character.codePointAt(0) ?? 0);
  const bytes = Buffer.alloc(codePoints.length * 4);
  codePoints.forEach((codePoint, index) => {
    if (littleEndian) {
      bytes.writeUInt32LE(codePoint, index * 4);
    } else {
      bytes.writeUInt32BE(codePoint, index * 4);
    }
  });
  return bytes;
};

const parse = (text: string, flags: number = ParseFlags.None, width: UnitWidth = 1): JsonContainer =>
  new JsonDocument({ width }).parse(Buffer.from(text), { flags });

const parseFailure = (input: string | Uint8Array, flags: number = ParseFlags.None): ParseError => {
  const bytes = typeof input === "string" ? Buffer.from(input) : input;
  try {
    new JsonDocument().parse(bytes, { flags });
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected the parse to fail");
};

const member = (container: JsonContainer, name: string): JsonValue => {
  const value = container.get(name);
  if (value === null) {
    throw new Error(`Missing member ${name}`);
  }
  return value;
};

const element = (container: JsonContainer, index: number): JsonValue => {
  const value = container.at(index);
  if (value === null) {
    throw new Error(`Missing element ${index}`);
  }
  return value;
};

const container = (value: JsonValue): JsonContainer => {
  const result = value.asContainer();
  if (result === null) {
    throw new Error("Expected a container");
  }
  return result;
};

describe("JsonParser structure", () => {
  it("builds objects, arrays and scalars", () => {
    const root = parse('{"a":1,"b":[true,false,null],"c":"x"}');

    expect(root.kind).toBe(ValueKind.Object);
    expect(root.childCount).toBe(3);
    expect(member(root, "a").asNumber()).toBe(1);
    const list = container(member(root, "b"));
    expect(Array.from(list.children(), (child) => child.kind)).toEqual([
      ValueKind.Bool,
      ValueKind.Bool,
      ValueKind.Null,
    ]);
    expect(element(list, 0).asBoolean()).toBe(true);
    expect(element(list, 1).asString()).toBe("false");
    expect(member(root, "c").asString()).toBe("x");
  });

  it("keeps members in source order with their names", () => {
    const root = parse('{ "z" : 1 , "y" : 2 }');

    expect(Array.from(root.children(), (child) => child.nameString())).toEqual(["z", "y"]);
  });

  it("accepts empty containers and surrounding whitespace", () => {
    expect(parse("[]").childCount).toBe(0);
    expect(parse("{}").kind).toBe(ValueKind.Object);
    expect(parse(" \t\r\n[ \n] \n").kind).toBe(ValueKind.Array);
  });

  it("nests containers", () => {
    const root = parse("[[[[1]]]]");

    const inner = container(element(container(element(container(element(root, 0)), 0)), 0));
    expect(element(inner, 0).asNumber()).toBe(1);
  });

  it("keeps duplicate names and finds the first", () => {
    const root = parse('{"a":1,"a":2}');

    expect(root.childCount).toBe(2);
    expect(member(root, "a").asNumber()).toBe(1);
  });

  it("keeps number text as written", () => {
    const root = parse("[0,-0,12.5e-1,1E2,-7]");

    expect(Array.from(root.children(), (child) => child.asString())).toEqual(["0", "-0", "12.5e-1", "1E2", "-7"]);
    expect(element(root, 2).asNumber()).toBe(1.25);
    expect(element(root, 3).asNumber()).toBe(100);
  });

  it("accepts an ArrayBuffer", () => {
    const buffer = new ArrayBuffer(3);
    new Uint8Array(buffer).set(Buffer.from("[1]"));

    const root = new JsonDocument().parse(buffer);

    expect(element(root, 0).asNumber()).toBe(1);
  });
});

describe("JsonParser strings", () => {
  it("unescapes every escape sequence", () => {
    const root = parse('["\\"\\\\\\/\\b\\f\\n\\r\\t\\u00e9\\ud834\\udd1e"]');

    expect(element(root, 0).asString()).toBe('"\\/\b\f\n\r\té\u{1d11e}');
  });

  it("passes raw UTF-8 through", () => {
    const root = parse('["héllo \u{1d11e}"]');

    expect(element(root, 0).asString()).toBe("héllo \u{1d11e}");
  });

  it("unescapes into the input buffer and terminates the text", () => {
    const bytes = Buffer.from('["a\\nb"]');

    const root = new JsonDocument().parse(bytes);

    expect(element(root, 0).asString()).toBe("a\nb");
    expect(Array.from(bytes)).toEqual([0x5b, 0x22, 0x61, 0x0a, 0x62, 0x00, 0x22, 0x5d]);
  });

  it("terminates numbers once the separator is consumed", () => {
    const bytes = Buffer.from("[12,3]");

    new JsonDocument().parse(bytes);

    expect(Array.from(bytes)).toEqual([0x5b, 0x31, 0x32, 0x00, 0x33, 0x00]);
  });
});

describe("JsonParser flags", () => {
  const source = '{"plain":"ab","escaped":"a\\tb","n":-4.5}';

  const check = (root: JsonContainer): void => {
    expect(member(root, "plain").asString()).toBe("ab");
    expect(member(root, "escaped").asString()).toBe("a\tb");
    expect(member(root, "n").asNumber()).toBe(-4.5);
  };

  it("leaves the input untouched when non-destructive", () => {
    const bytes = Buffer.from(source);

    const root = new JsonDocument().parse(bytes, { flags: ParseFlags.NonDestructive });

    check(root);
    expect(bytes.toString()).toBe(source);
  });

  it("copies every capture with a terminator when non-destructive and terminated", () => {
    const bytes = Buffer.from(source);

    const root = new JsonDocument().parse(bytes, { flags: ParseFlags.NonDestructiveTerminated });

    check(root);
    expect(bytes.toString()).toBe(source);
    const { units, end } = member(root, "plain").text;
    expect(units[end]).toBe(0);
  });

  it("skips terminators but still unescapes in place without terminators", () => {
    const bytes = Buffer.from('["ab","c\\td"]');

    const root = new JsonDocument().parse(bytes, { flags: ParseFlags.NoStringTerminators });

    expect(element(root, 0).asString()).toBe("ab");
    expect(element(root, 1).asString()).toBe("c\td");
    expect(bytes.subarray(0, 6).toString()).toBe('["ab",');
  });

  it("copies strings out of the input when inline translation is off", () => {
    const bytes = Buffer.from('["a\\nb"]');

    const root = new JsonDocument().parse(bytes, { flags: ParseFlags.NoInlineTranslation });

    expect(element(root, 0).asString()).toBe("a\nb");
    expect(bytes.toString()).toBe('["a\\nb"]');
  });

  it("accepts trailing commas when asked", () => {
    const root = parse('{"a":[1,2,],}', ParseFlags.TrailingCommas);

    expect(container(member(root, "a")).childCount).toBe(2);
  });

  it("skips comments when asked", () => {
    const root = parse("// lead\n[1, # hash\n 2 /* block */ ] // done", ParseFlags.Comments);

    expect(Array.from(root.children(), (child) => child.asNumber())).toEqual([1, 2]);
  });

  it("rejects unknown and conflicting flags", () => {
    expect(() => parse("[]", 64)).toThrow("Unknown parse flags 0x40");
    expect(() => parse("[]", ParseFlags.NoStringTerminators | ParseFlags.ForceStringTerminators)).toThrow(
      RangeError
    );
  });
});

describe("JsonParser errors", () => {
  const cases: Array<[input: string, message: string, offset: number]> = [
    [" [ 0, ] ", "Expected value", 6],
    ['{"a" 1}', "Expected name separator (:)", 5],
    ['{"a":1 "b":2}', "Expected value-separator ',' or end-of-object '}'", 7],
    ["{,}", "Expected end-of-object '}' or name (string)", 1],
    ['{"a":1,}', "Expected name (string)", 7],
    ["[1 2]", "Expected value-separator ',' or end-of-array ']'", 3],
    ["[1] x", "Expected end of document", 4],
    ['  "a"', "Expected '{' or '['", 2],
    ["[tru]", "Expected value", 1],
    ["[x]", "Expected value", 1],
    ["[-]", "Expected digit", 2],
    ["[.5]", "Expected digit", 1],
    ["[1.]", "Expected fractional digits", 3],
    ["[1e+]", "Expected exponent digits", 4],
    ['["abc', "Expected end-of-string '\"'", 5],
    ['["\\x"]', "Invalid escaped character", 3],
    ['["\\u12', "Invalid \\u escape sequence", 2],
    ['["\\u12"]', "Expected hex character (0-9, a-f, A-F)", 6],
    ['["\\udc00"]', "Invalid UTF-16 surrogate pair", 2],
    ['["\\ud834"]', "Expected UTF-16 surrogate pair", 8],
    ['["\\ud834abcdefg"]', "Expected \\uXXXX", 8],
    ['["\\ud834\\u0041"]', "Expected UTF-16 surrogate pair", 8],
    ['["\\ud834\\ud834"]', "Expected UTF-16 surrogate pair", 8],
    ["[1 /* note */]", "Expected value-separator ',' or end-of-array ']'", 3],
    ["[", "Expected value", 1],
  ];

  it.each(cases)("rejects %j", (input, message, offset) => {
    const error = parseFailure(input);

    expect(error.message).toBe(message);
    expect(error.offset).toBe(offset);
  });

  it("rejects malformed UTF-8 inside a string", () => {
    const error = parseFailure(new Uint8Array([0x5b, 0x22, 0xc3, 0x22, 0x5d]));

    expect(error.message).toBe("Invalid UTF-8 sequence");
    expect(error.offset).toBe(2);
  });

  it("reports an unterminated block comment at the end of input", () => {
    const error = parseFailure("[1 /* x", ParseFlags.Comments);

    expect(error.message).toBe("Expected value-separator ',' or end-of-array ']'");
    expect(error.offset).toBe(7);
  });

  it("reports byte offsets for wide input", () => {
    const error = parseFailure(utf16le("[1 2]"));

    expect(error.offset).toBe(6);
    expect(error.toString()).toBe("Expected value-separator ',' or end-of-array ']' (byte offset 6)");
  });

  it("keeps the previous root when a parse fails", () => {
    const document = new JsonDocument();
    document.parse(Buffer.from("[1]"));

    expect(() => document.parse(Buffer.from("[1,"))).toThrow(ParseError);
    expect(document.root.kind).toBe(ValueKind.Array);
    expect(document.root.childCount).toBe(1);
  });

  it("throws ParseAbortedError when the handler returns", () => {
    const seen: Array<[string, number]> = [];
    const document = new JsonDocument({
      errorHandler: (message, offset) => {
        seen.push([message, offset]);
      },
    });

    expect(() => document.parse(Buffer.from("[1 2]"))).toThrow(ParseAbortedError);
    expect(seen).toEqual([["Expected value-separator ',' or end-of-array ']'", 3]]);
  });

  it("reports nesting past the depth limit through the handler", () => {
    const seen: Array<[string, number]> = [];
    const document = new JsonDocument({
      errorHandler: (message, offset) => {
        seen.push([message, offset]);
      },
    });
    const deep = "[".repeat(20000) + "]".repeat(20000);

    expect(() => document.parse(Buffer.from(deep))).toThrow(ParseAbortedError);
    expect(seen).toEqual([["Maximum nesting depth exceeded", DEFAULT_MAX_DEPTH]]);
  });

  it("takes a depth limit per parse", () => {
    const document = new JsonDocument();

    expect(document.parse(Buffer.from('[{"a":[]}]'), { maxDepth: 3 }).childCount).toBe(1);
    expect(() => document.parse(Buffer.from("[[[1]]]"), { maxDepth: 2 })).toThrow("Maximum nesting depth exceeded");
    expect(() => document.parse(Buffer.from("[]"), { maxDepth: 0 })).toThrow("Invalid maximum depth 0");
  });

  it("lets the handler throw its own error", () => {
    const document = new JsonDocument({
      errorHandler: (message) => {
        throw new SyntaxError(`bad input: ${message}`);
      },
    });

    expect(() => document.parse(Buffer.from("{"))).toThrow("bad input: Expected end-of-object '}' or name (string)");
  });
});

describe("JsonDocument.parse input handling", () => {
  it("honours an explicit byte length", () => {
    const root = new JsonDocument().parse(Buffer.from("[1]xyz"), { byteLength: 3 });

    expect(root.childCount).toBe(1);
  });

  it("stops at the first NUL when asked", () => {
    const root = new JsonDocument().parse(Buffer.from("[1,2]\0garbage"), {
      byteLength: NUL_TERMINATED,
      encoding: Encoding.Utf8,
    });

    expect(root.childCount).toBe(2);
  });

  it("needs an encoding for NUL-terminated input", () => {
    expect(() => new JsonDocument().parse(Buffer.from("[1]\0"), { byteLength: NUL_TERMINATED })).toThrow(
      "Encoding must be specified with NUL-terminated data"
    );
  });

  it("rejects empty and undetectable input", () => {
    expect(parseFailure("").message).toBe("Expected '{' or '['");
    expect(parseFailure(new Uint8Array(4)).message).toBe("Unable to determine encoding");
  });

  it("rejects byte lengths outside the input", () => {
    expect(() => new JsonDocument().parse(Buffer.from("[]"), { byteLength: 99 })).toThrow("Invalid byte length 99");
  });

  it("copies input whose offset does not fit the unit width", () => {
    const encoded = utf16le('["ok"]');
    const backing = new Uint8Array(encoded.length + 1);
    backing.set(encoded, 1);

    const root = new JsonDocument().parse(backing.subarray(1));

    expect(element(root, 0).asString()).toBe("ok");
    expect(Array.from(backing.subarray(1))).toEqual(Array.from(encoded));
  });
});

describe("JsonParser encodings", () => {
  const text = '{"name":"héllo \u{1d11e}","esc":"\\u00e9\\ud834\\udd1e","n":-12.5,"ok":true}';

  const inputs: Array<[label: string, bytes: () => Uint8Array]> = [
    ["UTF-8", () => Buffer.from(text)],
    ["UTF-16LE", () => utf16le(text)],
    ["UTF-16BE", () => utf16be(text)],
    ["UTF-32LE", () => utf32(text, true)],
    ["UTF-32BE", () => utf32(text, false)],
  ];
  const widths: UnitWidth[] = [1, 2, 4];

  for (const [label, bytes] of inputs) {
    for (const width of widths) {
      it(`reads ${label} into a ${width * 8}-bit tree`, () => {
        const root = new JsonDocument({ width }).parse(bytes());

        expect(member(root, "name").asString()).toBe("héllo \u{1d11e}");
        expect(member(root, "esc").asString()).toBe("é\u{1d11e}");
        expect(member(root, "n").asNumber()).toBe(-12.5);
        expect(member(root, "ok").asBoolean()).toBe(true);
        expect(member(root, "name").nameString()).toBe("name");
      });
    }
  }

  it("stores supplementary characters in the tree's width", () => {
    const clef = '["\u{1d11e}"]';

    const narrow = element(parse(clef, ParseFlags.None, 2), 0).text;
    expect(Array.from(narrow.units.slice(narrow.start, narrow.end))).toEqual([0xd834, 0xdd1e]);
    const wide = element(parse(clef, ParseFlags.None, 4), 0).text;
    expect(Array.from(wide.units.slice(wide.start, wide.end))).toEqual([0x1d11e]);
  });

  it("uses the given encoding instead of detecting one", () => {
    const bytes = utf16be("[7]");
    const encoding = resolveEncoding("utf16be");

    const root = new JsonDocument().parse(bytes, { encoding });

    expect(element(root, 0).asNumber()).toBe(7);
  });
});

describe("JsonParser reference documents", () => {
  it("reads a number view without touching the buffer", () => {
    const bytes = Buffer.from(" [ 0 ] ");

    const root = new JsonDocument().parse(bytes, { flags: ParseFlags.NoStringTerminators });

    expect(root.childCount).toBe(1);
    expect(element(root, 0).kind).toBe(ValueKind.Number);
    expect(element(root, 0).asNumber()).toBe(0);
    expect(bytes.toString()).toBe(" [ 0 ] ");
  });

  it("accepts a trailing comma only when asked", () => {
    expect(parseFailure(" [ 0, ] ").offset).toBe(6);
    expect(parse(" [ 0, ] ", ParseFlags.TrailingCommas).childCount).toBe(1);
  });

  it("decodes supplementary characters to four UTF-8 bytes", () => {
    const root = parse('{ "teststr": "hello \u{1d11e} world" }');
    const { units, start, end } = member(root, "teststr").text;

    expect(member(root, "teststr").asString()).toBe("hello \u{1d11e} world");
    expect(Array.from(units.slice(start + 6, start + 10))).toEqual([0xf0, 0x9d, 0x84, 0x9e]);
    expect(end - start).toBe(16);
  });

  it("points past leading whitespace when no container follows", () => {
    const error = parseFailure(" ");

    expect(error.message).toBe("Expected '{' or '['");
    expect(error.offset).toBe(1);
  });
});
