import { ParseFlags } from "../parser/flags.js";
import { SerializeFlags } from "../serializer/serializer.js";
import { Encoding, resolveEncoding } from "../unicode/encoding.js";
import type { UnitWidth } from "../unicode/units.js";

export const USAGE =
  "Usage: arena-json <input.json> [output.json] " +
  "[--encoding <utf8|utf16le|utf16be|utf32le|utf32be>] [--output-encoding <name>] " +
  "[--width <8|16|32>] [--comments] [--trailing-commas] [--non-destructive] " +
  "[--compact] [--spaces <1|2|4|8>] [--verify]";

export class UsageError extends Error {
  override readonly name = "UsageError";

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, UsageError.prototype);
  }
}

export type CliOptions = {
  help: boolean;
  inputPath: string;
  outputPath?: string;
  /** Input encoding; detected when absent. */
  encoding?: Encoding;
  outputEncoding: Encoding;
  width: UnitWidth;
  parseFlags: number;
  serializeFlags: number;
  verify: boolean;
};

const VALUE_FLAGS = new Set(["--input", "--output", "--encoding", "--output-encoding", "--width", "--spaces"]);
const SWITCHES = new Set([
  "--comments",
  "--trailing-commas",
  "--non-destructive",
  "--compact",
  "--verify",
  "--help",
  "-h",
]);

const WIDTHS = new Map<string, UnitWidth>([
  ["8", 1],
  ["16", 2],
  ["32", 4],
]);

const SPACES = new Map<string, number>([
  ["1", SerializeFlags.Indent1],
  ["2", SerializeFlags.Indent2],
  ["4", SerializeFlags.Indent4],
  ["8", SerializeFlags.Indent8],
]);

const encodingOption = (flag: string, value: string): Encoding => {
  const encoding = resolveEncoding(value);
  if (encoding === undefined) {
    throw new UsageError(`Unknown encoding "${value}" for ${flag}`);
  }
  return encoding;
};

export const parseCliArgs = (args: readonly string[]): CliOptions => {
  const consumedArgs = new Set<number>();
  const values = new Map<string, string>();
  const switches = new Set<string>();

  args.forEach((arg, index) => {
    if (consumedArgs.has(index) || !arg.startsWith("-")) {
      return;
    }
    consumedArgs.add(index);
    if (SWITCHES.has(arg)) {
      switches.add(arg);
      return;
    }
    if (!VALUE_FLAGS.has(arg)) {
      throw new UsageError(`Unknown option ${arg}`);
    }
    const value = args[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new UsageError(`Missing value for ${arg}`);
    }
    consumedArgs.add(index + 1);
    values.set(arg, value);
  });

  const positionalArgs = args.filter((_, index) => !consumedArgs.has(index));
  const help = switches.has("--help") || switches.has("-h");
  const inputPath = values.get("--input") ?? positionalArgs[0];
  if (inputPath === undefined) {
    if (help) {
      return {
        help,
        inputPath: "",
        outputEncoding: Encoding.Utf8,
        width: 1,
        parseFlags: ParseFlags.None,
        serializeFlags: SerializeFlags.None,
        verify: false,
      };
    }
    throw new UsageError("Missing input path");
  }

  const widthValue = values.get("--width") ?? "8";
  const width = WIDTHS.get(widthValue);
  if (width === undefined) {
    throw new UsageError(`Invalid --width "${widthValue}"; expected 8, 16 or 32`);
  }

  let parseFlags: number = ParseFlags.None;
  if (switches.has("--comments")) {
    parseFlags |= ParseFlags.Comments;
  }
  if (switches.has("--trailing-commas")) {
    parseFlags |= ParseFlags.TrailingCommas;
  }
  if (switches.has("--non-destructive")) {
    parseFlags |= ParseFlags.NonDestructive;
  }

  let serializeFlags: number = SerializeFlags.None;
  if (switches.has("--compact")) {
    serializeFlags |= SerializeFlags.Compact;
  }
  const spacesValue = values.get("--spaces");
  if (spacesValue !== undefined) {
    const spaces = SPACES.get(spacesValue);
    if (spaces === undefined) {
      throw new UsageError(`Invalid --spaces "${spacesValue}"; expected 1, 2, 4 or 8`);
    }
    serializeFlags |= SerializeFlags.UseSpaces | spaces;
  }

  const verify = switches.has("--verify");
  if (verify && (parseFlags & (ParseFlags.Comments | ParseFlags.TrailingCommas)) !== 0) {
    throw new UsageError("--verify cannot be combined with --comments or --trailing-commas");
  }

  const encodingValue = values.get("--encoding");
  const outputEncodingValue = values.get("--output-encoding");
  return {
    help,
    inputPath,
    outputPath: values.get("--output") ?? positionalArgs[1],
    encoding: encodingValue === undefined ? undefined : encodingOption("--encoding", encodingValue),
    outputEncoding:
      outputEncodingValue === undefined ? Encoding.Utf8 : encodingOption("--output-encoding", outputEncodingValue),
    width,
    parseFlags,
    serializeFlags,
    verify,
  };
};
