export { Arena, LimitedHeap, defaultHeap, DEFAULT_ALIGNMENT, DEFAULT_DYNAMIC_SIZE, DEFAULT_STATIC_SIZE } from "./arena/arena.js";
export type { ArenaOptions, ArenaSpan, ArenaStats, HeapAllocator } from "./arena/arena.js";
export { JsonCodecError, ParseAbortedError, ParseError, throwingHandler } from "./errors.js";
export type { ErrorHandler } from "./errors.js";
export { numberToText, textToBoolean, textToNumber } from "./number/numberCodec.js";
export type { NumberText } from "./number/numberCodec.js";
export { ParseFlags } from "./parser/flags.js";
export { SerializeFlags, quoteText, serialize, stringify } from "./serializer/serializer.js";
export { EncodedSink, StreamSink, StringSink } from "./serializer/sinks.js";
export type { OutputSink } from "./serializer/sinks.js";
export { TreeAnalyzer, analyzeValue } from "./tokens/analyzer.js";
export type { AnalysisReport } from "./tokens/analyzer.js";
export {
  TokenRecorder,
  collectReferenceTokens,
  compareTokens,
  describeToken,
  emitTokens,
  readReferenceTokens,
  verifyTree,
} from "./tokens/tokenStream.js";
export type { Token, TokenMismatch, TokenWriter } from "./tokens/tokenStream.js";
export { JsonDocument, NUL_TERMINATED } from "./tree/document.js";
export { DEFAULT_MAX_DEPTH } from "./parser/parser.js";
export type { DocumentOptions, DocumentStats, ParseOptions } from "./tree/document.js";
export { ValueKind } from "./tree/store.js";
export type { TextView } from "./tree/store.js";
export { JsonContainer, JsonValue } from "./tree/value.js";
export { Encoding, detectEncoding, encodingWidth, isSwapped, resolveEncoding } from "./unicode/encoding.js";
export {
  measureTranscoded,
  stringToUnits,
  transcode,
  transcodeToUtf8,
  unitsToBytes,
  unitsToString,
} from "./unicode/transcoder.js";
export type { UnitArray, UnitWidth } from "./unicode/units.js";
