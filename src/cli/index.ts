#!/usr/bin/env node
import { finished } from "node:stream/promises";
import { createWriteStream, readAll } from "../io/streams.js";
import { ParseError } from "../errors.js";
import { SerializeFlags, serialize } from "../serializer/serializer.js";
import { EncodedSink, StreamSink } from "../serializer/sinks.js";
import { analyzeValue } from "../tokens/analyzer.js";
import { describeToken, verifyTree } from "../tokens/tokenStream.js";
import { JsonDocument } from "../tree/document.js";
import { detectEncoding } from "../unicode/encoding.js";
import { transcodeToUtf8 } from "../unicode/transcoder.js";
import { USAGE, UsageError, parseCliArgs, type CliOptions } from "./options.js";

const readOptions = (): CliOptions | undefined => {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(error.message);
      console.error(USAGE);
      process.exitCode = 1;
      return undefined;
    }
    throw error;
  }
};

const options = readOptions();

const writeOutput = async (document: JsonDocument, cli: CliOptions, outputPath: string): Promise<number> => {
  const outputStream = createWriteStream(outputPath);
  const sink = new StreamSink(outputStream, cli.outputEncoding);
  serialize(document, sink, cli.serializeFlags);
  try {
    await sink.flush();
    outputStream.end();
    await finished(outputStream);
  } catch (error) {
    outputStream.destroy();
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to write output file "${outputPath}": ${reason}`);
  }
  return sink.byteLength;
};

const run = async (cli: CliOptions): Promise<void> => {
  const document = new JsonDocument({ width: cli.width });
  try {
    let bytes: Uint8Array;
    try {
      bytes = await readAll(cli.inputPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to read input file "${cli.inputPath}": ${reason}`);
    }

    const encoding = cli.encoding ?? detectEncoding(bytes);
    // Parsing rewrites the buffer, so keep a pristine copy to verify against.
    const original = cli.verify ? bytes.slice() : undefined;

    const started = process.hrtime.bigint();
    const root = document.parse(bytes, { flags: cli.parseFlags, encoding: cli.encoding });
    const parseMs = Number(process.hrtime.bigint() - started) / 1e6;

    const reference =
      original !== undefined && encoding !== undefined ? transcodeToUtf8(original, encoding) : undefined;
    if (reference !== undefined) {
      const mismatch = await verifyTree(root, reference);
      if (mismatch !== null) {
        console.error(
          `Verification failed at token ${mismatch.index}: ` +
            `expected ${describeToken(mismatch.expected)}, got ${describeToken(mismatch.actual)}`
        );
        process.exitCode = 1;
        return;
      }
    }

    if (cli.outputPath === undefined) {
      const sink = new EncodedSink(cli.outputEncoding);
      serialize(document, sink, cli.serializeFlags);
      process.stdout.write(sink.toBuffer());
      return;
    }

    console.log(`Input JSON: ${cli.inputPath}`);
    console.log(`Output JSON: ${cli.outputPath}`);
    const written = await writeOutput(document, cli, cli.outputPath);

    const report = analyzeValue(root);
    const stats = document.stats();
    console.log("Success: output written.");
    console.log("Analysis Report:");
    console.log("  Input:");
    console.log(`    Encoding: ${encoding ?? "unknown"}`);
    console.log(`    Bytes:    ${bytes.byteLength}`);
    console.log(`    Parse:    ${parseMs.toFixed(3)} ms`);
    console.log(`    Verified: ${reference !== undefined ? "yes" : "no"}`);
    console.log("  Tokens:");
    console.log(`    Objects:   ${report.tokens.objects}`);
    console.log(`    Arrays:    ${report.tokens.arrays}`);
    console.log(`    Keys:      ${report.tokens.keys}`);
    console.log(`    Strings:   ${report.tokens.strings}`);
    console.log(`    Numbers:   ${report.tokens.numbers}`);
    console.log(`    Booleans:  ${report.tokens.booleans}`);
    console.log(`    Nulls:     ${report.tokens.nulls}`);
    console.log(`    Max Depth: ${report.maxDepth}`);
    console.log("  Strings:");
    console.log(`    Unique Strings: ${report.strings.uniqueCount}`);
    console.log(`    Total Strings:  ${report.strings.totalCount}`);
    console.log(`    Unique Bytes:   ${report.strings.uniqueBytes}`);
    console.log(`    Total Bytes:    ${report.strings.totalBytes}`);
    console.log("  Arena:");
    console.log(`    Values:   ${stats.values}`);
    console.log(`    Blocks:   ${stats.blocks} (${stats.heapBlocks} from heap)`);
    console.log(`    Used:     ${stats.bytesUsed} bytes`);
    console.log(`    Reserved: ${stats.bytesReserved} bytes`);
    console.log(`  Output Bytes: ${written}`);
    if ((cli.serializeFlags & SerializeFlags.Compact) !== 0 && bytes.byteLength > 0) {
      const ratio = (written / bytes.byteLength) * 100;
      console.log(`  Compacted To: ${ratio.toFixed(2)}% of input`);
    }
  } catch (error) {
    const message =
      error instanceof ParseError ? error.toString() : error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
  } finally {
    document.dispose();
  }
};

if (options?.help) {
  console.log(USAGE);
} else if (options) {
  void run(options);
}
