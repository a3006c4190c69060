import { ParseFlags } from "../src/parser/flags.js";
import { SerializeFlags, stringify } from "../src/serializer/serializer.js";
import { JsonDocument } from "../src/tree/document.js";
import type { UnitWidth } from "../src/unicode/units.js";

const RECORDS = 5000;

const generate = (count: number): string => {
  const records: string[] = [];
  for (let i = 0; i < count; i++) {
    records.push(
      JSON.stringify({
        id: i,
        name: `user-${i}`,
        score: i * 0.125,
        active: i % 3 === 0,
        tags: ["alpha", "beta", i % 2 === 0 ? "even" : "odd"],
        note: i % 7 === 0 ? "line\nbreak é" : null,
      })
    );
  }
  return `[${records.join(",")}]`;
};

const measure = (label: string, iterations: number, input: Buffer, width: UnitWidth, flags: number) => {
  const document = new JsonDocument({ width });
  const start = process.hrtime.bigint();
  for (let i = 0; i < iterations; i++) {
    // Destructive parses rewrite their input, so each run gets a fresh copy.
    document.parse(Buffer.from(input), { flags });
    document.clear();
  }
  const end = process.hrtime.bigint();
  const duration = Number(end - start) / 1e9;
  const megabytes = (input.byteLength * iterations) / (1024 * 1024);
  console.log(`${label}: ${(duration / iterations * 1000).toFixed(2)}ms per parse, ${(megabytes / duration).toFixed(1)} MB/s`);
  document.dispose();
};

async function main() {
  console.log("Starting benchmark...");
  const text = generate(RECORDS);
  const utf8 = Buffer.from(text);
  const utf16 = Buffer.from(text, "utf16le");
  const iterations = 20;

  measure("utf8 -> 8-bit, in place", iterations, utf8, 1, ParseFlags.None);
  measure("utf8 -> 8-bit, non-destructive", iterations, utf8, 1, ParseFlags.NonDestructive);
  measure("utf8 -> 16-bit", iterations, utf8, 2, ParseFlags.None);
  measure("utf16 -> 16-bit, in place", iterations, utf16, 2, ParseFlags.None);
  measure("utf16 -> 8-bit", iterations, utf16, 1, ParseFlags.None);

  const document = new JsonDocument();
  document.parse(Buffer.from(utf8));
  const start = process.hrtime.bigint();
  let length = 0;
  for (let i = 0; i < iterations; i++) {
    length = stringify(document, SerializeFlags.Compact).length;
  }
  const duration = Number(process.hrtime.bigint() - start) / 1e9;
  console.log(`stringify: ${(duration / iterations * 1000).toFixed(2)}ms per run, ${length} chars`);
}

main().catch(console.error);
