import type { TokenWriter } from "./tokenStream.js";
import { emitTokens } from "./tokenStream.js";
import type { JsonValue } from "../tree/value.js";

export type AnalysisReport = {
  tokens: {
    objects: number;
    arrays: number;
    keys: number;
    strings: number;
    numbers: number;
    booleans: number;
    nulls: number;
  };
  maxDepth: number;
  strings: {
    uniqueCount: number;
    totalCount: number;
    uniqueBytes: number;
    totalBytes: number;
  };
};

export class TreeAnalyzer implements TokenWriter {
  private depth = 0;
  private readonly seen = new Set<string>();
  private readonly report: AnalysisReport = {
    tokens: {
      objects: 0,
      arrays: 0,
      keys: 0,
      strings: 0,
      numbers: 0,
      booleans: 0,
      nulls: 0,
    },
    maxDepth: 0,
    strings: {
      uniqueCount: 0,
      totalCount: 0,
      uniqueBytes: 0,
      totalBytes: 0,
    },
  };

  getReport(): AnalysisReport {
    return this.report;
  }

  private registerString(value: string): void {
    const byteLength = Buffer.byteLength(value, "utf8");
    this.report.strings.totalCount += 1;
    this.report.strings.totalBytes += byteLength;
    if (!this.seen.has(value)) {
      this.seen.add(value);
      this.report.strings.uniqueCount += 1;
      this.report.strings.uniqueBytes += byteLength;
    }
  }

  private open(): void {
    this.depth += 1;
    this.report.maxDepth = Math.max(this.report.maxDepth, this.depth);
  }

  private close(kind: string): void {
    if (this.depth === 0) {
      throw new Error(`Unbalanced ${kind}`);
    }
    this.depth -= 1;
  }

  writeStartObject(): void {
    this.report.tokens.objects += 1;
    this.open();
  }

  writeEndObject(): void {
    this.close("object");
  }

  writeStartArray(): void {
    this.report.tokens.arrays += 1;
    this.open();
  }

  writeEndArray(): void {
    this.close("array");
  }

  writeKey(key: string): void {
    this.report.tokens.keys += 1;
    this.registerString(key);
  }

  writeString(value: string): void {
    this.report.tokens.strings += 1;
    this.registerString(value);
  }

  writeNumber(): void {
    this.report.tokens.numbers += 1;
  }

  writeBoolean(): void {
    this.report.tokens.booleans += 1;
  }

  writeNull(): void {
    this.report.tokens.nulls += 1;
  }
}

export const analyzeValue = (value: JsonValue): AnalysisReport => {
  const analyzer = new TreeAnalyzer();
  emitTokens(value, analyzer);
  return analyzer.getReport();
};
