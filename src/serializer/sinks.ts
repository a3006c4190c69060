import { once } from "node:events";
import type { Writable } from "node:stream";
import { Encoding, HOST_LITTLE_ENDIAN, encodingWidth, isSwapped } from "../unicode/encoding.js";

const DEFAULT_BUFFER_SIZE = 64 * 1024;

/** Receives serializer output. Chunks are always plain ASCII. */
export interface OutputSink {
  append(chunk: string): void;
}

export class StringSink implements OutputSink {
  private readonly parts: string[] = [];

  append(chunk: string): void {
    this.parts.push(chunk);
  }

  toString(): string {
    return this.parts.join("");
  }
}

const encodeAscii = (chunk: string, encoding: Encoding): Buffer => {
  const width = encodingWidth(encoding);
  if (width === 1) {
    return Buffer.from(chunk, "latin1");
  }
  const littleEndian = HOST_LITTLE_ENDIAN !== isSwapped(encoding);
  const bytes = Buffer.alloc(chunk.length * width);
  for (let index = 0; index < chunk.length; index += 1) {
    const code = chunk.charCodeAt(index);
    if (width === 2) {
      if (littleEndian) {
        bytes.writeUInt16LE(code, index * 2);
      } else {
        bytes.writeUInt16BE(code, index * 2);
      }
    } else if (littleEndian) {
      bytes.writeUInt32LE(code, index * 4);
    } else {
      bytes.writeUInt32BE(code, index * 4);
    }
  }
  return bytes;
};

/** Collects output as bytes in any supported encoding. */
export class EncodedSink implements OutputSink {
  private readonly chunks: Buffer[] = [];

  constructor(readonly encoding: Encoding = Encoding.Utf8) {}

  append(chunk: string): void {
    this.chunks.push(encodeAscii(chunk, this.encoding));
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}

/**
 * Buffers output into fixed-size chunks for a Node stream. Once the stream
 * reports backpressure, filled chunks are held back until {@link StreamSink.flush},
 * which hands them over as the stream drains.
 */
export class StreamSink implements OutputSink {
  private buffer: Buffer;
  private offset = 0;
  private bytesWritten = 0;
  private readonly pending: Buffer[] = [];

  constructor(
    private readonly stream: Writable,
    readonly encoding: Encoding = Encoding.Utf8,
    private readonly size = DEFAULT_BUFFER_SIZE
  ) {
    this.buffer = Buffer.allocUnsafe(this.size);
  }

  get byteLength(): number {
    return this.bytesWritten + this.offset;
  }

  /** Bytes filled but not yet handed to the stream. */
  get pendingLength(): number {
    return this.pending.reduce((total, chunk) => total + chunk.length, this.offset);
  }

  append(chunk: string): void {
    let remaining = encodeAscii(chunk, this.encoding);
    while (remaining.length > 0) {
      const available = this.size - this.offset;
      if (remaining.length <= available) {
        remaining.copy(this.buffer, this.offset);
        this.offset += remaining.length;
        return;
      }
      remaining.copy(this.buffer, this.offset, 0, available);
      this.offset += available;
      remaining = remaining.subarray(available);
      this.writeBuffer();
    }
  }

  async flush(): Promise<void> {
    this.writeBuffer();
    for (;;) {
      if (this.stream.writableNeedDrain) {
        await once(this.stream, "drain");
      }
      const next = this.pending.shift();
      if (next === undefined) {
        return;
      }
      this.stream.write(next);
    }
  }

  private writeBuffer(): void {
    if (this.offset === 0) {
      return;
    }
    // The stream keeps a reference to what it is given, so hand over the
    // filled buffer and start a fresh one.
    const slice = this.buffer.subarray(0, this.offset);
    this.bytesWritten += this.offset;
    this.buffer = Buffer.allocUnsafe(this.size);
    this.offset = 0;
    if (this.pending.length > 0 || this.stream.writableNeedDrain) {
      this.pending.push(slice);
      return;
    }
    this.stream.write(slice);
  }
}
