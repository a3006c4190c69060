import { createWriteStream as fsCreateWriteStream } from "node:fs";
import type { WriteStream } from "node:fs";
import { readFile } from "node:fs/promises";

const WRITE_HIGH_WATER_MARK = 16 * 1024;

/** Output stream for serialized bytes; aborting the signal destroys it. */
export const createWriteStream = (path: string, signal?: AbortSignal): WriteStream =>
  fsCreateWriteStream(path, {
    highWaterMark: WRITE_HIGH_WATER_MARK,
    signal,
  });

/**
 * Reads a whole file into one buffer. Parsing needs the complete document in
 * memory, and the buffer doubles as storage for in-place strings.
 */
export const readAll = async (path: string, signal?: AbortSignal): Promise<Uint8Array> => {
  const bytes = await readFile(path, { signal });
  if (bytes.byteOffset === 0 && bytes.buffer.byteLength === bytes.byteLength) {
    return bytes;
  }
  // Pooled slices share their store; unit views need one starting at offset 0.
  const owned = new Uint8Array(bytes.byteLength);
  owned.set(bytes);
  return owned;
};
