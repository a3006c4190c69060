import { createWriteStream, readAll } from "./streams.js";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { finished } from "node:stream/promises";

describe("streams", () => {
  it("createWriteStream writes file content", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "output.txt");
    const content = "Hello Writer";

    const stream = createWriteStream(filePath);
    stream.write(content);
    stream.end();
    await finished(stream);

    const written = await readFile(filePath, "utf8");
    expect(written).toBe(content);
  });

  it("createWriteStream aborts with signal", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "output-abort.txt");

    const controller = new AbortController();
    const stream = createWriteStream(filePath, controller.signal);

    controller.abort();

    await expect(finished(stream)).rejects.toThrow(/aborted/i);
  });

  it("readAll returns the whole file in a buffer of its own", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "large.json");
    const payload = Buffer.alloc(200 * 1024, 0x20);
    payload[0] = 0x5b;
    payload[payload.length - 1] = 0x5d;
    await writeFile(filePath, payload);

    const bytes = await readAll(filePath);
    expect(bytes.byteLength).toBe(payload.length);
    expect(bytes.byteOffset).toBe(0);
    expect(bytes.buffer.byteLength).toBe(payload.length);
    expect(bytes[0]).toBe(0x5b);
    expect(bytes[bytes.length - 1]).toBe(0x5d);
  });

  it("readAll rejects once aborted", async () => {
    const tempDir = await mkdtemp(path.join(tmpdir(), "streams-test-"));
    const filePath = path.join(tempDir, "aborted.json");
    await writeFile(filePath, Buffer.alloc(1024 * 1024));

    const controller = new AbortController();
    controller.abort();

    await expect(readAll(filePath, controller.signal)).rejects.toThrow(/abort/i);
  });
});
