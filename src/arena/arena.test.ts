import { describe, expect, it } from "vitest";
import { Arena, LimitedHeap } from "./arena.js";

describe("Arena", () => {
  it("aligns consecutive allocations", () => {
    const arena = new Arena();

    const first = arena.allocate(10);
    const second = arena.allocate(4);

    expect(first).toMatchObject({ byteOffset: 0, byteLength: 10 });
    expect(second).toMatchObject({ byteOffset: 16, byteLength: 4 });
    expect(second?.block).toBe(first?.block);
  });

  it("honours a custom alignment", () => {
    const arena = new Arena({ alignment: 4 });

    arena.allocate(5);

    expect(arena.allocate(1)?.byteOffset).toBe(8);
  });

  it("moves to a heap block once the static block is full", () => {
    const arena = new Arena({ staticSize: 16, dynamicSize: 64 });

    const inStatic = arena.allocate(16);
    const onHeap = arena.allocate(8);

    expect(inStatic?.byteOffset).toBe(0);
    expect(onHeap?.byteOffset).toBe(0);
    expect(onHeap?.block).not.toBe(inStatic?.block);
    expect(onHeap?.block.byteLength).toBe(64);
    expect(arena.stats()).toEqual({
      blocks: 2,
      heapBlocks: 1,
      bytesUsed: 24,
      bytesReserved: 80,
    });
  });

  it("sizes a heap block to fit an oversized request", () => {
    const arena = new Arena({ staticSize: 0, dynamicSize: 64 });

    const span = arena.allocate(100);

    expect(span?.block.byteLength).toBe(100);
  });

  it("returns null when the heap refuses", () => {
    const heap = new LimitedHeap(100);
    const arena = new Arena({ staticSize: 0, dynamicSize: 64, heap });

    expect(arena.allocate(64)).not.toBeNull();
    expect(arena.allocate(8)).toBeNull();
    expect(heap.bytesInUse).toBe(64);
  });

  it("returns heap blocks and bumps the generation on release", () => {
    const heap = new LimitedHeap(1024);
    const arena = new Arena({ staticSize: 8, dynamicSize: 32, heap });
    arena.allocate(8);
    arena.allocate(8);

    arena.release();

    expect(heap.bytesInUse).toBe(0);
    expect(arena.generation).toBe(1);
    expect(arena.allocate(8)?.byteOffset).toBe(0);
    expect(arena.stats().heapBlocks).toBe(0);
  });

  it("rejects invalid configuration", () => {
    expect(() => new Arena({ alignment: 3 })).toThrow("Alignment must be a power of two, got 3");
    expect(() => new Arena({ staticSize: -1 })).toThrow("Invalid static size -1");
    expect(() => new Arena({ dynamicSize: 0 })).toThrow("Invalid dynamic size 0");
    expect(() => new Arena().allocate(-1)).toThrow(RangeError);
  });
});

describe("LimitedHeap", () => {
  it("refuses to free a block it did not hand out", () => {
    const heap = new LimitedHeap(16);

    expect(() => heap.free(new ArrayBuffer(4))).toThrow("Block was not allocated by this heap");
  });
});
