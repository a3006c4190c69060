export const DEFAULT_STATIC_SIZE = 32 * 1024;
export const DEFAULT_DYNAMIC_SIZE = 32 * 1024;
export const DEFAULT_ALIGNMENT = 8;

export type ArenaSpan = {
  block: ArrayBuffer;
  byteOffset: number;
  byteLength: number;
};

export type ArenaStats = {
  blocks: number;
  heapBlocks: number;
  bytesUsed: number;
  bytesReserved: number;
};

/**
 * Supplies the blocks an {@link Arena} carves allocations from once its
 * static block is exhausted. Returning `null` reports exhaustion.
 */
export interface HeapAllocator {
  allocate(size: number): ArrayBuffer | null;
  free(block: ArrayBuffer): void;
}

export type ArenaOptions = {
  staticSize?: number;
  dynamicSize?: number;
  alignment?: number;
  heap?: HeapAllocator;
};

export const defaultHeap: HeapAllocator = {
  allocate(size: number): ArrayBuffer | null {
    try {
      return new ArrayBuffer(size);
    } catch (error) {
      if (error instanceof RangeError) {
        return null;
      }
      throw error;
    }
  },
  free(): void {
    // Garbage collected.
  },
};

/** Heap that refuses to hand out more than `limit` bytes in total. */
export class LimitedHeap implements HeapAllocator {
  private used = 0;
  private readonly sizes = new Map<ArrayBuffer, number>();

  constructor(private readonly limit: number) {}

  get bytesInUse(): number {
    return this.used;
  }

  allocate(size: number): ArrayBuffer | null {
    if (this.used + size > this.limit) {
      return null;
    }
    const block = new ArrayBuffer(size);
    this.used += size;
    this.sizes.set(block, size);
    return block;
  }

  free(block: ArrayBuffer): void {
    const size = this.sizes.get(block);
    if (size === undefined) {
      throw new Error("Block was not allocated by this heap");
    }
    this.sizes.delete(block);
    this.used -= size;
  }
}

const isPowerOfTwo = (value: number): boolean =>
  Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;

/**
 * Bump allocator owning every byte of one document. Allocations are never
 * freed individually; {@link Arena.release} drops them all and bumps
 * {@link Arena.generation} so stale handles can be detected.
 */
export class Arena {
  readonly staticSize: number;
  readonly dynamicSize: number;
  readonly alignment: number;

  private readonly heap: HeapAllocator;
  private readonly staticBlock: ArrayBuffer;
  private heapBlocks: ArrayBuffer[] = [];
  private current: ArrayBuffer;
  private next = 0;
  private end = 0;
  private used = 0;
  private gen = 0;

  constructor(options: ArenaOptions = {}) {
    const staticSize = options.staticSize ?? DEFAULT_STATIC_SIZE;
    const dynamicSize = options.dynamicSize ?? DEFAULT_DYNAMIC_SIZE;
    const alignment = options.alignment ?? DEFAULT_ALIGNMENT;
    if (!isPowerOfTwo(alignment)) {
      throw new RangeError(`Alignment must be a power of two, got ${alignment}`);
    }
    if (!Number.isInteger(staticSize) || staticSize < 0) {
      throw new RangeError(`Invalid static size ${staticSize}`);
    }
    if (!Number.isInteger(dynamicSize) || dynamicSize <= 0) {
      throw new RangeError(`Invalid dynamic size ${dynamicSize}`);
    }

    this.staticSize = staticSize;
    this.dynamicSize = dynamicSize;
    this.alignment = alignment;
    this.heap = options.heap ?? defaultHeap;
    this.staticBlock = new ArrayBuffer(staticSize);
    this.current = this.staticBlock;
    this.end = staticSize;
  }

  get generation(): number {
    return this.gen;
  }

  allocate(size: number): ArenaSpan | null {
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Invalid allocation size ${size}`);
    }

    const mask = this.alignment - 1;
    let offset = (this.next + mask) & ~mask;
    if (offset + size > this.end) {
      const blockSize = Math.max(this.dynamicSize, size);
      const block = this.heap.allocate(blockSize);
      if (block === null) {
        return null;
      }
      this.heapBlocks.push(block);
      this.current = block;
      this.end = block.byteLength;
      offset = 0;
    }

    this.next = offset + size;
    this.used += size;
    return { block: this.current, byteOffset: offset, byteLength: size };
  }

  release(): void {
    for (const block of this.heapBlocks) {
      this.heap.free(block);
    }
    this.heapBlocks = [];
    this.current = this.staticBlock;
    this.next = 0;
    this.end = this.staticSize;
    this.used = 0;
    this.gen += 1;
  }

  stats(): ArenaStats {
    return {
      blocks: this.heapBlocks.length + (this.staticSize > 0 ? 1 : 0),
      heapBlocks: this.heapBlocks.length,
      bytesUsed: this.used,
      bytesReserved:
        this.staticSize + this.heapBlocks.reduce((total, block) => total + block.byteLength, 0),
    };
  }
}
