import type { Arena, ArenaSpan } from "../arena/arena.js";
import type { Fail } from "../errors.js";
import { allocateUnits, createUnitView, type UnitArray, type UnitWidth } from "../unicode/units.js";

export enum ValueKind {
  Null = 0,
  Bool = 1,
  Number = 2,
  String = 3,
  Array = 4,
  Object = 5,
}

export const NONE = -1;

// Record layout, in 32-bit slots.
export const KIND = 0;
export const OWNER = 1;
export const PREV = 2;
export const NEXT = 3;
export const FIRST_CHILD = 4;
export const LAST_CHILD = 5;
export const CHILD_COUNT = 6;
export const NAME_BUFFER = 7;
export const NAME_START = 8;
export const NAME_END = 9;
export const TEXT_BUFFER = 10;
export const TEXT_START = 11;
export const TEXT_END = 12;

const RECORD_STRIDE = 16;
const PAGE_SHIFT = 6;
const PAGE_RECORDS = 1 << PAGE_SHIFT;
const PAGE_MASK = PAGE_RECORDS - 1;
const PAGE_BYTES = PAGE_RECORDS * RECORD_STRIDE * 4;

export const LITERAL_BUFFER = 0;
export const NULL_START = 0;
export const NULL_END = 4;
export const TRUE_START = 5;
export const TRUE_END = 9;
export const FALSE_START = 10;
export const FALSE_END = 15;
export const EMPTY_POSITION = 15;

const LITERALS = "null\0true\0false\0";

const literalTable = (width: UnitWidth): UnitArray => {
  const units = allocateUnits(width, LITERALS.length);
  for (let index = 0; index < LITERALS.length; index += 1) {
    units[index] = LITERALS.charCodeAt(index);
  }
  return units;
};

/** A range of units in one of the store's registered buffers. */
export type TextView = {
  readonly units: UnitArray;
  readonly start: number;
  readonly end: number;
};

export type UnitAllocation = {
  buffer: number;
  start: number;
  units: UnitArray;
};

export const isContainerKind = (kind: ValueKind): boolean =>
  kind === ValueKind.Array || kind === ValueKind.Object;

/**
 * Fixed-stride value records carved from an {@link Arena}, plus the registry
 * of unit buffers their name and text views point into. Every link between
 * records is a record index, never an object reference.
 */
export class ValueStore {
  readonly buffers: UnitArray[] = [];
  root = NONE;
  private pages: Int32Array[] = [];
  private count = 0;
  private readonly blockIds = new Map<ArrayBuffer, number>();
  private readonly literals: UnitArray;

  constructor(
    readonly arena: Arena,
    readonly width: UnitWidth,
    readonly fail: Fail
  ) {
    this.literals = literalTable(width);
    this.buffers.push(this.literals);
  }

  get records(): number {
    return this.count;
  }

  get generation(): number {
    return this.arena.generation;
  }

  /** Drops every record and buffer. The arena must have been released first. */
  reset(): void {
    this.root = NONE;
    this.pages = [];
    this.count = 0;
    this.buffers.length = 0;
    this.buffers.push(this.literals);
    this.blockIds.clear();
  }

  allocate(byteLength: number): ArenaSpan {
    const span = this.arena.allocate(byteLength);
    if (span === null) {
      return this.fail("Memory allocation failed", 0);
    }
    return span;
  }

  create(kind: ValueKind): number {
    const id = this.count;
    const slot = id & PAGE_MASK;
    if (slot === 0) {
      const span = this.allocate(PAGE_BYTES);
      this.pages.push(new Int32Array(span.block, span.byteOffset, PAGE_RECORDS * RECORD_STRIDE));
    }
    this.count += 1;

    const page = this.page(id);
    const base = slot * RECORD_STRIDE;
    page[base + KIND] = kind;
    page[base + OWNER] = NONE;
    page[base + PREV] = NONE;
    page[base + NEXT] = NONE;
    page[base + FIRST_CHILD] = NONE;
    page[base + LAST_CHILD] = NONE;
    page[base + CHILD_COUNT] = 0;
    page[base + NAME_BUFFER] = LITERAL_BUFFER;
    page[base + NAME_START] = EMPTY_POSITION;
    page[base + NAME_END] = EMPTY_POSITION;
    page[base + TEXT_BUFFER] = LITERAL_BUFFER;
    page[base + TEXT_START] = EMPTY_POSITION;
    page[base + TEXT_END] = EMPTY_POSITION;
    return id;
  }

  private page(id: number): Int32Array {
    const page = this.pages[id >> PAGE_SHIFT];
    if (page === undefined || id < 0 || id >= this.count) {
      throw new RangeError(`Unknown value record ${id}`);
    }
    return page;
  }

  get(id: number, field: number): number {
    return this.page(id)[(id & PAGE_MASK) * RECORD_STRIDE + field] ?? NONE;
  }

  set(id: number, field: number, value: number): void {
    this.page(id)[(id & PAGE_MASK) * RECORD_STRIDE + field] = value;
  }

  kind(id: number): ValueKind {
    switch (this.get(id, KIND)) {
      case ValueKind.Null:
        return ValueKind.Null;
      case ValueKind.Bool:
        return ValueKind.Bool;
      case ValueKind.Number:
        return ValueKind.Number;
      case ValueKind.String:
        return ValueKind.String;
      case ValueKind.Array:
        return ValueKind.Array;
      case ValueKind.Object:
        return ValueKind.Object;
      default:
        throw new RangeError(`Corrupt value record ${id}`);
    }
  }

  setText(id: number, buffer: number, start: number, end: number): void {
    this.set(id, TEXT_BUFFER, buffer);
    this.set(id, TEXT_START, start);
    this.set(id, TEXT_END, end);
  }

  setName(id: number, buffer: number, start: number, end: number): void {
    this.set(id, NAME_BUFFER, buffer);
    this.set(id, NAME_START, start);
    this.set(id, NAME_END, end);
  }

  clearName(id: number): void {
    this.setName(id, LITERAL_BUFFER, EMPTY_POSITION, EMPTY_POSITION);
  }

  text(id: number): TextView {
    return this.view(this.get(id, TEXT_BUFFER), this.get(id, TEXT_START), this.get(id, TEXT_END));
  }

  name(id: number): TextView {
    return this.view(this.get(id, NAME_BUFFER), this.get(id, NAME_START), this.get(id, NAME_END));
  }

  private view(buffer: number, start: number, end: number): TextView {
    const units = this.buffers[buffer];
    if (units === undefined) {
      throw new RangeError(`Unknown text buffer ${buffer}`);
    }
    return { units, start, end };
  }

  registerBuffer(units: UnitArray): number {
    this.buffers.push(units);
    return this.buffers.length - 1;
  }

  /** Reserves `length` units of the store's width inside the arena. */
  allocateUnits(length: number): UnitAllocation {
    const span = this.allocate(length * this.width);
    let buffer = this.blockIds.get(span.block);
    if (buffer === undefined) {
      buffer = this.registerBuffer(
        createUnitView(this.width, span.block, 0, Math.floor(span.block.byteLength / this.width))
      );
      this.blockIds.set(span.block, buffer);
    }
    const units = this.buffers[buffer] ?? this.literals;
    return { buffer, start: span.byteOffset / this.width, units };
  }

  /** Copies `source` into the arena and returns where it landed. */
  storeUnits(source: ArrayLike<number>, terminate: boolean): UnitAllocation {
    const allocation = this.allocateUnits(source.length + (terminate ? 1 : 0));
    for (let index = 0; index < source.length; index += 1) {
      allocation.units[allocation.start + index] = source[index] ?? 0;
    }
    if (terminate) {
      allocation.units[allocation.start + source.length] = 0;
    }
    return allocation;
  }

  // Child list bookkeeping.

  appendChild(parent: number, child: number): void {
    const last = this.get(parent, LAST_CHILD);
    this.set(child, OWNER, parent);
    this.set(child, PREV, last);
    this.set(child, NEXT, NONE);
    if (last === NONE) {
      this.set(parent, FIRST_CHILD, child);
    } else {
      this.set(last, NEXT, child);
    }
    this.set(parent, LAST_CHILD, child);
    this.set(parent, CHILD_COUNT, this.get(parent, CHILD_COUNT) + 1);
  }

  insertBefore(parent: number, child: number, before: number): void {
    if (before === NONE) {
      this.appendChild(parent, child);
      return;
    }
    const prev = this.get(before, PREV);
    this.set(child, OWNER, parent);
    this.set(child, PREV, prev);
    this.set(child, NEXT, before);
    this.set(before, PREV, child);
    if (prev === NONE) {
      this.set(parent, FIRST_CHILD, child);
    } else {
      this.set(prev, NEXT, child);
    }
    this.set(parent, CHILD_COUNT, this.get(parent, CHILD_COUNT) + 1);
  }

  detach(child: number): void {
    const parent = this.get(child, OWNER);
    if (parent === NONE) {
      return;
    }
    const prev = this.get(child, PREV);
    const next = this.get(child, NEXT);
    if (prev === NONE) {
      this.set(parent, FIRST_CHILD, next);
    } else {
      this.set(prev, NEXT, next);
    }
    if (next === NONE) {
      this.set(parent, LAST_CHILD, prev);
    } else {
      this.set(next, PREV, prev);
    }
    this.set(parent, CHILD_COUNT, this.get(parent, CHILD_COUNT) - 1);
    this.set(child, OWNER, NONE);
    this.set(child, PREV, NONE);
    this.set(child, NEXT, NONE);
  }

  /** Puts `replacement` where `current` is and detaches `current`. */
  replace(current: number, replacement: number): void {
    const parent = this.get(current, OWNER);
    const next = this.get(current, NEXT);
    this.detach(current);
    this.insertBefore(parent, replacement, next);
  }

  detachAll(parent: number): void {
    let child = this.get(parent, FIRST_CHILD);
    while (child !== NONE) {
      const next = this.get(child, NEXT);
      this.set(child, OWNER, NONE);
      this.set(child, PREV, NONE);
      this.set(child, NEXT, NONE);
      child = next;
    }
    this.set(parent, FIRST_CHILD, NONE);
    this.set(parent, LAST_CHILD, NONE);
    this.set(parent, CHILD_COUNT, 0);
  }

  childAt(parent: number, index: number): number {
    const count = this.get(parent, CHILD_COUNT);
    if (index < 0 || index >= count) {
      return NONE;
    }
    if (index < count / 2) {
      let child = this.get(parent, FIRST_CHILD);
      for (let step = 0; step < index; step += 1) {
        child = this.get(child, NEXT);
      }
      return child;
    }
    let child = this.get(parent, LAST_CHILD);
    for (let step = count - 1; step > index; step -= 1) {
      child = this.get(child, PREV);
    }
    return child;
  }
}
