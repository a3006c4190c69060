export type UnitWidth = 1 | 2 | 4;
export type UnitArray = Uint8Array | Uint16Array | Uint32Array;

export const isUnitWidth = (value: number): value is UnitWidth =>
  value === 1 || value === 2 || value === 4;

export const createUnitView = (
  width: UnitWidth,
  buffer: ArrayBufferLike,
  byteOffset: number,
  length: number
): UnitArray => {
  switch (width) {
    case 1:
      return new Uint8Array(buffer, byteOffset, length);
    case 2:
      return new Uint16Array(buffer, byteOffset, length);
    case 4:
      return new Uint32Array(buffer, byteOffset, length);
  }
};

export const allocateUnits = (width: UnitWidth, length: number): UnitArray => {
  switch (width) {
    case 1:
      return new Uint8Array(length);
    case 2:
      return new Uint16Array(length);
    case 4:
      return new Uint32Array(length);
  }
};

export const swap16 = (unit: number): number => ((unit & 0xff) << 8) | (unit >>> 8);

export const swap32 = (unit: number): number =>
  (((unit & 0xff) << 24) | ((unit & 0xff00) << 8) | ((unit >>> 8) & 0xff00) | (unit >>> 24)) >>> 0;

/**
 * Reads code units in host order. Reads past the end of the view yield 0,
 * which the parser treats like a terminator.
 */
export interface UnitSource {
  readonly width: UnitWidth;
  readonly units: UnitArray;
  readonly swapped: boolean;
  at(index: number): number;
}

class NativeSource implements UnitSource {
  readonly swapped = false;

  constructor(
    readonly width: UnitWidth,
    readonly units: UnitArray
  ) {}

  at(index: number): number {
    return this.units[index] ?? 0;
  }
}

class Swapped16Source implements UnitSource {
  readonly width = 2;
  readonly swapped = true;

  constructor(readonly units: UnitArray) {}

  at(index: number): number {
    return swap16(this.units[index] ?? 0);
  }
}

class Swapped32Source implements UnitSource {
  readonly width = 4;
  readonly swapped = true;

  constructor(readonly units: UnitArray) {}

  at(index: number): number {
    return swap32(this.units[index] ?? 0);
  }
}

export const createUnitSource = (width: UnitWidth, units: UnitArray, swapped: boolean): UnitSource => {
  if (!swapped || width === 1) {
    return new NativeSource(width, units);
  }
  return width === 2 ? new Swapped16Source(units) : new Swapped32Source(units);
};
