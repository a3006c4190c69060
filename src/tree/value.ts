import { textToBoolean, textToNumber } from "../number/numberCodec.js";
import { stringToUnits, unitsToString } from "../unicode/transcoder.js";
import type { UnitArray } from "../unicode/units.js";
import {
  CHILD_COUNT,
  FIRST_CHILD,
  LAST_CHILD,
  NAME_BUFFER,
  NAME_END,
  NAME_START,
  NEXT,
  NONE,
  OWNER,
  PREV,
  ValueKind,
  isContainerKind,
  type TextView,
  type ValueStore,
} from "./store.js";

const sameUnits = (view: TextView, units: UnitArray): boolean => {
  if (view.end - view.start !== units.length) {
    return false;
  }
  for (let index = 0; index < units.length; index += 1) {
    if (view.units[view.start + index] !== units[index]) {
      return false;
    }
  }
  return true;
};

/**
 * Handle to one value record. Handles are cheap and compare by
 * {@link JsonValue.equals}, not identity. Any access after the owning
 * document is cleared or disposed throws.
 */
export class JsonValue {
  constructor(
    protected readonly store: ValueStore,
    readonly id: number,
    private readonly generation: number
  ) {}

  protected get live(): ValueStore {
    if (this.store.generation !== this.generation) {
      throw new Error("Stale value handle");
    }
    return this.store;
  }

  get kind(): ValueKind {
    return this.live.kind(this.id);
  }

  isNull(): boolean {
    return this.kind === ValueKind.Null;
  }

  isBool(): boolean {
    return this.kind === ValueKind.Bool;
  }

  isNumber(): boolean {
    return this.kind === ValueKind.Number;
  }

  isString(): boolean {
    return this.kind === ValueKind.String;
  }

  isArray(): boolean {
    return this.kind === ValueKind.Array;
  }

  isObject(): boolean {
    return this.kind === ValueKind.Object;
  }

  isContainer(): boolean {
    return isContainerKind(this.kind);
  }

  /** Member name; empty for array elements, the root and detached values. */
  get name(): TextView {
    return this.live.name(this.id);
  }

  nameString(): string {
    const { units, start, end } = this.name;
    return unitsToString(units, start, end);
  }

  /** Literal text of a scalar, or the decoded content of a string. Empty for containers. */
  get text(): TextView {
    return this.live.text(this.id);
  }

  asString(): string {
    const { units, start, end } = this.text;
    return unitsToString(units, start, end);
  }

  asNumber(): number {
    const { units, start, end } = this.text;
    return textToNumber(units, start, end);
  }

  asBoolean(): boolean {
    const { units, start, end } = this.text;
    return textToBoolean(units, start, end);
  }

  get owner(): JsonContainer | null {
    const owner = this.live.get(this.id, OWNER);
    return owner === NONE ? null : wrapContainer(this.store, owner);
  }

  get next(): JsonValue | null {
    return this.link(NEXT);
  }

  get prev(): JsonValue | null {
    return this.link(PREV);
  }

  asContainer(): JsonContainer | null {
    return this instanceof JsonContainer ? this : null;
  }

  equals(other: JsonValue): boolean {
    return other.store === this.store && other.id === this.id && other.generation === this.generation;
  }

  protected link(field: number): JsonValue | null {
    const id = this.live.get(this.id, field);
    return id === NONE ? null : wrapValue(this.store, id);
  }

  /** @internal */
  ownedBy(store: ValueStore): boolean {
    return this.store === store && this.generation === store.generation;
  }
}

/** An Array or Object. Array operations on an Object (and the reverse) throw TypeError. */
export class JsonContainer extends JsonValue {
  get firstChild(): JsonValue | null {
    return this.link(FIRST_CHILD);
  }

  get lastChild(): JsonValue | null {
    return this.link(LAST_CHILD);
  }

  get childCount(): number {
    return this.live.get(this.id, CHILD_COUNT);
  }

  *children(): IterableIterator<JsonValue> {
    const store = this.live;
    let child = store.get(this.id, FIRST_CHILD);
    while (child !== NONE) {
      const next = store.get(child, NEXT);
      yield wrapValue(store, child);
      child = next;
    }
  }

  /** Child at `index`; negative indices count from the end. */
  at(index: number): JsonValue | null {
    const count = this.childCount;
    const child = this.live.childAt(this.id, index < 0 ? count + index : index);
    return child === NONE ? null : wrapValue(this.store, child);
  }

  /** First member named `name`, compared unit by unit. */
  get(name: string): JsonValue | null {
    const child = this.findMember(stringToUnits(name, this.live.width));
    return child === NONE ? null : wrapValue(this.store, child);
  }

  arrayAdd(value: JsonValue): void {
    const store = this.requireKind(ValueKind.Array);
    this.adopt(value);
    store.clearName(value.id);
    store.appendChild(this.id, value.id);
  }

  /** Inserts before `index`. Negative indices count from the end, so -1 appends; out-of-range indices clamp. */
  arrayInsert(value: JsonValue, index: number): void {
    const store = this.requireKind(ValueKind.Array);
    this.adopt(value);
    const count = this.childCount;
    const position = Math.min(Math.max(index < 0 ? count + 1 + index : index, 0), count);
    store.clearName(value.id);
    store.insertBefore(this.id, value.id, store.childAt(this.id, position));
  }

  /**
   * Detaches and returns the element at `index`. Negative indices count from
   * the end and out-of-range indices clamp to the first or last element; an
   * empty array gives null.
   */
  arrayRemove(index: number): JsonValue | null {
    const store = this.requireKind(ValueKind.Array);
    const count = this.childCount;
    if (count === 0) {
      return null;
    }
    const position = Math.min(Math.max(index < 0 ? count + index : index, 0), count - 1);
    const child = store.childAt(this.id, position);
    store.detach(child);
    return wrapValue(store, child);
  }

  /**
   * Replaces the element at `index` and returns the detached previous one.
   * `index === childCount` appends and returns null.
   */
  arraySet(index: number, value: JsonValue): JsonValue | null {
    const store = this.requireKind(ValueKind.Array);
    const count = this.childCount;
    const position = index < 0 ? count + index : index;
    if (position < 0 || position > count) {
      throw new RangeError(`Array index ${index} out of range (length ${count})`);
    }
    this.adopt(value);
    store.clearName(value.id);
    if (position === count) {
      store.appendChild(this.id, value.id);
      return null;
    }
    const current = store.childAt(this.id, position);
    store.replace(current, value.id);
    return wrapValue(store, current);
  }

  /**
   * Sets member `name`, copying the name into the document. An existing
   * member of that name is replaced in place and returned detached.
   */
  objectSet(name: string, value: JsonValue): JsonValue | null {
    const store = this.requireKind(ValueKind.Object);
    if (name.length === 0) {
      throw new RangeError("Member name must not be empty");
    }
    this.adopt(value);
    const units = stringToUnits(name, store.width);
    const current = this.findMember(units);
    if (current !== NONE) {
      store.setName(
        value.id,
        store.get(current, NAME_BUFFER),
        store.get(current, NAME_START),
        store.get(current, NAME_END)
      );
      store.replace(current, value.id);
      return wrapValue(store, current);
    }
    const allocation = store.storeUnits(units, true);
    store.setName(value.id, allocation.buffer, allocation.start, allocation.start + units.length);
    store.appendChild(this.id, value.id);
    return null;
  }

  /** Detaches and returns member `name`; an empty name matches nothing. */
  objectRemove(name: string): JsonValue | null {
    const store = this.requireKind(ValueKind.Object);
    const child = name.length === 0 ? NONE : this.findMember(stringToUnits(name, store.width));
    if (child === NONE) {
      return null;
    }
    store.detach(child);
    return wrapValue(store, child);
  }

  removeAll(): void {
    this.live.detachAll(this.id);
  }

  private findMember(units: UnitArray): number {
    const store = this.live;
    let child = store.get(this.id, FIRST_CHILD);
    while (child !== NONE) {
      if (sameUnits(store.name(child), units)) {
        return child;
      }
      child = store.get(child, NEXT);
    }
    return NONE;
  }

  private requireKind(kind: ValueKind): ValueStore {
    const store = this.live;
    if (store.kind(this.id) !== kind) {
      throw new TypeError(kind === ValueKind.Array ? "Value is not an array" : "Value is not an object");
    }
    return store;
  }

  private adopt(value: JsonValue): void {
    const store = this.live;
    if (!value.ownedBy(store)) {
      throw new TypeError("Value belongs to another document");
    }
    if (store.get(value.id, OWNER) !== NONE) {
      throw new TypeError("Value already has an owner");
    }
    if (value.id === store.root) {
      throw new TypeError("Cannot attach the document root");
    }
    for (let ancestor = this.id; ancestor !== NONE; ancestor = store.get(ancestor, OWNER)) {
      if (ancestor === value.id) {
        throw new TypeError("Cannot attach a container inside itself");
      }
    }
  }
}

export const wrapValue = (store: ValueStore, id: number): JsonValue =>
  isContainerKind(store.kind(id))
    ? new JsonContainer(store, id, store.generation)
    : new JsonValue(store, id, store.generation);

export const wrapContainer = (store: ValueStore, id: number): JsonContainer => {
  const value = wrapValue(store, id);
  if (!(value instanceof JsonContainer)) {
    throw new TypeError(`Value ${id} is not a container`);
  }
  return value;
};
