import { fitsInt64, fitsUint64, isExtensionType } from "./types";
import type { ExtensionType } from "./types";

/**
 * Common base of every value node, so that values can be told apart from
 * arbitrary host objects.
 */
export abstract class ValueNode {
  abstract readonly kind: string;
}

export class NilValue extends ValueNode {
  readonly kind = "nil" as const;
}

/** The nil value. */
export const NIL = new NilValue();

export class BoolValue extends ValueNode {
  readonly kind = "bool" as const;

  constructor(readonly value: boolean) {
    super();
  }
}

/**
 * Converts a bigint to a number, warning when precision may be lost.
 */
function bigintToNumber(value: bigint, family: string, warnOnPrecisionLoss: boolean): number {
  if (
    warnOnPrecisionLoss &&
    (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER))
  ) {
    console.warn(
      `packwire: ${family} value ${value} exceeds safe integer range (${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), precision may be lost. Use .value for full precision.`
    );
  }
  return Number(value);
}

/**
 * Signed 64-bit integer.
 */
export class IntValue extends ValueNode {
  readonly kind = "int" as const;
  readonly value: bigint;

  constructor(value: bigint | number) {
    super();
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new RangeError(`Not a safe integer: ${value}`);
    }
    const v = BigInt(value);
    if (!fitsInt64(v)) {
      throw new RangeError(`Value ${v} out of int64 range`);
    }
    this.value = v;
  }

  /**
   * Returns the value as a number.
   */
  toNumber(warnOnPrecisionLoss = true): number {
    return bigintToNumber(this.value, "int64", warnOnPrecisionLoss);
  }
}

/**
 * Unsigned 64-bit integer.
 */
export class UintValue extends ValueNode {
  readonly kind = "uint" as const;
  readonly value: bigint;

  constructor(value: bigint | number) {
    super();
    if (typeof value === "number" && !Number.isSafeInteger(value)) {
      throw new RangeError(`Not a safe integer: ${value}`);
    }
    const v = BigInt(value);
    if (!fitsUint64(v)) {
      throw new RangeError(`Value ${v} out of uint64 range`);
    }
    this.value = v;
  }

  /**
   * Returns the value as a number.
   */
  toNumber(warnOnPrecisionLoss = true): number {
    return bigintToNumber(this.value, "uint64", warnOnPrecisionLoss);
  }
}

/**
 * Single-precision float. The value is rounded to float32 on construction.
 */
export class Float32Value extends ValueNode {
  readonly kind = "float32" as const;
  readonly value: number;

  constructor(value: number) {
    super();
    this.value = Math.fround(value);
  }
}

export class Float64Value extends ValueNode {
  readonly kind = "float64" as const;

  constructor(readonly value: number) {
    super();
  }
}

const textEncoder = new TextEncoder();
// Invalid UTF-8 decodes to U+FFFD; a leading BOM is kept.
const textDecoder = new TextDecoder("utf-8", { ignoreBOM: true });

// Decoded strings, built on first use.
const strTexts = new WeakMap<StrValue, string>();

/**
 * Text. Holds the UTF-8 bytes as read or given; they are not validated, and
 * re-encode unchanged. The string form is decoded from them on demand.
 */
export class StrValue extends ValueNode {
  readonly kind = "str" as const;
  readonly bytes: Uint8Array;

  constructor(value: string | Uint8Array) {
    super();
    if (typeof value === "string") {
      this.bytes = textEncoder.encode(value);
      strTexts.set(this, value);
    } else {
      this.bytes = value;
    }
  }

  /**
   * The text as a string. Invalid UTF-8 sequences read as U+FFFD.
   */
  get value(): string {
    let text = strTexts.get(this);
    if (text === undefined) {
      text = textDecoder.decode(this.bytes);
      strTexts.set(this, text);
    }
    return text;
  }
}

export class BinValue extends ValueNode {
  readonly kind = "bin" as const;

  constructor(readonly value: Uint8Array) {
    super();
  }
}

export class ArrayValue extends ValueNode {
  readonly kind = "array" as const;

  constructor(readonly items: readonly Value[]) {
    super();
  }

  get length(): number {
    return this.items.length;
  }
}

/**
 * A map entry.
 */
export type MapEntry = readonly [Value, Value];

/**
 * Ordered map. Lookups use key identity (see {@link keyIdentity}); entries
 * are kept in the order given.
 */
export class MapValue extends ValueNode {
  readonly kind = "map" as const;

  readonly entries: readonly MapEntry[];

  constructor(entries: readonly MapEntry[]) {
    super();
    this.entries = [...entries];
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Returns the value stored under a key, or undefined.
   */
  get(key: Value): Value | undefined {
    const id = keyIdentity(key);
    if (id === null) {
      return undefined;
    }
    return this.lookup().get(id);
  }

  /**
   * Returns the value stored under a string key, or undefined.
   */
  getStr(key: string): Value | undefined {
    return this.get(new StrValue(key));
  }

  has(key: Value): boolean {
    return this.get(key) !== undefined;
  }

  private lookup(): Map<string, Value> {
    let index = mapIndexes.get(this);
    if (index === undefined) {
      index = new Map<string, Value>();
      for (const [k, v] of this.entries) {
        const id = keyIdentity(k);
        if (id !== null && !index.has(id)) {
          index.set(id, v);
        }
      }
      mapIndexes.set(this, index);
    }
    return index;
  }
}

// Lookup indexes, built on first use. Kept off the instance so that
// structurally equal maps compare equal.
const mapIndexes = new WeakMap<MapValue, Map<string, Value>>();

/**
 * Extension block with no resolver.
 */
export class ExtValue extends ValueNode {
  readonly kind = "ext" as const;

  constructor(
    readonly type: ExtensionType,
    readonly data: Uint8Array
  ) {
    super();
    if (!isExtensionType(type)) {
      throw new RangeError(`Extension type ${type} out of range -128..127`);
    }
  }
}

// Key identities supplied by resolvers. Kept off the instance like the
// map indexes above.
const resolvedIdentities = new WeakMap<ResolvedValue, string>();

/**
 * Extension block decoded into a host value. Re-encodes as its type and
 * raw payload.
 *
 * A resolver may pass an identity so that payloads encoding the same host
 * value (a timestamp in its 32 and 96-bit forms, say) are the same map key.
 * Without one, the payload bytes identify the key.
 */
export class ResolvedValue<T = unknown> extends ValueNode {
  readonly kind = "resolved" as const;

  constructor(
    readonly type: ExtensionType,
    readonly data: Uint8Array,
    readonly value: T,
    identity?: string
  ) {
    super();
    if (!isExtensionType(type)) {
      throw new RangeError(`Extension type ${type} out of range -128..127`);
    }
    if (identity !== undefined) {
      resolvedIdentities.set(this, `v:${identity}`);
    }
  }

  /**
   * The identity this value has as a map key within its extension type.
   */
  get identity(): string {
    return resolvedIdentities.get(this) ?? `b:${toHex(this.data)}`;
  }
}

/**
 * A value in the data model.
 */
export type Value =
  | NilValue
  | BoolValue
  | IntValue
  | UintValue
  | Float32Value
  | Float64Value
  | StrValue
  | BinValue
  | ArrayValue
  | MapValue
  | ExtValue
  | ResolvedValue;

export type ValueKind = Value["kind"];

/**
 * Returns true if the argument is a value node.
 */
export function isValue(obj: unknown): obj is Value {
  return (
    obj instanceof NilValue ||
    obj instanceof BoolValue ||
    obj instanceof IntValue ||
    obj instanceof UintValue ||
    obj instanceof Float32Value ||
    obj instanceof Float64Value ||
    obj instanceof StrValue ||
    obj instanceof BinValue ||
    obj instanceof ArrayValue ||
    obj instanceof MapValue ||
    obj instanceof ExtValue ||
    obj instanceof ResolvedValue
  );
}

function toHex(data: Uint8Array): string {
  let out = "";
  for (const b of data) {
    out += b.toString(16).padStart(2, "0");
  }
  return out;
}

function floatIdentity(prefix: string, value: number): string | null {
  if (Number.isNaN(value)) {
    return null;
  }
  // +0 and -0 are the same key
  return `${prefix}:${value === 0 ? 0 : value}`;
}

/**
 * Returns the identity string two equal map keys share, or null if the value
 * cannot act as a key (bin, array, map, unresolved extension, NaN).
 */
export function keyIdentity(value: Value): string | null {
  switch (value.kind) {
    case "nil":
      return "nil";
    case "bool":
      return value.value ? "true" : "false";
    case "int":
      return `i:${value.value}`;
    case "uint":
      return `u:${value.value}`;
    case "float32":
      return floatIdentity("f32", value.value);
    case "float64":
      return floatIdentity("f64", value.value);
    case "str":
      return `s:${toHex(value.bytes)}`;
    case "resolved":
      return `x:${value.type}:${value.identity}`;
    case "bin":
    case "array":
    case "map":
    case "ext":
      return null;
  }
}

// Factories

export function bool(value: boolean): BoolValue {
  return new BoolValue(value);
}

export function int(value: bigint | number): IntValue {
  return new IntValue(value);
}

export function uint(value: bigint | number): UintValue {
  return new UintValue(value);
}

export function float32(value: number): Float32Value {
  return new Float32Value(value);
}

export function float64(value: number): Float64Value {
  return new Float64Value(value);
}

export function str(value: string | Uint8Array): StrValue {
  return new StrValue(value);
}

export function bin(value: Uint8Array | readonly number[]): BinValue {
  return new BinValue(value instanceof Uint8Array ? value : Uint8Array.from(value));
}

export function array(...items: Value[]): ArrayValue {
  return new ArrayValue(items);
}

export function map(...entries: MapEntry[]): MapValue {
  return new MapValue(entries);
}

export function ext(type: ExtensionType, data: Uint8Array | readonly number[]): ExtValue {
  return new ExtValue(type, data instanceof Uint8Array ? data : Uint8Array.from(data));
}
