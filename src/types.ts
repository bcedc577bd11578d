/**
 * Tag bytes of the MessagePack wire format.
 *
 * Packed forms (fixint, fixmap, fixarray, fixstr) occupy a range of tag
 * values; the enum holds the first byte of each range.
 */
export enum Tag {
  /** 0x00-0x7f: positive fixint */
  PositiveFixint = 0x00,
  /** 0x80-0x8f: fixmap, low nibble is the entry count */
  Fixmap = 0x80,
  /** 0x90-0x9f: fixarray, low nibble is the element count */
  Fixarray = 0x90,
  /** 0xa0-0xbf: fixstr, low five bits are the byte length */
  Fixstr = 0xa0,
  Nil = 0xc0,
  /** Reserved; never valid on the wire */
  NeverUsed = 0xc1,
  False = 0xc2,
  True = 0xc3,
  Bin8 = 0xc4,
  Bin16 = 0xc5,
  Bin32 = 0xc6,
  Ext8 = 0xc7,
  Ext16 = 0xc8,
  Ext32 = 0xc9,
  Float32 = 0xca,
  Float64 = 0xcb,
  Uint8 = 0xcc,
  Uint16 = 0xcd,
  Uint32 = 0xce,
  Uint64 = 0xcf,
  Int8 = 0xd0,
  Int16 = 0xd1,
  Int32 = 0xd2,
  Int64 = 0xd3,
  Fixext1 = 0xd4,
  Fixext2 = 0xd5,
  Fixext4 = 0xd6,
  Fixext8 = 0xd7,
  Fixext16 = 0xd8,
  Str8 = 0xd9,
  Str16 = 0xda,
  Str32 = 0xdb,
  Array16 = 0xdc,
  Array32 = 0xdd,
  Map16 = 0xde,
  Map32 = 0xdf,
  /** 0xe0-0xff: negative fixint */
  NegativeFixint = 0xe0,
}

/**
 * Extension type code, a signed 8-bit integer. Negative codes are reserved
 * for standard extensions.
 */
export type ExtensionType = number;

/** Smallest standard extension type. */
export const MIN_STANDARD_EXTENSION_TYPE = -128;
/** Largest standard extension type. */
export const MAX_STANDARD_EXTENSION_TYPE = -1;
/** Smallest application extension type. */
export const MIN_APPLICATION_EXTENSION_TYPE = 0;
/** Largest application extension type. */
export const MAX_APPLICATION_EXTENSION_TYPE = 127;

/** Largest count or byte length any wire form can carry. */
export const MaxUint32 = 0xffffffff;

/**
 * Integer bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MaxUint64 = BigInt("18446744073709551615"); // 2^64 - 1

/** Payload lengths that have a fixext form, mapped to their tag. */
export const FIXEXT_TAGS: ReadonlyMap<number, Tag> = new Map([
  [1, Tag.Fixext1],
  [2, Tag.Fixext2],
  [4, Tag.Fixext4],
  [8, Tag.Fixext8],
  [16, Tag.Fixext16],
]);

export function isPositiveFixint(tag: number): boolean {
  return tag <= 0x7f;
}

export function isNegativeFixint(tag: number): boolean {
  return tag >= 0xe0;
}

export function isFixmap(tag: number): boolean {
  return tag >= 0x80 && tag <= 0x8f;
}

export function isFixarray(tag: number): boolean {
  return tag >= 0x90 && tag <= 0x9f;
}

export function isFixstr(tag: number): boolean {
  return tag >= 0xa0 && tag <= 0xbf;
}

/**
 * Returns true if the value is within the signed 64-bit range.
 */
export function fitsInt64(value: bigint): boolean {
  return value >= MinInt64 && value <= MaxInt64;
}

/**
 * Returns true if the value is within the unsigned 64-bit range.
 */
export function fitsUint64(value: bigint): boolean {
  return value >= 0n && value <= MaxUint64;
}

/**
 * Returns true if the number is a valid extension type code.
 */
export function isExtensionType(type: number): type is ExtensionType {
  return Number.isInteger(type) && type >= MIN_STANDARD_EXTENSION_TYPE && type <= MAX_APPLICATION_EXTENSION_TYPE;
}

/** Default limit on nested arrays and maps, for both encoding and decoding. */
export const DEFAULT_MAX_DEPTH = 512;

/** Largest element count an array is pre-sized for while decoding. */
export const MAX_ARRAY_PREALLOC = 1000;
