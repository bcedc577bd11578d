import {
  DepthLimitExceededError,
  DuplicateKeyError,
  InvalidFormatError,
  UnsupportedExtensionTypeError,
  UnsupportedKeyTypeError,
} from "./errors";
import { BoundedReader } from "./reader";
import type { ByteSource } from "./reader";
import { standardExtensions } from "./registry";
import type { ExtensionRegistry } from "./registry";
import type { DecodeTransformer, Decoded } from "./transformers";
import {
  DEFAULT_MAX_DEPTH,
  MAX_ARRAY_PREALLOC,
  Tag,
  isFixarray,
  isFixmap,
  isFixstr,
  isNegativeFixint,
  isPositiveFixint,
} from "./types";
import type { ExtensionType } from "./types";
import {
  ArrayValue,
  BinValue,
  BoolValue,
  ExtValue,
  Float32Value,
  Float64Value,
  IntValue,
  MapValue,
  NIL,
  StrValue,
  UintValue,
  keyIdentity,
} from "./value";
import type { MapEntry, Value } from "./value";

/**
 * Options for decoding.
 */
export interface DecodeOptions {
  /** Keep the first of duplicate map keys instead of failing. Default: false */
  allowDuplicateKeys?: boolean;
  /** Drop map entries whose key cannot be a key instead of failing. Default: false */
  dropUnsupportedKeys?: boolean;
  /** Fail on extension types with no decoder instead of keeping them unresolved. Default: false */
  rejectUnknownExtensions?: boolean;
  /** Application extensions (types 0 to 127). */
  extensions?: ExtensionRegistry;
  /** Leave standard extensions (timestamp) unresolved. Default: false */
  disableStandardExtensions?: boolean;
  /** Applied to every decoded value, in order. */
  transformers?: DecodeTransformer[];
  /** Maximum nesting of arrays and maps. Default: 512 */
  maxDepth?: number;
}

export type DecodeInput = Uint8Array | ByteSource | BoundedReader;

function keyed(value: Value): Decoded {
  return { value, keyEligible: true };
}

function unkeyed(value: Value): Decoded {
  return { value, keyEligible: false };
}

/**
 * Decoder reads one MessagePack value at a time from a BoundedReader.
 */
export class Decoder {
  private readonly allowDuplicateKeys: boolean;
  private readonly dropUnsupportedKeys: boolean;
  private readonly rejectUnknownExtensions: boolean;
  private readonly applicationExtensions: ExtensionRegistry | undefined;
  private readonly standardExtensions: ExtensionRegistry | undefined;
  private readonly transformers: readonly DecodeTransformer[];
  private readonly maxDepth: number;

  constructor(options: DecodeOptions = {}) {
    this.allowDuplicateKeys = options.allowDuplicateKeys ?? false;
    this.dropUnsupportedKeys = options.dropUnsupportedKeys ?? false;
    this.rejectUnknownExtensions = options.rejectUnknownExtensions ?? false;
    this.applicationExtensions = options.extensions;
    this.standardExtensions = options.disableStandardExtensions ? undefined : standardExtensions;
    this.transformers = options.transformers ?? [];
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Decodes one value. Bytes after it are left unread.
   */
  decode(input: DecodeInput): Value {
    const reader = input instanceof BoundedReader ? input : new BoundedReader(input);
    return this.decodeValue(reader).value;
  }

  /**
   * Decodes one value along with whether it may be used as a map key.
   */
  decodeValue(reader: BoundedReader, depth = 0): Decoded {
    let decoded = this.decodeRaw(reader, depth);
    for (const transform of this.transformers) {
      decoded = transform(decoded);
    }
    return decoded;
  }

  private decodeRaw(reader: BoundedReader, depth: number): Decoded {
    const tag = reader.readByte();

    if (isPositiveFixint(tag)) {
      return keyed(new IntValue(tag));
    }
    if (isNegativeFixint(tag)) {
      return keyed(new IntValue(tag - 0x100));
    }
    if (isFixmap(tag)) {
      return this.decodeMap(reader, tag & 0x0f, depth);
    }
    if (isFixarray(tag)) {
      return this.decodeArray(reader, tag & 0x0f, depth);
    }
    if (isFixstr(tag)) {
      return this.decodeStr(reader, tag & 0x1f);
    }

    switch (tag) {
      case Tag.Nil:
        return keyed(NIL);
      case Tag.NeverUsed:
        throw new InvalidFormatError(tag);
      case Tag.False:
        return keyed(new BoolValue(false));
      case Tag.True:
        return keyed(new BoolValue(true));
      case Tag.Bin8:
        return unkeyed(new BinValue(reader.readExact(reader.readByte())));
      case Tag.Bin16:
        return unkeyed(new BinValue(reader.readExact(reader.readUint16())));
      case Tag.Bin32:
        return unkeyed(new BinValue(reader.readExact(reader.readUint32())));
      case Tag.Ext8:
        return this.decodeExt(reader, reader.readByte());
      case Tag.Ext16:
        return this.decodeExt(reader, reader.readUint16());
      case Tag.Ext32:
        return this.decodeExt(reader, reader.readUint32());
      case Tag.Float32:
        return keyed(new Float32Value(reader.readFloat32()));
      case Tag.Float64:
        return keyed(new Float64Value(reader.readFloat64()));
      case Tag.Uint8:
        return keyed(new UintValue(reader.readByte()));
      case Tag.Uint16:
        return keyed(new UintValue(reader.readUint16()));
      case Tag.Uint32:
        return keyed(new UintValue(reader.readUint32()));
      case Tag.Uint64:
        return keyed(new UintValue(reader.readUint64()));
      case Tag.Int8:
        return keyed(new IntValue(reader.readInt8()));
      case Tag.Int16:
        return keyed(new IntValue(reader.readInt16()));
      case Tag.Int32:
        return keyed(new IntValue(reader.readInt32()));
      case Tag.Int64:
        return keyed(new IntValue(reader.readInt64()));
      case Tag.Fixext1:
        return this.decodeExt(reader, 1);
      case Tag.Fixext2:
        return this.decodeExt(reader, 2);
      case Tag.Fixext4:
        return this.decodeExt(reader, 4);
      case Tag.Fixext8:
        return this.decodeExt(reader, 8);
      case Tag.Fixext16:
        return this.decodeExt(reader, 16);
      case Tag.Str8:
        return this.decodeStr(reader, reader.readByte());
      case Tag.Str16:
        return this.decodeStr(reader, reader.readUint16());
      case Tag.Str32:
        return this.decodeStr(reader, reader.readUint32());
      case Tag.Array16:
        return this.decodeArray(reader, reader.readUint16(), depth);
      case Tag.Array32:
        return this.decodeArray(reader, reader.readUint32(), depth);
      case Tag.Map16:
        return this.decodeMap(reader, reader.readUint16(), depth);
      case Tag.Map32:
        return this.decodeMap(reader, reader.readUint32(), depth);
    }

    // Every byte value is covered above.
    throw new Error(`packwire: internal error: unhandled tag 0x${tag.toString(16)}`);
  }

  private enter(depth: number): void {
    if (depth >= this.maxDepth) {
      throw new DepthLimitExceededError(this.maxDepth);
    }
  }

  // UTF-8 validity is not checked; the bytes are kept as read.
  private decodeStr(reader: BoundedReader, length: number): Decoded {
    return keyed(new StrValue(reader.readExact(length)));
  }

  private decodeArray(reader: BoundedReader, length: number, depth: number): Decoded {
    this.enter(depth);
    const items = new Array<Value>(Math.min(length, MAX_ARRAY_PREALLOC));
    for (let i = 0; i < length; i++) {
      items[i] = this.decodeValue(reader, depth + 1).value;
    }
    return unkeyed(new ArrayValue(items));
  }

  private decodeMap(reader: BoundedReader, size: number, depth: number): Decoded {
    this.enter(depth);
    const entries: MapEntry[] = [];
    const seen = new Set<string>();
    for (let i = 0; i < size; i++) {
      // Both halves are read before the entry is judged, so a dropped
      // entry leaves the reader at the next one.
      const key = this.decodeValue(reader, depth + 1);
      const value = this.decodeValue(reader, depth + 1).value;

      if (!key.keyEligible) {
        if (this.dropUnsupportedKeys) {
          continue;
        }
        throw new UnsupportedKeyTypeError(key.value.kind);
      }

      // NaN keys have no identity and never collide.
      const id = keyIdentity(key.value);
      if (id !== null) {
        if (seen.has(id)) {
          if (this.allowDuplicateKeys) {
            continue;
          }
          throw new DuplicateKeyError();
        }
        seen.add(id);
      }
      entries.push([key.value, value]);
    }
    return unkeyed(new MapValue(entries));
  }

  private decodeExt(reader: BoundedReader, length: number): Decoded {
    const type: ExtensionType = reader.readInt8();
    const data = reader.readExact(length);
    const registry = type >= 0 ? this.applicationExtensions : this.standardExtensions;
    const decode = registry?.get(type)?.decode;
    if (decode !== undefined) {
      return decode(data, type);
    }
    if (this.rejectUnknownExtensions) {
      throw new UnsupportedExtensionTypeError(type);
    }
    return unkeyed(new ExtValue(type, data));
  }
}

/**
 * Decodes one value from bytes or a source.
 */
export function decode(input: DecodeInput, options: DecodeOptions = {}): Value {
  return new Decoder(options).decode(input);
}
