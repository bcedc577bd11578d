import { DepthLimitExceededError, TooBigError, UnsupportedTypeError } from "./errors";
import { standardExtensions } from "./registry";
import type { Extension, ExtensionRegistry } from "./registry";
import { standardLateTransformers } from "./transformers";
import type { Transformer } from "./transformers";
import {
  DEFAULT_MAX_DEPTH,
  FIXEXT_TAGS,
  MaxUint32,
  MaxUint64,
  Tag,
  fitsInt64,
} from "./types";
import type { ExtensionType } from "./types";
import { isValue } from "./value";
import type { Value } from "./value";
import { Writer } from "./writer";
import type { ByteSink } from "./writer";

const DEFAULT_INITIAL_CAPACITY = 256;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Options for encoding.
 */
export interface EncodeOptions {
  /** Applied to every value, in order, before anything else. */
  transformers?: Transformer[];
  /**
   * Tried in order on values with no wire form. Default:
   * standardLateTransformers
   */
  lateTransformers?: readonly Transformer[];
  /** Application extensions (types 0 to 127). */
  extensions?: ExtensionRegistry;
  /** Skip the standard extensions (timestamp). Default: false */
  disableStandardExtensions?: boolean;
  /** Maximum nesting of arrays and maps. Default: 512 */
  maxDepth?: number;
  /** Initial buffer size for encode(). Default: 256 */
  initialCapacity?: number;
}

/**
 * A sink plus the scratch writer headers are built in. Each header goes to
 * the sink as a single chunk; sinks copy what they are given, so the
 * scratch buffer is reused for the next one.
 */
class Output {
  private readonly scratch = new Writer(16);

  constructor(readonly sink: ByteSink) {}

  emit(fill: (writer: Writer) => void): void {
    this.scratch.reset();
    fill(this.scratch);
    this.sink.write(this.scratch.bytes());
  }
}

function writeNil(out: Output): void {
  out.emit((w) => w.writeByte(Tag.Nil));
}

function writeBool(out: Output, value: boolean): void {
  out.emit((w) => w.writeByte(value ? Tag.True : Tag.False));
}

/**
 * Writes a signed integer in the smallest signed form.
 */
function writeInt(out: Output, value: bigint): void {
  if (value >= 0n && value <= 0x7fn) {
    out.emit((w) => w.writeByte(Number(value)));
  } else if (value >= -32n && value < 0n) {
    out.emit((w) => w.writeInt8(Number(value)));
  } else if (value >= -0x80n && value <= 0x7fn) {
    out.emit((w) => {
      w.writeByte(Tag.Int8);
      w.writeInt8(Number(value));
    });
  } else if (value >= -0x8000n && value <= 0x7fffn) {
    out.emit((w) => {
      w.writeByte(Tag.Int16);
      w.writeInt16(Number(value));
    });
  } else if (value >= -0x80000000n && value <= 0x7fffffffn) {
    out.emit((w) => {
      w.writeByte(Tag.Int32);
      w.writeInt32(Number(value));
    });
  } else {
    out.emit((w) => {
      w.writeByte(Tag.Int64);
      w.writeInt64(value);
    });
  }
}

/**
 * Writes an unsigned integer in the smallest uint form. Never uses fixint.
 */
function writeUint(out: Output, value: bigint): void {
  if (value <= 0xffn) {
    out.emit((w) => {
      w.writeByte(Tag.Uint8);
      w.writeByte(Number(value));
    });
  } else if (value <= 0xffffn) {
    out.emit((w) => {
      w.writeByte(Tag.Uint16);
      w.writeUint16(Number(value));
    });
  } else if (value <= 0xffffffffn) {
    out.emit((w) => {
      w.writeByte(Tag.Uint32);
      w.writeUint32(Number(value));
    });
  } else {
    out.emit((w) => {
      w.writeByte(Tag.Uint64);
      w.writeUint64(value);
    });
  }
}

function writeFloat32(out: Output, value: number): void {
  out.emit((w) => {
    w.writeByte(Tag.Float32);
    w.writeFloat32(value);
  });
}

function writeFloat64(out: Output, value: number): void {
  out.emit((w) => {
    w.writeByte(Tag.Float64);
    w.writeFloat64(value);
  });
}

/**
 * Tags for a length-prefixed family. fix is the packed-form base and its
 * largest length; tag8 is absent for families without an 8-bit form.
 */
interface LengthTags {
  what: string;
  fix?: { base: number; max: number };
  tag8?: Tag;
  tag16: Tag;
  tag32: Tag;
}

const STR_TAGS: LengthTags = {
  what: "string length",
  fix: { base: Tag.Fixstr, max: 31 },
  tag8: Tag.Str8,
  tag16: Tag.Str16,
  tag32: Tag.Str32,
};

const BIN_TAGS: LengthTags = { what: "binary length", tag8: Tag.Bin8, tag16: Tag.Bin16, tag32: Tag.Bin32 };

const ARRAY_TAGS: LengthTags = {
  what: "array length",
  fix: { base: Tag.Fixarray, max: 15 },
  tag16: Tag.Array16,
  tag32: Tag.Array32,
};

const MAP_TAGS: LengthTags = {
  what: "map size",
  fix: { base: Tag.Fixmap, max: 15 },
  tag16: Tag.Map16,
  tag32: Tag.Map32,
};

function writeLengthHeader(out: Output, tags: LengthTags, length: number): void {
  if (length > MaxUint32) {
    throw new TooBigError(tags.what, length);
  }
  const { fix, tag8 } = tags;
  if (fix !== undefined && length <= fix.max) {
    out.emit((w) => w.writeByte(fix.base | length));
  } else if (tag8 !== undefined && length <= 0xff) {
    out.emit((w) => {
      w.writeByte(tag8);
      w.writeByte(length);
    });
  } else if (length <= 0xffff) {
    out.emit((w) => {
      w.writeByte(tags.tag16);
      w.writeUint16(length);
    });
  } else {
    out.emit((w) => {
      w.writeByte(tags.tag32);
      w.writeUint32(length);
    });
  }
}

function writePayload(out: Output, data: Uint8Array): void {
  if (data.length > 0) {
    out.sink.write(data);
  }
}

function writeStr(out: Output, bytes: Uint8Array): void {
  writeLengthHeader(out, STR_TAGS, bytes.length);
  writePayload(out, bytes);
}

function writeBin(out: Output, value: Uint8Array): void {
  writeLengthHeader(out, BIN_TAGS, value.length);
  writePayload(out, value);
}

/**
 * Writes an extension block, using fixext where the payload length allows.
 */
function writeExt(out: Output, type: ExtensionType, data: Uint8Array): void {
  const length = data.length;
  const fixTag = FIXEXT_TAGS.get(length);
  if (fixTag !== undefined) {
    out.emit((w) => {
      w.writeByte(fixTag);
      w.writeInt8(type);
    });
  } else if (length <= 0xff) {
    out.emit((w) => {
      w.writeByte(Tag.Ext8);
      w.writeByte(length);
      w.writeInt8(type);
    });
  } else if (length <= 0xffff) {
    out.emit((w) => {
      w.writeByte(Tag.Ext16);
      w.writeUint16(length);
      w.writeInt8(type);
    });
  } else if (length <= MaxUint32) {
    out.emit((w) => {
      w.writeByte(Tag.Ext32);
      w.writeUint32(length);
      w.writeInt8(type);
    });
  } else {
    throw new TooBigError("extension length", length);
  }
  writePayload(out, data);
}

function describe(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    // Null-prototype objects, and chains built from one, have no constructor.
    const ctor: unknown = value.constructor;
    return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "object";
  }
  return typeof value;
}

/**
 * Encoder writes values in canonical (smallest-form) MessagePack.
 *
 * Each value passes through the pre-encode transformers, then the extension
 * encoders (application, then standard), then the built-in forms. A value
 * with no built-in form is handed to the late transformers; the first one
 * that changes it restarts the pipeline with the result. Each late
 * transformer fires at most once per value.
 */
export class Encoder {
  private readonly transformers: readonly Transformer[];
  private readonly lateTransformers: readonly Transformer[];
  private readonly extensions: readonly Extension[];
  private readonly maxDepth: number;
  private readonly initialCapacity: number;

  constructor(options: EncodeOptions = {}) {
    this.transformers = options.transformers ?? [];
    this.lateTransformers = options.lateTransformers ?? standardLateTransformers;
    this.extensions = [
      ...(options.extensions?.encoders() ?? []),
      ...(options.disableStandardExtensions ? [] : standardExtensions.encoders()),
    ];
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.initialCapacity = options.initialCapacity ?? DEFAULT_INITIAL_CAPACITY;
  }

  /**
   * Encodes a value into a new byte array.
   */
  encode(value: unknown): Uint8Array {
    const writer = new Writer(this.initialCapacity);
    this.encodeTo(writer, value);
    return writer.bytes();
  }

  /**
   * Encodes a value to a sink. On error, bytes already written stay
   * written.
   */
  encodeTo(sink: ByteSink, value: unknown): void {
    this.encodeValue(new Output(sink), value, 0);
  }

  private encodeValue(out: Output, value: unknown, depth: number): void {
    const fired = new Set<Transformer>();
    let current = value;

    for (;;) {
      for (const transform of this.transformers) {
        current = transform(current);
      }

      for (const ext of this.extensions) {
        const payload = ext.encode?.(current);
        if (payload !== undefined) {
          writeExt(out, ext.type, payload);
          return;
        }
      }

      if (this.encodeBuiltin(out, current, depth)) {
        return;
      }

      const before = current;
      for (const transform of this.lateTransformers) {
        if (fired.has(transform)) {
          continue;
        }
        const next = transform(current);
        if (!Object.is(next, current)) {
          fired.add(transform);
          current = next;
          break;
        }
      }
      if (Object.is(before, current)) {
        throw new UnsupportedTypeError(describe(current));
      }
    }
  }

  private enter(depth: number): void {
    if (depth >= this.maxDepth) {
      throw new DepthLimitExceededError(this.maxDepth);
    }
  }

  /**
   * Encodes a value with a built-in form. Returns false if there is none.
   */
  private encodeBuiltin(out: Output, value: unknown, depth: number): boolean {
    if (value === null || value === undefined) {
      writeNil(out);
    } else if (typeof value === "boolean") {
      writeBool(out, value);
    } else if (typeof value === "number") {
      if (Number.isSafeInteger(value) && !Object.is(value, -0)) {
        writeInt(out, BigInt(value));
      } else {
        writeFloat64(out, value);
      }
    } else if (typeof value === "bigint") {
      if (fitsInt64(value)) {
        writeInt(out, value);
      } else if (value > 0n && value <= MaxUint64) {
        writeUint(out, value);
      } else {
        throw new TooBigError("integer", value);
      }
    } else if (typeof value === "string") {
      writeStr(out, textEncoder.encode(value));
    } else if (value instanceof Uint8Array) {
      writeBin(out, value);
    } else if (Array.isArray(value)) {
      this.enter(depth);
      writeLengthHeader(out, ARRAY_TAGS, value.length);
      for (const item of value) {
        this.encodeValue(out, item, depth + 1);
      }
    } else if (value instanceof Map) {
      this.enter(depth);
      writeLengthHeader(out, MAP_TAGS, value.size);
      for (const [k, v] of value) {
        this.encodeValue(out, k, depth + 1);
        this.encodeValue(out, v, depth + 1);
      }
    } else if (isValue(value)) {
      this.writeValue(out, value, depth);
    } else {
      return false;
    }
    return true;
  }

  private writeValue(out: Output, value: Value, depth: number): void {
    switch (value.kind) {
      case "nil":
        writeNil(out);
        return;
      case "bool":
        writeBool(out, value.value);
        return;
      case "int":
        writeInt(out, value.value);
        return;
      case "uint":
        writeUint(out, value.value);
        return;
      case "float32":
        writeFloat32(out, value.value);
        return;
      case "float64":
        writeFloat64(out, value.value);
        return;
      case "str":
        writeStr(out, value.bytes);
        return;
      case "bin":
        writeBin(out, value.value);
        return;
      case "array":
        this.enter(depth);
        writeLengthHeader(out, ARRAY_TAGS, value.items.length);
        for (const item of value.items) {
          this.encodeValue(out, item, depth + 1);
        }
        return;
      case "map":
        this.enter(depth);
        writeLengthHeader(out, MAP_TAGS, value.entries.length);
        for (const [k, v] of value.entries) {
          this.encodeValue(out, k, depth + 1);
          this.encodeValue(out, v, depth + 1);
        }
        return;
      case "ext":
      case "resolved":
        writeExt(out, value.type, value.data);
        return;
    }
  }
}

/**
 * Encodes a value into a new byte array.
 */
export function encode(value: unknown, options: EncodeOptions = {}): Uint8Array {
  return new Encoder(options).encode(value);
}

/**
 * Encodes a value to a sink.
 */
export function encodeTo(sink: ByteSink, value: unknown, options: EncodeOptions = {}): void {
  new Encoder(options).encodeTo(sink, value);
}
