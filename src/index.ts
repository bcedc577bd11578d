/**
 * packwire - MessagePack codec for TypeScript
 *
 * Canonical (smallest-form) encoding, bounded decoding of untrusted input,
 * and pluggable extension types and transformers.
 *
 * @example
 * ```typescript
 * import { encode, decode } from 'packwire';
 *
 * const data = encode([{ foo: "bar" }, 123, 4.5]);
 * const value = decode(data); // ArrayValue
 * ```
 */

// Wire format
export {
  Tag,
  MinInt64,
  MaxInt64,
  MaxUint64,
  MaxUint32,
  MIN_STANDARD_EXTENSION_TYPE,
  MAX_STANDARD_EXTENSION_TYPE,
  MIN_APPLICATION_EXTENSION_TYPE,
  MAX_APPLICATION_EXTENSION_TYPE,
  DEFAULT_MAX_DEPTH,
  MAX_ARRAY_PREALLOC,
  fitsInt64,
  fitsUint64,
  isExtensionType,
} from "./types";
export type { ExtensionType } from "./types";

// Errors
export {
  PackwireError,
  EncodeError,
  DecodeError,
  UnsupportedTypeError,
  TooBigError,
  EofError,
  UnexpectedEofError,
  InvalidFormatError,
  InvalidTimestampError,
  DuplicateKeyError,
  UnsupportedKeyTypeError,
  UnsupportedExtensionTypeError,
  DepthLimitExceededError,
  StreamClosedError,
} from "./errors";

// Value model
export {
  ValueNode,
  NilValue,
  NIL,
  BoolValue,
  IntValue,
  UintValue,
  Float32Value,
  Float64Value,
  StrValue,
  BinValue,
  ArrayValue,
  MapValue,
  ExtValue,
  ResolvedValue,
  isValue,
  keyIdentity,
  bool,
  int,
  uint,
  float32,
  float64,
  str,
  bin,
  array,
  map,
  ext,
} from "./value";
export type { Value, ValueKind, MapEntry } from "./value";

// Byte sources and sinks
export { BoundedReader, BufferSource, ChunkSource, READ_CHUNK_SIZE } from "./reader";
export type { ByteSource } from "./reader";
export { Writer } from "./writer";
export type { ByteSink } from "./writer";

// Transformers and extensions
export {
  arrayTransformer,
  composeTransformers,
  composeDecodeTransformers,
  standardLateTransformers,
} from "./transformers";
export type { Transformer, DecodeTransformer, Decoded } from "./transformers";
export { makeRecordTransformer, recordTransformer } from "./record";
export type { RecordTransformerOptions } from "./record";
export { ExtensionRegistry, standardExtensions, makeExtensionTransformer } from "./registry";
export type { Extension, ExtensionEncoder, ExtensionDecoder } from "./registry";
export {
  Timestamp,
  TIMESTAMP_EXTENSION_TYPE,
  encodeTimestamp,
  decodeTimestamp,
  timestampExtension,
} from "./timestamp";

// Codec
export { Encoder, encode, encodeTo } from "./encoder";
export type { EncodeOptions } from "./encoder";
export { Decoder, decode } from "./decoder";
export type { DecodeOptions, DecodeInput } from "./decoder";

// Streams
export { StreamWriter, StreamReader } from "./stream";
export type { StreamWriterOptions } from "./stream";

/**
 * Library version.
 */
export const VERSION = "0.1.0";
