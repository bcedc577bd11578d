/**
 * Sequences of values on one buffer or source.
 *
 * Values are written back to back with no framing: each encoded value is
 * self-delimiting, and the end of a sequence is a clean end of input
 * between two values.
 */

import { Decoder } from "./decoder";
import type { DecodeOptions } from "./decoder";
import { Encoder } from "./encoder";
import type { EncodeOptions } from "./encoder";
import { EofError, StreamClosedError, UnexpectedEofError } from "./errors";
import { BoundedReader } from "./reader";
import type { ByteSource } from "./reader";
import type { Value } from "./value";
import { Writer } from "./writer";

/** Default initial buffer capacity for stream writer. */
const DEFAULT_STREAM_BUFFER_CAPACITY = 4096;

/**
 * Options for StreamWriter configuration.
 */
export interface StreamWriterOptions extends EncodeOptions {
  /** Initial buffer capacity. Default: 4096 */
  initialCapacity?: number;
}

/**
 * StreamWriter encodes values one after another into a buffer.
 *
 * @example
 * ```typescript
 * const stream = new StreamWriter();
 * stream.write({ id: 1 });
 * stream.write("done");
 * const data = stream.bytes();
 * ```
 */
export class StreamWriter {
  private writer: Writer;
  private encoder: Encoder;
  private closed: boolean;
  private count: number;

  constructor(options: StreamWriterOptions = {}) {
    this.writer = new Writer(options.initialCapacity ?? DEFAULT_STREAM_BUFFER_CAPACITY);
    this.encoder = new Encoder(options);
    this.closed = false;
    this.count = 0;
  }

  /**
   * Returns the current position (bytes written).
   */
  get position(): number {
    return this.writer.position;
  }

  /**
   * Returns the number of values written.
   */
  get length(): number {
    return this.count;
  }

  /**
   * Returns true if the writer is closed.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Encodes and appends a value. If encoding fails, the bytes of the
   * failed value are discarded.
   *
   * @throws StreamClosedError if the writer is closed
   */
  write(value: unknown): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
    const staged = new Writer();
    this.encoder.encodeTo(staged, value);
    this.writer.writeBytes(staged.bytes());
    this.count++;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.writer.bytes();
  }

  /**
   * Resets the writer for reuse, clearing all written data.
   */
  reset(): void {
    this.writer.reset();
    this.closed = false;
    this.count = 0;
  }

  /**
   * Closes the writer. No more values can be written after closing.
   */
  close(): void {
    this.closed = true;
  }
}

/**
 * StreamReader decodes consecutive values until the input ends.
 *
 * @example
 * ```typescript
 * const reader = new StreamReader(data);
 * for (const value of reader) {
 *   // handle value...
 * }
 * ```
 */
export class StreamReader implements Iterable<Value>, AsyncIterable<Value> {
  private reader: BoundedReader;
  private decoder: Decoder;
  private done: boolean;

  constructor(input: Uint8Array | ByteSource, options: DecodeOptions = {}) {
    this.reader = new BoundedReader(input);
    this.decoder = new Decoder(options);
    this.done = false;
  }

  /**
   * Returns the number of bytes consumed.
   */
  get position(): number {
    return this.reader.position;
  }

  /**
   * Reads the next value.
   *
   * @returns The value, or null if the input ended between values
   * @throws EofError subclasses if the input ends inside a value
   */
  next(): Value | null {
    if (this.done) {
      return null;
    }
    const start = this.reader.position;
    try {
      return this.decoder.decodeValue(this.reader).value;
    } catch (e) {
      if (e instanceof EofError && !(e instanceof UnexpectedEofError) && this.reader.position === start) {
        this.done = true;
        return null;
      }
      throw e;
    }
  }

  /**
   * Returns a synchronous iterator over the remaining values.
   */
  *[Symbol.iterator](): IterableIterator<Value> {
    for (let value = this.next(); value !== null; value = this.next()) {
      yield value;
    }
  }

  /**
   * Implements AsyncIterable for use with for-await-of.
   */
  async *[Symbol.asyncIterator](): AsyncIterableIterator<Value> {
    for (let value = this.next(); value !== null; value = this.next()) {
      yield value;
    }
  }

  /**
   * Collects the remaining values into an array.
   */
  toArray(): Value[] {
    return [...this];
  }
}
