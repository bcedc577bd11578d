import { EofError, UnexpectedEofError } from "./errors";

/** Largest single read requested from a source. */
export const READ_CHUNK_SIZE = 4096;

/**
 * A pull source of bytes.
 */
export interface ByteSource {
  /**
   * Returns between 1 and max bytes, or an empty array at end of data.
   * The returned bytes may be a view; callers copy what they keep.
   */
  read(max: number): Uint8Array;
}

/**
 * ByteSource over a single buffer.
 */
export class BufferSource implements ByteSource {
  private buffer: Uint8Array;
  private pos: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.pos = 0;
  }

  /**
   * Returns the number of bytes not yet read.
   */
  get remaining(): number {
    return this.buffer.length - this.pos;
  }

  read(max: number): Uint8Array {
    const n = Math.min(max, this.remaining);
    const bytes = this.buffer.subarray(this.pos, this.pos + n);
    this.pos += n;
    return bytes;
  }
}

/**
 * ByteSource over a queue of chunks. Chunks may be pushed while reading;
 * reading past the last queued chunk is end of data.
 */
export class ChunkSource implements ByteSource {
  private chunks: Uint8Array[] = [];
  private offset = 0;

  constructor(chunks: Iterable<Uint8Array> = []) {
    for (const chunk of chunks) {
      this.push(chunk);
    }
  }

  /**
   * Appends a chunk to the queue.
   */
  push(chunk: Uint8Array): void {
    if (chunk.length > 0) {
      this.chunks.push(chunk);
    }
  }

  read(max: number): Uint8Array {
    const head = this.chunks[0];
    if (head === undefined || max <= 0) {
      return new Uint8Array(0);
    }
    const n = Math.min(max, head.length - this.offset);
    const bytes = head.subarray(this.offset, this.offset + n);
    this.offset += n;
    if (this.offset === head.length) {
      this.chunks.shift();
      this.offset = 0;
    }
    return bytes;
  }
}

/**
 * BoundedReader performs exact-length reads from a ByteSource.
 *
 * Reads longer than READ_CHUNK_SIZE are gathered chunk by chunk, so a length
 * prefix claiming more data than the source holds fails without allocating
 * the claimed size.
 */
export class BoundedReader {
  private source: ByteSource;
  private pos: number;

  constructor(source: ByteSource | Uint8Array) {
    this.source = source instanceof Uint8Array ? new BufferSource(source) : source;
    this.pos = 0;
  }

  /**
   * Returns the number of bytes consumed so far.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Reads a single byte.
   */
  readByte(): number {
    return this.readExact(1)[0];
  }

  /**
   * Reads exactly n bytes into a new array.
   *
   * @throws EofError if no bytes were available
   * @throws UnexpectedEofError if fewer than n bytes were available
   */
  readExact(n: number): Uint8Array {
    if (n === 0) {
      return new Uint8Array(0);
    }
    if (n <= READ_CHUNK_SIZE) {
      const out = new Uint8Array(n);
      this.fill(out, n, 0);
      return out;
    }

    const chunks: Uint8Array[] = [];
    let got = 0;
    while (got < n) {
      const chunk = new Uint8Array(Math.min(READ_CHUNK_SIZE, n - got));
      this.fill(chunk, n, got);
      chunks.push(chunk);
      got += chunk.length;
    }

    const out = new Uint8Array(n);
    let offset = 0;
    for (const chunk of chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  /**
   * Fills target from the source. requested and before describe the whole
   * read this fill is part of, for error reporting.
   */
  private fill(target: Uint8Array, requested: number, before: number): void {
    let filled = 0;
    while (filled < target.length) {
      const want = target.length - filled;
      const data = this.source.read(want);
      if (data.length === 0) {
        const available = before + filled;
        if (available === 0) {
          throw new EofError();
        }
        throw new UnexpectedEofError(requested, available);
      }
      const n = Math.min(data.length, want);
      target.set(data.subarray(0, n), filled);
      filled += n;
      this.pos += n;
    }
  }

  private view(n: number): DataView {
    const bytes = this.readExact(n);
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  /**
   * Reads a big-endian unsigned 16-bit integer.
   */
  readUint16(): number {
    return this.view(2).getUint16(0);
  }

  /**
   * Reads a big-endian unsigned 32-bit integer.
   */
  readUint32(): number {
    return this.view(4).getUint32(0);
  }

  /**
   * Reads a big-endian unsigned 64-bit integer.
   */
  readUint64(): bigint {
    return this.view(8).getBigUint64(0);
  }

  readInt8(): number {
    return this.view(1).getInt8(0);
  }

  readInt16(): number {
    return this.view(2).getInt16(0);
  }

  readInt32(): number {
    return this.view(4).getInt32(0);
  }

  readInt64(): bigint {
    return this.view(8).getBigInt64(0);
  }

  /**
   * Reads a big-endian IEEE 754 single.
   */
  readFloat32(): number {
    return this.view(4).getFloat32(0);
  }

  /**
   * Reads a big-endian IEEE 754 double.
   */
  readFloat64(): number {
    return this.view(8).getFloat64(0);
  }
}
