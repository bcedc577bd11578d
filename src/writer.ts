const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

/**
 * A push destination for encoded bytes. Implementations must copy or
 * consume the chunk before returning; the caller may reuse it.
 */
export interface ByteSink {
  write(chunk: Uint8Array): void;
}

/**
 * Writer accumulates bytes in a growable buffer. Multi-byte values are
 * written big-endian.
 */
export class Writer implements ByteSink {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(initialCapacity: number = INITIAL_CAPACITY) {
    this.buffer = new Uint8Array(Math.max(initialCapacity, 1));
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the written bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has room for the specified number of bytes.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = this.buffer.length * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * ByteSink implementation; same as writeBytes.
   */
  write(chunk: Uint8Array): void {
    this.writeBytes(chunk);
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  writeUint16(value: number): void {
    this.ensureCapacity(2);
    this.view.setUint16(this.pos, value);
    this.pos += 2;
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value);
    this.pos += 4;
  }

  writeUint64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, value);
    this.pos += 8;
  }

  writeInt8(value: number): void {
    this.ensureCapacity(1);
    this.view.setInt8(this.pos, value);
    this.pos += 1;
  }

  writeInt16(value: number): void {
    this.ensureCapacity(2);
    this.view.setInt16(this.pos, value);
    this.pos += 2;
  }

  writeInt32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value);
    this.pos += 4;
  }

  writeInt64(value: bigint): void {
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeFloat32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeFloat64(value: number): void {
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value);
    this.pos += 8;
  }
}
