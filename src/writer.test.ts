import { describe, it, expect } from 'vitest';
import { Writer } from './writer';
import { BoundedReader } from './reader';

describe('Writer', () => {
  describe('integers', () => {
    it('writes uint16 big-endian', () => {
      const writer = new Writer();
      writer.writeUint16(0x0102);
      expect(writer.bytes()).toEqual(new Uint8Array([0x01, 0x02]));
    });

    it('writes uint32 big-endian', () => {
      const writer = new Writer();
      writer.writeUint32(0xdeadbeef);
      expect(writer.bytes()).toEqual(new Uint8Array([0xde, 0xad, 0xbe, 0xef]));
    });

    it('writes uint64 big-endian', () => {
      const writer = new Writer();
      writer.writeUint64(0x0102030405060708n);
      expect(writer.bytes()).toEqual(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8]));
    });

    it('writes negative values in two\'s complement', () => {
      const writer = new Writer();
      writer.writeInt8(-1);
      writer.writeInt16(-2);
      writer.writeInt32(-3);
      expect(writer.bytes()).toEqual(
        new Uint8Array([0xff, 0xff, 0xfe, 0xff, 0xff, 0xff, 0xfd])
      );
    });

    it('writes int64 big-endian', () => {
      const writer = new Writer();
      writer.writeInt64(-9223372036854775808n);
      expect(writer.bytes()).toEqual(new Uint8Array([0x80, 0, 0, 0, 0, 0, 0, 0]));
    });
  });

  describe('floats', () => {
    it('writes float64 4.5', () => {
      const writer = new Writer();
      writer.writeFloat64(4.5);
      expect(writer.bytes()).toEqual(new Uint8Array([0x40, 0x12, 0, 0, 0, 0, 0, 0]));
    });

    it('writes float32 1.5', () => {
      const writer = new Writer();
      writer.writeFloat32(1.5);
      expect(writer.bytes()).toEqual(new Uint8Array([0x3f, 0xc0, 0, 0]));
    });
  });

  describe('buffer management', () => {
    it('grows past the initial capacity', () => {
      const writer = new Writer(2);
      for (let i = 0; i < 100; i++) {
        writer.writeByte(i);
      }
      expect(writer.position).toBe(100);
      expect(writer.bytes()[99]).toBe(99);
    });

    it('keeps earlier bytes when growing on a large write', () => {
      const writer = new Writer(4);
      writer.writeByte(0xaa);
      writer.write(new Uint8Array(50).fill(1));
      const bytes = writer.bytes();
      expect(bytes.length).toBe(51);
      expect(bytes[0]).toBe(0xaa);
      expect(bytes[50]).toBe(1);
    });

    it('resets for reuse', () => {
      const writer = new Writer();
      writer.writeUint32(1);
      writer.reset();
      expect(writer.position).toBe(0);
      writer.writeByte(7);
      expect(writer.bytes()).toEqual(new Uint8Array([7]));
    });
  });

  it('writes what BoundedReader reads back', () => {
    const writer = new Writer();
    writer.writeUint16(65535);
    writer.writeInt64(-5n);
    writer.writeFloat64(-0.25);
    const reader = new BoundedReader(writer.bytes());
    expect(reader.readUint16()).toBe(65535);
    expect(reader.readInt64()).toBe(-5n);
    expect(reader.readFloat64()).toBe(-0.25);
  });
});
