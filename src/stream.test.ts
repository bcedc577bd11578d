import { describe, it, expect } from "vitest";
import { StreamWriter, StreamReader } from "./stream";
import { ChunkSource } from "./reader";
import { StreamClosedError, UnexpectedEofError, UnsupportedTypeError } from "./errors";
import { NIL, array, bool, int, map, str } from "./value";
import type { Value } from "./value";

describe("StreamWriter", () => {
  describe("basic operations", () => {
    it("writes values back to back", () => {
      const stream = new StreamWriter();
      stream.write({ id: 1 });
      stream.write("done");

      expect(stream.bytes()).toEqual(
        new Uint8Array([0x81, 0xa2, 0x69, 0x64, 0x01, 0xa4, 0x64, 0x6f, 0x6e, 0x65])
      );
    });

    it("tracks position and count", () => {
      const stream = new StreamWriter();
      expect(stream.position).toBe(0);
      expect(stream.length).toBe(0);

      stream.write(300);
      expect(stream.position).toBe(3);
      stream.write(null);
      expect(stream.position).toBe(4);
      expect(stream.length).toBe(2);
    });

    it("grows past its initial capacity", () => {
      const stream = new StreamWriter({ initialCapacity: 2 });
      stream.write("a longer string than two bytes");
      expect(stream.position).toBe(31);
    });

    it("passes encode options through", () => {
      const stream = new StreamWriter({ maxDepth: 1 });
      expect(() => stream.write([[1]])).toThrow("Nesting depth exceeds limit of 1");
    });
  });

  describe("failed writes", () => {
    it("leaves earlier values intact", () => {
      const stream = new StreamWriter();
      stream.write(1);
      expect(() => stream.write([2, Symbol("nope")])).toThrow(UnsupportedTypeError);

      expect(stream.bytes()).toEqual(new Uint8Array([0x01]));
      expect(stream.length).toBe(1);
    });
  });

  describe("close and reset", () => {
    it("rejects writes after close", () => {
      const stream = new StreamWriter();
      stream.write(1);
      stream.close();

      expect(stream.isClosed).toBe(true);
      expect(() => stream.write(2)).toThrow(StreamClosedError);
      expect(stream.bytes()).toEqual(new Uint8Array([0x01]));
    });

    it("clears data and reopens on reset", () => {
      const stream = new StreamWriter();
      stream.write(1);
      stream.close();
      stream.reset();

      expect(stream.isClosed).toBe(false);
      expect(stream.position).toBe(0);
      expect(stream.length).toBe(0);
      stream.write(2);
      expect(stream.bytes()).toEqual(new Uint8Array([0x02]));
    });
  });
});

describe("StreamReader", () => {
  it("reads values until the input ends", () => {
    const reader = new StreamReader(new Uint8Array([0x01, 0xa1, 0x61, 0x92, 0xc3, 0xc2]));

    expect(reader.next()).toEqual(int(1));
    expect(reader.position).toBe(1);
    expect(reader.next()).toEqual(str("a"));
    expect(reader.next()).toEqual(array(bool(true), bool(false)));
    expect(reader.next()).toBeNull();
    expect(reader.next()).toBeNull();
  });

  it("returns null on empty input", () => {
    expect(new StreamReader(new Uint8Array()).next()).toBeNull();
  });

  it("fails when the input ends inside a value", () => {
    const reader = new StreamReader(new Uint8Array([0x01, 0xcd, 0x01]));
    expect(reader.next()).toEqual(int(1));
    expect(() => reader.next()).toThrow(UnexpectedEofError);
  });

  it("fails when the input ends between the elements of a container", () => {
    const reader = new StreamReader(new Uint8Array([0x92, 0x01]));
    expect(() => reader.next()).toThrow("End of input");
  });

  it("iterates synchronously", () => {
    const reader = new StreamReader(new Uint8Array([0x01, 0x02, 0x03]));
    expect([...reader]).toEqual([int(1), int(2), int(3)]);
  });

  it("iterates asynchronously", async () => {
    const reader = new StreamReader(new Uint8Array([0x04, 0x05]));
    const values: Value[] = [];
    for await (const value of reader) {
      values.push(value);
    }
    expect(values).toEqual([int(4), int(5)]);
  });

  it("collects remaining values", () => {
    const reader = new StreamReader(new Uint8Array([0x01, 0x02]));
    reader.next();
    expect(reader.toArray()).toEqual([int(2)]);
  });

  it("reads from a chunked source", () => {
    const source = new ChunkSource([new Uint8Array([0x81, 0xa1]), new Uint8Array([0x6b, 0x07, 0x08])]);
    expect(new StreamReader(source).toArray()).toEqual([map([str("k"), int(7)]), int(8)]);
  });

  it("passes decode options through", () => {
    const reader = new StreamReader(new Uint8Array([0x82, 0x01, 0xc0, 0x01, 0xc3]), { allowDuplicateKeys: true });
    expect(reader.next()).toEqual(map([int(1), NIL]));
  });

  it("reads what StreamWriter writes", () => {
    const stream = new StreamWriter();
    stream.write([1, "two"]);
    stream.write(new Map([["k", true]]));
    stream.write(-5);

    expect(new StreamReader(stream.bytes()).toArray()).toEqual([
      array(int(1), str("two")),
      map([str("k"), bool(true)]),
      int(-5),
    ]);
  });
});
