import { describe, it, expect } from "vitest";
import {
  BoundedReader,
  ExtensionRegistry,
  NIL,
  ResolvedValue,
  StreamReader,
  StreamWriter,
  Timestamp,
  UintValue,
  Writer,
  array,
  bool,
  decode,
  encode,
  ext,
  float64,
  int,
  map,
  str,
  uint,
} from "../../src";
import type { Extension } from "../../src";

class Money {
  constructor(
    readonly cents: bigint,
    readonly currency: string
  ) {}
}

const moneyExtension: Extension = {
  type: 7,
  name: "money",
  encode: (value) => {
    if (!(value instanceof Money)) {
      return undefined;
    }
    const writer = new Writer(11);
    writer.writeInt64(value.cents);
    writer.writeBytes(new TextEncoder().encode(value.currency));
    return writer.bytes();
  },
  decode: (data, type) => {
    const reader = new BoundedReader(data);
    const cents = reader.readInt64();
    const currency = new TextDecoder().decode(reader.readExact(data.length - 8));
    return { value: new ResolvedValue(type, data, new Money(cents, currency)), keyEligible: false };
  },
};

class Duration {
  constructor(readonly nanos: bigint) {}
}

const durationExtension: Extension = {
  type: 42,
  name: "duration",
  encode: (value) => {
    if (!(value instanceof Duration)) {
      return undefined;
    }
    const writer = new Writer(8);
    writer.writeInt64(value.nanos);
    return writer.bytes();
  },
  decode: (data, type) => ({
    value: new ResolvedValue(type, data, new Duration(new BoundedReader(data).readInt64())),
    keyEligible: true,
  }),
};

describe("round trip", () => {
  it("encodes and decodes the example document", () => {
    const bytes = encode([{ foo: "bar" }, 123, 4.5]);
    expect(Array.from(bytes)).toEqual([
      0x93, 0x81, 0xa3, 0x66, 0x6f, 0x6f, 0xa3, 0x62, 0x61, 0x72, 0x7b, 0xcb, 0x40, 0x12, 0x00, 0x00, 0x00, 0x00,
      0x00, 0x00,
    ]);

    const tree = decode(bytes);
    expect(tree).toEqual(array(map([str("foo"), str("bar")]), int(123), float64(4.5)));
    expect(encode(tree)).toEqual(bytes);
  });

  it("re-encodes decoded values in their smallest form", () => {
    expect(Array.from(encode(decode(new Uint8Array([0xd1, 0x00, 0x05]))))).toEqual([0x05]);
    expect(Array.from(encode(decode(new Uint8Array([0xda, 0x00, 0x01, 0x61]))))).toEqual([0xa1, 0x61]);
    expect(Array.from(encode(decode(new Uint8Array([0xcf, 0, 0, 0, 0, 0, 0, 0, 0x05]))))).toEqual([0xcc, 0x05]);
  });

  it("keeps float widths", () => {
    const float32 = new Uint8Array([0xca, 0x3f, 0xc0, 0x00, 0x00]);
    expect(encode(decode(float32))).toEqual(float32);
  });

  it("keeps signed and unsigned keys apart", () => {
    const bytes = new Uint8Array([0x82, 0x0c, 0xa1, 0x61, 0xcc, 0x0c, 0xa1, 0x62]);
    const tree = decode(bytes);
    expect(tree).toEqual(map([int(12), str("a")], [uint(12), str("b")]));
    expect(encode(tree)).toEqual(bytes);
  });

  it("carries unknown extensions through unchanged", () => {
    const bytes = new Uint8Array([0xd5, 0x05, 0x01, 0x02]);
    const tree = decode(bytes);
    expect(tree).toEqual(ext(5, [1, 2]));
    expect(encode(tree)).toEqual(bytes);
  });

  it("round-trips dates through the timestamp extension", () => {
    const bytes = encode(new Date(1500));
    expect(Array.from(bytes)).toEqual([0xd7, 0xff, 0x77, 0x35, 0x94, 0x00, 0x00, 0x00, 0x00, 0x01]);

    const tree = decode(bytes);
    if (!(tree instanceof ResolvedValue) || !(tree.value instanceof Timestamp)) {
      throw new Error("expected a timestamp");
    }
    expect(tree.value.toDate().getTime()).toBe(1500);
    expect(encode(tree)).toEqual(bytes);
  });

  it("round-trips a duration through its extension", () => {
    const extensions = ExtensionRegistry.application().register(durationExtension);
    const bytes = encode(new Duration(123n), { extensions });
    expect(Array.from(bytes)).toEqual([0xd7, 0x2a, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x7b]);

    const tree = decode(bytes, { extensions });
    expect(tree instanceof ResolvedValue && tree.value).toEqual(new Duration(123n));
  });

  it("round-trips text bytes exactly, valid UTF-8 or not", () => {
    const bytes = new Uint8Array([0x82, 0xa1, 0xff, 0x01, 0xa2, 0xc3, 0x28, 0x02]);
    expect(encode(decode(bytes))).toEqual(bytes);
    expect(Array.from(encode(decode(new Uint8Array([0xa1, 0xff]))))).toEqual([0xa1, 0xff]);
  });

  it("round-trips application extensions", () => {
    const extensions = ExtensionRegistry.application().register(moneyExtension);
    const bytes = encode([new Money(-250n, "EUR")], { extensions });
    expect(Array.from(bytes)).toEqual([
      0x91, 0xc7, 0x0b, 0x07, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0x06, 0x45, 0x55, 0x52,
    ]);

    const tree = decode(bytes, { extensions });
    if (tree.kind !== "array") {
      throw new Error("expected an array");
    }
    const [first] = tree.items;
    expect(first instanceof ResolvedValue && first.value).toEqual(new Money(-250n, "EUR"));
    expect(encode(tree)).toEqual(bytes);
  });

  it("round-trips records, sets and typed arrays", () => {
    const bytes = encode({ tags: new Set(["a"]), sizes: new Uint16Array([1, 300]) });
    const tree = decode(bytes);
    expect(tree).toEqual(
      map([str("tags"), array(str("a"))], [str("sizes"), array(new UintValue(1), new UintValue(300))])
    );
    expect(encode(tree)).toEqual(bytes);
  });

  it("round-trips a stream of values", () => {
    const stream = new StreamWriter();
    stream.write({ id: 1 });
    stream.write([true, null]);
    stream.write(2n ** 63n);

    expect(new StreamReader(stream.bytes()).toArray()).toEqual([
      map([str("id"), int(1)]),
      array(bool(true), NIL),
      uint(2n ** 63n),
    ]);
  });
});
