import { InvalidTimestampError, UnsupportedTypeError } from "./errors";
import { fitsInt64 } from "./types";
import { ResolvedValue } from "./value";
import { Writer } from "./writer";
import type { Extension } from "./registry";

/** Extension type of the standard timestamp. */
export const TIMESTAMP_EXTENSION_TYPE = -1;

const NANOS_PER_SECOND = 1_000_000_000;
const MAX_UINT32_SECONDS = 0xffffffffn;
const MAX_SECONDS_34 = (1n << 34n) - 1n;

/**
 * A point in time as whole seconds since the Unix epoch plus nanoseconds.
 * Covers the full range of the timestamp extension, unlike Date.
 */
export class Timestamp {
  readonly seconds: bigint;
  readonly nanoseconds: number;

  constructor(seconds: bigint | number, nanoseconds = 0) {
    if (typeof seconds === "number" && !Number.isSafeInteger(seconds)) {
      throw new RangeError(`Not a safe integer: ${seconds}`);
    }
    const s = BigInt(seconds);
    if (!fitsInt64(s)) {
      throw new RangeError(`Seconds ${s} out of int64 range`);
    }
    if (!Number.isInteger(nanoseconds) || nanoseconds < 0 || nanoseconds >= NANOS_PER_SECOND) {
      throw new RangeError(`Nanoseconds ${nanoseconds} out of range 0..999999999`);
    }
    this.seconds = s;
    this.nanoseconds = nanoseconds;
  }

  /**
   * Creates a timestamp from milliseconds since the epoch.
   */
  static fromMillis(millis: number): Timestamp {
    if (!Number.isFinite(millis)) {
      throw new RangeError(`Invalid time value: ${millis}`);
    }
    const seconds = Math.floor(millis / 1000);
    const nanos = Math.round((millis - seconds * 1000) * 1_000_000);
    if (nanos === NANOS_PER_SECOND) {
      return new Timestamp(seconds + 1, 0);
    }
    return new Timestamp(seconds, nanos);
  }

  static fromDate(date: Date): Timestamp {
    return Timestamp.fromMillis(date.getTime());
  }

  /**
   * Returns milliseconds since the epoch. Sub-millisecond precision is
   * truncated.
   */
  toMillis(): number {
    return Number(this.seconds) * 1000 + Math.floor(this.nanoseconds / 1_000_000);
  }

  toDate(): Date {
    return new Date(this.toMillis());
  }

  equals(other: Timestamp): boolean {
    return this.seconds === other.seconds && this.nanoseconds === other.nanoseconds;
  }
}

/**
 * Encodes a timestamp payload in the smallest of the 32, 64 and 96-bit
 * forms.
 */
export function encodeTimestamp(ts: Timestamp): Uint8Array {
  const { seconds, nanoseconds } = ts;
  if (seconds >= 0n && nanoseconds === 0 && seconds <= MAX_UINT32_SECONDS) {
    const writer = new Writer(4);
    writer.writeUint32(Number(seconds));
    return writer.bytes();
  }
  if (seconds >= 0n && seconds <= MAX_SECONDS_34) {
    const writer = new Writer(8);
    writer.writeUint64((BigInt(nanoseconds) << 34n) | seconds);
    return writer.bytes();
  }
  const writer = new Writer(12);
  writer.writeUint32(nanoseconds);
  writer.writeInt64(seconds);
  return writer.bytes();
}

/**
 * Decodes a timestamp payload.
 *
 * @throws InvalidTimestampError on a bad length or nanosecond field
 */
export function decodeTimestamp(data: Uint8Array): Timestamp {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  switch (data.length) {
    case 4:
      return new Timestamp(BigInt(view.getUint32(0)), 0);
    case 8: {
      const packed = view.getBigUint64(0);
      return checked(packed & MAX_SECONDS_34, Number(packed >> 34n));
    }
    case 12:
      return checked(view.getBigInt64(4), view.getUint32(0));
    default:
      throw new InvalidTimestampError(`payload length ${data.length}`);
  }
}

function checked(seconds: bigint, nanoseconds: number): Timestamp {
  if (nanoseconds >= NANOS_PER_SECOND) {
    throw new InvalidTimestampError(`nanoseconds ${nanoseconds} out of range`);
  }
  return new Timestamp(seconds, nanoseconds);
}

/**
 * The standard timestamp extension. Encodes Timestamp and Date values;
 * decodes to a ResolvedValue holding a Timestamp, usable as a map key.
 */
export const timestampExtension: Extension = {
  type: TIMESTAMP_EXTENSION_TYPE,
  name: "timestamp",
  encode(value) {
    if (value instanceof Timestamp) {
      return encodeTimestamp(value);
    }
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw new UnsupportedTypeError("invalid Date");
      }
      return encodeTimestamp(Timestamp.fromDate(value));
    }
    return undefined;
  },
  decode(data, type) {
    const ts = decodeTimestamp(data);
    // Equal instants are one key whichever form carried them.
    return {
      value: new ResolvedValue(type, data, ts, `${ts.seconds}:${ts.nanoseconds}`),
      keyEligible: true,
    };
  },
};
