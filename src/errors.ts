/**
 * Base error class for packwire errors.
 */
export class PackwireError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PackwireError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends PackwireError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends PackwireError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a value has no wire representation and no transformer
 * or extension claims it.
 */
export class UnsupportedTypeError extends EncodeError {
  constructor(description: string) {
    super(`Unsupported type: ${description}`);
    this.name = "UnsupportedTypeError";
  }
}

/**
 * Error thrown when a length, count or integer does not fit the largest
 * wire form.
 */
export class TooBigError extends EncodeError {
  constructor(what: string, size: number | bigint) {
    super(`Too big: ${what} ${size} exceeds the largest encodable size`);
    this.name = "TooBigError";
  }
}

/**
 * Error thrown when no bytes at all were available for a read.
 */
export class EofError extends DecodeError {
  constructor(message = "End of input") {
    super(message);
    this.name = "EofError";
  }
}

/**
 * Error thrown when input ends part way through a read.
 */
export class UnexpectedEofError extends EofError {
  constructor(needed: number, available: number) {
    super(`Unexpected end of input: needed ${needed} bytes, only ${available} available`);
    this.name = "UnexpectedEofError";
  }
}

/**
 * Error thrown on the reserved tag byte.
 */
export class InvalidFormatError extends DecodeError {
  constructor(tag: number) {
    super(`Invalid format: tag 0x${tag.toString(16).padStart(2, "0")}`);
    this.name = "InvalidFormatError";
  }
}

export class InvalidTimestampError extends DecodeError {
  constructor(reason: string) {
    super(`Invalid timestamp: ${reason}`);
    this.name = "InvalidTimestampError";
  }
}

export class DuplicateKeyError extends DecodeError {
  constructor() {
    super("Duplicate map key");
    this.name = "DuplicateKeyError";
  }
}

/**
 * Error thrown when a decoded map key is not usable as a key.
 */
export class UnsupportedKeyTypeError extends DecodeError {
  constructor(kind: string) {
    super(`Unsupported map key type: ${kind}`);
    this.name = "UnsupportedKeyTypeError";
  }
}

export class UnsupportedExtensionTypeError extends DecodeError {
  constructor(type: number) {
    super(`Unsupported extension type: ${type}`);
    this.name = "UnsupportedExtensionTypeError";
  }
}

/**
 * Error thrown when nesting exceeds the configured depth.
 */
export class DepthLimitExceededError extends PackwireError {
  constructor(maxDepth: number) {
    super(`Nesting depth exceeds limit of ${maxDepth}`);
    this.name = "DepthLimitExceededError";
  }
}

/**
 * Error thrown when writing to a closed stream.
 */
export class StreamClosedError extends PackwireError {
  constructor() {
    super("Stream is closed");
    this.name = "StreamClosedError";
  }
}
