import { Float32Value, Float64Value, UintValue } from "./value";
import type { Value } from "./value";
import { recordTransformer } from "./record";

/**
 * Rewrites a host value before encoding. A transformer that does not apply
 * returns its argument unchanged (the same reference).
 */
export type Transformer = (value: unknown) => unknown;

/**
 * A decoded value together with whether it may be used as a map key.
 */
export interface Decoded {
  value: Value;
  keyEligible: boolean;
}

/**
 * Rewrites a value after decoding.
 */
export type DecodeTransformer = (decoded: Decoded) => Decoded;

/**
 * Chains transformers left to right.
 */
export function composeTransformers(...transformers: Transformer[]): Transformer {
  return (value) => transformers.reduce((acc, t) => t(acc), value);
}

/**
 * Chains decode transformers left to right.
 */
export function composeDecodeTransformers(...transformers: DecodeTransformer[]): DecodeTransformer {
  return (decoded) => transformers.reduce((acc, t) => t(acc), decoded);
}

/**
 * Turns sets and typed arrays (other than Uint8Array, which encodes as
 * binary) into arrays. Elements of unsigned and floating-point typed arrays
 * keep their family.
 */
export const arrayTransformer: Transformer = (value) => {
  if (value instanceof Set) {
    return Array.from(value);
  }
  if (value instanceof Float32Array) {
    return Array.from(value, (x) => new Float32Value(x));
  }
  if (value instanceof Float64Array) {
    return Array.from(value, (x) => new Float64Value(x));
  }
  if (value instanceof Uint8ClampedArray || value instanceof Uint16Array || value instanceof Uint32Array) {
    return Array.from(value, (x) => new UintValue(x));
  }
  if (value instanceof BigUint64Array) {
    return Array.from(value, (x) => new UintValue(x));
  }
  if (value instanceof Int8Array || value instanceof Int16Array || value instanceof Int32Array) {
    return Array.from(value);
  }
  if (value instanceof BigInt64Array) {
    return Array.from(value);
  }
  return value;
};

/**
 * Late transformers used when none are configured.
 */
export const standardLateTransformers: readonly Transformer[] = [arrayTransformer, recordTransformer];
