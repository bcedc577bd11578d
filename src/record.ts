import { ValueNode } from "./value";
import type { Transformer } from "./transformers";

/**
 * Options for makeRecordTransformer.
 */
export interface RecordTransformerOptions {
  /**
   * Maps a property name to the key written for it, or undefined to leave
   * the property out. Default: every property under its own name.
   */
  fieldKey?: (name: string, value: unknown) => string | undefined;
  /**
   * Also convert instances of user classes, not just plain objects.
   * Default: false
   */
  includeClassInstances?: boolean;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

// Built-ins that are never treated as records.
function isBuiltin(value: object): boolean {
  return (
    Array.isArray(value) ||
    ArrayBuffer.isView(value) ||
    value instanceof ArrayBuffer ||
    value instanceof Map ||
    value instanceof Set ||
    value instanceof WeakMap ||
    value instanceof WeakSet ||
    value instanceof Date ||
    value instanceof RegExp ||
    value instanceof Error ||
    value instanceof Promise ||
    value instanceof ValueNode
  );
}

function isRecord(value: unknown, includeClassInstances: boolean): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (isPlainObject(value)) {
    return true;
  }
  return includeClassInstances && !isBuiltin(value);
}

/**
 * Makes a transformer that turns records into a Map keyed by property
 * name. Property values are left for the encoder.
 */
export function makeRecordTransformer(options: RecordTransformerOptions = {}): Transformer {
  const fieldKey = options.fieldKey ?? ((name: string) => name);
  const includeClassInstances = options.includeClassInstances ?? false;

  return (value) => {
    if (!isRecord(value, includeClassInstances)) {
      return value;
    }
    const out = new Map<string, unknown>();
    for (const [name, field] of Object.entries(value)) {
      const key = fieldKey(name, field);
      if (key !== undefined) {
        out.set(key, field);
      }
    }
    return out;
  };
}

/**
 * Record transformer with default options.
 */
export const recordTransformer: Transformer = makeRecordTransformer();
