import { ExtValue } from "./value";
import {
  MAX_APPLICATION_EXTENSION_TYPE,
  MAX_STANDARD_EXTENSION_TYPE,
  MIN_APPLICATION_EXTENSION_TYPE,
  MIN_STANDARD_EXTENSION_TYPE,
} from "./types";
import type { ExtensionType } from "./types";
import type { DecodeTransformer, Decoded } from "./transformers";
import { timestampExtension } from "./timestamp";

/**
 * Produces the payload for a host value, or undefined if the extension does
 * not claim it.
 */
export type ExtensionEncoder = (value: unknown) => Uint8Array | undefined;

/**
 * Turns an extension payload into a value.
 */
export type ExtensionDecoder = (data: Uint8Array, type: ExtensionType) => Decoded;

/**
 * An extension type and its codec functions. Either side may be omitted.
 */
export interface Extension {
  type: ExtensionType;
  name: string;
  encode?: ExtensionEncoder;
  decode?: ExtensionDecoder;
}

/**
 * ExtensionRegistry holds at most one extension per type code, within a
 * fixed range of codes.
 */
export class ExtensionRegistry {
  private byType: Map<ExtensionType, Extension> = new Map();
  private byName: Map<string, Extension> = new Map();
  private frozen = false;

  constructor(
    readonly minType: ExtensionType,
    readonly maxType: ExtensionType
  ) {}

  /**
   * Creates a registry for application extension types (0 to 127).
   */
  static application(): ExtensionRegistry {
    return new ExtensionRegistry(MIN_APPLICATION_EXTENSION_TYPE, MAX_APPLICATION_EXTENSION_TYPE);
  }

  /**
   * Creates a registry for standard extension types (-128 to -1).
   */
  static standard(): ExtensionRegistry {
    return new ExtensionRegistry(MIN_STANDARD_EXTENSION_TYPE, MAX_STANDARD_EXTENSION_TYPE);
  }

  /**
   * Registers an extension. Returns the registry for chaining.
   */
  register(extension: Extension): this {
    if (this.frozen) {
      throw new Error(`Registry is frozen; cannot register "${extension.name}"`);
    }
    const { type, name } = extension;
    if (!Number.isInteger(type) || type < this.minType || type > this.maxType) {
      throw new RangeError(`Extension type ${type} outside ${this.minType}..${this.maxType}`);
    }
    if (this.byType.has(type)) {
      throw new Error(`Extension type ${type} already registered`);
    }
    if (this.byName.has(name)) {
      throw new Error(`Extension name "${name}" already registered`);
    }
    this.byType.set(type, extension);
    this.byName.set(name, extension);
    return this;
  }

  /**
   * Gets the extension registered for a type code.
   */
  get(type: ExtensionType): Extension | undefined {
    return this.byType.get(type);
  }

  /**
   * Gets the extension registered under a name.
   */
  getByName(name: string): Extension | undefined {
    return this.byName.get(name);
  }

  /**
   * Checks if a type code is registered.
   */
  isRegistered(type: ExtensionType): boolean {
    return this.byType.has(type);
  }

  /**
   * Returns the extensions with an encoder, in registration order.
   */
  encoders(): Extension[] {
    return [...this.byType.values()].filter((ext) => ext.encode !== undefined);
  }

  get size(): number {
    return this.byType.size;
  }

  /**
   * Prevents further registrations.
   */
  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Clears all registrations.
   */
  clear(): void {
    if (this.frozen) {
      throw new Error("Registry is frozen");
    }
    this.byType.clear();
    this.byName.clear();
  }
}

/**
 * The built-in standard extensions (timestamp, type -1). Frozen.
 */
export const standardExtensions = ExtensionRegistry.standard().register(timestampExtension).freeze();

/**
 * Makes a decode transformer that resolves unresolved extensions through a
 * registry. Values it has no decoder for pass through unchanged.
 */
export function makeExtensionTransformer(registry: ExtensionRegistry): DecodeTransformer {
  return (decoded) => {
    const { value } = decoded;
    if (!(value instanceof ExtValue)) {
      return decoded;
    }
    const decode = registry.get(value.type)?.decode;
    if (decode === undefined) {
      return decoded;
    }
    return decode(value.data, value.type);
  };
}
