import type {
  ConfigDocument,
  ConfigDocumentValue,
} from "./schemas/config-document.js";

export type ConfigValue =
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "number"; readonly value: number }
  | { readonly type: "boolean"; readonly value: boolean }
  | { readonly type: "class"; readonly value: string };

export type ConfigValueType = ConfigValue["type"];

/**
 * Read side of a configuration. Anything that can enumerate its keys and
 * look a value up by key can be the source of a derivation.
 */
export interface ReadableConfiguration {
  keys(): Iterable<string>;
  get(key: string): ConfigValue | undefined;
  has(key: string): boolean;
}

export class ConfigValueTypeError extends Error {
  constructor(
    readonly key: string,
    readonly expected: readonly ConfigValueType[],
    readonly actual: ConfigValueType,
  ) {
    super(
      `Configuration key '${key}' holds a ${actual} value, expected ${expected.join(" or ")}`,
    );
    this.name = "ConfigValueTypeError";
  }
}

export const stringValue = (value: string): ConfigValue => ({ type: "string", value });
export const numberValue = (value: number): ConfigValue => ({ type: "number", value });
export const booleanValue = (value: boolean): ConfigValue => ({ type: "boolean", value });
export const classValue = (name: string): ConfigValue => ({ type: "class", value: name });

/** Tag a plain document value. `{ class: name }` becomes a class reference. */
export function fromDocumentValue(raw: ConfigDocumentValue): ConfigValue {
  if (typeof raw === "string") return stringValue(raw);
  if (typeof raw === "number") return numberValue(raw);
  if (typeof raw === "boolean") return booleanValue(raw);
  return classValue(raw.class);
}

export function toDocumentValue(value: ConfigValue): ConfigDocumentValue {
  return value.type === "class" ? { class: value.value } : value.value;
}

/**
 * Key/value configuration describing one stage: where it reads, where it
 * writes, which formats it uses, and any other settings the stage runtime
 * needs. Values are immutable; entries are replaced, never edited in place.
 */
export class Configuration implements ReadableConfiguration {
  private readonly entries = new Map<string, ConfigValue>();

  constructor(entries?: Iterable<readonly [string, ConfigValue]>) {
    if (entries) {
      for (const [key, value] of entries) {
        this.entries.set(key, value);
      }
    }
  }

  static fromObject(document: ConfigDocument): Configuration {
    const config = new Configuration();
    for (const [key, raw] of Object.entries(document)) {
      config.set(key, fromDocumentValue(raw));
    }
    return config;
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): IterableIterator<string> {
    return this.entries.keys();
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): ConfigValue | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: ConfigValue): this {
    this.entries.set(key, value);
    return this;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  getString(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "string") {
      throw new ConfigValueTypeError(key, ["string"], entry.type);
    }
    return entry.value;
  }

  getNumber(key: string): number | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "number") {
      throw new ConfigValueTypeError(key, ["number"], entry.type);
    }
    return entry.value;
  }

  getBoolean(key: string): boolean | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "boolean") {
      throw new ConfigValueTypeError(key, ["boolean"], entry.type);
    }
    return entry.value;
  }

  getClassName(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "class") {
      throw new ConfigValueTypeError(key, ["class"], entry.type);
    }
    return entry.value;
  }

  /**
   * Reads a name that may be stored either as a class reference or as a
   * plain string, which is how format classes usually arrive from files.
   */
  getName(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (entry.type !== "string" && entry.type !== "class") {
      throw new ConfigValueTypeError(key, ["string", "class"], entry.type);
    }
    return entry.value;
  }

  /** Independent instance holding the same entries. */
  copy(): Configuration {
    return new Configuration(this.entries);
  }

  toObject(): ConfigDocument {
    // fromEntries defines own properties, so "__proto__" survives as a key
    return Object.fromEntries(
      [...this.entries].map(
        ([key, value]): [string, ConfigDocumentValue] => [key, toDocumentValue(value)],
      ),
    );
  }
}
