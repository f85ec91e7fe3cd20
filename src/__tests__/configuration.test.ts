import { describe, test, expect } from "vitest";
import {
  Configuration,
  ConfigValueTypeError,
  booleanValue,
  classValue,
  numberValue,
  stringValue,
} from "../configuration.js";

function sample(): Configuration {
  return Configuration.fromObject({
    name: "pagerank",
    retries: 3,
    verbose: true,
    format: { class: "com.example.FooOutputFormat" },
  });
}

// ── fromObject / toObject ───────────────────────────────────────

describe("Configuration.fromObject", () => {
  test("tags each document value by its JSON type", () => {
    const config = sample();

    expect(config.get("name")).toEqual({ type: "string", value: "pagerank" });
    expect(config.get("retries")).toEqual({ type: "number", value: 3 });
    expect(config.get("verbose")).toEqual({ type: "boolean", value: true });
    expect(config.get("format")).toEqual({
      type: "class",
      value: "com.example.FooOutputFormat",
    });
  });

  test("toObject returns the document it was built from", () => {
    const document = {
      name: "pagerank",
      retries: 3,
      verbose: true,
      format: { class: "com.example.FooOutputFormat" },
    };

    expect(Configuration.fromObject(document).toObject()).toEqual(document);
  });

  test("toObject keeps a __proto__ key as an own entry", () => {
    const config = new Configuration()
      .set("__proto__", classValue("com.example.X"))
      .set("a", numberValue(1));

    const document = config.toObject();

    expect(Object.keys(document)).toEqual(["__proto__", "a"]);
    expect(Object.getPrototypeOf(document)).toBe(Object.prototype);
    expect(JSON.stringify(document)).toBe(
      '{"__proto__":{"class":"com.example.X"},"a":1}',
    );
  });

  test("fromObject reads a __proto__ key from parsed JSON", () => {
    const config = Configuration.fromObject(
      JSON.parse('{"__proto__":"x","a":1}'),
    );

    expect(config.getString("__proto__")).toBe("x");
    expect(config.size).toBe(2);
  });

  test("empty document gives an empty configuration", () => {
    const config = Configuration.fromObject({});

    expect(config.size).toBe(0);
    expect([...config.keys()]).toEqual([]);
    expect(config.toObject()).toEqual({});
  });
});

// ── typed accessors ─────────────────────────────────────────────

describe("typed accessors", () => {
  test("return the stored value when the type matches", () => {
    const config = sample();

    expect(config.getString("name")).toBe("pagerank");
    expect(config.getNumber("retries")).toBe(3);
    expect(config.getBoolean("verbose")).toBe(true);
    expect(config.getClassName("format")).toBe("com.example.FooOutputFormat");
  });

  test("return undefined for a missing key", () => {
    const config = new Configuration();

    expect(config.getString("missing")).toBeUndefined();
    expect(config.getNumber("missing")).toBeUndefined();
    expect(config.getBoolean("missing")).toBeUndefined();
    expect(config.getClassName("missing")).toBeUndefined();
    expect(config.getName("missing")).toBeUndefined();
  });

  test("throw ConfigValueTypeError instead of coercing", () => {
    const config = sample();

    expect(() => config.getString("retries")).toThrow(ConfigValueTypeError);
    expect(() => config.getNumber("name")).toThrow(ConfigValueTypeError);
    expect(() => config.getBoolean("name")).toThrow(ConfigValueTypeError);
    expect(() => config.getClassName("name")).toThrow(ConfigValueTypeError);
  });

  test("type error names the key and both types", () => {
    const config = sample();

    try {
      config.getString("retries");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValueTypeError);
      if (error instanceof ConfigValueTypeError) {
        expect(error.key).toBe("retries");
        expect(error.expected).toEqual(["string"]);
        expect(error.actual).toBe("number");
        expect(error.message).toBe(
          "Configuration key 'retries' holds a number value, expected string",
        );
      }
    }
  });

  test("getName accepts strings and class references only", () => {
    const config = new Configuration()
      .set("a", stringValue("com.example.A"))
      .set("b", classValue("com.example.B"))
      .set("c", booleanValue(false));

    expect(config.getName("a")).toBe("com.example.A");
    expect(config.getName("b")).toBe("com.example.B");
    expect(() => config.getName("c")).toThrow(
      "Configuration key 'c' holds a boolean value, expected string or class",
    );
  });
});

// ── copy ────────────────────────────────────────────────────────

describe("copy", () => {
  test("returns a distinct instance with equal entries", () => {
    const config = sample();
    const copy = config.copy();

    expect(copy).not.toBe(config);
    expect(copy.toObject()).toEqual(config.toObject());
  });

  test("changes to the copy do not reach the original", () => {
    const config = sample();
    const copy = config.copy();

    copy.set("retries", numberValue(9));
    copy.set("added", stringValue("x"));
    copy.delete("name");

    expect(config.getNumber("retries")).toBe(3);
    expect(config.has("added")).toBe(false);
    expect(config.getString("name")).toBe("pagerank");
  });

  test("changes to the original do not reach the copy", () => {
    const config = sample();
    const copy = config.copy();

    config.set("name", stringValue("changed"));

    expect(copy.getString("name")).toBe("pagerank");
  });
});

// ── set / delete ────────────────────────────────────────────────

describe("set and delete", () => {
  test("set replaces an existing entry and keeps the key count", () => {
    const config = sample();

    config.set("name", stringValue("sssp"));

    expect(config.getString("name")).toBe("sssp");
    expect(config.size).toBe(4);
  });

  test("delete reports whether the key was present", () => {
    const config = sample();

    expect(config.delete("name")).toBe(true);
    expect(config.delete("name")).toBe(false);
    expect(config.has("name")).toBe(false);
  });
});
