import { describe, expect, it } from "vitest";
import { applyFieldMappings, parseFieldValue } from "./field-mappings.js";
import type { JsonObject } from "./types.js";

describe("parseFieldValue", () => {
  it("passes strings through", () => {
    expect(parseFieldValue(" as-is ", "str")).toBe(" as-is ");
  });

  it("parses integers and rejects anything else", () => {
    expect(parseFieldValue(" 4000 ", "int")).toBe(4000);
    expect(() => parseFieldValue("4k", "int", "TEXT_LIMIT")).toThrow(
      'TEXT_LIMIT must be an integer, got "4k"',
    );
  });

  it("treats bool_true as on unless the value is false", () => {
    expect(parseFieldValue("FALSE", "bool_true")).toBe(false);
    expect(parseFieldValue("no", "bool_true")).toBe(true);
    expect(parseFieldValue("", "bool_true")).toBe(true);
  });

  it("treats bool_false as off unless the value is true", () => {
    expect(parseFieldValue("True", "bool_false")).toBe(true);
    expect(parseFieldValue("1", "bool_false")).toBe(false);
  });

  it("splits csv and drops blanks", () => {
    expect(parseFieldValue(" a, b ,,c ", "csv")).toEqual(["a", "b", "c"]);
    expect(parseFieldValue("", "csv")).toEqual([]);
  });

  it("turns numeric csv_smart items into numbers", () => {
    expect(parseFieldValue("123456, @alice, -7", "csv_smart")).toEqual([123456, "@alice", -7]);
  });
});

describe("applyFieldMappings", () => {
  it("writes only variables that are set, at dotted paths", () => {
    const target: JsonObject = { keep: 1 };
    const applied = applyFieldMappings(
      target,
      [
        { env: "X_POLICY", path: "dm.policy", type: "str" },
        { env: "X_LIMIT", path: "limit", type: "int" },
        { env: "X_MISSING", path: "missing", type: "str" },
      ],
      { X_POLICY: "pairing", X_LIMIT: "20" },
    );
    expect(applied).toEqual(["dm.policy", "limit"]);
    expect(target).toEqual({ keep: 1, dm: { policy: "pairing" }, limit: 20 });
  });
});
