import { describe, expect, it } from "vitest";
import {
  applyBindings,
  decodeBindingName,
  encodeBindingName,
  inferValue,
  parseEnvBindings,
} from "./env-bindings.js";
import { getAtPath } from "./document.js";
import type { ConfigDocument } from "./types.js";

describe("decodeBindingName", () => {
  it("splits the remainder on double underscores", () => {
    expect(decodeBindingName("GATEWAY_JSON__agents__defaults__maxConcurrent")).toEqual([
      "agents",
      "defaults",
      "maxConcurrent",
    ]);
  });

  it("keeps single underscores inside a segment", () => {
    expect(decodeBindingName("GATEWAY_JSON__tools__web_search__enabled")).toEqual([
      "tools",
      "web_search",
      "enabled",
    ]);
  });

  it("rejects a bare prefix", () => {
    expect(decodeBindingName("GATEWAY_JSON__")).toEqual({ reason: "no path after prefix" });
  });

  it("rejects empty segments", () => {
    expect(decodeBindingName("GATEWAY_JSON__a____b")).toEqual({ reason: "empty path segment" });
    expect(decodeBindingName("GATEWAY_JSON__a__")).toEqual({ reason: "empty path segment" });
  });

  it("round-trips through encodeBindingName", () => {
    const path = ["channels", "telegram", "dmPolicy"];
    expect(decodeBindingName(encodeBindingName(path))).toEqual(path);
  });
});

describe("parseEnvBindings", () => {
  it("keeps only prefixed variables, sorted by name", () => {
    const { bindings, issues } = parseEnvBindings({
      HOME: "/root",
      GATEWAY_JSON__b: "2",
      GATEWAY_JSON__a__x: "1",
      GATEWAY_PORT: "9000",
    });
    expect(bindings.map((b) => b.name)).toEqual(["GATEWAY_JSON__a__x", "GATEWAY_JSON__b"]);
    expect(bindings[0]).toEqual({ name: "GATEWAY_JSON__a__x", path: ["a", "x"], raw: "1" });
    expect(issues).toEqual([]);
  });

  it("reports malformed names instead of applying them", () => {
    const { bindings, issues } = parseEnvBindings({ GATEWAY_JSON__: "x", GATEWAY_JSON__ok: "y" });
    expect(bindings.map((b) => b.name)).toEqual(["GATEWAY_JSON__ok"]);
    expect(issues).toEqual([{ name: "GATEWAY_JSON__", reason: "no path after prefix" }]);
  });
});

describe("inferValue", () => {
  it("parses booleans case-insensitively", () => {
    expect(inferValue("true")).toBe(true);
    expect(inferValue("FALSE")).toBe(false);
  });

  it("parses integers and decimals", () => {
    expect(inferValue("10")).toBe(10);
    expect(inferValue("-3")).toBe(-3);
    expect(inferValue("0.25")).toBe(0.25);
  });

  it("keeps integers beyond the safe range as strings", () => {
    expect(inferValue("123456789012345678901")).toBe("123456789012345678901");
  });

  it("does not treat exponent notation or hex as numbers", () => {
    expect(inferValue("1e5")).toBe("1e5");
    expect(inferValue("0x10")).toBe("0x10");
  });

  it("parses JSON objects and arrays", () => {
    expect(inferValue('{"a":[1,"b"]}')).toEqual({ a: [1, "b"] });
    expect(inferValue('["x","y"]')).toEqual(["x", "y"]);
  });

  it("keeps a __proto__ key as an ordinary key", () => {
    const value = inferValue('{"__proto__":{"a":1},"b":2}');
    expect(JSON.stringify(value)).toBe('{"__proto__":{"a":1},"b":2}');
    expect(getAtPath(value, ["__proto__", "a"])).toBe(1);
    expect(Object.getPrototypeOf(value)).toBe(Object.prototype);
  });

  it("keeps invalid JSON as a string", () => {
    expect(inferValue("{not json")).toBe("{not json");
  });

  it("leaves other strings untouched, including whitespace", () => {
    expect(inferValue("safeguard")).toBe("safeguard");
    expect(inferValue(" padded ")).toBe(" padded ");
    expect(inferValue("")).toBe("");
  });
});

describe("applyBindings", () => {
  it("builds nested objects for the documented scenario", () => {
    const { bindings } = parseEnvBindings({
      GATEWAY_JSON__agents__defaults__maxConcurrent: "10",
      GATEWAY_JSON__agents__defaults__compaction__mode: "safeguard",
    });
    const doc = applyBindings({}, bindings);
    expect(doc).toEqual({
      agents: { defaults: { maxConcurrent: 10, compaction: { mode: "safeguard" } } },
    });
  });

  it("replaces a scalar that sits where an object is needed", () => {
    const doc: ConfigDocument = { a: { b: "scalar" } };
    const { bindings } = parseEnvBindings({ GATEWAY_JSON__a__b__c: "1" });
    applyBindings(doc, bindings);
    expect(doc).toEqual({ a: { b: { c: 1 } } });
  });

  it("replaces an object leaf outright rather than merging into it", () => {
    const doc: ConfigDocument = { gateway: { controlUi: { enabled: true, basePath: "/ui" } } };
    const { bindings } = parseEnvBindings({ GATEWAY_JSON__gateway__controlUi: '{"enabled":false}' });
    applyBindings(doc, bindings);
    expect(doc).toEqual({ gateway: { controlUi: { enabled: false } } });
  });

  it("decodes every binding back to its inferred value", () => {
    const env = {
      GATEWAY_JSON__x__flag: "true",
      GATEWAY_JSON__x__count: "42",
      GATEWAY_JSON__x__ratio: "1.5",
      GATEWAY_JSON__x__name: "alpha",
      GATEWAY_JSON__y: "[1,2]",
    };
    const { bindings } = parseEnvBindings(env);
    const doc = applyBindings({}, bindings);
    for (const binding of bindings) {
      expect(getAtPath(doc, binding.path)).toEqual(inferValue(binding.raw));
    }
  });
});
