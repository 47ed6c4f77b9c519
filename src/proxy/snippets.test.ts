import bcrypt from "bcrypt";
import { describe, expect, it } from "vitest";
import {
  EMPTY_AUTH_SNIPPET,
  generateSnippets,
  parseAuthSnippet,
  renderAuthSnippet,
  renderHooksSnippet,
  resolveHooksConfig,
} from "./snippets.js";

// Lowest cost bcrypt accepts, to keep the suite fast.
const COST = 4;

describe("renderAuthSnippet", () => {
  it("emits a permissive block without a password", async () => {
    expect(await renderAuthSnippet({ username: "admin" })).toBe(EMPTY_AUTH_SNIPPET);
    expect(EMPTY_AUTH_SNIPPET).toBe("(auth_block) {}\n");
  });

  it("emits basic auth with a verifiable hash", async () => {
    const content = await renderAuthSnippet({ username: "ops", password: "test-secret", bcryptCost: COST });
    const parsed = parseAuthSnippet(content);
    expect(parsed?.username).toBe("ops");
    expect(await bcrypt.compare("test-secret", parsed?.hash ?? "")).toBe(true);
    expect(content).toBe(
      ["(auth_block) {", "    basic_auth {", `        ops ${parsed?.hash}`, "    }", "}", ""].join("\n"),
    );
  });

  it("exempts the health path when one is configured", async () => {
    const content = await renderAuthSnippet({
      username: "admin",
      password: "test-secret",
      healthPath: "/healthz",
      bcryptCost: COST,
    });
    const lines = content.split("\n");
    expect(lines[1]).toBe("    @protected not path /healthz");
    expect(lines[2]).toBe("    basic_auth @protected {");
  });

  it("reuses the previous hash when the credentials are unchanged", async () => {
    const auth = { username: "admin", password: "test-secret", bcryptCost: COST };
    const first = await renderAuthSnippet(auth);
    expect(await renderAuthSnippet(auth, first)).toBe(first);
  });

  it("rehashes when the password changes", async () => {
    const first = await renderAuthSnippet({ username: "admin", password: "test-secret", bcryptCost: COST });
    const second = await renderAuthSnippet({ username: "admin", password: "other-secret", bcryptCost: COST }, first);
    expect(second).not.toBe(first);
    expect(await bcrypt.compare("other-secret", parseAuthSnippet(second)?.hash ?? "")).toBe(true);
  });

  it("rejects usernames Caddy would misparse", async () => {
    await expect(renderAuthSnippet({ username: "bad name", password: "test-secret", bcryptCost: COST })).rejects.toThrow(
      "auth username",
    );
  });
});

describe("renderHooksSnippet", () => {
  it("is empty when hooks are off", () => {
    expect(renderHooksSnippet({ enabled: false, path: "/hooks", gatewayPort: 18789 }, "test-secret")).toBe("");
  });

  it("routes the hooks path with the gateway token injected", () => {
    expect(renderHooksSnippet({ enabled: true, path: "/hooks", gatewayPort: 18789 }, "test-secret")).toBe(
      [
        "handle /hooks* {",
        "    reverse_proxy 127.0.0.1:18789 {",
        '        header_up Authorization "Bearer test-secret"',
        "    }",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("rejects a relative path", () => {
    expect(() => renderHooksSnippet({ enabled: true, path: "hooks", gatewayPort: 1 }, "t")).toThrow(
      'hooks path must start with "/"',
    );
  });
});

describe("generateSnippets", () => {
  it("always returns both snippets", async () => {
    const snippets = await generateSnippets(
      { username: "admin" },
      { enabled: false, path: "/hooks", gatewayPort: 18789 },
      "test-secret",
    );
    expect(snippets).toEqual([
      { name: "auth", fileName: "auth.caddyfile", content: "(auth_block) {}\n" },
      { name: "hooks", fileName: "hooks.caddyfile", content: "" },
    ]);
  });
});

describe("resolveHooksConfig", () => {
  it("reads the toggle and path from the document", () => {
    expect(resolveHooksConfig({}, { gatewayPort: 1 })).toEqual({ enabled: false, path: "/hooks", gatewayPort: 1 });
    expect(resolveHooksConfig({ hooks: { enabled: true, path: "/in" } }, { gatewayPort: 2 })).toEqual({
      enabled: true,
      path: "/in",
      gatewayPort: 2,
    });
  });

  it("treats anything but boolean true as disabled", () => {
    expect(resolveHooksConfig({ hooks: { enabled: "true" } }, { gatewayPort: 1 }).enabled).toBe(false);
    expect(resolveHooksConfig({ hooks: { enabled: false, token: "test-secret" } }, { gatewayPort: 1 }).enabled).toBe(
      false,
    );
  });
});
