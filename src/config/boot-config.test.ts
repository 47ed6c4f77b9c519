import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { resolveAssetPath } from "../infra/assets.js";
import { BootstrapError } from "../infra/errors.js";
import { resolveBootConfig } from "./boot-config.js";

describe("resolveBootConfig", () => {
  it("applies container defaults", () => {
    const config = resolveBootConfig({});
    expect(config.stateDir).toBe("/data/.gateway");
    expect(config.workspaceDir).toBe("/data/workspace");
    expect(config.configPath).toBe("/data/.gateway/gateway.json");
    expect(config.customConfigPath).toBe("/app/config/gateway.json");
    expect(config.templatePath).toBe(resolveAssetPath("gateway.json.example"));
    expect(config.tokenFilePath).toBe("/data/.gateway/gateway.token");
    expect(config.explicitToken).toBeUndefined();
    expect(config.lockFiles).toEqual([path.join(os.tmpdir(), "gateway.lock"), "/data/.gateway/gateway.lock"]);
    expect(config.gateway).toEqual({
      command: "gateway",
      subcommand: "serve",
      cwd: undefined,
      port: 18789,
      portFromEnv: false,
      bind: "loopback",
      verbose: true,
      allowUnconfigured: true,
      selfHeal: true,
    });
    expect(config.proxy).toEqual({
      enabled: true,
      command: "caddy",
      configPath: resolveAssetPath("Caddyfile"),
      snippetDir: "/app/caddy.d",
      healthPath: "/healthz",
      graceMs: 1500,
    });
    expect(config.auth).toEqual({ username: "admin", password: undefined, bcryptCost: 14 });
    expect(config.bindings).toEqual([]);
  });

  it("reads overrides from the environment", () => {
    const config = resolveBootConfig({
      GATEWAY_STATE_DIR: "/srv/state/",
      GATEWAY_PORT: "8080",
      GATEWAY_TOKEN: " test-secret ",
      GATEWAY_VERBOSE: "false",
      AUTH_PASSWORD: "test-password",
      AUTH_USERNAME: "ops",
    });
    expect(config.stateDir).toBe("/srv/state");
    expect(config.configPath).toBe("/srv/state/gateway.json");
    expect(config.gateway.port).toBe(8080);
    expect(config.gateway.portFromEnv).toBe(true);
    expect(config.gateway.verbose).toBe(false);
    expect(config.explicitToken).toBe("test-secret");
    expect(config.auth).toEqual({ username: "ops", password: "test-password", bcryptCost: 14 });
  });

  it("falls back to PORT", () => {
    expect(resolveBootConfig({ PORT: "3000" }).gateway.port).toBe(3000);
  });

  it("binds to the LAN when the proxy is disabled", () => {
    const config = resolveBootConfig({ PROXY_ENABLED: "false" });
    expect(config.proxy.enabled).toBe(false);
    expect(config.gateway.bind).toBe("lan");
  });

  it("allows an empty subcommand", () => {
    expect(resolveBootConfig({ GATEWAY_SUBCOMMAND: "" }).gateway.subcommand).toBe("");
  });

  it("collects convention bindings and malformed names", () => {
    const config = resolveBootConfig({ GATEWAY_JSON__a__b: "1", GATEWAY_JSON__: "x" });
    expect(config.bindings).toEqual([{ name: "GATEWAY_JSON__a__b", path: ["a", "b"], raw: "1" }]);
    expect(config.bindingIssues).toEqual([{ name: "GATEWAY_JSON__", reason: "no path after prefix" }]);
  });

  it("rejects a non-numeric port", () => {
    expect(() => resolveBootConfig({ GATEWAY_PORT: "http" })).toThrow(BootstrapError);
    expect(() => resolveBootConfig({ GATEWAY_PORT: "http" })).toThrow('GATEWAY_PORT must be a port number, got "http"');
  });

  it("rejects settings outside their range", () => {
    expect(() => resolveBootConfig({ GATEWAY_PORT: "70000" })).toThrow("Invalid bootstrap configuration");
    expect(() => resolveBootConfig({ GATEWAY_BIND: "everywhere" })).toThrow("Invalid bootstrap configuration");
    expect(() => resolveBootConfig({ AUTH_BCRYPT_COST: "2" })).toThrow("Invalid bootstrap configuration");
    expect(() => resolveBootConfig({ PROXY_HEALTH_PATH: "healthz" })).toThrow("Invalid bootstrap configuration");
  });
});
