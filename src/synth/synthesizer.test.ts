import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { getAtPath } from "./document.js";
import { parseEnvBindings } from "./env-bindings.js";
import { MalformedDocumentError } from "./store.js";
import { synthesizeConfig, synthesizeDocument, type SynthesizeOptions } from "./synthesizer.js";

let tmpDir: string;
let configPath: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "synth-test-"));
  configPath = path.join(tmpDir, "gateway.json");
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function options(env: Record<string, string>, extra: Partial<SynthesizeOptions> = {}): SynthesizeOptions {
  return {
    configPath,
    env,
    bindings: parseEnvBindings(env).bindings,
    token: "test-secret",
    workspaceDir: "/data/workspace",
    ...extra,
  };
}

const scenarioEnv = {
  GATEWAY_JSON__agents__defaults__maxConcurrent: "10",
  GATEWAY_JSON__agents__defaults__compaction__mode: "safeguard",
};

describe("synthesizeDocument", () => {
  it("builds nested values from bindings on an empty document", () => {
    const doc = synthesizeDocument(parseEnvBindings(scenarioEnv).bindings, {});
    expect(doc).toEqual({ agents: { defaults: { maxConcurrent: 10, compaction: { mode: "safeguard" } } } });
  });

  it("does not mutate the existing document", () => {
    const existing = { agents: { defaults: { maxConcurrent: 2 } } };
    synthesizeDocument(parseEnvBindings(scenarioEnv).bindings, existing);
    expect(existing).toEqual({ agents: { defaults: { maxConcurrent: 2 } } });
  });
});

describe("synthesizeConfig", () => {
  it("writes gateway defaults and bindings to a fresh file", async () => {
    const result = await synthesizeConfig(options(scenarioEnv));
    expect(result.source).toBe("empty");
    expect(result.hasProvider).toBe(false);
    expect(result.appliedBindings).toHaveLength(2);

    const written: unknown = JSON.parse(await fs.readFile(configPath, "utf-8"));
    expect(written).toEqual({
      gateway: {
        port: 18789,
        mode: "local",
        auth: { mode: "token", token: "test-secret" },
        controlUi: { allowInsecureAuth: true, enabled: true },
      },
      agents: {
        defaults: {
          workspace: "/data/workspace",
          model: {},
          maxConcurrent: 10,
          compaction: { mode: "safeguard" },
        },
      },
    });
  });

  it("produces byte-identical output on a second run", async () => {
    const env = { ...scenarioEnv, ANTHROPIC_API_KEY: "test-secret", TELEGRAM_BOT_TOKEN: "test-bot" };
    await synthesizeConfig(options(env));
    const first = await fs.readFile(configPath, "utf-8");
    const second = await synthesizeConfig(options(env));
    expect(second.source).toBe("persisted");
    expect(await fs.readFile(configPath, "utf-8")).toBe(first);
  });

  it("preserves keys no input addresses", async () => {
    await fs.writeFile(configPath, JSON.stringify({ plugins: { entries: { memory: { enabled: true } } } }));
    const result = await synthesizeConfig(options(scenarioEnv));
    expect(getAtPath(result.document, ["plugins"])).toEqual({ entries: { memory: { enabled: true } } });
  });

  it("lets a binding override what the sections wrote", async () => {
    const result = await synthesizeConfig(options({ GATEWAY_JSON__gateway__port: "9999" }, { port: 8080 }));
    expect(getAtPath(result.document, ["gateway", "port"])).toBe(9999);
  });

  it("seeds from the template when nothing is persisted", async () => {
    const templatePath = path.join(tmpDir, "template.json");
    await fs.writeFile(templatePath, JSON.stringify({ agents: { defaults: { maxConcurrent: 4 } } }));
    const result = await synthesizeConfig(options({}, { templatePath }));
    expect(result.source).toBe("template");
    expect(getAtPath(result.document, ["agents", "defaults", "maxConcurrent"])).toBe(4);
  });

  it("refuses to overwrite a malformed persisted document", async () => {
    await fs.writeFile(configPath, "{not json");
    await expect(synthesizeConfig(options(scenarioEnv))).rejects.toBeInstanceOf(MalformedDocumentError);
    expect(await fs.readFile(configPath, "utf-8")).toBe("{not json");
  });

  it("layers the persisted document over a custom overlay and keeps its providers", async () => {
    const customConfigPath = path.join(tmpDir, "custom.json");
    await fs.writeFile(
      customConfigPath,
      JSON.stringify({ models: { providers: { ollama: { baseUrl: "http://gpu:11434/v1" } } }, ui: { theme: "dark" } }),
    );
    await fs.writeFile(configPath, JSON.stringify({ ui: { theme: "light" } }));
    const result = await synthesizeConfig(options({}, { customConfigPath }));
    expect(result.customOverlay).toBe(true);
    expect(getAtPath(result.document, ["ui", "theme"])).toBe("light");
    expect(getAtPath(result.document, ["models", "providers", "ollama"])).toEqual({
      baseUrl: "http://gpu:11434/v1",
    });
  });
});
