import { describe, expect, it } from "vitest";
import { loadProviderCatalog, loadSectionCatalog } from "./catalog.js";

describe("bundled catalogs", () => {
  it("loads the provider catalog", () => {
    const catalog = loadProviderCatalog();
    expect(catalog.builtin.map((p) => p.env)).toContain("ANTHROPIC_API_KEY");
    expect(catalog.custom.map((p) => p.key)).toContain("venice");
    expect(catalog.ollama.env).toBe("OLLAMA_BASE_URL");
    expect(catalog.primaryModelPriority[0]).toEqual({
      source: "ANTHROPIC_API_KEY",
      model: "anthropic/claude-opus-4-5-20251101",
    });
  });

  it("loads the section catalog", () => {
    const catalog = loadSectionCatalog();
    expect(catalog.channels.map((c) => c.key)).toEqual(["telegram", "discord", "slack", "whatsapp"]);
    expect(catalog.hooks.gate).toBe("HOOKS_ENABLED");
    expect(catalog.browser.gate).toBe("BROWSER_CDP_URL");
  });

  it("caches the parsed catalogs", () => {
    expect(loadProviderCatalog()).toBe(loadProviderCatalog());
    expect(loadSectionCatalog()).toBe(loadSectionCatalog());
  });
});
