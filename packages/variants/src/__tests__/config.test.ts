import { describe, expect, it } from "vitest";

import { buildRecognizerTables, loadVariantConfig, parseEnvNumber } from "../config";

describe("loadVariantConfig", () => {
  it("uses defaults when the environment is empty", () => {
    const config = loadVariantConfig({});

    expect(config.limits).toEqual({
      maxClicks: 5,
      clickTimeoutMs: 3000,
      interactiveTimeoutMs: 15000,
      interactiveThreshold: 2,
      maxOptionLength: 64,
      maxCandidatesPerStrategy: 120,
    });
    expect(config.verifier.enabled).toBe(true);
    expect(config.verifier.apiKey).toBeUndefined();
    expect(config.verifier.model).toBe("gpt-5-mini");
  });

  it("clamps numeric limits and falls back on garbage", () => {
    const config = loadVariantConfig({ VARIANT_MAX_CLICKS: "50", VARIANT_CLICK_TIMEOUT_MS: "abc" });

    expect(config.limits.maxClicks).toBe(10);
    expect(config.limits.clickTimeoutMs).toBe(3000);
  });

  it("reads verifier switches and credentials", () => {
    const config = loadVariantConfig({
      VARIANT_VERIFIER_ENABLED: "false",
      OPENAI_API_KEY: "  test-secret  ",
      OPENAI_INPUT_COST_PER_1M: "0.5",
    });

    expect(config.verifier.enabled).toBe(false);
    expect(config.verifier.apiKey).toBe("test-secret");
    expect(config.verifier.inputCostPer1M).toBe(0.5);
    expect(config.verifier.outputCostPer1M).toBeUndefined();
  });

  it("applies explicit overrides after the environment", () => {
    const config = loadVariantConfig({ VARIANT_MAX_CLICKS: "3" }, { limits: { maxClicks: 0 } });
    expect(config.limits.maxClicks).toBe(0);
  });
});

describe("buildRecognizerTables", () => {
  it("rejects tables missing a dimension", () => {
    expect(() => buildRecognizerTables({ dimensions: {}, uiPhrases: [], placeholders: [], navigationLabels: [] })).toThrow();
  });

  it("lower-cases keywords and compiles patterns", () => {
    const table = { containerKeywords: ["Colour"], keywords: ["Teal"], patterns: ["^x\\d+$"] };
    const tables = buildRecognizerTables({
      dimensions: { color: table, size: table, storage: table, style: table, material: table },
      uiPhrases: ["Buy Now"],
      placeholders: [],
      navigationLabels: [],
    });

    expect(tables.dimensions[0].keywords.has("teal")).toBe(true);
    expect(tables.dimensions[0].patterns[0].test("X12")).toBe(true);
    expect(tables.uiPhrases.has("buy now")).toBe(true);
  });
});

describe("parseEnvNumber", () => {
  it("clamps into range", () => {
    expect(parseEnvNumber("0.01", 1, 0.5, 2)).toBe(0.5);
    expect(parseEnvNumber(undefined, 1, 0.5, 2)).toBe(1);
  });
});
