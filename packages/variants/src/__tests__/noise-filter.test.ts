import { describe, expect, it } from "vitest";

import { classifyCandidate } from "../classify";
import { loadVariantConfig } from "../config";
import { filterNoise, findNoiseRule } from "../noise-filter";
import type { ClassifiedOption } from "../types";

const { recognizers } = loadVariantConfig({});
const settings = { recognizers, maxOptionLength: 64 };

function classified(rawText: string, containerHint = ""): ClassifiedOption {
  return classifyCandidate({ rawText, source: "container", containerHint, images: [] }, recognizers);
}

describe("findNoiseRule", () => {
  it.each([
    ["", "EMPTY"],
    ["x".repeat(65), "TOO_LONG"],
    ["1+", "QUANTITY_TOKEN"],
    ["Qty: 2", "QUANTITY_PREFIX"],
    ["$26.58", "PRICE_ONLY"],
    ["9 options from $101.12", "AGGREGATE_OFFER"],
    ["3 videos", "MEDIA_COUNTER"],
    ["Video Games", "NAVIGATION"],
    ["Add-to-Cart", "UI_PHRASE"],
    ["Ad to cart", "UI_PHRASE"],
    ["Please select a size", "UI_PHRASE"],
  ])("rejects %j as %s", (text, rule) => {
    expect(findNoiseRule(classified(text), settings)).toBe(rule);
  });

  it("reports classifier verdicts the text rules did not catch", () => {
    const option: ClassifiedOption = { ...classified("Gift wrap"), inferredType: "unrelated" };
    expect(findNoiseRule(option, settings)).toBe("TYPE_UNRELATED");
  });

  it("does not treat a short name one edit away from a UI phrase as noise", () => {
    expect(findNoiseRule(classified("Currant", "variation_flavor_name"), settings)).toBeNull();
  });
});

describe("filterNoise", () => {
  it("excludes quantity, UI and placeholder labels under any casing or spacing", () => {
    const labels = ["1+", " 2+ ", "10", "Add  to List", "ADD TO LIST", "update page", "Update   PAGE", "SELECT", " select "];
    for (const label of labels) {
      const { kept, rejected } = filterNoise([classified(label, "variation_color_name")], settings);
      expect(kept).toEqual([]);
      expect(rejected).toHaveLength(1);
    }
  });

  it("keeps recognized options and flags unknown ones", () => {
    const { kept, rejected } = filterNoise(
      [classified("Black", "variation_color_name"), classified("Currant", "variation_flavor_name"), classified("1+")],
      settings,
    );

    expect(kept.map((option) => [option.rawText, option.lowConfidence])).toEqual([
      ["Black", false],
      ["Currant", true],
    ]);
    expect(rejected.map((entry) => [entry.option.rawText, entry.rule])).toEqual([["1+", "QUANTITY_TOKEN"]]);
  });

  it("drops unknown options shadowed by a recognized option of the same name", () => {
    const { kept, rejected } = filterNoise([classified("Sage", "variation_color_name"), classified("sage")], settings);

    expect(kept.map((option) => option.inferredType)).toEqual(["color"]);
    expect(rejected).toEqual([expect.objectContaining({ rule: "SHADOWED_UNKNOWN" })]);
  });
});
