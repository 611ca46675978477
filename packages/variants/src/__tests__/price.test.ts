import { describe, expect, it } from "vitest";

import { parseDisplayedPrice, parsePrice, toPriceCents } from "../price";

describe("parsePrice", () => {
  it("reads grouped thousands with either decimal separator", () => {
    expect(parsePrice("$1,299.99")).toEqual({ priceCents: 129999, currency: "USD" });
    expect(parsePrice("1.299,50 €")).toEqual({ priceCents: 129950, currency: "EUR" });
  });

  it("treats a separator followed by three digits as grouping", () => {
    expect(parsePrice("1.299 €")).toEqual({ priceCents: 129900, currency: "EUR" });
  });

  it("prefers the amount next to the currency symbol", () => {
    expect(parsePrice("Size 10 - $26.58")).toEqual({ priceCents: 2658, currency: "USD" });
  });

  it("reads bare amounts without a currency", () => {
    expect(parsePrice("31.99")).toEqual({ priceCents: 3199 });
    expect(parsePrice("$4.5")).toEqual({ priceCents: 450, currency: "USD" });
  });

  it("returns null without a positive amount", () => {
    expect(parsePrice("contact for price")).toBeNull();
    expect(parsePrice("$0.00")).toBeNull();
  });
});

describe("parseDisplayedPrice", () => {
  it("requires a currency symbol", () => {
    expect(parseDisplayedPrice("128 GB")).toBeUndefined();
    expect(parseDisplayedPrice("$26.58")).toBe(2658);
  });
});

describe("toPriceCents", () => {
  it("converts numeric and textual base prices to cents", () => {
    expect(toPriceCents(26.58)).toBe(2658);
    expect(toPriceCents("$31.99")).toBe(3199);
  });

  it("treats missing or non-positive prices as absent", () => {
    expect(toPriceCents(null)).toBeNull();
    expect(toPriceCents(0)).toBeNull();
    expect(toPriceCents("  ")).toBeNull();
  });
});
