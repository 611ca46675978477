import { describe, expect, it } from "vitest";

import { cleanOptionText, compactOptionKey, normalizeOptionName, upgradeImageUrl } from "../text";

describe("cleanOptionText", () => {
  it("strips dimension label prefixes", () => {
    expect(cleanOptionText("Color: Black")).toBe("Black");
  });

  it("drops embedded prices when a name remains", () => {
    expect(cleanOptionText("  Red   $26.58 ")).toBe("Red");
  });

  it("keeps a bare price for the noise filter to judge", () => {
    expect(cleanOptionText("$26.58")).toBe("$26.58");
  });

  it("removes stock phrases and trailing separators", () => {
    expect(cleanOptionText("Blue - Only 3 left in stock - order soon.")).toBe("Blue");
  });

  it("reduces aggregate offers to their counter", () => {
    expect(cleanOptionText("9 options from $101.12")).toBe("9 options");
  });

  it("returns an empty string for missing input", () => {
    expect(cleanOptionText(undefined)).toBe("");
  });
});

describe("option keys", () => {
  it("normalizes casing and whitespace", () => {
    expect(normalizeOptionName("  Space   BLACK ")).toBe("space black");
  });

  it("compacts punctuation away", () => {
    expect(compactOptionKey("Add-to-Cart")).toBe("addtocart");
  });
});

describe("upgradeImageUrl", () => {
  it("requests the large rendition of marketplace thumbnails", () => {
    expect(upgradeImageUrl("https://m.media-amazon.com/images/I/71abc._SS40_.jpg")).toBe(
      "https://m.media-amazon.com/images/I/71abc._AC_SX679_.jpg",
    );
  });

  it("leaves other hosts untouched", () => {
    expect(upgradeImageUrl("https://cdn.example.com/red._SS40_.jpg")).toBe("https://cdn.example.com/red._SS40_.jpg");
  });
});
