import { describe, expect, it } from "vitest";

import { formatResultLine } from "../output";

const FINISHED_AT = new Date("2026-03-02T09:00:00.000Z");

describe("formatResultLine", () => {
  it("writes a successful result with its verdict", () => {
    const line = formatResultLine(
      {
        itemId: "mug-1",
        status: "SUCCESS",
        verdict: {
          variants: [{ type: "color", name: "Red", priceCents: 1800, stock: null, sku: "VAR001", images: [] }],
          method: "rule_based",
          confidence: 0.85,
        },
        degraded: false,
        warnings: [],
      },
      FINISHED_AT,
    );

    expect(JSON.parse(line)).toEqual({
      itemId: "mug-1",
      status: "SUCCESS",
      finishedAt: "2026-03-02T09:00:00.000Z",
      verdict: {
        variants: [{ type: "color", name: "Red", priceCents: 1800, stock: null, sku: "VAR001", images: [] }],
        method: "rule_based",
        confidence: 0.85,
      },
    });
  });

  it("keeps the reason and omits empty fields for failures", () => {
    const line = formatResultLine({ itemId: "tote", status: "FAILED", reason: "Fetch failed with status 503" }, FINISHED_AT);

    expect(line).toBe(
      '{"itemId":"tote","status":"FAILED","finishedAt":"2026-03-02T09:00:00.000Z","reason":"Fetch failed with status 503"}',
    );
  });

  it("flags degraded results with their warnings", () => {
    const line = formatResultLine(
      {
        itemId: "lamp",
        status: "EMPTY",
        verdict: { variants: [], method: "rule_based", confidence: 0.4 },
        degraded: true,
        warnings: ["INTERACTION_TIMEOUT"],
      },
      FINISHED_AT,
    );

    expect(JSON.parse(line)).toMatchObject({ degraded: true, warnings: ["INTERACTION_TIMEOUT"] });
  });
});
