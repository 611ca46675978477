import { describe, expect, it, vi } from "vitest";

import { VariantBatchService } from "../batch-service";
import type { BatchItem, BatchItemResult } from "../batch-service";
import { loadVariantConfig } from "../config";
import { VariantPipeline } from "../pipeline";
import type { ExtractVariantsInput } from "../pipeline";
import type { ExtractionOutcome } from "../types";
import { COLOR_CONTAINER_PAGE, NOISE_ONLY_PAGE, quietLogger } from "./fixtures";

function item(id: string, html: string): BatchItem {
  return {
    id,
    product: { title: `Product ${id}`, basePrice: 26.58 },
    loadPage: vi.fn<BatchItem["loadPage"]>().mockResolvedValue({ html }),
  };
}

function successOutcome(names: string[]): ExtractionOutcome {
  return {
    status: "success",
    verdict: {
      variants: names.map((name) => ({ type: "color", name, priceCents: 2658, stock: null, sku: null, images: [] })),
      method: "rule_based",
      confidence: 0.9,
    },
    degraded: false,
    warnings: [],
    candidateCount: names.length,
    rejected: [],
    verifier: { status: "unavailable", reason: "DISABLED" },
  };
}

describe("VariantBatchService integration", () => {
  it("runs the real pipeline for every product and reports each result", async () => {
    const config = loadVariantConfig({}, { verifier: { enabled: false } });
    const onResult = vi.fn<(result: BatchItemResult) => void>();
    const service = new VariantBatchService({
      createExtractor: () => new VariantPipeline({ config, logger: quietLogger() }),
      onResult,
      logger: quietLogger(),
    });

    const summary = await service.runBatch([item("mug", COLOR_CONTAINER_PAGE), item("noise", NOISE_ONLY_PAGE)]);

    expect(summary).toMatchObject({ total: 2, succeeded: 1, empty: 1, cancelled: 0, failed: 0 });
    expect(summary.results[0].verdict?.variants.map((variant) => variant.name)).toEqual(["Black", "White"]);
    expect(onResult).toHaveBeenCalledTimes(2);
    expect(onResult).toHaveBeenCalledWith(expect.objectContaining({ itemId: "noise", status: "EMPTY" }));
  });

  it("marks products whose page cannot be loaded as failed", async () => {
    const broken: BatchItem = {
      id: "broken",
      product: { title: "Broken", basePrice: null },
      loadPage: vi.fn<BatchItem["loadPage"]>().mockRejectedValue(new Error("ENOENT: missing.html")),
    };
    const extract = vi.fn<(input: ExtractVariantsInput) => Promise<ExtractionOutcome>>();
    const service = new VariantBatchService({ createExtractor: () => ({ extract }), logger: quietLogger() });

    const result = await service.runItem(broken);

    expect(result).toEqual({ itemId: "broken", status: "FAILED", reason: "ENOENT: missing.html" });
    expect(extract).not.toHaveBeenCalled();
  });

  it("stops scheduling new products once the signal fires", async () => {
    const controller = new AbortController();
    const extract = vi.fn<(input: ExtractVariantsInput) => Promise<ExtractionOutcome>>().mockImplementation(async () => {
      controller.abort();
      return successOutcome(["Black"]);
    });
    const items = [item("first", "<div></div>"), item("second", "<div></div>"), item("third", "<div></div>")];
    const service = new VariantBatchService({ createExtractor: () => ({ extract }), concurrency: 1, logger: quietLogger() });

    const summary = await service.runBatch(items, controller.signal);

    expect(summary.results.map((result) => [result.itemId, result.status])).toEqual([
      ["first", "SUCCESS"],
      ["second", "CANCELLED"],
      ["third", "CANCELLED"],
    ]);
    expect(extract).toHaveBeenCalledTimes(1);
    expect(items[1].loadPage).not.toHaveBeenCalled();
  });

  it("passes pipeline cancellation through", async () => {
    const extract = vi
      .fn<(input: ExtractVariantsInput) => Promise<ExtractionOutcome>>()
      .mockResolvedValue({ status: "cancelled", reason: "CANCELLATION_REQUESTED" });
    const service = new VariantBatchService({ createExtractor: () => ({ extract }), logger: quietLogger() });

    const result = await service.runItem(item("mid-flight", "<div></div>"));

    expect(result).toEqual({ itemId: "mid-flight", status: "CANCELLED", reason: "CANCELLATION_REQUESTED" });
  });

  it("keeps going when the result sink throws", async () => {
    const extract = vi.fn<(input: ExtractVariantsInput) => Promise<ExtractionOutcome>>().mockResolvedValue(successOutcome(["Red"]));
    const logger = quietLogger();
    const service = new VariantBatchService({
      createExtractor: () => ({ extract }),
      onResult: () => {
        throw new Error("sink offline");
      },
      logger,
    });

    const summary = await service.runBatch([item("a", "<div></div>"), item("b", "<div></div>")]);

    expect(summary.succeeded).toBe(2);
    expect(logger.error).toHaveBeenCalledTimes(2);
  });
});
