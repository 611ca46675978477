import pLimit from "p-limit";

import { describeError } from "./errors";
import { createLogger } from "./logger";
import type { Logger } from "./logger";
import { VariantPipeline } from "./pipeline";
import type { ExtractVariantsInput } from "./pipeline";
import type { ExtractionOutcome, PageContent, ProductContext, VerificationVerdict } from "./types";

export type BatchItem = {
  id: string;
  product: ProductContext;
  loadPage(): Promise<PageContent>;
};

export type BatchItemStatus = "SUCCESS" | "EMPTY" | "CANCELLED" | "FAILED";

export type BatchItemResult = {
  itemId: string;
  status: BatchItemStatus;
  verdict?: VerificationVerdict;
  degraded?: boolean;
  warnings?: string[];
  reason?: string;
};

export type BatchSummary = {
  total: number;
  succeeded: number;
  empty: number;
  cancelled: number;
  failed: number;
  results: BatchItemResult[];
};

type VariantExtractor = {
  extract(input: ExtractVariantsInput): Promise<ExtractionOutcome>;
};

type BatchServiceDependencies = {
  createExtractor?: () => VariantExtractor;
  onResult?: (result: BatchItemResult) => Promise<void> | void;
  logger?: Logger;
  concurrency?: number;
  chunkSize?: number;
};

export class VariantBatchService {
  private createExtractor: () => VariantExtractor;
  private onResult: (result: BatchItemResult) => Promise<void> | void;
  private logger: Logger;
  private concurrency: number;
  private chunkSize: number;

  constructor(deps: BatchServiceDependencies = {}) {
    this.createExtractor = deps.createExtractor ?? (() => new VariantPipeline());
    this.onResult = deps.onResult ?? (() => undefined);
    this.logger = deps.logger ?? createLogger("batch");
    this.concurrency = deps.concurrency ?? 3;
    this.chunkSize = deps.chunkSize ?? 25;
  }

  async runItem(item: BatchItem, signal?: AbortSignal): Promise<BatchItemResult> {
    return this.report(await this.extractItem(item, signal));
  }

  /** Products already started finish normally when `signal` aborts; the rest are reported CANCELLED. */
  async runBatch(items: readonly BatchItem[], signal?: AbortSignal): Promise<BatchSummary> {
    const limit = pLimit(this.concurrency);
    const results: BatchItemResult[] = [];

    for (const batch of chunk(items, this.chunkSize)) {
      const settled = await Promise.all(
        batch.map((item) =>
          limit(async () => {
            if (signal?.aborted) {
              return this.report({ itemId: item.id, status: "CANCELLED", reason: "CANCELLATION_REQUESTED" });
            }
            return this.runItem(item, signal);
          }),
        ),
      );
      results.push(...settled);
    }

    const summary = summarize(results);
    this.logger.info(
      `batch finished: ${summary.succeeded} success, ${summary.empty} empty, ${summary.cancelled} cancelled, ${summary.failed} failed`,
    );
    return summary;
  }

  private async extractItem(item: BatchItem, signal?: AbortSignal): Promise<BatchItemResult> {
    try {
      const page = await item.loadPage();
      const outcome = await this.createExtractor().extract({ page, product: item.product, signal });

      if (outcome.status === "cancelled") {
        return { itemId: item.id, status: "CANCELLED", reason: outcome.reason };
      }

      return {
        itemId: item.id,
        status: outcome.verdict.variants.length > 0 ? "SUCCESS" : "EMPTY",
        verdict: outcome.verdict,
        degraded: outcome.degraded,
        warnings: outcome.warnings,
      };
    } catch (error) {
      this.logger.warn(`${item.id} failed: ${describeError(error)}`);
      return { itemId: item.id, status: "FAILED", reason: error instanceof Error ? error.message : "Unexpected error" };
    }
  }

  private async report(result: BatchItemResult): Promise<BatchItemResult> {
    try {
      await this.onResult(result);
    } catch (error) {
      this.logger.error(`result sink failed for ${result.itemId}: ${describeError(error)}`);
    }
    return result;
  }
}

function summarize(results: BatchItemResult[]): BatchSummary {
  const count = (status: BatchItemStatus) => results.filter((result) => result.status === status).length;
  return {
    total: results.length,
    succeeded: count("SUCCESS"),
    empty: count("EMPTY"),
    cancelled: count("CANCELLED"),
    failed: count("FAILED"),
    results,
  };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    result.push(items.slice(index, index + size));
  }
  return result;
}
