import { loadVariantConfig, parseEnvInt, VariantBatchService, VariantPipeline } from "@variant-sieve/variants";
import type { BatchSummary, Logger } from "@variant-sieve/variants";

import { loadManifest } from "./manifest";
import { createWorkerLogger, printResult } from "./output";

export function createBatchService(env: Record<string, string | undefined> = process.env): VariantBatchService {
  const config = loadVariantConfig(env);
  const pipelineLogger = createWorkerLogger("variants");

  return new VariantBatchService({
    createExtractor: () => new VariantPipeline({ config, logger: pipelineLogger }),
    onResult: printResult,
    logger: createWorkerLogger("batch"),
    concurrency: parseEnvInt(env.VARIANT_BATCH_CONCURRENCY, 3, 1, 16),
  });
}

export async function runManifestBatch(input: {
  manifestPath: string;
  service: VariantBatchService;
  logger: Logger;
  signal?: AbortSignal;
}): Promise<BatchSummary> {
  const startedAt = new Date();
  input.logger.info(`Batch run started at ${startedAt.toISOString()} from ${input.manifestPath}`);

  const items = await loadManifest(input.manifestPath);
  const summary = await input.service.runBatch(items, input.signal);

  input.logger.info(`Batch run finished at ${new Date().toISOString()} (${summary.total} products)`);
  return summary;
}
