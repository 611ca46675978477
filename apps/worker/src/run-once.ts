import "dotenv/config";

import { createBatchService, runManifestBatch } from "./batch";
import { createWorkerLogger } from "./output";
import { abortOnShutdown } from "./shutdown";

const logger = createWorkerLogger();
const controller = new AbortController();

abortOnShutdown({ logger, onShutdown: () => controller.abort() });

void (async () => {
  try {
    const summary = await runManifestBatch({
      manifestPath: process.argv[2] ?? process.env.VARIANT_MANIFEST_PATH ?? "manifest.json",
      service: createBatchService(),
      logger,
      signal: controller.signal,
    });
    process.exit(summary.failed > 0 ? 1 : 0);
  } catch (error) {
    logger.error("Batch run failed", error);
    process.exit(1);
  }
})();
