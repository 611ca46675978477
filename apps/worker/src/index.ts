import "dotenv/config";

import cron from "node-cron";

import { createBatchService, runManifestBatch } from "./batch";
import { createWorkerLogger } from "./output";
import { abortOnShutdown } from "./shutdown";

const schedule = process.env.VARIANT_BATCH_CRON ?? "0 9 * * *";
const manifestPath = process.env.VARIANT_MANIFEST_PATH ?? "manifest.json";
const logger = createWorkerLogger();
const service = createBatchService();

let running: AbortController | null = null;

async function executeBatchRun() {
  if (running) {
    logger.warn("Previous batch still running, skipping this tick");
    return;
  }

  const controller = new AbortController();
  running = controller;
  try {
    await runManifestBatch({ manifestPath, service, logger, signal: controller.signal });
  } catch (error) {
    logger.error("Batch run failed", error);
  } finally {
    running = null;
  }
}

const task = cron.schedule(schedule, () => {
  void executeBatchRun();
});

logger.info(`Scheduler active with cron: ${schedule}`);

abortOnShutdown({
  logger,
  onShutdown: () => {
    task.stop();
    running?.abort();
  },
});

if (process.env.WORKER_RUN_ON_BOOT === "true") {
  void executeBatchRun();
}
