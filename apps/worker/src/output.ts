import { createLogger } from "@variant-sieve/variants";
import type { BatchItemResult, Logger } from "@variant-sieve/variants";

/** Worker logs go to stderr so stdout carries only result lines. */
export function createWorkerLogger(scope = "worker"): Logger {
  return createLogger(scope, {
    sink: {
      debug: console.error,
      log: console.error,
      warn: console.warn,
      error: console.error,
    },
  });
}

export function formatResultLine(result: BatchItemResult, finishedAt: Date = new Date()): string {
  return JSON.stringify({
    itemId: result.itemId,
    status: result.status,
    finishedAt: finishedAt.toISOString(),
    ...(result.verdict ? { verdict: result.verdict } : {}),
    ...(result.degraded ? { degraded: true } : {}),
    ...(result.warnings && result.warnings.length > 0 ? { warnings: result.warnings } : {}),
    ...(result.reason ? { reason: result.reason } : {}),
  });
}

export function printResult(result: BatchItemResult): void {
  process.stdout.write(`${formatResultLine(result)}\n`);
}
