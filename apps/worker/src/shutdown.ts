import type { Logger } from "@variant-sieve/variants";

export const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

/** Runs `onShutdown` on the first SIGINT or SIGTERM. Products already started still finish. */
export function abortOnShutdown(input: {
  logger: Logger;
  onShutdown: () => void;
  target?: Pick<NodeJS.EventEmitter, "once">;
}): void {
  const target = input.target ?? process;
  let stopped = false;

  for (const signal of SHUTDOWN_SIGNALS) {
    target.once(signal, () => {
      if (stopped) {
        return;
      }
      stopped = true;
      input.logger.info(`${signal} received, finishing products already started`);
      input.onShutdown();
    });
  }
}
