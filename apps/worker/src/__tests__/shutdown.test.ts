import { EventEmitter } from "node:events";

import { describe, expect, it, vi } from "vitest";

import { abortOnShutdown } from "../shutdown";

function quietLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("abortOnShutdown", () => {
  it.each(["SIGINT", "SIGTERM"])("aborts the run on %s", (signal) => {
    const target = new EventEmitter();
    const logger = quietLogger();
    const controller = new AbortController();

    abortOnShutdown({ logger, onShutdown: () => controller.abort(), target });
    target.emit(signal);

    expect(controller.signal.aborted).toBe(true);
    expect(logger.info).toHaveBeenCalledWith(`${signal} received, finishing products already started`);
  });

  it("shuts down once when both signals arrive", () => {
    const target = new EventEmitter();
    const onShutdown = vi.fn();

    abortOnShutdown({ logger: quietLogger(), onShutdown, target });
    target.emit("SIGTERM");
    target.emit("SIGINT");

    expect(onShutdown).toHaveBeenCalledTimes(1);
  });
});
