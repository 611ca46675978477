export type Logger = {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
};

type ConsoleLike = Pick<Console, "debug" | "log" | "warn" | "error">;

export function createLogger(scope: string, options: { debug?: boolean; sink?: ConsoleLike } = {}): Logger {
  const sink = options.sink ?? console;
  const verbose = options.debug ?? process.env.VARIANT_DEBUG === "true";
  const prefix = `[${scope}]`;

  return {
    debug: (message, ...details) => {
      if (verbose) {
        sink.debug(`${prefix} ${message}`, ...details);
      }
    },
    info: (message, ...details) => sink.log(`${prefix} ${message}`, ...details),
    warn: (message, ...details) => sink.warn(`${prefix} ${message}`, ...details),
    error: (message, ...details) => sink.error(`${prefix} ${message}`, ...details),
  };
}
