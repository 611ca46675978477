export function cancellationError(stage: string): Error {
  return new Error(`CANCELLED:${stage}`);
}

export function isCancellationError(error: unknown): boolean {
  return error instanceof Error && error.message.startsWith("CANCELLED:");
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.message.startsWith("TIMED_OUT:");
}

export function throwIfCancelled(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw cancellationError(stage);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

/** Rejects with a TIMED_OUT error after `timeoutMs`, or a CANCELLED error when `signal` aborts first. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  signal?: AbortSignal,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`TIMED_OUT:${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  const aborted = new Promise<never>((_, reject) => {
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      reject(cancellationError(label));
      return;
    }
    onAbort = () => reject(cancellationError(label));
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([promise, timeout, aborted]);
  } finally {
    if (timer) clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener("abort", onAbort);
  }
}
