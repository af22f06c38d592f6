/**
 * Deadline helper for outbound API calls.
 * A single attempt only: callers that time out get a TimeoutError, never a retry.
 */

export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Run fn under a deadline. fn receives a signal that aborts when the
 * deadline passes, so the work it started (socket, body stream) is torn
 * down too. The timer is always cleared once the call settles.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race reports the timeout, not the abort it causes
      reject(new TimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeoutPromise]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
