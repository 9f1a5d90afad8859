/**
 * @sockrpc/client - Timeout
 * Deadline wrapper for async operations
 */

/**
 * Error thrown when an operation exceeds its timeout.
 */
export class TimeoutExceededError extends Error {
  /** The timeout value in milliseconds that was exceeded */
  readonly timeout: number;

  constructor(timeout: number) {
    super(`Operation timed out after ${timeout}ms`);
    this.name = "TimeoutExceededError";
    this.timeout = timeout;
  }
}

/**
 * Run `fn` with a deadline.
 *
 * When the deadline passes first, `onTimeout` runs; if it throws, that error
 * rejects the call, otherwise a {@link TimeoutExceededError} does. `fn` keeps
 * running in the background, so `onTimeout` is where it gets cut off.
 */
export async function executeWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  onTimeout?: () => void
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      if (onTimeout) {
        try {
          onTimeout();
        } catch (error) {
          reject(error);
          return;
        }
      }
      reject(new TimeoutExceededError(timeoutMs));
    }, timeoutMs);
  });

  const work = fn();
  try {
    return await Promise.race([work, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    // the losing side of the race settles unobserved
    work.catch(() => undefined);
  }
}
