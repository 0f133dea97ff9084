import { BacktestTimeoutError } from './errors';

/**
 * Reject with a BacktestTimeoutError when `promise` does not settle within
 * `timeoutMs`. The underlying work is not cancelled.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  context?: Record<string, unknown>
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new BacktestTimeoutError(timeoutMs, context)), timeoutMs);
  });

  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Throw once the wall-clock deadline has passed
 */
export function checkDeadline(deadline: number, timeoutMs: number, context?: Record<string, unknown>): void {
  if (Date.now() > deadline) {
    throw new BacktestTimeoutError(timeoutMs, context);
  }
}
