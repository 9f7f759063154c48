import { clearTimeout, setTimeout } from "node:timers";
import { DeadlineExceededError } from "../errors.ts";

/**
 * Runs `operation` with a signal that aborts after `ms` milliseconds.
 *
 * When the deadline passes first, the returned promise rejects with
 * {@link DeadlineExceededError} right away, whether or not the operation
 * reacts to the signal. Each call gets its own timer and signal.
 */
export function withDeadline<T>(
  ms: number,
  operation: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new DeadlineExceededError(ms);
      controller.abort(error);
      reject(error);
    }, ms);

    void Promise.resolve()
      .then(() => operation(controller.signal))
      .then(resolve, reject)
      .finally(() => {
        clearTimeout(timer);
      });
  });
}
