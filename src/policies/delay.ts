import { abortedOperationError } from "../errors.js";

/**
 * Resolve after `ms`, or reject as soon as `signal` aborts. The timer is
 * cleared on abort.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!signal) {
      setTimeout(resolve, ms);
      return;
    }
    const abortSignal: AbortSignal = signal;
    if (abortSignal.aborted) {
      reject(abortedOperationError(abortSignal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortedOperationError(abortSignal));
    };
    const timer = setTimeout(() => {
      abortSignal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    abortSignal.addEventListener("abort", onAbort, { once: true });
  });
}
