/**
 * Abortable Sleep
 *
 * Promise-based delay used by the rate limiter. Rejects with
 * WorkflowCancelledError when the caller's signal aborts mid-wait.
 */
import { WorkflowCancelledError } from "../errors/portal.errors";

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new WorkflowCancelledError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new WorkflowCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Throw if the caller has already aborted */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new WorkflowCancelledError();
  }
}
