/**
 * Rate Limiter
 *
 * Minimum spacing between dependent fetches of one traversal, so a listing
 * with many rows does not hammer the portal with detail requests.
 * Each turn waits until `intervalMs` has passed since the previous turn; the
 * first turn waits the full interval.
 *
 * Time comes from an injectable Clock so tests can run without real delays.
 */
import config from "../../config";
import { logger } from "../../monitoring/logger";
import { sleep } from "../../shared/utils/sleep";

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};

export class RateLimiter {
  private lastTurn?: number;

  constructor(
    private readonly intervalMs: number = config.detailFetchIntervalMs,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Wait for the next turn.
   * Returns the wait time in ms.
   *
   * @throws WorkflowCancelledError if the signal aborts while waiting
   */
  async waitTurn(signal?: AbortSignal): Promise<number> {
    const waitMs =
      this.lastTurn === undefined
        ? this.intervalMs
        : Math.max(0, this.lastTurn + this.intervalMs - this.clock.now());

    if (waitMs > 0) {
      logger.trace({ waitMs }, "Waiting before next portal fetch");
      await this.clock.sleep(waitMs, signal);
    }

    this.lastTurn = this.clock.now();
    return waitMs;
  }
}
