import type { Clock } from "../../src/scraping/traversal/rate-limiter";
import { throwIfAborted } from "../../src/shared/utils/sleep";

/** Clock that only moves when told to; sleeping advances it instantly */
export class ManualClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    this.sleeps.push(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
