import type { BackendMs, IClock } from "@smileys/contracts";

/**
 * Monotonic clock backed by performance.now(), zero at construction.
 */
export class SystemClock implements IClock {
  private source: () => number;
  private origin: number;

  constructor(source: () => number = () => performance.now()) {
    this.source = source;
    this.origin = source();
  }

  now(): BackendMs {
    return Math.floor(this.source() - this.origin);
  }
}
