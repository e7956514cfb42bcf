import type { BackendMs, Ms } from "../core/time";
import type { InputEvent } from "../input/events";

/**
 * Source of input events.
 */
export interface IEventSource {
  /**
   * Wait up to `timeoutMs` for the next event.
   * Resolves null when nothing arrived in time.
   */
  waitEvent(timeoutMs: Ms): Promise<InputEvent | null>;

  /** Detach from the underlying input; pending waits resolve null */
  dispose(): void;
}

/**
 * Monotonic millisecond clock, zero at backend init.
 */
export interface IClock {
  now(): BackendMs;
}

/**
 * Uniform integer source.
 */
export interface IRandom {
  /** Integer in [0, n); 0 when n <= 0 */
  uniform(n: number): number;
}
