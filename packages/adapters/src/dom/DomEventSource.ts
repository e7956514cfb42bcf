/**
 * DOM Event Source
 *
 * Push-to-pull bridge between browser events and the polling loop:
 * - pointerdown on the canvas becomes a pointer press in window pixels
 * - keydown becomes a key press; chords with Alt, Ctrl or Meta are left
 *   to the browser
 * - resize, focus and blur become window events; pagehide becomes quit
 * - waitEvent() takes the oldest queued event, or waits for the next one
 *   up to the timeout
 */

import type { IEventSource, InputEvent, Ms, Vec2 } from "@smileys/contracts";

import { readFlag, readNumber, readString, type EventHost } from "./EventHost";
import { keySymbolFor, pointerButtonFor } from "./keys";

export interface DomEventSourceConfig {
  /** Receives pointerdown (usually the canvas) */
  pointerTarget?: EventHost | null;

  /** Receives keydown, resize, focus, blur and pagehide (usually `window`) */
  windowTarget?: EventHost | null;

  /** Maps page coordinates to window pixels */
  mapPointer?: ((clientX: number, clientY: number) => Vec2) | null;
}

const DEFAULT_CONFIG: Required<DomEventSourceConfig> = {
  pointerTarget: null,
  windowTarget: null,
  mapPointer: null,
};

export class DomEventSource implements IEventSource {
  private config: Required<DomEventSourceConfig>;

  private queue: InputEvent[] = [];
  private waiter: ((event: InputEvent | null) => void) | null = null;
  private started = false;
  private disposed = false;

  private readonly onPointerDown = (event: Event): void => {
    const clientX = readNumber(event, "clientX");
    const clientY = readNumber(event, "clientY");
    const button = pointerButtonFor(readNumber(event, "button") ?? -1);
    if (clientX === null || clientY === null || button === null) return;

    const { x, y } = this.config.mapPointer?.(clientX, clientY) ?? { x: clientX, y: clientY };
    this.push({ kind: "pointer-press", x, y, button });
  };

  private readonly onKeyDown = (event: Event): void => {
    if (readFlag(event, "altKey") || readFlag(event, "ctrlKey") || readFlag(event, "metaKey")) {
      return;
    }
    const key = keySymbolFor(readString(event, "key") ?? "");
    if (key === null) return;

    // Arrows and space would otherwise scroll the page
    event.preventDefault();
    this.push({ kind: "key-press", key });
  };

  private readonly onResize = (): void => {
    this.push({ kind: "window", state: "resized" });
  };

  private readonly onFocus = (): void => {
    this.push({ kind: "window", state: "focus-gained" });
  };

  private readonly onBlur = (): void => {
    this.push({ kind: "window", state: "focus-lost" });
  };

  private readonly onPageHide = (): void => {
    this.push({ kind: "quit" });
  };

  constructor(config: DomEventSourceConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Start listening.
   */
  start(): void {
    if (this.started || this.disposed) return;
    this.started = true;

    this.config.pointerTarget?.addEventListener("pointerdown", this.onPointerDown);
    for (const [type, listener] of this.windowListeners()) {
      this.config.windowTarget?.addEventListener(type, listener);
    }
  }

  /**
   * Queue an event as if it came from the page.
   */
  push(event: InputEvent): void {
    if (this.disposed) return;
    if (this.waiter) {
      this.waiter(event);
      return;
    }
    this.queue.push(event);
  }

  waitEvent(timeoutMs: Ms): Promise<InputEvent | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.disposed) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error("DomEventSource: waitEvent() already pending"));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(null);
      }, Math.max(0, timeoutMs));

      this.waiter = (event) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(event);
      };
    });
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Stop listening. A pending wait resolves null.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    if (this.started) {
      this.config.pointerTarget?.removeEventListener("pointerdown", this.onPointerDown);
      for (const [type, listener] of this.windowListeners()) {
        this.config.windowTarget?.removeEventListener(type, listener);
      }
    }

    this.queue = [];
    this.waiter?.(null);
  }

  private windowListeners(): Array<[string, (event: Event) => void]> {
    return [
      ["keydown", this.onKeyDown],
      ["resize", this.onResize],
      ["focus", this.onFocus],
      ["blur", this.onBlur],
      ["pagehide", this.onPageHide],
    ];
  }
}
