/**
 * Scene Loop
 *
 * Single control flow that polls for input, drives the colour-drift tick
 * and maps events onto the scene. One iteration:
 *
 *   now ← clock
 *   event ← wait up to pollTimeoutMs
 *   tick if now - lastTick ≥ tickInterval   (whether or not an event came)
 *   dispatch event, if any
 *
 * `done` is only consulted between iterations, so a started iteration
 * always finishes its mutation and render.
 */

import type {
  BackendMs,
  IClock,
  IEventSource,
  IRenderer,
  InputEvent,
  KeySymbol,
  Ms,
} from "@smileys/contracts";
import { describeEvent, formatColor } from "@smileys/contracts";

import type { Scene } from "../scene/Scene";

export interface SceneLoopConfig {
  /** @default 100 */
  tickIntervalMs?: Ms;
  /** Longest single wait for input. @default 10 */
  pollTimeoutMs?: Ms;
  /** Colour drift per tick for Smiley 1. @default 30 */
  primaryDrift?: number;
  /** Colour drift per tick for Smiley 2. @default 20 */
  secondaryDrift?: number;
  /** Arrow-key step for Smiley 2, in pixels. @default 20 */
  nudgeStep?: number;
  /** Log every tick and dispatched event. @default false */
  verbose?: boolean;
}

const DEFAULT_CONFIG: Required<SceneLoopConfig> = {
  tickIntervalMs: 100,
  pollTimeoutMs: 10,
  primaryDrift: 30,
  secondaryDrift: 20,
  nudgeStep: 20,
  verbose: false,
};

export interface SceneLoopDeps {
  scene: Scene;
  renderer: IRenderer;
  events: IEventSource;
  clock: IClock;
}

/**
 * Loop state. Owned by one SceneLoop, never shared.
 */
export interface LoopState {
  done: boolean;
  verbose: boolean;
  tickIntervalMs: Ms;
  lastTickMs: BackendMs;
}

const ARROW_DIRECTIONS = new Map<KeySymbol, { dx: number; dy: number }>([
  ["left", { dx: -1, dy: 0 }],
  ["right", { dx: 1, dy: 0 }],
  ["up", { dx: 0, dy: -1 }],
  ["down", { dx: 0, dy: 1 }],
]);

export class SceneLoop {
  private deps: SceneLoopDeps;
  private config: Required<SceneLoopConfig>;
  private loopState: LoopState;

  constructor(deps: SceneLoopDeps, config: SceneLoopConfig = {}) {
    this.deps = deps;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.loopState = {
      done: false,
      verbose: this.config.verbose,
      tickIntervalMs: this.config.tickIntervalMs,
      lastTickMs: deps.clock.now(),
    };
  }

  get state(): Readonly<LoopState> {
    return this.loopState;
  }

  get done(): boolean {
    return this.loopState.done;
  }

  /**
   * Iterate until a quit request or quit key.
   */
  async run(): Promise<void> {
    while (!this.loopState.done) {
      await this.step();
    }
  }

  /**
   * One loop iteration.
   */
  async step(): Promise<void> {
    const now = this.deps.clock.now();
    const event = await this.deps.events.waitEvent(this.config.pollTimeoutMs);

    this.tick(now);

    if (event) {
      this.dispatch(event);
    }
  }

  /**
   * Apply the colour drift if a full tick interval has elapsed since the
   * last one. Returns whether it fired.
   */
  tick(now: BackendMs): boolean {
    if (now - this.loopState.lastTickMs < this.loopState.tickIntervalMs) {
      return false;
    }

    const { primary, secondary } = this.deps.scene;
    primary.mutateColor(this.config.primaryDrift);
    secondary.mutateColor(this.config.secondaryDrift);
    this.render();
    this.loopState.lastTickMs = now;

    if (this.loopState.verbose) {
      console.log(
        `[SceneLoop] tick at ${now}ms: ${formatColor(primary.color)} / ${formatColor(secondary.color)}`
      );
    }
    return true;
  }

  /**
   * Map one input event onto the scene.
   */
  dispatch(event: InputEvent): void {
    if (this.loopState.verbose) {
      console.log(`[SceneLoop] ${describeEvent(event)}`);
    }

    switch (event.kind) {
      case "window":
        this.render();
        break;
      case "quit":
        this.stop();
        break;
      case "pointer-press":
        this.deps.scene.primary.entity.setPosition(event.x, event.y);
        this.render();
        break;
      case "key-press":
        this.handleKey(event.key);
        break;
    }
  }

  /**
   * Request loop exit at the end of the current iteration.
   */
  stop(): void {
    this.loopState.done = true;
  }

  render(): void {
    this.deps.renderer.render(this.deps.scene.drawOrder);
  }

  private handleKey(key: KeySymbol): void {
    if (key === "escape" || key === "q") {
      this.stop();
      return;
    }

    if (key === "space") {
      this.deps.scene.primary.randomizeColor();
      this.deps.scene.secondary.randomizeColor();
      this.render();
      return;
    }

    const direction = ARROW_DIRECTIONS.get(key);
    if (direction) {
      const step = this.config.nudgeStep;
      this.deps.scene.secondary.entity.translate(direction.dx * step, direction.dy * step);
      this.render();
    }
  }
}
