/**
 * Graphics Backend Contract
 *
 * The fixed surface/window API the scene core consumes. The core never
 * touches pixels directly: it creates, fills, composites and frees surfaces
 * through an IGraphicsBackend, and presents through a window handle.
 *
 * Ownership rules:
 * - A surface returned by createSurface() has exactly one owner, which must
 *   release it with freeSurface() exactly once.
 * - The surface returned by getWindowSurface() belongs to the window. The
 *   core borrows it and never frees it.
 */

import type { ColorRGBA } from "../color/color";
import type { Rect, Size, Vec2 } from "../geometry/geometry";

/**
 * Opaque pixel buffer. Only the dimensions are visible to the core.
 */
export interface ISurface {
  readonly width: number;
  readonly height: number;
}

export interface WindowSpec {
  title: string;
  /** Requested top-left position; backends without placement ignore it */
  position?: Vec2;
  size: Size;
  resizable?: boolean;
}

/**
 * Handle to an open window.
 */
export interface IWindow {
  readonly title: string;
  readonly size: Size;
}

export interface IGraphicsBackend {
  createWindow(spec: WindowSpec): IWindow;
  getWindowSurface(window: IWindow): ISurface;
  destroyWindow(window: IWindow): void;

  /**
   * Allocate a transparent surface. Throws when allocation fails.
   * `depth` is bits per pixel; backends with a single pixel format ignore it.
   */
  createSurface(width: number, height: number, depth: number): ISurface;
  freeSurface(surface: ISurface): void;

  /** Fast-blit hint; backends may ignore it */
  setSurfaceRLE(surface: ISurface, enabled: boolean): void;

  /**
   * Overwrite pixels (alpha included, no blending) inside `area`, or the
   * whole surface when `area` is null.
   */
  fillRect(surface: ISurface, area: Rect | null, color: ColorRGBA): void;
  fillRects(surface: ISurface, areas: readonly Rect[], color: ColorRGBA): void;

  /**
   * Composite `src` (or the `srcArea` part of it) over `dest` with its
   * top-left at `destArea`. Uses alpha-over blending.
   */
  blit(src: ISurface, srcArea: Rect | null, dest: ISurface, destArea: Rect): void;

  /** Push the window surface to the screen */
  present(window: IWindow): void;

  /** Release everything the backend acquired */
  dispose(): void;
}
