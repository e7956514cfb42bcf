/**
 * Canvas Graphics Backend
 *
 * Implements IGraphicsBackend over HTML canvases:
 * - every surface is an offscreen canvas of its own
 * - a window draws into an offscreen back buffer; present() copies that
 *   buffer onto the visible canvas
 * - fills replace pixels (alpha included); blits composite with drawImage
 */

import type {
  ColorRGBA,
  IGraphicsBackend,
  ISurface,
  IWindow,
  Rect,
  WindowSpec,
} from "@smileys/contracts";
import { formatColor, intersectRects } from "@smileys/contracts";

import type { ViewportHost } from "../dom/EventHost";
import { CanvasSurface } from "./CanvasSurface";
import { CanvasWindow } from "./CanvasWindow";

export type CanvasFactory = (width: number, height: number) => HTMLCanvasElement;

/**
 * Offscreen canvases from the page's document.
 */
export const createDomCanvas: CanvasFactory = (width, height) => {
  const canvas = document.createElement("canvas");
  canvas.width = width;
  canvas.height = height;
  return canvas;
};

export interface CanvasGraphicsConfig {
  /** Creates offscreen canvases for surfaces and back buffers */
  createCanvas?: CanvasFactory;

  /** Resizable windows are scaled to fit it. Null keeps their natural size. */
  viewport?: ViewportHost | null;

  /** Receives the window title (usually `document`) */
  titleTarget?: { title: string } | null;

  /**
   * Largest surface (in pixels) createSurface() will allocate.
   * Larger requests fail the way an exhausted allocator would.
   * @default 16777216
   */
  maxSurfacePixels?: number;
}

const DEFAULT_CONFIG: Required<CanvasGraphicsConfig> = {
  createCanvas: createDomCanvas,
  viewport: null,
  titleTarget: null,
  maxSurfacePixels: 4096 * 4096,
};

export class CanvasGraphics implements IGraphicsBackend {
  private screen: HTMLCanvasElement;
  private config: Required<CanvasGraphicsConfig>;
  private window: CanvasWindow | null = null;
  private surfaces = new Set<CanvasSurface>();
  private presented = 0;

  private readonly onViewportResize = (): void => {
    this.fitWindow();
  };

  /**
   * @param screen - The visible canvas windows are presented on
   */
  constructor(screen: HTMLCanvasElement, config: CanvasGraphicsConfig = {}) {
    this.screen = screen;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  // === Windows ===

  /**
   * Open the window on the visible canvas. One window per canvas.
   */
  createWindow(spec: WindowSpec): CanvasWindow {
    if (this.window) {
      throw new Error(`Canvas already hosts window "${this.window.title}"`);
    }
    const { width, height } = spec.size;
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid window size ${width}x${height}`);
    }

    const screenCtx = this.screen.getContext("2d");
    if (!screenCtx) {
      throw new Error("Failed to get 2D rendering context");
    }
    const backBuffer = new CanvasSurface(this.config.createCanvas(width, height), true);
    const opened = new CanvasWindow(this.screen, screenCtx, backBuffer, spec);
    this.window = opened;

    if (this.config.titleTarget) {
      this.config.titleTarget.title = spec.title;
    }
    if (opened.resizable && this.config.viewport) {
      this.fitWindow();
      this.config.viewport.addEventListener("resize", this.onViewportResize);
    }
    return opened;
  }

  getWindowSurface(window: IWindow): CanvasSurface {
    return this.toWindow(window).surface;
  }

  destroyWindow(window: IWindow): void {
    const w = this.toWindow(window);
    this.config.viewport?.removeEventListener("resize", this.onViewportResize);
    w.surface.release();
    this.window = null;
  }

  present(window: IWindow): void {
    this.toWindow(window).show();
    this.presented++;
  }

  // === Surfaces ===

  /**
   * Canvases are always 32-bit RGBA, so the requested depth is ignored.
   */
  createSurface(width: number, height: number, _depth: number): CanvasSurface {
    if (width <= 0 || height <= 0) {
      throw new Error(`Invalid surface size ${width}x${height}`);
    }
    if (width * height > this.config.maxSurfacePixels) {
      throw new Error(`Out of memory allocating ${width}x${height} surface`);
    }
    const surface = new CanvasSurface(this.config.createCanvas(width, height));
    this.surfaces.add(surface);
    return surface;
  }

  freeSurface(surface: ISurface): void {
    const s = this.toSurface(surface);
    if (s.windowOwned) {
      throw new Error("Window surfaces are released with their window");
    }
    s.release();
    this.surfaces.delete(s);
  }

  setSurfaceRLE(surface: ISurface, enabled: boolean): void {
    this.toSurface(surface).rle = enabled;
  }

  fillRect(surface: ISurface, area: Rect | null, color: ColorRGBA): void {
    const s = this.toSurface(surface);
    const { x, y, w, h } = area ?? { x: 0, y: 0, w: s.width, h: s.height };

    // clearRect first so the fill replaces what was there instead of blending
    s.ctx.clearRect(x, y, w, h);
    if (color.a === 0) return;
    s.ctx.fillStyle = formatColor(color);
    s.ctx.fillRect(x, y, w, h);
  }

  fillRects(surface: ISurface, areas: readonly Rect[], color: ColorRGBA): void {
    for (const area of areas) {
      this.fillRect(surface, area, color);
    }
  }

  blit(src: ISurface, srcArea: Rect | null, dest: ISurface, destArea: Rect): void {
    const from = this.toSurface(src);
    const to = this.toSurface(dest);

    const bounds: Rect = { x: 0, y: 0, w: from.width, h: from.height };
    const requested = srcArea ?? bounds;
    const source = intersectRects(requested, bounds);
    if (!source) return;

    // Destination origin shifts with whatever was clipped off the source
    const dx = destArea.x + (source.x - requested.x);
    const dy = destArea.y + (source.y - requested.y);
    to.ctx.drawImage(from.canvas, source.x, source.y, source.w, source.h, dx, dy, source.w, source.h);
  }

  // === Lifecycle ===

  /** Surfaces allocated by createSurface() and not yet freed */
  get liveSurfaceCount(): number {
    return this.surfaces.size;
  }

  get presentCount(): number {
    return this.presented;
  }

  dispose(): void {
    for (const surface of this.surfaces) {
      surface.release();
    }
    this.surfaces.clear();
    if (this.window) {
      this.destroyWindow(this.window);
    }
  }

  private fitWindow(): void {
    const viewport = this.config.viewport;
    if (!this.window || !viewport) return;
    this.window.fit({ width: viewport.innerWidth, height: viewport.innerHeight });
  }

  private toSurface(surface: ISurface): CanvasSurface {
    if (!(surface instanceof CanvasSurface)) {
      throw new Error("Surface was not created by this backend");
    }
    if (surface.freed) {
      throw new Error("Surface used after it was freed");
    }
    return surface;
  }

  private toWindow(window: IWindow): CanvasWindow {
    if (window !== this.window || !(window instanceof CanvasWindow)) {
      throw new Error(`Unknown window "${window.title}"`);
    }
    return window;
  }
}
