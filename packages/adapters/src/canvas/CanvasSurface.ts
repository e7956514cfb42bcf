import type { ISurface } from "@smileys/contracts";

/**
 * A surface backed by its own canvas. Canvases are always 32-bit RGBA.
 */
export class CanvasSurface implements ISurface {
  readonly width: number;
  readonly height: number;
  readonly canvas: HTMLCanvasElement;
  readonly ctx: CanvasRenderingContext2D;

  /** Window back buffers are released with their window, never freed directly */
  readonly windowOwned: boolean;

  /** Fast-blit hint; canvases have no use for it but keep it for callers */
  rle = false;

  private released = false;

  constructor(canvas: HTMLCanvasElement, windowOwned = false) {
    const ctx = canvas.getContext("2d");
    if (!ctx) {
      throw new Error("Failed to get 2D rendering context");
    }
    this.canvas = canvas;
    this.ctx = ctx;
    this.width = canvas.width;
    this.height = canvas.height;
    this.windowOwned = windowOwned;
  }

  get freed(): boolean {
    return this.released;
  }

  /**
   * Drop the backing store. Browsers reclaim a canvas's pixels once it is
   * sized to zero.
   */
  release(): void {
    if (this.released) return;
    this.released = true;
    this.canvas.width = 0;
    this.canvas.height = 0;
  }
}
