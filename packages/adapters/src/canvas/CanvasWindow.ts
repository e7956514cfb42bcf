import type { IWindow, Size, Vec2, WindowSpec } from "@smileys/contracts";

import type { CanvasSurface } from "./CanvasSurface";

/**
 * A window on the visible canvas. The canvas keeps the window's logical
 * size; resizable windows are scaled through CSS to fit the viewport.
 */
export class CanvasWindow implements IWindow {
  readonly title: string;
  readonly size: Size;
  readonly resizable: boolean;
  readonly surface: CanvasSurface;

  private screen: HTMLCanvasElement;
  private screenCtx: CanvasRenderingContext2D;

  constructor(
    screen: HTMLCanvasElement,
    screenCtx: CanvasRenderingContext2D,
    surface: CanvasSurface,
    spec: WindowSpec
  ) {
    this.title = spec.title;
    this.size = { width: spec.size.width, height: spec.size.height };
    this.resizable = spec.resizable ?? false;
    this.surface = surface;
    this.screen = screen;
    this.screenCtx = screenCtx;

    screen.width = this.size.width;
    screen.height = this.size.height;
  }

  /**
   * Scale the canvas to the largest size that fits `viewport` while keeping
   * the window's aspect ratio.
   */
  fit(viewport: Size): void {
    if (!this.resizable) return;
    const scale = Math.min(viewport.width / this.size.width, viewport.height / this.size.height);
    if (!(scale > 0)) return;
    this.screen.style.width = `${Math.floor(this.size.width * scale)}px`;
    this.screen.style.height = `${Math.floor(this.size.height * scale)}px`;
  }

  /**
   * Map page coordinates (as on a pointer event) to window pixels.
   */
  toWindowPixel(clientX: number, clientY: number): Vec2 {
    const box = this.screen.getBoundingClientRect();
    const scaleX = box.width > 0 ? this.size.width / box.width : 1;
    const scaleY = box.height > 0 ? this.size.height / box.height : 1;
    return {
      x: Math.floor((clientX - box.left) * scaleX),
      y: Math.floor((clientY - box.top) * scaleY),
    };
  }

  /**
   * Copy the back buffer onto the visible canvas.
   */
  show(): void {
    this.screenCtx.clearRect(0, 0, this.size.width, this.size.height);
    this.screenCtx.drawImage(this.surface.canvas, 0, 0);
  }
}
