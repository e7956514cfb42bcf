import type {
  ColorRGBA,
  IDrawable,
  IGraphicsBackend,
  IRenderer,
  ISurface,
  IWindow,
} from "@smileys/contracts";
import { rgba } from "@smileys/contracts";

export interface SceneRendererConfig {
  /** Colour the whole window is cleared to before drawing */
  backgroundColor?: ColorRGBA;
}

const DEFAULT_CONFIG: Required<SceneRendererConfig> = {
  backgroundColor: rgba(0, 80, 160, 255),
};

/**
 * Full-frame renderer: clear, draw back to front, present.
 * No dirty rectangles; every frame repaints the whole window.
 */
export class SceneRenderer implements IRenderer {
  readonly id = "scene";

  private gfx: IGraphicsBackend;
  private window: IWindow | null = null;
  private target: ISurface | null = null;
  private config: Required<SceneRendererConfig>;
  private frames = 0;

  constructor(gfx: IGraphicsBackend, config: SceneRendererConfig = {}) {
    this.gfx = gfx;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Attach to a window. Its surface is borrowed, never freed here.
   * Must be called before render().
   */
  attach(window: IWindow): void {
    this.window = window;
    this.target = this.gfx.getWindowSurface(window);
  }

  /**
   * Detach from the window.
   */
  detach(): void {
    this.window = null;
    this.target = null;
  }

  get frameCount(): number {
    return this.frames;
  }

  /**
   * Render one frame. Drawables are painted in order, so later ones
   * cover earlier ones.
   */
  render(drawables: readonly IDrawable[]): void {
    if (!this.window || !this.target) {
      return;
    }

    this.gfx.fillRect(this.target, null, this.config.backgroundColor);

    for (const drawable of drawables) {
      drawable.draw(this.target);
    }

    this.gfx.present(this.window);
    this.frames++;
  }
}
