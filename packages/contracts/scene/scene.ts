import type { ISurface } from "../graphics/graphics";

/**
 * Anything that can composite itself onto a destination surface.
 */
export interface IDrawable {
  draw(dest: ISurface): void;
}

/**
 * Renderer that produces one full frame from drawables given back to front.
 */
export interface IRenderer {
  id: string;
  render(drawables: readonly IDrawable[]): void;
}
