import type { IDrawable, IGraphicsBackend, ISurface, Rect, Vec2 } from "@smileys/contracts";
import { centeredRect } from "@smileys/contracts";

/**
 * A surface placed in the scene by its center point.
 *
 * The entity owns its surface: replacing it or disposing the entity frees
 * the old one through the backend exactly once.
 */
export class SceneEntity implements IDrawable {
  private gfx: IGraphicsBackend;
  private owned: ISurface | null;
  private center: Vec2;

  constructor(gfx: IGraphicsBackend, surface: ISurface, position: Vec2) {
    this.gfx = gfx;
    this.owned = surface;
    this.center = { x: position.x, y: position.y };
  }

  get surface(): ISurface {
    if (!this.owned) {
      throw new Error("SceneEntity used after dispose()");
    }
    return this.owned;
  }

  get position(): Readonly<Vec2> {
    return this.center;
  }

  get disposed(): boolean {
    return this.owned === null;
  }

  setPosition(x: number, y: number): void {
    this.center = { x, y };
  }

  translate(dx: number, dy: number): void {
    this.center = { x: this.center.x + dx, y: this.center.y + dy };
  }

  /**
   * Destination rectangle: the surface centered on the position.
   */
  boundingRect(): Rect {
    const { width, height } = this.surface;
    return centeredRect(this.center, width, height);
  }

  draw(dest: ISurface): void {
    this.gfx.blit(this.surface, null, dest, this.boundingRect());
  }

  /**
   * Take ownership of `next` and free the previous surface.
   */
  replaceSurface(next: ISurface): void {
    const previous = this.surface;
    if (previous === next) return;
    this.owned = next;
    this.gfx.freeSurface(previous);
  }

  dispose(): void {
    if (!this.owned) return;
    const surface = this.owned;
    this.owned = null;
    this.gfx.freeSurface(surface);
  }
}
