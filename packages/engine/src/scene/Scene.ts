import type { ColorRGBA, IGraphicsBackend, IRandom, Vec2 } from "@smileys/contracts";
import { rgba } from "@smileys/contracts";

import { Smiley, type SmileyConfig } from "./Smiley";
import type { SceneEntity } from "./SceneEntity";

export interface SmileySetup {
  position: Vec2;
  color: ColorRGBA;
}

export interface SceneSetup {
  /** Smiley 1: follows the pointer, drawn on top */
  primary?: SmileySetup;
  /** Smiley 2: moved by the arrow keys, drawn underneath */
  secondary?: SmileySetup;
  smiley?: SmileyConfig;
}

export const DEFAULT_SCENE_SETUP: Required<SceneSetup> = {
  primary: { position: { x: 220, y: 240 }, color: rgba(255, 220, 0) },
  secondary: { position: { x: 420, y: 240 }, color: rgba(240, 100, 200) },
  smiley: {},
};

/**
 * The two smileys and the order they are painted in.
 */
export class Scene {
  readonly primary: Smiley;
  readonly secondary: Smiley;

  constructor(primary: Smiley, secondary: Smiley) {
    this.primary = primary;
    this.secondary = secondary;
  }

  static create(gfx: IGraphicsBackend, random: IRandom, setup: SceneSetup = {}): Scene {
    const { primary, secondary, smiley } = { ...DEFAULT_SCENE_SETUP, ...setup };
    const first = Smiley.create(gfx, random, primary.position.x, primary.position.y, primary.color, smiley);
    try {
      const second = Smiley.create(
        gfx,
        random,
        secondary.position.x,
        secondary.position.y,
        secondary.color,
        smiley
      );
      return new Scene(first, second);
    } catch (err) {
      first.dispose();
      throw err;
    }
  }

  /** Back to front: Smiley 2 first so Smiley 1 sits on top */
  get drawOrder(): readonly SceneEntity[] {
    return [this.secondary.entity, this.primary.entity];
  }

  dispose(): void {
    this.secondary.dispose();
    this.primary.dispose();
  }
}
