import type { ColorRGBA, IGraphicsBackend, IRandom } from "@smileys/contracts";
import { OPAQUE, clampChannel, rgba } from "@smileys/contracts";

import { buildFace, type FaceBuilder } from "../faces/buildFace";
import { SceneEntity } from "./SceneEntity";

/**
 * How mutateColor() draws per-channel offsets for a given delta d.
 * - "symmetric": closed interval [-d, d]
 * - "legacy": [-d + 1, d], matching the historical drift formula
 */
export type DriftRange = "symmetric" | "legacy";

export interface SmileyConfig {
  /** @default "symmetric" */
  driftRange?: DriftRange;
  /** Surface factory; swapped out in tests */
  faceBuilder?: FaceBuilder;
}

const DEFAULT_CONFIG: Required<SmileyConfig> = {
  driftRange: "symmetric",
  faceBuilder: buildFace,
};

/** randomizeColor() channel range: RANDOM_CHANNEL_MIN + [0, RANDOM_CHANNEL_SPAN) */
export const RANDOM_CHANNEL_MIN = 50;
export const RANDOM_CHANNEL_SPAN = 175;

/**
 * A face-shaped scene entity paired with the colour it depicts.
 *
 * Invariant: whenever control returns to the caller, entity.surface is a
 * rendering of `color`.
 */
export class Smiley {
  readonly entity: SceneEntity;

  private gfx: IGraphicsBackend;
  private random: IRandom;
  private config: Required<SmileyConfig>;
  private current: ColorRGBA;

  private constructor(
    gfx: IGraphicsBackend,
    random: IRandom,
    entity: SceneEntity,
    color: ColorRGBA,
    config: Required<SmileyConfig>
  ) {
    this.gfx = gfx;
    this.random = random;
    this.entity = entity;
    this.current = color;
    this.config = config;
  }

  static create(
    gfx: IGraphicsBackend,
    random: IRandom,
    x: number,
    y: number,
    color: ColorRGBA,
    config: SmileyConfig = {}
  ): Smiley {
    const resolved = { ...DEFAULT_CONFIG, ...config };
    const surface = resolved.faceBuilder(gfx, color);
    const entity = new SceneEntity(gfx, surface, { x, y });
    return new Smiley(gfx, random, entity, color, resolved);
  }

  get color(): ColorRGBA {
    return this.current;
  }

  /**
   * Re-render the face in `color` and swap it in.
   * The new surface is built before the old one is released, so a failed
   * build leaves the smiley unchanged.
   */
  setColor(color: ColorRGBA): void {
    const next = this.config.faceBuilder(this.gfx, color);
    this.entity.replaceSurface(next);
    this.current = color;
  }

  /**
   * Drift each RGB channel by a random offset of at most `delta`, clamped
   * to the channel range. Alpha becomes opaque.
   */
  mutateColor(delta: number): void {
    const spread = Math.abs(Math.trunc(delta));
    const { r, g, b } = this.current;
    this.setColor(
      rgba(
        clampChannel(r + this.drift(spread)),
        clampChannel(g + this.drift(spread)),
        clampChannel(b + this.drift(spread)),
        OPAQUE
      )
    );
  }

  /**
   * Pick a fresh mid-range colour, each channel in [50, 224].
   */
  randomizeColor(): void {
    this.setColor(
      rgba(
        RANDOM_CHANNEL_MIN + this.random.uniform(RANDOM_CHANNEL_SPAN),
        RANDOM_CHANNEL_MIN + this.random.uniform(RANDOM_CHANNEL_SPAN),
        RANDOM_CHANNEL_MIN + this.random.uniform(RANDOM_CHANNEL_SPAN),
        OPAQUE
      )
    );
  }

  dispose(): void {
    this.entity.dispose();
  }

  private drift(spread: number): number {
    if (this.config.driftRange === "legacy") {
      return this.random.uniform(2 * spread) - spread + 1;
    }
    return this.random.uniform(2 * spread + 1) - spread;
  }
}
