/**
 * Smiley face surface.
 *
 * Layout on a 100×100 canvas:
 *
 *   (0,0) ┌──────────┐
 *         │ ▪▪    ▪▪ │  head 90×90 in the base colour,
 *         │          │  eyes and mouth punched back to
 *         │  ▬▬▬▬▬▬  │  shadow alpha
 *         └──────────┘▒
 *            ▒▒▒▒▒▒▒▒▒▒  shadow 90×90 offset by (10,10)
 *
 * All fills overwrite pixels, so the cut-outs are exactly as transparent
 * as the shadow rather than a blend of shadow over head.
 */

import type { ColorRGBA, IGraphicsBackend, ISurface, Rect } from "@smileys/contracts";
import { rect, rgba } from "@smileys/contracts";

export const FACE_SIZE = 100;
export const FACE_DEPTH = 32;

export const SHADOW_COLOR: ColorRGBA = rgba(0, 0, 0, 128);

export const SHADOW_RECT: Readonly<Rect> = rect(10, 10, 90, 90);
export const HEAD_RECT: Readonly<Rect> = rect(0, 0, 90, 90);
export const EYE_RECTS: readonly Rect[] = [rect(20, 20, 15, 15), rect(55, 20, 15, 15)];
export const MOUTH_RECT: Readonly<Rect> = rect(20, 60, 50, 10);

export type FaceBuilder = (gfx: IGraphicsBackend, color: ColorRGBA) => ISurface;

/**
 * Render a fresh face surface in `color`. The caller owns the result.
 * Allocation failures from the backend propagate.
 */
export function buildFace(gfx: IGraphicsBackend, color: ColorRGBA): ISurface {
  const surface = gfx.createSurface(FACE_SIZE, FACE_SIZE, FACE_DEPTH);

  gfx.fillRect(surface, SHADOW_RECT, SHADOW_COLOR);
  gfx.fillRect(surface, HEAD_RECT, color);
  gfx.fillRects(surface, [...EYE_RECTS, MOUTH_RECT], SHADOW_COLOR);

  gfx.setSurfaceRLE(surface, true);
  return surface;
}
