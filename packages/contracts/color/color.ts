/**
 * 8-bit RGBA colour. Channels are integers in 0..255; `a` is opacity
 * (255 = fully opaque).
 */
export interface ColorRGBA {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export const CHANNEL_MIN = 0;
export const CHANNEL_MAX = 255;
export const OPAQUE = CHANNEL_MAX;

/**
 * Saturate a value into the 8-bit channel range. Non-integers are rounded
 * toward zero first.
 */
export function clampChannel(value: number): number {
  return Math.max(CHANNEL_MIN, Math.min(CHANNEL_MAX, Math.trunc(value)));
}

/**
 * Build a frozen colour. Channels are clamped; alpha defaults to opaque.
 */
export function rgba(r: number, g: number, b: number, a: number = OPAQUE): ColorRGBA {
  return Object.freeze({
    r: clampChannel(r),
    g: clampChannel(g),
    b: clampChannel(b),
    a: clampChannel(a),
  });
}

/**
 * CSS colour string, alpha scaled to 0..1: `rgba(0, 0, 0, 0.502)`.
 * Canvas fills and diagnostics both use it.
 */
export function formatColor(c: ColorRGBA): string {
  return `rgba(${c.r}, ${c.g}, ${c.b}, ${(c.a / CHANNEL_MAX).toFixed(3)})`;
}
