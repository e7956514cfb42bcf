/** Integer pixel coordinates. */
export interface Vec2 {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

/** Axis-aligned integer rectangle, top-left origin. */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export function rect(x: number, y: number, w: number, h: number): Rect {
  return { x, y, w, h };
}

/**
 * Rectangle of size `w`×`h` centered on `center`. Half extents truncate
 * toward zero, so odd sizes put the extra pixel right/below the center.
 */
export function centeredRect(center: Vec2, w: number, h: number): Rect {
  return {
    x: center.x - Math.trunc(w / 2),
    y: center.y - Math.trunc(h / 2),
    w,
    h,
  };
}

/**
 * Intersection of two rectangles, or null when they do not overlap.
 */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
}
