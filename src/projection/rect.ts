/**
 * Pixel rectangle helpers.
 *
 * Rects are half-open: a point lies inside when left <= x < right
 * and top <= y < bottom.
 */

import type { Point, Rect, Size } from "./types";

export function rectFromSize(topLeft: Point, size: Size): Rect {
  return {
    left: topLeft.x,
    top: topLeft.y,
    right: topLeft.x + size.width,
    bottom: topLeft.y + size.height,
  };
}

/**
 * Build a normalized rect from two arbitrary corners, as produced by
 * dragging a selection in any direction.
 */
export function normalizeRect(a: Point, b: Point): Rect {
  return {
    left: Math.min(a.x, b.x),
    top: Math.min(a.y, b.y),
    right: Math.max(a.x, b.x),
    bottom: Math.max(a.y, b.y),
  };
}

export function rectWidth(r: Rect): number {
  return r.right - r.left;
}

export function rectHeight(r: Rect): number {
  return r.bottom - r.top;
}

export function topLeftOf(r: Rect): Point {
  return { x: r.left, y: r.top };
}

/** Center point, rounded down like integer division */
export function centerOf(r: Rect): Point {
  return {
    x: Math.floor((r.left + r.right) / 2),
    y: Math.floor((r.top + r.bottom) / 2),
  };
}

export function rectContainsPoint(r: Rect, p: Point): boolean {
  return p.x >= r.left && p.x < r.right && p.y >= r.top && p.y < r.bottom;
}

/** Check whether `outer` fully contains `inner` (shared edges count) */
export function rectContainsRect(outer: Rect, inner: Rect): boolean {
  return (
    inner.left >= outer.left &&
    inner.right <= outer.right &&
    inner.top >= outer.top &&
    inner.bottom <= outer.bottom
  );
}

/**
 * Intersection of two rects.
 * @returns null when the rects do not overlap
 */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  const result = {
    left: Math.max(a.left, b.left),
    top: Math.max(a.top, b.top),
    right: Math.min(a.right, b.right),
    bottom: Math.min(a.bottom, b.bottom),
  };
  if (result.left >= result.right || result.top >= result.bottom) return null;
  return result;
}

export function offsetRect(r: Rect, dx: number, dy: number): Rect {
  return {
    left: r.left + dx,
    top: r.top + dy,
    right: r.right + dx,
    bottom: r.bottom + dy,
  };
}

// Absolute <=> local coordinates, like client <=> screen conversion.

/** Convert an absolute point into the space whose origin is `origin` */
export function toInnerPoint(origin: Point, p: Point): Point {
  return { x: p.x - origin.x, y: p.y - origin.y };
}

/** Convert a point local to `origin` back into absolute coordinates */
export function toOuterPoint(origin: Point, p: Point): Point {
  return { x: p.x + origin.x, y: p.y + origin.y };
}

export function toInnerRect(origin: Point, r: Rect): Rect {
  return offsetRect(r, -origin.x, -origin.y);
}

export function toOuterRect(origin: Point, r: Rect): Rect {
  return offsetRect(r, origin.x, origin.y);
}
