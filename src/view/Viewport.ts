/**
 * Viewport
 *
 * Tracks the visible part of the map: a scroll offset into the map surface
 * plus the host's viewport size. The offset is clamped so the view never
 * leaves the map unless the map is smaller than the viewport.
 */

import type { Point, Rect, Size } from "../projection/types";
import { toInnerPoint, toInnerRect, toOuterPoint, toOuterRect } from "../projection/rect";

export class Viewport {
  private _size: Size = { width: 0, height: 0 };
  private _mapSize: Size = { width: 0, height: 0 };
  private _scroll: Point = { x: 0, y: 0 };

  get size(): Size {
    return { ...this._size };
  }

  get mapSize(): Size {
    return { ...this._mapSize };
  }

  /** Top-left of the view in map pixels */
  get scrollOffset(): Point {
    return { ...this._scroll };
  }

  get viewRect(): Rect {
    return {
      left: this._scroll.x,
      top: this._scroll.y,
      right: this._scroll.x + this._size.width,
      bottom: this._scroll.y + this._size.height,
    };
  }

  /** Largest scroll offset per axis */
  get scrollRange(): Size {
    return {
      width: Math.max(0, this._mapSize.width - this._size.width),
      height: Math.max(0, this._mapSize.height - this._size.height),
    };
  }

  setSize(size: Size): void {
    if (size.width < 0 || size.height < 0) {
      throw new RangeError(`Invalid viewport size ${size.width}x${size.height}`);
    }
    this._size = { ...size };
    this.clampScroll();
  }

  setMapSize(size: Size): void {
    this._mapSize = { ...size };
    this.clampScroll();
  }

  /**
   * Move the view's top-left to a map point, clamped into the scroll range.
   * @returns true when the offset changed
   */
  scrollTo(p: Point): boolean {
    const range = this.scrollRange;
    const x = Math.max(0, Math.min(Math.round(p.x), range.width));
    const y = Math.max(0, Math.min(Math.round(p.y), range.height));
    if (x === this._scroll.x && y === this._scroll.y) return false;
    this._scroll = { x, y };
    return true;
  }

  scrollBy(dx: number, dy: number): boolean {
    return this.scrollTo({ x: this._scroll.x + dx, y: this._scroll.y + dy });
  }

  /** Viewport-relative pixels to absolute map pixels */
  viewToMap(p: Point): Point;
  viewToMap(r: Rect): Rect;
  viewToMap(value: Point | Rect): Point | Rect {
    const origin = this._scroll;
    return "left" in value ? toOuterRect(origin, value) : toOuterPoint(origin, value);
  }

  /** Absolute map pixels to viewport-relative pixels */
  mapToView(p: Point): Point;
  mapToView(r: Rect): Rect;
  mapToView(value: Point | Rect): Point | Rect {
    const origin = this._scroll;
    return "left" in value ? toInnerRect(origin, value) : toInnerPoint(origin, value);
  }

  private clampScroll(): void {
    this.scrollTo(this._scroll);
  }
}
