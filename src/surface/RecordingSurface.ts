/**
 * Headless DrawSurface that records draw operations instead of rasterizing.
 *
 * Useful for server-side layout checks and for tests. Text extents are
 * synthetic: half the font size per character, one font size high.
 */

import type { Point, Rect, Size } from "../projection/types";
import type { Color, DrawSurface, FontSpec, ShapeStyle, TextStyle } from "./types";

export type DrawOp =
  | { op: "resize"; width: number; height: number }
  | { op: "clear"; rect: Rect; color?: Color }
  | { op: "rectangle"; rect: Rect; style: ShapeStyle }
  | { op: "ellipse"; rect: Rect; style: ShapeStyle }
  | { op: "polygon"; points: Point[]; style: ShapeStyle }
  | { op: "text"; text: string; at: Point; style: TextStyle }
  | { op: "blit"; from: DrawSurface; source: Rect; at: Point };

export class RecordingSurface implements DrawSurface {
  private _width: number;
  private _height: number;

  /** Operations in the order they were issued */
  readonly ops: DrawOp[] = [];

  constructor(width = 0, height = 0) {
    this._width = width;
    this._height = height;
  }

  get width(): number {
    return this._width;
  }

  get height(): number {
    return this._height;
  }

  /** Forget recorded operations */
  reset(): void {
    this.ops.length = 0;
  }

  resize(width: number, height: number): void {
    this._width = width;
    this._height = height;
    this.ops.push({ op: "resize", width, height });
  }

  clear(rect: Rect, color?: Color): void {
    this.ops.push(color === undefined ? { op: "clear", rect } : { op: "clear", rect, color });
  }

  rectangle(rect: Rect, style: ShapeStyle): void {
    this.ops.push({ op: "rectangle", rect, style });
  }

  ellipse(rect: Rect, style: ShapeStyle): void {
    this.ops.push({ op: "ellipse", rect, style });
  }

  polygon(points: readonly Point[], style: ShapeStyle): void {
    this.ops.push({ op: "polygon", points: [...points], style });
  }

  measureText(text: string, font: FontSpec): Size {
    return { width: text.length * Math.ceil(font.size / 2), height: font.size };
  }

  drawText(text: string, at: Point, style: TextStyle): void {
    this.ops.push({ op: "text", text, at, style });
  }

  blit(from: DrawSurface, source: Rect, at: Point): void {
    this.ops.push({ op: "blit", from, source, at });
  }
}

export function recordingSurfaceFactory(width: number, height: number): RecordingSurface {
  return new RecordingSurface(width, height);
}
