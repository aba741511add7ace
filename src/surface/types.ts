/**
 * Drawing Surface Types
 *
 * The viewport core draws through this small 2D interface so that it can
 * run against a browser canvas, an OffscreenCanvas, a node canvas library
 * or a headless recorder.
 */

import type { Point, Rect, Size } from "../projection/types";

/** CSS color string, e.g. "#87ceeb" or "rgb(0, 0, 0)" */
export type Color = string;

/** Font used for captions and labels */
export interface FontSpec {
  family: string;
  /** Size in pixels */
  size: number;
  bold?: boolean;
  italic?: boolean;
}

/** Fill and outline colors of a shape */
export interface ShapeStyle {
  fill: Color;
  stroke: Color;
}

export interface TextStyle {
  font: FontSpec;
  color: Color;
  /** Opaque background behind the text; omitted means transparent */
  background?: Color;
}

/**
 * Raster target the map draws to: the cache image, label bitmaps and the
 * host's paint target all implement it.
 */
export interface DrawSurface {
  readonly width: number;
  readonly height: number;

  /** Change dimensions; contents are undefined afterwards */
  resize(width: number, height: number): void;
  /** Fill a rect with a solid color, or make it transparent when color is omitted */
  clear(r: Rect, color?: Color): void;
  /** Filled rectangle with a 1px outline */
  rectangle(r: Rect, style: ShapeStyle): void;
  /** Filled ellipse inscribed in a rect, with outline */
  ellipse(r: Rect, style: ShapeStyle): void;
  /** Filled closed polygon with outline */
  polygon(points: readonly Point[], style: ShapeStyle): void;
  /** Extent of a single line of text */
  measureText(text: string, font: FontSpec): Size;
  /** Draw text with its top-left corner at `at` */
  drawText(text: string, at: Point, style: TextStyle): void;
  /** Copy `source` region of another surface with its top-left at `at` */
  blit(from: DrawSurface, source: Rect, at: Point): void;
}

/** Creates offscreen surfaces for the cache image and label bitmaps */
export type SurfaceFactory = (width: number, height: number) => DrawSurface;

/** CSS font shorthand for a font spec */
export function fontToCss(font: FontSpec): string {
  const parts: string[] = [];
  if (font.italic) parts.push("italic");
  if (font.bold) parts.push("bold");
  parts.push(`${font.size}px`);
  parts.push(font.family);
  return parts.join(" ");
}
