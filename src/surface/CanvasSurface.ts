/**
 * DrawSurface backed by an HTML canvas 2D context.
 *
 * Canvas and context are typed structurally, so the adapter also works with
 * OffscreenCanvas and with node canvas libraries exposing the same API.
 */

import type { Point, Rect, Size } from "../projection/types";
import {
  type Color,
  type DrawSurface,
  type FontSpec,
  type ShapeStyle,
  type TextStyle,
  fontToCss,
} from "./types";

/** The subset of CanvasRenderingContext2D the adapter uses */
export interface Canvas2DContextLike {
  fillStyle: unknown;
  strokeStyle: unknown;
  lineWidth: number;
  font: string;
  textBaseline: unknown;
  clearRect(x: number, y: number, w: number, h: number): void;
  fillRect(x: number, y: number, w: number, h: number): void;
  strokeRect(x: number, y: number, w: number, h: number): void;
  beginPath(): void;
  closePath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  ellipse(
    x: number,
    y: number,
    radiusX: number,
    radiusY: number,
    rotation: number,
    startAngle: number,
    endAngle: number
  ): void;
  fill(): void;
  stroke(): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): {
    width: number;
    actualBoundingBoxAscent?: number;
    actualBoundingBoxDescent?: number;
  };
  drawImage(
    image: CanvasLike,
    sx: number,
    sy: number,
    sw: number,
    sh: number,
    dx: number,
    dy: number,
    dw: number,
    dh: number
  ): void;
}

/** The subset of HTMLCanvasElement / OffscreenCanvas the adapter uses */
export interface CanvasLike {
  width: number;
  height: number;
  getContext(contextId: "2d"): Canvas2DContextLike | null;
}

export class CanvasSurface implements DrawSurface {
  readonly canvas: CanvasLike;
  private ctx: Canvas2DContextLike;

  constructor(canvas: CanvasLike) {
    const ctx = canvas.getContext("2d");
    if (!ctx) {
      throw new Error("Canvas 2D context not supported");
    }
    this.canvas = canvas;
    this.ctx = ctx;
  }

  get width(): number {
    return this.canvas.width;
  }

  get height(): number {
    return this.canvas.height;
  }

  resize(width: number, height: number): void {
    this.canvas.width = width;
    this.canvas.height = height;
  }

  clear(r: Rect, color?: Color): void {
    const w = r.right - r.left;
    const h = r.bottom - r.top;
    if (color === undefined) {
      this.ctx.clearRect(r.left, r.top, w, h);
      return;
    }
    this.ctx.fillStyle = color;
    this.ctx.fillRect(r.left, r.top, w, h);
  }

  rectangle(r: Rect, style: ShapeStyle): void {
    const ctx = this.ctx;
    const w = r.right - r.left;
    const h = r.bottom - r.top;
    ctx.fillStyle = style.fill;
    ctx.fillRect(r.left, r.top, w, h);
    // Half-pixel offset keeps the 1px outline inside the rect
    ctx.lineWidth = 1;
    ctx.strokeStyle = style.stroke;
    ctx.strokeRect(r.left + 0.5, r.top + 0.5, w - 1, h - 1);
  }

  ellipse(r: Rect, style: ShapeStyle): void {
    const ctx = this.ctx;
    const rx = (r.right - r.left) / 2;
    const ry = (r.bottom - r.top) / 2;
    ctx.beginPath();
    ctx.ellipse(r.left + rx, r.top + ry, rx, ry, 0, 0, Math.PI * 2);
    this.fillAndStroke(style);
  }

  polygon(points: readonly Point[], style: ShapeStyle): void {
    const [first, ...rest] = points;
    if (!first) return;
    const ctx = this.ctx;
    ctx.beginPath();
    ctx.moveTo(first.x, first.y);
    for (const p of rest) {
      ctx.lineTo(p.x, p.y);
    }
    ctx.closePath();
    this.fillAndStroke(style);
  }

  measureText(text: string, font: FontSpec): Size {
    this.ctx.font = fontToCss(font);
    const metrics = this.ctx.measureText(text);
    const ascent = metrics.actualBoundingBoxAscent;
    const descent = metrics.actualBoundingBoxDescent;
    const height =
      ascent !== undefined && descent !== undefined
        ? ascent + descent
        : font.size;
    return { width: Math.ceil(metrics.width), height: Math.ceil(height) };
  }

  drawText(text: string, at: Point, style: TextStyle): void {
    const ctx = this.ctx;
    if (style.background !== undefined) {
      const size = this.measureText(text, style.font);
      ctx.fillStyle = style.background;
      ctx.fillRect(at.x, at.y, size.width, size.height);
    }
    ctx.font = fontToCss(style.font);
    ctx.textBaseline = "top";
    ctx.fillStyle = style.color;
    ctx.fillText(text, at.x, at.y);
  }

  blit(from: DrawSurface, source: Rect, at: Point): void {
    if (!(from instanceof CanvasSurface)) {
      throw new Error("CanvasSurface can only blit from another CanvasSurface");
    }
    const w = source.right - source.left;
    const h = source.bottom - source.top;
    this.ctx.drawImage(from.canvas, source.left, source.top, w, h, at.x, at.y, w, h);
  }

  private fillAndStroke(style: ShapeStyle): void {
    this.ctx.fillStyle = style.fill;
    this.ctx.fill();
    this.ctx.lineWidth = 1;
    this.ctx.strokeStyle = style.stroke;
    this.ctx.stroke();
  }
}

/**
 * Surface factory creating canvases through a host constructor, e.g.
 * `canvasSurfaceFactory((w, h) => new OffscreenCanvas(w, h))`.
 */
export function canvasSurfaceFactory(
  createCanvas: (width: number, height: number) => CanvasLike
): (width: number, height: number) => CanvasSurface {
  return (width, height) => new CanvasSurface(createCanvas(width, height));
}
