/**
 * Map Renderer
 *
 * Composes one frame: the cached map region under the view, the copyright
 * and scale bar labels, then the visible mapmarks in layer order.
 */

import type { Point, Rect } from "../projection/types";
import { ensureInMap, geoToMap, mapToGeo } from "../projection/mercator";
import { intersectRects, topLeftOf } from "../projection/rect";
import type { DrawSurface, FontSpec, SurfaceFactory } from "../surface/types";
import type { MapMark, MapLayer, MarkStyleDefaults } from "../marks/types";
import type { MapMarkList } from "../marks/MapMarkList";
import { resolveMarkStyle } from "../marks/style";
import type { Viewport } from "../view/Viewport";
import type { ViewportCache } from "../view/ViewportCache";
import {
  bottomLeftPlacement,
  bottomRightPlacement,
  renderCopyright,
  renderScaleBar,
} from "./labels";

/**
 * Called before a mark is drawn, with the mark's position in viewport
 * pixels. May change the mark's style props or visibility; returning true
 * means the mark was drawn and default drawing is skipped.
 */
export type MapMarkDrawCallback = (
  mark: MapMark,
  at: Point,
  surface: DrawSurface
) => boolean;

export interface MapRendererOptions {
  surfaceFactory: SurfaceFactory;
  viewport: Viewport;
  cache: ViewportCache;
  marks: MapMarkList;
  markDefaults: () => MarkStyleDefaults;
  copyright: string;
  labelFont: FontSpec;
  drawCopyright: boolean;
  drawScale: boolean;
  visibleLayers: Iterable<MapLayer>;
  drawMapMark?: MapMarkDrawCallback;
}

export class MapRenderer {
  drawCopyright: boolean;
  drawScale: boolean;
  drawMapMark?: MapMarkDrawCallback;
  visibleLayers: Set<MapLayer>;

  private surfaceFactory: SurfaceFactory;
  private viewport: Viewport;
  private cache: ViewportCache;
  private marks: MapMarkList;
  private markDefaults: () => MarkStyleDefaults;
  private copyright: string;
  private labelFont: FontSpec;
  private copyrightLabel?: DrawSurface;
  private scaleLabel?: { zoom: number; surface: DrawSurface };

  constructor(options: MapRendererOptions) {
    this.surfaceFactory = options.surfaceFactory;
    this.viewport = options.viewport;
    this.cache = options.cache;
    this.marks = options.marks;
    this.markDefaults = options.markDefaults;
    this.copyright = options.copyright;
    this.labelFont = options.labelFont;
    this.drawCopyright = options.drawCopyright;
    this.drawScale = options.drawScale;
    this.visibleLayers = new Set(options.visibleLayers);
    this.drawMapMark = options.drawMapMark;
  }

  /** Render the scale bar for a new zoom level */
  updateScaleBar(zoom: number): void {
    const surface = this.scaleLabel?.surface ?? this.surfaceFactory(0, 0);
    renderScaleBar(surface, zoom, this.labelFont);
    this.scaleLabel = { zoom, surface };
  }

  /** Draw the frame for `zoom` onto `target`; (0, 0) is the view's top-left */
  paint(target: DrawSurface, zoom: number): void {
    const mapSize = this.viewport.mapSize;
    const viewRect = this.viewport.viewRect;

    if (!this.cache.covers(viewRect)) {
      this.cache.reposition(viewRect, mapSize);
      this.cache.repaint(zoom, mapSize);
    }

    const visible = intersectRects(viewRect, this.cache.cacheRect);
    if (visible) {
      target.blit(
        this.cache.image,
        this.cache.toLocal(visible),
        this.viewport.mapToView(topLeftOf(visible))
      );
    }

    this.paintLabels(target, zoom);
    this.paintMarks(target, zoom, ensureInMap(zoom, viewRect));
  }

  private paintLabels(target: DrawSurface, zoom: number): void {
    const viewSize = this.viewport.size;

    if (this.drawCopyright) {
      if (!this.copyrightLabel) {
        this.copyrightLabel = this.surfaceFactory(0, 0);
        renderCopyright(this.copyrightLabel, this.copyright, this.labelFont);
      }
      const label = this.copyrightLabel;
      target.blit(label, fullRect(label), bottomRightPlacement(viewSize, label));
    }

    if (this.drawScale) {
      if (this.scaleLabel?.zoom !== zoom) {
        this.updateScaleBar(zoom);
      }
      const label = this.scaleLabel?.surface;
      if (label) {
        target.blit(label, fullRect(label), bottomLeftPlacement(viewSize, label));
      }
    }
  }

  private paintMarks(target: DrawSurface, zoom: number, mapRect: Rect): void {
    const region = mapToGeo(zoom, mapRect);
    for (const mark of this.marks.marksIn(region)) {
      if (!mark.visible || !this.visibleLayers.has(mark.layer)) continue;
      const at = this.viewport.mapToView(geoToMap(zoom, mark.coord));
      this.paintMark(target, mark, at);
    }
  }

  private paintMark(target: DrawSurface, mark: MapMark, at: Point): void {
    if (this.drawMapMark) {
      try {
        if (this.drawMapMark(mark, at, target)) return;
      } catch (error) {
        console.error(
          `[MapRenderer] drawMapMark failed for mark "${mark.caption}":`,
          error
        );
      }
      if (!mark.visible) return;
    }

    const style = resolveMarkStyle(this.markDefaults(), mark);
    const { glyph } = style;
    const half = Math.floor(glyph.size / 2);
    const r = {
      left: at.x - half,
      top: at.y - half,
      right: at.x - half + glyph.size,
      bottom: at.y - half + glyph.size,
    };
    const shapeStyle = { fill: glyph.bgColor, stroke: glyph.borderColor };

    switch (glyph.shape) {
      case "circle":
        target.ellipse(r, shapeStyle);
        break;
      case "square":
        target.rectangle(r, shapeStyle);
        break;
      case "triangle":
        target.polygon(
          [
            { x: r.left, y: r.bottom },
            { x: r.left + half, y: r.top },
            { x: r.right, y: r.bottom },
          ],
          shapeStyle
        );
        break;
    }

    if (mark.caption === "") return;
    const { caption, font } = style;
    const textAt = { x: r.right + caption.dx, y: r.top + caption.dy };
    const textStyle = caption.transparent
      ? { font, color: caption.color }
      : { font, color: caption.color, background: caption.bgColor };
    target.drawText(mark.caption, textAt, textStyle);
  }
}

function fullRect(surface: DrawSurface): Rect {
  return { left: 0, top: 0, right: surface.width, bottom: surface.height };
}
