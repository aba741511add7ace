/**
 * SlippyMap - tiled map viewport with zoom, pan and mapmarks
 *
 * The host owns the window: it reports viewport size changes, forwards
 * scroll, wheel and selection gestures, and calls `paint` when
 * `onInvalidate` asks for a redraw.
 */

import type {
  GeoPoint,
  GeoRect,
  Point,
  Rect,
  Size,
  Tile,
} from "./projection/types";
import { MIN_ZOOM, mapHeight, mapWidth } from "./projection/tileCoord";
import * as mercator from "./projection/mercator";
import {
  centerOf,
  normalizeRect,
  rectHeight,
  rectWidth,
  topLeftOf,
} from "./projection/rect";
import type { Color, DrawSurface, FontSpec, SurfaceFactory } from "./surface/types";
import { TileRenderer, type TileDrawCallback } from "./tiles/TileRenderer";
import {
  DEFAULT_COPYRIGHT,
  DEFAULT_TILE_URL,
  formatTileUrl,
  type TileUrlConfig,
} from "./tiles/tileUrl";
import {
  DEFAULT_CAPTION_FONT,
  DEFAULT_CAPTION_STYLE,
  DEFAULT_GLYPH_STYLE,
  MAX_LAYER,
  MIN_LAYER,
  type CaptionStyle,
  type GlyphStyle,
  type MapLayer,
  type MarkStyleDefaults,
} from "./marks/types";
import { MapMarkList, NOT_FOUND } from "./marks/MapMarkList";
import { Viewport } from "./view/Viewport";
import { ViewportCache } from "./view/ViewportCache";
import { ZoomController } from "./view/ZoomController";
import { MapRenderer, type MapMarkDrawCallback } from "./render/MapRenderer";
import { DEFAULT_LABEL_FONT } from "./render/labels";

export interface SlippyMapOptions {
  /** Creates the cache image and label surfaces */
  surfaceFactory: SurfaceFactory;
  /** Minimum cache size in tiles */
  cacheTiles?: Size;
  /** Tiles cached around the view on each side */
  cacheMarginTiles?: number;
  /** Fill of areas without tiles */
  background?: Color;
  copyright?: string;
  tileUrl?: TileUrlConfig;
  drawCopyright?: boolean;
  drawScale?: boolean;
  minZoom?: number;
  maxZoom?: number;
  /** Initial zoom; defaults to minZoom */
  zoom?: number;
  /** Layers whose marks are drawn; all by default */
  visibleLayers?: Iterable<MapLayer>;
  markGlyphStyle?: GlyphStyle;
  markCaptionStyle?: CaptionStyle;
  markCaptionFont?: FontSpec;
  /** Font of labels and tile placeholders */
  labelFont?: FontSpec;

  drawTile?: TileDrawCallback;
  drawTileLoading?: TileDrawCallback;
  drawMapMark?: MapMarkDrawCallback;
  onZoomChanged?: (zoom: number) => void;
  /** Receives the geo region of a finished selection */
  onSelectionBox?: (region: GeoRect) => void;
  /** The view content changed and the host should repaint */
  onInvalidate?: () => void;
}

export const DEFAULT_CACHE_TILES: Readonly<Size> = { width: 8, height: 8 };
export const DEFAULT_CACHE_MARGIN_TILES = 2;
export const DEFAULT_BACKGROUND: Color = "#ffffff";

/** All layers, 0..255 */
export function allLayers(): Set<MapLayer> {
  const layers = new Set<MapLayer>();
  for (let layer = MIN_LAYER; layer <= MAX_LAYER; layer++) {
    layers.add(layer);
  }
  return layers;
}

export class SlippyMap {
  /** Owner-level mapmark styles, used by marks without custom props */
  readonly markStyle: MarkStyleDefaults;
  readonly mapMarks: MapMarkList;

  onSelectionBox?: (region: GeoRect) => void;
  onInvalidate?: () => void;

  private viewport = new Viewport();
  private tileRenderer: TileRenderer;
  private cache: ViewportCache;
  private zoomController: ZoomController;
  private renderer: MapRenderer;
  private tileUrlConfig: TileUrlConfig;

  constructor(options: SlippyMapOptions) {
    const background = options.background ?? DEFAULT_BACKGROUND;
    const labelFont = options.labelFont ?? DEFAULT_LABEL_FONT;

    this.onSelectionBox = options.onSelectionBox;
    this.onInvalidate = options.onInvalidate;
    this.tileUrlConfig = options.tileUrl ?? DEFAULT_TILE_URL;
    this.markStyle = {
      glyphStyle: { ...(options.markGlyphStyle ?? DEFAULT_GLYPH_STYLE) },
      captionStyle: { ...(options.markCaptionStyle ?? DEFAULT_CAPTION_STYLE) },
      captionFont: { ...(options.markCaptionFont ?? DEFAULT_CAPTION_FONT) },
    };

    this.mapMarks = new MapMarkList({
      defaults: () => this.markStyle,
      onChange: () => this.invalidate(),
    });

    this.tileRenderer = new TileRenderer({
      drawTile: options.drawTile,
      drawTileLoading: options.drawTileLoading,
      background,
      font: labelFont,
    });

    this.cache = new ViewportCache({
      surfaceFactory: options.surfaceFactory,
      tileRenderer: this.tileRenderer,
      defaultTiles: options.cacheTiles ?? DEFAULT_CACHE_TILES,
      marginTiles: options.cacheMarginTiles ?? DEFAULT_CACHE_MARGIN_TILES,
      background,
    });

    this.renderer = new MapRenderer({
      surfaceFactory: options.surfaceFactory,
      viewport: this.viewport,
      cache: this.cache,
      marks: this.mapMarks,
      markDefaults: () => this.markStyle,
      copyright: options.copyright ?? DEFAULT_COPYRIGHT,
      labelFont,
      drawCopyright: options.drawCopyright ?? true,
      drawScale: options.drawScale ?? true,
      visibleLayers: options.visibleLayers ?? allLayers(),
      drawMapMark: options.drawMapMark,
    });

    const onZoomChanged = options.onZoomChanged;
    this.zoomController = new ZoomController({
      viewport: this.viewport,
      cache: this.cache,
      minZoom: options.minZoom ?? MIN_ZOOM,
      maxZoom: options.maxZoom,
      onZoomApplied: (zoom) => {
        if (this.renderer.drawScale) this.renderer.updateScaleBar(zoom);
      },
      onZoomChanged: (zoom) => {
        this.invalidate();
        onZoomChanged?.(zoom);
      },
    });

    const initialZoom = options.zoom ?? this.zoomController.minZoom;
    if (!this.zoomController.setZoom(initialZoom)) {
      throw new RangeError(
        `Initial zoom ${initialZoom} is outside ` +
          `[${this.minZoom}, ${this.maxZoom}]`
      );
    }
  }

  // Zoom

  get zoom(): number {
    return this.zoomController.zoom;
  }

  get minZoom(): number {
    return this.zoomController.minZoom;
  }

  get maxZoom(): number {
    return this.zoomController.maxZoom;
  }

  /** @throws RangeError for invalid levels or min > max */
  setZoomConstraints(minZoom?: number, maxZoom?: number): void {
    this.zoomController.setConstraints(minZoom, maxZoom);
  }

  /**
   * Change the zoom level, keeping the map point `anchor` (map pixels at
   * the current zoom) at its viewport position.
   * @returns false when the level is current or outside the constraints
   */
  setZoom(level: number, anchor?: Point): boolean {
    return this.zoomController.setZoom(level, anchor);
  }

  /** Zoom one level towards the sign of `delta` around a viewport point */
  zoomBy(delta: number, viewPoint: Point): boolean {
    return this.zoomController.zoomBy(delta, viewPoint);
  }

  /**
   * Zoom to the largest level at which a region fits the viewport, then
   * move the region's top-left corner to the view's top-left.
   */
  zoomToArea(region: GeoRect): void {
    const view = this.viewport.size;
    let target = this.minZoom;
    for (let zoom = this.minZoom; zoom <= this.maxZoom; zoom++) {
      const r = mercator.geoToMap(zoom, region);
      if (rectWidth(r) > view.width || rectHeight(r) > view.height) break;
      target = zoom;
    }
    this.setZoom(target);
    this.nwPoint = region.topLeft;
  }

  /** Fit the whole map into the viewport */
  zoomToFit(): void {
    const { width, height } = this.mapSize;
    this.zoomToArea(
      this.mapToGeo({ left: 0, top: 0, right: width, bottom: height })
    );
  }

  // View

  get mapSize(): Size {
    return { width: mapWidth(this.zoom), height: mapHeight(this.zoom) };
  }

  /** Visible part of the map in map pixels */
  get viewRect(): Rect {
    return this.viewport.viewRect;
  }

  get viewportSize(): Size {
    return this.viewport.size;
  }

  /** Called by the host when its client area changes size */
  setViewportSize(size: Size): void {
    this.viewport.setSize(size);
    const mapSize = this.viewport.mapSize;
    if (this.cache.resize(size, mapSize)) {
      this.cache.reposition(this.viewport.viewRect, mapSize);
      this.cache.repaint(this.zoom, mapSize);
    }
    this.invalidate();
  }

  scrollMapBy(dx: number, dy: number): void {
    if (this.viewport.scrollBy(dx, dy)) this.invalidate();
  }

  scrollMapTo(p: Point): void {
    if (this.viewport.scrollTo(p)) this.invalidate();
  }

  /** Geo coordinates of the view's center */
  get centerPoint(): GeoPoint {
    return this.mapToGeo(mercator.ensureInMap(this.zoom, centerOf(this.viewRect)));
  }

  set centerPoint(coords: GeoPoint) {
    const center = this.geoToMap(coords);
    const size = this.viewport.size;
    this.scrollMapTo({
      x: center.x - Math.floor(size.width / 2),
      y: center.y - Math.floor(size.height / 2),
    });
  }

  /** Geo coordinates of the view's top-left corner */
  get nwPoint(): GeoPoint {
    return this.mapToGeo(mercator.ensureInMap(this.zoom, topLeftOf(this.viewRect)));
  }

  set nwPoint(coords: GeoPoint) {
    this.scrollMapTo(this.geoToMap(coords));
  }

  // Conversions at the current zoom

  mapToGeo(p: Point): GeoPoint;
  mapToGeo(r: Rect): GeoRect;
  mapToGeo(value: Point | Rect): GeoPoint | GeoRect {
    if ("left" in value) return mercator.mapToGeo(this.zoom, value);
    return mercator.mapToGeo(this.zoom, value);
  }

  geoToMap(p: GeoPoint): Point;
  geoToMap(r: GeoRect): Rect;
  geoToMap(value: GeoPoint | GeoRect): Point | Rect {
    if ("topLeft" in value) return mercator.geoToMap(this.zoom, value);
    return mercator.geoToMap(this.zoom, value);
  }

  viewToMap(p: Point): Point;
  viewToMap(r: Rect): Rect;
  viewToMap(value: Point | Rect): Point | Rect {
    if ("left" in value) return this.viewport.viewToMap(value);
    return this.viewport.viewToMap(value);
  }

  mapToView(p: Point): Point;
  mapToView(r: Rect): Rect;
  mapToView(value: Point | Rect): Point | Rect {
    if ("left" in value) return this.viewport.mapToView(value);
    return this.viewport.mapToView(value);
  }

  // Layers and labels

  get visibleLayers(): ReadonlySet<MapLayer> {
    return this.renderer.visibleLayers;
  }

  set visibleLayers(layers: Iterable<MapLayer>) {
    this.renderer.visibleLayers = new Set(layers);
    this.invalidate();
  }

  get drawCopyright(): boolean {
    return this.renderer.drawCopyright;
  }

  set drawCopyright(value: boolean) {
    this.renderer.drawCopyright = value;
    this.invalidate();
  }

  get drawScale(): boolean {
    return this.renderer.drawScale;
  }

  set drawScale(value: boolean) {
    this.renderer.drawScale = value;
    this.invalidate();
  }

  // Drawing

  /**
   * Redraw a tile whose image became available.
   * @returns false when the tile is not cached at the current zoom
   */
  refreshTile(tile: Tile): boolean {
    const refreshed = this.cache.refreshTile(tile);
    if (refreshed) this.invalidate();
    return refreshed;
  }

  /** Draw the current view; the target's (0, 0) is the view's top-left */
  paint(target: DrawSurface): void {
    this.renderer.paint(target, this.zoom);
  }

  /** Ask the host for a repaint */
  invalidate(): void {
    this.onInvalidate?.();
  }

  // Interaction

  /**
   * Finish a selection dragged between two viewport points. Both points
   * are clamped into the map; the region is reported to `onSelectionBox`.
   */
  selectArea(viewStart: Point, viewEnd: Point): GeoRect {
    const start = mercator.ensureInMap(this.zoom, this.viewToMap(viewStart));
    const end = mercator.ensureInMap(this.zoom, this.viewToMap(viewEnd));
    const region = this.mapToGeo(normalizeRect(start, end));
    this.onSelectionBox?.(region);
    return region;
  }

  /** Whether a drag may start at a viewport point: on the map and not on a mark */
  isPointFree(viewPoint: Point): boolean {
    const p = this.viewToMap(viewPoint);
    if (!mercator.inMap(this.zoom, p)) return false;
    return this.mapMarks.find(this.mapToGeo(p), true) === NOT_FOUND;
  }

  /** Download URL of a tile */
  tileUrl(tile: Tile): string {
    return formatTileUrl(this.tileUrlConfig, tile);
  }
}
