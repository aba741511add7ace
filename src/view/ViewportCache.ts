/**
 * Viewport Cache
 *
 * Holds a tile-aligned window of the map, larger than the viewport by a
 * margin of whole tiles, in an offscreen surface. Panning inside the window
 * only blits; the window moves and repaints once the view leaves it.
 */

import type { Rect, Size, Tile } from "../projection/types";
import {
  TILE_HEIGHT,
  TILE_WIDTH,
  assertValidTile,
  tileBoundaryAlign,
  tileOrigin,
  tileRect,
  toTileHeightGreater,
  toTileWidthGreater,
} from "../projection/tileCoord";
import {
  rectContainsRect,
  rectHeight,
  rectWidth,
  toInnerPoint,
  toInnerRect,
  topLeftOf,
} from "../projection/rect";
import type { Color, DrawSurface, SurfaceFactory } from "../surface/types";
import type { TileRenderer } from "../tiles/TileRenderer";

export interface ViewportCacheOptions {
  surfaceFactory: SurfaceFactory;
  tileRenderer: TileRenderer;
  /** Minimum cache size in tiles, used when the map is large enough */
  defaultTiles: Size;
  /** Tiles kept around the view on each side; at least 1 */
  marginTiles: number;
  background: Color;
}

export class ViewportCache {
  background: Color;

  private surface: DrawSurface;
  private renderer: TileRenderer;
  private defaultSize: Size;
  private marginTiles: number;
  private _cacheRect: Rect = { left: 0, top: 0, right: 0, bottom: 0 };
  /** Zoom of the cached pixels; undefined until the first repaint */
  private paintedZoom: number | undefined;

  constructor(options: ViewportCacheOptions) {
    const { defaultTiles, marginTiles } = options;
    if (!Number.isInteger(marginTiles) || marginTiles < 1) {
      throw new RangeError(`Cache margin must be at least 1 tile, got ${marginTiles}`);
    }
    if (
      !Number.isInteger(defaultTiles.width) ||
      !Number.isInteger(defaultTiles.height) ||
      defaultTiles.width < 1 ||
      defaultTiles.height < 1
    ) {
      throw new RangeError(
        "Default cache size must be at least 1x1 tiles, got " +
          `${defaultTiles.width}x${defaultTiles.height}`
      );
    }

    this.renderer = options.tileRenderer;
    this.background = options.background;
    this.marginTiles = marginTiles;
    this.defaultSize = {
      width: defaultTiles.width * TILE_WIDTH,
      height: defaultTiles.height * TILE_HEIGHT,
    };
    this.surface = options.surfaceFactory(
      this.defaultSize.width,
      this.defaultSize.height
    );
  }

  /** Map region held in the cache, in absolute map pixels */
  get cacheRect(): Rect {
    return { ...this._cacheRect };
  }

  /** Cache surface; its pixel (0, 0) is the cache rect's top-left */
  get image(): DrawSurface {
    return this.surface;
  }

  get size(): Size {
    return { width: this.surface.width, height: this.surface.height };
  }

  covers(viewRect: Rect): boolean {
    return this.paintedZoom !== undefined && rectContainsRect(this._cacheRect, viewRect);
  }

  /**
   * Fit the cache to a new viewport or map size. The surface is only
   * reallocated when the dimensions change; the cache rect keeps its origin.
   *
   * @returns true when the dimensions changed and a repaint is due
   */
  resize(viewportSize: Size, mapSize: Size): boolean {
    const width = this.desiredExtent(
      toTileWidthGreater(viewportSize.width),
      TILE_WIDTH,
      mapSize.width,
      this.defaultSize.width
    );
    const height = this.desiredExtent(
      toTileHeightGreater(viewportSize.height),
      TILE_HEIGHT,
      mapSize.height,
      this.defaultSize.height
    );
    if (width === this.surface.width && height === this.surface.height) {
      return false;
    }

    this.surface.resize(width, height);
    this._cacheRect = {
      left: this._cacheRect.left,
      top: this._cacheRect.top,
      right: this._cacheRect.left + width,
      bottom: this._cacheRect.top + height,
    };
    this.paintedZoom = undefined;
    return true;
  }

  /**
   * Move the cache over a view that left it. The view is aligned to tiles
   * and padded with up to `marginTiles` tiles in front of it, then the
   * origin is kept inside the map.
   */
  reposition(viewRect: Rect, mapSize: Size): void {
    const aligned = tileBoundaryAlign(viewRect);
    const width = this.surface.width;
    const height = this.surface.height;

    const left = this.placeAxis(
      aligned.left,
      rectWidth(aligned),
      width,
      mapSize.width,
      TILE_WIDTH
    );
    const top = this.placeAxis(
      aligned.top,
      rectHeight(aligned),
      height,
      mapSize.height,
      TILE_HEIGHT
    );

    this._cacheRect = { left, top, right: left + width, bottom: top + height };
    this.paintedZoom = undefined;
  }

  /** Clear to the background and draw every tile in both cache and map */
  repaint(zoom: number, mapSize: Size): void {
    const r = this._cacheRect;
    const { width, height } = this.surface;
    this.surface.clear(
      { left: 0, top: 0, right: width, bottom: height },
      this.background
    );

    const drawnWidth = Math.min(mapSize.width - r.left, rectWidth(r));
    const drawnHeight = Math.min(mapSize.height - r.top, rectHeight(r));
    const cols = Math.max(0, Math.ceil(drawnWidth / TILE_WIDTH));
    const rows = Math.max(0, Math.ceil(drawnHeight / TILE_HEIGHT));
    const firstX = r.left / TILE_WIDTH;
    const firstY = r.top / TILE_HEIGHT;

    for (let row = 0; row < rows; row++) {
      for (let col = 0; col < cols; col++) {
        const tile: Tile = { zoom, x: firstX + col, y: firstY + row };
        const topLeft = { x: col * TILE_WIDTH, y: row * TILE_HEIGHT };
        this.renderer.draw(tile, topLeft, this.surface);
      }
    }
    this.paintedZoom = zoom;
  }

  /**
   * Redraw a single tile in place, e.g. when its image arrived.
   *
   * @returns false when the tile is of another zoom or outside the cache
   * @throws RangeError for an invalid tile
   */
  refreshTile(tile: Tile): boolean {
    assertValidTile(tile);
    if (tile.zoom !== this.paintedZoom) return false;
    const bounds = tileRect(tile);
    if (!rectContainsRect(this._cacheRect, bounds)) return false;

    const local = toInnerPoint(topLeftOf(this._cacheRect), tileOrigin(tile));
    this.surface.clear(this.toLocal(bounds), this.background);
    this.renderer.draw(tile, local, this.surface);
    return true;
  }

  /** Map rect to cache-local rect */
  toLocal(r: Rect): Rect {
    return toInnerRect(topLeftOf(this._cacheRect), r);
  }

  /** Cache extent along one axis */
  private desiredExtent(
    alignedView: number,
    tileSize: number,
    mapExtent: number,
    defaultExtent: number
  ): number {
    return Math.max(
      alignedView + 2 * this.marginTiles * tileSize,
      Math.min(mapExtent, defaultExtent)
    );
  }

  /** Cache origin along one axis */
  private placeAxis(
    alignedStart: number,
    alignedExtent: number,
    cacheExtent: number,
    mapExtent: number,
    tileSize: number
  ): number {
    const spareTiles = Math.max(
      0,
      Math.floor((cacheExtent - alignedExtent) / tileSize / 2)
    );
    const margin = Math.min(this.marginTiles, spareTiles);
    let start = alignedStart - margin * tileSize;
    start = Math.min(start, Math.max(0, mapExtent - cacheExtent));
    return Math.max(0, start);
  }
}
