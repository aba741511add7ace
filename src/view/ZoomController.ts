/**
 * Zoom Controller
 *
 * Owns the zoom level and runs the zoom transition. The map point under an
 * anchor keeps its position in the viewport across the change, so zooming
 * at the cursor feels like zooming into that spot.
 */

import type { GeoPoint, Point } from "../projection/types";
import { MAX_ZOOM, MIN_ZOOM, assertValidZoom, mapHeight, mapWidth } from "../projection/tileCoord";
import { ensureInMap, geoToMap, mapToGeo } from "../projection/mercator";
import type { Viewport } from "./Viewport";
import type { ViewportCache } from "./ViewportCache";

export interface ZoomControllerOptions {
  viewport: Viewport;
  cache: ViewportCache;
  minZoom?: number;
  maxZoom?: number;
  /** Runs once the new zoom is applied, before the view moves */
  onZoomApplied?: (zoom: number) => void;
  /** Runs after a completed transition */
  onZoomChanged?: (zoom: number) => void;
}

export class ZoomController {
  onZoomApplied?: (zoom: number) => void;
  onZoomChanged?: (zoom: number) => void;

  private viewport: Viewport;
  private cache: ViewportCache;
  private _zoom: number | undefined;
  private _minZoom = MIN_ZOOM;
  private _maxZoom = MAX_ZOOM;

  constructor(options: ZoomControllerOptions) {
    this.viewport = options.viewport;
    this.cache = options.cache;
    this.onZoomApplied = options.onZoomApplied;
    this.onZoomChanged = options.onZoomChanged;
    this.setConstraints(options.minZoom ?? MIN_ZOOM, options.maxZoom ?? MAX_ZOOM);
  }

  /** @throws Error before the first zoom was set */
  get zoom(): number {
    if (this._zoom === undefined) {
      throw new Error("Zoom level is not established yet");
    }
    return this._zoom;
  }

  get hasZoom(): boolean {
    return this._zoom !== undefined;
  }

  get minZoom(): number {
    return this._minZoom;
  }

  get maxZoom(): number {
    return this._maxZoom;
  }

  /**
   * Limit the zoom range. A current zoom outside the new range is moved
   * to the nearest bound through the regular transition.
   *
   * @throws RangeError for invalid levels or min > max
   */
  setConstraints(minZoom = this._minZoom, maxZoom = this._maxZoom): void {
    assertValidZoom(minZoom);
    assertValidZoom(maxZoom);
    if (minZoom > maxZoom) {
      throw new RangeError(`Min zoom ${minZoom} is greater than max zoom ${maxZoom}`);
    }
    this._minZoom = minZoom;
    this._maxZoom = maxZoom;

    if (this._zoom !== undefined) {
      this.setZoom(Math.min(maxZoom, Math.max(minZoom, this._zoom)));
    }
  }

  /**
   * Change the zoom level keeping `anchor` (map pixels at the current zoom)
   * at the same viewport position. The anchor defaults to the view's
   * top-left corner.
   *
   * @returns false when the level is the current one or outside the
   *   allowed range; nothing changes then
   * @throws RangeError for a non-integer level
   */
  setZoom(level: number, anchor?: Point): boolean {
    if (!Number.isInteger(level)) {
      throw new RangeError(`Zoom level must be an integer, got ${level}`);
    }
    if (level === this._zoom || level < this._minZoom || level > this._maxZoom) {
      return false;
    }

    const viewRect = this.viewport.viewRect;
    const anchorPoint = anchor ?? { x: viewRect.left, y: viewRect.top };
    const anchorGeo = this.anchorGeo(anchorPoint);
    const offset = { x: anchorPoint.x - viewRect.left, y: anchorPoint.y - viewRect.top };

    this._zoom = level;
    const mapSize = { width: mapWidth(level), height: mapHeight(level) };
    this.viewport.setMapSize(mapSize);
    this.onZoomApplied?.(level);

    const moved = geoToMap(level, anchorGeo);
    this.viewport.scrollTo({ x: moved.x - offset.x, y: moved.y - offset.y });

    // Tile numbering changed, so cached pixels are stale even when covered
    this.cache.resize(this.viewport.size, mapSize);
    if (!this.cache.covers(this.viewport.viewRect)) {
      this.cache.reposition(this.viewport.viewRect, mapSize);
    }
    this.cache.repaint(level, mapSize);

    this.onZoomChanged?.(level);
    return true;
  }

  /**
   * Zoom one level in the direction of `delta`, anchored on the map point
   * under `viewPoint` (viewport pixels). Mouse wheel zoom.
   */
  zoomBy(delta: number, viewPoint: Point): boolean {
    if (delta === 0) return false;
    const zoom = this.zoom;
    const anchor = ensureInMap(zoom, this.viewport.viewToMap(viewPoint));
    return this.setZoom(zoom + Math.sign(delta), anchor);
  }

  private anchorGeo(anchor: Point): GeoPoint {
    if (this._zoom === undefined) {
      return mapToGeo(MIN_ZOOM, { x: 0, y: 0 });
    }
    return mapToGeo(this._zoom, ensureInMap(this._zoom, anchor));
  }
}
