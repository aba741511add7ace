/**
 * Mapmark List
 *
 * Marks are kept sorted by layer, ascending, and drawn in that order.
 * Marks of the same layer keep their insertion order.
 */

import type { GeoPoint, GeoRect } from "../projection/types";
import { geoRectContains } from "../projection/mercator";
import { MapMark, MAX_LAYER, MIN_LAYER, type MapLayer, type MarkStyleDefaults } from "./types";

/** Index returned by searches that found nothing */
export const NOT_FOUND = -1;

/** What happened to a mark in a list */
export type MapMarkAction = "added" | "removed" | "extracted";

/**
 * Called after a mark was added to, removed from or extracted from the list.
 * Lets the owner set up or release per-mark resources.
 */
export type MapMarkNotify = (item: MapMark, action: MapMarkAction) => void;

export interface MapMarkListOptions {
  /** Defaults copied into marks created by `newItem` */
  defaults: () => MarkStyleDefaults;
  /** Called when the list changed and the map needs redrawing */
  onChange?: () => void;
}

/** Tolerance comparison of coordinates, relative for large values */
function sameValue(a: number, b: number): boolean {
  const resolution = 1e-12;
  const epsilon = Math.max(Math.min(Math.abs(a), Math.abs(b)) * resolution, resolution);
  return Math.abs(a - b) <= epsilon;
}

function assertValidLayer(layer: MapLayer): void {
  if (!Number.isInteger(layer) || layer < MIN_LAYER || layer > MAX_LAYER) {
    throw new RangeError(`Invalid map layer ${layer}, expected ${MIN_LAYER}..${MAX_LAYER}`);
  }
}

export class MapMarkList implements Iterable<MapMark> {
  /** Observer of item additions and removals */
  onItemNotify?: MapMarkNotify;

  private items: MapMark[] = [];
  private updateCount = 0;
  private defaults: () => MarkStyleDefaults;
  private onChange?: () => void;

  constructor(options: MapMarkListOptions) {
    this.defaults = options.defaults;
    this.onChange = options.onChange;
  }

  get count(): number {
    return this.items.length;
  }

  /** @throws RangeError for an index outside [0, count) */
  get(index: number): MapMark {
    const item = this.items[index];
    if (!item) {
      throw new RangeError(`Mapmark index ${index} out of range [0, ${this.items.length})`);
    }
    return item;
  }

  [Symbol.iterator](): Iterator<MapMark> {
    return this.items[Symbol.iterator]();
  }

  /** Hold back change notifications until the matching endUpdate */
  beginUpdate(): void {
    this.updateCount++;
  }

  endUpdate(): void {
    if (this.updateCount > 0) {
      this.updateCount--;
    }
    if (this.updateCount === 0) {
      this.onChange?.();
    }
  }

  /** Create a mark initialized with the owner's default styles; not added */
  newItem(coord: GeoPoint): MapMark {
    const defaults = this.defaults();
    return new MapMark({
      coord,
      glyphStyle: defaults.glyphStyle,
      captionStyle: defaults.captionStyle,
      captionFont: defaults.captionFont,
    });
  }

  /** Add a mark by coordinates, caption and layer */
  add(coord: GeoPoint, caption: string, layer?: MapLayer): MapMark;
  /** Add a fully customized mark, usually created by newItem */
  add(mark: MapMark): MapMark;
  add(markOrCoord: MapMark | GeoPoint, caption = "", layer: MapLayer = MIN_LAYER): MapMark {
    let mark: MapMark;
    if (markOrCoord instanceof MapMark) {
      mark = markOrCoord;
    } else {
      mark = this.newItem(markOrCoord);
      mark.caption = caption;
      mark.layer = layer;
    }
    assertValidLayer(mark.layer);

    this.items.splice(this.upperBound(mark.layer), 0, mark);
    this.onItemNotify?.(mark, "added");
    this.changed();
    return mark;
  }

  /** Remove a mark; unknown marks are ignored */
  remove(mark: MapMark): void {
    if (this.take(mark)) {
      this.onItemNotify?.(mark, "removed");
    }
    this.changed();
  }

  /**
   * Take a mark out of the list without releasing it.
   * @returns the mark, or undefined when it was not in the list
   */
  extract(mark: MapMark): MapMark | undefined {
    if (!this.take(mark)) return undefined;
    this.onItemNotify?.(mark, "extracted");
    this.changed();
    return mark;
  }

  clear(): void {
    const removed = this.items;
    this.items = [];
    for (const mark of removed) {
      this.onItemNotify?.(mark, "removed");
    }
    this.changed();
  }

  /**
   * Find the next mark at given coordinates.
   *
   * @param considerMarkSize - widen the search by the mark's glyph size.
   *   Accepted for API stability; the search radius does not use it yet.
   * @param startIndex - index of the previous hit; NOT_FOUND starts from the first mark
   * @returns index of the mark, or NOT_FOUND
   */
  find(coords: GeoPoint, considerMarkSize = true, startIndex = NOT_FOUND): number {
    for (let i = Math.max(0, startIndex + 1); i < this.items.length; i++) {
      const mark = this.items[i];
      if (!mark) continue;
      if (
        sameValue(coords.long, mark.coord.long) &&
        sameValue(coords.lat, mark.coord.lat)
      ) {
        return i;
      }
    }
    return NOT_FOUND;
  }

  /**
   * Find the next mark inside a region. Same parameters as `find`.
   *
   * @example
   * let idx = NOT_FOUND;
   * while ((idx = list.findIn(region, true, idx)) !== NOT_FOUND) {
   *   select(list.get(idx));
   * }
   */
  findIn(region: GeoRect, considerMarkSize = true, startIndex = NOT_FOUND): number {
    for (let i = Math.max(0, startIndex + 1); i < this.items.length; i++) {
      const mark = this.items[i];
      if (mark && geoRectContains(region, mark.coord)) {
        return i;
      }
    }
    return NOT_FOUND;
  }

  /** All marks inside a region, in list order */
  *marksIn(region: GeoRect): Generator<MapMark> {
    let idx = NOT_FOUND;
    while ((idx = this.findIn(region, true, idx)) !== NOT_FOUND) {
      yield this.get(idx);
    }
  }

  /** First index whose layer is greater than `layer` */
  private upperBound(layer: MapLayer): number {
    let lo = 0;
    let hi = this.items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const item = this.items[mid];
      if (item && item.layer <= layer) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  /** First index whose layer is not less than `layer` */
  private lowerBound(layer: MapLayer): number {
    let lo = 0;
    let hi = this.items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const item = this.items[mid];
      if (item && item.layer < layer) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  /** Splice a mark out, searching only its layer's range */
  private take(mark: MapMark): boolean {
    const end = this.upperBound(mark.layer);
    for (let i = this.lowerBound(mark.layer); i < end; i++) {
      if (this.items[i] === mark) {
        this.items.splice(i, 1);
        return true;
      }
    }
    return false;
  }

  private changed(): void {
    if (this.updateCount === 0) {
      this.onChange?.();
    }
  }
}
