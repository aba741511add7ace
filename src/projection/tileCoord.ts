/**
 * Tile Coordinate Utilities
 *
 * Tile numbering, map extents per zoom level and alignment of pixel
 * rects to tile boundaries.
 */

import type { Rect, Tile } from "./types";

/** Width of a map tile in pixels */
export const TILE_WIDTH = 256;
/** Height of a map tile in pixels */
export const TILE_HEIGHT = 256;

/** Lowest zoom level: the whole world in one tile */
export const MIN_ZOOM = 0;
/** Highest zoom level served by standard OSM tile servers */
export const MAX_ZOOM = 19;

export function isValidZoom(zoom: number): boolean {
  return Number.isInteger(zoom) && zoom >= MIN_ZOOM && zoom <= MAX_ZOOM;
}

/** @throws RangeError if zoom is not an integer in [MIN_ZOOM, MAX_ZOOM] */
export function assertValidZoom(zoom: number): void {
  if (!isValidZoom(zoom)) {
    throw new RangeError(`Invalid zoom level ${zoom}, expected ${MIN_ZOOM}..${MAX_ZOOM}`);
  }
}

/** Number of tiles along each axis at a zoom level (2^zoom) */
export function tileCount(zoom: number): number {
  return 2 ** zoom;
}

/** Map width in pixels at a zoom level */
export function mapWidth(zoom: number): number {
  return tileCount(zoom) * TILE_WIDTH;
}

/** Map height in pixels at a zoom level */
export function mapHeight(zoom: number): number {
  return tileCount(zoom) * TILE_HEIGHT;
}

export function tileValid(tile: Tile): boolean {
  if (!isValidZoom(tile.zoom)) return false;
  const count = tileCount(tile.zoom);
  return (
    Number.isInteger(tile.x) &&
    Number.isInteger(tile.y) &&
    tile.x >= 0 &&
    tile.y >= 0 &&
    tile.x < count &&
    tile.y < count
  );
}

/** @throws RangeError for a tile outside its zoom level's grid */
export function assertValidTile(tile: Tile): void {
  if (!tileValid(tile)) {
    throw new RangeError(`Invalid tile ${tileToString(tile)}`);
  }
}

/** Standard string form of a tile, e.g. "3 * [2 : 5]" */
export function tileToString(tile: Tile): string {
  return `${tile.zoom} * [${tile.x} : ${tile.y}]`;
}

export function tilesEqual(a: Tile, b: Tile): boolean {
  return a.zoom === b.zoom && a.x === b.x && a.y === b.y;
}

/** Pixel origin of a tile on the map surface */
export function tileOrigin(tile: Tile): { x: number; y: number } {
  return { x: tile.x * TILE_WIDTH, y: tile.y * TILE_HEIGHT };
}

/** Pixel rect covered by a tile on the map surface */
export function tileRect(tile: Tile): Rect {
  const { x, y } = tileOrigin(tile);
  return { left: x, top: y, right: x + TILE_WIDTH, bottom: y + TILE_HEIGHT };
}

// Alignment to tile size

/** Floor a horizontal pixel value to a tile multiple */
export function toTileWidthLesser(width: number): number {
  return Math.floor(width / TILE_WIDTH) * TILE_WIDTH;
}

/** Floor a vertical pixel value to a tile multiple */
export function toTileHeightLesser(height: number): number {
  return Math.floor(height / TILE_HEIGHT) * TILE_HEIGHT;
}

/** Ceil a horizontal pixel value to a tile multiple */
export function toTileWidthGreater(width: number): number {
  return Math.ceil(width / TILE_WIDTH) * TILE_WIDTH;
}

/** Ceil a vertical pixel value to a tile multiple */
export function toTileHeightGreater(height: number): number {
  return Math.ceil(height / TILE_HEIGHT) * TILE_HEIGHT;
}

/**
 * Align a map rect to tile boundaries: top-left moves to the lower tile
 * multiple, bottom-right to the higher one.
 */
export function tileBoundaryAlign(r: Rect): Rect {
  return {
    left: toTileWidthLesser(r.left),
    top: toTileHeightLesser(r.top),
    right: toTileWidthGreater(r.right),
    bottom: toTileHeightGreater(r.bottom),
  };
}
