/**
 * Tile URL formatting for tile-fetching collaborators.
 */

import type { Tile } from "../projection/types";
import { assertValidTile } from "../projection/tileCoord";

export interface TileUrlConfig {
  /** URL of the tile server, put before the tile path */
  prefix: string;
  /** Tile path pattern with {zoom}, {x} and {y} placeholders */
  pattern: string;
  /** Part of the URL after the tile path, e.g. an API key query */
  postfix: string;
}

export const DEFAULT_TILE_URL: Readonly<TileUrlConfig> = {
  prefix: "https://tile.openstreetmap.org/",
  pattern: "{zoom}/{x}/{y}.png",
  postfix: "",
};

/** Copyright notice required by the default tile server */
export const DEFAULT_COPYRIGHT = "(c) OpenStreetMap contributors";

/** Substitute a tile into a path pattern */
export function formatTilePath(pattern: string, tile: Tile): string {
  return pattern
    .replaceAll("{zoom}", String(tile.zoom))
    .replaceAll("{x}", String(tile.x))
    .replaceAll("{y}", String(tile.y));
}

/**
 * Full URL of a tile image.
 *
 * @throws RangeError for an invalid tile
 */
export function formatTileUrl(config: TileUrlConfig, tile: Tile): string {
  assertValidTile(tile);
  return config.prefix + formatTilePath(config.pattern, tile) + config.postfix;
}
