/**
 * Tile drawing protocol.
 *
 * A tile is offered to the host's tile callback first, then to the loading
 * callback, and finally drawn as a built-in "Loading" placeholder.
 */

import type { Point, Tile } from "../projection/types";
import { TILE_HEIGHT, TILE_WIDTH, tileToString } from "../projection/tileCoord";
import { rectFromSize } from "../projection/rect";
import type { Color, DrawSurface, FontSpec } from "../surface/types";

/**
 * Draws tile `tile` with its top-left corner at `topLeft` on `surface`.
 * Returns true when the tile was drawn; false passes it to the next stage.
 */
export type TileDrawCallback = (
  tile: Tile,
  topLeft: Point,
  surface: DrawSurface
) => boolean;

/** Which stage ended up drawing a tile */
export type TileDrawStage = "tile" | "loading" | "placeholder";

export interface TileRendererOptions {
  drawTile?: TileDrawCallback;
  drawTileLoading?: TileDrawCallback;
  /** Fill of the placeholder */
  background: Color;
  /** Font of the placeholder label */
  font: FontSpec;
}

/** Outline color of the placeholder */
const PLACEHOLDER_BORDER: Color = "#808080";
/** Label color of the placeholder */
const PLACEHOLDER_TEXT: Color = "#008000";

/** Label of a tile that has no image yet */
export function loadingLabel(tile: Tile): string {
  return `Loading [${tile.x} : ${tile.y}]...`;
}

export class TileRenderer {
  drawTile?: TileDrawCallback;
  drawTileLoading?: TileDrawCallback;
  background: Color;
  font: FontSpec;

  constructor(options: TileRendererOptions) {
    this.drawTile = options.drawTile;
    this.drawTileLoading = options.drawTileLoading;
    this.background = options.background;
    this.font = options.font;
  }

  /** Draw a tile through the three-stage fallback */
  draw(tile: Tile, topLeft: Point, surface: DrawSurface): TileDrawStage {
    if (this.tryCallback(this.drawTile, "drawTile", tile, topLeft, surface)) {
      return "tile";
    }
    const loading = this.drawTileLoading;
    if (this.tryCallback(loading, "drawTileLoading", tile, topLeft, surface)) {
      return "loading";
    }
    this.drawPlaceholder(tile, topLeft, surface);
    return "placeholder";
  }

  /** Bordered tile rect with a centered "Loading [x : y]..." label */
  drawPlaceholder(tile: Tile, topLeft: Point, surface: DrawSurface): void {
    surface.rectangle(
      rectFromSize(topLeft, { width: TILE_WIDTH, height: TILE_HEIGHT }),
      { fill: this.background, stroke: PLACEHOLDER_BORDER }
    );

    const text = loadingLabel(tile);
    const extent = surface.measureText(text, this.font);
    surface.drawText(
      text,
      {
        x: topLeft.x + Math.floor((TILE_WIDTH - extent.width) / 2),
        y: topLeft.y + Math.floor((TILE_HEIGHT - extent.height) / 2),
      },
      { font: this.font, color: PLACEHOLDER_TEXT }
    );
  }

  private tryCallback(
    callback: TileDrawCallback | undefined,
    name: string,
    tile: Tile,
    topLeft: Point,
    surface: DrawSurface
  ): boolean {
    if (!callback) return false;
    try {
      return callback(tile, topLeft, surface);
    } catch (error) {
      // Treated as unhandled so the next stage still draws the tile
      console.error(
        `[TileRenderer] ${name} failed for tile ${tileToString(tile)}:`,
        error
      );
      return false;
    }
  }
}
