export {
  formatTileUrl,
  formatTilePath,
  DEFAULT_TILE_URL,
  DEFAULT_COPYRIGHT,
  type TileUrlConfig,
} from "./tileUrl";
export {
  TileRenderer,
  loadingLabel,
  type TileDrawCallback,
  type TileDrawStage,
  type TileRendererOptions,
} from "./TileRenderer";
