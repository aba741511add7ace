/**
 * slippy-viewport - tiled Web Mercator map viewport with a margin-padded
 * tile cache, anchored zoom and layered mapmarks
 */

export const VERSION = "0.0.1";

export {
  SlippyMap,
  allLayers,
  DEFAULT_CACHE_TILES,
  DEFAULT_CACHE_MARGIN_TILES,
  DEFAULT_BACKGROUND,
  type SlippyMapOptions,
} from "./SlippyMap";
export * from "./projection";
export * from "./surface";
export * from "./tiles";
export * from "./marks";
export * from "./view";
export * from "./render";
