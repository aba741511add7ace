/**
 * Projection Module
 *
 * Web Mercator conversions between geo degrees and map pixels, tile
 * arithmetic, pixel rect helpers and scale/distance utilities.
 */

export type { GeoPoint, GeoRect, Point, Size, Rect, Tile } from "./types";

export {
  geoPoint,
  geoRect,
  geoRectContains,
  clampLatitude,
  longitudeToMapCoord,
  latitudeToMapCoord,
  mapCoordToLongitude,
  mapCoordToLatitude,
  geoToMap,
  mapToGeo,
  inMap,
  ensureInMap,
  MAX_LATITUDE,
  LATITUDE_LIMIT,
  LONGITUDE_LIMIT,
} from "./mercator";

export {
  TILE_WIDTH,
  TILE_HEIGHT,
  MIN_ZOOM,
  MAX_ZOOM,
  isValidZoom,
  assertValidZoom,
  tileCount,
  mapWidth,
  mapHeight,
  tileValid,
  assertValidTile,
  tileToString,
  tilesEqual,
  tileOrigin,
  tileRect,
  toTileWidthLesser,
  toTileHeightLesser,
  toTileWidthGreater,
  toTileHeightGreater,
  tileBoundaryAlign,
} from "./tileCoord";

export {
  rectFromSize,
  normalizeRect,
  rectWidth,
  rectHeight,
  topLeftOf,
  centerOf,
  rectContainsPoint,
  rectContainsRect,
  intersectRects,
  offsetRect,
  toInnerPoint,
  toOuterPoint,
  toInnerRect,
  toOuterRect,
} from "./rect";

export { calcLinDistanceInMeter } from "./distance";
export {
  getScaleBarParams,
  METERS_PER_PIXEL_ON_EQUATOR,
  type ScaleBarParams,
} from "./scaleBar";
