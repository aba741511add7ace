/**
 * Projection Types
 *
 * Coordinate systems used by the map viewport: geographic degrees,
 * absolute map pixels and slippy tile numbers.
 */

/**
 * Point on a map defined by longitude and latitude, in degrees.
 *
 * Kept apart from pixel points because latitude grows upwards while
 * pixel Y grows downwards.
 */
export interface GeoPoint {
  long: number;
  lat: number;
}

/**
 * Region defined by two geo points.
 * topLeft holds max latitude / min longitude, bottomRight the opposite.
 */
export interface GeoRect {
  topLeft: GeoPoint;
  bottomRight: GeoPoint;
}

/** Integer pixel point (map, view or cache-local space) */
export interface Point {
  x: number;
  y: number;
}

/** Pixel dimensions */
export interface Size {
  width: number;
  height: number;
}

/** Pixel rectangle; right and bottom are exclusive */
export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/** Slippy map tile: zoom level and column/row numbers */
export interface Tile {
  zoom: number;
  x: number;
  y: number;
}
