/**
 * Web Mercator Projection
 *
 * Conversion between WGS84 degrees and absolute map pixels at a discrete
 * zoom level, following the OSM slippy map tile scheme.
 */

import type { GeoPoint, GeoRect, Point, Rect } from "./types";
import { assertValidZoom, mapHeight, mapWidth } from "./tileCoord";

/** Degrees to radians conversion factor */
const DEG_TO_RAD = Math.PI / 180;

/** Radians to degrees conversion factor */
const RAD_TO_DEG = 180 / Math.PI;

/** Maximum latitude for Web Mercator projection (~85.05 degrees) */
export const MAX_LATITUDE = 85.051128779806604;

/** Latitude bound accepted in geo points; slightly wider than MAX_LATITUDE */
export const LATITUDE_LIMIT = 85.1;

/** Longitude bound accepted in geo points */
export const LONGITUDE_LIMIT = 180;

// Added to a map fraction before flooring, scaled by the map size, so pixel
// values obtained from mapToGeo project back onto the same pixel at every
// zoom. The round-trip error stays below 1e-15 of the map size.
const FRACTION_EPSILON = 1e-13;

function fractionToPixel(fraction: number, size: number): number {
  return Math.floor(fraction * size + FRACTION_EPSILON * size);
}

function assertValidLong(long: number): void {
  if (!(long >= -LONGITUDE_LIMIT && long <= LONGITUDE_LIMIT)) {
    throw new RangeError(`Longitude ${long} is out of range [-180, 180]`);
  }
}

function assertValidLat(lat: number): void {
  if (!(lat >= -LATITUDE_LIMIT && lat <= LATITUDE_LIMIT)) {
    throw new RangeError(`Latitude ${lat} is out of range [-85.1, 85.1]`);
  }
}

function assertValidMapX(zoom: number, x: number): void {
  if (!(Number.isInteger(x) && x >= 0 && x <= mapWidth(zoom))) {
    throw new RangeError(
      `Map X ${x} is out of range [0, ${mapWidth(zoom)}] at zoom ${zoom}`
    );
  }
}

function assertValidMapY(zoom: number, y: number): void {
  if (!(Number.isInteger(y) && y >= 0 && y <= mapHeight(zoom))) {
    throw new RangeError(
      `Map Y ${y} is out of range [0, ${mapHeight(zoom)}] at zoom ${zoom}`
    );
  }
}

/**
 * Create a geo point.
 *
 * @throws RangeError when longitude is outside [-180, 180] or latitude
 *   outside [-85.1, 85.1]
 */
export function geoPoint(long: number, lat: number): GeoPoint {
  assertValidLong(long);
  assertValidLat(lat);
  return { long, lat };
}

export function geoRect(topLeft: GeoPoint, bottomRight: GeoPoint): GeoRect {
  return { topLeft, bottomRight };
}

/**
 * Check whether a region contains a point.
 * Latitude decreases from topLeft to bottomRight, hence the swapped bounds.
 */
export function geoRectContains(region: GeoRect, p: GeoPoint): boolean {
  return (
    p.long >= region.topLeft.long &&
    p.long <= region.bottomRight.long &&
    p.lat >= region.bottomRight.lat &&
    p.lat <= region.topLeft.lat
  );
}

/**
 * Clamp latitude to the valid Web Mercator range.
 */
export function clampLatitude(lat: number): number {
  return Math.max(-MAX_LATITUDE, Math.min(MAX_LATITUDE, lat));
}

// Degrees to pixels

export function longitudeToMapCoord(zoom: number, longitude: number): number {
  assertValidZoom(zoom);
  assertValidLong(longitude);
  const x = fractionToPixel((longitude + 180) / 360, mapWidth(zoom));
  assertValidMapX(zoom, x);
  return x;
}

export function latitudeToMapCoord(zoom: number, latitude: number): number {
  assertValidZoom(zoom);
  assertValidLat(latitude);
  const latRad = clampLatitude(latitude) * DEG_TO_RAD;
  // asinh(tan φ) == ln(tan φ + sec φ)
  const fraction = (1 - Math.asinh(Math.tan(latRad)) / Math.PI) / 2;
  const size = mapHeight(zoom);
  // The clamped pole latitudes land a hair outside the map in float math
  const y = Math.min(size, Math.max(0, fractionToPixel(fraction, size)));
  assertValidMapY(zoom, y);
  return y;
}

// Pixels to degrees

export function mapCoordToLongitude(zoom: number, x: number): number {
  assertValidZoom(zoom);
  assertValidMapX(zoom, x);
  return (x / mapWidth(zoom)) * 360 - 180;
}

export function mapCoordToLatitude(zoom: number, y: number): number {
  assertValidZoom(zoom);
  assertValidMapY(zoom, y);
  const n = Math.PI - (2 * Math.PI * y) / mapHeight(zoom);
  return RAD_TO_DEG * Math.atan(Math.sinh(n));
}

/**
 * Convert geo coordinates to absolute map pixels.
 * A rect is converted corner by corner.
 */
export function geoToMap(zoom: number, coords: GeoPoint): Point;
export function geoToMap(zoom: number, coords: GeoRect): Rect;
export function geoToMap(zoom: number, coords: GeoPoint | GeoRect): Point | Rect {
  if ("topLeft" in coords) {
    const tl = geoToMap(zoom, coords.topLeft);
    const br = geoToMap(zoom, coords.bottomRight);
    return { left: tl.x, top: tl.y, right: br.x, bottom: br.y };
  }
  return {
    x: longitudeToMapCoord(zoom, coords.long),
    y: latitudeToMapCoord(zoom, coords.lat),
  };
}

/**
 * Convert absolute map pixels to geo coordinates.
 * A rect is converted corner by corner.
 */
export function mapToGeo(zoom: number, coords: Point): GeoPoint;
export function mapToGeo(zoom: number, coords: Rect): GeoRect;
export function mapToGeo(zoom: number, coords: Point | Rect): GeoPoint | GeoRect {
  if ("left" in coords) {
    return {
      topLeft: mapToGeo(zoom, { x: coords.left, y: coords.top }),
      bottomRight: mapToGeo(zoom, { x: coords.right, y: coords.bottom }),
    };
  }
  return geoPoint(mapCoordToLongitude(zoom, coords.x), mapCoordToLatitude(zoom, coords.y));
}

// Map bounds

/** Check whether a point lies on the map at a zoom level */
export function inMap(zoom: number, p: Point): boolean;
/** Check whether a rect lies fully within the map at a zoom level */
export function inMap(zoom: number, r: Rect): boolean;
export function inMap(zoom: number, value: Point | Rect): boolean {
  const w = mapWidth(zoom);
  const h = mapHeight(zoom);
  if ("left" in value) {
    return value.left >= 0 && value.top >= 0 && value.right <= w && value.bottom <= h;
  }
  return value.x >= 0 && value.x < w && value.y >= 0 && value.y < h;
}

/**
 * Clamp a point into the map at a zoom level.
 * The upper bound is the map size itself so that it can serve as the
 * exclusive right/bottom edge of a rect.
 */
export function ensureInMap(zoom: number, p: Point): Point;
/** Clamp both corners of a rect into the map at a zoom level */
export function ensureInMap(zoom: number, r: Rect): Rect;
export function ensureInMap(zoom: number, value: Point | Rect): Point | Rect {
  const w = mapWidth(zoom);
  const h = mapHeight(zoom);
  const clampX = (x: number) => Math.max(0, Math.min(x, w));
  const clampY = (y: number) => Math.max(0, Math.min(y, h));
  if ("left" in value) {
    return {
      left: clampX(value.left),
      top: clampY(value.top),
      right: clampX(value.right),
      bottom: clampY(value.bottom),
    };
  }
  return { x: clampX(value.x), y: clampY(value.y) };
}
