/**
 * Scale bar parameters per zoom level.
 */

import { assertValidZoom } from "./tileCoord";

/**
 * Ground resolution at the equator, meters per pixel, indexed by zoom.
 * See https://wiki.openstreetmap.org/wiki/Zoom_levels
 */
export const METERS_PER_PIXEL_ON_EQUATOR: readonly number[] = [
  156412, 78206, 39103, 19551, 9776, 4888, 2444, 1222, 610.984, 305.492, 152.746, 76.373,
  38.187, 19.093, 9.547, 4.773, 2.387, 1.193, 0.596, 0.298,
];

/** Round distance shown by the scale bar at each zoom, in km */
const SCALE_BAR_WIDTH_KM: readonly number[] = [
  10000, 5000, 3000, 1000, 500, 300, 200, 100, 50, 30, 10, 5, 3, 1, 0.5, 0.3, 0.2, 0.1, 0.05,
  0.02,
];

export interface ScaleBarParams {
  /** Bar length in pixels */
  widthPx: number;
  /** Distance the bar represents, in meters */
  widthMeters: number;
  /** Label such as "300 m" or "5 km" */
  text: string;
}

export function getScaleBarParams(zoom: number): ScaleBarParams {
  assertValidZoom(zoom);
  const km = SCALE_BAR_WIDTH_KM[zoom] ?? 0;
  const metersPerPixel = METERS_PER_PIXEL_ON_EQUATOR[zoom] ?? 1;

  const meters = km * 1000;
  const widthPx = Math.round(meters / metersPerPixel);
  const widthMeters = Math.round(meters);
  const text =
    widthMeters < 1000 ? `${widthMeters} m` : `${Math.floor(widthMeters / 1000)} km`;

  return { widthPx, widthMeters, text };
}
