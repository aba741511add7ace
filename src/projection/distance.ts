/**
 * Linear distance between geo points on the WGS84 ellipsoid.
 */

import type { GeoPoint } from "./types";

/** Degrees to radians, truncated as in the reference formula */
const D2R = 0.017453;
/** WGS84 semi-major axis in meters */
const SEMI_MAJOR_AXIS = 6378137.0;
/** Eccentricity squared */
const E2 = 0.006739496742337;

/**
 * Distance between two points in meters.
 *
 * Uses the radius of curvature of the ellipsoid in the direction of the
 * great circle through both points rather than a fixed-radius haversine,
 * so values match other tools built on the same formula.
 * Returns NaN for identical points (the azimuth is undefined).
 */
export function calcLinDistanceInMeter(a: GeoPoint, b: GeoPoint): number {
  const dLambda = (a.long - b.long) * D2R;
  const dPhi = (a.lat - b.lat) * D2R;
  const phiMean = ((a.lat + b.lat) / 2) * D2R;

  const sinPhiMean = Math.sin(phiMean);
  const temp = 1 - E2 * sinPhiMean ** 2;
  const rho = (SEMI_MAJOR_AXIS * (1 - E2)) / temp ** 1.5;
  const nu = SEMI_MAJOR_AXIS / Math.sqrt(1 - E2 * sinPhiMean * sinPhiMean);

  let z = Math.sqrt(
    Math.sin(dPhi / 2) ** 2 +
      Math.cos(b.lat * D2R) * Math.cos(a.lat * D2R) * Math.sin(dLambda / 2) ** 2
  );
  z = 2 * Math.asin(z);

  const alpha = Math.asin((Math.cos(b.lat * D2R) * Math.sin(dLambda)) / Math.sin(z));

  const r = (rho * nu) / (rho * Math.sin(alpha) ** 2 + nu * Math.cos(alpha) ** 2);

  return z * r;
}
