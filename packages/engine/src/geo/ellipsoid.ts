import { Angle, Length, geodetic, latLon } from "@georadar/shared";
import type { Geodetic, LatLon } from "@georadar/shared";
import { Geocentric } from "../math/vector";
import { STANDARD_K_FACTOR, WGS84_A, WGS84_B, WGS84_E2 } from "./constants";
import type { EarthModel } from "./earth";
import { haversineInverseFallback, sphericalDirectFallback } from "./fallback";
import type { DirectFallback, InverseFallback } from "./fallback";
import { DEGENERATE_ECEF_M, nanGeodetic } from "./sphere";
import { WGS84, vincentyDirect, vincentyInverse } from "./vincenty";
import type { VincentyOptions } from "./vincenty";

/** Fixed refinement count of the ECEF -> geodetic latitude solve. */
export const GEODETIC_LATITUDE_ITERATIONS = 5;

export type EllipsoidalModelOptions = VincentyOptions & {
  directFallback?: DirectFallback;
  inverseFallback?: InverseFallback;
};

function primeVerticalRadius(sinLat: number): number {
  return WGS84_A / Math.sqrt(1 - WGS84_E2 * sinLat * sinLat);
}

/** Height above the ellipsoid for a meridian-plane position (p, z) at latitude `lat`. */
function ellipsoidalHeight(p: number, z: number, lat: number): number {
  const sinLat = Math.sin(lat);
  return p * Math.cos(lat) + z * sinLat - WGS84_A * Math.sqrt(1 - WGS84_E2 * sinLat * sinLat);
}

export function wgs84ToGeocentric(point: Geodetic): Geocentric {
  const sinLat = point.lat.sin();
  const cosLat = point.lat.cos();
  const h = point.alt.base;
  const N = primeVerticalRadius(sinLat);

  return Geocentric.meters(
    (N + h) * cosLat * point.lon.cos(),
    (N + h) * cosLat * point.lon.sin(),
    (N * (1 - WGS84_E2) + h) * sinLat
  );
}

export function wgs84ToGeodetic(ecef: Geocentric): Geodetic {
  const [x, y, z] = ecef.toArray();
  const p = Math.hypot(x, y);
  const lon = Math.atan2(y, x);

  if (ecef.magnitude() < DEGENERATE_ECEF_M) return nanGeodetic(lon);

  if (p < DEGENERATE_ECEF_M) {
    const lat = z >= 0 ? Math.PI / 2 : -Math.PI / 2;
    return geodetic(Angle.rad(lon), Angle.rad(lat), Length.meters(Math.abs(z) - WGS84_B));
  }

  let lat = Math.atan2(z, p * (1 - WGS84_E2));
  for (let i = 0; i < GEODETIC_LATITUDE_ITERATIONS; i++) {
    const N = primeVerticalRadius(Math.sin(lat));
    const h = ellipsoidalHeight(p, z, lat);
    lat = Math.atan2(z, p * (1 - (WGS84_E2 * N) / (N + h)));
  }

  return geodetic(Angle.rad(lon), Angle.rad(lat), Length.meters(ellipsoidalHeight(p, z, lat)));
}

/** Radius of the WGS84 ellipse at geodetic latitude `lat`. */
export function wgs84Radius(lat: Angle): number {
  const a2 = WGS84_A * WGS84_A;
  const b2 = WGS84_B * WGS84_B;
  const c = lat.cos();
  const s = lat.sin();
  const num = (a2 * c) ** 2 + (b2 * s) ** 2;
  const den = (WGS84_A * c) ** 2 + (WGS84_B * s) ** 2;
  if (den < 1e-10) return WGS84_B;
  return Math.sqrt(num / den);
}

/**
 * WGS84 model. Geodesics use Vincenty; when an iteration does not converge the
 * configured fallback answers instead.
 */
export function createEllipsoidalModel(options: EllipsoidalModelOptions = {}): EarthModel {
  const directFallback = options.directFallback ?? sphericalDirectFallback();
  const inverseFallback = options.inverseFallback ?? haversineInverseFallback();
  const vincenty: VincentyOptions = { tolerance: options.tolerance, maxIterations: options.maxIterations };

  function inverse(from: Geodetic, to: Geodetic): { distance: Length; bearing: Angle } {
    const r = vincentyInverse(from.lat.base, from.lon.base, to.lat.base, to.lon.base, WGS84, vincenty);
    if (!r.ok) return inverseFallback(from, to);
    return { distance: Length.meters(r.distanceM), bearing: Angle.rad(r.initialBearingRad) };
  }

  return {
    kind: "ellipsoidal",

    toGeocentric: wgs84ToGeocentric,

    toGeodetic: wgs84ToGeodetic,

    surfaceDistance(from, to) {
      return inverse(from, to).distance;
    },

    initialBearing(from, to) {
      return inverse(from, to).bearing;
    },

    earthRadius(lat) {
      return Length.meters(wgs84Radius(lat));
    },

    effectiveEarthRadius(lat, kFactor = STANDARD_K_FACTOR) {
      return Length.meters(wgs84Radius(lat) * kFactor);
    },

    destinationPoint(start: Geodetic | LatLon, bearing, distance) {
      const r = vincentyDirect(start.lat.base, start.lon.base, bearing.base, distance.base, WGS84, vincenty);
      if (!r.ok) return directFallback(start, bearing, distance);
      return latLon(Angle.rad(r.latRad), Angle.rad(r.lonRad));
    },
  };
}
