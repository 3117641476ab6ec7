import { Angle, Length, geodetic, latLon } from "@georadar/shared";
import type { Geodetic, LatLon } from "@georadar/shared";
import type { Geocentric } from "../math/vector";
import { geocentricToSphericalCoordinate, geodeticAsSphericalCoordinate, sphericalCoordinateToGeocentric } from "./coords";
import { MEAN_EARTH_RADIUS_M, STANDARD_K_FACTOR } from "./constants";
import type { EarthModel } from "./earth";

const TWO_PI = 2 * Math.PI;

/** Below this ECEF magnitude a position has no defined latitude. */
export const DEGENERATE_ECEF_M = 1e-9;

/** Central angle (rad) between two points via the haversine formula. */
export function haversineCentralAngle(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const sinDLat = Math.sin((lat2 - lat1) / 2);
  const sinDLon = Math.sin((lon2 - lon1) / 2);
  const h = sinDLat * sinDLat + Math.cos(lat1) * Math.cos(lat2) * sinDLon * sinDLon;
  return 2 * Math.atan2(Math.sqrt(h), Math.sqrt(Math.max(0, 1 - h)));
}

/** Great-circle initial bearing (rad, [0, 2π)). */
export function sphericalInitialBearing(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLon = lon2 - lon1;
  const y = Math.sin(dLon) * Math.cos(lat2);
  const x = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon);
  const theta = Math.atan2(y, x);
  return theta < 0 ? theta + TWO_PI : theta;
}

export function sphericalDestination(
  lat1: number,
  lon1: number,
  bearing: number,
  angularDistance: number
): { lat: number; lon: number } {
  const sinLat1 = Math.sin(lat1);
  const cosLat1 = Math.cos(lat1);
  const sinD = Math.sin(angularDistance);
  const cosD = Math.cos(angularDistance);

  const lat = Math.asin(Math.max(-1, Math.min(1, sinLat1 * cosD + cosLat1 * sinD * Math.cos(bearing))));
  const lon = lon1 + Math.atan2(Math.sin(bearing) * sinD * cosLat1, cosD - sinLat1 * Math.sin(lat));
  return { lat, lon };
}

export function nanGeodetic(lon = 0): Geodetic {
  return geodetic(Angle.rad(lon), Angle.rad(Number.NaN), Length.meters(Number.NaN));
}

/** Sphere of constant radius; mean Earth radius by default. */
export function createSphericalModel(radiusM = MEAN_EARTH_RADIUS_M): EarthModel {
  const radius = Length.meters(radiusM);

  return {
    kind: "spherical",

    toGeocentric(point) {
      return sphericalCoordinateToGeocentric(geodeticAsSphericalCoordinate(point, radius));
    },

    toGeodetic(ecef: Geocentric) {
      if (ecef.magnitude() < DEGENERATE_ECEF_M) return nanGeodetic();
      const s = geocentricToSphericalCoordinate(ecef);
      return geodetic(s.azimuth, s.elevation, Length.meters(s.range.base - radiusM));
    },

    surfaceDistance(from, to) {
      const c = haversineCentralAngle(from.lat.base, from.lon.base, to.lat.base, to.lon.base);
      return Length.meters(radiusM * c);
    },

    initialBearing(from, to) {
      return Angle.rad(sphericalInitialBearing(from.lat.base, from.lon.base, to.lat.base, to.lon.base));
    },

    earthRadius() {
      return radius;
    },

    effectiveEarthRadius(_lat, kFactor = STANDARD_K_FACTOR) {
      return Length.meters(radiusM * kFactor);
    },

    destinationPoint(start: Geodetic | LatLon, bearing, distance) {
      const d = sphericalDestination(start.lat.base, start.lon.base, bearing.base, distance.base / radiusM);
      return latLon(Angle.rad(d.lat), Angle.rad(d.lon));
    },
  };
}
