import { Angle, Length, latLon } from "@georadar/shared";
import type { LatLon } from "@georadar/shared";
import { MEAN_EARTH_RADIUS_M, WGS84_A } from "./constants";
import { haversineCentralAngle, sphericalDestination, sphericalInitialBearing } from "./sphere";

type Position = { readonly lat: Angle; readonly lon: Angle };

/** Used when an iterative direct solution does not converge. */
export type DirectFallback = (start: Position, bearing: Angle, distance: Length) => LatLon;

/** Used when an iterative inverse solution does not converge. */
export type InverseFallback = (from: Position, to: Position) => { distance: Length; bearing: Angle };

export function sphericalDirectFallback(radiusM = MEAN_EARTH_RADIUS_M): DirectFallback {
  return (start, bearing, distance) => {
    const d = sphericalDestination(start.lat.base, start.lon.base, bearing.base, distance.base / radiusM);
    return latLon(Angle.rad(d.lat), Angle.rad(d.lon));
  };
}

export function haversineInverseFallback(radiusM = WGS84_A): InverseFallback {
  return (from, to) => {
    const c = haversineCentralAngle(from.lat.base, from.lon.base, to.lat.base, to.lon.base);
    const bearing = sphericalInitialBearing(from.lat.base, from.lon.base, to.lat.base, to.lon.base);
    return { distance: Length.meters(radiusM * c), bearing: Angle.rad(bearing) };
  };
}
