import { Angle, Length } from "@georadar/shared";
import type { Geodetic, Spherical } from "@georadar/shared";
import type { Cartesian, EnuVector, Vec3Like } from "../math/vector";
import { MEAN_EARTH_RADIUS_M } from "./constants";
import type { EarthModel } from "./earth";
import { ecefToEnu, enuToEcef } from "./frames";
import { haversineCentralAngle } from "./sphere";

/** Ground distance below which two points count as vertically aligned. */
const SAME_GROUND_POINT_M = 1e-9;

/** Straight-line (3D) distance between two points. */
export function chordDistance(model: EarthModel, from: Geodetic, to: Geodetic): Length {
  return model.toGeocentric(from).distanceTo(model.toGeocentric(to));
}

/** ECEF offset from `from` to `to`. */
export function ecefDisplacement(model: EarthModel, from: Geodetic, to: Geodetic): Cartesian {
  return model.toGeocentric(to).offsetFrom(model.toGeocentric(from));
}

/** Offset from `from` to `to` in the ENU frame at `from`. */
export function localDisplacement(model: EarthModel, from: Geodetic, to: Geodetic): EnuVector {
  return ecefToEnu(from, ecefDisplacement(model, from, to));
}

/** Geometric (unrefracted) azimuth, elevation and range from `from` to `to`. */
export function lookAngles(model: EarthModel, from: Geodetic, to: Geodetic): Spherical {
  return localDisplacement(model, from, to).toSpherical();
}

export function translate(model: EarthModel, point: Geodetic, ecefOffset: Vec3Like): Geodetic {
  return model.toGeodetic(model.toGeocentric(point).translate(ecefOffset));
}

export function translateLocal(model: EarthModel, point: Geodetic, enuOffset: Vec3Like): Geodetic {
  return translate(model, point, enuToEcef(point, enuOffset));
}

export function altitudeDifference(from: Geodetic, to: Geodetic): Length {
  return to.alt.subtract(from.alt);
}

/**
 * Elevation of `to` seen from `from`, measured against the surface distance.
 * Points straight above or below give ±90°.
 */
export function elevationAngle(model: EarthModel, from: Geodetic, to: Geodetic): Angle {
  const ground = model.surfaceDistance(from, to).base;
  const dh = altitudeDifference(from, to).base;
  if (ground < SAME_GROUND_POINT_M) return Angle.deg(dh >= 0 ? 90 : -90);
  return Angle.rad(Math.atan2(dh, ground));
}

export function haversineDistance(from: Geodetic, to: Geodetic, radiusM = MEAN_EARTH_RADIUS_M): Length {
  return Length.meters(radiusM * haversineCentralAngle(from.lat.base, from.lon.base, to.lat.base, to.lon.base));
}
