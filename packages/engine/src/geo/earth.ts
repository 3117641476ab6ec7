import { assertNever } from "@georadar/shared";
import type { Angle, Geodetic, LatLon, Length } from "@georadar/shared";
import type { Geocentric } from "../math/vector";
import { createEllipsoidalModel } from "./ellipsoid";
import type { EllipsoidalModelOptions } from "./ellipsoid";
import { createSphericalModel } from "./sphere";

export type EarthModelKind = "ellipsoidal" | "spherical";

/**
 * Shared capability set of the reference surfaces. Implementations are stateless
 * and are passed explicitly to whatever needs them.
 */
export interface EarthModel {
  readonly kind: EarthModelKind;

  toGeocentric(point: Geodetic): Geocentric;

  /** Degenerate input (near the Earth's center) yields NaN lat/alt. */
  toGeodetic(ecef: Geocentric): Geodetic;

  surfaceDistance(from: Geodetic, to: Geodetic): Length;

  initialBearing(from: Geodetic, to: Geodetic): Angle;

  earthRadius(lat: Angle): Length;

  /** `earthRadius(lat) * kFactor`, with k = 4/3 when omitted. */
  effectiveEarthRadius(lat: Angle, kFactor?: number): Length;

  destinationPoint(start: Geodetic | LatLon, bearing: Angle, distance: Length): LatLon;
}

export type EarthModelFactoryOptions = EllipsoidalModelOptions & {
  /** Sphere radius for the spherical variant. */
  radiusM?: number;
};

export function createEarthModel(kind: EarthModelKind, options: EarthModelFactoryOptions = {}): EarthModel {
  switch (kind) {
    case "ellipsoidal":
      return createEllipsoidalModel(options);
    case "spherical":
      return createSphericalModel(options.radiusM);
    default:
      return assertNever(kind, "Unknown Earth model");
  }
}
