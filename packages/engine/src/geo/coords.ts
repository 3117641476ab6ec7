// packages/engine/src/geo/coords.ts
import { spherical } from "@georadar/shared";
import type { Geodetic, Length, Spherical } from "@georadar/shared";
import { Cartesian, Geocentric } from "../math/vector";

/**
 * Reads a geodetic point as a spherical coordinate about the Earth's center:
 * longitude as azimuth, latitude as elevation, radius + altitude as range.
 * Only meaningful for the spherical Earth model.
 */
export function geodeticAsSphericalCoordinate(point: Geodetic, radius: Length): Spherical {
  return spherical(point.lon, point.lat, radius.add(point.alt));
}

export function sphericalCoordinateToGeocentric(coordinate: Spherical): Geocentric {
  const [x, y, z] = Cartesian.fromSpherical(coordinate).toArray();
  return Geocentric.meters(x, y, z);
}

export function geocentricToSphericalCoordinate(ecef: Geocentric): Spherical {
  const [x, y, z] = ecef.toArray();
  return Cartesian.meters(x, y, z).toSpherical();
}
