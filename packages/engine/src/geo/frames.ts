import type { Angle } from "@georadar/shared";
import { mtxv, mxv } from "../math/mat3";
import type { Mat3 } from "../math/mat3";
import { Cartesian, EnuVector } from "../math/vector";
import type { Vec3Like } from "../math/vector";

export type FrameOrigin = {
  readonly lon: Angle;
  readonly lat: Angle;
};

/**
 * Columns are the east, north and up unit vectors expressed in ECEF, so
 * ECEF = R * ENU and ENU = transpose(R) * ECEF.
 */
export function enuBasis(origin: FrameOrigin): Mat3 {
  const sinLat = origin.lat.sin();
  const cosLat = origin.lat.cos();
  const sinLon = origin.lon.sin();
  const cosLon = origin.lon.cos();

  return [
    -sinLon, -sinLat * cosLon, cosLat * cosLon,
    cosLon, -sinLat * sinLon, cosLat * sinLon,
    0, cosLat, sinLat,
  ];
}

export function ecefToEnu(origin: FrameOrigin, offset: Vec3Like): EnuVector {
  const [e, n, u] = mtxv(enuBasis(origin), [offset.x.base, offset.y.base, offset.z.base]);
  return EnuVector.meters(e, n, u);
}

export function enuToEcef(origin: FrameOrigin, enu: Vec3Like): Cartesian {
  const [x, y, z] = mxv(enuBasis(origin), [enu.x.base, enu.y.base, enu.z.base]);
  return Cartesian.meters(x, y, z);
}
