import { ValidationError } from "./errors";
import { Angle, Length } from "./units";

export type Geodetic = {
  readonly kind: "geodetic";
  readonly lon: Angle; // [-180°, 180°), east-positive
  readonly lat: Angle; // [-90°, 90°]
  readonly alt: Length; // above the reference surface; negative is valid
};

export type Spherical = {
  readonly kind: "spherical";
  readonly azimuth: Angle; // [0°, 360°)
  readonly elevation: Angle; // [-90°, 90°]
  readonly range: Length;
};

/** Sensor-native detection: altitude takes the place of elevation. */
export type Observation = {
  readonly kind: "observation";
  readonly azimuth: Angle;
  readonly range: Length;
  readonly altitude: Length;
};

/** Result of the direct geodesic problem, which says nothing about altitude. */
export type LatLon = {
  readonly kind: "latlon";
  readonly lat: Angle;
  readonly lon: Angle;
};

function requireAngle(value: unknown, label: string): Angle {
  if (!(value instanceof Angle)) throw new ValidationError(`${label} must be an Angle`);
  return value;
}

function requireLength(value: unknown, label: string): Length {
  if (!(value instanceof Length)) throw new ValidationError(`${label} must be a Length`);
  return value;
}

export function geodetic(lon: Angle, lat: Angle, alt: Length): Geodetic {
  return {
    kind: "geodetic",
    lon: requireAngle(lon, "geodetic.lon").asLongitude(),
    lat: requireAngle(lat, "geodetic.lat").asLatitude(),
    alt: requireLength(alt, "geodetic.alt"),
  };
}

export function geodeticDeg(lonDeg: number, latDeg: number, altM = 0): Geodetic {
  return geodetic(Angle.deg(lonDeg), Angle.deg(latDeg), Length.meters(altM));
}

export function spherical(azimuth: Angle, elevation: Angle, range: Length): Spherical {
  return {
    kind: "spherical",
    azimuth: requireAngle(azimuth, "spherical.azimuth").asAzimuth(),
    elevation: requireAngle(elevation, "spherical.elevation").asElevation(),
    range: requireLength(range, "spherical.range"),
  };
}

export function sphericalDeg(azimuthDeg: number, elevationDeg: number, rangeM: number): Spherical {
  return spherical(Angle.deg(azimuthDeg), Angle.deg(elevationDeg), Length.meters(rangeM));
}

export function observation(azimuth: Angle, range: Length, altitude: Length): Observation {
  return {
    kind: "observation",
    azimuth: requireAngle(azimuth, "observation.azimuth").asAzimuth(),
    range: requireLength(range, "observation.range"),
    altitude: requireLength(altitude, "observation.altitude"),
  };
}

export function observationDeg(azimuthDeg: number, rangeM: number, altitudeM: number): Observation {
  return observation(Angle.deg(azimuthDeg), Length.meters(rangeM), Length.meters(altitudeM));
}

export function latLon(lat: Angle, lon: Angle): LatLon {
  return {
    kind: "latlon",
    lat: requireAngle(lat, "latLon.lat").asLatitude(),
    lon: requireAngle(lon, "latLon.lon").asLongitude(),
  };
}

/** False for the NaN sentinel produced by degenerate ECEF input. */
export function isValidGeodetic(point: Geodetic): boolean {
  return point.lon.isValid() && point.lat.isValid() && point.alt.isValid();
}
