// WGS84
export const WGS84_A = 6378137.0; // semi-major axis (m)
export const WGS84_F = 1 / 298.257223563; // flattening
export const WGS84_B = WGS84_A * (1 - WGS84_F);
export const WGS84_E2 = (WGS84_A * WGS84_A - WGS84_B * WGS84_B) / (WGS84_A * WGS84_A);

export const MEAN_EARTH_RADIUS_M = 6371008.8;

/** k for the standard (4/3 Earth) refraction model. */
export const STANDARD_K_FACTOR = 4 / 3;

export const DEG2RAD = Math.PI / 180;
export const RAD2DEG = 180 / Math.PI;
