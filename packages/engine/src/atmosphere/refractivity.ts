import { Pressure, ValidationError } from "@georadar/shared";
import type { Length, Temperature } from "@georadar/shared";
import { MEAN_EARTH_RADIUS_M } from "../geo/constants";
import { standardAtmosphere } from "./standard";
import type { AtmosphereSample, StandardAtmosphereOptions, Weather } from "./standard";

/** Unrefracted Earth radius used to fold curvature into M. */
export const REFRACTION_EARTH_RADIUS_M = MEAN_EARTH_RADIUS_M;

// ITU-R P.453 coefficients
const K1 = 77.6; // K/hPa
const K3 = 3.732e5; // K²/hPa

function requireRelativeHumidity(relativeHumidity: number): number {
  if (!(relativeHumidity >= 0 && relativeHumidity <= 100)) {
    throw new ValidationError(`Relative humidity must be within [0, 100], got ${relativeHumidity}`);
  }
  return relativeHumidity;
}

/** Tetens equation over water. */
export function saturationVaporPressure(temperature: Temperature): Pressure {
  const tc = temperature.celsius;
  return Pressure.hectopascals(6.112 * Math.exp((17.67 * tc) / (tc + 243.5)));
}

export function vaporPressure(temperature: Temperature, relativeHumidity: number): Pressure {
  const rh = requireRelativeHumidity(relativeHumidity);
  return saturationVaporPressure(temperature).scale(rh / 100);
}

/** Radio refractivity N (N-units). */
export function refractivity(pressure: Pressure, temperature: Temperature, relativeHumidity: number): number {
  const e = vaporPressure(temperature, relativeHumidity).hectopascals;
  const t = temperature.kelvin;
  return (K1 * pressure.hectopascals) / t + (K3 * e) / (t * t);
}

export function weatherRefractivity(weather: Weather): number {
  return refractivity(weather.pressure, weather.temperature, weather.relativeHumidity);
}

export function refractiveIndex(n: number): number {
  return 1 + n * 1e-6;
}

/** M = N + (h / Re)·1e6 */
export function modifiedRefractivity(
  n: number,
  height: Length,
  earthRadiusM = REFRACTION_EARTH_RADIUS_M
): number {
  return n + (height.base / earthRadiusM) * 1e6;
}

export function sampleModifiedRefractivity(sample: AtmosphereSample, earthRadiusM = REFRACTION_EARTH_RADIUS_M): number {
  return modifiedRefractivity(weatherRefractivity(sample), sample.height, earthRadiusM);
}

/** Mean M of two samples. */
export function averageModifiedRefractivity(site: AtmosphereSample, target: AtmosphereSample): number {
  return (sampleModifiedRefractivity(site) + sampleModifiedRefractivity(target)) / 2;
}

/** Mean M with both ends taken from the standard atmosphere. */
export function averageModifiedRefractivityStandard(
  siteHeight: Length,
  targetHeight: Length,
  options: StandardAtmosphereOptions = {}
): number {
  return averageModifiedRefractivity(standardAtmosphere(siteHeight, options), standardAtmosphere(targetHeight, options));
}

/** Mean M from measured site weather and a standard-atmosphere target. */
export function averageModifiedRefractivityFromSite(
  site: AtmosphereSample,
  targetHeight: Length,
  options: StandardAtmosphereOptions = {}
): number {
  return averageModifiedRefractivity(site, standardAtmosphere(targetHeight, options));
}
