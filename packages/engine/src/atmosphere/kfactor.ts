import type { Length } from "@georadar/shared";
import { REFRACTION_EARTH_RADIUS_M, sampleModifiedRefractivity } from "./refractivity";
import { standardAtmosphere } from "./standard";
import type { AtmosphereSample, StandardAtmosphereOptions } from "./standard";

/** Textbook dM/dh (M-units per meter) used when both samples share a height. */
export const STANDARD_M_GRADIENT = 0.118;

/** Returned when dM/dh is too flat to divide by (near ducting). */
export const DUCTING_K_FACTOR = 1000;

const SAME_HEIGHT_EPSILON_M = 1e-6;
const FLAT_GRADIENT_EPSILON = 1e-9;

export type KFactorOptions = StandardAtmosphereOptions & {
  earthRadiusM?: number;
};

/** k = (1e6 / Re) / (dM/dh) between two samples. */
export function kFactorFromProfile(lower: AtmosphereSample, upper: AtmosphereSample, options: KFactorOptions = {}): number {
  const re = options.earthRadiusM ?? REFRACTION_EARTH_RADIUS_M;
  const dh = upper.height.base - lower.height.base;

  let gradient: number;
  if (Math.abs(dh) < SAME_HEIGHT_EPSILON_M) {
    gradient = STANDARD_M_GRADIENT;
  } else {
    gradient = (sampleModifiedRefractivity(upper, re) - sampleModifiedRefractivity(lower, re)) / dh;
  }

  if (Math.abs(gradient) < FLAT_GRADIENT_EPSILON) return DUCTING_K_FACTOR;
  return 1e6 / re / gradient;
}

export function kFactorFromStandardAtmosphere(h1: Length, h2: Length, options: KFactorOptions = {}): number {
  return kFactorFromProfile(standardAtmosphere(h1, options), standardAtmosphere(h2, options), options);
}

/** Measured weather at the site, standard atmosphere at the target height. */
export function kFactorFromSiteWeather(
  site: AtmosphereSample,
  targetHeight: Length,
  options: KFactorOptions = {}
): number {
  return kFactorFromProfile(site, standardAtmosphere(targetHeight, options), options);
}
