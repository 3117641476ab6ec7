import { Pressure, Temperature } from "@georadar/shared";
import type { Length } from "@georadar/shared";

/** Two-layer International Standard Atmosphere. */
export const ISA = {
  seaLevelTemperatureK: 288.15,
  seaLevelPressurePa: 101325,
  gravity: 9.80665, // m/s²
  gasConstant: 287.058, // J/(kg·K), dry air
  lapseRate: -0.0065, // K/m
  tropopauseM: 11000,
  tropopauseTemperatureK: 216.65,
} as const;

/** Relative humidity (%) assumed at every altitude. */
export const STANDARD_RELATIVE_HUMIDITY = 60;

export type Weather = {
  readonly pressure: Pressure;
  readonly temperature: Temperature;
  readonly relativeHumidity: number; // percent, 0..100
};

export type AtmosphereSample = Weather & {
  readonly height: Length;
};

export type StandardAtmosphereOptions = {
  relativeHumidity?: number;
};

// g / (L·R) with L as a positive lapse magnitude
const PRESSURE_EXPONENT = ISA.gravity / (-ISA.lapseRate * ISA.gasConstant);

function troposphereTemperatureK(h: number): number {
  return ISA.seaLevelTemperatureK + ISA.lapseRate * h;
}

function standardPressurePa(h: number): number {
  if (h <= ISA.tropopauseM) {
    const ratio = troposphereTemperatureK(h) / ISA.seaLevelTemperatureK;
    return ISA.seaLevelPressurePa * ratio ** PRESSURE_EXPONENT;
  }
  const tropopausePa = standardPressurePa(ISA.tropopauseM);
  return (
    tropopausePa *
    Math.exp((-ISA.gravity * (h - ISA.tropopauseM)) / (ISA.gasConstant * ISA.tropopauseTemperatureK))
  );
}

export function standardTemperature(altitude: Length): Temperature {
  const h = altitude.base;
  const k = h <= ISA.tropopauseM ? troposphereTemperatureK(h) : ISA.tropopauseTemperatureK;
  return Temperature.kelvin(k);
}

export function standardPressure(altitude: Length): Pressure {
  return Pressure.pascals(standardPressurePa(altitude.base));
}

/** Constant with altitude unless the caller overrides it. */
export function standardRelativeHumidity(
  _altitude: Length,
  options: StandardAtmosphereOptions = {}
): number {
  return options.relativeHumidity ?? STANDARD_RELATIVE_HUMIDITY;
}

export function standardAtmosphere(altitude: Length, options: StandardAtmosphereOptions = {}): AtmosphereSample {
  return {
    height: altitude,
    pressure: standardPressure(altitude),
    temperature: standardTemperature(altitude),
    relativeHumidity: standardRelativeHumidity(altitude, options),
  };
}
