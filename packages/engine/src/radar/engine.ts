import { Length, geodetic, observation, spherical } from "@georadar/shared";
import type { Angle, Geodetic, Observation, Spherical } from "@georadar/shared";
import { kFactorFromProfile, kFactorFromSiteWeather } from "../atmosphere/kfactor";
import type { KFactorOptions } from "../atmosphere/kfactor";
import type { Weather } from "../atmosphere/standard";
import { resolveEngineConfig } from "../config";
import type { EngineConfig } from "../config";
import { createEarthModel } from "../geo/earth";
import type { EarthModel } from "../geo/earth";
import { chordDistance } from "../geo/geodetic";
import { consoleLogger } from "../log";
import type { Logger } from "../log";
import { solveRefractionTriangle } from "./triangle";

export type RadarEngineOptions = {
  /** Defaults to the model named by `config.earthModel`. */
  model?: EarthModel;
  config?: Partial<EngineConfig>;
  logger?: Logger;
};

export type WeatherSolution = {
  position: Geodetic;
  kFactor: number; // k that produced `position`
  iterations: number;
  converged: boolean;
};

export type RadarEngine = {
  readonly model: EarthModel;
  readonly config: EngineConfig;

  toSpherical(sensor: Geodetic, target: Geodetic | Observation, kFactor?: number): Spherical;
  /** k taken from the weather at both ends. */
  toSphericalInWeather(sensor: Geodetic, sensorWeather: Weather, target: Geodetic, targetWeather: Weather): Spherical;
  toGeodetic(sensor: Geodetic, detection: Spherical | Observation, kFactor?: number): Geodetic;
  /** Fixed-point solve of k against the (unknown) target altitude. */
  solveGeodeticInWeather(sensor: Geodetic, sensorWeather: Weather, detection: Spherical): WeatherSolution;
  toGeodeticInWeather(sensor: Geodetic, sensorWeather: Weather, detection: Spherical): Geodetic;
  toObservation(sensor: Geodetic, target: Geodetic): Observation;
  horizonDistance(altitude: Length, latitude: Angle, kFactor?: number): Length;

  toSphericals(sensor: Geodetic, targets: readonly (Geodetic | Observation)[], kFactor?: number): Spherical[];
  toGeodetics(sensor: Geodetic, detections: readonly (Spherical | Observation)[], kFactor?: number): Geodetic[];
  toObservations(sensor: Geodetic, targets: readonly Geodetic[]): Observation[];
};

export function createRadarEngine(options: RadarEngineOptions = {}): RadarEngine {
  const config = resolveEngineConfig(options.config);
  const model = options.model ?? createEarthModel(config.earthModel);
  const logger = options.logger ?? consoleLogger;
  const kOptions: KFactorOptions = { relativeHumidity: config.standardRelativeHumidity };
  const triangleOptions = { centralAngleClamp: config.centralAngleClamp };

  function elevationFor(sensor: Geodetic, targetAltitude: Length, slantRange: Length, k: number): Angle {
    return solveRefractionTriangle(
      {
        solveFor: "elevation",
        effectiveRadius: model.effectiveEarthRadius(sensor.lat, k),
        sensorAltitude: sensor.alt,
        slantRange,
        targetAltitude,
      },
      triangleOptions
    ).elevation;
  }

  function toSpherical(sensor: Geodetic, target: Geodetic | Observation, kFactor = config.kFactor): Spherical {
    if (target.kind === "observation") {
      return spherical(target.azimuth, elevationFor(sensor, target.altitude, target.range, kFactor), target.range);
    }
    const range = chordDistance(model, sensor, target);
    const azimuth = model.initialBearing(sensor, target);
    return spherical(azimuth, elevationFor(sensor, target.alt, range, kFactor), range);
  }

  function toGeodetic(sensor: Geodetic, detection: Spherical | Observation, kFactor = config.kFactor): Geodetic {
    const sph = detection.kind === "observation" ? toSpherical(sensor, detection, kFactor) : detection;
    const effectiveRadius = model.effectiveEarthRadius(sensor.lat, kFactor);
    const solution = solveRefractionTriangle(
      {
        solveFor: "targetAltitude",
        effectiveRadius,
        sensorAltitude: sensor.alt,
        slantRange: sph.range,
        elevation: sph.elevation,
      },
      triangleOptions
    );
    const ground = Length.meters(effectiveRadius.base * solution.centralAngleRad);
    const end = model.destinationPoint(sensor, sph.azimuth, ground);
    return geodetic(end.lon, end.lat, solution.targetAltitude);
  }

  function solveGeodeticInWeather(sensor: Geodetic, sensorWeather: Weather, detection: Spherical): WeatherSolution {
    const site = { ...sensorWeather, height: sensor.alt };
    let k = config.kFactor;

    for (let i = 1; ; i++) {
      const position = toGeodetic(sensor, detection, k);
      const next = kFactorFromSiteWeather(site, position.alt, kOptions);
      if (Math.abs(next - k) < config.kTolerance) {
        return { position, kFactor: k, iterations: i, converged: true };
      }
      if (i >= config.maxKIterations) {
        logger.warn(`[@georadar/engine] k-factor did not converge within ${i} iterations (last k=${next})`);
        return { position, kFactor: k, iterations: i, converged: false };
      }
      k = next;
    }
  }

  function toObservation(sensor: Geodetic, target: Geodetic): Observation {
    return observation(model.initialBearing(sensor, target), chordDistance(model, sensor, target), target.alt);
  }

  return {
    model,
    config,

    toSpherical,

    toSphericalInWeather(sensor, sensorWeather, target, targetWeather) {
      const k = kFactorFromProfile(
        { ...sensorWeather, height: sensor.alt },
        { ...targetWeather, height: target.alt },
        kOptions
      );
      return toSpherical(sensor, target, k);
    },

    toGeodetic,

    solveGeodeticInWeather,

    toGeodeticInWeather(sensor, sensorWeather, detection) {
      return solveGeodeticInWeather(sensor, sensorWeather, detection).position;
    },

    toObservation,

    horizonDistance(altitude, latitude, kFactor = config.kFactor) {
      const re = model.effectiveEarthRadius(latitude, kFactor).base;
      const h = altitude.base;
      if (!(h > 0)) return Length.meters(0);
      return Length.meters(Math.sqrt(2 * re * h + h * h));
    },

    toSphericals(sensor, targets, kFactor) {
      return targets.map((target) => toSpherical(sensor, target, kFactor));
    },

    toGeodetics(sensor, detections, kFactor) {
      return detections.map((detection) => toGeodetic(sensor, detection, kFactor));
    },

    toObservations(sensor, targets) {
      return targets.map((target) => toObservation(sensor, target));
    },
  };
}
