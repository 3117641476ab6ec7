import { describe, expect, it, vi } from "vitest";
import { Angle, Length, Pressure, Temperature, geodeticDeg, observationDeg, sphericalDeg } from "@georadar/shared";
import type { Geodetic } from "@georadar/shared";
import { kFactorFromProfile, kFactorFromSiteWeather } from "../src/atmosphere/kfactor";
import { standardAtmosphere } from "../src/atmosphere/standard";
import type { Weather } from "../src/atmosphere/standard";
import { createSphericalModel } from "../src/geo/sphere";
import { silentLogger } from "../src/log";
import { createRadarEngine } from "../src/radar/engine";

function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

const engine = createRadarEngine({ logger: silentLogger });

function expectSamePosition(actual: Geodetic, expected: Geodetic, label: string): void {
  expect(Math.abs(actual.lat.radians - expected.lat.radians), `${label}.lat`).toBeLessThan(1e-6);
  expect(Math.abs(actual.lon.radians - expected.lon.radians), `${label}.lon`).toBeLessThan(1e-6);
  expect(Math.abs(actual.alt.meters - expected.alt.meters), `${label}.alt`).toBeLessThan(1);
}

describe("radar engine: geodetic <-> spherical", () => {
  const cases = [
    {
      name: "equator",
      sensor: geodeticDeg(0, 0, 100),
      target: geodeticDeg(0.1, 0.1, 1000),
      k: 4 / 3,
      expected: { az: 45.19237938831004, el: 3.229754711941815, range: 15717.485443667601 },
    },
    {
      name: "mid-latitude",
      sensor: geodeticDeg(10, 45, 50),
      target: geodeticDeg(10.5, 45.3, 500),
      k: 1.2,
      expected: { az: 49.52782504809085, el: 0.30681341658838274, range: 51556.535383312745 },
    },
  ];

  it("matches fixed regression detections", () => {
    for (const tc of cases) {
      const s = engine.toSpherical(tc.sensor, tc.target, tc.k);
      expect(s.azimuth.degrees, `${tc.name}.az`).toBeCloseTo(tc.expected.az, 8);
      expect(s.elevation.degrees, `${tc.name}.el`).toBeCloseTo(tc.expected.el, 8);
      expect(s.range.meters, `${tc.name}.range`).toBeCloseTo(tc.expected.range, 5);
    }
  });

  it("round-trips toSpherical -> toGeodetic", () => {
    for (const tc of cases) {
      const back = engine.toGeodetic(tc.sensor, engine.toSpherical(tc.sensor, tc.target, tc.k), tc.k);
      expectSamePosition(back, tc.target, tc.name);
    }
  });

  it("round-trips short-range targets for deterministic random geometry", () => {
    // Reff * gamma ground distance holds 1e-6 rad only at short range and low altitude
    const rand = createRng(0x6e0da7);
    for (let n = 0; n < 100; n++) {
      const lon = rand() * 340 - 170;
      const lat = rand() * 140 - 70;
      const sensor = geodeticDeg(lon, lat, rand() * 500);
      const target = geodeticDeg(lon + rand() * 0.4 - 0.2, lat + rand() * 0.4 - 0.2, rand() * 3000);
      const k = 1 + rand() * 0.6;
      expectSamePosition(engine.toGeodetic(sensor, engine.toSpherical(sensor, target, k), k), target, `#${n}`);
    }
  });

  it("round-trips on the spherical model", () => {
    const sphereEngine = createRadarEngine({ model: createSphericalModel(), logger: silentLogger });
    for (const tc of cases) {
      const back = sphereEngine.toGeodetic(tc.sensor, sphereEngine.toSpherical(tc.sensor, tc.target, tc.k), tc.k);
      expectSamePosition(back, tc.target, `sphere.${tc.name}`);
    }
  });

  it("uses the configured default k-factor", () => {
    const tuned = createRadarEngine({ config: { kFactor: 1.2 }, logger: silentLogger });
    const { sensor, target } = cases[0] ?? { sensor: geodeticDeg(0, 0), target: geodeticDeg(0, 0) };
    expect(tuned.toSpherical(sensor, target).elevation.radians).toBe(
      engine.toSpherical(sensor, target, 1.2).elevation.radians
    );
    expect(engine.toSpherical(sensor, target).elevation.radians).toBe(
      engine.toSpherical(sensor, target, 4 / 3).elevation.radians
    );
  });
});

describe("radar engine: observations", () => {
  const sensor = geodeticDeg(0, 0, 100);
  const target = geodeticDeg(0.1, 0.1, 1000);

  it("builds an observation from bearing, chord and target altitude", () => {
    const o = engine.toObservation(sensor, target);
    expect(o.kind).toBe("observation");
    expect(o.azimuth.degrees).toBeCloseTo(45.19237938831004, 8);
    expect(o.range.meters).toBeCloseTo(15717.485443667601, 5);
    expect(o.altitude.meters).toBe(1000);
  });

  it("derives the same detection from an observation as from the target", () => {
    const fromTarget = engine.toSpherical(sensor, target);
    const fromObservation = engine.toSpherical(sensor, engine.toObservation(sensor, target));
    expect(fromObservation.elevation.radians).toBeCloseTo(fromTarget.elevation.radians, 12);
    expect(fromObservation.azimuth.radians).toBeCloseTo(fromTarget.azimuth.radians, 12);
    expect(fromObservation.range.meters).toBeCloseTo(fromTarget.range.meters, 9);
  });

  it("keeps the observed altitude when locating an observation", () => {
    const g = engine.toGeodetic(sensor, observationDeg(120, 40000, 3000));
    expect(g.alt.meters).toBeCloseTo(3000, 6);
    expectSamePosition(engine.toGeodetic(sensor, engine.toObservation(sensor, target)), target, "observation");
  });
});

describe("radar engine: batches", () => {
  const sensor = geodeticDeg(10, 45, 50);

  it("preserves input order", () => {
    const targets = [geodeticDeg(10.2, 45.1, 800), observationDeg(200, 30000, 1500), geodeticDeg(9.7, 44.8, 2500)];
    const batch = engine.toSphericals(sensor, targets, 1.25);
    expect(batch).toHaveLength(3);
    targets.forEach((target, i) => {
      expect(batch[i]?.range.meters, `#${i}`).toBe(engine.toSpherical(sensor, target, 1.25).range.meters);
      expect(batch[i]?.elevation.radians, `#${i}`).toBe(engine.toSpherical(sensor, target, 1.25).elevation.radians);
    });

    const detections = [sphericalDeg(10, 1, 20000), observationDeg(300, 15000, 900)];
    const located = engine.toGeodetics(sensor, detections);
    expect(located.map((g) => g.alt.meters)).toEqual(detections.map((d) => engine.toGeodetic(sensor, d).alt.meters));

    const geodeticTargets = [geodeticDeg(10.2, 45.1, 800), geodeticDeg(9.7, 44.8, 2500)];
    expect(engine.toObservations(sensor, geodeticTargets).map((o) => o.altitude.meters)).toEqual([800, 2500]);
  });

  it("returns empty arrays for empty input", () => {
    expect(engine.toSphericals(sensor, [])).toEqual([]);
    expect(engine.toGeodetics(sensor, [])).toEqual([]);
    expect(engine.toObservations(sensor, [])).toEqual([]);
  });
});

describe("radar engine: horizon", () => {
  it("is zero at sea level and grows with altitude and k", () => {
    const lat = Angle.deg(0);
    expect(engine.horizonDistance(Length.meters(0), lat).meters).toBe(0);
    expect(engine.horizonDistance(Length.meters(-20), lat).meters).toBe(0);
    expect(engine.horizonDistance(Length.meters(100), lat).meters).toBeCloseTo(41241.3207, 3);
    expect(engine.horizonDistance(Length.meters(100), lat, 1).meters).toBeCloseTo(35716.0664, 3);

    let previous = 0;
    for (const alt of [1, 10, 100, 1000, 10000]) {
      const d = engine.horizonDistance(Length.meters(alt), Angle.deg(52)).meters;
      expect(d, `alt=${alt}`).toBeGreaterThan(previous);
      previous = d;
    }
  });
});

describe("radar engine: weather", () => {
  const sensor = geodeticDeg(0, 0, 100);
  const target = geodeticDeg(0.1, 0.1, 1000);
  const sensorWeather: Weather = standardAtmosphere(Length.meters(100));

  it("derives k from both endpoints for toSphericalInWeather", () => {
    const targetWeather: Weather = {
      pressure: Pressure.hectopascals(898.75),
      temperature: Temperature.celsius(8.5),
      relativeHumidity: 50,
    };
    const k = kFactorFromProfile({ ...sensorWeather, height: sensor.alt }, { ...targetWeather, height: target.alt });
    const s = engine.toSphericalInWeather(sensor, sensorWeather, target, targetWeather);
    expect(s.elevation.radians).toBe(engine.toSpherical(sensor, target, k).elevation.radians);
  });

  it("converges the k-factor against the solved target altitude", () => {
    const detection = engine.toSpherical(sensor, target);
    const solution = engine.solveGeodeticInWeather(sensor, sensorWeather, detection);

    expect(solution.converged).toBe(true);
    expect(solution.iterations).toBeGreaterThan(1);
    expect(solution.iterations).toBeLessThanOrEqual(10);
    const site = { ...sensorWeather, height: sensor.alt };
    expect(Math.abs(kFactorFromSiteWeather(site, solution.position.alt) - solution.kFactor)).toBeLessThan(1e-6);
    expect(solution.position).toEqual(engine.toGeodetic(sensor, detection, solution.kFactor));
    expect(engine.toGeodeticInWeather(sensor, sensorWeather, detection)).toEqual(solution.position);
  });

  it("stops at the iteration cap and warns", () => {
    const warn = vi.fn();
    const capped = createRadarEngine({ config: { maxKIterations: 1 }, logger: { warn } });
    const detection = capped.toSpherical(sensor, target);
    const solution = capped.solveGeodeticInWeather(sensor, sensorWeather, detection);

    expect(solution.converged).toBe(false);
    expect(solution.iterations).toBe(1);
    expect(solution.kFactor).toBe(4 / 3);
    expect(solution.position).toEqual(capped.toGeodetic(sensor, detection, 4 / 3));
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("keeps the default cap when an override is explicitly undefined", () => {
    const warn = vi.fn();
    const loose = createRadarEngine({ config: { maxKIterations: undefined, kTolerance: 0 }, logger: { warn } });
    expect(loose.config.maxKIterations).toBe(10);

    const solution = loose.solveGeodeticInWeather(sensor, sensorWeather, loose.toSpherical(sensor, target));
    expect(solution.converged).toBe(false);
    expect(solution.iterations).toBe(10);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
