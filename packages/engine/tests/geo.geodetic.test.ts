import { describe, expect, it } from "vitest";
import { geodeticDeg } from "@georadar/shared";
import { MEAN_EARTH_RADIUS_M, WGS84_A } from "../src/geo/constants";
import { createEllipsoidalModel } from "../src/geo/ellipsoid";
import {
  altitudeDifference,
  chordDistance,
  ecefDisplacement,
  elevationAngle,
  haversineDistance,
  localDisplacement,
  lookAngles,
  translate,
  translateLocal,
} from "../src/geo/geodetic";
import { createSphericalModel } from "../src/geo/sphere";
import { Cartesian, EnuVector } from "../src/math/vector";

const wgs84 = createEllipsoidalModel();
const sphere = createSphericalModel();

describe("geodetic helpers with an explicit Earth model", () => {
  it("measures chord distances in 3D", () => {
    expect(chordDistance(wgs84, geodeticDeg(0, 0, 0), geodeticDeg(0, 0, 1000)).meters).toBeCloseTo(1000, 6);
    expect(chordDistance(wgs84, geodeticDeg(0, 0), geodeticDeg(90, 0)).meters).toBeCloseTo(WGS84_A * Math.SQRT2, 5);
  });

  it("gives ECEF and local displacements between points", () => {
    const from = geodeticDeg(0, 0, 0);
    const to = geodeticDeg(0, 0, 250);
    const ecef = ecefDisplacement(wgs84, from, to);
    expect(ecef).toBeInstanceOf(Cartesian);
    expect(ecef.toArray()[0]).toBeCloseTo(250, 6);

    const enu = localDisplacement(wgs84, from, to);
    expect(enu).toBeInstanceOf(EnuVector);
    expect(enu.up.meters).toBeCloseTo(250, 6);
    expect(enu.east.meters).toBeCloseTo(0, 6);
    expect(enu.north.meters).toBeCloseTo(0, 6);
  });

  it("computes geometric look angles", () => {
    const overhead = lookAngles(wgs84, geodeticDeg(10, 20, 0), geodeticDeg(10, 20, 1000));
    expect(overhead.elevation.degrees).toBeCloseTo(90, 6);
    expect(overhead.range.meters).toBeCloseTo(1000, 6);

    const east = lookAngles(wgs84, geodeticDeg(0, 0, 0), geodeticDeg(0.01, 0, 0));
    expect(east.azimuth.degrees).toBeCloseTo(90, 6);
    expect(east.elevation.degrees).toBeLessThan(0);
  });

  it("translates along ECEF and local offsets", () => {
    const p = geodeticDeg(-5.3536, 36.1408, 10);
    const up = translateLocal(wgs84, p, EnuVector.meters(0, 0, 500));
    expect(up.lat.degrees).toBeCloseTo(36.1408, 9);
    expect(up.lon.degrees).toBeCloseTo(-5.3536, 9);
    expect(up.alt.meters).toBeCloseTo(510, 6);

    const shifted = translate(wgs84, geodeticDeg(0, 0, 0), Cartesian.meters(300, 0, 0));
    expect(shifted.alt.meters).toBeCloseTo(300, 6);

    const east = translateLocal(wgs84, geodeticDeg(0, 0, 0), EnuVector.meters(1000, 0, 0));
    expect(east.lon.degrees).toBeGreaterThan(0);
    expect(east.lat.degrees).toBeCloseTo(0, 9);
  });

  it("computes elevation against the surface distance", () => {
    const base = geodeticDeg(0, 0, 0);
    expect(elevationAngle(sphere, base, geodeticDeg(0, 0, 50)).degrees).toBeCloseTo(90, 12);
    expect(elevationAngle(sphere, base, geodeticDeg(0, 0, -50)).degrees).toBeCloseTo(-90, 12);

    const oneDegree = MEAN_EARTH_RADIUS_M * (Math.PI / 180);
    expect(elevationAngle(sphere, base, geodeticDeg(1, 0, oneDegree)).degrees).toBeCloseTo(45, 9);
  });

  it("reports altitude differences and haversine distances", () => {
    expect(altitudeDifference(geodeticDeg(0, 0, 100), geodeticDeg(1, 1, 350)).meters).toBe(250);
    expect(haversineDistance(geodeticDeg(0, 0), geodeticDeg(0, 1)).meters).toBeCloseTo(
      MEAN_EARTH_RADIUS_M * (Math.PI / 180),
      6
    );
    expect(haversineDistance(geodeticDeg(0, 0), geodeticDeg(0, 1), 1000).meters).toBeCloseTo(
      1000 * (Math.PI / 180),
      12
    );
  });
});
