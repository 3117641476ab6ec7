import { describe, expect, it } from "vitest";
import { ValidationError } from "@georadar/shared";
import { DEFAULT_ENGINE_CONFIG, loadEngineConfig, resolveEngineConfig } from "../src/config";
import { createRadarEngine } from "../src/radar/engine";
import { silentLogger } from "../src/log";

describe("loadEngineConfig", () => {
  it("returns defaults for an empty environment", () => {
    expect(loadEngineConfig({})).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(DEFAULT_ENGINE_CONFIG.kFactor).toBe(4 / 3);
    expect(DEFAULT_ENGINE_CONFIG.standardRelativeHumidity).toBe(60);
    expect(DEFAULT_ENGINE_CONFIG.centralAngleClamp).toBe("literal");
  });

  it("reads and coerces every variable", () => {
    const config = loadEngineConfig({
      GEORADAR_EARTH_MODEL: "spherical",
      GEORADAR_K_FACTOR: " 1.25 ",
      GEORADAR_STANDARD_RH: "40",
      GEORADAR_K_MAX_ITERATIONS: "7",
      GEORADAR_K_TOLERANCE: "1e-8",
      GEORADAR_CENTRAL_ANGLE_CLAMP: "unit",
      UNRELATED: "ignored",
    });
    expect(config).toEqual({
      earthModel: "spherical",
      kFactor: 1.25,
      standardRelativeHumidity: 40,
      maxKIterations: 7,
      kTolerance: 1e-8,
      centralAngleClamp: "unit",
    });
  });

  it("clamps the iteration cap", () => {
    expect(loadEngineConfig({ GEORADAR_K_MAX_ITERATIONS: "500" }).maxKIterations).toBe(50);
    expect(loadEngineConfig({ GEORADAR_K_MAX_ITERATIONS: "0" }).maxKIterations).toBe(1);
    expect(loadEngineConfig({ GEORADAR_K_MAX_ITERATIONS: "3.6" }).maxKIterations).toBe(4);
  });

  it("rejects invalid values", () => {
    expect(() => loadEngineConfig({ GEORADAR_EARTH_MODEL: "flat" })).toThrow(ValidationError);
    expect(() => loadEngineConfig({ GEORADAR_K_FACTOR: "-1" })).toThrow(/GEORADAR_K_FACTOR/);
    expect(() => loadEngineConfig({ GEORADAR_K_FACTOR: "abc" })).toThrow(ValidationError);
    expect(() => loadEngineConfig({ GEORADAR_STANDARD_RH: "120" })).toThrow(/GEORADAR_STANDARD_RH/);
    expect(() => loadEngineConfig({ GEORADAR_K_TOLERANCE: "" })).toThrow(ValidationError);
  });

  it("feeds the radar engine", () => {
    const engine = createRadarEngine({ config: loadEngineConfig({ GEORADAR_EARTH_MODEL: "spherical" }), logger: silentLogger });
    expect(engine.model.kind).toBe("spherical");
    expect(engine.config.maxKIterations).toBe(10);
  });
});

describe("resolveEngineConfig", () => {
  it("fills defaults per field, including explicit undefined overrides", () => {
    expect(resolveEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(resolveEngineConfig({ maxKIterations: undefined, kFactor: undefined })).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(resolveEngineConfig({ kFactor: 1.1, centralAngleClamp: "unit" })).toEqual({
      ...DEFAULT_ENGINE_CONFIG,
      kFactor: 1.1,
      centralAngleClamp: "unit",
    });
  });
});
