import { ValidationError } from "@georadar/shared";
import { z } from "zod";
import { STANDARD_K_FACTOR } from "./geo/constants";
import type { EarthModelKind } from "./geo/earth";
import { STANDARD_RELATIVE_HUMIDITY } from "./atmosphere/standard";
import type { CentralAngleClamp } from "./radar/triangle";

export type EngineConfig = {
  earthModel: EarthModelKind;
  kFactor: number; // used when a call supplies none
  standardRelativeHumidity: number;
  maxKIterations: number;
  kTolerance: number;
  centralAngleClamp: CentralAngleClamp;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  earthModel: "ellipsoidal",
  kFactor: STANDARD_K_FACTOR,
  standardRelativeHumidity: STANDARD_RELATIVE_HUMIDITY,
  maxKIterations: 10,
  kTolerance: 1e-6,
  centralAngleClamp: "literal",
};

/** Defaults filled in per field, so an explicit `undefined` override keeps the default. */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  return {
    earthModel: overrides.earthModel ?? d.earthModel,
    kFactor: overrides.kFactor ?? d.kFactor,
    standardRelativeHumidity: overrides.standardRelativeHumidity ?? d.standardRelativeHumidity,
    maxKIterations: overrides.maxKIterations ?? d.maxKIterations,
    kTolerance: overrides.kTolerance ?? d.kTolerance,
    centralAngleClamp: overrides.centralAngleClamp ?? d.centralAngleClamp,
  };
}

export type Env = Record<string, string | undefined>;

const optionalNumber = z.string().trim().min(1).pipe(z.coerce.number().finite()).optional();

const EnvSchema = z.object({
  GEORADAR_EARTH_MODEL: z.enum(["ellipsoidal", "spherical"]).optional(),
  GEORADAR_K_FACTOR: optionalNumber.refine((v) => v === undefined || v > 0, "must be positive"),
  GEORADAR_STANDARD_RH: optionalNumber.refine((v) => v === undefined || (v >= 0 && v <= 100), "must be within [0, 100]"),
  GEORADAR_K_MAX_ITERATIONS: optionalNumber,
  GEORADAR_K_TOLERANCE: optionalNumber.refine((v) => v === undefined || v > 0, "must be positive"),
  GEORADAR_CENTRAL_ANGLE_CLAMP: z.enum(["literal", "unit"]).optional(),
});

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

function processEnv(): Env {
  return typeof process !== "undefined" ? process.env : {};
}

/** Engine configuration from GEORADAR_* environment variables. */
export function loadEngineConfig(env: Env = processEnv()): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ValidationError(`Invalid engine configuration: ${details}`);
  }

  const vars = parsed.data;
  const d = DEFAULT_ENGINE_CONFIG;
  return {
    earthModel: vars.GEORADAR_EARTH_MODEL ?? d.earthModel,
    kFactor: vars.GEORADAR_K_FACTOR ?? d.kFactor,
    standardRelativeHumidity: vars.GEORADAR_STANDARD_RH ?? d.standardRelativeHumidity,
    maxKIterations: clamp(Math.round(vars.GEORADAR_K_MAX_ITERATIONS ?? d.maxKIterations), 1, 50),
    kTolerance: vars.GEORADAR_K_TOLERANCE ?? d.kTolerance,
    centralAngleClamp: vars.GEORADAR_CENTRAL_ANGLE_CLAMP ?? d.centralAngleClamp,
  };
}
