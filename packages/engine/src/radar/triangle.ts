import { Angle, Length } from "@georadar/shared";

/**
 * Upper bound applied to cos(γ) when the triangle is solved for elevation.
 *
 * - "literal": clamp to [-1, 1e-12], which pins γ at or above ~90° for short ranges
 * - "unit": clamp to [-1, 1]
 *
 * The elevation answer is identical in both modes; only the reported central
 * angle differs.
 */
export type CentralAngleClamp = "literal" | "unit";

export const LITERAL_COS_GAMMA_MAX = 1e-12;

type TriangleBase = {
  effectiveRadius: Length; // Reff = k * earthRadius(sensor lat)
  sensorAltitude: Length;
  slantRange: Length; // straight sensor-target chord
};

export type TriangleInput =
  | (TriangleBase & { solveFor: "targetAltitude"; elevation: Angle })
  | (TriangleBase & { solveFor: "elevation"; targetAltitude: Length });

export type TriangleSolution = {
  targetAltitude: Length;
  elevation: Angle;
  centralAngleRad: number; // at the Earth's center, between sensor and target
};

export type TriangleOptions = {
  centralAngleClamp?: CentralAngleClamp;
};

function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * Solves the Earth-center / sensor / target triangle on an Earth of effective
 * radius Reff, where the refracted ray is straight.
 */
export function solveRefractionTriangle(input: TriangleInput, options: TriangleOptions = {}): TriangleSolution {
  const re = input.effectiveRadius.base;
  const rc = re + input.sensorAltitude.base; // center to sensor
  const chord = input.slantRange.base;

  if (input.solveFor === "targetAltitude") {
    const rtSq = rc * rc + chord * chord + 2 * rc * chord * input.elevation.sin();
    const rt = Math.sqrt(rtSq);
    const cosGamma = (rc * rc + rtSq - chord * chord) / (2 * rc * rt);
    return {
      targetAltitude: Length.meters(rt - re),
      elevation: input.elevation,
      centralAngleRad: Math.acos(clamp(cosGamma, -1, 1)),
    };
  }

  const rt = re + input.targetAltitude.base; // center to target
  const cosGamma = (rc * rc + rt * rt - chord * chord) / (2 * rc * rt);
  const upper = options.centralAngleClamp === "unit" ? 1 : LITERAL_COS_GAMMA_MAX;
  const centralAngleRad = Math.acos(clamp(cosGamma, -1, upper));

  // A zero chord has no direction; report a level ray.
  if (chord === 0) {
    return { targetAltitude: input.targetAltitude, elevation: Angle.rad(0), centralAngleRad };
  }

  const sinBeta = (rt * rt - rc * rc - chord * chord) / (2 * rc * chord);
  return {
    targetAltitude: input.targetAltitude,
    elevation: Angle.rad(Math.asin(clamp(sinBeta, -1, 1))),
    centralAngleRad,
  };
}
