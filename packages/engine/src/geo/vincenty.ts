import { WGS84_A, WGS84_B, WGS84_F } from "./constants";

export type Ellipsoid = {
  a: number; // semi-major axis (m)
  b: number; // semi-minor axis (m)
  f: number; // flattening
};

export const WGS84: Ellipsoid = { a: WGS84_A, b: WGS84_B, f: WGS84_F };

export const VINCENTY_TOLERANCE = 1e-12;
export const VINCENTY_MAX_ITERATIONS = 100;

export type VincentyOptions = {
  tolerance?: number;
  maxIterations?: number;
};

export type VincentyInverseResult =
  | {
      ok: true;
      distanceM: number;
      initialBearingRad: number; // [0, 2π)
      finalBearingRad: number;
      iterations: number;
    }
  | { ok: false; iterations: number };

export type VincentyDirectResult =
  | {
      ok: true;
      latRad: number;
      lonRad: number;
      finalBearingRad: number;
      iterations: number;
    }
  | { ok: false; iterations: number };

const TWO_PI = 2 * Math.PI;

function normalizeBearing(theta: number): number {
  const r = theta % TWO_PI;
  return r < 0 ? r + TWO_PI : r;
}

// Series coefficients shared by the inverse and direct problems.
function seriesAB(cosSqAlpha: number, e: Ellipsoid): { A: number; B: number } {
  const uSq = (cosSqAlpha * (e.a * e.a - e.b * e.b)) / (e.b * e.b);
  const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
  const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
  return { A, B };
}

function deltaSigma(B: number, sinSigma: number, cosSigma: number, cos2SigmaM: number): number {
  const c2 = cos2SigmaM * cos2SigmaM;
  return (
    B *
    sinSigma *
    (cos2SigmaM +
      (B / 4) *
        (cosSigma * (-1 + 2 * c2) - (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma * sinSigma) * (-3 + 4 * c2)))
  );
}

/**
 * Vincenty's inverse formula. Coincident points return a zero distance; nearly
 * antipodal points may fail to converge (`ok: false`).
 */
export function vincentyInverse(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
  ellipsoid: Ellipsoid = WGS84,
  options: VincentyOptions = {}
): VincentyInverseResult {
  const tol = options.tolerance ?? VINCENTY_TOLERANCE;
  const maxIter = options.maxIterations ?? VINCENTY_MAX_ITERATIONS;
  const { f } = ellipsoid;

  if (lat1 === lat2 && lon1 === lon2) {
    return { ok: true, distanceM: 0, initialBearingRad: 0, finalBearingRad: 0, iterations: 0 };
  }

  const L = lon2 - lon1;
  const U1 = Math.atan((1 - f) * Math.tan(lat1));
  const U2 = Math.atan((1 - f) * Math.tan(lat2));
  const sinU1 = Math.sin(U1);
  const cosU1 = Math.cos(U1);
  const sinU2 = Math.sin(U2);
  const cosU2 = Math.cos(U2);

  let lambda = L;

  for (let i = 0; i < maxIter; i++) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);
    const t = cosU1 * sinU2 - sinU1 * cosU2 * cosLambda;
    const sinSigma = Math.sqrt((cosU2 * sinLambda) ** 2 + t * t);
    const cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;

    if (sinSigma === 0) {
      if (cosSigma > 0) {
        return { ok: true, distanceM: 0, initialBearingRad: 0, finalBearingRad: 0, iterations: i + 1 };
      }
      return { ok: false, iterations: i + 1 };
    }

    const sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    const cosSqAlpha = 1 - sinAlpha * sinAlpha;
    // Equatorial line: cosSqAlpha = 0
    const cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;
    const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
    const lambdaPrev = lambda;
    lambda =
      L +
      (1 - C) *
        f *
        sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

    if (Math.abs(lambda - lambdaPrev) <= tol) {
      const { A, B } = seriesAB(cosSqAlpha, ellipsoid);
      const s = ellipsoid.b * A * (sigma - deltaSigma(B, sinSigma, cosSigma, cos2SigmaM));
      const sinL = Math.sin(lambda);
      const cosL = Math.cos(lambda);
      const alpha1 = Math.atan2(cosU2 * sinL, cosU1 * sinU2 - sinU1 * cosU2 * cosL);
      const alpha2 = Math.atan2(cosU1 * sinL, -sinU1 * cosU2 + cosU1 * sinU2 * cosL);
      return {
        ok: true,
        distanceM: s,
        initialBearingRad: normalizeBearing(alpha1),
        finalBearingRad: normalizeBearing(alpha2),
        iterations: i + 1,
      };
    }
  }

  return { ok: false, iterations: maxIter };
}

/** Vincenty's direct formula: endpoint from a start point, bearing and distance. */
export function vincentyDirect(
  lat1: number,
  lon1: number,
  bearing: number,
  distanceM: number,
  ellipsoid: Ellipsoid = WGS84,
  options: VincentyOptions = {}
): VincentyDirectResult {
  const tol = options.tolerance ?? VINCENTY_TOLERANCE;
  const maxIter = options.maxIterations ?? VINCENTY_MAX_ITERATIONS;
  const { f, b } = ellipsoid;

  const sinAlpha1 = Math.sin(bearing);
  const cosAlpha1 = Math.cos(bearing);
  const tanU1 = (1 - f) * Math.tan(lat1);
  const cosU1 = 1 / Math.sqrt(1 + tanU1 * tanU1);
  const sinU1 = tanU1 * cosU1;
  const sigma1 = Math.atan2(tanU1, cosAlpha1);
  const sinAlpha = cosU1 * sinAlpha1;
  const cosSqAlpha = 1 - sinAlpha * sinAlpha;
  const { A, B } = seriesAB(cosSqAlpha, ellipsoid);

  const sigma0 = distanceM / (b * A);
  let sigma = sigma0;
  let iterations = 0;
  let converged = false;

  while (iterations < maxIter) {
    iterations++;
    const cos2SigmaM = Math.cos(2 * sigma1 + sigma);
    const sigmaPrev = sigma;
    sigma = sigma0 + deltaSigma(B, Math.sin(sigma), Math.cos(sigma), cos2SigmaM);
    if (Math.abs(sigma - sigmaPrev) <= tol) {
      converged = true;
      break;
    }
  }

  if (!converged) return { ok: false, iterations };

  const sinSigma = Math.sin(sigma);
  const cosSigma = Math.cos(sigma);
  const cos2SigmaM = Math.cos(2 * sigma1 + sigma);
  const tmp = sinU1 * sinSigma - cosU1 * cosSigma * cosAlpha1;
  const lat2 = Math.atan2(
    sinU1 * cosSigma + cosU1 * sinSigma * cosAlpha1,
    (1 - f) * Math.sqrt(sinAlpha * sinAlpha + tmp * tmp)
  );
  const lambda = Math.atan2(sinSigma * sinAlpha1, cosU1 * cosSigma - sinU1 * sinSigma * cosAlpha1);
  const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
  const L =
    lambda -
    (1 - C) *
      f *
      sinAlpha *
      (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

  return {
    ok: true,
    latRad: lat2,
    lonRad: lon1 + L,
    finalBearingRad: normalizeBearing(Math.atan2(sinAlpha, -tmp)),
    iterations,
  };
}
