import { Angle, DegenerateVectorError, Length, ValidationError, wrapValue } from "@georadar/shared";
import type { Spherical, WrapMode } from "@georadar/shared";

export const VECTOR_EPSILON = 1e-10;

export type Vec3Like = {
  readonly x: Length;
  readonly y: Length;
  readonly z: Length;
};

function requireLength(value: unknown, label: string): Length {
  if (!(value instanceof Length)) throw new ValidationError(`vector.${label} must be a Length`);
  return value;
}

function requireNonZero(value: number, op: string): number {
  if (Math.abs(value) < VECTOR_EPSILON) {
    throw new DegenerateVectorError(`${op}: denominator ${value} is below ${VECTOR_EPSILON}`);
  }
  return value;
}

/**
 * Three length components with the shared algebra. Every operation works on base
 * meters and rebuilds the concrete subtype through `create`.
 */
export abstract class Vector3<T extends Vector3<T>> implements Vec3Like {
  readonly x: Length;
  readonly y: Length;
  readonly z: Length;

  constructor(x: Length, y: Length, z: Length) {
    this.x = requireLength(x, "x");
    this.y = requireLength(y, "y");
    this.z = requireLength(z, "z");
  }

  protected abstract create(x: Length, y: Length, z: Length): T;

  protected fromBase(x: number, y: number, z: number): T {
    return this.create(this.x.withBase(x), this.y.withBase(y), this.z.withBase(z));
  }

  toArray(): [number, number, number] {
    return [this.x.base, this.y.base, this.z.base];
  }

  add(other: Vec3Like): T {
    return this.fromBase(this.x.base + other.x.base, this.y.base + other.y.base, this.z.base + other.z.base);
  }

  subtract(other: Vec3Like): T {
    return this.fromBase(this.x.base - other.x.base, this.y.base - other.y.base, this.z.base - other.z.base);
  }

  scale(factor: number): T {
    return this.fromBase(this.x.base * factor, this.y.base * factor, this.z.base * factor);
  }

  negate(): T {
    return this.scale(-1);
  }

  divide(divisor: number): T {
    requireNonZero(divisor, "divide");
    return this.scale(1 / divisor);
  }

  /** Component-wise quotient. */
  ratio(other: Vec3Like): T {
    return this.fromBase(
      this.x.base / requireNonZero(other.x.base, "ratio.x"),
      this.y.base / requireNonZero(other.y.base, "ratio.y"),
      this.z.base / requireNonZero(other.z.base, "ratio.z")
    );
  }

  /** Component-wise reciprocal. */
  invert(): T {
    return this.fromBase(
      1 / requireNonZero(this.x.base, "invert.x"),
      1 / requireNonZero(this.y.base, "invert.y"),
      1 / requireNonZero(this.z.base, "invert.z")
    );
  }

  dot(other: Vec3Like): number {
    return this.x.base * other.x.base + this.y.base * other.y.base + this.z.base * other.z.base;
  }

  cross(other: Vec3Like): T {
    const [ax, ay, az] = this.toArray();
    const bx = other.x.base;
    const by = other.y.base;
    const bz = other.z.base;
    return this.fromBase(ay * bz - az * by, az * bx - ax * bz, ax * by - ay * bx);
  }

  magnitude(): number {
    return Math.hypot(this.x.base, this.y.base, this.z.base);
  }

  distanceTo(other: Vec3Like): Length {
    return Length.meters(
      Math.hypot(this.x.base - other.x.base, this.y.base - other.y.base, this.z.base - other.z.base)
    );
  }

  normalize(): T {
    return this.divide(requireNonZero(this.magnitude(), "normalize"));
  }

  angleTo(other: Vec3Like): Angle {
    const otherMagnitude = Math.hypot(other.x.base, other.y.base, other.z.base);
    const denom = requireNonZero(this.magnitude() * otherMagnitude, "angleTo");
    const c = Math.max(-1, Math.min(1, this.dot(other) / denom));
    return Angle.rad(Math.acos(c));
  }

  clamp(min: number, max: number, mode: WrapMode = "bound"): T {
    return this.fromBase(
      wrapValue(this.x.base, min, max, mode),
      wrapValue(this.y.base, min, max, mode),
      wrapValue(this.z.base, min, max, mode)
    );
  }

  isZero(eps = VECTOR_EPSILON): boolean {
    return this.magnitude() < eps;
  }

  /** True when any single component is within `eps` of zero. */
  isAnyZero(eps = VECTOR_EPSILON): boolean {
    return this.toArray().some((c) => Math.abs(c) < eps);
  }

  equals(other: Vec3Like, eps = VECTOR_EPSILON): boolean {
    return (
      Math.abs(this.x.base - other.x.base) < eps &&
      Math.abs(this.y.base - other.y.base) < eps &&
      Math.abs(this.z.base - other.z.base) < eps
    );
  }

  isValid(): boolean {
    return this.x.isValid() && this.y.isValid() && this.z.isValid();
  }

  toString(): string {
    return `(${this.x.toString()}, ${this.y.toString()}, ${this.z.toString()})`;
  }
}

export class Cartesian extends Vector3<Cartesian> {
  static meters(x: number, y: number, z: number): Cartesian {
    return new Cartesian(Length.meters(x), Length.meters(y), Length.meters(z));
  }

  static zero(): Cartesian {
    return Cartesian.meters(0, 0, 0);
  }

  /** Inverse of `toSpherical`: azimuth from +x toward +y, elevation from the xy-plane. */
  static fromSpherical(s: Spherical): Cartesian {
    const r = s.range.base;
    const cosEl = s.elevation.cos();
    return Cartesian.meters(r * cosEl * s.azimuth.cos(), r * cosEl * s.azimuth.sin(), r * s.elevation.sin());
  }

  protected create(x: Length, y: Length, z: Length): Cartesian {
    return new Cartesian(x, y, z);
  }

  toSpherical(): Spherical {
    const r = this.magnitude();
    if (r < VECTOR_EPSILON) {
      return { kind: "spherical", azimuth: Angle.rad(0), elevation: Angle.rad(0), range: Length.meters(0) };
    }
    const [x, y, z] = this.toArray();
    return {
      kind: "spherical",
      azimuth: Angle.rad(Math.atan2(y, x)).asAzimuth(),
      elevation: Angle.rad(Math.asin(Math.max(-1, Math.min(1, z / r)))),
      range: Length.meters(r),
    };
  }
}

/** Position in the Earth-centered, Earth-fixed frame. */
export class Geocentric extends Vector3<Geocentric> {
  static meters(x: number, y: number, z: number): Geocentric {
    return new Geocentric(Length.meters(x), Length.meters(y), Length.meters(z));
  }

  protected create(x: Length, y: Length, z: Length): Geocentric {
    return new Geocentric(x, y, z);
  }

  /** Offset from `origin` to this position. */
  offsetFrom(origin: Vec3Like): Cartesian {
    return new Cartesian(this.x, this.y, this.z).subtract(origin);
  }

  translate(offset: Vec3Like): Geocentric {
    return this.add(offset);
  }
}

/** Displacement in a local East-North-Up tangent frame. */
export class EnuVector extends Vector3<EnuVector> {
  static meters(east: number, north: number, up: number): EnuVector {
    return new EnuVector(Length.meters(east), Length.meters(north), Length.meters(up));
  }

  protected create(x: Length, y: Length, z: Length): EnuVector {
    return new EnuVector(x, y, z);
  }

  get east(): Length {
    return this.x;
  }

  get north(): Length {
    return this.y;
  }

  get up(): Length {
    return this.z;
  }

  /** Look angles with a compass azimuth (clockwise from north). */
  toSpherical(): Spherical {
    const r = this.magnitude();
    if (r < VECTOR_EPSILON) {
      return { kind: "spherical", azimuth: Angle.rad(0), elevation: Angle.rad(0), range: Length.meters(0) };
    }
    const [e, n, u] = this.toArray();
    return {
      kind: "spherical",
      azimuth: Angle.rad(Math.atan2(e, n)).asAzimuth(),
      elevation: Angle.rad(Math.asin(Math.max(-1, Math.min(1, u / r)))),
      range: Length.meters(r),
    };
  }
}
