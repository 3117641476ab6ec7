// packages/shared/src/units.ts
export type WrapMode = "none" | "bound" | "cycle" | "bounce";

export type UnitDef = {
  readonly symbol: string;
  readonly factor: number; // base = value * factor + offset
  readonly offset?: number;
};

type UnitTable<U extends string> = Readonly<Record<U, UnitDef>>;

const DEG2RAD = Math.PI / 180;
const TWO_PI = 2 * Math.PI;

export const ANGLE_UNITS = {
  rad: { symbol: "rad", factor: 1 },
  deg: { symbol: "deg", factor: DEG2RAD },
  grad: { symbol: "gon", factor: Math.PI / 200 },
  arcmin: { symbol: "arcmin", factor: DEG2RAD / 60 },
  arcsec: { symbol: "arcsec", factor: DEG2RAD / 3600 },
} as const satisfies UnitTable<string>;

export const LENGTH_UNITS = {
  m: { symbol: "m", factor: 1 },
  km: { symbol: "km", factor: 1000 },
  ft: { symbol: "ft", factor: 0.3048 },
  nmi: { symbol: "NM", factor: 1852 },
  mi: { symbol: "mi", factor: 1609.344 },
  fl: { symbol: "FL", factor: 30.48 },
} as const satisfies UnitTable<string>;

export const PRESSURE_UNITS = {
  Pa: { symbol: "Pa", factor: 1 },
  hPa: { symbol: "hPa", factor: 100 },
  mbar: { symbol: "mbar", factor: 100 },
  kPa: { symbol: "kPa", factor: 1000 },
  atm: { symbol: "atm", factor: 101325 },
} as const satisfies UnitTable<string>;

export const TEMPERATURE_UNITS = {
  K: { symbol: "K", factor: 1 },
  degC: { symbol: "°C", factor: 1, offset: 273.15 },
  degF: { symbol: "°F", factor: 5 / 9, offset: (459.67 * 5) / 9 },
} as const satisfies UnitTable<string>;

export type AngleUnit = keyof typeof ANGLE_UNITS;
export type LengthUnit = keyof typeof LENGTH_UNITS;
export type PressureUnit = keyof typeof PRESSURE_UNITS;
export type TemperatureUnit = keyof typeof TEMPERATURE_UNITS;

function mod(value: number, period: number): number {
  const r = value % period;
  return r < 0 ? r + period : r;
}

/**
 * Brings `value` into [min, max] according to `mode`.
 *
 * - bound: clamp
 * - cycle: half-open [min, max), so `max` itself maps to `min`
 * - bounce: reflect off both ends
 *
 * Non-finite values are returned as-is so NaN sentinels survive.
 */
export function wrapValue(value: number, min: number, max: number, mode: WrapMode): number {
  if (mode === "none" || !Number.isFinite(value)) return value;
  const range = max - min;
  if (!(range > 0)) return value;

  switch (mode) {
    case "bound":
      return Math.min(max, Math.max(min, value));
    case "cycle": {
      if (value >= min && value < max) return value;
      // a tiny offset below min can round up to max
      const wrapped = min + mod(value - min, range);
      return wrapped >= max ? min : wrapped;
    }
    case "bounce": {
      if (value >= min && value <= max) return value;
      const r = mod(value - min, 2 * range);
      return r <= range ? min + r : max - (r - range);
    }
  }
}

export abstract class Quantity<U extends string, Q extends Quantity<U, Q>> {
  /** Value in the quantity's base unit (rad, m, Pa, K). */
  readonly base: number;

  protected constructor(
    readonly value: number,
    readonly unit: U,
    private readonly units: UnitTable<U>
  ) {
    const def = units[unit];
    this.base = value * def.factor + (def.offset ?? 0);
  }

  protected abstract make(value: number, unit: U): Q;

  in(unit: U): number {
    const def = this.units[unit];
    return (this.base - (def.offset ?? 0)) / def.factor;
  }

  to(unit: U): Q {
    return this.make(this.in(unit), unit);
  }

  /** Same unit as this quantity, new base value. */
  withBase(base: number): Q {
    const def = this.units[this.unit];
    return this.make((base - (def.offset ?? 0)) / def.factor, this.unit);
  }

  add(other: Q): Q {
    return this.withBase(this.base + other.base);
  }

  subtract(other: Q): Q {
    return this.withBase(this.base - other.base);
  }

  scale(factor: number): Q {
    return this.withBase(this.base * factor);
  }

  negate(): Q {
    return this.withBase(-this.base);
  }

  compareTo(other: Q): number {
    return this.base - other.base;
  }

  wrap(min: number, max: number, mode: WrapMode): Q {
    return this.withBase(wrapValue(this.base, min, max, mode));
  }

  isValid(): boolean {
    return Number.isFinite(this.base);
  }

  toString(digits = 3): string {
    return `${this.value.toFixed(digits)} ${this.units[this.unit].symbol}`;
  }

  toJSON(): { value: number; unit: U } {
    return { value: this.value, unit: this.unit };
  }
}

export class Angle extends Quantity<AngleUnit, Angle> {
  private constructor(value: number, unit: AngleUnit) {
    super(value, unit, ANGLE_UNITS);
  }

  static of(value: number, unit: AngleUnit): Angle {
    return new Angle(value, unit);
  }

  static rad(value: number): Angle {
    return new Angle(value, "rad");
  }

  static deg(value: number): Angle {
    return new Angle(value, "deg");
  }

  static longitude(deg: number): Angle {
    return Angle.deg(deg).asLongitude();
  }

  static latitude(deg: number): Angle {
    return Angle.deg(deg).asLatitude();
  }

  static azimuth(deg: number): Angle {
    return Angle.deg(deg).asAzimuth();
  }

  static elevation(deg: number): Angle {
    return Angle.deg(deg).asElevation();
  }

  protected make(value: number, unit: AngleUnit): Angle {
    return new Angle(value, unit);
  }

  get radians(): number {
    return this.base;
  }

  get degrees(): number {
    return this.in("deg");
  }

  sin(): number {
    return Math.sin(this.base);
  }

  cos(): number {
    return Math.cos(this.base);
  }

  tan(): number {
    return Math.tan(this.base);
  }

  // [-180°, 180°)
  asLongitude(): Angle {
    return this.wrap(-Math.PI, Math.PI, "cycle");
  }

  // [-90°, 90°], reflecting
  asLatitude(): Angle {
    return this.wrap(-Math.PI / 2, Math.PI / 2, "bounce");
  }

  // [0°, 360°)
  asAzimuth(): Angle {
    return this.wrap(0, TWO_PI, "cycle");
  }

  asElevation(): Angle {
    return this.wrap(-Math.PI / 2, Math.PI / 2, "bounce");
  }
}

export class Length extends Quantity<LengthUnit, Length> {
  private constructor(value: number, unit: LengthUnit) {
    super(value, unit, LENGTH_UNITS);
  }

  static of(value: number, unit: LengthUnit): Length {
    return new Length(value, unit);
  }

  static meters(value: number): Length {
    return new Length(value, "m");
  }

  static kilometers(value: number): Length {
    return new Length(value, "km");
  }

  protected make(value: number, unit: LengthUnit): Length {
    return new Length(value, unit);
  }

  get meters(): number {
    return this.base;
  }
}

export class Pressure extends Quantity<PressureUnit, Pressure> {
  private constructor(value: number, unit: PressureUnit) {
    super(value, unit, PRESSURE_UNITS);
  }

  static of(value: number, unit: PressureUnit): Pressure {
    return new Pressure(value, unit);
  }

  static pascals(value: number): Pressure {
    return new Pressure(value, "Pa");
  }

  static hectopascals(value: number): Pressure {
    return new Pressure(value, "hPa");
  }

  protected make(value: number, unit: PressureUnit): Pressure {
    return new Pressure(value, unit);
  }

  get pascals(): number {
    return this.base;
  }

  get hectopascals(): number {
    return this.in("hPa");
  }
}

export class Temperature extends Quantity<TemperatureUnit, Temperature> {
  private constructor(value: number, unit: TemperatureUnit) {
    super(value, unit, TEMPERATURE_UNITS);
  }

  static of(value: number, unit: TemperatureUnit): Temperature {
    return new Temperature(value, unit);
  }

  static kelvin(value: number): Temperature {
    return new Temperature(value, "K");
  }

  static celsius(value: number): Temperature {
    return new Temperature(value, "degC");
  }

  protected make(value: number, unit: TemperatureUnit): Temperature {
    return new Temperature(value, unit);
  }

  get kelvin(): number {
    return this.base;
  }

  get celsius(): number {
    return this.in("degC");
  }
}
