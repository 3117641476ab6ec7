import type { Geodetic } from "@georadar/shared";

export type TrackPoint = {
  timestamp: Date;
  icao24: string; // 24-bit transponder address, hex
  position: Geodetic; // barometric altitude
  onGround: boolean;
  velocityMs: number;
  verticalRateMs: number;
};

export type FlightRoute = {
  id: string;
  waypoints: readonly Geodetic[];
};

export type RouteLeg = {
  index: number;
  from: Geodetic;
  to: Geodetic;
};
