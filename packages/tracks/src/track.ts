import { Length, ValidationError } from "@georadar/shared";
import type { Angle, Geodetic } from "@georadar/shared";
import type { EarthModel } from "@georadar/engine";
import type { FlightRoute, RouteLeg, TrackPoint } from "./types";

/** Time-ordered history of one aircraft. */
export class AircraftTrack {
  private readonly points: TrackPoint[] = [];

  constructor(readonly icao24: string) {}

  addPoint(point: TrackPoint): void {
    if (point.icao24 !== this.icao24) {
      throw new ValidationError(`Track point for ${point.icao24} does not belong to track ${this.icao24}`);
    }
    this.points.push(point);
  }

  latest(): TrackPoint | undefined {
    return this.points[this.points.length - 1];
  }

  get history(): readonly TrackPoint[] {
    return this.points;
  }

  get length(): number {
    return this.points.length;
  }
}

export function createFlightRoute(id: string, waypoints: readonly Geodetic[]): FlightRoute {
  if (waypoints.length < 2) {
    throw new ValidationError(`Route ${id} needs at least 2 waypoints, got ${waypoints.length}`);
  }
  return { id, waypoints: [...waypoints] };
}

export function routeLeg(route: FlightRoute, index: number): RouteLeg {
  const from = route.waypoints[index];
  const to = route.waypoints[index + 1];
  if (!Number.isInteger(index) || !from || !to) {
    throw new RangeError(`Route ${route.id} has no leg ${index} (legs: ${route.waypoints.length - 1})`);
  }
  return { index, from, to };
}

export type MeasuredLeg = RouteLeg & {
  distance: Length;
  bearing: Angle;
};

export function routeLegs(model: EarthModel, route: FlightRoute): MeasuredLeg[] {
  return route.waypoints.slice(1).map((_, i) => {
    const leg = routeLeg(route, i);
    return {
      ...leg,
      distance: model.surfaceDistance(leg.from, leg.to),
      bearing: model.initialBearing(leg.from, leg.to),
    };
  });
}

export function routeLength(model: EarthModel, route: FlightRoute): Length {
  return routeLegs(model, route).reduce((sum, leg) => sum.add(leg.distance), Length.meters(0));
}
