import type { Geodetic, Observation, Spherical } from "@georadar/shared";
import type { RadarEngine } from "@georadar/engine";
import type { AircraftTrack } from "./track";

export type TrackObservation = {
  timestamp: Date;
  icao24: string;
  observation: Observation;
  detection: Spherical;
};

/** What the sensor sees of each track point, in track order. */
export function observeTrack(
  engine: RadarEngine,
  sensor: Geodetic,
  track: AircraftTrack,
  kFactor?: number
): TrackObservation[] {
  const positions = track.history.map((point) => point.position);
  const observations = engine.toObservations(sensor, positions);
  const detections = engine.toSphericals(sensor, positions, kFactor);

  return track.history.map((point, i) => {
    const observation = observations[i];
    const detection = detections[i];
    if (!observation || !detection) throw new RangeError(`no detection for track point ${i}`);
    return { timestamp: point.timestamp, icao24: point.icao24, observation, detection };
  });
}

