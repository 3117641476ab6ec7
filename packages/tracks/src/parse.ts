import fs from "node:fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { ValidationError, geodeticDeg } from "@georadar/shared";
import { consoleLogger } from "@georadar/engine";
import type { Logger } from "@georadar/engine";
import { AircraftTrack } from "./track";
import type { TrackPoint } from "./types";

const numeric = z.string().trim().min(1).pipe(z.coerce.number().finite());

const TrackRowSchema = z.object({
  time: numeric.pipe(z.number().int()), // unix seconds
  icao24: z.string().trim().min(1).toLowerCase(),
  lat: numeric.pipe(z.number().min(-90).max(90)),
  lon: numeric.pipe(z.number().min(-180).max(180)),
  baro_altitude: numeric, // m
  on_ground: z
    .string()
    .optional()
    .transform((v) => v?.trim().toLowerCase() === "true"),
  velocity: numeric, // m/s
  vertical_rate: numeric, // m/s
});

export type TrackRow = z.infer<typeof TrackRowSchema>;

export type ParseTrackOptions = {
  logger?: Logger;
};

export function toTrackPoint(row: TrackRow): TrackPoint {
  return {
    timestamp: new Date(row.time * 1000),
    icao24: row.icao24,
    position: geodeticDeg(row.lon, row.lat, row.baro_altitude),
    onGround: row.on_ground,
    velocityMs: row.velocity,
    verticalRateMs: row.vertical_rate,
  };
}

function readRecords(text: string): unknown[] {
  try {
    return parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new ValidationError(`Unreadable track CSV: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Groups state-vector rows by aircraft. Rows that fail validation are skipped
 * with a warning; tracks keep first-seen order.
 */
export function parseTrackCsv(text: string, options: ParseTrackOptions = {}): Map<string, AircraftTrack> {
  const logger = options.logger ?? consoleLogger;
  const tracks = new Map<string, AircraftTrack>();

  readRecords(text).forEach((record, i) => {
    const parsed = TrackRowSchema.safeParse(record);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      logger.warn(`[@georadar/tracks] skipping record ${i + 1}: ${reason}`);
      return;
    }

    const point = toTrackPoint(parsed.data);
    let track = tracks.get(point.icao24);
    if (!track) {
      track = new AircraftTrack(point.icao24);
      tracks.set(point.icao24, track);
    }
    track.addPoint(point);
  });

  return tracks;
}

export function loadTrackCsv(pathname: string, options: ParseTrackOptions = {}): Map<string, AircraftTrack> {
  return parseTrackCsv(fs.readFileSync(pathname, "utf8"), options);
}
