/**
 * observe_tracks.ts
 *
 * Loads a state-vector CSV and prints, per aircraft, what a radar at the given
 * site would report for its latest position.
 *
 * Run:  npx tsx scripts/observe_tracks.ts [tracks.csv]
 *
 * Env:  SENSOR_LAT, SENSOR_LON (degrees), SENSOR_ALT (m), TRACKS_CSV, plus the
 *       GEORADAR_* engine variables.
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import { geodeticDeg } from "@georadar/shared";
import { createRadarEngine, loadEngineConfig } from "@georadar/engine";
import { loadTrackCsv } from "../src/parse";
import { observeTrack } from "../src/observe";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function toNum(v: string | undefined, fallback: number): number {
  const n = Number(v);
  return v !== undefined && v.trim() !== "" && Number.isFinite(n) ? n : fallback;
}

function clamp(v: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, v));
}

const csvPath = path.resolve(
  process.argv[2] ?? process.env.TRACKS_CSV ?? path.resolve(__dirname, "../tests/fixtures/sample_tracks.csv")
);

const sensor = geodeticDeg(
  clamp(toNum(process.env.SENSOR_LON, -5.3536), -180, 180),
  clamp(toNum(process.env.SENSOR_LAT, 36.1408), -90, 90),
  toNum(process.env.SENSOR_ALT, 0)
);

const engine = createRadarEngine({ config: loadEngineConfig() });
const tracks = loadTrackCsv(csvPath);
const horizon = engine.horizonDistance(sensor.alt, sensor.lat);

console.log(`Loaded ${tracks.size} aircraft from ${csvPath}`);
console.log(`Sensor horizon: ${horizon.to("km").toString(1)} (${engine.model.kind} model)`);

for (const track of tracks.values()) {
  const observed = observeTrack(engine, sensor, track);
  const last = observed[observed.length - 1];
  if (!last) continue;

  console.log(
    JSON.stringify({
      icao24: track.icao24,
      points: track.length,
      time: last.timestamp.toISOString(),
      azimuthDeg: Number(last.detection.azimuth.degrees.toFixed(3)),
      elevationDeg: Number(last.detection.elevation.degrees.toFixed(3)),
      rangeKm: Number(last.detection.range.in("km").toFixed(3)),
      altitudeM: last.observation.altitude.meters,
    })
  );
}
