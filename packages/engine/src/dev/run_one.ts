import { geodeticDeg, observationDeg } from "@georadar/shared";
import { standardAtmosphere } from "../atmosphere/standard";
import { loadEngineConfig } from "../config";
import { createRadarEngine } from "../radar/engine";

declare const console: {
  log: (...args: unknown[]) => void;
};

const engine = createRadarEngine({ config: loadEngineConfig() });

const gibraltar = geodeticDeg(-5.3536, 36.1408, 120);
const target = geodeticDeg(-5.1, 36.4, 3500);

const detection = engine.toSpherical(gibraltar, target);
console.log(`Detection from Gibraltar (${engine.model.kind} model):`);
console.log(JSON.stringify(detection, null, 2));

console.log("\nLocated again:");
console.log(JSON.stringify(engine.toGeodetic(gibraltar, detection), null, 2));

console.log("\nObservation at 200°, 60 km, 4500 m:");
console.log(JSON.stringify(engine.toGeodetic(gibraltar, observationDeg(200, 60000, 4500)), null, 2));

const solution = engine.solveGeodeticInWeather(gibraltar, standardAtmosphere(gibraltar.alt), detection);
console.log("\nWeather solve:");
console.log(JSON.stringify({ kFactor: solution.kFactor, iterations: solution.iterations, converged: solution.converged }, null, 2));

console.log(`\nRadar horizon: ${engine.horizonDistance(gibraltar.alt, gibraltar.lat).to("km").toString(1)}`);
