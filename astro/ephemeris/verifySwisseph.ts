// Dev-only diagnostic to validate Swiss Ephemeris data availability.
import "dotenv/config";
import { loadAstroConfig } from "../config.js";
import { createInstant } from "../instant.js";
import { SwissEphemeris } from "./swisseph.js";

const config = loadAstroConfig();
const ephemeris = SwissEphemeris.open(config.ephe_path);

try {
  const instant = createInstant({
    utc: "2025-12-17T12:00:00Z",
    latitude: 0,
    longitude: 0,
  });
  const set = ephemeris.positions(instant, "sidereal");
  const sun = set.bodies.sun;

  console.log("[swisseph] OK");
  console.log(`JD: ${set.julian_day}`);
  console.log(`Ayanamsha: ${set.ayanamsha_deg?.toFixed(4)}°`);
  console.log(
    `Sun: ${sun.longitude.toFixed(2)}°  speed: ${sun.speed_deg_per_day.toFixed(2)}°/day`
  );
} finally {
  ephemeris.close();
}
