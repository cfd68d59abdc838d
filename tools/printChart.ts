import "dotenv/config";

import { loadAstroConfig } from "../astro/config.js";
import { computeBirthChart, type BirthContext } from "../astro/chart/computeBirthChart.js";
import { describeDashaTransitions, upcomingMahadashas } from "../astro/dasha/dashaTransitions.js";
import { InvalidInputError } from "../astro/errors.js";
import { withEphemeris } from "../astro/ephemeris/ephemerisProvider.js";
import { setAstroLogLevel } from "../logging/astroLog.js";

const USAGE =
  "usage: printChart --date=YYYY-MM-DD [--time=HH:mm] --lat=<deg> --lon=<deg> --tz=<IANA zone> [--levels=1..5] [--until=<ISO>]";

function readFlag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const match = args.find((a) => a.startsWith(prefix));
  return match === undefined ? undefined : match.slice(prefix.length);
}

function readNumber(args: string[], name: string): number | undefined {
  const raw = readFlag(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new InvalidInputError("arguments", [`--${name}: expected a number, got "${raw}"`]);
  }
  return value;
}

export function parseChartArgs(args: string[]): {
  birth: BirthContext;
  max_level?: number;
  until?: string;
} {
  const date = readFlag(args, "date");
  const latitude = readNumber(args, "lat");
  const longitude = readNumber(args, "lon");
  const timezone = readFlag(args, "tz");
  if (date === undefined || latitude === undefined || longitude === undefined || !timezone) {
    throw new InvalidInputError("arguments", [USAGE]);
  }

  return {
    birth: { date, time: readFlag(args, "time"), latitude, longitude, timezone },
    max_level: readNumber(args, "levels"),
    until: readFlag(args, "until"),
  };
}

async function main() {
  const config = loadAstroConfig();
  setAstroLogLevel(config.log_level);
  const request = parseChartArgs(process.argv.slice(2));

  const output = await withEphemeris(config, (provider) => {
    const chart = computeBirthChart({ ...request, provider });
    const now = new Date();
    return {
      chart,
      current_periods: describeDashaTransitions(chart.dasha, now),
      upcoming_mahadashas: upcomingMahadashas(chart.dasha, now),
    };
  });

  console.log(JSON.stringify(output, null, 2));
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    main().catch((err) => {
      console.error(err instanceof Error ? err.message : err);
      process.exit(1);
    });
  }
}
