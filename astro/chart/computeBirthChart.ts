import { DateTime } from "luxon";
import { z } from "zod";
import { astroLogHelpers } from "../../logging/astroLog.js";
import { normalizeDegrees, signOf, type SignName } from "../angles.js";
import { findAspects, findChartAspects, type AspectEvent } from "../aspects/computeAspects.js";
import { classifyPulse, type PulseReading } from "../aspects/classifyPulse.js";
import { ASPECT_POLICY_V1, type OrbTable } from "../aspects/policy/aspectPolicy.v1.js";
import { assembleDashaTimeline, type DashaTimeline } from "../dasha/assembleDashaTimeline.js";
import { tropicalAscendant } from "../ephemeris/houses.js";
import type { Accuracy, EphemerisProvider, PositionSet } from "../ephemeris/types.js";
import { InvalidInputError } from "../errors.js";
import {
  createInstant,
  LatitudeSchema,
  LongitudeSchema,
  TimezoneSchema,
  type Instant,
  type UtcInput,
} from "../instant.js";
import { nakshatraFromLongitude, type NakshatraInfo } from "../nakshatra/nakshatra.js";
import { scorePlanetaryStrength, type StrengthReport } from "../strength/scorePlanetaryStrength.js";
import { parseInput } from "../validation.js";

/** Local clock time used to place a chart when the birth time is unknown */
const UNKNOWN_TIME_PLACEHOLDER = "12:00";

export const BirthContextSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD"),
  time: z
    .string()
    .regex(/^\d{2}:\d{2}(:\d{2})?$/, "expected HH:mm or HH:mm:ss")
    .nullable()
    .optional(),
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
  timezone: TimezoneSchema,
});

export type BirthContext = z.input<typeof BirthContextSchema>;

export interface ResolvedBirth {
  instant: Instant;
  /** Local wall-clock time as given, ISO without offset */
  local: string;
  time_known: boolean;
}

export interface Ascendant {
  tropical: number;
  sidereal: number;
  sign: SignName;
}

export interface BirthChart {
  birth: {
    utc: string;
    local: string;
    timezone: string;
    latitude: number;
    longitude: number;
    time_known: boolean;
  };
  accuracy: Accuracy;
  tropical: PositionSet;
  sidereal: PositionSet;
  /** null when the birth time is unknown */
  ascendant: Ascendant | null;
  nakshatra: NakshatraInfo;
  dasha: DashaTimeline;
  strength: StrengthReport;
  aspects: AspectEvent[];
}

export interface Synastry {
  events: AspectEvent[];
  pulse: PulseReading;
}

/**
 * Local date and time in an IANA zone to a UTC instant. A missing time is
 * placed at local noon and flagged.
 */
export function resolveBirthInstant(context: BirthContext): ResolvedBirth {
  const parsed = parseInput(BirthContextSchema, context, "birth context");
  const timeKnown = parsed.time !== undefined && parsed.time !== null;
  const time = parsed.time ?? UNKNOWN_TIME_PLACEHOLDER;
  const local = DateTime.fromISO(`${parsed.date}T${time}`, { zone: parsed.timezone });

  if (!local.isValid) {
    throw new InvalidInputError("birth context", [
      `date/time: ${local.invalidExplanation ?? local.invalidReason ?? "not a valid local time"}`,
    ]);
  }

  const instant = createInstant({
    utc: local.toJSDate(),
    latitude: parsed.latitude,
    longitude: parsed.longitude,
    timezone: parsed.timezone,
  });

  return {
    instant,
    local: local.toISO({ includeOffset: false }) ?? `${parsed.date}T${time}`,
    time_known: timeKnown,
  };
}

/**
 * Positions, ascendant, nakshatra, dasha timeline, strength and natal
 * aspects for one birth.
 */
export function computeBirthChart(params: {
  birth: BirthContext;
  provider: EphemerisProvider;
  until?: UtcInput;
  max_level?: number;
  orbs?: OrbTable;
}): BirthChart {
  const startedAt = Date.now();
  let birthUtc: string | undefined;

  try {
    const resolved = resolveBirthInstant(params.birth);
    const instant = resolved.instant;
    birthUtc = instant.utc;

    const tropical = params.provider.positions(instant, "tropical");
    const sidereal = params.provider.positions(instant, "sidereal");

    let ascendant: Ascendant | null = null;
    if (resolved.time_known) {
      const tropicalAsc = tropicalAscendant(instant.julian_day, instant.latitude, instant.longitude);
      const siderealAsc = normalizeDegrees(tropicalAsc - params.provider.ayanamsha(instant));
      ascendant = { tropical: tropicalAsc, sidereal: siderealAsc, sign: signOf(siderealAsc) };
    }

    const moon = sidereal.bodies.moon.longitude;
    const dasha = assembleDashaTimeline({
      birth: instant.utc,
      moon_sidereal_longitude: moon,
      until: params.until,
      max_level: params.max_level,
    });
    astroLogHelpers.dashaAssembled({
      birth_utc: instant.utc,
      period_count: dasha.periods.length,
      max_level: dasha.max_level,
    });

    const strength = scorePlanetaryStrength(sidereal, {
      ascendant_longitude: ascendant === null ? null : ascendant.sidereal,
    });

    const chart: BirthChart = {
      birth: {
        utc: instant.utc,
        local: resolved.local,
        timezone: instant.timezone,
        latitude: instant.latitude,
        longitude: instant.longitude,
        time_known: resolved.time_known,
      },
      accuracy: sidereal.accuracy,
      tropical,
      sidereal,
      ascendant,
      nakshatra: nakshatraFromLongitude(moon),
      dasha,
      strength,
      aspects: findChartAspects(tropical.bodies, params.orbs ?? ASPECT_POLICY_V1.orbs),
    };

    astroLogHelpers.chartComputed({
      birth_utc: instant.utc,
      accuracy: chart.accuracy,
      period_count: dasha.periods.length,
      duration_ms: Date.now() - startedAt,
    });
    return chart;
  } catch (err) {
    astroLogHelpers.chartFailed({ birth_utc: birthUtc, error: err });
    throw err;
  }
}

/**
 * Cross-chart aspects (every body of A against every body of B, tropical)
 * and the pulse they add up to.
 */
export function computeSynastry(
  chartA: Pick<BirthChart, "tropical">,
  chartB: Pick<BirthChart, "tropical">,
  orbs: OrbTable = ASPECT_POLICY_V1.orbs
): Synastry {
  const events = findAspects(chartA.tropical.bodies, chartB.tropical.bodies, orbs);
  return { events, pulse: classifyPulse(events) };
}
