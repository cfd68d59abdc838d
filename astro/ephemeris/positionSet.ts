import { normalizeDegrees, signDegreeOf, signOf } from "../angles.js";
import { UnsupportedDateRangeError } from "../errors.js";
import { J2000_JULIAN_DAY, toUtcIso, type Instant } from "../instant.js";
import type {
  Accuracy,
  AyanamshaCorrector,
  BodyId,
  BodyPosition,
  PositionSet,
  RawBodyCoordinates,
  ReferenceFrame,
} from "./types.js";

export const MAX_YEARS_FROM_J2000 = 6000;
const DAYS_PER_JULIAN_YEAR = 365.25;

/** Every body except Ketu, which is always derived from Rahu */
export type ComputedBodyId = Exclude<BodyId, "ketu">;

export const COMPUTED_BODY_IDS: readonly ComputedBodyId[] = [
  "sun",
  "moon",
  "mercury",
  "venus",
  "mars",
  "jupiter",
  "saturn",
  "uranus",
  "neptune",
  "pluto",
  "rahu",
];

/**
 * Fail on instants outside the supported era. Never clamps.
 */
export function assertSupportedJulianDay(julianDay: number, utc: string): void {
  const years = (julianDay - J2000_JULIAN_DAY) / DAYS_PER_JULIAN_YEAR;
  if (!Number.isFinite(years) || Math.abs(years) > MAX_YEARS_FROM_J2000) {
    throw new UnsupportedDateRangeError(utc, years, MAX_YEARS_FROM_J2000);
  }
}

export function assertSupportedInstant(instant: Instant): void {
  assertSupportedJulianDay(instant.julian_day, instant.utc);
}

function framePosition(
  body: BodyId,
  raw: RawBodyCoordinates,
  frame: ReferenceFrame,
  accuracy: Accuracy,
  ayanamshaDeg: number | null
): BodyPosition {
  const longitude =
    ayanamshaDeg === null
      ? normalizeDegrees(raw.longitude)
      : normalizeDegrees(raw.longitude - ayanamshaDeg);

  return {
    body,
    longitude,
    latitude: raw.latitude,
    speed_deg_per_day: raw.speed_deg_per_day,
    retrograde: raw.speed_deg_per_day < 0,
    frame,
    accuracy,
    sign: signOf(longitude),
    sign_degree: signDegreeOf(longitude),
  };
}

/**
 * Shared output contract for both strategies: frames tropical coordinates,
 * derives Ketu as Rahu + 180 and attaches sign data. The set is frozen all
 * the way down, since cached sets are handed to every caller.
 */
export function buildPositionSet(params: {
  epoch_ms: number;
  julian_day: number;
  frame: ReferenceFrame;
  accuracy: Accuracy;
  corrector: AyanamshaCorrector;
  raw: Record<ComputedBodyId, RawBodyCoordinates>;
}): PositionSet {
  const { frame, accuracy, raw } = params;
  const ayanamshaDeg =
    frame === "sidereal" ? params.corrector.ayanamsha(params.julian_day) : null;

  const rahu = raw.rahu;
  const ketu: RawBodyCoordinates = {
    longitude: normalizeDegrees(rahu.longitude + 180),
    latitude: rahu.latitude === 0 ? 0 : -rahu.latitude,
    speed_deg_per_day: rahu.speed_deg_per_day,
  };

  const position = (body: BodyId, coords: RawBodyCoordinates) =>
    Object.freeze(framePosition(body, coords, frame, accuracy, ayanamshaDeg));

  return Object.freeze({
    computed_at: toUtcIso(params.epoch_ms),
    julian_day: params.julian_day,
    frame,
    accuracy,
    ayanamsha_deg: ayanamshaDeg,
    bodies: Object.freeze({
      sun: position("sun", raw.sun),
      moon: position("moon", raw.moon),
      mercury: position("mercury", raw.mercury),
      venus: position("venus", raw.venus),
      mars: position("mars", raw.mars),
      jupiter: position("jupiter", raw.jupiter),
      saturn: position("saturn", raw.saturn),
      uranus: position("uranus", raw.uranus),
      neptune: position("neptune", raw.neptune),
      pluto: position("pluto", raw.pluto),
      rahu: position("rahu", rahu),
      ketu: position("ketu", ketu),
    }),
  });
}
