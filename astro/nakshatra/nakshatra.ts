import { normalizeDegrees } from "../angles.js";
import { DASHA_LORDS, type DashaLord } from "../dasha/vimshottari.js";

export const NAKSHATRA_NAMES = [
  "Ashwini",
  "Bharani",
  "Krittika",
  "Rohini",
  "Mrigashira",
  "Ardra",
  "Punarvasu",
  "Pushya",
  "Ashlesha",
  "Magha",
  "Purva Phalguni",
  "Uttara Phalguni",
  "Hasta",
  "Chitra",
  "Swati",
  "Vishakha",
  "Anuradha",
  "Jyeshtha",
  "Mula",
  "Purva Ashadha",
  "Uttara Ashadha",
  "Shravana",
  "Dhanishta",
  "Shatabhisha",
  "Purva Bhadrapada",
  "Uttara Bhadrapada",
  "Revati",
] as const;

export type NakshatraName = (typeof NAKSHATRA_NAMES)[number];

export const NAKSHATRA_COUNT = 27;
/** 13°20′ */
export const NAKSHATRA_SPAN_DEG = 360 / NAKSHATRA_COUNT;

export interface NakshatraInfo {
  /** 1..27 */
  index: number;
  name: NakshatraName;
  lord: DashaLord;
  /** 1..4 */
  pada: number;
  degrees_into_nakshatra: number;
  /** Share of the nakshatra already traversed, in [0, 1) */
  fraction_elapsed: number;
}

/**
 * Lords repeat the nine-lord cycle three times across the zodiac.
 */
export function nakshatraLord(zeroBasedIndex: number): DashaLord {
  return DASHA_LORDS[zeroBasedIndex % DASHA_LORDS.length];
}

export function nakshatraFromLongitude(siderealLongitude: number): NakshatraInfo {
  if (!Number.isFinite(siderealLongitude)) {
    throw new RangeError(`Longitude must be finite, got ${siderealLongitude}`);
  }
  // lon * 27 / 360 keeps exact fractions at span midpoints
  const position = (normalizeDegrees(siderealLongitude) * NAKSHATRA_COUNT) / 360;
  const index = Math.min(Math.floor(position), NAKSHATRA_COUNT - 1);
  const fraction = Math.min(Math.max(position - index, 0), 1 - Number.EPSILON);

  return {
    index: index + 1,
    name: NAKSHATRA_NAMES[index],
    lord: nakshatraLord(index),
    pada: Math.min(Math.floor(fraction * 4), 3) + 1,
    degrees_into_nakshatra: fraction * NAKSHATRA_SPAN_DEG,
    fraction_elapsed: fraction,
  };
}
