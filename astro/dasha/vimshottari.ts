/**
 * Vimshottari lord cycle. Order and years are fixed; the years sum to 120.
 */

export const DASHA_LORDS = [
  "ketu",
  "venus",
  "sun",
  "moon",
  "mars",
  "rahu",
  "jupiter",
  "saturn",
  "mercury",
] as const;

export type DashaLord = (typeof DASHA_LORDS)[number];

export const DASHA_YEARS: Readonly<Record<DashaLord, number>> = Object.freeze({
  ketu: 7,
  venus: 20,
  sun: 6,
  moon: 10,
  mars: 7,
  rahu: 18,
  jupiter: 16,
  saturn: 19,
  mercury: 17,
});

export const CYCLE_YEARS = 120;

/** Julian year in milliseconds (365.25 days) */
export const MS_PER_JULIAN_YEAR = 31_557_600_000;

export const CYCLE_MS = CYCLE_YEARS * MS_PER_JULIAN_YEAR;

export const DASHA_LEVEL_NAMES = [
  "mahadasha",
  "antardasha",
  "pratyantardasha",
  "sookshma",
  "prana",
] as const;

export type DashaLevelName = (typeof DASHA_LEVEL_NAMES)[number];
export type DashaLevel = 1 | 2 | 3 | 4 | 5;

export const MAX_DASHA_LEVEL: DashaLevel = 5;

export function levelName(level: DashaLevel): DashaLevelName {
  return DASHA_LEVEL_NAMES[level - 1];
}

/**
 * The nine lords in cycle order starting from `from`.
 */
export function cycleFrom(from: DashaLord): DashaLord[] {
  const start = DASHA_LORDS.indexOf(from);
  return DASHA_LORDS.map((_, i) => DASHA_LORDS[(start + i) % DASHA_LORDS.length]);
}

/**
 * Cumulative year offsets of each lord in the cycle starting at `from`:
 * entry i is the sum of years of the first i lords, so entry 0 is 0 and
 * entry 9 is 120.
 */
export function cumulativeYears(from: DashaLord): number[] {
  const offsets = [0];
  let total = 0;
  for (const lord of cycleFrom(from)) {
    total += DASHA_YEARS[lord];
    offsets.push(total);
  }
  return offsets;
}
