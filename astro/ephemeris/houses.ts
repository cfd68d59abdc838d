import { normalizeDegrees, signIndexOf, toDegrees, toRadians } from "../angles.js";
import { J2000_JULIAN_DAY } from "../instant.js";
import { julianCenturiesFromJ2000 } from "./ayanamsha.js";

export type HouseAngularity = "angular" | "succedent" | "cadent";

/**
 * Greenwich mean sidereal time in degrees.
 */
export function greenwichMeanSiderealTime(julianDay: number): number {
  const T = julianCenturiesFromJ2000(julianDay);
  return normalizeDegrees(
    280.46061837 +
      360.98564736629 * (julianDay - J2000_JULIAN_DAY) +
      0.000387933 * T * T -
      (T * T * T) / 38710000
  );
}

export function localSiderealTime(julianDay: number, longitude: number): number {
  return normalizeDegrees(greenwichMeanSiderealTime(julianDay) + longitude);
}

/**
 * Mean obliquity of the ecliptic in degrees.
 */
export function meanObliquity(julianDay: number): number {
  const T = julianCenturiesFromJ2000(julianDay);
  return 23.43929111 - (46.815 * T + 0.00059 * T * T - 0.001813 * T * T * T) / 3600;
}

/**
 * Tropical longitude of the eastern horizon for a local sidereal time.
 */
export function ascendantFromSiderealTime(
  lstDeg: number,
  latitude: number,
  obliquityDeg: number
): number {
  const lst = toRadians(lstDeg);
  const eps = toRadians(obliquityDeg);
  const phi = toRadians(latitude);
  const y = Math.cos(lst);
  const x = -(Math.sin(lst) * Math.cos(eps) + Math.tan(phi) * Math.sin(eps));
  return normalizeDegrees(toDegrees(Math.atan2(y, x)));
}

export function tropicalAscendant(julianDay: number, latitude: number, longitude: number): number {
  return ascendantFromSiderealTime(
    localSiderealTime(julianDay, longitude),
    latitude,
    meanObliquity(julianDay)
  );
}

/**
 * Whole-sign house (1..12): the ascendant's sign is the first house.
 */
export function wholeSignHouse(bodyLongitude: number, ascendantLongitude: number): number {
  return ((signIndexOf(bodyLongitude) - signIndexOf(ascendantLongitude) + 12) % 12) + 1;
}

export function houseAngularity(house: number): HouseAngularity {
  const position = (house - 1) % 3;
  if (position === 0) return "angular";
  if (position === 1) return "succedent";
  return "cadent";
}

/**
 * The Sun is above the horizon when it sits in the half of the ecliptic
 * running back from the ascendant through the MC to the descendant.
 */
export function isDayBirth(sunLongitude: number, ascendantLongitude: number): boolean {
  return normalizeDegrees(sunLongitude - ascendantLongitude) >= 180;
}
