/**
 * Pure angle helpers shared by every layer.
 * All angles are ecliptic degrees.
 */

export const SIGN_NAMES = [
  "aries",
  "taurus",
  "gemini",
  "cancer",
  "leo",
  "virgo",
  "libra",
  "scorpio",
  "sagittarius",
  "capricorn",
  "aquarius",
  "pisces",
] as const;

export type SignName = (typeof SIGN_NAMES)[number];

/**
 * Normalize degrees to 0-360 range
 */
export function normalizeDegrees(value: number): number {
  let v = value % 360;
  if (v < 0) v += 360;
  // -1e-15 % 360 + 360 rounds up to 360
  return v >= 360 ? 0 : v;
}

/**
 * Signed difference a - b folded into [-180, 180)
 */
export function signedDifference(a: number, b: number): number {
  return normalizeDegrees(a - b + 180) - 180;
}

/**
 * Compute angular separation between two longitudes (0-180 degrees)
 */
export function angularSeparation(lon1: number, lon2: number): number {
  const diff = Math.abs(normalizeDegrees(lon1) - normalizeDegrees(lon2));
  return Math.min(diff, 360 - diff);
}

export function signIndexOf(longitude: number): number {
  return Math.min(Math.floor(normalizeDegrees(longitude) / 30), 11);
}

export function signOf(longitude: number): SignName {
  return SIGN_NAMES[signIndexOf(longitude)];
}

export function signDegreeOf(longitude: number): number {
  return normalizeDegrees(longitude) - signIndexOf(longitude) * 30;
}

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function toDegrees(radians: number): number {
  return (radians * 180) / Math.PI;
}
