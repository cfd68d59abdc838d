import { normalizeDegrees } from "../angles.js";
import { J2000_JULIAN_DAY } from "../instant.js";
import type { AyanamshaCorrector } from "./types.js";

const DAYS_PER_JULIAN_CENTURY = 36525;

/** Lahiri ayanamsha at J2000.0, degrees */
export const LAHIRI_AYANAMSHA_J2000 = 23.85282;

/** General precession in longitude, arcseconds per century (linear, quadratic) */
const PRECESSION_ARCSEC_T1 = 5028.796195;
const PRECESSION_ARCSEC_T2 = 1.1054348;

export function julianCenturiesFromJ2000(julianDay: number): number {
  return (julianDay - J2000_JULIAN_DAY) / DAYS_PER_JULIAN_CENTURY;
}

/**
 * Lahiri-style precession model.
 *
 * Grows ~50.29"/year at J2000; the derivative stays positive for the whole
 * supported era (|T| <= 60 centuries), so the value is strictly increasing.
 */
export class LahiriAyanamsha implements AyanamshaCorrector {
  readonly name = "lahiri";

  ayanamsha(julianDay: number): number {
    const t = julianCenturiesFromJ2000(julianDay);
    return (
      LAHIRI_AYANAMSHA_J2000 +
      (PRECESSION_ARCSEC_T1 * t + PRECESSION_ARCSEC_T2 * t * t) / 3600
    );
  }

  toSidereal(tropicalLongitude: number, julianDay: number): number {
    return normalizeDegrees(tropicalLongitude - this.ayanamsha(julianDay));
  }
}

/**
 * Wraps an externally computed ayanamsha (e.g. from the precise source).
 */
export class FunctionAyanamsha implements AyanamshaCorrector {
  constructor(
    readonly name: string,
    private readonly compute: (julianDay: number) => number
  ) {}

  ayanamsha(julianDay: number): number {
    return this.compute(julianDay);
  }

  toSidereal(tropicalLongitude: number, julianDay: number): number {
    return normalizeDegrees(tropicalLongitude - this.compute(julianDay));
  }
}
