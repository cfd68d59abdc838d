import { nakshatraFromLongitude, type NakshatraInfo } from "../nakshatra/nakshatra.js";
import { DASHA_YEARS, type DashaLord } from "./vimshottari.js";

export interface StartingDasha {
  lord: DashaLord;
  nakshatra: NakshatraInfo;
  /** Share of the starting mahadasha already consumed before birth */
  fraction_elapsed: number;
  balance_years: number;
}

/**
 * Starting mahadasha lord and remaining balance from the Moon's sidereal
 * longitude at birth.
 */
export function calculateStartingDasha(moonSiderealLongitude: number): StartingDasha {
  const nakshatra = nakshatraFromLongitude(moonSiderealLongitude);
  const lord = nakshatra.lord;
  return {
    lord,
    nakshatra,
    fraction_elapsed: nakshatra.fraction_elapsed,
    balance_years: DASHA_YEARS[lord] * (1 - nakshatra.fraction_elapsed),
  };
}
