import { describe, expect, it } from "vitest";
import { J2000_JULIAN_DAY } from "../../instant.js";
import { FunctionAyanamsha, LAHIRI_AYANAMSHA_J2000, LahiriAyanamsha } from "../ayanamsha.js";

const DAYS_PER_YEAR = 365.25;

describe("LahiriAyanamsha", () => {
  const lahiri = new LahiriAyanamsha();

  it("matches the reference value at J2000.0", () => {
    expect(lahiri.ayanamsha(J2000_JULIAN_DAY)).toBe(LAHIRI_AYANAMSHA_J2000);
  });

  it("grows by roughly 50 arcseconds a year", () => {
    const perYear = lahiri.ayanamsha(J2000_JULIAN_DAY + DAYS_PER_YEAR) - lahiri.ayanamsha(J2000_JULIAN_DAY);
    expect(perYear * 3600).toBeGreaterThan(50);
    expect(perYear * 3600).toBeLessThan(50.6);
  });

  it("is strictly increasing across the supported era", () => {
    let previous = -Infinity;
    for (let year = -6000; year <= 6000; year += 250) {
      const value = lahiri.ayanamsha(J2000_JULIAN_DAY + year * DAYS_PER_YEAR);
      expect(value).toBeGreaterThan(previous);
      previous = value;
    }
  });

  it("subtracts the offset and wraps below zero", () => {
    expect(lahiri.toSidereal(100, J2000_JULIAN_DAY)).toBeCloseTo(100 - LAHIRI_AYANAMSHA_J2000, 10);
    expect(lahiri.toSidereal(10, J2000_JULIAN_DAY)).toBeCloseTo(360 + 10 - LAHIRI_AYANAMSHA_J2000, 10);
  });
});

describe("FunctionAyanamsha", () => {
  it("delegates to the wrapped function", () => {
    const fixed = new FunctionAyanamsha("fixed", () => 24);
    expect(fixed.name).toBe("fixed");
    expect(fixed.ayanamsha(0)).toBe(24);
    expect(fixed.toSidereal(20, 0)).toBe(356);
  });
});
