import { describe, expect, it } from "vitest";
import { J2000_JULIAN_DAY } from "../../instant.js";
import {
  ascendantFromSiderealTime,
  greenwichMeanSiderealTime,
  houseAngularity,
  isDayBirth,
  meanObliquity,
  wholeSignHouse,
} from "../houses.js";

describe("sidereal time and obliquity", () => {
  it("match the J2000.0 reference values", () => {
    expect(greenwichMeanSiderealTime(J2000_JULIAN_DAY)).toBeCloseTo(280.46061837, 8);
    expect(meanObliquity(J2000_JULIAN_DAY)).toBeCloseTo(23.43929111, 8);
  });
});

describe("ascendantFromSiderealTime", () => {
  it("rises at 0° Cancer when the equinox culminates on the equator", () => {
    expect(ascendantFromSiderealTime(0, 0, 23.44)).toBeCloseTo(90, 8);
  });

  it("rises at 0° Libra a quarter turn later", () => {
    expect(ascendantFromSiderealTime(90, 0, 23.44)).toBeCloseTo(180, 8);
  });

  it("stays in [0, 360)", () => {
    for (let lst = 0; lst < 360; lst += 15) {
      const asc = ascendantFromSiderealTime(lst, 51.5, 23.44);
      expect(asc).toBeGreaterThanOrEqual(0);
      expect(asc).toBeLessThan(360);
    }
  });
});

describe("wholeSignHouse", () => {
  it("counts signs from the ascendant's sign", () => {
    expect(wholeSignHouse(350, 350)).toBe(1);
    expect(wholeSignHouse(45, 10)).toBe(2);
    expect(wholeSignHouse(5, 350)).toBe(2);
    expect(wholeSignHouse(340, 10)).toBe(12);
  });
});

describe("houseAngularity", () => {
  it("classifies the twelve houses", () => {
    expect([1, 4, 7, 10].map(houseAngularity)).toEqual(["angular", "angular", "angular", "angular"]);
    expect([2, 5, 8, 11].map(houseAngularity)).toEqual([
      "succedent",
      "succedent",
      "succedent",
      "succedent",
    ]);
    expect([3, 6, 9, 12].map(houseAngularity)).toEqual(["cadent", "cadent", "cadent", "cadent"]);
  });
});

describe("isDayBirth", () => {
  it("is true when the Sun is above the horizon", () => {
    expect(isDayBirth(270, 0)).toBe(true);
    expect(isDayBirth(90, 0)).toBe(false);
  });
});
