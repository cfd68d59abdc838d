import { describe, expect, it } from "vitest";
import { UnsupportedDateRangeError } from "../../errors.js";
import { createInstant } from "../../instant.js";
import { PositionSetSchema } from "../../schemas/positionSet.schema.js";
import { ApproximateEphemeris, meanLunarNode } from "../approximateEphemeris.js";
import { LAHIRI_AYANAMSHA_J2000 } from "../ayanamsha.js";
import { BODY_IDS } from "../types.js";

const j2000 = createInstant({ utc: "2000-01-01T12:00:00Z", latitude: 0, longitude: 0 });

describe("ApproximateEphemeris", () => {
  const ephemeris = new ApproximateEphemeris();

  it("produces a valid position set for every body", () => {
    const set = ephemeris.positions(j2000, "tropical");
    expect(PositionSetSchema.safeParse(set).success).toBe(true);
    expect(Object.keys(set.bodies)).toEqual([...BODY_IDS]);
    expect(set.accuracy).toBe("approximate");
    expect(set.ayanamsha_deg).toBeNull();
  });

  it("places the Sun and Moon near their J2000.0 longitudes", () => {
    const set = ephemeris.positions(j2000, "tropical");
    expect(set.bodies.sun.longitude).toBeGreaterThan(280);
    expect(set.bodies.sun.longitude).toBeLessThan(281);
    expect(set.bodies.sun.sign).toBe("capricorn");
    expect(set.bodies.moon.longitude).toBeGreaterThan(222);
    expect(set.bodies.moon.longitude).toBeLessThan(225);
  });

  it("uses the mean node for Rahu and puts Ketu opposite", () => {
    const set = ephemeris.positions(j2000, "tropical");
    expect(set.bodies.rahu.longitude).toBeCloseTo(meanLunarNode(j2000.julian_day), 10);
    expect(set.bodies.rahu.longitude).toBeCloseTo(125.0445, 3);
    expect(set.bodies.ketu.longitude).toBeCloseTo(305.0445, 3);
    expect(set.bodies.rahu.retrograde).toBe(true);
    expect(set.bodies.ketu.retrograde).toBe(true);
  });

  it("flags retrograde exactly when speed is negative", () => {
    const set = ephemeris.positions(createInstant({ utc: "2021-06-10T00:00:00Z", latitude: 0, longitude: 0 }), "tropical");
    for (const body of BODY_IDS) {
      expect(set.bodies[body].retrograde).toBe(set.bodies[body].speed_deg_per_day < 0);
    }
  });

  it("shifts sidereal longitudes by the ayanamsha", () => {
    const tropical = ephemeris.positions(j2000, "tropical");
    const sidereal = ephemeris.positions(j2000, "sidereal");
    expect(sidereal.ayanamsha_deg).toBe(LAHIRI_AYANAMSHA_J2000);
    expect(ephemeris.ayanamsha(j2000)).toBe(LAHIRI_AYANAMSHA_J2000);
    expect(sidereal.bodies.sun.longitude).toBeCloseTo(
      tropical.bodies.sun.longitude - LAHIRI_AYANAMSHA_J2000,
      10
    );
    expect(PositionSetSchema.safeParse(sidereal).success).toBe(true);
  });

  it("is deterministic", () => {
    expect(ephemeris.positions(j2000, "sidereal")).toEqual(ephemeris.positions(j2000, "sidereal"));
  });

  it("refuses instants beyond 6000 years from J2000.0", () => {
    const far = createInstant({ utc: "8100-01-01T00:00:00Z", latitude: 0, longitude: 0 });
    expect(() => ephemeris.positions(far, "tropical")).toThrow(UnsupportedDateRangeError);
    expect(() => ephemeris.ayanamsha(far)).toThrow(UnsupportedDateRangeError);
  });

  it("still computes near the edge of the range", () => {
    const edge = createInstant({ utc: "7900-01-01T00:00:00Z", latitude: 0, longitude: 0 });
    const set = ephemeris.positions(edge, "sidereal");
    expect(PositionSetSchema.safeParse(set).success).toBe(true);
  });
});
