import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { setAstroLogLevel } from "../../../logging/astroLog.js";
import { normalizeDegrees, signOf } from "../../angles.js";
import { ApproximateEphemeris } from "../../ephemeris/approximateEphemeris.js";
import type { EphemerisProvider } from "../../ephemeris/types.js";
import { EphemerisCalculationError, InvalidInputError } from "../../errors.js";
import { createInstant } from "../../instant.js";
import { nakshatraFromLongitude } from "../../nakshatra/nakshatra.js";
import { AspectEventSchema } from "../../schemas/aspectEvent.schema.js";
import { DashaTimelineSchema } from "../../schemas/dashaTimeline.schema.js";
import { ScriptedEphemeris } from "../../__tests__/support/scriptedEphemeris.js";
import { computeBirthChart, computeSynastry, resolveBirthInstant } from "../computeBirthChart.js";

const delhi = {
  date: "1990-06-15",
  time: "08:30",
  latitude: 28.6139,
  longitude: 77.209,
  timezone: "Asia/Kolkata",
};

describe("resolveBirthInstant", () => {
  it("converts local time in the birth zone to UTC", () => {
    const resolved = resolveBirthInstant(delhi);
    expect(resolved.instant.utc).toBe("1990-06-15T03:00:00.000Z");
    expect(resolved.local).toBe("1990-06-15T08:30:00.000");
    expect(resolved.time_known).toBe(true);
  });

  it("places an unknown time at local noon", () => {
    const resolved = resolveBirthInstant({ ...delhi, time: null });
    expect(resolved.instant.utc).toBe("1990-06-15T06:30:00.000Z");
    expect(resolved.time_known).toBe(false);
  });

  it("rejects impossible dates", () => {
    expect(() => resolveBirthInstant({ ...delhi, date: "1990-02-30" })).toThrow(InvalidInputError);
  });

  it("rejects unknown zones", () => {
    expect(() => resolveBirthInstant({ ...delhi, timezone: "Asia/Atlantis" })).toThrow(/timezone/);
  });
});

describe("computeBirthChart", () => {
  const provider = new ApproximateEphemeris();

  beforeEach(() => setAstroLogLevel("silent"));
  afterEach(() => vi.restoreAllMocks());

  it("assembles every part of the chart", () => {
    const chart = computeBirthChart({ birth: delhi, provider, max_level: 2 });
    const instant = createInstant({ utc: chart.birth.utc, latitude: delhi.latitude, longitude: delhi.longitude });

    expect(chart.accuracy).toBe("approximate");
    expect(chart.tropical.frame).toBe("tropical");
    expect(chart.sidereal.frame).toBe("sidereal");

    expect(chart.ascendant).not.toBeNull();
    if (chart.ascendant) {
      expect(chart.ascendant.sidereal).toBeCloseTo(
        normalizeDegrees(chart.ascendant.tropical - provider.ayanamsha(instant)),
        10
      );
      expect(chart.ascendant.sign).toBe(signOf(chart.ascendant.sidereal));
    }

    const moon = chart.sidereal.bodies.moon.longitude;
    expect(chart.nakshatra).toEqual(nakshatraFromLongitude(moon));
    expect(chart.dasha.starting_dasha.lord).toBe(chart.nakshatra.lord);
    expect(chart.dasha.birth).toBe(chart.birth.utc);
    expect(chart.dasha.max_level).toBe(2);
    expect(DashaTimelineSchema.safeParse(chart.dasha).success).toBe(true);

    expect(chart.strength.directional_available).toBe(true);
    expect(chart.aspects.every((a) => AspectEventSchema.safeParse(a).success)).toBe(true);
  });

  it("leaves out the ascendant and directional strength when the time is unknown", () => {
    const chart = computeBirthChart({ birth: { ...delhi, time: undefined }, provider });

    expect(chart.birth.time_known).toBe(false);
    expect(chart.ascendant).toBeNull();
    expect(chart.strength.directional_available).toBe(false);
    expect(chart.strength.scores.sun.directional).toBeNull();
  });

  it("is deterministic", () => {
    const a = computeBirthChart({ birth: delhi, provider, max_level: 1 });
    const b = computeBirthChart({ birth: delhi, provider, max_level: 1 });
    expect(b).toEqual(a);
  });

  it("logs a completed chart", () => {
    setAstroLogLevel("info");
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    computeBirthChart({ birth: delhi, provider, max_level: 1 });

    const entries = log.mock.calls.map((call) => JSON.parse(String(call[0])));
    const computed = entries.find((e) => e.event === "chart.computed");
    expect(computed).toMatchObject({ birth_utc: "1990-06-15T03:00:00.000Z", accuracy: "approximate" });
  });

  it("logs and rethrows provider failures", () => {
    setAstroLogLevel("error");
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const failing: EphemerisProvider = {
      accuracy: "precise",
      positions: () => {
        throw new EphemerisCalculationError("moon", "data file unreadable");
      },
      ayanamsha: () => 24,
      close: () => undefined,
    };

    expect(() => computeBirthChart({ birth: delhi, provider: failing })).toThrow(EphemerisCalculationError);

    const entry = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toMatchObject({
      event: "chart.failed",
      birth_utc: "1990-06-15T03:00:00.000Z",
      error_code: "EphemerisCalculationError",
    });
  });
});

describe("computeSynastry", () => {
  it("pairs every body of one chart with every body of the other and reads the pulse", () => {
    const at = createInstant({ utc: "2000-01-01T00:00:00Z", latitude: 0, longitude: 0 });
    const tropical = new ScriptedEphemeris({}).positions(at, "tropical");

    const synastry = computeSynastry({ tropical }, { tropical });

    // every body at 0° except Ketu, which sits opposite Rahu
    expect(synastry.events).toHaveLength(144);
    expect(synastry.events.every((e) => e.orb_deg === 0)).toBe(true);
    expect(synastry.events.filter((e) => e.type === "opposition")).toHaveLength(22);
    expect(synastry.pulse).toMatchObject({
      label: "friction",
      amplifying: 122,
      challenging: 22,
      net_tally: -22,
      score: 0,
    });
  });
});
