import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../../errors.js";
import { createInstant } from "../../instant.js";
import { StrengthReportSchema } from "../../schemas/strengthReport.schema.js";
import { ScriptedEphemeris } from "../../__tests__/support/scriptedEphemeris.js";
import { STRENGTH_POLICY_V1 } from "../policy/strengthPolicy.v1.js";
import {
  classifyDignity,
  compositeStrength,
  scorePlanetaryStrength,
} from "../scorePlanetaryStrength.js";

const epoch = createInstant({ utc: "1970-01-01T00:00:00Z", latitude: 0, longitude: 0 });

const chart = new ScriptedEphemeris({
  sun: () => 10,
  moon: () => 100,
  mercury: () => 345,
  venus: () => 50,
  mars: (ms) => 130 - ms / 1e10,
  jupiter: () => 75,
  saturn: () => 200,
  rahu: (ms) => -ms / 1e10,
}).positions(epoch, "tropical");

describe("classifyDignity", () => {
  it("checks exaltation, debilitation and own sign first", () => {
    expect(classifyDignity("sun", "aries")).toBe("exalted");
    expect(classifyDignity("mercury", "pisces")).toBe("debilitated");
    expect(classifyDignity("mercury", "virgo")).toBe("exalted");
    expect(classifyDignity("venus", "libra")).toBe("own");
  });

  it("falls back to the sign lord's relationship", () => {
    expect(classifyDignity("mars", "leo")).toBe("friendly");
    expect(classifyDignity("jupiter", "gemini")).toBe("enemy");
    expect(classifyDignity("uranus", "aries")).toBe("neutral");
  });
});

describe("compositeStrength", () => {
  it("weights the three parts", () => {
    expect(compositeStrength({ positional: 100, directional: 100, temporal: 25 })).toBe(81.25);
  });

  it("renormalizes when the directional part is missing", () => {
    expect(compositeStrength({ positional: 100, directional: null, temporal: 50 })).toBe(83.33);
  });
});

describe("scorePlanetaryStrength", () => {
  it("scores without directional strength when the birth time is unknown", () => {
    const report = scorePlanetaryStrength(chart, { ascendant_longitude: null });

    expect(report.directional_available).toBe(false);
    expect(report.is_day_birth).toBeNull();
    expect(report.scores.sun).toMatchObject({
      dignity: "exalted",
      positional: 100,
      directional: null,
      temporal: 50,
      composite: 83.33,
      house: null,
    });
    expect(report.scores.mercury.composite).toBe(16.67);
    expect(StrengthReportSchema.safeParse(report).success).toBe(true);
  });

  it("uses whole-sign houses and day/night rulers with a known ascendant", () => {
    const report = scorePlanetaryStrength(chart, { ascendant_longitude: 0 });

    expect(report.is_day_birth).toBe(false);
    expect(report.scores.sun).toMatchObject({ house: 1, directional: 100, temporal: 25, composite: 81.25 });
    expect(report.scores.moon).toMatchObject({ house: 4, temporal: 75, composite: 83.75 });
    expect(report.scores.saturn).toMatchObject({ dignity: "exalted", house: 7, composite: 93.75 });
    expect(report.scores.mercury).toMatchObject({ house: 12, directional: 30, composite: 20 });
    expect(report.scores.jupiter).toMatchObject({ dignity: "enemy", house: 3, temporal: 25, composite: 31.25 });
    expect(StrengthReportSchema.safeParse(report).success).toBe(true);
  });

  it("penalizes retrograde planets but not the nodes", () => {
    const report = scorePlanetaryStrength(chart, { ascendant_longitude: 0 });

    expect(chart.bodies.mars.retrograde).toBe(true);
    expect(report.scores.mars.temporal).toBe(63.75);
    expect(chart.bodies.rahu.retrograde).toBe(true);
    expect(report.scores.rahu.temporal).toBe(50);
  });

  it("maps composite strength onto life domains", () => {
    const report = scorePlanetaryStrength(chart, { ascendant_longitude: 0 });
    expect(report.scores.sun.domain_impact.health).toBe(65);
    for (const value of Object.values(report.domain_impact)) {
      expect(value).toBeGreaterThan(0);
      expect(value).toBeLessThanOrEqual(100);
    }
  });

  it("accepts a valid custom policy", () => {
    const positionalOnly = {
      ...STRENGTH_POLICY_V1,
      strength_policy_version: "positional_only",
      weights: { positional: 1, directional: 0, temporal: 0 },
    };
    const report = scorePlanetaryStrength(chart, { ascendant_longitude: 0 }, positionalOnly);

    expect(report.strength_policy_version).toBe("positional_only");
    expect(report.scores.sun.composite).toBe(100);
    expect(report.scores.mercury.composite).toBe(0);
  });

  it("ships a built-in policy that cannot be changed in place", () => {
    expect(() => {
      STRENGTH_POLICY_V1.weights.positional = 0.9;
    }).toThrow(TypeError);
    expect(() => {
      STRENGTH_POLICY_V1.dignity_scores.exalted = 1000;
    }).toThrow(TypeError);
    expect(STRENGTH_POLICY_V1.weights).toEqual({ positional: 0.5, directional: 0.25, temporal: 0.25 });
  });

  it("rejects weights that do not sum to one", () => {
    const broken = {
      ...STRENGTH_POLICY_V1,
      weights: { positional: 0.5, directional: 0.5, temporal: 0.5 },
    };
    expect(() => scorePlanetaryStrength(chart, { ascendant_longitude: 0 }, broken)).toThrow(
      InvalidInputError
    );
  });
});
