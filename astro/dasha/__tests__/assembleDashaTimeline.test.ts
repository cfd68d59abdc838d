import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../../errors.js";
import { DashaTimelineSchema } from "../../schemas/dashaTimeline.schema.js";
import {
  assembleDashaTimeline,
  iterateDashaPeriods,
  planDashaTimeline,
  type DashaPeriod,
} from "../assembleDashaTimeline.js";
import { calculateStartingDasha } from "../startingDasha.js";
import { CYCLE_MS, MS_PER_JULIAN_YEAR } from "../vimshottari.js";

const BIRTH = "2000-01-01T00:00:00Z";
const BIRTH_MS = Date.UTC(2000, 0, 1);
const Y = MS_PER_JULIAN_YEAR;

function years(period: DashaPeriod): number {
  return (period.end_ms - period.start_ms) / Y;
}

function expectTiling(children: DashaPeriod[], parent: DashaPeriod) {
  expect(children.length).toBeGreaterThan(0);
  expect(children[0].start_ms).toBe(parent.start_ms);
  expect(children[children.length - 1].end_ms).toBe(parent.end_ms);
  for (let i = 1; i < children.length; i++) {
    expect(children[i].start_ms).toBe(children[i - 1].end_ms);
  }
}

describe("calculateStartingDasha", () => {
  it("starts a full Ketu period at 0°", () => {
    const start = calculateStartingDasha(0);
    expect(start.lord).toBe("ketu");
    expect(start.nakshatra.name).toBe("Ashwini");
    expect(start.balance_years).toBe(7);
  });

  it("leaves half of Ketu at the middle of Ashwini", () => {
    expect(calculateStartingDasha(6.666666666666667).balance_years).toBe(3.5);
  });

  it("leaves half of Venus at the middle of Bharani", () => {
    const start = calculateStartingDasha(20);
    expect(start.lord).toBe("venus");
    expect(start.balance_years).toBe(10);
  });
});

describe("assembleDashaTimeline", () => {
  it("runs the nine lords from birth when nothing was consumed", () => {
    const timeline = assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 0, max_level: 1 });
    const maha = timeline.levels.mahadasha;

    expect(maha.map((p) => p.lord)).toEqual([
      "ketu",
      "venus",
      "sun",
      "moon",
      "mars",
      "rahu",
      "jupiter",
      "saturn",
      "mercury",
    ]);
    expect(maha[0].start).toBe("2000-01-01T00:00:00.000Z");
    expect(maha[0].duration_days).toBe(2556.75);
    expect(maha[maha.length - 1].end_ms).toBe(BIRTH_MS + CYCLE_MS);
  });

  it("splits the starting lord around the cycle when it began before birth", () => {
    const timeline = assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 20, max_level: 1 });
    const maha = timeline.levels.mahadasha;

    expect(maha.map((p) => [p.lord, years(p)])).toEqual([
      ["venus", 10],
      ["sun", 6],
      ["moon", 10],
      ["mars", 7],
      ["rahu", 18],
      ["jupiter", 16],
      ["saturn", 19],
      ["mercury", 17],
      ["ketu", 7],
      ["venus", 10],
    ]);
    expect(maha[0].start_ms).toBe(BIRTH_MS);
    expect(maha[maha.length - 1].end_ms).toBe(BIRTH_MS + CYCLE_MS);
    expect(timeline.starting_dasha).toEqual({
      lord: "venus",
      nakshatra: "Bharani",
      balance_years: 10,
      fraction_elapsed: 0.5,
    });
  });

  it("covers exactly 120 years", () => {
    for (const moon of [0, 20, 123.456, 359.9]) {
      const maha = assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: moon, max_level: 1 })
        .levels.mahadasha;
      const total = maha.reduce((sum, p) => sum + (p.end_ms - p.start_ms), 0);
      expect(total).toBe(CYCLE_MS);
      expect(maha[0].start_ms).toBe(BIRTH_MS);
    }
  });

  it("tiles every parent with its children", () => {
    const timeline = assembleDashaTimeline({
      birth: BIRTH,
      moon_sidereal_longitude: 123.456,
      max_level: 3,
    });

    for (const parent of timeline.periods.filter((p) => p.level < 3)) {
      expectTiling(
        timeline.periods.filter((p) => p.parent_id === parent.id),
        parent
      );
    }
  });

  it("divides the balance at birth among all nine lords from its own lord", () => {
    const timeline = assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 20, max_level: 2 });
    const first = timeline.levels.antardasha.filter((p) => p.parent_id === 0);

    // the Venus balance is 10 years: one cycle year maps to 10y / 120
    const unitMs = (10 * Y) / 120;
    expect(first.map((p) => [p.lord, (p.end_ms - p.start_ms) / unitMs])).toEqual([
      ["venus", 20],
      ["sun", 6],
      ["moon", 10],
      ["mars", 7],
      ["rahu", 18],
      ["jupiter", 16],
      ["saturn", 19],
      ["mercury", 17],
      ["ketu", 7],
    ]);
    expectTiling(first, timeline.levels.mahadasha[0]);
  });

  it("divides the truncated last mahadasha the same way", () => {
    const timeline = assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 20, max_level: 2 });
    const maha = timeline.levels.mahadasha;
    const last = maha[maha.length - 1];
    const children = timeline.levels.antardasha.filter((p) => p.parent_id === last.id);

    expect(last.lord).toBe("venus");
    expect(children.map((p) => p.lord)).toEqual([
      "venus",
      "sun",
      "moon",
      "mars",
      "rahu",
      "jupiter",
      "saturn",
      "mercury",
      "ketu",
    ]);
    expectTiling(children, last);
  });

  it("keeps each level chronological", () => {
    const timeline = assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 200, max_level: 3 });
    for (const periods of Object.values(timeline.levels)) {
      for (let i = 1; i < periods.length; i++) {
        expect(periods[i].start_ms).toBe(periods[i - 1].end_ms);
      }
    }
    expect(timeline.levels.sookshma).toEqual([]);
  });

  it("only builds the periods that overlap the window", () => {
    const timeline = assembleDashaTimeline({
      birth: BIRTH,
      moon_sidereal_longitude: 20,
      until: "2000-01-02T00:00:00Z",
      max_level: 3,
    });

    expect(timeline.periods.map((p) => [p.id, p.parent_id, p.level_name, p.lord])).toEqual([
      [0, null, "mahadasha", "venus"],
      [1, 0, "antardasha", "venus"],
      [2, 1, "pratyantardasha", "venus"],
    ]);
    expect(timeline.until).toBe("2000-01-02T00:00:00.000Z");
  });

  it("leaves out periods that start exactly at until", () => {
    // Venus/Venus/Venus lasts 10y/6 × 20/120 = 8_766_000_000 ms
    const timeline = assembleDashaTimeline({
      birth: BIRTH,
      moon_sidereal_longitude: 20,
      until: "2000-04-11T11:00:00Z",
      max_level: 3,
    });

    expect(timeline.levels.pratyantardasha.map((p) => [p.lord, p.end_ms])).toEqual([
      ["venus", BIRTH_MS + 8_766_000_000],
    ]);
    expect(timeline.periods).toHaveLength(3);
  });

  it("keeps the periods running at birth when until equals birth", () => {
    const timeline = assembleDashaTimeline({
      birth: BIRTH,
      moon_sidereal_longitude: 20,
      until: BIRTH,
      max_level: 3,
    });
    expect(timeline.periods).toHaveLength(3);
  });

  it("defaults to three levels", () => {
    const timeline = assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 0 });
    expect(timeline.max_level).toBe(3);
    expect(timeline.levels.pratyantardasha.length).toBeGreaterThan(0);
    expect(timeline.levels.sookshma).toHaveLength(0);
  });

  it("is deterministic and matches its schema", () => {
    const input = { birth: BIRTH, moon_sidereal_longitude: 77.7, max_level: 2 };
    const a = assembleDashaTimeline(input);
    expect(assembleDashaTimeline(input)).toEqual(a);
    expect(DashaTimelineSchema.safeParse(a).success).toBe(true);
  });

  it("rejects a window that ends before birth", () => {
    expect(() =>
      assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 0, until: "1999-12-31T00:00:00Z" })
    ).toThrow(InvalidInputError);
  });

  it("rejects out-of-range inputs", () => {
    expect(() => assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 360 })).toThrow(
      /moon_sidereal_longitude/
    );
    expect(() =>
      assembleDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 0, max_level: 6 })
    ).toThrow(/max_level/);
  });
});

describe("iterateDashaPeriods", () => {
  it("can be consumed partially", () => {
    const plan = planDashaTimeline({ birth: BIRTH, moon_sidereal_longitude: 0, max_level: 5 });
    const iterator = iterateDashaPeriods(plan);

    const levels: number[] = [];
    for (const period of iterator) {
      levels.push(period.level);
      if (levels.length === 5) break;
    }

    expect(levels).toEqual([1, 2, 3, 4, 5]);
  });

  it("descends to prana level with exact tiling", () => {
    const plan = planDashaTimeline({
      birth: BIRTH,
      moon_sidereal_longitude: 0,
      until: "2000-01-01T00:00:00Z",
      max_level: 5,
    });
    const periods = [...iterateDashaPeriods(plan)];

    expect(periods.map((p) => p.lord)).toEqual(["ketu", "ketu", "ketu", "ketu", "ketu"]);
    expect(periods.every((p) => p.start_ms === BIRTH_MS)).toBe(true);
  });
});
