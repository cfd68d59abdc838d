/**
 * Vimshottari dasha timeline.
 *
 * Periods are produced lazily, depth first, by iterateDashaPeriods(). Every
 * boundary is an integer millisecond computed from cumulative year fractions
 * of the parent's span, so siblings tile their parent exactly and no
 * rounding error accumulates between levels.
 *
 * Mahadashas are clipped to the life window [birth, birth + 120 years]; only
 * the first (the balance at birth) and the last are shorter than their lord's
 * years. Every period, clipped or not, holds all nine sub-periods.
 */

import { z } from "zod";
import { InvalidInputError } from "../errors.js";
import { epochMsFromUtcInput, MS_PER_DAY, toUtcIso, UtcInputSchema, type UtcInput } from "../instant.js";
import { parseInput } from "../validation.js";
import { calculateStartingDasha, type StartingDasha } from "./startingDasha.js";
import {
  CYCLE_MS,
  CYCLE_YEARS,
  cumulativeYears,
  cycleFrom,
  DASHA_YEARS,
  levelName,
  MAX_DASHA_LEVEL,
  MS_PER_JULIAN_YEAR,
  type DashaLevel,
  type DashaLevelName,
  type DashaLord,
} from "./vimshottari.js";

export interface DashaPeriod {
  /** Position in depth-first order, unique within one timeline */
  id: number;
  parent_id: number | null;
  lord: DashaLord;
  level: DashaLevel;
  level_name: DashaLevelName;
  start: string;
  end: string;
  start_ms: number;
  end_ms: number;
  duration_days: number;
}

export interface DashaTimeline {
  birth: string;
  until: string;
  max_level: DashaLevel;
  starting_dasha: {
    lord: DashaLord;
    nakshatra: string;
    balance_years: number;
    fraction_elapsed: number;
  };
  periods: DashaPeriod[];
  levels: Record<DashaLevelName, DashaPeriod[]>;
}

export const DashaTimelineInputSchema = z.object({
  birth: UtcInputSchema,
  moon_sidereal_longitude: z.number().finite().min(0).lt(360),
  until: UtcInputSchema.optional(),
  max_level: z.number().int().min(1).max(MAX_DASHA_LEVEL).default(3),
});

export type DashaTimelineInput = {
  birth: UtcInput;
  moon_sidereal_longitude: number;
  /** Defaults to the end of the 120-year cycle */
  until?: UtcInput;
  /** 1..5, defaults to 3 */
  max_level?: number;
};

export interface DashaPlan {
  birth_ms: number;
  until_ms: number;
  life_end_ms: number;
  /** Nominal start of the first mahadasha, before birth unless the fraction is 0 */
  cycle_start_ms: number;
  max_level: DashaLevel;
  starting: StartingDasha;
}

interface Span {
  start_ms: number;
  end_ms: number;
}

interface PeriodNode {
  lord: DashaLord;
  level: DashaLevel;
  span: Span;
}

function isDashaLevel(value: number): value is DashaLevel {
  return Number.isInteger(value) && value >= 1 && value <= MAX_DASHA_LEVEL;
}

function toDashaLevel(value: number): DashaLevel {
  if (!isDashaLevel(value)) {
    throw new InvalidInputError("dasha timeline", [`max_level: must be 1..${MAX_DASHA_LEVEL}`]);
  }
  return value;
}

function clip(span: Span, window: Span): Span | null {
  const start_ms = Math.max(span.start_ms, window.start_ms);
  const end_ms = Math.min(span.end_ms, window.end_ms);
  return end_ms > start_ms ? { start_ms, end_ms } : null;
}

/**
 * Validate the request and fix the anchor of the cycle.
 */
export function planDashaTimeline(input: DashaTimelineInput): DashaPlan {
  const parsed = parseInput(DashaTimelineInputSchema, input, "dasha timeline");
  const birthMs = epochMsFromUtcInput(parsed.birth);
  const lifeEndMs = birthMs + CYCLE_MS;
  const untilMs = parsed.until === undefined ? lifeEndMs : epochMsFromUtcInput(parsed.until);

  if (untilMs < birthMs) {
    throw new InvalidInputError("dasha timeline", ["until: must not be before birth"]);
  }

  const starting = calculateStartingDasha(parsed.moon_sidereal_longitude);
  const consumedMs = Math.round(
    starting.fraction_elapsed * DASHA_YEARS[starting.lord] * MS_PER_JULIAN_YEAR
  );

  return {
    birth_ms: birthMs,
    until_ms: untilMs,
    life_end_ms: lifeEndMs,
    cycle_start_ms: birthMs - consumedMs,
    max_level: toDashaLevel(parsed.max_level),
    starting,
  };
}

/**
 * Level-1 periods: the nine lords from the starting lord, then the starting
 * lord again when part of it was consumed before birth. Clipping to the life
 * window makes the set sum to exactly 120 years.
 */
function mahadashaNodes(plan: DashaPlan): PeriodNode[] {
  const life: Span = { start_ms: plan.birth_ms, end_ms: plan.life_end_ms };
  const lords = [...cycleFrom(plan.starting.lord), plan.starting.lord];
  const nodes: PeriodNode[] = [];
  let offsetYears = 0;

  for (const lord of lords) {
    const nominal: Span = {
      start_ms: plan.cycle_start_ms + offsetYears * MS_PER_JULIAN_YEAR,
      end_ms: plan.cycle_start_ms + (offsetYears + DASHA_YEARS[lord]) * MS_PER_JULIAN_YEAR,
    };
    offsetYears += DASHA_YEARS[lord];
    const span = clip(nominal, life);
    if (span) nodes.push({ lord, level: 1, span });
  }
  return nodes;
}

/**
 * Nine sub-periods of a node's span in cycle order from its lord, each
 * `lord_years × D / 120` long. Sub-periods shorter than a millisecond vanish.
 */
function subdivide(node: PeriodNode, level: DashaLevel): PeriodNode[] {
  const duration = node.span.end_ms - node.span.start_ms;
  const offsets = cumulativeYears(node.lord);
  const boundary = (k: number) =>
    node.span.start_ms + Math.round((duration * offsets[k]) / CYCLE_YEARS);

  const children: PeriodNode[] = [];
  cycleFrom(node.lord).forEach((lord, k) => {
    const span: Span = { start_ms: boundary(k), end_ms: boundary(k + 1) };
    if (span.end_ms > span.start_ms) children.push({ lord, level, span });
  });
  return children;
}

function toPeriod(node: PeriodNode, id: number, parentId: number | null): DashaPeriod {
  return {
    id,
    parent_id: parentId,
    lord: node.lord,
    level: node.level,
    level_name: levelName(node.level),
    start: toUtcIso(node.span.start_ms),
    end: toUtcIso(node.span.end_ms),
    start_ms: node.span.start_ms,
    end_ms: node.span.end_ms,
    duration_days: (node.span.end_ms - node.span.start_ms) / MS_PER_DAY,
  };
}

/**
 * Walk the tree depth first. Only periods overlapping [birth, until) are
 * produced (the periods running at birth when until equals birth), and
 * nothing below max_level is ever built.
 */
export function* iterateDashaPeriods(plan: DashaPlan): Generator<DashaPeriod> {
  let nextId = 0;
  const overlapsWindow = (span: Span) =>
    span.end_ms > plan.birth_ms &&
    (plan.until_ms > plan.birth_ms ? span.start_ms < plan.until_ms : span.start_ms <= plan.until_ms);

  function* walk(node: PeriodNode, parentId: number | null): Generator<DashaPeriod> {
    if (!overlapsWindow(node.span)) return;
    const period = toPeriod(node, nextId, parentId);
    nextId += 1;
    yield period;

    const childLevel = node.level + 1;
    if (!isDashaLevel(childLevel) || childLevel > plan.max_level) return;
    for (const child of subdivide(node, childLevel)) {
      yield* walk(child, period.id);
    }
  }

  for (const node of mahadashaNodes(plan)) {
    yield* walk(node, null);
  }
}

function emptyLevels(): Record<DashaLevelName, DashaPeriod[]> {
  return {
    mahadasha: [],
    antardasha: [],
    pratyantardasha: [],
    sookshma: [],
    prana: [],
  };
}

/**
 * Materialize the pruned tree as a flat arena plus chronological lists per
 * level. Depth-first order keeps each level's list chronological.
 */
export function assembleDashaTimeline(input: DashaTimelineInput): DashaTimeline {
  const plan = planDashaTimeline(input);
  const periods = [...iterateDashaPeriods(plan)];
  const levels = emptyLevels();
  for (const period of periods) {
    levels[period.level_name].push(period);
  }

  return {
    birth: toUtcIso(plan.birth_ms),
    until: toUtcIso(plan.until_ms),
    max_level: plan.max_level,
    starting_dasha: {
      lord: plan.starting.lord,
      nakshatra: plan.starting.nakshatra.name,
      balance_years: plan.starting.balance_years,
      fraction_elapsed: plan.starting.fraction_elapsed,
    },
    periods,
    levels,
  };
}
