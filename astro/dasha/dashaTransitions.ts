import { DateTime } from "luxon";
import { epochMsFromUtcInput, UtcInputSchema, type UtcInput } from "../instant.js";
import { parseInput } from "../validation.js";
import type { DashaPeriod, DashaTimeline } from "./assembleDashaTimeline.js";
import { DASHA_LEVEL_NAMES, type DashaLevelName, type DashaLord } from "./vimshottari.js";

const DAYS_PER_YEAR = 365.25;
const DAYS_PER_MONTH = 30.4375;

export interface DashaTransition {
  level_name: DashaLevelName;
  current_lord: DashaLord;
  started_on: string;
  ends_on: string;
  days_remaining: number;
  months_remaining: number;
  years_remaining: number;
  next_lord: DashaLord | null;
}

export interface UpcomingMahadasha {
  lord: DashaLord;
  start: string;
  end: string;
  duration_years: number;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function atMs(at: UtcInput): number {
  return epochMsFromUtcInput(parseInput(UtcInputSchema, at, "date"));
}

function utcDate(epochMs: number): DateTime {
  return DateTime.fromMillis(epochMs, { zone: "utc" }).startOf("day");
}

/**
 * Period containing `epochMs`: start inclusive, end exclusive, except that
 * the final period of a level also owns its end instant.
 */
function activeIndex(periods: DashaPeriod[], epochMs: number): number {
  const index = periods.findIndex((p) => p.start_ms <= epochMs && epochMs < p.end_ms);
  if (index >= 0) return index;
  const last = periods.length - 1;
  return last >= 0 && periods[last].end_ms === epochMs ? last : -1;
}

/**
 * The active period at each materialized level, outermost first.
 */
export function findActivePeriods(timeline: DashaTimeline, at: UtcInput): DashaPeriod[] {
  const epochMs = atMs(at);
  const active: DashaPeriod[] = [];
  for (const name of DASHA_LEVEL_NAMES) {
    const periods = timeline.levels[name];
    const index = activeIndex(periods, epochMs);
    if (index < 0) break;
    active.push(periods[index]);
  }
  return active;
}

/**
 * Current lord, time remaining and the following lord per level. Day counts
 * compare calendar dates in UTC.
 */
export function describeDashaTransitions(
  timeline: DashaTimeline,
  at: UtcInput
): DashaTransition[] {
  const epochMs = atMs(at);
  const today = utcDate(epochMs);
  const transitions: DashaTransition[] = [];

  for (const name of DASHA_LEVEL_NAMES) {
    const periods = timeline.levels[name];
    const index = activeIndex(periods, epochMs);
    if (index < 0) break;

    const current = periods[index];
    const next = index + 1 < periods.length ? periods[index + 1] : undefined;
    const daysRemaining = Math.round(utcDate(current.end_ms).diff(today, "days").days);

    transitions.push({
      level_name: name,
      current_lord: current.lord,
      started_on: utcDate(current.start_ms).toISODate() ?? current.start.slice(0, 10),
      ends_on: utcDate(current.end_ms).toISODate() ?? current.end.slice(0, 10),
      days_remaining: daysRemaining,
      months_remaining: round(daysRemaining / DAYS_PER_MONTH, 1),
      years_remaining: round(daysRemaining / DAYS_PER_YEAR, 2),
      next_lord: next ? next.lord : null,
    });
  }
  return transitions;
}

/**
 * Mahadashas after the one active at `at`, up to `count`.
 */
export function upcomingMahadashas(
  timeline: DashaTimeline,
  at: UtcInput,
  count = 3
): UpcomingMahadasha[] {
  const periods = timeline.levels.mahadasha;
  const index = activeIndex(periods, atMs(at));
  if (index < 0) return [];

  return periods.slice(index + 1, index + 1 + Math.max(0, Math.floor(count))).map((p) => ({
    lord: p.lord,
    start: p.start,
    end: p.end,
    duration_years: round(p.duration_days / DAYS_PER_YEAR, 2),
  }));
}
