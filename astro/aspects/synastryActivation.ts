/**
 * Transit activation of synastry aspects.
 *
 * A synastry aspect between chart A and chart B is active on a day when a
 * fast transiting body aspects either of its two natal bodies. Days are
 * sampled once each, at the time of day of `start`.
 */

import { DateTime } from "luxon";
import { z } from "zod";
import type { BodyId, EphemerisProvider, ReferenceFrame } from "../ephemeris/types.js";
import { createInstant, epochMsFromUtcInput, toUtcIso, UtcInputSchema, type UtcInput } from "../instant.js";
import { parseInput } from "../validation.js";
import { classifyPulse, tightness, type PulseReading } from "./classifyPulse.js";
import { findAspects, validateOrbTable, type AspectBodies, type AspectEvent } from "./computeAspects.js";
import {
  ActivationPolicySchema,
  ASPECT_POLICY_V1,
  PulsePolicySchema,
  type ActivationPolicy,
  type AspectType,
  type OrbTable,
  type PulsePolicy,
} from "./policy/aspectPolicy.v1.js";

export interface SynastryCharts {
  a: AspectBodies;
  b: AspectBodies;
}

export interface ActivationTrigger {
  transiting: BodyId;
  chart: "a" | "b";
  natal_body: BodyId;
  type: AspectType;
  orb_deg: number;
}

export interface Activation {
  /** "<body_a> <type> <body_b>" of the synastry aspect */
  key: string;
  aspect: AspectEvent;
  /** False for challenging aspect types */
  supportive: boolean;
  /** 0-1, from the tightest trigger */
  strength: number;
  trigger: ActivationTrigger;
}

export interface ActivationRequest {
  /** Synastry aspects, body_a from chart A and body_b from chart B */
  synastry: AspectEvent[];
  charts: SynastryCharts;
  provider: EphemerisProvider;
  /** Frame of the natal longitudes, default tropical */
  frame?: ReferenceFrame;
  orbs?: OrbTable;
  policy?: ActivationPolicy;
  pulse?: PulsePolicy;
}

export interface SignificantShift {
  at: string;
  date: string;
  days_away: number;
  /** Keys of the strong activations that were not active the day before */
  new_activations: string[];
  activations: Activation[];
  pulse: PulseReading;
}

export type JourneyIntensity = "quiet" | "peak" | "elevated" | "challenging" | "neutral";

export interface JourneyDay {
  date: string;
  at: string;
  intensity: JourneyIntensity;
  total_strength: number;
  supportive: number;
  challenging: number;
  /** Key of the strongest activation, for peak, elevated and challenging days */
  lead: string | null;
}

export interface PeakWindow {
  start_date: string;
  end_date: string;
  days: number;
  /** Still running on the last forecast day */
  open_ended: boolean;
}

export interface JourneyForecast {
  days: JourneyDay[];
  peak_windows: PeakWindow[];
}

const FrameSchema = z.enum(["tropical", "sidereal"]).default("tropical");
const DayCountSchema = z.number().int().min(1).max(366).default(30);

const DayRequestSchema = z.object({ at: UtcInputSchema, frame: FrameSchema });
const ShiftRequestSchema = z.object({
  start: UtcInputSchema,
  days_ahead: DayCountSchema,
  frame: FrameSchema,
});
const ForecastRequestSchema = z.object({
  start: UtcInputSchema,
  days: DayCountSchema,
  frame: FrameSchema,
});

function round4(value: number): number {
  return Number(value.toFixed(4));
}

function aspectKey(aspect: AspectEvent): string {
  return `${aspect.body_a} ${aspect.type} ${aspect.body_b}`;
}

export interface ActivationRules {
  orbs: OrbTable;
  policy: ActivationPolicy;
  pulse: PulsePolicy;
}

const DEFAULT_RULES: ActivationRules = {
  orbs: ASPECT_POLICY_V1.orbs,
  policy: ASPECT_POLICY_V1.activation,
  pulse: ASPECT_POLICY_V1.pulse,
};

function resolveRules(request: ActivationRequest): ActivationRules {
  const policy = request.policy ?? ASPECT_POLICY_V1.activation;
  if (policy !== ASPECT_POLICY_V1.activation) {
    parseInput(ActivationPolicySchema, policy, "activation policy");
  }
  const pulse = request.pulse ?? ASPECT_POLICY_V1.pulse;
  if (pulse !== ASPECT_POLICY_V1.pulse) {
    parseInput(PulsePolicySchema, pulse, "pulse policy");
  }
  return {
    orbs: validateOrbTable(request.orbs ?? ASPECT_POLICY_V1.orbs),
    policy,
    pulse,
  };
}

/**
 * The tightest trigger of one synastry aspect among the transiting bodies,
 * or null when none aspects either natal body.
 */
export function activationOf(
  aspect: AspectEvent,
  transit: AspectBodies,
  charts: SynastryCharts,
  rules: ActivationRules = DEFAULT_RULES
): Activation | null {
  const { orbs, policy, pulse } = rules;
  const triggers: AspectBodies = {};
  for (const body of policy.trigger_bodies) {
    const position = transit[body];
    if (position) triggers[body] = { longitude: position.longitude };
  }

  let best: { strength: number; trigger: ActivationTrigger } | null = null;
  const sides = [
    ["a", aspect.body_a],
    ["b", aspect.body_b],
  ] as const;

  for (const [chart, natalBody] of sides) {
    const natalLon = charts[chart][natalBody]?.longitude;
    if (natalLon === undefined) continue;
    const natal: AspectBodies = {};
    natal[natalBody] = { longitude: natalLon };

    for (const hit of findAspects(triggers, natal, orbs)) {
      const boosted = pulse.harmonious.includes(hit.type) || pulse.amplifying.includes(hit.type);
      const strength = Math.min(1, tightness(hit) * (boosted ? policy.supportive_boost : 1));
      if (best === null || strength > best.strength) {
        best = {
          strength,
          trigger: {
            transiting: hit.body_a,
            chart,
            natal_body: natalBody,
            type: hit.type,
            orb_deg: hit.orb_deg,
          },
        };
      }
    }
  }

  if (best === null) return null;
  return {
    key: aspectKey(aspect),
    aspect,
    supportive: !pulse.challenging.includes(aspect.type),
    strength: round4(best.strength),
    trigger: best.trigger,
  };
}

function activationsAt(
  request: ActivationRequest,
  rules: ActivationRules,
  epochMs: number,
  frame: ReferenceFrame
): Activation[] {
  const instant = createInstant({ utc: toUtcIso(epochMs), latitude: 0, longitude: 0 });
  const transit: AspectBodies = request.provider.positions(instant, frame).bodies;

  return request.synastry
    .map((aspect, index) => ({ index, activation: activationOf(aspect, transit, request.charts, rules) }))
    .flatMap(({ index, activation }) =>
      activation !== null && activation.strength >= rules.policy.min_strength
        ? [{ index, activation }]
        : []
    )
    .sort((x, y) => y.activation.strength - x.activation.strength || x.index - y.index)
    .map(({ activation }) => activation);
}

function dayAt(startMs: number, offset: number): DateTime {
  return DateTime.fromMillis(startMs, { zone: "utc" }).plus({ days: offset });
}

/**
 * Synastry aspects activated at one instant, strongest first. Activations
 * below the policy's minimum strength are left out.
 */
export function findDayActivations(request: ActivationRequest & { at: UtcInput }): Activation[] {
  const parsed = parseInput(DayRequestSchema, request, "activation request");
  return activationsAt(request, resolveRules(request), epochMsFromUtcInput(parsed.at), parsed.frame);
}

/**
 * First day after `start` on which a strong activation begins or the number
 * of activations changes sharply, or null when none does within `days_ahead`.
 */
export function findNextSignificantShift(
  request: ActivationRequest & { start: UtcInput; days_ahead?: number }
): SignificantShift | null {
  const parsed = parseInput(ShiftRequestSchema, request, "activation request");
  const rules = resolveRules(request);
  const startMs = epochMsFromUtcInput(parsed.start);

  let previous = activationsAt(request, rules, startMs, parsed.frame);
  for (let offset = 1; offset <= parsed.days_ahead; offset++) {
    const day = dayAt(startMs, offset);
    const current = activationsAt(request, rules, day.toMillis(), parsed.frame);
    const previousKeys = new Set(previous.map((a) => a.key));
    const fresh = current.filter(
      (a) => a.strength >= rules.policy.shift_strength && !previousKeys.has(a.key)
    );

    if (fresh.length > 0 || Math.abs(current.length - previous.length) >= rules.policy.shift_count_change) {
      return {
        at: toUtcIso(day.toMillis()),
        date: day.toISODate() ?? toUtcIso(day.toMillis()).slice(0, 10),
        days_away: offset,
        new_activations: fresh.map((a) => a.key),
        activations: current,
        pulse: classifyPulse(
          current.map((a) => a.aspect),
          rules.pulse
        ),
      };
    }
    previous = current;
  }
  return null;
}

function intensityOf(
  activations: Activation[],
  total: number,
  supportive: number,
  challenging: number,
  policy: ActivationPolicy
): JourneyIntensity {
  if (activations.length === 0) return "quiet";
  if (total >= policy.peak.total_at_least && supportive >= policy.peak.supportive_at_least) return "peak";
  if (total >= policy.elevated.total_at_least && supportive >= policy.elevated.supportive_at_least) {
    return "elevated";
  }
  if (challenging > supportive) return "challenging";
  return "neutral";
}

/**
 * Daily intensity markers from `start`, plus the runs of peak or elevated
 * days long enough to count as windows.
 */
export function buildJourneyForecast(
  request: ActivationRequest & { start: UtcInput; days?: number }
): JourneyForecast {
  const parsed = parseInput(ForecastRequestSchema, request, "activation request");
  const rules = resolveRules(request);
  const startMs = epochMsFromUtcInput(parsed.start);

  const days: JourneyDay[] = [];
  const windows: PeakWindow[] = [];
  let run: JourneyDay[] = [];

  const closeRun = (openEnded: boolean) => {
    if (run.length >= rules.policy.window_min_days) {
      windows.push({
        start_date: run[0].date,
        end_date: run[run.length - 1].date,
        days: run.length,
        open_ended: openEnded,
      });
    }
    run = [];
  };

  for (let offset = 0; offset < parsed.days; offset++) {
    const day = dayAt(startMs, offset);
    const activations = activationsAt(request, rules, day.toMillis(), parsed.frame);
    const supportive = activations.filter((a) => a.supportive).length;
    const challenging = activations.length - supportive;
    const total = round4(activations.reduce((sum, a) => sum + a.strength, 0));
    const intensity = intensityOf(activations, total, supportive, challenging, rules.policy);

    const marker: JourneyDay = {
      date: day.toISODate() ?? toUtcIso(day.toMillis()).slice(0, 10),
      at: toUtcIso(day.toMillis()),
      intensity,
      total_strength: total,
      supportive,
      challenging,
      lead:
        intensity === "peak" || intensity === "elevated" || intensity === "challenging"
          ? activations[0].key
          : null,
    };
    days.push(marker);

    if ((intensity === "peak" || intensity === "elevated") && supportive > 0) {
      run.push(marker);
    } else {
      closeRun(false);
    }
  }
  closeRun(true);

  return { days, peak_windows: windows.slice(0, rules.policy.window_max_count) };
}
