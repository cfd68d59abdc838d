import { parseInput } from "../validation.js";
import type { AspectEvent } from "./computeAspects.js";
import {
  ASPECT_POLICY_V1,
  PulsePolicySchema,
  type PulseLabel,
  type PulsePolicy,
} from "./policy/aspectPolicy.v1.js";

export interface PulseReading {
  label: PulseLabel;
  net_tally: number;
  harmonious: number;
  challenging: number;
  amplifying: number;
  /** 0-100, 50 is balanced */
  score: number;
}

function round4(value: number): number {
  return Number(value.toFixed(4));
}

/**
 * 1 at exact, 0 at the edge of the orb.
 */
export function tightness(event: Pick<AspectEvent, "orb_deg" | "orb_allowed_deg">): number {
  if (event.orb_allowed_deg <= 0) return event.orb_deg === 0 ? 1 : 0;
  return Math.min(1, Math.max(0, 1 - event.orb_deg / event.orb_allowed_deg));
}

/**
 * Collapse a set of aspects into one categorical reading. Harmonious minus
 * challenging tightness gives the net tally; conjunctions only amplify.
 */
export function classifyPulse(
  events: AspectEvent[],
  policy: PulsePolicy = ASPECT_POLICY_V1.pulse
): PulseReading {
  if (policy !== ASPECT_POLICY_V1.pulse) {
    parseInput(PulsePolicySchema, policy, "pulse policy");
  }

  let harmonious = 0;
  let challenging = 0;
  let amplifying = 0;

  for (const event of events) {
    const weight = tightness(event);
    if (policy.harmonious.includes(event.type)) harmonious += weight;
    else if (policy.challenging.includes(event.type)) challenging += weight;
    else if (policy.amplifying.includes(event.type)) amplifying += weight;
  }

  harmonious = round4(harmonious);
  challenging = round4(challenging);
  amplifying = round4(amplifying);
  const net = round4(harmonious - challenging);
  const total = harmonious + challenging + amplifying;

  let label: PulseLabel;
  if (total < policy.grounded_total_below) label = "grounded";
  else if (net >= policy.flowing_net_at_least) label = "flowing";
  else if (net <= policy.friction_net_at_most) label = "friction";
  else if (amplifying >= harmonious && amplifying >= challenging) label = "magnetic";
  else label = "electric";

  const score = Math.min(100, Math.max(0, policy.score_base + policy.score_per_net * net));

  return {
    label,
    net_tally: net,
    harmonious,
    challenging,
    amplifying,
    score: Math.round(score * 100) / 100,
  };
}
