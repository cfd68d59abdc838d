import type { DashaLord } from "../dasha/vimshottari.js";
import { LIFE_DOMAINS, STRENGTH_POLICY_V1, type LifeDomain, type StrengthPolicyV1 } from "./policy/strengthPolicy.v1.js";
import type { StrengthReport, StrengthScore } from "./scorePlanetaryStrength.js";

export type DashaTone = "supportive" | "positive" | "mixed" | "challenging" | "transformative";

export interface DashaImpact {
  dasha_lord: DashaLord;
  strength: StrengthScore;
  /** 0-10 per domain */
  impact_scores: Record<LifeDomain, number>;
  tone: DashaTone;
  keywords: readonly string[];
}

export interface DashaShift {
  domain: LifeDomain;
  direction: "increases" | "decreases";
  delta: number;
}

export interface DashaImpactComparison {
  current: DashaImpact;
  next: DashaImpact;
  deltas: Record<LifeDomain, number>;
  major_shifts: DashaShift[];
  transition_summary: string;
}

/** Minimum |delta| on the 0-10 scale reported as a major shift */
export const MAJOR_SHIFT_THRESHOLD = 2.0;

const LORD_KEYWORDS: Record<DashaLord, readonly string[]> = {
  sun: ["authority", "vitality", "ego", "father"],
  moon: ["emotions", "mother", "mind", "nurturing"],
  mars: ["energy", "courage", "action", "conflict"],
  mercury: ["intellect", "communication", "learning", "commerce"],
  jupiter: ["wisdom", "expansion", "fortune", "teaching"],
  venus: ["love", "beauty", "harmony", "luxury"],
  saturn: ["discipline", "responsibility", "restriction", "karma"],
  rahu: ["ambition", "illusion", "obsession", "foreign"],
  ketu: ["detachment", "spirituality", "liberation", "moksha"],
};

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export function toneFor(strengthFactor: number): DashaTone {
  if (strengthFactor >= 0.75) return "supportive";
  if (strengthFactor >= 0.6) return "positive";
  if (strengthFactor >= 0.4) return "mixed";
  if (strengthFactor >= 0.25) return "challenging";
  return "transformative";
}

/**
 * How strongly a dasha lord's period touches each life domain, given the
 * lord's natal strength.
 */
export function calculateDashaImpact(
  lord: DashaLord,
  report: StrengthReport,
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1
): DashaImpact {
  const strength = report.scores[lord];
  const factor = strength.composite / 100;
  const affinity = policy.affinity[lord];

  return {
    dasha_lord: lord,
    strength,
    impact_scores: {
      career: round1(affinity.career * factor * 10),
      relationship: round1(affinity.relationship * factor * 10),
      health: round1(affinity.health * factor * 10),
      spiritual: round1(affinity.spiritual * factor * 10),
    },
    tone: toneFor(factor),
    keywords: LORD_KEYWORDS[lord],
  };
}

export function compareDashaImpacts(
  currentLord: DashaLord,
  nextLord: DashaLord,
  report: StrengthReport,
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1
): DashaImpactComparison {
  const current = calculateDashaImpact(currentLord, report, policy);
  const next = calculateDashaImpact(nextLord, report, policy);

  const deltas: Record<LifeDomain, number> = {
    career: round1(next.impact_scores.career - current.impact_scores.career),
    relationship: round1(next.impact_scores.relationship - current.impact_scores.relationship),
    health: round1(next.impact_scores.health - current.impact_scores.health),
    spiritual: round1(next.impact_scores.spiritual - current.impact_scores.spiritual),
  };

  const majorShifts: DashaShift[] = LIFE_DOMAINS.filter(
    (domain) => Math.abs(deltas[domain]) >= MAJOR_SHIFT_THRESHOLD
  ).map((domain): DashaShift => ({
    domain,
    direction: deltas[domain] > 0 ? "increases" : "decreases",
    delta: deltas[domain],
  }));

  return {
    current,
    next,
    deltas,
    major_shifts: majorShifts,
    transition_summary: `Shifting from ${current.tone} ${currentLord} to ${next.tone} ${nextLord}`,
  };
}
