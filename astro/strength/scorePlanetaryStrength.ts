import type { SignName } from "../angles.js";
import { houseAngularity, isDayBirth, wholeSignHouse } from "../ephemeris/houses.js";
import { BODY_IDS, type BodyId, type BodyPosition, type PositionSet } from "../ephemeris/types.js";
import { parseInput } from "../validation.js";
import {
  STRENGTH_POLICY_V1,
  StrengthPolicySchema,
  type Dignity,
  type LifeDomain,
  type StrengthPolicyV1,
} from "./policy/strengthPolicy.v1.js";

export interface StrengthContext {
  /**
   * Ascendant longitude in the same frame as the positions, or null when the
   * birth time is unknown.
   */
  ascendant_longitude: number | null;
}

export interface StrengthScore {
  body: BodyId;
  positional: number;
  /** null when the birth time is unknown */
  directional: number | null;
  temporal: number;
  composite: number;
  dignity: Dignity;
  house: number | null;
  domain_impact: Record<LifeDomain, number>;
}

export interface StrengthReport {
  strength_policy_version: string;
  scores: Record<BodyId, StrengthScore>;
  domain_impact: Record<LifeDomain, number>;
  directional_available: boolean;
  is_day_birth: boolean | null;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clampScore(value: number): number {
  return Math.min(100, Math.max(0, value));
}

export function classifyDignity(
  body: BodyId,
  sign: SignName,
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1
): Dignity {
  const table = policy.dignities[body];
  if (table.exaltation === sign) return "exalted";
  if (table.debilitation === sign) return "debilitated";
  if (table.own.includes(sign)) return "own";

  const lord = policy.sign_lords[sign];
  if (table.friends.includes(lord)) return "friendly";
  if (table.enemies.includes(lord)) return "enemy";
  return "neutral";
}

export function temporalStrength(
  position: BodyPosition,
  dayBirth: boolean | null,
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1
): number {
  const t = policy.temporal;
  let score = t.base;

  if (dayBirth !== null) {
    if (t.day_rulers.includes(position.body)) {
      score += dayBirth ? t.day_night_bonus : -t.day_night_bonus;
    } else if (t.night_rulers.includes(position.body)) {
      score += dayBirth ? -t.day_night_bonus : t.day_night_bonus;
    }
  }

  if (position.retrograde && !t.retrograde_exempt.includes(position.body)) {
    score *= t.retrograde_multiplier;
  }
  return round2(clampScore(score));
}

/**
 * Weighted composite; without a directional score the remaining weights are
 * scaled back up to 1.0.
 */
export function compositeStrength(
  parts: { positional: number; directional: number | null; temporal: number },
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1
): number {
  const w = policy.weights;
  if (parts.directional === null) {
    const total = w.positional + w.temporal;
    const value =
      total > 0 ? (parts.positional * w.positional + parts.temporal * w.temporal) / total : 0;
    return round2(clampScore(value));
  }
  return round2(
    clampScore(
      parts.positional * w.positional +
        parts.directional * w.directional +
        parts.temporal * w.temporal
    )
  );
}

function domainMap(fn: (domain: LifeDomain) => number): Record<LifeDomain, number> {
  return {
    career: fn("career"),
    relationship: fn("relationship"),
    health: fn("health"),
    spiritual: fn("spiritual"),
  };
}

/**
 * Score every body in the set. Pure; the policy is validated on every call
 * unless it is the built-in one.
 */
export function scorePlanetaryStrength(
  positions: PositionSet,
  context: StrengthContext,
  policy: StrengthPolicyV1 = STRENGTH_POLICY_V1
): StrengthReport {
  if (policy !== STRENGTH_POLICY_V1) {
    parseInput(StrengthPolicySchema, policy, "strength policy");
  }

  const ascendant = context.ascendant_longitude;
  const dayBirth = ascendant === null ? null : isDayBirth(positions.bodies.sun.longitude, ascendant);

  const scoreBody = (body: BodyId): StrengthScore => {
    const position = positions.bodies[body];
    const dignity = classifyDignity(body, position.sign, policy);
    const positional = policy.dignity_scores[dignity];
    const house = ascendant === null ? null : wholeSignHouse(position.longitude, ascendant);
    const directional = house === null ? null : policy.angularity_scores[houseAngularity(house)];
    const temporal = temporalStrength(position, dayBirth, policy);
    const composite = compositeStrength({ positional, directional, temporal }, policy);

    return {
      body,
      positional,
      directional,
      temporal,
      composite,
      dignity,
      house,
      domain_impact: domainMap((domain) => round2(composite * policy.affinity[body][domain])),
    };
  };

  const scores: Record<BodyId, StrengthScore> = {
    sun: scoreBody("sun"),
    moon: scoreBody("moon"),
    mercury: scoreBody("mercury"),
    venus: scoreBody("venus"),
    mars: scoreBody("mars"),
    jupiter: scoreBody("jupiter"),
    saturn: scoreBody("saturn"),
    uranus: scoreBody("uranus"),
    neptune: scoreBody("neptune"),
    pluto: scoreBody("pluto"),
    rahu: scoreBody("rahu"),
    ketu: scoreBody("ketu"),
  };

  const domainImpact = domainMap((domain) => {
    let weighted = 0;
    let totalAffinity = 0;
    for (const body of BODY_IDS) {
      const affinity = policy.affinity[body][domain];
      if (affinity <= 0) continue;
      weighted += affinity * scores[body].composite;
      totalAffinity += affinity;
    }
    return totalAffinity > 0 ? round2(weighted / totalAffinity) : 0;
  });

  return {
    strength_policy_version: policy.strength_policy_version,
    scores,
    domain_impact: domainImpact,
    directional_available: ascendant !== null,
    is_day_birth: dayBirth,
  };
}
