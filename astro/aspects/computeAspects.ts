/**
 * Pure functions for computing aspects between celestial bodies.
 * No interpretation, only geometric relationships.
 */

import { angularSeparation } from "../angles.js";
import { BODY_IDS, type BodyId } from "../ephemeris/types.js";
import { parseInput } from "../validation.js";
import {
  allowedOrb,
  ASPECT_POLICY_V1,
  ASPECT_TYPES,
  ASPECT_ANGLES,
  OrbTableSchema,
  type AspectType,
  type OrbTable,
} from "./policy/aspectPolicy.v1.js";

export interface AspectEvent {
  body_a: BodyId;
  body_b: BodyId;
  type: AspectType;
  separation_deg: number;
  /** Deviation from the exact aspect angle */
  orb_deg: number;
  orb_allowed_deg: number;
  /** Exact moment, only when computed over a transit window */
  exact_at: string | null;
}

export type AspectBodies = Partial<Record<BodyId, { longitude: number }>>;

function round4(value: number): number {
  return Number(value.toFixed(4));
}

/**
 * Nearest canonical aspect within its orb for the pair, or null.
 * Ties go to the smallest deviation, then to the earlier aspect type.
 */
export function detectAspect(
  lonA: number,
  lonB: number,
  bodyA: BodyId,
  bodyB: BodyId,
  orbs: OrbTable
): { type: AspectType; separation: number; deviation: number; allowed: number } | null {
  const separation = angularSeparation(lonA, lonB);

  let best: { type: AspectType; separation: number; deviation: number; allowed: number } | null =
    null;

  for (const type of ASPECT_TYPES) {
    const deviation = Math.abs(separation - ASPECT_ANGLES[type]);
    const allowed = allowedOrb(orbs, type, bodyA, bodyB);
    if (deviation <= allowed && (best === null || deviation < best.deviation)) {
      best = { type, separation, deviation, allowed };
    }
  }

  return best;
}

function toEvent(
  bodyA: BodyId,
  bodyB: BodyId,
  found: { type: AspectType; separation: number; deviation: number; allowed: number }
): AspectEvent {
  return {
    body_a: bodyA,
    body_b: bodyB,
    type: found.type,
    separation_deg: round4(found.separation),
    orb_deg: round4(found.deviation),
    orb_allowed_deg: found.allowed,
    exact_at: null,
  };
}

export function validateOrbTable(orbs: OrbTable): OrbTable {
  if (orbs !== ASPECT_POLICY_V1.orbs) {
    parseInput(OrbTableSchema, orbs, "orb table");
  }
  return orbs;
}

/**
 * Every directed pair (a from setA, b from setB). Used for transit-to-natal
 * and for synastry between two charts.
 */
export function findAspects(
  setA: AspectBodies,
  setB: AspectBodies,
  orbs: OrbTable = ASPECT_POLICY_V1.orbs
): AspectEvent[] {
  validateOrbTable(orbs);
  const events: AspectEvent[] = [];

  for (const bodyA of BODY_IDS) {
    const lonA = setA[bodyA]?.longitude;
    if (lonA === undefined) continue;

    for (const bodyB of BODY_IDS) {
      const lonB = setB[bodyB]?.longitude;
      if (lonB === undefined) continue;

      const found = detectAspect(lonA, lonB, bodyA, bodyB, orbs);
      if (found) events.push(toEvent(bodyA, bodyB, found));
    }
  }

  return events;
}

/**
 * Aspects within a single chart, each unordered pair once. Rahu/Ketu are
 * always opposed, so that pair is skipped.
 */
export function findChartAspects(
  set: AspectBodies,
  orbs: OrbTable = ASPECT_POLICY_V1.orbs
): AspectEvent[] {
  validateOrbTable(orbs);
  const events: AspectEvent[] = [];

  for (let i = 0; i < BODY_IDS.length; i++) {
    const bodyA = BODY_IDS[i];
    const lonA = set[bodyA]?.longitude;
    if (lonA === undefined) continue;

    for (let j = i + 1; j < BODY_IDS.length; j++) {
      const bodyB = BODY_IDS[j];
      if (bodyA === "rahu" && bodyB === "ketu") continue;
      const lonB = set[bodyB]?.longitude;
      if (lonB === undefined) continue;

      const found = detectAspect(lonA, lonB, bodyA, bodyB, orbs);
      if (found) events.push(toEvent(bodyA, bodyB, found));
    }
  }

  return events;
}
