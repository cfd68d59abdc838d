/**
 * Aspect Policy v1
 *
 * Orb tolerances, pulse thresholds and transit-activation rules for the
 * aspect engine.
 */

import { z } from "zod";
import { BODY_IDS, type BodyId } from "../../ephemeris/types.js";
import { deepFreeze } from "../../freeze.js";

export const ASPECT_TYPES = ["conjunction", "sextile", "square", "trine", "opposition"] as const;
export type AspectType = (typeof ASPECT_TYPES)[number];

export const ASPECT_ANGLES: Readonly<Record<AspectType, number>> = Object.freeze({
  conjunction: 0,
  sextile: 60,
  square: 90,
  trine: 120,
  opposition: 180,
});

export type BodyClass = "fast" | "slow";

export const BODY_CLASS: Readonly<Record<BodyId, BodyClass>> = Object.freeze({
  sun: "fast",
  moon: "fast",
  mercury: "fast",
  venus: "fast",
  mars: "fast",
  jupiter: "slow",
  saturn: "slow",
  uranus: "slow",
  neptune: "slow",
  pluto: "slow",
  rahu: "slow",
  ketu: "slow",
});

/** Allowed deviation in degrees per aspect type and body class */
export type OrbTable = Record<AspectType, Record<BodyClass, number>>;

export type PulseLabel = "flowing" | "electric" | "magnetic" | "grounded" | "friction";

export interface PulsePolicy {
  harmonious: AspectType[];
  challenging: AspectType[];
  amplifying: AspectType[];
  /** Total tightness below this reads as grounded */
  grounded_total_below: number;
  flowing_net_at_least: number;
  friction_net_at_most: number;
  score_base: number;
  score_per_net: number;
}

export interface IntensityThreshold {
  total_at_least: number;
  supportive_at_least: number;
}

/**
 * When transits switch synastry aspects on, and how a day's activations
 * read as a whole.
 */
export interface ActivationPolicy {
  /** Fast transiting bodies that can activate a synastry aspect */
  trigger_bodies: BodyId[];
  /** Multiplier for triggers by harmonious or amplifying aspects; strength is capped at 1 */
  supportive_boost: number;
  min_strength: number;
  /** A new activation at least this strong marks a shift */
  shift_strength: number;
  /** So does a day-to-day change of this many activations */
  shift_count_change: number;
  peak: IntensityThreshold;
  elevated: IntensityThreshold;
  window_min_days: number;
  window_max_count: number;
}

export interface AspectPolicyV1 {
  aspect_policy_version: string;
  orbs: OrbTable;
  pulse: PulsePolicy;
  activation: ActivationPolicy;
}

export const ASPECT_POLICY_V1: AspectPolicyV1 = deepFreeze<AspectPolicyV1>({
  aspect_policy_version: "aspect_v1",

  orbs: {
    conjunction: { fast: 8, slow: 10 },
    sextile: { fast: 5, slow: 6 },
    square: { fast: 7, slow: 8 },
    trine: { fast: 7, slow: 8 },
    opposition: { fast: 8, slow: 10 },
  },

  pulse: {
    harmonious: ["sextile", "trine"],
    challenging: ["square", "opposition"],
    amplifying: ["conjunction"],
    grounded_total_below: 0.5,
    flowing_net_at_least: 1,
    friction_net_at_most: -1,
    score_base: 50,
    score_per_net: 10,
  },

  activation: {
    trigger_bodies: ["moon", "mercury", "venus", "sun", "mars"],
    supportive_boost: 1.1,
    min_strength: 0.3,
    shift_strength: 0.7,
    shift_count_change: 2,
    peak: { total_at_least: 1.8, supportive_at_least: 2 },
    elevated: { total_at_least: 1.2, supportive_at_least: 1 },
    window_min_days: 2,
    window_max_count: 3,
  },
});

const Orb = z.number().finite().min(0).max(30);
const ClassOrbs = z.object({ fast: Orb, slow: Orb });

export const OrbTableSchema = z.object({
  conjunction: ClassOrbs,
  sextile: ClassOrbs,
  square: ClassOrbs,
  trine: ClassOrbs,
  opposition: ClassOrbs,
});

const AspectTypeSchema = z.enum(ASPECT_TYPES);

export const PulsePolicySchema = z
  .object({
    harmonious: z.array(AspectTypeSchema),
    challenging: z.array(AspectTypeSchema),
    amplifying: z.array(AspectTypeSchema),
    grounded_total_below: z.number().finite().min(0),
    flowing_net_at_least: z.number().finite(),
    friction_net_at_most: z.number().finite(),
    score_base: z.number().finite().min(0).max(100),
    score_per_net: z.number().finite().min(0),
  })
  .refine((p) => p.friction_net_at_most < p.flowing_net_at_least, {
    message: "friction threshold must be below the flowing threshold",
  });

const Unit = z.number().finite().min(0).max(1);
const Threshold = z.object({
  total_at_least: z.number().finite().min(0),
  supportive_at_least: z.number().int().min(0),
});

export const ActivationPolicySchema = z
  .object({
    trigger_bodies: z.array(z.enum(BODY_IDS)).min(1),
    supportive_boost: z.number().finite().min(1),
    min_strength: Unit,
    shift_strength: Unit,
    shift_count_change: z.number().int().min(1),
    peak: Threshold,
    elevated: Threshold,
    window_min_days: z.number().int().min(1),
    window_max_count: z.number().int().min(0),
  })
  .refine((p) => p.elevated.total_at_least <= p.peak.total_at_least, {
    message: "elevated threshold must not exceed the peak threshold",
    path: ["elevated"],
  });

/**
 * Orb allowed for a pair: the wider of the two bodies' class orbs.
 */
export function allowedOrb(orbs: OrbTable, type: AspectType, a: BodyId, b: BodyId): number {
  return Math.max(orbs[type][BODY_CLASS[a]], orbs[type][BODY_CLASS[b]]);
}
