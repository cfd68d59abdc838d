/**
 * Strength Policy v1
 *
 * Tables and weights for the planetary strength scorer. Everything the
 * scorer treats as a judgement call lives here so it can be reviewed and
 * swapped without touching the arithmetic.
 */

import { z } from "zod";
import { SIGN_NAMES, type SignName } from "../../angles.js";
import type { HouseAngularity } from "../../ephemeris/houses.js";
import type { BodyId } from "../../ephemeris/types.js";
import { deepFreeze } from "../../freeze.js";
import { BodyIdSchema, perBody, SignSchema } from "../../schemas/common.schema.js";

export const LIFE_DOMAINS = ["career", "relationship", "health", "spiritual"] as const;
export type LifeDomain = (typeof LIFE_DOMAINS)[number];

export type Dignity = "exalted" | "own" | "friendly" | "neutral" | "enemy" | "debilitated";

export interface BodyDignityTable {
  exaltation: SignName | null;
  debilitation: SignName | null;
  own: SignName[];
  friends: BodyId[];
  enemies: BodyId[];
}

export interface StrengthPolicyV1 {
  strength_policy_version: string;

  /** Positional score per dignity class, 0-100 */
  dignity_scores: Record<Dignity, number>;

  dignities: Record<BodyId, BodyDignityTable>;

  /** Classical lord of each sign, used to judge friendly/enemy placement */
  sign_lords: Record<SignName, BodyId>;

  /** Directional score per house class, 0-100 */
  angularity_scores: Record<HouseAngularity, number>;

  temporal: {
    base: number;
    /** Added when a day ruler is born by day (or night ruler by night), subtracted otherwise */
    day_night_bonus: number;
    day_rulers: BodyId[];
    night_rulers: BodyId[];
    retrograde_multiplier: number;
    /** Bodies whose retrograde motion is their normal state */
    retrograde_exempt: BodyId[];
  };

  /** Composite weights; must sum to 1.0 */
  weights: {
    positional: number;
    directional: number;
    temporal: number;
  };

  /** Body → domain affinity, 0-1 */
  affinity: Record<BodyId, Record<LifeDomain, number>>;
}

const NO_DIGNITY: BodyDignityTable = {
  exaltation: null,
  debilitation: null,
  own: [],
  friends: [],
  enemies: [],
};

export const STRENGTH_POLICY_V1: StrengthPolicyV1 = deepFreeze<StrengthPolicyV1>({
  strength_policy_version: "strength_v1",

  dignity_scores: {
    exalted: 100,
    own: 80,
    friendly: 65,
    neutral: 50,
    enemy: 35,
    debilitated: 0,
  },

  dignities: {
    sun: {
      exaltation: "aries",
      debilitation: "libra",
      own: ["leo"],
      friends: ["moon", "mars", "jupiter"],
      enemies: ["venus", "saturn"],
    },
    moon: {
      exaltation: "taurus",
      debilitation: "scorpio",
      own: ["cancer"],
      friends: ["sun", "mercury"],
      enemies: [],
    },
    mercury: {
      exaltation: "virgo",
      debilitation: "pisces",
      own: ["gemini", "virgo"],
      friends: ["sun", "venus"],
      enemies: ["moon"],
    },
    venus: {
      exaltation: "pisces",
      debilitation: "virgo",
      own: ["taurus", "libra"],
      friends: ["mercury", "saturn"],
      enemies: ["sun", "moon"],
    },
    mars: {
      exaltation: "capricorn",
      debilitation: "cancer",
      own: ["aries", "scorpio"],
      friends: ["sun", "moon", "jupiter"],
      enemies: ["mercury"],
    },
    jupiter: {
      exaltation: "cancer",
      debilitation: "capricorn",
      own: ["sagittarius", "pisces"],
      friends: ["sun", "moon", "mars"],
      enemies: ["mercury", "venus"],
    },
    saturn: {
      exaltation: "libra",
      debilitation: "aries",
      own: ["capricorn", "aquarius"],
      friends: ["mercury", "venus"],
      enemies: ["sun", "moon", "mars"],
    },
    uranus: NO_DIGNITY,
    neptune: NO_DIGNITY,
    pluto: NO_DIGNITY,
    rahu: {
      exaltation: "taurus",
      debilitation: "scorpio",
      own: [],
      friends: ["mercury", "venus", "saturn"],
      enemies: ["sun", "moon", "mars"],
    },
    ketu: {
      exaltation: "scorpio",
      debilitation: "taurus",
      own: [],
      friends: ["mars", "jupiter"],
      enemies: ["sun", "moon"],
    },
  },

  sign_lords: {
    aries: "mars",
    taurus: "venus",
    gemini: "mercury",
    cancer: "moon",
    leo: "sun",
    virgo: "mercury",
    libra: "venus",
    scorpio: "mars",
    sagittarius: "jupiter",
    capricorn: "saturn",
    aquarius: "saturn",
    pisces: "jupiter",
  },

  angularity_scores: {
    angular: 100,
    succedent: 60,
    cadent: 30,
  },

  temporal: {
    base: 50,
    day_night_bonus: 25,
    day_rulers: ["sun", "jupiter", "venus"],
    night_rulers: ["moon", "mars", "saturn"],
    retrograde_multiplier: 0.85,
    retrograde_exempt: ["rahu", "ketu"],
  },

  weights: {
    positional: 0.5,
    directional: 0.25,
    temporal: 0.25,
  },

  affinity: {
    sun: { career: 0.9, relationship: 0.4, health: 0.8, spiritual: 0.6 },
    moon: { career: 0.3, relationship: 0.8, health: 0.7, spiritual: 0.7 },
    mercury: { career: 0.8, relationship: 0.7, health: 0.5, spiritual: 0.5 },
    venus: { career: 0.6, relationship: 0.9, health: 0.6, spiritual: 0.5 },
    mars: { career: 0.7, relationship: 0.5, health: 0.9, spiritual: 0.4 },
    jupiter: { career: 0.7, relationship: 0.7, health: 0.6, spiritual: 0.9 },
    saturn: { career: 0.8, relationship: 0.4, health: 0.5, spiritual: 0.7 },
    uranus: { career: 0.5, relationship: 0.3, health: 0.2, spiritual: 0.6 },
    neptune: { career: 0.2, relationship: 0.5, health: 0.3, spiritual: 0.9 },
    pluto: { career: 0.6, relationship: 0.4, health: 0.5, spiritual: 0.8 },
    rahu: { career: 0.8, relationship: 0.6, health: 0.3, spiritual: 0.6 },
    ketu: { career: 0.3, relationship: 0.3, health: 0.4, spiritual: 0.9 },
  },
});

const Score = z.number().finite().min(0).max(100);
const Unit = z.number().finite().min(0).max(1);

export const StrengthPolicySchema = z
  .object({
    strength_policy_version: z.string().min(1),
    dignity_scores: z.object({
      exalted: Score,
      own: Score,
      friendly: Score,
      neutral: Score,
      enemy: Score,
      debilitated: Score,
    }),
    dignities: perBody(
      z.object({
        exaltation: SignSchema.nullable(),
        debilitation: SignSchema.nullable(),
        own: z.array(SignSchema),
        friends: z.array(BodyIdSchema),
        enemies: z.array(BodyIdSchema),
      })
    ),
    sign_lords: z.record(SignSchema, BodyIdSchema),
    angularity_scores: z.object({ angular: Score, succedent: Score, cadent: Score }),
    temporal: z.object({
      base: Score,
      day_night_bonus: z.number().finite().min(0).max(50),
      day_rulers: z.array(BodyIdSchema),
      night_rulers: z.array(BodyIdSchema),
      retrograde_multiplier: Unit,
      retrograde_exempt: z.array(BodyIdSchema),
    }),
    weights: z.object({ positional: Unit, directional: Unit, temporal: Unit }),
    affinity: perBody(
      z.object({ career: Unit, relationship: Unit, health: Unit, spiritual: Unit })
    ),
  })
  .refine(
    (p) =>
      Math.abs(p.weights.positional + p.weights.directional + p.weights.temporal - 1) < 1e-9,
    { message: "weights must sum to 1.0", path: ["weights"] }
  )
  .refine((p) => SIGN_NAMES.every((sign) => sign in p.sign_lords), {
    message: "every sign needs a lord",
    path: ["sign_lords"],
  });
